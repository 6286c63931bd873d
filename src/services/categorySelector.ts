import { CATEGORY_ORDER } from '../constants';
import type {
    ArticleCategory,
    CategoryAggregation,
    CategoryMatrix,
    SortKey,
    ViewRequest,
    ViewResult,
} from '../types/articles';
import { matrixCell } from './categoryAggregator';

export const EMPTY_CATEGORIES_MESSAGE = 'Please select at least one article type to display.';
export const EMPTY_LANGUAGES_MESSAGE = 'Please select at least one language to display.';

const SHARE_PREFIX = 'share:';

export const shareCategoryOf = (sortKey: SortKey): ArticleCategory | null =>
    sortKey.startsWith(SHARE_PREFIX)
        ? CATEGORY_ORDER.find((category) => `${SHARE_PREFIX}${category}` === sortKey) ?? null
        : null;

/**
 * Order the top languages for display.
 *
 * Share sorts rank against the full percentage table, before any category
 * filter, so hiding a category does not change an order computed from it.
 */
export function orderLanguages(aggregation: CategoryAggregation, sortKey: SortKey): string[] {
    const { topLanguages, languageTotals, percentages } = aggregation;
    const total = (language: string) => languageTotals.get(language) ?? 0;

    if (sortKey === 'count-desc') {
        return [...topLanguages].sort((a, b) => total(b) - total(a));
    }
    if (sortKey === 'count-asc') {
        return [...topLanguages].sort((a, b) => total(a) - total(b));
    }

    const category = shareCategoryOf(sortKey);
    if (!category || !percentages.categories.includes(category)) {
        return [...topLanguages];
    }
    return [...topLanguages].sort(
        (a, b) => matrixCell(percentages, b, category) - matrixCell(percentages, a, category),
    );
}

const restrictMatrix = (
    matrix: CategoryMatrix,
    languages: string[],
    categories: ArticleCategory[],
): CategoryMatrix => {
    const values = new Map<string, Map<ArticleCategory, number>>();
    const kept = languages.filter((language) => matrix.values.has(language));
    kept.forEach((language) => {
        values.set(
            language,
            new Map(categories.map((category) => [category, matrixCell(matrix, language, category)])),
        );
    });
    return { languages: kept, categories: [...categories], values };
};

/**
 * Apply the user's category and language choices, sort order and language cap.
 * The source matrices are left untouched and percentages are not re-normalized.
 */
export function selectView(aggregation: CategoryAggregation, request: ViewRequest): ViewResult {
    // a choice that matches nothing in the data counts as an empty selection
    const chosenCategories = new Set(request.categories);
    const categories = aggregation.counts.categories.filter((category) => chosenCategories.has(category));
    if (categories.length === 0) {
        return { status: 'empty-categories', message: EMPTY_CATEGORIES_MESSAGE };
    }

    const chosenLanguages = new Set(request.languages);
    let languages = orderLanguages(aggregation, request.sortKey).filter((language) =>
        chosenLanguages.has(language),
    );
    if (languages.length === 0) {
        return { status: 'empty-languages', message: EMPTY_LANGUAGES_MESSAGE };
    }
    if (request.languageLimit !== undefined) {
        languages = languages.slice(0, Math.max(0, request.languageLimit));
    }

    return {
        status: 'ok',
        view: {
            languages,
            categories,
            counts: restrictMatrix(aggregation.counts, languages, categories),
            percentages: restrictMatrix(aggregation.percentages, languages, categories),
        },
    };
}
