import { CATEGORY_ORDER, TOP_LANGUAGE_LIMIT } from '../constants';
import type { ArticleCategory, CategoryAggregation, CategoryMatrix, LongRow } from '../types/articles';

export const matrixCell = (matrix: CategoryMatrix, language: string, category: ArticleCategory): number =>
    matrix.values.get(language)?.get(category) ?? 0;

export const matrixRowTotal = (matrix: CategoryMatrix, language: string): number =>
    matrix.categories.reduce((sum, category) => sum + matrixCell(matrix, language, category), 0);

/**
 * Count long rows per language, keyed in first-appearance order.
 */
export function countRowsByLanguage(rows: readonly LongRow[]): Map<string, number> {
    const totals = new Map<string, number>();
    rows.forEach((row) => {
        totals.set(row.languageCode, (totals.get(row.languageCode) ?? 0) + 1);
    });
    return totals;
}

/**
 * Languages with the most rows, largest first. Ties keep first-appearance order.
 */
export function selectTopLanguages(totals: Map<string, number>, limit: number = TOP_LANGUAGE_LIMIT): string[] {
    return Array.from(totals)
        .filter(([, count]) => count > 0)
        .sort((a, b) => b[1] - a[1])
        .slice(0, Math.max(0, limit))
        .map(([language]) => language);
}

/**
 * Group rows into a languages x categories count table.
 * Rows whose language is not listed are ignored; the category columns are the
 * categories present among the remaining rows, in display order.
 */
export function buildCountMatrix(rows: readonly LongRow[], languages: string[]): CategoryMatrix {
    const values = new Map<string, Map<ArticleCategory, number>>(
        languages.map((language) => [language, new Map<ArticleCategory, number>()]),
    );
    const present = new Set<ArticleCategory>();

    rows.forEach((row) => {
        const counts = values.get(row.languageCode);
        if (!counts) {
            return;
        }
        counts.set(row.category, (counts.get(row.category) ?? 0) + 1);
        present.add(row.category);
    });

    const categories = CATEGORY_ORDER.filter((category) => present.has(category));
    values.forEach((counts) => {
        categories.forEach((category) => {
            if (!counts.has(category)) {
                counts.set(category, 0);
            }
        });
    });

    return { languages: [...languages], categories, values };
}

/**
 * Divide each row by its sum. Rows summing to zero have no defined share and are left out.
 */
export function toPercentageMatrix(counts: CategoryMatrix): CategoryMatrix {
    const values = new Map<string, Map<ArticleCategory, number>>();
    const languages: string[] = [];

    counts.languages.forEach((language) => {
        const total = matrixRowTotal(counts, language);
        if (total === 0) {
            return;
        }
        languages.push(language);
        values.set(
            language,
            new Map(
                counts.categories.map((category) => [category, (matrixCell(counts, language, category) / total) * 100]),
            ),
        );
    });

    return { languages, categories: [...counts.categories], values };
}

export function aggregateCategories(
    rows: readonly LongRow[],
    limit: number = TOP_LANGUAGE_LIMIT,
): CategoryAggregation {
    const languageTotals = countRowsByLanguage(rows);
    const topLanguages = selectTopLanguages(languageTotals, limit);
    const retained = new Set(topLanguages);
    const topRows = rows.filter((row) => retained.has(row.languageCode));
    const counts = buildCountMatrix(topRows, topLanguages);

    return {
        languageTotals,
        topLanguages,
        rows: topRows,
        counts,
        percentages: toPercentageMatrix(counts),
    };
}
