import { CATEGORY_ORDER, LANGUAGE_NAMES, SAMPLE_SIZE } from '../constants';
import type {
    ArticleCategory,
    BreakdownRow,
    CategoryAggregation,
    CategoryMatrix,
    CategoryView,
    ChartMode,
    ChartSeriesRow,
    LongRow,
    PlotRow,
    SampleRow,
    ViewSummary,
} from '../types/articles';
import { matrixCell } from './categoryAggregator';

export const formatLanguageName = (code: string): string => LANGUAGE_NAMES[code] ?? code;

export const formatLanguageLabel = (code: string, total: number): string =>
    `${formatLanguageName(code)} (n=${total.toLocaleString('en-US')})`;

export const formatRowLabel = (code: string): string => `${formatLanguageName(code)} (${code})`;

export const formatPercentage = (value: number): string => `${value.toFixed(1)}%`;

export const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

const matrixForMode = (view: CategoryView, mode: ChartMode): CategoryMatrix =>
    mode === 'stacked-count' ? view.counts : view.percentages;

/**
 * Long-form plotting table: one row per (language, category) in view order.
 */
export function buildPlotRows(
    view: CategoryView,
    languageTotals: Map<string, number>,
    mode: ChartMode,
): PlotRow[] {
    const matrix = matrixForMode(view, mode);
    return matrix.languages.flatMap((languageCode) => {
        const languageLabel = formatLanguageLabel(languageCode, languageTotals.get(languageCode) ?? 0);
        return view.categories.map((category) => ({
            languageCode,
            languageLabel,
            category,
            value: matrixCell(matrix, languageCode, category),
        }));
    });
}

/**
 * Pivot plot rows into the one-object-per-bar shape recharts expects.
 */
export function toChartSeries(plotRows: PlotRow[]): ChartSeriesRow[] {
    const series = new Map<string, ChartSeriesRow>();
    plotRows.forEach((row) => {
        const entry = series.get(row.languageCode) ?? { languageLabel: row.languageLabel };
        entry[row.category] = row.value;
        series.set(row.languageCode, entry);
    });
    return Array.from(series.values());
}

const toBreakdownRows = (matrix: CategoryMatrix, categories: ArticleCategory[]): BreakdownRow[] =>
    matrix.languages.map((languageCode) => {
        const values: Partial<Record<ArticleCategory, number>> = {};
        categories.forEach((category) => {
            values[category] = matrixCell(matrix, languageCode, category);
        });
        return {
            languageCode,
            label: formatRowLabel(languageCode),
            values,
            total: categories.reduce((sum, category) => sum + (values[category] ?? 0), 0),
        };
    });

export const buildCountTable = (view: CategoryView): BreakdownRow[] => toBreakdownRows(view.counts, view.categories);

/**
 * Percentage rows as computed before filtering; the total is what the shown categories add up to.
 */
export const buildPercentageTable = (view: CategoryView): BreakdownRow[] =>
    toBreakdownRows(view.percentages, view.categories);

const countCategories = (rows: readonly LongRow[]): Map<ArticleCategory, number> => {
    const counts = new Map<ArticleCategory, number>();
    rows.forEach((row) => counts.set(row.category, (counts.get(row.category) ?? 0) + 1));
    return counts;
};

export function summarizeView(aggregation: CategoryAggregation, view: CategoryView): ViewSummary {
    const counts = countCategories(aggregation.rows);
    const mostCommonCategory = CATEGORY_ORDER.reduce<ArticleCategory | null>((best, category) => {
        const count = counts.get(category) ?? 0;
        if (count === 0) return best;
        if (!best) return category;
        return count > (counts.get(best) ?? 0) ? category : best;
    }, null);

    return {
        totalArticles: aggregation.rows.length,
        languagesShown: view.languages.length,
        categoriesShown: view.categories.length,
        mostCommonCategory,
    };
}

/**
 * Share of each category across all rows of the top languages, rounded to one decimal.
 * Categories with no rows are omitted.
 */
export function categoryBreakdown(
    aggregation: CategoryAggregation,
    categories: ArticleCategory[],
): Array<{ category: ArticleCategory; percentage: number }> {
    const total = aggregation.rows.length;
    if (total === 0) {
        return [];
    }
    const counts = countCategories(aggregation.rows);
    return categories
        .filter((category) => (counts.get(category) ?? 0) > 0)
        .map((category) => ({
            category,
            percentage: Math.round(((counts.get(category) ?? 0) / total) * 1000) / 10,
        }));
}

export interface LanguageCountRange {
    largest: { code: string; total: number };
    smallest: { code: string; total: number };
}

/**
 * The biggest and smallest of the top languages by article count.
 */
export function languageCountRange(aggregation: CategoryAggregation): LanguageCountRange | null {
    const { topLanguages, languageTotals } = aggregation;
    const first = topLanguages[0];
    const last = topLanguages[topLanguages.length - 1];
    if (first === undefined || last === undefined) {
        return null;
    }
    return {
        largest: { code: first, total: languageTotals.get(first) ?? 0 },
        smallest: { code: last, total: languageTotals.get(last) ?? 0 },
    };
}

/**
 * Random sample of rows in the shown categories and languages, sorted by language then category.
 * @param random - returns a float in [0, 1), like Math.random
 */
export function sampleArticles(
    rows: readonly LongRow[],
    view: CategoryView,
    size: number = SAMPLE_SIZE,
    random: () => number = Math.random,
): SampleRow[] {
    const categories = new Set(view.categories);
    const languages = new Set(view.languages);
    const pool = rows.filter((row) => categories.has(row.category) && languages.has(row.languageCode));
    const count = Math.min(Math.max(0, size), pool.length);

    // partial Fisher-Yates over a copy
    for (let index = 0; index < count; index += 1) {
        const swapIndex = index + Math.floor(random() * (pool.length - index));
        const current = pool[index];
        const swap = pool[swapIndex];
        if (current && swap) {
            pool[index] = swap;
            pool[swapIndex] = current;
        }
    }

    return pool
        .slice(0, count)
        .sort(
            (a, b) => a.languageCode.localeCompare(b.languageCode) || a.category.localeCompare(b.category),
        )
        .map((row) => ({
            languageName: formatLanguageName(row.languageCode),
            languageCode: row.languageCode,
            category: row.category,
            qid: row.qid,
            articleUrl: row.articleUrl,
        }));
}
