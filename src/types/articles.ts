/**
 * Article-type labels assigned offline from Wikidata's P31/P279 hierarchy
 */
export const ARTICLE_CATEGORIES = ['concept', 'event', 'human', 'organization', 'other', 'none'] as const;

export type ArticleCategory = (typeof ARTICLE_CATEGORIES)[number];

/**
 * Column layout the article table must follow
 */
export interface ArticleTableSchema {
    idColumn: string;
    categoryColumn: string;
    languagePrefix: string;
    /** Language codes whose columns must be present; when omitted, every prefixed column is read. */
    languages?: string[];
}

/**
 * Raw CSV contents before validation
 */
export interface ArticleTable {
    fields: string[];
    records: Array<Record<string, string | undefined>>;
}

/**
 * One classified article with its per-language locators
 */
export interface ArticleItem {
    qid: string;
    category: ArticleCategory;
    articles: Map<string, string>;
}

/**
 * One (item, language) pair of the long-form table
 */
export interface LongRow {
    qid: string;
    languageCode: string;
    articleUrl: string;
    category: ArticleCategory;
}

/**
 * Result of a single load of the article table
 */
export interface ArticleDataset {
    source: string;
    stamp: string;
    readonly languageColumns: readonly string[];
    readonly items: readonly ArticleItem[];
    readonly rows: readonly LongRow[];
}

/**
 * Languages x categories table with explicit row and column order
 */
export interface CategoryMatrix {
    languages: string[];
    categories: ArticleCategory[];
    values: Map<string, Map<ArticleCategory, number>>;
}

export interface CategoryAggregation {
    /** Row count of every language in the data, in first-appearance order. */
    languageTotals: Map<string, number>;
    topLanguages: string[];
    /** Long rows whose language is among the top languages. */
    rows: readonly LongRow[];
    counts: CategoryMatrix;
    percentages: CategoryMatrix;
}

export type SortKey = 'count-desc' | 'count-asc' | `share:${ArticleCategory}`;

export type ChartMode = 'stacked-percentage' | 'stacked-count' | 'grouped';

export interface ViewRequest {
    categories: ArticleCategory[];
    languages: string[];
    sortKey: SortKey;
    languageLimit?: number;
}

/**
 * Filtered, ordered slice of an aggregation ready for display
 */
export interface CategoryView {
    languages: string[];
    categories: ArticleCategory[];
    counts: CategoryMatrix;
    percentages: CategoryMatrix;
}

export type ViewResult =
    | { status: 'ok'; view: CategoryView }
    | { status: 'empty-categories'; message: string }
    | { status: 'empty-languages'; message: string };

export interface PlotRow {
    languageCode: string;
    languageLabel: string;
    category: ArticleCategory;
    value: number;
}

export type ChartSeriesRow = { languageLabel: string } & Partial<Record<ArticleCategory, number>>;

export interface BreakdownRow {
    languageCode: string;
    label: string;
    values: Partial<Record<ArticleCategory, number>>;
    total: number;
}

export interface SampleRow {
    languageName: string;
    languageCode: string;
    category: ArticleCategory;
    qid: string;
    articleUrl: string;
}

export interface ViewSummary {
    totalArticles: number;
    languagesShown: number;
    categoriesShown: number;
    mostCommonCategory: ArticleCategory | null;
}
