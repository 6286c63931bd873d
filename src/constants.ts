import type { ArticleCategory, ArticleTableSchema, ChartMode, SortKey } from './types/articles';

// Static CSV served from the public directory (see DATA_DIR in settings/.env)
export const ARTICLES_SOURCE_URL = '/data/articles.csv';

export const ARTICLE_TABLE_SCHEMA: ArticleTableSchema = {
    idColumn: 'qid',
    categoryColumn: 'category',
    languagePrefix: 'article_',
};

export const TOP_LANGUAGE_LIMIT = 25;

export const SAMPLE_SIZE = 100;

export const LANGUAGE_SLIDER = {
    min: 5,
    max: 25,
    step: 5,
} as const;

// Display and stacking order
export const CATEGORY_ORDER: readonly ArticleCategory[] = ['event', 'concept', 'organization', 'human', 'none', 'other'];

export const CATEGORY_COLORS: Record<ArticleCategory, string> = {
    event: '#66c2a5',
    concept: '#fc8d62',
    organization: '#8da0cb',
    human: '#e78ac3',
    none: '#a6d854',
    other: '#ffd92f',
};

export const CATEGORY_DEFINITIONS: Record<ArticleCategory, string> = {
    concept: 'Scientific concepts, theories, properties, phenomena (e.g., greenhouse effect, carbon cycle)',
    event: 'Conferences, protests, disasters, climate summits (e.g., COP meetings, climate strikes)',
    human: 'Biographies of climate activists, scientists, politicians',
    organization: 'Companies, NGOs, government agencies, research institutions (e.g., IPCC, Greenpeace)',
    none: 'Articles with no instance type information in Wikidata',
    other: "Articles that don't fit the above categories (technologies, geographic features, policies, etc.)",
};

export const LANGUAGE_NAMES: Record<string, string> = {
    en: 'English',
    ar: 'Arabic',
    fr: 'French',
    es: 'Spanish',
    de: 'German',
    pt: 'Portuguese',
    zh: 'Chinese',
    ru: 'Russian',
    uk: 'Ukrainian',
    it: 'Italian',
    ja: 'Japanese',
    nl: 'Dutch',
    id: 'Indonesian',
    pl: 'Polish',
    sv: 'Swedish',
    fi: 'Finnish',
    cs: 'Czech',
    ko: 'Korean',
    he: 'Hebrew',
    el: 'Greek',
    da: 'Danish',
    hu: 'Hungarian',
    hi: 'Hindi',
    ro: 'Romanian',
    bg: 'Bulgarian',
};

export const SORT_OPTIONS: ReadonlyArray<{ key: SortKey; label: string }> = [
    { key: 'count-desc', label: 'Article Count (Descending)' },
    { key: 'count-asc', label: 'Article Count (Ascending)' },
    { key: 'share:event', label: 'Highest % Event' },
    { key: 'share:concept', label: 'Highest % Concept' },
    { key: 'share:organization', label: 'Highest % Organization' },
    { key: 'share:human', label: 'Highest % Human' },
    { key: 'share:other', label: 'Highest % Other' },
];

export const CHART_MODES: Record<
    ChartMode,
    { label: string; title: string; yLabel: string; stacked: boolean; yDomain?: [number, number] }
> = {
    'stacked-percentage': {
        label: 'Percentage (Stacked)',
        title: 'Distribution of Article Types Across Wikipedia Language Editions (%)',
        yLabel: 'Percentage of Articles',
        stacked: true,
        yDomain: [0, 100],
    },
    'stacked-count': {
        label: 'Raw Counts (Stacked)',
        title: 'Distribution of Article Types Across Wikipedia Language Editions (Counts)',
        yLabel: 'Number of Articles',
        stacked: true,
    },
    grouped: {
        label: 'Grouped Bars',
        title: 'Distribution of Article Types Across Wikipedia Language Editions (Grouped)',
        yLabel: 'Percentage of Articles',
        stacked: false,
    },
};

export const CHART_MODE_ORDER: readonly ChartMode[] = ['stacked-percentage', 'stacked-count', 'grouped'];
