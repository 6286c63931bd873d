import {
    createContext,
    useCallback,
    useContext,
    useEffect,
    useMemo,
    useState,
} from 'react';
import type { ReactNode } from 'react';
import { ARTICLES_SOURCE_URL, TOP_LANGUAGE_LIMIT } from '../constants';
import { DataFormatError } from '../errors';
import { createLoadCache, loadArticleDataset } from '../services/articlesApi';
import type { LoadCache } from '../services/articlesApi';
import { aggregateCategories } from '../services/categoryAggregator';
import type { ArticleDataset, CategoryAggregation } from '../types/articles';

interface ArticlesContextType {
    source: string;
    loading: boolean;
    error: string | null;
    /** True when the data file itself is malformed; retrying will not help. */
    fatal: boolean;
    dataset: ArticleDataset | null;
    aggregation: CategoryAggregation | null;
    reload: (signal?: AbortSignal) => Promise<void>;
}

type ArticlesProviderProps = {
    children: ReactNode;
    source?: string;
    cache?: LoadCache;
    topLanguageLimit?: number;
};

const ArticlesContext = createContext<ArticlesContextType | null>(null);

// Shared by every provider that is not handed its own cache
const defaultCache = createLoadCache();

export const ArticlesProvider = ({
    children,
    source = ARTICLES_SOURCE_URL,
    cache = defaultCache,
    topLanguageLimit = TOP_LANGUAGE_LIMIT,
}: ArticlesProviderProps) => {
    const [loading, setLoading] = useState(true);
    const [error, setError] = useState<string | null>(null);
    const [fatal, setFatal] = useState(false);
    const [dataset, setDataset] = useState<ArticleDataset | null>(null);

    const reload = useCallback(async (signal?: AbortSignal) => {
        setLoading(true);
        setError(null);
        setFatal(false);

        try {
            const loaded = await loadArticleDataset(source, cache, { signal });
            setDataset(loaded);
        } catch (err) {
            // the provider went away or started another load
            if (signal?.aborted) {
                return;
            }
            console.error('Failed to load article data:', err);
            setDataset(null);
            setFatal(err instanceof DataFormatError);
            setError(err instanceof Error ? err.message : 'Failed to load article data');
        }
        setLoading(false);
    }, [cache, source]);

    useEffect(() => {
        const controller = new AbortController();
        void reload(controller.signal);
        return () => controller.abort();
    }, [reload]);

    const aggregation = useMemo(
        () => (dataset ? aggregateCategories(dataset.rows, topLanguageLimit) : null),
        [dataset, topLanguageLimit],
    );

    const value = useMemo<ArticlesContextType>(
        () => ({
            source,
            loading,
            error,
            fatal,
            dataset,
            aggregation,
            reload,
        }),
        [source, loading, error, fatal, dataset, aggregation, reload],
    );

    return (
        <ArticlesContext.Provider value={value}>
            {children}
        </ArticlesContext.Provider>
    );
};

export const useArticles = (): ArticlesContextType => {
    const context = useContext(ArticlesContext);
    if (!context) {
        throw new Error('useArticles must be used within an ArticlesProvider');
    }
    return context;
};
