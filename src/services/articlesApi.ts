import { ARTICLE_TABLE_SCHEMA } from '../constants';
import type { ArticleDataset, ArticleTableSchema } from '../types/articles';
import { buildArticleDataset } from './articleLoader';

/**
 * Loads keyed by source, freshness stamp and schema. Entries hold the in-flight
 * promise so concurrent callers share one request.
 */
export type LoadCache = Map<string, Promise<ArticleDataset>>;

export const createLoadCache = (): LoadCache => new Map();

export interface LoadOptions {
    schema?: ArticleTableSchema;
    /** Cancels this caller's wait only; a download other callers share keeps running. */
    signal?: AbortSignal;
}

/**
 * Fetch a freshness stamp for the article table without downloading it.
 * @returns the Last-Modified or ETag header, or an empty string when the server sends neither
 */
export async function fetchArticlesStamp(source: string, signal?: AbortSignal): Promise<string> {
    const response = await fetch(source, { method: 'HEAD', signal });

    if (!response.ok) {
        throw new Error(`Failed to load article data: ${response.status}`);
    }

    return response.headers.get('last-modified') ?? response.headers.get('etag') ?? '';
}

/**
 * Download the raw CSV text of the article table.
 */
export async function fetchArticlesCsv(source: string): Promise<string> {
    const response = await fetch(source, {
        method: 'GET',
        headers: {
            Accept: 'text/csv',
        },
    });

    if (!response.ok) {
        throw new Error(`Failed to load article data: ${response.status}`);
    }

    return response.text();
}

const schemaKey = (schema: ArticleTableSchema): string =>
    JSON.stringify([schema.idColumn, schema.categoryColumn, schema.languagePrefix, schema.languages ?? null]);

const abortError = () => new DOMException('The article load was aborted.', 'AbortError');

// Settle with the shared promise unless this caller's signal fires first
const untilAborted = <T>(shared: Promise<T>, signal?: AbortSignal): Promise<T> => {
    if (!signal) {
        return shared;
    }
    if (signal.aborted) {
        return Promise.reject(abortError());
    }

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(abortError());
        signal.addEventListener('abort', onAbort, { once: true });
        shared.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
};

/**
 * Load and reshape the article table, reusing a cached result while the source is unchanged.
 * A failed load is evicted so the next call retries.
 */
export async function loadArticleDataset(
    source: string,
    cache: LoadCache,
    options: LoadOptions = {},
): Promise<ArticleDataset> {
    const schema = options.schema ?? ARTICLE_TABLE_SCHEMA;
    const stamp = await fetchArticlesStamp(source, options.signal);
    const versionPrefix = `${source}::${stamp}::`;
    const key = `${versionPrefix}${schemaKey(schema)}`;

    const cached = cache.get(key);
    if (cached) {
        return untilAborted(cached, options.signal);
    }

    // drop results for older versions of the same file
    for (const staleKey of cache.keys()) {
        if (staleKey.startsWith(`${source}::`) && !staleKey.startsWith(versionPrefix)) {
            cache.delete(staleKey);
        }
    }

    const pending = fetchArticlesCsv(source).then((csvText) =>
        buildArticleDataset(csvText, schema, source, stamp),
    );
    cache.set(key, pending);
    pending.then(undefined, () => {
        if (cache.get(key) === pending) {
            cache.delete(key);
        }
    });

    return untilAborted(pending, options.signal);
}
