import Papa from 'papaparse';
import { DataFormatError } from '../errors';
import { ARTICLE_CATEGORIES } from '../types/articles';
import type {
    ArticleCategory,
    ArticleDataset,
    ArticleItem,
    ArticleTable,
    ArticleTableSchema,
    LongRow,
} from '../types/articles';

const isArticleCategory = (value: string): value is ArticleCategory =>
    ARTICLE_CATEGORIES.some((category) => category === value);

/**
 * Parse CSV text into header fields and string records.
 * Values are kept as text; typing happens in {@link toArticleItems}.
 */
export function parseArticleTable(csvText: string): ArticleTable {
    const result = Papa.parse<Record<string, string | undefined>>(csvText, {
        header: true,
        skipEmptyLines: true,
        transformHeader: (header) => header.trim(),
    });

    const fatal = result.errors.find((error) => error.type === 'Quotes');
    if (fatal) {
        // quote errors index raw lines with the header as 0; report the CSV line number
        const line = fatal.row === undefined ? undefined : fatal.row + 1;
        throw new DataFormatError(`Malformed CSV: ${fatal.message}`, { row: line });
    }

    return {
        fields: result.meta.fields ?? [],
        records: result.data,
    };
}

/**
 * Resolve the language columns the schema expects and check the header against it.
 * @returns language codes in column order
 */
export function resolveLanguageColumns(fields: string[], schema: ArticleTableSchema): string[] {
    for (const column of [schema.idColumn, schema.categoryColumn]) {
        if (!fields.includes(column)) {
            throw new DataFormatError(`Article table is missing required column "${column}"`, { column });
        }
    }

    const discovered = fields
        .filter((field) => field.startsWith(schema.languagePrefix) && field.length > schema.languagePrefix.length)
        .map((field) => field.slice(schema.languagePrefix.length));

    if (schema.languages) {
        const missing = schema.languages.filter((code) => !discovered.includes(code));
        if (missing.length > 0) {
            const column = `${schema.languagePrefix}${missing[0] ?? ''}`;
            throw new DataFormatError(
                `Article table is missing language columns: ${missing.map((code) => schema.languagePrefix + code).join(', ')}`,
                { column },
            );
        }
        return [...schema.languages];
    }

    if (discovered.length === 0) {
        throw new DataFormatError(`Article table has no "${schema.languagePrefix}*" language columns`);
    }
    return discovered;
}

/**
 * Validate the table and turn each record into an {@link ArticleItem}.
 * Empty locator cells are dropped; an empty category cell reads as "none".
 */
export function toArticleItems(table: ArticleTable, schema: ArticleTableSchema): ArticleItem[] {
    const languages = resolveLanguageColumns(table.fields, schema);

    return table.records.map((record, index) => {
        // header is line 1
        const line = index + 2;
        const qid = (record[schema.idColumn] ?? '').trim();
        if (!qid) {
            throw new DataFormatError(`Row ${line} has an empty "${schema.idColumn}" value`, {
                column: schema.idColumn,
                row: line,
            });
        }

        const rawCategory = (record[schema.categoryColumn] ?? '').trim().toLowerCase();
        const category = rawCategory === '' ? 'none' : rawCategory;
        if (!isArticleCategory(category)) {
            throw new DataFormatError(`Row ${line} has unknown category "${rawCategory}"`, {
                column: schema.categoryColumn,
                row: line,
            });
        }

        const articles = new Map<string, string>();
        languages.forEach((code) => {
            const locator = (record[schema.languagePrefix + code] ?? '').trim();
            if (locator) {
                articles.set(code, locator);
            }
        });

        return { qid, category, articles };
    });
}

/**
 * Melt items into one row per (item, language) pair that has a locator.
 */
export function toLongRows(items: readonly ArticleItem[]): LongRow[] {
    return items.flatMap((item) =>
        Array.from(item.articles, ([languageCode, articleUrl]) => ({
            qid: item.qid,
            languageCode,
            articleUrl,
            category: item.category,
        })),
    );
}

export function buildArticleDataset(
    csvText: string,
    schema: ArticleTableSchema,
    source: string,
    stamp: string,
): ArticleDataset {
    const table = parseArticleTable(csvText);
    const languageColumns = resolveLanguageColumns(table.fields, schema);
    const items = toArticleItems(table, schema);
    const rows = toLongRows(items);
    if (items.length > 0 && rows.length === 0) {
        console.warn(`Article table ${source} has ${items.length} items but no article locators`);
    }
    return {
        source,
        stamp,
        languageColumns,
        items,
        rows,
    };
}
