import { CATEGORY_COLORS } from '../constants';
import { makeRows } from '../testing/fixtures';
import type { CategoryView, ViewRequest } from '../types/articles';
import { aggregateCategories } from './categoryAggregator';
import {
  buildCountTable,
  buildPercentageTable,
  buildPlotRows,
  capitalize,
  categoryBreakdown,
  formatLanguageLabel,
  formatLanguageName,
  formatPercentage,
  formatRowLabel,
  languageCountRange,
  sampleArticles,
  summarizeView,
  toChartSeries,
} from './categoryPresenter';
import { selectView } from './categorySelector';

// Q1 en/event, Q2-Q3 en/human, Q4 en/organization, Q5-Q6 fr/event, Q7 fr/human,
// Q8 de/human, Q9-Q12 de/organization
const aggregation = aggregateCategories(
  makeRows([
    ['en', 'event', 1],
    ['en', 'human', 2],
    ['en', 'organization', 1],
    ['fr', 'event', 2],
    ['fr', 'human', 1],
    ['de', 'human', 1],
    ['de', 'organization', 4],
  ]),
);

const viewOf = (overrides: Partial<ViewRequest> = {}): CategoryView => {
  const result = selectView(aggregation, {
    categories: aggregation.counts.categories,
    languages: aggregation.topLanguages,
    sortKey: 'count-desc',
    ...overrides,
  });
  if (result.status !== 'ok') {
    throw new Error(result.message);
  }
  return result.view;
};

describe('categoryPresenter', () => {
  describe('labels', () => {
    it('names registered languages and echoes unknown codes', () => {
      expect(formatLanguageName('fi')).toBe('Finnish');
      expect(formatLanguageName('eo')).toBe('eo');
    });

    it('annotates labels with the article count', () => {
      expect(formatLanguageLabel('en', 2991)).toBe('English (n=2,991)');
      expect(formatLanguageLabel('eo', 3)).toBe('eo (n=3)');
      expect(formatRowLabel('bg')).toBe('Bulgarian (bg)');
    });

    it('formats percentages and category names', () => {
      expect(formatPercentage(66.66666)).toBe('66.7%');
      expect(capitalize('organization')).toBe('Organization');
    });
  });

  describe('buildPlotRows', () => {
    it('emits one row per language and category with counts', () => {
      const rows = buildPlotRows(viewOf(), aggregation.languageTotals, 'stacked-count');

      expect(rows).toHaveLength(9);
      expect(rows.slice(0, 3)).toEqual([
        { languageCode: 'de', languageLabel: 'German (n=5)', category: 'event', value: 0 },
        { languageCode: 'de', languageLabel: 'German (n=5)', category: 'organization', value: 4 },
        { languageCode: 'de', languageLabel: 'German (n=5)', category: 'human', value: 1 },
      ]);
    });

    it('uses percentages for the stacked-percentage and grouped modes', () => {
      const stacked = buildPlotRows(viewOf(), aggregation.languageTotals, 'stacked-percentage');
      const grouped = buildPlotRows(viewOf(), aggregation.languageTotals, 'grouped');

      expect(stacked).toEqual(grouped);
      expect(stacked.find((row) => row.languageCode === 'de' && row.category === 'organization')?.value).toBe(80);
    });

    it('keeps the shares computed before the category filter', () => {
      const rows = buildPlotRows(viewOf({ categories: ['human'] }), aggregation.languageTotals, 'grouped');

      expect(rows.map((row) => row.languageCode)).toEqual(['de', 'en', 'fr']);
      expect(rows[0]?.value).toBe(20);
      expect(rows[1]?.value).toBe(50);
      expect(rows[2]?.value).toBeCloseTo(33.333, 3);
    });
  });

  describe('toChartSeries', () => {
    it('pivots plot rows into one entry per language in view order', () => {
      const series = toChartSeries(buildPlotRows(viewOf(), aggregation.languageTotals, 'stacked-count'));

      expect(series).toEqual([
        { languageLabel: 'German (n=5)', event: 0, organization: 4, human: 1 },
        { languageLabel: 'English (n=4)', event: 1, organization: 1, human: 2 },
        { languageLabel: 'French (n=3)', event: 2, organization: 0, human: 1 },
      ]);
    });
  });

  describe('breakdown tables', () => {
    it('lists counts with a total column', () => {
      const rows = buildCountTable(viewOf({ categories: ['organization', 'human'] }));

      expect(rows[0]).toEqual({
        languageCode: 'de',
        label: 'German (de)',
        values: { organization: 4, human: 1 },
        total: 5,
      });
      expect(rows.map((row) => row.total)).toEqual([5, 3, 1]);
    });

    it('lists percentages without re-normalizing', () => {
      const rows = buildPercentageTable(viewOf({ categories: ['event', 'human'] }));

      expect(rows.map((row) => row.label)).toEqual(['German (de)', 'English (en)', 'French (fr)']);
      expect(rows[1]?.values).toEqual({ event: 25, human: 50 });
      expect(rows[1]?.total).toBe(75);
    });
  });

  describe('summarizeView', () => {
    it('reports totals over the top languages and the most common category', () => {
      expect(summarizeView(aggregation, viewOf({ languageLimit: 2, categories: ['human'] }))).toEqual({
        totalArticles: 12,
        languagesShown: 2,
        categoriesShown: 1,
        mostCommonCategory: 'organization',
      });
    });

    it('breaks ties by display order', () => {
      const tied = aggregateCategories(
        makeRows([
          ['en', 'human', 2],
          ['en', 'event', 2],
        ]),
      );
      const result = selectView(tied, { categories: ['human'], languages: ['en'], sortKey: 'count-desc' });
      if (result.status !== 'ok') {
        throw new Error(result.message);
      }

      expect(summarizeView(tied, result.view).mostCommonCategory).toBe('event');
    });
  });

  describe('categoryBreakdown', () => {
    it('rounds overall shares to one decimal', () => {
      expect(categoryBreakdown(aggregation, ['event', 'human', 'organization', 'concept'])).toEqual([
        { category: 'event', percentage: 25 },
        { category: 'human', percentage: 33.3 },
        { category: 'organization', percentage: 41.7 },
      ]);
    });
  });

  describe('languageCountRange', () => {
    it('picks the first and last of the top languages', () => {
      expect(languageCountRange(aggregation)).toEqual({
        largest: { code: 'de', total: 5 },
        smallest: { code: 'fr', total: 3 },
      });
    });

    it('is empty without languages', () => {
      expect(languageCountRange(aggregateCategories([]))).toBeNull();
    });
  });

  describe('sampleArticles', () => {
    it('restricts to the shown categories and sorts by language', () => {
      const sample = sampleArticles(aggregation.rows, viewOf({ categories: ['human'] }), 100, () => 0);

      expect(sample.map((row) => `${row.languageCode}:${row.qid}`)).toEqual(['de:Q8', 'en:Q2', 'en:Q3', 'fr:Q7']);
      expect(sample[0]).toEqual({
        languageName: 'German',
        languageCode: 'de',
        category: 'human',
        qid: 'Q8',
        articleUrl: 'https://de.example.org/wiki/Q8',
      });
    });

    it('restricts to the shown languages', () => {
      const sample = sampleArticles(aggregation.rows, viewOf({ languages: ['fr'] }), 100, () => 0);

      expect(sample.map((row) => row.qid)).toEqual(['Q5', 'Q6', 'Q7']);
    });

    it('never returns more rows than requested', () => {
      const first = sampleArticles(aggregation.rows, viewOf({ categories: ['human'] }), 2, () => 0);
      const last = sampleArticles(aggregation.rows, viewOf({ categories: ['human'] }), 2, () => 0.999);

      expect(first.map((row) => row.qid)).toEqual(['Q2', 'Q3']);
      expect(last.map((row) => row.qid)).toEqual(['Q8', 'Q2']);
    });
  });

  it('assigns every category a distinct fixed color', () => {
    expect(new Set(Object.values(CATEGORY_COLORS)).size).toBe(6);
    expect(CATEGORY_COLORS.event).toBe('#66c2a5');
  });
});
