import type { ArticleCategory, LongRow } from '../types/articles';

// Three items, en/fr; the event item has no French article
export const SMALL_CSV = [
  'qid,category,article_en,article_fr',
  'Q1,human,https://en.example.org/wiki/One,https://fr.example.org/wiki/Un',
  'Q2,event,https://en.example.org/wiki/Two,',
  'Q3,human,https://en.example.org/wiki/Three,https://fr.example.org/wiki/Trois',
].join('\n');

/**
 * Build long rows from (language, category, count) triples, numbering qids in order.
 */
export const makeRows = (triples: Array<[string, ArticleCategory, number]>): LongRow[] => {
  let next = 1;
  return triples.flatMap(([languageCode, category, count]) =>
    Array.from({ length: count }, () => {
      const qid = `Q${next}`;
      next += 1;
      return {
        qid,
        languageCode,
        articleUrl: `https://${languageCode}.example.org/wiki/${qid}`,
        category,
      };
    }),
  );
};

type FakeResponse = {
  ok: boolean;
  status: number;
  headers: { get: (name: string) => string | null };
  text: () => Promise<string>;
};

export const fakeResponse = (
  body: string,
  { status = 200, headers = {} }: { status?: number; headers?: Record<string, string> } = {},
): FakeResponse => ({
  ok: status >= 200 && status < 300,
  status,
  headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
  text: async () => body,
});

/**
 * A fetch stand-in answering HEAD with the stamp headers and GET with the CSV body.
 */
export const csvFetch = (body: string, headers: Record<string, string> = {}, status = 200) =>
  jest.fn(async (_input: string, init?: RequestInit) =>
    init?.method === 'HEAD' ? fakeResponse('', { status, headers }) : fakeResponse(body, { status, headers }),
  );

/**
 * jsdom has no fetch; define one on window for the duration of a test.
 */
export const installFetch = (mock: jest.Mock) => {
  Object.defineProperty(window, 'fetch', {
    value: mock,
    writable: true,
    configurable: true,
  });
};
