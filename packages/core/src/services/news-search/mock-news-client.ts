import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { NewsArticle, NewsSearchClient } from './types.js';

const log = createChildLogger('news-search:mock');

const DEFAULT_ARTICLES: readonly NewsArticle[] = [
  {
    title: 'Mock market headline',
    description: 'Mock news article about the industry.',
    link: 'https://example.com/news/1',
    pubDate: 'Mon, 15 Jul 2024 09:00:00 +0900',
  },
];

export function createMockNewsClient(
  responses?: Map<string, readonly NewsArticle[]>,
): NewsSearchClient {
  log.info('Using mock news search client');

  return {
    available: true,
    search(query: string, limit: number): Promise<readonly NewsArticle[]> {
      log.debug({ query }, 'Mock news search');
      const articles = responses?.get(query) ?? DEFAULT_ARTICLES;
      return Promise.resolve(articles.slice(0, limit));
    },
  };
}
