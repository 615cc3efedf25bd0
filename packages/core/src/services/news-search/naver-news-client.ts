import { z } from 'zod';
import { createChildLogger } from '@market-agent/shared/src/logger.js';
import { ConfigurationError, MarketAgentError, toError } from '@market-agent/shared/src/utils/errors.js';
import type { NewsArticle, NewsSearchClient } from './types.js';

const log = createChildLogger('news-search:naver');

export const NAVER_NEWS_URL = 'https://openapi.naver.com/v1/search/news.json';
const DEFAULT_TIMEOUT_MS = 10_000;

export interface NaverNewsClientConfig {
  readonly clientId: string;
  readonly clientSecret: string;
  readonly url?: string;
  readonly timeoutMs?: number;
}

const NaverNewsResponseSchema = z.object({
  items: z
    .array(
      z.object({
        title: z.string().default(''),
        description: z.string().default(''),
        link: z.string().default(''),
        originallink: z.string().optional(),
        pubDate: z.string().default(''),
      }),
    )
    .default([]),
});

const ENTITIES: Readonly<Record<string, string>> = {
  '&quot;': '"',
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&apos;': "'",
  '&#39;': "'",
};

/** Search results mark matches with `<b>` and escape quotes as entities. */
export function stripMarkup(text: string): string {
  return text
    .replace(/<\/?b>/g, '')
    .replace(/&(quot|amp|lt|gt|apos|#39);/g, (entity) => ENTITIES[entity] ?? entity)
    .trim();
}

export function createNaverNewsClient(config: NaverNewsClientConfig): NewsSearchClient {
  if (!config.clientId || !config.clientSecret) {
    throw new ConfigurationError('Naver client id and secret are required for news search');
  }
  const url = config.url ?? NAVER_NEWS_URL;
  const timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  return {
    available: true,

    async search(query: string, limit: number): Promise<readonly NewsArticle[]> {
      const params = new URLSearchParams({
        query,
        display: String(limit),
        start: '1',
        sort: 'date',
      });

      let response: Response;
      try {
        response = await fetch(`${url}?${params.toString()}`, {
          headers: {
            'X-Naver-Client-Id': config.clientId,
            'X-Naver-Client-Secret': config.clientSecret,
          },
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (error) {
        throw new MarketAgentError(
          `News search request failed: ${toError(error).message}`,
          'NEWS_SEARCH_ERROR',
          toError(error),
        );
      }

      if (!response.ok) {
        throw new MarketAgentError(
          `News search responded with ${String(response.status)}`,
          'NEWS_SEARCH_ERROR',
        );
      }

      const parsed = NaverNewsResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new MarketAgentError('News search returned an unexpected payload', 'NEWS_SEARCH_ERROR');
      }

      const articles = parsed.data.items.slice(0, limit).map((item) => ({
        title: stripMarkup(item.title),
        description: stripMarkup(item.description),
        link: item.link || item.originallink || '',
        pubDate: item.pubDate,
      }));
      log.debug({ query, count: articles.length }, 'News search completed');
      return articles;
    },
  };
}

/** Used when no API credentials are configured. */
export function createDisabledNewsClient(): NewsSearchClient {
  log.warn('News search credentials are not configured; news hints are disabled');
  return {
    available: false,
    search(): Promise<readonly NewsArticle[]> {
      return Promise.resolve([]);
    },
  };
}
