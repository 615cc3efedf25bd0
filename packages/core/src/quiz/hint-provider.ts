import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { QuizQuestion } from '@market-agent/shared/src/types/quiz.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import type { NewsArticle, NewsSearchClient } from '../services/news-search/types.js';

const log = createChildLogger('quiz:hints');

export const HINT_PHRASES: readonly string[] = [
  '힌트', 'hint', '도움', 'help', '힌트 주세요', '힌트주세요', '힌트 좀', '힌트좀',
  '도움 주세요', '도움주세요', '도와주세요', '도와줘', '모르겠어', '모르겠어요',
  '모르겠다', '몰라', '몰라요', '어려워', '어려워요', '어렵다', '어려운데',
  '잘 모르겠어', '잘 모르겠어요', '잘 모르겠네', '헷갈려', '헷갈려요', '헷갈린다',
  '애매해', '애매해요', '뭐지', '뭐야', '뭔지', '뭔가요',
];

export const LEAKED_HINT_FALLBACK = '키워드: 관련 정보, 배경지식, 참고자료';
export const FAILED_HINT_FALLBACK = '키워드: 관련, 정보, 배경';
export const NEWS_HINT_FALLBACK = '최근 뉴스 검색이 불가능합니다. 기존 힌트를 참고해주세요.';

const MAX_SEARCH_KEYWORDS = 5;
const ARTICLES_PER_KEYWORD = 3;
const MAX_ARTICLES = 10;
const MAX_NEWS_KEYWORDS = 5;

const TRAILING_PUNCTUATION = /[\s.?!~]+$/;

/** Whole-input match against the phrase list, ignoring case and trailing punctuation. */
export function isHintRequest(input: string): boolean {
  const normalized = input.trim().toLowerCase().replace(TRAILING_PUNCTUATION, '');
  return normalized.length > 0 && HINT_PHRASES.includes(normalized);
}

export interface HintContext {
  readonly sessionId?: string;
  readonly credential?: string;
}

export type NewsHint =
  | { readonly available: true; readonly keywords: readonly string[] }
  | { readonly available: false; readonly reason: string };

export interface HintProvider {
  /** Keyword paraphrase of the background; never names the answer. */
  keywordHint(question: QuizQuestion, context?: HintContext): Promise<string>;
  newsHint(question: QuizQuestion, context?: HintContext): Promise<NewsHint>;
}

const KEYWORD_HINT_PROMPT = `You are a quiz hint writer for a Korean stock quiz.
Turn the background text into 3-5 short keywords (years, amounts, sector, distinctive facts).
Never include the company name or any part of it.
Answer in Korean in the form "키워드: a, b, c".`;

const SEARCH_KEYWORD_PROMPT = `You are a news search keyword writer.
List 3-5 search keywords about the given company's sector, main business and technology.
Exclude the company name itself. Answer with a comma separated list and nothing else.`;

const NEWS_KEYWORD_PROMPT = `You are a news keyword extractor for a quiz hint.
From the news headlines and summaries, extract up to 5 short keywords that describe recent events.
Never include the company name. Answer in the form "키워드: a, b, c".`;

/** Splits "키워드: a, b" or "a, b" into trimmed keywords. */
export function parseKeywordList(text: string): string[] {
  const body = text.replace(/^\s*키워드\s*[:：]/, '');
  return body
    .split(/[,\n]/)
    .map((k) =>
      k
        .trim()
        .replace(/^\d+\.\s+/, '')
        .replace(/^["'\-•*\s]+|["'\s]+$/g, ''),
    )
    .filter((k) => k.length >= 2);
}

function articleDigest(articles: readonly NewsArticle[]): string {
  return articles.map((a, i) => `${String(i + 1)}. ${a.title} - ${a.description}`).join('\n');
}

export function createHintProvider(llmClient: LlmClient, news: NewsSearchClient): HintProvider {
  const ask = async (systemPrompt: string, userMessage: string, context: HintContext) =>
    (
      await llmClient.invoke({
        systemPrompt,
        userMessage,
        sessionId: context.sessionId,
        credential: context.credential,
      })
    ).content.trim();

  return {
    async keywordHint(question: QuizQuestion, context: HintContext = {}): Promise<string> {
      const company = question.correctAnswer.company;
      try {
        const hint = await ask(
          KEYWORD_HINT_PROMPT,
          `Background: ${question.background}\nCompany (do not reveal): ${company}`,
          context,
        );
        if (!hint || hint.includes(company)) {
          log.warn({ quizId: question.id }, 'Hint rejected, using generic keywords');
          return LEAKED_HINT_FALLBACK;
        }
        return hint;
      } catch (error) {
        log.error({ err: error, quizId: question.id }, 'Keyword hint generation failed');
        return FAILED_HINT_FALLBACK;
      }
    },

    async newsHint(question: QuizQuestion, context: HintContext = {}): Promise<NewsHint> {
      if (!news.available) {
        return { available: false, reason: 'News search is not configured' };
      }
      const company = question.correctAnswer.company;

      try {
        const searchKeywords = parseKeywordList(
          await ask(SEARCH_KEYWORD_PROMPT, `Company: ${company}`, context),
        )
          .filter((k) => !k.includes(company))
          .slice(0, MAX_SEARCH_KEYWORDS);
        if (searchKeywords.length === 0) {
          return { available: false, reason: 'No search keywords' };
        }

        const articles: NewsArticle[] = [];
        for (const keyword of searchKeywords) {
          if (articles.length >= MAX_ARTICLES) {
            break;
          }
          articles.push(...(await news.search(keyword, ARTICLES_PER_KEYWORD)));
        }
        if (articles.length === 0) {
          return { available: false, reason: 'No related news' };
        }

        const keywords = parseKeywordList(
          await ask(NEWS_KEYWORD_PROMPT, articleDigest(articles.slice(0, MAX_ARTICLES)), context),
        )
          .filter((k) => !k.includes(company))
          .slice(0, MAX_NEWS_KEYWORDS);
        if (keywords.length === 0) {
          return { available: false, reason: 'No keywords extracted from news' };
        }

        log.info({ quizId: question.id, articles: articles.length }, 'News hint generated');
        return { available: true, keywords };
      } catch (error) {
        log.warn({ err: error, quizId: question.id }, 'News hint generation failed');
        return { available: false, reason: error instanceof Error ? error.message : String(error) };
      }
    },
  };
}
