import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type { ClarificationRecord } from '@market-agent/shared/src/types/conversation.types.js';
import type { LlmClient } from '../llm/llm-client.js';
import { invokeAndValidate } from '../llm/invoke-and-validate.js';
import type {
  ClarificationDecision,
  RouterGraphState,
  RouterNode,
} from '../orchestration/router-state.js';
import {
  CompletenessAnalysisJsonSchema,
  CompletenessAnalysisSchema,
  QueryRewriteJsonSchema,
  QueryRewriteSchema,
  type CompletenessAnalysis,
} from './agent-output.schemas.js';

const log = createChildLogger('agent:clarification');

export const FALLBACK_ANALYSIS: CompletenessAnalysis = {
  hasStockName: false,
  hasSpecificDate: false,
  hasRelativeTime: false,
  hasMetrics: false,
  hasConditions: false,
  missingInformationType: 'NONE',
  informationCompleteness: 'AMBIGUOUS',
};

const MISSING_LABELS: Readonly<Record<CompletenessAnalysis['missingInformationType'], string>> = {
  STOCK_NAME: '종목명',
  SPECIFIC_DATE: '날짜',
  TIME_PERIOD: '기간',
  NONE: '추가',
};

/**
 * Only partial questions missing a stock, a date or a period go back to the
 * user; a relative date ("yesterday") is resolved without asking.
 */
export function decideClarification(analysis: CompletenessAnalysis): ClarificationDecision {
  if (analysis.informationCompleteness !== 'PARTIAL') {
    return 'selfClarify';
  }
  const missing = analysis.missingInformationType;
  if (missing === 'SPECIFIC_DATE' && analysis.hasRelativeTime) {
    return 'selfClarify';
  }
  return missing === 'NONE' ? 'selfClarify' : 'askUser';
}

export function fallbackQuestion(analysis: CompletenessAnalysis): string {
  return `질문을 처리하기 위해 추가 정보가 필요합니다. ${MISSING_LABELS[analysis.missingInformationType]} 정보를 알려주시겠어요?`;
}

const ANALYSIS_PROMPT = `You are a completeness analyst for Korean stock market questions.
Decide which information the question contains and what is missing to look up market data.
- hasStockName: a specific company is named
- hasSpecificDate: an explicit calendar date (YYYY-MM-DD or YYYYMMDD) is given
- hasRelativeTime: a relative expression such as 어제, 최근, 지난주 is used
- hasMetrics: a metric such as close, volume or change rate is named
- hasConditions: a screening condition such as "over 5%" is given
- missingInformationType: the single most important missing piece (STOCK_NAME, SPECIFIC_DATE, TIME_PERIOD or NONE)
- informationCompleteness: COMPLETE (answerable), PARTIAL (one piece missing), AMBIGUOUS (vague overall)`;

function askUserPrompt(today: string): string {
  return `You are a clarification question writer for a Korean stock market assistant.
Today is ${today}. Write one short, polite Korean follow-up question asking the user for the missing information.
Give one or two concrete examples of a complete question. Answer with the question text only.`;
}

function rewritePrompt(today: string): string {
  return `You are a query rewriter for Korean stock market questions. Today is ${today}.
Rewrite the vague question into a specific one that can be answered from daily market data:
turn relative dates into YYYY-MM-DD (use the most recent weekday for "today" or "yesterday"),
pick a market scope (KOSPI, KOSDAQ or ALL) and a concrete ranking criterion when none is given.
Keep the question in Korean.`;
}

export interface ClarificationDeps {
  readonly llmClient: LlmClient;
}

export function createAmbiguousNode(deps: ClarificationDeps): RouterNode {
  const { llmClient } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    let completeness: CompletenessAnalysis;
    try {
      completeness = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: ANALYSIS_PROMPT,
          userMessage: `question: ${state.query}\nbackground_knowledge: ${JSON.stringify(state.backgroundKnowledge)}`,
          sessionId: state.sessionId,
          credential: state.credential,
          jsonSchema: CompletenessAnalysisJsonSchema as Record<string, unknown>,
        },
        schema: CompletenessAnalysisSchema,
        agentName: 'CompletenessAnalyst',
      });
    } catch (error) {
      log.warn({ err: error, sessionId: state.sessionId }, 'Completeness analysis failed');
      completeness = FALLBACK_ANALYSIS;
    }

    const clarificationDecision = decideClarification(completeness);
    log.info(
      {
        sessionId: state.sessionId,
        completeness: completeness.informationCompleteness,
        missing: completeness.missingInformationType,
        decision: clarificationDecision,
      },
      'Ambiguity analysed',
    );
    return { completeness, clarificationDecision };
  };
}

export function createAskUserNode(deps: ClarificationDeps): RouterNode {
  const { llmClient } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const analysis = state.completeness ?? FALLBACK_ANALYSIS;
    try {
      const result = await llmClient.invoke({
        systemPrompt: askUserPrompt(state.today),
        userMessage: `question: ${state.query}\nmissing: ${analysis.missingInformationType}\nanalysis: ${JSON.stringify(analysis)}`,
        sessionId: state.sessionId,
        credential: state.credential,
      });
      const question = result.content.trim();
      if (question) {
        return { response: question };
      }
      log.warn({ sessionId: state.sessionId }, 'Empty follow-up question, using fallback');
    } catch (error) {
      log.error({ err: error, sessionId: state.sessionId }, 'Follow-up question generation failed');
    }
    return { response: fallbackQuestion(analysis) };
  };
}

export function createSelfClarifyNode(deps: ClarificationDeps): RouterNode {
  const { llmClient } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const originalQuery = state.query;
    let clarification: ClarificationRecord = { originalQuery, clarifiedQuery: originalQuery };

    try {
      const rewrite = await invokeAndValidate({
        llmClient,
        request: {
          systemPrompt: rewritePrompt(state.today),
          userMessage: originalQuery,
          sessionId: state.sessionId,
          credential: state.credential,
          jsonSchema: QueryRewriteJsonSchema as Record<string, unknown>,
        },
        schema: QueryRewriteSchema,
        agentName: 'QueryRewriter',
      });
      clarification = {
        originalQuery,
        clarifiedQuery: rewrite.clarifiedQuery.trim() || originalQuery,
        startDate: rewrite.startDate,
        endDate: rewrite.endDate,
        marketScope: rewrite.marketScope,
        primaryCriteria: rewrite.primaryCriteria,
        secondaryCriteria: rewrite.secondaryCriteria,
      };
    } catch (error) {
      log.warn({ err: error, sessionId: state.sessionId }, 'Query rewrite failed, keeping original');
    }

    log.info(
      { sessionId: state.sessionId, clarifiedQuery: clarification.clarifiedQuery },
      'Query clarified',
    );
    return {
      clarification,
      query: clarification.clarifiedQuery,
      clarificationPasses: state.clarificationPasses + 1,
    };
  };
}
