import { createChildLogger } from '@market-agent/shared/src/logger.js';
import type {
  DataRetrievalResult,
  RetrievalCategory,
} from '@market-agent/shared/src/types/conversation.types.js';
import type { ChatMessage, ToolCallResult } from '@market-agent/shared/src/types/tool.types.js';
import type { CompletionGateway } from '../llm/completion-gateway.js';
import type { RouterGraphState, RouterNode } from '../orchestration/router-state.js';
import { isRecord, type ToolRegistry } from '../tools/tool-registry.js';
import { runToolRound } from '../tools/tool-round.js';
import { RETRIEVAL_SYSTEM_PROMPTS } from './retrieval-prompts.js';

const log = createChildLogger('agent:data-retrieval');

export interface DataRetrievalDeps {
  readonly gateway: CompletionGateway;
  readonly registry: ToolRegistry;
}

function buildUserMessage(category: RetrievalCategory, state: RouterGraphState): string {
  const lines = [
    `question: ${state.query}`,
    `today: ${state.today}`,
    `background_knowledge: ${JSON.stringify(state.backgroundKnowledge)}`,
  ];
  const clarification = state.clarification;
  if (clarification) {
    lines.push(
      `clarification: ${JSON.stringify({
        startDate: clarification.startDate,
        endDate: clarification.endDate,
        marketScope: clarification.marketScope,
        primaryCriteria: clarification.primaryCriteria,
        secondaryCriteria: clarification.secondaryCriteria,
      })}`,
    );
  }
  const stocks = state.backgroundKnowledge.stocks ?? [];
  if (category === 'fetch' && stocks.length > 1) {
    lines.push(
      `Several stocks were named (${stocks.map((s) => `${s.name} ${s.ticker}`).join(', ')}); prefer get_stock_comparison when the question compares them.`,
    );
  }
  return lines.join('\n');
}

function parameters(state: RouterGraphState): Record<string, unknown> {
  return { query: state.query, backgroundKnowledge: state.backgroundKnowledge };
}

function listSummary(query: string, totalCount: number, returnedCount: number): string {
  if (totalCount === 0) {
    return `No stocks match '${query}'.`;
  }
  const shown = returnedCount < totalCount ? ` (showing top ${String(returnedCount)})` : '';
  return `Found ${String(totalCount)} stocks matching '${query}'.${shown}`;
}

function readCount(payload: Record<string, unknown>, camel: string, snake: string, fallback: number): number {
  const value = payload[camel] ?? payload[snake];
  return typeof value === 'number' ? value : fallback;
}

/** Fetch keeps every tool's payload under its tool name. */
function collectFetchResults(
  state: RouterGraphState,
  results: readonly ToolCallResult[],
): DataRetrievalResult {
  const collected: Record<string, unknown> = {};
  for (const result of results) {
    if (result.success) {
      collected[result.toolName] = result.result;
    }
  }
  const count = Object.keys(collected).length;
  return {
    source: 'fetch',
    status: 'ok',
    results: count > 0 ? [collected] : [],
    totalCount: count,
    returnedCount: count,
    summary: `Stock data retrieved: ${state.query}`,
    parameters: parameters(state),
  };
}

/** Screening categories report the last tool's list payload. */
function collectListResults(
  source: 'conditional' | 'signal',
  state: RouterGraphState,
  results: readonly ToolCallResult[],
): DataRetrievalResult {
  const last = results.at(-1)?.result;
  const payload = isRecord(last) ? last : {};
  const rows = Array.isArray(payload['results']) ? payload['results'].filter(isRecord) : [];
  const totalCount = readCount(payload, 'totalCount', 'total_count', rows.length);
  const returnedCount = readCount(payload, 'returnedCount', 'returned_count', rows.length);
  return {
    source,
    status: 'ok',
    results: rows,
    totalCount,
    returnedCount,
    summary: listSummary(state.query, totalCount, returnedCount),
    parameters: parameters(state),
  };
}

export function createDataRetrievalNode(
  category: RetrievalCategory,
  deps: DataRetrievalDeps,
): RouterNode {
  const { gateway, registry } = deps;

  return async (state: RouterGraphState): Promise<Partial<RouterGraphState>> => {
    const messages: ChatMessage[] = [
      { role: 'system', content: RETRIEVAL_SYSTEM_PROMPTS[category] },
      { role: 'user', content: buildUserMessage(category, state) },
    ];

    const outcome = await runToolRound({
      gateway,
      registry,
      messages,
      sessionId: state.sessionId,
      credential: state.credential,
    });

    if (!outcome.success) {
      log.warn(
        { sessionId: state.sessionId, category, reason: outcome.reason },
        'Data retrieval failed',
      );
      return {
        retrieval: {
          source: category,
          status: 'failed',
          results: [],
          totalCount: 0,
          returnedCount: 0,
          summary: 'Request failed',
          parameters: parameters(state),
          error: outcome.error,
        },
      };
    }

    const retrieval =
      category === 'fetch'
        ? collectFetchResults(state, outcome.results)
        : collectListResults(category, state, outcome.results);

    log.info(
      { sessionId: state.sessionId, category, tools: outcome.results.map((r) => r.toolName), totalCount: retrieval.totalCount },
      'Data retrieval complete',
    );
    return {
      retrieval:
        outcome.directAnswer !== undefined ? { ...retrieval, directAnswer: outcome.directAnswer } : retrieval,
    };
  };
}
