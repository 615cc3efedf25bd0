import type { DataRetrievalResult } from '@market-agent/shared/src/types/conversation.types.js';
import { isRecord } from '../tools/tool-registry.js';

const MAX_ROWS = 20;

function formatValue(value: unknown): string {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value.toLocaleString('en-US') : String(value);
  }
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined) {
    return '-';
  }
  return JSON.stringify(value);
}

export function formatRow(row: Record<string, unknown>): string {
  return Object.entries(row)
    .map(([key, value]) => `${key}: ${formatValue(value)}`)
    .join(', ');
}

function formatRows(rows: readonly unknown[]): string[] {
  return rows
    .slice(0, MAX_ROWS)
    .map((row, i) => `${String(i + 1)}. ${isRecord(row) ? formatRow(row) : formatValue(row)}`);
}

/** Scalar fields as one line, then the `results` rows numbered. */
function formatPayload(payload: unknown): string[] {
  if (!isRecord(payload)) {
    return [formatValue(payload)];
  }
  const { results, ...meta } = payload;
  const lines: string[] = [];
  const metaLine = formatRow(meta);
  if (metaLine) {
    lines.push(metaLine);
  }
  if (Array.isArray(results)) {
    lines.push(...formatRows(results));
  }
  return lines;
}

/** Compact text rendering of a retrieval result for the answer prompt. */
export function formatRetrieval(retrieval: DataRetrievalResult): string {
  if (retrieval.status === 'failed') {
    return `Data retrieval failed: ${retrieval.error ?? retrieval.summary}`;
  }

  const lines: string[] = [retrieval.summary];

  if (retrieval.source === 'fetch') {
    const byTool = retrieval.results[0] ?? {};
    for (const [toolName, payload] of Object.entries(byTool)) {
      lines.push('', `[${toolName}]`, ...formatPayload(payload));
    }
  } else {
    lines.push(...formatRows(retrieval.results));
  }

  if (retrieval.results.length === 0) {
    lines.push('No data was returned.');
  }
  if (retrieval.directAnswer) {
    lines.push('', `Model note: ${retrieval.directAnswer}`);
  }
  return lines.join('\n');
}
