const CODE_BLOCK_PATTERN = /```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/;

function tryParse(text: string): { readonly ok: true; readonly value: unknown } | { readonly ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) as unknown };
  } catch {
    return { ok: false };
  }
}

/**
 * Pulls a JSON value out of model output that may wrap it in a markdown
 * fence or in prose. Tries the whole text, then the first fenced block,
 * then the first balanced object, then the first balanced array.
 */
export function extractJson(content: string): unknown {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return direct.value;
  }

  const fenced = CODE_BLOCK_PATTERN.exec(trimmed)?.[1];
  if (fenced) {
    const fromBlock = tryParse(fenced.trim());
    if (fromBlock.ok) {
      return fromBlock.value;
    }
  }

  for (const [open, close] of [
    ['{', '}'],
    ['[', ']'],
  ] as const) {
    const candidate = findBalanced(trimmed, open, close);
    if (candidate !== undefined) {
      const balanced = tryParse(candidate);
      if (balanced.ok) {
        return balanced.value;
      }
    }
  }

  throw new SyntaxError(`Failed to extract JSON from content: ${trimmed.slice(0, 100)}`);
}

function findBalanced(text: string, open: string, close: string): string | undefined {
  const startIdx = text.indexOf(open);
  if (startIdx === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIdx; i < text.length; i++) {
    const ch = text[i];

    if (escape) {
      escape = false;
    } else if (ch === '\\' && inString) {
      escape = true;
    } else if (ch === '"') {
      inString = !inString;
    } else if (!inString && ch === open) {
      depth++;
    } else if (!inString && ch === close) {
      depth--;
      if (depth === 0) {
        return text.slice(startIdx, i + 1);
      }
    }
  }

  return undefined;
}
