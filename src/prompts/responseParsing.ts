/**
 * Response parsing helpers for language-model output
 */

const FENCED_BLOCK = /```[\w-]*[ \t]*\r?\n([\s\S]*?)```/;

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Pull the first JSON object out of a response. Accepts a bare object, a
 * fenced block, or an object surrounded by prose. Returns undefined when
 * nothing parses.
 */
export function extractJson(text: string): unknown {
  const trimmed = text.trim();
  if (!trimmed) return undefined;

  const direct = tryParse(trimmed);
  if (direct !== undefined) return direct;

  const fenced = trimmed.match(FENCED_BLOCK);
  if (fenced) {
    const inner = tryParse(fenced[1].trim());
    if (inner !== undefined) return inner;
  }

  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start !== -1 && end > start) {
    return tryParse(trimmed.slice(start, end + 1));
  }

  return undefined;
}

/**
 * Remove a leading ```lang fence line and a trailing ``` fence, then trim
 */
export function stripCodeFences(text: string): string {
  let code = text.trim();

  if (code.startsWith('```')) {
    const newline = code.indexOf('\n');
    code = newline === -1 ? '' : code.slice(newline + 1);
  }
  if (code.endsWith('```')) {
    code = code.slice(0, -3);
  }

  return code.trim();
}

/**
 * Keep the first and last halves of a long text, dropping the middle
 */
export function truncateMiddle(text: string, maxLines: number): string {
  const lines = text.split('\n');
  if (lines.length <= maxLines) return text;

  const half = Math.floor(maxLines / 2);
  return [
    ...lines.slice(0, half),
    `... [${lines.length - half * 2} lines truncated] ...`,
    ...lines.slice(-half)
  ].join('\n');
}
