/**
 * Drops markdown fence lines (```json, ```) and keeps everything else.
 */
export function stripCodeFences(raw: string): string {
  const trimmed = raw.trim();
  if (!trimmed.includes('```')) {
    return trimmed;
  }

  return trimmed
    .split('\n')
    .filter((line) => !line.trim().startsWith('```'))
    .join('\n')
    .trim();
}

/**
 * First `{...}` with balanced braces, ignoring braces inside JSON strings.
 */
export function extractFirstJsonObject(text: string): string | undefined {
  const start = text.indexOf('{');
  if (start === -1) {
    return undefined;
  }

  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
    } else if (char === '{') {
      depth++;
    } else if (char === '}') {
      depth--;
      if (depth === 0) {
        return text.slice(start, i + 1);
      }
    }
  }

  return undefined;
}

export type JsonReply = { ok: true; value: unknown } | { ok: false; error: string };

function tryParse(text: string): JsonReply {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * Parse a model reply that should hold one JSON object but may be wrapped in
 * fences or prose.
 */
export function parseJsonReply(raw: string): JsonReply {
  const cleaned = stripCodeFences(raw);
  const direct = tryParse(cleaned);
  if (direct.ok) {
    return direct;
  }

  const candidate = extractFirstJsonObject(cleaned);
  if (candidate === undefined) {
    return { ok: false, error: `No JSON object in reply: ${cleaned.slice(0, 200)}` };
  }
  return tryParse(candidate);
}
