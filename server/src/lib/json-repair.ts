import logger from './logger.js';

type ParseAttempt = { ok: true; value: unknown } | { ok: false };

function tryParse(text: string): ParseAttempt {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

/** Append the closers an unterminated object/array is missing. */
function closePartial(s: string): string {
  const stack: string[] = [];
  let inString = false;
  let escape = false;
  for (const ch of s) {
    if (escape) { escape = false; continue; }
    if (ch === '\\' && inString) { escape = true; continue; }
    if (ch === '"') { inString = !inString; continue; }
    if (inString) continue;
    if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  return s.replace(/,\s*$/, '') + stack.reverse().join('');
}

/**
 * Multi-step JSON repair for LLM outputs that may include markdown fences,
 * surrounding text, or trailing commas.
 *
 * Returns the parsed value (callers validate its shape with zod), or null
 * when nothing parseable remains.
 */
export function repairJSON(text: string): unknown {
  if (!text || typeof text !== 'string') return null;

  // Step 1: strip markdown fences
  let cleaned = text.replace(/^```(?:json)?\s*\n?/i, '').replace(/\n?```\s*$/i, '').trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  // Step 2: extract the object/array from surrounding prose
  const firstBrace = cleaned.indexOf('{');
  const firstBracket = cleaned.indexOf('[');
  let start = -1;
  let closeChar = '';

  if (firstBrace >= 0 && (firstBracket < 0 || firstBrace < firstBracket)) {
    start = firstBrace;
    closeChar = '}';
  } else if (firstBracket >= 0) {
    start = firstBracket;
    closeChar = ']';
  }

  if (start >= 0) {
    const lastClose = cleaned.lastIndexOf(closeChar);
    if (lastClose > start) {
      cleaned = cleaned.slice(start, lastClose + 1);
      const extracted = tryParse(cleaned);
      if (extracted.ok) return extracted.value;
    } else {
      cleaned = cleaned.slice(start);
    }
  }

  // Step 3: trailing commas
  const noTrailing = cleaned.replace(/,\s*([\]}])/g, '$1');
  const trailing = tryParse(noTrailing);
  if (trailing.ok) return trailing.value;

  // Skip regex-heavy steps on large inputs to avoid catastrophic backtracking
  if (noTrailing.length > 50_000) {
    logger.warn({ size: noTrailing.length }, 'Skipping aggressive JSON repair on large input');
    return null;
  }

  // Step 4: raw newlines/tabs inside strings, single-quoted values
  const aggressive = noTrailing
    .replace(/(?<=:\s*"[^"]*)\n/g, '\\n')
    .replace(/(?<=:\s*"[^"]*)\t/g, '\\t')
    .replace(/(?<=[[{,:])\s*'([^']*)'\s*(?=[,\]}:])/g, '"$1"');
  const aggressiveAttempt = tryParse(aggressive);
  if (aggressiveAttempt.ok) return aggressiveAttempt.value;

  // Step 5: unquoted keys - { key: "value" } → { "key": "value" }
  const quotedKeys = aggressive.replace(/([{,]\s*)([A-Za-z_$][A-Za-z0-9_$]*)\s*:/g, '$1"$2":');
  const quotedAttempt = tryParse(quotedKeys);
  if (quotedAttempt.ok) return quotedAttempt.value;

  // Step 6: truncated output, close what was left open
  const closed = closePartial(quotedKeys);
  if (closed !== quotedKeys) {
    const closedAttempt = tryParse(closed);
    if (closedAttempt.ok) return closedAttempt.value;
  }

  logger.warn({ rawSnippet: text.substring(0, 300) }, 'Failed to repair JSON');
  return null;
}
