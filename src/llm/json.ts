/**
 * Tolerant JSON extraction for model output.
 *
 * Model responses often wrap JSON in prose or markdown fences, or carry
 * small syntax mistakes. `extractJSON` strips fences, finds the outermost
 * object or array, and repairs trailing commas and raw control characters
 * inside strings before giving up.
 */

export class JSONExtractionError extends Error {
  constructor(message: string, public readonly rawPreview: string) {
    super(message);
    this.name = 'JSONExtractionError';
  }
}

/**
 * Repair common model JSON mistakes:
 * trailing commas before } or ], and unescaped control characters
 * (newlines, tabs) inside string values.
 */
export function repairJSON(raw: string): string {
  return escapeControlCharsInStrings(raw.replace(/,\s*([}\]])/g, '$1'));
}

function escapeControlCharsInStrings(json: string): string {
  const chars: string[] = [];
  let inString = false;
  let escaped = false;

  for (const ch of json) {
    if (escaped) {
      chars.push(ch);
      escaped = false;
      continue;
    }
    if (ch === '\\' && inString) {
      chars.push(ch);
      escaped = true;
      continue;
    }
    if (ch === '"') {
      inString = !inString;
      chars.push(ch);
      continue;
    }
    if (inString && ch.charCodeAt(0) < 0x20) {
      switch (ch) {
        case '\n': chars.push('\\n'); break;
        case '\r': chars.push('\\r'); break;
        case '\t': chars.push('\\t'); break;
        default:
          chars.push('\\u' + ch.charCodeAt(0).toString(16).padStart(4, '0'));
          break;
      }
      continue;
    }
    chars.push(ch);
  }

  return chars.join('');
}

/** Outermost {...} or [...] span, whichever opens first; null if none closes. */
export function extractOutermostJSON(text: string): string | null {
  const objIdx = text.indexOf('{');
  const arrIdx = text.indexOf('[');
  const pairs: Array<[string, string]> = [];
  if (objIdx !== -1 && (arrIdx === -1 || objIdx < arrIdx)) {
    pairs.push(['{', '}']);
    if (arrIdx !== -1) pairs.push(['[', ']']);
  } else if (arrIdx !== -1) {
    pairs.push(['[', ']']);
    if (objIdx !== -1) pairs.push(['{', '}']);
  }

  for (const [open, close] of pairs) {
    const start = text.indexOf(open);
    let depth = 0;
    let inString = false;
    let escaped = false;
    for (let i = start; i < text.length; i++) {
      const ch = text[i];
      if (escaped) {
        escaped = false;
        continue;
      }
      if (ch === '\\' && inString) {
        escaped = true;
        continue;
      }
      if (ch === '"') {
        inString = !inString;
        continue;
      }
      if (inString) continue;
      if (ch === open) depth++;
      else if (ch === close && --depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (err) {
    return { ok: false, error: err instanceof Error ? err.message : String(err) };
  }
}

export function extractJSON(raw: string): unknown {
  let cleaned = raw.trim();
  const fence = cleaned.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fence) cleaned = fence[1].trim();

  const direct = tryParse(cleaned);
  if (direct.ok) return direct.value;

  const span = extractOutermostJSON(cleaned);
  if (!span) {
    throw new JSONExtractionError('No JSON object or array found in model response', raw.slice(0, 500));
  }
  const extracted = tryParse(span);
  if (extracted.ok) return extracted.value;

  const repaired = tryParse(repairJSON(span));
  if (repaired.ok) return repaired.value;
  throw new JSONExtractionError(`Model response is not valid JSON: ${repaired.error}`, raw.slice(0, 500));
}
