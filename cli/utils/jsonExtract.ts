import JSON5 from 'json5';

/**
 * Lenient decoding for embedded JSON blocks. Pages wrap ld+json in HTML comments or CDATA
 * markers, leave trailing commas behind, or append junk after the value.
 */

const stripScriptWrappers = (value: string): string =>
  value
    .replace(/^\s*(?:\/\/\s*)?<!\[CDATA\[/, '')
    .replace(/(?:\/\/\s*)?\]\]>\s*$/, '')
    .replace(/^\s*<!--/, '')
    .replace(/-->\s*$/, '')
    .trim();

/**
 * Returns the first complete top-level object or array in `value`, or null when the value
 * never closes. Brackets inside string literals are ignored.
 */
export const extractBalancedJson = (value: string): string | null => {
  let start = -1;
  let inString = false;
  let escapeNext = false;
  const stack: string[] = [];

  for (let i = 0; i < value.length; i += 1) {
    const char = value[i];

    if (inString) {
      if (escapeNext) {
        escapeNext = false;
      } else if (char === '\\') {
        escapeNext = true;
      } else if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"' && start !== -1) {
      inString = true;
      continue;
    }

    if (char === '{' || char === '[') {
      if (start === -1) start = i;
      stack.push(char === '{' ? '}' : ']');
      continue;
    }

    if ((char === '}' || char === ']') && stack.length) {
      if (stack[stack.length - 1] !== char) {
        return null;
      }
      stack.pop();
      if (stack.length === 0) {
        return value.slice(start, i + 1);
      }
    }
  }

  return null;
};

type Decoded = { value: unknown } | null;

const tryDecode = (text: string, decode: (text: string) => unknown): Decoded => {
  try {
    return { value: decode(text) };
  } catch {
    return null;
  }
};

/** Decodes an embedded JSON block; `undefined` when nothing usable can be recovered. */
export const parseLenientJson = (raw: string): unknown => {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;

  const strict = tryDecode(trimmed, JSON.parse);
  if (strict) return strict.value;

  const unwrapped = stripScriptWrappers(trimmed);
  const candidate = extractBalancedJson(unwrapped) ?? unwrapped;
  return tryDecode(candidate, JSON5.parse)?.value;
};
