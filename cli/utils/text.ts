export const normalizeWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export const escapeHtml = (value: string): string => value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);

/** True when the text stops mid-sentence or trails off into an ellipsis. */
export const looksCutOff = (text: string): boolean => {
  const trimmed = text.trim();
  if (!trimmed) return false;
  if (/(\.\.\.|…)$/.test(trimmed)) return true;
  return !/[.!?)"'”’]$/.test(trimmed);
};

export const isHttpUrl = (value: string): boolean => {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
};

export const absolutizeUrl = (value: string, base: string): string | null => {
  try {
    return new URL(value, base).toString();
  } catch {
    return null;
  }
};
