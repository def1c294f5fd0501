/**
 * Boilerplate Detection
 * Podcast bumpers, URLs, giving appeals and announcements make poor receipts.
 */

const EMAIL_RE = /[a-z0-9._%+-]+@[a-z0-9.-]+\.[a-z]{2,}/i;
const URL_RE = /(https?:\/\/\S+|www\.\S+|\b\S+\.(com|org|net|io|co|us|tv)\b)/i;

export function isBoilerplate(text: string, patterns: readonly RegExp[]): boolean {
  const collapsed = text.trim().split(/\s+/).join(" ");
  if (!collapsed) {
    return false;
  }
  if (EMAIL_RE.test(collapsed) || URL_RE.test(collapsed)) {
    return true;
  }
  return patterns.some((pattern) => pattern.test(collapsed));
}
