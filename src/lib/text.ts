/**
 * Small text helpers shared by the parsers and the formatter.
 */

/** Trim and collapse all whitespace runs (including newlines) to single spaces. */
export function cleanText(text: string | null | undefined): string {
  if (!text) return '';
  return text.trim().replace(/\s+/g, ' ');
}

/** First integer in the string, commas allowed. '1,234 connections' -> 1234 */
export function extractNumber(text: string): number | null {
  const match = text.match(/(\d[\d,]*)/);
  if (!match) return null;
  const n = parseInt(match[1].replace(/,/g, ''), 10);
  return Number.isFinite(n) ? n : null;
}

/** Cut to maxLen characters, ending in '...' when anything was dropped. */
export function truncate(text: string, maxLen = 80): string {
  if (!text) return '';
  if (text.length <= maxLen) return text;
  if (maxLen <= 3) return text.slice(0, maxLen);
  return text.slice(0, maxLen - 3) + '...';
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Case-insensitive whole-word/phrase matcher. */
export function wordPattern(phrase: string): RegExp {
  return new RegExp(`\\b${escapeRegExp(phrase)}\\b`, 'i');
}
