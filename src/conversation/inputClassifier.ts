/**
 * Shape checks for free-text chat input: is it a profile reference, a person's
 * name, a cancellation, or none of those.
 */

import { extractProfileReference } from '../research/reference';

const MAX_INPUT_LEN = 2048;
const NAME_DISQUALIFIERS = ['|', '@', '$', '#', 'http'];
const CANCEL_WORDS = new Set(['/cancel', 'cancel', 'stop', 'nevermind', 'never mind']);

export type ClassifiedInput =
  | { kind: 'reference'; reference: string }
  | { kind: 'name'; name: string }
  | { kind: 'cancel' }
  | { kind: 'unrecognized' };

/** 2-4 space-separated tokens, each capitalised, none of | @ $ # or "http". */
export function isLikelyName(text: string): boolean {
  if (!text) return false;
  const trimmed = text.trim();
  const words = trimmed.split(/\s+/);
  if (words.length < 2 || words.length > 4) return false;
  if (NAME_DISQUALIFIERS.some((c) => trimmed.includes(c))) return false;
  return words.every((w) => {
    const first = w.charAt(0);
    return first !== first.toLowerCase() && first === first.toUpperCase();
  });
}

export function isCancellation(text: string): boolean {
  return CANCEL_WORDS.has(text.trim().toLowerCase());
}

export function classifyInput(text: string): ClassifiedInput {
  const trimmed = (text ?? '').trim().slice(0, MAX_INPUT_LEN);
  if (!trimmed) return { kind: 'unrecognized' };
  if (isCancellation(trimmed)) return { kind: 'cancel' };
  const reference = extractProfileReference(trimmed);
  if (reference) return { kind: 'reference', reference };
  if (isLikelyName(trimmed)) return { kind: 'name', name: trimmed.split(/\s+/).join(' ') };
  return { kind: 'unrecognized' };
}
