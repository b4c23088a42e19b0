/**
 * Parses the labeled-field text returned by the research provider into a
 * VerdictRecord. Never throws: anything missing or malformed keeps its default.
 *
 * Fields are found by label anywhere in the text and run until the next label,
 * so values may span lines and arrive in any order.
 */

import { cleanText, truncate } from '../lib/text';
import { HEADLINE_NOT_FOUND, type Verdict, type VerdictRecord } from '../types';

const MAX_FLAGS = 5;
const MAX_FLAG_LEN = 100;
const MAX_REASON_SENTENCES = 3;

export const DEFAULT_REASON = 'Could not parse response';

const NOT_FOUND_PHRASES = ['not found', 'could not locate', 'cannot locate', 'unable to locate', 'unable to find'];

const FIELD_LABELS = ['VERDICT', 'SCORE', 'HEADLINE', 'REASON', 'RED FLAGS', 'GREEN FLAGS'] as const;
type FieldLabel = (typeof FIELD_LABELS)[number];

const LABEL_PATTERN = /[*_]*\b(VERDICT|SCORE|HEADLINE|REASON|RED FLAGS|GREEN FLAGS)\b[*_]*\s*:[*_]*/g;

// Longest phrases first so "LIKELY SPAM" is not read as "SPAM".
const VERDICT_ALIASES: [string, Verdict][] = [
  ['LIKELY SPAM', 'LIKELY_SPAM'],
  ['LIKELY LEGIT', 'LIKELY_LEGIT'],
  ['SPAM', 'SPAM'],
  ['LEGIT', 'LEGIT'],
  ['UNCLEAR', 'UNCLEAR'],
  ['ERROR', 'ERROR'],
];

function isFieldLabel(value: string): value is FieldLabel {
  return FIELD_LABELS.some((label) => label === value);
}

const BULLET = /^(?:[-*•–]|\d+[.)])\s+/;

/** Split the text into label -> raw value. The first occurrence of a label wins. */
export function extractFields(text: string): Partial<Record<FieldLabel, string>> {
  const fields: Partial<Record<FieldLabel, string>> = {};
  const matches = [...text.matchAll(LABEL_PATTERN)];
  matches.forEach((m, i) => {
    const label = m[1];
    if (!isFieldLabel(label) || fields[label] !== undefined) return;
    const start = (m.index ?? 0) + m[0].length;
    const end = i + 1 < matches.length ? matches[i + 1].index ?? text.length : text.length;
    fields[label] = text.slice(start, end);
  });
  return fields;
}

/**
 * Strip emphasis markers, fold bulleted sub-lines into comma-joined fragments and
 * collapse whitespace.
 */
export function cleanFieldValue(raw: string): string {
  let out = '';
  for (const rawLine of raw.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) continue;
    const isBullet = BULLET.test(line);
    const content = line.replace(BULLET, '').trim();
    if (!content) continue;
    if (!out) out = content;
    else out += isBullet ? `, ${content}` : ` ${content}`;
  }
  out = out.replace(/\*+/g, '').replace(/__/g, '').replace(/`/g, '');
  return stripQuotes(cleanText(out));
}

const EDGE_QUOTES = /^["'“”]+|["'“”]+$/g;

function stripQuotes(value: string): string {
  const m = value.match(/^["'“](.*)["'”]$/);
  return m ? m[1].trim() : value;
}

export function normalizeVerdict(raw: string): Verdict | null {
  const words = raw.toUpperCase().replace(/[^A-Z]+/g, ' ').trim();
  for (const [alias, verdict] of VERDICT_ALIASES) {
    if (words === alias || words.startsWith(`${alias} `)) return verdict;
  }
  return null;
}

function parseScore(raw: string): number | null {
  const m = raw.match(/-?\d+/);
  if (!m) return null;
  const n = parseInt(m[0], 10);
  return Number.isFinite(n) ? n : null;
}

export function parseFlags(raw: string): string[] {
  return cleanFieldValue(raw)
    .split(',')
    .map((f) => f.trim().replace(EDGE_QUOTES, '').trim())
    .filter((f) => f.length > 0 && f.replace(/[.!]+$/, '').toLowerCase() !== 'none')
    .map((f) => truncate(f, MAX_FLAG_LEN))
    .slice(0, MAX_FLAGS);
}

export function capSentences(text: string, max = MAX_REASON_SENTENCES): string {
  const sentences = text.split(/(?<=[.!?])\s+/).filter((s) => s.length > 0);
  return sentences.slice(0, max).join(' ');
}

export function parseResearchResponse(rawText: string, fallbackName: string): VerdictRecord {
  const text = typeof rawText === 'string' ? rawText : '';
  let verdict: Verdict = 'UNCLEAR';
  let score = 50;
  let headline = HEADLINE_NOT_FOUND;
  let reason = DEFAULT_REASON;
  let redFlags: string[] = [];
  let greenFlags: string[] = [];

  if (text.trim()) {
    const fields = extractFields(text);

    if (fields.VERDICT !== undefined) verdict = normalizeVerdict(fields.VERDICT) ?? verdict;
    if (fields.SCORE !== undefined) score = parseScore(cleanFieldValue(fields.SCORE)) ?? score;
    if (fields.HEADLINE !== undefined) headline = cleanFieldValue(fields.HEADLINE) || headline;
    if (fields.REASON !== undefined) reason = capSentences(cleanFieldValue(fields.REASON)) || reason;
    if (fields['RED FLAGS'] !== undefined) redFlags = parseFlags(fields['RED FLAGS']);
    if (fields['GREEN FLAGS'] !== undefined) greenFlags = parseFlags(fields['GREEN FLAGS']);
  }

  score = verdict === 'ERROR' ? -1 : Math.min(100, Math.max(0, score));

  return Object.freeze({
    subjectName: fallbackName,
    verdict,
    score,
    headline,
    reason,
    redFlags: Object.freeze(redFlags),
    greenFlags: Object.freeze(greenFlags),
    rawText: text,
  });
}

export function errorVerdict(subjectName: string, message: string): VerdictRecord {
  return Object.freeze({
    subjectName,
    verdict: 'ERROR' as const,
    score: -1,
    headline: HEADLINE_NOT_FOUND,
    reason: `Analysis failed: ${message}`,
    redFlags: Object.freeze([]),
    greenFlags: Object.freeze([]),
    rawText: '',
  });
}

/**
 * True when a research result carries no usable signal and the user should be
 * asked for a direct profile reference instead. An UNCLEAR verdict with a
 * substantive reason does not count.
 */
export function isSearchFailed(record: VerdictRecord): boolean {
  if (record.score === -1) return true;
  if (record.verdict !== 'UNCLEAR' && record.verdict !== 'ERROR') return false;
  const reason = record.reason.toLowerCase();
  return NOT_FOUND_PHRASES.some((p) => reason.includes(p));
}
