/**
 * Deterministic spam scorer for connection-request profiles.
 * Additive point system over the profile text; every rule fires independently and
 * the total saturates at 100. Pure and total: missing fields count as empty.
 */

import lexicon from './lexicon.json';
import { wordPattern } from '../lib/text';
import type { ProfileRecord, ScoreResult } from '../types';

const MAX_SCORE = 100;
export const NO_INDICATORS_REASON = 'No obvious spam indicators detected';

const SPAM_KEYWORDS = lexicon.spamKeywords.map(wordPattern);
const RED_FLAGS = lexicon.redFlagPhrases.map(wordPattern);
const INCOME_CLAIMS = lexicon.incomeClaims.map(wordPattern);

const EMOJI =
  /[\u{1F600}-\u{1F64F}\u{1F300}-\u{1F5FF}\u{1F680}-\u{1F6FF}\u{1F1E0}-\u{1F1FF}\u{1F900}-\u{1F9FF}\u{2600}-\u{26FF}\u{2702}-\u{27B0}]/gu;
const EXECUTIVE_TITLE = /\b(ceo|founder)\b/i;
const MONEY_TERMS = /\b(success|wealth|money|cash|profit|income)\b/i;
const GURU_TERMS = /\b(digital|online|virtual)\s+(entrepreneur|expert|guru)\b/i;

export type VerdictBand =
  | 'highly likely spam'
  | 'likely spam'
  | 'suspicious'
  | 'somewhat suspicious'
  | 'probably legitimate';

function countMatches(patterns: RegExp[], text: string): number {
  return patterns.reduce((n, p) => (p.test(text) ? n + 1 : n), 0);
}

export function countEmoji(text: string): number {
  return text.match(EMOJI)?.length ?? 0;
}

function isShouting(headline: string): boolean {
  return headline.length > 10 && headline === headline.toUpperCase() && headline !== headline.toLowerCase();
}

export function scoreProfile(profile: Partial<ProfileRecord>): ScoreResult {
  const name = profile.name ?? '';
  const headline = profile.headline ?? '';
  const summary = profile.summary ?? '';
  const connections =
    typeof profile.connections === 'number' && Number.isFinite(profile.connections) ? Math.max(0, profile.connections) : 0;
  const fullText = `${name} ${headline} ${summary}`.toLowerCase();
  const headlineLower = headline.toLowerCase();

  let score = 0;
  const reasons: string[] = [];
  const add = (points: number, reason: string) => {
    score += points;
    reasons.push(reason);
  };

  const keywordCount = countMatches(SPAM_KEYWORDS, headlineLower);
  if (keywordCount >= 3) add(30, `Multiple spam keywords in headline (${keywordCount} found)`);
  else if (keywordCount >= 1) add(15, `Spam keywords in headline (${keywordCount} found)`);

  const redFlagCount = countMatches(RED_FLAGS, fullText);
  if (redFlagCount > 0) add(redFlagCount * 15, `Red flag phrases detected (${redFlagCount} found)`);

  const emojiCount = countEmoji(headline);
  if (emojiCount >= 5) add(20, `Excessive emojis in headline (${emojiCount} found)`);
  else if (emojiCount >= 3) add(10, `Multiple emojis in headline (${emojiCount} found)`);

  if (isShouting(headline)) add(15, 'Headline is all caps (shouting)');

  if (connections > 0 && connections < 100) add(10, `Low connection count (${connections})`);
  else if (connections > 5000) add(5, `Very high connection count (${connections})`);

  if (EXECUTIVE_TITLE.test(headlineLower) && connections < 200) add(15, 'Claims CEO/Founder title with low connections');

  if (MONEY_TERMS.test(fullText)) add(10, 'Money/success-related terms in name or profile');
  else if (GURU_TERMS.test(fullText)) add(10, "Generic 'expert/guru' language detected");

  const incomeCount = countMatches(INCOME_CLAIMS, fullText);
  if (incomeCount >= 2) add(20, 'Multiple income-related claims');
  else if (incomeCount === 1) add(10, 'Income-related claims detected');

  score = Math.min(Math.max(score, 0), MAX_SCORE);
  if (score === 0) return { score, reasons: [NO_INDICATORS_REASON] };
  return { score, reasons };
}

/** Display band for a heuristic score. Thresholds are fixed. */
export function verdictBand(score: number): VerdictBand {
  if (score >= 80) return 'highly likely spam';
  if (score >= 60) return 'likely spam';
  if (score >= 40) return 'suspicious';
  if (score >= 20) return 'somewhat suspicious';
  return 'probably legitimate';
}
