/**
 * Plain-text chat reports for research verdicts and heuristic scores.
 */

import { verdictBand, type VerdictBand } from '../scoring/spamScorer';
import { HEADLINE_NOT_FOUND, type ProfileRecord, type ScoreResult, type Verdict, type VerdictRecord } from '../types';

const DIVIDER = '━'.repeat(22);
const BAR_SEGMENTS = 10;
const MAX_FLAGS_SHOWN = 3;

const VERDICT_LABELS: Record<Verdict, string> = {
  SPAM: 'SPAM',
  LIKELY_SPAM: 'LIKELY SPAM',
  UNCLEAR: 'UNCLEAR',
  LIKELY_LEGIT: 'LIKELY LEGIT',
  LEGIT: 'LEGIT',
  ERROR: 'ERROR',
};

const BAND_LABELS: Record<VerdictBand, string> = {
  'highly likely spam': '🚨 HIGHLY LIKELY SPAM - Avoid',
  'likely spam': '⚠️ LIKELY SPAM - Proceed with caution',
  suspicious: '🤔 SUSPICIOUS - Could be spam, be careful',
  'somewhat suspicious': '😐 SOMEWHAT SUSPICIOUS - Minor red flags',
  'probably legitimate': '✅ PROBABLY LEGITIMATE - Looks okay',
};

export function statusGlyph(verdict: Verdict): string {
  switch (verdict) {
    case 'SPAM':
    case 'LIKELY_SPAM':
      return '🔴';
    case 'UNCLEAR':
      return '🟡';
    case 'LEGIT':
    case 'LIKELY_LEGIT':
      return '🟢';
    default:
      return '⚪';
  }
}

export function recommendation(verdict: Verdict): string | null {
  switch (verdict) {
    case 'SPAM':
    case 'LIKELY_SPAM':
      return '⚠️ Recommend: Decline';
    case 'UNCLEAR':
      return '💭 Recommend: Review manually';
    case 'LEGIT':
    case 'LIKELY_LEGIT':
      return '✅ Recommend: Safe to accept';
    default:
      return null;
  }
}

/** 10-segment bar, floor(score / 10) segments filled. */
export function scoreBar(score: number): string {
  const filled = Math.min(BAR_SEGMENTS, Math.max(0, Math.floor(score / 10)));
  return '█'.repeat(filled) + '░'.repeat(BAR_SEGMENTS - filled);
}

function flagList(title: string, flags: readonly string[]): string[] {
  if (flags.length === 0) return [];
  return ['', title, ...flags.slice(0, MAX_FLAGS_SHOWN).map((f) => `  • ${f}`)];
}

export function formatVerdictMessage(record: VerdictRecord): string {
  const glyph = statusGlyph(record.verdict);
  const lines = [`${glyph} ${record.subjectName}`, DIVIDER, ''];

  if (record.headline && record.headline !== HEADLINE_NOT_FOUND) {
    lines.push(`💼 ${record.headline}`, '');
  }
  if (record.score >= 0) {
    lines.push(`📊 Spam Score: ${record.score}%`, scoreBar(record.score), '');
  }
  lines.push(`${glyph} ${VERDICT_LABELS[record.verdict]}`, record.reason);
  lines.push(...flagList('🚩 Red flags:', record.redFlags));
  lines.push(...flagList('✅ Green flags:', record.greenFlags));

  const rec = recommendation(record.verdict);
  if (rec) lines.push('', rec);
  return lines.join('\n');
}

export function formatScoreMessage(profile: ProfileRecord, result: ScoreResult): string {
  const lines = [`🔍 ${profile.name || 'Unnamed profile'}`, DIVIDER, ''];
  if (profile.headline) lines.push(`💼 ${profile.headline}`, '');
  lines.push(`📊 Spam Score: ${result.score}%`, scoreBar(result.score), '');
  lines.push(BAND_LABELS[verdictBand(result.score)], '', 'Reasons:');
  lines.push(...result.reasons.map((r) => `  • ${r}`));
  return lines.join('\n');
}
