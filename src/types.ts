/**
 * Shared records passed between the scorer, the research pipeline, the
 * formatter and the conversation layer.
 */

export interface ProfileRecord {
  name: string;
  headline: string;
  summary: string;
  connections: number;
}

export interface ScoreResult {
  score: number;
  reasons: string[];
}

export const VERDICTS = ['SPAM', 'LIKELY_SPAM', 'UNCLEAR', 'LIKELY_LEGIT', 'LEGIT', 'ERROR'] as const;

export type Verdict = (typeof VERDICTS)[number];

export interface VerdictRecord {
  readonly subjectName: string;
  readonly verdict: Verdict;
  /** 0-100, or -1 when verdict is ERROR. */
  readonly score: number;
  readonly headline: string;
  readonly reason: string;
  readonly redFlags: readonly string[];
  readonly greenFlags: readonly string[];
  readonly rawText: string;
}

/** A person pulled from a connection-request email. */
export interface Candidate {
  name: string;
  extraInfo?: string;
  subject?: string;
  emailId?: string;
}

export const HEADLINE_NOT_FOUND = 'Not found';
