import type { Candidate } from '../types';

/**
 * Supplies people who recently sent connection requests. Rejects with
 * NotConfiguredError when the mailbox has not been authorized yet.
 */
export interface CandidateSource {
  fetchCandidates(limit: number): Promise<Candidate[]>;
}
