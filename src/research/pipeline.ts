/**
 * Research pipeline: asks the generation provider (with web search) about a
 * person and parses the answer into a VerdictRecord.
 *
 * This is the only place a provider failure is turned into an ERROR verdict;
 * research() and researchByReference() never reject.
 */

import { withRetry, delay } from '../lib/apiClient';
import { ConnectionFailedError, RateLimitedError, describeError } from '../errors';
import type { VerdictRecord } from '../types';
import type { GenerationProvider } from './provider';
import { RESEARCH_SYSTEM_PROMPT, buildNamePrompt, buildReferencePrompt } from './prompts';
import { displayNameFromReference } from './reference';
import { errorVerdict, parseResearchResponse } from './responseParser';
import { ResultCache } from './resultCache';

export const MAX_ATTEMPTS = 3;
export const BACKOFF_STEP_MS = 15_000;

export const RATE_LIMIT_MESSAGE = 'Rate limit reached, try again in a moment';
export const CONNECTION_MESSAGE = 'Could not connect to the research provider';
export const EMPTY_MESSAGE = 'No analysis returned';

export interface ResearchPipeline {
  research(name: string, extraInfo?: string): Promise<VerdictRecord>;
  researchByReference(reference: string): Promise<VerdictRecord>;
}

export interface ResearchPipelineOptions {
  provider: GenerationProvider;
  cache?: ResultCache;
  sleep?: (ms: number) => Promise<void>;
  /** Wait after failed attempt n; defaults to 15 s × n. */
  backoffMs?: (attempt: number) => number;
}

export function createResearchPipeline(options: ResearchPipelineOptions): ResearchPipeline {
  const { provider, cache } = options;
  const sleep = options.sleep ?? delay;
  const backoffMs = options.backoffMs ?? ((attempt: number) => BACKOFF_STEP_MS * attempt);

  async function run(subjectName: string, prompt: string): Promise<VerdictRecord> {
    let text: string;
    try {
      text = await withRetry(() => provider.generate(RESEARCH_SYSTEM_PROMPT, prompt, { webSearch: true }), {
        maxAttempts: MAX_ATTEMPTS,
        shouldRetry: (err) => err instanceof RateLimitedError,
        delayMs: backoffMs,
        sleep,
        onRetry: (_err, attempt, waitMs) =>
          console.warn(`[research] rate limited on attempt ${attempt} for ${subjectName}, retrying in ${waitMs}ms`),
      });
    } catch (err) {
      if (err instanceof RateLimitedError) {
        console.error(`[research] rate limit persisted after ${MAX_ATTEMPTS} attempts for ${subjectName}`);
        return errorVerdict(subjectName, RATE_LIMIT_MESSAGE);
      }
      if (err instanceof ConnectionFailedError) {
        console.error('[research] provider connection failed:', err.message);
        return errorVerdict(subjectName, CONNECTION_MESSAGE);
      }
      console.error(`[research] analysis error for ${subjectName}:`, err);
      return errorVerdict(subjectName, describeError(err, 100));
    }

    if (!text.trim()) {
      console.warn(`[research] empty response for ${subjectName}`);
      return errorVerdict(subjectName, EMPTY_MESSAGE);
    }
    return parseResearchResponse(text, subjectName);
  }

  async function cached(key: string, compute: () => Promise<VerdictRecord>): Promise<VerdictRecord> {
    const hit = cache?.get(key);
    if (hit) {
      console.log(`[research] cache hit for ${key}`);
      return hit;
    }
    const record = await compute();
    if (cache && ResultCache.isCacheable(record)) {
      cache.set(key, record);
      console.log(`[research] cached ${key} (${cache.size} entries)`);
    }
    return record;
  }

  return {
    research(name: string, extraInfo?: string): Promise<VerdictRecord> {
      const subject = name.trim();
      return cached(ResultCache.keyFor('name', subject), () => run(subject, buildNamePrompt(subject, extraInfo)));
    },

    researchByReference(reference: string): Promise<VerdictRecord> {
      const ref = reference.trim();
      const displayName = displayNameFromReference(ref);
      return cached(ResultCache.keyFor('reference', ref), () => run(displayName, buildReferencePrompt(ref, displayName)));
    },
  };
}
