/**
 * Lookup conversation: the per-user state machine behind the chat commands.
 *
 *   Idle --lookup(name), search failed--> AwaitingReference(name)
 *   AwaitingReference --reference--> Idle (report)
 *   AwaitingReference --other text--> AwaitingReference (re-prompt)
 *   any --cancel--> Idle
 *
 * Session reads and writes for one user happen inside that user's queue, so each
 * message is one atomic transition. Research calls run outside the queue; a
 * result that comes back after the user moved on is still reported but does not
 * open a new session.
 */

import { describeError, NotConfiguredError } from '../errors';
import { cleanText } from '../lib/text';
import { delay } from '../lib/apiClient';
import { formatScoreMessage, formatVerdictMessage } from '../format/messageFormatter';
import type { CandidateSource } from '../mail/candidateSource';
import type { ResearchPipeline } from '../research/pipeline';
import { displayNameFromReference, extractProfileReference } from '../research/reference';
import { errorVerdict, isSearchFailed } from '../research/responseParser';
import { parseProfileText } from '../scoring/profileText';
import { scoreProfile } from '../scoring/spamScorer';
import type { Candidate, VerdictRecord } from '../types';
import type { ChatContext, SentMessage } from './chat';
import { classifyInput } from './inputClassifier';
import { KeyedQueue } from './keyedQueue';
import { LookupSessionStore, type ConversationState } from './sessionStore';

export const DEFAULT_CHECK_LIMIT = 10;
export const DEFAULT_REQUEST_SPACING_MS = 15_000;

export const LOOKUP_USAGE = [
  'Usage: /lookup [name or URL]',
  '',
  'Examples:',
  '• /lookup John Doe',
  '• /lookup https://www.linkedin.com/in/john-doe',
].join('\n');

export const SCORE_USAGE = [
  'Usage: /score followed by the profile text, one field per line:',
  '',
  'Name',
  'Headline',
  '500+ connections',
  'About / summary text',
].join('\n');

export const UNRECOGNIZED_REPLY = [
  'Not sure what to do with that.',
  '',
  'Try:',
  '• /check - scan your inbox for connection requests',
  '• /lookup John Doe - research someone',
  '• Or just type a name like: John Doe',
].join('\n');

export const REFERENCE_REPROMPT = [
  "❌ That doesn't look like a LinkedIn URL.",
  '',
  'Please send a URL like:',
  'https://www.linkedin.com/in/username',
  '',
  'Or /cancel to stop',
].join('\n');

export const MAIL_SETUP_REPLY = [
  '❌ Mail access is not authorized yet.',
  '',
  'Set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET, then run once in your terminal:',
  'npm run authorize',
].join('\n');

export const NO_CANDIDATES_REPLY = [
  '📭 No new LinkedIn connection request emails found.',
  '',
  'Make sure LinkedIn email notifications are enabled.',
].join('\n');

export const CANCELLED_REPLY = '✅ Cancelled.';
export const CANCELLED_IN_FLIGHT_REPLY =
  '✅ Cancelled. The search already running will still report back, but will not ask for a URL.';
export const NOTHING_TO_CANCEL_REPLY = 'Nothing to cancel.';

export function referenceRequest(name: string): string {
  return [
    `⚠️ Could not find reliable info for ${name}.`,
    '',
    '📎 Please send their LinkedIn profile URL',
    '(Just paste the URL, or /cancel to stop)',
  ].join('\n');
}

export interface LookupConversationOptions {
  pipeline: ResearchPipeline;
  sessions?: LookupSessionStore;
  mail?: CandidateSource;
  checkLimit?: number;
  /** Minimum spacing between research calls during a bulk inbox check. */
  requestSpacingMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface PendingLookup {
  generation: number;
  placeholder: SentMessage;
}

export class LookupConversation {
  readonly sessions: LookupSessionStore;
  private readonly pipeline: ResearchPipeline;
  private readonly mail?: CandidateSource;
  private readonly checkLimit: number;
  private readonly requestSpacingMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly queue = new KeyedQueue();

  constructor(options: LookupConversationOptions) {
    this.pipeline = options.pipeline;
    this.sessions = options.sessions ?? new LookupSessionStore();
    this.mail = options.mail;
    this.checkLimit = options.checkLimit ?? DEFAULT_CHECK_LIMIT;
    this.requestSpacingMs = options.requestSpacingMs ?? DEFAULT_REQUEST_SPACING_MS;
    this.sleep = options.sleep ?? delay;
  }

  state(userId: string): ConversationState {
    return this.sessions.state(userId);
  }

  /** /lookup: a name or a profile URL. Any pending session is discarded first. */
  async lookup(chat: ChatContext, input: string): Promise<void> {
    const text = cleanText(input);
    if (!text) {
      await chat.reply(LOOKUP_USAGE);
      return;
    }
    const reference = extractProfileReference(text);
    if (reference) {
      const pending = await this.queue.run(chat.userId, () => this.beginReferenceLookup(chat));
      await this.finishReferenceLookup(chat, reference, pending);
      return;
    }
    const pending = await this.queue.run(chat.userId, () => this.beginNameLookup(chat, text));
    await this.finishNameLookup(chat, text, pending);
  }

  /** Free text: reference reply, cancellation, name candidate, or none of those. */
  async handleText(chat: ChatContext, text: string): Promise<void> {
    const input = classifyInput(text);
    const next = await this.queue.run(chat.userId, async (): Promise<(() => Promise<void>) | null> => {
      const session = this.sessions.get(chat.userId);
      if (input.kind === 'cancel') {
        await this.applyCancel(chat);
        return null;
      }
      if (input.kind === 'reference') {
        const pending = await this.beginReferenceLookup(chat, session?.pendingName);
        return () => this.finishReferenceLookup(chat, input.reference, pending);
      }
      if (input.kind === 'name' && !session) {
        const pending = await this.beginNameLookup(chat, input.name);
        return () => this.finishNameLookup(chat, input.name, pending);
      }
      await chat.reply(session ? REFERENCE_REPROMPT : UNRECOGNIZED_REPLY);
      return null;
    });
    if (next) await next();
  }

  async cancel(chat: ChatContext): Promise<void> {
    await this.queue.run(chat.userId, () => this.applyCancel(chat));
  }

  /** /score: heuristic report for pasted profile text. No session change. */
  async scoreText(chat: ChatContext, text: string): Promise<void> {
    if (!text.trim()) {
      await chat.reply(SCORE_USAGE);
      return;
    }
    const profile = parseProfileText(text);
    await chat.reply(formatScoreMessage(profile, scoreProfile(profile)));
  }

  /** /check: research every recent connection request, one provider call at a time. */
  async checkInbox(chat: ChatContext, limit = this.checkLimit): Promise<void> {
    if (!this.mail) {
      await chat.reply(MAIL_SETUP_REPLY);
      return;
    }
    const status = await chat.reply('📬 Checking mail...');

    let candidates: Candidate[];
    try {
      candidates = await this.mail.fetchCandidates(limit);
    } catch (err) {
      if (err instanceof NotConfiguredError) {
        console.warn('[conversation] mail not configured:', err.message);
        await status.edit(MAIL_SETUP_REPLY);
        return;
      }
      console.error('[conversation] mail fetch error:', err);
      await status.edit(`❌ Mail error: ${describeError(err, 200)}`);
      return;
    }

    if (candidates.length === 0) {
      await status.edit(NO_CANDIDATES_REPLY);
      return;
    }
    await status.edit(`🔍 Found ${candidates.length} request(s). Researching each one...`);

    for (let i = 0; i < candidates.length; i++) {
      const { name, extraInfo } = candidates[i];
      if (i > 0) await this.sleep(this.requestSpacingMs);
      const message = await chat.reply(`🔎 Researching ${name}...`);
      try {
        const result = await this.pipeline.research(name, extraInfo);
        await message.edit(formatVerdictMessage(result));
      } catch (err) {
        console.error(`[conversation] analysis error for ${name}:`, err);
        await message.edit(`❌ Could not analyze ${name}: ${describeError(err, 100)}`);
      }
    }
  }

  private async applyCancel(chat: ChatContext): Promise<void> {
    const hadSession = this.sessions.clear(chat.userId);
    const hadInFlight = this.sessions.dropInFlight(chat.userId);
    this.sessions.nextGeneration(chat.userId);
    if (hadSession) await chat.reply(CANCELLED_REPLY);
    else await chat.reply(hadInFlight ? CANCELLED_IN_FLIGHT_REPLY : NOTHING_TO_CANCEL_REPLY);
  }

  private async beginNameLookup(chat: ChatContext, name: string): Promise<PendingLookup> {
    this.sessions.clear(chat.userId);
    const generation = this.sessions.nextGeneration(chat.userId);
    this.sessions.markInFlight(chat.userId, generation);
    const placeholder = await chat.reply(`🔎 Searching for ${name}...`);
    return { generation, placeholder };
  }

  private async finishNameLookup(chat: ChatContext, name: string, pending: PendingLookup): Promise<void> {
    let result: VerdictRecord | null = null;
    try {
      result = await this.pipeline.research(name);
    } catch (err) {
      console.error(`[conversation] name lookup error for ${name}:`, err);
    }

    await this.queue.run(chat.userId, async () => {
      this.sessions.settle(chat.userId, pending.generation);
      const failed = result === null || isSearchFailed(result);
      if (failed && this.sessions.isCurrent(chat.userId, pending.generation)) {
        this.sessions.begin(chat.userId, name);
        await pending.placeholder.edit(referenceRequest(name));
        return;
      }
      await pending.placeholder.edit(result ? formatVerdictMessage(result) : `❌ Could not analyze ${name}.`);
    });
  }

  private async beginReferenceLookup(chat: ChatContext, pendingName?: string): Promise<PendingLookup> {
    this.sessions.clear(chat.userId);
    const generation = this.sessions.nextGeneration(chat.userId);
    this.sessions.markInFlight(chat.userId, generation);
    const placeholder = await chat.reply(
      pendingName ? `✅ Got it! Analyzing ${pendingName}'s profile...` : '🔎 Fetching profile...'
    );
    return { generation, placeholder };
  }

  private async finishReferenceLookup(chat: ChatContext, reference: string, pending: PendingLookup): Promise<void> {
    let result: VerdictRecord;
    try {
      result = await this.pipeline.researchByReference(reference);
    } catch (err) {
      console.error('[conversation] reference lookup error:', err);
      result = errorVerdict(displayNameFromReference(reference), describeError(err, 100));
    }
    this.sessions.settle(chat.userId, pending.generation);
    await pending.placeholder.edit(formatVerdictMessage(result));
  }
}
