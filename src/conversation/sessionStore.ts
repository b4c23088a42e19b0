/**
 * Per-user lookup sessions. A session exists only while the user owes us a
 * direct profile reference after a failed name search.
 *
 * Each user also has a request generation that moves on with every new lookup
 * or cancellation, so a result arriving for an older request can tell it has
 * been superseded.
 */

export interface LookupSession {
  pendingName: string;
}

export type ConversationState = { kind: 'idle' } | { kind: 'awaitingReference'; pendingName: string };

export class LookupSessionStore {
  private readonly sessions = new Map<string, LookupSession>();
  private readonly generations = new Map<string, number>();
  private readonly inFlight = new Map<string, number>();

  get(userId: string): LookupSession | undefined {
    return this.sessions.get(userId);
  }

  state(userId: string): ConversationState {
    const session = this.sessions.get(userId);
    return session ? { kind: 'awaitingReference', pendingName: session.pendingName } : { kind: 'idle' };
  }

  begin(userId: string, pendingName: string): void {
    this.sessions.set(userId, { pendingName });
  }

  /** Returns true when a pending session was dropped. */
  clear(userId: string): boolean {
    return this.sessions.delete(userId);
  }

  /** Start a new request for the user and return its generation number. */
  nextGeneration(userId: string): number {
    const next = (this.generations.get(userId) ?? 0) + 1;
    this.generations.set(userId, next);
    return next;
  }

  isCurrent(userId: string, generation: number): boolean {
    return this.generations.get(userId) === generation;
  }

  /** Record that a research call for this generation is running. */
  markInFlight(userId: string, generation: number): void {
    this.inFlight.set(userId, generation);
  }

  /** The call for this generation has finished; newer calls stay marked. */
  settle(userId: string, generation: number): void {
    if (this.inFlight.get(userId) === generation) this.inFlight.delete(userId);
  }

  /** Drop the in-flight mark; returns true when one was set. */
  dropInFlight(userId: string): boolean {
    return this.inFlight.delete(userId);
  }
}
