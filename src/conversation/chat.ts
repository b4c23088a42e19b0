/**
 * What the conversation layer needs from a chat transport: send a message,
 * and replace a message sent earlier (placeholder -> final report).
 */

export interface SentMessage {
  edit(text: string): Promise<void>;
}

export interface ChatContext {
  /** Stable identity of the user the message came from. */
  userId: string;
  reply(text: string): Promise<SentMessage>;
}
