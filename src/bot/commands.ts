/**
 * Routes one incoming chat message to the matching conversation action.
 * Transport-agnostic: anything that can produce a ChatContext can use it.
 */

import type { ChatContext } from '../conversation/chat';
import type { LookupConversation } from '../conversation/lookupConversation';

export const WELCOME_TEXT = [
  '👋 Welcome to the connection screener!',
  '',
  'I check your LinkedIn connection requests and tell you if they look spammy.',
  '',
  'Commands:',
  '/check - scan the latest connection requests from your inbox',
  '/lookup [name or URL] - research someone',
  '/score [profile text] - score a pasted profile offline',
  '/cancel - stop waiting for a profile URL',
  '/help - how to use',
].join('\n');

export const HELP_TEXT = [
  '📖 How to use:',
  '',
  'Option 1 - Auto:',
  '  /check',
  '  Reads your inbox for LinkedIn connection request',
  '  emails and researches each person.',
  '',
  'Option 2 - Manual:',
  '  /lookup John Doe',
  '  /lookup https://www.linkedin.com/in/...',
  '  Research by name or URL.',
  "  If the name search fails, I'll ask for the URL.",
  '',
  'Option 3 - Offline:',
  '  /score followed by name, headline,',
  '  connection count and summary on separate lines.',
].join('\n');

export interface ParsedCommand {
  command: string;
  args: string;
}

/** '/lookup Jane Roe' -> { command: 'lookup', args: 'Jane Roe' }. Null for plain text. */
export function parseCommand(text: string): ParsedCommand | null {
  const match = text.trim().match(/^\/([a-z]+)(?:@\S+)?(?:[ \t]+|\r?\n|$)([\s\S]*)$/i);
  if (!match) return null;
  return { command: match[1].toLowerCase(), args: match[2].trim() };
}

export async function routeMessage(conversation: LookupConversation, chat: ChatContext, text: string): Promise<void> {
  const parsed = parseCommand(text);
  if (!parsed) {
    await conversation.handleText(chat, text);
    return;
  }
  switch (parsed.command) {
    case 'start':
      await chat.reply(WELCOME_TEXT);
      return;
    case 'help':
      await chat.reply(HELP_TEXT);
      return;
    case 'check':
      await conversation.checkInbox(chat);
      return;
    case 'lookup':
      await conversation.lookup(chat, parsed.args);
      return;
    case 'score':
      await conversation.scoreText(chat, parsed.args);
      return;
    case 'cancel':
      await conversation.cancel(chat);
      return;
    default:
      await chat.reply(`Unknown command /${parsed.command}. Send /help for the list.`);
  }
}
