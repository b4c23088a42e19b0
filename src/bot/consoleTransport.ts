/**
 * Terminal chat transport: every stdin line is a message from one local user.
 * A bare "/score" switches to paste mode; the pasted profile ends at a blank line.
 * Edits cannot rewrite earlier terminal output, so they print the new text.
 */

import readline from 'readline';
import type { ChatContext, SentMessage } from '../conversation/chat';

export const CONSOLE_USER_ID = 'console';

export interface ConsoleTransportOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  onMessage: (chat: ChatContext, text: string) => Promise<void>;
}

export function createConsoleChat(output: NodeJS.WritableStream, userId = CONSOLE_USER_ID): ChatContext {
  const print = (text: string) => {
    output.write(`${text}\n\n`);
  };
  return {
    userId,
    async reply(text: string): Promise<SentMessage> {
      print(text);
      return {
        async edit(next: string) {
          print(next);
        },
      };
    },
  };
}

/** Resolves when the input closes or the user types /quit. */
export function runConsoleTransport(options: ConsoleTransportOptions): Promise<void> {
  const output = options.output ?? process.stdout;
  const rl = readline.createInterface({ input: options.input ?? process.stdin, output, terminal: false });
  const chat = createConsoleChat(output);
  let pasteBuffer: string[] | null = null;

  const dispatch = (text: string) => {
    options.onMessage(chat, text).catch((err: unknown) => {
      console.error('[console] message handling failed:', err);
    });
  };

  return new Promise((resolve) => {
    rl.on('line', (line) => {
      const text = line.trim();
      if (pasteBuffer) {
        if (text) {
          pasteBuffer.push(text);
          return;
        }
        const pasted = pasteBuffer.join('\n');
        pasteBuffer = null;
        dispatch(`/score\n${pasted}`);
        return;
      }
      if (!text) return;
      if (text === '/quit' || text === '/exit') {
        rl.close();
        return;
      }
      if (text === '/score') {
        pasteBuffer = [];
        output.write('Paste the profile, then an empty line:\n');
        return;
      }
      dispatch(text);
    });
    rl.on('close', () => resolve());
  });
}
