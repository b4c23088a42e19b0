import { describe, it, expect, vi, beforeEach } from 'vitest';
import { LookupConversation } from '../conversation/lookupConversation';
import type { ChatContext } from '../conversation/chat';
import type { ResearchPipeline } from '../research/pipeline';
import { parseResearchResponse } from '../research/responseParser';
import { HELP_TEXT, WELCOME_TEXT, parseCommand, routeMessage } from './commands';

function setup() {
  const replies: string[] = [];
  const chat: ChatContext = {
    userId: 'user-1',
    async reply(text: string) {
      replies.push(text);
      return {
        async edit(next: string) {
          replies.push(next);
        },
      };
    },
  };
  const research = vi.fn<ResearchPipeline['research']>().mockResolvedValue(
    parseResearchResponse('VERDICT: LEGIT\nSCORE: 5\nREASON: Real job.', 'Jane Roe')
  );
  const researchByReference = vi.fn<ResearchPipeline['researchByReference']>();
  const conversation = new LookupConversation({ pipeline: { research, researchByReference } });
  return { chat, replies, research, conversation };
}

describe('parseCommand', () => {
  it('splits command and arguments', () => {
    expect(parseCommand('/lookup Jane Roe')).toEqual({ command: 'lookup', args: 'Jane Roe' });
    expect(parseCommand('/check')).toEqual({ command: 'check', args: '' });
  });

  it('ignores case and a bot mention', () => {
    expect(parseCommand('/LOOKUP@screener_bot  John Doe ')).toEqual({ command: 'lookup', args: 'John Doe' });
  });

  it('keeps multi-line arguments', () => {
    expect(parseCommand('/score\nRick Money\nCEO')).toEqual({ command: 'score', args: 'Rick Money\nCEO' });
  });

  it('returns null for plain text', () => {
    expect(parseCommand('Jane Roe')).toBeNull();
    expect(parseCommand('/123')).toBeNull();
  });
});

describe('routeMessage', () => {
  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  it('answers /start and /help', async () => {
    const { chat, replies, conversation } = setup();
    await routeMessage(conversation, chat, '/start');
    await routeMessage(conversation, chat, '/help');
    expect(replies).toEqual([WELCOME_TEXT, HELP_TEXT]);
  });

  it('rejects unknown commands', async () => {
    const { chat, replies, conversation } = setup();
    await routeMessage(conversation, chat, '/frobnicate');
    expect(replies).toEqual(['Unknown command /frobnicate. Send /help for the list.']);
  });

  it('routes /lookup and plain names to research', async () => {
    const { chat, research, conversation } = setup();
    await routeMessage(conversation, chat, '/lookup Jane Roe');
    await routeMessage(conversation, chat, 'Jane Roe');
    expect(research.mock.calls).toEqual([['Jane Roe'], ['Jane Roe']]);
  });

  it('routes /score to the offline scorer', async () => {
    const { chat, replies, research, conversation } = setup();
    await routeMessage(conversation, chat, '/score\nAlice Johnson\nSoftware Engineer at Acme\n800 connections');
    expect(replies).toHaveLength(1);
    expect(replies[0].split('\n')[0]).toBe('🔍 Alice Johnson');
    expect(research).not.toHaveBeenCalled();
  });

  it('routes /cancel', async () => {
    const { chat, replies, conversation } = setup();
    await routeMessage(conversation, chat, '/cancel');
    expect(replies).toEqual(['Nothing to cancel.']);
  });
});
