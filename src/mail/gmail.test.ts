import { describe, it, expect } from 'vitest';
import type { gmail_v1 } from 'googleapis';
import { NotConfiguredError } from '../errors';
import {
  createGmailCandidateSource,
  extractExtraInfo,
  extractNameFromSubject,
  extractPlainBody,
  parseConnectionEmail,
  parseFromName,
} from './gmail';

const encode = (text: string) => Buffer.from(text, 'utf-8').toString('base64url');

describe('parseFromName', () => {
  it('strips the "via LinkedIn" suffix', () => {
    expect(parseFromName('"Jane Roe via LinkedIn" <invitations@linkedin.com>')).toBe('Jane Roe');
  });

  it('ignores senders without a person name', () => {
    expect(parseFromName('LinkedIn <invitations@linkedin.com>')).toBeUndefined();
    expect(parseFromName('invitations@linkedin.com')).toBeUndefined();
    expect(parseFromName(undefined)).toBeUndefined();
  });
});

describe('extractNameFromSubject', () => {
  it('reads the subject, then the body', () => {
    expect(extractNameFromSubject('Jane Roe wants to connect', '')).toBe('Jane Roe');
    expect(extractNameFromSubject('Hi', 'Sam Lee wants to connect with you')).toBe('Sam Lee');
    expect(extractNameFromSubject('Weekly digest', '')).toBeUndefined();
  });
});

describe('extractExtraInfo', () => {
  it('picks a headline-shaped line', () => {
    const body = ['Hi there', 'CEO | X', 'Growth Lead at Acme Corp | Speaker', 'https://www.linkedin.com/comm/in/x'].join('\n');
    expect(extractExtraInfo(body)).toBe('Growth Lead at Acme Corp | Speaker');
    expect(extractExtraInfo('nothing useful here')).toBeUndefined();
  });
});

describe('extractPlainBody', () => {
  it('collects text/plain parts and skips html', () => {
    const payload: gmail_v1.Schema$MessagePart = {
      mimeType: 'multipart/alternative',
      parts: [
        { mimeType: 'text/html', body: { data: encode('<p>html</p>') } },
        { mimeType: 'text/plain', body: { data: encode('Hello\nWorld') } },
      ],
    };
    expect(extractPlainBody(payload)).toBe('Hello\nWorld');
    expect(extractPlainBody(undefined)).toBe('');
  });
});

describe('parseConnectionEmail', () => {
  it('builds a candidate from a notification', () => {
    const message: gmail_v1.Schema$Message = {
      id: 'm1',
      payload: {
        mimeType: 'text/plain',
        headers: [
          { name: 'From', value: '"Jane Roe via LinkedIn" <invitations@linkedin.com>' },
          { name: 'Subject', value: 'Jane Roe wants to connect' },
        ],
        body: { data: encode('Jane Roe\nStaff Engineer at Acme | Mentor\nAccept') },
      },
    };
    expect(parseConnectionEmail(message)).toEqual({
      name: 'Jane Roe',
      extraInfo: 'Staff Engineer at Acme | Mentor',
      subject: 'Jane Roe wants to connect',
      emailId: 'm1',
    });
  });

  it('returns null when no name can be found', () => {
    const message: gmail_v1.Schema$Message = {
      payload: {
        headers: [
          { name: 'From', value: 'LinkedIn <invitations@linkedin.com>' },
          { name: 'Subject', value: 'Weekly digest' },
        ],
      },
    };
    expect(parseConnectionEmail(message)).toBeNull();
  });
});

describe('createGmailCandidateSource', () => {
  it('rejects when client credentials are missing', async () => {
    const source = createGmailCandidateSource({ clientId: null, clientSecret: null });
    await expect(source.fetchCandidates(5)).rejects.toBeInstanceOf(NotConfiguredError);
  });

  it('rejects when no mailbox has been authorized', async () => {
    const source = createGmailCandidateSource({ clientId: 'test-client', clientSecret: 'test-secret' });
    await expect(source.fetchCandidates(5)).rejects.toThrow('No mailbox authorized');
  });
});
