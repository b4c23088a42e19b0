/**
 * Gmail candidate source: reads LinkedIn "wants to connect" notification emails
 * and pulls out the sender's name and, when present, their headline.
 */

import { google, type gmail_v1 } from 'googleapis';
import { getActiveAccountId, getAccountTokens, updateAccountTokens } from '../db';
import { NotConfiguredError } from '../errors';
import { withRetry } from '../lib/apiClient';
import type { Candidate } from '../types';
import type { CandidateSource } from './candidateSource';
import { REDIRECT_URI } from './oauth';

export const CONNECTION_REQUEST_QUERY =
  'from:invitations@linkedin.com (subject:"I want to connect" OR subject:"You have an invitation")';

const MAX_LIMIT = 50;

const SUBJECT_NAME_PATTERNS = [
  /^(.+?)\s+wants to connect/i,
  /^(.+?)\s+invited you to connect/i,
  /^(.+?)\s+has accepted/i,
  /^(.+?)\s+accepted your/i,
];
const BODY_NAME_PATTERN = /([A-Z][a-z]+(?:\s[A-Z][a-z]+)+)\s+wants to connect/;

export interface GmailCredentials {
  clientId: string | null;
  clientSecret: string | null;
}

function getGmailClient(credentials: GmailCredentials): gmail_v1.Gmail {
  const { clientId, clientSecret } = credentials;
  if (!clientId || !clientSecret) throw new NotConfiguredError('Google OAuth client credentials not set');

  const email = getActiveAccountId();
  if (!email) throw new NotConfiguredError('No mailbox authorized');
  const tokens = getAccountTokens(email);
  if (!tokens?.refresh_token) throw new NotConfiguredError('No tokens for account');

  const oauth2Client = new google.auth.OAuth2(clientId, clientSecret, REDIRECT_URI);
  oauth2Client.setCredentials({
    refresh_token: tokens.refresh_token,
    access_token: tokens.access_token,
    expiry_date: tokens.expiry_date,
  });
  oauth2Client.on('tokens', (fresh) => {
    updateAccountTokens(email, fresh);
    console.log('[gmail] token refreshed for', email);
  });

  return google.gmail({ version: 'v1', auth: oauth2Client });
}

function getHeader(headers: gmail_v1.Schema$MessagePartHeader[], name: string): string {
  const h = headers.find((x) => (x.name ?? '').toLowerCase() === name.toLowerCase());
  return h?.value ?? '';
}

/**
 * Sender name from a From header: '"Jane Roe via LinkedIn" <invitations@linkedin.com>' -> 'Jane Roe'.
 * The bare "LinkedIn" sender carries no person's name.
 */
export function parseFromName(raw: string | undefined): string | undefined {
  if (!raw) return undefined;
  const match = raw.match(/^"?([^"<]+?)"?\s*</);
  const name = (match ? match[1] : raw.includes('@') ? '' : raw).replace(/\s+via LinkedIn$/i, '').trim();
  if (!name || name.toLowerCase() === 'linkedin') return undefined;
  return name;
}

function decodeBase64Url(str: string): string {
  try {
    return Buffer.from(str.replace(/-/g, '+').replace(/_/g, '/'), 'base64').toString('utf-8');
  } catch {
    return '';
  }
}

/** Concatenated text/plain content of a message payload, depth first. */
export function extractPlainBody(part: gmail_v1.Schema$MessagePart | undefined): string {
  if (!part) return '';
  let text = '';
  if ((part.mimeType ?? '').toLowerCase() === 'text/plain' && part.body?.data) {
    text += decodeBase64Url(part.body.data);
  }
  for (const child of part.parts ?? []) {
    text += extractPlainBody(child);
  }
  return text;
}

export function extractNameFromSubject(subject: string, body: string): string | undefined {
  for (const pattern of SUBJECT_NAME_PATTERNS) {
    const match = subject.match(pattern);
    if (match) return match[1].trim();
  }
  const bodyMatch = body.match(BODY_NAME_PATTERN);
  return bodyMatch ? bodyMatch[1].trim() : undefined;
}

/**
 * The sender's headline, which LinkedIn sometimes prints under their name:
 * a 20-120 char line with "|" or " at " that is not a link, address or footer.
 */
export function extractExtraInfo(body: string): string | undefined {
  if (!body) return undefined;
  const lines = body
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length > 0);
  return lines.find((line) => {
    const lower = line.toLowerCase();
    return (
      line.length >= 20 &&
      line.length <= 120 &&
      !line.includes('http') &&
      !lower.includes('unsubscribe') &&
      !lower.includes('linkedin.com') &&
      !line.includes('@') &&
      (line.includes('|') || lower.includes(' at '))
    );
  });
}

/** Candidate from a full-format Gmail message, or null when no name can be found. */
export function parseConnectionEmail(message: gmail_v1.Schema$Message): Candidate | null {
  const headers = message.payload?.headers ?? [];
  const subject = getHeader(headers, 'Subject');
  const body = extractPlainBody(message.payload);
  const name = parseFromName(getHeader(headers, 'From')) ?? extractNameFromSubject(subject, body);
  if (!name) return null;
  const extraInfo = extractExtraInfo(body);
  return {
    name,
    ...(extraInfo ? { extraInfo } : {}),
    subject,
    ...(message.id ? { emailId: message.id } : {}),
  };
}

export function createGmailCandidateSource(credentials: GmailCredentials): CandidateSource {
  return {
    async fetchCandidates(limit: number): Promise<Candidate[]> {
      const gmail = getGmailClient(credentials);
      const maxResults = Math.min(Math.max(1, Math.floor(limit)), MAX_LIMIT);
      const res = await withRetry(() =>
        gmail.users.messages.list({ userId: 'me', q: CONNECTION_REQUEST_QUERY, maxResults })
      );
      const refs = res.data.messages ?? [];
      if (refs.length === 0) {
        console.log('[gmail] no LinkedIn connection request emails found');
        return [];
      }

      const candidates: Candidate[] = [];
      for (const ref of refs) {
        if (!ref.id) continue;
        const id = ref.id;
        try {
          const full = await withRetry(() => gmail.users.messages.get({ userId: 'me', id, format: 'full' }));
          const candidate = parseConnectionEmail(full.data);
          if (candidate) candidates.push(candidate);
        } catch (e) {
          console.warn(`[gmail] failed to parse email ${id}:`, e);
        }
      }
      return candidates;
    },
  };
}
