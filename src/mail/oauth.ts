/**
 * One-time Google OAuth loopback flow for the mailbox the bot reads. Prints the
 * consent URL, waits for the redirect on localhost and stores the tokens.
 */

import { createServer, type IncomingMessage, type ServerResponse } from 'http';
import { URL } from 'url';
import { google } from 'googleapis';
import { saveAccountTokens } from '../db';

const REDIRECT_PORT = 3333;
const REDIRECT_PATH = '/oauth2callback';
const FLOW_TIMEOUT_MS = 5 * 60 * 1000;

export const REDIRECT_URI = `http://localhost:${REDIRECT_PORT}${REDIRECT_PATH}`;

export const SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/userinfo.email',
];

export interface OAuthResult {
  email: string;
}

export function runOAuthFlow(
  clientId: string,
  clientSecret: string,
  onAuthUrl: (url: string) => void = (url) => console.log(`[oauth] Open this URL to authorize mail access:\n${url}`)
): Promise<OAuthResult> {
  return new Promise((resolve, reject) => {
    const oauth2Client = new google.auth.OAuth2(clientId, clientSecret, REDIRECT_URI);
    const authUrl = oauth2Client.generateAuthUrl({
      access_type: 'offline',
      scope: SCOPES,
      prompt: 'consent',
    });

    const finish = (res: ServerResponse, status: number, body: string) => {
      res.writeHead(status, { 'Content-Type': 'text/plain; charset=utf-8' });
      res.end(body);
      clearTimeout(timer);
      server.close();
    };

    const server = createServer((req: IncomingMessage, res: ServerResponse) => {
      const url = req.url ? new URL(req.url, `http://localhost:${REDIRECT_PORT}`) : null;
      if (!url || url.pathname !== REDIRECT_PATH) {
        res.writeHead(404);
        res.end('Not found');
        return;
      }

      const error = url.searchParams.get('error');
      if (error) {
        finish(res, 400, `Authorization failed: ${error}`);
        reject(new Error(error));
        return;
      }
      const code = url.searchParams.get('code');
      if (!code) {
        res.writeHead(400);
        res.end('No code received');
        return;
      }

      exchangeCode(code)
        .then((result) => {
          finish(res, 200, 'Authorization successful. You can close this window.');
          resolve(result);
        })
        .catch((err: unknown) => {
          finish(res, 500, 'Token exchange failed');
          reject(err instanceof Error ? err : new Error(String(err)));
        });
    });

    async function exchangeCode(code: string): Promise<OAuthResult> {
      const { tokens } = await oauth2Client.getToken(code);
      oauth2Client.setCredentials(tokens);
      const oauth2 = google.oauth2({ version: 'v2', auth: oauth2Client });
      const { data } = await oauth2.userinfo.get();
      const email = (data.email || '').trim();
      if (!email) throw new Error('No email in userinfo');
      if (!tokens.refresh_token) throw new Error('No refresh token returned; revoke access and try again');
      saveAccountTokens(
        email,
        { access_token: tokens.access_token, refresh_token: tokens.refresh_token, expiry_date: tokens.expiry_date },
        SCOPES
      );
      return { email };
    }

    const timer = setTimeout(() => {
      if (server.listening) {
        server.close();
        reject(new Error('OAuth timeout'));
      }
    }, FLOW_TIMEOUT_MS);

    server.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });

    server.listen(REDIRECT_PORT, () => onAuthUrl(authUrl));
  });
}
