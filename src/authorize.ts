#!/usr/bin/env node
/**
 * One-time mailbox authorization. Runs the Google OAuth flow, stores the tokens
 * and lists the latest connection requests as a smoke test.
 */
import 'dotenv/config';
import { loadConfig, databasePath } from './config';
import { initDb, closeDb } from './db';
import { runOAuthFlow } from './mail/oauth';
import { createGmailCandidateSource } from './mail/gmail';

async function authorize(): Promise<void> {
  const config = loadConfig();
  if (!config.googleClientId || !config.googleClientSecret) {
    console.error('[authorize] GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET must be set (see .env.example)');
    process.exitCode = 1;
    return;
  }
  initDb(databasePath(config));
  try {
    const { email } = await runOAuthFlow(config.googleClientId, config.googleClientSecret);
    console.log(`[authorize] authorized ${email}`);

    const source = createGmailCandidateSource({ clientId: config.googleClientId, clientSecret: config.googleClientSecret });
    const candidates = await source.fetchCandidates(5);
    if (candidates.length === 0) console.log('[authorize] no connection request emails found');
    for (const c of candidates) {
      console.log(`\n📧 ${c.subject ?? ''}\n   Name: ${c.name}${c.extraInfo ? `\n   Info: ${c.extraInfo}` : ''}`);
    }
  } finally {
    closeDb();
  }
}

authorize().catch((err: unknown) => {
  console.error('[authorize] failed:', err);
  process.exitCode = 1;
});
