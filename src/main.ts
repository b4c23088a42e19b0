#!/usr/bin/env node
import 'dotenv/config';
import { loadConfig, databasePath } from './config';
import { initDb, closeDb } from './db';
import { createClaudeProvider } from './research/claude';
import { createResearchPipeline } from './research/pipeline';
import { ResultCache } from './research/resultCache';
import { createGmailCandidateSource } from './mail/gmail';
import { LookupConversation } from './conversation/lookupConversation';
import { routeMessage, WELCOME_TEXT } from './bot/commands';
import { runConsoleTransport } from './bot/consoleTransport';

async function main(): Promise<void> {
  const config = loadConfig();
  initDb(databasePath(config));

  if (!config.anthropicApiKey) {
    console.warn('[main] ANTHROPIC_API_KEY not set; research lookups will fail, /score still works');
  }

  const pipeline = createResearchPipeline({
    provider: createClaudeProvider({ apiKey: config.anthropicApiKey, model: config.anthropicModel }),
    cache:
      config.resultCacheSize > 0
        ? new ResultCache({ maxEntries: config.resultCacheSize, ttlMs: config.resultCacheTtlMs })
        : undefined,
  });
  const conversation = new LookupConversation({
    pipeline,
    mail: createGmailCandidateSource({ clientId: config.googleClientId, clientSecret: config.googleClientSecret }),
    checkLimit: config.checkLimit,
    requestSpacingMs: config.requestSpacingMs,
  });

  process.stdout.write(`${WELCOME_TEXT}\n\n`);
  console.log('[main] connection screener running; /quit to exit');
  await runConsoleTransport({ onMessage: (chat, text) => routeMessage(conversation, chat, text) });
  closeDb();
}

main().catch((err: unknown) => {
  console.error('[main] fatal:', err);
  process.exitCode = 1;
});
