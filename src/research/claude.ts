/**
 * Claude-backed generation provider for the research pipeline.
 * Wraps the Anthropic Messages API with the server-side web search tool and
 * translates SDK failures into the provider error taxonomy.
 */

import Anthropic from '@anthropic-ai/sdk';
import { ConnectionFailedError, NotConfiguredError, RateLimitedError } from '../errors';
import type { GenerationCapabilities, GenerationProvider } from './provider';

const DEFAULT_MODEL = 'claude-sonnet-4-20250514';
const MAX_TOKENS = 1024;
const MAX_SEARCHES = 5;
const MAX_PROMPT_LEN = 20000;

export interface ClaudeProviderOptions {
  apiKey: string | null;
  model?: string;
  baseURL?: string;
}

/** Map SDK errors onto RateLimitedError / ConnectionFailedError; anything else passes through. */
export function toProviderError(err: unknown): unknown {
  if (err instanceof Anthropic.RateLimitError) return new RateLimitedError();
  if (err instanceof Anthropic.APIConnectionError) return new ConnectionFailedError();
  // 529: API overloaded, transient in the same way as a rate limit
  if (err instanceof Anthropic.APIError && err.status === 529) return new RateLimitedError('Provider overloaded');
  return err;
}

export function createClaudeProvider(options: ClaudeProviderOptions): GenerationProvider {
  const model = options.model || DEFAULT_MODEL;
  let client: Anthropic | null = null;

  return {
    async generate(instructions: string, prompt: string, capabilities: GenerationCapabilities): Promise<string> {
      if (!options.apiKey) {
        throw new NotConfiguredError('ANTHROPIC_API_KEY is not set');
      }
      // the research pipeline owns retries
      client ??= new Anthropic({ apiKey: options.apiKey, baseURL: options.baseURL, maxRetries: 0 });
      const tools: Anthropic.Messages.ToolUnion[] = capabilities.webSearch
        ? [{ type: 'web_search_20250305', name: 'web_search', max_uses: MAX_SEARCHES }]
        : [];
      try {
        const response = await client.messages.create({
          model,
          max_tokens: MAX_TOKENS,
          system: instructions,
          tools,
          messages: [{ role: 'user', content: prompt.slice(0, MAX_PROMPT_LEN) }],
        });
        let text = '';
        for (const block of response.content) {
          if (block.type === 'text') text += block.text;
        }
        return text;
      } catch (err) {
        throw toProviderError(err);
      }
    },
  };
}
