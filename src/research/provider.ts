/**
 * The text-generation service the research pipeline talks to. Implementations
 * signal failures with RateLimitedError, ConnectionFailedError or any other
 * Error, and may resolve with an empty string.
 */
export interface GenerationCapabilities {
  webSearch: boolean;
}

export interface GenerationProvider {
  generate(instructions: string, prompt: string, capabilities: GenerationCapabilities): Promise<string>;
}
