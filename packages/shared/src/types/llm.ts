/**
 * A message in a conversation with an LLM provider.
 */
export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Request payload for generating a model response.
 *
 * @example
 * ```typescript
 * const request: ModelRequest = {
 *   messages: [{ role: 'user', content: 'Diagnose this failure' }],
 *   jsonMode: true,
 * };
 * ```
 */
export interface ModelRequest {
  messages: ChatMessage[];
  /** Maximum tokens to generate in the response */
  maxTokens?: number;
  /** Sampling temperature (0-2) */
  temperature?: number;
  /** Request JSON-formatted output */
  jsonMode?: boolean;
}

/**
 * Token usage statistics from a model response.
 */
export interface Usage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface ModelResponse {
  text?: string;
  usage?: Usage;
  /** Raw provider-specific response data */
  raw?: unknown;
}

/**
 * Describes what an adapter can do; used to decide whether to ask for JSON mode.
 */
export interface ProviderCapabilities {
  supportsJsonMode: boolean;
  maxContextTokens?: number;
  latencyClass: 'fast' | 'medium' | 'slow';
}
