/**
 * Generation contract
 * What the conversation core expects from a language-model client
 */

import type { MessageRole } from '../memory/db.js';

export interface ChatTurn {
  role: MessageRole;
  content: string;
}

// Token usage as reported by the upstream API
export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface GenerationMetadata {
  model: string;
  latencyMs: number;
  tokenUsage: TokenUsage | null;
  requestId: string | null;
  [key: string]: unknown;
}

export interface GenerationResult {
  text: string;
  metadata: GenerationMetadata;
}

export interface GenerationClient {
  /**
   * Generate the next assistant turn.
   * Retries transient failures internally; rejects with GenerationError otherwise.
   */
  generate(turns: ChatTurn[]): Promise<GenerationResult>;
}

export interface GenerationClientOptions {
  apiKey: string;
  baseUrl?: string;
  model: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  maxTokens?: number;
  /** Retries after the first attempt */
  maxRetries?: number;
  /** First backoff delay; doubled for every further retry */
  retryDelayMs?: number;
}
