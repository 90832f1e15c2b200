/**
 * LLM client used by the rule compiler. The compiler depends only on the
 * `LlmClient` interface so tests can substitute a fake.
 */

import Anthropic from '@anthropic-ai/sdk';

export interface LlmConfig {
  apiKey?: string;
  baseUrl?: string;
  model: string;
  /** Per-request timeout in milliseconds. */
  timeoutMs: number;
  /** Retries on transient failures; one bounded retry by default. */
  maxRetries: number;
  temperature: number;
}

export interface LlmRequest {
  system: string;
  prompt: string;
  maxTokens?: number;
}

export interface LlmResponse {
  text: string;
  usage: {
    inputTokens: number;
    outputTokens: number;
  };
}

export interface LlmClient {
  complete(request: LlmRequest): Promise<LlmResponse>;
}

/** The model could not be reached or refused the call. */
export class LlmUnavailableError extends Error {
  constructor(
    message: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'LlmUnavailableError';
  }
}

export class AnthropicLlmClient implements LlmClient {
  private anthropic: Anthropic | null = null;

  constructor(private readonly config: LlmConfig) {}

  isConfigured(): boolean {
    return !!this.config.apiKey && this.config.apiKey.length > 0;
  }

  async complete(request: LlmRequest): Promise<LlmResponse> {
    const client = this.getAnthropicClient();

    try {
      const response = await client.messages.create({
        model: this.config.model,
        max_tokens: request.maxTokens ?? 1024,
        temperature: this.config.temperature,
        system: request.system,
        messages: [{ role: 'user', content: request.prompt }],
      });

      const text = response.content
        .filter((block): block is Anthropic.TextBlock => block.type === 'text')
        .map((block) => block.text)
        .join('');

      return {
        text,
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      if (error instanceof Anthropic.APIError) {
        throw new LlmUnavailableError(`LLM request failed: ${error.message}`, error.status);
      }
      throw error;
    }
  }

  private getAnthropicClient(): Anthropic {
    if (!this.anthropic) {
      if (!this.isConfigured()) {
        throw new LlmUnavailableError('Missing API key: LLM_API_KEY is not set');
      }
      this.anthropic = new Anthropic({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseUrl,
        timeout: this.config.timeoutMs,
        maxRetries: this.config.maxRetries,
      });
    }
    return this.anthropic;
  }
}

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text.trim());
  } catch {
    return undefined;
  }
}

/**
 * Extract JSON from a model reply: the bare reply, a fenced code block, or
 * the first brace-delimited span. Undefined when none parses.
 */
export function extractJson(text: string): unknown {
  const direct = tryParse(text);
  if (direct !== undefined) return direct;

  const codeBlock = text.match(/```(?:json)?\s*\n([\s\S]*?)\n```/);
  if (codeBlock?.[1]) {
    const parsed = tryParse(codeBlock[1]);
    if (parsed !== undefined) return parsed;
  }

  const braces = text.match(/(\{[\s\S]*\})/);
  if (braces?.[1]) return tryParse(braces[1]);

  return undefined;
}
