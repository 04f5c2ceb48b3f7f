import Groq from 'groq-sdk';
import OpenAI from 'openai';

/**
 * GenerationProvider Interface
 *
 * Vendor-agnostic abstraction over chat-completion APIs. The Generator owns
 * prompts, timeouts and error mapping; providers only move text.
 */

export interface CompletionRequest {
  system: string;
  prompt: string;
  temperature: number;
  maxTokens: number;
}

export interface GenerationProvider {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest, signal: AbortSignal): Promise<string>;
  ping(signal: AbortSignal): Promise<void>;
}

/**
 * Groq inference API (fast, free tier available).
 */
export class GroqProvider implements GenerationProvider {
  readonly name = 'groq';

  constructor(private readonly client: Groq, readonly model: string) {}

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal }
    );

    return response.choices[0]?.message?.content?.trim() || '';
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.client.models.list({ signal });
  }
}

/**
 * OpenAI chat completions. Also serves OpenAI-compatible gateways
 * (e.g. OpenRouter) when the client is built with a custom baseURL.
 */
export class OpenAIProvider implements GenerationProvider {
  readonly name = 'openai';

  constructor(private readonly client: OpenAI, readonly model: string) {}

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        messages: [
          { role: 'system', content: request.system },
          { role: 'user', content: request.prompt },
        ],
        temperature: request.temperature,
        max_tokens: request.maxTokens,
      },
      { signal }
    );

    return response.choices[0]?.message?.content?.trim() || '';
  }

  async ping(signal: AbortSignal): Promise<void> {
    await this.client.models.list({ signal });
  }
}
