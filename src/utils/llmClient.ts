import OpenAI from 'openai';
import { LlmError, describeError } from './errorHandler';
import { logger } from './logger';

export type LlmRole = 'system' | 'user' | 'assistant';

export interface LlmMessage {
  role: LlmRole;
  content: string;
}

export interface LlmRequest {
  messages: LlmMessage[];
  maxTokens: number;
  temperature: number;
  /** Ask the model for a single JSON object. */
  json?: boolean;
  /** Short label used in logs. */
  purpose: string;
}

export interface LlmClient {
  complete(request: LlmRequest): Promise<string>;
}

export interface OpenAiLlmClientOptions {
  apiKey: string;
  baseURL?: string;
  model: string;
  timeoutMs: number;
  maxRetries: number;
}

function toMessageParam(message: LlmMessage): OpenAI.Chat.Completions.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Chat completion client for OpenAI or any OpenAI-compatible endpoint
 * (Groq, a local gateway) selected through `baseURL`.
 */
export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(private readonly options: OpenAiLlmClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: options.maxRetries
    });
  }

  async complete(request: LlmRequest): Promise<string> {
    const startedAt = Date.now();
    try {
      const completion = await this.client.chat.completions.create({
        model: this.options.model,
        messages: request.messages.map(toMessageParam),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
        ...(request.json ? { response_format: { type: 'json_object' as const } } : {})
      });

      const content = completion.choices[0]?.message?.content?.trim();
      if (!content) {
        throw new LlmError('Language model returned an empty response');
      }

      logger.info('LLM call completed', {
        purpose: request.purpose,
        model: this.options.model,
        durationMs: Date.now() - startedAt,
        totalTokens: completion.usage?.total_tokens
      });

      return content;
    } catch (error) {
      if (error instanceof LlmError) {
        throw error;
      }
      logger.error('LLM call failed', {
        purpose: request.purpose,
        model: this.options.model,
        durationMs: Date.now() - startedAt,
        error: describeError(error)
      });
      throw new LlmError();
    }
  }
}
