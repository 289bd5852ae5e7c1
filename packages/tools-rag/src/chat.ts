import { createOpenAI } from '@ai-sdk/openai';
import { createLogger } from '@paperqa/tools-core';
import { generateText } from 'ai';
import { z } from 'zod';
import {
  CompletionAuthError,
  CompletionRequestError,
  CompletionUnavailableError,
  errorMessage,
} from './errors.js';
import { RetryError, type RetryPolicy, defaultRetryPolicy, withRetry } from './retry.js';
import { DEFAULT_COMPATIBLE_BASE_URL } from './embedding.js';
import type { SearchHit } from './vectorIndex.js';

const log = createLogger('chat');

export interface CompleteOptions {
  signal?: AbortSignal;
}

/** Prompt in, text out. */
export interface ChatModel {
  complete(prompt: string, options?: CompleteOptions): Promise<string>;
}

export enum ChatModelProvider {
  Mock = 'mock',
  OpenAI = 'openai',
}

const MockChatConfigSchema = z.object({
  provider: z.literal(ChatModelProvider.Mock),
  answer: z.string().default('This is a mock answer.'),
});

const OpenAIChatConfigSchema = z.object({
  provider: z.literal(ChatModelProvider.OpenAI),
  baseURL: z.string().url().default(DEFAULT_COMPATIBLE_BASE_URL),
  apiKey: z.string().min(1, 'An API key is required for the OpenAI-compatible chat provider'),
  model: z.string().default('qwen-plus'),
  temperature: z.number().min(0).max(2).default(0.1),
  maxTokens: z.number().int().positive().default(1000),
});

export const ChatModelConfigSchema = z.discriminatedUnion('provider', [
  MockChatConfigSchema,
  OpenAIChatConfigSchema,
]);
export type ChatModelConfig = z.infer<typeof ChatModelConfigSchema>;

export class MockChatModel implements ChatModel {
  public readonly prompts: string[] = [];

  constructor(private readonly answer = 'This is a mock answer.') {}

  public async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.answer;
  }
}

export interface OpenAIChatModelOptions {
  baseURL: string;
  apiKey: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

/** Chat completions against any OpenAI-compatible endpoint. */
export class OpenAIChatModel implements ChatModel {
  private readonly provider: ReturnType<typeof createOpenAI>;

  constructor(private readonly options: OpenAIChatModelOptions) {
    this.provider = createOpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      compatibility: 'compatible',
    });
  }

  public async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const { text } = await generateText({
      model: this.provider.chat(this.options.model),
      prompt,
      temperature: this.options.temperature,
      maxTokens: this.options.maxTokens,
      // RetryingChatModel owns retries.
      maxRetries: 0,
      abortSignal: options.signal,
    });
    return text;
  }
}

export interface RetryingChatModelOptions {
  policy?: RetryPolicy;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/** Applies the embedding retry policy to completions, with the same transient/non-transient split. */
export class RetryingChatModel implements ChatModel {
  constructor(
    private readonly inner: ChatModel,
    private readonly options: RetryingChatModelOptions = {},
  ) {}

  public async complete(prompt: string, options: CompleteOptions = {}): Promise<string> {
    const policy = this.options.policy ?? defaultRetryPolicy;
    try {
      return await withRetry(() => this.inner.complete(prompt, options), {
        policy,
        sleep: this.options.sleep,
        random: this.options.random,
        signal: options.signal,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn(`Completion attempt ${attempt}/${policy.maxAttempts} failed, retrying in ${delayMs}ms: ${errorMessage(error)}`),
      });
    } catch (error: unknown) {
      if (!(error instanceof RetryError)) throw error;
      const details = { attempts: error.attempts };
      const cause = { cause: error.lastError };
      const message = errorMessage(error.lastError);
      switch (error.kind) {
        case 'auth':
          throw new CompletionAuthError(`Chat API rejected the credentials: ${message}`, details, cause);
        case 'transient':
          throw new CompletionUnavailableError(
            `Chat completion failed after ${error.attempts} attempt(s): ${message}`,
            details,
            cause,
          );
        default:
          throw new CompletionRequestError(`Chat completion request failed: ${message}`, details, cause);
      }
    }
  }
}

export function createChatModel(config: ChatModelConfig): ChatModel {
  switch (config.provider) {
    case ChatModelProvider.Mock:
      return new MockChatModel(config.answer);
    case ChatModelProvider.OpenAI:
      return new OpenAIChatModel(config);
    default: {
      const exhaustiveCheck: never = config;
      throw new Error(`Unhandled chat provider: ${JSON.stringify(exhaustiveCheck)}`);
    }
  }
}

export const QA_PROMPT_TEMPLATE = `Use the following pieces of context to answer the question at the end. If you don't know the answer, just say that you don't know, don't try to make up an answer.

{context}

Question: {question}
Helpful Answer:`;

/** Stuffs the retrieved segments, in rank order, into a single prompt. */
export function buildQaPrompt(question: string, hits: readonly SearchHit[]): string {
  const context = hits.map((hit) => hit.segment.text).join('\n\n');
  return QA_PROMPT_TEMPLATE.replace(/\{(context|question)\}/g, (_match, key: string) =>
    key === 'context' ? context : question,
  );
}
