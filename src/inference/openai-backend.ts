/**
 * OpenAI Backend - Chat Completions API
 *
 * Works with any OpenAI-compatible endpoint through `baseURL`, e.g.
 * DashScope's compatible mode.
 */

import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { DEFAULT_MODELS } from '../config/providers.js';
import { BackendUnavailableError } from '../errors/index.js';
import type {
  BackendCompletion,
  BackendRequest,
  InferenceBackend,
  PromptMessage,
} from '../types/index.js';
import { convertBackendError } from './error-converter.js';
import type { BackendOptions } from './types.js';

export interface OpenAIBackendOptions extends BackendOptions<OpenAI> {
  /** Base URL of an OpenAI-compatible endpoint (overrides OPENAI_BASE_URL) */
  baseURL?: string;
}

function toChatMessage(message: PromptMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIBackend implements InferenceBackend {
  readonly name = 'openai';
  readonly provider = 'openai' as const;
  readonly defaultModel: string;
  private client: OpenAI;

  constructor(options?: OpenAIBackendOptions) {
    if (options?.client) {
      this.client = options.client;
    } else {
      this.client = new OpenAI({
        apiKey: options?.apiKey ?? process.env.OPENAI_API_KEY,
        baseURL: options?.baseURL ?? process.env.OPENAI_BASE_URL,
        // Retries are owned by InferenceClient
        maxRetries: 0,
      });
    }
    this.defaultModel = options?.defaultModel ?? DEFAULT_MODELS.openai;
  }

  async complete(request: BackendRequest, signal: AbortSignal): Promise<BackendCompletion> {
    const { params } = request;

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: params.model,
          messages: request.messages.map(toChatMessage),
          temperature: params.temperature,
          max_tokens: params.maxTokens,
          top_p: params.topP,
          frequency_penalty: params.frequencyPenalty,
          presence_penalty: params.presencePenalty,
        },
        { signal }
      );
    } catch (error) {
      throw convertBackendError(error, this.name);
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new BackendUnavailableError('Backend returned no choices', { provider: this.name });
    }

    return {
      text: choice.message.content ?? '',
      model: completion.model,
      finishReason: choice.finish_reason,
      usage: completion.usage
        ? {
            promptTokens: completion.usage.prompt_tokens,
            completionTokens: completion.usage.completion_tokens,
            totalTokens: completion.usage.total_tokens,
          }
        : undefined,
    };
  }
}
