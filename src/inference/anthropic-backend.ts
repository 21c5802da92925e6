/**
 * Anthropic Backend - Messages API
 */

import Anthropic from '@anthropic-ai/sdk';
import type { MessageParam, TextBlock } from '@anthropic-ai/sdk/resources/messages';
import { DEFAULT_MODELS } from '../config/providers.js';
import { InvalidParamsError } from '../errors/index.js';
import type { BackendCompletion, BackendRequest, InferenceBackend } from '../types/index.js';
import { createLogger } from '../utils/logger.js';
import { convertBackendError } from './error-converter.js';
import type { BackendOptions } from './types.js';

const logger = createLogger('AnthropicBackend');

/** The Messages API accepts temperatures in [0, 1] */
const MAX_TEMPERATURE = 1;

export type AnthropicBackendOptions = BackendOptions<Anthropic>;

/**
 * Anthropic backend
 *
 * System messages are sent through the `system` parameter; the remaining
 * messages keep their order. Frequency and presence penalties are not
 * supported by the API and are ignored.
 */
export class AnthropicBackend implements InferenceBackend {
  readonly name = 'anthropic';
  readonly provider = 'anthropic' as const;
  readonly defaultModel: string;
  private client: Anthropic;

  constructor(options?: AnthropicBackendOptions) {
    if (options?.client) {
      this.client = options.client;
    } else {
      this.client = new Anthropic({
        apiKey: options?.apiKey ?? process.env.ANTHROPIC_API_KEY,
        maxRetries: 0,
      });
    }
    this.defaultModel = options?.defaultModel ?? DEFAULT_MODELS.anthropic;
  }

  async complete(request: BackendRequest, signal: AbortSignal): Promise<BackendCompletion> {
    const { params } = request;

    if (params.temperature > MAX_TEMPERATURE) {
      throw new InvalidParamsError(
        `temperature ${params.temperature} exceeds the Anthropic maximum of ${MAX_TEMPERATURE}`,
        { provider: this.name }
      );
    }
    if (params.frequencyPenalty !== undefined || params.presencePenalty !== undefined) {
      logger.debug({ model: params.model }, 'Ignoring frequency/presence penalty (unsupported)');
    }

    const systemParts: string[] = [];
    const messages: MessageParam[] = [];
    for (const message of request.messages) {
      if (message.role === 'system') {
        systemParts.push(message.content);
      } else {
        messages.push({ role: message.role, content: message.content });
      }
    }

    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: params.model,
          max_tokens: params.maxTokens,
          system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
          messages,
          temperature: params.temperature,
          top_p: params.topP,
        },
        { signal }
      );
    } catch (error) {
      throw convertBackendError(error, this.name);
    }

    const text = response.content
      .filter((block): block is TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');

    return {
      text,
      model: response.model,
      finishReason: response.stop_reason ?? undefined,
      usage: {
        promptTokens: response.usage.input_tokens,
        completionTokens: response.usage.output_tokens,
        totalTokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }
}
