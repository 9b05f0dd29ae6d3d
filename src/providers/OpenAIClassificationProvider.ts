/**
 * OpenAI chat-completions provider for item classification.
 * Requests a JSON object reply; the SDK's own retries are disabled because
 * retry and backoff are owned by the staging state machine.
 */

import OpenAI from 'openai';
import { AIProviderError, httpStatusOf } from '../errors.js';
import type {
  CompletionRequest,
  IClassificationProvider,
} from './IClassificationProvider.js';

const DEFAULT_MODEL = 'gpt-4o-mini';

export class OpenAIClassificationProvider implements IClassificationProvider {
  readonly name: string;
  readonly model: string;
  private client: OpenAI;

  constructor(opts?: {
    apiKey?: string;
    baseURL?: string;
    model?: string;
    /** Provenance label; defaults to "openai". Set it when baseURL points elsewhere. */
    name?: string;
  }) {
    this.client = new OpenAI({
      apiKey: opts?.apiKey ?? process.env.OPENAI_API_KEY,
      baseURL: opts?.baseURL,
      maxRetries: 0,
    });
    this.model = opts?.model ?? DEFAULT_MODEL;
    this.name = opts?.name ?? 'openai';
  }

  async complete(request: CompletionRequest): Promise<string> {
    const model = request.model ?? this.model;

    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model,
          temperature: 0,
          response_format: { type: 'json_object' },
          messages: [
            { role: 'system', content: request.prompt },
            { role: 'user', content: request.text },
          ],
        },
        { signal: request.signal }
      );
    } catch (err) {
      if (request.signal?.aborted) {
        throw new AIProviderError('AI request aborted', {
          provider: this.name,
          model,
          reason: 'timeout',
        });
      }
      const status = httpStatusOf(err);
      throw new AIProviderError(
        `AI request failed: ${err instanceof Error ? err.message : String(err)}`,
        {
          provider: this.name,
          model,
          ...(status !== undefined && { status }),
          rateLimited: status === 429,
        }
      );
    }

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new AIProviderError('AI reply was empty', {
        provider: this.name,
        model,
        finishReason: completion.choices[0]?.finish_reason ?? null,
      });
    }

    return content;
  }
}
