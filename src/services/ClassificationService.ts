/**
 * AI classification adapter.
 * Renders the versioned prompt, calls the completion provider under a timeout
 * and validates the reply. Retryable failures come back as a tagged outcome;
 * anything else is thrown.
 */

import type { IClassificationProvider } from '../providers/IClassificationProvider.js';
import type {
  ClassificationProvenance,
  ClassificationResult,
} from '../types/models.js';
import {
  AIProviderError,
  ParseError,
  isRetryableClassificationError,
} from '../errors.js';
import { loadPromptTemplate, renderPrompt } from '../prompts.js';
import { parseClassificationReply } from '../schemas.js';

export type ClassificationOutcome =
  | { ok: true; result: ClassificationResult; provenance: ClassificationProvenance }
  | { ok: false; error: AIProviderError | ParseError };

export interface ClassifyOptions {
  /** Abort after this many milliseconds. */
  timeoutMs: number;
  /** External cancellation, e.g. pool shutdown. */
  signal?: AbortSignal;
}

export interface ClassificationServiceOptions {
  promptVersion: string;
  language: string;
  now?: () => Date;
  /** Template loader override, mainly for tests. */
  loadTemplate?: (version: string) => Promise<string>;
}

export class ClassificationService {
  private readonly now: () => Date;
  private readonly loadTemplate: (version: string) => Promise<string>;

  constructor(
    private readonly provider: IClassificationProvider,
    private readonly options: ClassificationServiceOptions
  ) {
    this.now = options.now ?? (() => new Date());
    this.loadTemplate = options.loadTemplate ?? loadPromptTemplate;
  }

  get provenance(): ClassificationProvenance {
    return {
      provider: this.provider.name,
      model: this.provider.model,
      promptVersion: this.options.promptVersion,
    };
  }

  async classify(text: string, opts: ClassifyOptions): Promise<ClassificationOutcome> {
    const template = await this.loadTemplate(this.options.promptVersion);
    const prompt = renderPrompt(template, {
      currentDate: this.now(),
      language: this.options.language,
    });

    try {
      const reply = await this.completeWithTimeout(prompt, text, opts);
      const result = parseClassificationReply(reply);
      return { ok: true, result, provenance: this.provenance };
    } catch (err) {
      if (isRetryableClassificationError(err)) return { ok: false, error: err };
      throw err;
    }
  }

  private async completeWithTimeout(
    prompt: string,
    text: string,
    opts: ClassifyOptions
  ): Promise<string> {
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (opts.signal?.aborted) controller.abort();
    opts.signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new AIProviderError(`AI request timed out after ${opts.timeoutMs}ms`, {
            provider: this.provider.name,
            reason: 'timeout',
          })
        );
      }, opts.timeoutMs);
    });

    try {
      return await Promise.race([
        this.provider.complete({ prompt, text, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      opts.signal?.removeEventListener('abort', onAbort);
    }
  }
}
