/**
 * AI completion provider interface.
 * Sends a rendered prompt plus item text to an external model and returns its raw reply.
 * Parsing and validation of the reply belong to ClassificationService.
 */

export interface CompletionRequest {
  /** Rendered system prompt. */
  prompt: string;
  /** Item text to analyze. */
  text: string;
  /** Overrides the provider's default model. */
  model?: string;
  /** Aborts the in-flight request (timeout or shutdown). */
  signal?: AbortSignal;
}

export interface IClassificationProvider {
  /** Provider identifier recorded in item provenance, e.g. "openai". */
  readonly name: string;
  /** Default model identifier recorded in item provenance. */
  readonly model: string;

  /**
   * Returns the model's raw text reply.
   * Throws AIProviderError on timeout, rate limiting or transport failure.
   */
  complete(request: CompletionRequest): Promise<string>;
}
