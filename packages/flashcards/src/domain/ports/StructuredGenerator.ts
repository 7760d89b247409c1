/** One request for structured output. */
export interface GenerationRequest {
  /** Standing instructions (system prompt). */
  readonly instructions: string;
  /** The per-card prompt. */
  readonly prompt: string;
}

/**
 * The external model call. Implementations wrap a provider SDK and resolve with
 * the parsed JSON object the model returned; validation happens afterwards.
 * Credentials and model choice belong to the implementation.
 */
export interface StructuredGenerator {
  generate(request: GenerationRequest, signal: AbortSignal): Promise<unknown>;
}
