/**
 * Which model family an agent wants: a code-tuned model or a general one.
 */
export type ModelKind = 'code' | 'general';

export interface ModelMessage {
  role: 'system' | 'user';
  content: string;
}

export interface ModelRequest {
  modelKind: ModelKind;
  messages: ModelMessage[];
  temperature: number;
  maxTokens: number;
}

/**
 * Transport to the underlying language model.
 */
export interface ModelRepository {
  /**
   * Sends one completion request and resolves with the raw text of the answer.
   * Implementations must stop work when `signal` aborts.
   */
  complete(request: ModelRequest, signal: AbortSignal): Promise<string>;
}
