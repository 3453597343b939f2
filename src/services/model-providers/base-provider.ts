/**
 * Base Model Provider Interface
 *
 * Call boundary to a chat-completion service
 */

import type { TokenUsage } from '../../types/coding.types.js';

export type ContentPart =
  | { type: 'text'; text: string }
  | { type: 'image_url'; imageUrl: { url: string } };

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string | ContentPart[] };

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  maxTokens: number;
}

export interface ChatChoice {
  role: 'assistant';
  text: string;
}

/**
 * Normalised reply; `choices` is empty when the service returned none
 */
export interface ChatCompletionResult {
  model: string;
  choices: ChatChoice[];
  usage?: TokenUsage;
}

/**
 * Credentials and endpoint settings belong to the concrete provider's client
 */
export abstract class BaseModelProvider {
  /**
   * Generate a completion. Transport and HTTP failures are thrown.
   */
  abstract complete(request: ChatCompletionRequest): Promise<ChatCompletionResult>;
}

/**
 * Text of the first choice, or null when there is none or it is blank
 */
export function firstChoiceText(result: ChatCompletionResult): string | null {
  const text = result.choices[0]?.text;
  return text && text.trim() ? text : null;
}
