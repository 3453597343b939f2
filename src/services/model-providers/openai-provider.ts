/**
 * OpenAI-compatible Model Provider
 *
 * Works against any endpoint speaking the OpenAI chat-completions protocol
 * (SiliconFlow, OpenAI, local gateways), authenticated by bearer token.
 */

import OpenAI from 'openai';
import {
  BaseModelProvider,
  type ChatCompletionRequest,
  type ChatCompletionResult,
  type ChatMessage,
} from './base-provider.js';

export interface OpenAIProviderOptions {
  baseURL?: string;
  timeoutMs?: number;
}

export class OpenAIProvider extends BaseModelProvider {
  private client: OpenAI;

  constructor(apiKey: string, options: OpenAIProviderOptions = {}) {
    super();
    // Retries are handled by RetryPolicy, not the SDK
    this.client = new OpenAI({
      apiKey,
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletionResult> {
    const completion = await this.client.chat.completions.create({
      model: request.model,
      messages: request.messages.map(toMessageParam),
      temperature: request.temperature,
      max_tokens: request.maxTokens,
    });

    const choices = (completion.choices ?? []).map(choice => ({
      role: 'assistant' as const,
      text: choice.message?.content ?? '',
    }));
    const usage = completion.usage;

    return {
      model: completion.model,
      choices,
      usage: usage
        ? { inputTokens: usage.prompt_tokens, outputTokens: usage.completion_tokens }
        : undefined,
    };
  }
}

function toMessageParam(message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam {
  if (message.role === 'system') {
    return { role: 'system', content: message.content };
  }

  if (typeof message.content === 'string') {
    return { role: 'user', content: message.content };
  }

  const parts: OpenAI.Chat.ChatCompletionContentPart[] = message.content.map(part =>
    part.type === 'text'
      ? { type: 'text', text: part.text }
      : { type: 'image_url', image_url: { url: part.imageUrl.url } }
  );
  return { role: 'user', content: parts };
}
