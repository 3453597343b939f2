/**
 * Model Provider Factory
 */

import type { CodingConfig } from '../../config/coding.config.js';
import type { BaseModelProvider } from './base-provider.js';
import { OpenAIProvider } from './openai-provider.js';

export type ProviderFactory = (apiKey: string, config: CodingConfig) => BaseModelProvider;

export const createModelProvider: ProviderFactory = (apiKey, config) =>
  new OpenAIProvider(apiKey, { baseURL: config.baseURL, timeoutMs: config.requestTimeoutMs });
