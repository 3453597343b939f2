import 'dotenv/config';
import { z } from 'zod';

export interface RetryConfig {
  maxRetries: number;
  initialBackoffSeconds: number;
  backoffFactor: number;
}

export interface CodingConfig {
  apiKey?: string;
  baseURL: string;
  textModel: string;
  visionModel: string;
  requestTimeoutMs: number;
}

export const DEFAULT_BASE_URL = 'https://api.siliconflow.cn/v1';
export const DEFAULT_TEXT_MODEL = 'deepseek-ai/DeepSeek-V2.5';
export const DEFAULT_VISION_MODEL = 'Qwen/Qwen2-VL-72B-Instruct';

// Retry budget around the final coding call
export const CODING_RETRY: RetryConfig = {
  maxRetries: 2,
  initialBackoffSeconds: 5,
  backoffFactor: 2,
};

export const GENERATION_SETTINGS = {
  textCoding: { temperature: 0.2, maxTokens: 1000 },
  videoCoding: { temperature: 0.3, maxTokens: 1000 },
  frameDescription: { temperature: 0.2, maxTokens: 500 },
} as const;

export const MAX_VIDEO_FRAMES = 4;

// Minimum character-overlap score for a fuzzy categorical repair
export const FUZZY_MATCH_THRESHOLD = 0.5;

const optionalString = z
  .string()
  .optional()
  .transform(value => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  CODING_API_KEY: optionalString,
  CODING_API_BASE_URL: z.string().url().default(DEFAULT_BASE_URL),
  CODING_TEXT_MODEL: z.string().min(1).default(DEFAULT_TEXT_MODEL),
  CODING_VISION_MODEL: z.string().min(1).default(DEFAULT_VISION_MODEL),
  CODING_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

/**
 * Build the coding config from environment variables.
 * A missing API key is allowed here; coding calls report it as `no_api_key`.
 */
export function loadCodingConfig(env: NodeJS.ProcessEnv = process.env): CodingConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`Invalid coding configuration: ${issues}`);
  }

  return {
    apiKey: parsed.data.CODING_API_KEY,
    baseURL: parsed.data.CODING_API_BASE_URL,
    textModel: parsed.data.CODING_TEXT_MODEL,
    visionModel: parsed.data.CODING_VISION_MODEL,
    requestTimeoutMs: parsed.data.CODING_REQUEST_TIMEOUT_MS,
  };
}
