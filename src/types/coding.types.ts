/**
 * Coding scheme and coding outcome types
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type VariableKind = 'categorical' | 'likert' | 'numeric' | 'text';

interface VariableBase {
  name: string;
  guide?: string;
}

export interface CategoricalVariable extends VariableBase {
  kind: 'categorical';
  options: string[];
}

export interface LikertVariable extends VariableBase {
  kind: 'likert';
  likertScale: number;
  likertLabels?: string[];
}

export interface NumericVariable extends VariableBase {
  kind: 'numeric';
}

export interface TextVariable extends VariableBase {
  kind: 'text';
}

export type Variable = CategoricalVariable | LikertVariable | NumericVariable | TextVariable;

export interface CodingRequest {
  content: string;
  variables: readonly Variable[];
  customPrompt?: string;
}

/** Variable name -> coded value. Partial: unanswered variables are absent. */
export type CodingResult = Record<string, JsonValue>;

export interface VideoFrame {
  /** Encoded image bytes (JPEG unless mimeType says otherwise) */
  image: Buffer;
  /** Seconds from the start of the video */
  timestamp: number;
  mimeType?: string;
}

export interface FrameSampler {
  sampleFrames(videoPath: string, intervalSeconds: number): Promise<VideoFrame[]>;
}

export type CodingFailureKind = 'no_api_key' | 'transport_error' | 'extraction_failed';

export interface CodingFailure {
  kind: CodingFailureKind;
  message: string;
}

export type Outcome<T, E = CodingFailure> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export type ProgressCallback = (progress: number, message: string) => void;

export interface CodingOptions {
  customPrompt?: string;
  textModel?: string;
  onProgress?: ProgressCallback;
}

export interface VideoCodingOptions extends CodingOptions {
  visionModel?: string;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export function succeed<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return true;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value);
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  if (typeof value === 'object') {
    return Object.values(value).every(isJsonValue);
  }
  return false;
}
