import { isJsonObject } from '../types/coding.types.js';
import type { JsonObject, JsonValue } from '../types/coding.types.js';

export type ExtractionStrategyName = 'direct-json' | 'fenced-json' | 'brace-span' | 'key-value-lines';

/**
 * A single parse strategy. Returns null when it finds nothing usable.
 */
export interface ExtractionStrategy {
  name: ExtractionStrategyName;
  parse(raw: string): JsonObject | null;
}

export type ExtractionResult =
  | { found: true; values: JsonObject; strategy: ExtractionStrategyName }
  | { found: false };

function parseJsonObject(text: string): JsonObject | null {
  try {
    const parsed: JsonValue = JSON.parse(text);
    return isJsonObject(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

const FENCED_BLOCK = /```(?:json)?\s*([\s\S]*?)\s*```/i;

export const directJson: ExtractionStrategy = {
  name: 'direct-json',
  parse: raw => parseJsonObject(raw.trim()),
};

export const fencedJson: ExtractionStrategy = {
  name: 'fenced-json',
  parse: raw => {
    const match = FENCED_BLOCK.exec(raw);
    return match ? parseJsonObject(match[1]) : null;
  },
};

export const braceSpan: ExtractionStrategy = {
  name: 'brace-span',
  parse: raw => {
    const start = raw.indexOf('{');
    const end = raw.lastIndexOf('}');
    if (start === -1 || end <= start) {
      return null;
    }
    return parseJsonObject(raw.slice(start, end + 1));
  },
};

export const keyValueLines: ExtractionStrategy = {
  name: 'key-value-lines',
  parse: raw => {
    const values: JsonObject = {};
    for (const line of raw.split('\n')) {
      const separator = line.indexOf('=');
      if (separator === -1) continue;

      const key = line.slice(0, separator).trim();
      if (!key) continue;
      values[key] = line.slice(separator + 1).trim();
    }
    return values;
  },
};

export const DEFAULT_STRATEGIES: readonly ExtractionStrategy[] = [directJson, fencedJson, braceSpan, keyValueLines];

/**
 * Recovers a variable -> value mapping from a raw model reply.
 * Strategies run in order; the first non-empty mapping wins. Never throws.
 */
export class ResponseExtractor {
  constructor(private strategies: readonly ExtractionStrategy[] = DEFAULT_STRATEGIES) {}

  extract(raw: string): ExtractionResult {
    for (const [index, strategy] of this.strategies.entries()) {
      let values: JsonObject | null = null;
      try {
        values = strategy.parse(raw);
      } catch (error) {
        console.warn(`⚠️ Extraction strategy ${strategy.name} threw:`, error);
      }

      if (values && Object.keys(values).length > 0) {
        if (index > 0) {
          console.log(`📄 Recovered ${Object.keys(values).length} values via ${strategy.name} fallback`);
        }
        return { found: true, values, strategy: strategy.name };
      }

      const next = this.strategies[index + 1];
      if (next) {
        console.warn(`⚠️ ${strategy.name} found nothing, falling back to ${next.name}`);
      }
    }

    console.warn('⚠️ No structured result could be recovered from the model reply');
    return { found: false };
  }
}
