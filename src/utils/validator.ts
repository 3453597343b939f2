import { FUZZY_MATCH_THRESHOLD } from '../config/coding.config.js';
import type { CategoricalVariable, CodingResult, JsonObject, JsonValue, Variable } from '../types/coding.types.js';

export interface CategoricalRepair {
  variable: string;
  original: JsonValue;
  repaired: string;
  method: 'fuzzy' | 'default';
  score: number;
}

export interface SchemaValidationResult {
  values: CodingResult;
  repairs: CategoricalRepair[];
}

export interface OptionMatch {
  option: string;
  score: number;
}

const chars = (text: string): string[] => Array.from(text);

/**
 * Character-set overlap between an option and a candidate value,
 * divided by the longer of the two lengths. Only options where one
 * string contains the other (case-insensitive) are eligible.
 */
export function similarityScore(option: string, value: string): number | null {
  const optionLower = option.toLowerCase();
  const valueLower = value.toLowerCase();
  if (!optionLower.includes(valueLower) && !valueLower.includes(optionLower)) {
    return null;
  }

  const valueChars = new Set(chars(valueLower));
  let shared = 0;
  for (const char of new Set(chars(optionLower))) {
    if (valueChars.has(char)) shared++;
  }

  const longest = Math.max(chars(option).length, chars(value).length);
  return longest === 0 ? 0 : shared / longest;
}

/**
 * Best eligible option; the first one wins on equal scores.
 */
export function bestOptionMatch(options: readonly string[], value: string): OptionMatch | null {
  let best: OptionMatch | null = null;
  for (const option of options) {
    const score = similarityScore(option, value);
    if (score !== null && score > (best?.score ?? 0)) {
      best = { option, score };
    }
  }
  return best;
}

/**
 * Makes candidate values conform to the coding scheme.
 * Categorical answers outside the option set are repaired or defaulted,
 * other kinds pass through untouched. Missing variables stay missing.
 */
export class SchemaValidator {
  constructor(private threshold: number = FUZZY_MATCH_THRESHOLD) {}

  validate(candidate: JsonObject, variables: readonly Variable[]): SchemaValidationResult {
    const values: CodingResult = {};
    const repairs: CategoricalRepair[] = [];

    for (const variable of variables) {
      if (!Object.prototype.hasOwnProperty.call(candidate, variable.name)) {
        continue;
      }
      const value = candidate[variable.name];

      if (variable.kind !== 'categorical') {
        values[variable.name] = value;
        continue;
      }

      const { accepted, repair } = this.resolveCategorical(variable, value);
      values[variable.name] = accepted;
      if (repair) {
        repairs.push(repair);
      }
    }

    return { values, repairs };
  }

  private resolveCategorical(
    variable: CategoricalVariable,
    value: JsonValue
  ): { accepted: string; repair?: CategoricalRepair } {
    const text = typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
      ? String(value)
      : null;

    if (text !== null && variable.options.includes(text)) {
      return { accepted: text };
    }

    const match = text !== null ? bestOptionMatch(variable.options, text) : null;
    if (match && match.score > this.threshold) {
      console.log(`🔧 ${variable.name}: repaired "${text}" to "${match.option}" (score ${match.score.toFixed(2)})`);
      return {
        accepted: match.option,
        repair: { variable: variable.name, original: value, repaired: match.option, method: 'fuzzy', score: match.score },
      };
    }

    const fallback = variable.options[0];
    console.warn(`⚠️ ${variable.name}: value ${JSON.stringify(value)} is not a valid option, using default "${fallback}"`);
    return {
      accepted: fallback,
      repair: { variable: variable.name, original: value, repaired: fallback, method: 'default', score: match?.score ?? 0 },
    };
  }
}
