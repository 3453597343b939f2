import type { JsonValue } from '../types/coding.types.js';
import type { AlphaInterpretation, CategoryMap, Observation } from '../types/reliability.types.js';

// Values are compared by their JSON form, so 1 and "1" differ
const valueKey = (value: JsonValue): string => JSON.stringify(value);

const has = (observation: Observation, variable: string): boolean =>
  Object.prototype.hasOwnProperty.call(observation.values, variable);

/**
 * Observations per content item, in first-seen order
 */
export function groupByContent(observations: readonly Observation[]): Map<string, Observation[]> {
  const groups = new Map<string, Observation[]>();
  for (const observation of observations) {
    const group = groups.get(observation.contentId);
    if (group) {
      group.push(observation);
    } else {
      groups.set(observation.contentId, [observation]);
    }
  }
  return groups;
}

/**
 * Every unordered pair of observations coding the same content item
 */
export function withinContentPairs(observations: readonly Observation[]): Array<[Observation, Observation]> {
  const pairs: Array<[Observation, Observation]> = [];
  for (const group of groupByContent(observations).values()) {
    for (let i = 0; i < group.length; i++) {
      for (let j = i + 1; j < group.length; j++) {
        pairs.push([group[i], group[j]]);
      }
    }
  }
  return pairs;
}

export function collectVariables(observations: readonly Observation[]): string[] {
  const names = new Set<string>();
  for (const observation of observations) {
    Object.keys(observation.values).forEach(name => names.add(name));
  }
  return [...names];
}

/**
 * Distinct values seen per variable
 */
export function deriveCategories(observations: readonly Observation[], variables?: readonly string[]): CategoryMap {
  const categories: CategoryMap = {};
  for (const variable of variables ?? collectVariables(observations)) {
    const seen = new Map<string, JsonValue>();
    for (const observation of observations) {
      if (has(observation, variable)) {
        const value = observation.values[variable];
        seen.set(valueKey(value), value);
      }
    }
    categories[variable] = [...seen.values()];
  }
  return categories;
}

interface PairTally {
  comparisons: number;
  agreements: number;
}

function tallyPairs(observations: readonly Observation[]): Map<string, PairTally> {
  const tallies = new Map<string, PairTally>();

  for (const [a, b] of withinContentPairs(observations)) {
    for (const variable of Object.keys(a.values)) {
      if (!has(a, variable) || !has(b, variable)) continue;

      const tally = tallies.get(variable) ?? { comparisons: 0, agreements: 0 };
      tally.comparisons++;
      if (valueKey(a.values[variable]) === valueKey(b.values[variable])) {
        tally.agreements++;
      }
      tallies.set(variable, tally);
    }
  }

  return tallies;
}

function sumTallies(tallies: Map<string, PairTally>): PairTally {
  let comparisons = 0;
  let agreements = 0;
  for (const tally of tallies.values()) {
    comparisons += tally.comparisons;
    agreements += tally.agreements;
  }
  return { comparisons, agreements };
}

function valueShares(observations: readonly Observation[], variable: string, coderId?: string): Map<string, number> {
  const counts = new Map<string, number>();
  let total = 0;
  for (const observation of observations) {
    if (coderId !== undefined && observation.coderId !== coderId) continue;
    if (!has(observation, variable)) continue;
    const key = valueKey(observation.values[variable]);
    counts.set(key, (counts.get(key) ?? 0) + 1);
    total++;
  }

  const shares = new Map<string, number>();
  for (const [key, count] of counts) {
    shares.set(key, count / total);
  }
  return shares;
}

/**
 * Share of matching values over all coder pairs on the same content item
 * and every variable both coders answered. 0 when nothing is comparable.
 */
export function calculatePercentageAgreement(observations: readonly Observation[]): number {
  const { comparisons, agreements } = sumTallies(tallyPairs(observations));
  return comparisons === 0 ? 0 : agreements / comparisons;
}

/**
 * Simplified Krippendorff's-alpha-style coefficient:
 * 1 - observed / expected disagreement. Observed disagreement pools every
 * unordered pair of values a variable received, across all observations
 * carrying it; expected disagreement is averaged over variables from their
 * marginal value distributions.
 */
export function calculateAlphaCoefficient(
  observations: readonly Observation[],
  categories: CategoryMap = deriveCategories(observations)
): number {
  if (observations.length < 2) {
    return 0;
  }

  const variables = Object.keys(categories);
  let comparisons = 0;
  let disagreements = 0;
  for (const variable of variables) {
    const counts = new Map<string, number>();
    let total = 0;
    for (const observation of observations) {
      if (!has(observation, variable)) continue;
      const key = valueKey(observation.values[variable]);
      counts.set(key, (counts.get(key) ?? 0) + 1);
      total++;
    }

    const pairs = (total * (total - 1)) / 2;
    let agreeing = 0;
    for (const count of counts.values()) {
      agreeing += (count * (count - 1)) / 2;
    }
    comparisons += pairs;
    disagreements += pairs - agreeing;
  }
  if (comparisons === 0) {
    return 0;
  }
  const observedDisagreement = disagreements / comparisons;

  let expectedSum = 0;
  let contributing = 0;
  for (const variable of variables) {
    if (categories[variable].length === 0) continue;

    const shares = valueShares(observations, variable);
    const total = observations.filter(observation => has(observation, variable)).length;
    if (total < 2) continue;

    let expected = 0;
    for (const [first, p1] of shares) {
      for (const [second, p2] of shares) {
        if (first !== second) {
          expected += p1 * p2;
        }
      }
    }
    expectedSum += expected;
    contributing++;
  }

  const expectedDisagreement = contributing === 0 ? 0 : expectedSum / contributing;
  if (expectedDisagreement === 0) {
    return 1;
  }

  return 1 - observedDisagreement / expectedDisagreement;
}

/**
 * Scott's pi: chance agreement from the pooled value distribution,
 * weighted by each variable's share of comparisons.
 */
export function calculateScottsPi(observations: readonly Observation[]): number {
  const tallies = tallyPairs(observations);
  const { comparisons, agreements } = sumTallies(tallies);
  if (comparisons === 0) {
    return 0;
  }

  let chance = 0;
  for (const [variable, tally] of tallies) {
    let sumSquares = 0;
    for (const share of valueShares(observations, variable).values()) {
      sumSquares += share * share;
    }
    chance += (tally.comparisons / comparisons) * sumSquares;
  }

  return chanceCorrected(agreements / comparisons, chance);
}

/**
 * Cohen's kappa for exactly two coders; null otherwise.
 * Chance agreement uses each coder's own value distribution.
 */
export function calculateCohensKappa(observations: readonly Observation[]): number | null {
  const coders = [...new Set(observations.map(observation => observation.coderId))];
  if (coders.length !== 2) {
    return null;
  }

  const tallies = tallyPairs(observations);
  const { comparisons, agreements } = sumTallies(tallies);
  if (comparisons === 0) {
    return 0;
  }

  let chance = 0;
  for (const [variable, tally] of tallies) {
    const first = valueShares(observations, variable, coders[0]);
    const second = valueShares(observations, variable, coders[1]);
    let overlap = 0;
    for (const [key, share] of first) {
      overlap += share * (second.get(key) ?? 0);
    }
    chance += (tally.comparisons / comparisons) * overlap;
  }

  return chanceCorrected(agreements / comparisons, chance);
}

function chanceCorrected(observedAgreement: number, chanceAgreement: number): number {
  if (chanceAgreement >= 1) {
    return 1;
  }
  return (observedAgreement - chanceAgreement) / (1 - chanceAgreement);
}

export function interpretAlpha(alpha: number): AlphaInterpretation {
  if (alpha >= 0.8) return 'reliable';
  if (alpha >= 0.667) return 'acceptable';
  return 'unreliable';
}
