import type { JsonValue } from './coding.types.js';

/**
 * One coder's values for one content item
 */
export interface Observation {
  contentId: string;
  coderId: string;
  values: Record<string, JsonValue>;
}

export type ReliabilityMethod =
  | 'percent_agreement'
  | 'holsti'
  | 'scotts_pi'
  | 'cohens_kappa'
  | 'krippendorff_alpha';

export type ReliabilityResult = Partial<Record<ReliabilityMethod, number>>;

export type AlphaInterpretation = 'reliable' | 'acceptable' | 'unreliable';

/** Variable name -> the distinct values observed for it */
export type CategoryMap = Record<string, JsonValue[]>;

/**
 * Stored under the `reliability_results` document of a project
 */
export interface ReliabilityDataset {
  observations: Observation[];
  variables: string[];
  results?: ReliabilityResult;
  calculatedAt?: string;
}

export interface CalculationRequest {
  variables?: string[];
  methods?: ReliabilityMethod[];
}

export interface CalculationReport {
  results: ReliabilityResult;
  usedContentIds: string[];
  skippedContentIds: string[];
  observationCount: number;
  warnings: string[];
}

export type ImportFormat = 'csv' | 'json' | 'xlsx';

export type ReliabilityFailureKind =
  | 'invalid_import'
  | 'invalid_request'
  | 'dataset_missing'
  | 'insufficient_observations'
  | 'storage_error';

export interface ReliabilityFailure {
  kind: ReliabilityFailureKind;
  message: string;
}
