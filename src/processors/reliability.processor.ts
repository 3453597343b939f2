import type { ProjectStore } from '../db/project-store.js';
import { fail, succeed } from '../types/coding.types.js';
import type { JsonValue, Outcome } from '../types/coding.types.js';
import { ReliabilityDatasetSchema } from '../types/schemas.js';
import type {
  CalculationReport,
  CalculationRequest,
  ImportFormat,
  Observation,
  ReliabilityDataset,
  ReliabilityFailure,
  ReliabilityMethod,
  ReliabilityResult,
} from '../types/reliability.types.js';
import {
  calculateAlphaCoefficient,
  calculateCohensKappa,
  calculatePercentageAgreement,
  calculateScottsPi,
  deriveCategories,
  groupByContent,
} from '../utils/agreement-calculator.js';
import { parseObservations } from './import.processor.js';
import type { ImportSource } from './import.processor.js';

export const RELIABILITY_DOCUMENT = 'reliability_results';

export const DEFAULT_METHODS: ReliabilityMethod[] = ['percent_agreement', 'krippendorff_alpha'];

/**
 * Keep one observation per coder for each content item that has at least
 * two coders, restricted to the selected variables.
 */
export function selectUsableObservations(
  observations: readonly Observation[],
  variables: readonly string[]
): { observations: Observation[]; usedContentIds: string[]; skippedContentIds: string[]; warnings: string[] } {
  const usable: Observation[] = [];
  const usedContentIds: string[] = [];
  const skippedContentIds: string[] = [];
  const warnings: string[] = [];

  for (const [contentId, group] of groupByContent(observations)) {
    const byCoder = new Map<string, Observation>();
    for (const observation of group) {
      if (!byCoder.has(observation.coderId)) {
        byCoder.set(observation.coderId, observation);
      }
    }

    if (byCoder.size < 2) {
      const warning = `Content "${contentId}" has only one coder, skipping`;
      console.warn(`⚠️ ${warning}`);
      warnings.push(warning);
      skippedContentIds.push(contentId);
      continue;
    }

    usedContentIds.push(contentId);
    for (const observation of byCoder.values()) {
      const values: Observation['values'] = {};
      for (const variable of variables) {
        if (Object.prototype.hasOwnProperty.call(observation.values, variable)) {
          values[variable] = observation.values[variable];
        }
      }
      if (Object.keys(values).length > 0) {
        usable.push({ ...observation, values });
      }
    }
  }

  return { observations: usable, usedContentIds, skippedContentIds, warnings };
}

/**
 * Run the selected reliability methods over a snapshot of observations
 */
export function computeReliability(
  observations: readonly Observation[],
  variables: readonly string[],
  methods: readonly ReliabilityMethod[] = DEFAULT_METHODS
): Outcome<CalculationReport, ReliabilityFailure> {
  const selection = selectUsableObservations(observations, variables);
  const usable = selection.observations;

  if (usable.length < 2) {
    return fail<ReliabilityFailure>({ kind: 'insufficient_observations', message: 'Not enough observations to calculate reliability' });
  }

  const warnings = [...selection.warnings];
  const results: ReliabilityResult = {};

  for (const method of methods) {
    switch (method) {
      case 'percent_agreement':
      case 'holsti':
        results[method] = calculatePercentageAgreement(usable);
        break;
      case 'scotts_pi':
        results[method] = calculateScottsPi(usable);
        break;
      case 'cohens_kappa': {
        const kappa = calculateCohensKappa(usable);
        if (kappa === null) {
          const warning = "Cohen's kappa needs exactly two coders, skipped";
          console.warn(`⚠️ ${warning}`);
          warnings.push(warning);
        } else {
          results[method] = kappa;
        }
        break;
      }
      case 'krippendorff_alpha':
        results[method] = calculateAlphaCoefficient(usable, deriveCategories(usable, variables));
        break;
    }
  }

  return succeed({
    results,
    usedContentIds: selection.usedContentIds,
    skippedContentIds: selection.skippedContentIds,
    observationCount: usable.length,
    warnings,
  });
}

/**
 * Import, store and score multi-coder datasets of a project
 */
export class ReliabilityProcessor {
  constructor(private store: ProjectStore) {}

  async importDataset(
    project: string,
    source: ImportSource,
    format: ImportFormat
  ): Promise<Outcome<ReliabilityDataset, ReliabilityFailure>> {
    const parsed = await parseObservations(source, format);
    if (!parsed.ok) {
      console.error(`❌ Import failed: ${parsed.error.message}`);
      return parsed;
    }

    parsed.value.warnings.forEach(warning => console.warn(`⚠️ ${warning}`));
    const dataset: ReliabilityDataset = {
      observations: parsed.value.observations,
      variables: parsed.value.variables,
    };

    if (!(await this.store.save(project, RELIABILITY_DOCUMENT, toDocument(dataset)))) {
      return fail<ReliabilityFailure>({ kind: 'storage_error', message: 'Could not save the imported dataset' });
    }

    console.log(`✅ Imported ${dataset.observations.length} observations with ${dataset.variables.length} variables`);
    return succeed(dataset);
  }

  async loadDataset(project: string): Promise<ReliabilityDataset | null> {
    const document = await this.store.load(project, RELIABILITY_DOCUMENT);
    if (document === null) {
      return null;
    }

    const parsed = ReliabilityDatasetSchema.safeParse(document);
    if (!parsed.success) {
      console.warn(`⚠️ Stored reliability dataset for ${project} is malformed`);
      return null;
    }
    return parsed.data;
  }

  async calculate(
    project: string,
    request: CalculationRequest = {}
  ): Promise<Outcome<CalculationReport, ReliabilityFailure>> {
    const dataset = await this.loadDataset(project);
    if (!dataset) {
      return fail<ReliabilityFailure>({ kind: 'dataset_missing', message: 'Import coding data before calculating reliability' });
    }

    const variables = request.variables
      ? request.variables.filter(variable => dataset.variables.includes(variable))
      : dataset.variables;
    if (variables.length === 0) {
      return fail<ReliabilityFailure>({ kind: 'invalid_request', message: 'Select at least one variable' });
    }

    const methods = request.methods ?? DEFAULT_METHODS;
    if (methods.length === 0) {
      return fail<ReliabilityFailure>({ kind: 'invalid_request', message: 'Select at least one calculation method' });
    }

    console.log(`📊 Calculating ${methods.join(', ')} over ${variables.length} variables`);
    const report = computeReliability(dataset.observations, variables, methods);
    if (!report.ok) {
      console.error(`❌ ${report.error.message}`);
      return report;
    }

    const updated: ReliabilityDataset = {
      ...dataset,
      results: report.value.results,
      calculatedAt: new Date().toISOString(),
    };
    if (!(await this.store.save(project, RELIABILITY_DOCUMENT, toDocument(updated)))) {
      return fail<ReliabilityFailure>({ kind: 'storage_error', message: 'Could not save the reliability results' });
    }

    return report;
  }
}

function toDocument(dataset: ReliabilityDataset): JsonValue {
  const document: { [key: string]: JsonValue } = {
    observations: dataset.observations.map(observation => ({
      contentId: observation.contentId,
      coderId: observation.coderId,
      values: observation.values,
    })),
    variables: dataset.variables,
  };
  if (dataset.results) {
    const results: { [key: string]: JsonValue } = {};
    for (const [method, value] of Object.entries(dataset.results)) {
      if (value !== undefined) results[method] = value;
    }
    document.results = results;
  }
  if (dataset.calculatedAt) {
    document.calculatedAt = dataset.calculatedAt;
  }
  return document;
}
