import type { ProjectStore } from '../db/project-store.js';
import type { CodingService } from '../services/coding.service.js';
import { fail, isJsonObject, succeed } from '../types/coding.types.js';
import type {
  CodingFailure,
  CodingOptions,
  CodingResult,
  JsonObject,
  Outcome,
  Variable,
  VideoCodingOptions,
  VideoFrame,
} from '../types/coding.types.js';
import { parseProjectVariables } from '../types/schemas.js';

export const CONFIG_DOCUMENT = 'config';
export const CODING_RESULTS_DOCUMENT = 'coding_results';

export type ProcessorFailureKind = 'no_variables' | 'storage_error';

export interface ProcessorFailure {
  kind: ProcessorFailureKind;
  message: string;
}

/**
 * Merge one content item's coded values into the project's coding results
 */
export async function saveCodingResult(
  store: ProjectStore,
  project: string,
  contentId: string,
  result: CodingResult
): Promise<boolean> {
  const stored = await store.load(project, CODING_RESULTS_DOCUMENT);
  const all: JsonObject = isJsonObject(stored) ? stored : {};
  const existing = all[contentId];

  all[contentId] = { ...(isJsonObject(existing) ? existing : {}), ...result };
  return store.save(project, CODING_RESULTS_DOCUMENT, all);
}

export async function loadProjectVariables(store: ProjectStore, project: string): Promise<Variable[]> {
  const config = await store.load(project, CONFIG_DOCUMENT);
  const { variables, errors } = parseProjectVariables(config);
  errors.forEach(error => console.warn(`⚠️ ${error}`));
  return variables;
}

/**
 * Codes project content with the project's variables and stores the results
 */
export class CodingProcessor {
  constructor(private store: ProjectStore, private codingService: CodingService) {}

  async processText(
    project: string,
    contentId: string,
    content: string,
    options: CodingOptions = {}
  ): Promise<Outcome<CodingResult, ProcessorFailure | CodingFailure>> {
    console.log(`🎯 Coding ${contentId} in project ${project}`);
    const variables = await loadProjectVariables(this.store, project);
    if (variables.length === 0) {
      return fail<ProcessorFailure>({ kind: 'no_variables', message: 'Add variables to the project before coding' });
    }

    return this.persist(project, contentId, await this.codingService.codeText(content, variables, options));
  }

  async processVideo(
    project: string,
    contentId: string,
    frames: readonly VideoFrame[],
    options: VideoCodingOptions = {}
  ): Promise<Outcome<CodingResult, ProcessorFailure | CodingFailure>> {
    console.log(`🎯 Coding video ${contentId} in project ${project}`);
    const variables = await loadProjectVariables(this.store, project);
    if (variables.length === 0) {
      return fail<ProcessorFailure>({ kind: 'no_variables', message: 'Add variables to the project before coding' });
    }

    return this.persist(project, contentId, await this.codingService.codeVideo(frames, variables, options));
  }

  private async persist<E>(
    project: string,
    contentId: string,
    outcome: Outcome<CodingResult, E>
  ): Promise<Outcome<CodingResult, E | ProcessorFailure>> {
    if (!outcome.ok) {
      return outcome;
    }
    if (!(await saveCodingResult(this.store, project, contentId, outcome.value))) {
      return fail<ProcessorFailure>({ kind: 'storage_error', message: 'Coding succeeded but the result could not be saved' });
    }
    return succeed(outcome.value);
  }
}
