export { CodingService } from './services/coding.service.js';
export type { CodingServiceDependencies } from './services/coding.service.js';
export { BaseModelProvider, firstChoiceText } from './services/model-providers/base-provider.js';
export type {
  ChatChoice,
  ChatCompletionRequest,
  ChatCompletionResult,
  ChatMessage,
  ContentPart,
} from './services/model-providers/base-provider.js';
export { OpenAIProvider } from './services/model-providers/openai-provider.js';
export { createModelProvider } from './services/model-providers/provider-factory.js';

export { RetryPolicy } from './utils/retry.js';
export { ResponseExtractor, DEFAULT_STRATEGIES } from './utils/response-extractor.js';
export type { ExtractionResult, ExtractionStrategy } from './utils/response-extractor.js';
export { SchemaValidator, similarityScore, bestOptionMatch } from './utils/validator.js';
export { buildVariablesText, renderPrompt, formatTimestamp } from './utils/prompt-builder.js';
export {
  calculatePercentageAgreement,
  calculateAlphaCoefficient,
  calculateScottsPi,
  calculateCohensKappa,
  deriveCategories,
  interpretAlpha,
} from './utils/agreement-calculator.js';

export { CodingProcessor, saveCodingResult, loadProjectVariables } from './processors/coding.processor.js';
export { ReliabilityProcessor, computeReliability } from './processors/reliability.processor.js';
export {
  parseObservations,
  parseObservationsCsv,
  parseObservationsJson,
  parseObservationsXlsx,
} from './processors/import.processor.js';
export type { ImportSource, ImportedObservations } from './processors/import.processor.js';

export { DatabaseProjectStore } from './db/project-store.js';
export type { ProjectStore } from './db/project-store.js';
export { createDatabase, getDatabase, closeDatabase, SQLiteDatabase, PostgreSQLDatabase } from './db/database.js';
export { applyMigrations } from './db/migrations.js';

export { loadCodingConfig } from './config/coding.config.js';
export type { CodingConfig } from './config/coding.config.js';
export { parseProjectVariables } from './types/schemas.js';
export type * from './types/coding.types.js';
export type * from './types/reliability.types.js';
