import {
  CODING_RETRY,
  DEFAULT_BASE_URL,
  DEFAULT_TEXT_MODEL,
  DEFAULT_VISION_MODEL,
  GENERATION_SETTINGS,
  MAX_VIDEO_FRAMES,
  type CodingConfig,
} from '../config/coding.config.js';
import {
  DEFAULT_TEXT_TEMPLATE,
  DEFAULT_VIDEO_TEMPLATE,
  FRAME_DESCRIPTION_PROMPT,
  SYSTEM_PROMPTS,
} from '../config/prompts.js';
import { fail, succeed } from '../types/coding.types.js';
import type {
  CodingFailure,
  CodingOptions,
  CodingRequest,
  CodingResult,
  FrameSampler,
  Outcome,
  ProgressCallback,
  TokenUsage,
  Variable,
  VideoCodingOptions,
  VideoFrame,
} from '../types/coding.types.js';
import { ResponseExtractor } from '../utils/response-extractor.js';
import { SchemaValidator } from '../utils/validator.js';
import { RetryPolicy, describeError } from '../utils/retry.js';
import { buildVariablesText, formatTimestamp, renderPrompt } from '../utils/prompt-builder.js';
import { firstChoiceText, type BaseModelProvider } from './model-providers/base-provider.js';
import { createModelProvider, type ProviderFactory } from './model-providers/provider-factory.js';

export interface CodingServiceDependencies {
  createProvider?: ProviderFactory;
  retryPolicy?: RetryPolicy;
  extractor?: ResponseExtractor;
  validator?: SchemaValidator;
}

interface CodingPass extends CodingRequest {
  template: string;
  systemPrompt: string;
  model: string;
  settings: { temperature: number; maxTokens: number };
  onProgress?: ProgressCallback;
}

const NO_API_KEY: CodingFailure = {
  kind: 'no_api_key',
  message: 'No API key configured. Set an API key and try again.',
};

/**
 * Codes text or sampled video frames against a coding scheme with a
 * remote chat model, then extracts and validates the answer set.
 * Every public method resolves to an Outcome; nothing is thrown.
 */
export class CodingService {
  private config: CodingConfig;
  private createProvider: ProviderFactory;
  private provider: BaseModelProvider | null = null;
  private retryPolicy: RetryPolicy;
  private extractor: ResponseExtractor;
  private validator: SchemaValidator;
  private usage: TokenUsage = { inputTokens: 0, outputTokens: 0 };

  constructor(config: Partial<CodingConfig> = {}, deps: CodingServiceDependencies = {}) {
    this.config = {
      apiKey: config.apiKey,
      baseURL: config.baseURL ?? DEFAULT_BASE_URL,
      textModel: config.textModel ?? DEFAULT_TEXT_MODEL,
      visionModel: config.visionModel ?? DEFAULT_VISION_MODEL,
      requestTimeoutMs: config.requestTimeoutMs ?? 60000,
    };
    this.createProvider = deps.createProvider ?? createModelProvider;
    this.retryPolicy = deps.retryPolicy ?? new RetryPolicy(CODING_RETRY);
    this.extractor = deps.extractor ?? new ResponseExtractor();
    this.validator = deps.validator ?? new SchemaValidator();
  }

  /**
   * Code a piece of text content
   */
  async codeText(
    content: string,
    variables: readonly Variable[],
    options: CodingOptions = {}
  ): Promise<Outcome<CodingResult>> {
    const provider = this.getProvider();
    if (!provider) {
      console.error('❌ No API key configured, cannot code content');
      return fail(NO_API_KEY);
    }

    console.log(`🧠 Coding text content (${content.length} chars, ${variables.length} variables)`);
    options.onProgress?.(0.1, 'Generating coding...');

    const outcome = await this.runCodingPass(provider, {
      content,
      variables,
      template: DEFAULT_TEXT_TEMPLATE,
      customPrompt: options.customPrompt,
      systemPrompt: SYSTEM_PROMPTS.textCoding,
      model: options.textModel ?? this.config.textModel,
      settings: GENERATION_SETTINGS.textCoding,
      onProgress: options.onProgress,
    });

    if (outcome.ok) {
      options.onProgress?.(1, 'Coding complete');
    }
    return outcome;
  }

  /**
   * Describe up to four frames with the vision model, then code the
   * combined chronological description with the text model.
   */
  async codeVideo(
    frames: readonly VideoFrame[],
    variables: readonly Variable[],
    options: VideoCodingOptions = {}
  ): Promise<Outcome<CodingResult>> {
    const provider = this.getProvider();
    if (!provider) {
      console.error('❌ No API key configured, cannot code video');
      return fail(NO_API_KEY);
    }

    const selected = [...frames]
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(0, MAX_VIDEO_FRAMES);
    const visionModel = options.visionModel ?? this.config.visionModel;

    console.log(`🎬 Describing ${selected.length}/${frames.length} frames with ${visionModel}`);
    options.onProgress?.(0.1, 'Analysing video frames...');

    const descriptions: string[] = [];
    for (const [index, frame] of selected.entries()) {
      options.onProgress?.(0.1 + (index / selected.length) * 0.4, `Analysing frame ${index + 1}/${selected.length}...`);

      const description = await this.describeFrame(provider, frame, visionModel);
      if (description) {
        descriptions.push(`Time: ${formatTimestamp(frame.timestamp)}\nDescription: ${description}`);
      }
    }

    if (descriptions.length === 0) {
      console.error('❌ No frame could be described');
      return fail<CodingFailure>({ kind: 'extraction_failed', message: 'None of the video frames could be analysed.' });
    }

    options.onProgress?.(0.6, 'Generating coding...');

    const outcome = await this.runCodingPass(provider, {
      content: descriptions.join('\n\n'),
      variables,
      template: DEFAULT_VIDEO_TEMPLATE,
      customPrompt: options.customPrompt,
      systemPrompt: SYSTEM_PROMPTS.videoCoding,
      model: options.textModel ?? this.config.textModel,
      settings: GENERATION_SETTINGS.videoCoding,
      onProgress: options.onProgress,
    });

    if (outcome.ok) {
      options.onProgress?.(1, 'Coding complete');
    }
    return outcome;
  }

  /**
   * Sample frames from a video file, then code them
   */
  async codeVideoFile(
    videoPath: string,
    sampler: FrameSampler,
    variables: readonly Variable[],
    options: VideoCodingOptions & { frameIntervalSeconds?: number } = {}
  ): Promise<Outcome<CodingResult>> {
    if (!this.config.apiKey) {
      console.error('❌ No API key configured, cannot code video');
      return fail(NO_API_KEY);
    }

    let frames: VideoFrame[];
    try {
      frames = await sampler.sampleFrames(videoPath, options.frameIntervalSeconds ?? 30);
    } catch (error) {
      console.error(`❌ Frame sampling failed for ${videoPath}:`, describeError(error));
      return fail<CodingFailure>({ kind: 'extraction_failed', message: `Could not sample frames: ${describeError(error)}` });
    }

    return this.codeVideo(frames, variables, options);
  }

  getUsage(): TokenUsage {
    return { ...this.usage };
  }

  private getProvider(): BaseModelProvider | null {
    if (!this.config.apiKey) {
      return null;
    }
    if (!this.provider) {
      this.provider = this.createProvider(this.config.apiKey, this.config);
    }
    return this.provider;
  }

  private async runCodingPass(provider: BaseModelProvider, pass: CodingPass): Promise<Outcome<CodingResult>> {
    const template = pass.customPrompt && pass.customPrompt.trim() ? pass.customPrompt : pass.template;
    const prompt = renderPrompt(template, pass.content, buildVariablesText(pass.variables));

    let reply: string | null;
    try {
      const result = await this.retryPolicy.execute(
        () => provider.complete({
          model: pass.model,
          messages: [
            { role: 'system', content: pass.systemPrompt },
            { role: 'user', content: prompt },
          ],
          temperature: pass.settings.temperature,
          maxTokens: pass.settings.maxTokens,
        }),
        `Coding request (${pass.model})`
      );
      this.recordUsage(result.usage);
      reply = firstChoiceText(result);
    } catch (error) {
      return fail<CodingFailure>({ kind: 'transport_error', message: `Model request failed: ${describeError(error)}` });
    }

    pass.onProgress?.(0.9, 'Processing coding result...');

    if (!reply) {
      console.warn('⚠️ Empty response from model');
      return fail<CodingFailure>({ kind: 'extraction_failed', message: 'The model returned an empty reply.' });
    }

    const extraction = this.extractor.extract(reply);
    if (!extraction.found) {
      return fail<CodingFailure>({ kind: 'extraction_failed', message: 'No structured coding result found in the model reply.' });
    }

    const { values, repairs } = this.validator.validate(extraction.values, pass.variables);
    if (repairs.length > 0) {
      console.log(`🔧 Repaired ${repairs.length} categorical value(s)`);
    }
    console.log(`✅ Coded ${Object.keys(values).length}/${pass.variables.length} variables (${extraction.strategy})`);

    return succeed(values);
  }

  private async describeFrame(
    provider: BaseModelProvider,
    frame: VideoFrame,
    model: string
  ): Promise<string | null> {
    const label = formatTimestamp(frame.timestamp);
    const dataUri = `data:${frame.mimeType ?? 'image/jpeg'};base64,${frame.image.toString('base64')}`;

    try {
      const result = await provider.complete({
        model,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'image_url', imageUrl: { url: dataUri } },
              { type: 'text', text: FRAME_DESCRIPTION_PROMPT },
            ],
          },
        ],
        temperature: GENERATION_SETTINGS.frameDescription.temperature,
        maxTokens: GENERATION_SETTINGS.frameDescription.maxTokens,
      });
      this.recordUsage(result.usage);

      const text = firstChoiceText(result);
      if (!text) {
        console.warn(`⚠️ Empty description for frame at ${label}, skipping`);
      }
      return text;
    } catch (error) {
      console.warn(`⚠️ Frame at ${label} could not be analysed, skipping: ${describeError(error)}`);
      return null;
    }
  }

  private recordUsage(usage?: TokenUsage): void {
    if (!usage) return;
    this.usage.inputTokens += usage.inputTokens;
    this.usage.outputTokens += usage.outputTokens;
  }
}
