import Anthropic from '@anthropic-ai/sdk';
import type { LLMPort, LLMRequest, LLMResponse, VisionRequest } from '../../ports/LLMPort.js';
import type { Config } from '../../config/index.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

const DEFAULT_MODEL = 'claude-sonnet-4-5';

function buildSystemParam(systemPrompt: string | undefined): string | undefined {
  return systemPrompt?.trim() ? systemPrompt : undefined;
}

export class ClaudeAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'ClaudeAdapter' });
  private readonly client: Anthropic;
  private readonly textModel: string;
  private readonly visionModel: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(config: Config) {
    // A failed completion aborts the stage; the operator re-runs it.
    this.client = new Anthropic({ apiKey: config.anthropicApiKey, maxRetries: 0 });
    this.textModel = config.llmTextModel ?? DEFAULT_MODEL;
    this.visionModel = config.llmVisionModel ?? DEFAULT_MODEL;
    this.temperature = config.llmTemperature;
    this.maxTokens = config.llmMaxTokens;
    this.logger.info({ textModel: this.textModel, visionModel: this.visionModel }, 'Claude adapter initialized');
  }

  async generateText(request: LLMRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateText' });
    try {
      const response = await this.client.messages.create({
        model: this.textModel,
        max_tokens: request.maxTokens ?? this.maxTokens,
        temperature: request.temperature ?? this.temperature,
        system: buildSystemParam(request.systemPrompt),
        messages: [
          {
            role: 'user',
            content: request.prompt,
          },
        ],
      });

      return buildLlmResponse(response);
    } catch (error) {
      logger.error({ error }, 'Claude text generation failed');
      throw new LLMError(`Claude text generation failed: ${messageOf(error)}`, { cause: error });
    }
  }

  async generateVision(request: VisionRequest): Promise<LLMResponse> {
    const logger = this.logger.child({ method: 'generateVision' });
    try {
      const response = await this.client.messages.create({
        model: this.visionModel,
        max_tokens: request.maxTokens ?? this.maxTokens,
        temperature: request.temperature ?? this.temperature,
        system: buildSystemParam(request.systemPrompt),
        messages: [
          {
            role: 'user',
            content: [
              {
                type: 'text',
                text: request.prompt,
              },
              {
                type: 'image',
                source: {
                  type: 'base64',
                  media_type: request.mediaType,
                  data: request.imageData,
                },
              },
            ],
          },
        ],
      });

      return buildLlmResponse(response);
    } catch (error) {
      logger.error({ error }, 'Claude vision generation failed');
      throw new LLMError(`Claude vision generation failed: ${messageOf(error)}`, { cause: error });
    }
  }
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function buildLlmResponse(response: unknown): LLMResponse {
  const text = extractText(response);
  const usage = extractUsage(response);
  return {
    text,
    usage,
  };
}

function extractText(response: unknown): string {
  if (!isRecord(response)) {
    return '';
  }
  const content = response.content;
  if (!Array.isArray(content)) {
    return '';
  }
  for (const block of content) {
    if (isRecord(block) && block.type === 'text' && typeof block.text === 'string') {
      return block.text;
    }
  }
  return '';
}

function extractUsage(response: unknown): { inputTokens: number; outputTokens: number } | undefined {
  if (!isRecord(response)) {
    return undefined;
  }
  const usage = response.usage;
  if (!isRecord(usage)) {
    return undefined;
  }
  const inputTokens = typeof usage.input_tokens === 'number' ? usage.input_tokens : undefined;
  const outputTokens = typeof usage.output_tokens === 'number' ? usage.output_tokens : undefined;
  if (inputTokens === undefined || outputTokens === undefined) {
    return undefined;
  }
  return { inputTokens, outputTokens };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}
