import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import type { ImageMediaType, LLMPort } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { fillPrompt, loadPrompt } from '../../utils/prompts.js';
import type { BookFields } from './bookFields.js';
import type { BookOracle, BookPrompts } from './types.js';

const MEDIA_TYPES: Record<string, ImageMediaType> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
};

export function mediaTypeFor(imagePath: string): ImageMediaType {
  return MEDIA_TYPES[extname(imagePath).toLowerCase()] ?? 'image/jpeg';
}

export interface SamplingOptions {
  temperature: number;
  maxTokens: number;
}

export async function loadBookPrompts(): Promise<BookPrompts> {
  const [extractionSystem, extractionUser, classificationSystem, classificationUser] = await Promise.all([
    loadPrompt('extraction_system.md'),
    loadPrompt('extraction_user.md'),
    loadPrompt('classification_system.md'),
    loadPrompt('classification_user.md'),
  ]);
  return { extractionSystem, extractionUser, classificationSystem, classificationUser };
}

export class BookExtractor implements BookOracle {
  private readonly logger = createLogger({ service: 'BookExtractor' });

  constructor(
    private readonly llmPort: LLMPort,
    private readonly prompts: BookPrompts,
    private readonly sampling: SamplingOptions
  ) {}

  async extract(imagePath: string): Promise<string> {
    const logger = this.logger.child({ method: 'extract', imagePath });
    const image = await readFile(imagePath);
    logger.info({ bytes: image.length }, 'Extracting book information from title page');

    const response = await this.llmPort.generateVision({
      imageData: image.toString('base64'),
      mediaType: mediaTypeFor(imagePath),
      prompt: this.prompts.extractionUser.trim(),
      systemPrompt: this.prompts.extractionSystem,
      temperature: this.sampling.temperature,
      maxTokens: this.sampling.maxTokens,
    });

    logger.debug({ length: response.text.length, tail: response.text.slice(-20) }, 'Extraction reply');
    return response.text;
  }

  async classify(book: BookFields, knownSubjects: string[], knownSpecificSubjects: string[]): Promise<string> {
    const logger = this.logger.child({ method: 'classify' });
    logger.info(
      { subjects: knownSubjects.length, specificSubjects: knownSpecificSubjects.length },
      'Inferring subjects'
    );

    const prompt = fillPrompt(this.prompts.classificationUser, {
      SUBJECTS: JSON.stringify(knownSubjects),
      SPECIFIC_SUBJECTS: JSON.stringify(knownSpecificSubjects),
      BOOK: JSON.stringify(book),
    });
    const response = await this.llmPort.generateText({
      prompt,
      systemPrompt: this.prompts.classificationSystem,
      temperature: this.sampling.temperature,
      maxTokens: this.sampling.maxTokens,
    });

    logger.debug({ length: response.text.length }, 'Classification reply');
    return response.text;
  }
}
