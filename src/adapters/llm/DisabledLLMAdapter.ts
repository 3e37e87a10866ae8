import type { LLMPort, LLMRequest, LLMResponse, VisionRequest } from '../../ports/LLMPort.js';
import { createLogger } from '../../utils/logger.js';
import { LLMError } from '../../utils/errors.js';

const NOT_CONFIGURED = 'Language model is not configured; set ANTHROPIC_API_KEY';

export class DisabledLLMAdapter implements LLMPort {
  private readonly logger = createLogger({ adapter: 'DisabledLLMAdapter' });

  async generateText(_request: LLMRequest): Promise<LLMResponse> {
    this.logger.warn('LLM adapter is disabled; refusing text generation');
    throw new LLMError(NOT_CONFIGURED);
  }

  async generateVision(_request: VisionRequest): Promise<LLMResponse> {
    this.logger.warn('LLM adapter is disabled; refusing vision generation');
    throw new LLMError(NOT_CONFIGURED);
  }
}
