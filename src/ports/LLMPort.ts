export interface LLMRequest {
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMResponse {
  text: string;
  usage?: {
    inputTokens: number;
    outputTokens: number;
  };
}

export type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

export interface VisionRequest {
  /** Base64-encoded image bytes, sent inline with the request. */
  imageData: string;
  mediaType: ImageMediaType;
  prompt: string;
  systemPrompt?: string;
  maxTokens?: number;
  temperature?: number;
}

export interface LLMPort {
  generateText(request: LLMRequest): Promise<LLMResponse>;
  generateVision(request: VisionRequest): Promise<LLMResponse>;
}
