export type DiscardResult = 'deleted' | 'missing';

export interface ImageSourcePort {
  /** Fetch one still image and store it locally; resolves to the file path. */
  capture(): Promise<string>;
  discard(imagePath: string): Promise<DiscardResult>;
}
