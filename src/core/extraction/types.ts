import type { BookFields } from './bookFields.js';

/** Completion-backed oracles; both resolve to the model's raw reply text. */
export interface BookOracle {
  extract(imagePath: string): Promise<string>;
  classify(book: BookFields, knownSubjects: string[], knownSpecificSubjects: string[]): Promise<string>;
}

export interface BookPrompts {
  extractionSystem: string;
  extractionUser: string;
  classificationSystem: string;
  classificationUser: string;
}
