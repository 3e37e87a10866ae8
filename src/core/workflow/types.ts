import type { SqlValue } from '../../persistence/drivers/SqlDriver.js';

export const READING_STATUSES = ['Complete', 'Partially Complete', 'Not Started'] as const;
export type ReadingStatus = (typeof READING_STATUSES)[number];

export type WorkflowState =
  | 'Idle'
  | 'Capturing'
  | 'Extracting'
  | 'Classifying'
  | 'AwaitingStatus'
  | 'Persisting'
  | 'CleaningUp'
  | 'Aborted';

export type AbortStage = 'capture' | 'extraction' | 'persist';

/** Canonical book fields plus whatever extra keys the extraction oracle returned. */
export interface BookRecord {
  Title: string | null;
  Author: string | null;
  Publisher: string | null;
  Description: string | null;
  Subject?: string | null;
  SubjectSpecific?: string | null;
  Location: string | null;
  ReadingStatus: ReadingStatus;
  [field: string]: unknown;
}

export type WorkflowOutcome =
  | { status: 'completed'; id: number; record: BookRecord; row: Record<string, SqlValue> }
  | { status: 'aborted'; stage: AbortStage; reason: string };

export type StateChangeListener = (from: WorkflowState, to: WorkflowState) => void;
