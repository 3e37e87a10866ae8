import type { Logger } from 'pino';
import type { ImageSourcePort } from '../../ports/ImageSourcePort.js';
import type { CataloguePort, InsertOutcome } from '../../ports/CataloguePort.js';
import type { OperatorPort } from '../../ports/OperatorPort.js';
import type { BookOracle } from '../extraction/types.js';
import {
  omitWorkflowFields,
  parseBookFields,
  parseSubjectFields,
  type BookFields,
  type SubjectFields,
} from '../extraction/bookFields.js';
import { createLogger, generateCorrelationId } from '../../utils/logger.js';
import { PersistenceError, describeError } from '../../utils/errors.js';
import { promptReadingStatus } from './readingStatus.js';
import type {
  AbortStage,
  BookRecord,
  StateChangeListener,
  WorkflowOutcome,
  WorkflowState,
} from './types.js';

const RULE = '='.repeat(60);

export interface BookWorkflowDeps {
  imageSource: ImageSourcePort;
  oracle: BookOracle;
  catalogue: CataloguePort;
  operator: OperatorPort;
  /** Shelf location stamped on every record; null when not configured. */
  location?: string | null;
  onStateChange?: StateChangeListener;
}

/**
 * One book per run: capture → extract → classify → reading status → persist,
 * always deleting the captured image once it exists.
 */
export class BookWorkflow {
  private readonly logger = createLogger({ service: 'BookWorkflow' });
  private currentState: WorkflowState = 'Idle';

  constructor(private readonly deps: BookWorkflowDeps) {}

  /** `Idle` after a completed run, `Aborted` after a failed one. */
  get state(): WorkflowState {
    return this.currentState;
  }

  async run(): Promise<WorkflowOutcome> {
    const { imageSource, oracle, operator } = this.deps;
    const logger = this.logger.child({ runId: generateCorrelationId() });
    this.currentState = 'Idle';

    operator.say('');
    operator.say(RULE);
    operator.say('STARTING BOOK PROCESSING WORKFLOW');
    operator.say(RULE);

    this.transition('Capturing');
    operator.say('');
    operator.say('Step 1: Capturing image...');
    let imagePath: string;
    try {
      imagePath = await imageSource.capture();
    } catch (error) {
      logger.error({ error }, 'Capture failed');
      operator.say(`Failed to capture image: ${describeError(error)}. Workflow aborted.`);
      return this.abort('capture', error);
    }
    operator.say(`Image captured: ${imagePath}`);

    this.transition('Extracting');
    operator.say('');
    operator.say('Step 2: Extracting book information...');
    let book: BookFields;
    try {
      book = parseBookFields(await oracle.extract(imagePath));
    } catch (error) {
      logger.error({ error }, 'Extraction failed');
      operator.say(`Failed to extract book information: ${describeError(error)}. Workflow aborted.`);
      this.transition('CleaningUp');
      await this.cleanUp(imagePath, logger);
      return this.abort('extraction', error);
    }
    const owned = omitWorkflowFields(book);
    if (owned.removed.length > 0) {
      logger.warn({ removed: owned.removed }, 'Ignoring workflow-owned fields in extraction reply');
      book = owned.book;
    }
    operator.say(JSON.stringify(book, null, 2));

    this.transition('Classifying');
    operator.say('');
    operator.say('Step 3: Inferring subjects...');
    const subjects = await this.classify(book, logger);

    const location = this.deps.location ?? null;
    operator.say(location ? `Location: ${location}` : 'No location provided');

    this.transition('AwaitingStatus');
    const readingStatus = await promptReadingStatus(operator);
    const complete: BookRecord = {
      ...book,
      ...(subjects ?? {}),
      Location: location,
      ReadingStatus: readingStatus,
    };

    operator.say('');
    operator.say('Final book information:');
    operator.say('-'.repeat(40));
    for (const [key, value] of Object.entries(complete)) {
      operator.say(`${key}: ${value === null || value === undefined ? 'null' : String(value)}`);
    }
    operator.say('-'.repeat(40));

    this.transition('Persisting');
    operator.say('');
    operator.say('Step 4: Adding to database...');
    const persisted = await this.persist(complete);

    this.transition('CleaningUp');
    await this.cleanUp(imagePath, logger);

    if (persisted.status === 'failed') {
      logger.error({ error: persisted.error }, 'Persist failed');
      operator.say(`Failed to add to database: ${persisted.error.message}`);
      return this.abort('persist', persisted.error);
    }

    this.transition('Idle');
    logger.info({ id: persisted.id, title: complete.Title }, 'Workflow completed');
    operator.say(`Added '${complete.Title ?? 'Unknown'}' with ID ${persisted.id}.`);
    operator.say(RULE);
    operator.say('WORKFLOW COMPLETED. Ready for next book.');
    operator.say(RULE);
    return { status: 'completed', id: persisted.id, record: complete, row: persisted.row };
  }

  /** Failure here never aborts the run; the record simply has no subjects. */
  private async classify(book: BookFields, logger: Logger): Promise<SubjectFields | null> {
    const { oracle, catalogue, operator } = this.deps;
    const knownSubjects = catalogue.distinctValues('Subject');
    const knownSpecific = catalogue.distinctValues('SubjectSpecific');

    try {
      const subjects = parseSubjectFields(await oracle.classify(book, knownSubjects, knownSpecific));
      if (subjects.Subject !== null && !knownSubjects.includes(subjects.Subject)) {
        logger.warn({ subject: subjects.Subject }, 'Oracle returned a subject not in the catalogue');
      }
      if (subjects.SubjectSpecific !== null && !knownSpecific.includes(subjects.SubjectSpecific)) {
        logger.warn({ subjectSpecific: subjects.SubjectSpecific }, 'Oracle returned a specific subject not in the catalogue');
      }
      operator.say(`Subject: ${subjects.Subject ?? 'null'} / ${subjects.SubjectSpecific ?? 'null'}`);
      return subjects;
    } catch (error) {
      logger.warn({ error }, 'Classification failed; continuing without subjects');
      operator.say(`Could not infer subjects: ${describeError(error)}`);
      return null;
    }
  }

  private async persist(record: BookRecord): Promise<InsertOutcome> {
    try {
      return await this.deps.catalogue.insert(record);
    } catch (error) {
      return {
        status: 'failed',
        error: new PersistenceError(`Failed to add book to database: ${describeError(error)}`, { cause: error }),
      };
    }
  }

  private async cleanUp(imagePath: string, logger: Logger): Promise<void> {
    const { imageSource, operator } = this.deps;
    try {
      const result = await imageSource.discard(imagePath);
      if (result === 'missing') {
        logger.warn({ imagePath }, 'Captured image already gone');
        operator.say(`Image not found: ${imagePath}`);
      } else {
        operator.say(`Deleted image: ${imagePath}`);
      }
    } catch (error) {
      logger.error({ error, imagePath }, 'Failed to delete captured image');
      operator.say(`Error deleting image ${imagePath}: ${describeError(error)}`);
    }
  }

  private abort(stage: AbortStage, error: unknown): WorkflowOutcome {
    this.transition('Aborted');
    return { status: 'aborted', stage, reason: describeError(error) };
  }

  private transition(to: WorkflowState): void {
    const from = this.currentState;
    this.currentState = to;
    this.deps.onStateChange?.(from, to);
  }
}
