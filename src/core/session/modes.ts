import type { ImageSourcePort } from '../../ports/ImageSourcePort.js';
import type { CataloguePort } from '../../ports/CataloguePort.js';
import type { OperatorPort } from '../../ports/OperatorPort.js';
import type { BookWorkflow } from '../workflow/BookWorkflow.js';
import { createLogger } from '../../utils/logger.js';
import { describeError } from '../../utils/errors.js';

const logger = createLogger({ component: 'session' });

export type SessionMode = 'interactive' | 'single' | 'test' | 'repair';

const MODE_ALIASES = new Map<string, SessionMode>([
  ['1', 'interactive'],
  ['interactive', 'interactive'],
  ['2', 'single'],
  ['single', 'single'],
  ['3', 'test'],
  ['test', 'test'],
  ['4', 'repair'],
  ['repair', 'repair'],
]);

export function parseMode(input: string): SessionMode | undefined {
  return MODE_ALIASES.get(input.trim().toLowerCase());
}

export interface SessionDeps {
  workflow: Pick<BookWorkflow, 'run'>;
  imageSource: ImageSourcePort;
  catalogue: CataloguePort;
  operator: OperatorPort;
  cameraConfigured: boolean;
}

export async function chooseMode(operator: OperatorPort): Promise<SessionMode | undefined> {
  operator.say('Choose operation mode:');
  operator.say('1. Interactive mode');
  operator.say('2. Single capture mode');
  operator.say('3. Test camera connection');
  operator.say('4. Repair ReadingStatus column');
  operator.say('');
  const choice = await operator.ask('Enter your choice (1-4): ');
  return parseMode(choice);
}

/** Capture one image and delete it again; true when the camera answered. */
export async function testConnection(deps: Pick<SessionDeps, 'imageSource' | 'operator'>): Promise<boolean> {
  const { imageSource, operator } = deps;
  operator.say('Testing camera connection...');
  let imagePath: string;
  try {
    imagePath = await imageSource.capture();
  } catch (error) {
    logger.warn({ error }, 'Camera connection test failed');
    operator.say(`Connection failed: ${describeError(error)}`);
    operator.say('Check that the camera app is running, the URL is correct and both devices share a network.');
    return false;
  }

  operator.say(`Connection successful! Image saved to: ${imagePath}`);
  try {
    await imageSource.discard(imagePath);
  } catch (error) {
    logger.error({ error, imagePath }, 'Failed to delete test image');
    operator.say(`Error deleting image ${imagePath}: ${describeError(error)}`);
  }
  return true;
}

export async function runSingleCapture(deps: SessionDeps): Promise<boolean> {
  const { workflow, operator } = deps;
  if (!deps.cameraConfigured) {
    operator.say('Error: camera URL not configured. Set CAMERA_URL.');
    return false;
  }
  operator.say('Position a book title page in front of the camera.');
  await operator.ask('Press Enter when ready to capture...');
  const outcome = await workflow.run();
  if (outcome.status === 'completed') {
    operator.say('Book processing completed successfully!');
    return true;
  }
  operator.say(`Book processing failed at ${outcome.stage}: ${outcome.reason}`);
  return false;
}

export async function repairReadingStatus(deps: Pick<SessionDeps, 'catalogue' | 'operator'>): Promise<boolean> {
  const { catalogue, operator } = deps;
  operator.say('Cleaning ReadingStatus column...');
  const outcome = await catalogue.repairStatusColumn();
  if (outcome.status === 'failed') {
    operator.say(outcome.error.message);
    return false;
  }
  operator.say(
    outcome.cleaned === 0
      ? 'No ReadingStatus values needed cleaning.'
      : `Cleaned ${outcome.cleaned} ReadingStatus value(s).`
  );
  return true;
}
