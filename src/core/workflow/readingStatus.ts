import type { OperatorPort } from '../../ports/OperatorPort.js';
import { describeError } from '../../utils/errors.js';
import { createLogger } from '../../utils/logger.js';
import type { ReadingStatus } from './types.js';

const logger = createLogger({ component: 'readingStatus' });

export const READING_STATUS_KEYS: ReadonlyMap<string, ReadingStatus> = new Map<string, ReadingStatus>([
  ['c', 'Complete'],
  ['p', 'Partially Complete'],
  ['n', 'Not Started'],
]);

export const FALLBACK_READING_STATUS: ReadingStatus = 'Not Started';

/**
 * Ask for C/P/N until one is given. If the input stream fails the status
 * falls back to "Not Started".
 */
export async function promptReadingStatus(operator: OperatorPort): Promise<ReadingStatus> {
  operator.say('');
  operator.say('Select reading status:');
  operator.say('  C - Complete');
  operator.say('  P - Partially Complete');
  operator.say('  N - Not Started');

  for (;;) {
    let key: string;
    try {
      key = (await operator.ask('Enter C, P, or N: ')).trim().toLowerCase();
    } catch (error) {
      logger.warn({ error }, 'Reading status input failed; using fallback');
      operator.say(`Error reading input: ${describeError(error)}`);
      return FALLBACK_READING_STATUS;
    }

    const status = READING_STATUS_KEYS.get(key);
    if (status) {
      operator.say(`Selected: ${status}`);
      return status;
    }
    operator.say(`Invalid input '${key}'. Please enter C, P, or N.`);
  }
}
