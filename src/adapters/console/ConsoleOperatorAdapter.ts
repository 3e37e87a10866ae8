import { createInterface, type Interface } from 'node:readline';
import type { OperatorPort } from '../../ports/OperatorPort.js';
import { OperatorInputError } from '../../utils/errors.js';

interface PendingAnswer {
  resolve: (line: string) => void;
  reject: (error: OperatorInputError) => void;
}

/**
 * Line-based operator console. Lines that arrive before a question is asked
 * are queued, so piped input is answered in order.
 */
export class ConsoleOperatorAdapter implements OperatorPort {
  private readonly rl: Interface;
  private readonly buffered: string[] = [];
  private waiting: PendingAnswer | null = null;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.rl.on('line', (line) => {
      const waiting = this.waiting;
      if (waiting) {
        this.waiting = null;
        waiting.resolve(line);
      } else {
        this.buffered.push(line);
      }
    });
    this.rl.on('close', () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = null;
      waiting?.reject(new OperatorInputError('Input stream closed while waiting for an answer'));
    });
  }

  ask(question: string): Promise<string> {
    this.output.write(question);
    const next = this.buffered.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.closed) {
      return Promise.reject(new OperatorInputError('Input stream is closed'));
    }
    return new Promise((resolve, reject) => {
      this.waiting = { resolve, reject };
    });
  }

  say(line: string): void {
    this.output.write(`${line}\n`);
  }

  /**
   * On the first SIGINT, close input so pending and later questions reject with
   * OperatorInputError and the caller unwinds normally. A second SIGINT gets
   * the default handler.
   */
  closeOnInterrupt(signals: Pick<NodeJS.EventEmitter, 'once'> = process): void {
    signals.once('SIGINT', () => {
      this.say('');
      this.say('Interrupted by user');
      this.close();
    });
  }

  close(): void {
    if (!this.closed) {
      this.rl.close();
    }
  }
}
