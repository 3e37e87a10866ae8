import { createLogger } from '../../utils/logger.js';
import { OperatorInputError, describeError } from '../../utils/errors.js';
import { testConnection, type SessionDeps } from './modes.js';

type Command = 'capture' | 'test' | 'quit';

const COMMANDS: readonly Command[] = ['capture', 'test', 'quit'];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

/** Command loop: `capture`, `test`, `quit`. Ends on quit or when input closes. */
export class InteractiveSession {
  private readonly logger = createLogger({ service: 'InteractiveSession' });

  constructor(private readonly deps: SessionDeps) {}

  async run(): Promise<void> {
    const { operator } = this.deps;
    if (!this.deps.cameraConfigured) {
      operator.say('Error: camera URL not configured. Set CAMERA_URL.');
      return;
    }

    operator.say('Starting interactive book processing mode...');
    operator.say('Commands:');
    operator.say("  'capture' - Capture and process a book");
    operator.say("  'test' - Test camera connection");
    operator.say("  'quit' - Exit the program");
    operator.say('-'.repeat(50));

    for (;;) {
      try {
        const input = (await operator.ask('\nEnter command (capture/test/quit): ')).trim().toLowerCase();
        if (!isCommand(input)) {
          operator.say("Invalid command. Please enter 'capture', 'test', or 'quit'.");
          continue;
        }
        if (input === 'quit') {
          operator.say('Exiting...');
          return;
        }
        await this.execute(input);
      } catch (error) {
        if (error instanceof OperatorInputError) {
          this.logger.info('Operator input closed; leaving interactive mode');
          operator.say('Input closed. Exiting...');
          return;
        }
        this.logger.error({ error }, 'Command failed');
        operator.say(`Error: ${describeError(error)}`);
      }
    }
  }

  private async execute(command: Exclude<Command, 'quit'>): Promise<void> {
    const { operator, workflow } = this.deps;
    switch (command) {
      case 'capture': {
        operator.say('Position a book title page in front of the camera...');
        await operator.ask('Press Enter when ready to capture...');
        const outcome = await workflow.run();
        if (outcome.status === 'aborted') {
          this.logger.warn({ stage: outcome.stage, reason: outcome.reason }, 'Workflow aborted');
        }
        return;
      }
      case 'test':
        await testConnection(this.deps);
        return;
    }
  }
}
