import { describe, it, expect, vi, beforeEach } from 'vitest';
import {
  chooseMode,
  parseMode,
  repairReadingStatus,
  runSingleCapture,
  testConnection,
  type SessionDeps,
} from '../../core/session/modes.js';
import { InteractiveSession } from '../../core/session/InteractiveSession.js';
import type { OperatorPort } from '../../ports/OperatorPort.js';
import type { WorkflowOutcome } from '../../core/workflow/types.js';
import { CameraError, OperatorInputError, PersistenceError } from '../../utils/errors.js';

function createOperator(answers: string[]): OperatorPort & { lines: string[] } {
  const lines: string[] = [];
  const queue = [...answers];
  return {
    lines,
    ask: vi.fn(async () => {
      const next = queue.shift();
      if (next === undefined) {
        throw new OperatorInputError('Input stream is closed');
      }
      return next;
    }),
    say: vi.fn((line: string) => {
      lines.push(line);
    }),
    close: vi.fn(),
  };
}

const COMPLETED: WorkflowOutcome = {
  status: 'completed',
  id: 3,
  record: {
    Title: 'Dune',
    Author: 'Frank Herbert',
    Publisher: null,
    Description: null,
    Location: null,
    ReadingStatus: 'Complete',
  },
  row: { id: 3, Title: 'Dune' },
};

function createDeps(answers: string[], overrides: Partial<SessionDeps> = {}): SessionDeps & {
  operator: OperatorPort & { lines: string[] };
} {
  return {
    workflow: { run: vi.fn().mockResolvedValue(COMPLETED) },
    imageSource: {
      capture: vi.fn().mockResolvedValue('captured_images/test.jpg'),
      discard: vi.fn().mockResolvedValue('deleted'),
    },
    catalogue: {
      load: vi.fn(),
      distinctValues: vi.fn(() => []),
      insert: vi.fn(),
      repairStatusColumn: vi.fn().mockResolvedValue({ status: 'repaired', cleaned: 0 }),
    },
    cameraConfigured: true,
    ...overrides,
    operator: createOperator(answers),
  };
}

describe('parseMode', () => {
  it('accepts menu numbers and names', () => {
    expect(parseMode('1')).toBe('interactive');
    expect(parseMode(' 2 ')).toBe('single');
    expect(parseMode('Test')).toBe('test');
    expect(parseMode('repair')).toBe('repair');
  });

  it('rejects anything else', () => {
    expect(parseMode('5')).toBeUndefined();
    expect(parseMode('')).toBeUndefined();
  });
});

describe('chooseMode', () => {
  it('asks once and parses the answer', async () => {
    const operator = createOperator(['3']);
    expect(await chooseMode(operator)).toBe('test');
    expect(operator.ask).toHaveBeenCalledWith('Enter your choice (1-4): ');
  });
});

describe('testConnection', () => {
  it('captures and deletes a test image', async () => {
    const deps = createDeps([]);
    expect(await testConnection(deps)).toBe(true);
    expect(deps.imageSource.discard).toHaveBeenCalledWith('captured_images/test.jpg');
    expect(deps.operator.lines).toContain('Connection successful! Image saved to: captured_images/test.jpg');
  });

  it('reports a camera failure', async () => {
    const deps = createDeps([]);
    deps.imageSource.capture = vi.fn().mockRejectedValue(new CameraError('Camera returned HTTP 404'));

    expect(await testConnection(deps)).toBe(false);
    expect(deps.operator.lines).toContain('Connection failed: Camera returned HTTP 404');
    expect(deps.imageSource.discard).not.toHaveBeenCalled();
  });
});

describe('runSingleCapture', () => {
  it('waits for Enter and runs one workflow', async () => {
    const deps = createDeps(['']);
    expect(await runSingleCapture(deps)).toBe(true);
    expect(deps.workflow.run).toHaveBeenCalledTimes(1);
    expect(deps.operator.lines).toContain('Book processing completed successfully!');
  });

  it('reports an aborted workflow', async () => {
    const deps = createDeps([''], {
      workflow: {
        run: vi.fn().mockResolvedValue({ status: 'aborted', stage: 'capture', reason: 'Camera returned HTTP 500' }),
      },
    });
    expect(await runSingleCapture(deps)).toBe(false);
    expect(deps.operator.lines).toContain('Book processing failed at capture: Camera returned HTTP 500');
  });

  it('refuses to run without a camera URL', async () => {
    const deps = createDeps([''], { cameraConfigured: false });
    expect(await runSingleCapture(deps)).toBe(false);
    expect(deps.workflow.run).not.toHaveBeenCalled();
  });
});

describe('repairReadingStatus', () => {
  it('reports a clean column', async () => {
    const deps = createDeps([]);
    expect(await repairReadingStatus(deps)).toBe(true);
    expect(deps.operator.lines).toContain('No ReadingStatus values needed cleaning.');
  });

  it('reports how many values were cleaned', async () => {
    const deps = createDeps([]);
    deps.catalogue.repairStatusColumn = vi.fn().mockResolvedValue({ status: 'repaired', cleaned: 2 });
    await repairReadingStatus(deps);
    expect(deps.operator.lines).toContain('Cleaned 2 ReadingStatus value(s).');
  });

  it('reports a failed repair', async () => {
    const deps = createDeps([]);
    deps.catalogue.repairStatusColumn = vi.fn().mockResolvedValue({
      status: 'failed',
      error: new PersistenceError('Failed to clean ReadingStatus column: database is locked'),
    });
    expect(await repairReadingStatus(deps)).toBe(false);
    expect(deps.operator.lines).toContain('Failed to clean ReadingStatus column: database is locked');
  });
});

describe('InteractiveSession', () => {
  let deps: ReturnType<typeof createDeps>;

  beforeEach(() => {
    deps = createDeps(['capture', '', 'bogus', 'TEST', 'quit']);
  });

  it('dispatches commands until quit', async () => {
    await new InteractiveSession(deps).run();

    expect(deps.workflow.run).toHaveBeenCalledTimes(1);
    expect(deps.imageSource.capture).toHaveBeenCalledTimes(1);
    expect(deps.operator.lines).toContain("Invalid command. Please enter 'capture', 'test', or 'quit'.");
    expect(deps.operator.lines[deps.operator.lines.length - 1]).toBe('Exiting...');
  });

  it('exits when input closes', async () => {
    deps = createDeps(['capture', '']);
    await new InteractiveSession(deps).run();

    expect(deps.workflow.run).toHaveBeenCalledTimes(1);
    expect(deps.operator.lines[deps.operator.lines.length - 1]).toBe('Input closed. Exiting...');
  });

  it('keeps looping after a failed command', async () => {
    deps = createDeps(['capture', '', 'quit'], {
      workflow: { run: vi.fn().mockRejectedValue(new Error('unexpected failure')) },
    });
    await new InteractiveSession(deps).run();

    expect(deps.operator.lines).toContain('Error: unexpected failure');
    expect(deps.operator.lines[deps.operator.lines.length - 1]).toBe('Exiting...');
  });

  it('refuses to start without a camera URL', async () => {
    deps = createDeps(['quit'], { cameraConfigured: false });
    await new InteractiveSession(deps).run();

    expect(deps.operator.ask).not.toHaveBeenCalled();
    expect(deps.operator.lines).toEqual(['Error: camera URL not configured. Set CAMERA_URL.']);
  });
});
