#!/usr/bin/env node
// Load environment variables first
import 'dotenv/config';

import { loadConfig } from './config/index.js';
import { createLogger } from './utils/logger.js';
import { describeError } from './utils/errors.js';
import { ClaudeAdapter } from './adapters/llm/ClaudeAdapter.js';
import { DisabledLLMAdapter } from './adapters/llm/DisabledLLMAdapter.js';
import { IpWebcamAdapter } from './adapters/camera/IpWebcamAdapter.js';
import { ConsoleOperatorAdapter } from './adapters/console/ConsoleOperatorAdapter.js';
import { createSqlDriver, describeConnection } from './persistence/database.js';
import { MasterTableRepository } from './persistence/repositories/MasterTableRepository.js';
import { BookExtractor, loadBookPrompts } from './core/extraction/BookExtractor.js';
import { BookWorkflow } from './core/workflow/BookWorkflow.js';
import { InteractiveSession } from './core/session/InteractiveSession.js';
import {
  chooseMode,
  parseMode,
  repairReadingStatus,
  runSingleCapture,
  testConnection,
  type SessionDeps,
  type SessionMode,
} from './core/session/modes.js';

const logger = createLogger({ component: 'index' });

async function runMode(mode: SessionMode, deps: SessionDeps): Promise<boolean> {
  switch (mode) {
    case 'interactive':
      await new InteractiveSession(deps).run();
      return true;
    case 'single':
      return runSingleCapture(deps);
    case 'test':
      return testConnection(deps);
    case 'repair':
      return repairReadingStatus(deps);
  }
}

async function main(): Promise<number> {
  const config = loadConfig();
  const operator = new ConsoleOperatorAdapter();
  operator.closeOnInterrupt();
  const driver = createSqlDriver(config);

  try {
    const catalogue = new MasterTableRepository(driver, describeConnection(config));
    await catalogue.initialize();

    const llmAdapter = config.anthropicApiKey ? new ClaudeAdapter(config) : new DisabledLLMAdapter();
    const oracle = new BookExtractor(llmAdapter, await loadBookPrompts(), {
      temperature: config.llmTemperature,
      maxTokens: config.llmMaxTokens,
    });
    const imageSource = new IpWebcamAdapter(config);
    const workflow = new BookWorkflow({
      imageSource,
      oracle,
      catalogue,
      operator,
      location: config.bookLocation ?? null,
    });

    operator.say('Book cataloguing pipeline');
    operator.say('='.repeat(60));
    operator.say(`Camera URL: ${config.cameraUrl ?? '(not configured)'}`);
    operator.say(`Location: ${config.bookLocation ?? '(none)'}`);
    operator.say(`Database: ${describeConnection(config)}`);
    operator.say('');

    const argument = process.argv[2];
    const mode = argument ? parseMode(argument) : await chooseMode(operator);
    if (!mode) {
      operator.say('Invalid choice. Exiting.');
      return 1;
    }

    const ok = await runMode(mode, {
      workflow,
      imageSource,
      catalogue,
      operator,
      cameraConfigured: imageSource.configured,
    });
    return ok ? 0 : 1;
  } catch (error) {
    logger.error({ error }, 'Pipeline failed');
    operator.say(`Error: ${describeError(error)}`);
    return 1;
  } finally {
    operator.close();
    await driver.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    console.error('Unhandled error:', error);
    process.exit(1);
  });
