#!/usr/bin/env node
import { Command, program } from 'commander';
import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import defaultConfig, { AgentConfig, getDefaultConfig, mergeConfig, saveConfig, validateConfig } from './config';
import logger, { LogLevel } from './logger';
import { BrowserAgent, createSession } from './agent';
import { CommandParser } from './command-parser';
import { CompletionEvent, ItemOutcome, QuestionAnsweredPayload } from './task-completion-engine';
import { launchBrowser } from './page-driver';

// Load environment variables
dotenv.config();

// Options shared by every command that opens a browser
interface BrowserOptions {
  headless?: boolean;
  debug?: boolean;
  timeout?: string;
}

interface RunOptions extends BrowserOptions {
  url?: string;
  username?: string;
  password?: string;
}

interface CompleteOptions extends BrowserOptions {
  task?: string;
  maxQuestions?: string;
}

program
  .name('webtask')
  .description('Natural-language browser task agent')
  .version('1.0.0');

/**
 * Add the common browser flags to a command
 */
function withBrowserOptions(command: Command): Command {
  return command
    .option('-h, --headless', 'Run in headless mode (no visible browser)')
    .option('-d, --debug', 'Enable debug logging')
    .option('-t, --timeout <ms>', 'Default timeout in milliseconds');
}

/**
 * Apply command-line flags over the loaded configuration
 */
function resolveConfig(options: BrowserOptions, maxQuestions?: string): AgentConfig {
  if (options.debug) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const browser: Partial<AgentConfig['browser']> = {};
  if (options.headless) {
    browser.headless = true;
  }
  if (options.timeout) {
    browser.defaultTimeout = parseInt(options.timeout);
  }

  const completion: Partial<AgentConfig['completion']> = {};
  if (maxQuestions) {
    completion.maxQuestions = parseInt(maxQuestions);
  }

  const config = mergeConfig(defaultConfig, { browser, completion });
  const validation = validateConfig(config);
  validation.errors.forEach(error => logger.warn(`Configuration: ${error}`));
  return config;
}

/**
 * Abort controller wired to Ctrl+C; a second Ctrl+C exits immediately
 */
function abortOnInterrupt(): AbortController {
  const controller = new AbortController();
  process.on('SIGINT', () => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    logger.warn('Interrupt received; finishing the current step before stopping');
    controller.abort();
  });
  return controller;
}

program
  .command('parse')
  .description('Show the actions a command parses into, without opening a browser')
  .argument('<command...>', 'Natural-language command')
  .action((words: string[]) => {
    const parser = new CommandParser();
    const result = parser.parseDetailed(words.join(' '));
    console.log(JSON.stringify(result, null, 2));
  });

program
  .command('suggest')
  .description('Suggest command completions for partial input')
  .argument('<partial...>', 'Partial command')
  .action((words: string[]) => {
    const parser = new CommandParser();
    parser.getSuggestions(words.join(' ')).forEach(suggestion => console.log(suggestion));
  });

withBrowserOptions(
  program
    .command('run')
    .description('Interpret a natural-language command and run it in the browser')
    .argument('<command...>', 'Natural-language command')
    .option('-u, --url <url>', 'Page to open before running the command')
    .option('--username <username>', 'Username for login actions', process.env.AGENT_USERNAME)
    .option('--password <password>', 'Password for login actions', process.env.AGENT_PASSWORD)
).action(async (words: string[], options: RunOptions) => {
  const config = resolveConfig(options);
  const controller = abortOnInterrupt();
  const browserSession = await launchBrowser(config);

  try {
    const agent = new BrowserAgent(browserSession.driver, { config });
    attachProgressLogging(agent);

    const credentials = options.username || options.password
      ? { username: options.username, password: options.password }
      : undefined;
    let session = createSession(credentials);

    if (options.url) {
      const opened = await agent.interpretAndRun(`go to ${options.url}`, { session, signal: controller.signal });
      session = opened.session;
      if (!opened.success) {
        logger.error(opened.message);
        process.exitCode = 1;
        return;
      }
    }

    const result = await agent.interpretAndRun(words.join(' '), { session, signal: controller.signal });
    result.results.forEach(({ action, outcome }, index) => {
      logger.info(`${index + 1}. ${outcome.success ? 'OK  ' : 'FAIL'} ${action.description}: ${outcome.message}`);
    });
    if (result.suggestions && result.suggestions.length > 0) {
      logger.info(`Try one of: ${result.suggestions.join(' | ')}`);
    }

    if (result.success) {
      logger.info(result.message);
    } else {
      logger.error(result.message);
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Error running command:', error);
    process.exitCode = 1;
  } finally {
    await browserSession.close();
  }
});

withBrowserOptions(
  program
    .command('complete')
    .description('Complete every incomplete quiz, test or assessment listed on a page')
    .argument('<url>', 'Page listing the work items')
    .option('--task <description>', 'Task description used to find the right section, e.g. "complete my quizzes"')
    .option('-m, --max-questions <number>', 'Maximum questions answered per item')
).action(async (url: string, options: CompleteOptions) => {
  const config = resolveConfig(options, options.maxQuestions);
  const controller = abortOnInterrupt();
  const browserSession = await launchBrowser(config);

  try {
    const agent = new BrowserAgent(browserSession.driver, { config });
    attachProgressLogging(agent);

    const result = await agent.completeWorkload(url, options.task, { signal: controller.signal });
    result.outcomes.forEach(outcome => {
      logger.info(`${outcome.title}: ${outcome.status} (${outcome.questionsAnswered} answered) ${outcome.outcome.message}`);
    });

    if (result.success) {
      logger.info(result.message);
    } else {
      logger.error(result.message);
      process.exitCode = 1;
    }
  } catch (error) {
    logger.error('Error completing workload:', error);
    process.exitCode = 1;
  } finally {
    await browserSession.close();
  }
});

// Command to generate a configuration file
program
  .command('init')
  .description('Generate a configuration file')
  .option('-f, --force', 'Overwrite existing configuration file')
  .action((options: { force?: boolean }) => {
    try {
      const configPath = path.join(process.cwd(), 'agent-config.json');

      if (fs.existsSync(configPath) && !options.force) {
        logger.error(`Configuration file already exists at ${configPath}. Use --force to overwrite.`);
        process.exitCode = 1;
        return;
      }

      saveConfig(getDefaultConfig(), configPath);
      logger.info(`Configuration file generated at ${configPath}`);
    } catch (error) {
      logger.error('Error generating configuration file:', error);
      process.exitCode = 1;
    }
  });

/**
 * Log engine progress events as they happen
 */
function attachProgressLogging(agent: BrowserAgent): void {
  const engine = agent.getEngine();
  engine.on(CompletionEvent.QUESTION_ANSWERED, (payload: QuestionAnsweredPayload) => {
    logger.info(`[${payload.item}] answered: ${payload.answer}`);
  });
  engine.on(CompletionEvent.ITEM_FINISHED, (outcome: ItemOutcome) => {
    logger.info(`[${outcome.title}] ${outcome.status}`);
  });
}

// Parse command line arguments
program.parseAsync(process.argv).catch(error => {
  logger.error('Unexpected error:', error);
  process.exit(1);
});
