import { v4 as uuidv4 } from 'uuid';
import defaultConfig, { AgentConfig } from './config';
import { ActionExecutor, QUIZ_VOCABULARY } from './action-executor';
import { AutomationTemplates, TemplateRunner } from './automation-templates';
import { CommandParser } from './command-parser';
import { ElementLocatorStrategy, SmartElementDetector } from './element-finder';
import { ErrorKind, ParseAmbiguousError } from './errors';
import { ExecutionLog } from './execution-log';
import { logger as defaultLogger, Logger } from './logger';
import { PageDriver } from './page-driver';
import { LangChainTextGenerator, QuestionAnswerer, TextGenerator } from './question-answering';
import { TaskCompletionEngine, WorkloadResult } from './task-completion-engine';
import { Action, ActionKind, AgentSession, ExecutionOutcome, failed, succeeded } from './types';

export interface ActionResult {
  action: Action;
  outcome: ExecutionOutcome;
}

export interface CommandResult {
  success: boolean;
  message: string;
  results: ActionResult[];
  unparsed: string[];
  suggestions?: string[];
  errorKind?: ErrorKind;
  session: AgentSession;
  log: ExecutionLog;
}

export interface WorkloadRunResult extends WorkloadResult {
  session: AgentSession;
}

export interface RunOptions {
  session?: AgentSession;
  signal?: AbortSignal;
}

export interface BrowserAgentOptions {
  config?: AgentConfig;
  logger?: Logger;
  parser?: CommandParser;
  strategy?: ElementLocatorStrategy;
  templates?: TemplateRunner;
  generator?: TextGenerator;
}

// Words that point back at items named earlier in the same command
const BACK_REFERENCE = /\b(?:unfinished|incomplete|remaining|pending|them|ones|all)\b/i;

/**
 * Create an empty session
 * @param credentials Optional credentials used by login actions
 */
export function createSession(credentials?: AgentSession['credentials']): AgentSession {
  return credentials ? { id: uuidv4(), history: [], credentials } : { id: uuidv4(), history: [] };
}

/**
 * Caller-facing agent: wires parser, executor and completion engine once
 */
export class BrowserAgent {
  private driver: PageDriver;
  private config: AgentConfig;
  private logger: Logger;
  private parser: CommandParser;
  private executor: ActionExecutor;
  private engine: TaskCompletionEngine;

  /**
   * Create a new agent
   * @param driver Page driver the agent acts on
   * @param options Collaborator overrides
   */
  constructor(driver: PageDriver, options: BrowserAgentOptions = {}) {
    this.driver = driver;
    this.config = options.config || defaultConfig;
    this.logger = options.logger || defaultLogger;
    this.parser = options.parser || new CommandParser({ searchFallback: this.config.parser.searchFallback, logger: this.logger });

    const detector = new SmartElementDetector();
    this.executor = new ActionExecutor({
      strategy: options.strategy || detector,
      templates: options.templates || new AutomationTemplates(detector),
      config: this.config,
      logger: this.logger,
    });

    const answerer = new QuestionAnswerer(options.generator || new LangChainTextGenerator(this.config), this.logger);
    this.engine = new TaskCompletionEngine({
      executor: this.executor,
      answerer,
      config: this.config,
      logger: this.logger,
    });
  }

  /**
   * The completion engine, for subscribing to its events
   */
  getEngine(): TaskCompletionEngine {
    return this.engine;
  }

  /**
   * Parse a command and run its actions in order, stopping at the first failure
   * @param command Natural-language command
   * @param options Session and cancellation signal
   * @returns Per-action results and the updated session
   */
  async interpretAndRun(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const session = options.session || createSession();
    const log = new ExecutionLog();
    const parsed = this.parser.parseDetailed(command);

    if (parsed.actions.length === 0) {
      const error = new ParseAmbiguousError(command, parsed.suggestions);
      const outcome = failed(error.message, error.kind);
      log.recordCommand(command, outcome);
      return {
        success: false,
        message: error.message,
        results: [],
        unparsed: parsed.unparsed,
        suggestions: error.suggestions,
        errorKind: error.kind,
        session: this.updateSession(session, command),
        log,
      };
    }

    const results: ActionResult[] = [];
    let failure: ActionResult | undefined;

    for (const action of parsed.actions) {
      if (options.signal?.aborted) {
        failure = { action, outcome: failed('Cancelled') };
        results.push(failure);
        break;
      }

      const outcome = this.routesToEngine(action, command)
        ? await this.runWorkItems(options.signal, log)
        : await this.executor.execute(action, this.driver, { credentials: session.credentials });

      log.recordAction(action, outcome, command);
      results.push({ action, outcome });

      if (!outcome.success) {
        failure = { action, outcome };
        break;
      }
    }

    let message = failure
      ? `Stopped at "${failure.action.description}": ${failure.outcome.message}`
      : `Executed ${results.length} action(s)`;
    if (parsed.unparsed.length > 0) {
      message += `; could not understand: ${parsed.unparsed.map(fragment => `"${fragment}"`).join(', ')}`;
    }

    return {
      success: !failure,
      message,
      results,
      unparsed: parsed.unparsed,
      ...(failure?.outcome.errorKind ? { errorKind: failure.outcome.errorKind } : {}),
      session: this.updateSession(session, command),
      log,
    };
  }

  /**
   * Scan the entry page and complete every incomplete work item
   * @param entryUrl Page listing the work items
   * @param taskDescription Optional description used to find the right section
   * @param options Session and cancellation signal
   * @returns Aggregate workload result and the updated session
   */
  async completeWorkload(entryUrl: string, taskDescription?: string, options: RunOptions = {}): Promise<WorkloadRunResult> {
    const session = options.session || createSession();
    const startTime = new Date();

    const result = await this.engine.completeWorkload(this.driver, {
      entryUrl,
      taskDescription,
      signal: options.signal,
    });

    if (this.config.logging.logToFile) {
      this.logger.generateReport({
        startTime,
        endTime: new Date(),
        entryUrl,
        attempted: result.attempted,
        completed: result.completed,
        failed: result.failed,
        skipped: result.skipped,
        questionsAnswered: result.outcomes.reduce((total, outcome) => total + outcome.questionsAnswered, 0),
        cancelled: result.cancelled,
      });
    }

    return { ...result, session: this.updateSession(session, `complete ${entryUrl}`) };
  }

  /**
   * Custom actions about quizzes, tests or assessments (or pointing back at them) go to the engine
   */
  private routesToEngine(action: Action, command: string): boolean {
    if (action.kind !== ActionKind.CUSTOM || !action.target) {
      return false;
    }
    return QUIZ_VOCABULARY.test(action.target)
      || (BACK_REFERENCE.test(action.target) && QUIZ_VOCABULARY.test(command));
  }

  private async runWorkItems(signal: AbortSignal | undefined, log: ExecutionLog): Promise<ExecutionOutcome> {
    const result = await this.engine.completeWorkload(this.driver, { signal, log });
    const data = {
      attempted: result.attempted,
      completed: result.completed,
      failed: result.failed,
      skipped: result.skipped,
    };
    if (result.success) {
      return succeeded(result.message, data);
    }
    const firstFailure = result.outcomes.find(outcome => !outcome.outcome.success);
    return failed(result.message, result.errorKind || firstFailure?.outcome.errorKind, data);
  }

  private updateSession(session: AgentSession, command: string): AgentSession {
    return {
      ...session,
      currentUrl: this.driver.currentUrl(),
      history: [...session.history, command],
    };
  }
}
