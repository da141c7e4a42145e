import { EventEmitter } from 'events';
import defaultConfig, { AgentConfig } from './config';
import { ActionExecutor } from './action-executor';
import { isUrlLike, normalizeUrl } from './command-parser';
import { findFirstVisible, quoteSelectorValue } from './element-finder';
import { AgentError, ElementNotFoundError, ErrorKind, SubmissionError, isTimeoutError, toAgentError } from './errors';
import { ExecutionLog } from './execution-log';
import { logger as defaultLogger, Logger } from './logger';
import { PageDriver } from './page-driver';
import { QuestionAnswerer, buildPageContext, classifyQuestion, matchAnswerToOption } from './question-answering';
import { SiteNavigator } from './site-navigator';
import { WorkItemScanner, isIncomplete } from './work-item-scanner';
import { ActionKind, ExecutionOutcome, Question, QuestionKind, TaskStatus, WorkItem, createAction, failed, succeeded } from './types';

/**
 * Events emitted while a workload runs
 */
export enum CompletionEvent {
  ITEM_STARTED = 'item_started',
  QUESTION_ANSWERED = 'question_answered',
  ITEM_FINISHED = 'item_finished'
}

export interface ItemOutcome {
  title: string;
  locator: string;
  status: TaskStatus;
  questionsAnswered: number;
  skipped: boolean;
  outcome: ExecutionOutcome;
}

export interface WorkloadResult {
  success: boolean;
  message: string;
  attempted: number;
  completed: number;
  failed: number;
  skipped: number;
  cancelled: boolean;
  errorKind?: ErrorKind;
  outcomes: ItemOutcome[];
  log: ExecutionLog;
}

interface SummaryOverride {
  success: boolean;
  message: string;
  errorKind?: ErrorKind;
}

export interface CompletionOptions {
  entryUrl?: string;
  taskDescription?: string;
  signal?: AbortSignal;
  log?: ExecutionLog;
}

export interface TaskCompletionEngineOptions {
  executor: ActionExecutor;
  answerer: QuestionAnswerer;
  scanner?: WorkItemScanner;
  navigator?: SiteNavigator;
  config?: AgentConfig;
  logger?: Logger;
}

export interface QuestionAnsweredPayload {
  item: string;
  question: Question;
  answer: string;
}

// Completion indicators
const FINISHED_SELECTORS = [
  '.quiz-complete',
  '.assessment-complete',
  '.finished',
  "[data-testid*='complete']",
  '.success-message',
  "text='Quiz Complete'",
  "text='Assessment Complete'",
];

// Matched against the path only, as whole segments
const FINISHED_PATH = /(?:^|\/)(?:complete|completed|finished|results?)(?:\/|$)/i;

const QUESTION_SELECTORS = [
  '.question',
  '.quiz-question',
  '.assessment-question',
  "[data-testid*='question']",
  '.question-text',
  'h1, h2, h3',
];

const OPTION_SELECTORS = [
  '.option',
  '.choice',
  '.answer-option',
  "[data-testid*='option']",
  "input[type='radio'] + label",
  '.multiple-choice-option',
];

const TEXT_INPUT_SELECTORS = [
  'textarea',
  "input[type='text']",
  '.answer-input',
  "[data-testid*='answer']",
  '.text-input',
];

const SUBMIT_SELECTORS = [
  'button:has-text("Submit")',
  'button:has-text("Next")',
  'button:has-text("Continue")',
  '.submit-btn',
  '.next-btn',
  "[data-testid*='submit']",
  "[data-testid*='next']",
];

const ITEM_START_SELECTORS = [
  'button:has-text("Start")',
  'button:has-text("Begin")',
  'button:has-text("Take Quiz")',
  'a:has-text("Start")',
  '.start-btn',
  '.take-test',
];

const MIN_QUESTION_LENGTH = 10;

function urlPath(url: string): string {
  try {
    return new URL(url).pathname;
  } catch {
    return url;
  }
}

/**
 * Task Completion Engine: scans work items and drives each through its question loop
 */
export class TaskCompletionEngine extends EventEmitter {
  private executor: ActionExecutor;
  private answerer: QuestionAnswerer;
  private scanner: WorkItemScanner;
  private navigator: SiteNavigator;
  private config: AgentConfig;
  private logger: Logger;

  /**
   * Create a new completion engine
   * @param options Collaborators, config and logger
   */
  constructor(options: TaskCompletionEngineOptions) {
    super();
    this.executor = options.executor;
    this.answerer = options.answerer;
    this.logger = options.logger || defaultLogger;
    this.scanner = options.scanner || new WorkItemScanner(this.logger);
    this.navigator = options.navigator || new SiteNavigator(this.logger);
    this.config = options.config || defaultConfig;
  }

  /**
   * Complete every incomplete work item reachable from the entry page.
   * One item's failure never stops its siblings.
   * @param driver Page driver
   * @param options Entry URL, task description, cancellation signal and log
   * @returns Aggregate result with per-item outcomes
   */
  async completeWorkload(driver: PageDriver, options: CompletionOptions = {}): Promise<WorkloadResult> {
    const log = options.log || new ExecutionLog();
    const outcomes: ItemOutcome[] = [];
    let cancelled = false;

    if (options.entryUrl) {
      const url = isUrlLike(options.entryUrl) ? normalizeUrl(options.entryUrl) : options.entryUrl;
      const navigate = createAction(ActionKind.NAVIGATE, `Navigate to ${url}`, url);
      const outcome = await this.executor.execute(navigate, driver);
      log.recordAction(navigate, outcome);
      if (!outcome.success) {
        return this.summarize(outcomes, log, false, {
          success: false,
          message: `Could not open ${url}: ${outcome.message}`,
          errorKind: outcome.errorKind,
        });
      }
    }

    try {
      if (options.taskDescription) {
        await this.openRelevantSection(driver, options.taskDescription, log);
      }

      const items = await this.scanner.scan(driver);
      const incomplete = items.filter(item => isIncomplete(item.status));
      this.logger.info(`${incomplete.length} of ${items.length} item(s) need completing`);

      if (incomplete.length === 0) {
        return this.summarize(outcomes, log, false, { success: true, message: 'No incomplete items found' });
      }

      for (const item of incomplete) {
        if (options.signal?.aborted) {
          cancelled = true;
          outcomes.push(this.skippedOutcome(item, 'Cancelled before start'));
          continue;
        }

        const itemOutcome = await this.completeItem(driver, item, options.signal);
        outcomes.push(itemOutcome);
        log.recordItem(item.title, itemOutcome.outcome);
        this.emit(CompletionEvent.ITEM_FINISHED, itemOutcome);

        if (options.signal?.aborted) {
          cancelled = true;
        }
        await driver.waitFor(this.config.completion.itemDelayMs);
      }
    } catch (error) {
      const agentError = toAgentError(error, 'scan');
      this.logger.error('Workload stopped:', agentError);
      return this.summarize(outcomes, log, cancelled, {
        success: false,
        message: `Workload stopped: ${agentError.message}`,
        errorKind: agentError.kind,
      });
    }

    return this.summarize(outcomes, log, cancelled);
  }

  /**
   * Drive one item: return to its page, re-check its status, start it, run the question loop
   * @param driver Page driver
   * @param item Item from the initial scan
   * @param signal Optional cancellation signal
   * @returns Outcome for the item (never throws)
   */
  async completeItem(driver: PageDriver, item: WorkItem, signal?: AbortSignal): Promise<ItemOutcome> {
    this.emit(CompletionEvent.ITEM_STARTED, item);
    this.logger.info(`Starting item: ${item.title}`);
    let answered = 0;

    try {
      await this.returnToSource(driver, item);

      // The scan may be stale; only the page's current state counts
      const current = await this.rescan(driver, item);
      if (!current) {
        throw new ElementNotFoundError(`item "${item.title}"`, 'rescan');
      }
      if (!isIncomplete(current.status)) {
        return this.skippedOutcome(current, `Already ${current.status}`);
      }

      await this.startItem(driver, current);

      const maxQuestions = this.config.completion.maxQuestions;
      for (let iteration = 0; iteration < maxQuestions; iteration++) {
        if (signal?.aborted) {
          return this.itemOutcome(item, TaskStatus.FAILED, answered, failed('Cancelled'));
        }

        if (await this.isFinished(driver)) {
          return this.completedOutcome(item, answered);
        }

        const question = await this.extractQuestion(driver);
        if (!question) {
          this.logger.info(`No further questions for ${item.title}; treating as finished`);
          return this.completedOutcome(item, answered);
        }

        const answer = await this.answerer.answer(question);
        await this.submitAnswer(driver, question, answer);

        answered++;
        const payload: QuestionAnsweredPayload = { item: item.title, question, answer };
        this.emit(CompletionEvent.QUESTION_ANSWERED, payload);
        await driver.waitFor(this.config.completion.questionDelayMs);
      }

      return this.itemOutcome(
        item,
        TaskStatus.FAILED,
        answered,
        failed(`Question limit of ${maxQuestions} reached for ${item.title}`, 'Timeout')
      );
    } catch (error) {
      const agentError = toAgentError(error, `complete ${item.title}`);
      this.logger.error(`Item ${item.title} failed:`, agentError);
      return this.itemOutcome(item, TaskStatus.FAILED, answered, failed(agentError.message, agentError.kind));
    }
  }

  /**
   * Check the finished-indicator set and the URL
   */
  async isFinished(driver: PageDriver): Promise<boolean> {
    if (FINISHED_PATH.test(urlPath(driver.currentUrl()))) {
      return true;
    }
    return (await findFirstVisible(driver, FINISHED_SELECTORS)) !== null;
  }

  /**
   * Extract the current question, its options and page context
   * @param driver Page driver
   * @returns Question, or null when no question text is on the page
   */
  async extractQuestion(driver: PageDriver): Promise<Question | null> {
    let text = '';
    for (const selector of QUESTION_SELECTORS) {
      for (const candidate of await driver.queryAll(selector)) {
        const candidateText = await candidate.textContent();
        if (candidateText.length > MIN_QUESTION_LENGTH && (await candidate.isVisible())) {
          text = candidateText;
          break;
        }
      }
      if (text) {
        break;
      }
    }
    if (!text) {
      return null;
    }

    const options: string[] = [];
    for (const selector of OPTION_SELECTORS) {
      for (const candidate of await driver.queryAll(selector)) {
        const optionText = await candidate.textContent();
        if (optionText) {
          options.push(optionText);
        }
      }
      if (options.length > 0) {
        break;
      }
    }

    let kind = classifyQuestion(text);
    if (options.length > 0 && kind !== QuestionKind.MULTIPLE_CHOICE) {
      kind = QuestionKind.MULTIPLE_CHOICE;
    }

    const context = await buildPageContext(
      await driver.title(),
      driver.currentUrl(),
      await driver.content(),
      this.config.ai.contextChars
    );

    return { text, kind, options, context };
  }

  /**
   * Submit an answer: pick the option or fill the text input, then Submit/Next/Continue or Enter
   * @throws SubmissionError when the answer cannot be entered
   */
  async submitAnswer(driver: PageDriver, question: Question, answer: string): Promise<void> {
    if (question.kind === QuestionKind.MULTIPLE_CHOICE && question.options.length > 0) {
      const matched = matchAnswerToOption(answer, question.options);
      if (!matched && this.config.completion.strictOptionMatching) {
        throw new SubmissionError(`Answer "${answer}" does not match any option`);
      }
      const choice = matched || answer;
      const quoted = quoteSelectorValue(choice);
      const option = await findFirstVisible(driver, [
        `text=${quoted}`,
        `label:has-text(${quoted})`,
        `input[value=${quoted}] + label`,
        `.option:has-text(${quoted})`,
      ]);
      if (!option) {
        throw new SubmissionError(`Could not select option "${choice}"`);
      }
      await option.click();
    } else {
      const input = await findFirstVisible(driver, TEXT_INPUT_SELECTORS);
      if (!input) {
        throw new SubmissionError('No answer input found');
      }
      await input.fill(answer);
    }

    const submit = await findFirstVisible(driver, SUBMIT_SELECTORS);
    if (submit) {
      await submit.click();
    } else {
      await driver.pressKey('Enter');
    }
  }

  private async openRelevantSection(driver: PageDriver, taskDescription: string, log: ExecutionLog): Promise<void> {
    const section = await this.navigator.findRelevantSection(driver, taskDescription);
    if (!section) {
      this.logger.debug(`No section matched "${taskDescription}"; scanning the current page`);
      return;
    }
    await section.element.click();
    await this.settle(driver);
    log.recordCommand(taskDescription, succeeded(`Opened section ${section.name}`));
  }

  private async returnToSource(driver: PageDriver, item: WorkItem): Promise<void> {
    if (driver.currentUrl() === item.source) {
      return;
    }
    const navigate = createAction(ActionKind.NAVIGATE, `Return to ${item.source}`, item.source);
    const outcome = await this.executor.execute(navigate, driver);
    if (!outcome.success) {
      throw new AgentError(outcome.errorKind || 'ExternalServiceFailure', outcome.message);
    }
  }

  private async rescan(driver: PageDriver, item: WorkItem): Promise<WorkItem | null> {
    const fresh = await this.scanner.scan(driver);
    return fresh.find(candidate => candidate.locator === item.locator)
      || fresh.find(candidate => candidate.title === item.title)
      || null;
  }

  private async startItem(driver: PageDriver, item: WorkItem): Promise<void> {
    if (isUrlLike(item.locator)) {
      const navigate = createAction(ActionKind.NAVIGATE, `Open ${item.title}`, item.locator);
      const outcome = await this.executor.execute(navigate, driver);
      if (!outcome.success) {
        throw new AgentError(outcome.errorKind || 'ExternalServiceFailure', outcome.message);
      }
      const start = await findFirstVisible(driver, ITEM_START_SELECTORS);
      if (start) {
        await start.click();
        await this.settle(driver);
      }
      return;
    }

    const start = await driver.find(item.startSelector || item.locator);
    if (!start) {
      throw new ElementNotFoundError(`start control for ${item.title}`, 'start');
    }
    await start.click();
    await this.settle(driver);
  }

  private async settle(driver: PageDriver): Promise<void> {
    try {
      await driver.waitForLoadState('domcontentloaded', this.config.browser.loadFallbackTimeout);
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      this.logger.debug('Page did not report content loaded; continuing');
    }
  }

  private itemOutcome(item: WorkItem, status: TaskStatus, questionsAnswered: number, outcome: ExecutionOutcome): ItemOutcome {
    return { title: item.title, locator: item.locator, status, questionsAnswered, skipped: false, outcome };
  }

  private completedOutcome(item: WorkItem, answered: number): ItemOutcome {
    return this.itemOutcome(
      item,
      TaskStatus.COMPLETED,
      answered,
      succeeded(`Completed ${item.title} (${answered} question(s) answered)`)
    );
  }

  private skippedOutcome(item: WorkItem, reason: string): ItemOutcome {
    return {
      title: item.title,
      locator: item.locator,
      status: item.status,
      questionsAnswered: 0,
      skipped: true,
      outcome: succeeded(`Skipped ${item.title}: ${reason}`),
    };
  }

  private summarize(
    outcomes: ItemOutcome[],
    log: ExecutionLog,
    cancelled: boolean,
    override?: SummaryOverride
  ): WorkloadResult {
    const attempted = outcomes.filter(outcome => !outcome.skipped);
    const completed = attempted.filter(outcome => outcome.status === TaskStatus.COMPLETED).length;
    const failedCount = attempted.filter(outcome => outcome.status === TaskStatus.FAILED).length;
    const skipped = outcomes.length - attempted.length;

    const summary = override
      ? override.message
      : `Completed ${completed} of ${attempted.length} item(s)` + (cancelled ? ' (cancelled)' : '');
    const success = override ? override.success : failedCount === 0 && !cancelled;
    this.logger.info(summary);

    return {
      success,
      message: summary,
      attempted: attempted.length,
      completed,
      failed: failedCount,
      skipped,
      cancelled,
      errorKind: override?.errorKind,
      outcomes,
      log,
    };
  }
}
