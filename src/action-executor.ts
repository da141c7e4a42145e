import fs from 'fs';
import path from 'path';
import defaultConfig, { AgentConfig } from './config';
import { ElementLocatorStrategy, findFirstVisible, keyTerms, quoteSelectorValue, resolveElement, resolveInput } from './element-finder';
import { TemplatePayload, TemplateRunner } from './automation-templates';
import { errorMessage, isTimeoutError, toAgentError } from './errors';
import { logger as defaultLogger, Logger } from './logger';
import { LoadState, PageDriver, PageElement } from './page-driver';
import { Action, ActionKind, AgentSession, ExecutionOutcome, failed, succeeded } from './types';

/**
 * Per-call context for an execution
 */
export interface ExecutionContext {
  credentials?: AgentSession['credentials'];
}

export interface ActionExecutorOptions {
  strategy?: ElementLocatorStrategy;
  templates?: TemplateRunner;
  config?: AgentConfig;
  logger?: Logger;
}

const SEARCH_INPUT_SELECTORS = [
  'input[type="search"]',
  'input[name*="search"]',
  'input[placeholder*="search"]',
  'input[id*="search"]',
  '.search input',
  '#search input',
];

const LOGIN_AFFORDANCE_SELECTORS = [
  'a:has-text("Sign in")',
  'button:has-text("Sign in")',
  'a:has-text("Log in")',
  'button:has-text("Log in")',
  'a:has-text("Login")',
  'button:has-text("Login")',
  'a[href*="login"]',
  'a[href*="signin"]',
];

const QUIZ_START_SELECTORS = [
  'button:has-text("Start")',
  'button:has-text("Take Quiz")',
  'button:has-text("Begin")',
  'a:has-text("Start")',
  'a:has-text("Take")',
  '.start-btn',
  '.take-test',
  '[data-testid*="start"]',
];

// One query, so an element matching several selectors comes back once
export const QUIZ_START_SELECTOR = QUIZ_START_SELECTORS.join(', ');

export const QUIZ_VOCABULARY = /\b(?:quiz(?:zes)?|tests?|assessments?|exams?)\b/i;

const SCROLL_KEYS: Record<string, string> = {
  down: 'PageDown',
  up: 'PageUp',
  top: 'Home',
  bottom: 'End',
};

const LOAD_CONDITIONS: Record<string, LoadState> = {
  'page load': 'load',
  'page to load': 'load',
  load: 'load',
  'network idle': 'networkidle',
  'page to settle': 'networkidle',
  content: 'domcontentloaded',
};

const WAIT_POLL_INTERVAL = 500;
const MAX_QUIZ_STARTS = 3;

/**
 * Parse "key=value" or "key: value" pairs separated by commas or "and"
 * @param text e.g. "name=Jane, email=jane@example.com"
 * @returns Field map (empty when nothing parses)
 */
export function parseFieldPairs(text: string | undefined): Record<string, string> {
  const fields: Record<string, string> = {};
  if (!text) {
    return fields;
  }
  for (const part of text.split(/\s*,\s*|\s+and\s+/i)) {
    const pair = part.match(/^\s*([^=:]+?)\s*[=:]\s*(.+?)\s*$/);
    if (pair) {
      fields[pair[1].toLowerCase().replace(/\s+/g, '_')] = pair[2].replace(/^(["'])(.*)\1$/, '$2');
    }
  }
  return fields;
}

/**
 * Action Executor: performs one action against the page and reports the outcome
 */
export class ActionExecutor {
  private strategy?: ElementLocatorStrategy;
  private templates?: TemplateRunner;
  private config: AgentConfig;
  private logger: Logger;

  /**
   * Create a new executor
   * @param options Element strategy, templates collaborator, config and logger
   */
  constructor(options: ActionExecutorOptions = {}) {
    this.strategy = options.strategy;
    this.templates = options.templates;
    this.config = options.config || defaultConfig;
    this.logger = options.logger || defaultLogger;
  }

  /**
   * Execute a single action once. Never throws and never retries.
   * @param action Action to perform
   * @param driver Page driver
   * @param context Optional credentials for login
   * @returns Outcome of the action
   */
  async execute(action: Action, driver: PageDriver, context: ExecutionContext = {}): Promise<ExecutionOutcome> {
    this.logger.info(`Executing: ${action.description}`);
    try {
      const outcome = await this.dispatch(action, driver, context);
      if (!outcome.success) {
        this.logger.warn(`${action.description}: ${outcome.message}`);
      }
      return outcome;
    } catch (error) {
      const agentError = toAgentError(error, action.kind);
      this.logger.error(`${action.description} failed:`, error);
      return failed(`${action.description} failed: ${errorMessage(error)}`, agentError.kind);
    }
  }

  private async dispatch(action: Action, driver: PageDriver, context: ExecutionContext): Promise<ExecutionOutcome> {
    switch (action.kind) {
      case ActionKind.NAVIGATE:
        return this.navigate(action, driver);
      case ActionKind.CLICK:
        return this.click(action, driver);
      case ActionKind.TYPE:
        return this.type(action, driver);
      case ActionKind.SCROLL:
        return this.scroll(action, driver);
      case ActionKind.WAIT:
        return this.wait(action, driver);
      case ActionKind.SCREENSHOT:
        return this.screenshot(action, driver);
      case ActionKind.EXTRACT:
        return this.extract(action, driver);
      case ActionKind.SEARCH:
        return this.search(action, driver);
      case ActionKind.LOGIN:
        return this.login(action, driver, context);
      case ActionKind.FILL_FORM:
        return this.fillForm(action, driver);
      case ActionKind.CUSTOM:
        return this.custom(action, driver);
      default:
        return failed(`Action ${action.kind} is not implemented`);
    }
  }

  /**
   * Navigate: content-loaded, then network idle with a basic load fallback
   */
  private async navigate(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    if (!action.target) {
      return failed('No URL provided for navigation', 'ParseAmbiguous');
    }
    const { navigationTimeout, networkIdleTimeout, loadFallbackTimeout } = this.config.browser;

    await driver.navigate(action.target, navigationTimeout);
    await driver.waitForLoadState('domcontentloaded', navigationTimeout);

    try {
      await driver.waitForLoadState('networkidle', networkIdleTimeout);
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      this.logger.warn(`Network idle timeout on ${action.target}, waiting for load instead`);
      try {
        await driver.waitForLoadState('load', loadFallbackTimeout);
      } catch (loadError) {
        if (!isTimeoutError(loadError)) {
          throw loadError;
        }
        this.logger.warn(`Load timeout on ${action.target}, continuing`);
      }
    }

    const title = await driver.title();
    return succeeded(`Navigated to ${action.target}`, { url: driver.currentUrl(), title });
  }

  private async click(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    if (!action.target) {
      return failed('No element described to click', 'ParseAmbiguous');
    }
    const resolved = await resolveElement(driver, action.target, this.strategy);
    if (!resolved) {
      return failed(`Could not find element: ${action.target}`, 'ElementNotFound');
    }
    await resolved.element.click();
    return succeeded(`Clicked on ${action.target}`, { method: resolved.method });
  }

  private async type(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    if (!action.value) {
      return failed('No text provided to type', 'ParseAmbiguous');
    }
    const target = action.target || 'input field';
    const resolved = await resolveInput(driver, target, this.strategy);
    if (!resolved) {
      return failed(`Could not find input field: ${target}`, 'ElementNotFound');
    }
    await resolved.element.clear();
    await resolved.element.type(action.value);
    return succeeded(`Typed '${action.value}' into ${target}`, { method: resolved.method });
  }

  private async scroll(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const target = action.target || 'down';
    const direction = target.toLowerCase();
    const key = Object.hasOwn(SCROLL_KEYS, direction) ? SCROLL_KEYS[direction] : undefined;
    if (key) {
      await driver.pressKey(key);
      return succeeded(`Scrolled ${target}`);
    }
    const resolved = await resolveElement(driver, target, this.strategy);
    if (!resolved) {
      return failed(`Could not find element to scroll to: ${target}`, 'ElementNotFound');
    }
    await resolved.element.scrollIntoView();
    return succeeded(`Scrolled to ${target}`);
  }

  /**
   * Wait: numeric seconds, a named load condition, or polling for a described element
   */
  private async wait(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    if (action.value !== undefined) {
      const seconds = parseFloat(action.value);
      if (Number.isNaN(seconds) || seconds < 0) {
        return failed(`Invalid wait duration: ${action.value}`, 'ParseAmbiguous');
      }
      await driver.waitFor(seconds * 1000);
      return succeeded(`Waited ${action.value} seconds`);
    }

    if (!action.target) {
      return failed('Nothing to wait for', 'ParseAmbiguous');
    }

    const condition = action.target.toLowerCase();
    const state = Object.hasOwn(LOAD_CONDITIONS, condition) ? LOAD_CONDITIONS[condition] : undefined;
    if (state) {
      try {
        await driver.waitForLoadState(state, this.config.browser.defaultTimeout);
      } catch (error) {
        if (isTimeoutError(error)) {
          return failed(`Timed out waiting for ${action.target}`, 'Timeout');
        }
        throw error;
      }
      return succeeded(`Waited for ${action.target}`);
    }

    const attempts = Math.max(1, Math.ceil(this.config.browser.defaultTimeout / WAIT_POLL_INTERVAL));
    for (let attempt = 0; attempt < attempts; attempt++) {
      if (await resolveElement(driver, action.target, this.strategy)) {
        return succeeded(`${action.target} appeared`);
      }
      await driver.waitFor(WAIT_POLL_INTERVAL);
    }
    return failed(`Timed out waiting for ${action.target}`, 'Timeout');
  }

  private async screenshot(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const dir = this.config.paths.screenshotDir;
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
    const label = (action.target || 'screenshot').replace(/[^a-z0-9_-]+/gi, '_');
    const filePath = path.join(dir, `${label}_${Date.now()}.png`);
    await driver.screenshot(filePath);
    return succeeded(`Screenshot saved to ${filePath}`, { path: filePath });
  }

  /**
   * Extract: page title, URL, page text, or the text of a described element
   */
  private async extract(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const target = action.target || 'page content';
    const lower = target.toLowerCase();

    if (/\btitle\b/.test(lower) && /\bpage\b|^title$/.test(lower)) {
      const title = await driver.title();
      return succeeded(`Page title: ${title}`, { target, text: title });
    }
    if (/\b(?:url|address|link)\b/.test(lower) && /\b(?:page|current)\b|^url$/.test(lower)) {
      const url = driver.currentUrl();
      return succeeded(`Current URL: ${url}`, { target, text: url });
    }
    if (/^(?:page\s+)?(?:content|text)$|^page$/.test(lower)) {
      const text = await driver.content();
      return succeeded(`Extracted ${text.length} characters of page text`, { target, text });
    }

    const resolved = await resolveElement(driver, target, this.strategy);
    if (!resolved) {
      return failed(`Could not find element: ${target}`, 'ElementNotFound');
    }
    const text = await resolved.element.textContent();
    return succeeded(`Extracted ${target}: ${text}`, { target, text });
  }

  /**
   * Search: first matching search input, fill, Enter, bounded network-idle wait
   */
  private async search(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const query = action.value || action.target;
    if (!query) {
      return failed('No search query provided', 'ParseAmbiguous');
    }

    for (const selector of SEARCH_INPUT_SELECTORS) {
      const input = await driver.find(selector, { timeoutMs: 2000 });
      if (!input) {
        continue;
      }
      await input.fill(query);
      await input.press('Enter');
      try {
        await driver.waitForLoadState('networkidle', 10000);
      } catch (error) {
        if (!isTimeoutError(error)) {
          throw error;
        }
        this.logger.debug('Search results did not reach network idle');
      }
      return succeeded(`Searched for '${query}'`, { selector });
    }

    return failed('No search input found on page', 'ElementNotFound');
  }

  /**
   * Login: templates collaborator first, then visible login affordances.
   * Never falls back to a search.
   */
  private async login(action: Action, driver: PageDriver, context: ExecutionContext): Promise<ExecutionOutcome> {
    const steps: string[] = [];

    if (this.templates) {
      const payload: TemplatePayload = {
        site: action.target,
        method: action.value,
        username: context.credentials?.username,
        password: context.credentials?.password,
      };
      const result = await this.templates.execute('login', driver, payload);
      if (result.success) {
        return succeeded(`Login: ${result.steps.join('; ') || 'completed'}`, { steps: result.steps });
      }
      steps.push(...result.steps, result.error || 'Login template failed');
    }

    const affordance = await this.findLoginAffordance(driver);
    if (affordance) {
      await affordance.click();
      await driver.waitFor(3000);
      return succeeded('Clicked login option', { steps: [...steps, 'Clicked login option'] });
    }

    return failed('No visible login option found', 'ElementNotFound', { steps });
  }

  private async findLoginAffordance(driver: PageDriver): Promise<PageElement | null> {
    for (const selector of LOGIN_AFFORDANCE_SELECTORS) {
      const element = await driver.find(selector, { timeoutMs: 2000 });
      if (element) {
        return element;
      }
    }

    for (const candidate of await driver.queryAll('a, button')) {
      const text = await candidate.textContent();
      if (/\b(?:sign\s*in|log\s*in|login)\b/i.test(text) && (await candidate.isVisible())) {
        return candidate;
      }
    }
    return null;
  }

  /**
   * FillForm: fill key=value pairs; with no pairs, submit the form
   */
  private async fillForm(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const fields = parseFieldPairs(action.value);
    const submit = Object.keys(fields).length === 0;
    const payload: TemplatePayload = submit ? { submit: 'true' } : { ...fields };

    if (this.templates) {
      const result = await this.templates.execute('form_filling', driver, payload);
      if (!result.success) {
        return failed(result.error || 'Form filling failed', 'ElementNotFound', { steps: result.steps });
      }
      return succeeded(`${submit ? 'Submitted' : 'Filled'} ${action.target || 'form'}`, { steps: result.steps });
    }

    if (submit) {
      await driver.pressKey('Enter');
      return succeeded(`Submitted ${action.target || 'form'}`);
    }

    const filled: string[] = [];
    for (const [field, value] of Object.entries(fields)) {
      const resolved = await resolveInput(driver, field, this.strategy);
      if (resolved) {
        await resolved.element.fill(value);
        filled.push(field);
      }
    }
    if (filled.length === 0) {
      return failed('No matching form fields found', 'ElementNotFound');
    }
    return succeeded(`Filled ${filled.join(', ')}`, { fields: filled });
  }

  /**
   * Custom: start quiz-like items, or click the first element matching a keyword.
   * The score target is always reported.
   */
  private async custom(action: Action, driver: PageDriver): Promise<ExecutionOutcome> {
    const target = action.target || 'task';
    const score = action.value || '100%';

    if (QUIZ_VOCABULARY.test(target)) {
      const starts: PageElement[] = [];
      for (const candidate of await driver.queryAll(QUIZ_START_SELECTOR)) {
        if (starts.length < MAX_QUIZ_STARTS && !starts.includes(candidate) && (await candidate.isVisible())) {
          starts.push(candidate);
        }
      }
      if (starts.length === 0) {
        return failed(`No start buttons found for ${target} (target score ${score})`, 'ElementNotFound', { score });
      }
      for (const start of starts) {
        await start.click();
        await driver.waitFor(1000);
      }
      return succeeded(`Started ${starts.length} item(s) for ${target}, targeting ${score} score`, { score, started: starts.length });
    }

    for (const keyword of keyTerms(target).filter(term => term.length > 2)) {
      const quoted = quoteSelectorValue(keyword);
      const element = await findFirstVisible(driver, [
        `text=${quoted}`,
        `[aria-label*=${quoted} i]`,
        `[title*=${quoted} i]`,
      ]);
      if (element) {
        await element.click();
        return succeeded(`Clicked "${keyword}" for ${target}, targeting ${score} score`, { score, keyword });
      }
    }

    return failed(`Could not find anything to act on for ${target} (target score ${score})`, 'ElementNotFound', { score });
  }
}
