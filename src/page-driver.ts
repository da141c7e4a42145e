import { Browser, Locator, Page, firefox } from 'playwright';
import { AgentConfig } from './config';
import { isTimeoutError, toAgentError } from './errors';

export type LoadState = 'load' | 'domcontentloaded' | 'networkidle';

export interface FindOptions {
  timeoutMs?: number;
  // Require the element to be visible (default true)
  visible?: boolean;
}

/**
 * Handle to one element on the page
 */
export interface PageElement {
  click(): Promise<void>;
  fill(text: string): Promise<void>;
  clear(): Promise<void>;
  type(text: string): Promise<void>;
  press(key: string): Promise<void>;
  textContent(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  isVisible(): Promise<boolean>;
  scrollIntoView(): Promise<void>;
  find(selector: string): Promise<PageElement | null>;
}

/**
 * Page automation interface consumed by the executor, scanner and engine.
 * Lookups return null when nothing matches; other faults are thrown as AgentError.
 */
export interface PageDriver {
  navigate(url: string, timeoutMs: number): Promise<void>;
  waitForLoadState(state: LoadState, timeoutMs: number): Promise<void>;
  find(selector: string, options?: FindOptions): Promise<PageElement | null>;
  findByText(text: string, exact: boolean, timeoutMs?: number): Promise<PageElement | null>;
  queryAll(selector: string): Promise<PageElement[]>;
  pressKey(key: string): Promise<void>;
  currentUrl(): string;
  title(): Promise<string>;
  content(): Promise<string>;
  screenshot(path: string): Promise<void>;
  waitFor(ms: number): Promise<void>;
}

const DEFAULT_FIND_TIMEOUT = 2000;

/**
 * Playwright locator wrapped as a PageElement
 */
export class PlaywrightElement implements PageElement {
  private locator: Locator;
  private timeoutMs: number;

  constructor(locator: Locator, timeoutMs: number) {
    this.locator = locator;
    this.timeoutMs = timeoutMs;
  }

  async click(): Promise<void> {
    await this.run('click', () => this.locator.click({ timeout: this.timeoutMs }));
  }

  async fill(text: string): Promise<void> {
    await this.run('fill', () => this.locator.fill(text, { timeout: this.timeoutMs }));
  }

  async clear(): Promise<void> {
    await this.run('clear', () => this.locator.clear({ timeout: this.timeoutMs }));
  }

  async type(text: string): Promise<void> {
    await this.run('type', () => this.locator.pressSequentially(text, { delay: 50, timeout: this.timeoutMs }));
  }

  async press(key: string): Promise<void> {
    await this.run('press', () => this.locator.press(key, { timeout: this.timeoutMs }));
  }

  async textContent(): Promise<string> {
    const text = await this.run('textContent', () => this.locator.textContent({ timeout: this.timeoutMs }));
    return (text || '').trim();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.run('getAttribute', () => this.locator.getAttribute(name, { timeout: this.timeoutMs }));
  }

  async isVisible(): Promise<boolean> {
    return this.run('isVisible', () => this.locator.isVisible());
  }

  async scrollIntoView(): Promise<void> {
    await this.run('scrollIntoView', () => this.locator.scrollIntoViewIfNeeded({ timeout: this.timeoutMs }));
  }

  async find(selector: string): Promise<PageElement | null> {
    const child = this.locator.locator(selector).first();
    const count = await this.run(`find ${selector}`, () => child.count());
    return count > 0 ? new PlaywrightElement(child, this.timeoutMs) : null;
  }

  private async run<T>(step: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toAgentError(error, step);
    }
  }
}

/**
 * Playwright page wrapped as a PageDriver
 */
export class PlaywrightDriver implements PageDriver {
  private page: Page;
  private timeoutMs: number;

  /**
   * Create a new driver
   * @param page Playwright page object
   * @param timeoutMs Timeout for element interactions
   */
  constructor(page: Page, timeoutMs: number) {
    this.page = page;
    this.timeoutMs = timeoutMs;
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    try {
      await this.page.goto(url, { timeout: timeoutMs, waitUntil: 'commit' });
    } catch (error) {
      throw toAgentError(error, `navigate ${url}`);
    }
  }

  async waitForLoadState(state: LoadState, timeoutMs: number): Promise<void> {
    try {
      await this.page.waitForLoadState(state, { timeout: timeoutMs });
    } catch (error) {
      throw toAgentError(error, `wait for ${state}`);
    }
  }

  async find(selector: string, options: FindOptions = {}): Promise<PageElement | null> {
    const locator = this.page.locator(selector).first();
    return this.waitForLocator(locator, selector, options);
  }

  async findByText(text: string, exact: boolean, timeoutMs: number = DEFAULT_FIND_TIMEOUT): Promise<PageElement | null> {
    const locator = this.page.getByText(text, { exact }).first();
    return this.waitForLocator(locator, `text ${text}`, { timeoutMs });
  }

  async queryAll(selector: string): Promise<PageElement[]> {
    const locator = this.page.locator(selector);
    try {
      const count = await locator.count();
      return Array.from({ length: count }, (_, index) => new PlaywrightElement(locator.nth(index), this.timeoutMs));
    } catch (error) {
      throw toAgentError(error, `query ${selector}`);
    }
  }

  async pressKey(key: string): Promise<void> {
    try {
      await this.page.keyboard.press(key);
    } catch (error) {
      throw toAgentError(error, `press ${key}`);
    }
  }

  currentUrl(): string {
    return this.page.url();
  }

  async title(): Promise<string> {
    try {
      return await this.page.title();
    } catch (error) {
      throw toAgentError(error, 'title');
    }
  }

  async content(): Promise<string> {
    try {
      return await this.page.locator('body').innerText({ timeout: this.timeoutMs });
    } catch (error) {
      throw toAgentError(error, 'content');
    }
  }

  async screenshot(path: string): Promise<void> {
    try {
      await this.page.screenshot({ path, fullPage: true });
    } catch (error) {
      throw toAgentError(error, 'screenshot');
    }
  }

  async waitFor(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  private async waitForLocator(locator: Locator, label: string, options: FindOptions): Promise<PageElement | null> {
    const timeout = options.timeoutMs ?? DEFAULT_FIND_TIMEOUT;
    try {
      await locator.waitFor({ state: options.visible === false ? 'attached' : 'visible', timeout });
      return new PlaywrightElement(locator, this.timeoutMs);
    } catch (error) {
      // Only a lookup that ran out of time means "not there"
      if (isTimeoutError(error)) {
        return null;
      }
      throw toAgentError(error, `find ${label}`);
    }
  }
}

/**
 * Open browser and page handed to the CLI
 */
export interface BrowserSession {
  browser: Browser;
  page: Page;
  driver: PlaywrightDriver;
  close(): Promise<void>;
}

/**
 * Launch a browser configured from the agent config
 * @param config Agent configuration
 * @returns Browser, page and driver
 */
export async function launchBrowser(config: AgentConfig): Promise<BrowserSession> {
  const browser = await firefox.launch({
    headless: config.browser.headless,
    slowMo: config.browser.slowMo,
  });

  const page = await browser.newPage({
    viewport: { width: 1280, height: 800 },
    userAgent: config.browser.userAgent,
  });
  page.setDefaultTimeout(config.browser.defaultTimeout);
  page.setDefaultNavigationTimeout(config.browser.navigationTimeout);

  return {
    browser,
    page,
    driver: new PlaywrightDriver(page, config.browser.defaultTimeout),
    close: () => browser.close(),
  };
}
