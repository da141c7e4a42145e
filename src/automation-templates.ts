import { PageDriver, PageElement } from './page-driver';
import { SmartElementDetector, findFirstVisible, resolveInput } from './element-finder';
import { errorMessage, isTimeoutError } from './errors';
import { logger } from './logger';
import { SiteNavigator } from './site-navigator';

/**
 * Loosely-typed template input (site, method, credentials, form fields, query)
 */
export type TemplatePayload = Record<string, string | undefined>;

export interface TemplateResult {
  success: boolean;
  steps: string[];
  error?: string;
}

/**
 * Collaborator that runs named multi-step workflows
 */
export interface TemplateRunner {
  execute(name: string, driver: PageDriver, payload: TemplatePayload): Promise<TemplateResult>;
}

type Template = (driver: PageDriver, payload: TemplatePayload) => Promise<TemplateResult>;

const LOGIN_LINK_SELECTORS = [
  'a:has-text("Sign in")',
  'a:has-text("Login")',
  'a:has-text("Log in")',
  'button:has-text("Sign in")',
  'button:has-text("Login")',
  'button:has-text("Log in")',
  'a[href*="login"]',
  'a[href*="signin"]',
];

const SEARCH_INPUT_SELECTORS = [
  'input[name*="search"]',
  'input[id*="search"]',
  'input[placeholder*="search" i]',
  'input[type="search"]',
  'input[name="q"]',
];

const SUCCESS_INDICATORS = ['dashboard', 'profile', 'account', 'welcome', 'logout'];
const FAILURE_INDICATORS = ['invalid', 'incorrect', 'error', 'failed', 'try again'];

function onLoginPage(url: string): boolean {
  const lower = url.toLowerCase();
  return lower.includes('login') || lower.includes('signin') || lower.includes('auth');
}

/**
 * Pre-built workflows for common page tasks
 */
export class AutomationTemplates implements TemplateRunner {
  private detector: SmartElementDetector;
  private navigator: SiteNavigator;
  private templates: Record<string, Template>;

  /**
   * Create the template collection
   * @param detector Element detector used to locate fields
   * @param navigator Used to spot the sign-in method a page offers
   */
  constructor(detector: SmartElementDetector = new SmartElementDetector(), navigator: SiteNavigator = new SiteNavigator()) {
    this.detector = detector;
    this.navigator = navigator;
    this.templates = {
      login: (driver, payload) => this.loginTemplate(driver, payload),
      form_filling: (driver, payload) => this.formFillingTemplate(driver, payload),
      search: (driver, payload) => this.searchTemplate(driver, payload),
    };
  }

  /**
   * Names of the available templates
   */
  getAvailableTemplates(): string[] {
    return Object.keys(this.templates);
  }

  /**
   * Execute a template by name
   * @param name Template name
   * @param driver Page driver
   * @param payload Template input
   * @returns Template result; faults are reported in `error`
   */
  async execute(name: string, driver: PageDriver, payload: TemplatePayload): Promise<TemplateResult> {
    const template = Object.hasOwn(this.templates, name) ? this.templates[name] : undefined;
    if (!template) {
      return { success: false, steps: [], error: `Template ${name} not found` };
    }

    try {
      return await template(driver, payload);
    } catch (error) {
      logger.error(`Template ${name} failed:`, error);
      return { success: false, steps: [], error: errorMessage(error) };
    }
  }

  /**
   * Login: open the login form if needed, fill credentials, submit and read the result
   */
  private async loginTemplate(driver: PageDriver, payload: TemplatePayload): Promise<TemplateResult> {
    const steps: string[] = [];

    let method = payload.method;
    if (!method && !payload.username) {
      // Without credentials, follow whichever provider the page offers
      const detected = await this.navigator.detectAuthenticationMethod(driver);
      if (detected && detected !== 'username') {
        steps.push(`Detected ${detected} sign-in`);
        method = detected;
      }
    }

    if (method && method !== 'username') {
      const provider = await findFirstVisible(driver, [
        `button:has-text(${JSON.stringify(`Continue with ${method}`)})`,
        `button:has-text(${JSON.stringify(`Sign in with ${method}`)})`,
        `[aria-label*=${JSON.stringify(method)} i]`,
      ]);
      if (provider) {
        await provider.click();
        steps.push(`Clicked ${method} sign-in`);
        return { success: true, steps };
      }
      steps.push(`No ${method} sign-in button found`);
    }

    let linkClicked = false;
    if (!onLoginPage(driver.currentUrl())) {
      const link = await findFirstVisible(driver, LOGIN_LINK_SELECTORS);
      if (link) {
        await link.click();
        await driver.waitFor(2000);
        linkClicked = true;
        steps.push('Clicked login link');
      }
    }

    const elements = await this.detector.findLoginElements(driver);
    if (!elements.username && !elements.password) {
      if (linkClicked) {
        return { success: true, steps: [...steps, 'Login page opened'] };
      }
      return { success: false, steps, error: 'No login form or login link found' };
    }

    if (!payload.username || !payload.password) {
      steps.push('Login form found; credentials not supplied');
      return { success: true, steps };
    }

    if (elements.username) {
      await elements.username.fill(payload.username);
      steps.push('Username/email filled');
    }

    let password: PageElement | null = elements.password;
    if (!password) {
      // Two-step forms show the password field after "Next"
      const next = await this.findNextButton(driver);
      if (next) {
        await next.click();
        await driver.waitFor(2000);
        steps.push('Clicked Next after username');
        password = (await this.detector.findLoginElements(driver)).password;
      }
    }

    if (password) {
      await password.fill(payload.password);
      steps.push('Password filled');
    }

    if (elements.submit) {
      await elements.submit.click();
      steps.push('Login submitted');
    } else if (password) {
      await password.press('Enter');
      steps.push('Login submitted via Enter key');
    }

    try {
      await driver.waitForLoadState('networkidle', 15000);
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
      steps.push('Network did not settle after login');
    }

    const url = driver.currentUrl().toLowerCase();
    const content = (await driver.content()).toLowerCase();
    if (SUCCESS_INDICATORS.some(indicator => url.includes(indicator) || content.includes(indicator))) {
      steps.push('Login appears successful');
      return { success: true, steps };
    }
    if (FAILURE_INDICATORS.some(indicator => content.includes(indicator))) {
      steps.push('Login appears to have failed');
      return { success: false, steps, error: 'Login rejected' };
    }
    steps.push('Login completed (status unclear)');
    return { success: true, steps };
  }

  /**
   * Form filling: fill detected fields from the payload, optionally submitting
   */
  private async formFillingTemplate(driver: PageDriver, payload: TemplatePayload): Promise<TemplateResult> {
    const steps: string[] = [];
    const known = await this.detector.findFormElements(driver);

    for (const [field, value] of Object.entries(payload)) {
      if (field === 'submit' || value === undefined) {
        continue;
      }
      const element = known[field] || (await resolveInput(driver, field))?.element;
      if (!element) {
        steps.push(`No field found for ${field}`);
        continue;
      }
      await element.fill(value);
      steps.push(`Filled ${field}`);
    }

    const filled = steps.filter(step => step.startsWith('Filled')).length;

    if (payload.submit === 'true') {
      const [submit] = await this.detector.findButtonsByText(driver, 'submit');
      if (submit) {
        await submit.click();
        steps.push('Form submitted');
      } else {
        await driver.pressKey('Enter');
        steps.push('Form submitted via Enter key');
      }
      return { success: true, steps };
    }

    if (filled === 0) {
      return { success: false, steps, error: 'No matching form fields found' };
    }
    return { success: true, steps };
  }

  /**
   * Search: fill the site's search input and submit
   */
  private async searchTemplate(driver: PageDriver, payload: TemplatePayload): Promise<TemplateResult> {
    const query = payload.query || '';
    if (!query) {
      return { success: false, steps: [], error: 'No search query provided' };
    }

    const input = await findFirstVisible(driver, SEARCH_INPUT_SELECTORS);
    if (!input) {
      return { success: false, steps: [], error: 'Search input not found' };
    }

    await input.fill(query);
    await input.press('Enter');
    const steps = [`Entered search query: ${query}`, 'Search submitted'];

    try {
      await driver.waitForLoadState('networkidle', 10000);
    } catch (error) {
      if (!isTimeoutError(error)) {
        throw error;
      }
    }
    return { success: true, steps };
  }

  private async findNextButton(driver: PageDriver): Promise<PageElement | null> {
    for (const button of await this.detector.findButtonsByText(driver, 'submit')) {
      if ((await button.textContent()).toLowerCase().includes('next')) {
        return button;
      }
    }
    return null;
  }
}

// Export default template collection
export default new AutomationTemplates();
