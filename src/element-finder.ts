import { PageDriver, PageElement } from './page-driver';
import { logger } from './logger';
import patterns from './data/element-patterns.json';

export type ButtonType = keyof typeof patterns.buttons;

/**
 * Pluggable semantic lookup tried before plain text matching
 */
export interface ElementLocatorStrategy {
  findByDescription(driver: PageDriver, description: string): Promise<PageElement | null>;
}

export interface LoginElements {
  username: PageElement | null;
  password: PageElement | null;
  submit: PageElement | null;
}

/**
 * How an element was resolved, for outcome messages
 */
export type ResolutionMethod = 'smart' | 'exact-text' | 'partial-text' | 'attribute' | 'first-input';

export interface ResolvedElement {
  element: PageElement;
  method: ResolutionMethod;
}

/**
 * Quote a value for use inside a selector
 */
export function quoteSelectorValue(value: string): string {
  return JSON.stringify(value);
}

/**
 * Return the first visible element matched by any selector, in order
 * @param driver Page driver
 * @param selectors Candidate selectors
 * @returns First visible element or null
 */
export async function findFirstVisible(driver: PageDriver, selectors: readonly string[]): Promise<PageElement | null> {
  for (const selector of selectors) {
    const candidates = await driver.queryAll(selector);
    for (const candidate of candidates) {
      if (await candidate.isVisible()) {
        return candidate;
      }
    }
  }
  return null;
}

/**
 * Key terms of an element description with generic words removed
 * @param description e.g. "the search box"
 * @returns e.g. ["search"]
 */
export function keyTerms(description: string): string[] {
  return description
    .toLowerCase()
    .split(/[^a-z0-9_-]+/)
    .filter(term => term.length > 1 && !patterns.genericInputTerms.includes(term));
}

/**
 * Heuristic element detection driven by attribute and text patterns
 */
export class SmartElementDetector implements ElementLocatorStrategy {
  /**
   * Find an element from a human description using accessible attributes
   * @param driver Page driver
   * @param description Element description such as "search box" or "login button"
   * @returns Matching element or null
   */
  async findByDescription(driver: PageDriver, description: string): Promise<PageElement | null> {
    const text = description.trim();
    if (!text) {
      return null;
    }

    const lower = text.toLowerCase();
    if (/\b(?:password|passcode)\b/.test(lower)) {
      const password = await findFirstVisible(driver, patterns.login.password);
      if (password) {
        return password;
      }
    }
    if (/\b(?:username|user name|email|e-mail)\b/.test(lower)) {
      const username = await findFirstVisible(driver, patterns.login.username);
      if (username) {
        return username;
      }
    }

    const quoted = quoteSelectorValue(text);
    const selectors = [
      `[aria-label=${quoted} i]`,
      `[placeholder=${quoted} i]`,
      `[title=${quoted} i]`,
      `[name=${quoted} i]`,
      `button:has-text(${quoted})`,
      `a:has-text(${quoted})`,
      `[role="button"]:has-text(${quoted})`,
      `input[value=${quoted} i]`,
    ];

    const element = await findFirstVisible(driver, selectors);
    if (element) {
      logger.debug(`Smart detector matched "${text}"`);
    }
    return element;
  }

  /**
   * Find login form elements
   * @param driver Page driver
   * @returns Username, password and submit elements (each may be null)
   */
  async findLoginElements(driver: PageDriver): Promise<LoginElements> {
    return {
      username: await findFirstVisible(driver, patterns.login.username),
      password: await findFirstVisible(driver, patterns.login.password),
      submit: await findFirstVisible(driver, patterns.login.submit),
    };
  }

  /**
   * Find common form fields keyed by field name
   * @param driver Page driver
   * @returns Map of field name to element (null when absent)
   */
  async findFormElements(driver: PageDriver): Promise<Record<string, PageElement | null>> {
    const elements: Record<string, PageElement | null> = {};
    for (const [field, selectors] of Object.entries(patterns.form)) {
      elements[field] = await findFirstVisible(driver, selectors);
    }
    return elements;
  }

  /**
   * Find buttons whose text matches a button category
   * @param driver Page driver
   * @param buttonType Category such as submit or search
   * @returns Visible matching buttons in pattern order
   */
  async findButtonsByText(driver: PageDriver, buttonType: ButtonType): Promise<PageElement[]> {
    const buttons: PageElement[] = [];
    for (const text of patterns.buttons[buttonType]) {
      const quoted = quoteSelectorValue(text);
      const selectors = [
        `button:has-text(${quoted})`,
        `input[value*=${quoted} i]`,
        `a:has-text(${quoted})`,
        `[role="button"]:has-text(${quoted})`,
      ];
      for (const selector of selectors) {
        for (const candidate of await driver.queryAll(selector)) {
          if (await candidate.isVisible()) {
            buttons.push(candidate);
          }
        }
      }
    }
    return buttons;
  }
}

/**
 * Resolve a described element: smart finder, then exact text, then partial text
 * @param driver Page driver
 * @param description Target description
 * @param strategy Optional semantic finder
 * @returns The element and how it was found, or null
 */
export async function resolveElement(
  driver: PageDriver,
  description: string,
  strategy?: ElementLocatorStrategy
): Promise<ResolvedElement | null> {
  if (strategy) {
    const element = await strategy.findByDescription(driver, description);
    if (element) {
      return { element, method: 'smart' };
    }
  }

  const exact = await driver.findByText(description, true);
  if (exact) {
    return { element: exact, method: 'exact-text' };
  }

  const partial = await driver.findByText(description, false);
  if (partial) {
    return { element: partial, method: 'partial-text' };
  }

  return null;
}

/**
 * Build attribute selectors for an input from the key terms of its description
 * @param description e.g. "search box"
 * @returns Selectors in lookup order
 */
export function inputSelectorsFor(description: string): string[] {
  return keyTerms(description).flatMap(term => {
    const quoted = quoteSelectorValue(term);
    return [
      `input[name*=${quoted} i]`,
      `input[id*=${quoted} i]`,
      `input[placeholder*=${quoted} i]`,
      `textarea[name*=${quoted} i]`,
      `[aria-label*=${quoted} i]`,
    ];
  });
}

export const FIRST_TEXT_INPUT = 'input[type="text"], input[type="search"], input:not([type]), textarea';

/**
 * Resolve an input field: smart finder, then attribute selectors, then the first visible text input
 * @param driver Page driver
 * @param description Field description
 * @param strategy Optional semantic finder
 * @returns The input and how it was found, or null
 */
export async function resolveInput(
  driver: PageDriver,
  description: string,
  strategy?: ElementLocatorStrategy
): Promise<ResolvedElement | null> {
  if (strategy) {
    const element = await strategy.findByDescription(driver, description);
    if (element) {
      return { element, method: 'smart' };
    }
  }

  const byAttribute = await findFirstVisible(driver, inputSelectorsFor(description));
  if (byAttribute) {
    return { element: byAttribute, method: 'attribute' };
  }

  const first = await findFirstVisible(driver, [FIRST_TEXT_INPUT]);
  return first ? { element: first, method: 'first-input' } : null;
}
