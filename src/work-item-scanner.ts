import { logger as defaultLogger, Logger } from './logger';
import { PageDriver, PageElement } from './page-driver';
import { TaskStatus, WorkItem } from './types';

// Card and list-item selectors, most specific first
export const CARD_SELECTORS = [
  '.quiz-item',
  '.assessment-item',
  '.test-item',
  '.skill-test',
  '.challenge-item',
  "[data-testid*='quiz']",
  '.card',
  '.list-item',
  '.assessment-card',
];

export const TITLE_SELECTOR = 'h1, h2, h3, h4, .title, .name';
export const START_SELECTOR = 'button, a, .start-btn, .take-test';

const TEXT_COMPLETED = [/[✓✔]/, /(?<!not\s)\bcompleted\b/, /\b100\s*%/, /\bpassed\b/, /\bdone\b/];
const TEXT_IN_PROGRESS = [/\bin progress\b/, /(?<!not\s)\bstarted\b/, /\bcontinue\b/];
const TEXT_RETAKE = [/\bfailed\b/, /\bretake\b/, /\btry again\b/];

const CLASS_COMPLETED = /^(?:is-)?(?:completed?|done|passed|finished)$/;
const CLASS_IN_PROGRESS = /^(?:is-)?(?:in-progress|in_progress|inprogress|started|partial|ongoing)$/;
const CLASS_RETAKE = /^(?:is-)?(?:failed|retake|try-again)$/;

/**
 * Classify a work item from its text and class attribute.
 * Text markers always win over class markers; the first satisfied rule decides.
 * @param text Visible text of the item
 * @param className Class attribute of the item
 * @returns Completion status
 */
export function classifyText(text: string, className: string): TaskStatus {
  const lower = text.toLowerCase();
  if (TEXT_COMPLETED.some(marker => marker.test(lower))) {
    return TaskStatus.COMPLETED;
  }
  if (TEXT_IN_PROGRESS.some(marker => marker.test(lower))) {
    return TaskStatus.IN_PROGRESS;
  }
  if (TEXT_RETAKE.some(marker => marker.test(lower))) {
    return TaskStatus.RETAKE_AVAILABLE;
  }

  const tokens = className.toLowerCase().split(/\s+/).filter(Boolean);
  if (tokens.some(token => CLASS_COMPLETED.test(token))) {
    return TaskStatus.COMPLETED;
  }
  if (tokens.some(token => CLASS_IN_PROGRESS.test(token))) {
    return TaskStatus.IN_PROGRESS;
  }
  if (tokens.some(token => CLASS_RETAKE.test(token))) {
    return TaskStatus.RETAKE_AVAILABLE;
  }
  return TaskStatus.NOT_STARTED;
}

/**
 * Classify a work-item element by completion status
 * @param element Card element
 * @returns Completion status
 */
export async function classify(element: PageElement): Promise<TaskStatus> {
  const text = await element.textContent();
  const className = (await element.getAttribute('class')) || '';
  return classifyText(text, className);
}

/**
 * Statuses that still need work
 */
export function isIncomplete(status: TaskStatus): boolean {
  return status === TaskStatus.NOT_STARTED
    || status === TaskStatus.IN_PROGRESS
    || status === TaskStatus.RETAKE_AVAILABLE;
}

/**
 * Work-Item Scanner: enumerates and classifies items on the current page
 */
export class WorkItemScanner {
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  /**
   * Scan the current page for work items
   * @param driver Page driver
   * @returns Items in page order, freshly classified
   */
  async scan(driver: PageDriver): Promise<WorkItem[]> {
    const source = driver.currentUrl();
    const items: WorkItem[] = [];
    const seen = new Set<string>();

    for (const selector of CARD_SELECTORS) {
      const cards = await driver.queryAll(selector);
      for (let index = 0; index < cards.length; index++) {
        const card = cards[index];
        const text = await card.textContent();
        if (!text || seen.has(text)) {
          continue;
        }
        seen.add(text);
        items.push(await this.toWorkItem(card, `${selector} >> nth=${index}`, source));
      }
    }

    this.logger.info(`Found ${items.length} work item(s) on ${source}`);
    return items;
  }

  /**
   * Classify a card element; exposed for callers holding an element
   */
  async classify(element: PageElement): Promise<TaskStatus> {
    return classify(element);
  }

  private async toWorkItem(card: PageElement, reference: string, source: string): Promise<WorkItem> {
    const titleElement = await card.find(TITLE_SELECTOR);
    const title = (titleElement && (await titleElement.textContent())) || 'Unknown';
    const start = await card.find(START_SELECTOR);
    const href = (start && (await start.getAttribute('href'))) || (await card.getAttribute('href'));
    const url = href ? this.resolveHref(href, source) : null;
    const status = await classify(card);

    if (url) {
      return { title, locator: url, status, source };
    }
    return {
      title,
      locator: reference,
      status,
      source,
      ...(start ? { startSelector: `${reference} >> ${START_SELECTOR}` } : {}),
    };
  }

  /**
   * Resolve a link against the page URL; in-page anchors and script links are not locations
   */
  private resolveHref(href: string, source: string): string | null {
    const trimmed = href.trim();
    if (!trimmed || trimmed.startsWith('#') || trimmed.toLowerCase().startsWith('javascript:')) {
      return null;
    }
    try {
      return new URL(trimmed, source).toString();
    } catch (error) {
      this.logger.debug(`Ignoring unresolvable link ${trimmed}`, error);
      return null;
    }
  }
}

// Export default scanner instance
export default new WorkItemScanner();
