import { findFirstVisible, quoteSelectorValue } from './element-finder';
import { logger as defaultLogger, Logger } from './logger';
import { PageDriver, PageElement } from './page-driver';

export type AuthenticationMethod = 'google' | 'facebook' | 'github' | 'username';

export interface NavigationMatch {
  name: string;
  selector: string;
  element: PageElement;
}

const AUTH_INDICATORS: Array<[AuthenticationMethod, string[]]> = [
  ['google', ['Sign in with Google', 'Google Login', 'Continue with Google']],
  ['facebook', ['Sign in with Facebook', 'Facebook Login', 'Continue with Facebook']],
  ['github', ['Sign in with GitHub', 'GitHub Login', 'Continue with GitHub']],
  ['username', ['Username', 'Email', 'Login', 'Sign In']],
];

const SECTION_NAMES = new Map<string, string[]>([
  ['quiz', ['Skills', 'Assessments', 'Tests', 'Quizzes']],
  ['test', ['Skills', 'Assessments', 'Tests', 'Quizzes']],
  ['assessment', ['Assessments', 'Skills', 'Tests']],
  ['exam', ['Exams', 'Assessments', 'Tests']],
  ['course', ['Courses', 'Learning', 'Training']],
  ['assignment', ['Assignments', 'My Assignments', 'Courses']],
  ['job', ['Jobs', 'Opportunities', 'Positions']],
  ['profile', ['Profile', 'Account', 'Settings']],
]);

/**
 * Reduce a word to the singular key used in the section map
 */
function singular(word: string): string {
  if (word.endsWith('zes')) {
    return word.slice(0, -3);
  }
  return word.endsWith('s') ? word.slice(0, -1) : word;
}

/**
 * Site-level navigation helpers: menus, sign-in methods and task sections
 */
export class SiteNavigator {
  private logger: Logger;

  constructor(logger: Logger = defaultLogger) {
    this.logger = logger;
  }

  /**
   * Find a navigation item by any of its possible names
   * @param driver Page driver
   * @param names Candidate labels in preference order
   * @returns The first visible match, or null
   */
  async findNavigationItem(driver: PageDriver, names: string[]): Promise<NavigationMatch | null> {
    for (const name of names) {
      const quoted = quoteSelectorValue(name);
      const selectors = [
        `a:has-text(${quoted})`,
        `button:has-text(${quoted})`,
        `[role="menuitem"]:has-text(${quoted})`,
        `nav a:has-text(${quoted})`,
        `.nav-item:has-text(${quoted})`,
        `.menu-item:has-text(${quoted})`,
      ];
      for (const selector of selectors) {
        const element = await findFirstVisible(driver, [selector]);
        if (element) {
          this.logger.info(`Found navigation item: ${name}`);
          return { name, selector, element };
        }
      }
    }

    this.logger.debug(`No navigation item found for ${names.join(', ')}`);
    return null;
  }

  /**
   * Detect which sign-in method the current page offers
   * @param driver Page driver
   * @returns Method name, or null when no sign-in affordance is visible
   */
  async detectAuthenticationMethod(driver: PageDriver): Promise<AuthenticationMethod | null> {
    for (const [method, texts] of AUTH_INDICATORS) {
      const selectors = texts.map(text => `text=${quoteSelectorValue(text)}`);
      if (await findFirstVisible(driver, selectors)) {
        return method;
      }
    }
    return null;
  }

  /**
   * Find the site section a task description refers to
   * @param driver Page driver
   * @param taskDescription e.g. "complete my quizzes"
   * @returns Matching navigation item, or null
   */
  async findRelevantSection(driver: PageDriver, taskDescription: string): Promise<NavigationMatch | null> {
    const keywords = taskDescription.toLowerCase().split(/[^a-z]+/).filter(Boolean);
    for (const keyword of keywords) {
      const names = SECTION_NAMES.get(singular(keyword));
      if (!names) {
        continue;
      }
      const match = await this.findNavigationItem(driver, names);
      if (match) {
        return match;
      }
    }
    return null;
  }
}

// Export default navigator instance
export default new SiteNavigator();
