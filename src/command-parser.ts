import config from './config';
import { logger as defaultLogger, Logger } from './logger';
import { Action, ActionKind, createAction } from './types';

/**
 * Result of parsing one command, including the fragments nothing understood
 */
export interface ParseResult {
  actions: Action[];
  unparsed: string[];
  suggestions: string[];
}

/**
 * One family of patterns producing a single kind of action
 */
export interface ActionMatcher {
  family: string;
  match(fragment: string): Action | null;
}

export interface CommandParserOptions {
  // Turn any unmatched fragment longer than five characters into a search
  searchFallback?: boolean;
  logger?: Logger;
}

// Verbs that start a new step after a bare comma or "and"
const ACTION_VERBS = [
  'find', 'see', 'take', 'click', 'go', 'navigate', 'open', 'visit', 'login', 'log', 'sign',
  'search', 'look', 'type', 'enter', 'fill', 'submit', 'wait', 'scroll', 'press', 'select',
  'complete', 'finish', 'extract', 'get', 'download', 'upload',
];

const VERB_AHEAD = `(?=(?:${ACTION_VERBS.join('|')})\\b)`;

// Applied in order; later separators see the pieces produced by earlier ones
const SEPARATORS: RegExp[] = [
  /\s*,\s*and\s+then\s+/i,
  /\s+and\s+then\s+/i,
  /\s*,\s*then\s+/i,
  /\s+then\s+/i,
  /\s*,\s*and\s+/i,
  /\s*;\s*/,
  /\s*,?\s+after\s+that\s*,?\s+/i,
  new RegExp(`\\s*,?\\s+next\\s*,?\\s+${VERB_AHEAD}`, 'i'),
  /\s*,?\s+afterwards\s*,?\s+/i,
  new RegExp(`\\s*,\\s*${VERB_AHEAD}`, 'i'),
  new RegExp(`\\s+and\\s+${VERB_AHEAD}`, 'i'),
];

const LEADING_CONJUNCTION = /^(?:(?:and\s+then|and|then|after\s+that|afterwards|next)\b[\s,]*)+/i;
const TRAILING_CONJUNCTION = /(?:[\s,]+(?:and\s+then|and|then))+$/i;

const FILLER_PREFIX = /^(?:(?:please|now|also|first|finally|so|okay|ok|just|we\s+need\s+to|we\s+want\s+to|i\s+want\s+to|i\s+need\s+to|i'd\s+like\s+to|you\s+should|can\s+you|could\s+you|let's|lets)\s+)+/i;

const INTERACTION_NOUNS = [
  'quizzes', 'tests', 'assessments', 'exams', 'assignments',
  'account', 'profile', 'dashboard', 'settings',
  'results', 'scores', 'grades', 'progress',
];

const COMMAND_STARTERS = [
  'go to', 'click on', 'type', 'search for', 'login to',
  'take screenshot', 'scroll down', 'wait for', 'fill form',
  'download', 'upload file', 'extract', 'find', 'complete',
];

const SCORE = String.raw`\d+(?:\.\d+)?\s*(?:%|percent)|perfect|full\s+marks|all`;
const SCORE_SUFFIX = new RegExp(
  String.raw`\s+(?:and\s+)?(?:(?:pass|score)(?:\s+(?:them|it))?\s+)?(?:with|at|of|getting)?\s*(?:an?\s+)?(${SCORE})(?:\s+(?:scores?|marks|correct))?\s*$`,
  'i'
);

/**
 * Normalise a score phrase to a percentage; absent or unrecognised phrases mean 100%
 * @param phrase Score phrase such as "90 percent" or "perfect"
 * @returns Percentage string
 */
export function normalizeScore(phrase?: string): string {
  if (!phrase) {
    return '100%';
  }
  const numeric = phrase.match(/(\d+(?:\.\d+)?)\s*(?:%|percent)/i);
  if (numeric) {
    return `${numeric[1]}%`;
  }
  return '100%';
}

/**
 * Check whether a token looks like a URL or a bare domain
 */
export function isUrlLike(token: string): boolean {
  const candidate = token.trim().replace(/[.,;!?]+$/, '');
  if (/\s/.test(candidate)) {
    return false;
  }
  if (/^(?:https?:\/\/|www\.)/i.test(candidate)) {
    return true;
  }
  return /^(?:localhost|[a-z0-9-]+(?:\.[a-z0-9-]+)*\.[a-z]{2,})(?::\d+)?(?:[/?#].*)?$/i.test(candidate);
}

/**
 * Turn a bare domain into a fully-qualified URL.
 * Two-label hosts without a scheme or leading www. get "https://www."; others get "https://".
 * @param raw Domain or URL as typed
 * @returns Fully-qualified URL
 */
export function normalizeUrl(raw: string): string {
  const url = raw.trim().replace(/[.,;!?]+$/, '');
  if (/^https?:\/\//i.test(url)) {
    return url;
  }
  if (/^www\./i.test(url)) {
    return `https://${url}`;
  }
  const host = url.split(/[/?#:]/)[0];
  if (host.toLowerCase() === 'localhost') {
    return `http://${url}`;
  }
  return host.split('.').length === 2 ? `https://www.${url}` : `https://${url}`;
}

function stripArticle(text: string): string {
  return text.trim().replace(/^(?:the|a|an|my)\s+/i, '').trim();
}

function unquote(text: string): string {
  return text.trim().replace(/^(["'])(.*)\1$/, '$2').trim();
}

/**
 * Split a custom-task phrase into its target and normalised score
 */
function splitScore(phrase: string): { target: string; score: string } {
  const suffix = phrase.match(SCORE_SUFFIX);
  if (suffix && suffix.index !== undefined && suffix.index > 0) {
    return { target: stripArticle(phrase.slice(0, suffix.index)), score: normalizeScore(suffix[1]) };
  }
  return { target: stripArticle(phrase), score: '100%' };
}

function customAction(phrase: string): Action {
  const { target, score } = splitScore(phrase);
  return createAction(ActionKind.CUSTOM, `Complete ${target} with ${score} score`, target, score);
}

function loginAction(site: string | undefined, method: string | undefined): Action {
  const target = site ? stripArticle(site) : 'current site';
  const methodText = method ? ` with ${method}` : '';
  return createAction(ActionKind.LOGIN, `Login to ${target}${methodText}`, target, method);
}

function searchAction(query: string): Action {
  const value = unquote(query);
  return createAction(ActionKind.SEARCH, `Search for '${value}'`, undefined, value);
}

function typeAction(value: string, target: string): Action {
  const text = unquote(value);
  const field = stripArticle(target);
  return createAction(ActionKind.TYPE, `Type '${text}' in ${field}`, field, text);
}

const navigateMatcher: ActionMatcher = {
  family: 'navigate',
  match(fragment) {
    const match = fragment.match(/^(?:go\s+to|navigate\s+to|visit|open|load|browse\s+to|take\s+me\s+to|head\s+to)\s+(.+)$/i);
    if (!match) {
      return null;
    }
    const destination = stripArticle(match[1]);
    if (/^(?:top|bottom)\b/i.test(destination)) {
      return null;
    }
    if (isUrlLike(destination)) {
      const url = normalizeUrl(destination);
      return createAction(ActionKind.NAVIGATE, `Navigate to ${url}`, url);
    }
    // In-page destinations ("open settings") are links to follow
    return createAction(ActionKind.CLICK, `Click on ${destination}`, destination);
  },
};

const clickMatcher: ActionMatcher = {
  family: 'click',
  match(fragment) {
    const match = fragment.match(/^(?:click|press|tap|hit|activate)\s+(?:on\s+)?(.+)$/i)
      || fragment.match(/^(?:select|choose)\s+(.+)$/i);
    if (!match) {
      return null;
    }
    const target = stripArticle(match[1]);
    return target ? createAction(ActionKind.CLICK, `Click on ${target}`, target) : null;
  },
};

const typeMatcher: ActionMatcher = {
  family: 'type',
  match(fragment) {
    const quoted = fragment.match(/^(?:type|enter|input|put|insert|write)\s+(["'])(.+?)\1\s+(?:in|into|on)\s+(.+)$/i);
    if (quoted) {
      return typeAction(quoted[2], quoted[3]);
    }

    const fill = fragment.match(/^(?:write|fill)\s+(.+?)\s+(?:in|into)\s+(.+)$/i);
    if (fill) {
      return typeAction(fill[1], fill[2]);
    }

    // Single capture: fall back to splitting on the literal " in "
    const single = fragment.match(/^(?:type|write)\s+(.+)$/i);
    if (single) {
      const parts = single[1].split(' in ');
      if (parts.length >= 2) {
        return typeAction(parts[0], parts.slice(1).join(' in '));
      }
      return typeAction(single[1], 'input field');
    }
    return null;
  },
};

const scrollMatcher: ActionMatcher = {
  family: 'scroll',
  match(fragment) {
    const direction = fragment.match(/^(?:scroll|move|page)\s+(up|down)\b/i)
      || fragment.match(/^(?:scroll\s+|go\s+|move\s+)?to\s+(?:the\s+)?(top|bottom)\b/i)
      || fragment.match(/^(?:scroll)\s+(?:to\s+)?(?:the\s+)?(top|bottom)\b/i);
    if (direction) {
      const target = direction[1].toLowerCase();
      return createAction(ActionKind.SCROLL, `Scroll ${target}`, target);
    }
    if (/^scroll$/i.test(fragment)) {
      return createAction(ActionKind.SCROLL, 'Scroll down', 'down');
    }
    const element = fragment.match(/^scroll\s+to\s+(.+)$/i);
    if (element) {
      const target = stripArticle(element[1]);
      return createAction(ActionKind.SCROLL, `Scroll to ${target}`, target);
    }
    return null;
  },
};

const waitMatcher: ActionMatcher = {
  family: 'wait',
  match(fragment) {
    const timed = fragment.match(
      /^(?:wait|pause|delay|hold|sleep)\s+(?:for\s+)?(\d+(?:\.\d+)?)\s*(milliseconds?|ms|seconds?|secs?|s|minutes?|mins?|m)?$/i
    );
    if (timed) {
      const amount = parseFloat(timed[1]);
      const unit = (timed[2] || 's').toLowerCase();
      let seconds = amount;
      if (unit === 'ms' || unit.startsWith('milli')) {
        seconds = amount / 1000;
      } else if (unit.startsWith('m')) {
        seconds = amount * 60;
      }
      const value = String(seconds);
      return createAction(ActionKind.WAIT, `Wait for ${value} seconds`, undefined, value);
    }

    const condition = fragment.match(/^(?:wait|pause)\s+(?:for|until)\s+(.+)$/i);
    if (condition) {
      const target = stripArticle(condition[1]);
      return createAction(ActionKind.WAIT, `Wait for ${target}`, target);
    }
    return null;
  },
};

const screenshotMatcher: ActionMatcher = {
  family: 'screenshot',
  match(fragment) {
    const match = fragment.match(
      /^(?:(?:take|capture|grab|save|snap)\s+(?:a\s+|an\s+)?(?:full\s+page\s+)?)?(?:screenshot|screen\s+shot|picture|image|snapshot)(?:\s+(?:of|as|named)\s+(.+))?$/i
    );
    if (!match) {
      return null;
    }
    const label = match[1] ? stripArticle(match[1]) : undefined;
    return createAction(ActionKind.SCREENSHOT, label ? `Take screenshot of ${label}` : 'Take screenshot', label);
  },
};

const extractMatcher: ActionMatcher = {
  family: 'extract',
  match(fragment) {
    const match = fragment.match(/^(?:extract|get|grab|copy|read|what\s+is|what's|show\s+me|tell\s+me)\s+(.+)$/i);
    if (!match) {
      return null;
    }
    const target = stripArticle(match[1]);
    return createAction(ActionKind.EXTRACT, `Extract ${target}`, target);
  },
};

const fillFormMatcher: ActionMatcher = {
  family: 'fill_form',
  match(fragment) {
    const fill = fragment.match(/^(?:fill|complete)\s+(?:out\s+|in\s+)?(?:the\s+)?(?:(.+?)\s+)?(?:form|fields)(?:\s+with\s+(.+))?$/i);
    if (fill) {
      const target = fill[1] ? `${stripArticle(fill[1])} form` : 'form';
      const value = fill[2] ? fill[2].trim() : undefined;
      return createAction(ActionKind.FILL_FORM, value ? `Fill ${target} with ${value}` : `Submit ${target}`, target, value);
    }

    const submit = fragment.match(/^(?:submit|send)\s+(?:the\s+)?(?:(.+?)\s+)?form$/i);
    if (submit) {
      const target = submit[1] ? `${stripArticle(submit[1])} form` : 'form';
      return createAction(ActionKind.FILL_FORM, `Submit ${target}`, target);
    }

    if (/^(?:enter|input)\s+(?:my\s+)?(?:details|information)$/i.test(fragment)) {
      return createAction(ActionKind.FILL_FORM, 'Submit form', 'form');
    }
    return null;
  },
};

const loginMatcher: ActionMatcher = {
  family: 'login',
  match(fragment) {
    const match = fragment.match(/^(?:log\s*in|login|sign\s*in|log\s+on|authenticate)(?:\s+(.*))?$/i);
    if (!match) {
      if (/^(?:enter|use)\s+(?:my\s+)?(?:credentials|login)$/i.test(fragment)) {
        return loginAction(undefined, undefined);
      }
      return null;
    }
    const rest = match[1] || '';
    const method = rest.match(/\b(?:with|using|via)\s+(?:my\s+)?([\w.-]+)/i);
    const site = rest.match(/\b(?:to|into|on|at|for)\s+(.+?)(?:\s+(?:with|using|via)\s+.+)?$/i);
    return loginAction(site ? site[1] : undefined, method ? method[1] : undefined);
  },
};

const searchMatcher: ActionMatcher = {
  family: 'search',
  match(fragment) {
    const quoted = fragment.match(/^(?:search|look)\s+(?:for\s+|up\s+)?(["'])(.+?)\1/i);
    if (quoted) {
      return searchAction(quoted[2]);
    }
    const match = fragment.match(/^search\s+(?:for\s+)?(.+)$/i)
      || fragment.match(/^(?:find|locate|look\s+for|look\s+up|lookup|query)\s+(.+)$/i);
    return match ? searchAction(stripArticle(match[1])) : null;
  },
};

const transferMatcher: ActionMatcher = {
  family: 'download_upload',
  match(fragment) {
    const download = fragment.match(/^(?:download|fetch|retrieve|export|backup)\s+(.+)$/i);
    if (download) {
      const target = stripArticle(download[1]);
      return createAction(ActionKind.DOWNLOAD, `Download ${target}`, target);
    }
    const upload = fragment.match(/^(?:upload|attach)\s+(?:file\s+)?(.+)$/i);
    if (upload) {
      const target = stripArticle(upload[1]);
      return createAction(ActionKind.UPLOAD, `Upload ${target}`, target);
    }
    if (/^(?:browse|pick)\s+(?:a\s+)?file$/i.test(fragment)) {
      return createAction(ActionKind.UPLOAD, 'Upload file', 'file');
    }
    return null;
  },
};

const customMatcher: ActionMatcher = {
  family: 'custom',
  match(fragment) {
    const match = fragment.match(/^(?:complete|finish|do|take|attempt|pass|accomplish|achieve)\s+(.+)$/i);
    return match ? customAction(match[1]) : null;
  },
};

/**
 * Matcher families in priority order; the first match wins
 */
export const ACTION_MATCHERS: readonly ActionMatcher[] = [
  navigateMatcher,
  clickMatcher,
  typeMatcher,
  scrollMatcher,
  waitMatcher,
  screenshotMatcher,
  extractMatcher,
  fillFormMatcher,
  loginMatcher,
  searchMatcher,
  transferMatcher,
  customMatcher,
];

/**
 * Strip politeness and sequencing filler that carries no action
 */
export function cleanFragment(fragment: string): string {
  return fragment
    .trim()
    .replace(FILLER_PREFIX, '')
    .replace(/\s+please$/i, '')
    .replace(/[.!?]+$/, '')
    .trim();
}

/**
 * Split a compound command into ordered fragments.
 * Quoted substrings are never split; dangling conjunctions are trimmed and
 * fragments of two characters or fewer are dropped.
 * @param command Natural-language command
 * @returns Fragments in command order
 */
export function splitCompoundCommand(command: string): string[] {
  const quoted: string[] = [];
  const protectedText = command.replace(
    /(^|\s)(["'])((?:(?!\2).)*?)\2(?=$|[\s,.;!?])/g,
    (_match: string, lead: string, quote: string, body: string) => {
      quoted.push(`${quote}${body}${quote}`);
      return `${lead}\u0000${quoted.length - 1}\u0000`;
    }
  );

  let fragments = [protectedText.trim()];
  for (const separator of SEPARATORS) {
    fragments = fragments.flatMap(fragment => fragment.split(separator));
  }

  return fragments
    .map(fragment => fragment
      .replace(LEADING_CONJUNCTION, '')
      .replace(TRAILING_CONJUNCTION, '')
      .replace(/^[\s,;]+|[\s,;]+$/g, '')
      .replace(/\u0000(\d+)\u0000/g, (_match: string, index: string) => quoted[Number(index)]))
    .map(fragment => fragment.trim())
    .filter(fragment => fragment.length > 2);
}

/**
 * Match one fragment against the matcher table
 * @param fragment Single-step fragment
 * @returns The first matching action, or null
 */
export function matchFragment(fragment: string): Action | null {
  const cleaned = cleanFragment(fragment);
  if (!cleaned) {
    return null;
  }
  for (const matcher of ACTION_MATCHERS) {
    const action = matcher.match(cleaned);
    if (action) {
      return action;
    }
  }
  return null;
}

/**
 * Secondary phrasings tried when no matcher accepted a fragment
 */
function matchComplexPhrase(fragment: string): Action | null {
  const viaProvider = fragment.match(/^(?:use|using)\s+(?:my\s+)?([\w.-]+)(?:\s+account)?\s+to\s+(?:log\s*in|login|sign\s*in)(?:\s+(?:to|on|at)\s+(.+))?$/i)
    || fragment.match(/\b(?:log\s*in|login|sign\s*in)\s+(?:with|using|via)\s+(?:my\s+)?([\w.-]+)(?:.*?\b(?:to|on|at)\s+(.+))?$/i);
  if (viaProvider) {
    return loginAction(viaProvider[2], viaProvider[1]);
  }

  const find = fragment.match(/\b(?:find|look\s+for|locate)\s+(.+)$/i)
    || fragment.match(/^see\s+(?:what\s+)?(?:i\s+)?(.+)$/i);
  if (find) {
    return searchAction(stripArticle(find[1]));
  }

  const pass = fragment.match(new RegExp(String.raw`^(.+?)\s+and\s+pass(?:\s+(?:them|it))?\s+(?:at|with)\s+(${SCORE})$`, 'i'));
  if (pass) {
    const target = stripArticle(pass[1]);
    const score = normalizeScore(pass[2]);
    return createAction(ActionKind.CUSTOM, `Complete ${target} with ${score} score`, target, score);
  }
  return null;
}

/**
 * Command Parser: natural language in, typed actions out
 */
export class CommandParser {
  private searchFallback: boolean;
  private logger: Logger;

  /**
   * Create a new parser
   * @param options Fallback behaviour and logger
   */
  constructor(options: CommandParserOptions = {}) {
    this.searchFallback = options.searchFallback ?? config.parser.searchFallback;
    this.logger = options.logger || defaultLogger;
  }

  /**
   * Parse a command into actions. Never throws.
   * @param command Natural-language command
   * @returns Ordered actions (empty when nothing was understood)
   */
  parse(command: string): Action[] {
    return this.parseDetailed(command).actions;
  }

  /**
   * Parse a command, also reporting fragments that produced no action
   * @param command Natural-language command
   * @returns Actions, unparsed fragments and suggestions
   */
  parseDetailed(command: string): ParseResult {
    const actions: Action[] = [];
    const unparsed: string[] = [];

    for (const fragment of splitCompoundCommand(command)) {
      const action = matchFragment(fragment) || this.inferAction(cleanFragment(fragment), actions);
      if (action) {
        actions.push(action);
      } else {
        unparsed.push(fragment);
      }
    }

    this.logger.debug(`Parsed "${command}" into ${actions.length} action(s)`, { actions, unparsed });

    let suggestions: string[] = [];
    if (actions.length === 0) {
      const matching = this.getSuggestions(command);
      suggestions = matching.length > 0 ? matching : COMMAND_STARTERS.slice(0, 5);
    }

    return { actions, unparsed, suggestions };
  }

  /**
   * Suggest command starters for a partial command
   * @param partial Partial command text
   * @returns Up to ten starters related to the input
   */
  getSuggestions(partial: string): string[] {
    const text = partial.toLowerCase().trim();
    if (!text) {
      return COMMAND_STARTERS.slice(0, 10);
    }
    return COMMAND_STARTERS
      .filter(starter => starter.includes(text) || text.includes(starter))
      .slice(0, 10);
  }

  /**
   * Context-aware fallbacks for a fragment no matcher accepted
   * @param fragment Cleaned fragment
   * @param previous Actions parsed so far in this command
   */
  private inferAction(fragment: string, previous: Action[]): Action | null {
    if (!fragment) {
      return null;
    }

    const complex = matchComplexPhrase(fragment);
    if (complex) {
      return complex;
    }

    const last = previous[previous.length - 1];
    if (last && last.kind === ActionKind.NAVIGATE) {
      const noun = INTERACTION_NOUNS.find(candidate => new RegExp(`\\b${candidate}\\b`, 'i').test(fragment));
      if (noun) {
        return createAction(ActionKind.CLICK, `Click on ${noun}`, noun);
      }
    }

    // Lossy: any leftover phrase becomes a search query
    if (this.searchFallback && fragment.length > 5) {
      this.logger.warn(`Treating unmatched fragment as a search: "${fragment}"`);
      return searchAction(fragment);
    }
    return null;
  }
}

// Export default parser instance
export default new CommandParser();
