import { ErrorKind } from './errors';

/**
 * Kinds of browser operation a command can be decomposed into
 */
export enum ActionKind {
  NAVIGATE = 'navigate',
  CLICK = 'click',
  TYPE = 'type',
  SCROLL = 'scroll',
  WAIT = 'wait',
  SCREENSHOT = 'screenshot',
  EXTRACT = 'extract',
  SEARCH = 'search',
  LOGIN = 'login',
  FILL_FORM = 'fill_form',
  CUSTOM = 'custom',
  DOWNLOAD = 'download',
  UPLOAD = 'upload'
}

/**
 * One discrete browser operation derived from natural language
 */
export interface Action {
  readonly kind: ActionKind;
  readonly target?: string;
  readonly value?: string;
  readonly description: string;
}

/**
 * Build a frozen action
 * @param kind Action kind
 * @param description Human-readable summary
 * @param target Element description or URL
 * @param value Text to enter, duration or score target
 */
export function createAction(kind: ActionKind, description: string, target?: string, value?: string): Action {
  const action: Action = { kind, description };
  return Object.freeze({
    ...action,
    ...(target !== undefined ? { target } : {}),
    ...(value !== undefined ? { value } : {}),
  });
}

/**
 * Result of executing one action
 */
export interface ExecutionOutcome {
  readonly success: boolean;
  readonly message: string;
  readonly data?: unknown;
  readonly errorKind?: ErrorKind;
}

export function succeeded(message: string, data?: unknown): ExecutionOutcome {
  return Object.freeze(data !== undefined ? { success: true, message, data } : { success: true, message });
}

export function failed(message: string, errorKind?: ErrorKind, data?: unknown): ExecutionOutcome {
  return Object.freeze({
    success: false,
    message,
    ...(errorKind ? { errorKind } : {}),
    ...(data !== undefined ? { data } : {}),
  });
}

/**
 * Completion status of a work item
 */
export enum TaskStatus {
  NOT_STARTED = 'not_started',
  IN_PROGRESS = 'in_progress',
  COMPLETED = 'completed',
  RETAKE_AVAILABLE = 'retake_available',
  FAILED = 'failed'
}

/**
 * One unit of a larger task, such as a single quiz
 */
export interface WorkItem {
  title: string;
  // Absolute URL, or an in-page element reference when the card has no link
  locator: string;
  status: TaskStatus;
  // URL of the page the item was scanned on
  source: string;
  startSelector?: string;
}

/**
 * Question categories used to pick a prompt template
 */
export enum QuestionKind {
  MULTIPLE_CHOICE = 'multiple_choice',
  CODING = 'coding',
  ESSAY = 'essay',
  MATH = 'math',
  FORM_FILL = 'form_fill',
  GENERAL = 'general'
}

export interface Question {
  text: string;
  kind: QuestionKind;
  options: string[];
  context: string;
}

export interface ExecutionLogEntry {
  readonly timestamp: string;
  readonly command?: string;
  readonly action?: Action;
  readonly item?: string;
  readonly outcome: ExecutionOutcome;
}

/**
 * Explicit session state passed into and returned from the agent's entry points
 */
export interface AgentSession {
  readonly id: string;
  readonly currentUrl?: string;
  readonly history: readonly string[];
  readonly credentials?: {
    readonly username?: string;
    readonly password?: string;
  };
}
