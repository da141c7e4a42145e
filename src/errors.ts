import { errors as playwrightErrors } from 'playwright';

/**
 * Failure categories reported by the parser, executor and completion engine
 */
export type ErrorKind =
  | 'ParseAmbiguous'
  | 'ElementNotFound'
  | 'Timeout'
  | 'SubmissionFailure'
  | 'ExternalServiceFailure';

/**
 * Base error for every fault raised inside the agent
 */
export class AgentError extends Error {
  readonly kind: ErrorKind;
  readonly step?: string;

  constructor(kind: ErrorKind, message: string, step?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AgentError';
    this.kind = kind;
    this.step = step;
  }
}

export class ElementNotFoundError extends AgentError {
  constructor(description: string, step?: string) {
    super('ElementNotFound', `Could not find element: ${description}`, step);
    this.name = 'ElementNotFoundError';
  }
}

export class StepTimeoutError extends AgentError {
  constructor(step: string, timeoutMs?: number, options?: { cause?: unknown }) {
    const bound = timeoutMs !== undefined ? ` after ${timeoutMs}ms` : '';
    super('Timeout', `Step "${step}" timed out${bound}`, step, options);
    this.name = 'StepTimeoutError';
  }
}

export class SubmissionError extends AgentError {
  constructor(message: string, step?: string) {
    super('SubmissionFailure', message, step);
    this.name = 'SubmissionError';
  }
}

export class ExternalServiceError extends AgentError {
  constructor(message: string, step?: string, options?: { cause?: unknown }) {
    super('ExternalServiceFailure', message, step, options);
    this.name = 'ExternalServiceError';
  }
}

export class ParseAmbiguousError extends AgentError {
  readonly suggestions: string[];

  constructor(command: string, suggestions: string[] = []) {
    super('ParseAmbiguous', `Could not understand command: "${command}"`);
    this.name = 'ParseAmbiguousError';
    this.suggestions = suggestions;
  }
}

/**
 * Check whether an error is a timeout raised by Playwright or by the agent itself
 * @param error Unknown thrown value
 */
export function isTimeoutError(error: unknown): boolean {
  if (error instanceof StepTimeoutError || error instanceof playwrightErrors.TimeoutError) {
    return true;
  }
  return error instanceof Error && error.name === 'TimeoutError';
}

/**
 * Describe an unknown thrown value as text
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert any thrown value into an AgentError for the given step.
 * Timeouts become StepTimeoutError, everything else ExternalServiceError.
 * @param error Thrown value
 * @param step Name of the step that failed
 * @returns Typed agent error
 */
export function toAgentError(error: unknown, step: string): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  if (isTimeoutError(error)) {
    return new StepTimeoutError(step, undefined, { cause: error });
  }
  return new ExternalServiceError(`${step} failed: ${errorMessage(error)}`, step, { cause: error });
}
