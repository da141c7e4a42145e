// Library entry point

export { BrowserAgent, createSession } from './agent';
export type { ActionResult, BrowserAgentOptions, CommandResult, RunOptions, WorkloadRunResult } from './agent';

export { CommandParser, ACTION_MATCHERS, cleanFragment, isUrlLike, matchFragment, normalizeScore, normalizeUrl, splitCompoundCommand } from './command-parser';
export type { ActionMatcher, CommandParserOptions, ParseResult } from './command-parser';

export { ActionExecutor, parseFieldPairs } from './action-executor';
export type { ActionExecutorOptions, ExecutionContext } from './action-executor';

export { AutomationTemplates } from './automation-templates';
export type { TemplatePayload, TemplateResult, TemplateRunner } from './automation-templates';

export { SmartElementDetector, resolveElement, resolveInput } from './element-finder';
export type { ElementLocatorStrategy, ResolvedElement } from './element-finder';

export { WorkItemScanner, classify, classifyText, isIncomplete } from './work-item-scanner';

export { LangChainTextGenerator, QuestionAnswerer, buildPageContext, classifyQuestion, matchAnswerToOption } from './question-answering';
export type { TextGenerator } from './question-answering';

export { SiteNavigator } from './site-navigator';
export { TaskCompletionEngine, CompletionEvent } from './task-completion-engine';
export type { CompletionOptions, ItemOutcome, QuestionAnsweredPayload, WorkloadResult } from './task-completion-engine';

export { ExecutionLog } from './execution-log';
export { PlaywrightDriver, PlaywrightElement, launchBrowser } from './page-driver';
export type { BrowserSession, FindOptions, LoadState, PageDriver, PageElement } from './page-driver';

export {
  AgentError,
  ElementNotFoundError,
  ExternalServiceError,
  ParseAmbiguousError,
  StepTimeoutError,
  SubmissionError,
  toAgentError,
} from './errors';
export type { ErrorKind } from './errors';

export { Logger, LogLevel, logger } from './logger';
export { getDefaultConfig, loadConfig, mergeConfig, saveConfig, validateConfig } from './config';
export type { AgentConfig, ConfigOverrides } from './config';

export * from './types';
