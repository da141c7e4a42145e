import { ChatOpenAI } from '@langchain/openai';
import { PromptTemplate } from '@langchain/core/prompts';
import { StringOutputParser } from '@langchain/core/output_parsers';
import { RecursiveCharacterTextSplitter } from 'langchain/text_splitter';
import defaultConfig, { AgentConfig } from './config';
import { ExternalServiceError, errorMessage } from './errors';
import { logger as defaultLogger, Logger } from './logger';
import { Question, QuestionKind } from './types';

/**
 * External text-generation service: one prompt in, one answer out
 */
export interface TextGenerator {
  generate(prompt: string): Promise<string>;
}

const MULTIPLE_CHOICE_MARKERS = /\b[a-d]\)|\bselect\b|\bchoose\b|\bwhich of the following\b|\btrue or false\b/i;
const CODING_MARKERS = /\b(?:code|function|program|algorithm|implement|javascript|typescript|python|sql|syntax|compile|output of)\b/i;
const MATH_MARKERS = /\b(?:calculate|compute|solve|equation|sum|product|derivative|integral|percentage|how many|how much)\b/i;
const ARITHMETIC = /\d+(?:\.\d+)?\s*[-+*/×÷^]\s*\d+/;
const ESSAY_MARKERS = /\b(?:explain|describe|discuss|essay|why|elaborate|compare|justify|in your own words)\b/i;
const FORM_FILL_MARKERS = /\b(?:enter your|your name|email address|phone number|fill in|date of birth)\b/i;

/**
 * Classify a question by keyword taxonomy
 * @param text Question text
 * @returns Question kind (General when nothing matches)
 */
export function classifyQuestion(text: string): QuestionKind {
  if (MULTIPLE_CHOICE_MARKERS.test(text)) {
    return QuestionKind.MULTIPLE_CHOICE;
  }
  if (CODING_MARKERS.test(text)) {
    return QuestionKind.CODING;
  }
  if (MATH_MARKERS.test(text) || ARITHMETIC.test(text)) {
    return QuestionKind.MATH;
  }
  if (ESSAY_MARKERS.test(text)) {
    return QuestionKind.ESSAY;
  }
  if (FORM_FILL_MARKERS.test(text)) {
    return QuestionKind.FORM_FILL;
  }
  return QuestionKind.GENERAL;
}

const PROMPT_TEMPLATES: Record<QuestionKind, string> = {
  [QuestionKind.MULTIPLE_CHOICE]: `You are answering a multiple-choice question on a web page.

Page context:
{context}

Question: {question}

Options:
{options}

Reply with the exact text of the single correct option and nothing else.`,
  [QuestionKind.CODING]: `You are answering a programming question on a web page.

Page context:
{context}

Question: {question}
{options}

Reply with only the code or the exact answer, no explanation.`,
  [QuestionKind.MATH]: `You are answering a math question on a web page.

Page context:
{context}

Question: {question}
{options}

Reply with only the final answer.`,
  [QuestionKind.ESSAY]: `You are answering an open-ended question on a web page.

Page context:
{context}

Question: {question}
{options}

Write a clear, well-organised answer of one or two paragraphs.`,
  [QuestionKind.FORM_FILL]: `You are filling in a form field on a web page.

Page context:
{context}

Field prompt: {question}
{options}

Reply with only the value to enter.`,
  [QuestionKind.GENERAL]: `You are answering a question on a web page.

Page context:
{context}

Question: {question}
{options}

Reply with only the answer, no explanation.`,
};

function formatOptions(options: string[]): string {
  return options.map((option, index) => `${index + 1}. ${option}`).join('\n');
}

/**
 * Build the page excerpt passed to the text-generation service
 * @param title Page title
 * @param url Page URL
 * @param bodyText Visible page text
 * @param maxChars Upper bound on the excerpt length
 * @returns Context block
 */
export async function buildPageContext(title: string, url: string, bodyText: string, maxChars: number = defaultConfig.ai.contextChars): Promise<string> {
  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: maxChars,
    chunkOverlap: 0,
  });
  const chunks = await splitter.splitText(bodyText.trim());
  const excerpt = chunks.length > 0 ? chunks[0] : '';
  return `Page title: ${title}\nURL: ${url}\n\n${excerpt}`;
}

/**
 * Map a generated answer onto one of the extracted options.
 * Tries verbatim, option number, option letter, then containment.
 * @param answer Generated answer
 * @param options On-page options in order
 * @returns The matching option text, or null
 */
export function matchAnswerToOption(answer: string, options: string[]): string | null {
  const normalized = answer.trim().replace(/[.\s]+$/, '').toLowerCase();
  if (!normalized || options.length === 0) {
    return null;
  }

  const exact = options.find(option => option.trim().toLowerCase() === normalized);
  if (exact) {
    return exact;
  }

  // Bare numbers are indices only when no option is itself a number
  const numericOptions = options.some(option => /^\s*-?\d+(?:\.\d+)?\s*$/.test(option));
  const numbered = normalized.match(/^(?:option\s+)?(\d+)[.):]?$/);
  if (numbered && !numericOptions) {
    const index = parseInt(numbered[1]) - 1;
    return options[index] ?? null;
  }

  const lettered = normalized.match(/^(?:option\s+)?\(?([a-z])\)?[.):]?$/);
  if (lettered) {
    const index = lettered[1].charCodeAt(0) - 'a'.charCodeAt(0);
    return options[index] ?? null;
  }

  const contained = options
    .filter(option => option.trim() && normalized.includes(option.trim().toLowerCase()))
    .sort((a, b) => b.length - a.length);
  if (contained.length > 0) {
    return contained[0];
  }

  const containing = options.find(option => option.toLowerCase().includes(normalized));
  if (containing) {
    return containing;
  }

  const prefixed = normalized.match(/^\(?([a-z])[.):]\s+/);
  if (prefixed) {
    const index = prefixed[1].charCodeAt(0) - 'a'.charCodeAt(0);
    return options[index] ?? null;
  }

  return null;
}

/**
 * TextGenerator backed by an OpenAI chat model through LangChain
 */
export class LangChainTextGenerator implements TextGenerator {
  private config: AgentConfig;
  private model: ChatOpenAI | null = null;

  constructor(config: AgentConfig = defaultConfig) {
    this.config = config;
  }

  /**
   * Send one prompt and return the model's text response
   * @param prompt Fully formatted prompt
   */
  async generate(prompt: string): Promise<string> {
    const chain = this.getModel().pipe(new StringOutputParser());
    return chain.invoke(prompt);
  }

  private getModel(): ChatOpenAI {
    if (!this.model) {
      this.model = new ChatOpenAI({
        apiKey: this.config.apiKeys.openai,
        model: this.config.ai.model,
        temperature: this.config.ai.temperature,
        maxTokens: this.config.ai.maxTokens,
        timeout: this.config.ai.timeoutMs,
        maxRetries: this.config.ai.maxRetries,
      });
    }
    return this.model;
  }
}

/**
 * Builds kind-specific prompts and delegates answering to a TextGenerator
 */
export class QuestionAnswerer {
  private generator: TextGenerator;
  private logger: Logger;
  private prompts: Record<QuestionKind, PromptTemplate>;

  /**
   * Create a question answerer
   * @param generator Text-generation service
   * @param logger Logger instance
   */
  constructor(generator: TextGenerator, logger: Logger = defaultLogger) {
    this.generator = generator;
    this.logger = logger;
    this.prompts = {
      [QuestionKind.MULTIPLE_CHOICE]: this.template(QuestionKind.MULTIPLE_CHOICE),
      [QuestionKind.CODING]: this.template(QuestionKind.CODING),
      [QuestionKind.MATH]: this.template(QuestionKind.MATH),
      [QuestionKind.ESSAY]: this.template(QuestionKind.ESSAY),
      [QuestionKind.FORM_FILL]: this.template(QuestionKind.FORM_FILL),
      [QuestionKind.GENERAL]: this.template(QuestionKind.GENERAL),
    };
  }

  /**
   * Format the prompt for a question
   * @param question Question to answer
   * @returns Prompt text
   */
  async buildPrompt(question: Question): Promise<string> {
    const options = question.options.length > 0
      ? (question.kind === QuestionKind.MULTIPLE_CHOICE ? '' : 'Options:\n') + formatOptions(question.options)
      : '';
    return this.prompts[question.kind].format({
      question: question.text,
      options,
      context: question.context || 'No additional context.',
    });
  }

  /**
   * Answer a question with one call to the text-generation service
   * @param question Question to answer
   * @returns Trimmed answer
   * @throws ExternalServiceError when the service fails or answers with nothing
   */
  async answer(question: Question): Promise<string> {
    const prompt = await this.buildPrompt(question);
    this.logger.debug(`Answering ${question.kind} question: ${question.text}`);

    let raw: string;
    try {
      raw = await this.generator.generate(prompt);
    } catch (error) {
      throw new ExternalServiceError(`Text generation failed: ${errorMessage(error)}`, 'generate', { cause: error });
    }

    const answer = raw.trim();
    if (!answer) {
      throw new ExternalServiceError('Text generation returned an empty answer', 'generate');
    }
    return answer;
  }

  private template(kind: QuestionKind): PromptTemplate {
    return new PromptTemplate({
      template: PROMPT_TEMPLATES[kind],
      inputVariables: ['context', 'question', 'options'],
    });
  }
}
