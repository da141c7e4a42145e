import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ActionExecutor } from '../../src/action-executor';
import { AgentConfig, getDefaultConfig, mergeConfig } from '../../src/config';
import { ExternalServiceError, SubmissionError } from '../../src/errors';
import { QuestionAnswerer } from '../../src/question-answering';
import { CompletionEvent, QuestionAnsweredPayload, TaskCompletionEngine } from '../../src/task-completion-engine';
import { START_SELECTOR, TITLE_SELECTOR } from '../../src/work-item-scanner';
import { QuestionKind, TaskStatus } from '../../src/types';
import { FakeElement, FakePage } from '../helpers/fake-page';

const SOURCE = 'https://example.com/skills';

/**
 * A quiz card with a title and a start button that has no link
 */
function inPageCard(title: string, start: FakeElement): FakeElement {
  return new FakeElement(`${title} Start`)
    .withChild(TITLE_SELECTOR, new FakeElement(title))
    .withChild(START_SELECTOR, start);
}

function startSelectorFor(index: number): string {
  return `.quiz-item >> nth=${index} >> ${START_SELECTOR}`;
}

describe('TaskCompletionEngine', () => {
  let config: AgentConfig;
  let page: FakePage;
  let generate: ReturnType<typeof vi.fn>;

  function createEngine(overrides: AgentConfig = config): TaskCompletionEngine {
    return new TaskCompletionEngine({
      executor: new ActionExecutor({ config: overrides }),
      answerer: new QuestionAnswerer({ generate }),
      config: overrides,
    });
  }

  beforeEach(() => {
    config = mergeConfig(getDefaultConfig(), {
      completion: { maxQuestions: 3, questionDelayMs: 0, itemDelayMs: 0, strictOptionMatching: false },
    });
    page = new FakePage(SOURCE, 'Skills', 'Skill assessments');
    generate = vi.fn().mockResolvedValue('Paris');
  });

  it('should stop an item at the question limit', async () => {
    const start = new FakeElement('Start');
    page.add('.quiz-item', inPageCard('Quiz A', start));
    page.add(startSelectorFor(0), start);
    // The same question never goes away
    page.add('.question', new FakeElement('What is the capital of France?'));
    page.add('textarea', new FakeElement());

    const result = await createEngine().completeWorkload(page);

    expect(generate).toHaveBeenCalledTimes(3);
    expect(result.attempted).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.success).toBe(false);
    expect(result.outcomes[0]).toMatchObject({
      title: 'Quiz A',
      status: TaskStatus.FAILED,
      questionsAnswered: 3,
      outcome: { success: false, message: 'Question limit of 3 reached for Quiz A', errorKind: 'Timeout' },
    });
  });

  it('should keep going after one item fails', async () => {
    const startA = new FakeElement('Start');
    const startB = new FakeElement('Start');
    page.add('.quiz-item', inPageCard('Quiz A', startA), inPageCard('Quiz B', startB));
    page.add(startSelectorFor(0), startA);
    page.add(startSelectorFor(1), startB);

    // Quiz A shows a question with nowhere to answer it
    startA.onClick = () => {
      page.set('.question', new FakeElement('Question for quiz A here?'));
    };
    // Quiz B has an answer box and finishes after one submission
    startB.onClick = () => {
      const submit = new FakeElement('Submit');
      submit.onClick = () => {
        page.add('.quiz-complete', new FakeElement('Quiz Complete'));
      };
      page.set('.question', new FakeElement('Question for quiz B here?'));
      page.add('textarea', new FakeElement());
      page.add('button:has-text("Submit")', submit);
    };

    const answered: QuestionAnsweredPayload[] = [];
    const engine = createEngine();
    engine.on(CompletionEvent.QUESTION_ANSWERED, (payload: QuestionAnsweredPayload) => answered.push(payload));
    const finished = vi.fn();
    engine.on(CompletionEvent.ITEM_FINISHED, finished);

    const result = await engine.completeWorkload(page);

    expect(result.attempted).toBe(2);
    expect(result.completed).toBe(1);
    expect(result.failed).toBe(1);
    expect(result.success).toBe(false);
    expect(result.message).toBe('Completed 1 of 2 item(s)');
    expect(result.outcomes[0].outcome).toEqual({
      success: false,
      message: 'No answer input found',
      errorKind: 'SubmissionFailure',
    });
    expect(result.outcomes[1]).toMatchObject({
      title: 'Quiz B',
      status: TaskStatus.COMPLETED,
      questionsAnswered: 1,
      outcome: { success: true, message: 'Completed Quiz B (1 question(s) answered)' },
    });
    expect(answered).toHaveLength(1);
    expect(answered[0].item).toBe('Quiz B');
    expect(answered[0].answer).toBe('Paris');
    expect(finished).toHaveBeenCalledTimes(2);
    expect(result.log.getEntries().map(entry => entry.item)).toEqual(['Quiz A', 'Quiz B']);
  });

  it('should open linked items and return to the list between them', async () => {
    const cardFor = (title: string, href: string) => new FakeElement(`${title} Start`)
      .withChild(TITLE_SELECTOR, new FakeElement(title))
      .withChild(START_SELECTOR, new FakeElement('Start', { href }));
    page.add('.quiz-item', cardFor('Quiz A', '/quiz/a'), cardFor('Quiz B', '/quiz/b'));
    page.onNavigate = url => {
      if (url.includes('/quiz/')) {
        page.set('.quiz-complete', new FakeElement('Quiz Complete'));
      } else {
        page.remove('.quiz-complete');
      }
    };

    const result = await createEngine().completeWorkload(page);

    expect(page.navigations).toEqual([
      'https://example.com/quiz/a',
      SOURCE,
      'https://example.com/quiz/b',
    ]);
    expect(result.completed).toBe(2);
    expect(result.success).toBe(true);
  });

  it('should skip every remaining item once cancelled', async () => {
    page.add('.quiz-item', inPageCard('Quiz A', new FakeElement('Start')), inPageCard('Quiz B', new FakeElement('Start')));
    const controller = new AbortController();
    controller.abort();

    const result = await createEngine().completeWorkload(page, { signal: controller.signal });

    expect(result.cancelled).toBe(true);
    expect(result.attempted).toBe(0);
    expect(result.skipped).toBe(2);
    expect(result.success).toBe(false);
    expect(result.message).toBe('Completed 0 of 0 item(s) (cancelled)');
    expect(generate).not.toHaveBeenCalled();
  });

  it('should open the entry URL and succeed when nothing is incomplete', async () => {
    page.add('.quiz-item', new FakeElement('Quiz A Completed').withChild(TITLE_SELECTOR, new FakeElement('Quiz A')));

    const result = await createEngine().completeWorkload(page, { entryUrl: 'example.com/skills' });

    expect(page.navigations).toEqual(['https://www.example.com/skills']);
    expect(result.success).toBe(true);
    expect(result.message).toBe('No incomplete items found');
    expect(result.attempted).toBe(0);
  });

  it('should report a failed scan instead of throwing', async () => {
    page.faults.set('.quiz-item', new ExternalServiceError('Execution context was destroyed', 'queryAll'));

    const result = await createEngine().completeWorkload(page);

    expect(result.success).toBe(false);
    expect(result.message).toBe('Workload stopped: Execution context was destroyed');
    expect(result.errorKind).toBe('ExternalServiceFailure');
    expect(result.attempted).toBe(0);
  });

  it('should report a section that cannot be opened instead of throwing', async () => {
    const section = new FakeElement('Quizzes');
    section.click = async () => {
      throw new Error('element detached');
    };
    page.add('nav a:has-text("Quizzes")', section);

    const result = await createEngine().completeWorkload(page, { taskDescription: 'complete my quizzes' });

    expect(result.success).toBe(false);
    expect(result.message).toBe('Workload stopped: scan failed: element detached');
    expect(result.errorKind).toBe('ExternalServiceFailure');
  });

  it('should fail an item whose start control is missing', async () => {
    page.add('.quiz-item', inPageCard('Quiz A', new FakeElement('Start')));

    const result = await createEngine().completeWorkload(page);

    expect(result.outcomes[0].outcome).toEqual({
      success: false,
      message: 'Could not find element: start control for Quiz A',
      errorKind: 'ElementNotFound',
    });
  });

  it('should fail only the item whose answer could not be generated', async () => {
    const startA = new FakeElement('Start');
    const startB = new FakeElement('Start');
    page.add('.quiz-item', inPageCard('Quiz A', startA), inPageCard('Quiz B', startB));
    page.add(startSelectorFor(0), startA);
    page.add(startSelectorFor(1), startB);
    page.add('textarea', new FakeElement());

    startA.onClick = () => {
      page.set('.question', new FakeElement('Question for quiz A here?'));
    };
    startB.onClick = () => {
      const submit = new FakeElement('Submit');
      submit.onClick = () => {
        page.add('.quiz-complete', new FakeElement('Quiz Complete'));
      };
      page.set('.question', new FakeElement('Question for quiz B here?'));
      page.add('button:has-text("Submit")', submit);
    };
    generate.mockRejectedValueOnce(new Error('rate limited'));

    const result = await createEngine().completeWorkload(page);

    expect(result.outcomes[0]).toMatchObject({
      title: 'Quiz A',
      status: TaskStatus.FAILED,
      questionsAnswered: 0,
      outcome: {
        success: false,
        message: 'Text generation failed: rate limited',
        errorKind: 'ExternalServiceFailure',
      },
    });
    expect(result.outcomes[1]).toMatchObject({ title: 'Quiz B', status: TaskStatus.COMPLETED, questionsAnswered: 1 });
    expect(result.completed).toBe(1);
    expect(result.failed).toBe(1);
  });

  it('should fail an item when the generated answer is empty', async () => {
    const start = new FakeElement('Start');
    page.add('.quiz-item', inPageCard('Quiz A', start));
    page.add(startSelectorFor(0), start);
    page.add('.question', new FakeElement('What is the capital of France?'));
    page.add('textarea', new FakeElement());
    generate.mockResolvedValue('   ');

    const result = await createEngine().completeWorkload(page);

    expect(result.outcomes[0].outcome).toEqual({
      success: false,
      message: 'Text generation returned an empty answer',
      errorKind: 'ExternalServiceFailure',
    });
  });

  describe('question handling', () => {
    it('should treat a question with options as multiple choice', async () => {
      page.add('.question', new FakeElement('Which city is the capital of France?'));
      page.add('.option', new FakeElement('Paris'), new FakeElement('London'));

      const question = await createEngine().extractQuestion(page);

      expect(question).not.toBeNull();
      expect(question?.kind).toBe(QuestionKind.MULTIPLE_CHOICE);
      expect(question?.options).toEqual(['Paris', 'London']);
      expect(question?.context).toBe('Page title: Skills\nURL: https://example.com/skills\n\nSkill assessments');
    });

    it('should ignore headings too short to be questions', async () => {
      page.add('h1, h2, h3', new FakeElement('Quiz'));
      expect(await createEngine().extractQuestion(page)).toBeNull();
    });

    it('should click the option the answer maps to, then press Enter', async () => {
      const london = new FakeElement('London');
      page.add('text="London"', london);

      await createEngine().submitAnswer(
        page,
        { text: 'Which city?', kind: QuestionKind.MULTIPLE_CHOICE, options: ['Paris', 'London'], context: '' },
        '2'
      );

      expect(london.clicks).toBe(1);
      expect(page.keys).toEqual(['Enter']);
    });

    it('should refuse an unmatched answer in strict mode', async () => {
      const strict = mergeConfig(config, { completion: { strictOptionMatching: true } });

      await expect(createEngine(strict).submitAnswer(
        page,
        { text: 'Which city?', kind: QuestionKind.MULTIPLE_CHOICE, options: ['Paris', 'London'], context: '' },
        'Berlin'
      )).rejects.toBeInstanceOf(SubmissionError);
    });

    it('should detect a finished item from the URL', async () => {
      page.url = 'https://example.com/quiz/results';
      expect(await createEngine().isFinished(page)).toBe(true);
    });

    it('should not read a finished marker inside a longer path segment', async () => {
      page.url = 'https://example.com/incomplete-quizzes?view=completed';
      expect(await createEngine().isFinished(page)).toBe(false);
    });
  });
});
