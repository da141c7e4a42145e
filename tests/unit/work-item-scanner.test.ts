import { describe, it, expect, beforeEach } from 'vitest';
import { START_SELECTOR, TITLE_SELECTOR, WorkItemScanner, classify, classifyText, isIncomplete } from '../../src/work-item-scanner';
import { TaskStatus } from '../../src/types';
import { FakeElement, FakePage } from '../helpers/fake-page';

describe('classifyText', () => {
  it('should let a text marker win over a conflicting class marker', () => {
    expect(classifyText('✓ Completed', 'in-progress')).toBe(TaskStatus.COMPLETED);
    expect(classifyText('Retake', 'card completed')).toBe(TaskStatus.RETAKE_AVAILABLE);
  });

  it('should recognise completion markers', () => {
    expect(classifyText('Score: 100%', '')).toBe(TaskStatus.COMPLETED);
    expect(classifyText('Passed', '')).toBe(TaskStatus.COMPLETED);
  });

  it('should recognise progress markers', () => {
    expect(classifyText('In progress', '')).toBe(TaskStatus.IN_PROGRESS);
    expect(classifyText('Continue where you left off', '')).toBe(TaskStatus.IN_PROGRESS);
  });

  it('should recognise retake markers', () => {
    expect(classifyText('Failed - try again', '')).toBe(TaskStatus.RETAKE_AVAILABLE);
  });

  it('should not read "not completed" as completed', () => {
    expect(classifyText('Not completed', '')).toBe(TaskStatus.NOT_STARTED);
  });

  it('should fall back to class markers when the text says nothing', () => {
    expect(classifyText('Algebra Basics', 'card completed')).toBe(TaskStatus.COMPLETED);
    expect(classifyText('Algebra Basics', 'card in-progress')).toBe(TaskStatus.IN_PROGRESS);
    expect(classifyText('Algebra Basics', 'card retake')).toBe(TaskStatus.RETAKE_AVAILABLE);
  });

  it('should default to not started', () => {
    expect(classifyText('Algebra Basics', 'card')).toBe(TaskStatus.NOT_STARTED);
  });
});

describe('classify', () => {
  it('should read text and class from the element', async () => {
    const element = new FakeElement('Algebra Basics', { class: 'quiz-item done' });
    expect(await classify(element)).toBe(TaskStatus.COMPLETED);
  });
});

describe('isIncomplete', () => {
  it('should treat everything but completed and failed as incomplete', () => {
    expect(isIncomplete(TaskStatus.NOT_STARTED)).toBe(true);
    expect(isIncomplete(TaskStatus.IN_PROGRESS)).toBe(true);
    expect(isIncomplete(TaskStatus.RETAKE_AVAILABLE)).toBe(true);
    expect(isIncomplete(TaskStatus.COMPLETED)).toBe(false);
    expect(isIncomplete(TaskStatus.FAILED)).toBe(false);
  });
});

describe('WorkItemScanner', () => {
  const source = 'https://example.com/skills';
  let page: FakePage;
  let scanner: WorkItemScanner;

  beforeEach(() => {
    page = new FakePage(source);
    scanner = new WorkItemScanner();
  });

  it('should return items in page order with titles, locators and statuses', async () => {
    const done = new FakeElement('Algebra Basics Completed').withChild(TITLE_SELECTOR, new FakeElement('Algebra Basics'));
    const linked = new FakeElement('JavaScript Start')
      .withChild(TITLE_SELECTOR, new FakeElement('JavaScript'))
      .withChild(START_SELECTOR, new FakeElement('Start', { href: '/quiz/js' }));
    const inPage = new FakeElement('SQL Start')
      .withChild(TITLE_SELECTOR, new FakeElement('SQL'))
      .withChild(START_SELECTOR, new FakeElement('Start', { href: '#' }));
    page.add('.quiz-item', done, linked, inPage);

    expect(await scanner.scan(page)).toEqual([
      { title: 'Algebra Basics', locator: '.quiz-item >> nth=0', status: TaskStatus.COMPLETED, source },
      { title: 'JavaScript', locator: 'https://example.com/quiz/js', status: TaskStatus.NOT_STARTED, source },
      {
        title: 'SQL',
        locator: '.quiz-item >> nth=2',
        status: TaskStatus.NOT_STARTED,
        source,
        startSelector: '.quiz-item >> nth=2 >> button, a, .start-btn, .take-test',
      },
    ]);
  });

  it('should skip cards already seen under an earlier selector and cards without text', async () => {
    page.add('.quiz-item', new FakeElement('Algebra Basics').withChild(TITLE_SELECTOR, new FakeElement('Algebra Basics')));
    page.add('.card', new FakeElement('Algebra Basics'), new FakeElement('   '));

    const items = await scanner.scan(page);
    expect(items).toHaveLength(1);
    expect(items[0].locator).toBe('.quiz-item >> nth=0');
  });

  it('should title a card without a heading "Unknown"', async () => {
    page.add('.card', new FakeElement('Mystery task'));
    const [item] = await scanner.scan(page);
    expect(item.title).toBe('Unknown');
  });

  it('should return nothing on a page without cards', async () => {
    expect(await scanner.scan(page)).toEqual([]);
  });
});
