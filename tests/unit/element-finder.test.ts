import { describe, it, expect, beforeEach } from 'vitest';
import {
  FIRST_TEXT_INPUT,
  SmartElementDetector,
  findFirstVisible,
  keyTerms,
  resolveElement,
  resolveInput,
} from '../../src/element-finder';
import { FakeElement, FakePage } from '../helpers/fake-page';

describe('element finder', () => {
  let page: FakePage;
  const detector = new SmartElementDetector();

  beforeEach(() => {
    page = new FakePage();
  });

  describe('resolveElement', () => {
    it('should try exact text before partial text', async () => {
      const exact = new FakeElement('Submit');
      page.add('button', new FakeElement('Submit application'), exact);

      const resolved = await resolveElement(page, 'Submit');

      expect(resolved?.element).toBe(exact);
      expect(resolved?.method).toBe('exact-text');
    });

    it('should fall back to partial text', async () => {
      const partial = new FakeElement('Submit application');
      page.add('button', partial);

      const resolved = await resolveElement(page, 'submit');

      expect(resolved?.element).toBe(partial);
      expect(resolved?.method).toBe('partial-text');
    });

    it('should prefer the strategy when it finds something', async () => {
      const labelled = new FakeElement('', { 'aria-label': 'Search' });
      page.add('[aria-label="Search" i]', labelled);
      page.add('button', new FakeElement('Search'));

      const resolved = await resolveElement(page, 'Search', detector);

      expect(resolved).toEqual({ element: labelled, method: 'smart' });
    });

    it('should return null when nothing matches', async () => {
      expect(await resolveElement(page, 'missing', detector)).toBeNull();
    });
  });

  describe('resolveInput', () => {
    it('should match inputs by the key terms of the description', async () => {
      const input = new FakeElement();
      page.add('input[name*="search" i]', input);

      expect(await resolveInput(page, 'the search box')).toEqual({ element: input, method: 'attribute' });
    });

    it('should fall back to the first visible text input', async () => {
      const input = new FakeElement();
      page.add(FIRST_TEXT_INPUT, input);

      expect(await resolveInput(page, 'comment')).toEqual({ element: input, method: 'first-input' });
    });
  });

  describe('SmartElementDetector', () => {
    it('should find password fields by pattern', async () => {
      const password = new FakeElement();
      page.add('input[type="password"]', password);

      expect(await detector.findByDescription(page, 'password field')).toBe(password);
    });

    it('should find the login form', async () => {
      const username = new FakeElement();
      const password = new FakeElement();
      const submit = new FakeElement('Log in');
      page.add('input[name*="user"]', username);
      page.add('input[type="password"]', password);
      page.add('button[type="submit"]', submit);

      expect(await detector.findLoginElements(page)).toEqual({ username, password, submit });
    });

    it('should only return visible buttons', async () => {
      const visible = new FakeElement('Submit');
      page.add('button:has-text("submit")', visible, new FakeElement('Submit', {}, false));

      expect(await detector.findButtonsByText(page, 'submit')).toEqual([visible]);
    });
  });

  it('should skip hidden elements in findFirstVisible', async () => {
    const shown = new FakeElement('b');
    page.add('.a', new FakeElement('a', {}, false));
    page.add('.b', shown);

    expect(await findFirstVisible(page, ['.a', '.b'])).toBe(shown);
  });

  it('should drop generic words from descriptions', () => {
    expect(keyTerms('the search box')).toEqual(['search']);
    expect(keyTerms('First name field')).toEqual(['first', 'name']);
  });
});
