import { describe, it, expect, beforeEach } from 'vitest';
import { SiteNavigator } from '../../src/site-navigator';
import { FakeElement, FakePage } from '../helpers/fake-page';

describe('SiteNavigator', () => {
  let page: FakePage;
  const navigator = new SiteNavigator();

  beforeEach(() => {
    page = new FakePage();
  });

  it('should find a navigation item by any of its names', async () => {
    const link = new FakeElement('Assessments');
    page.add('a:has-text("Assessments")', link);

    expect(await navigator.findNavigationItem(page, ['Skills', 'Assessments'])).toEqual({
      name: 'Assessments',
      selector: 'a:has-text("Assessments")',
      element: link,
    });
  });

  it('should detect the offered sign-in method', async () => {
    page.add('text="Continue with GitHub"', new FakeElement('Continue with GitHub'));
    expect(await navigator.detectAuthenticationMethod(page)).toBe('github');
  });

  it('should return null when no sign-in method is visible', async () => {
    expect(await navigator.detectAuthenticationMethod(page)).toBeNull();
  });

  it('should map a task description to its section', async () => {
    page.add('nav a:has-text("Quizzes")', new FakeElement('Quizzes'));

    const section = await navigator.findRelevantSection(page, 'complete my quizzes');

    expect(section?.name).toBe('Quizzes');
    expect(section?.selector).toBe('nav a:has-text("Quizzes")');
  });

  it('should return null for descriptions with no known section', async () => {
    expect(await navigator.findRelevantSection(page, 'do something')).toBeNull();
  });
});
