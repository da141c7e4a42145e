import { describe, it, expect, beforeEach } from 'vitest';
import { AutomationTemplates } from '../../src/automation-templates';
import { FakeElement, FakePage } from '../helpers/fake-page';

describe('AutomationTemplates', () => {
  let page: FakePage;
  let templates: AutomationTemplates;

  beforeEach(() => {
    page = new FakePage('https://example.com/login');
    templates = new AutomationTemplates();
  });

  it('should list the available templates', () => {
    expect(templates.getAvailableTemplates()).toEqual(['login', 'form_filling', 'search']);
  });

  it('should report an unknown template', async () => {
    expect(await templates.execute('nope', page, {})).toEqual({
      success: false,
      steps: [],
      error: 'Template nope not found',
    });
  });

  describe('login', () => {
    let username: FakeElement;
    let password: FakeElement;
    let submit: FakeElement;

    beforeEach(() => {
      username = new FakeElement();
      password = new FakeElement();
      submit = new FakeElement('Log in');
      page.add('input[name*="user"]', username);
      page.add('input[type="password"]', password);
      page.add('button[type="submit"]', submit);
    });

    it('should fill and submit the form', async () => {
      submit.onClick = () => {
        page.url = 'https://example.com/dashboard';
      };

      const result = await templates.execute('login', page, { username: 'jane', password: 'test-secret' });

      expect(result).toEqual({
        success: true,
        steps: ['Username/email filled', 'Password filled', 'Login submitted', 'Login appears successful'],
      });
      expect(username.value).toBe('jane');
      expect(password.value).toBe('test-secret');
    });

    it('should report a rejected login', async () => {
      page.bodyText = 'Invalid password';

      const result = await templates.execute('login', page, { username: 'jane', password: 'test-secret' });

      expect(result.success).toBe(false);
      expect(result.error).toBe('Login rejected');
      expect(result.steps[result.steps.length - 1]).toBe('Login appears to have failed');
    });

    it('should stop at the form when no credentials are supplied', async () => {
      expect(await templates.execute('login', page, {})).toEqual({
        success: true,
        steps: ['Login form found; credentials not supplied'],
      });
      expect(submit.clicks).toBe(0);
    });

    it('should prefer a provider button when a method is given', async () => {
      const google = new FakeElement('Continue with google');
      page.add('button:has-text("Continue with google")', google);

      expect(await templates.execute('login', page, { method: 'google' })).toEqual({
        success: true,
        steps: ['Clicked google sign-in'],
      });
      expect(google.clicks).toBe(1);
    });
  });

  it('should follow the sign-in provider the page offers when no method or credentials are given', async () => {
    const github = new FakeElement('Continue with GitHub');
    page.add('text="Continue with GitHub"', github);
    page.add('button:has-text("Continue with github")', github);

    expect(await templates.execute('login', page, {})).toEqual({
      success: true,
      steps: ['Detected github sign-in', 'Clicked github sign-in'],
    });
    expect(github.clicks).toBe(1);
  });

  it('should fail login when there is neither a form nor a link', async () => {
    page.url = 'https://example.com/';
    expect(await templates.execute('login', page, {})).toEqual({
      success: false,
      steps: [],
      error: 'No login form or login link found',
    });
  });

  describe('form_filling', () => {
    it('should fill known fields and note unknown ones', async () => {
      const email = new FakeElement();
      page.add('input[name*="email"]', email);

      const result = await templates.execute('form_filling', page, { email: 'jane@example.com', nickname: 'JJ' });

      expect(result).toEqual({ success: true, steps: ['Filled email', 'No field found for nickname'] });
      expect(email.value).toBe('jane@example.com');
    });

    it('should submit with Enter when no submit button is visible', async () => {
      expect(await templates.execute('form_filling', page, { submit: 'true' })).toEqual({
        success: true,
        steps: ['Form submitted via Enter key'],
      });
      expect(page.keys).toEqual(['Enter']);
    });

    it('should fail when nothing could be filled', async () => {
      const result = await templates.execute('form_filling', page, { nickname: 'JJ' });
      expect(result.success).toBe(false);
      expect(result.error).toBe('No matching form fields found');
    });
  });

  describe('search', () => {
    it('should fill the query and press Enter', async () => {
      const input = new FakeElement();
      page.add('input[name*="search"]', input);

      expect(await templates.execute('search', page, { query: 'cats' })).toEqual({
        success: true,
        steps: ['Entered search query: cats', 'Search submitted'],
      });
      expect(input.pressed).toEqual(['Enter']);
    });

    it('should report faults thrown by the page', async () => {
      const input = new FakeElement();
      input.fill = async () => {
        throw new Error('input detached');
      };
      page.add('input[name*="search"]', input);

      expect(await templates.execute('search', page, { query: 'cats' })).toEqual({
        success: false,
        steps: [],
        error: 'input detached',
      });
    });
  });
});
