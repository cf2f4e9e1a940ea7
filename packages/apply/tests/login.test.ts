import { describe, it, expect } from 'vitest';
import { FakeElement, FakePage } from '@jobhound/browser/testing';
import { signIn } from '../src/login.js';
import { createLogger } from './helpers.js';

const credentials = { email: 'candidate@example.com', password: 'test-secret' };

describe('signIn', () => {
  it('fills the login form and submits it', async () => {
    const form: Record<string, FakeElement> = {
      '#username': new FakeElement(),
      '#password': new FakeElement(),
      '[type="submit"]': new FakeElement(),
    };
    const page = new FakePage((selector) => {
      const element = form[selector];
      return element ? [element] : [];
    });

    expect(await signIn(page, credentials, createLogger())).toBe(true);
    expect(form['#username']?.value).toBe('candidate@example.com');
    expect(form['#password']?.value).toBe('test-secret');
    expect(form['[type="submit"]']?.clicks).toBe(1);
    expect(page.waitedMs).toBe(3000);
  });

  it('carries on signed out when the form is missing', async () => {
    const logger = createLogger();

    expect(await signIn(new FakePage(() => []), credentials, logger)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('[apply] Login form not found, continuing signed out');
  });

  it('carries on signed out when navigation fails', async () => {
    const logger = createLogger();
    const page = new FakePage(() => [], { failNavigation: () => new Error('net::ERR_NAME_NOT_RESOLVED') });

    expect(await signIn(page, credentials, logger)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('[apply] Login failed: net::ERR_NAME_NOT_RESOLVED, continuing signed out');
  });
});
