import { chromium, errors, type ElementHandle, type Page } from 'playwright-core';
import { BrowserTimeoutError } from './errors.js';
import type { BrowserLaunchOptions, BrowserPage, BrowserSession, NavigationOptions, PageElement } from './types.js';

const DEFAULT_NAVIGATION_TIMEOUT_MS = 20_000;
const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

async function translateTimeouts<T>(action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof errors.TimeoutError) {
      throw new BrowserTimeoutError(error.message);
    }
    throw error;
  }
}

class PlaywrightElement implements PageElement {
  constructor(private readonly handle: ElementHandle) {}

  innerText(): Promise<string> {
    return translateTimeouts(() => this.handle.innerText());
  }

  getAttribute(name: string): Promise<string | null> {
    return translateTimeouts(() => this.handle.getAttribute(name));
  }

  inputValue(): Promise<string> {
    return translateTimeouts(() => this.handle.inputValue());
  }

  fill(value: string): Promise<void> {
    return translateTimeouts(() => this.handle.fill(value));
  }

  click(): Promise<void> {
    return translateTimeouts(() => this.handle.click());
  }

  check(): Promise<void> {
    return translateTimeouts(() => this.handle.check());
  }

  setInputFiles(path: string): Promise<void> {
    return translateTimeouts(() => this.handle.setInputFiles(path));
  }

  async selectOption(value: string): Promise<void> {
    await translateTimeouts(() => this.handle.selectOption({ value }));
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const handles = await translateTimeouts(() => this.handle.$$(selector));
    return handles.map((handle) => new PlaywrightElement(handle));
  }
}

class PlaywrightPage implements BrowserPage {
  constructor(private readonly page: Page) {}

  async goto(url: string, options?: NavigationOptions): Promise<void> {
    await translateTimeouts(() =>
      this.page.goto(url, {
        waitUntil: 'domcontentloaded',
        timeout: options?.timeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS,
      }),
    );
  }

  waitForTimeout(ms: number): Promise<void> {
    return this.page.waitForTimeout(ms);
  }

  async querySelector(selector: string): Promise<PageElement | null> {
    const handle = await translateTimeouts(() => this.page.$(selector));
    return handle ? new PlaywrightElement(handle) : null;
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    const handles = await translateTimeouts(() => this.page.$$(selector));
    return handles.map((handle) => new PlaywrightElement(handle));
  }

  close(): Promise<void> {
    return this.page.close();
  }
}

/**
 * One Chromium instance with one context. Every page of a run shares its
 * cookies, so a login on the first page carries over.
 */
export async function launchBrowserSession(options: BrowserLaunchOptions): Promise<BrowserSession> {
  const browser = await chromium.launch({
    headless: options.headless,
    executablePath: options.executablePath,
    channel: options.executablePath ? undefined : options.channel,
    args: ['--no-sandbox', '--disable-dev-shm-usage'],
  });

  try {
    const context = await browser.newContext({
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      viewport: { width: 1280, height: 800 },
    });

    return {
      newPage: async () => new PlaywrightPage(await context.newPage()),
      close: () => browser.close(),
    };
  } catch (error) {
    await browser.close();
    throw error;
  }
}
