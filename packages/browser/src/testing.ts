import { BrowserTimeoutError } from './errors.js';
import type { BrowserPage, BrowserSession, NavigationOptions, PageElement } from './types.js';

export interface FakeElementInit {
  text?: string;
  value?: string;
  attributes?: Record<string, string>;
  children?: Record<string, FakeElement[]>;
  onClick?: () => void;
}

/** In-memory element that records every interaction. */
export class FakeElement implements PageElement {
  text: string;
  value: string;
  checked = false;
  clicks = 0;
  files: string[] = [];
  readonly attributes: Record<string, string>;
  private readonly children: Record<string, FakeElement[]>;
  private readonly onClick?: () => void;

  constructor(init: FakeElementInit = {}) {
    this.text = init.text ?? '';
    this.value = init.value ?? '';
    this.attributes = init.attributes ?? {};
    this.children = init.children ?? {};
    this.onClick = init.onClick;
  }

  async innerText(): Promise<string> {
    return this.text;
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.attributes[name] ?? null;
  }

  async inputValue(): Promise<string> {
    return this.value;
  }

  async fill(value: string): Promise<void> {
    this.value = value;
  }

  async click(): Promise<void> {
    this.clicks++;
    this.onClick?.();
  }

  async check(): Promise<void> {
    this.checked = true;
  }

  async setInputFiles(path: string): Promise<void> {
    this.files.push(path);
  }

  async selectOption(value: string): Promise<void> {
    this.value = value;
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    return this.children[selector] ?? [];
  }
}

export type FakeDom = (selector: string, url: string | undefined) => FakeElement[];

export interface FakePageOptions {
  /** Make `goto` fail for matching urls. */
  failNavigation?: (url: string) => Error | undefined;
}

/**
 * Page whose DOM is a function of the selector and the current url, so tests
 * can script multi-step flows by closing over their own state.
 */
export class FakePage implements BrowserPage {
  url: string | undefined;
  readonly visited: string[] = [];
  waitedMs = 0;
  closed = false;

  constructor(
    private readonly dom: FakeDom,
    private readonly options: FakePageOptions = {},
  ) {}

  async goto(url: string, _options?: NavigationOptions): Promise<void> {
    this.visited.push(url);
    const failure = this.options.failNavigation?.(url);
    if (failure) {
      throw failure;
    }
    this.url = url;
  }

  async waitForTimeout(ms: number): Promise<void> {
    this.waitedMs += ms;
  }

  async querySelector(selector: string): Promise<PageElement | null> {
    return this.dom(selector, this.url)[0] ?? null;
  }

  async querySelectorAll(selector: string): Promise<PageElement[]> {
    return this.dom(selector, this.url);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export function navigationTimeout(url: string): BrowserTimeoutError {
  return new BrowserTimeoutError(`Timeout 20000ms exceeded navigating to ${url}`);
}

export class FakeBrowserSession implements BrowserSession {
  readonly pages: FakePage[] = [];
  closed = false;

  constructor(private readonly createPage: () => FakePage) {}

  async newPage(): Promise<BrowserPage> {
    const page = this.createPage();
    this.pages.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
