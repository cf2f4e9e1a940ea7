export interface PageElement {
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  inputValue(): Promise<string>;
  fill(value: string): Promise<void>;
  click(): Promise<void>;
  check(): Promise<void>;
  setInputFiles(path: string): Promise<void>;
  selectOption(value: string): Promise<void>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
}

export interface NavigationOptions {
  timeoutMs?: number;
}

/**
 * The slice of a live page the pipeline drives. Timeouts surface as
 * `BrowserTimeoutError`; everything else propagates unchanged.
 */
export interface BrowserPage {
  goto(url: string, options?: NavigationOptions): Promise<void>;
  waitForTimeout(ms: number): Promise<void>;
  querySelector(selector: string): Promise<PageElement | null>;
  querySelectorAll(selector: string): Promise<PageElement[]>;
  close(): Promise<void>;
}

export interface BrowserSession {
  newPage(): Promise<BrowserPage>;
  close(): Promise<void>;
}

export interface BrowserLaunchOptions {
  headless: boolean;
  /** Chromium binary; playwright-core ships none. */
  executablePath?: string;
  /** Installed browser channel such as `chrome`, used when no path is given. */
  channel?: string;
  userAgent?: string;
}
