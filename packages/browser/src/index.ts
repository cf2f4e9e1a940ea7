export type {
  BrowserLaunchOptions,
  BrowserPage,
  BrowserSession,
  NavigationOptions,
  PageElement,
} from './types.js';
export { BrowserTimeoutError } from './errors.js';
export { launchBrowserSession } from './playwright.js';
