import type { BrowserPage } from '@jobhound/browser';
import type { ApplyLogger, PlatformCredentials } from './types.js';

const LOGIN_URL = 'https://www.linkedin.com/login';

/**
 * Signs the session in so later pages carry the cookies. A failed login is
 * logged and the batch goes on; the driver then ends in `no_easy_apply`.
 */
export async function signIn(page: BrowserPage, credentials: PlatformCredentials, logger: ApplyLogger): Promise<boolean> {
  try {
    await page.goto(LOGIN_URL);
    const username = await page.querySelector('#username');
    const password = await page.querySelector('#password');
    const submit = await page.querySelector('[type="submit"]');
    if (!username || !password || !submit) {
      logger.warn('[apply] Login form not found, continuing signed out');
      return false;
    }

    await username.fill(credentials.email);
    await password.fill(credentials.password);
    await submit.click();
    await page.waitForTimeout(3000);
    logger.info('[apply] Signed in');
    return true;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn(`[apply] Login failed: ${message}, continuing signed out`);
    return false;
  }
}
