import { errors, type Browser, type BrowserContext, type ElementHandle, type Page } from 'playwright';
import { BrowserSession, CardHandle } from '../scrapers/types';

type Handle = ElementHandle<SVGElement | HTMLElement>;

// what Playwright throws when a read races a redirect
const NAVIGATING = /page is navigating|Execution context was destroyed/i;

/**
 * Runs `op`; if it failed because the page was mid-navigation, waits for the
 * new document via `settle` and runs it once more.
 */
export async function retryAfterNavigation<T>(op: () => Promise<T>, settle: () => Promise<void>): Promise<T> {
  try {
    return await op();
  } catch (e) {
    if (!(e instanceof Error) || !NAVIGATING.test(e.message)) throw e;
    await settle();
    return op();
  }
}

class PlaywrightElement implements CardHandle {
  constructor(private handle: Handle) {}

  async find(selector: string) {
    const h = await this.handle.$(selector);
    return h ? new PlaywrightElement(h) : null;
  }

  async findAll(selector: string) {
    return (await this.handle.$$(selector)).map(h => new PlaywrightElement(h));
  }

  async text() {
    // innerText throws for SVG nodes
    try {
      return await this.handle.innerText();
    } catch {
      return (await this.handle.textContent()) ?? '';
    }
  }
}

export class PlaywrightSession implements BrowserSession {
  constructor(
    private browser: Browser,
    private context: BrowserContext,
    private page: Page,
    private navigationTimeoutMs: number,
  ) {}

  async goto(url: string) {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
  }

  content() {
    return retryAfterNavigation(() => this.page.content(), () => this.settle());
  }

  evaluate(script: string) {
    return retryAfterNavigation(() => this.page.evaluate<unknown>(script), () => this.settle());
  }

  private async settle() {
    await this.page.waitForLoadState('domcontentloaded', { timeout: this.navigationTimeoutMs });
  }

  async waitForSelector(selector: string, timeoutMs: number) {
    try {
      await this.page.waitForSelector(selector, { state: 'attached', timeout: timeoutMs });
      return true;
    } catch (e) {
      if (e instanceof errors.TimeoutError) return false;
      throw e;
    }
  }

  async reload() {
    await this.page.reload({ waitUntil: 'domcontentloaded', timeout: this.navigationTimeoutMs });
  }

  async find(selector: string) {
    const h = await this.page.$(selector);
    return h ? new PlaywrightElement(h) : null;
  }

  async findAll(selector: string) {
    return (await this.page.$$(selector)).map(h => new PlaywrightElement(h));
  }

  async close() {
    try {
      await this.page.close();
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}
