import { chromium } from 'playwright';
import { createInterface } from 'readline';
import { DelayRange, ScraperConfig } from '../schemas/config';
import { BrowserSession } from '../scrapers/types';
import { pickUserAgent, randomViewport } from '../utils/userAgents';
import { Random, randomBetween, randomInt } from '../utils/random';
import { logger } from '../utils/logger';
import { PlaywrightSession } from './session';

export type Pause = (range: DelayRange) => Promise<void>;

// Masks the navigator/WebGL properties public bot checks look at.
export const EVASION_SCRIPT = `
Object.defineProperty(navigator, 'webdriver', {get: () => undefined});
Object.defineProperty(navigator, 'platform', {get: () => 'Win32'});
Object.defineProperty(navigator, 'language', {get: () => 'ru-RU'});
Object.defineProperty(navigator, 'languages', {get: () => ['ru-RU','ru','en-US']});
Object.defineProperty(navigator, 'plugins', {get: () => [1,2,3]});
Object.defineProperty(navigator, 'hardwareConcurrency', {get: () => 8});
if (typeof WebGLRenderingContext !== 'undefined') {
  const getParameter = WebGLRenderingContext.prototype.getParameter;
  WebGLRenderingContext.prototype.getParameter = function(parameter) {
    if (parameter === 37445) return 'Intel Inc.';
    if (parameter === 37446) return 'Intel Iris OpenGL Engine';
    return getParameter.call(this, parameter);
  };
}
`;

export async function openSession(config: ScraperConfig, random: Random = Math.random): Promise<BrowserSession> {
  const userAgent = pickUserAgent(config.userAgents, random);
  const viewport = randomViewport(config, random);

  logger.info({ headless: config.headless, viewport }, 'opening browser');
  const browser = await chromium.launch({
    headless: config.headless,
    args: [
      '--no-sandbox',
      '--disable-dev-shm-usage',
      '--lang=ru-RU',
      '--disable-blink-features=AutomationControlled',
      `--window-size=${viewport.width},${viewport.height}`,
    ],
    ignoreDefaultArgs: ['--enable-automation'],
    timeout: config.navigationTimeout,
  });
  try {
    const context = await browser.newContext({
      userAgent,
      viewport,
      locale: 'ru-RU',
      extraHTTPHeaders: { 'Accept-Language': config.acceptLanguage },
    });
    await context.addInitScript(EVASION_SCRIPT);
    const page = await context.newPage();
    return new PlaywrightSession(browser, context, page, config.navigationTimeout);
  } catch (e) {
    await browser.close();
    throw e;
  }
}

export function humanDelay(range: DelayRange, random: Random = Math.random): Promise<void> {
  const ms = Math.floor(randomBetween(range, random));
  return new Promise(r => setTimeout(r, ms));
}

type ScrollSettings = Pick<ScraperConfig, 'scrollSteps' | 'scrollDelay' | 'scrollResetDelay'>;

/** A few smooth scroll steps down and back up, so lazy cards get rendered. */
export async function scrollGently(session: BrowserSession, config: ScrollSettings, pause: Pause, random: Random = Math.random) {
  const measured = await session.evaluate('document.body.scrollHeight');
  const height = typeof measured === 'number' && measured > 0 ? measured : 1000;
  const steps = randomInt(config.scrollSteps[0], config.scrollSteps[1], random);
  for (let i = 0; i < steps; i++) {
    const y = Math.floor((height * (i + 1)) / (steps + 1));
    await session.evaluate(`window.scrollTo({top:${y}, behavior:'smooth'});`);
    await pause(config.scrollDelay);
  }
  await session.evaluate(`window.scrollTo({top:0, behavior:'smooth'});`);
  await pause(config.scrollResetDelay);
}

/** Blocks until the operator presses Enter (or stdin closes). */
export function waitForOperator(message: string): Promise<void> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  return new Promise<void>(resolve => {
    rl.once('close', () => resolve());
    rl.question(`${message}\n`, () => {
      rl.close();
    });
  });
}
