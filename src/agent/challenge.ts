import { ScraperConfig } from '../schemas/config';
import { BrowserSession } from '../scrapers/types';
import { RunLog } from '../utils/logger';
import { Pause } from './human';

export type ChallengeOutcome = 'clear' | 'cleared-by-poll' | 'cleared-by-manual' | 'blocked';

export function isChallengeScreen(content: string, markers: readonly string[]): boolean {
  const html = content.toLowerCase();
  return markers.some(m => html.includes(m.toLowerCase()));
}

export type ChallengeContext = {
  config: Pick<ScraperConfig,
    'headless' | 'challengeMarkers' | 'challengePollAttempts' | 'challengePollDelay' | 'manualRetryAttempts' | 'manualRetryDelay'>;
  pause: Pause;
  confirm: () => Promise<void>;
  log: RunLog;
};

/**
 * Waits out an anti-bot interstitial on the current page: automatic polling
 * first, then (only with a visible window) a manual pass by the operator
 * followed by reload-and-check rounds.
 */
export async function resolveChallenge(session: BrowserSession, page: number, ctx: ChallengeContext): Promise<ChallengeOutcome> {
  const { config, pause, log } = ctx;
  const challenged = async () => isChallengeScreen(await session.content(), config.challengeMarkers);

  if (!(await challenged())) return 'clear';

  log.push('warn', `Page ${page}: challenge screen, waiting for redirect`);
  for (let i = 0; i < config.challengePollAttempts; i++) {
    await pause(config.challengePollDelay);
    if (!(await challenged())) return 'cleared-by-poll';
  }

  if (config.headless) {
    log.push('error', `Page ${page}: challenge not passed, stopping`);
    return 'blocked';
  }

  log.push('warn', `Page ${page}: waiting for operator confirmation`);
  await ctx.confirm();

  for (let i = 0; i < config.manualRetryAttempts; i++) {
    await pause(config.manualRetryDelay);
    if (!(await challenged())) return 'cleared-by-manual';
    await session.reload();
  }

  log.push('error', `Page ${page}: challenge not passed after operator confirmation, stopping`);
  return 'blocked';
}
