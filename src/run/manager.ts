import { humanDelay, Pause, scrollGently } from '../agent/human';
import { resolveChallenge } from '../agent/challenge';
import { Place } from '../schemas/place';
import { pageUrl, ScraperConfig } from '../schemas/config';
import { ZoonScraper } from '../scrapers/zoon';
import { BrowserSession, CatalogScraper } from '../scrapers/types';
import { ensureOutDir, saveFinal, savePartial } from '../utils/exporter';
import { logger, RunLog } from '../utils/logger';
import { Progress, ProgressStore, StopReason } from '../utils/progress';
import { Random } from '../utils/random';

export type ManagerDeps = {
  openSession: () => Promise<BrowserSession>;
  /** Resolves once the operator has dealt with a challenge in the visible window. */
  confirm: () => Promise<void>;
  pause?: Pause;
  random?: Random;
  log?: RunLog;
};

export type RunResult = {
  places: Place[];
  log: string[];
  progress: Readonly<Progress>;
};

export class ScrapeManager {
  private places: Place[] = [];
  private progress = new ProgressStore();
  private readonly log: RunLog;
  private readonly pause: Pause;
  private readonly random: Random;

  constructor(
    private readonly config: ScraperConfig,
    private readonly deps: ManagerDeps,
    private readonly scraper: CatalogScraper = ZoonScraper,
  ) {
    this.random = deps.random ?? Math.random;
    this.pause = deps.pause ?? (range => humanDelay(range, this.random));
    this.log = deps.log ?? new RunLog();
  }

  isRunning() { return this.progress.get().running; }

  async run(): Promise<RunResult> {
    if (this.isRunning()) throw new Error('run already in progress');
    this.places = [];
    this.progress.reset();
    this.progress.set({ running: true, pagesTarget: this.config.totalPages });

    let session: BrowserSession;
    try {
      ensureOutDir(this.config.outDir);
      session = await this.deps.openSession();
    } catch (e) {
      this.progress.set({ running: false });
      throw e;
    }

    try {
      let stop: StopReason = 'completed';
      for (let page = 1; page <= this.config.totalPages; page++) {
        const reason = await this.processPage(session, page);
        if (reason) { stop = reason; break; }
      }
      this.progress.set({ stopReason: stop });
    } finally {
      this.progress.set({ running: false });
      await session.close().catch(err => logger.debug({ err }, 'browser release failed'));
    }

    const files = saveFinal(this.config, this.places, this.log.entries());
    logger.info({ ...files, rows: this.places.length }, 'final output saved');
    return { places: this.places, log: this.log.entries(), progress: this.progress.get() };
  }

  /** Returns the reason to stop the run, or null to go on with the next page. */
  private async processPage(session: BrowserSession, page: number): Promise<StopReason | null> {
    const url = pageUrl(this.config, page);
    logger.info({ page, url }, 'opening page');
    this.progress.set({ currentPage: page });

    await session.goto(url);
    await this.pause(this.config.initialDelay);

    const challenge = await resolveChallenge(session, page, {
      config: this.config,
      pause: this.pause,
      confirm: () => this.confirmWithOperator(),
      log: this.log,
    });
    if (challenge === 'blocked') return 'challenge';
    if (challenge !== 'clear') logger.info({ page, challenge }, 'challenge passed');

    const container = await this.scraper.waitForContainer(session, this.config.containerTimeout);
    if (!container) {
      this.log.push('error', `Page ${page}: container not found, stopping`);
      return 'container-not-found';
    }

    await scrollGently(session, this.config, this.pause, this.random);

    const cards = await this.scraper.collectCards(session);
    if (!cards.length) {
      this.log.push('warn', `Page ${page}: no cards, stopping`);
      return 'no-cards';
    }

    let added = 0;
    for (const card of cards) {
      const place = await this.scraper.extractPlace(card);
      if (!place.name) continue;
      this.places.push(place);
      added++;
    }
    const st = this.progress.get();
    this.progress.set({
      pagesVisited: page,
      cardsSeen: st.cardsSeen + cards.length,
      placesCollected: this.places.length,
    });
    this.log.push('info', `Page ${page}: cards ${cards.length}, added ${added}, total ${this.places.length}`);

    const saved = savePartial(this.config, page, this.places, this.log.entries());
    logger.debug({ ...saved, rows: this.places.length }, 'autosave');

    await this.pause(this.config.pageDelay);
    return null;
  }

  private async confirmWithOperator() {
    this.progress.set({ interventionRequired: true });
    try {
      await this.deps.confirm();
    } finally {
      this.progress.set({ interventionRequired: false });
    }
  }
}
