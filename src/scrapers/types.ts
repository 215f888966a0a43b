import { Place } from '../schemas/place';

export interface ElementLookup {
  find(selector: string): Promise<CardHandle | null>;
  findAll(selector: string): Promise<CardHandle[]>;
}

export interface CardHandle extends ElementLookup {
  text(): Promise<string>;
}

/**
 * What the run loop needs from a browser. Playwright backs it in production
 * (see agent/session.ts); tests use an in-memory document.
 */
export interface BrowserSession extends ElementLookup {
  goto(url: string): Promise<void>;
  /** Rendered HTML of the current document. */
  content(): Promise<string>;
  evaluate(script: string): Promise<unknown>;
  /** Resolves false when the selector is not attached within the timeout. */
  waitForSelector(selector: string, timeoutMs: number): Promise<boolean>;
  reload(): Promise<void>;
  close(): Promise<void>;
}

export type CatalogScraper = {
  name: string;
  waitForContainer: (session: BrowserSession, timeoutMs: number) => Promise<string | null>;
  collectCards: (lookup: ElementLookup) => Promise<CardHandle[]>;
  extractPlace: (card: CardHandle) => Promise<Place>;
};
