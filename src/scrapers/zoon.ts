import { CardHandle, CatalogScraper } from './types';
import { createPlace } from '../schemas/place';
import { cleanCategory, normalizeRating, uniqueInOrder } from '../extractors/normalize';

const SELECTORS = {
  containers: ['ul.js-results-group', 'div.catalog-list', 'div.results-container'],
  cards: ['li.minicard-item.js-results-item', 'div.minicard-item'],
  titles: ['a.title-link.js-item-url', '.minicard-item__title', 'h2'],
  rating: '.minicard-item__rating, .rating, .stars',
  categories: '.minicard-item__features a, .service-items a, .tags a',
};

async function extractName(card: CardHandle): Promise<string> {
  for (const sel of SELECTORS.titles) {
    const el = await card.find(sel);
    const text = el ? (await el.text()).trim() : '';
    if (text) return text;
  }
  return '';
}

async function extractRating(card: CardHandle): Promise<number | null> {
  const el = await card.find(SELECTORS.rating);
  if (!el) return null;
  return normalizeRating((await el.text()).trim());
}

async function extractCategories(card: CardHandle): Promise<string[]> {
  const links = await card.findAll(SELECTORS.categories);
  const texts: string[] = [];
  for (const link of links) texts.push(cleanCategory(await link.text()));
  return uniqueInOrder(texts);
}

export const ZoonScraper: CatalogScraper = {
  name: 'Zoon',

  async waitForContainer(session, timeoutMs) {
    for (const sel of SELECTORS.containers) {
      if (await session.waitForSelector(sel, timeoutMs)) return sel;
    }
    return null;
  },

  async collectCards(lookup) {
    for (const sel of SELECTORS.cards) {
      const items = await lookup.findAll(sel);
      if (items.length) return items;
    }
    return [];
  },

  async extractPlace(card) {
    return createPlace({
      name: await extractName(card),
      rating: await extractRating(card),
      categories: await extractCategories(card),
    });
  },
};
