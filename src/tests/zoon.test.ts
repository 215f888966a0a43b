import { describe, expect, it } from 'vitest';
import { ZoonScraper } from '../scrapers/zoon';
import { CARD, FakeElement, FakeSession, RATING, TAGS, TITLE, card, catalogPage } from './fakes';

describe('ZoonScraper.extractPlace', () => {
  it('extracts name, rating and categories', async () => {
    const place = await ZoonScraper.extractPlace(new FakeElement(card('  Пельменная №1 ', 'Rating: 4,5 stars', ['Кафе', 'Бар'])));
    expect(place).toEqual({ name: 'Пельменная №1', rating: 4.5, categories: ['Кафе', 'Бар'] });
  });

  it('falls back through the title selectors', async () => {
    const el = new FakeElement({
      matches: {
        [TITLE]: [{ text: '   ' }],
        '.minicard-item__title': [{ text: '' }],
        h2: [{ text: 'Столовая' }],
      },
    });
    expect((await ZoonScraper.extractPlace(el)).name).toBe('Столовая');
  });

  it('gives an empty name when no title has text', async () => {
    const place = await ZoonScraper.extractPlace(new FakeElement({ matches: { h2: [{ text: ' \n ' }] } }));
    expect(place).toEqual({ name: '', rating: null, categories: [] });
  });

  it('treats a rating without digits as absent', async () => {
    const place = await ZoonScraper.extractPlace(new FakeElement(card('Кофейня', 'no score')));
    expect(place.rating).toBeNull();
  });

  it('de-duplicates categories after trimming separators', async () => {
    const el = new FakeElement({
      matches: {
        [TITLE]: [{ text: 'Гриль' }],
        [TAGS]: [{ text: ' A ·' }, { text: '— B' }, { text: 'A' }, { text: ' · ' }, { text: 'C\n' }],
      },
    });
    expect((await ZoonScraper.extractPlace(el)).categories).toEqual(['A', 'B', 'C']);
  });

  it('returns equal records for the same card', async () => {
    const el = new FakeElement(card('Бистро', '4', ['Кафе']));
    expect(await ZoonScraper.extractPlace(el)).toEqual(await ZoonScraper.extractPlace(el));
  });

  it('produces frozen records, categories included', async () => {
    const place = await ZoonScraper.extractPlace(new FakeElement(card('Бистро', '4', ['Кафе'])));
    expect(Object.isFrozen(place)).toBe(true);
    expect(Object.isFrozen(place.categories)).toBe(true);
    expect(() => Reflect.apply(Array.prototype.push, place.categories, ['Бар'])).toThrow(TypeError);
    expect(place.categories).toEqual(['Кафе']);
  });

  it('reads the rating from the combined selector', async () => {
    const el = new FakeElement({ matches: { [TITLE]: [{ text: 'X' }], [RATING]: [{ text: '9' }] } });
    expect((await ZoonScraper.extractPlace(el)).rating).toBe(9);
  });
});

describe('ZoonScraper.collectCards', () => {
  it('uses the first selector that matches anything', async () => {
    const doc = new FakeElement({
      matches: {
        [CARD]: [],
        'div.minicard-item': [card('A'), card('B')],
      },
    });
    expect(await ZoonScraper.collectCards(doc)).toHaveLength(2);
  });

  it('prefers the list item selector', async () => {
    const doc = new FakeElement({ matches: { [CARD]: [card('A')], 'div.minicard-item': [card('B'), card('C')] } });
    const cards = await ZoonScraper.collectCards(doc);
    expect(cards).toHaveLength(1);
    expect((await ZoonScraper.extractPlace(cards[0])).name).toBe('A');
  });

  it('returns nothing when no selector matches', async () => {
    expect(await ZoonScraper.collectCards(new FakeElement({}))).toEqual([]);
  });
});

describe('ZoonScraper.waitForContainer', () => {
  it('returns the first container selector that appears', async () => {
    const session = new FakeSession({ u: { containers: ['div.catalog-list', 'div.results-container'] } });
    await session.goto('u');
    expect(await ZoonScraper.waitForContainer(session, 10)).toBe('div.catalog-list');
  });

  it('returns null when none appears', async () => {
    const session = new FakeSession({ u: catalogPage([]) });
    await session.goto('elsewhere');
    expect(await ZoonScraper.waitForContainer(session, 10)).toBeNull();
  });
});
