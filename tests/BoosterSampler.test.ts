import { describe, expect, it } from 'vitest';
import { countSlots, drawFoil, sampleBooster } from '../src/server/algorithms/BoosterSampler';
import { SeededRandom } from '../src/server/algorithms/Random';
import { InsufficientCardsError } from '../src/server/errors/BoosterErrors';
import type { RawBoosterRule, RawCardRecord } from '../src/server/interfaces/BoosterInterfaces';
import { COLOR_LIST, colorSpread, ids, poolOf, rawCard, rawSet, standardCards } from './helpers/cardFactory';

const SEEDS = Array.from({ length: 50 }, (_, i) => i + 1);

const poolWith = (booster: RawBoosterRule, cards: RawCardRecord[] = standardCards()) =>
  poolOf(rawSet('STD', cards, booster));

const largeCards = (): RawCardRecord[] => [
  ...colorSpread('c', 'common', 4),
  ...colorSpread('u', 'uncommon', 2),
  ...colorSpread('r', 'rare', 1),
  rawCard('m-1', 'mythic', ['B']),
  rawCard('m-2', 'mythic', ['U'])
];

describe('sampleBooster', () => {
  it('fills every slot in display order', () => {
    const cards = sampleBooster(poolWith({ foil: false }), new SeededRandom(3));
    expect(cards).toHaveLength(14);
    expect(cards.map(c => c.slot)).toEqual([
      'rare',
      'uncommon', 'uncommon', 'uncommon',
      ...Array.from({ length: 10 }, () => 'common')
    ]);
    expect(cards.every(c => !c.foil)).toBe(true);
  });

  it('never repeats a card within a pack', () => {
    const pool = poolWith({ foil: { rate: 0.5, mode: 'replace' } }, largeCards());
    for (const seed of SEEDS) {
      const pack = ids(sampleBooster(pool, new SeededRandom(seed)));
      expect(new Set(pack).size).toBe(pack.length);
    }
  });

  it('is deterministic for a seed', () => {
    const pool = poolWith({ foil: { rate: 0.5, mode: 'replace' } }, largeCards());
    expect(sampleBooster(pool, new SeededRandom('same'))).toEqual(sampleBooster(pool, new SeededRandom('same')));
  });

  it('upgrades the rare slot to a mythic at the mythic rate', () => {
    const always = poolWith({ mythicRate: 1, foil: false });
    const never = poolWith({ mythicRate: 0, foil: false });
    for (const seed of SEEDS) {
      expect(sampleBooster(always, new SeededRandom(seed))[0].card.id).toBe('std-m1');
      expect(['std-r1', 'std-r2']).toContain(sampleBooster(never, new SeededRandom(seed))[0].card.id);
    }
  });

  it('falls back to the other tier when one is empty', () => {
    const noMythics = poolWith({ mythicRate: 1, foil: false }, standardCards().filter(c => c.rarity !== 'mythic'));
    const noRares = poolWith({ mythicRate: 0, foil: false }, standardCards().filter(c => c.rarity !== 'rare'));
    expect(sampleBooster(noMythics, new SeededRandom(1))[0].card.rarity).toBe('rare');
    expect(sampleBooster(noRares, new SeededRandom(1))[0].card.id).toBe('std-m1');
  });

  it('draws several rare slots without repeats', () => {
    const pool = poolWith({ rareSlots: 3, foil: false });
    const rares = sampleBooster(pool, new SeededRandom(9)).filter(c => c.slot === 'rare');
    expect(ids(rares).sort()).toEqual(['std-m1', 'std-r1', 'std-r2']);
  });

  it('throws InsufficientCardsError when a sheet is too small', () => {
    expect(() => sampleBooster(poolWith({ uncommons: 4, foil: false }), new SeededRandom(1))).toThrow(InsufficientCardsError);
    try {
      sampleBooster(poolWith({ commons: 11, foil: false }), new SeededRandom(1));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(InsufficientCardsError);
      if (err instanceof InsufficientCardsError) {
        expect([err.sheet, err.required, err.available]).toEqual(['common', 11, 10]);
      }
    }
  });

  it('rejects a short common sheet whatever the foil and bonus rolls', () => {
    const cards = [...standardCards().filter(c => c.uuid !== 'std-cG2'), rawCard('std-list', 'special', ['R'])];
    const pool = poolWith({ foil: { rate: 0.5, mode: 'replace' }, bonus: { rate: 0.5 } }, cards);
    for (const seed of SEEDS) {
      expect(() => sampleBooster(pool, new SeededRandom(seed))).toThrow(
        'Set STD needs 10 cards from its common sheet but only 9 are available'
      );
    }
  });

  it('fills the land slot from the land sheet', () => {
    const cards = [...standardCards(), rawCard('std-plains', 'land', [], 'Basic Land — Plains')];
    const pack = sampleBooster(poolWith({ landSlot: true, foil: false }, cards), new SeededRandom(4));
    expect(pack).toHaveLength(14);
    expect(countSlots(pack)).toEqual({ rare: 1, uncommon: 3, common: 9, land: 1, bonus: 0, foil: 0 });
    expect(pack[pack.length - 1]).toEqual(expect.objectContaining({ slot: 'land', foil: false }));
    expect(pack[pack.length - 1].card.id).toBe('std-plains');
  });

  it('adds the bonus card in place of a common', () => {
    const cards = [...standardCards(), rawCard('std-list', 'special', ['R'])];
    const pack = sampleBooster(poolWith({ bonus: { rate: 1 }, foil: false }, cards), new SeededRandom(4));
    expect(countSlots(pack)).toEqual({ rare: 1, uncommon: 3, common: 9, land: 0, bonus: 1, foil: 0 });
    expect(pack[pack.length - 1].card.id).toBe('std-list');
  });

  it('skips the bonus slot when the bonus sheet is empty', () => {
    const pack = sampleBooster(poolWith({ bonus: { rate: 1 }, foil: false }), new SeededRandom(4));
    expect(countSlots(pack).common).toBe(10);
  });

  it('replaces a common with a foil not already in the pack', () => {
    const pool = poolWith({ foil: { rate: 1, mode: 'replace' } });
    for (const seed of SEEDS) {
      const pack = sampleBooster(pool, new SeededRandom(seed));
      expect(pack).toHaveLength(14);
      expect(countSlots(pack)).toEqual({ rare: 1, uncommon: 3, common: 9, land: 0, bonus: 0, foil: 1 });
      const foil = pack[13];
      expect(foil.foil).toBe(true);
      expect(ids(pack.slice(0, 13))).not.toContain(foil.card.id);
    }
  });

  it('honours foil rarity weights', () => {
    const pool = poolWith({ foil: { rate: 1, mode: 'replace', rarityWeights: { common: 1, uncommon: 0, rare: 0, mythic: 0 } } });
    const pack = sampleBooster(pool, new SeededRandom(12));
    const foil = pack[13];
    expect(foil.card.rarity).toBe('common');
    // nine commons plus the foil common cover the whole common sheet
    expect(new Set(ids(pack.filter(c => c.card.rarity === 'common'))).size).toBe(10);
  });

  it('keeps the common when no foil is eligible', () => {
    const cards = standardCards().map(c => ({ ...c, hasFoil: false }));
    const pack = sampleBooster(poolWith({ foil: { rate: 1, mode: 'replace' } }, cards), new SeededRandom(5));
    expect(pack).toHaveLength(14);
    expect(countSlots(pack)).toEqual({ rare: 1, uncommon: 3, common: 10, land: 0, bonus: 0, foil: 0 });
  });

  it('appends an extra foil without taking a common slot', () => {
    const pack = sampleBooster(poolWith({ foil: { rate: 1, mode: 'extra' } }, largeCards()), new SeededRandom(6));
    expect(pack).toHaveLength(15);
    expect(countSlots(pack)).toEqual({ rare: 1, uncommon: 3, common: 10, land: 0, bonus: 0, foil: 1 });
  });

  it('drops an extra foil when every weighted tier is already in the pack', () => {
    const pool = poolWith({ foil: { rate: 1, mode: 'extra', rarityWeights: { common: 1, uncommon: 0, rare: 0, mythic: 0 } } });
    expect(sampleBooster(pool, new SeededRandom(6))).toHaveLength(14);
  });
});

describe('drawFoil', () => {
  const { sheets } = poolOf(rawSet('STD', standardCards()));
  const weights = { common: 1, uncommon: 1, rare: 1, mythic: 1 };

  it('skips cards that are already present', () => {
    const present = new Set(sheets.foils.map(f => f.card.id).filter(id => id !== 'std-uU'));
    const foil = drawFoil(new SeededRandom(1), sheets.foils, weights, present);
    expect(foil).toEqual({ card: expect.objectContaining({ id: 'std-uU' }), slot: 'foil', foil: true });
  });

  it('returns null when nothing is left', () => {
    const present = new Set(sheets.foils.map(f => f.card.id));
    expect(drawFoil(new SeededRandom(1), sheets.foils, weights, present)).toBeNull();
  });
});

describe('countSlots', () => {
  it('counts zero for unused slots', () => {
    expect(countSlots([])).toEqual({ rare: 0, uncommon: 0, common: 0, land: 0, bonus: 0, foil: 0 });
  });

  it('covers every color in the large pool', () => {
    const { sheets } = poolOf(rawSet('STD', largeCards()));
    expect(new Set(sheets.commons.flatMap(c => c.colors))).toEqual(new Set(COLOR_LIST));
  });
});
