import { InsufficientCardsError } from '../errors/BoosterErrors';
import { BoosterCard, FoilEntry, FoilTier, PackCard, SetPool, SlotKind } from '../interfaces/BoosterInterfaces';
import { RandomSource, pickOne, pickWeighted, sampleWithoutReplacement } from './Random';

const FOIL_TIERS: readonly FoilTier[] = ['common', 'uncommon', 'rare', 'mythic'];

const toSlot = (slot: SlotKind) => (card: BoosterCard): PackCard => ({ card, slot, foil: false });

const drawSheet = (
  rng: RandomSource,
  setCode: string,
  sheet: string,
  cards: readonly BoosterCard[],
  count: number
): BoosterCard[] => {
  if (cards.length < count) {
    throw new InsufficientCardsError(setCode, sheet, count, cards.length);
  }
  return sampleWithoutReplacement(rng, cards, count);
};

/**
 * Flips the mythic coin once per rare slot, then draws each tier without
 * replacement. A tier that runs dry spills its slots over to the other one.
 */
const drawRareSlots = (rng: RandomSource, pool: SetPool): PackCard[] => {
  const { rareSlots, mythicRate } = pool.metadata.composition;
  const { rares, mythics } = pool.sheets;
  if (rareSlots === 0) return [];
  if (rares.length + mythics.length < rareSlots) {
    throw new InsufficientCardsError(pool.metadata.code, 'rare/mythic', rareSlots, rares.length + mythics.length);
  }

  let mythicCount = 0;
  for (let i = 0; i < rareSlots; i++) {
    if (rng.next() < mythicRate) mythicCount++;
  }
  mythicCount = Math.min(mythicCount, mythics.length);
  let rareCount = rareSlots - mythicCount;
  if (rareCount > rares.length) {
    mythicCount += rareCount - rares.length;
    rareCount = rares.length;
  }

  return [
    ...sampleWithoutReplacement(rng, mythics, mythicCount).map(toSlot('rare')),
    ...sampleWithoutReplacement(rng, rares, rareCount).map(toSlot('rare'))
  ];
};

/**
 * Foil rarity is rolled among the tiers that still have an eligible card,
 * so a foil never repeats a card already in the pack.
 */
export const drawFoil = (
  rng: RandomSource,
  foils: readonly FoilEntry[],
  weights: Readonly<Record<FoilTier, number>>,
  present: ReadonlySet<string>
): PackCard | null => {
  const byTier = new Map<FoilTier, BoosterCard[]>();
  for (const entry of foils) {
    if (present.has(entry.card.id)) continue;
    const tierCards = byTier.get(entry.tier) ?? [];
    tierCards.push(entry.card);
    byTier.set(entry.tier, tierCards);
  }

  const tier = pickWeighted(rng, FOIL_TIERS.map(t => [t, byTier.has(t) ? weights[t] : 0] as const));
  if (!tier) return null;
  const candidates = byTier.get(tier);
  if (!candidates) return null;
  return { card: pickOne(rng, candidates), slot: 'foil', foil: true };
};

/**
 * Draws one raw, unbalanced candidate pack. Display order: rare/mythic,
 * uncommons, commons, bonus, land, foil.
 */
export const sampleBooster = (pool: SetPool, rng: RandomSource): PackCard[] => {
  const { code } = pool.metadata;
  const { composition } = pool.metadata;
  const { sheets } = pool;

  // Worst case, before a bonus or foil roll can free a common slot
  const maxCommonSlots = composition.commons - (composition.landSlot ? 1 : 0);
  if (sheets.commons.length < maxCommonSlots) {
    throw new InsufficientCardsError(code, 'common', maxCommonSlots, sheets.commons.length);
  }

  const rareCards = drawRareSlots(rng, pool);
  const uncommonCards = drawSheet(rng, code, 'uncommon', sheets.uncommons, composition.uncommons).map(toSlot('uncommon'));

  const hasBonus = composition.bonus !== null && sheets.bonus.length > 0 && rng.next() < composition.bonus.rate;
  const replaceFoil = composition.foil?.mode === 'replace' && rng.next() < composition.foil.rate;
  const commonSlots = maxCommonSlots - (hasBonus ? 1 : 0);
  const commonsNeeded = commonSlots - (replaceFoil ? 1 : 0);

  // One spare common covers a replacing foil that finds no eligible card
  const drawnCommons = sampleWithoutReplacement(rng, sheets.commons, commonSlots);
  const commonCards = drawnCommons.slice(0, commonsNeeded).map(toSlot('common'));

  const bonusCards = hasBonus ? [toSlot('bonus')(pickOne(rng, sheets.bonus))] : [];
  const landCards = composition.landSlot ? drawSheet(rng, code, 'land', sheets.lands, 1).map(toSlot('land')) : [];

  const pack = [...rareCards, ...uncommonCards, ...commonCards, ...bonusCards, ...landCards];

  if (composition.foil) {
    const extraFoil = composition.foil.mode === 'extra' && rng.next() < composition.foil.rate;
    if (replaceFoil || extraFoil) {
      const present = new Set(pack.map(p => p.card.id));
      const foil = drawFoil(rng, sheets.foils, composition.foil.rarityWeights, present);
      if (foil) {
        pack.push(foil);
      } else if (replaceFoil) {
        const spare = drawnCommons[commonsNeeded];
        pack.splice(rareCards.length + uncommonCards.length + commonCards.length, 0, toSlot('common')(spare));
      }
    }
  }

  return pack;
};

/** Per-slot counts a pack drawn from this set must have. */
export const countSlots = (cards: readonly PackCard[]): Record<SlotKind, number> => {
  const counts: Record<SlotKind, number> = { rare: 0, uncommon: 0, common: 0, land: 0, bonus: 0, foil: 0 };
  for (const c of cards) counts[c.slot]++;
  return counts;
};
