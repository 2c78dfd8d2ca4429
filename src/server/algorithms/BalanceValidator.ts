import { BalanceReport, BalanceRuleId, BoosterCard, COLORS, Color, ColorBucket, PackCard } from '../interfaces/BoosterInterfaces';

export const MAX_COMMONS_PER_COLOR = 4;
export const MAX_UNCOMMONS_PER_COLOR = 2;

export const BALANCE_RULES: Readonly<Record<BalanceRuleId, string>> = {
  1: `no color has more than ${MAX_COMMONS_PER_COLOR} commons`,
  2: 'every color has at least one common',
  3: 'at least one common is a creature',
  4: `no color has more than ${MAX_UNCOMMONS_PER_COLOR} uncommons`,
  5: 'no card appears twice'
};

export const colorBucket = (card: BoosterCard): ColorBucket => {
  if (card.colors.length === 0) return 'colorless';
  if (card.colors.length > 1) return 'multicolor';
  return card.colors[0];
};

/** Only monocolored cards are counted; multicolor and colorless cards belong to no color. */
export const countColors = (cards: readonly PackCard[]): Record<Color, number> => {
  const counts: Record<Color, number> = { W: 0, U: 0, B: 0, R: 0, G: 0 };
  for (const { card } of cards) {
    const bucket = colorBucket(card);
    if (bucket !== 'colorless' && bucket !== 'multicolor') counts[bucket]++;
  }
  return counts;
};

export const isCreature = (card: BoosterCard) => /\bCreature\b/.test(card.typeLine);

export const hasDuplicates = (cards: readonly PackCard[]): boolean =>
  new Set(cards.map(c => c.card.id)).size !== cards.length;

/**
 * Reuben's color-balancing rules. Rules 1-3 look at the common slots,
 * rule 4 at the uncommon slots, rule 5 at the whole pack. Every rule is
 * evaluated so a rejection can report all of its causes.
 */
export const checkPackBalance = (cards: readonly PackCard[]): BalanceReport => {
  const commons = cards.filter(c => c.slot === 'common');
  const uncommons = cards.filter(c => c.slot === 'uncommon');
  const commonColors = countColors(commons);
  const uncommonColors = countColors(uncommons);

  const violations: BalanceRuleId[] = [];
  if (COLORS.some(color => commonColors[color] > MAX_COMMONS_PER_COLOR)) violations.push(1);
  if (COLORS.some(color => commonColors[color] === 0)) violations.push(2);
  if (!commons.some(c => isCreature(c.card))) violations.push(3);
  if (COLORS.some(color => uncommonColors[color] > MAX_UNCOMMONS_PER_COLOR)) violations.push(4);
  if (hasDuplicates(cards)) violations.push(5);

  return { passed: violations.length === 0, violations };
};

export const describeViolations = (violations: readonly BalanceRuleId[]): string[] =>
  violations.map(id => `${id}: ${BALANCE_RULES[id]}`);
