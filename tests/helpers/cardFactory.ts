import { CardPoolIndex, PoolDefaults, buildSetPool } from '../../src/server/algorithms/CardPoolIndex';
import { DEFAULT_FOIL_RARITY_WEIGHTS } from '../../src/server/config/booster.config';
import type {
  BoosterCard,
  Color,
  PackCard,
  RawBoosterRule,
  RawCardRecord,
  RawSetRecord,
  Rarity,
  SetPool,
  SlotKind
} from '../../src/server/interfaces/BoosterInterfaces';

export const COLOR_LIST: Color[] = ['W', 'U', 'B', 'R', 'G'];

export const TEST_DEFAULTS: PoolDefaults = {
  mythicRate: 0.125,
  foilRate: 0,
  foilRarityWeights: DEFAULT_FOIL_RARITY_WEIGHTS
};

export const rawCard = (
  uuid: string,
  rarity: string,
  colors: string[] = [],
  type = 'Creature — Test',
  extra: Partial<RawCardRecord> = {}
): RawCardRecord => ({
  uuid,
  name: `Card ${uuid}`,
  number: String(uuid.replace(/\D/g, '') || '0'),
  rarity,
  colors,
  type,
  hasFoil: true,
  ...extra
});

/** `perColor` cards of each of the five colors, ids `${prefix}-${color}${i}` */
export const colorSpread = (prefix: string, rarity: string, perColor: number, type = 'Creature — Test'): RawCardRecord[] =>
  COLOR_LIST.flatMap(color =>
    Array.from({ length: perColor }, (_, i) => rawCard(`${prefix}-${color}${i}`, rarity, [color], type))
  );

export const rawSet = (
  code: string,
  cards: RawCardRecord[],
  booster: RawBoosterRule | undefined = { balanced: true, foil: false },
  extra: Partial<RawSetRecord> = {}
): RawSetRecord => ({
  code,
  name: `Set ${code}`,
  releaseDate: '2020-01-01',
  formats: [],
  booster,
  cards,
  ...extra
});

export const poolOf = (record: RawSetRecord, defaults: PoolDefaults = TEST_DEFAULTS): SetPool => {
  const pool = buildSetPool(record, defaults);
  if (!pool) throw new Error(`Set ${record.code} has no booster`);
  return pool;
};

export const indexOf = (...records: RawSetRecord[]): CardPoolIndex =>
  CardPoolIndex.fromRecords(records, TEST_DEFAULTS);

/** Ten commons (one creature and one spell per color), three uncommons of distinct colors, rares and a mythic. */
export const standardCards = (prefix = 'std'): RawCardRecord[] => [
  ...COLOR_LIST.flatMap(color => [
    rawCard(`${prefix}-c${color}1`, 'common', [color], 'Creature — Soldier'),
    rawCard(`${prefix}-c${color}2`, 'common', [color], 'Instant')
  ]),
  rawCard(`${prefix}-uW`, 'uncommon', ['W']),
  rawCard(`${prefix}-uU`, 'uncommon', ['U']),
  rawCard(`${prefix}-uB`, 'uncommon', ['B']),
  rawCard(`${prefix}-r1`, 'rare', ['R']),
  rawCard(`${prefix}-r2`, 'rare', ['G']),
  rawCard(`${prefix}-m1`, 'mythic', ['B'])
];

export const boosterCard = (
  id: string,
  colors: Color[],
  typeLine = 'Creature — Test',
  rarity: Rarity = 'common'
): BoosterCard => ({
  id,
  name: `Card ${id}`,
  setCode: 'TST',
  number: '1',
  rarity,
  colors,
  typeLine,
  foilEligible: true,
  metadata: {}
});

export const inSlot = (slot: SlotKind, card: BoosterCard, foil = slot === 'foil'): PackCard => ({ card, slot, foil });

export const ids = (cards: readonly PackCard[]) => cards.map(c => c.card.id);
