import { CardDataError, EmptySheetError, UnknownSetError } from '../errors/BoosterErrors';
import {
  BoosterCard,
  COLORS,
  Color,
  CompositionRule,
  FoilEntry,
  FoilTier,
  FormatTag,
  RARITIES,
  Rarity,
  RawBoosterRule,
  RawCardRecord,
  RawSetRecord,
  SetMetadata,
  SetPool,
  SetSheets
} from '../interfaces/BoosterInterfaces';

export interface PoolDefaults {
  mythicRate: number;
  foilRate: number;
  foilRarityWeights: Readonly<Record<FoilTier, number>>;
}

const FORMAT_TAGS: readonly FormatTag[] = ['standard', 'historic', 'explorer'];
const CARD_FIELDS = new Set(['uuid', 'name', 'number', 'rarity', 'colors', 'type', 'hasFoil']);

const isRarity = (value: string): value is Rarity => (RARITIES as readonly string[]).includes(value);
const isColor = (value: string): value is Color => (COLORS as readonly string[]).includes(value);
const isFormatTag = (value: string): value is FormatTag => (FORMAT_TAGS as readonly string[]).includes(value);

/** Returns null for records that cannot take part in a booster (no id, name or known rarity). */
export const normalizeCard = (raw: RawCardRecord, setCode: string): BoosterCard | null => {
  if (!raw.uuid || !raw.name || typeof raw.rarity !== 'string') return null;
  const rarity = raw.rarity.toLowerCase();
  if (!isRarity(rarity)) return null;

  const metadata: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (!CARD_FIELDS.has(key)) metadata[key] = value;
  }

  return Object.freeze({
    id: raw.uuid,
    name: raw.name,
    setCode,
    number: raw.number ?? '',
    rarity,
    colors: Object.freeze((raw.colors ?? []).filter(isColor)),
    typeLine: raw.type ?? '',
    foilEligible: raw.hasFoil === true,
    metadata: Object.freeze(metadata)
  });
};

const checkCount = (setCode: string, field: string, value: number) => {
  if (!Number.isInteger(value) || value < 0) {
    throw new CardDataError(`Set ${setCode}: booster ${field} must be a non-negative integer, got ${value}`);
  }
};

const checkRate = (setCode: string, field: string, value: number) => {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new CardDataError(`Set ${setCode}: booster ${field} must be between 0 and 1, got ${value}`);
  }
};

export const buildComposition = (setCode: string, raw: RawBoosterRule, defaults: PoolDefaults): CompositionRule => {
  const rule: CompositionRule = {
    rareSlots: raw.rareSlots ?? 1,
    uncommons: raw.uncommons ?? 3,
    commons: raw.commons ?? 10,
    landSlot: raw.landSlot ?? false,
    mythicRate: raw.mythicRate ?? defaults.mythicRate,
    foil: raw.foil === false ? null : {
      rate: raw.foil?.rate ?? defaults.foilRate,
      mode: raw.foil?.mode ?? 'replace',
      rarityWeights: Object.freeze({ ...defaults.foilRarityWeights, ...raw.foil?.rarityWeights })
    },
    bonus: raw.bonus ? { rate: raw.bonus.rate } : null
  };

  checkCount(setCode, 'rareSlots', rule.rareSlots);
  checkCount(setCode, 'uncommons', rule.uncommons);
  checkCount(setCode, 'commons', rule.commons);
  checkRate(setCode, 'mythicRate', rule.mythicRate);
  if (rule.foil) checkRate(setCode, 'foil.rate', rule.foil.rate);
  if (rule.bonus) checkRate(setCode, 'bonus.rate', rule.bonus.rate);

  const reserved = (rule.landSlot ? 1 : 0) + (rule.bonus ? 1 : 0) + (rule.foil?.mode === 'replace' ? 1 : 0);
  if (rule.commons < reserved) {
    throw new CardDataError(`Set ${setCode}: ${rule.commons} common slots cannot hold ${reserved} special slots`);
  }
  return Object.freeze(rule);
};

const FOIL_TIERS: Partial<Record<Rarity, FoilTier>> = {
  common: 'common',
  uncommon: 'uncommon',
  rare: 'rare',
  mythic: 'mythic'
};

export const buildSheets = (cards: readonly BoosterCard[], composition: CompositionRule): SetSheets => {
  const commons: BoosterCard[] = [];
  const uncommons: BoosterCard[] = [];
  const rares: BoosterCard[] = [];
  const mythics: BoosterCard[] = [];
  const lands: BoosterCard[] = [];
  const bonus: BoosterCard[] = [];
  const foils: FoilEntry[] = [];

  for (const card of cards) {
    const isLand = card.typeLine.includes('Land');
    const isBasic = isLand && card.typeLine.includes('Basic');

    if (card.rarity === 'land' || isBasic) {
      lands.push(card);
      continue;
    }
    if (card.rarity === 'common' && isLand) {
      // Common duals live on the land sheet; sets without a land slot leave them out
      if (composition.landSlot) lands.push(card);
      continue;
    }

    if (card.rarity === 'common') commons.push(card);
    else if (card.rarity === 'uncommon') uncommons.push(card);
    else if (card.rarity === 'rare') rares.push(card);
    else if (card.rarity === 'mythic') mythics.push(card);
    else bonus.push(card);

    const tier = FOIL_TIERS[card.rarity];
    if (card.foilEligible && tier) {
      foils.push(Object.freeze({ card, tier }));
    }
  }

  return Object.freeze({
    commons: Object.freeze(commons),
    uncommons: Object.freeze(uncommons),
    rares: Object.freeze(rares),
    mythics: Object.freeze(mythics),
    lands: Object.freeze(lands),
    bonus: Object.freeze(bonus),
    foils: Object.freeze(foils)
  });
};

/** Returns null for sets that ship no boosters. */
export const buildSetPool = (record: RawSetRecord, defaults: PoolDefaults): SetPool | null => {
  if (!record.booster) return null;
  const code = record.code.toUpperCase();
  const composition = buildComposition(code, record.booster, defaults);

  const seen = new Set<string>();
  const cards: BoosterCard[] = [];
  for (const raw of record.cards) {
    const card = normalizeCard(raw, code);
    if (!card || seen.has(card.id)) continue;
    seen.add(card.id);
    cards.push(card);
  }

  const metadata: SetMetadata = Object.freeze({
    code,
    name: record.name,
    releaseDate: record.releaseDate,
    balanced: record.booster.balanced ?? false,
    formats: Object.freeze((record.formats ?? []).map(f => f.toLowerCase()).filter(isFormatTag)),
    composition,
    cardCount: cards.length
  });

  return Object.freeze({ metadata, sheets: buildSheets(cards, composition) });
};

/**
 * Immutable per-set lookup tables. A new index is built for every data
 * (re)load; generation calls hold on to the instance they started with.
 */
export class CardPoolIndex {
  private readonly pools: ReadonlyMap<string, SetPool>;
  private readonly ordered: readonly SetMetadata[];

  constructor(pools: Iterable<SetPool>) {
    const map = new Map<string, SetPool>();
    for (const pool of pools) map.set(pool.metadata.code, pool);
    this.pools = map;
    this.ordered = Object.freeze(
      [...map.values()]
        .map(p => p.metadata)
        .sort((a, b) => a.releaseDate.localeCompare(b.releaseDate) || a.code.localeCompare(b.code))
    );
  }

  static fromRecords(records: Iterable<RawSetRecord>, defaults: PoolDefaults): CardPoolIndex {
    const pools: SetPool[] = [];
    for (const record of records) {
      const pool = buildSetPool(record, defaults);
      if (pool) pools.push(pool);
    }
    return new CardPoolIndex(pools);
  }

  get size(): number {
    return this.pools.size;
  }

  metadata(code: string): SetMetadata | undefined {
    return this.pools.get(code.trim().toUpperCase())?.metadata;
  }

  /** Set codes in release order */
  codes(): string[] {
    return this.ordered.map(s => s.code);
  }

  sets(): readonly SetMetadata[] {
    return this.ordered;
  }

  lookup(code: string): SetPool {
    const pool = this.pools.get(code.trim().toUpperCase());
    if (!pool) throw new UnknownSetError(code);

    const { composition, code: setCode } = pool.metadata;
    const { sheets } = pool;
    if (composition.commons - (composition.landSlot ? 1 : 0) > 0 && sheets.commons.length === 0) {
      throw new EmptySheetError(setCode, 'common');
    }
    if (composition.uncommons > 0 && sheets.uncommons.length === 0) {
      throw new EmptySheetError(setCode, 'uncommon');
    }
    if (composition.rareSlots > 0 && sheets.rares.length + sheets.mythics.length === 0) {
      throw new EmptySheetError(setCode, 'rare/mythic');
    }
    if (composition.landSlot && sheets.lands.length === 0) {
      throw new EmptySheetError(setCode, 'land');
    }
    return pool;
  }
}
