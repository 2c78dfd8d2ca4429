import fs from 'fs';
import path from 'path';
import { CardPoolIndex, PoolDefaults } from '../algorithms/CardPoolIndex';
import { CardDataError } from '../errors/BoosterErrors';
import {
  FoilTier,
  RawBoosterRule,
  RawCardRecord,
  RawFoilRule,
  RawSetRecord
} from '../interfaces/BoosterInterfaces';
import logger from '../utils/logger';

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(v => typeof v === 'string');

const optionalNumber = (source: JsonObject, key: string, context: string): number | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number') throw new CardDataError(`${context}: '${key}' must be a number`);
  return value;
};

const optionalBoolean = (source: JsonObject, key: string, context: string): boolean | undefined => {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new CardDataError(`${context}: '${key}' must be a boolean`);
  return value;
};

const FOIL_TIERS: readonly FoilTier[] = ['common', 'uncommon', 'rare', 'mythic'];

const parseFoil = (value: unknown, context: string): RawFoilRule | false | undefined => {
  if (value === undefined || value === false) return value;
  if (!isObject(value)) throw new CardDataError(`${context}: 'foil' must be an object or false`);

  const rawMode = value.mode;
  let mode: RawFoilRule['mode'];
  if (rawMode === 'replace' || rawMode === 'extra') mode = rawMode;
  else if (rawMode !== undefined) throw new CardDataError(`${context}: foil mode must be 'replace' or 'extra'`);

  const rawWeights = value.rarityWeights;
  let rarityWeights: Partial<Record<FoilTier, number>> | undefined;
  if (rawWeights !== undefined) {
    if (!isObject(rawWeights)) throw new CardDataError(`${context}: foil rarityWeights must be an object`);
    rarityWeights = {};
    for (const tier of FOIL_TIERS) {
      const weight = optionalNumber(rawWeights, tier, `${context} foil rarityWeights`);
      if (weight !== undefined) rarityWeights[tier] = weight;
    }
  }
  return { rate: optionalNumber(value, 'rate', `${context} foil`), mode, rarityWeights };
};

const parseBooster = (value: unknown, context: string): RawBoosterRule | undefined => {
  if (value === undefined || value === null) return undefined;
  if (!isObject(value)) throw new CardDataError(`${context}: 'booster' must be an object`);

  const rawBonus = value.bonus;
  let bonus: RawBoosterRule['bonus'];
  if (rawBonus !== undefined) {
    const rate = isObject(rawBonus) ? optionalNumber(rawBonus, 'rate', `${context} bonus`) : undefined;
    if (rate === undefined) throw new CardDataError(`${context}: bonus needs a numeric 'rate'`);
    bonus = { rate };
  }

  return {
    balanced: optionalBoolean(value, 'balanced', context),
    rareSlots: optionalNumber(value, 'rareSlots', context),
    uncommons: optionalNumber(value, 'uncommons', context),
    commons: optionalNumber(value, 'commons', context),
    landSlot: optionalBoolean(value, 'landSlot', context),
    mythicRate: optionalNumber(value, 'mythicRate', context),
    foil: parseFoil(value.foil, context),
    bonus
  };
};

const parseCard = (value: unknown): RawCardRecord | null => {
  if (!isObject(value)) return null;
  const { uuid, name, rarity, number, colors, type, hasFoil } = value;
  if (typeof uuid !== 'string' || typeof name !== 'string' || typeof rarity !== 'string') return null;
  return {
    ...value,
    uuid,
    name,
    rarity,
    number: typeof number === 'string' ? number : undefined,
    colors: isStringArray(colors) ? colors : undefined,
    type: typeof type === 'string' ? type : undefined,
    hasFoil: typeof hasFoil === 'boolean' ? hasFoil : undefined
  };
};

/**
 * Validates an MTGJSON-shaped database (`{ data: { CODE: set } }`).
 * Structural problems in a set are fatal; unusable card records are skipped.
 */
export const parseCardDatabase = (json: unknown): RawSetRecord[] => {
  const data = isObject(json) ? json.data : undefined;
  if (!isObject(data)) {
    throw new CardDataError("Card database must be an object with a 'data' map of sets");
  }

  const sets: RawSetRecord[] = [];
  for (const [key, entry] of Object.entries(data)) {
    const context = `Set ${key}`;
    if (!isObject(entry)) throw new CardDataError(`${context}: entry must be an object`);
    const rawCards: unknown = entry.cards;
    const rawFormats: unknown = entry.formats;
    if (!Array.isArray(rawCards)) throw new CardDataError(`${context}: 'cards' must be an array`);
    let formats: string[] | undefined;
    if (isStringArray(rawFormats)) formats = rawFormats;
    else if (rawFormats !== undefined) throw new CardDataError(`${context}: 'formats' must be a list of strings`);

    const cards: RawCardRecord[] = [];
    let skipped = 0;
    for (const raw of rawCards) {
      const card = parseCard(raw);
      if (card) cards.push(card);
      else skipped++;
    }
    if (skipped > 0) {
      logger.warn(`[CardData] ${context}: skipped ${skipped} malformed card records`);
    }

    sets.push({
      code: typeof entry.code === 'string' ? entry.code : key,
      name: typeof entry.name === 'string' ? entry.name : key,
      releaseDate: typeof entry.releaseDate === 'string' ? entry.releaseDate : '',
      formats,
      booster: parseBooster(entry.booster, context),
      cards
    });
  }
  return sets;
};

/**
 * Owns the current card pool snapshot. Loads build a whole new index and
 * swap it in with one assignment, so generation calls that already hold
 * the previous index keep reading it unchanged.
 */
export class CardDataService {
  private snapshot: CardPoolIndex | null = null;
  private loadedAt: Date | null = null;

  constructor(private readonly dataPath: string, private readonly defaults: PoolDefaults) { }

  get isLoaded(): boolean {
    return this.snapshot !== null;
  }

  get lastLoadedAt(): Date | null {
    return this.loadedAt;
  }

  getIndex(): CardPoolIndex {
    if (!this.snapshot) throw new CardDataError('Card data has not been loaded');
    return this.snapshot;
  }

  load(): CardPoolIndex {
    const filePath = path.resolve(process.cwd(), this.dataPath);
    logger.info(`[CardData] Loading card database from ${filePath}`);

    let json: unknown;
    try {
      json = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CardDataError(`Cannot read card database at ${filePath}: ${reason}`);
    }
    return this.useRecords(parseCardDatabase(json));
  }

  reload(): CardPoolIndex {
    logger.info('[CardData] Reloading card database');
    return this.load();
  }

  useRecords(records: Iterable<RawSetRecord>): CardPoolIndex {
    const index = CardPoolIndex.fromRecords(records, this.defaults);
    this.snapshot = index;
    this.loadedAt = new Date();

    const cardCount = index.sets().reduce((sum, s) => sum + s.cardCount, 0);
    logger.info(`[CardData] Indexed ${index.size} sets with boosters (${cardCount} cards)`);
    return index;
  }
}
