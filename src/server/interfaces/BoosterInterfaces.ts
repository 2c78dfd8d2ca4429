export const COLORS = ['W', 'U', 'B', 'R', 'G'] as const;
export type Color = typeof COLORS[number];

export const RARITIES = ['common', 'uncommon', 'rare', 'mythic', 'special', 'bonus', 'land'] as const;
export type Rarity = typeof RARITIES[number];

export type ColorBucket = Color | 'colorless' | 'multicolor';

export interface BoosterCard {
  id: string; // printed identifier (MTGJSON uuid)
  name: string;
  setCode: string;
  number: string;
  rarity: Rarity;
  colors: readonly Color[];
  typeLine: string;
  foilEligible: boolean;
  metadata: Readonly<Record<string, unknown>>; // display fields, passed through untouched
}

export type SlotKind = 'rare' | 'uncommon' | 'common' | 'land' | 'bonus' | 'foil';

export interface PackCard {
  card: BoosterCard;
  slot: SlotKind;
  foil: boolean;
}

export type FoilTier = 'common' | 'uncommon' | 'rare' | 'mythic';

export interface FoilRule {
  rate: number;
  mode: 'replace' | 'extra'; // replace: takes a common slot; extra: appended to the pack
  rarityWeights: Readonly<Record<FoilTier, number>>;
}

export interface CompositionRule {
  rareSlots: number;
  uncommons: number;
  commons: number; // common slots, including any taken by the land, bonus or replacing foil card
  landSlot: boolean;
  mythicRate: number;
  foil: FoilRule | null;
  bonus: { rate: number } | null;
}

export type FormatTag = 'standard' | 'historic' | 'explorer';

export interface SetMetadata {
  code: string; // upper case
  name: string;
  releaseDate: string;
  balanced: boolean;
  formats: readonly FormatTag[];
  composition: CompositionRule;
  cardCount: number;
}

export interface FoilEntry {
  card: BoosterCard;
  tier: FoilTier;
}

export interface SetSheets {
  commons: readonly BoosterCard[];
  uncommons: readonly BoosterCard[];
  rares: readonly BoosterCard[];
  mythics: readonly BoosterCard[];
  lands: readonly BoosterCard[];
  bonus: readonly BoosterCard[];
  foils: readonly FoilEntry[];
}

export interface SetPool {
  metadata: SetMetadata;
  sheets: SetSheets;
}

export type BalanceRuleId = 1 | 2 | 3 | 4 | 5;

export interface BalanceReport {
  passed: boolean;
  violations: BalanceRuleId[];
}

export type BalanceValidator = (cards: readonly PackCard[]) => BalanceReport;

export interface PackResult {
  setCode: string;
  setName: string;
  cards: PackCard[];
  balanced: boolean; // false only when the retry budget ran out
  validated: boolean; // false when the set skips balancing
  attempts: number;
  violations: BalanceRuleId[]; // rules failed by the returned pack
  seed: number;
  requestedBy?: string;
}

export interface GenerationOptions {
  seed?: number | string;
  requestedBy?: string;
}

// Raw database records (MTGJSON-like), before indexing

export interface RawFoilRule {
  rate?: number;
  mode?: 'replace' | 'extra';
  rarityWeights?: Partial<Record<FoilTier, number>>;
}

export interface RawBoosterRule {
  balanced?: boolean;
  rareSlots?: number;
  uncommons?: number;
  commons?: number;
  landSlot?: boolean;
  mythicRate?: number;
  foil?: RawFoilRule | false;
  bonus?: { rate: number };
}

export interface RawCardRecord {
  uuid: string;
  name: string;
  number?: string;
  rarity: string;
  colors?: string[];
  type?: string;
  hasFoil?: boolean;
  [key: string]: unknown;
}

export interface RawSetRecord {
  code: string;
  name: string;
  releaseDate: string;
  formats?: string[];
  booster?: RawBoosterRule;
  cards: RawCardRecord[];
}
