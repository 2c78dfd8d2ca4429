import 'dotenv/config';
import { ConfigurationError } from '../errors/BoosterErrors';
import { FoilTier } from '../interfaces/BoosterInterfaces';

export interface BoosterConfig {
  port: number;
  cardDataPath: string;
  maxBalancingAttempts: number;
  mythicRate: number;
  foilRate: number;
  foilRarityWeights: Record<FoilTier, number>;
  sealedPackCount: number;
  maxPacksPerRequest: number;
}

// Mythics replace roughly one rare in eight. Community convention, not a published rate.
export const DEFAULT_MYTHIC_RATE = 0.125;

export const DEFAULT_FOIL_RARITY_WEIGHTS: Record<FoilTier, number> = {
  common: 10,
  uncommon: 4,
  rare: 1.75,
  mythic: 0.25
};

type Env = Record<string, string | undefined>;

const readInt = (env: Env, key: string, fallback: number, min: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new ConfigurationError(`${key} must be an integer >= ${min}, got '${raw}'`);
  }
  return value;
};

const readRate = (env: Env, key: string, fallback: number): number => {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new ConfigurationError(`${key} must be a probability between 0 and 1, got '${raw}'`);
  }
  return value;
};

export const loadBoosterConfig = (env: Env = process.env): BoosterConfig => ({
  port: readInt(env, 'PORT', 3000, 1),
  cardDataPath: env.CARD_DATA_PATH || 'data/sets.json',
  maxBalancingAttempts: readInt(env, 'MAX_BALANCING_ATTEMPTS', 100, 1),
  mythicRate: readRate(env, 'MYTHIC_RATE', DEFAULT_MYTHIC_RATE),
  foilRate: readRate(env, 'FOIL_RATE', 0.333),
  foilRarityWeights: { ...DEFAULT_FOIL_RARITY_WEIGHTS },
  sealedPackCount: readInt(env, 'SEALED_PACK_COUNT', 6, 1),
  maxPacksPerRequest: readInt(env, 'MAX_PACKS_PER_REQUEST', 36, 1)
});
