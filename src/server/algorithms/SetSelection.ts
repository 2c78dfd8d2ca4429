import { InvalidRequestError, UnknownSetError } from '../errors/BoosterErrors';
import { FormatTag, SetMetadata } from '../interfaces/BoosterInterfaces';
import { CardPoolIndex } from './CardPoolIndex';
import { RandomSource, pickOne } from './Random';

const FORMAT_TOKENS = new Map<string, FormatTag>([
  ['standard', 'standard'],
  ['historic', 'historic'],
  ['explorer', 'explorer'],
  ['chaos', 'historic']
]);

export const isSymbolicSelector = (selector: string): boolean => {
  const token = selector.trim().toLowerCase();
  return token === 'random' || FORMAT_TOKENS.has(token) || token.includes('|');
};

/** Sets a selector may resolve to. Explicit codes resolve to themselves. */
export const candidateSets = (selector: string, index: CardPoolIndex): SetMetadata[] => {
  const token = selector.trim().toLowerCase();
  if (!token) throw new InvalidRequestError('Empty set selector');

  if (token === 'random') return [...index.sets()];

  const format = FORMAT_TOKENS.get(token);
  if (format) return index.sets().filter(s => s.formats.includes(format));

  const codes = token.split('|').map(c => c.trim()).filter(Boolean);
  if (codes.length === 0) throw new InvalidRequestError(`Invalid set selector '${selector}'`);
  return codes.map(code => {
    const set = index.metadata(code);
    if (!set) throw new UnknownSetError(code);
    return set;
  });
};

/**
 * Resolves a request token (random, historic, standard, explorer, chaos,
 * a `|`-separated list of codes, or a single code) to one set code.
 * Pure apart from the random source.
 */
export const resolveSetSelector = (selector: string, index: CardPoolIndex, rng: RandomSource): string => {
  const candidates = candidateSets(selector, index);
  if (candidates.length === 0) {
    throw new UnknownSetError(selector, `No sets with boosters match '${selector.trim()}'`);
  }
  return pickOne(rng, candidates).code;
};
