import { checkPackBalance, describeViolations } from '../algorithms/BalanceValidator';
import { sampleBooster } from '../algorithms/BoosterSampler';
import { CardPoolIndex } from '../algorithms/CardPoolIndex';
import { RandomSource, createRandom } from '../algorithms/Random';
import { isSymbolicSelector, resolveSetSelector } from '../algorithms/SetSelection';
import { ConfigurationError, InvalidRequestError } from '../errors/BoosterErrors';
import {
  BalanceValidator,
  GenerationOptions,
  PackCard,
  PackResult,
  SetPool
} from '../interfaces/BoosterInterfaces';
import logger from '../utils/logger';

export interface PackGenerationSettings {
  maxBalancingAttempts: number;
  sealedPackCount: number;
  maxPacksPerRequest: number;
}

export type IndexProvider = () => CardPoolIndex;

const cardNames = (cards: readonly PackCard[]) => cards.map(c => c.foil ? `${c.card.name} (foil)` : c.card.name);

const MAX_SEED = 4294967295;

const nextSeed = (rng: RandomSource) => Math.floor(rng.next() * 4294967296);

export class PackGeneratorService {

  constructor(
    private readonly getIndex: IndexProvider,
    private readonly settings: PackGenerationSettings,
    private readonly validate: BalanceValidator = checkPackBalance
  ) {
    if (!Number.isInteger(settings.maxBalancingAttempts) || settings.maxBalancingAttempts < 1) {
      throw new ConfigurationError(`maxBalancingAttempts must be a positive integer, got ${settings.maxBalancingAttempts}`);
    }
  }

  /**
   * One pack for a set code or symbolic selector. The returned `seed`
   * regenerates the same pack when passed back with the resolved set code.
   */
  generatePack(selector: string, options: GenerationOptions = {}): PackResult {
    const index = this.getIndex();
    return this.generateOne(index, selector, this.checkSeed(options.seed), options.requestedBy);
  }

  /** Symbolic selectors are resolved again for every pack; an explicit code yields packs of that set only. */
  generateBatch(selector: string, count: number, options: GenerationOptions = {}): PackResult[] {
    this.checkCount(count);
    const index = this.getIndex();
    const rng = createRandom(this.checkSeed(options.seed));
    logger.info(`[PackGenerator] Generating ${count} packs for '${selector}'`, {
      independentSets: isSymbolicSelector(selector),
      requestedBy: options.requestedBy
    });

    const packs: PackResult[] = [];
    for (let i = 0; i < count; i++) {
      packs.push(this.generateOne(index, selector, nextSeed(rng), options.requestedBy));
    }
    return packs;
  }

  /** A sealed pool: the selector is resolved once and every pack comes from that set. */
  generateSealed(selector: string, options: GenerationOptions = {}): PackResult[] {
    const index = this.getIndex();
    const rng = createRandom(this.checkSeed(options.seed));
    const setCode = resolveSetSelector(selector, index, rng);
    logger.info(`[PackGenerator] Generating sealed pool of ${setCode}`, { requestedBy: options.requestedBy });

    const packs: PackResult[] = [];
    for (let i = 0; i < this.settings.sealedPackCount; i++) {
      packs.push(this.generateOne(index, setCode, nextSeed(rng), options.requestedBy));
    }
    return packs;
  }

  /** Chaos sealed: every pack from an independently chosen historic set. */
  generateChaos(options: GenerationOptions = {}): PackResult[] {
    return this.generateBatch('chaos', this.settings.sealedPackCount, options);
  }

  private generateOne(index: CardPoolIndex, selector: string, seed: number | string | undefined, requestedBy?: string): PackResult {
    const rng = createRandom(seed);
    const setCode = resolveSetSelector(selector, index, rng);
    return this.buildPack(index.lookup(setCode), rng, requestedBy);
  }

  /**
   * SAMPLE -> VALIDATE -> ACCEPT | RETRY. Every retry is a fresh draw of the
   * whole pack. When the budget runs out the last candidate is returned
   * flagged as unbalanced instead of failing the request.
   */
  private buildPack(pool: SetPool, rng: RandomSource, requestedBy?: string): PackResult {
    const { code, name, balanced: needsBalancing } = pool.metadata;
    const base = { setCode: code, setName: name, seed: rng.seed, ...(requestedBy !== undefined && { requestedBy }) };

    if (!needsBalancing) {
      const cards = sampleBooster(pool, rng);
      logger.debug(`[PackGenerator] ${code} is not balanced, skipping validation`);
      return { ...base, cards, balanced: true, validated: false, attempts: 1, violations: [] };
    }

    const maxAttempts = this.settings.maxBalancingAttempts;
    let cards = sampleBooster(pool, rng);
    let report = this.validate(cards);
    let attempts = 1;

    while (!report.passed && attempts < maxAttempts) {
      logger.debug(`[PackGenerator] Discarded ${code} pack (attempt ${attempts})`, {
        violations: describeViolations(report.violations),
        cards: cardNames(cards)
      });
      cards = sampleBooster(pool, rng);
      report = this.validate(cards);
      attempts++;
    }

    if (report.passed) {
      logger.info(`[PackGenerator] ${code} pack generated, attempts needed: ${attempts}`);
      return { ...base, cards, balanced: true, validated: true, attempts, violations: [] };
    }

    logger.warn(`[PackGenerator] ${code} pack still unbalanced after ${attempts} attempts`, {
      violations: describeViolations(report.violations),
      cards: cardNames(cards)
    });
    return { ...base, cards, balanced: false, validated: true, attempts, violations: report.violations };
  }

  private checkCount(count: number) {
    if (!Number.isInteger(count) || count < 1 || count > this.settings.maxPacksPerRequest) {
      throw new InvalidRequestError(`Pack count must be an integer between 1 and ${this.settings.maxPacksPerRequest}`);
    }
  }

  private checkSeed(seed: number | string | undefined): number | string | undefined {
    if (seed === undefined) return undefined;
    // Numeric seeds become the generator state unchanged
    if (typeof seed === 'number' && (!Number.isInteger(seed) || seed < 1 || seed > MAX_SEED)) {
      throw new InvalidRequestError(`Numeric seeds must be integers between 1 and ${MAX_SEED}`);
    }
    if (typeof seed === 'string' && seed.trim() === '') {
      throw new InvalidRequestError('Seed must be a finite number or a non-empty string');
    }
    return seed;
  }
}
