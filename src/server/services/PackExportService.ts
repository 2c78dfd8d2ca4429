import { countSlots } from '../algorithms/BoosterSampler';
import { PackResult, Rarity, SlotKind } from '../interfaces/BoosterInterfaces';

export interface DeckEntry {
  name: string;
  set: string;
  count: number;
}

export interface PackSummary {
  setCode: string;
  size: number;
  balanced: boolean;
  validated: boolean;
  attempts: number;
  foils: number;
  rarities: Partial<Record<Rarity, number>>;
  slots: Record<SlotKind, number>;
}

export class PackExportService {

  /** Arena import format: `1 Name (SET) number`, one card per line. */
  toArena(pack: PackResult): string {
    return pack.cards
      .map(({ card }) => `1 ${card.name} (${card.setCode})${card.number ? ` ${card.number}` : ''}`)
      .join('\n');
  }

  /** Pool list for deck builders; identical cards across packs are merged into one entry. */
  toDeckJson(packs: readonly PackResult[]): DeckEntry[] {
    const entries = new Map<string, DeckEntry>();
    for (const pack of packs) {
      for (const { card } of pack.cards) {
        const key = `${card.setCode}:${card.name}`;
        const entry = entries.get(key);
        if (entry) entry.count++;
        else entries.set(key, { name: card.name, set: card.setCode, count: 1 });
      }
    }
    return [...entries.values()];
  }

  summarize(pack: PackResult): PackSummary {
    const rarities: Partial<Record<Rarity, number>> = {};
    for (const { card } of pack.cards) {
      rarities[card.rarity] = (rarities[card.rarity] ?? 0) + 1;
    }
    return {
      setCode: pack.setCode,
      size: pack.cards.length,
      balanced: pack.balanced,
      validated: pack.validated,
      attempts: pack.attempts,
      foils: pack.cards.filter(c => c.foil).length,
      rarities,
      slots: countSlots(pack.cards)
    };
  }
}
