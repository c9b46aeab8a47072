// Loot rolls on victory

import { Injectable } from '@nestjs/common';
import type { EnemyTemplate, LootEntry } from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';

export interface LootDrop {
  itemId: string;
  quantity: number;
}

@Injectable()
export class RewardsService {
  /** One chance roll per table entry; quantity rolled in [min, max] (default 1). */
  rollLoot(template: EnemyTemplate, rng: Rng): LootDrop[] {
    const drops: LootDrop[] = [];
    for (const entry of template.loot) {
      if (rng.next() < entry.chance) {
        drops.push({ itemId: entry.itemId, quantity: this.rollQuantity(entry, rng) });
      }
    }
    return drops;
  }

  private rollQuantity(entry: LootEntry, rng: Rng): number {
    const min = entry.min ?? 1;
    const max = Math.max(min, entry.max ?? min);
    return min === max ? min : rng.range(min, max);
  }
}
