// Merchant wares and purchases, paid in essence

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { matchesName } from '../../common/text-utils.js';
import {
  fail,
  succeed,
  type Item,
  type NpcDefinition,
  type Outcome,
  type Player,
} from '../../types/index.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { QuestService } from '../quests/quest.service.js';

export type ShopFailReason = 'NO_MERCHANT' | 'NOT_SOLD' | 'INSUFFICIENT_ESSENCE';

export interface ShopDisplayItem {
  itemId: string;
  name: string;
  description: string;
  price: number;
}

export type PurchaseOutcome = Outcome<ShopFailReason> & { item?: Item; questLines?: string[] };

@Injectable()
export class ShopService {
  constructor(
    private readonly contentLoader: ContentLoaderService,
    private readonly inventoryService: InventoryService,
    private readonly questService: QuestService,
  ) {}

  /** Price is the item's listed value. */
  getDisplayItems(npc: NpcDefinition): ShopDisplayItem[] {
    const result: ShopDisplayItem[] = [];
    for (const itemId of npc.shop ?? []) {
      const itemDef = this.contentLoader.getItem(itemId);
      if (!itemDef) continue;
      result.push({ itemId, name: itemDef.name, description: itemDef.description, price: itemDef.value });
    }
    return result;
  }

  describeWares(npc: NpcDefinition): string[] {
    const wares = this.getDisplayItems(npc);
    if (wares.length === 0) return [`${npc.name} has nothing to sell.`];
    return [
      `${npc.name} offers:`,
      ...wares.map((w) => `  ${w.name} - ${w.price} essence`),
    ];
  }

  purchase(player: Player, npc: NpcDefinition | undefined, query: string): PurchaseOutcome {
    if (!npc?.shop || npc.shop.length === 0) {
      return fail('NO_MERCHANT', 'There is no one here to trade with.');
    }

    const ware = this.getDisplayItems(npc).find((w) => matchesName(query, { id: w.itemId, name: w.name }));
    if (!ware) return fail('NOT_SOLD', `${npc.name} doesn't sell "${query}".`);

    if (player.essence < ware.price) {
      return fail(
        'INSUFFICIENT_ESSENCE',
        `${ware.name} costs ${ware.price} essence (you have ${player.essence}).`,
      );
    }

    const item = this.contentLoader.createItem(ware.itemId);
    if (!item) return fail('NOT_SOLD', `${npc.name} doesn't sell "${query}".`);

    player.essence -= ware.price;
    const entry = this.inventoryService.addItem(player, item);
    const questLines = this.questService
      .recordObjective(player, 'item', item.id)
      .flatMap((done) => done.lines);
    return {
      ...succeed(`You buy ${item.name} for ${ware.price} essence.`),
      item: entry,
      questLines,
    };
  }
}
