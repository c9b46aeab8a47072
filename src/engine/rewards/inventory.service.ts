// Inventory and equipment slots. Equipment stores item ids; the item stays in the inventory.

import { Injectable } from '@nestjs/common';
import { matchesName } from '../../common/text-utils.js';
import {
  EQUIPMENT_SLOTS,
  fail,
  isArmor,
  isConsumable,
  isWeapon,
  succeed,
  type ConsumableItem,
  type DamageType,
  type EquipmentSlot,
  type Item,
  type Outcome,
  type Player,
} from '../../types/index.js';
import { StatusService } from '../status/status.service.js';

export type InventoryFailReason =
  | 'NOT_FOUND'
  | 'NOT_EQUIPPABLE'
  | 'NOT_USABLE'
  | 'EMPTY_SLOT'
  | 'INSUFFICIENT_QUANTITY';

@Injectable()
export class InventoryService {
  constructor(private readonly statusService: StatusService) {}

  findById(player: Player, itemId: string): Item | undefined {
    return player.inventory.find((i) => i.id === itemId);
  }

  /** Equipped entries first, so "unequip sword" finds the one in hand. */
  findByName(player: Player, query: string): Item | undefined {
    const matches = player.inventory.filter((i) => matchesName(query, i));
    return matches.find((i) => i.equipped) ?? matches[0];
  }

  count(player: Player, itemId: string): number {
    return player.inventory
      .filter((i) => i.id === itemId)
      .reduce((sum, i) => sum + i.quantity, 0);
  }

  /** Non-equippable items stack by id; equippable ones always get their own entry. */
  addItem(player: Player, item: Item): Item {
    if (!item.equippable) {
      const existing = player.inventory.find((i) => i.id === item.id);
      if (existing) {
        existing.quantity += item.quantity;
        return existing;
      }
    }
    const entry = { ...item, equipped: false };
    player.inventory.push(entry);
    return entry;
  }

  /** Take `qty` off an entry; an entry at 0 leaves the inventory (and its slot). */
  removeQuantity(player: Player, itemId: string, qty = 1): Outcome<InventoryFailReason> {
    if (this.count(player, itemId) < qty) {
      return fail('INSUFFICIENT_QUANTITY', `You don't have ${qty} of that.`);
    }

    let remaining = qty;
    // unequipped copies go first
    const entries = player.inventory
      .filter((i) => i.id === itemId)
      .sort((a, b) => Number(a.equipped) - Number(b.equipped));
    for (const entry of entries) {
      if (remaining === 0) break;
      const taken = Math.min(entry.quantity, remaining);
      entry.quantity -= taken;
      remaining -= taken;
      if (entry.quantity === 0) {
        if (entry.equipped) this.clearSlotsFor(player, entry.id);
        player.inventory.splice(player.inventory.indexOf(entry), 1);
      }
    }
    return succeed(`Removed ${qty} × ${itemId}.`);
  }

  /** Which slot an item goes into; rings fill ring1, then ring2, then displace ring1. */
  slotFor(player: Player, item: Item): EquipmentSlot | null {
    if (!item.equippable) return null;
    if (isWeapon(item)) return 'weapon';
    if (isArmor(item)) return item.armor.armorType === 'shield' ? 'shield' : 'armor';
    if (item.kind === 'ring') {
      if (player.equipment.ring1 === null) return 'ring1';
      if (player.equipment.ring2 === null) return 'ring2';
      return 'ring1';
    }
    if (item.kind === 'amulet') return 'amulet';
    return null;
  }

  equip(player: Player, query: string): Outcome<InventoryFailReason> {
    const item = this.findByName(player, query);
    if (!item) return fail('NOT_FOUND', `You don't have "${query}".`);
    if (item.equipped) return succeed(`${item.name} is already equipped.`);

    const slot = this.slotFor(player, item);
    if (!slot) return fail('NOT_EQUIPPABLE', `${item.name} can't be equipped.`);

    const displaced: string[] = [];
    const release = (s: EquipmentSlot) => {
      const current = this.equippedItem(player, s);
      if (current) {
        current.equipped = false;
        displaced.push(current.name);
      }
      player.equipment[s] = null;
    };

    release(slot);
    // two hands: a greatweapon and a shield exclude each other
    if (slot === 'weapon' && isWeapon(item) && item.weapon.twoHanded) release('shield');
    if (slot === 'shield') {
      const weapon = this.equippedItem(player, 'weapon');
      if (weapon && isWeapon(weapon) && weapon.weapon.twoHanded) release('weapon');
    }

    player.equipment[slot] = item.id;
    item.equipped = true;

    const swapped = displaced.length > 0 ? ` (unequipped ${displaced.join(', ')})` : '';
    return succeed(`You equip ${item.name}${swapped}.`);
  }

  unequip(player: Player, slot: EquipmentSlot): Outcome<InventoryFailReason> {
    const item = this.equippedItem(player, slot);
    if (player.equipment[slot] === null) {
      return fail('EMPTY_SLOT', `Nothing is equipped in ${slot}.`);
    }
    player.equipment[slot] = null;
    if (item) item.equipped = false;
    return succeed(`You unequip ${item?.name ?? slot}.`);
  }

  /** Slot holding an item id, if any */
  slotOf(player: Player, itemId: string): EquipmentSlot | undefined {
    return EQUIPMENT_SLOTS.find((s) => player.equipment[s] === itemId);
  }

  equippedItem(player: Player, slot: EquipmentSlot): Item | undefined {
    const id = player.equipment[slot];
    if (id === null) return undefined;
    const copies = player.inventory.filter((i) => i.id === id);
    return copies.find((i) => i.equipped) ?? copies[0];
  }

  equippedItems(player: Player): Item[] {
    const items: Item[] = [];
    for (const slot of EQUIPMENT_SLOTS) {
      const item = this.equippedItem(player, slot);
      if (item && !items.includes(item)) items.push(item);
    }
    return items;
  }

  /** Summed resistance percent against one damage type across equipped gear */
  resistanceTotal(player: Player, damageType: DamageType): number {
    let total = 0;
    for (const item of this.equippedItems(player)) {
      if (isArmor(item)) total += item.armor.resistance[damageType] ?? 0;
      else if (item.itemType === 'item' && item.accessory) {
        total += item.accessory.resistance[damageType] ?? 0;
      }
    }
    return total;
  }

  /** Drink/apply a consumable outside the estus flask. */
  useItem(player: Player, query: string): Outcome<InventoryFailReason> {
    const item = this.findByName(player, query);
    if (!item) return fail('NOT_FOUND', `You don't have "${query}".`);
    if (!isConsumable(item) || !item.usable) {
      return fail('NOT_USABLE', `You can't use ${item.name}.`);
    }

    const message = this.applyConsumable(player, item);
    this.removeQuantity(player, item.id, 1);
    return succeed(message);
  }

  private applyConsumable(player: Player, item: ConsumableItem): string {
    const { effectType, value, duration, buffStat } = item.effect;
    switch (effectType) {
      case 'heal': {
        const before = player.hp;
        player.hp = Math.min(player.maxHp, player.hp + value);
        return `You use ${item.name} and recover ${player.hp - before} HP.`;
      }
      case 'stamina': {
        const before = player.stamina;
        player.stamina = Math.min(player.maxStamina, player.stamina + value);
        return `You use ${item.name} and recover ${player.stamina - before} stamina.`;
      }
      case 'buff':
        player.effects = this.statusService.applyEffect(player.effects, {
          type: buffStat === 'defense' ? 'defense_boost' : 'attack_boost',
          value,
          duration,
          source: item.id,
        });
        return `You use ${item.name}. Your ${buffStat ?? 'attack'} rises by ${value} for ${duration} turns.`;
    }
  }

  private clearSlotsFor(player: Player, itemId: string): void {
    for (const slot of EQUIPMENT_SLOTS) {
      if (player.equipment[slot] === itemId) player.equipment[slot] = null;
    }
  }
}
