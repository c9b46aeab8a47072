// Item variants: discriminated by itemType (the save-file "item_type" tag)

import type { DamageType, ItemKind } from './enums.js';

export type ResistanceMap = Partial<Record<DamageType, number>>; // percent

export interface ItemBase {
  id: string;
  name: string;
  description: string;
  kind: ItemKind;
  value: number;
  weight: number;
  usable: boolean;
  equippable: boolean;
  quantity: number;
  equipped: boolean;
}

export interface WeaponStats {
  damage: number;
  damageType: DamageType;
  twoHanded: boolean;
  scaling?: 'strength' | 'dexterity';
  staminaCost: number;
  weaponType: string;
}

export interface ArmorStats {
  defense: number;
  armorType: 'body' | 'shield';
  resistance: ResistanceMap;
}

export interface ConsumableEffect {
  effectType: 'heal' | 'stamina' | 'buff';
  value: number;
  duration: number; // 0 = instant
  buffStat?: 'attack' | 'defense';
}

export interface AccessoryStats {
  defense: number;
  resistance: ResistanceMap;
}

export interface WeaponItem extends ItemBase {
  itemType: 'weapon';
  kind: 'weapon';
  weapon: WeaponStats;
}

export interface ArmorItem extends ItemBase {
  itemType: 'armor';
  kind: 'armor';
  armor: ArmorStats;
}

export interface ConsumableItem extends ItemBase {
  itemType: 'consumable';
  kind: 'consumable';
  effect: ConsumableEffect;
}

export interface PlainItem extends ItemBase {
  itemType: 'item';
  kind: Exclude<ItemKind, 'weapon' | 'armor' | 'consumable'>;
  accessory?: AccessoryStats;
}

export type Item = WeaponItem | ArmorItem | ConsumableItem | PlainItem;
export type ItemType = Item['itemType'];

export function isWeapon(item: Item): item is WeaponItem {
  return item.itemType === 'weapon';
}

export function isArmor(item: Item): item is ArmorItem {
  return item.itemType === 'armor';
}

export function isConsumable(item: Item): item is ConsumableItem {
  return item.itemType === 'consumable';
}

/** Items are templates in content; the player always owns a fresh copy. */
export function cloneItem<T extends Item>(item: T, quantity = item.quantity): T {
  return structuredClone({ ...item, quantity, equipped: false });
}
