// Spec-only builders. Excluded from the build.

import type { Clock } from '../engine/clock/clock.js';
import { Rng } from '../engine/rng/rng.service.js';
import {
  emptyEquipment,
  type ArmorItem,
  type BossDefinition,
  type ConsumableItem,
  type EnemyDefinition,
  type PlainItem,
  type Player,
  type WeaponItem,
} from '../types/index.js';

export class ManualClock implements Clock {
  constructor(private t = 0) {}

  now(): number {
    return this.t;
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/**
 * Rng that replays fixed draws for `next()`; once they run out every draw is 0.99,
 * so chance rolls below 99% fail.
 */
export class ScriptedRng extends Rng {
  private readonly draws: number[];

  constructor(draws: number[] = []) {
    super('scripted');
    this.draws = [...draws];
  }

  override next(): number {
    return this.draws.shift() ?? 0.99;
  }
}

export function makePlayer(overrides: Partial<Player> = {}): Player {
  return {
    name: 'Tester',
    characterClass: 'warrior',
    level: 1,
    essence: 0,
    lostEssence: null,
    hp: 100,
    maxHp: 100,
    stamina: 100,
    maxStamina: 100,
    estus: { current: 3, max: 3 },
    stats: { strength: 10, dexterity: 10, intelligence: 10, faith: 10, vitality: 10, endurance: 10 },
    inventory: [],
    equipment: emptyEquipment(),
    stance: 'balanced',
    currentLocationId: 'cemetery_of_ash',
    discoveredLocations: ['cemetery_of_ash'],
    killCounts: {},
    quests: { active: {}, completed: [] },
    effects: [],
    flags: {},
    factionReputation: {},
    unlockedLore: [],
    ...overrides,
  };
}

export function makeWeapon(overrides: Partial<WeaponItem['weapon']> = {}, id = 'test_sword'): WeaponItem {
  return {
    id,
    name: 'Test Sword',
    description: '',
    itemType: 'weapon',
    kind: 'weapon',
    value: 100,
    weight: 3,
    usable: false,
    equippable: true,
    quantity: 1,
    equipped: false,
    weapon: {
      damage: 10,
      damageType: 'physical',
      twoHanded: false,
      scaling: 'strength',
      staminaCost: 12,
      weaponType: 'sword',
      ...overrides,
    },
  };
}

export function makeArmor(overrides: Partial<ArmorItem['armor']> = {}, id = 'test_armor'): ArmorItem {
  return {
    id,
    name: id === 'test_armor' ? 'Test Armor' : id,
    description: '',
    itemType: 'armor',
    kind: 'armor',
    value: 100,
    weight: 5,
    usable: false,
    equippable: true,
    quantity: 1,
    equipped: false,
    armor: { defense: 10, armorType: 'body', resistance: {}, ...overrides },
  };
}

export function makeConsumable(
  overrides: Partial<ConsumableItem['effect']> = {},
  id = 'test_potion',
  quantity = 1,
): ConsumableItem {
  return {
    id,
    name: 'Test Potion',
    description: '',
    itemType: 'consumable',
    kind: 'consumable',
    value: 50,
    weight: 0.5,
    usable: true,
    equippable: false,
    quantity,
    equipped: false,
    effect: { effectType: 'heal', value: 50, duration: 0, ...overrides },
  };
}

export function makeRing(accessory: PlainItem['accessory'] = { defense: 0, resistance: {} }, id = 'test_ring'): PlainItem {
  return {
    id,
    name: 'Test Ring',
    description: '',
    itemType: 'item',
    kind: 'ring',
    value: 300,
    weight: 0.1,
    usable: false,
    equippable: true,
    quantity: 1,
    equipped: false,
    accessory,
  };
}

export function makeMaterial(id = 'ember_essence', quantity = 1): PlainItem {
  return {
    id,
    name: 'Ember Essence',
    description: '',
    itemType: 'item',
    kind: 'material',
    value: 150,
    weight: 0.2,
    usable: false,
    equippable: false,
    quantity,
    equipped: false,
  };
}

export function makeEnemy(overrides: Partial<EnemyDefinition> = {}): EnemyDefinition {
  return {
    id: 'hollow_soldier',
    name: 'Hollow Soldier',
    description: '',
    level: 1,
    maxHp: 40,
    attack: 8,
    defense: 4,
    attackPatterns: [
      { name: 'Rusty Slash', power: 8, damageType: 'physical' },
      { name: 'Lunging Thrust', power: 10, damageType: 'physical' },
    ],
    loot: [],
    essence: 50,
    weaknesses: [],
    ...overrides,
  };
}

export function makeBoss(overrides: Partial<BossDefinition> = {}): BossDefinition {
  return {
    ...makeEnemy({ id: 'test_boss', name: 'Test Boss', maxHp: 200, attack: 15, defense: 10, essence: 1000 }),
    phases: [
      { trigger: 100 },
      {
        trigger: 50,
        attackBonus: 5,
        attackPatterns: [{ name: 'Enraged Sweep', power: 20, damageType: 'fire' }],
        message: 'The boss is enraged!',
      },
      { trigger: 25, attackBonus: 5, defenseBonus: 5, message: 'The boss burns white-hot.' },
    ],
    ...overrides,
  };
}
