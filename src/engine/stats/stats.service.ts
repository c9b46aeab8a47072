// Combat stat pipeline: base → gear → buffs (flat) then stance (percent), floored at the end

import { Injectable } from '@nestjs/common';
import {
  isArmor,
  isWeapon,
  type DamageType,
  type Player,
  type Stance,
  type WeaponItem,
} from '../../types/index.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { StatusService } from '../status/status.service.js';

export type CombatStat = 'attack' | 'defense';
export type ModifierOp = 'FLAT' | 'PERCENT';

export interface StatModifier {
  stat: CombatStat;
  op: ModifierOp;
  value: number;
  priority: number; // lower applies first
  source: string;
}

/** Final numbers for one turn */
export interface StatsSnapshot {
  attack: number;
  defense: number;
}

/*
 * Priorities:
 * BASE(100) → GEAR(200) → BUFF(300) → STANCE(900)
 */
const PRIORITY = { BASE: 100, GEAR: 200, BUFF: 300, STANCE: 900 } as const;

export const STANCE_ATTACK_MULT: Record<Stance, number> = {
  balanced: 1.0,
  aggressive: 1.2,
  defensive: 0.8,
};

export const STANCE_DEFENSE_MULT: Record<Stance, number> = {
  balanced: 1.0,
  aggressive: 0.8,
  defensive: 1.2,
};

export const UNARMED_STAMINA_COST = 10;
export const MIN_RESISTANCE_MULT = 0.2;

@Injectable()
export class StatsService {
  constructor(
    private readonly inventoryService: InventoryService,
    private readonly statusService: StatusService,
  ) {}

  /** Apply modifiers in priority order; FLAT adds, PERCENT multiplies the running value. */
  buildSnapshot(modifiers: StatModifier[]): StatsSnapshot {
    const snap: StatsSnapshot = { attack: 0, defense: 0 };
    const sorted = [...modifiers].sort((a, b) => a.priority - b.priority);

    for (const mod of sorted) {
      if (mod.op === 'FLAT') {
        snap[mod.stat] += mod.value;
      } else {
        snap[mod.stat] *= 1 + mod.value;
      }
    }

    snap.attack = Math.max(0, Math.floor(snap.attack));
    snap.defense = Math.max(0, Math.floor(snap.defense));
    return snap;
  }

  /** Every modifier the player carries right now */
  collectModifiers(player: Player, options: { includeStance?: boolean } = {}): StatModifier[] {
    const { strength, dexterity, vitality } = player.stats;
    const mods: StatModifier[] = [
      { stat: 'attack', op: 'FLAT', value: Math.floor(strength / 2), priority: PRIORITY.BASE, source: 'strength' },
      { stat: 'defense', op: 'FLAT', value: Math.floor(vitality / 2), priority: PRIORITY.BASE, source: 'vitality' },
    ];

    const weapon = this.weapon(player);
    if (weapon) {
      mods.push({ stat: 'attack', op: 'FLAT', value: weapon.weapon.damage, priority: PRIORITY.GEAR, source: weapon.id });
      const scaling = weapon.weapon.scaling;
      if (scaling) {
        const stat = scaling === 'dexterity' ? dexterity : strength;
        mods.push({ stat: 'attack', op: 'FLAT', value: Math.floor(stat / 3), priority: PRIORITY.GEAR, source: `${weapon.id}:${scaling}` });
      }
    }

    for (const item of this.inventoryService.equippedItems(player)) {
      if (isArmor(item)) {
        // a raised shield is dropped in aggressive stance
        if (item.armor.armorType === 'shield' && player.stance === 'aggressive') continue;
        mods.push({ stat: 'defense', op: 'FLAT', value: item.armor.defense, priority: PRIORITY.GEAR, source: item.id });
      } else if (item.itemType === 'item' && item.accessory && item.accessory.defense > 0) {
        mods.push({ stat: 'defense', op: 'FLAT', value: item.accessory.defense, priority: PRIORITY.GEAR, source: item.id });
      }
    }

    for (const effect of player.effects) {
      if (!effect.permanent && effect.duration <= 0) continue;
      if (effect.type === 'attack_boost') {
        mods.push({ stat: 'attack', op: 'FLAT', value: effect.value, priority: PRIORITY.BUFF, source: effect.source });
      } else if (effect.type === 'defense_boost') {
        mods.push({ stat: 'defense', op: 'FLAT', value: effect.value, priority: PRIORITY.BUFF, source: effect.source });
      }
    }

    if (options.includeStance ?? true) {
      mods.push(...this.stanceModifiers(player.stance));
    }
    return mods;
  }

  stanceModifiers(stance: Stance): StatModifier[] {
    return [
      { stat: 'attack', op: 'PERCENT', value: STANCE_ATTACK_MULT[stance] - 1, priority: PRIORITY.STANCE, source: stance },
      { stat: 'defense', op: 'PERCENT', value: STANCE_DEFENSE_MULT[stance] - 1, priority: PRIORITY.STANCE, source: stance },
    ];
  }

  snapshot(player: Player): StatsSnapshot {
    return this.buildSnapshot(this.collectModifiers(player));
  }

  /** floor(strength/2) + weapon + scaling + buffs, before stance */
  baseAttack(player: Player): number {
    return this.buildSnapshot(this.collectModifiers(player, { includeStance: false })).attack;
  }

  attackPower(player: Player): number {
    return this.snapshot(player).attack;
  }

  effectiveDefense(player: Player): number {
    return this.snapshot(player).defense;
  }

  /** max(0.2, 1 − Σresistance/100) */
  resistanceMultiplier(player: Player, damageType: DamageType): number {
    const total = this.inventoryService.resistanceTotal(player, damageType);
    return Math.max(MIN_RESISTANCE_MULT, 1 - total / 100);
  }

  /** Percent chance to slip an enemy attack */
  evasionChance(player: Player): number {
    return Math.min(100, this.statusService.total(player.effects, 'evasion_boost'));
  }

  weapon(player: Player): WeaponItem | undefined {
    const item = this.inventoryService.equippedItem(player, 'weapon');
    return item && isWeapon(item) ? item : undefined;
  }

  weaponDamageType(player: Player): DamageType {
    return this.weapon(player)?.weapon.damageType ?? 'physical';
  }

  attackStaminaCost(player: Player): number {
    return this.weapon(player)?.weapon.staminaCost ?? UNARMED_STAMINA_COST;
  }

  staminaRegen(player: Player): number {
    return 5 + Math.floor(player.stats.dexterity / 5);
  }
}
