// Damage formula and hp clamping

import { Injectable } from '@nestjs/common';
import type { DamageType, EnemyTemplate } from '../../types/index.js';

export interface DamageInput {
  attackPower: number;
  defense: number;
  resistanceMult?: number;
  weaknessMult?: number;
  comboMult?: number;
  moveMult?: number;
  shieldMult?: number;
}

export interface DamageResult {
  damage: number;
  raw: number;
  product: number;
}

export interface HpPool {
  hp: number;
  maxHp: number;
}

export const WEAKNESS_MULT = 1.5;

@Injectable()
export class DamageService {
  /**
   * product = resistance × weakness × combo × move × shield
   * raw     = attackPower × product − floor(defense / 2)
   * damage  = max(1, floor(raw))
   */
  computeDamage(input: DamageInput): DamageResult {
    const product =
      (input.resistanceMult ?? 1) *
      (input.weaknessMult ?? 1) *
      (input.comboMult ?? 1) *
      (input.moveMult ?? 1) *
      (input.shieldMult ?? 1);

    const raw = input.attackPower * product - Math.floor(input.defense / 2);
    return { damage: Math.max(1, Math.floor(raw)), raw, product };
  }

  weaknessMultiplier(template: EnemyTemplate, damageType: DamageType): number {
    return template.weaknesses.includes(damageType) ? WEAKNESS_MULT : 1;
  }

  /** Returns the hp actually lost. */
  applyDamage(target: HpPool, amount: number): number {
    const before = target.hp;
    target.hp = clamp(target.hp - Math.max(0, amount), 0, target.maxHp);
    return before - target.hp;
  }

  /** Returns the hp actually restored. */
  applyHeal(target: HpPool, amount: number): number {
    const before = target.hp;
    target.hp = clamp(target.hp + Math.max(0, amount), 0, target.maxHp);
    return target.hp - before;
  }
}

function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
