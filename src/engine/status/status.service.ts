// Timed combat effects: stun, buffs, damage shields. Lists are never mutated in place.

import { Injectable } from '@nestjs/common';
import type { ActiveEffect, EffectType } from '../../types/index.js';

export interface TickResult {
  effects: ActiveEffect[];
  expired: ActiveEffect[];
}

const EFFECT_LABELS: Record<EffectType, string> = {
  stun: 'Stunned',
  defense_boost: 'Defense up',
  evasion_boost: 'Evasion up',
  damage_shield: 'Damage shield',
  attack_boost: 'Attack up',
};

@Injectable()
export class StatusService {
  /**
   * Add an effect. The same type from the same source refreshes instead of stacking:
   * the stronger value and the longer duration win.
   */
  applyEffect(effects: ActiveEffect[], effect: ActiveEffect): ActiveEffect[] {
    const idx = effects.findIndex((e) => e.type === effect.type && e.source === effect.source);
    if (idx < 0) return [...effects, { ...effect }];

    const updated = [...effects];
    updated[idx] = {
      ...updated[idx],
      value: Math.max(updated[idx].value, effect.value),
      duration: Math.max(updated[idx].duration, effect.duration),
    };
    return updated;
  }

  hasEffect(effects: ActiveEffect[], type: EffectType): boolean {
    return effects.some((e) => e.type === type && (e.permanent || e.duration > 0));
  }

  /** Sum of every active effect of a type */
  total(effects: ActiveEffect[], type: EffectType): number {
    return effects
      .filter((e) => e.type === type && (e.permanent || e.duration > 0))
      .reduce((sum, e) => sum + e.value, 0);
  }

  /** Damage-shield reduction as a multiplier, e.g. a 30% shield → 0.7 */
  shieldMultiplier(effects: ActiveEffect[]): number {
    const reduction = Math.min(100, this.total(effects, 'damage_shield'));
    return 1 - reduction / 100;
  }

  /** End-of-turn decrement; permanent effects are untouched. */
  tick(effects: ActiveEffect[]): TickResult {
    const kept: ActiveEffect[] = [];
    const expired: ActiveEffect[] = [];

    for (const effect of effects) {
      if (effect.permanent) {
        kept.push(effect);
        continue;
      }
      const duration = effect.duration - 1;
      if (duration > 0) {
        kept.push({ ...effect, duration });
      } else {
        expired.push(effect);
      }
    }

    return { effects: kept, expired };
  }

  /** Resting drops everything timed. */
  clearTemporary(effects: ActiveEffect[]): ActiveEffect[] {
    return effects.filter((e) => e.permanent);
  }

  label(type: EffectType): string {
    return EFFECT_LABELS[type];
  }

  describe(effect: ActiveEffect): string {
    const label = this.label(effect.type);
    const amount = effect.type === 'stun' ? '' : ` ${effect.value}${this.unit(effect.type)}`;
    const turns = effect.permanent ? '' : ` (${effect.duration} turn${effect.duration === 1 ? '' : 's'})`;
    return `${label}${amount}${turns}`;
  }

  private unit(type: EffectType): string {
    return type === 'evasion_boost' || type === 'damage_shield' ? '%' : '';
  }
}
