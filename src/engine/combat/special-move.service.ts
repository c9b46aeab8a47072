// Class special moves: precondition, power and secondary effect

import { Injectable } from '@nestjs/common';
import { matchesName } from '../../common/text-utils.js';
import type { ActiveEffect, DamageType, Player, SpecialMove } from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { StatsService, STANCE_ATTACK_MULT } from '../stats/stats.service.js';

export interface MovePower {
  attackPower: number;
  moveMult: number;
  damageType: DamageType;
}

@Injectable()
export class SpecialMoveService {
  constructor(private readonly statsService: StatsService) {}

  findMove(moves: SpecialMove[], query: string): SpecialMove | undefined {
    return moves.find((m) => matchesName(query, m));
  }

  /** Checked before anything is computed or spent. */
  canUseMove(player: Player, move: SpecialMove): boolean {
    return player.stamina >= move.staminaCost;
  }

  /**
   * flat moves:       flat + floor(stat/2)
   * multiplier moves: baseAttack + floor(stat/2), multiplier goes into the damage product
   * stance applies to both.
   */
  movePower(player: Player, move: SpecialMove): MovePower {
    const scalingBonus = move.scaling ? Math.floor(player.stats[move.scaling] / 2) : 0;
    const stanceMult = STANCE_ATTACK_MULT[player.stance];

    if (move.flat !== undefined) {
      return {
        attackPower: Math.floor((move.flat + scalingBonus) * stanceMult),
        moveMult: 1,
        damageType: move.damageType ?? 'physical',
      };
    }

    const base = this.statsService.baseAttack(player) + scalingBonus;
    return {
      attackPower: Math.floor(base * stanceMult),
      moveMult: move.multiplier ?? 1,
      damageType: move.damageType ?? this.statsService.weaponDamageType(player),
    };
  }

  /** Secondary effect, if the move has one and its chance roll lands */
  rollEffect(move: SpecialMove, rng: Rng): ActiveEffect | null {
    const effect = move.effect;
    if (!effect) return null;
    if (effect.chance !== undefined && !rng.chance(effect.chance)) return null;
    return { type: effect.type, value: effect.value, duration: effect.duration, source: move.id };
  }
}
