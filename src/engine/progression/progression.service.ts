// Leveling, estus, resting, death and essence recovery

import { Injectable } from '@nestjs/common';
import {
  fail,
  succeed,
  type BaseStat,
  type EnemyTemplate,
  type LocationDefinition,
  type Outcome,
  type Player,
} from '../../types/index.js';
import { DamageService } from '../combat/damage.service.js';
import { StatusService } from '../status/status.service.js';

export type ProgressionFailReason = 'INSUFFICIENT_ESSENCE' | 'NO_ESTUS' | 'NOT_A_BEACON';

export const LEVEL_UP_POOL_BONUS = 5;
export const ESTUS_HEAL_RATIO = 0.4;

export interface DeathResult {
  lostAmount: number;
  lostAt: string;
  respawnAt: string;
}

@Injectable()
export class ProgressionService {
  constructor(
    private readonly damageService: DamageService,
    private readonly statusService: StatusService,
  ) {}

  /** floor(100 × 1.1^(level−1)) */
  levelCost(level: number): number {
    return Math.floor(100 * Math.pow(1.1, level - 1));
  }

  levelUp(player: Player, stat: BaseStat): Outcome<ProgressionFailReason> {
    const cost = this.levelCost(player.level);
    if (player.essence < cost) {
      return fail(
        'INSUFFICIENT_ESSENCE',
        `You need ${cost} essence to reach level ${player.level + 1} (you have ${player.essence}).`,
      );
    }

    player.essence -= cost;
    player.level += 1;
    player.stats[stat] += 1;

    if (stat === 'vitality') {
      player.maxHp += LEVEL_UP_POOL_BONUS;
      player.hp += LEVEL_UP_POOL_BONUS;
    } else if (stat === 'endurance') {
      player.maxStamina += LEVEL_UP_POOL_BONUS;
      player.stamina += LEVEL_UP_POOL_BONUS;
    }

    return succeed(`You are now level ${player.level}. ${stat} rises to ${player.stats[stat]}.`);
  }

  useEstus(player: Player): Outcome<ProgressionFailReason> {
    if (player.estus.current <= 0) {
      return fail('NO_ESTUS', 'Your Estus Flask is empty.');
    }
    player.estus.current -= 1;
    const healed = this.damageService.applyHeal(player, Math.floor(player.maxHp * ESTUS_HEAL_RATIO));
    return succeed(
      `You drink from the Estus Flask and recover ${healed} HP. (${player.estus.current}/${player.estus.max} left)`,
    );
  }

  rest(player: Player, location: LocationDefinition): Outcome<ProgressionFailReason> {
    if (!location.isBeacon) {
      return fail('NOT_A_BEACON', 'There is no beacon here to rest at.');
    }
    player.hp = player.maxHp;
    player.stamina = player.maxStamina;
    player.estus.current = player.estus.max;
    player.effects = this.statusService.clearTemporary(player.effects);
    return succeed(`You rest at the ${location.name}. HP, stamina and Estus are restored.`);
  }

  discover(player: Player, locationId: string): boolean {
    if (player.discoveredLocations.includes(locationId)) return false;
    player.discoveredLocations.push(locationId);
    return true;
  }

  /** Most recently discovered beacon, else the start location */
  respawnPoint(player: Player, startLocationId: string, isBeacon: (id: string) => boolean): string {
    for (let i = player.discoveredLocations.length - 1; i >= 0; i--) {
      const id = player.discoveredLocations[i];
      if (isBeacon(id)) return id;
    }
    return startLocationId;
  }

  /** All carried essence stays behind where the player fell; an older stain is lost. */
  die(player: Player, startLocationId: string, isBeacon: (id: string) => boolean): DeathResult {
    const lostAt = player.currentLocationId;
    const lostAmount = player.essence;

    player.lostEssence = { amount: lostAmount, locationId: lostAt };
    player.essence = 0;

    const respawnAt = this.respawnPoint(player, startLocationId, isBeacon);
    player.currentLocationId = respawnAt;
    player.hp = Math.floor(player.maxHp / 2);
    player.stamina = player.maxStamina;
    player.effects = this.statusService.clearTemporary(player.effects);

    return { lostAmount, lostAt, respawnAt };
  }

  /** Returns the amount recovered, 0 when there is nothing here. */
  recoverEssence(player: Player): number {
    const lost = player.lostEssence;
    if (!lost || lost.locationId !== player.currentLocationId) return 0;
    player.essence += lost.amount;
    player.lostEssence = null;
    return lost.amount;
  }

  applyKill(player: Player, enemy: EnemyTemplate): number {
    player.essence += enemy.essence;
    player.killCounts[enemy.id] = (player.killCounts[enemy.id] ?? 0) + 1;
    return enemy.essence;
  }
}
