// Encounter flow: one player action, then the enemy's answer, then end-of-turn upkeep

import { Injectable } from '@nestjs/common';
import {
  isBoss,
  type AttackPattern,
  type CombatEvent,
  type CombatFailReason,
  type CombatOutcome,
  type CombatTurnResult,
  type Encounter,
  type EnemyTemplate,
  type Player,
  type SpecialMove,
  type Stance,
} from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { StatsService } from '../stats/stats.service.js';
import { StatusService } from '../status/status.service.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { ProgressionService } from '../progression/progression.service.js';
import { DamageService } from './damage.service.js';
import { ComboService } from './combo.service.js';
import { SpecialMoveService } from './special-move.service.js';
import { BossPhaseService } from './boss-phase.service.js';
import { EnemyAiService } from './enemy-ai.service.js';

export interface CombatContext {
  player: Player;
  encounter: Encounter;
  rng: Rng;
}

export const PARRY_STAMINA_COST = 15;
export const PARRY_FAIL_MULT = 1.5;
export const FLEE_BASE_CHANCE = 40;

interface StrikeOptions {
  mult?: number;
  evadable?: boolean;
  prefix?: string;
}

@Injectable()
export class CombatService {
  constructor(
    private readonly statsService: StatsService,
    private readonly statusService: StatusService,
    private readonly damageService: DamageService,
    private readonly comboService: ComboService,
    private readonly specialMoveService: SpecialMoveService,
    private readonly bossPhaseService: BossPhaseService,
    private readonly enemyAiService: EnemyAiService,
    private readonly progressionService: ProgressionService,
    private readonly inventoryService: InventoryService,
  ) {}

  /** Fresh encounter on a private copy of the template. */
  startEncounter(template: EnemyTemplate): Encounter {
    const copy = structuredClone(template);
    const encounter: Encounter = {
      enemy: { template: copy, hp: copy.maxHp, maxHp: copy.maxHp },
      isBoss: isBoss(copy),
      patternIndex: 0,
      activePatterns: copy.attackPatterns.map((p) => ({ ...p })),
      phaseIndex: 0,
      attackBonus: 0,
      defenseBonus: 0,
      combo: this.comboService.create(),
      enemyEffects: [],
      turnNo: 1,
    };

    // phase 0 may carry its own kit
    if (isBoss(copy)) {
      const opening = copy.phases[0];
      if (opening.attackPatterns && opening.attackPatterns.length > 0) {
        encounter.activePatterns = opening.attackPatterns.map((p) => ({ ...p }));
      }
      encounter.attackBonus = opening.attackBonus ?? 0;
      encounter.defenseBonus = opening.defenseBonus ?? 0;
    }
    return encounter;
  }

  nextEnemyPattern(encounter: Encounter): AttackPattern {
    return this.enemyAiService.peekPattern(encounter);
  }

  attack(ctx: CombatContext): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const { player, encounter } = ctx;
    const cost = this.statsService.attackStaminaCost(player);
    if (player.stamina < cost) {
      return this.reject('INSUFFICIENT_STAMINA', `You need ${cost} stamina to attack (you have ${player.stamina}).`);
    }

    player.stamina -= cost;
    const chain = this.comboService.register(encounter.combo);
    const damageType = this.statsService.weaponDamageType(player);
    const { damage } = this.damageService.computeDamage({
      attackPower: this.statsService.attackPower(player),
      defense: this.enemyAiService.defense(encounter),
      weaknessMult: this.damageService.weaknessMultiplier(encounter.enemy.template, damageType),
      comboMult: this.comboService.multiplier(encounter.combo),
    });
    const dealt = this.damageService.applyDamage(encounter.enemy, damage);

    const weaponName = this.statsService.weapon(player)?.name ?? 'fists';
    const comboText = chain > 0 ? ` Combo x${chain + 1}!` : '';
    const events: CombatEvent[] = [
      {
        kind: 'PLAYER',
        text: `You strike ${this.enemyName(ctx)} with your ${weaponName} for ${dealt} damage.${comboText}`,
        damage: dealt,
      },
    ];
    this.checkPhase(ctx, events);
    return this.finishTurn(ctx, events);
  }

  special(ctx: CombatContext, query: string, moves: SpecialMove[]): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const { player, encounter, rng } = ctx;
    const move = this.specialMoveService.findMove(moves, query);
    if (!move) {
      const known = moves.map((m) => m.name).join(', ') || 'none';
      return this.reject('UNKNOWN_MOVE', `You don't know "${query}". Your moves: ${known}.`);
    }
    if (!this.specialMoveService.canUseMove(player, move)) {
      return this.reject(
        'INSUFFICIENT_STAMINA',
        `${move.name} needs ${move.staminaCost} stamina (you have ${player.stamina}).`,
      );
    }

    player.stamina -= move.staminaCost;
    const power = this.specialMoveService.movePower(player, move);
    const { damage } = this.damageService.computeDamage({
      attackPower: power.attackPower,
      defense: this.enemyAiService.defense(encounter),
      weaknessMult: this.damageService.weaknessMultiplier(encounter.enemy.template, power.damageType),
      moveMult: power.moveMult,
    });
    const dealt = this.damageService.applyDamage(encounter.enemy, damage);

    const events: CombatEvent[] = [
      { kind: 'PLAYER', text: `You use ${move.name}! ${this.enemyName(ctx)} takes ${dealt} damage.`, damage: dealt },
    ];
    this.checkPhase(ctx, events);

    const effect = this.specialMoveService.rollEffect(move, rng);
    if (effect && encounter.enemy.hp > 0) {
      if (effect.type === 'stun') {
        encounter.enemyEffects = this.statusService.applyEffect(encounter.enemyEffects, effect);
        events.push({ kind: 'STATUS', text: `${this.enemyName(ctx)} is stunned!` });
      } else {
        player.effects = this.statusService.applyEffect(player.effects, effect);
        events.push({ kind: 'STATUS', text: `You gain: ${this.statusService.describe(effect)}.` });
      }
    }

    return this.finishTurn(ctx, events);
  }

  /** Free action: does not hand the turn to the enemy. */
  changeStance(ctx: CombatContext, stance: Stance): CombatTurnResult {
    const previous = ctx.player.stance;
    ctx.player.stance = stance;
    return {
      ok: true,
      events: [{ kind: 'SYSTEM', text: `You shift from ${previous} to ${stance} stance.` }],
      outcome: 'ONGOING',
    };
  }

  estus(ctx: CombatContext): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const result = this.progressionService.useEstus(ctx.player);
    if (!result.ok) return this.reject('NO_ESTUS', result.message);
    return this.finishTurn(ctx, [{ kind: 'PLAYER', text: result.message }]);
  }

  useItem(ctx: CombatContext, query: string): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const result = this.inventoryService.useItem(ctx.player, query);
    if (!result.ok) return this.reject('NOT_USABLE', result.message);
    return this.finishTurn(ctx, [{ kind: 'PLAYER', text: result.message }]);
  }

  flee(ctx: CombatContext): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const { player, encounter, rng } = ctx;
    if (encounter.isBoss) {
      return this.reject('CANNOT_FLEE', `There is no escaping ${this.enemyName(ctx)}!`);
    }

    if (rng.chance(FLEE_BASE_CHANCE + player.stats.dexterity)) {
      this.comboService.reset(encounter.combo);
      return { ok: true, events: [{ kind: 'SYSTEM', text: 'You flee from combat!' }], outcome: 'FLED' };
    }
    return this.finishTurn(ctx, [{ kind: 'SYSTEM', text: 'You fail to escape!' }]);
  }

  /**
   * Answer the enemy's next attack. Either way the pattern is spent;
   * a clean parry sends it back and the enemy loses its turn.
   */
  parry(ctx: CombatContext, success: boolean): CombatTurnResult {
    const blocked = this.guard(ctx);
    if (blocked) return blocked;

    const { player, encounter } = ctx;
    if (player.stamina < PARRY_STAMINA_COST) {
      return this.reject('INSUFFICIENT_STAMINA', `You need ${PARRY_STAMINA_COST} stamina to parry.`);
    }
    player.stamina -= PARRY_STAMINA_COST;

    if (this.statusService.hasEffect(encounter.enemyEffects, 'stun')) {
      return this.finishTurn(ctx, [
        { kind: 'PLAYER', text: `${this.enemyName(ctx)} is reeling. There is nothing to parry.` },
      ]);
    }

    const pattern = this.enemyAiService.selectPattern(encounter);
    const events: CombatEvent[] = [];

    if (success) {
      const { damage } = this.damageService.computeDamage({
        attackPower: this.enemyAiService.attackPower(encounter, pattern),
        defense: this.enemyAiService.defense(encounter),
      });
      const dealt = this.damageService.applyDamage(encounter.enemy, damage);
      events.push({
        kind: 'PLAYER',
        text: `Perfect parry! You turn ${this.enemyName(ctx)}'s ${pattern.name} back for ${dealt} damage.`,
        damage: dealt,
      });
      this.checkPhase(ctx, events);
    } else {
      this.strikePlayer(ctx, pattern, events, {
        mult: PARRY_FAIL_MULT,
        evadable: false,
        prefix: 'You mistime the parry. ',
      });
    }

    return this.finishTurn(ctx, events, { enemyActs: false });
  }

  // ── internals ──

  private guard(ctx: CombatContext): CombatTurnResult | null {
    if (ctx.encounter.enemy.hp <= 0) {
      return this.reject('TARGET_DEAD', `${this.enemyName(ctx)} is already dead.`, 'VICTORY');
    }
    if (ctx.player.hp <= 0) {
      return this.reject('COMBAT_OVER', 'You are dead.', 'DEFEAT');
    }
    return null;
  }

  private reject(
    reason: CombatFailReason,
    text: string,
    outcome: CombatOutcome = 'ONGOING',
  ): CombatTurnResult {
    return { ok: false, reason, events: [{ kind: 'SYSTEM', text }], outcome };
  }

  private checkPhase(ctx: CombatContext, events: CombatEvent[]): void {
    const transition = this.bossPhaseService.checkPhase(ctx.encounter);
    if (transition?.phase.message) {
      events.push({ kind: 'PHASE', text: transition.phase.message });
    }
  }

  private finishTurn(
    ctx: CombatContext,
    events: CombatEvent[],
    options: { enemyActs?: boolean } = {},
  ): CombatTurnResult {
    const { player, encounter } = ctx;

    if (encounter.enemy.hp <= 0) {
      events.push({ kind: 'SYSTEM', text: `${this.enemyName(ctx)} is defeated!` });
      return { ok: true, events, outcome: 'VICTORY' };
    }

    if (options.enemyActs ?? true) {
      this.enemyTurn(ctx, events);
    }

    if (player.hp <= 0) {
      events.push({ kind: 'SYSTEM', text: 'YOU DIED' });
      return { ok: true, events, outcome: 'DEFEAT' };
    }

    this.endOfTurn(ctx, events);
    return { ok: true, events, outcome: 'ONGOING' };
  }

  private enemyTurn(ctx: CombatContext, events: CombatEvent[]): void {
    const { encounter } = ctx;
    if (this.statusService.hasEffect(encounter.enemyEffects, 'stun')) {
      events.push({ kind: 'STATUS', text: `${this.enemyName(ctx)} is stunned and cannot act.` });
      return;
    }
    const pattern = this.enemyAiService.selectPattern(encounter);
    this.strikePlayer(ctx, pattern, events, {});
  }

  private strikePlayer(
    ctx: CombatContext,
    pattern: AttackPattern,
    events: CombatEvent[],
    options: StrikeOptions,
  ): void {
    const { player, encounter, rng } = ctx;
    const name = this.enemyName(ctx);

    const evasion = this.statsService.evasionChance(player);
    if ((options.evadable ?? true) && evasion > 0 && rng.chance(evasion)) {
      events.push({ kind: 'ENEMY', text: `You slip past ${name}'s ${pattern.name}!` });
      return;
    }

    const power = Math.floor(this.enemyAiService.attackPower(encounter, pattern) * (options.mult ?? 1));
    const { damage } = this.damageService.computeDamage({
      attackPower: power,
      defense: this.statsService.effectiveDefense(player),
      resistanceMult: this.statsService.resistanceMultiplier(player, pattern.damageType),
      shieldMult: this.statusService.shieldMultiplier(player.effects),
    });
    const dealt = this.damageService.applyDamage(player, damage);
    const flavour = pattern.text ? `${pattern.text} ` : '';
    events.push({
      kind: 'ENEMY',
      text: `${options.prefix ?? ''}${flavour}${name} uses ${pattern.name} for ${dealt} damage.`,
      damage: dealt,
    });
  }

  private endOfTurn(ctx: CombatContext, events: CombatEvent[]): void {
    const { player, encounter } = ctx;

    const playerTick = this.statusService.tick(player.effects);
    player.effects = playerTick.effects;
    for (const expired of playerTick.expired) {
      events.push({ kind: 'STATUS', text: `${this.statusService.label(expired.type)} wears off.` });
    }
    encounter.enemyEffects = this.statusService.tick(encounter.enemyEffects).effects;

    player.stamina = Math.min(player.maxStamina, player.stamina + this.statsService.staminaRegen(player));
    encounter.turnNo += 1;
  }

  private enemyName(ctx: CombatContext): string {
    return ctx.encounter.enemy.template.name;
  }
}
