import type { SpecialMove } from '../../types/index.js';
import type { CombatContext } from './combat.service.js';
import { createEngine, type TestEngine } from '../../testing/engine.js';
import { makeBoss, makeEnemy, makePlayer, makeWeapon, ScriptedRng } from '../../testing/fixtures.js';

const HEAVY_SLAM: SpecialMove = {
  id: 'heavy_slam',
  name: 'Heavy Slam',
  staminaCost: 30,
  multiplier: 1.8,
  effect: { type: 'stun', chance: 25, value: 0, duration: 1 },
};

const BATTLE_CRY: SpecialMove = {
  id: 'battle_cry',
  name: 'Battle Cry',
  staminaCost: 20,
  multiplier: 1.2,
  effect: { type: 'defense_boost', value: 10, duration: 2 },
};

describe('CombatService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  function context(overrides: Partial<CombatContext> = {}): CombatContext {
    return {
      player: makePlayer(),
      encounter: engine.combat.startEncounter(makeEnemy()),
      rng: new ScriptedRng(),
      ...overrides,
    };
  }

  function armed(ctx: CombatContext, damageType: 'physical' | 'fire' = 'physical'): CombatContext {
    ctx.player.inventory.push(makeWeapon({ damageType }));
    engine.inventory.equip(ctx.player, 'test sword');
    return ctx;
  }

  describe('startEncounter', () => {
    it('works on a private copy of the template', () => {
      const template = makeEnemy();
      const encounter = engine.combat.startEncounter(template);
      encounter.enemy.template.attackPatterns.push({ name: 'Extra', power: 1, damageType: 'physical' });
      expect(template.attackPatterns).toHaveLength(2);
      expect(encounter.enemy.hp).toBe(40);
      expect(encounter.isBoss).toBe(false);
      expect(encounter.turnNo).toBe(1);
    });

    it('bosses are flagged', () => {
      expect(engine.combat.startEncounter(makeBoss()).isBoss).toBe(true);
    });
  });

  describe('attack', () => {
    it('trades blows and runs upkeep', () => {
      const ctx = context();
      const result = engine.combat.attack(ctx);

      expect(result.ok).toBe(true);
      expect(result.outcome).toBe('ONGOING');
      expect(result.events.map((e) => e.text)).toEqual([
        'You strike Hollow Soldier with your fists for 3 damage.',
        'Hollow Soldier uses Rusty Slash for 6 damage.',
      ]);
      expect(ctx.encounter.enemy.hp).toBe(37);
      expect(ctx.player.hp).toBe(94);
      expect(ctx.player.stamina).toBe(97); // 100 − 10 + 7
      expect(ctx.encounter.turnNo).toBe(2);
    });

    it('chains a combo inside the window', () => {
      const ctx = armed(context());
      engine.combat.attack(ctx);
      engine.clock.advance(500);
      const second = engine.combat.attack(ctx);

      expect(second.events[0]).toEqual({
        kind: 'PLAYER',
        text: 'You strike Hollow Soldier with your Test Sword for 17 damage. Combo x2!',
        damage: 17,
      });
      expect(ctx.encounter.enemy.hp).toBe(40 - 16 - 17);
    });

    it('the combo restarts after the window', () => {
      const ctx = armed(context());
      engine.combat.attack(ctx);
      engine.clock.advance(2500);
      expect(engine.combat.attack(ctx).events[0].damage).toBe(16);
    });

    it('hits a weakness for ×1.5', () => {
      const ctx = armed(context({ encounter: engine.combat.startEncounter(makeEnemy({ weaknesses: ['fire'] })) }), 'fire');
      expect(engine.combat.attack(ctx).events[0].damage).toBe(25); // 18 × 1.5 − 2
    });

    it('finishing blow ends the fight before the enemy acts', () => {
      const ctx = context();
      ctx.encounter.enemy.hp = 3;
      const result = engine.combat.attack(ctx);

      expect(result.outcome).toBe('VICTORY');
      expect(result.events.map((e) => e.text)).toEqual([
        'You strike Hollow Soldier with your fists for 3 damage.',
        'Hollow Soldier is defeated!',
      ]);
      expect(ctx.player.hp).toBe(100);
    });

    it('not enough stamina → rejected, nothing spent', () => {
      const ctx = context({ player: makePlayer({ stamina: 5 }) });
      const result = engine.combat.attack(ctx);

      expect(result).toEqual({
        ok: false,
        reason: 'INSUFFICIENT_STAMINA',
        events: [{ kind: 'SYSTEM', text: 'You need 10 stamina to attack (you have 5).' }],
        outcome: 'ONGOING',
      });
      expect(ctx.encounter.enemy.hp).toBe(40);
      expect(ctx.encounter.turnNo).toBe(1);
    });

    it('a dead player ends the fight with YOU DIED', () => {
      const ctx = context({ player: makePlayer({ hp: 5 }) });
      const result = engine.combat.attack(ctx);

      expect(result.outcome).toBe('DEFEAT');
      expect(result.events.at(-1)?.text).toBe('YOU DIED');
      expect(ctx.player.hp).toBe(0);
    });

    it('refuses to act once the fight is decided', () => {
      const dead = context();
      dead.encounter.enemy.hp = 0;
      expect(engine.combat.attack(dead)).toMatchObject({ ok: false, reason: 'TARGET_DEAD', outcome: 'VICTORY' });

      const fallen = context({ player: makePlayer({ hp: 0 }) });
      expect(engine.combat.attack(fallen)).toMatchObject({ ok: false, reason: 'COMBAT_OVER', outcome: 'DEFEAT' });
    });
  });

  describe('special', () => {
    it('unknown move → UNKNOWN_MOVE', () => {
      const result = engine.combat.special(context(), 'dance', [HEAVY_SLAM]);
      expect(result.reason).toBe('UNKNOWN_MOVE');
      expect(result.events[0].text).toBe('You don\'t know "dance". Your moves: Heavy Slam.');
    });

    it('not enough stamina → rejected before anything is spent', () => {
      const ctx = context({ player: makePlayer({ stamina: 20 }) });
      const result = engine.combat.special(ctx, 'heavy slam', [HEAVY_SLAM]);

      expect(result.reason).toBe('INSUFFICIENT_STAMINA');
      expect(result.events[0].text).toBe('Heavy Slam needs 30 stamina (you have 20).');
      expect(ctx.player.stamina).toBe(20);
      expect(ctx.encounter.enemy.hp).toBe(40);
    });

    it('a landed stun skips the enemy turn and wears off at end of turn', () => {
      const ctx = context({ rng: new ScriptedRng([0.1]) });
      const result = engine.combat.special(ctx, 'heavy slam', [HEAVY_SLAM]);

      expect(result.events.map((e) => e.text)).toEqual([
        'You use Heavy Slam! Hollow Soldier takes 7 damage.',
        'Hollow Soldier is stunned!',
        'Hollow Soldier is stunned and cannot act.',
      ]);
      expect(ctx.encounter.enemy.hp).toBe(33);
      expect(ctx.player.hp).toBe(100);
      expect(ctx.player.stamina).toBe(77);
      expect(ctx.encounter.enemyEffects).toEqual([]);
      expect(ctx.encounter.patternIndex).toBe(0);
    });

    it('a missed stun roll lets the enemy answer', () => {
      const ctx = context({ rng: new ScriptedRng([0.5]) });
      const result = engine.combat.special(ctx, 'heavy slam', [HEAVY_SLAM]);
      expect(result.events.map((e) => e.kind)).toEqual(['PLAYER', 'ENEMY']);
    });

    it('buff moves go on the player before the enemy strikes', () => {
      const ctx = context();
      const result = engine.combat.special(ctx, 'battle cry', [BATTLE_CRY]);

      expect(result.events.map((e) => e.text)).toEqual([
        'You use Battle Cry! Hollow Soldier takes 4 damage.',
        'You gain: Defense up 10 (2 turns).',
        'Hollow Soldier uses Rusty Slash for 1 damage.',
      ]);
      expect(ctx.player.effects).toEqual([{ type: 'defense_boost', value: 10, duration: 1, source: 'battle_cry' }]);
    });
  });

  describe('stance', () => {
    it('is a free action', () => {
      const ctx = context();
      const result = engine.combat.changeStance(ctx, 'aggressive');

      expect(result.events[0].text).toBe('You shift from balanced to aggressive stance.');
      expect(ctx.player.stance).toBe('aggressive');
      expect(ctx.player.hp).toBe(100);
      expect(ctx.encounter.turnNo).toBe(1);
    });
  });

  describe('estus and items', () => {
    it('estus heals 40% then the enemy acts', () => {
      const ctx = context({ player: makePlayer({ hp: 50 }) });
      const result = engine.combat.estus(ctx);

      expect(result.events[0].text).toBe('You drink from the Estus Flask and recover 40 HP. (2/3 left)');
      expect(ctx.player.hp).toBe(84);
    });

    it('empty flask → NO_ESTUS and the turn is not spent', () => {
      const ctx = context({ player: makePlayer({ estus: { current: 0, max: 3 } }) });
      const result = engine.combat.estus(ctx);
      expect(result.reason).toBe('NO_ESTUS');
      expect(result.events[0].text).toBe('Your Estus Flask is empty.');
      expect(ctx.player.hp).toBe(100);
    });

    it('an item that cannot be used → NOT_USABLE', () => {
      const result = engine.combat.useItem(context(), 'rock');
      expect(result.reason).toBe('NOT_USABLE');
      expect(result.events[0].text).toBe('You don\'t have "rock".');
    });
  });

  describe('flee', () => {
    it('bosses cannot be fled', () => {
      const result = engine.combat.flee(context({ encounter: engine.combat.startEncounter(makeBoss()) }));
      expect(result.reason).toBe('CANNOT_FLEE');
      expect(result.events[0].text).toBe('There is no escaping Test Boss!');
    });

    it('a good roll escapes', () => {
      const result = engine.combat.flee(context({ rng: new ScriptedRng([0.1]) }));
      expect(result).toEqual({
        ok: true,
        events: [{ kind: 'SYSTEM', text: 'You flee from combat!' }],
        outcome: 'FLED',
      });
    });

    it('a bad roll costs the turn', () => {
      const ctx = context();
      const result = engine.combat.flee(ctx);
      expect(result.outcome).toBe('ONGOING');
      expect(result.events.map((e) => e.text)).toEqual([
        'You fail to escape!',
        'Hollow Soldier uses Rusty Slash for 6 damage.',
      ]);
    });
  });

  describe('parry', () => {
    it('a clean parry reflects the attack and the enemy loses its turn', () => {
      const ctx = context();
      const result = engine.combat.parry(ctx, true);

      expect(result.events.map((e) => e.text)).toEqual([
        "Perfect parry! You turn Hollow Soldier's Rusty Slash back for 6 damage.",
      ]);
      expect(ctx.encounter.enemy.hp).toBe(34);
      expect(ctx.player.hp).toBe(100);
      expect(ctx.player.stamina).toBe(92);
      expect(ctx.encounter.patternIndex).toBe(1);
    });

    it('a missed parry takes the blow at ×1.5 and cannot be evaded', () => {
      const ctx = context({
        player: makePlayer({ effects: [{ type: 'evasion_boost', value: 100, duration: 2, source: 'shadow_step' }] }),
      });
      const result = engine.combat.parry(ctx, false);

      expect(result.events.map((e) => e.text)).toEqual([
        'You mistime the parry. Hollow Soldier uses Rusty Slash for 10 damage.',
      ]);
      expect(ctx.player.hp).toBe(90);
    });

    it('needs 15 stamina', () => {
      const result = engine.combat.parry(context({ player: makePlayer({ stamina: 10 }) }), true);
      expect(result.reason).toBe('INSUFFICIENT_STAMINA');
      expect(result.events[0].text).toBe('You need 15 stamina to parry.');
    });

    it('a stunned enemy has nothing to parry', () => {
      const ctx = context();
      ctx.encounter.enemyEffects = [{ type: 'stun', value: 0, duration: 1, source: 'heavy_slam' }];
      const result = engine.combat.parry(ctx, true);

      expect(result.events.map((e) => e.text)).toEqual([
        'Hollow Soldier is reeling. There is nothing to parry.',
        'Hollow Soldier is stunned and cannot act.',
      ]);
      expect(ctx.encounter.patternIndex).toBe(0);
    });
  });

  describe('enemy turn', () => {
    it('evasion slips the attack on a good roll', () => {
      const ctx = context({
        player: makePlayer({ effects: [{ type: 'evasion_boost', value: 40, duration: 2, source: 'shadow_step' }] }),
        rng: new ScriptedRng([0.1]),
      });
      const result = engine.combat.attack(ctx);
      expect(result.events[1].text).toBe("You slip past Hollow Soldier's Rusty Slash!");
      expect(ctx.player.hp).toBe(100);
    });

    it('reports effects that wear off', () => {
      const ctx = context({
        player: makePlayer({ effects: [{ type: 'defense_boost', value: 4, duration: 1, source: 'stone_draught' }] }),
      });
      const result = engine.combat.attack(ctx);
      expect(result.events.at(-1)).toEqual({ kind: 'STATUS', text: 'Defense up wears off.' });
      expect(ctx.player.effects).toEqual([]);
    });

    it('a boss phase change is announced and its kit is used at once', () => {
      const ctx = armed(context({ encounter: engine.combat.startEncounter(makeBoss()) }));
      ctx.encounter.enemy.hp = 101;
      const result = engine.combat.attack(ctx);

      expect(result.events.map((e) => e.kind)).toEqual(['PLAYER', 'PHASE', 'ENEMY']);
      expect(result.events[1].text).toBe('The boss is enraged!');
      expect(result.events[2].text).toBe('Test Boss uses Enraged Sweep for 23 damage.');
      expect(ctx.encounter.enemy.hp).toBe(88);
      expect(ctx.player.hp).toBe(77);
    });
  });
});
