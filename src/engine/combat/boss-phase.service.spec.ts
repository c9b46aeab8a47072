import { createEngine, type TestEngine } from '../../testing/engine.js';
import { makeBoss, makeEnemy } from '../../testing/fixtures.js';

describe('BossPhaseService', () => {
  let engine: TestEngine;

  beforeEach(() => {
    engine = createEngine();
  });

  it('half hp enters the enraged phase with its patterns and bonus', () => {
    const encounter = engine.combat.startEncounter(makeBoss());
    encounter.enemy.hp = 100;

    const transition = engine.bossPhase.checkPhase(encounter);
    expect(transition).toMatchObject({ from: 0, to: 1, phase: { message: 'The boss is enraged!' } });
    expect(encounter.phaseIndex).toBe(1);
    expect(encounter.activePatterns.map((p) => p.name)).toEqual(['Enraged Sweep']);
    expect(encounter.patternIndex).toBe(0);
    expect(encounter.attackBonus).toBe(5);
    expect(encounter.defenseBonus).toBe(0);
  });

  it('above every trigger nothing happens', () => {
    const encounter = engine.combat.startEncounter(makeBoss());
    encounter.enemy.hp = 101;
    expect(engine.bossPhase.checkPhase(encounter)).toBeNull();
    expect(encounter.phaseIndex).toBe(0);
  });

  it('moves one phase per check even when hp skipped past two triggers', () => {
    const encounter = engine.combat.startEncounter(makeBoss());
    encounter.enemy.hp = 40;

    expect(engine.bossPhase.checkPhase(encounter)?.to).toBe(1);
    expect(engine.bossPhase.checkPhase(encounter)?.to).toBe(2);
    expect(engine.bossPhase.checkPhase(encounter)).toBeNull();

    expect(encounter.attackBonus).toBe(10);
    expect(encounter.defenseBonus).toBe(5);
    // the last phase brings no patterns, so the enraged kit stays
    expect(encounter.activePatterns.map((p) => p.name)).toEqual(['Enraged Sweep']);
  });

  it('never goes back a phase', () => {
    const encounter = engine.combat.startEncounter(makeBoss());
    encounter.enemy.hp = 90;
    engine.bossPhase.checkPhase(encounter);
    encounter.enemy.hp = 200;
    expect(engine.bossPhase.checkPhase(encounter)).toBeNull();
    expect(encounter.phaseIndex).toBe(1);
  });

  it('a dead boss does not transition', () => {
    const encounter = engine.combat.startEncounter(makeBoss());
    encounter.enemy.hp = 0;
    expect(engine.bossPhase.checkPhase(encounter)).toBeNull();
    expect(encounter.phaseIndex).toBe(0);
  });

  it('regular enemies have no phases', () => {
    const encounter = engine.combat.startEncounter(makeEnemy());
    encounter.enemy.hp = 1;
    expect(engine.bossPhase.checkPhase(encounter)).toBeNull();
  });
});
