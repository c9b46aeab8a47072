import { RewardsService } from './rewards.service.js';
import { makeEnemy, ScriptedRng } from '../../testing/fixtures.js';

describe('RewardsService', () => {
  const service = new RewardsService();
  const enemy = makeEnemy({
    loot: [
      { itemId: 'healing_potion', chance: 0.2 },
      { itemId: 'broken_sword', chance: 0.05 },
      { itemId: 'ember_essence', chance: 1, min: 1, max: 3 },
    ],
  });

  it('rolls each entry once and quantities inside [min, max]', () => {
    const rng = new ScriptedRng([0.1, 0.5, 0.0, 0.7]);
    expect(service.rollLoot(enemy, rng)).toEqual([
      { itemId: 'healing_potion', quantity: 1 },
      { itemId: 'ember_essence', quantity: 3 },
    ]);
  });

  it('a fixed quantity draws no extra roll', () => {
    const rng = new ScriptedRng([0.0, 0.42]);
    const drops = service.rollLoot(makeEnemy({ loot: [{ itemId: 'ashen_key', chance: 1, min: 2, max: 2 }] }), rng);
    expect(drops).toEqual([{ itemId: 'ashen_key', quantity: 2 }]);
    expect(rng.next()).toBe(0.42);
  });

  it('no loot table → nothing', () => {
    expect(service.rollLoot(makeEnemy(), new ScriptedRng([0]))).toEqual([]);
  });
});
