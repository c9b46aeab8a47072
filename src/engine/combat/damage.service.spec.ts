import { DamageService, WEAKNESS_MULT } from './damage.service.js';
import { makeEnemy } from '../../testing/fixtures.js';

describe('DamageService', () => {
  const service = new DamageService();

  describe('computeDamage', () => {
    it('attack 7 against defense 5 → 5', () => {
      expect(service.computeDamage({ attackPower: 7, defense: 5 }).damage).toBe(5);
    });

    it('aggressive attack 8 against defense 5 → 6', () => {
      expect(service.computeDamage({ attackPower: 8, defense: 5 }).damage).toBe(6);
    });

    it('attack 100 against defense 200 → clamps to 1', () => {
      const result = service.computeDamage({ attackPower: 100, defense: 200 });
      expect(result.raw).toBe(0);
      expect(result.damage).toBe(1);
    });

    it('heavy resistance still lands at least 1', () => {
      const result = service.computeDamage({ attackPower: 10, defense: 10, resistanceMult: 0.2 });
      expect(result.raw).toBe(-3); // 10 × 0.2 − 5
      expect(result.damage).toBe(1);
    });

    it('multiplies every factor into one product', () => {
      const result = service.computeDamage({
        attackPower: 20,
        defense: 4,
        weaknessMult: 1.5,
        comboMult: 1.2,
        moveMult: 2,
      });
      expect(result.product).toBeCloseTo(3.6);
      expect(result.damage).toBe(70); // floor(72 − 2)
    });

    it('a damage shield scales incoming damage down', () => {
      expect(service.computeDamage({ attackPower: 20, defense: 0, shieldMult: 0.5 }).damage).toBe(10);
    });

    it('defense is halved and floored', () => {
      expect(service.computeDamage({ attackPower: 10, defense: 3 }).damage).toBe(9);
    });
  });

  describe('weaknessMultiplier', () => {
    it('1.5 against a listed weakness, 1 otherwise', () => {
      const enemy = makeEnemy({ weaknesses: ['fire'] });
      expect(service.weaknessMultiplier(enemy, 'fire')).toBe(WEAKNESS_MULT);
      expect(service.weaknessMultiplier(enemy, 'frost')).toBe(1);
    });
  });

  describe('hp clamping', () => {
    it('damage stops at 0 and reports what was lost', () => {
      const target = { hp: 5, maxHp: 40 };
      expect(service.applyDamage(target, 12)).toBe(5);
      expect(target.hp).toBe(0);
    });

    it('healing stops at max', () => {
      const target = { hp: 35, maxHp: 40 };
      expect(service.applyHeal(target, 12)).toBe(5);
      expect(target.hp).toBe(40);
    });

    it('negative amounts change nothing', () => {
      const target = { hp: 20, maxHp: 40 };
      expect(service.applyDamage(target, -5)).toBe(0);
      expect(service.applyHeal(target, -5)).toBe(0);
      expect(target.hp).toBe(20);
    });
  });
});
