import { Rng, RngService } from './rng.service.js';

describe('RngService', () => {
  it('creates an Rng at the requested cursor', () => {
    const rng = new RngService().create('test-seed', 7);
    expect(rng).toBeInstanceOf(Rng);
    expect(rng.getState()).toEqual({ seed: 'test-seed', cursor: 7 });
  });
});

describe('Rng determinism', () => {
  it('same seed + cursor → same sequence', () => {
    const a = new Rng('seed-abc', 0);
    const b = new Rng('seed-abc', 0);
    for (let i = 0; i < 100; i++) {
      expect(a.next()).toBe(b.next());
    }
  });

  it('different seeds diverge', () => {
    const a = new Rng('seed-1', 0);
    const b = new Rng('seed-2', 0);
    const same = Array.from({ length: 10 }, () => a.next() === b.next());
    expect(same.some((s) => !s)).toBe(true);
  });

  it('resuming from a cursor continues the same sequence', () => {
    const full = new Rng('seed-xyz', 0);
    for (let i = 0; i < 50; i++) full.next();
    const afterFifty = full.next();

    expect(new Rng('seed-xyz', 50).next()).toBe(afterFifty);
  });

  it('every draw advances the cursor by one', () => {
    const rng = new Rng('track', 10);
    rng.next();
    rng.range(1, 100);
    rng.chance(50);
    rng.pick(['a', 'b']);
    expect(rng.cursor).toBe(14);
  });
});

describe('Rng ranges', () => {
  it('next stays in [0, 1)', () => {
    const rng = new Rng('unit', 0);
    for (let i = 0; i < 1000; i++) {
      const v = rng.next();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });

  it('range is inclusive on both ends', () => {
    const rng = new Rng('range-test', 0);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      const v = rng.range(1, 3);
      expect(v).toBeGreaterThanOrEqual(1);
      expect(v).toBeLessThanOrEqual(3);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([1, 2, 3]);
  });

  it('chance(0) never, chance(100) always', () => {
    const rng = new Rng('chance', 0);
    for (let i = 0; i < 100; i++) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(100)).toBe(true);
    }
  });

  it('pick on an empty list → undefined without consuming', () => {
    const rng = new Rng('pick', 0);
    expect(rng.pick([])).toBeUndefined();
    expect(rng.cursor).toBe(0);
  });
});
