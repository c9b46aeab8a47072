import { ComboService } from './combo.service.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { ManualClock } from '../../testing/fixtures.js';

describe('ComboService', () => {
  let clock: ManualClock;
  let service: ComboService;

  beforeEach(() => {
    clock = new ManualClock(10_000);
    const config = new GameConfigService();
    config.override({ comboWindowMs: 2000 });
    service = new ComboService(clock, config);
  });

  it('the first attack starts a chain at 0', () => {
    const combo = service.create();
    expect(service.register(combo)).toBe(0);
    expect(combo.lastAttackAt).toBe(10_000);
    expect(service.multiplier(combo)).toBe(1);
  });

  it('attacks inside the window extend the chain', () => {
    const combo = service.create();
    service.register(combo);
    clock.advance(1500);
    expect(service.register(combo)).toBe(1);
    clock.advance(2000);
    expect(service.register(combo)).toBe(2);
    expect(service.multiplier(combo)).toBeCloseTo(1.2);
  });

  it('a gap past the window restarts the chain', () => {
    const combo = service.create();
    service.register(combo);
    clock.advance(500);
    service.register(combo);
    clock.advance(2001);
    expect(service.register(combo)).toBe(0);
  });

  it('reset clears the chain', () => {
    const combo = service.create();
    service.register(combo);
    clock.advance(100);
    service.register(combo);
    service.reset(combo);
    expect(combo).toEqual({ count: 0, lastAttackAt: null });
  });
});
