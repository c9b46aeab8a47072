// Basic-attack combo chain, driven by the injected clock

import { Inject, Injectable } from '@nestjs/common';
import type { ComboState } from '../../types/index.js';
import { GameConfigService } from '../../config/game-config.service.js';
import { CLOCK, type Clock } from '../clock/clock.js';

@Injectable()
export class ComboService {
  constructor(
    @Inject(CLOCK) private readonly clock: Clock,
    private readonly config: GameConfigService,
  ) {}

  create(): ComboState {
    return { count: 0, lastAttackAt: null };
  }

  /** Register a basic attack now; a hit inside the window extends the chain, otherwise it restarts. */
  register(combo: ComboState): number {
    const t = this.clock.now();
    if (combo.lastAttackAt !== null && t - combo.lastAttackAt <= this.config.get().comboWindowMs) {
      combo.count += 1;
    } else {
      combo.count = 0;
    }
    combo.lastAttackAt = t;
    return combo.count;
  }

  multiplier(combo: ComboState): number {
    return 1 + 0.1 * combo.count;
  }

  reset(combo: ComboState): void {
    combo.count = 0;
    combo.lastAttackAt = null;
  }
}
