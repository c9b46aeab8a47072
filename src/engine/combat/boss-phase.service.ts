// Boss phase transitions after damage

import { Injectable } from '@nestjs/common';
import { isBoss, type BossPhase, type Encounter } from '../../types/index.js';

export interface PhaseTransition {
  from: number;
  to: number;
  phase: BossPhase;
}

@Injectable()
export class BossPhaseService {
  /**
   * First phase after the current one whose trigger the hp% has reached.
   * One step per damage event; a dead boss does not transition.
   */
  checkPhase(encounter: Encounter): PhaseTransition | null {
    const { enemy } = encounter;
    if (!encounter.isBoss || !isBoss(enemy.template) || enemy.hp <= 0) return null;

    const hpPct = (enemy.hp / enemy.maxHp) * 100;
    const phases = enemy.template.phases;

    for (let i = encounter.phaseIndex + 1; i < phases.length; i++) {
      if (hpPct <= phases[i].trigger) {
        return this.enterPhase(encounter, i, phases[i]);
      }
    }
    return null;
  }

  private enterPhase(encounter: Encounter, index: number, phase: BossPhase): PhaseTransition {
    const from = encounter.phaseIndex;

    encounter.phaseIndex = index;
    if (phase.attackPatterns && phase.attackPatterns.length > 0) {
      encounter.activePatterns = phase.attackPatterns.map((p) => ({ ...p }));
      encounter.patternIndex = 0;
    }
    encounter.attackBonus += phase.attackBonus ?? 0;
    encounter.defenseBonus += phase.defenseBonus ?? 0;

    return { from, to: index, phase };
  }
}
