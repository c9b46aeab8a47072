// Enemy turn: round-robin over the encounter's active attack patterns

import { Injectable } from '@nestjs/common';
import type { AttackPattern, Encounter } from '../../types/index.js';

@Injectable()
export class EnemyAiService {
  /** Pattern the enemy will use next, without advancing. */
  peekPattern(encounter: Encounter): AttackPattern {
    const patterns = encounter.activePatterns;
    if (patterns.length === 0) {
      return { name: 'Attack', power: encounter.enemy.template.attack, damageType: 'physical' };
    }
    return patterns[encounter.patternIndex % patterns.length];
  }

  /** Select and advance (i + 1) mod n. */
  selectPattern(encounter: Encounter): AttackPattern {
    const pattern = this.peekPattern(encounter);
    const n = encounter.activePatterns.length;
    if (n > 0) {
      encounter.patternIndex = (encounter.patternIndex + 1) % n;
    }
    return pattern;
  }

  attackPower(encounter: Encounter, pattern: AttackPattern): number {
    return pattern.power + encounter.attackBonus;
  }

  defense(encounter: Encounter): number {
    return encounter.enemy.template.defense + encounter.defenseBonus;
  }
}
