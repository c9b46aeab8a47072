import { Module } from '@nestjs/common';
import { RngService } from './rng/rng.service.js';
import { CLOCK, SystemClock } from './clock/clock.js';
import { StatusService } from './status/status.service.js';
import { InventoryService } from './rewards/inventory.service.js';
import { RewardsService } from './rewards/rewards.service.js';
import { StatsService } from './stats/stats.service.js';
import { DamageService } from './combat/damage.service.js';
import { ComboService } from './combat/combo.service.js';
import { SpecialMoveService } from './combat/special-move.service.js';
import { BossPhaseService } from './combat/boss-phase.service.js';
import { EnemyAiService } from './combat/enemy-ai.service.js';
import { CombatService } from './combat/combat.service.js';
import { ProgressionService } from './progression/progression.service.js';
import { QuestService } from './quests/quest.service.js';
import { DialogueService } from './dialogue/dialogue.service.js';
import { WorldService } from './world/world.service.js';
import { ShopService } from './shop/shop.service.js';
import { CommandParserService } from './input/command-parser.service.js';
import { TimedInputService } from './input/timed-input.service.js';

const providers = [
  // Layer 1: primitives
  RngService,
  SystemClock,
  { provide: CLOCK, useExisting: SystemClock },
  // Layer 2: effects / items
  StatusService,
  InventoryService,
  RewardsService,
  // Layer 3: stats
  StatsService,
  // Layer 4: combat
  DamageService,
  ComboService,
  SpecialMoveService,
  BossPhaseService,
  EnemyAiService,
  // Layer 5: progression
  ProgressionService,
  CombatService,
  // Layer 6: quests / world
  QuestService,
  DialogueService,
  WorldService,
  ShopService,
  // Layer 7: input
  CommandParserService,
  TimedInputService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
