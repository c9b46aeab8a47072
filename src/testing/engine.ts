// Wires the engine services by hand for specs that need several of them.

import { join } from 'path';
import { GameConfigService } from '../config/game-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { InventoryService } from '../engine/rewards/inventory.service.js';
import { RewardsService } from '../engine/rewards/rewards.service.js';
import { StatsService } from '../engine/stats/stats.service.js';
import { DamageService } from '../engine/combat/damage.service.js';
import { ComboService } from '../engine/combat/combo.service.js';
import { SpecialMoveService } from '../engine/combat/special-move.service.js';
import { BossPhaseService } from '../engine/combat/boss-phase.service.js';
import { EnemyAiService } from '../engine/combat/enemy-ai.service.js';
import { CombatService } from '../engine/combat/combat.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';
import { QuestService } from '../engine/quests/quest.service.js';
import { DialogueService } from '../engine/dialogue/dialogue.service.js';
import { WorldService } from '../engine/world/world.service.js';
import { ShopService } from '../engine/shop/shop.service.js';
import { RngService } from '../engine/rng/rng.service.js';
import { CommandParserService } from '../engine/input/command-parser.service.js';
import { SaveService } from '../persistence/save.service.js';
import { CharacterFactoryService } from '../session/character-factory.service.js';
import { GameViewService } from '../session/game-view.service.js';
import { GameSessionService } from '../session/game-session.service.js';
import { ManualClock } from './fixtures.js';

export const BUNDLED_CONTENT_DIR = join(__dirname, '..', '..', 'content', 'ashen_v1');

export interface TestEngine {
  config: GameConfigService;
  clock: ManualClock;
  status: StatusService;
  inventory: InventoryService;
  rewards: RewardsService;
  stats: StatsService;
  damage: DamageService;
  combo: ComboService;
  specialMoves: SpecialMoveService;
  bossPhase: BossPhaseService;
  enemyAi: EnemyAiService;
  progression: ProgressionService;
  combat: CombatService;
}

export interface TestWorld extends TestEngine {
  content: ContentLoaderService;
  quests: QuestService;
  dialogue: DialogueService;
  world: WorldService;
  shop: ShopService;
}

export interface TestSession extends TestWorld {
  saves: SaveService;
  session: GameSessionService;
}

export function testConfig(): GameConfigService {
  const config = new GameConfigService();
  config.override({ contentDir: BUNDLED_CONTENT_DIR, comboWindowMs: 2000, rngSeed: 'test-seed' });
  return config;
}

/** Combat, stats and progression without content */
export function createEngine(config = testConfig()): TestEngine {
  const clock = new ManualClock(1_000);
  const status = new StatusService();
  const inventory = new InventoryService(status);
  const rewards = new RewardsService();
  const stats = new StatsService(inventory, status);
  const damage = new DamageService();
  const combo = new ComboService(clock, config);
  const specialMoves = new SpecialMoveService(stats);
  const bossPhase = new BossPhaseService();
  const enemyAi = new EnemyAiService();
  const progression = new ProgressionService(damage, status);
  const combat = new CombatService(
    stats,
    status,
    damage,
    combo,
    specialMoves,
    bossPhase,
    enemyAi,
    progression,
    inventory,
  );
  return { config, clock, status, inventory, rewards, stats, damage, combo, specialMoves, bossPhase, enemyAi, progression, combat };
}

/** Full engine on the bundled ashen_v1 content */
export async function createWorld(): Promise<TestWorld> {
  const engine = createEngine();
  const content = new ContentLoaderService(engine.config);
  await content.onModuleInit();
  const quests = new QuestService(content, engine.inventory);
  const dialogue = new DialogueService(content, quests, engine.inventory);
  const world = new WorldService(content, engine.inventory, engine.progression);
  const shop = new ShopService(content, engine.inventory, quests);
  return { ...engine, content, quests, dialogue, world, shop };
}

/** A whole game session writing saves into `saveDir` */
export async function createSession(saveDir: string): Promise<TestSession> {
  const w = await createWorld();
  w.config.override({ saveDir });
  const saves = new SaveService(w.config);
  const view = new GameViewService(w.content, w.stats, w.status, w.inventory, w.progression, w.quests, w.enemyAi);
  const session = new GameSessionService(
    w.config,
    w.content,
    new RngService(),
    new CommandParserService(),
    w.world,
    w.combat,
    w.progression,
    w.quests,
    w.dialogue,
    w.inventory,
    w.rewards,
    w.shop,
    saves,
    new CharacterFactoryService(w.content, w.inventory),
    view,
  );
  return { ...w, saves, session };
}
