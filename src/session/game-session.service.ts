// One running game: the player, the world, and which mode commands are read in

import { Injectable, Logger } from '@nestjs/common';
import { GameConfigService } from '../config/game-config.service.js';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { GameError, InvalidInputError } from '../common/errors/game-errors.js';
import { matchesName } from '../common/text-utils.js';
import {
  BASE_STATS,
  EQUIPMENT_SLOTS,
  STANCES,
  type CombatTurnResult,
  type Encounter,
  type EnemyTemplate,
  type EquipmentSlot,
  type NpcDefinition,
  type Player,
  type SessionMode,
  type Stance,
  type WorldState,
} from '../types/index.js';
import { Rng, RngService } from '../engine/rng/rng.service.js';
import {
  CommandParserService,
  type CommandVerb,
  type ParsedCommand,
} from '../engine/input/command-parser.service.js';
import { WorldService } from '../engine/world/world.service.js';
import { CombatService, PARRY_STAMINA_COST, type CombatContext } from '../engine/combat/combat.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';
import { QuestService, type QuestCompletion } from '../engine/quests/quest.service.js';
import { DialogueService } from '../engine/dialogue/dialogue.service.js';
import { InventoryService } from '../engine/rewards/inventory.service.js';
import { RewardsService } from '../engine/rewards/rewards.service.js';
import { ShopService } from '../engine/shop/shop.service.js';
import { SaveService } from '../persistence/save.service.js';
import { CharacterFactoryService } from './character-factory.service.js';
import { GameViewService } from './game-view.service.js';

export const AUTOSAVE_SLOT = 'autosave';
export const QUICKSAVE_SLOT = 'quicksave';
export const PARRY_WORD = 'parry';
export const UNKNOWN_COMMAND = "Unknown command. Type 'help' for a list of commands.";

const HELP_LINES = [
  'Exploring:',
  '  n/s/e/w/ne/nw/se/sw/u/d, go <direction>  travel',
  '  look, examine <item>                     look around or at something',
  '  take <item>, drop <item>                 pick up or leave items',
  '  talk <someone>, buy <item>               speak and trade',
  '  equip <item>, unequip <slot|item>        change gear',
  '  use <item>, estus                        drink and heal',
  '  rest                                     rest at a beacon (autosaves)',
  '  level <stat>                             spend essence on a stat',
  '  stance <balanced|aggressive|defensive>   change stance',
  'In combat:',
  '  attack, special <move>, parry, estus, use <item>, stance <s>, flee',
  'In conversation:',
  '  <number> to choose, buy <item>, leave',
  'Any time:',
  '  inventory, character, quests, lore, save [slot], load [slot], help, quit',
];

type KnownCommand = { verb: CommandVerb; arg?: string };

export interface SessionState {
  player: Player;
  world: WorldState;
  mode: SessionMode;
  encounter?: Encounter;
  npcId?: string;
}

export interface SessionReply {
  lines: string[];
  /** The player asked to leave the game */
  quit?: boolean;
  /** Combat waits on a timed "parry" answer; pass it to resolveParry */
  parry?: boolean;
}

@Injectable()
export class GameSessionService {
  private readonly logger = new Logger(GameSessionService.name);

  private current: SessionState | null = null;
  private rng: Rng;

  constructor(
    private readonly config: GameConfigService,
    private readonly content: ContentLoaderService,
    private readonly rngService: RngService,
    private readonly parser: CommandParserService,
    private readonly worldService: WorldService,
    private readonly combatService: CombatService,
    private readonly progressionService: ProgressionService,
    private readonly questService: QuestService,
    private readonly dialogueService: DialogueService,
    private readonly inventoryService: InventoryService,
    private readonly rewardsService: RewardsService,
    private readonly shopService: ShopService,
    private readonly saveService: SaveService,
    private readonly characterFactory: CharacterFactoryService,
    private readonly view: GameViewService,
  ) {
    this.rng = this.rngService.create(this.config.get().rngSeed);
  }

  hasGame(): boolean {
    return this.current !== null;
  }

  get state(): SessionState {
    if (!this.current) throw new InvalidInputError('No game in progress');
    return this.current;
  }

  /** Replace the roll source; the seed and cursor go into every save. */
  useRng(rng: Rng): void {
    this.rng = rng;
  }

  describeClasses(): string[] {
    return this.characterFactory.describeClasses();
  }

  newGame(name: string, classQuery: string): string[] {
    const player = this.characterFactory.createPlayer(name, classQuery);
    this.current = { player, world: this.worldService.createWorldState(), mode: 'explore' };
    this.logger.log(`New game: ${player.name} the ${player.characterClass}`);

    const className = this.content.getClass(player.characterClass)?.name ?? player.characterClass;
    return [
      `Rise, ${player.name} the ${className}.`,
      ...this.worldService.describeLocation(player, this.current.world),
    ];
  }

  async loadGame(slot: string): Promise<string[]> {
    const loaded = await this.saveService.load(slot);
    this.current = { player: loaded.player, world: loaded.world, mode: 'explore' };
    if (loaded.rng) {
      this.rng = this.rngService.create(loaded.rng.seed, loaded.rng.cursor);
    }

    const lines: string[] = [];
    if (loaded.warning) lines.push(loaded.warning);
    lines.push(`Welcome back, ${loaded.player.name}.`);
    lines.push(...this.worldService.describeLocation(loaded.player, loaded.world));
    return lines;
  }

  async saveGame(slot: string = QUICKSAVE_SLOT): Promise<string[]> {
    const { player, world } = this.state;
    await this.saveService.save(slot, { player, world, rng: this.rng.getState() });
    return [`Game saved to slot "${slot}".`];
  }

  async execute(line: string): Promise<SessionReply> {
    const command = this.parser.parse(line);
    try {
      return await this.dispatch(command);
    } catch (err) {
      if (err instanceof GameError) {
        this.logger.debug(`${err.code}: ${err.message}`);
        return { lines: [err.message] };
      }
      throw err;
    }
  }

  /** Second half of a parry: `typed` is whatever arrived before the window closed. */
  resolveParry(typed: string): SessionReply {
    const state = this.state;
    if (state.mode !== 'combat' || !state.encounter) {
      return { lines: ['There is nothing to parry.'] };
    }
    const success = typed.trim().toLowerCase() === PARRY_WORD;
    const result = this.combatService.parry(this.combatContext(state, state.encounter), success);
    return { lines: this.afterCombatTurn(state, result) };
  }

  // ── dispatch ──

  private async dispatch(command: ParsedCommand): Promise<SessionReply> {
    if (command.verb === 'unknown') {
      return { lines: [command.raw === '' ? 'Say something.' : UNKNOWN_COMMAND] };
    }
    const { verb, arg } = command;

    // 1. no game needed
    switch (verb) {
      case 'help':
        return { lines: [...HELP_LINES] };
      case 'quit':
        return { lines: ['The flame gutters. Farewell, Unkindled.'], quit: true };
      case 'load':
        return { lines: await this.loadGame(arg ?? QUICKSAVE_SLOT) };
      default:
        break;
    }

    // 2. available in every mode
    const state = this.state;
    const { player } = state;
    switch (verb) {
      case 'inventory':
        return { lines: this.view.inventory(player) };
      case 'character':
        return { lines: this.view.characterSheet(player) };
      case 'quests':
        return { lines: this.view.journal(player) };
      case 'lore':
        return { lines: this.view.lore(player) };
      default:
        break;
    }

    // 3. mode-specific
    switch (state.mode) {
      case 'combat':
        return this.combatCommand(state, command);
      case 'dialogue':
        return this.dialogueCommand(state, command);
      case 'explore':
        return this.exploreCommand(state, command);
    }
  }

  private async exploreCommand(state: SessionState, { verb, arg }: KnownCommand): Promise<SessionReply> {
    const { player, world } = state;

    switch (verb) {
      case 'move':
        return { lines: arg ? this.travel(state, arg) : ['Go where?'] };
      case 'look':
        return { lines: this.worldService.describeLocation(player, world) };
      case 'examine':
        return { lines: arg ? this.examine(state, arg) : this.worldService.describeLocation(player, world) };
      case 'take':
        return { lines: arg ? this.take(state, arg) : ['Take what?'] };
      case 'drop':
        return { lines: [arg ? this.worldService.dropItem(player, world, arg).message : 'Drop what?'] };
      case 'equip':
        return { lines: [arg ? this.inventoryService.equip(player, arg).message : 'Equip what?'] };
      case 'unequip':
        return { lines: [arg ? this.unequip(player, arg) : 'Unequip what?'] };
      case 'use':
        return { lines: [arg ? this.inventoryService.useItem(player, arg).message : 'Use what?'] };
      case 'estus':
        return { lines: [this.progressionService.useEstus(player).message] };
      case 'rest':
        return { lines: await this.rest(state) };
      case 'level':
        return { lines: this.levelUp(player, arg) };
      case 'stance':
        return { lines: [this.changeStance(player, arg)] };
      case 'talk':
        return { lines: this.talk(state, arg) };
      case 'buy':
        return { lines: this.buy(state, this.merchantHere(player), arg) };
      case 'save':
        return { lines: await this.saveGame(arg) };
      case 'attack':
      case 'special':
      case 'flee':
      case 'parry':
        return { lines: ['There is nothing to fight here.'] };
      case 'choose':
      case 'leave':
        return { lines: ['You are not talking to anyone.'] };
      default:
        return { lines: [UNKNOWN_COMMAND] };
    }
  }

  private combatCommand(state: SessionState, { verb, arg }: KnownCommand): SessionReply {
    const encounter = state.encounter;
    if (!encounter) {
      state.mode = 'explore';
      return { lines: ['The fight is over.'] };
    }
    const ctx = this.combatContext(state, encounter);

    switch (verb) {
      case 'attack':
        return { lines: this.afterCombatTurn(state, this.combatService.attack(ctx)) };
      case 'special': {
        const moves = this.content.getClass(state.player.characterClass)?.moves ?? [];
        if (!arg) {
          const known = moves.map((m) => `${m.name} (${m.staminaCost} stamina)`).join(', ');
          return { lines: [`Your moves: ${known || 'none'}.`] };
        }
        return { lines: this.afterCombatTurn(state, this.combatService.special(ctx, arg, moves)) };
      }
      case 'estus':
        return { lines: this.afterCombatTurn(state, this.combatService.estus(ctx)) };
      case 'use':
        if (!arg) return { lines: ['Use what?'] };
        return { lines: this.afterCombatTurn(state, this.combatService.useItem(ctx, arg)) };
      case 'flee':
        return { lines: this.afterCombatTurn(state, this.combatService.flee(ctx)) };
      case 'stance': {
        const stance = this.parseStance(arg);
        if (!stance) return { lines: [this.changeStance(state.player, arg)] };
        return { lines: this.afterCombatTurn(state, this.combatService.changeStance(ctx, stance)) };
      }
      case 'parry': {
        // too tired to parry: no prompt, just the refusal
        if (state.player.stamina < PARRY_STAMINA_COST) {
          return { lines: this.afterCombatTurn(state, this.combatService.parry(ctx, false)) };
        }
        const pattern = this.combatService.nextEnemyPattern(encounter);
        return {
          lines: [`${encounter.enemy.template.name} winds up ${pattern.name}... type "${PARRY_WORD}"!`],
          parry: true,
        };
      }
      case 'look':
        return { lines: this.view.combatStatus(state.player, encounter) };
      case 'examine':
        return { lines: [encounter.enemy.template.description, ...this.view.combatStatus(state.player, encounter)] };
      default:
        return { lines: ['You are in combat! Attack, use a special move, parry, drink estus, use an item or flee.'] };
    }
  }

  private dialogueCommand(state: SessionState, { verb, arg }: KnownCommand): SessionReply {
    const npcId = state.npcId;
    const npc = npcId ? this.content.getNpc(npcId) : undefined;
    if (!npcId || !npc) {
      this.endDialogue(state);
      return { lines: ['There is no one to talk to.'] };
    }

    switch (verb) {
      case 'choose': {
        const index = Number(arg);
        const result = this.dialogueService.choose(state.player, state.world, npcId, index);
        if (result.ended) {
          this.endDialogue(state);
          return { lines: result.lines };
        }
        return { lines: [...result.lines, ...this.dialogueView(state, npcId)] };
      }
      case 'talk':
        return { lines: this.dialogueView(state, npcId) };
      case 'buy':
        return { lines: this.buy(state, npc, arg) };
      case 'leave':
        this.dialogueService.leave(state.world, npcId);
        this.endDialogue(state);
        return { lines: [`You take your leave of ${npc.name}.`] };
      default:
        return { lines: [`You are talking to ${npc.name}. Choose an option by number, or leave.`] };
    }
  }

  // ── exploring ──

  private travel(state: SessionState, direction: string): string[] {
    const { player, world } = state;
    const result = this.worldService.move(player, direction);
    if (!result.ok) return [result.message];

    const lines = [result.message, ...this.worldService.describeLocation(player, world)];

    const recovered = this.progressionService.recoverEssence(player);
    if (recovered > 0) lines.push(`You recover ${recovered} lost essence.`);

    const template = this.worldService.spawnEncounter(player, world, this.rng);
    if (template) lines.push(...this.beginCombat(state, template));
    return lines;
  }

  private take(state: SessionState, query: string): string[] {
    const result = this.worldService.takeItem(state.player, state.world, query);
    const lines = [result.message];
    if (result.ok && result.item) {
      lines.push(...completionLines(this.questService.recordObjective(state.player, 'item', result.item.id)));
    }
    return lines;
  }

  private examine(state: SessionState, query: string): string[] {
    const carried = this.inventoryService.findByName(state.player, query);
    if (carried) return this.view.examineItem(carried);

    const here = this.worldService.locationState(state.world, state.player.currentLocationId);
    const groundId = here.items.find((id) => {
      const def = this.content.getItem(id);
      return def ? matchesName(query, def) : false;
    });
    const ground = groundId ? this.content.getItem(groundId) : undefined;
    if (ground) return this.view.examineItem(ground);

    const npc = this.npcsHere(state.player).find((n) => matchesName(query, n));
    if (npc) return [npc.description];

    return [`You see no "${query}" here.`];
  }

  private unequip(player: Player, query: string): string {
    const slot = this.resolveSlot(player, query);
    if (!slot) return `You have nothing equipped called "${query}".`;
    return this.inventoryService.unequip(player, slot).message;
  }

  /** Slot name ("shield", "ring" for either ring) or the name of an equipped item */
  private resolveSlot(player: Player, query: string): EquipmentSlot | undefined {
    const q = query.trim().toLowerCase();
    if (q === 'ring') {
      return player.equipment.ring1 !== null ? 'ring1' : player.equipment.ring2 !== null ? 'ring2' : 'ring1';
    }
    const slot = EQUIPMENT_SLOTS.find((s) => s === q);
    if (slot) return slot;

    const item = this.inventoryService.findByName(player, query);
    return item?.equipped ? this.inventoryService.slotOf(player, item.id) : undefined;
  }

  private async rest(state: SessionState): Promise<string[]> {
    const { player } = state;
    const location = this.worldService.currentLocation(player);
    if (!location) return ['You are nowhere.'];

    const result = this.progressionService.rest(player, location);
    if (!result.ok) return [result.message];

    try {
      await this.saveGame(AUTOSAVE_SLOT);
    } catch (err) {
      if (!(err instanceof GameError)) throw err;
      return [result.message, err.message];
    }
    return [result.message, 'Your progress is recorded.'];
  }

  private levelUp(player: Player, arg: string | undefined): string[] {
    const stat = BASE_STATS.find((s) => s === arg?.trim().toLowerCase());
    if (!stat) {
      const cost = this.progressionService.levelCost(player.level);
      return [
        `Level ${player.level + 1} costs ${cost} essence (you have ${player.essence}).`,
        `Choose a stat: level <${BASE_STATS.join('|')}>`,
      ];
    }
    return [this.progressionService.levelUp(player, stat).message];
  }

  private parseStance(arg: string | undefined): Stance | undefined {
    const q = arg?.trim().toLowerCase();
    return STANCES.find((s) => s === q);
  }

  /** Out of combat a stance change is just bookkeeping. */
  private changeStance(player: Player, arg: string | undefined): string {
    if (!arg) return `Your stance is ${player.stance}.`;
    const stance = this.parseStance(arg);
    if (!stance) return `Stances: ${STANCES.join(', ')}.`;
    const previous = player.stance;
    player.stance = stance;
    return `You shift from ${previous} to ${stance} stance.`;
  }

  // ── people ──

  private npcsHere(player: Player): NpcDefinition[] {
    const location = this.worldService.currentLocation(player);
    return (location?.npcs ?? [])
      .map((id) => this.content.getNpc(id))
      .filter((npc): npc is NpcDefinition => npc !== undefined);
  }

  private merchantHere(player: Player): NpcDefinition | undefined {
    return this.npcsHere(player).find((npc) => (npc.shop ?? []).length > 0);
  }

  private talk(state: SessionState, query: string | undefined): string[] {
    const here = this.npcsHere(state.player);
    if (here.length === 0) return ['There is no one here.'];

    const npc = query ? here.find((n) => matchesName(query, n)) : here.length === 1 ? here[0] : undefined;
    if (!npc) {
      return query
        ? [`There is no "${query}" here.`]
        : [`Talk to whom? Here: ${here.map((n) => n.name).join(', ')}.`];
    }

    state.mode = 'dialogue';
    state.npcId = npc.id;
    return this.dialogueView(state, npc.id);
  }

  private dialogueView(state: SessionState, npcId: string): string[] {
    const view = this.dialogueService.talk(state.player, state.world, npcId);
    return view ? this.view.dialogue(view) : ['There is no one to talk to.'];
  }

  private endDialogue(state: SessionState): void {
    state.mode = 'explore';
    state.npcId = undefined;
  }

  private buy(state: SessionState, npc: NpcDefinition | undefined, query: string | undefined): string[] {
    if (!query) {
      return npc?.shop && npc.shop.length > 0
        ? this.shopService.describeWares(npc)
        : ['There is no one here to trade with.'];
    }
    const result = this.shopService.purchase(state.player, npc, query);
    return [result.message, ...(result.questLines ?? [])];
  }

  // ── combat ──

  private combatContext(state: SessionState, encounter: Encounter): CombatContext {
    return { player: state.player, encounter, rng: this.rng };
  }

  private beginCombat(state: SessionState, template: EnemyTemplate): string[] {
    const encounter = this.combatService.startEncounter(template);
    state.mode = 'combat';
    state.encounter = encounter;
    const opening = encounter.isBoss
      ? `${template.name} bars your way!`
      : `${template.name} attacks!`;
    return [opening, ...this.view.combatStatus(state.player, encounter)];
  }

  private endCombat(state: SessionState): void {
    state.mode = 'explore';
    state.encounter = undefined;
  }

  private afterCombatTurn(state: SessionState, result: CombatTurnResult): string[] {
    const lines = result.events.map((e) => e.text);
    const encounter = state.encounter;

    switch (result.outcome) {
      case 'VICTORY':
        if (encounter) lines.push(...this.victory(state, encounter));
        this.endCombat(state);
        break;
      case 'DEFEAT':
        lines.push(...this.defeat(state));
        break;
      case 'FLED':
        this.endCombat(state);
        break;
      case 'ONGOING':
        if (result.ok && encounter) lines.push(...this.view.combatStatus(state.player, encounter));
        break;
    }
    return lines;
  }

  private victory(state: SessionState, encounter: Encounter): string[] {
    const { player, world } = state;
    const template = encounter.enemy.template;
    const lines: string[] = [];

    // 1. essence and the kill counter
    const essence = this.progressionService.applyKill(player, template);
    lines.push(`You gain ${essence} essence.`);

    // 2. loot
    for (const drop of this.rewardsService.rollLoot(template, this.rng)) {
      const item = this.content.createItem(drop.itemId, drop.quantity);
      if (!item) continue;
      this.inventoryService.addItem(player, item);
      lines.push(`You obtain ${item.name}${drop.quantity > 1 ? ` x${drop.quantity}` : ''}.`);
      lines.push(...completionLines(this.questService.recordObjective(player, 'item', item.id, drop.quantity)));
    }

    // 3. bosses stay dead
    if (encounter.isBoss) {
      if (!world.defeatedBosses.includes(template.id)) world.defeatedBosses.push(template.id);
      player.flags[`${template.id}_defeated`] = true;
      lines.push(`${template.name} has fallen. The way ahead lies open.`);
      this.logger.log(`Boss defeated: ${template.id}`);
    }

    // 4. kill objectives
    lines.push(...completionLines(this.questService.recordObjective(player, 'kill', template.id)));
    return lines;
  }

  private defeat(state: SessionState): string[] {
    const { player, world } = state;
    const { startLocationId } = this.content.getPlayerDefaults();
    const death = this.progressionService.die(player, startLocationId, (id) => this.worldService.isBeacon(id));
    this.endCombat(state);

    const lines: string[] = [];
    if (death.lostAmount > 0) {
      const where = this.content.getLocation(death.lostAt)?.name ?? death.lostAt;
      lines.push(`Your ${death.lostAmount} essence lies in ${where}. Return to reclaim it.`);
    }
    const respawn = this.content.getLocation(death.respawnAt)?.name ?? death.respawnAt;
    lines.push(`You awaken at ${respawn}.`);
    lines.push(...this.worldService.describeLocation(player, world));
    return lines;
  }
}

function completionLines(completions: QuestCompletion[]): string[] {
  return completions.flatMap((done) => done.lines);
}
