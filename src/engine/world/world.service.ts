// Map traversal, location descriptions, item pickup/drop and random encounters

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import { matchesName, titleCase } from '../../common/text-utils.js';
import {
  fail,
  succeed,
  type EnemyTemplate,
  type Item,
  type LocationDefinition,
  type LocationState,
  type Outcome,
  type Player,
  type VisitRequirement,
  type WorldState,
} from '../../types/index.js';
import type { Rng } from '../rng/rng.service.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { ProgressionService } from '../progression/progression.service.js';

export type WorldFailReason = 'NO_EXIT' | 'LOCKED' | 'NOT_FOUND' | 'UNKNOWN_LOCATION' | 'EQUIPPED';

export const SPAWN_CHANCE = 80;

export const DIRECTION_ALIASES: Record<string, string> = {
  n: 'north',
  s: 'south',
  e: 'east',
  w: 'west',
  ne: 'northeast',
  nw: 'northwest',
  se: 'southeast',
  sw: 'southwest',
  u: 'up',
  d: 'down',
};

export function normalizeDirection(input: string): string {
  const dir = input.trim().toLowerCase();
  return Object.hasOwn(DIRECTION_ALIASES, dir) ? DIRECTION_ALIASES[dir] : dir;
}

export type MoveOutcome = Outcome<WorldFailReason> & { location?: LocationDefinition; firstDiscovery?: boolean };

@Injectable()
export class WorldService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly inventoryService: InventoryService,
    private readonly progressionService: ProgressionService,
  ) {}

  createWorldState(): WorldState {
    const locations: Record<string, LocationState> = {};
    for (const loc of this.content.getAllLocations()) {
      locations[loc.id] = { visited: false, items: [...loc.items] };
    }
    const npcs: WorldState['npcs'] = {};
    for (const npc of this.content.getAllNpcs()) {
      npcs[npc.id] = { met: false, relationship: 0, currentNode: 'greeting' };
    }
    return { locations, npcs, defeatedBosses: [] };
  }

  currentLocation(player: Player): LocationDefinition | undefined {
    return this.content.getLocation(player.currentLocationId);
  }

  locationState(world: WorldState, locationId: string): LocationState {
    const existing = world.locations[locationId];
    if (existing) return existing;
    const fresh: LocationState = { visited: false, items: [] };
    world.locations[locationId] = fresh;
    return fresh;
  }

  meetsRequirement(player: Player, requirement: VisitRequirement | undefined): boolean {
    if (!requirement) return true;
    switch (requirement.type) {
      case 'item':
        return this.inventoryService.count(player, requirement.itemId) > 0;
      case 'quest_complete':
        return player.quests.completed.includes(requirement.questId);
      case 'flag':
        return player.flags[requirement.flag] === true;
    }
  }

  move(player: Player, direction: string): MoveOutcome {
    const here = this.currentLocation(player);
    if (!here) return fail('UNKNOWN_LOCATION', 'You are nowhere.');

    const dir = normalizeDirection(direction);
    const targetId = Object.hasOwn(here.connections, dir) ? here.connections[dir] : undefined;
    if (!targetId) return fail('NO_EXIT', `You can't go ${dir} from here.`);

    const target = this.content.getLocation(targetId);
    if (!target) return fail('UNKNOWN_LOCATION', `The way ${dir} leads nowhere.`);

    if (!this.meetsRequirement(player, target.visitRequirement)) {
      return fail('LOCKED', this.lockedText(target.visitRequirement));
    }

    player.currentLocationId = target.id;
    const firstDiscovery = this.progressionService.discover(player, target.id);
    return { ...succeed(`You travel ${dir} to ${target.name}.`), location: target, firstDiscovery };
  }

  /** Full look; first-visit text shows once. */
  describeLocation(player: Player, world: WorldState): string[] {
    const loc = this.currentLocation(player);
    if (!loc) return ['You are nowhere.'];
    const state = this.locationState(world, loc.id);

    const lines = [`== ${loc.name} ==`];
    if (!state.visited && loc.firstVisitText) lines.push(loc.firstVisitText);
    lines.push(loc.description);
    if (loc.isBeacon) lines.push('A beacon burns here. You may rest.');

    if (state.items.length > 0) {
      const names = state.items.map((id) => this.content.getItem(id)?.name ?? titleCase(id));
      lines.push(`You see: ${names.join(', ')}.`);
    }
    if (loc.npcs.length > 0) {
      const names = loc.npcs.map((id) => this.content.getNpc(id)?.name ?? titleCase(id));
      lines.push(`Here: ${names.join(', ')}.`);
    }
    const exits = Object.keys(loc.connections);
    lines.push(exits.length > 0 ? `Exits: ${exits.join(', ')}.` : 'There is no way out.');

    state.visited = true;
    return lines;
  }

  /**
   * Boss areas field their undefeated boss; elsewhere an 80% roll picks one of the
   * location's enemies.
   */
  spawnEncounter(player: Player, world: WorldState, rng: Rng): EnemyTemplate | undefined {
    const loc = this.currentLocation(player);
    if (!loc || loc.enemies.length === 0) return undefined;

    if (loc.isBossArea) {
      const bossId = loc.enemies.find(
        (id) => this.content.getBoss(id) !== undefined && !world.defeatedBosses.includes(id),
      );
      return bossId ? this.content.getBoss(bossId) : undefined;
    }

    if (!rng.chance(SPAWN_CHANCE)) return undefined;
    const enemyId = rng.pick(loc.enemies);
    return enemyId ? this.content.getEnemyTemplate(enemyId) : undefined;
  }

  takeItem(player: Player, world: WorldState, query: string): Outcome<WorldFailReason> & { item?: Item } {
    const state = this.locationState(world, player.currentLocationId);
    const idx = state.items.findIndex((id) => {
      const def = this.content.getItem(id);
      return def ? matchesName(query, def) : false;
    });
    const item = idx >= 0 ? this.content.createItem(state.items[idx]) : undefined;
    if (!item) return fail('NOT_FOUND', `There is no "${query}" here.`);

    state.items.splice(idx, 1);
    const entry = this.inventoryService.addItem(player, item);
    return { ...succeed(`You pick up ${item.name}.`), item: entry };
  }

  /** Drops one unequipped copy; gear in use has to come off first. */
  dropItem(player: Player, world: WorldState, query: string): Outcome<WorldFailReason> {
    const item =
      player.inventory.find((i) => !i.equipped && matchesName(query, i)) ??
      this.inventoryService.findByName(player, query);
    if (!item) return fail('NOT_FOUND', `You don't have "${query}".`);
    if (item.equipped) return fail('EQUIPPED', `You need to unequip ${item.name} first.`);

    this.inventoryService.removeQuantity(player, item.id, 1);
    this.locationState(world, player.currentLocationId).items.push(item.id);
    return succeed(`You drop ${item.name}.`);
  }

  isBeacon(locationId: string): boolean {
    return this.content.getLocation(locationId)?.isBeacon ?? false;
  }

  private lockedText(requirement: VisitRequirement | undefined): string {
    switch (requirement?.type) {
      case 'item':
        return `The way is sealed. You need ${this.content.getItem(requirement.itemId)?.name ?? requirement.itemId}.`;
      case 'quest_complete':
        return 'You are not yet ready to pass.';
      case 'flag':
      default:
        return 'Something bars the way.';
    }
  }
}
