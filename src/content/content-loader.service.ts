// ashen_v1 JSON load + zod validation + in-memory cache

import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { z } from 'zod';
import { GameConfigService } from '../config/game-config.service.js';
import { ContentError } from '../common/errors/game-errors.js';
import {
  cloneItem,
  type BossDefinition,
  type ClassDefinition,
  type EnemyDefinition,
  type EnemyTemplate,
  type Item,
  type LocationDefinition,
  type NpcDefinition,
  type QuestDefinition,
} from '../types/index.js';
import type { LoreEntries, PlayerDefaults } from './content.types.js';
import {
  bossesFileSchema,
  classesFileSchema,
  enemiesFileSchema,
  formatIssues,
  itemSchema,
  locationsFileSchema,
  loreFileSchema,
  npcsFileSchema,
  playerDefaultsSchema,
  questsFileSchema,
} from './content.schema.js';

const itemsFileSchema = itemSchema.array();

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);

  private items = new Map<string, Item>();
  private enemies = new Map<string, EnemyDefinition>();
  private bosses = new Map<string, BossDefinition>();
  private classes = new Map<string, ClassDefinition>();
  private locations = new Map<string, LocationDefinition>();
  private npcs = new Map<string, NpcDefinition>();
  private quests = new Map<string, QuestDefinition>();
  private lore: LoreEntries = {};
  private playerDefaults: PlayerDefaults = {
    startLocationId: '',
    estusMax: 3,
    stance: 'balanced',
  };

  constructor(private readonly config: GameConfigService) {}

  async onModuleInit() {
    await this.loadAll(this.config.get().contentDir);
  }

  async loadAll(dir: string): Promise<void> {
    const read = (file: string) => readFile(join(dir, file), 'utf-8');

    const [
      itemsRaw, enemiesRaw, bossesRaw, classesRaw, locationsRaw,
      npcsRaw, questsRaw, loreRaw, defaultsRaw,
    ] = await Promise.all([
      read('items.json'),
      read('enemies.json'),
      read('bosses.json'),
      read('classes.json'),
      read('locations.json'),
      read('npcs.json'),
      read('quests.json'),
      read('lore.json').catch(() => '{}'),
      read('player_defaults.json'),
    ]).catch((err: unknown) => {
      throw new ContentError(`Cannot read content from ${dir}`, {
        cause: err instanceof Error ? err.message : String(err),
      });
    });

    this.items = toMap(parseFile('items.json', itemsFileSchema, itemsRaw));
    this.enemies = toMap(parseFile('enemies.json', enemiesFileSchema, enemiesRaw));
    this.bosses = toMap(parseFile('bosses.json', bossesFileSchema, bossesRaw));
    this.classes = toMap(parseFile('classes.json', classesFileSchema, classesRaw));
    this.locations = toMap(parseFile('locations.json', locationsFileSchema, locationsRaw));
    this.npcs = toMap(parseFile('npcs.json', npcsFileSchema, npcsRaw));
    this.quests = toMap(parseFile('quests.json', questsFileSchema, questsRaw));
    this.lore = parseFile('lore.json', loreFileSchema, loreRaw);
    this.playerDefaults = parseFile('player_defaults.json', playerDefaultsSchema, defaultsRaw);

    const problems = this.crossCheck();
    if (problems.length > 0) {
      throw new ContentError('Content references do not resolve', { issues: problems });
    }

    this.logger.log(
      `Loaded ${this.items.size} items, ${this.enemies.size} enemies, ${this.bosses.size} bosses, ` +
        `${this.locations.size} locations, ${this.npcs.size} npcs, ${this.quests.size} quests from ${dir}`,
    );
  }

  /** Dangling ids across files: reported all at once */
  private crossCheck(): string[] {
    const problems: string[] = [];
    const need = (ok: boolean, msg: string) => {
      if (!ok) problems.push(msg);
    };

    need(
      this.locations.has(this.playerDefaults.startLocationId),
      `player_defaults.startLocationId: unknown location "${this.playerDefaults.startLocationId}"`,
    );

    for (const enemy of [...this.enemies.values(), ...this.bosses.values()]) {
      for (const drop of enemy.loot) {
        need(this.items.has(drop.itemId), `${enemy.id}.loot: unknown item "${drop.itemId}"`);
      }
    }

    for (const cls of this.classes.values()) {
      for (const start of cls.startingItems) {
        need(this.items.has(start.itemId), `${cls.id}.startingItems: unknown item "${start.itemId}"`);
      }
    }

    for (const loc of this.locations.values()) {
      for (const [dir, target] of Object.entries(loc.connections)) {
        need(this.locations.has(target), `${loc.id}.connections.${dir}: unknown location "${target}"`);
      }
      for (const id of loc.enemies) {
        need(this.getEnemyTemplate(id) !== undefined, `${loc.id}.enemies: unknown enemy "${id}"`);
      }
      for (const id of loc.items) {
        need(this.items.has(id), `${loc.id}.items: unknown item "${id}"`);
      }
      for (const id of loc.npcs) {
        need(this.npcs.has(id), `${loc.id}.npcs: unknown npc "${id}"`);
      }
      if (loc.isBossArea) {
        need(
          loc.enemies.some((id) => this.bosses.has(id)),
          `${loc.id}: boss area without a boss`,
        );
      }
    }

    for (const npc of this.npcs.values()) {
      for (const id of npc.shop ?? []) {
        need(this.items.has(id), `${npc.id}.shop: unknown item "${id}"`);
      }
      for (const [nodeId, node] of Object.entries(npc.dialogue)) {
        for (const opt of node.options ?? []) {
          const next = opt.next ?? 'greeting';
          need(next in npc.dialogue, `${npc.id}.dialogue.${nodeId}: unknown node "${next}"`);
          if (opt.startQuest) {
            need(this.quests.has(opt.startQuest), `${npc.id}.dialogue.${nodeId}: unknown quest "${opt.startQuest}"`);
          }
        }
      }
    }

    for (const quest of this.quests.values()) {
      const { itemId, lore } = quest.rewards;
      if (itemId) need(this.items.has(itemId), `${quest.id}.rewards: unknown item "${itemId}"`);
      if (lore) need(lore in this.lore, `${quest.id}.rewards: unknown lore "${lore}"`);
    }

    return problems;
  }

  getPlayerDefaults(): PlayerDefaults {
    return this.playerDefaults;
  }

  getItem(id: string): Item | undefined {
    return this.items.get(id);
  }

  /** Fresh owned copy of a content item, or undefined for an unknown id. */
  createItem(id: string, quantity = 1): Item | undefined {
    const template = this.items.get(id);
    return template ? cloneItem(template, quantity) : undefined;
  }

  getEnemy(id: string): EnemyDefinition | undefined {
    return this.enemies.get(id);
  }

  getBoss(id: string): BossDefinition | undefined {
    return this.bosses.get(id);
  }

  /** Regular enemy or boss by id */
  getEnemyTemplate(id: string): EnemyTemplate | undefined {
    return this.bosses.get(id) ?? this.enemies.get(id);
  }

  getClass(id: string): ClassDefinition | undefined {
    return this.classes.get(id);
  }

  getAllClasses(): ClassDefinition[] {
    return [...this.classes.values()];
  }

  getLocation(id: string): LocationDefinition | undefined {
    return this.locations.get(id);
  }

  getAllLocations(): LocationDefinition[] {
    return [...this.locations.values()];
  }

  getNpc(id: string): NpcDefinition | undefined {
    return this.npcs.get(id);
  }

  getAllNpcs(): NpcDefinition[] {
    return [...this.npcs.values()];
  }

  getQuest(id: string): QuestDefinition | undefined {
    return this.quests.get(id);
  }

  getLore(id: string): string | undefined {
    return this.lore[id];
  }
}

function parseFile<S extends z.ZodTypeAny>(file: string, schema: S, raw: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ContentError(`${file} is not valid JSON`, {
      cause: err instanceof Error ? err.message : String(err),
    });
  }
  const result = schema.safeParse(json);
  if (!result.success) {
    throw new ContentError(`${file} failed validation`, { issues: formatIssues(result.error) });
  }
  return result.data;
}

function toMap<T extends { id: string }>(list: T[]): Map<string, T> {
  const map = new Map<string, T>();
  for (const entry of list) {
    if (map.has(entry.id)) {
      throw new ContentError(`Duplicate content id "${entry.id}"`);
    }
    map.set(entry.id, entry);
  }
  return map;
}
