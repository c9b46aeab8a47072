// JSON save slots under the configured save directory

import { Injectable, Logger } from '@nestjs/common';
import { mkdir, readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { GameConfigService } from '../config/game-config.service.js';
import {
  InvalidInputError,
  SaveCorruptError,
  SaveNotFoundError,
  SaveWriteError,
} from '../common/errors/game-errors.js';
import { formatIssues } from '../content/content.schema.js';
import { EQUIPMENT_SLOTS, type Player, type WorldState } from '../types/index.js';
import type { RngState } from '../engine/rng/rng.service.js';
import { saveFileSchema, toItemRecord } from './save.schema.js';

export interface GameSnapshot {
  player: Player;
  world: WorldState;
  rng?: RngState;
}

export interface LoadedGame extends GameSnapshot {
  version: string;
  timestamp: string;
  /** Set when the file was written by another game version */
  warning?: string;
}

export interface SaveSummary {
  slot: string;
  timestamp: string;
  version: string;
}

const SLOT_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

@Injectable()
export class SaveService {
  private readonly logger = new Logger(SaveService.name);

  constructor(private readonly config: GameConfigService) {}

  async save(slot: string, snapshot: GameSnapshot): Promise<string> {
    const { saveDir, version } = this.config.get();
    const path = this.slotPath(slot);

    const payload = {
      version,
      timestamp: new Date().toISOString(),
      player: { ...snapshot.player, inventory: snapshot.player.inventory.map(toItemRecord) },
      world: snapshot.world,
      ...(snapshot.rng ? { rng: snapshot.rng } : {}),
    };

    try {
      await mkdir(saveDir, { recursive: true });
      await writeFile(path, JSON.stringify(payload, null, 2), 'utf-8');
    } catch (err) {
      this.logger.error(`Could not write ${path}: ${errorText(err)}`);
      throw new SaveWriteError(`Could not save to slot "${slot}"`, { path, cause: errorText(err) });
    }
    this.logger.log(`Saved slot "${slot}" to ${path}`);
    return path;
  }

  async load(slot: string): Promise<LoadedGame> {
    const path = this.slotPath(slot);

    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) {
        throw new SaveNotFoundError(`No save in slot "${slot}"`, { path });
      }
      throw new SaveCorruptError(`Could not read slot "${slot}"`, { path, cause: errorText(err) });
    }

    const data = this.parse(raw, path);
    const { player, world } = data;
    this.relinkEquipment(player);

    const current = this.config.get().version;
    let warning: string | undefined;
    if (data.version !== current) {
      warning = `Save was written by version ${data.version}; this is ${current}. Loading anyway.`;
      this.logger.warn(`${path}: ${warning}`);
    }

    this.logger.log(`Loaded slot "${slot}" from ${path}`);
    return { player, world, rng: data.rng, version: data.version, timestamp: data.timestamp, warning };
  }

  /** Slots with their timestamps, newest first. Unreadable files are skipped. */
  async listSaves(): Promise<SaveSummary[]> {
    const { saveDir } = this.config.get();
    let files: string[];
    try {
      files = await readdir(saveDir);
    } catch (err) {
      if (isMissingFile(err)) return [];
      throw new SaveCorruptError('Could not read the save directory', { saveDir, cause: errorText(err) });
    }

    const summaries: SaveSummary[] = [];
    for (const file of files.filter((f) => f.endsWith('.json'))) {
      const slot = file.slice(0, -'.json'.length);
      try {
        const data = this.parse(await readFile(join(saveDir, file), 'utf-8'), file);
        summaries.push({ slot, timestamp: data.timestamp, version: data.version });
      } catch (err) {
        this.logger.warn(`Skipping unreadable save ${file}: ${errorText(err)}`);
      }
    }
    return summaries.sort((a, b) => b.timestamp.localeCompare(a.timestamp));
  }

  private parse(raw: string, path: string) {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      throw new SaveCorruptError('Save file is not valid JSON', {
        path,
        cause: errorText(err),
      });
    }
    const result = saveFileSchema.safeParse(json);
    if (!result.success) {
      throw new SaveCorruptError('Save file does not match the expected format', {
        path,
        issues: formatIssues(result.error),
      });
    }
    return result.data;
  }

  /**
   * Slots point at item ids. A slot whose id is gone from the inventory is cleared,
   * and `equipped` flags are recomputed from the slots.
   */
  private relinkEquipment(player: Player): void {
    const wasEquipped = new Map(player.inventory.map((item) => [item, item.equipped]));
    for (const item of player.inventory) item.equipped = false;

    for (const slot of EQUIPMENT_SLOTS) {
      const id = player.equipment[slot];
      if (id === null) continue;
      const candidates = player.inventory.filter((i) => i.id === id && !i.equipped);
      const linked = candidates.find((i) => wasEquipped.get(i)) ?? candidates[0];
      if (linked) {
        linked.equipped = true;
      } else {
        this.logger.warn(`Equipment slot ${slot} referenced missing item "${id}"; cleared`);
        player.equipment[slot] = null;
      }
    }
  }

  private slotPath(slot: string): string {
    if (!SLOT_PATTERN.test(slot)) {
      throw new InvalidInputError('Save slot names may use letters, digits, "-" and "_" only', { slot });
    }
    return join(this.config.get().saveDir, `${slot}.json`);
  }
}

/** Matched by `code`: fs errors may come from another realm */
function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function errorText(err: unknown): string {
  return typeof err === 'object' && err !== null && 'message' in err ? String(err.message) : String(err);
}
