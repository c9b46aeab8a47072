// Game settings: .env defaults, resolved once at construction

import { Injectable } from '@nestjs/common';
import type { LogLevel } from '@nestjs/common';
import { join } from 'path';

export interface GameConfig {
  saveDir: string;
  contentDir: string;
  version: string;
  comboWindowMs: number;
  parryWindowMs: number;
  rngSeed: string;
  logLevels: LogLevel[];
}

const LOG_LEVEL_ORDER: LogLevel[] = ['fatal', 'error', 'warn', 'log', 'debug', 'verbose'];

/** `LOG_LEVEL=log` → every level at or above `log` */
export function resolveLogLevels(level: string | undefined): LogLevel[] {
  const idx = LOG_LEVEL_ORDER.findIndex((l) => l === level);
  return LOG_LEVEL_ORDER.slice(0, idx >= 0 ? idx + 1 : LOG_LEVEL_ORDER.indexOf('warn') + 1);
}

function readInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

export function loadGameConfig(env: NodeJS.ProcessEnv = process.env): GameConfig {
  return {
    saveDir: env.SAVE_DIR ?? join(process.cwd(), 'saves'),
    contentDir: env.CONTENT_DIR ?? join(process.cwd(), 'content', 'ashen_v1'),
    version: env.GAME_VERSION ?? '1.0.0',
    comboWindowMs: readInt(env.COMBO_WINDOW_MS, 2000),
    parryWindowMs: readInt(env.PARRY_WINDOW_MS, 1500),
    rngSeed: env.RNG_SEED ?? `seed_${Date.now()}`,
    logLevels: resolveLogLevels(env.LOG_LEVEL),
  };
}

@Injectable()
export class GameConfigService {
  private readonly config: GameConfig;

  constructor() {
    this.config = loadGameConfig();
  }

  get(): GameConfig {
    return this.config;
  }

  /** Test / tooling override, e.g. pointing saveDir at a temp directory. */
  override(patch: Partial<GameConfig>): GameConfig {
    Object.assign(this.config, patch);
    return this.config;
  }
}
