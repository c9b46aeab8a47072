// Content bundle types (ashen_v1 JSON)

import type { Stance } from '../types/index.js';

export type PlayerDefaults = {
  startLocationId: string;
  estusMax: number;
  stance: Stance;
};

/** lore id → text */
export type LoreEntries = Record<string, string>;
