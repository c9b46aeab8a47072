// World definitions (read-only content) and the mutable world state

import type { ObjectiveType } from './enums.js';

export type VisitRequirement =
  | { type: 'item'; itemId: string }
  | { type: 'quest_complete'; questId: string }
  | { type: 'flag'; flag: string };

export interface LocationDefinition {
  id: string;
  name: string;
  description: string;
  region: string;
  connections: Record<string, string>; // direction → location id
  enemies: string[];
  items: string[];
  npcs: string[];
  isBeacon: boolean;
  isBossArea: boolean;
  firstVisitText?: string;
  visitRequirement?: VisitRequirement;
}

export type DialogueCondition =
  | { type: 'quest_complete'; questId: string }
  | { type: 'item'; itemId: string }
  | { type: 'flag'; flag: string };

export interface DialogueOption {
  text: string;
  next?: string;
  relationship?: number;
  setFlag?: string;
  startQuest?: string;
  questProgress?: { questId: string; type: ObjectiveType; amount: number };
  condition?: DialogueCondition;
}

export interface DialogueNode {
  text: string;
  options?: DialogueOption[];
}

export interface NpcDefinition {
  id: string;
  name: string;
  description: string;
  dialogue: Record<string, DialogueNode>;
  shop?: string[];
  faction?: string;
}

export interface QuestObjective {
  type: ObjectiveType;
  target: string;
  quantity: number;
}

export interface QuestRewards {
  essence?: number;
  itemId?: string;
  faction?: string;
  reputation?: number;
  lore?: string;
}

export interface QuestDefinition {
  id: string;
  name: string;
  description: string;
  objectives: QuestObjective[];
  rewards: QuestRewards;
}

export interface LocationState {
  visited: boolean;
  items: string[];
}

export interface NpcState {
  met: boolean;
  relationship: number;
  currentNode: string;
}

export interface WorldState {
  locations: Record<string, LocationState>;
  npcs: Record<string, NpcState>;
  defeatedBosses: string[];
}
