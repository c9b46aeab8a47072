// NPC conversation trees with conditional options

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import type {
  DialogueCondition,
  DialogueOption,
  NpcDefinition,
  NpcState,
  Player,
  WorldState,
} from '../../types/index.js';
import { InventoryService } from '../rewards/inventory.service.js';
import { QuestService } from '../quests/quest.service.js';

export const GREETING_NODE = 'greeting';
const FAREWELL: DialogueOption = { text: 'Farewell.' };

export interface DialogueView {
  npc: NpcDefinition;
  text: string;
  options: DialogueOption[];
}

export interface ChoiceResult {
  ok: boolean;
  lines: string[];
  /** true once the conversation is back at the greeting */
  ended: boolean;
}

@Injectable()
export class DialogueService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly questService: QuestService,
    private readonly inventoryService: InventoryService,
  ) {}

  npcState(world: WorldState, npcId: string): NpcState {
    const existing = world.npcs[npcId];
    if (existing) return existing;
    const fresh: NpcState = { met: false, relationship: 0, currentNode: GREETING_NODE };
    world.npcs[npcId] = fresh;
    return fresh;
  }

  /** Current node text plus the options whose conditions pass; never an empty option list. */
  talk(player: Player, world: WorldState, npcId: string): DialogueView | undefined {
    const npc = this.content.getNpc(npcId);
    if (!npc) return undefined;

    const state = this.npcState(world, npcId);
    state.met = true;
    if (!(state.currentNode in npc.dialogue)) state.currentNode = GREETING_NODE;

    const node = npc.dialogue[state.currentNode];
    const options = (node.options ?? []).filter((o) => this.passes(player, o.condition));
    return { npc, text: node.text, options: options.length > 0 ? options : [FAREWELL] };
  }

  /** Pick a visible option by its 1-based index. */
  choose(player: Player, world: WorldState, npcId: string, index: number): ChoiceResult {
    const view = this.talk(player, world, npcId);
    if (!view) return { ok: false, lines: ['There is no one to talk to.'], ended: true };

    const option = view.options[index - 1];
    if (!option) {
      return { ok: false, lines: [`Choose an option between 1 and ${view.options.length}.`], ended: false };
    }

    const state = this.npcState(world, npcId);
    const lines: string[] = [`> ${option.text}`];

    if (option.relationship) {
      state.relationship += option.relationship;
      if (view.npc.faction) {
        const faction = view.npc.faction;
        player.factionReputation[faction] = (player.factionReputation[faction] ?? 0) + option.relationship;
      }
    }
    if (option.setFlag) {
      player.flags[option.setFlag] = true;
    }
    if (option.startQuest) {
      lines.push(this.questService.start(player, option.startQuest).message);
    }
    if (option.questProgress) {
      const { questId, type, amount } = option.questProgress;
      if (this.questService.updateProgress(player, questId, type, amount)) {
        const done = this.questService.checkCompletion(player, questId);
        if (done) lines.push(...done.lines);
      }
    }

    state.currentNode = option.next ?? GREETING_NODE;
    const ended = state.currentNode === GREETING_NODE;
    if (ended) {
      lines.push(`${view.npc.name} nods.`);
    }
    return { ok: true, lines, ended };
  }

  /** Walk away mid-conversation; the next talk starts at the greeting. */
  leave(world: WorldState, npcId: string): void {
    this.npcState(world, npcId).currentNode = GREETING_NODE;
  }

  private passes(player: Player, condition: DialogueCondition | undefined): boolean {
    if (!condition) return true;
    switch (condition.type) {
      case 'quest_complete':
        return this.questService.isCompleted(player, condition.questId);
      case 'item':
        return this.inventoryService.count(player, condition.itemId) > 0;
      case 'flag':
        return player.flags[condition.flag] === true;
    }
  }
}
