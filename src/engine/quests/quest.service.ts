// Quest counters (keyed by objective type), completion and one-shot rewards

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../../content/content-loader.service.js';
import {
  fail,
  succeed,
  type ObjectiveType,
  type Outcome,
  type Player,
  type QuestDefinition,
} from '../../types/index.js';
import { InventoryService } from '../rewards/inventory.service.js';

export type QuestFailReason = 'UNKNOWN_QUEST' | 'ALREADY_ACTIVE' | 'ALREADY_COMPLETED';

export interface QuestCompletion {
  quest: QuestDefinition;
  lines: string[];
}

@Injectable()
export class QuestService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly inventoryService: InventoryService,
  ) {}

  isActive(player: Player, questId: string): boolean {
    return Object.hasOwn(player.quests.active, questId);
  }

  isCompleted(player: Player, questId: string): boolean {
    return player.quests.completed.includes(questId);
  }

  start(player: Player, questId: string): Outcome<QuestFailReason> {
    const quest = this.content.getQuest(questId);
    if (!quest) return fail('UNKNOWN_QUEST', `No such quest: ${questId}.`);
    if (this.isCompleted(player, questId)) {
      return fail('ALREADY_COMPLETED', `You have already completed "${quest.name}".`);
    }
    if (this.isActive(player, questId)) {
      return fail('ALREADY_ACTIVE', `"${quest.name}" is already in your journal.`);
    }

    const counters: Partial<Record<ObjectiveType, number>> = {};
    for (const objective of quest.objectives) counters[objective.type] = 0;
    player.quests.active[questId] = counters;
    return succeed(`New quest: ${quest.name}. ${quest.description}`);
  }

  /** Only an active quest that declares this objective type moves. */
  updateProgress(player: Player, questId: string, type: ObjectiveType, amount = 1): boolean {
    const counters = player.quests.active[questId];
    const quest = this.content.getQuest(questId);
    if (!counters || !quest) return false;
    if (!quest.objectives.some((o) => o.type === type)) return false;

    counters[type] = (counters[type] ?? 0) + amount;
    return true;
  }

  /**
   * Forward a kill or pickup to every active quest with a matching objective,
   * then complete whatever that finished.
   */
  recordObjective(player: Player, type: ObjectiveType, targetId: string, amount = 1): QuestCompletion[] {
    const completions: QuestCompletion[] = [];
    for (const questId of Object.keys(player.quests.active)) {
      const quest = this.content.getQuest(questId);
      if (!quest) continue;
      const matches = quest.objectives.some((o) => o.type === type && o.target === targetId);
      if (!matches) continue;

      this.updateProgress(player, questId, type, amount);
      const done = this.checkCompletion(player, questId);
      if (done) completions.push(done);
    }
    return completions;
  }

  /** Completes the quest when every objective's counter meets its quantity. */
  checkCompletion(player: Player, questId: string): QuestCompletion | null {
    const counters = player.quests.active[questId];
    const quest = this.content.getQuest(questId);
    if (!counters || !quest) return null;

    const finished = quest.objectives.every((o) => (counters[o.type] ?? 0) >= o.quantity);
    return finished ? this.complete(player, questId) : null;
  }

  /** Only an active quest completes, so rewards are paid once. */
  complete(player: Player, questId: string): QuestCompletion | null {
    const quest = this.content.getQuest(questId);
    if (!quest || !this.isActive(player, questId)) return null;

    delete player.quests.active[questId];
    player.quests.completed.push(questId);

    const lines = [`Quest complete: ${quest.name}!`];
    const { essence, itemId, faction, reputation, lore } = quest.rewards;

    if (essence) {
      player.essence += essence;
      lines.push(`You receive ${essence} essence.`);
    }
    if (itemId) {
      const item = this.content.createItem(itemId);
      if (item) {
        this.inventoryService.addItem(player, item);
        lines.push(`You receive ${item.name}.`);
      }
    }
    if (faction && reputation) {
      player.factionReputation[faction] = (player.factionReputation[faction] ?? 0) + reputation;
      lines.push(`Your standing with ${faction} changes by ${reputation}.`);
    }
    if (lore && !player.unlockedLore.includes(lore)) {
      player.unlockedLore.push(lore);
      lines.push('New lore unlocked.');
    }

    return { quest, lines };
  }

  /** Journal lines for one quest */
  describe(player: Player, questId: string): string[] {
    const quest = this.content.getQuest(questId);
    if (!quest) return [];

    if (this.isCompleted(player, questId)) {
      return [`${quest.name} (completed)`];
    }
    const counters = player.quests.active[questId] ?? {};
    return [
      `${quest.name}: ${quest.description}`,
      ...quest.objectives.map((o) => {
        const progress = Math.min(counters[o.type] ?? 0, o.quantity);
        const verb = o.type === 'kill' ? 'Defeat' : 'Collect';
        return `  - ${verb} ${this.targetName(o.type, o.target)}: ${progress}/${o.quantity}`;
      }),
    ];
  }

  private targetName(type: ObjectiveType, target: string): string {
    if (type === 'kill') return this.content.getEnemyTemplate(target)?.name ?? target;
    return this.content.getItem(target)?.name ?? target;
  }
}
