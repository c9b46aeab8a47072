// Text panels: character sheet, pack, item details, journal, lore, combat and dialogue

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { displayBar, titleCase } from '../common/text-utils.js';
import {
  BASE_STATS,
  EQUIPMENT_SLOTS,
  isArmor,
  isConsumable,
  isWeapon,
  type BaseStat,
  type Encounter,
  type Item,
  type Player,
  type ResistanceMap,
} from '../types/index.js';
import { StatsService } from '../engine/stats/stats.service.js';
import { StatusService } from '../engine/status/status.service.js';
import { InventoryService } from '../engine/rewards/inventory.service.js';
import { ProgressionService } from '../engine/progression/progression.service.js';
import { QuestService } from '../engine/quests/quest.service.js';
import { EnemyAiService } from '../engine/combat/enemy-ai.service.js';
import type { DialogueView } from '../engine/dialogue/dialogue.service.js';

const STAT_ABBREVIATIONS: Record<BaseStat, string> = {
  strength: 'STR',
  dexterity: 'DEX',
  intelligence: 'INT',
  faith: 'FAI',
  vitality: 'VIT',
  endurance: 'END',
};

const COMBAT_BAR_WIDTH = 10;

@Injectable()
export class GameViewService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly statsService: StatsService,
    private readonly statusService: StatusService,
    private readonly inventoryService: InventoryService,
    private readonly progressionService: ProgressionService,
    private readonly questService: QuestService,
    private readonly enemyAiService: EnemyAiService,
  ) {}

  characterSheet(player: Player): string[] {
    const className = this.content.getClass(player.characterClass)?.name ?? titleCase(player.characterClass);
    const stats = BASE_STATS.map((stat) => `${STAT_ABBREVIATIONS[stat]} ${player.stats[stat]}`).join(' | ');
    const equipped = EQUIPMENT_SLOTS.map(
      (slot) => `${slot} ${this.inventoryService.equippedItem(player, slot)?.name ?? '-'}`,
    ).join(', ');

    const lines = [
      `${player.name}, level ${player.level} ${className}`,
      `HP      ${displayBar(player.hp, player.maxHp)}`,
      `Stamina ${displayBar(player.stamina, player.maxStamina)}`,
      `Estus   ${player.estus.current}/${player.estus.max}`,
      `Essence ${player.essence} (next level costs ${this.progressionService.levelCost(player.level)})`,
      stats,
      `Attack ${this.statsService.attackPower(player)} | Defense ${this.statsService.effectiveDefense(player)} | Stance ${player.stance}`,
      `Equipped: ${equipped}`,
    ];
    if (player.effects.length > 0) {
      lines.push(`Effects: ${player.effects.map((e) => this.statusService.describe(e)).join(', ')}`);
    }
    if (player.lostEssence) {
      const where = this.content.getLocation(player.lostEssence.locationId)?.name ?? player.lostEssence.locationId;
      lines.push(`${player.lostEssence.amount} essence lies at ${where}.`);
    }
    return lines;
  }

  inventory(player: Player): string[] {
    if (player.inventory.length === 0) return ['Your pack is empty.'];
    return [
      'You carry:',
      ...player.inventory.map((item) => {
        const count = item.quantity > 1 ? ` x${item.quantity}` : '';
        const worn = item.equipped ? ' (equipped)' : '';
        return `  ${item.name}${count}${worn}`;
      }),
    ];
  }

  examineItem(item: Item): string[] {
    const lines = [`${item.name}: ${item.description}`];
    if (isWeapon(item)) {
      const w = item.weapon;
      const scaling = w.scaling ? `, scales with ${w.scaling}` : '';
      const hands = w.twoHanded ? 'two-handed' : 'one-handed';
      lines.push(`  ${w.damage} ${w.damageType} damage${scaling}, ${w.staminaCost} stamina per swing, ${hands}.`);
    } else if (isArmor(item)) {
      const a = item.armor;
      lines.push(`  ${a.defense} defense (${a.armorType})${this.resistanceText(a.resistance)}.`);
    } else if (isConsumable(item)) {
      const e = item.effect;
      switch (e.effectType) {
        case 'heal':
          lines.push(`  Restores ${e.value} HP.`);
          break;
        case 'stamina':
          lines.push(`  Restores ${e.value} stamina.`);
          break;
        case 'buff':
          lines.push(`  Raises ${e.buffStat ?? 'attack'} by ${e.value} for ${e.duration} turns.`);
          break;
      }
    } else if (item.accessory) {
      lines.push(`  ${item.accessory.defense} defense${this.resistanceText(item.accessory.resistance)}.`);
    }
    lines.push(`  Worth ${item.value} essence.`);
    return lines;
  }

  journal(player: Player): string[] {
    const ids = [...Object.keys(player.quests.active), ...player.quests.completed];
    if (ids.length === 0) return ['Your journal is empty.'];
    return ids.flatMap((id) => this.questService.describe(player, id));
  }

  lore(player: Player): string[] {
    const entries = player.unlockedLore
      .map((id) => this.content.getLore(id))
      .filter((text): text is string => text !== undefined);
    return entries.length > 0 ? entries : ['You have not uncovered any lore yet.'];
  }

  combatStatus(player: Player, encounter: Encounter): string[] {
    const { enemy } = encounter;
    const next = this.enemyAiService.peekPattern(encounter);
    return [
      `${enemy.template.name} ${displayBar(enemy.hp, enemy.maxHp, COMBAT_BAR_WIDTH)}`,
      `You HP ${displayBar(player.hp, player.maxHp, COMBAT_BAR_WIDTH)} | Stamina ${displayBar(player.stamina, player.maxStamina, COMBAT_BAR_WIDTH)}`,
      `${enemy.template.name} readies ${next.name}.`,
    ];
  }

  dialogue(view: DialogueView): string[] {
    const lines = [`${view.npc.name}: "${view.text}"`, ...view.options.map((o, i) => `  ${i + 1}. ${o.text}`)];
    if (view.npc.shop && view.npc.shop.length > 0) {
      lines.push(`  (buy <item> to trade, leave to walk away)`);
    }
    return lines;
  }

  private resistanceText(resistance: ResistanceMap): string {
    const parts = Object.entries(resistance).map(([type, pct]) => `${type} ${pct}%`);
    return parts.length > 0 ? `; resists ${parts.join(', ')}` : '';
  }
}
