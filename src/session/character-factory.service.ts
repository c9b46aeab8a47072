// New characters from a class definition and the content's player defaults

import { Injectable } from '@nestjs/common';
import { ContentLoaderService } from '../content/content-loader.service.js';
import { InvalidInputError } from '../common/errors/game-errors.js';
import { matchesName } from '../common/text-utils.js';
import { emptyEquipment, type ClassDefinition, type Player } from '../types/index.js';
import { InventoryService } from '../engine/rewards/inventory.service.js';

export const MAX_NAME_LENGTH = 24;

@Injectable()
export class CharacterFactoryService {
  constructor(
    private readonly content: ContentLoaderService,
    private readonly inventoryService: InventoryService,
  ) {}

  /** Class by id, name or list position ("2") */
  findClass(query: string): ClassDefinition | undefined {
    const classes = this.content.getAllClasses();
    const index = Number(query.trim());
    if (Number.isInteger(index) && index >= 1) return classes[index - 1];
    return classes.find((c) => matchesName(query, c));
  }

  describeClasses(): string[] {
    return this.content
      .getAllClasses()
      .map((c, i) => `${i + 1}. ${c.name} (HP ${c.maxHp}, Stamina ${c.maxStamina}): ${c.description}`);
  }

  createPlayer(name: string, classQuery: string): Player {
    const trimmed = name.trim();
    if (trimmed.length === 0) {
      throw new InvalidInputError('Your character needs a name.');
    }
    if (trimmed.length > MAX_NAME_LENGTH) {
      throw new InvalidInputError(`Names are at most ${MAX_NAME_LENGTH} characters.`, { name: trimmed });
    }

    const cls = this.findClass(classQuery);
    if (!cls) {
      const names = this.content.getAllClasses().map((c) => c.name).join(', ');
      throw new InvalidInputError(`Unknown class "${classQuery}". Choose one of: ${names}.`, { classQuery });
    }

    const defaults = this.content.getPlayerDefaults();
    const player: Player = {
      name: trimmed,
      characterClass: cls.id,
      level: 1,
      essence: 0,
      lostEssence: null,
      hp: cls.maxHp,
      maxHp: cls.maxHp,
      stamina: cls.maxStamina,
      maxStamina: cls.maxStamina,
      estus: { current: defaults.estusMax, max: defaults.estusMax },
      stats: { ...cls.stats },
      inventory: [],
      equipment: emptyEquipment(),
      stance: defaults.stance,
      currentLocationId: defaults.startLocationId,
      discoveredLocations: [defaults.startLocationId],
      killCounts: {},
      quests: { active: {}, completed: [] },
      effects: [],
      flags: {},
      factionReputation: {},
      unlockedLore: [],
    };

    for (const start of cls.startingItems) {
      const item = this.content.createItem(start.itemId, start.quantity);
      if (!item) continue;
      this.inventoryService.addItem(player, item);
      if (start.equip) this.inventoryService.equip(player, item.id);
    }
    return player;
  }
}
