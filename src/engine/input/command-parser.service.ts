// Line-oriented command grammar: `<verb> [free-text argument]`

import { Injectable } from '@nestjs/common';
import { DIRECTION_ALIASES } from '../world/world.service.js';

export const COMMAND_VERBS = [
  'move',
  'look',
  'examine',
  'talk',
  'attack',
  'rest',
  'use',
  'equip',
  'unequip',
  'drop',
  'take',
  'buy',
  'estus',
  'special',
  'flee',
  'parry',
  'inventory',
  'character',
  'level',
  'stance',
  'quests',
  'lore',
  'save',
  'load',
  'help',
  'quit',
  'choose',
  'leave',
] as const;
export type CommandVerb = (typeof COMMAND_VERBS)[number];

export type ParsedCommand =
  | { verb: CommandVerb; arg?: string }
  | { verb: 'unknown'; raw: string };

interface KeywordEntry {
  verb: CommandVerb;
  keywords: string[];
}

/** First word → verb. Full verb names are matched before these aliases. */
const KEYWORD_MAP: KeywordEntry[] = [
  { verb: 'move', keywords: ['go', 'walk', 'travel'] },
  { verb: 'look', keywords: ['l'] },
  { verb: 'examine', keywords: ['x', 'inspect', 'read'] },
  { verb: 'talk', keywords: ['speak', 'ask'] },
  { verb: 'attack', keywords: ['a', 'hit', 'fight', 'strike'] },
  { verb: 'rest', keywords: ['sit', 'kindle'] },
  { verb: 'use', keywords: ['drink', 'eat', 'consume'] },
  { verb: 'equip', keywords: ['wear', 'wield'] },
  { verb: 'unequip', keywords: ['remove'] },
  { verb: 'take', keywords: ['get', 'grab', 'pick'] },
  { verb: 'buy', keywords: ['purchase'] },
  { verb: 'estus', keywords: ['heal'] },
  { verb: 'special', keywords: ['skill', 'cast'] },
  { verb: 'flee', keywords: ['run', 'escape'] },
  { verb: 'inventory', keywords: ['i', 'inv'] },
  { verb: 'character', keywords: ['c', 'char', 'stats', 'status'] },
  { verb: 'level', keywords: ['levelup'] },
  { verb: 'quests', keywords: ['journal', 'quest', 'j'] },
  { verb: 'help', keywords: ['h', '?', 'commands'] },
  { verb: 'quit', keywords: ['exit', 'q'] },
  { verb: 'leave', keywords: ['bye', 'goodbye'] },
];

const DIRECTIONS = new Set([...Object.keys(DIRECTION_ALIASES), ...Object.values(DIRECTION_ALIASES)]);

@Injectable()
export class CommandParserService {
  parse(line: string): ParsedCommand {
    const raw = line.trim();
    const [head = '', ...rest] = raw.split(/\s+/);
    const word = head.toLowerCase();
    const arg = rest.join(' ').trim();
    const withArg = (verb: CommandVerb): ParsedCommand => (arg ? { verb, arg } : { verb });

    if (word === '') return { verb: 'unknown', raw };

    // bare direction: "n", "north"
    if (DIRECTIONS.has(word) && arg === '') return { verb: 'move', arg: word };

    // dialogue option number
    if (/^\d+$/.test(word) && arg === '') return { verb: 'choose', arg: word };

    // "pick up <item>"
    if (word === 'pick' && rest[0]?.toLowerCase() === 'up') {
      const item = rest.slice(1).join(' ').trim();
      return item ? { verb: 'take', arg: item } : { verb: 'take' };
    }

    const direct = COMMAND_VERBS.find((v) => v === word);
    if (direct) return withArg(direct);

    const aliased = KEYWORD_MAP.find((entry) => entry.keywords.includes(word));
    if (aliased) return withArg(aliased.verb);

    return { verb: 'unknown', raw };
  }
}
