import { CommandParserService } from './command-parser.service.js';

describe('CommandParserService', () => {
  const parser = new CommandParserService();

  it('verb with a free-text argument', () => {
    expect(parser.parse('equip  Knight Sword ')).toEqual({ verb: 'equip', arg: 'Knight Sword' });
    expect(parser.parse('LOOK')).toEqual({ verb: 'look' });
  });

  it('aliases map to verbs', () => {
    expect(parser.parse('go north')).toEqual({ verb: 'move', arg: 'north' });
    expect(parser.parse('i')).toEqual({ verb: 'inventory' });
    expect(parser.parse('drink healing potion')).toEqual({ verb: 'use', arg: 'healing potion' });
    expect(parser.parse('cast fireball')).toEqual({ verb: 'special', arg: 'fireball' });
    expect(parser.parse('run')).toEqual({ verb: 'flee' });
  });

  it('a bare direction moves', () => {
    expect(parser.parse('n')).toEqual({ verb: 'move', arg: 'n' });
    expect(parser.parse('east')).toEqual({ verb: 'move', arg: 'east' });
  });

  it('a bare number picks a dialogue option', () => {
    expect(parser.parse('2')).toEqual({ verb: 'choose', arg: '2' });
  });

  it('"pick up" takes an item', () => {
    expect(parser.parse('pick up ashen key')).toEqual({ verb: 'take', arg: 'ashen key' });
    expect(parser.parse('pick up')).toEqual({ verb: 'take' });
    expect(parser.parse('pick key')).toEqual({ verb: 'take', arg: 'key' });
  });

  it('anything else is unknown', () => {
    expect(parser.parse('dance wildly')).toEqual({ verb: 'unknown', raw: 'dance wildly' });
    expect(parser.parse('   ')).toEqual({ verb: 'unknown', raw: '' });
  });
});
