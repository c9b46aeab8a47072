// Terminal front end: title menu, then one prompt per command

import { Injectable, Logger } from '@nestjs/common';
import { GameConfigService } from '../config/game-config.service.js';
import { GameError } from '../common/errors/game-errors.js';
import { TimedInputService, type LineSource } from '../engine/input/timed-input.service.js';
import { SaveService, type SaveSummary } from '../persistence/save.service.js';
import { GameSessionService, type SessionReply } from '../session/game-session.service.js';

export const PROMPT = '> ';

export const TITLE_LINES = [
  '',
  '   A S H E N   B E A C O N',
  '',
  '  1. New game',
  '  2. Load game',
  '  3. Quit',
];

/** Line input plus somewhere to print; readline in production, a script in tests */
export interface Terminal extends LineSource {
  print(line: string): void;
}

@Injectable()
export class GameCliService {
  private readonly logger = new Logger(GameCliService.name);

  constructor(
    private readonly config: GameConfigService,
    private readonly session: GameSessionService,
    private readonly saveService: SaveService,
    private readonly timedInput: TimedInputService,
  ) {}

  async run(terminal: Terminal): Promise<void> {
    const started = await this.titleMenu(terminal);
    if (!started) {
      terminal.print('Farewell.');
      return;
    }
    await this.gameLoop(terminal);
  }

  /** false when the player quits from the title */
  private async titleMenu(terminal: Terminal): Promise<boolean> {
    while (!this.session.hasGame()) {
      TITLE_LINES.forEach((line) => terminal.print(line));
      const choice = (await this.ask(terminal, PROMPT)).trim().toLowerCase();

      switch (choice) {
        case '1':
        case 'new':
          await this.newGame(terminal);
          break;
        case '2':
        case 'load':
          await this.loadGame(terminal);
          break;
        case '3':
        case 'quit':
        case 'q':
          return false;
        default:
          terminal.print('Choose 1, 2 or 3.');
      }
    }
    return true;
  }

  private async newGame(terminal: Terminal): Promise<void> {
    const name = await this.ask(terminal, 'What is your name, Unkindled? ');
    this.session.describeClasses().forEach((line) => terminal.print(line));
    const cls = await this.ask(terminal, 'Choose your class: ');
    try {
      this.session.newGame(name, cls).forEach((line) => terminal.print(line));
    } catch (err) {
      this.printGameError(terminal, err);
    }
  }

  private async loadGame(terminal: Terminal): Promise<void> {
    let saves: SaveSummary[];
    try {
      saves = await this.saveService.listSaves();
    } catch (err) {
      this.printGameError(terminal, err);
      return;
    }
    if (saves.length === 0) {
      terminal.print('No saved games found.');
      return;
    }
    saves.forEach((s, i) => terminal.print(`  ${i + 1}. ${s.slot} (${s.timestamp})`));
    const answer = (await this.ask(terminal, 'Load which slot? ')).trim();
    const index = Number(answer);
    const slot = Number.isInteger(index) && index >= 1 ? saves[index - 1]?.slot ?? answer : answer;
    try {
      (await this.session.loadGame(slot)).forEach((line) => terminal.print(line));
    } catch (err) {
      this.printGameError(terminal, err);
    }
  }

  private async gameLoop(terminal: Terminal): Promise<void> {
    for (;;) {
      const line = await this.ask(terminal, PROMPT);
      let reply: SessionReply = await this.session.execute(line);
      this.printReply(terminal, reply);

      // 1. a parry waits on a second, timed answer
      if (reply.parry) {
        const typed = await this.timedInput.readWithTimeout(terminal, PROMPT, this.config.get().parryWindowMs);
        reply = this.session.resolveParry(typed);
        this.printReply(terminal, reply);
      }

      // 2. leave when asked
      if (reply.quit) {
        this.logger.log('Player quit');
        return;
      }
    }
  }

  private ask(terminal: Terminal, prompt: string): Promise<string> {
    return terminal.question(prompt, { signal: new AbortController().signal });
  }

  private printReply(terminal: Terminal, reply: SessionReply): void {
    reply.lines.forEach((line) => terminal.print(line));
  }

  private printGameError(terminal: Terminal, err: unknown): void {
    if (!(err instanceof GameError)) throw err;
    terminal.print(err.message);
  }
}
