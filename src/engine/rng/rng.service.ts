// splitmix64 deterministic RNG: every roll in the game (loot, spawns, stun, evasion, flee) goes through here

import { Injectable } from '@nestjs/common';

export interface RngState {
  seed: string;
  cursor: number;
}

const MASK64 = 0xffffffffffffffffn;

export class Rng {
  private state: bigint;
  private _cursor: number;

  constructor(
    readonly seed: string,
    cursor: number = 0,
  ) {
    this.state = this.hashSeed(seed);
    this._cursor = cursor;
    // fast-forward to the cursor without counting the steps again
    for (let i = 0; i < cursor; i++) {
      this.advanceState();
    }
  }

  private hashSeed(seed: string): bigint {
    let h = 0n;
    for (let i = 0; i < seed.length; i++) {
      h = ((h << 5n) - h + BigInt(seed.charCodeAt(i))) & MASK64;
    }
    return h === 0n ? 1n : h;
  }

  private advanceState(): void {
    this.state = (this.state + 0x9e3779b97f4a7c15n) & MASK64;
  }

  private nextRaw(): bigint {
    this._cursor++;
    this.advanceState();
    let z = this.state;
    z = ((z ^ (z >> 30n)) * 0xbf58476d1ce4e5b9n) & MASK64;
    z = ((z ^ (z >> 27n)) * 0x94d049bb133111ebn) & MASK64;
    return (z ^ (z >> 31n)) & MASK64;
  }

  /** [0, 1) */
  next(): number {
    return Number(this.nextRaw() >> 11n) / 2 ** 53;
  }

  /** integer in [min, max] */
  range(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  /** true with `percent`% probability */
  chance(percent: number): boolean {
    return this.next() * 100 < percent;
  }

  pick<T>(list: readonly T[]): T | undefined {
    if (list.length === 0) return undefined;
    return list[this.range(0, list.length - 1)];
  }

  getState(): RngState {
    return { seed: this.seed, cursor: this._cursor };
  }

  get cursor(): number {
    return this._cursor;
  }
}

@Injectable()
export class RngService {
  create(seed: string, cursor: number = 0): Rng {
    return new Rng(seed, cursor);
  }
}
