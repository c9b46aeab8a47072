export * from './enums.js';
export * from './item.js';
export * from './enemy.js';
export * from './effects.js';
export * from './player.js';
export * from './world.js';
export * from './combat.js';
export * from './character.js';
export * from './outcome.js';
