// Timed combat effects (class-move secondary effects, consumable buffs)

export type EffectType =
  | 'stun'
  | 'defense_boost'
  | 'evasion_boost'
  | 'damage_shield'
  | 'attack_boost';

export interface ActiveEffect {
  type: EffectType;
  value: number;
  duration: number; // remaining turns
  source: string;
  permanent?: boolean;
}
