export interface BoundingBox {
  x: number;
  y: number;
  width: number;
  height: number;
}

/** Box as carried on the wire: `[x, y, w, h]` in normalized frame coordinates. */
export type WireBox = [number, number, number, number];

export interface Detection {
  label: string;
  confidence: number;
  box: BoundingBox;
}

export interface EntityRecord {
  label: string;
  confidence: number;
  age: number;
  missingStreak: number;
  framesSeen: number;
  box: WireBox;
}

export interface InteractionTemplate {
  name: string;
  slots: string[][];
  overlapThreshold: number;
  minSustainMs: number;
  expireAfterMs: number;
}

export type TransitionType = 'activated' | 'cleared';

export interface InteractionTransition {
  type: TransitionType;
  ts: number;
  context: string;
  interaction: string;
  slots: string[];
  firstObservedAt: number;
  lastObservedAt: number;
}
