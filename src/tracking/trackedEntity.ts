import { RunningStats } from '../stats/runningStats.js';
import { BoundingBox, Detection, EntityRecord, WireBox } from '../types.js';
import { fromWireBox, toWireBox } from './geometry.js';

type LabelObservation = {
  stats: RunningStats;
  lastBox: BoundingBox;
};

export class EntityPayloadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EntityPayloadError';
  }
}

/**
 * Folds a stream of (label, confidence, box) reports for one tracked id into a single
 * best-label judgment.
 *
 * Each label is weighted by its share of the total confidence mass, so a label wins by
 * being reported often and confidently. The resulting confidence is the winning
 * label's mean confidence scaled by that share. Ties go to the label observed first.
 */
export class TrackedEntity {
  private readonly observations = new Map<string, LabelObservation>();
  private cycles = 0;
  private missing = 0;
  private seenFrames = 0;
  private box: BoundingBox | null = null;
  private resolvedLabel: string | null = null;
  private resolvedConfidence = 0;
  private totalMass = 0;

  constructor(public readonly id: string) {}

  markSeen(detection?: Detection, isNewPollCycle = true) {
    if (isNewPollCycle) {
      this.cycles += 1;
    }
    this.missing = 0;

    if (!detection) {
      return;
    }

    const box = { ...detection.box };
    const existing = this.observations.get(detection.label);
    if (existing) {
      existing.stats.addValue(detection.confidence);
      existing.lastBox = box;
    } else {
      this.observations.set(detection.label, {
        stats: new RunningStats(detection.confidence),
        lastBox: box
      });
    }
    this.box = box;
    this.recalculateBest();
  }

  markMissing() {
    this.missing += 1;
  }

  labelConf(label: string): number {
    const observation = this.observations.get(label);
    if (!observation) {
      return 0;
    }
    return this.shareOf(observation);
  }

  get age(): number {
    return this.cycles;
  }

  get missingStreak(): number {
    return this.missing;
  }

  // Carried for wire compatibility, nothing updates it.
  get framesSeen(): number {
    return this.seenFrames;
  }

  get bestLabel(): string | null {
    return this.resolvedLabel;
  }

  get bestConfidence(): number {
    return this.resolvedConfidence;
  }

  get lastBox(): BoundingBox | null {
    return this.box ? { ...this.box } : null;
  }

  labels(): string[] {
    return Array.from(this.observations.keys());
  }

  labelBox(label: string): BoundingBox | null {
    const observation = this.observations.get(label);
    return observation ? { ...observation.lastBox } : null;
  }

  serialize(): EntityRecord {
    if (this.resolvedLabel === null || !this.box) {
      throw new Error(`Entity ${this.id} has no observed label to serialize`);
    }
    return {
      label: this.resolvedLabel,
      confidence: this.resolvedConfidence,
      age: this.cycles,
      missingStreak: this.missing,
      framesSeen: this.seenFrames,
      box: toWireBox(this.box)
    };
  }

  static deserialize(id: string, record: EntityRecord): TrackedEntity {
    const entity = new TrackedEntity(id);
    entity.markSeen({
      label: record.label,
      confidence: record.confidence,
      box: fromWireBox(record.box)
    });
    entity.cycles = record.age;
    entity.missing = record.missingStreak;
    entity.seenFrames = record.framesSeen;
    return entity;
  }

  private shareOf(observation: LabelObservation): number {
    if (this.totalMass <= 0) {
      return 0;
    }
    return observation.stats.sum / this.totalMass;
  }

  private recalculateBest() {
    let mass = 0;
    for (const observation of this.observations.values()) {
      mass += observation.stats.sum;
    }
    this.totalMass = mass;

    let bestShare = -1;
    let bestLabel: string | null = null;
    let bestAvg = 0;
    for (const [label, observation] of this.observations) {
      const share = this.shareOf(observation);
      if (share > bestShare) {
        bestShare = share;
        bestLabel = label;
        bestAvg = observation.stats.avg;
      }
    }

    this.resolvedLabel = bestLabel;
    this.resolvedConfidence = bestLabel === null ? 0 : bestAvg * bestShare;
  }
}

function isNonNegativeInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function parseWireBox(value: unknown): WireBox {
  if (!Array.isArray(value) || value.length !== 4) {
    throw new EntityPayloadError('box must be an array of four numbers');
  }
  const [x, y, width, height]: unknown[] = value;
  if (!isFiniteNumber(x) || !isFiniteNumber(y) || !isFiniteNumber(width) || !isFiniteNumber(height)) {
    throw new EntityPayloadError('box must be an array of four numbers');
  }
  if (width < 0 || height < 0) {
    throw new EntityPayloadError('box width and height must be >= 0');
  }
  return [x, y, width, height];
}

/** Validates a decoded detection payload. */
export function parseEntityRecord(raw: unknown): EntityRecord {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new EntityPayloadError('payload must be an object');
  }
  const record = raw as Record<string, unknown>;

  const label = typeof record.label === 'string' ? record.label.trim() : '';
  if (!label) {
    throw new EntityPayloadError('label must be a non-empty string');
  }

  const confidence = record.confidence;
  if (!isFiniteNumber(confidence) || confidence < 0 || confidence > 1) {
    throw new EntityPayloadError('confidence must be a number between 0 and 1');
  }

  const { age, missingStreak } = record;
  if (!isNonNegativeInteger(age)) {
    throw new EntityPayloadError('age must be a non-negative integer');
  }
  if (!isNonNegativeInteger(missingStreak)) {
    throw new EntityPayloadError('missingStreak must be a non-negative integer');
  }

  const framesSeen = record.framesSeen ?? 0;
  if (!isNonNegativeInteger(framesSeen)) {
    throw new EntityPayloadError('framesSeen must be a non-negative integer');
  }

  return {
    label,
    confidence,
    age,
    missingStreak,
    framesSeen,
    box: parseWireBox(record.box)
  };
}

export default TrackedEntity;
