import { intersectionOverSmaller } from '../tracking/geometry.js';
import type { TrackedEntity } from '../tracking/trackedEntity.js';
import { InteractionTemplate } from '../types.js';

export interface OverlapPair {
  first: number;
  second: number;
  ios: number;
}

export interface CandidateMatch {
  interaction: string;
  slots: string[];
  entityIds: string[];
}

export interface OverlapMatcherOptions {
  maxSlotDepth?: number;
}

export const DEFAULT_MAX_SLOT_DEPTH = 8;

export class SlotDepthError extends Error {
  constructor(
    public readonly interaction: string,
    public readonly depth: number,
    public readonly maxDepth: number
  ) {
    super(
      `Interaction "${interaction}" exceeds the slot matching depth limit (${depth} > ${maxDepth})`
    );
    this.name = 'SlotDepthError';
  }
}

type Member = {
  id: string;
  label: string;
};

/**
 * Finds pairwise box overlaps between tracked entities and fills interaction slots
 * from each overlapping pair.
 *
 * Only pairs are matched, so a template declaring more than two slots never produces a
 * candidate.
 */
export class OverlapMatcher {
  private readonly maxSlotDepth: number;

  constructor(options: OverlapMatcherOptions = {}) {
    this.maxSlotDepth = Math.max(1, Math.floor(options.maxSlotDepth ?? DEFAULT_MAX_SLOT_DEPTH));
  }

  computeOverlaps(entities: readonly TrackedEntity[]): OverlapPair[] {
    const pairs: OverlapPair[] = [];

    for (let first = 0; first < entities.length; first += 1) {
      const firstBox = entities[first].lastBox;
      if (!firstBox || entities[first].bestLabel === null) {
        continue;
      }
      for (let second = first + 1; second < entities.length; second += 1) {
        const secondBox = entities[second].lastBox;
        if (!secondBox || entities[second].bestLabel === null) {
          continue;
        }
        const ios = intersectionOverSmaller(firstBox, secondBox);
        if (ios === null) {
          continue;
        }
        pairs.push({ first, second, ios });
      }
    }

    return pairs;
  }

  matchTemplate(
    template: InteractionTemplate,
    entities: readonly TrackedEntity[],
    overlaps: readonly OverlapPair[]
  ): CandidateMatch[] {
    if (template.slots.length > this.maxSlotDepth) {
      throw new SlotDepthError(template.name, template.slots.length, this.maxSlotDepth);
    }

    const matches: CandidateMatch[] = [];
    for (const pair of overlaps) {
      if (pair.ios < template.overlapThreshold) {
        continue;
      }
      const members = [entities[pair.first], entities[pair.second]].flatMap(entity =>
        entity.bestLabel === null ? [] : [{ id: entity.id, label: entity.bestLabel }]
      );
      for (const assignment of this.assignSlots(template, members)) {
        matches.push({
          interaction: template.name,
          slots: assignment.map(member => member.label),
          entityIds: assignment.map(member => member.id)
        });
      }
    }

    return matches;
  }

  findCandidates(
    templates: Iterable<InteractionTemplate>,
    entities: readonly TrackedEntity[]
  ): CandidateMatch[] {
    const overlaps = this.computeOverlaps(entities);
    const candidates: CandidateMatch[] = [];
    for (const template of templates) {
      candidates.push(...this.matchTemplate(template, entities, overlaps));
    }
    return candidates;
  }

  /** Every ordering of `members` over the template slots that uses each member once. */
  private assignSlots(template: InteractionTemplate, members: Member[]): Member[][] {
    const results: Member[][] = [];
    const used = new Array<boolean>(members.length).fill(false);
    const chosen: Member[] = [];

    const fill = (depth: number) => {
      if (depth > this.maxSlotDepth) {
        throw new SlotDepthError(template.name, depth, this.maxSlotDepth);
      }
      if (depth === template.slots.length) {
        if (chosen.length === members.length) {
          results.push([...chosen]);
        }
        return;
      }

      const accepted = template.slots[depth];
      for (let index = 0; index < members.length; index += 1) {
        if (used[index] || !accepted.includes(members[index].label)) {
          continue;
        }
        used[index] = true;
        chosen.push(members[index]);
        fill(depth + 1);
        chosen.pop();
        used[index] = false;
      }
    };

    fill(0);
    return results;
  }
}

export default OverlapMatcher;
