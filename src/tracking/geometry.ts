import { BoundingBox, WireBox } from '../types.js';

export function boxArea(box: BoundingBox): number {
  return Math.max(0, box.width) * Math.max(0, box.height);
}

export function intersectionArea(a: BoundingBox, b: BoundingBox): number {
  const left = Math.max(a.x, b.x);
  const top = Math.max(a.y, b.y);
  const right = Math.min(a.x + a.width, b.x + b.width);
  const bottom = Math.min(a.y + a.height, b.y + b.height);

  if (right <= left || bottom <= top) {
    return 0;
  }

  return (right - left) * (bottom - top);
}

/**
 * Intersection over the smaller of the two areas. Returns null when the boxes do not
 * intersect or when either box has no area.
 */
export function intersectionOverSmaller(a: BoundingBox, b: BoundingBox): number | null {
  const overlap = intersectionArea(a, b);
  if (overlap <= 0) {
    return null;
  }

  const smaller = Math.min(boxArea(a), boxArea(b));
  if (smaller <= 0) {
    return null;
  }

  return overlap / smaller;
}

export function fromWireBox(box: WireBox): BoundingBox {
  const [x, y, width, height] = box;
  return { x, y, width, height };
}

export function toWireBox(box: BoundingBox): WireBox {
  return [box.x, box.y, box.width, box.height];
}
