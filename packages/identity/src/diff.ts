import { compareLabels, isPlainObject } from "./canonical.js";

export type PointerSegment = string | number;

export interface ValueDiff {
  readonly pointer: string;
  readonly left: unknown;
  readonly right: unknown;
}

export const MISSING = "[missing]" as const;

/**
 * First divergence between two canonical values, as a JSON pointer.
 * Object keys are visited in canonical order, so the reported pointer is
 * stable for a given pair.
 */
export function firstDivergence(
  left: unknown,
  right: unknown,
  segments: readonly PointerSegment[] = [],
): ValueDiff | null {
  if (Object.is(left, right)) {
    return null;
  }

  if (Array.isArray(left) && Array.isArray(right)) {
    const shared = Math.min(left.length, right.length);
    for (let index = 0; index < shared; index += 1) {
      const child = firstDivergence(left[index], right[index], [...segments, index]);
      if (child) {
        return child;
      }
    }
    if (left.length !== right.length) {
      return {
        pointer: pointerFromSegments([...segments, shared]),
        left: shared < left.length ? left[shared] : MISSING,
        right: shared < right.length ? right[shared] : MISSING,
      };
    }
    return null;
  }

  if (isPlainObject(left) && isPlainObject(right)) {
    const keys = Array.from(new Set([...Object.keys(left), ...Object.keys(right)])).sort(compareLabels);
    for (const key of keys) {
      const hasLeft = Object.prototype.hasOwnProperty.call(left, key);
      const hasRight = Object.prototype.hasOwnProperty.call(right, key);
      if (!hasLeft || !hasRight) {
        return {
          pointer: pointerFromSegments([...segments, key]),
          left: hasLeft ? left[key] : MISSING,
          right: hasRight ? right[key] : MISSING,
        };
      }
      const child = firstDivergence(left[key], right[key], [...segments, key]);
      if (child) {
        return child;
      }
    }
    return null;
  }

  return { pointer: pointerFromSegments(segments), left, right };
}

export function pointerFromSegments(segments: readonly PointerSegment[]): string {
  if (segments.length === 0) {
    return "/";
  }
  return `/${segments.map(escapePointerSegment).join("/")}`;
}

function escapePointerSegment(segment: PointerSegment): string {
  return String(segment).replace(/~/g, "~0").replace(/\//g, "~1");
}
