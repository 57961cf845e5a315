import { AttributeKind, Point3, PropertyValue } from '../../types/entities';
import { CompareConfig } from './config';

type Tolerances = Pick<CompareConfig, 'positionTolerance' | 'numericTolerance'>;

export function numbersEqual(a: number, b: number, tolerance: number): boolean {
  return Math.abs(a - b) <= tolerance;
}

/**
 * Per-axis comparison; a delta of exactly `tolerance` still counts as equal
 */
export function pointsEqual(a: Point3, b: Point3, tolerance: number): boolean {
  return (
    numbersEqual(a[0], b[0], tolerance) &&
    numbersEqual(a[1], b[1], tolerance) &&
    numbersEqual(a[2], b[2], tolerance)
  );
}

/**
 * Euclidean distance between two anchors
 */
export function distance(a: Point3, b: Point3): number {
  return Math.sqrt((a[0] - b[0]) ** 2 + (a[1] - b[1]) ** 2 + (a[2] - b[2]) ** 2);
}

function sequencesEqual(
  a: readonly PropertyValue[],
  b: readonly PropertyValue[],
  elementKind: AttributeKind,
  tolerances: Tolerances
): boolean {
  if (a.length !== b.length) return false;
  return a.every((value, index) => valuesEqual(value, b[index], elementKind, tolerances));
}

/**
 * Tolerance-aware equality of two attribute values of the given kind.
 * Values whose runtime shapes differ are never equal.
 */
export function valuesEqual(
  a: PropertyValue,
  b: PropertyValue,
  kind: AttributeKind,
  tolerances: Tolerances
): boolean {
  if (typeof a === 'number' || typeof b === 'number') {
    if (typeof a !== 'number' || typeof b !== 'number') return false;
    const tolerance = kind === 'point' || kind === 'points' ? tolerances.positionTolerance : tolerances.numericTolerance;
    return numbersEqual(a, b, tolerance);
  }

  if (typeof a === 'string' || typeof b === 'string' || typeof a === 'boolean' || typeof b === 'boolean') {
    return a === b;
  }

  switch (kind) {
    case 'point':
    case 'vector':
      return sequencesEqual(a, b, kind, tolerances);
    case 'points':
      // each element is a point, each coordinate uses the positional tolerance
      return sequencesEqual(a, b, 'point', tolerances);
    default:
      return sequencesEqual(a, b, 'number', tolerances);
  }
}
