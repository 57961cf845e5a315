import { z } from 'zod';
import { Entity, MTextEntity, Point3, TextEntity, isTextLike } from '../../types/entities';
import { ConfigurationError } from '../errors/types';
import { extractDrawing } from '../processors/dxf/extractor';
import { createLogger } from '../../utils/logging/logger';
import { distance } from './values';

const log = createLogger('TextOrientation');

type TextLikeEntity = TextEntity | MTextEntity;

export interface OrientationOptions {
  /** Degrees; wrapped rotation deltas up to this value count as unchanged */
  angleTolerance: number;
  /** Max distance between the insertion points of a text pair */
  positionTolerance: number;
}

const orientationOptionsSchema = z.object({
  angleTolerance: z.number().finite().nonnegative().default(0.1),
  positionTolerance: z.number().finite().nonnegative().default(0.01)
});

export interface OrientationChange {
  text: string;
  layer: string;
  position: Point3;
  oldRotation: number;
  newRotation: number;
  /** new - old, unnormalized */
  rotationChange: number;
  entityIds: readonly [string, string];
}

export interface OrientationResult {
  orientationChanges: OrientationChange[];
  missingInB: TextLikeEntity[];
  newInB: TextLikeEntity[];
  totalTextsA: number;
  totalTextsB: number;
}

export function resolveOrientationOptions(input: Partial<OrientationOptions> = {}): OrientationOptions {
  const result = orientationOptionsSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message }));
    throw new ConfigurationError(
      `Invalid orientation options: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      'INVALID_ORIENTATION_CONFIG',
      undefined,
      { issues }
    );
  }
  return result.data;
}

/**
 * Map an angle in degrees onto [0, 360)
 */
export function normalizeRotation(degrees: number): number {
  const normalized = degrees % 360;
  return normalized < 0 ? normalized + 360 : normalized;
}

export function rotationsEqual(a: number, b: number, tolerance: number): boolean {
  const diff = Math.abs(normalizeRotation(a) - normalizeRotation(b));
  return Math.min(diff, 360 - diff) <= tolerance;
}

function textEntities(entities: readonly Entity[]): TextLikeEntity[] {
  return entities.filter(isTextLike);
}

/**
 * Compare only the rotation of TEXT/MTEXT entities. Texts pair when their
 * trimmed contents are equal and their anchors lie within the position
 * tolerance; every B text pairs at most once.
 */
export function compareTextOrientation(
  entitiesA: readonly Entity[],
  entitiesB: readonly Entity[],
  input: Partial<OrientationOptions> = {}
): OrientationResult {
  const options = resolveOrientationOptions(input);
  const textsA = textEntities(entitiesA);
  const textsB = textEntities(entitiesB);
  const claimed = new Set<TextLikeEntity>();

  const orientationChanges: OrientationChange[] = [];
  const missingInB: TextLikeEntity[] = [];

  for (const a of textsA) {
    const content = a.properties.text.trim();
    const b = textsB.find(candidate =>
      !claimed.has(candidate) &&
      candidate.properties.text.trim() === content &&
      distance(candidate.position, a.position) <= options.positionTolerance
    );

    if (!b) {
      missingInB.push(a);
      continue;
    }

    claimed.add(b);
    const oldRotation = a.properties.rotation;
    const newRotation = b.properties.rotation;
    if (!rotationsEqual(oldRotation, newRotation, options.angleTolerance)) {
      orientationChanges.push({
        text: a.properties.text,
        layer: a.layer,
        position: a.position,
        oldRotation,
        newRotation,
        rotationChange: newRotation - oldRotation,
        entityIds: [a.id, b.id]
      });
    }
  }

  const newInB = textsB.filter(text => !claimed.has(text));
  log.debug('Orientation comparison finished', {
    texts: [textsA.length, textsB.length],
    changes: orientationChanges.length
  });

  return {
    orientationChanges,
    missingInB,
    newInB,
    totalTextsA: textsA.length,
    totalTextsB: textsB.length
  };
}

/**
 * @throws ConfigurationError | ExtractionError
 */
export function compareDrawingTextOrientation(
  fileA: string,
  fileB: string,
  input: Partial<OrientationOptions> = {}
): OrientationResult {
  const options = resolveOrientationOptions(input);
  const a = extractDrawing(fileA);
  const b = extractDrawing(fileB);
  return compareTextOrientation(a.entities, b.entities, options);
}
