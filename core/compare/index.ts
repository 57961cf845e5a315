export { resolveCompareConfig, compareConfigSchema, DEFAULT_COMPARE_CONFIG, ORIENTATION_BLIND_CONFIG } from './config';
export type { CompareConfig, CompareConfigInput } from './config';
export { buildMatchKey, buildFingerprint, buildSignature, fingerprintsEqual } from './signature';
export { matchEntities } from './matcher';
export { diffEntities, diffMatch } from './differ';
export { valuesEqual, pointsEqual, numbersEqual, distance } from './values';
export {
  compareEntities,
  compareDrawings,
  buildResult,
  comparisonOutcome,
  outcomeExitCode,
  totalChanges
} from './comparator';
export {
  compareTextOrientation,
  compareDrawingTextOrientation,
  normalizeRotation,
  rotationsEqual,
  resolveOrientationOptions
} from './orientation';
export type { OrientationChange, OrientationOptions, OrientationResult } from './orientation';
