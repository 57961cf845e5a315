import { z } from 'zod';
import { ConfigurationError } from '../errors/types';

export interface CompareConfig {
  /** Max per-axis delta for point-valued attributes */
  readonly positionTolerance: number;
  /** Max delta for scalar and vector attributes */
  readonly numericTolerance: number;
  /** Search radius of the nearest-neighbor tier, in drawing units */
  readonly matchRadius: number;
  /** Type-specific attributes never diffed nor fingerprinted */
  readonly excludedAttributes: ReadonlySet<string>;
  /** Decimal places of match keys and fingerprints */
  readonly keyRoundingDecimals: number;
}

export type CompareConfigInput = {
  positionTolerance?: number;
  numericTolerance?: number;
  matchRadius?: number;
  excludedAttributes?: Iterable<string>;
  keyRoundingDecimals?: number;
};

const toleranceSchema = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .finite(`${name} must be finite`)
    .nonnegative(`${name} must not be negative`);

export const compareConfigSchema = z.object({
  positionTolerance: toleranceSchema('positionTolerance').default(0.001),
  numericTolerance: toleranceSchema('numericTolerance').default(1e-6),
  matchRadius: toleranceSchema('matchRadius').default(10.0),
  excludedAttributes: z
    .array(z.string().trim().min(1, 'excluded attribute names must not be empty'))
    .default([]),
  keyRoundingDecimals: z
    .number()
    .int('keyRoundingDecimals must be an integer')
    .min(0)
    .max(12)
    .default(1)
});

function freeze(parsed: z.infer<typeof compareConfigSchema>): CompareConfig {
  return Object.freeze({
    positionTolerance: parsed.positionTolerance,
    numericTolerance: parsed.numericTolerance,
    matchRadius: parsed.matchRadius,
    excludedAttributes: new Set(parsed.excludedAttributes),
    keyRoundingDecimals: parsed.keyRoundingDecimals
  });
}

/**
 * Merge options over the defaults and validate them.
 * @throws ConfigurationError on any invalid option
 */
export function resolveCompareConfig(input: CompareConfigInput | CompareConfig = {}): CompareConfig {
  const excluded = input.excludedAttributes;
  const result = compareConfigSchema.safeParse({
    ...input,
    excludedAttributes: excluded === undefined || typeof excluded === 'string' ? excluded : Array.from(excluded)
  });

  if (!result.success) {
    const issues = result.error.issues.map(issue => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    throw new ConfigurationError(
      `Invalid comparison options: ${issues.map(i => `${i.path}: ${i.message}`).join('; ')}`,
      'INVALID_COMPARE_CONFIG',
      undefined,
      { issues }
    );
  }

  return freeze(result.data);
}

export const DEFAULT_COMPARE_CONFIG: CompareConfig = resolveCompareConfig();

/**
 * Orientation-blind mode: rotation changes are neither fingerprinted nor reported
 */
export const ORIENTATION_BLIND_CONFIG: CompareConfig = resolveCompareConfig({
  excludedAttributes: ['rotation']
});
