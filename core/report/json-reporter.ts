import { DrawingComparison } from '../../types/compare';
import { CompareConfig } from '../compare/config';
import { comparisonOutcome } from '../compare/comparator';

/**
 * Machine-readable report. Entity ids are kept; they are only meaningful per file.
 */
export function formatJsonReport(comparison: DrawingComparison, config: CompareConfig): string {
  return JSON.stringify(
    {
      outcome: comparisonOutcome(comparison),
      config: {
        positionTolerance: config.positionTolerance,
        numericTolerance: config.numericTolerance,
        matchRadius: config.matchRadius,
        excludedAttributes: Array.from(config.excludedAttributes),
        keyRoundingDecimals: config.keyRoundingDecimals
      },
      ...comparison
    },
    null,
    2
  );
}
