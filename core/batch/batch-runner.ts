import { existsSync, readdirSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import { ComparisonOutcome, DrawingComparison } from '../../types/compare';
import { CompareConfig, CompareConfigInput, resolveCompareConfig } from '../compare/config';
import { compareDrawings, comparisonOutcome, totalChanges } from '../compare/comparator';
import {
  OrientationOptions,
  OrientationResult,
  compareDrawingTextOrientation,
  resolveOrientationOptions
} from '../compare/orientation';
import { ConfigurationError, DrawingCompareError, ErrorReporter, createErrorDetails, toError } from '../errors/types';
import { createErrorReporter } from '../errors/reporter';
import { formatComparisonReport, formatOrientationReport } from '../report/text-reporter';
import { createLogger } from '../../utils/logging/logger';

const log = createLogger('BatchRunner');

export interface DrawingPair {
  fileA: string;
  fileB: string;
}

export type BatchMode = 'general' | 'orientation';

export interface BatchOptions {
  oldMarker?: string;
  newMarker?: string;
  mode?: BatchMode;
  config?: CompareConfigInput;
  orientation?: Partial<OrientationOptions>;
  /** Combined text report is written here when set */
  outputFile?: string;
}

export type BatchPairResult =
  | { pair: DrawingPair; outcome: 'identical' | 'different'; changes: number; report: string }
  | { pair: DrawingPair; outcome: 'failed'; error: string };

export interface BatchResult {
  pairs: BatchPairResult[];
  totalChanges: number;
  /** One entry per failed pair, with code and file names */
  failures: ErrorReporter;
}

const DXF_EXTENSION = '.dxf';

/**
 * Pair every `*<oldMarker>*.dxf` file with the sibling whose name substitutes
 * `newMarker`. Files without a counterpart are ignored. Sorted by name.
 */
export function findDrawingPairs(directory: string, oldMarker = '_old', newMarker = '_new'): DrawingPair[] {
  if (!oldMarker || !newMarker) {
    throw new ConfigurationError('File markers must not be empty', 'INVALID_BATCH_MARKERS');
  }

  let names: string[];
  try {
    names = readdirSync(directory);
  } catch (error) {
    throw new DrawingCompareError(
      `Cannot read directory ${directory}: ${toError(error).message}`,
      'BATCH_DIRECTORY_ERROR',
      toError(error),
      createErrorDetails(error)
    );
  }

  return names
    .filter(name => name.endsWith(DXF_EXTENSION) && name.slice(0, -DXF_EXTENSION.length).includes(oldMarker))
    .sort()
    .map(name => {
      const stem = name.slice(0, -DXF_EXTENSION.length);
      return { fileA: join(directory, name), fileB: join(directory, stem.split(oldMarker).join(newMarker) + DXF_EXTENSION) };
    })
    .filter(pair => existsSync(pair.fileB));
}

interface PairReport {
  changes: number;
  outcome: ComparisonOutcome;
  report: string;
}

function runGeneral(pair: DrawingPair, config: CompareConfig): PairReport {
  const comparison: DrawingComparison = compareDrawings(pair.fileA, pair.fileB, config);
  return {
    changes: totalChanges(comparison),
    outcome: comparisonOutcome(comparison),
    report: formatComparisonReport(comparison, config)
  };
}

function runOrientation(pair: DrawingPair, options: OrientationOptions): PairReport {
  const result: OrientationResult = compareDrawingTextOrientation(pair.fileA, pair.fileB, options);
  const changes = result.orientationChanges.length;
  return {
    changes,
    outcome: changes === 0 ? 'identical' : 'different',
    report: formatOrientationReport(result, pair.fileA, pair.fileB, options)
  };
}

function combinedReport(result: BatchResult, mode: BatchMode): string {
  const lines = [
    `BATCH DRAWING COMPARISON (${mode})`,
    '='.repeat(80),
    `Total file pairs: ${result.pairs.length}`,
    `Total changes: ${result.totalChanges}`,
    ''
  ];
  for (const entry of result.pairs) {
    lines.push(`Comparison: ${basename(entry.pair.fileA)} -> ${basename(entry.pair.fileB)}`);
    lines.push(entry.outcome === 'failed' ? `  Error: ${entry.error}` : entry.report);
    lines.push('');
  }
  return lines.join('\n');
}

/**
 * Compare every pair found in `directory`, sequentially. A failing pair is
 * recorded and the batch continues.
 * @throws ConfigurationError on invalid options, before any pair runs
 */
export function runBatch(directory: string, options: BatchOptions = {}): BatchResult {
  const mode = options.mode ?? 'general';
  const config = resolveCompareConfig(options.config);
  const orientation = resolveOrientationOptions(options.orientation);
  const pairs = findDrawingPairs(directory, options.oldMarker, options.newMarker);

  log.info(`Found ${pairs.length} drawing pairs`, { directory, mode });

  const result: BatchResult = { pairs: [], totalChanges: 0, failures: createErrorReporter() };

  pairs.forEach((pair, index) => {
    try {
      const report = mode === 'general' ? runGeneral(pair, config) : runOrientation(pair, orientation);
      result.totalChanges += report.changes;
      result.pairs.push({
        pair,
        outcome: report.outcome === 'identical' ? 'identical' : 'different',
        changes: report.changes,
        report: report.report
      });
    } catch (error) {
      const message = toError(error).message;
      const code = error instanceof DrawingCompareError ? error.code : 'BATCH_PAIR_FAILED';
      result.failures.addError(message, code, { fileA: pair.fileA, fileB: pair.fileB });
      result.pairs.push({ pair, outcome: 'failed', error: message });
      log.warn(`Pair ${index + 1}/${pairs.length} failed`, { ...pair, code });
    }
  });

  if (options.outputFile) {
    writeFileSync(options.outputFile, combinedReport(result, mode) + '\n', 'utf8');
    log.info('Batch report written', { outputFile: options.outputFile });
  }

  return result;
}

/**
 * 0 when every pair is identical, 2 when any pair failed, else 1
 */
export function batchExitCode(result: BatchResult): number {
  if (result.pairs.some(entry => entry.outcome === 'failed')) return 2;
  return result.pairs.some(entry => entry.outcome === 'different') ? 1 : 0;
}
