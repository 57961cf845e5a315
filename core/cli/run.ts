import { LogManager } from '../logging/log-manager';
import { batchExitCode, runBatch } from '../batch/batch-runner';
import { compareDrawings, comparisonOutcome, outcomeExitCode } from '../compare/comparator';
import { resolveCompareConfig } from '../compare/config';
import { compareDrawingTextOrientation, resolveOrientationOptions } from '../compare/orientation';
import { DrawingCompareError, toError } from '../errors/types';
import { formatComparisonReport, formatOrientationReport } from '../report/text-reporter';
import { formatJsonReport } from '../report/json-reporter';
import { BatchArgs, CompareArgs, USAGE, parseArgs } from './args';

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const processOutput: CliOutput = {
  out: text => process.stdout.write(text + '\n'),
  err: text => process.stderr.write(text + '\n')
};

function runCompare(args: CompareArgs, output: CliOutput): number {
  if (args.mode === 'orientation') {
    const options = resolveOrientationOptions(args.orientation);
    const result = compareDrawingTextOrientation(args.fileA, args.fileB, options);
    output.out(args.format === 'json'
      ? JSON.stringify(result, null, 2)
      : formatOrientationReport(result, args.fileA, args.fileB, options));
    return outcomeExitCode(result.orientationChanges.length === 0 ? 'identical' : 'different');
  }

  const config = resolveCompareConfig(args.config);
  const comparison = compareDrawings(args.fileA, args.fileB, config);
  output.out(args.format === 'json' ? formatJsonReport(comparison, config) : formatComparisonReport(comparison, config));
  return outcomeExitCode(comparisonOutcome(comparison));
}

function runBatchCommand(args: BatchArgs, output: CliOutput): number {
  const result = runBatch(args.directory, {
    oldMarker: args.oldMarker,
    newMarker: args.newMarker,
    mode: args.mode,
    config: args.config,
    orientation: args.orientation,
    outputFile: args.outputFile
  });

  if (result.pairs.length === 0) {
    output.err(`No matching drawing pairs found in ${args.directory}`);
    return 0;
  }

  for (const entry of result.pairs) {
    const status = entry.outcome === 'failed' ? `error: ${entry.error}` : `${entry.changes} changes`;
    output.out(`${entry.pair.fileA} -> ${entry.pair.fileB}: ${status}`);
  }
  output.out(`Total pairs: ${result.pairs.length}, total changes: ${result.totalChanges}`);
  if (args.outputFile) output.out(`Results saved to: ${args.outputFile}`);
  return batchExitCode(result);
}

/**
 * Entry point shared by the binary and the tests. Returns the exit code.
 */
export function runCli(argv: readonly string[], output: CliOutput = processOutput): number {
  try {
    const args = parseArgs(argv);
    if (args.command === 'help') {
      output.out(USAGE);
      return 0;
    }

    LogManager.getInstance().setLogLevel(args.verbose ? 'debug' : 'warn');
    return args.command === 'batch' ? runBatchCommand(args, output) : runCompare(args, output);
  } catch (error) {
    const err = toError(error);
    output.err(error instanceof DrawingCompareError ? `Error [${error.code}]: ${err.message}` : `Error: ${err.message}`);
    if (error instanceof DrawingCompareError && error.code === 'INVALID_ARGUMENTS') {
      output.err(USAGE);
    }
    return outcomeExitCode('failed');
  }
}
