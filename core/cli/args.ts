import { CompareConfigInput } from '../compare/config';
import { OrientationOptions } from '../compare/orientation';
import { BatchMode } from '../batch/batch-runner';
import { ConfigurationError } from '../errors/types';

export type OutputFormat = 'text' | 'json';

interface CommonArgs {
  mode: BatchMode;
  config: CompareConfigInput;
  orientation: Partial<OrientationOptions>;
  verbose: boolean;
}

export interface CompareArgs extends CommonArgs {
  command: 'compare';
  fileA: string;
  fileB: string;
  format: OutputFormat;
}

export interface BatchArgs extends CommonArgs {
  command: 'batch';
  directory: string;
  oldMarker?: string;
  newMarker?: string;
  outputFile?: string;
}

export type CliArgs = CompareArgs | BatchArgs | { command: 'help' };

export const USAGE = `Usage:
  drawing-compare <a.dxf> <b.dxf> [options]
  drawing-compare batch <directory> [--old _old] [--new _new] [--output file] [options]

Options:
  --position-tolerance <n>   max per-axis delta of points (default 0.001)
  --numeric-tolerance <n>    max delta of numbers (default 1e-6)
  --match-radius <n>         nearest-neighbor search radius (default 10)
  --decimals <n>             rounding of match keys (default 1)
  --exclude <a,b>            attributes never compared
  --ignore-orientation       same as --exclude rotation
  --orientation-only         compare only text rotation
  --angle-tolerance <deg>    rotation tolerance of --orientation-only (default 0.1)
  --json                     print the result as JSON
  --verbose                  log progress to stderr
  -h, --help                 show this help

Exit codes: 0 no differences, 1 differences found, 2 error`;

const VALUE_FLAGS = new Set([
  '--position-tolerance',
  '--numeric-tolerance',
  '--match-radius',
  '--decimals',
  '--exclude',
  '--angle-tolerance',
  '--old',
  '--new',
  '--output'
]);

function usageError(message: string): ConfigurationError {
  return new ConfigurationError(message, 'INVALID_ARGUMENTS');
}

function parseNumber(flag: string, raw: string): number {
  const value = Number(raw);
  if (raw.trim() === '' || Number.isNaN(value)) {
    throw usageError(`${flag} expects a number, got "${raw}"`);
  }
  return value;
}

/**
 * Split argv into positionals and flag values. `--flag=value` and
 * `--flag value` are both accepted.
 */
function tokenize(argv: readonly string[]): { positionals: string[]; flags: Map<string, string>; switches: Set<string> } {
  const positionals: string[] = [];
  const flags = new Map<string, string>();
  const switches = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (!token.startsWith('-')) {
      positionals.push(token);
      continue;
    }

    const eq = token.indexOf('=');
    const name = eq === -1 ? token : token.slice(0, eq);
    if (VALUE_FLAGS.has(name)) {
      const value = eq === -1 ? argv[++i] : token.slice(eq + 1);
      if (value === undefined) throw usageError(`${name} expects a value`);
      flags.set(name, value);
    } else if (eq === -1) {
      switches.add(name);
    } else {
      throw usageError(`${name} does not take a value`);
    }
  }

  return { positionals, flags, switches };
}

const SWITCHES = new Set(['--ignore-orientation', '--orientation-only', '--json', '--verbose', '--help', '-h']);

/**
 * @throws ConfigurationError for unknown flags, missing operands or malformed numbers
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags, switches } = tokenize(argv);

  for (const name of switches) {
    if (!SWITCHES.has(name)) throw usageError(`Unknown option ${name}`);
  }
  if (switches.has('--help') || switches.has('-h')) {
    return { command: 'help' };
  }

  const config: CompareConfigInput = {};
  const numeric = (flag: string): number | undefined => {
    const raw = flags.get(flag);
    return raw === undefined ? undefined : parseNumber(flag, raw);
  };
  config.positionTolerance = numeric('--position-tolerance');
  config.numericTolerance = numeric('--numeric-tolerance');
  config.matchRadius = numeric('--match-radius');
  config.keyRoundingDecimals = numeric('--decimals');

  const excluded = (flags.get('--exclude') ?? '')
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
  if (switches.has('--ignore-orientation') && !excluded.includes('rotation')) {
    excluded.push('rotation');
  }
  config.excludedAttributes = excluded;

  const angleTolerance = numeric('--angle-tolerance');
  const common: CommonArgs = {
    mode: switches.has('--orientation-only') ? 'orientation' : 'general',
    config,
    orientation: angleTolerance === undefined ? {} : { angleTolerance },
    verbose: switches.has('--verbose')
  };

  if (positionals[0] === 'batch') {
    if (positionals.length !== 2) throw usageError('batch expects exactly one directory');
    return {
      command: 'batch',
      directory: positionals[1],
      oldMarker: flags.get('--old'),
      newMarker: flags.get('--new'),
      outputFile: flags.get('--output'),
      ...common
    };
  }

  for (const flag of ['--old', '--new', '--output']) {
    if (flags.has(flag)) throw usageError(`${flag} is only valid with batch`);
  }
  if (positionals.length !== 2) {
    throw usageError('Expected two DXF files to compare');
  }

  return {
    command: 'compare',
    fileA: positionals[0],
    fileB: positionals[1],
    format: switches.has('--json') ? 'json' : 'text',
    ...common
  };
}
