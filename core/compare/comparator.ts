import { v4 as uuidv4 } from 'uuid';
import { Entity, typeLabel } from '../../types/entities';
import {
  ChangeRecord,
  ComparisonOutcome,
  ComparisonResult,
  DrawingComparison,
  ModifiedEntity,
  SideWarning,
  WarningSide
} from '../../types/compare';
import { ReportedIssue } from '../errors/types';
import { createLogger } from '../../utils/logging/logger';
import { extractDrawing } from '../processors/dxf/extractor';
import { CompareConfig, CompareConfigInput, resolveCompareConfig } from './config';
import { diffMatch } from './differ';
import { matchEntities } from './matcher';

const log = createLogger('Comparator');

function toModified(record: Extract<ChangeRecord, { kind: 'modified' }>): ModifiedEntity {
  return {
    entityType: typeLabel(record.a),
    layer: record.a.layer,
    position: record.a.position,
    entityIds: [record.a.id, record.b.id],
    matchTier: record.tier,
    changes: record.changes
  };
}

/**
 * Fold change records into the result shape
 */
export function buildResult(
  records: readonly ChangeRecord[],
  pairCount: number,
  totalEntitiesA: number,
  totalEntitiesB: number
): ComparisonResult {
  const result: ComparisonResult = {
    added: [],
    removed: [],
    modified: [],
    unchanged: 0,
    totalEntitiesA,
    totalEntitiesB
  };

  for (const record of records) {
    switch (record.kind) {
      case 'added':
        result.added.push(record.entity);
        break;
      case 'removed':
        result.removed.push(record.entity);
        break;
      case 'modified':
        result.modified.push(toModified(record));
        break;
    }
  }

  result.unchanged = pairCount - result.modified.length;
  return result;
}

/**
 * Compare two entity sequences. Pure: nothing is retained between calls.
 * @throws ConfigurationError when the options are invalid
 */
export function compareEntities(
  entitiesA: readonly Entity[],
  entitiesB: readonly Entity[],
  configInput: CompareConfigInput | CompareConfig = {}
): ComparisonResult {
  const config = resolveCompareConfig(configInput);
  const runId = uuidv4();
  const startedAt = Date.now();

  const match = matchEntities(entitiesA, entitiesB, config);
  const records = diffMatch(match, config);
  const result = buildResult(records, match.pairs.length, entitiesA.length, entitiesB.length);

  log.debug('Comparison finished', {
    entitiesA: entitiesA.length,
    entitiesB: entitiesB.length,
    added: result.added.length,
    removed: result.removed.length,
    modified: result.modified.length,
    unchanged: result.unchanged,
    durationMs: Date.now() - startedAt
  }, { runId });

  return result;
}

function tagWarnings(warnings: readonly ReportedIssue[], side: WarningSide): SideWarning[] {
  return warnings.map(warning => ({ ...warning, side }));
}

/**
 * Extract both drawings and compare them. Options are validated before any
 * file is read.
 * @throws ConfigurationError | ExtractionError
 */
export function compareDrawings(
  fileA: string,
  fileB: string,
  configInput: CompareConfigInput | CompareConfig = {}
): DrawingComparison {
  const config = resolveCompareConfig(configInput);

  const extractedA = extractDrawing(fileA);
  const extractedB = extractDrawing(fileB);
  const result = compareEntities(extractedA.entities, extractedB.entities, config);

  const warnings = [...tagWarnings(extractedA.warnings, 'a'), ...tagWarnings(extractedB.warnings, 'b')];
  if (warnings.length > 0) {
    log.warn(`${warnings.length} entities skipped during extraction`, { fileA, fileB });
  }

  return { ...result, fileA, fileB, warnings };
}

export function totalChanges(result: ComparisonResult): number {
  return result.added.length + result.removed.length + result.modified.length;
}

export function comparisonOutcome(result: ComparisonResult): ComparisonOutcome {
  return totalChanges(result) === 0 ? 'identical' : 'different';
}

/**
 * Process exit code of an outcome: 0 identical, 1 different, 2 failed
 */
export function outcomeExitCode(outcome: ComparisonOutcome): number {
  switch (outcome) {
    case 'identical':
      return 0;
    case 'different':
      return 1;
    case 'failed':
      return 2;
  }
}
