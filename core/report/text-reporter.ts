import { Entity, typeLabel } from '../../types/entities';
import { DrawingComparison, ModifiedEntity } from '../../types/compare';
import { CompareConfig } from '../compare/config';
import { totalChanges } from '../compare/comparator';
import { OrientationOptions, OrientationResult } from '../compare/orientation';
import { formatNumber, formatPoint, formatSigned, formatValue } from './format';

const RULE = '='.repeat(80);
const SECTION_RULE = '-'.repeat(60);

function entityDetails(entity: Entity): string {
  switch (entity.type) {
    case 'TEXT':
    case 'MTEXT':
      return `Text: "${formatValue(entity.properties.text)}", Height: ${formatNumber(entity.properties.height)}`;
    case 'LINE':
      return `From ${formatPoint(entity.properties.start)} To ${formatPoint(entity.properties.end)}`;
    case 'CIRCLE':
      return `Radius: ${formatNumber(entity.properties.radius)}`;
    case 'ARC':
      return `Radius: ${formatNumber(entity.properties.radius)}, Angles: ${entity.properties.startAngle.toFixed(1)} to ${entity.properties.endAngle.toFixed(1)} deg`;
    case 'INSERT':
      return `Block: "${entity.properties.name}"`;
    default:
      return '';
  }
}

function entityLines(entity: Entity, index: number): string[] {
  const lines = [
    `  ${index}. ${typeLabel(entity)} on layer '${entity.layer}'`,
    `     Position: ${formatPoint(entity.position)}`,
    `     Handle: ${entity.id}`
  ];
  const details = entityDetails(entity);
  if (details) lines.push(`     Details: ${details}`);
  return lines;
}

function modifiedLines(entity: ModifiedEntity, index: number): string[] {
  const lines = [
    `  ${index}. ${entity.entityType} on layer '${entity.layer}' (${entity.matchTier})`,
    `     Position: ${formatPoint(entity.position)}`,
    `     Handles: ${entity.entityIds[0]} -> ${entity.entityIds[1]}`,
    '     Changes:'
  ];
  entity.changes.forEach((change, i) => {
    lines.push(`        ${i + 1}. ${change.attribute}: ${formatValue(change.oldValue)} -> ${formatValue(change.newValue)}`);
  });
  return lines;
}

function section(title: string, blocks: string[][]): string[] {
  if (blocks.length === 0) return [];
  return [`${title} (${blocks.length}):`, SECTION_RULE, ...blocks.flatMap(block => [...block, '']), ''];
}

/**
 * Human-readable revision report: deleted, added, modified, then a summary
 */
export function formatComparisonReport(comparison: DrawingComparison, config: CompareConfig): string {
  const changes = totalChanges(comparison);
  const lines: string[] = [
    RULE,
    'DRAWING REVISION COMPARISON',
    RULE,
    `File A (original): ${comparison.fileA}`,
    `File B (revised):  ${comparison.fileB}`,
    `Position tolerance: ${config.positionTolerance}`,
    `Numeric tolerance: ${config.numericTolerance}`,
    `Match radius: ${config.matchRadius}`
  ];
  if (config.excludedAttributes.size > 0) {
    lines.push(`Excluded attributes: ${Array.from(config.excludedAttributes).join(', ')}`);
  }
  lines.push(SECTION_RULE);

  if (changes === 0) {
    lines.push('NO CHANGES DETECTED', '');
  } else {
    lines.push(`FOUND ${changes} TOTAL CHANGES`, '');
    lines.push(...section('DELETED ENTITIES', comparison.removed.map((e, i) => entityLines(e, i + 1))));
    lines.push(...section('ADDED ENTITIES', comparison.added.map((e, i) => entityLines(e, i + 1))));
    lines.push(...section('MODIFIED ENTITIES', comparison.modified.map((e, i) => modifiedLines(e, i + 1))));
  }

  if (comparison.warnings.length > 0) {
    lines.push(`EXTRACTION WARNINGS (${comparison.warnings.length}):`, SECTION_RULE);
    for (const warning of comparison.warnings) {
      lines.push(`  [${warning.side.toUpperCase()}] ${warning.message}`);
    }
    lines.push('');
  }

  lines.push(
    'SUMMARY:',
    SECTION_RULE,
    `   Original file:  ${comparison.totalEntitiesA} entities`,
    `   Revised file:   ${comparison.totalEntitiesB} entities`,
    `   Net change:     ${formatSigned(comparison.totalEntitiesB - comparison.totalEntitiesA)} entities`,
    `   Deleted:        ${comparison.removed.length}`,
    `   Added:          ${comparison.added.length}`,
    `   Modified:       ${comparison.modified.length}`,
    `   Unchanged:      ${comparison.unchanged}`,
    `   Total changes:  ${changes}`,
    RULE
  );

  return lines.join('\n');
}

const LISTED_TEXTS = 5;

/**
 * Report of a text-orientation-only comparison
 */
export function formatOrientationReport(
  result: OrientationResult,
  fileA: string,
  fileB: string,
  options: OrientationOptions
): string {
  const lines: string[] = [
    RULE,
    'TEXT ORIENTATION COMPARISON',
    RULE,
    `File A: ${fileA}`,
    `File B: ${fileB}`,
    `Angular tolerance: ${options.angleTolerance} deg`,
    SECTION_RULE
  ];

  if (result.orientationChanges.length === 0) {
    lines.push('NO TEXT ORIENTATION CHANGES DETECTED');
  } else {
    lines.push(`FOUND ${result.orientationChanges.length} TEXT ORIENTATION CHANGES:`, '');
    result.orientationChanges.forEach((change, i) => {
      lines.push(
        `${i + 1}. Text: '${formatValue(change.text)}'`,
        `   Position: ${formatPoint(change.position)}`,
        `   Layer: ${change.layer}`,
        `   Old rotation: ${change.oldRotation.toFixed(2)} deg`,
        `   New rotation: ${change.newRotation.toFixed(2)} deg`,
        `   Change: ${change.rotationChange.toFixed(2)} deg`,
        `   Handles: ${change.entityIds[0]} -> ${change.entityIds[1]}`,
        ''
      );
    });
  }

  const listTexts = (title: string, marker: string, texts: OrientationResult['newInB']) => {
    if (texts.length === 0) return;
    lines.push('', `${texts.length} ${title}:`);
    for (const text of texts.slice(0, LISTED_TEXTS)) {
      lines.push(`   ${marker} '${formatValue(text.properties.text)}' at ${formatPoint(text.position)}`);
    }
    if (texts.length > LISTED_TEXTS) {
      lines.push(`   ... and ${texts.length - LISTED_TEXTS} more`);
    }
  };
  listTexts('text entities missing in file B', '-', result.missingInB);
  listTexts('new text entities in file B', '+', result.newInB);

  lines.push('', `Summary: ${result.totalTextsA} texts in file A, ${result.totalTextsB} texts in file B`, RULE);
  return lines.join('\n');
}
