import { Entity, PropertyValue, attributeKind } from '../../types/entities';
import { AttributeChange, ChangeRecord, MatchResult } from '../../types/compare';
import { CompareConfig } from './config';
import { pointsEqual, valuesEqual } from './values';

type DifferOptions = Pick<CompareConfig, 'positionTolerance' | 'numericTolerance' | 'excludedAttributes'>;

/**
 * Base attributes: always compared, never subject to exclusion
 */
function diffBaseAttributes(a: Entity, b: Entity, options: DifferOptions): AttributeChange[] {
  const changes: AttributeChange[] = [];
  if (a.layer !== b.layer) {
    changes.push({ attribute: 'layer', oldValue: a.layer, newValue: b.layer });
  }
  if (a.color !== b.color) {
    changes.push({ attribute: 'color', oldValue: a.color, newValue: b.color });
  }
  if (a.linetype !== b.linetype) {
    changes.push({ attribute: 'linetype', oldValue: a.linetype, newValue: b.linetype });
  }
  if (!pointsEqual(a.position, b.position, options.positionTolerance)) {
    changes.push({ attribute: 'position', oldValue: a.position, newValue: b.position });
  }
  return changes;
}

function propertyEntries(entity: Entity): Array<[string, PropertyValue]> {
  return Object.entries(entity.properties);
}

/**
 * Type-specific attributes in A's extraction order, then B-only ones in B's order
 */
function diffProperties(a: Entity, b: Entity, options: DifferOptions): AttributeChange[] {
  const changes: AttributeChange[] = [];
  const propsA: Readonly<Record<string, PropertyValue>> = a.properties;
  const propsB: Readonly<Record<string, PropertyValue>> = b.properties;

  for (const [name, oldValue] of propertyEntries(a)) {
    if (options.excludedAttributes.has(name)) continue;

    if (!Object.prototype.hasOwnProperty.call(propsB, name)) {
      changes.push({ attribute: `${name}_removed`, oldValue, newValue: null });
      continue;
    }

    const newValue = propsB[name];
    if (!valuesEqual(oldValue, newValue, attributeKind(a, name, oldValue), options)) {
      changes.push({ attribute: name, oldValue, newValue });
    }
  }

  for (const [name, newValue] of propertyEntries(b)) {
    if (options.excludedAttributes.has(name)) continue;
    if (!Object.prototype.hasOwnProperty.call(propsA, name)) {
      changes.push({ attribute: `${name}_added`, oldValue: null, newValue });
    }
  }

  return changes;
}

/**
 * Ordered attribute differences of a matched pair; empty when unchanged
 */
export function diffEntities(a: Entity, b: Entity, options: DifferOptions): AttributeChange[] {
  return [...diffBaseAttributes(a, b, options), ...diffProperties(a, b, options)];
}

/**
 * Change records for a whole match: removed, then added, then modified pairs
 * in A's order. Unchanged pairs produce no record.
 */
export function diffMatch(match: MatchResult, options: DifferOptions): ChangeRecord[] {
  const records: ChangeRecord[] = [
    ...match.unmatchedA.map((entity): ChangeRecord => ({ kind: 'removed', entity })),
    ...match.unmatchedB.map((entity): ChangeRecord => ({ kind: 'added', entity }))
  ];

  for (const pair of match.pairs) {
    const changes = diffEntities(pair.a, pair.b, options);
    if (changes.length > 0) {
      records.push({ kind: 'modified', a: pair.a, b: pair.b, tier: pair.tier, changes });
    }
  }

  return records;
}
