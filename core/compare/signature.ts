import isEqual from 'lodash/isEqual';
import { Entity, Point3, PropertyValue, isTextLike, typeLabel } from '../../types/entities';
import { CompareConfig } from './config';

export type FingerprintValue = number | string | boolean | readonly FingerprintValue[];

/**
 * Shape summary of an entity: ordered (name, quantized value) entries.
 * Compared structurally, never hashed.
 */
export interface GeometryFingerprint {
  readonly type: string;
  readonly entries: ReadonlyArray<readonly [string, FingerprintValue]>;
}

type KeyOptions = Pick<CompareConfig, 'keyRoundingDecimals'>;
type FingerprintOptions = Pick<CompareConfig, 'keyRoundingDecimals' | 'excludedAttributes'>;

function formatCoordinate(value: number, decimals: number): string {
  const fixed = value.toFixed(decimals);
  // -0.0 and 0.0 denote the same rounded coordinate
  return Number(fixed) === 0 ? (0).toFixed(decimals) : fixed;
}

function quantize(value: number, decimals: number): number {
  const rounded = Number(value.toFixed(decimals));
  return rounded === 0 ? 0 : rounded;
}

function quantizeValue(value: PropertyValue, decimals: number): FingerprintValue {
  if (typeof value === 'number') return quantize(value, decimals);
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  const items: ReadonlyArray<number | Point3> = value;
  return items.map(item => quantizeValue(item, decimals));
}

function relativeTo(point: Point3, origin: Point3): Point3 {
  return [point[0] - origin[0], point[1] - origin[1], point[2] - origin[2]];
}

/**
 * Coarse lookup key: `TYPE|layer|x,y,z`, plus `|text` for text-like kinds
 */
export function buildMatchKey(entity: Entity, options: KeyOptions): string {
  const decimals = options.keyRoundingDecimals;
  const position = entity.position.map(c => formatCoordinate(c, decimals)).join(',');
  const key = `${typeLabel(entity)}|${entity.layer}|${position}`;
  return isTextLike(entity) ? `${key}|${entity.properties.text}` : key;
}

function fingerprintSource(entity: Entity): Array<readonly [string, PropertyValue]> {
  switch (entity.type) {
    case 'LINE':
      return [['end', relativeTo(entity.properties.end, entity.properties.start)]];
    case 'CIRCLE':
      return [['radius', entity.properties.radius]];
    case 'ARC': {
      const { radius, startAngle, endAngle } = entity.properties;
      return [['radius', radius], ['startAngle', startAngle], ['endAngle', endAngle]];
    }
    case 'ELLIPSE': {
      const { majorAxis, ratio, startParam, endParam } = entity.properties;
      return [['majorAxis', majorAxis], ['ratio', ratio], ['startParam', startParam], ['endParam', endParam]];
    }
    case 'TEXT': {
      const { height, style, insert, rotation } = entity.properties;
      return [['height', height], ['style', style], ['insert', insert], ['rotation', rotation]];
    }
    case 'MTEXT': {
      const { height, style, insert, width, rotation } = entity.properties;
      return [['height', height], ['style', style], ['insert', insert], ['width', width], ['rotation', rotation]];
    }
    case 'LWPOLYLINE':
    case 'POLYLINE': {
      const { vertices, bulges, closed } = entity.properties;
      return [['vertices', vertices], ['bulges', bulges], ['closed', closed]];
    }
    case 'SPLINE': {
      const { degree, controlPoints, knots, weights } = entity.properties;
      const first = controlPoints[0];
      const relative = first ? controlPoints.map(p => relativeTo(p, first)) : [];
      return [['degree', degree], ['controlPoints', relative], ['knots', knots], ['weights', weights]];
    }
    case 'INSERT': {
      const { name, xscale, yscale, zscale, rotation } = entity.properties;
      return [['name', name], ['xscale', xscale], ['yscale', yscale], ['zscale', zscale], ['rotation', rotation]];
    }
    case 'DIMENSION':
      return [['text', entity.properties.text], ['dimstyle', entity.properties.dimstyle]];
    case 'OTHER':
      return Object.entries(entity.properties);
  }
}

/**
 * Shape fingerprint with excluded attributes left out
 */
export function buildFingerprint(entity: Entity, options: FingerprintOptions): GeometryFingerprint {
  const entries = fingerprintSource(entity)
    .filter(([name]) => !options.excludedAttributes.has(name))
    .map(([name, value]) => [name, quantizeValue(value, options.keyRoundingDecimals)] as const);
  return { type: typeLabel(entity), entries };
}

export function fingerprintsEqual(a: GeometryFingerprint, b: GeometryFingerprint): boolean {
  return isEqual(a, b);
}

export interface EntitySignature {
  key: string;
  fingerprint: GeometryFingerprint;
}

export function buildSignature(entity: Entity, config: FingerprintOptions): EntitySignature {
  return {
    key: buildMatchKey(entity, config),
    fingerprint: buildFingerprint(entity, config)
  };
}
