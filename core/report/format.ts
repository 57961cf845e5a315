import truncate from 'lodash/truncate';
import { Point3, PropertyValue, isPoint3 } from '../../types/entities';

const MAX_STRING_LENGTH = 50;
const MAX_LIST_ITEMS = 4;

export function formatNumber(value: number): string {
  return value.toFixed(3);
}

export function formatPoint(point: Point3): string {
  return `(${point.map(formatNumber).join(', ')})`;
}

/**
 * Display form of an attribute value; `null` marks an absent attribute
 */
export function formatValue(value: PropertyValue | null): string {
  if (value === null) return '-';
  if (typeof value === 'number') return formatNumber(value);
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'string') return truncate(value, { length: MAX_STRING_LENGTH });
  if (isPoint3(value)) return formatPoint(value);

  const items: ReadonlyArray<number | Point3> = value;
  const shown = items.slice(0, MAX_LIST_ITEMS).map(item => (typeof item === 'number' ? formatNumber(item) : formatPoint(item)));
  const rest = items.length - shown.length;
  return `[${shown.join(', ')}${rest > 0 ? `, ... +${rest} more` : ''}]`;
}

export function formatSigned(value: number): string {
  return value > 0 ? `+${value}` : String(value);
}
