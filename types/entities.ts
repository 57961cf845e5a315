/**
 * 3D point or vector, always with an explicit z
 */
export type Point3 = readonly [number, number, number];

export const ORIGIN: Point3 = [0, 0, 0];

/**
 * Values an entity attribute may hold. Opaque decoder objects never reach this level.
 */
export type PropertyValue =
  | number
  | string
  | boolean
  | Point3
  | readonly Point3[]
  | readonly number[];

export type PropertyBag = { readonly [name: string]: PropertyValue };

/**
 * How an attribute is compared:
 * - point / points use the positional tolerance per axis
 * - number / numbers / vector use the numeric tolerance
 * - string / boolean compare exactly
 */
export type AttributeKind =
  | 'number'
  | 'numbers'
  | 'string'
  | 'boolean'
  | 'point'
  | 'points'
  | 'vector';

interface EntityCommon {
  /** Source handle, only meaningful inside one drawing */
  id: string;
  layer: string;
  /** ACI color number, 256 = BYLAYER */
  color: number;
  linetype: string;
  /** Spatial anchor used for matching */
  position: Point3;
}

export interface LineProperties extends PropertyBag {
  start: Point3;
  end: Point3;
}

export interface CircleProperties extends PropertyBag {
  center: Point3;
  radius: number;
}

export interface ArcProperties extends PropertyBag {
  center: Point3;
  radius: number;
  /** Degrees */
  startAngle: number;
  /** Degrees */
  endAngle: number;
}

export interface EllipseProperties extends PropertyBag {
  center: Point3;
  /** Major axis end point relative to the center */
  majorAxis: Point3;
  ratio: number;
  startParam: number;
  endParam: number;
}

export interface TextProperties extends PropertyBag {
  text: string;
  height: number;
  insert: Point3;
  /** Degrees */
  rotation: number;
  style: string;
}

export interface MTextProperties extends TextProperties {
  width: number;
  attachmentPoint: number;
}

export interface LwPolylineProperties extends PropertyBag {
  vertices: readonly Point3[];
  bulges: readonly number[];
  closed: boolean;
  elevation: number;
}

export interface PolylineProperties extends PropertyBag {
  vertices: readonly Point3[];
  bulges: readonly number[];
  closed: boolean;
}

export interface SplineProperties extends PropertyBag {
  degree: number;
  controlPoints: readonly Point3[];
  knots: readonly number[];
  weights: readonly number[];
}

export interface InsertProperties extends PropertyBag {
  name: string;
  insert: Point3;
  xscale: number;
  yscale: number;
  zscale: number;
  /** Degrees */
  rotation: number;
}

export interface DimensionProperties extends PropertyBag {
  defpoint: Point3;
  text: string;
  dimstyle: string;
  dimensionType: number;
}

export interface LineEntity extends EntityCommon { type: 'LINE'; properties: LineProperties }
export interface CircleEntity extends EntityCommon { type: 'CIRCLE'; properties: CircleProperties }
export interface ArcEntity extends EntityCommon { type: 'ARC'; properties: ArcProperties }
export interface EllipseEntity extends EntityCommon { type: 'ELLIPSE'; properties: EllipseProperties }
export interface TextEntity extends EntityCommon { type: 'TEXT'; properties: TextProperties }
export interface MTextEntity extends EntityCommon { type: 'MTEXT'; properties: MTextProperties }
export interface LwPolylineEntity extends EntityCommon { type: 'LWPOLYLINE'; properties: LwPolylineProperties }
export interface PolylineEntity extends EntityCommon { type: 'POLYLINE'; properties: PolylineProperties }
export interface SplineEntity extends EntityCommon { type: 'SPLINE'; properties: SplineProperties }
export interface InsertEntity extends EntityCommon { type: 'INSERT'; properties: InsertProperties }
export interface DimensionEntity extends EntityCommon { type: 'DIMENSION'; properties: DimensionProperties }

/**
 * Any entity kind without a dedicated schema. Keeps whatever readable
 * attributes the decoder exposed.
 */
export interface OtherEntity extends EntityCommon {
  type: 'OTHER';
  /** Original DXF entity name, e.g. POINT or HATCH */
  sourceType: string;
  properties: PropertyBag;
}

export type Entity =
  | LineEntity
  | CircleEntity
  | ArcEntity
  | EllipseEntity
  | TextEntity
  | MTextEntity
  | LwPolylineEntity
  | PolylineEntity
  | SplineEntity
  | InsertEntity
  | DimensionEntity
  | OtherEntity;

export type EntityType = Entity['type'];

export type KnownEntityType = Exclude<EntityType, 'OTHER'>;

type PropertiesOf<T extends KnownEntityType> = Extract<Entity, { type: T }>['properties'];

// Drops the PropertyBag index signature so every declared attribute must be listed
export type EntitySchema<T extends KnownEntityType> = {
  readonly [K in keyof PropertiesOf<T> as string extends K ? never : number extends K ? never : K]-?: AttributeKind;
};

/**
 * Attribute schema per entity kind. Key order is the extraction order.
 */
export const ENTITY_SCHEMAS: { readonly [T in KnownEntityType]: EntitySchema<T> } = {
  LINE: { start: 'point', end: 'point' },
  CIRCLE: { center: 'point', radius: 'number' },
  ARC: { center: 'point', radius: 'number', startAngle: 'number', endAngle: 'number' },
  ELLIPSE: { center: 'point', majorAxis: 'vector', ratio: 'number', startParam: 'number', endParam: 'number' },
  TEXT: { text: 'string', height: 'number', insert: 'point', rotation: 'number', style: 'string' },
  MTEXT: {
    text: 'string',
    height: 'number',
    insert: 'point',
    rotation: 'number',
    style: 'string',
    width: 'number',
    attachmentPoint: 'number'
  },
  LWPOLYLINE: { vertices: 'points', bulges: 'numbers', closed: 'boolean', elevation: 'number' },
  POLYLINE: { vertices: 'points', bulges: 'numbers', closed: 'boolean' },
  SPLINE: { degree: 'number', controlPoints: 'points', knots: 'numbers', weights: 'numbers' },
  INSERT: {
    name: 'string',
    insert: 'point',
    xscale: 'number',
    yscale: 'number',
    zscale: 'number',
    rotation: 'number'
  },
  DIMENSION: { defpoint: 'point', text: 'string', dimstyle: 'string', dimensionType: 'number' }
};

export function isTextLike(entity: Entity): entity is TextEntity | MTextEntity {
  return entity.type === 'TEXT' || entity.type === 'MTEXT';
}

/**
 * Type name used for matching and display. Unknown kinds keep their DXF name.
 */
export function typeLabel(entity: Entity): string {
  return entity.type === 'OTHER' ? entity.sourceType : entity.type;
}

export function isPoint3(value: PropertyValue): value is Point3 {
  return Array.isArray(value) && value.length === 3 && value.every(v => typeof v === 'number');
}

function isPointList(value: PropertyValue): value is readonly Point3[] {
  return Array.isArray(value) && value.length > 0 && value.every(v => Array.isArray(v));
}

/**
 * Kind of an attribute: from the variant schema, inferred for unknown kinds
 */
export function attributeKind(entity: Entity, name: string, value: PropertyValue): AttributeKind {
  if (entity.type !== 'OTHER') {
    const schema: Readonly<Record<string, AttributeKind>> = ENTITY_SCHEMAS[entity.type];
    const kind = schema[name];
    if (kind) return kind;
  }
  if (typeof value === 'number') return 'number';
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  if (isPoint3(value)) return 'point';
  if (isPointList(value)) return 'points';
  return 'numbers';
}
