import { readFileSync } from 'fs';
import DxfParser from 'dxf-parser';
import { z } from 'zod';
import { LogManager } from '../../logging/log-manager';
import { ExtractionError, ReportedIssue, createErrorDetails, toError } from '../../errors/types';
import { DxfErrorReporter, createDxfErrorReporter } from '../../errors/reporter';
import { Entity, ORIGIN, Point3, PropertyValue } from '../../../types/entities';
import {
  RawCommon,
  RawPoint,
  rawArcSchema,
  rawCircleSchema,
  rawCommonSchema,
  rawDimensionSchema,
  rawEllipseSchema,
  rawInsertSchema,
  rawLineSchema,
  rawMTextSchema,
  rawPointSchema,
  rawPolylineSchema,
  rawSplineSchema,
  rawTextSchema
} from './schemas';
import { EntityStyleIndex, scanEntityStyles } from './style-scanner';

export interface ExtractionResult {
  entities: Entity[];
  warnings: ReportedIssue[];
}

const BYLAYER_COLOR = 256;
const DEFAULT_LINETYPE = 'BYLAYER';
const DEFAULT_LAYER = '0';
const DEFAULT_TEXT_STYLE = 'Standard';
const DEFAULT_DIMSTYLE = 'STANDARD';

// Keys that describe the entity record itself rather than its geometry
const COMMON_KEYS = new Set([
  'type',
  'handle',
  'layer',
  'colorIndex',
  'color',
  'lineType',
  'lineweight',
  'lineTypeScale',
  'ownerHandle',
  'inPaperSpace',
  'visible',
  'materialObjectHandle',
  'extendedData'
]);

const parsedDocumentSchema = z.object({
  entities: z.array(z.unknown()).default([])
});

const rawVectorListSchema = z.array(rawPointSchema).min(1);
const rawNumberListSchema = z.array(z.number().finite());

function toPoint(point: RawPoint): Point3 {
  return [point.x, point.y, point.z ?? 0];
}

function radiansToDegrees(value: number): number {
  return (value * 180) / Math.PI;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Readable attribute value of an unknown entity kind, or undefined when the
 * decoder exposed something opaque
 */
function toPropertyValue(value: unknown): PropertyValue | undefined {
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : undefined;

  const point = rawPointSchema.safeParse(value);
  if (point.success) return toPoint(point.data);

  const points = rawVectorListSchema.safeParse(value);
  if (points.success) return points.data.map(toPoint);

  const numbers = rawNumberListSchema.safeParse(value);
  if (numbers.success) return numbers.data;

  return undefined;
}

/**
 * Converts dxf-parser output into normalized entities
 */
export class DxfEntityExtractor {
  private readonly logger = LogManager.getInstance();
  private readonly LOG_SOURCE = 'DxfEntityExtractor';

  /**
   * Decode DXF text. Entities that cannot be normalized are skipped with a warning.
   * @throws ExtractionError when the document itself cannot be decoded
   */
  extract(content: string): ExtractionResult {
    if (content.trim().length === 0) {
      throw new ExtractionError('DXF content is empty', 'DXF_EMPTY');
    }
    if (content.includes('\u0000')) {
      throw new ExtractionError('Binary DXF files are not supported', 'DXF_BINARY_UNSUPPORTED');
    }

    const rawEntities = this.parseDocument(content);
    const styles = scanEntityStyles(content);
    const reporter = createDxfErrorReporter();
    const entities: Entity[] = [];

    rawEntities.forEach((raw, index) => {
      const entity = this.normalize(raw, index, styles, reporter);
      if (entity) entities.push(entity);
    });

    const warnings = reporter.getWarnings();
    this.logger.debug(this.LOG_SOURCE, 'Extraction complete', {
      decoded: rawEntities.length,
      extracted: entities.length,
      skipped: warnings.length
    });

    return { entities, warnings };
  }

  private parseDocument(content: string): unknown[] {
    let parsed: unknown;
    try {
      const parser = new DxfParser();
      parsed = parser.parseSync(content);
    } catch (error) {
      throw new ExtractionError(
        `Failed to parse DXF content: ${toError(error).message}`,
        'DXF_PARSE_ERROR',
        toError(error),
        createErrorDetails(error)
      );
    }

    const document = parsedDocumentSchema.safeParse(parsed);
    if (!document.success) {
      throw new ExtractionError('DXF parser returned no document', 'DXF_PARSE_ERROR');
    }
    return document.data.entities;
  }

  private normalize(
    raw: unknown,
    index: number,
    styles: EntityStyleIndex,
    reporter: DxfErrorReporter
  ): Entity | null {
    // Advance the style cursor for every decoded record so kinds stay aligned
    const styleName = isRecord(raw) && typeof raw.type === 'string' ? styles.take(raw.type) : undefined;
    const common = rawCommonSchema.safeParse(raw);
    if (!common.success || !isRecord(raw)) {
      reporter.addEntityWarning('UNKNOWN', undefined, 'Entity record has no type', { index });
      return null;
    }

    try {
      return this.convert(common.data, raw, index, styleName);
    } catch (error) {
      const handle = common.data.handle === undefined ? undefined : String(common.data.handle);
      const message = error instanceof z.ZodError
        ? error.issues.map(issue => `${issue.path.join('.') || 'entity'}: ${issue.message}`).join('; ')
        : toError(error).message;
      reporter.addEntityWarning(common.data.type, handle, message, { index });
      this.logger.debug(this.LOG_SOURCE, 'Skipped entity', { type: common.data.type, handle, message });
      return null;
    }
  }

  private convert(
    common: RawCommon,
    raw: Record<string, unknown>,
    index: number,
    styleName: string | undefined
  ): Entity {
    const base = {
      id: common.handle === undefined ? `#${index}` : String(common.handle),
      layer: common.layer ?? DEFAULT_LAYER,
      color: common.colorIndex ?? BYLAYER_COLOR,
      linetype: common.lineType ?? DEFAULT_LINETYPE
    };

    switch (common.type) {
      case 'LINE': {
        const line = rawLineSchema.parse(raw);
        const start = toPoint(line.vertices[0]);
        const end = toPoint(line.vertices[1]);
        return { ...base, type: 'LINE', position: start, properties: { start, end } };
      }
      case 'CIRCLE': {
        const circle = rawCircleSchema.parse(raw);
        const center = toPoint(circle.center);
        return { ...base, type: 'CIRCLE', position: center, properties: { center, radius: circle.radius } };
      }
      case 'ARC': {
        const arc = rawArcSchema.parse(raw);
        const center = toPoint(arc.center);
        return {
          ...base,
          type: 'ARC',
          position: center,
          properties: {
            center,
            radius: arc.radius,
            startAngle: radiansToDegrees(arc.startAngle),
            endAngle: radiansToDegrees(arc.endAngle)
          }
        };
      }
      case 'ELLIPSE': {
        const ellipse = rawEllipseSchema.parse(raw);
        const center = toPoint(ellipse.center);
        return {
          ...base,
          type: 'ELLIPSE',
          position: center,
          properties: {
            center,
            majorAxis: toPoint(ellipse.majorAxisEndPoint),
            ratio: ellipse.axisRatio,
            startParam: ellipse.startAngle ?? 0,
            endParam: ellipse.endAngle ?? Math.PI * 2
          }
        };
      }
      case 'TEXT': {
        const text = rawTextSchema.parse(raw);
        const insert = toPoint(text.startPoint);
        return {
          ...base,
          type: 'TEXT',
          position: insert,
          properties: {
            text: text.text,
            height: text.textHeight ?? 0,
            insert,
            rotation: text.rotation ?? 0,
            style: styleName ?? DEFAULT_TEXT_STYLE
          }
        };
      }
      case 'MTEXT': {
        const mtext = rawMTextSchema.parse(raw);
        const insert = toPoint(mtext.position);
        return {
          ...base,
          type: 'MTEXT',
          position: insert,
          properties: {
            text: mtext.text,
            height: mtext.height ?? 0,
            insert,
            rotation: mtext.rotation ?? 0,
            style: styleName ?? DEFAULT_TEXT_STYLE,
            width: mtext.width ?? 0,
            attachmentPoint: mtext.attachmentPoint ?? 1
          }
        };
      }
      case 'LWPOLYLINE': {
        const polyline = rawPolylineSchema.parse(raw);
        const elevation = polyline.elevation ?? 0;
        const vertices = polyline.vertices.map(v => toPoint({ x: v.x, y: v.y, z: v.z ?? elevation }));
        return {
          ...base,
          type: 'LWPOLYLINE',
          position: vertices[0] ?? ORIGIN,
          properties: {
            vertices,
            bulges: polyline.vertices.map(v => v.bulge ?? 0),
            closed: polyline.shape ?? false,
            elevation
          }
        };
      }
      case 'POLYLINE': {
        const polyline = rawPolylineSchema.parse(raw);
        const vertices = polyline.vertices.map(toPoint);
        return {
          ...base,
          type: 'POLYLINE',
          position: vertices[0] ?? ORIGIN,
          properties: {
            vertices,
            bulges: polyline.vertices.map(v => v.bulge ?? 0),
            closed: polyline.shape ?? false
          }
        };
      }
      case 'SPLINE': {
        const spline = rawSplineSchema.parse(raw);
        const controlPoints = spline.controlPoints.map(toPoint);
        return {
          ...base,
          type: 'SPLINE',
          position: controlPoints[0] ?? ORIGIN,
          properties: {
            degree: spline.degreeOfSplineCurve ?? 3,
            controlPoints,
            knots: spline.knotValues,
            weights: spline.weights ?? []
          }
        };
      }
      case 'INSERT': {
        const insert = rawInsertSchema.parse(raw);
        const position = toPoint(insert.position);
        return {
          ...base,
          type: 'INSERT',
          position,
          properties: {
            name: insert.name,
            insert: position,
            xscale: insert.xScale ?? 1,
            yscale: insert.yScale ?? 1,
            zscale: insert.zScale ?? 1,
            rotation: insert.rotation ?? 0
          }
        };
      }
      case 'DIMENSION': {
        const dimension = rawDimensionSchema.parse(raw);
        const defpoint = dimension.anchorPoint ? toPoint(dimension.anchorPoint) : ORIGIN;
        return {
          ...base,
          type: 'DIMENSION',
          position: defpoint,
          properties: {
            defpoint,
            text: dimension.text ?? '',
            dimstyle: styleName ?? DEFAULT_DIMSTYLE,
            dimensionType: dimension.dimensionType ?? 0
          }
        };
      }
      default:
        return this.convertOther(common.type, base, raw);
    }
  }

  /**
   * Unknown kinds keep every readable attribute; the anchor is the insertion
   * or start point, else the origin
   */
  private convertOther(
    sourceType: string,
    base: Pick<Entity, 'id' | 'layer' | 'color' | 'linetype'>,
    raw: Record<string, unknown>
  ): Entity {
    const properties: Record<string, PropertyValue> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (COMMON_KEYS.has(key)) continue;
      const converted = toPropertyValue(value);
      if (converted !== undefined) properties[key] = converted;
    }

    const anchor = rawPointSchema.safeParse(raw.position ?? raw.startPoint);
    return {
      ...base,
      type: 'OTHER',
      sourceType,
      position: anchor.success ? toPoint(anchor.data) : ORIGIN,
      properties
    };
  }
}

/**
 * Read and decode a DXF file from disk
 * @throws ExtractionError when the file is missing, unreadable or not decodable
 */
export function extractDrawing(filePath: string): ExtractionResult {
  let content: string;
  try {
    content = readFileSync(filePath, 'utf8');
  } catch (error) {
    throw new ExtractionError(
      `Cannot read DXF file ${filePath}: ${toError(error).message}`,
      'DXF_READ_ERROR',
      toError(error),
      { ...createErrorDetails(error), filePath }
    );
  }
  return new DxfEntityExtractor().extract(content);
}
