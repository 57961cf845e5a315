import { z } from 'zod';

/**
 * Raw shapes of the dxf-parser entity objects this extractor understands.
 * Fields the decoder may omit are optional and defaulted during normalization.
 */

const finite = z.number().finite();

export const rawPointSchema = z.object({
  x: finite,
  y: finite,
  z: finite.optional()
});

export type RawPoint = z.infer<typeof rawPointSchema>;

export const rawCommonSchema = z.object({
  type: z.string().min(1),
  handle: z.union([z.string(), z.number()]).optional(),
  layer: z.string().optional(),
  colorIndex: z.number().int().optional(),
  lineType: z.string().optional()
});

export type RawCommon = z.infer<typeof rawCommonSchema>;

export const rawLineSchema = z.object({
  vertices: z.array(rawPointSchema).min(2)
});

export const rawCircleSchema = z.object({
  center: rawPointSchema,
  radius: finite
});

export const rawArcSchema = rawCircleSchema.extend({
  /** Radians as decoded */
  startAngle: finite,
  endAngle: finite
});

export const rawEllipseSchema = z.object({
  center: rawPointSchema,
  majorAxisEndPoint: rawPointSchema,
  axisRatio: finite,
  startAngle: finite.optional(),
  endAngle: finite.optional()
});

export const rawTextSchema = z.object({
  startPoint: rawPointSchema,
  text: z.string().default(''),
  textHeight: finite.optional(),
  rotation: finite.optional()
});

export const rawMTextSchema = z.object({
  position: rawPointSchema,
  text: z.string().default(''),
  height: finite.optional(),
  width: finite.optional(),
  rotation: finite.optional(),
  attachmentPoint: z.number().int().optional()
});

const rawVertexSchema = rawPointSchema.extend({
  bulge: finite.optional()
});

export const rawPolylineSchema = z.object({
  vertices: z.array(rawVertexSchema),
  shape: z.boolean().optional(),
  elevation: finite.optional()
});

export const rawSplineSchema = z.object({
  controlPoints: z.array(rawPointSchema).default([]),
  knotValues: z.array(finite).default([]),
  weights: z.array(finite).optional(),
  degreeOfSplineCurve: z.number().int().optional()
});

export const rawInsertSchema = z.object({
  name: z.string(),
  position: rawPointSchema,
  xScale: finite.optional(),
  yScale: finite.optional(),
  zScale: finite.optional(),
  rotation: finite.optional()
});

export const rawDimensionSchema = z.object({
  anchorPoint: rawPointSchema.optional(),
  text: z.string().optional(),
  dimensionType: z.number().int().optional()
});
