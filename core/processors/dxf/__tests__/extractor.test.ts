import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DxfEntityExtractor, extractDrawing } from '../extractor';
import { ExtractionError } from '../../../errors/types';
import { compareEntities } from '../../../compare/comparator';

type GroupPair = [number, string | number];

function dxf(entities: GroupPair[][]): string {
  const pairs: GroupPair[] = [
    [0, 'SECTION'],
    [2, 'ENTITIES'],
    ...entities.flat(),
    [0, 'ENDSEC'],
    [0, 'EOF']
  ];
  return pairs.map(([code, value]) => `${code}\n${value}`).join('\n') + '\n';
}

const LINE: GroupPair[] = [
  [0, 'LINE'], [5, '1A'], [8, 'WALLS'], [62, 1], [6, 'DASHED'],
  [10, 0], [20, 0], [30, 0],
  [11, 10], [21, 0], [31, 0]
];

const CIRCLE: GroupPair[] = [
  [0, 'CIRCLE'], [5, '1B'], [8, 'FIXTURES'],
  [10, 5], [20, 5], [30, 0], [40, 1.5]
];

const ARC: GroupPair[] = [
  [0, 'ARC'], [5, '1C'], [8, '0'],
  [10, 0], [20, 0], [30, 0], [40, 2], [50, 0], [51, 90]
];

const TEXT: GroupPair[] = [
  [0, 'TEXT'], [5, '1D'], [8, 'LABELS'],
  [10, 2], [20, 8], [30, 0], [40, 2.5], [1, 'Kitchen'], [50, 45]
];

const LWPOLYLINE: GroupPair[] = [
  [0, 'LWPOLYLINE'], [5, '1E'], [8, '0'], [90, 3], [70, 1],
  [10, 0], [20, 0],
  [10, 4], [20, 0], [42, 0.5],
  [10, 4], [20, 3]
];

const POINT: GroupPair[] = [
  [0, 'POINT'], [5, '1F'], [8, 'SURVEY'],
  [10, 7], [20, 8], [30, 9]
];

const MTEXT: GroupPair[] = [
  [0, 'MTEXT'], [5, '30'], [8, 'NOTES'], [7, 'ROMANS'],
  [10, 1], [20, 2], [30, 0], [40, 3], [41, 40], [50, 30], [71, 5], [1, 'Room note']
];

const INSERT: GroupPair[] = [
  [0, 'INSERT'], [5, '31'], [8, 'DOORS'], [2, 'DOOR'],
  [10, 5], [20, 6], [30, 0], [41, 2], [42, 3], [43, 1], [50, 90]
];

const ELLIPSE: GroupPair[] = [
  [0, 'ELLIPSE'], [5, '32'], [8, '0'],
  [10, 0], [20, 0], [30, 0], [11, 4], [21, 0], [31, 0], [40, 0.5], [41, 0], [42, 3.14]
];

const SPLINE: GroupPair[] = [
  [0, 'SPLINE'], [5, '33'], [8, '0'], [70, 8], [71, 3], [72, 8], [73, 4], [74, 0],
  [40, 0], [40, 0], [40, 0], [40, 0], [40, 1], [40, 1], [40, 1], [40, 1],
  [10, 0], [20, 0], [30, 0],
  [10, 1], [20, 2], [30, 0],
  [10, 3], [20, 2], [30, 0],
  [10, 4], [20, 0], [30, 0]
];

const POLYLINE: GroupPair[] = [
  [0, 'POLYLINE'], [5, '34'], [8, '0'], [66, 1], [10, 0], [20, 0], [30, 0], [70, 1],
  [0, 'VERTEX'], [5, '35'], [8, '0'], [10, 0], [20, 0], [30, 0],
  [0, 'VERTEX'], [5, '36'], [8, '0'], [10, 5], [20, 0], [30, 0], [42, 1],
  [0, 'VERTEX'], [5, '37'], [8, '0'], [10, 5], [20, 5], [30, 0],
  [0, 'SEQEND'], [5, '38'], [8, '0']
];

function textWithStyle(handle: string, style: string): GroupPair[] {
  return [
    [0, 'TEXT'], [5, handle], [8, 'LABELS'], [7, style],
    [10, 2], [20, 8], [30, 0], [40, 2.5], [1, 'Kitchen']
  ];
}

function dimensionWithStyle(handle: string, style: string): GroupPair[] {
  return [
    [0, 'DIMENSION'], [5, handle], [8, 'DIMS'], [2, '*D1'], [3, style],
    [10, 10], [20, 0], [30, 0], [11, 5], [21, 1], [31, 0], [70, 1], [1, '<>']
  ];
}

const CIRCLE_WITHOUT_RADIUS: GroupPair[] = [
  [0, 'CIRCLE'], [5, '2A'], [8, '0'],
  [10, 1], [20, 1], [30, 0]
];

describe('DxfEntityExtractor', () => {
  const extractor = new DxfEntityExtractor();

  it('normalizes a line with its display attributes', () => {
    const { entities, warnings } = extractor.extract(dxf([LINE]));

    expect(warnings).toEqual([]);
    expect(entities).toEqual([
      {
        id: '1A',
        type: 'LINE',
        layer: 'WALLS',
        color: 1,
        linetype: 'DASHED',
        position: [0, 0, 0],
        properties: { start: [0, 0, 0], end: [10, 0, 0] }
      }
    ]);
  });

  it('defaults color and linetype to BYLAYER', () => {
    const [entity] = extractor.extract(dxf([CIRCLE])).entities;

    expect(entity.color).toBe(256);
    expect(entity.linetype).toBe('BYLAYER');
    expect(entity.position).toEqual([5, 5, 0]);
    expect(entity.properties).toEqual({ center: [5, 5, 0], radius: 1.5 });
  });

  it('reports arc angles in degrees', () => {
    const [entity] = extractor.extract(dxf([ARC])).entities;

    expect(entity.type).toBe('ARC');
    if (entity.type === 'ARC') {
      expect(entity.properties.startAngle).toBeCloseTo(0);
      expect(entity.properties.endAngle).toBeCloseTo(90);
    }
  });

  it('keeps text content, height and rotation', () => {
    const [entity] = extractor.extract(dxf([TEXT])).entities;

    expect(entity.type).toBe('TEXT');
    if (entity.type === 'TEXT') {
      expect(entity.position).toEqual([2, 8, 0]);
      expect(entity.properties.text).toBe('Kitchen');
      expect(entity.properties.height).toBe(2.5);
      expect(entity.properties.rotation).toBe(45);
      expect(entity.properties.style).toBe('Standard');
    }
  });

  it('collects light polyline vertices, bulges and the closed flag', () => {
    const [entity] = extractor.extract(dxf([LWPOLYLINE])).entities;

    expect(entity.type).toBe('LWPOLYLINE');
    if (entity.type === 'LWPOLYLINE') {
      expect(entity.position).toEqual([0, 0, 0]);
      expect(entity.properties.vertices).toEqual([[0, 0, 0], [4, 0, 0], [4, 3, 0]]);
      expect(entity.properties.bulges).toEqual([0, 0.5, 0]);
      expect(entity.properties.closed).toBe(true);
    }
  });

  it('normalizes multiline text with its style', () => {
    const [entity] = extractor.extract(dxf([MTEXT])).entities;

    expect(entity.type).toBe('MTEXT');
    expect(entity.layer).toBe('NOTES');
    expect(entity.position).toEqual([1, 2, 0]);
    expect(entity.properties).toEqual({
      text: 'Room note',
      height: 3,
      insert: [1, 2, 0],
      rotation: 30,
      style: 'ROMANS',
      width: 40,
      attachmentPoint: 5
    });
  });

  it('keeps block reference name, scales and rotation', () => {
    const [entity] = extractor.extract(dxf([INSERT])).entities;

    expect(entity.type).toBe('INSERT');
    expect(entity.position).toEqual([5, 6, 0]);
    expect(entity.properties).toEqual({
      name: 'DOOR',
      insert: [5, 6, 0],
      xscale: 2,
      yscale: 3,
      zscale: 1,
      rotation: 90
    });
  });

  it('keeps ellipse parameters in radians', () => {
    const [entity] = extractor.extract(dxf([ELLIPSE])).entities;

    expect(entity.type).toBe('ELLIPSE');
    expect(entity.properties).toEqual({
      center: [0, 0, 0],
      majorAxis: [4, 0, 0],
      ratio: 0.5,
      startParam: 0,
      endParam: 3.14
    });
  });

  it('collects spline control points and knots', () => {
    const [entity] = extractor.extract(dxf([SPLINE])).entities;

    expect(entity.type).toBe('SPLINE');
    expect(entity.position).toEqual([0, 0, 0]);
    expect(entity.properties).toEqual({
      degree: 3,
      controlPoints: [[0, 0, 0], [1, 2, 0], [3, 2, 0], [4, 0, 0]],
      knots: [0, 0, 0, 0, 1, 1, 1, 1],
      weights: []
    });
  });

  it('collects heavy polyline vertices from the vertex records', () => {
    const [entity] = extractor.extract(dxf([POLYLINE])).entities;

    expect(entity.type).toBe('POLYLINE');
    expect(entity.id).toBe('34');
    expect(entity.position).toEqual([0, 0, 0]);
    expect(entity.properties).toEqual({
      vertices: [[0, 0, 0], [5, 0, 0], [5, 5, 0]],
      bulges: [0, 1, 0],
      closed: true
    });
  });

  it('reads text and dimension styles', () => {
    const { entities } = extractor.extract(dxf([
      TEXT,
      textWithStyle('40', 'ROMANS'),
      dimensionWithStyle('41', 'ISO-25'),
      MTEXT
    ]));

    const styles = entities.map(entity => {
      if (entity.type === 'TEXT' || entity.type === 'MTEXT') return entity.properties.style;
      if (entity.type === 'DIMENSION') return entity.properties.dimstyle;
      return undefined;
    });
    expect(styles).toEqual([
      'Standard',
      'ROMANS',
      'ISO-25',
      'ROMANS'
    ]);
    expect(entities[2].properties).toEqual({
      defpoint: [10, 0, 0],
      text: '<>',
      dimstyle: 'ISO-25',
      dimensionType: 1
    });
  });

  it('keeps entity kinds without a schema as generic entities', () => {
    const [entity] = extractor.extract(dxf([POINT])).entities;

    expect(entity.type).toBe('OTHER');
    if (entity.type === 'OTHER') {
      expect(entity.sourceType).toBe('POINT');
      expect(entity.layer).toBe('SURVEY');
      expect(entity.position).toEqual([7, 8, 9]);
      expect(entity.properties.position).toEqual([7, 8, 9]);
    }
  });

  it('skips entities that cannot be normalized with a warning', () => {
    const { entities, warnings } = extractor.extract(dxf([CIRCLE_WITHOUT_RADIUS, LINE]));

    expect(entities.map(entity => entity.id)).toEqual(['1A']);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].code).toBe('DXF_ENTITY_SKIPPED');
    expect(warnings[0].details).toEqual(expect.objectContaining({ entityType: 'CIRCLE', handle: '2A' }));
  });

  it('keeps the input order', () => {
    const { entities } = extractor.extract(dxf([TEXT, LINE, CIRCLE]));
    expect(entities.map(entity => entity.id)).toEqual(['1D', '1A', '1B']);
  });

  it('rejects empty content', () => {
    expect(() => extractor.extract('   \n')).toThrow(expect.objectContaining({ code: 'DXF_EMPTY' }));
  });

  it('rejects binary DXF', () => {
    expect(() => extractor.extract('AutoCAD Binary DXF\r\n\u001a\u0000')).toThrow(
      expect.objectContaining({ code: 'DXF_BINARY_UNSUPPORTED' })
    );
  });
});

describe('style changes between revisions', () => {
  const extractor = new DxfEntityExtractor();

  it('reports a changed text style', () => {
    const before = extractor.extract(dxf([textWithStyle('40', 'ROMANS')])).entities;
    const after = extractor.extract(dxf([textWithStyle('40', 'ARIAL')])).entities;
    const result = compareEntities(before, after);

    expect(result.modified).toHaveLength(1);
    expect(result.modified[0].changes).toEqual([{ attribute: 'style', oldValue: 'ROMANS', newValue: 'ARIAL' }]);
  });

  it('reports a changed dimension style', () => {
    const before = extractor.extract(dxf([dimensionWithStyle('41', 'ISO-25')])).entities;
    const after = extractor.extract(dxf([dimensionWithStyle('41', 'ANSI')])).entities;
    const result = compareEntities(before, after);

    expect(result.modified).toHaveLength(1);
    expect(result.modified[0].changes).toEqual([{ attribute: 'dimstyle', oldValue: 'ISO-25', newValue: 'ANSI' }]);
  });
});

describe('extractDrawing', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'drawing-extract-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads a drawing from disk', () => {
    const file = join(dir, 'plan.dxf');
    writeFileSync(file, dxf([LINE, CIRCLE]));

    expect(extractDrawing(file).entities).toHaveLength(2);
  });

  it('raises an extraction error for a missing file', () => {
    expect(() => extractDrawing(join(dir, 'missing.dxf'))).toThrow(ExtractionError);
  });
});
