import { matchEntities } from '../matcher';
import { resolveCompareConfig } from '../config';
import { circle, line, other, text } from './entity-factory';

const config = resolveCompareConfig();

describe('matchEntities', () => {
  it('pairs entities sharing a match key', () => {
    const a = [line([0, 0, 0], [10, 0, 0], { id: 'A1' })];
    const b = [line([0.02, 0, 0], [10, 0, 0], { id: 'B1' })];
    const result = matchEntities(a, b, config);

    expect(result.pairs).toEqual([{ a: a[0], b: b[0], tier: 'exact-key' }]);
    expect(result.unmatchedA).toEqual([]);
    expect(result.unmatchedB).toEqual([]);
  });

  it('prefers the key candidate with an equal fingerprint', () => {
    const a = [circle([0, 0, 0], 5, { id: 'A1' })];
    const b = [circle([0, 0, 0], 3, { id: 'B1' }), circle([0, 0, 0], 5, { id: 'B2' })];
    const result = matchEntities(a, b, config);

    expect(result.pairs.map(pair => pair.b.id)).toEqual(['B2']);
    expect(result.unmatchedB.map(entity => entity.id)).toEqual(['B1']);
  });

  it('falls back to the first unclaimed key candidate', () => {
    const a = [circle([0, 0, 0], 5, { id: 'A1' }), circle([0, 0, 0], 5, { id: 'A2' })];
    const b = [circle([0, 0, 0], 1, { id: 'B1' }), circle([0, 0, 0], 2, { id: 'B2' })];
    const result = matchEntities(a, b, config);

    expect(result.pairs.map(pair => [pair.a.id, pair.b.id])).toEqual([['A1', 'B1'], ['A2', 'B2']]);
  });

  it('pairs by nearest neighbor inside the radius', () => {
    const a = [circle([0, 0, 0], 5, { id: 'A1' })];
    const b = [circle([4, 0, 0], 5, { id: 'B1' }), circle([2, 0, 0], 5, { id: 'B2' })];
    const result = matchEntities(a, b, config);

    expect(result.pairs).toEqual([{ a: a[0], b: b[1], tier: 'nearest-neighbor' }]);
  });

  it('excludes candidates at exactly the radius', () => {
    const a = [circle([0, 0, 0], 5)];
    const b = [circle([10, 0, 0], 5)];
    const result = matchEntities(a, b, config);

    expect(result.pairs).toEqual([]);
    expect(result.unmatchedA).toEqual(a);
    expect(result.unmatchedB).toEqual(b);
  });

  it('resolves equal distances to the first candidate', () => {
    const a = [circle([0, 0, 0], 5)];
    const b = [circle([3, 0, 0], 5, { id: 'B1' }), circle([-3, 0, 0], 5, { id: 'B2' })];

    expect(matchEntities(a, b, config).pairs[0].b.id).toBe('B1');
  });

  it('reports an entity as removed when its nearest candidate is already claimed', () => {
    const a = [circle([1, 0, 0], 5, { id: 'A1' }), circle([2.5, 0, 0], 5, { id: 'A2' })];
    const b = [circle([1.5, 0, 0], 5, { id: 'B1' }), circle([8, 0, 0], 5, { id: 'B2' })];
    const result = matchEntities(a, b, config);

    expect(result.pairs.map(pair => [pair.a.id, pair.b.id])).toEqual([['A1', 'B1']]);
    expect(result.unmatchedA.map(entity => entity.id)).toEqual(['A2']);
    expect(result.unmatchedB.map(entity => entity.id)).toEqual(['B2']);
  });

  it('only pairs entities of the same type and layer', () => {
    const a = [circle([0, 0, 0], 5, { layer: 'A' }), other('POINT', [0, 0, 0])];
    const b = [circle([1, 0, 0], 5, { layer: 'B' }), other('HATCH', [0, 0, 0])];
    const result = matchEntities(a, b, config);

    expect(result.pairs).toEqual([]);
    expect(result.unmatchedA).toHaveLength(2);
    expect(result.unmatchedB).toHaveLength(2);
  });

  it('needs non-empty text on both sides for nearest-neighbor text pairing', () => {
    const withText = matchEntities([text('A', [0, 0, 0])], [text('B', [1, 0, 0])], config);
    expect(withText.pairs.map(pair => pair.tier)).toEqual(['nearest-neighbor']);

    const emptyText = matchEntities([text('', [0, 0, 0])], [text('B', [1, 0, 0])], config);
    expect(emptyText.pairs).toEqual([]);
  });

  it('leaves far-apart entities unmatched', () => {
    const a = [circle([0, 0, 0], 5)];
    const b = [circle([100, 100, 0], 5)];
    const result = matchEntities(a, b, config);

    expect(result.unmatchedA).toEqual(a);
    expect(result.unmatchedB).toEqual(b);
  });

  it('handles empty inputs', () => {
    const b = [circle([0, 0, 0], 1), circle([5, 0, 0], 1)];
    expect(matchEntities([], b, config)).toEqual({ pairs: [], unmatchedA: [], unmatchedB: b });
    expect(matchEntities(b, [], config)).toEqual({ pairs: [], unmatchedA: b, unmatchedB: [] });
  });
});
