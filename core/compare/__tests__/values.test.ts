import { distance, numbersEqual, pointsEqual, valuesEqual } from '../values';

const tolerances = { positionTolerance: 0.001, numericTolerance: 1e-6 };

describe('values', () => {
  it('treats a delta of exactly the tolerance as equal', () => {
    expect(numbersEqual(1, 1.5, 0.5)).toBe(true);
    expect(numbersEqual(1, 1.5000001, 0.5)).toBe(false);
  });

  it('compares points per axis', () => {
    expect(pointsEqual([0, 0, 0], [0.5, 0.5, 0.5], 0.5)).toBe(true);
    expect(pointsEqual([0, 0, 0], [0, 0, 0.75], 0.5)).toBe(false);
  });

  it('computes euclidean distance in 3D', () => {
    expect(distance([0, 0, 0], [3, 4, 0])).toBe(5);
    expect(distance([1, 1, 1], [1, 1, 3])).toBe(2);
  });

  describe('valuesEqual', () => {
    it('uses the numeric tolerance for numbers', () => {
      expect(valuesEqual(2, 2 + 5e-7, 'number', tolerances)).toBe(true);
      expect(valuesEqual(2, 2.0001, 'number', tolerances)).toBe(false);
    });

    it('uses the positional tolerance for points', () => {
      expect(valuesEqual([0, 0, 0], [0.0005, 0, 0], 'point', tolerances)).toBe(true);
      expect(valuesEqual([0, 0, 0], [0.002, 0, 0], 'point', tolerances)).toBe(false);
    });

    it('uses the numeric tolerance for vectors', () => {
      expect(valuesEqual([1, 0, 0], [1.0005, 0, 0], 'vector', tolerances)).toBe(false);
    });

    it('compares point sequences element-wise', () => {
      expect(valuesEqual([[0, 0, 0], [1, 1, 0]], [[0, 0, 0], [1.0005, 1, 0]], 'points', tolerances)).toBe(true);
      expect(valuesEqual([[0, 0, 0]], [[0, 0, 0], [1, 1, 0]], 'points', tolerances)).toBe(false);
    });

    it('compares number sequences with the numeric tolerance', () => {
      expect(valuesEqual([0, 0.5], [0, 0.5], 'numbers', tolerances)).toBe(true);
      expect(valuesEqual([0, 0.5], [0, 0.501], 'numbers', tolerances)).toBe(false);
    });

    it('compares strings and booleans exactly', () => {
      expect(valuesEqual('A', 'A', 'string', tolerances)).toBe(true);
      expect(valuesEqual('A', 'a', 'string', tolerances)).toBe(false);
      expect(valuesEqual(true, false, 'boolean', tolerances)).toBe(false);
    });

    it('never equates values of different shapes', () => {
      expect(valuesEqual(1, '1', 'number', tolerances)).toBe(false);
      expect(valuesEqual([1, 2, 3], 1, 'point', tolerances)).toBe(false);
    });
  });
});
