import {
  DEFAULT_COMPARE_CONFIG,
  ORIENTATION_BLIND_CONFIG,
  resolveCompareConfig
} from '../config';
import { ConfigurationError } from '../../errors/types';

describe('resolveCompareConfig', () => {
  it('applies the defaults', () => {
    expect(DEFAULT_COMPARE_CONFIG.positionTolerance).toBe(0.001);
    expect(DEFAULT_COMPARE_CONFIG.numericTolerance).toBe(1e-6);
    expect(DEFAULT_COMPARE_CONFIG.matchRadius).toBe(10);
    expect(DEFAULT_COMPARE_CONFIG.keyRoundingDecimals).toBe(1);
    expect(Array.from(DEFAULT_COMPARE_CONFIG.excludedAttributes)).toEqual([]);
  });

  it('merges partial input over the defaults', () => {
    const config = resolveCompareConfig({ positionTolerance: 0.01, excludedAttributes: ['rotation', 'style'] });
    expect(config.positionTolerance).toBe(0.01);
    expect(config.matchRadius).toBe(10);
    expect(config.excludedAttributes.has('style')).toBe(true);
  });

  it('returns a frozen value', () => {
    expect(Object.isFrozen(resolveCompareConfig())).toBe(true);
  });

  it('accepts an already resolved config', () => {
    const config = resolveCompareConfig(ORIENTATION_BLIND_CONFIG);
    expect(Array.from(config.excludedAttributes)).toEqual(['rotation']);
  });

  it.each([
    [{ positionTolerance: -0.1 }, 'positionTolerance'],
    [{ numericTolerance: -1 }, 'numericTolerance'],
    [{ matchRadius: -5 }, 'matchRadius'],
    [{ keyRoundingDecimals: 1.5 }, 'keyRoundingDecimals'],
    [{ keyRoundingDecimals: -1 }, 'keyRoundingDecimals'],
    [{ excludedAttributes: ['rotation', ''] }, 'excludedAttributes.1']
  ])('rejects %p', (input, path) => {
    try {
      resolveCompareConfig(input);
      throw new Error('expected a ConfigurationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('INVALID_COMPARE_CONFIG');
        expect(error.details?.issues).toEqual([expect.objectContaining({ path })]);
      }
    }
  });

  it('rejects an exclusion list given as a bare string', () => {
    expect(() => resolveCompareConfig({ excludedAttributes: 'rotation' })).toThrow(ConfigurationError);
  });
});
