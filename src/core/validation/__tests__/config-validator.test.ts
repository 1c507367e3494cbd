import { describe, expect, test } from 'vitest';
import { ConfigurationError } from '../../errors/index';
import { assertDistinctRoots, parseStartUrl } from '../config-validator';

describe('parseStartUrl', () => {
  test('parses an absolute URL', () => {
    expect(parseStartUrl('https://www.climatico.ro/aer-conditionat/vrv').pathname).toBe('/aer-conditionat/vrv');
  });

  test('rejects a relative URL', () => {
    expect(() => parseStartUrl('/aer-conditionat')).toThrow(ConfigurationError);
  });
});

describe('assertDistinctRoots', () => {
  test('accepts different directories', () => {
    expect(() => assertDistinctRoots('out/sources', 'out/product_info')).not.toThrow();
  });

  test('rejects paths that resolve to the same directory', () => {
    expect(() => assertDistinctRoots('out/sources', './out/sources/')).toThrow(ConfigurationError);
  });
});
