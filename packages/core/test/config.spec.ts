/* packages/core/test/config.spec.ts */
import { describe, it, expect, afterEach } from 'vitest';
import { _resetConfig, getConfig, loadConfig, Schema, DT, InvalidOperationError } from '../src';

describe('config', () => {
  afterEach(() => {
    delete process.env.FRAMEBRIDGE_APPROXIMATIONS;
    _resetConfig();
  });

  it('defaults when variables are unset', () => {
    expect(loadConfig({})).toEqual({ logLevel: 'info', approximations: 'warn' });
  });

  it('reads FRAMEBRIDGE_* variables', () => {
    expect(loadConfig({ FRAMEBRIDGE_LOG_LEVEL: 'debug', FRAMEBRIDGE_APPROXIMATIONS: ' error ' }))
      .toEqual({ logLevel: 'debug', approximations: 'error' });
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ FRAMEBRIDGE_APPROXIMATIONS: 'sometimes' })).toThrow();
  });

  it('caches until reset', () => {
    process.env.FRAMEBRIDGE_APPROXIMATIONS = 'allow';
    _resetConfig();
    expect(getConfig().approximations).toBe('allow');
    process.env.FRAMEBRIDGE_APPROXIMATIONS = 'error';
    expect(getConfig().approximations).toBe('allow');
    _resetConfig();
    expect(getConfig().approximations).toBe('error');
  });
});

describe('schema', () => {
  const s = Schema.from({ a: DT.Int64, b: DT.String });

  it('keeps order on replace and appends new columns', () => {
    expect(s.with('a', DT.Float64).names()).toEqual(['a', 'b']);
    expect(s.with('a', DT.Float64).get('a')).toEqual(DT.Float64);
    expect(s.with('c', DT.Boolean).names()).toEqual(['a', 'b', 'c']);
  });

  it('renames, drops and selects', () => {
    expect(s.rename({ a: 'x' }).names()).toEqual(['x', 'b']);
    expect(s.drop(['a']).names()).toEqual(['b']);
    expect(s.select(['b', 'a']).names()).toEqual(['b', 'a']);
  });

  it('rejects duplicate names', () => {
    expect(() => new Schema([['a', DT.Int64], ['a', DT.String]])).toThrow(InvalidOperationError);
  });
});
