import { afterEach, describe, it, expect, vi } from 'vitest';
import { resolveConfig } from '../../src/config.js';
import { scriptedRandom } from '../helpers.js';

describe('resolveConfig', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('fills in defaults', () => {
    const resolved = resolveConfig();
    expect(resolved.recursionLimit).toBe(3);
    expect(resolved.functionWeight).toBe(0.3);
    expect(resolved.categorySelection).toBe('weighted');
    expect(resolved.categoryWeights).toEqual({});
    expect(resolved.maxStringLength).toBe(100);
    expect(resolved.maxTop).toBe(1000);
    expect(resolved.maxSkip).toBe(1000);
    expect(resolved.filterSuffixes).toEqual({});
  });

  it('keeps explicit values', () => {
    const resolved = resolveConfig({ recursionLimit: 1, categorySelection: 'uniform', maxTop: 5 });
    expect(resolved.recursionLimit).toBe(1);
    expect(resolved.categorySelection).toBe('uniform');
    expect(resolved.maxTop).toBe(5);
  });

  it('prefers an explicit random source over a seed', () => {
    const random = scriptedRandom([0.25]);
    expect(resolveConfig({ random, seed: 9 }).random).toBe(random);
  });

  it('derives the same sequence from the same seed', () => {
    const a = resolveConfig({ seed: 11 }).random;
    const b = resolveConfig({ seed: 11 }).random;
    expect([a.next(), a.next()]).toEqual([b.next(), b.next()]);
  });

  it('logs warnings to console.warn by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const { onWarning } = resolveConfig();
    onWarning('first');
    onWarning('second', { entitySet: 'Orders' });
    expect(warn).toHaveBeenNthCalledWith(1, '[fuzzer] first');
    expect(warn).toHaveBeenNthCalledWith(2, '[fuzzer] second', { entitySet: 'Orders' });
  });

  it('passes warnings to a custom hook', () => {
    const hook = vi.fn();
    resolveConfig({ onWarning: hook }).onWarning('dropped', 42);
    expect(hook).toHaveBeenCalledWith('dropped', 42);
  });

  it('never propagates a throwing hook', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const failure = new Error('hook failed');
    const { onWarning } = resolveConfig({
      onWarning: () => {
        throw failure;
      },
    });
    expect(() => onWarning('dropped')).not.toThrow();
    expect(error).toHaveBeenCalledWith('[fuzzer] onWarning hook threw:', failure);
  });
});
