import { describe, expect, it } from 'vitest';
import { ChangeEngineError } from './errors.js';
import { Logger } from './logger.js';
import { DEFAULT_MATCH_POLICY, normalizeApplyOptions, parseMatchPolicy } from './options.js';

describe('normalizeApplyOptions', () => {
  it('fills in defaults', () => {
    const options = normalizeApplyOptions();

    expect(options.policy).toEqual(DEFAULT_MATCH_POLICY);
    expect(options.matchCase).toBe(true);
    expect(options.ambiguity).toBe('first');
    expect(options.tidyEmptyFragments).toBe(false);
    expect(options.logger.isEnabled).toBe(false);
    expect(options.signal).toBeUndefined();
  });

  it('creates distinct uuid fragment ids by default', () => {
    const { createFragmentId } = normalizeApplyOptions();

    const first = createFragmentId();
    expect(first).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(createFragmentId()).not.toBe(first);
  });

  it('accepts a single strategy name', () => {
    expect(normalizeApplyOptions({ policy: 'trim' }).policy).toEqual(['trim']);
  });

  it('keeps caller-supplied collaborators', () => {
    const logger = new Logger(true);
    const createFragmentId = () => 'fixed';

    const options = normalizeApplyOptions({ logger, createFragmentId, ambiguity: 'reject', tidyEmptyFragments: true });

    expect(options.logger).toBe(logger);
    expect(options.createFragmentId).toBe(createFragmentId);
    expect(options.ambiguity).toBe('reject');
    expect(options.tidyEmptyFragments).toBe(true);
  });

  it('rejects an empty policy', () => {
    expect(() => normalizeApplyOptions({ policy: [] })).toThrow(ChangeEngineError);
  });

  it('rejects unknown ambiguity values from untyped callers', () => {
    try {
      normalizeApplyOptions(JSON.parse('{"ambiguity":"last"}'));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ChangeEngineError);
      expect(error).toMatchObject({ code: 'INVALID_OPTIONS', details: { field: 'ambiguity', value: 'last' } });
    }
  });
});

describe('parseMatchPolicy', () => {
  it('parses a comma-separated list', () => {
    expect(parseMatchPolicy('exact, trim,')).toEqual(['exact', 'trim']);
  });

  it('names the unknown strategy', () => {
    expect(() => parseMatchPolicy('exact,fuzzy')).toThrow('Unknown match strategy "fuzzy"');
  });
});
