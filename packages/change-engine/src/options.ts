import { v4 as uuidv4 } from 'uuid';
import { ChangeEngineError } from './errors.js';
import { Logger } from './logger.js';
import { MATCH_STRATEGIES, type MatchStrategy } from './types.js';

export type AmbiguityPolicy = 'first' | 'reject';

export interface ApplyOptions {
  /**
   * Matching strategies tried in order until one finds the target.
   * Defaults to `exact` then `normalize_whitespace`.
   */
  policy?: MatchStrategy | readonly MatchStrategy[];
  /**
   * Case-sensitive comparison. Instructions may override it.
   * Defaults to `true`.
   */
  matchCase?: boolean;
  /**
   * What to do when a paragraph holds the target more than once: take the
   * first occurrence and flag it (`first`) or fail the change (`reject`).
   * Defaults to `first`.
   */
  ambiguity?: AmbiguityPolicy;
  /**
   * Remove fragments an edit left empty, right after that edit succeeds.
   * Defaults to `false`.
   */
  tidyEmptyFragments?: boolean;
  /** Id factory for fragments created by inserts. Defaults to UUID v4. */
  createFragmentId?: () => string;
  logger?: Logger;
  /** Checked between instructions; a pass is never interrupted mid-change. */
  signal?: AbortSignal;
}

export interface ResolvedApplyOptions {
  policy: readonly MatchStrategy[];
  matchCase: boolean;
  ambiguity: AmbiguityPolicy;
  tidyEmptyFragments: boolean;
  createFragmentId: () => string;
  logger: Logger;
  signal?: AbortSignal;
}

export const DEFAULT_MATCH_POLICY: readonly MatchStrategy[] = ['exact', 'normalize_whitespace'];

export function isMatchStrategy(value: unknown): value is MatchStrategy {
  return typeof value === 'string' && (MATCH_STRATEGIES as readonly string[]).includes(value);
}

/**
 * Parses a comma-separated strategy list such as `exact,trim`.
 */
export function parseMatchPolicy(value: string): MatchStrategy[] {
  const names = value
    .split(',')
    .map((name) => name.trim())
    .filter((name) => name.length > 0);

  return names.map((name) => {
    if (!isMatchStrategy(name)) {
      throw new ChangeEngineError(
        'INVALID_OPTIONS',
        `Unknown match strategy "${name}". Allowed strategies: ${MATCH_STRATEGIES.join(', ')}.`,
        { field: 'policy', value: name },
      );
    }
    return name;
  });
}

function normalizePolicy(policy: ApplyOptions['policy']): readonly MatchStrategy[] {
  if (policy === undefined) return DEFAULT_MATCH_POLICY;

  const strategies: readonly unknown[] = typeof policy === 'string' ? [policy] : policy;
  if (strategies.length === 0) {
    throw new ChangeEngineError('INVALID_OPTIONS', 'policy must name at least one match strategy.', {
      field: 'policy',
    });
  }

  return strategies.map((strategy) => {
    if (!isMatchStrategy(strategy)) {
      throw new ChangeEngineError('INVALID_OPTIONS', `Unknown match strategy ${JSON.stringify(strategy)}.`, {
        field: 'policy',
        value: strategy,
      });
    }
    return strategy;
  });
}

export function normalizeApplyOptions(options?: ApplyOptions): ResolvedApplyOptions {
  const ambiguity = options?.ambiguity ?? 'first';
  if (ambiguity !== 'first' && ambiguity !== 'reject') {
    throw new ChangeEngineError(
      'INVALID_OPTIONS',
      `ambiguity must be "first" or "reject", got ${JSON.stringify(ambiguity)}.`,
      { field: 'ambiguity', value: ambiguity },
    );
  }

  return {
    policy: normalizePolicy(options?.policy),
    matchCase: options?.matchCase ?? true,
    ambiguity,
    tidyEmptyFragments: options?.tidyEmptyFragments ?? false,
    createFragmentId: options?.createFragmentId ?? (() => uuidv4()),
    logger: options?.logger ?? new Logger(false),
    signal: options?.signal,
  };
}
