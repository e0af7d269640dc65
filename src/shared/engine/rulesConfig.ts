import type { SnakeColor } from '../types/puzzle';

/**
 * Tunable rule parameters. Hosts build one with resolveRules() (the server
 * feeds it from config) and pass it into createInitialState.
 */
export interface PuzzleRules {
  /** The only color allowed to move its tail end. */
  readonly reversibleColor: SnakeColor;
  /** The only color whose moves wrap around the board edges. */
  readonly wrappingColor: SnakeColor;
  /** Iteration bound for ice-cube slides (portal loops). */
  readonly maxSlideSteps: number;
  /** Bound on plate/gate re-runs after lasers destroy something while arming. */
  readonly maxRefreshPasses: number;
}

export const DEFAULT_RULES: PuzzleRules = {
  reversibleColor: 'red',
  wrappingColor: 'green',
  maxSlideSteps: 50,
  maxRefreshPasses: 8,
};

export function resolveRules(overrides: Partial<PuzzleRules> = {}): PuzzleRules {
  const rules = { ...DEFAULT_RULES, ...overrides };
  if (!Number.isInteger(rules.maxSlideSteps) || rules.maxSlideSteps < 1) {
    throw new RangeError(`maxSlideSteps must be a positive integer, got ${rules.maxSlideSteps}`);
  }
  if (!Number.isInteger(rules.maxRefreshPasses) || rules.maxRefreshPasses < 1) {
    throw new RangeError(
      `maxRefreshPasses must be a positive integer, got ${rules.maxRefreshPasses}`
    );
  }
  return rules;
}
