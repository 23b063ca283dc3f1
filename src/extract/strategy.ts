import { errorMessage } from "../errors";

/**
 * One heuristic attempt in an ordered cascade. `apply` resolves `null` (or an
 * empty array) when the strategy does not apply; a rejection counts the same.
 */
export interface MatchStrategy<C, T> {
  name: string;
  apply(context: C): Promise<T | null>;
}

export interface StrategyOutcome<T> {
  value: T;
  strategy: string;
}

export interface StrategyChainOptions {
  /** Receives `"<strategy>: <message>"` for every strategy that threw. */
  onError?: (message: string) => void;
}

function isMiss(value: unknown): boolean {
  return value === null || value === undefined || (Array.isArray(value) && value.length === 0);
}

/** Runs strategies in order and returns the first hit, or `null` when all of them miss. */
export async function runStrategyChain<C, T>(
  strategies: ReadonlyArray<MatchStrategy<C, T>>,
  context: C,
  options: StrategyChainOptions = {}
): Promise<StrategyOutcome<T> | null> {
  for (const strategy of strategies) {
    try {
      const value = await strategy.apply(context);
      if (value !== null && !isMiss(value)) {
        return { value, strategy: strategy.name };
      }
    } catch (error) {
      options.onError?.(`${strategy.name}: ${errorMessage(error)}`);
    }
  }
  return null;
}
