/**
 * Ordered fallback chains.
 *
 * Several lookups try progressively less-authoritative sources. Each source
 * is a strategy with one `attempt` method; a strategy that throws counts as
 * producing nothing and the chain moves on.
 */

import type { AuditLogger } from "./types.js";
import { emitAuditDiagnosticEvent } from "./diagnostics.js";
import { formatErrorMessage } from "./retry.js";
import { isAuthenticationError } from "./errors.js";

export interface Strategy<Ctx, R> {
  readonly name: string;
  attempt(ctx: Ctx): Promise<R | null>;
}

export type StrategyOutcome<R> = {
  result: R | null;
  /** Name of the strategy that produced `result`. */
  strategy: string | null;
  /** Strategies that were tried, in order. */
  tried: string[];
};

/**
 * Run strategies in order and return the first non-empty result.
 * Authentication errors are rethrown; any other failure falls through.
 */
export async function firstNonEmpty<Ctx, R>(
  strategies: readonly Strategy<Ctx, R>[],
  ctx: Ctx,
  options: {
    isEmpty?: (result: R) => boolean;
    logger?: AuditLogger;
    component?: string;
  } = {},
): Promise<StrategyOutcome<R>> {
  const isEmpty = options.isEmpty ?? (() => false);
  const component = options.component ?? "strategy";
  const tried: string[] = [];

  for (const strategy of strategies) {
    tried.push(strategy.name);
    let result: R | null = null;
    try {
      result = await strategy.attempt(ctx);
    } catch (error) {
      if (isAuthenticationError(error)) throw error;
      options.logger?.warn(`[${component}] ${strategy.name} failed: ${formatErrorMessage(error)}`);
    }

    if (result !== null && !isEmpty(result)) {
      return { result, strategy: strategy.name, tried };
    }

    emitAuditDiagnosticEvent({
      type: "backup.strategy.fallback",
      component,
      operation: strategy.name,
    });
  }

  return { result: null, strategy: null, tried };
}
