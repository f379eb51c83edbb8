/**
 * Ordered input-detection strategies
 */

import type { Logger } from '../types/index.js';
import { CancelledError, InputUnavailableError, classifyError } from '../errors/index.js';
import { silentLogger } from '../observability/index.js';

/**
 * One way of locating a service's input surface.
 * Return null (or throw InputUnavailableError) when it does not apply.
 */
export interface DetectionStrategy<T> {
  name: string;
  attempt(signal?: AbortSignal): Promise<T | null>;
}

export interface DetectionOutcome<T> {
  strategy: string;
  value: T;
}

/**
 * Try strategies in order and return the first that succeeds
 *
 * Failures classified as InputUnavailable or Unknown move on to the next
 * strategy. Anything else (auth, rate limit, cancellation) stops the
 * search and propagates.
 *
 * @throws InputUnavailableError naming every strategy tried
 */
export async function runDetectionStrategies<T>(
  strategies: ReadonlyArray<DetectionStrategy<T>>,
  options: { signal?: AbortSignal; logger?: Logger } = {}
): Promise<DetectionOutcome<T>> {
  const logger = options.logger ?? silentLogger;
  const tried: string[] = [];
  const failures: string[] = [];

  for (const strategy of strategies) {
    if (options.signal?.aborted) {
      throw new CancelledError();
    }
    tried.push(strategy.name);

    try {
      const value = await strategy.attempt(options.signal);
      if (value !== null) {
        logger.debug('Detection strategy succeeded', { strategy: strategy.name });
        return { strategy: strategy.name, value };
      }
      failures.push(`${strategy.name}: not found`);
    } catch (error) {
      const kind = classifyError(error);
      if (kind !== 'InputUnavailable' && kind !== 'Unknown') {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      failures.push(`${strategy.name}: ${message}`);
      logger.debug('Detection strategy failed', { strategy: strategy.name, error: message });
    }
  }

  throw new InputUnavailableError(
    failures.length > 0
      ? `No input entry point found (${failures.join('; ')})`
      : 'No input detection strategies configured',
    tried
  );
}
