import { logger } from './logging.js';
import { createErrorLogContext } from './errorHandling.js';

/**
 * Run one pipeline stage, logging how long it took.
 * Failures are logged with their duration and rethrown unchanged.
 */
export async function timeStage<T>(stage: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    logger.info(`Stage ${stage} finished`, {
      service: 'pipeline',
      stage,
      durationMs: Date.now() - startTime,
    });
    return result;
  } catch (error) {
    logger.error(
      `Stage ${stage} failed`,
      createErrorLogContext(error, { service: 'pipeline', stage, durationMs: Date.now() - startTime })
    );
    throw error;
  }
}
