/**
 * Background worker: run a cycle, sleep, repeat.
 *
 * The interval is measured from the end of a cycle, so a slow cycle pushes the
 * next one back instead of overlapping it.
 */

import { errorMessage } from '../types/errors';
import { logger } from '../utils/logger';
import { runIngestionCycle, type CycleReport, type IngestionDependencies } from './ingestion-pipeline';

export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface WorkerOptions extends IngestionDependencies {
  intervalSeconds: number;
  onCycle?: (report: CycleReport) => void;
  runCycle?: (deps: IngestionDependencies) => Promise<CycleReport>;
  sleep?: Sleep;
}

export interface IngestionWorker {
  /** Interrupts the current sleep; resolves once the in-flight cycle has finished. */
  stop(): Promise<void>;
  readonly finished: Promise<void>;
}

export const sleep: Sleep = (ms, signal) =>
  new Promise(resolve => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });

export function startIngestionWorker(options: WorkerOptions): IngestionWorker {
  const controller = new AbortController();
  const runCycle = options.runCycle ?? runIngestionCycle;
  const wait = options.sleep ?? sleep;
  const intervalMs = options.intervalSeconds * 1000;

  const loop = async () => {
    logger.info(`Ingestion worker started (interval ${options.intervalSeconds}s)`);

    while (!controller.signal.aborted) {
      try {
        const report = await runCycle(options);
        options.onCycle?.(report);
      } catch (error) {
        logger.error(`Ingestion cycle crashed: ${errorMessage(error)}`, error);
      }

      if (controller.signal.aborted) break;

      logger.info(`Worker sleeping for ${options.intervalSeconds}s`);
      try {
        await wait(intervalMs, controller.signal);
      } catch (error) {
        logger.error('Worker sleep interrupted unexpectedly', error);
      }
    }

    logger.info('Ingestion worker stopped');
  };

  const finished = loop();

  return {
    finished,
    stop: async () => {
      controller.abort();
      await finished;
    }
  };
}
