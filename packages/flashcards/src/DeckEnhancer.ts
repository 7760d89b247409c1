import { readdir } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { Logger } from 'pino';
import type { BatchExecutorConfig } from '@unitbatch/core';
import { BatchExecutor, attachEventLogger, createLogger, loadEnvConfig } from '@unitbatch/core';
import type { RawCard } from './domain/model/Card.js';
import type { StructuredGenerator } from './domain/ports/StructuredGenerator.js';
import { createExampleSentenceOperation } from './application/ExampleSentenceOperation.js';
import { CardCsvSource, assertCardLimit } from './infrastructure/csv/CardCsvSource.js';
import { EnhancedCardCsvSink } from './infrastructure/csv/EnhancedCardCsvSink.js';

/** Configuration for deck enhancement. */
export interface DeckEnhancerOptions {
  /** Batching, concurrency and retry settings for each deck run. */
  readonly executor?: BatchExecutorConfig<RawCard>;
  /** Run events are logged here. Default: a pino logger at `info`. */
  readonly logger?: Logger;
  /** Enhance at most this many cards per deck (a positive integer). */
  readonly limit?: number;
}

/** What happened to one deck file. */
export interface DeckReport {
  readonly runId: string;
  readonly inputPath: string;
  readonly outputPath: string;
  /** Set only when at least one card failed. */
  readonly failedPath: string | null;
  readonly total: number;
  readonly succeeded: number;
  readonly retriedSucceeded: number;
  readonly failed: number;
  readonly cancelled: boolean;
}

/**
 * Adds model-generated example sentences to flashcard decks.
 *
 * Each deck file is one executor run: cards are read with PapaParse, sent to the
 * generator in batches, and written back in their original order. Cards that
 * still fail after retries go to `<name>.failed.csv` beside the output.
 *
 * @example
 * ```typescript
 * const enhancer = new DeckEnhancer(generator, { executor: { batchSize: 20, maxConcurrency: 5 } });
 * const reports = await enhancer.enhanceDirectory('decks', 'decks-enhanced');
 * ```
 */
export class DeckEnhancer {
  private readonly logger: Logger;
  private readonly abortController = new AbortController();
  /** Aborted by `cancel()` or by `options.executor.signal`. */
  private readonly signal: AbortSignal;

  /** @throws ConfigError when `limit` is not a positive integer. */
  constructor(
    private readonly generator: StructuredGenerator,
    private readonly options: DeckEnhancerOptions = {},
  ) {
    assertCardLimit(options.limit);
    this.logger = options.logger ?? createLogger({ name: 'flashcards' });
    const external = options.executor?.signal;
    this.signal = external ? AbortSignal.any([this.abortController.signal, external]) : this.abortController.signal;
  }

  /** Whether `cancel()` was called or the external signal aborted. */
  get isCancelled(): boolean {
    return this.signal.aborted;
  }

  async enhanceFile(inputPath: string, outputPath: string): Promise<DeckReport> {
    const deck = basename(inputPath);
    const log = this.logger.child({ deck });

    const cards = await new CardCsvSource(inputPath, { limit: this.options.limit }).load();
    log.info({ cards: cards.length }, 'deck loaded');

    const executor = new BatchExecutor(createExampleSentenceOperation(this.generator), {
      ...this.options.executor,
      signal: this.signal,
    });
    const detach = attachEventLogger(executor, log);
    const sink = new EnhancedCardCsvSink(outputPath, cards);

    try {
      const result = await executor.execute(cards);
      await sink.write(result);

      const { summary } = result;
      const report: DeckReport = {
        runId: result.runId,
        inputPath,
        outputPath,
        failedPath: summary.failed > 0 ? sink.failedPath : null,
        total: summary.total,
        succeeded: summary.succeeded,
        retriedSucceeded: summary.retriedSucceeded,
        failed: summary.failed,
        cancelled: result.status === 'CANCELLED',
      };
      log.info({ outputPath, succeeded: report.succeeded, failed: report.failed }, 'deck written');
      return report;
    } finally {
      detach();
    }
  }

  /** Enhance every `*.csv` in `inputDir`, by name order, into files of the same name under `outputDir`. */
  async enhanceDirectory(inputDir: string, outputDir: string): Promise<DeckReport[]> {
    const entries = await readdir(inputDir, { withFileTypes: true });
    const files = entries
      .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.csv'))
      .map((entry) => entry.name)
      .sort();

    this.logger.info({ inputDir, decks: files.length }, 'enhancing decks');

    const reports: DeckReport[] = [];
    for (const file of files) {
      if (this.signal.aborted) {
        this.logger.warn({ inputDir, remaining: files.length - reports.length }, 'deck enhancement cancelled');
        break;
      }
      reports.push(await this.enhanceFile(join(inputDir, file), join(outputDir, file)));
    }
    return reports;
  }

  /**
   * Stop enhancing. The deck in progress finishes with its remaining cards
   * marked cancelled; later decks are not started. Cancelling is final for
   * this instance.
   */
  cancel(reason = 'deck enhancement cancelled'): void {
    this.abortController.abort(reason);
  }
}

/** Build a `DeckEnhancer` from `UNITBATCH_*` and `LOG_LEVEL` environment variables. */
export function createDeckEnhancerFromEnv(
  generator: StructuredGenerator,
  env: NodeJS.ProcessEnv = process.env,
  options: Pick<DeckEnhancerOptions, 'limit'> = {},
): DeckEnhancer {
  const { executor, logLevel } = loadEnvConfig(env);
  return new DeckEnhancer(generator, {
    ...options,
    executor,
    logger: createLogger({ name: 'flashcards', level: logLevel }),
  });
}
