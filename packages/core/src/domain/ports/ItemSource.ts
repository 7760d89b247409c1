import type { RunResult } from '../model/RunResult.js';

/** Supplies the ordered values a run works through (e.g. rows parsed from a file). */
export interface ItemSource<T> {
  load(): Promise<readonly T[]>;
}

/** Consumes a finished run (e.g. writes rows back out). */
export interface ResultSink<R> {
  write(result: RunResult<R>): Promise<void>;
}
