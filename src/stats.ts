import { EmptyInputError, NotFoundError } from './errors';
import { FileSetReader } from './fileSetReader';
import type { AverageResult, BoundaryPolicy, BucketOptions, BucketedCountSeries, ReadOptions } from './types';

/**
 * Counts timestamps per whole second. Buckets are global to everything added,
 * so timestamps from several files land in the same buckets.
 */
export class IntervalBucketer {
  private buckets = new Map<number, number>(); // key: epoch second
  private minSecond = Infinity;
  private maxSecond = -Infinity;

  add(ts: number): void {
    const second = Math.floor(ts);
    this.buckets.set(second, (this.buckets.get(second) ?? 0) + 1);
    if (second < this.minSecond) this.minSecond = second;
    if (second > this.maxSecond) this.maxSecond = second;
  }

  addAll(timestamps: Iterable<number>): this {
    for (const ts of timestamps) this.add(ts);
    return this;
  }

  /**
   * Dense series from the earliest to the latest observed second. The first
   * and last bucket may cover only part of a second of activity; 'trim' drops
   * both.
   */
  snapshot(boundary: BoundaryPolicy = 'keep'): BucketedCountSeries {
    if (this.buckets.size === 0) return { start: 0, counts: [] };
    const counts: number[] = [];
    for (let s = this.minSecond; s <= this.maxSecond; s++) {
      counts.push(this.buckets.get(s) ?? 0);
    }
    const series = { start: this.minSecond, counts };
    return boundary === 'trim' ? trimPartialSeconds(series) : series;
  }
}

export function bucketTimestamps(timestamps: Iterable<number>, boundary: BoundaryPolicy = 'keep'): BucketedCountSeries {
  return new IntervalBucketer().addAll(timestamps).snapshot(boundary);
}

export function trimPartialSeconds(series: BucketedCountSeries): BucketedCountSeries {
  if (series.counts.length <= 2) return { start: series.start, counts: [] };
  return { start: series.start + 1, counts: series.counts.slice(1, -1) };
}

/** One count per line, earliest bucket first. */
export function formatSeries(series: BucketedCountSeries): string {
  return series.counts.map((c) => `${c}\n`).join('');
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) throw new EmptyInputError('cannot average an empty sequence');
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export function bucketFileSet(baseName: string, options: BucketOptions = {}, reader = new FileSetReader(options)): BucketedCountSeries {
  const fileSet = reader.resolve(baseName);
  if (fileSet.paths.length === 0) {
    throw new NotFoundError(`no files starting with "${baseName}" in ${fileSet.directory}`);
  }
  const merged = reader.read(fileSet);
  if (merged.values.length === 0) {
    throw new EmptyInputError(`no valid timestamps in ${fileSet.paths.length} file(s) starting with "${baseName}"`);
  }
  return bucketTimestamps(merged.values, options.boundary);
}

export function averageFileSet(baseName: string, options: ReadOptions = {}, reader = new FileSetReader(options)): AverageResult {
  const fileSet = reader.resolve(baseName);
  const merged = reader.read(fileSet);
  if (merged.values.length === 0) {
    const what = fileSet.paths.length === 0 ? 'no files' : 'no valid values in files';
    throw new EmptyInputError(`${what} starting with "${baseName}" in ${fileSet.directory}`);
  }
  return {
    mean: mean(merged.values),
    count: merged.values.length,
    files: fileSet.paths.length,
    skipped: merged.skipped,
  };
}
