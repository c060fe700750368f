export type MalformedPolicy = 'skip' | 'fail';

export type BoundaryPolicy = 'keep' | 'trim';

export interface LogFileSet {
  baseName: string;
  directory: string;
  paths: string[]; // sorted
}

export interface ParsedValues {
  path: string;
  values: number[];
  malformed: MalformedLine[];
}

export interface MalformedLine {
  path: string;
  lineNumber: number; // 1-based
  content: string;
}

export interface MergedValues {
  fileSet: LogFileSet;
  values: number[];
  skipped: number;
}

export interface BucketedCountSeries {
  start: number; // epoch second of counts[0]
  counts: number[];
}

export interface AverageResult {
  mean: number;
  count: number;
  files: number;
  skipped: number;
}

export interface ReadOptions {
  directory?: string;
  malformed?: MalformedPolicy;
}

export interface BucketOptions extends ReadOptions {
  boundary?: BoundaryPolicy;
}
