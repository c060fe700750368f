import fs from 'fs';
import { MalformedLineError, NotFoundError } from './errors';
import type { MalformedLine, MalformedPolicy, ParsedValues } from './types';

// Plain decimal notation only: no hex, no NaN/Infinity, no digit separators
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Parses one trimmed line; `undefined` when it is not a finite decimal number. */
export function parseValue(text: string): number | undefined {
  if (!DECIMAL.test(text)) return undefined;
  const value = Number(text);
  return Number.isFinite(value) ? value : undefined;
}

export interface ReadValuesOptions {
  malformed?: MalformedPolicy;
  onMalformed?: (line: MalformedLine) => void;
}

/**
 * Yields the values of a log file in file order. Blank lines are ignored.
 * Under the 'skip' policy a malformed line is reported to `onMalformed` and
 * reading continues; under 'fail' its `MalformedLineError` is thrown.
 */
export function* readValues(filePath: string, options: ReadValuesOptions = {}): Generator<number, void, undefined> {
  const policy = options.malformed ?? 'skip';
  const lines = readText(filePath).split('\n');
  for (let i = 0; i < lines.length; i++) {
    const content = lines[i].trim();
    if (content.length === 0) continue;
    const value = parseValue(content);
    if (value !== undefined) {
      yield value;
      continue;
    }
    const line: MalformedLine = { path: filePath, lineNumber: i + 1, content };
    if (policy === 'fail') throw new MalformedLineError(line);
    options.onMalformed?.(line);
  }
}

/** A restartable view of one file: every iteration re-reads it from the start. */
export class ValueStream implements Iterable<number> {
  constructor(readonly path: string, private options: ReadValuesOptions = {}) {}

  [Symbol.iterator](): Iterator<number> {
    return readValues(this.path, this.options);
  }

  collect(): ParsedValues {
    const malformed: MalformedLine[] = [];
    const values = Array.from(readValues(this.path, {
      malformed: this.options.malformed,
      onMalformed: (line) => {
        malformed.push(line);
        this.options.onMalformed?.(line);
      },
    }));
    return { path: this.path, values, malformed };
  }
}

export function readValueStream(filePath: string, options: ReadValuesOptions = {}): ParsedValues {
  return new ValueStream(filePath, options).collect();
}

function readText(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (e: unknown) {
    throw new NotFoundError(`cannot read ${filePath}`, { cause: e });
  }
}
