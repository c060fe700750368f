import type { MalformedLine } from './types';

export type TimingLogErrorCode = 'EINVAL' | 'ENOTFOUND' | 'EMALFORMED' | 'EEMPTY' | 'ENODATA';

export abstract class TimingLogError extends Error {
  abstract readonly code: TimingLogErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends TimingLogError {
  readonly code = 'EINVAL';
}

export class NotFoundError extends TimingLogError {
  readonly code = 'ENOTFOUND';
}

/** One line of a log file that is not a decimal number. */
export class MalformedLineError extends TimingLogError {
  readonly code = 'EMALFORMED';

  constructor(readonly line: MalformedLine) {
    super(`${line.path}:${line.lineNumber}: not a number: ${JSON.stringify(line.content)}`);
  }
}

export class EmptyInputError extends TimingLogError {
  readonly code = 'EEMPTY';
}

export class NoDataError extends TimingLogError {
  readonly code = 'ENODATA';
}
