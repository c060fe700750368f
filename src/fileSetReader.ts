import { EventEmitter } from 'events';
import { resolveFileSet } from './fileSet';
import { readValueStream } from './parser';
import type { LogFileSet, MalformedLine, MergedValues, ReadOptions } from './types';

export interface FileSetReader {
  on(event: 'file', listener: (path: string, count: number) => void): this;
  on(event: 'malformed', listener: (line: MalformedLine) => void): this;
  on(event: 'notice', listener: (msg: string) => void): this;
  emit(event: 'file', path: string, count: number): boolean;
  emit(event: 'malformed', line: MalformedLine): boolean;
  emit(event: 'notice', msg: string): boolean;
}

/**
 * Reads every file of a set and concatenates their values. Files are visited
 * in path order, but nothing downstream depends on it.
 */
export class FileSetReader extends (EventEmitter as { new(): EventEmitter }) {
  constructor(private options: ReadOptions = {}) {
    super();
  }

  resolve(baseName: string): LogFileSet {
    const fileSet = resolveFileSet(baseName, this.options.directory);
    this.emit('notice', `${baseName}: ${fileSet.paths.length} file(s) in ${fileSet.directory}`);
    return fileSet;
  }

  read(fileSet: LogFileSet): MergedValues {
    const values: number[] = [];
    let skipped = 0;
    for (const file of fileSet.paths) {
      const parsed = readValueStream(file, { malformed: this.options.malformed });
      for (const line of parsed.malformed) this.emit('malformed', line);
      skipped += parsed.malformed.length;
      if (parsed.values.length === 0) this.emit('notice', `no values in ${file}`);
      for (const v of parsed.values) values.push(v);
      this.emit('file', file, parsed.values.length);
    }
    return { fileSet, values, skipped };
  }
}
