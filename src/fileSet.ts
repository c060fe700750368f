import fs from 'fs';
import path from 'path';
import { InvalidArgumentError, NotFoundError } from './errors';
import type { LogFileSet } from './types';

/**
 * Finds every regular file in `directory` whose name starts with `baseName`.
 * A base name with a directory part (`logs/quote_`) is resolved against that
 * sub-directory. An empty result is returned as is; callers decide whether
 * that is fatal.
 */
export function resolveFileSet(baseName: string, directory: string = process.cwd()): LogFileSet {
  if (!baseName) throw new InvalidArgumentError('base name must be non-empty');
  const prefix = path.basename(baseName);
  const dir = path.resolve(directory, path.dirname(baseName));
  if (!prefix || baseName.endsWith('/') || baseName.endsWith(path.sep)) {
    throw new InvalidArgumentError(`base name must end in a file name prefix: ${baseName}`);
  }

  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (e: unknown) {
    throw new NotFoundError(`cannot read directory ${dir}`, { cause: e });
  }

  const paths: string[] = [];
  for (const entry of entries) {
    if (!entry.name.startsWith(prefix)) continue;
    const full = path.join(dir, entry.name);
    // readdir reports symlinks as such; follow them to see what they point at
    if (entry.isFile() || (entry.isSymbolicLink() && isRegularFile(full))) paths.push(full);
  }
  paths.sort();
  return { baseName, directory: dir, paths };
}

function isRegularFile(p: string): boolean {
  try {
    return fs.statSync(p).isFile();
  } catch {
    return false;
  }
}
