import { promises as fs, constants } from 'fs';
import path from 'path';

async function isExecutableFile(candidate: string): Promise<boolean> {
  const stat = await fs.stat(candidate).catch(() => undefined);
  if (!stat?.isFile()) {
    return false;
  }
  return fs.access(candidate, constants.X_OK).then(
    () => true,
    () => false
  );
}

/**
 * Resolve a command the way spawn would: paths containing a separator are
 * checked directly, bare names are looked up on PATH
 *
 * @returns The executable's path, or undefined when none is found
 */
export async function findExecutable(
  command: string,
  searchPath: string = process.env.PATH ?? ''
): Promise<string | undefined> {
  const candidates = command.includes(path.sep)
    ? [path.resolve(command)]
    : searchPath
        .split(path.delimiter)
        .filter((dir) => dir.length > 0)
        .map((dir) => path.join(dir, command));

  for (const candidate of candidates) {
    if (await isExecutableFile(candidate)) {
      return candidate;
    }
  }
  return undefined;
}
