import { accessSync, constants, statSync } from 'fs';
import { join } from 'path';

export interface ExecutableLookupOptions {
  platform?: NodeJS.Platform;
  /** Windows executable extensions, `;`-separated */
  pathExt?: string;
}

/**
 * Search the PATH entries for an executable file.
 * @param name - Executable name, e.g. `python3`
 * @param pathEnv - PATH value to search; nothing is found when it is empty or unset
 * @returns Absolute path of the first match, or undefined
 */
export function findExecutable(
  name: string,
  pathEnv: string | undefined,
  options: ExecutableLookupOptions = {}
): string | undefined {
  if (!pathEnv) {
    return undefined;
  }

  const platform = options.platform ?? process.platform;
  const windows = platform === 'win32';
  const extensions = windows
    ? (options.pathExt ?? process.env.PATHEXT ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean)
    : [''];

  for (const dir of pathEnv.split(windows ? ';' : ':')) {
    if (!dir) {
      continue;
    }
    for (const extension of extensions) {
      const candidate = join(dir, name + extension);
      if (isExecutableFile(candidate)) {
        return candidate;
      }
    }
  }

  return undefined;
}

function isExecutableFile(path: string): boolean {
  try {
    if (!statSync(path).isFile()) {
      return false;
    }
    accessSync(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}
