import * as fs from 'fs';
import * as path from 'path';

function isExecutable(filePath: string): boolean {
  try {
    const stat = fs.statSync(filePath);
    if (!stat.isFile()) return false;
    fs.accessSync(filePath, process.platform === 'win32' ? fs.constants.F_OK : fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Resolve a command name or path to an executable file, the way a shell would.
 * Returns null when nothing runnable is found. Never spawns a process.
 */
export function findExecutable(
  command: string,
  searchPath: string = process.env['PATH'] ?? '',
): string | null {
  if (!command) return null;

  if (command.includes('/') || command.includes('\\')) {
    const absolute = path.resolve(command);
    return isExecutable(absolute) ? absolute : null;
  }

  const extensions = process.platform === 'win32'
    ? ['', ...(process.env['PATHEXT'] ?? '.EXE;.CMD;.BAT').split(';')]
    : [''];

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, command + ext);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return null;
}
