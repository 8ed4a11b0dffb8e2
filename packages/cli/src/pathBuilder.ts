import { mkdirSync } from 'fs';
import { dirname, join } from 'path';
import type { PathBuilder } from '@pianolog/engine';

const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
] as const;

const pad = (n: number) => String(n).padStart(2, '0');

/** `<baseDir>/2024/03-March/09/session_141502.mid`, in local time. */
export function sessionPath(baseDir: string, start: Date): string {
  const month = start.getMonth();
  return join(
    baseDir,
    String(start.getFullYear()),
    `${pad(month + 1)}-${MONTH_NAMES[month]}`,
    pad(start.getDate()),
    `session_${pad(start.getHours())}${pad(start.getMinutes())}${pad(start.getSeconds())}.mid`,
  );
}

/** Path builder for the recorder; creates the day directory on demand. */
export function createPathBuilder(baseDir: string): PathBuilder {
  return start => {
    const path = sessionPath(baseDir, start);
    mkdirSync(dirname(path), { recursive: true });
    return path;
  };
}
