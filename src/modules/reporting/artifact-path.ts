import { existsSync } from 'fs';
import { join } from 'path';
import dayjs from 'dayjs';

/**
 * First free `<prefix>_YYYY_MM_DD_<n>.<extension>` in `dir`, counting from 1.
 */
export function nextArtifactPath(dir: string, prefix: string, extension: string, date: Date = new Date()): string {
  const day = dayjs(date).format('YYYY_MM_DD');
  for (let n = 1; ; n++) {
    const candidate = join(dir, `${prefix}_${day}_${n}.${extension}`);
    if (!existsSync(candidate)) return candidate;
  }
}
