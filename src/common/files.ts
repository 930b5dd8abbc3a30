import { mkdir, rename, writeFile } from 'fs/promises';
import { dirname } from 'path';

/**
 * Write `data` as JSON through a temp file and rename, so a crash never
 * leaves a half-written state file behind.
 */
export async function writeJsonAtomic(
  filePath: string,
  data: unknown,
  mode = 0o644,
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, JSON.stringify(data, null, 2) + '\n', {
    encoding: 'utf-8',
    mode,
  });
  await rename(tmpPath, filePath);
}
