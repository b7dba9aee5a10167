import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { basename, dirname, join } from 'node:path';

/**
 * Writes `content` beside `targetPath` and renames it into place, so readers
 * only ever see the previous file or the complete new one. The temporary file
 * never outlives the call.
 */
export function writeFileAtomicSync(targetPath: string, content: string): void {
  const dir = dirname(targetPath);
  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const tmpPath = join(dir, `.${basename(targetPath)}.${process.pid}.tmp`);
  let renamed = false;

  try {
    const fd = openSync(tmpPath, 'w');
    try {
      writeFileSync(fd, content, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }

    renameSync(tmpPath, targetPath);
    renamed = true;
  } finally {
    if (!renamed && existsSync(tmpPath)) {
      rmSync(tmpPath, { force: true });
    }
  }
}
