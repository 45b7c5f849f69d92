import fs from 'node:fs';
import path from 'node:path';
import { StoreFileSchema, type StoreDocument, type StoreFile } from '../schema/index.js';
import { PersistenceCorruptError, PersistenceWriteError } from '../model/errors.js';

/**
 * Write the store so that a crash leaves either the old file or the new one:
 * the content goes to a temp file in the same directory, is flushed, and is
 * then renamed over the target.
 */
export function writeStoreFile(doc: StoreDocument, outputPath: string): void {
  const dir = path.dirname(outputPath);
  const tempPath = path.join(dir, `.${path.basename(outputPath)}.tmp-${process.pid}`);
  const content = `${JSON.stringify(doc, null, 2)}\n`;

  try {
    fs.mkdirSync(dir, { recursive: true });
    const fd = fs.openSync(tempPath, 'w');
    try {
      fs.writeFileSync(fd, content, 'utf-8');
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    fs.renameSync(tempPath, outputPath);
  } catch (error) {
    if (fs.existsSync(tempPath)) fs.rmSync(tempPath, { force: true });
    throw new PersistenceWriteError(outputPath, error);
  }
}

/**
 * Read and validate the store file. Returns null when the file does not exist;
 * anything unreadable as a store is reported as corrupt.
 */
export function readStoreFile(inputPath: string): StoreFile | null {
  if (!fs.existsSync(inputPath)) {
    return null;
  }

  const content = fs.readFileSync(inputPath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new PersistenceCorruptError(inputPath, `invalid JSON (${detail})`);
  }

  const parsed = StoreFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new PersistenceCorruptError(inputPath, `${issue?.message ?? 'invalid store'}${where}`);
  }
  return parsed.data;
}
