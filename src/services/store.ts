import { randomBytes } from 'crypto';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import path from 'path';
import type { z } from 'zod';

const isNotFound = (err: unknown) =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/**
 * Write-then-rename. The temp file lives next to the target so the rename
 * stays on one filesystem; readers see the old file or the new one.
 * Two concurrent writers to one path are not coordinated (last rename wins).
 */
export async function atomicSave(filePath: string, data: unknown): Promise<boolean> {
  const dir = path.dirname(filePath);
  const stem = path.basename(filePath, path.extname(filePath));
  const tmpPath = path.join(dir, `.${stem}_${randomBytes(6).toString('hex')}.tmp`);
  let handle: FileHandle | undefined;

  try {
    const payload = JSON.stringify(data, null, 2);
    if (payload === undefined) throw new TypeError('document is not JSON-serializable');

    await fs.mkdir(dir, { recursive: true });
    handle = await fs.open(tmpPath, 'wx');
    await handle.writeFile(payload, 'utf8');
    await handle.sync();
    await handle.close();
    handle = undefined;

    await fs.rename(tmpPath, filePath);
    return true;
  } catch (err) {
    console.error(`[store] save failed for ${filePath}`, err);
    if (handle) {
      await handle.close().catch((e: unknown) => console.error('[store] temp close failed', e));
    }
    await fs.rm(tmpPath, { force: true }).catch((e: unknown) => console.error('[store] temp cleanup failed', e));
    return false;
  }
}

/** Missing, unreadable or invalid documents resolve to `fallback`. */
export async function atomicLoad<T>(
  filePath: string,
  fallback: T,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): Promise<T> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (!isNotFound(err)) console.error(`[store] read failed for ${filePath}`, err);
    return fallback;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    console.error(`[store] invalid JSON in ${filePath}`, err);
    return fallback;
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    console.error(`[store] unexpected document shape in ${filePath}: ${result.error.message}`);
    return fallback;
  }
  return result.data;
}

export async function fileSize(filePath: string): Promise<number | undefined> {
  try {
    const stat = await fs.stat(filePath);
    return stat.size;
  } catch (err) {
    if (!isNotFound(err)) console.error(`[store] stat failed for ${filePath}`, err);
    return undefined;
  }
}
