/**
 * Atomic file I/O for crash-safe snapshot writes
 *
 * Invariants:
 * - Writes are atomic: a table file is always the old or the new snapshot, never a partial one
 * - Temp files always reside in the same directory as target (same filesystem for atomic rename)
 * - Temp files are removed on failure paths
 * - Removes are idempotent
 *
 * Pattern: write → fsync → rename → fsync directory
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { StorageIOError } from "./errors.js";
import { logger } from "./observability/logs.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export async function ensureDirectory(dirPath: string): Promise<void> {
  try {
    await fs.mkdir(dirPath, { recursive: true });
  } catch (err) {
    throw new StorageIOError(dirPath, "mkdir", { cause: err });
  }
}

async function syncDirectory(dir: string): Promise<void> {
  try {
    const dirHandle = await fs.open(dir, "r");
    try {
      await dirHandle.sync();
    } finally {
      await dirHandle.close();
    }
  } catch (err) {
    // Some platforms cannot fsync a directory; the rename itself already happened
    const code = errnoCode(err);
    if (code !== "EINVAL" && code !== "ENOTSUP" && code !== "EBADF" && code !== "EISDIR") {
      logger.debug("io.dir_fsync_failed", { details: { dir, code } });
    }
  }
}

/**
 * Atomically replace a file's contents using write-rename-sync
 * @param filePath - Target file path
 * @param content - Bytes to write
 */
export async function atomicWriteBytes(filePath: string, content: Uint8Array): Promise<void> {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  await ensureDirectory(dir);

  let fileHandle: fs.FileHandle | null = null;

  try {
    fileHandle = await fs.open(tmp, "w", 0o600);
    await fileHandle.writeFile(content);

    try {
      await fileHandle.datasync();
    } catch (err) {
      // ENOTSUP/ENOSYS: not supported on this platform
      // EINVAL: some CIFS/FUSE mounts report this instead
      const code = errnoCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        await fileHandle.sync();
      } else {
        throw err;
      }
    }

    await fileHandle.close();
    fileHandle = null;

    await fs.rename(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      await syncDirectory(dir);
    }
  } catch (err) {
    if (fileHandle) {
      await fileHandle.close().catch((closeErr: unknown) => {
        logger.debug("io.tmp_close_failed", { details: { tmp, code: errnoCode(closeErr) } });
      });
    }

    await fs.unlink(tmp).catch((unlinkErr: unknown) => {
      // ENOENT: the temp file was never created or was already renamed
      if (errnoCode(unlinkErr) !== "ENOENT") {
        logger.warn("io.tmp_cleanup_failed", { details: { tmp, code: errnoCode(unlinkErr) } });
      }
    });

    throw new StorageIOError(filePath, "write", { cause: err });
  }
}

/**
 * Read a whole file
 * @returns File contents, or null if the file does not exist
 * @throws StorageIOError for other read failures
 */
export async function readBytes(filePath: string): Promise<Uint8Array | null> {
  try {
    return new Uint8Array(await fs.readFile(filePath));
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return null;
    }
    throw new StorageIOError(filePath, "read", { cause: err });
  }
}

/**
 * Remove a file (idempotent - no error if file doesn't exist)
 * @throws StorageIOError if removal fails for reasons other than file not found
 */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fs.unlink(filePath);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      return;
    }
    throw new StorageIOError(filePath, "remove", { cause: err });
  }
}

/**
 * List regular files in a directory with the given extension
 * @param dirPath - Directory path to list
 * @param extension - File extension to filter by (e.g., ".db")
 * @returns Sorted array of filenames (not full paths)
 * @throws StorageIOError if the directory cannot be read
 */
export async function listFiles(dirPath: string, extension: string): Promise<string[]> {
  const ext = extension.startsWith(".") ? extension : `.${extension}`;

  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith(ext))
      .map((entry) => entry.name)
      .sort();
  } catch (err) {
    throw new StorageIOError(dirPath, "list", { cause: err });
  }
}
