import {
  promises as fsp,
  existsSync,
  readFileSync,
} from 'fs'
import type { Stats, Dirent } from 'fs'
import { randomBytes } from 'crypto'
import tmp from 'tmp'
import { join, dirname } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats, Dirent }

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

// ── Reads ──────────────────────────────────────────────────────

/** Read a text file as UTF-8 string. Throws "File not found: <path>" on ENOENT. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** List directory contents. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectory(dirPath: string): Promise<string[]> {
  try {
    return await fsp.readdir(dirPath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/** List directory with Dirent objects. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectoryWithTypes(dirPath: string): Promise<Dirent[]> {
  try {
    return await fsp.readdir(dirPath, { withFileTypes: true })
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/**
 * Recursively list every regular file under `dirPath`, sorted by full path.
 * Hidden entries (dot-prefixed) are skipped.
 */
export async function listFilesRecursive(dirPath: string): Promise<string[]> {
  const files: string[] = []
  const entries = await listDirectoryWithTypes(dirPath)
  for (const entry of entries) {
    if (entry.name.startsWith('.')) continue
    const full = join(dirPath, entry.name)
    if (entry.isDirectory()) {
      files.push(...(await listFilesRecursive(full)))
    } else if (entry.isFile()) {
      files.push(full)
    }
  }
  return files.sort()
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.stat(filePath)
    return true
  } catch {
    return false
  }
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

// ── Writes ─────────────────────────────────────────────────────

/** Write text file. Creates parent dirs. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content.replace(/\0/g, ''), { encoding: 'utf-8' })
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/** Remove file (ignores ENOENT). */
export async function removeFile(filePath: string): Promise<void> {
  try {
    await fsp.unlink(filePath)
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

/** Remove directory. */
export async function removeDirectory(
  dirPath: string,
  opts?: { recursive?: boolean; force?: boolean },
): Promise<void> {
  try {
    await fsp.rm(dirPath, { recursive: opts?.recursive ?? false, force: opts?.force ?? false })
  } catch (err: unknown) {
    if (isNotFound(err)) return
    throw err
  }
}

// ── Atomic output ──────────────────────────────────────────────

/**
 * Sibling path for an in-progress write: `<final>.partial-<hex>`.
 * Never matches a finished file's name, so readers cannot pick it up.
 */
export function partialPathFor(finalPath: string): string {
  return `${finalPath}.partial-${randomBytes(4).toString('hex')}`
}

/**
 * Produce `finalPath` through a temporary sibling: `write` fills the partial
 * path, which is renamed into place only if `write` resolves. On any failure
 * the partial file is removed and the error rethrown.
 */
export async function writeAtomically<T>(
  finalPath: string,
  write: (partialPath: string) => Promise<T>,
): Promise<T> {
  await ensureDirectory(dirname(finalPath))
  const partial = partialPathFor(finalPath)
  try {
    const result = await write(partial)
    await fsp.rename(partial, finalPath)
    return result
  } catch (err: unknown) {
    await removeFile(partial)
    throw err
  }
}

// ── Temp Dir ───────────────────────────────────────────────────

/** Create a temporary directory with the given prefix. Caller is responsible for cleanup. */
export async function makeTempDir(prefix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    // mode 0o700 ensures only the owner can access the directory
    tmp.dir({ prefix, mode: 0o700 }, (err, path) => {
      if (err) reject(err)
      else resolve(path)
    })
  })
}

/** Run fn inside a temp directory, auto-cleanup on completion or error. */
export async function withTempDir<T>(prefix: string, fn: (tempDir: string) => Promise<T>): Promise<T> {
  const tempDir = await makeTempDir(prefix)
  try {
    return await fn(tempDir)
  } finally {
    await removeDirectory(tempDir, { recursive: true, force: true })
  }
}
