// Re-export all commonly used path functions
export { join, resolve, dirname, basename, extname, parse, sep, relative, normalize, isAbsolute } from 'path'
export { fileURLToPath } from 'url'

import { existsSync } from 'fs'
import { join, resolve, dirname, basename, extname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))

/**
 * Walk up from `startDir` until a directory containing `package.json` is found.
 * Throws if the filesystem root is reached without finding one.
 */
export function findRoot(startDir: string): string {
  let dir = resolve(startDir)
  while (true) {
    if (existsSync(join(dir, 'package.json'))) return dir
    const parent = dirname(dir)
    if (parent === dir) throw new Error(`Could not find project root from ${startDir}`)
    dir = parent
  }
}

let _cachedRoot: string | undefined

/** Get the project root directory. */
export function projectRoot(): string {
  if (!_cachedRoot) _cachedRoot = findRoot(__dirname)
  return _cachedRoot
}

/** File name without directory or extension: `/a/b/clip.final.mp4` → `clip.final`. */
export function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath))
}

/** Sibling of a directory with a suffix: `/in/clips` + `_cache` → `/in/clips_cache`. */
export function siblingDir(dirPath: string, suffix: string): string {
  const resolved = resolve(dirPath)
  return join(dirname(resolved), `${basename(resolved)}${suffix}`)
}
