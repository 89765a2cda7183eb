import { existsSync } from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

/**
 * Directory holding package.json. Sources run from src/utils and builds
 * from dist/src/utils, so the nearest ancestor with a package.json wins.
 */
function findProjectRoot(start: string): string {
  let dir = start
  while (!existsSync(resolve(dir, 'package.json'))) {
    const parent = dirname(dir)
    if (parent === dir) return resolve(start, '..', '..')
    dir = parent
  }
  return dir
}

export const projectRoot = findProjectRoot(
  dirname(fileURLToPath(import.meta.url)),
)
