import { readFileSync } from 'node:fs'
import { resolve } from 'node:path'
import { projectRoot } from '@utils/project-root.js'
import { z } from 'zod'

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(resolve(projectRoot, 'package.json'), 'utf8')))

/** Application version from package.json */
export const APP_VERSION: string = packageJson.version

/**
 * User-Agent header for outbound requests to subscriber endpoints
 * Format: "xitter-notify/0.1.0"
 */
export const USER_AGENT = `xitter-notify/${APP_VERSION}`
