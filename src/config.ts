// src/config.ts

/**
 * Centralized configuration for the router process: environment variables and constants.
 */

import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { SubtreeMatch } from '@addrnet/dto'
import { InvalidConfigurationError } from '@addrnet/reasons'
import { DEFAULT_ROOT_ADDRESS } from '@addrnet/router'

export const ENV_FILE_NAME = '.env.router'

// Load .env.router from the working directory if it exists; variables already set win.
export function loadEnvFile(dir: string = process.cwd()): boolean {
  const envPath = path.join(dir, ENV_FILE_NAME)
  if (!fs.existsSync(envPath)) return false
  dotenv.config({ path: envPath })
  return true
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export const RouterEnvSchema = z.object({
  ROUTER_ADDRESS: z.string().optional(),
  ROUTER_ROOT_ADDRESS: z.string().min(1).default(DEFAULT_ROOT_ADDRESS),
  ROUTER_SUBTREE_MATCH: z.nativeEnum(SubtreeMatch).default(SubtreeMatch.PREFIX),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
})

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface RouterConfig {
  routerAddress?: string
  rootAddress: string
  subtreeMatch: SubtreeMatch
  logLevel: LogLevel
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RouterConfig {
  const res = RouterEnvSchema.safeParse(env)
  if (!res.success) {
    const issue = res.error.issues[0]
    const field = issue ? String(issue.path[0]) : 'env'
    throw new InvalidConfigurationError(field, `Invalid configuration for [${field}]: ${issue?.message ?? res.error.message}`, false)
  }
  return {
    routerAddress: res.data.ROUTER_ADDRESS,
    rootAddress: res.data.ROUTER_ROOT_ADDRESS,
    subtreeMatch: res.data.ROUTER_SUBTREE_MATCH,
    logLevel: res.data.LOG_LEVEL,
  }
}
