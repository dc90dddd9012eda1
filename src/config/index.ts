/**
 * Configuration loading.
 *
 * Reads ~/.escrow-channel/config.json over DEFAULT_CONFIG, then applies
 * ESCROW_CHANNEL_* environment overrides.
 */

import { existsSync, readFileSync } from 'fs'
import { homedir } from 'os'
import { join } from 'path'
import type { SigningDomain } from '../channels/digest.js'
import type { ChannelLogger } from '../channels/types.js'

export interface DisputeConfig {
  /** How often the monitor sweeps for closable channels (milliseconds) */
  checkIntervalMs: number
  /** Submit the newest held state when a stale one is on record */
  autoRespond: boolean
  /** Close channels whose challenge period has elapsed */
  autoClose: boolean
}

export interface EscrowChannelConfig {
  domain: SigningDomain
  /** SQLite database path, or ':memory:' */
  dbPath: string
  dispute: DisputeConfig
}

export const DEFAULT_CONFIG: EscrowChannelConfig = {
  domain: {
    name: 'escrow-channel',
    version: '1',
    ledger: 'default'
  },
  dbPath: '~/.escrow-channel/channels.db',
  dispute: {
    checkIntervalMs: 60 * 1000,  // 1 minute
    autoRespond: true,
    autoClose: false             // Manual by default
  }
}

export function getDataDir(): string {
  return join(homedir(), '.escrow-channel')
}

type ConfigFile = {
  domain?: Partial<SigningDomain>
  dbPath?: string
  dispute?: Partial<DisputeConfig>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function pickString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key]
  return typeof value === 'string' ? value : undefined
}

function pickNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key]
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function pickBoolean(source: Record<string, unknown>, key: string): boolean | undefined {
  const value = source[key]
  return typeof value === 'boolean' ? value : undefined
}

/**
 * Keep only the fields of a parsed config file that have the right type
 */
export function parseConfigFile(data: unknown): ConfigFile {
  if (!isRecord(data)) return {}

  const file: ConfigFile = {}
  if (isRecord(data.domain)) {
    file.domain = {
      name: pickString(data.domain, 'name'),
      version: pickString(data.domain, 'version'),
      ledger: pickString(data.domain, 'ledger')
    }
  }
  file.dbPath = pickString(data, 'dbPath')
  if (isRecord(data.dispute)) {
    file.dispute = {
      checkIntervalMs: pickNumber(data.dispute, 'checkIntervalMs'),
      autoRespond: pickBoolean(data.dispute, 'autoRespond'),
      autoClose: pickBoolean(data.dispute, 'autoClose')
    }
  }
  return file
}

export function loadConfig(
  configPath: string = join(getDataDir(), 'config.json'),
  env: NodeJS.ProcessEnv = process.env,
  logger: ChannelLogger = console
): EscrowChannelConfig {
  let file: ConfigFile = {}

  if (existsSync(configPath)) {
    try {
      file = parseConfigFile(JSON.parse(readFileSync(configPath, 'utf-8')))
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      logger.warn(`[Config] Ignoring unreadable config ${configPath}: ${reason}`)
    }
  }

  const config: EscrowChannelConfig = {
    domain: {
      name: file.domain?.name ?? DEFAULT_CONFIG.domain.name,
      version: file.domain?.version ?? DEFAULT_CONFIG.domain.version,
      ledger: file.domain?.ledger ?? DEFAULT_CONFIG.domain.ledger
    },
    dbPath: file.dbPath ?? DEFAULT_CONFIG.dbPath,
    dispute: {
      checkIntervalMs: file.dispute?.checkIntervalMs ?? DEFAULT_CONFIG.dispute.checkIntervalMs,
      autoRespond: file.dispute?.autoRespond ?? DEFAULT_CONFIG.dispute.autoRespond,
      autoClose: file.dispute?.autoClose ?? DEFAULT_CONFIG.dispute.autoClose
    }
  }

  // Environment overrides
  if (env.ESCROW_CHANNEL_DB_PATH) {
    config.dbPath = env.ESCROW_CHANNEL_DB_PATH
  }
  if (env.ESCROW_CHANNEL_DOMAIN_NAME) {
    config.domain.name = env.ESCROW_CHANNEL_DOMAIN_NAME
  }
  if (env.ESCROW_CHANNEL_DOMAIN_VERSION) {
    config.domain.version = env.ESCROW_CHANNEL_DOMAIN_VERSION
  }
  if (env.ESCROW_CHANNEL_LEDGER) {
    config.domain.ledger = env.ESCROW_CHANNEL_LEDGER
  }

  return config
}
