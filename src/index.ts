// Main exports for escrow-channel package

export * from './channels/index.js'

// Errors
export { ChannelError, isChannelError, friendlyError, formatError } from './errors.js'
export type { ChannelErrorCode, FriendlyError } from './errors.js'

// Configuration
export { loadConfig, DEFAULT_CONFIG, getDataDir } from './config/index.js'
export type { EscrowChannelConfig, DisputeConfig } from './config/index.js'
