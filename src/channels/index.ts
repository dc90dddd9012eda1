export { ChannelManager, systemClock } from './manager.js'
export type { ChannelManagerConfig } from './manager.js'
export { ChannelStateMachine } from './state-machine.js'
export type { ChannelOperation } from './state-machine.js'
export {
  TypedDataDigester,
  DOMAIN_TYPE,
  STATE_TYPE,
  CLOSE_TYPE,
  domainSeparator,
  structHash,
  digestHex
} from './digest.js'
export type { SigningDomain, StateDigester, DigestKind } from './digest.js'
export { StateSigner, cosign, bsvSignatureVerifier } from './signer.js'
export { MemoryChannelStore } from './store.js'
export type { ChannelStore } from './store.js'
export { SqliteChannelStore } from './storage.js'
export { MemoryEscrowLedger } from './ledger.js'
export { DisputeMonitor } from './dispute-monitor.js'
export type { DisputeMonitorConfig, DisputeAlert } from './dispute-monitor.js'
export type * from './types.js'
