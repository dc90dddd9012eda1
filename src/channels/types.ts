/**
 * Escrow Channel Types
 *
 * A channel locks collateral from two agents into a shared escrow.
 * Balances move off-channel through co-signed state updates; only
 * open, join, dispute and settlement touch the escrow ledger.
 */

export type ChannelStatus =
  | 'Open'        // Opener deposited, waiting for counterparty to join
  | 'Joined'      // Both deposits locked, updates accepted
  | 'Challenge'   // Dispute window running, closes after closeTime
  | 'Closed'      // Settled. Records in this state are removed, never stored

export interface Channel {
  /** 256-bit channel identifier (64 hex chars) */
  id: string

  /** Opener identity (compressed public key hex) */
  agentA: string

  /** Counterparty identity */
  agentB: string

  /** Identifier of the escrowed value unit */
  asset: string

  depositA: bigint
  depositB: bigint

  /** Current settlement amounts */
  balanceA: bigint
  balanceB: bigint

  status: ChannelStatus

  /** Dispute window length, in clock units */
  challengePeriod: number

  /** Nonce of the last accepted state update */
  nonce: bigint

  /** Set when the channel enters Challenge */
  closeTime?: number

  /** Identity that started the challenge */
  challenger?: string

  /** Clock reading at open */
  createdAt: number
}

/**
 * A balance update as both agents signed it off-channel
 */
export interface SignedState {
  channelId: string
  nonce: bigint
  balanceA: bigint
  balanceB: bigint
  /** DER signature (hex) from agentA */
  sigA: string
  /** DER signature (hex) from agentB */
  sigB: string
}

export type UnsignedState = Omit<SignedState, 'sigA' | 'sigB'>

// ============================================================
// External collaborators
// ============================================================

/**
 * Value custody. Each call is all-or-nothing; false means nothing moved.
 */
export interface EscrowLedger {
  transferIn(payer: string, asset: string, amount: bigint): Promise<boolean>
  transferOut(payee: string, asset: string, amount: bigint): Promise<boolean>
}

export interface SignatureVerifier {
  verify(digest: number[], signature: string, claimedSigner: string): boolean
}

/**
 * Non-decreasing time source shared by both agents
 */
export interface Clock {
  now(): number
}

export type ChannelLogger = Pick<Console, 'log' | 'warn' | 'error'>

// ============================================================
// Notifications
// ============================================================

export interface ChannelOpenEvent {
  id: string
  agentA: string
  agentB: string
  asset: string
  depositA: bigint
  challengePeriod: number
}

export interface ChannelJoinEvent {
  id: string
  agentA: string
  agentB: string
  asset: string
  depositA: bigint
  depositB: bigint
}

export interface ChannelUpdateStateEvent {
  id: string
  nonce: bigint
  balanceA: bigint
  balanceB: bigint
}

export interface ChannelChallengeEvent {
  id: string
  closeTime: number
}

export interface ChannelCloseEvent {
  id: string
}

export interface ChannelManagerEvents {
  'channel:open': (event: ChannelOpenEvent) => void
  'channel:join': (event: ChannelJoinEvent) => void
  'channel:update': (event: ChannelUpdateStateEvent) => void
  'channel:challenge': (event: ChannelChallengeEvent) => void
  'channel:close': (event: ChannelCloseEvent) => void
}
