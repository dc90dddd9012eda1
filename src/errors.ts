/**
 * Channel errors.
 *
 * Every failed operation throws a ChannelError; the channel is left exactly
 * as it was before the call. friendlyError() turns a code into what happened,
 * why, and what to do about it.
 */

export type ChannelErrorCode =
  | 'InvalidParty'
  | 'InvalidChallenge'
  | 'InvalidAmount'
  | 'DuplicateChannel'
  | 'Unauthorized'
  | 'InvalidStatus'
  | 'AssetMismatch'
  | 'BalanceMismatch'
  | 'NonceTooLow'
  | 'InvalidSignature'
  | 'TransferFailed'
  | 'ChallengePeriodNotElapsed'
  | 'NotFound'

export class ChannelError extends Error {
  readonly code: ChannelErrorCode
  readonly channelId?: string

  constructor(code: ChannelErrorCode, message: string, options: { channelId?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'ChannelError'
    this.code = code
    this.channelId = options.channelId
  }
}

export function isChannelError(err: unknown, code?: ChannelErrorCode): err is ChannelError {
  return err instanceof ChannelError && (code === undefined || err.code === code)
}

export interface FriendlyError {
  code: ChannelErrorCode
  message: string
  cause: string
  fix: string
}

const errors: Record<ChannelErrorCode, (detail?: string) => FriendlyError> = {
  InvalidParty: (detail) => ({
    code: 'InvalidParty',
    message: 'A channel needs two distinct, non-empty parties.',
    cause: detail || 'The counterparty is empty or is the opener itself.',
    fix: [
      'Pass the counterparty identity (its public key)',
      'You cannot open a channel with yourself',
    ].join('\n  • '),
  }),

  InvalidChallenge: (detail) => ({
    code: 'InvalidChallenge',
    message: 'The challenge period must be a positive whole number.',
    cause: detail || 'A zero challenge period would let either party settle stale state instantly.',
    fix: 'Choose a challenge period long enough for the counterparty to respond to a dispute',
  }),

  InvalidAmount: (detail) => ({
    code: 'InvalidAmount',
    message: 'Amounts and balances cannot be negative.',
    cause: detail || 'A negative deposit or balance was supplied.',
    fix: 'Use a non-negative amount in the asset\'s base units',
  }),

  DuplicateChannel: (detail) => ({
    code: 'DuplicateChannel',
    message: 'A channel between these parties for this asset is already active.',
    cause: detail || 'Only one channel per pair and asset may be active at a time.',
    fix: [
      'Keep using the existing channel',
      'Or close it (challenge, then close after the period) before opening a new one',
    ].join('\n  • '),
  }),

  Unauthorized: (detail) => ({
    code: 'Unauthorized',
    message: 'Only the two channel parties may do this.',
    cause: detail || 'The caller is not a participant, or not the participant this step belongs to.',
    fix: 'Submit the call as agentA or agentB (only agentB can join)',
  }),

  InvalidStatus: (detail) => ({
    code: 'InvalidStatus',
    message: 'The channel is not in a state that allows this operation.',
    cause: detail || 'Transitions only move forward: Open → Joined → Challenge → Closed.',
    fix: 'Check the channel status with getChannel() before retrying',
  }),

  AssetMismatch: (detail) => ({
    code: 'AssetMismatch',
    message: 'The asset does not match the channel\'s asset.',
    cause: detail || 'The join deposit names a different asset than the opener escrowed.',
    fix: 'Join with the same asset the channel was opened with',
  }),

  BalanceMismatch: (detail) => ({
    code: 'BalanceMismatch',
    message: 'The new balances do not add up to the channel deposits.',
    cause: detail || 'balanceA + balanceB must equal depositA + depositB.',
    fix: 'Recompute the balances so that no funds are created or lost',
  }),

  NonceTooLow: (detail) => ({
    code: 'NonceTooLow',
    message: 'This state is not newer than the one already recorded.',
    cause: detail || 'An update is only accepted with a nonce above the stored nonce.',
    fix: 'Submit the latest co-signed state (a higher nonce)',
  }),

  InvalidSignature: (detail) => ({
    code: 'InvalidSignature',
    message: 'A required signature does not verify for its party.',
    cause: detail || 'The state was signed by someone else, or over different values or domain.',
    fix: [
      'Have both parties sign the exact state being submitted',
      'Check that both sides use the same signing domain (name, version, ledger)',
    ].join('\n  • '),
  }),

  TransferFailed: (detail) => ({
    code: 'TransferFailed',
    message: 'The escrow ledger refused a transfer.',
    cause: detail || 'The payer has insufficient funds, or the ledger is unavailable.',
    fix: [
      'Fund the account and retry',
      'No state was changed; the call can be resubmitted as is',
    ].join('\n  • '),
  }),

  ChallengePeriodNotElapsed: (detail) => ({
    code: 'ChallengePeriodNotElapsed',
    message: 'The challenge period has not ended yet.',
    cause: detail || 'Close is only possible strictly after closeTime.',
    fix: 'Wait until after the channel\'s closeTime, then retry close',
  }),

  NotFound: (detail) => ({
    code: 'NotFound',
    message: `Channel ${detail || '(unknown)'} not found.`,
    cause: 'The channel ID may be incorrect or the channel was already closed.',
    fix: [
      'List your channels: listChannels()',
      'Verify the channel ID',
    ].join('\n  • '),
  }),
}

/**
 * Get a user-friendly explanation for an error code.
 */
export function friendlyError(code: ChannelErrorCode, detail?: string): FriendlyError {
  return errors[code](detail)
}

/**
 * Format a FriendlyError for console output.
 */
export function formatError(err: FriendlyError): string {
  const lines = [
    `\n❌ ${err.message}`,
    ``,
    `  Why: ${err.cause}`,
    ``,
    `  Fix:`,
    `  • ${err.fix}`,
    ``,
  ]
  return lines.join('\n')
}
