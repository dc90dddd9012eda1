/**
 * State-Update Validator
 *
 * Decides whether a claimed state may become the channel's canonical state.
 * Checks run in a fixed order: amounts, conservation, status, signatures.
 * Nonce freshness is left to the caller.
 */

import { ChannelError } from '../errors.js'
import { MAX_UINT256 } from './digest.js'
import type { DigestKind, StateDigester } from './digest.js'
import type { Channel, SignatureVerifier, SignedState } from './types.js'

export interface SignatureRequirements {
  requireSigA: boolean
  requireSigB: boolean
}

function inUint256(value: bigint): boolean {
  return value >= 0n && value <= MAX_UINT256
}

export class StateUpdateValidator {
  constructor(
    private digester: StateDigester,
    private verifier: SignatureVerifier
  ) {}

  /**
   * Bilateral form: both agents must have signed. The only entry point
   * the channel manager uses.
   */
  validateBilateral(channel: Channel, state: SignedState, kind: DigestKind = 'state'): void {
    this.validate(channel, state, { requireSigA: true, requireSigB: true }, kind)
  }

  /**
   * General form with independently toggleable signature requirements
   */
  validate(
    channel: Channel,
    state: SignedState,
    requirements: SignatureRequirements,
    kind: DigestKind = 'state'
  ): void {
    if (!inUint256(state.balanceA) || !inUint256(state.balanceB)) {
      throw new ChannelError(
        'InvalidAmount',
        `Balances must be within 0..2^256-1: ${state.balanceA}, ${state.balanceB}`,
        { channelId: channel.id }
      )
    }
    // A negative nonce is below every stored nonce
    if (state.nonce < 0n) {
      throw new ChannelError('NonceTooLow', `Nonce too low: ${state.nonce}`, { channelId: channel.id })
    }
    if (state.nonce > MAX_UINT256) {
      throw new ChannelError('InvalidAmount', `Nonce exceeds 2^256-1: ${state.nonce}`, { channelId: channel.id })
    }

    const total = state.balanceA + state.balanceB
    const deposits = channel.depositA + channel.depositB
    if (total !== deposits) {
      throw new ChannelError(
        'BalanceMismatch',
        `Invalid balances: ${total} != ${deposits}`,
        { channelId: channel.id }
      )
    }

    if (channel.status !== 'Joined' && channel.status !== 'Challenge') {
      throw new ChannelError(
        'InvalidStatus',
        `Cannot accept a state update in status ${channel.status}`,
        { channelId: channel.id }
      )
    }

    const digest = this.digestFor(channel, state, kind)

    if (requirements.requireSigA && !this.verifier.verify(digest, state.sigA, channel.agentA)) {
      throw new ChannelError('InvalidSignature', 'Signature A does not verify for agentA', { channelId: channel.id })
    }
    if (requirements.requireSigB && !this.verifier.verify(digest, state.sigB, channel.agentB)) {
      throw new ChannelError('InvalidSignature', 'Signature B does not verify for agentB', { channelId: channel.id })
    }
  }

  /**
   * Whether both agents signed the state. Balances, status and nonce
   * freshness are not checked.
   */
  hasBothSignatures(channel: Channel, state: SignedState, kind: DigestKind = 'state'): boolean {
    if (!inUint256(state.nonce) || !inUint256(state.balanceA) || !inUint256(state.balanceB)) {
      return false
    }
    const digest = this.digestFor(channel, state, kind)
    return this.verifier.verify(digest, state.sigA, channel.agentA) &&
      this.verifier.verify(digest, state.sigB, channel.agentB)
  }

  // The digest is bound to the stored channel, not to whatever id the caller sent
  private digestFor(channel: Channel, state: SignedState, kind: DigestKind): number[] {
    return this.digester.digest({
      channelId: channel.id,
      nonce: state.nonce,
      balanceA: state.balanceA,
      balanceB: state.balanceB
    }, kind)
  }
}
