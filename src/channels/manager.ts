/**
 * Escrow Channel Manager
 *
 * Runs the channel lifecycle on top of an escrow ledger:
 * - Opening and joining (deposits move into escrow)
 * - Accepting co-signed state updates
 * - Challenge, then close after the challenge period
 * - Cooperative close on a co-signed final state
 *
 * Operations are serialized. Each one completes fully or throws a
 * ChannelError with the channel and the ledger as they were.
 */

import { EventEmitter } from 'events'
import { ChannelError } from '../errors.js'
import { DEFAULT_CONFIG } from '../config/index.js'
import { TypedDataDigester } from './digest.js'
import type { DigestKind, SigningDomain, StateDigester } from './digest.js'
import { ChannelRegistry } from './registry.js'
import { SerialQueue } from './serial.js'
import { bsvSignatureVerifier } from './signer.js'
import { ChannelStateMachine } from './state-machine.js'
import { MemoryChannelStore } from './store.js'
import type { ChannelStore } from './store.js'
import type {
  Channel,
  ChannelLogger,
  ChannelManagerEvents,
  Clock,
  EscrowLedger,
  SignatureVerifier,
  SignedState
} from './types.js'
import { StateUpdateValidator } from './validator.js'

export interface ChannelManagerConfig {
  /** Custody of deposited funds */
  ledger: EscrowLedger
  /** Signing domain; ignored when a digester is given */
  domain?: SigningDomain
  digester?: StateDigester
  verifier?: SignatureVerifier
  clock?: Clock
  store?: ChannelStore
  logger?: ChannelLogger
}

/**
 * Unix time in seconds
 */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000)
}

interface TransferRecord {
  direction: 'in' | 'out'
  party: string
  asset: string
  amount: bigint
}

function short(id: string): string {
  return `${id.substring(0, 8)}...`
}

export class ChannelManager extends EventEmitter {
  private ledger: EscrowLedger
  private clock: Clock
  private logger: ChannelLogger
  private registry: ChannelRegistry
  private stateMachine = new ChannelStateMachine()
  private validator: StateUpdateValidator
  private queue = new SerialQueue()

  constructor(config: ChannelManagerConfig) {
    super()
    this.ledger = config.ledger
    this.clock = config.clock ?? systemClock
    this.logger = config.logger ?? console
    this.registry = new ChannelRegistry(config.store ?? new MemoryChannelStore())
    this.validator = new StateUpdateValidator(
      config.digester ?? new TypedDataDigester(config.domain ?? DEFAULT_CONFIG.domain),
      config.verifier ?? bsvSignatureVerifier
    )
  }

  /**
   * Open a channel, escrowing the opener's deposit
   */
  open(
    opener: string,
    counterparty: string,
    asset: string,
    amount: bigint,
    challengePeriod: number
  ): Promise<string> {
    return this.queue.run(async () => {
      const channel = this.registry.prepare(
        { opener, counterparty, asset, amount, challengePeriod },
        this.clock.now()
      )

      await this.withTransfers(channel.id, async (journal) => {
        await this.transfer(journal, channel.id, { direction: 'in', party: opener, asset, amount })
        this.registry.register(channel)
      })

      this.logger.log(`[ChannelManager] Opened channel ${short(channel.id)} (deposit ${amount} ${asset})`)
      this.notify('channel:open', {
        id: channel.id,
        agentA: channel.agentA,
        agentB: channel.agentB,
        asset: channel.asset,
        depositA: channel.depositA,
        challengePeriod: channel.challengePeriod
      })
      return channel.id
    })
  }

  /**
   * Counterparty joins with its own deposit
   */
  join(caller: string, channelId: string, asset: string, amount: bigint): Promise<Channel> {
    return this.queue.run(async () => {
      const channel = this.registry.lookup(channelId)
      this.stateMachine.authorize(channel, caller, 'join')

      if (asset !== channel.asset) {
        throw new ChannelError('AssetMismatch', `Channel holds ${channel.asset}, not ${asset}`, { channelId })
      }
      if (amount < 0n) {
        throw new ChannelError('InvalidAmount', `Deposit cannot be negative: ${amount}`, { channelId })
      }

      const joined: Channel = {
        ...channel,
        depositB: amount,
        balanceB: amount,
        status: this.stateMachine.transition(channel, 'Joined')
      }

      await this.withTransfers(channelId, async (journal) => {
        await this.transfer(journal, channelId, { direction: 'in', party: caller, asset, amount })
        this.registry.save(joined)
      })

      this.logger.log(`[ChannelManager] Channel ${short(channelId)} joined (deposit ${amount} ${asset})`)
      this.notify('channel:join', {
        id: joined.id,
        agentA: joined.agentA,
        agentB: joined.agentB,
        asset: joined.asset,
        depositA: joined.depositA,
        depositB: joined.depositB
      })
      return { ...joined }
    })
  }

  /**
   * Record a newer co-signed state
   */
  updateState(caller: string, state: SignedState): Promise<Channel> {
    return this.queue.run(() => {
      const channel = this.registry.lookup(state.channelId)
      this.stateMachine.authorize(channel, caller, 'updateState')
      this.validator.validateBilateral(channel, state)
      this.requireFresh(channel, state)

      const updated: Channel = {
        ...channel,
        balanceA: state.balanceA,
        balanceB: state.balanceB,
        nonce: state.nonce
      }
      this.registry.save(updated)

      this.logger.log(`[ChannelManager] Channel ${short(channel.id)} state updated (nonce ${state.nonce})`)
      this.notify('channel:update', {
        id: updated.id,
        nonce: updated.nonce,
        balanceA: updated.balanceA,
        balanceB: updated.balanceB
      })
      return { ...updated }
    })
  }

  /**
   * Start the dispute window. Returns the close time.
   */
  startChallenge(caller: string, channelId: string): Promise<number> {
    return this.queue.run(() => {
      const channel = this.registry.lookup(channelId)
      this.stateMachine.authorize(channel, caller, 'startChallenge')

      const closeTime = this.clock.now() + channel.challengePeriod
      this.registry.save({
        ...channel,
        status: this.stateMachine.transition(channel, 'Challenge'),
        closeTime,
        challenger: caller
      })

      this.logger.log(`[ChannelManager] Challenge started on ${short(channelId)}, closes after ${closeTime}`)
      this.notify('channel:challenge', { id: channelId, closeTime })
      return closeTime
    })
  }

  /**
   * Settle a challenged channel once its challenge period is over
   */
  close(caller: string, channelId: string): Promise<void> {
    return this.queue.run(async () => {
      const channel = this.registry.lookup(channelId)
      this.stateMachine.authorize(channel, caller, 'close')

      const now = this.clock.now()
      if (channel.closeTime === undefined || now <= channel.closeTime) {
        throw new ChannelError(
          'ChallengePeriodNotElapsed',
          `Channel ${short(channelId)} closes after ${channel.closeTime}, now ${now}`,
          { channelId }
        )
      }

      await this.settle(channel)
      this.notify('channel:close', { id: channelId })
    })
  }

  /**
   * Settle immediately on a final state both agents signed for closing
   */
  cooperativeClose(caller: string, state: SignedState): Promise<void> {
    return this.queue.run(async () => {
      const channel = this.registry.lookup(state.channelId)
      this.stateMachine.authorize(channel, caller, 'cooperativeClose')
      this.validator.validateBilateral(channel, state, 'close')
      this.requireFresh(channel, state)

      const final: Channel = {
        ...channel,
        balanceA: state.balanceA,
        balanceB: state.balanceB,
        nonce: state.nonce
      }
      await this.settle(final)

      this.notify('channel:update', {
        id: final.id,
        nonce: final.nonce,
        balanceA: final.balanceA,
        balanceB: final.balanceB
      })
      this.notify('channel:close', { id: final.id })
    })
  }

  /**
   * Get a channel by ID
   */
  getChannel(channelId: string): Channel {
    return this.registry.lookup(channelId)
  }

  /**
   * Active channel between two agents for an asset, in either role order
   */
  findChannel(agentX: string, agentY: string, asset: string): Channel | undefined {
    return this.registry.findActive(agentX, agentY, asset)
  }

  /**
   * Get all active channels
   */
  listChannels(): Channel[] {
    return this.registry.list()
  }

  /**
   * Whether both agents of the named channel signed the state, checked with
   * the same digester and verifier that updates go through. False for
   * unknown channels.
   */
  hasValidSignatures(state: SignedState, kind: DigestKind = 'state'): boolean {
    const channel = this.registry.find(state.channelId)
    return channel !== undefined && this.validator.hasBothSignatures(channel, state, kind)
  }

  private requireFresh(channel: Channel, state: SignedState): void {
    if (state.nonce <= channel.nonce) {
      throw new ChannelError(
        'NonceTooLow',
        `Nonce too low: ${state.nonce} <= ${channel.nonce}`,
        { channelId: channel.id }
      )
    }
  }

  /**
   * Pay out both balances and remove the record
   */
  private async settle(channel: Channel): Promise<void> {
    this.stateMachine.transition(channel, 'Closed')

    await this.withTransfers(channel.id, async (journal) => {
      await this.transfer(journal, channel.id, {
        direction: 'out', party: channel.agentA, asset: channel.asset, amount: channel.balanceA
      })
      await this.transfer(journal, channel.id, {
        direction: 'out', party: channel.agentB, asset: channel.asset, amount: channel.balanceB
      })
      this.registry.remove(channel.id)
    })

    this.logger.log(
      `[ChannelManager] Channel ${short(channel.id)} closed (A: ${channel.balanceA}, B: ${channel.balanceB})`
    )
  }

  /**
   * Run a step that moves funds. If it throws, every transfer it made is
   * reversed, newest first, before the error propagates.
   */
  private async withTransfers(
    channelId: string,
    step: (journal: TransferRecord[]) => Promise<void>
  ): Promise<void> {
    const journal: TransferRecord[] = []
    try {
      await step(journal)
    } catch (err) {
      await this.reverse(channelId, journal)
      throw err
    }
  }

  private async transfer(journal: TransferRecord[], channelId: string, record: TransferRecord): Promise<void> {
    // Zero amounts move nothing
    if (record.amount === 0n) return

    let ok: boolean
    try {
      ok = record.direction === 'in'
        ? await this.ledger.transferIn(record.party, record.asset, record.amount)
        : await this.ledger.transferOut(record.party, record.asset, record.amount)
    } catch (err) {
      throw new ChannelError(
        'TransferFailed',
        `Ledger error on transfer ${record.direction} of ${record.amount} ${record.asset}`,
        { channelId, cause: err }
      )
    }
    if (!ok) {
      throw new ChannelError(
        'TransferFailed',
        `Ledger refused transfer ${record.direction} of ${record.amount} ${record.asset}`,
        { channelId }
      )
    }
    journal.push(record)
  }

  private async reverse(channelId: string, journal: TransferRecord[]): Promise<void> {
    for (const record of [...journal].reverse()) {
      this.logger.warn(
        `[ChannelManager] Reversing transfer ${record.direction} of ${record.amount} ${record.asset} on ${short(channelId)}`
      )
      let reversed = false
      try {
        reversed = record.direction === 'in'
          ? await this.ledger.transferOut(record.party, record.asset, record.amount)
          : await this.ledger.transferIn(record.party, record.asset, record.amount)
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        this.logger.error(`[ChannelManager] Reversal threw: ${reason}`)
      }
      if (!reversed) {
        this.logger.error(
          `[ChannelManager] Could not reverse transfer ${record.direction} of ${record.amount} to ${record.party.substring(0, 16)}...`
        )
      }
    }
  }

  private notify<E extends keyof ChannelManagerEvents>(
    event: E,
    payload: Parameters<ChannelManagerEvents[E]>[0]
  ): void {
    // Each listener runs on its own; one that throws is logged and skipped
    for (const listener of this.rawListeners(event)) {
      try {
        listener.call(this, payload)
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err)
        this.logger.error(`[ChannelManager] Listener for ${event} failed: ${reason}`)
      }
    }
  }
}
