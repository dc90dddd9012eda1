/**
 * Dispute Monitor
 *
 * Watches channels on behalf of one party. The party hands every co-signed
 * state it receives to registerState(); the monitor keeps the newest one per
 * channel. If the counterparty starts a challenge while an older state is on
 * record, the monitor raises a dispute and (with autoRespond) submits the
 * newer state before the challenge period runs out.
 *
 * With autoClose, a periodic sweep also settles channels whose challenge
 * period has elapsed, so an honest party recovers funds without the
 * counterparty.
 */

import { EventEmitter } from 'events'
import { isChannelError } from '../errors.js'
import { DEFAULT_CONFIG } from '../config/index.js'
import type { DisputeConfig } from '../config/index.js'
import { ChannelManager, systemClock } from './manager.js'
import type {
  Channel,
  ChannelChallengeEvent,
  ChannelCloseEvent,
  ChannelLogger,
  ChannelUpdateStateEvent,
  Clock,
  SignedState
} from './types.js'

export interface DisputeMonitorConfig extends Partial<DisputeConfig> {
  /** The party this monitor acts for */
  identity: string
  clock?: Clock
  logger?: ChannelLogger
}

export interface DisputeAlert {
  channelId: string
  detectedAt: number
  /** Nonce currently recorded on the channel */
  recordedNonce: bigint
  /** Nonce of the newest state we hold */
  heldNonce: bigint
  closeTime?: number
  /** Whether the challenge window is still open */
  canRespond: boolean
}

function short(id: string): string {
  return `${id.substring(0, 8)}...`
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export class DisputeMonitor extends EventEmitter {
  private config: DisputeConfig
  private identity: string
  private clock: Clock
  private logger: ChannelLogger
  private heldStates: Map<string, SignedState> = new Map()
  private activeDisputes: Map<string, DisputeAlert> = new Map()
  private checkTimer: NodeJS.Timeout | null = null

  constructor(private manager: ChannelManager, config: DisputeMonitorConfig) {
    super()
    this.identity = config.identity
    this.clock = config.clock ?? systemClock
    this.logger = config.logger ?? console
    this.config = {
      checkIntervalMs: config.checkIntervalMs ?? DEFAULT_CONFIG.dispute.checkIntervalMs,
      autoRespond: config.autoRespond ?? DEFAULT_CONFIG.dispute.autoRespond,
      autoClose: config.autoClose ?? DEFAULT_CONFIG.dispute.autoClose
    }
  }

  /**
   * Subscribe to channel events and start the periodic sweep
   */
  start(): void {
    if (this.checkTimer) return

    this.manager.on('channel:challenge', this.onChallenge)
    this.manager.on('channel:update', this.onUpdate)
    this.manager.on('channel:close', this.onClose)

    this.checkTimer = setInterval(() => {
      this.sweep().catch(err => {
        this.logger.error('[DisputeMonitor] Sweep failed:', describe(err))
      })
    }, this.config.checkIntervalMs)

    this.logger.log(`[DisputeMonitor] Started (interval: ${this.config.checkIntervalMs}ms)`)
  }

  /**
   * Stop monitoring
   */
  stop(): void {
    if (!this.checkTimer) return

    clearInterval(this.checkTimer)
    this.checkTimer = null
    this.manager.off('channel:challenge', this.onChallenge)
    this.manager.off('channel:update', this.onUpdate)
    this.manager.off('channel:close', this.onClose)
    this.logger.log('[DisputeMonitor] Stopped')
  }

  /**
   * Keep a co-signed state if both agents' signatures verify and it is
   * newer than the one held. Returns whether it was kept.
   */
  registerState(state: SignedState): boolean {
    const held = this.heldStates.get(state.channelId)
    if (held && held.nonce >= state.nonce) return false

    if (!this.manager.hasValidSignatures(state)) {
      this.logger.warn(`[DisputeMonitor] Ignoring state for ${short(state.channelId)} (nonce ${state.nonce}): signatures do not verify`)
      return false
    }

    this.heldStates.set(state.channelId, { ...state })
    return true
  }

  getHeldState(channelId: string): SignedState | undefined {
    return this.heldStates.get(channelId)
  }

  /**
   * Compare the recorded state of a challenged channel with the held one
   */
  async checkChannel(channelId: string): Promise<DisputeAlert | null> {
    const held = this.heldStates.get(channelId)
    if (!held) return null

    let channel: Channel
    try {
      channel = this.manager.getChannel(channelId)
    } catch (err) {
      if (isChannelError(err, 'NotFound')) {
        this.forget(channelId)
        return null
      }
      throw err
    }

    if (channel.status !== 'Challenge' || held.nonce <= channel.nonce) {
      return null
    }

    const now = this.clock.now()
    const alert: DisputeAlert = {
      channelId,
      detectedAt: now,
      recordedNonce: channel.nonce,
      heldNonce: held.nonce,
      closeTime: channel.closeTime,
      canRespond: channel.closeTime === undefined || now <= channel.closeTime
    }

    this.activeDisputes.set(channelId, alert)
    this.emit('dispute', alert)

    this.logger.error(`[DisputeMonitor] 🚨 DISPUTE DETECTED!`)
    this.logger.error(`  Channel: ${channelId}`)
    this.logger.error(`  Recorded nonce: ${channel.nonce}`)
    this.logger.error(`  Held nonce: ${held.nonce}`)

    if (this.config.autoRespond && alert.canRespond) {
      await this.resolveDispute(channelId)
    }
    return alert
  }

  /**
   * Submit the held state for a channel in dispute
   */
  async resolveDispute(channelId: string): Promise<Channel> {
    const dispute = this.activeDisputes.get(channelId)
    if (!dispute) {
      throw new Error(`No active dispute for channel ${channelId}`)
    }
    const held = this.heldStates.get(channelId)
    if (!held) {
      throw new Error(`No held state for channel ${channelId}`)
    }

    this.logger.log(`[DisputeMonitor] Resolving dispute for ${short(channelId)} (nonce ${held.nonce})`)
    const channel = await this.manager.updateState(this.identity, held)

    this.activeDisputes.delete(channelId)
    this.emit('dispute_resolved', { channelId, nonce: channel.nonce })
    return channel
  }

  /**
   * Check every challenged channel we are party to; settle the elapsed
   * ones when autoClose is on
   */
  async sweep(): Promise<void> {
    const challenged = this.manager.listChannels().filter(
      c => c.status === 'Challenge' && (c.agentA === this.identity || c.agentB === this.identity)
    )

    for (const channel of challenged) {
      try {
        await this.checkChannel(channel.id)
        const now = this.clock.now()
        if (this.config.autoClose && channel.closeTime !== undefined && now > channel.closeTime) {
          await this.manager.close(this.identity, channel.id)
          this.emit('settled', { channelId: channel.id })
        }
      } catch (err) {
        this.logger.error(`[DisputeMonitor] Error checking channel ${short(channel.id)}:`, describe(err))
      }
    }
  }

  /**
   * Get all active disputes
   */
  getActiveDisputes(): DisputeAlert[] {
    return Array.from(this.activeDisputes.values())
  }

  getDisputeForChannel(channelId: string): DisputeAlert | undefined {
    return this.activeDisputes.get(channelId)
  }

  getStats(): {
    heldStates: number
    activeDisputes: number
    running: boolean
  } {
    return {
      heldStates: this.heldStates.size,
      activeDisputes: this.activeDisputes.size,
      running: this.checkTimer !== null
    }
  }

  private onChallenge = (event: ChannelChallengeEvent): void => {
    this.check(event.id)
  }

  private onUpdate = (event: ChannelUpdateStateEvent): void => {
    const held = this.heldStates.get(event.id)
    if (held && held.nonce > event.nonce) {
      this.check(event.id)
    } else {
      this.activeDisputes.delete(event.id)
    }
  }

  private onClose = (event: ChannelCloseEvent): void => {
    this.forget(event.id)
  }

  private check(channelId: string): void {
    this.checkChannel(channelId).catch(err => {
      this.logger.error(`[DisputeMonitor] Error checking channel ${short(channelId)}:`, describe(err))
    })
  }

  private forget(channelId: string): void {
    this.heldStates.delete(channelId)
    this.activeDisputes.delete(channelId)
  }
}
