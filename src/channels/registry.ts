/**
 * Channel Registry
 *
 * Owns channel records and the (pair, asset) index that keeps at most one
 * active channel per pair and asset. Funds are handled by the manager.
 */

import { Hash, Utils } from '@bsv/sdk'
import { ChannelError } from '../errors.js'
import type { ChannelStore } from './store.js'
import type { Channel } from './types.js'

export interface OpenParams {
  opener: string
  counterparty: string
  asset: string
  amount: bigint
  challengePeriod: number
}

function isNullIdentity(identity: string): boolean {
  return identity.trim().length === 0
}

export class ChannelRegistry {
  /** Disambiguates channels opened by the same pair within one clock tick */
  private sequence = 0

  constructor(private store: ChannelStore) {}

  /**
   * Validate an open request and build the record it would create.
   * Nothing is stored until register().
   */
  prepare(params: OpenParams, now: number): Channel {
    const { opener, counterparty, asset, amount, challengePeriod } = params

    if (isNullIdentity(opener) || isNullIdentity(counterparty)) {
      throw new ChannelError('InvalidParty', 'Parties must be non-empty identities')
    }
    if (opener === counterparty) {
      throw new ChannelError('InvalidParty', 'Cannot open a channel with yourself')
    }
    if (!Number.isSafeInteger(challengePeriod) || challengePeriod <= 0) {
      throw new ChannelError('InvalidChallenge', `Invalid challenge period: ${challengePeriod}`)
    }
    if (amount < 0n) {
      throw new ChannelError('InvalidAmount', `Deposit cannot be negative: ${amount}`)
    }

    const existing = this.store.findByParties(opener, counterparty, asset)
    if (existing) {
      throw new ChannelError(
        'DuplicateChannel',
        `Channel ${existing.id.slice(0, 8)}... already active for this pair and asset`,
        { channelId: existing.id }
      )
    }

    return {
      id: this.deriveId(opener, counterparty, now),
      agentA: opener,
      agentB: counterparty,
      asset,
      depositA: amount,
      depositB: 0n,
      balanceA: amount,
      balanceB: 0n,
      status: 'Open',
      challengePeriod,
      nonce: 0n,
      createdAt: now
    }
  }

  register(channel: Channel): void {
    this.store.insert(channel)
  }

  lookup(id: string): Channel {
    const channel = this.store.get(id)
    if (!channel) {
      throw new ChannelError('NotFound', `Channel ${id} not found`, { channelId: id })
    }
    return channel
  }

  find(id: string): Channel | undefined {
    return this.store.get(id)
  }

  findActive(agentX: string, agentY: string, asset: string): Channel | undefined {
    return this.store.findByParties(agentX, agentY, asset)
  }

  save(channel: Channel): void {
    this.store.update(channel)
  }

  /**
   * Delete the record and its index entry. Only settlement calls this.
   */
  remove(id: string): void {
    this.store.delete(id)
  }

  list(): Channel[] {
    return this.store.list()
  }

  private deriveId(opener: string, counterparty: string, timestamp: number): string {
    let id: string
    do {
      const seed = `${opener}:${counterparty}:${timestamp}:${this.sequence++}`
      id = Utils.toHex(Hash.sha256(Utils.toArray(seed, 'utf8')))
    } while (this.store.get(id))
    return id
  }
}
