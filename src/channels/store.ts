/**
 * Channel persistence interface and the in-memory store
 */

import type { Channel } from './types.js'

export interface ChannelStore {
  get(id: string): Channel | undefined
  /** Active channel for the pair and asset, in either role order */
  findByParties(agentX: string, agentY: string, asset: string): Channel | undefined
  insert(channel: Channel): void
  update(channel: Channel): void
  delete(id: string): void
  list(): Channel[]
}

/**
 * Registry index key. The pair is sorted so (A, B) and (B, A) collide.
 * Parts are JSON-encoded, so separators inside them stay distinct.
 */
export function pairKey(agentX: string, agentY: string, asset: string): string {
  const [first, second] = agentX < agentY ? [agentX, agentY] : [agentY, agentX]
  return JSON.stringify([first, second, asset])
}

export class MemoryChannelStore implements ChannelStore {
  private channels: Map<string, Channel> = new Map()
  private index: Map<string, string> = new Map()

  get(id: string): Channel | undefined {
    const channel = this.channels.get(id)
    return channel ? { ...channel } : undefined
  }

  findByParties(agentX: string, agentY: string, asset: string): Channel | undefined {
    const id = this.index.get(pairKey(agentX, agentY, asset))
    return id === undefined ? undefined : this.get(id)
  }

  insert(channel: Channel): void {
    const key = pairKey(channel.agentA, channel.agentB, channel.asset)
    if (this.channels.has(channel.id) || this.index.has(key)) {
      throw new Error(`Channel ${channel.id} conflicts with a stored channel`)
    }
    this.channels.set(channel.id, { ...channel })
    this.index.set(key, channel.id)
  }

  update(channel: Channel): void {
    if (!this.channels.has(channel.id)) {
      throw new Error(`Channel ${channel.id} not stored`)
    }
    this.channels.set(channel.id, { ...channel })
  }

  delete(id: string): void {
    const channel = this.channels.get(id)
    if (!channel) return
    this.index.delete(pairKey(channel.agentA, channel.agentB, channel.asset))
    this.channels.delete(id)
  }

  list(): Channel[] {
    return Array.from(this.channels.values()).map(c => ({ ...c }))
  }
}
