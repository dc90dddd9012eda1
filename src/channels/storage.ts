/**
 * SQLite persistence layer for escrow channels
 */

import Database from 'better-sqlite3'
import { existsSync, mkdirSync } from 'fs'
import { dirname } from 'path'
import type { Channel, ChannelStatus } from './types.js'
import type { ChannelStore } from './store.js'
import { pairKey } from './store.js'

export interface ChannelRow {
  id: string
  pair_key: string
  agent_a: string
  agent_b: string
  asset: string
  deposit_a: string
  deposit_b: string
  balance_a: string
  balance_b: string
  status: string
  challenge_period: number
  nonce: string
  close_time: number | null
  challenger: string | null
  created_at: number
}

const STORED_STATUSES: ChannelStatus[] = ['Open', 'Joined', 'Challenge']

function parseStatus(value: string): ChannelStatus {
  const status = STORED_STATUSES.find(s => s === value)
  if (!status) {
    throw new Error(`Unknown channel status in database: ${value}`)
  }
  return status
}

export class SqliteChannelStore implements ChannelStore {
  private db: Database.Database

  constructor(dbPath: string = '~/.escrow-channel/channels.db') {
    if (dbPath === ':memory:') {
      this.db = new Database(dbPath)
    } else {
      // Expand ~ to home directory
      const expandedPath = dbPath.replace(/^~/, process.env.HOME || '')

      const dir = dirname(expandedPath)
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true })
      }

      this.db = new Database(expandedPath)
      this.db.pragma('journal_mode = WAL')
    }
    this.init()
  }

  private init(): void {
    // Amounts and nonces are TEXT: they exceed 2^53
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS channels (
        id TEXT PRIMARY KEY,
        pair_key TEXT NOT NULL UNIQUE,
        agent_a TEXT NOT NULL,
        agent_b TEXT NOT NULL,
        asset TEXT NOT NULL,
        deposit_a TEXT NOT NULL,
        deposit_b TEXT NOT NULL,
        balance_a TEXT NOT NULL,
        balance_b TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'Open',
        challenge_period INTEGER NOT NULL,
        nonce TEXT NOT NULL DEFAULT '0',
        close_time INTEGER,
        challenger TEXT,
        created_at INTEGER NOT NULL
      )
    `)

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_channels_status ON channels(status);
    `)
  }

  get(id: string): Channel | undefined {
    const row = this.db.prepare('SELECT * FROM channels WHERE id = ?').get(id) as ChannelRow | undefined
    return row ? this.rowToChannel(row) : undefined
  }

  findByParties(agentX: string, agentY: string, asset: string): Channel | undefined {
    const row = this.db
      .prepare('SELECT * FROM channels WHERE pair_key = ?')
      .get(pairKey(agentX, agentY, asset)) as ChannelRow | undefined
    return row ? this.rowToChannel(row) : undefined
  }

  insert(channel: Channel): void {
    this.db.prepare(`
      INSERT INTO channels (
        id, pair_key, agent_a, agent_b, asset, deposit_a, deposit_b, balance_a, balance_b,
        status, challenge_period, nonce, close_time, challenger, created_at
      ) VALUES (
        @id, @pair_key, @agent_a, @agent_b, @asset, @deposit_a, @deposit_b, @balance_a, @balance_b,
        @status, @challenge_period, @nonce, @close_time, @challenger, @created_at
      )
    `).run(this.channelToRow(channel))
  }

  update(channel: Channel): void {
    const result = this.db.prepare(`
      UPDATE channels SET
        deposit_b = @deposit_b,
        balance_a = @balance_a,
        balance_b = @balance_b,
        status = @status,
        nonce = @nonce,
        close_time = @close_time,
        challenger = @challenger
      WHERE id = @id
    `).run(this.channelToRow(channel))
    if (result.changes === 0) {
      throw new Error(`Channel ${channel.id} not stored`)
    }
  }

  delete(id: string): void {
    this.db.prepare('DELETE FROM channels WHERE id = ?').run(id)
  }

  list(): Channel[] {
    const rows = this.db.prepare('SELECT * FROM channels ORDER BY created_at').all() as ChannelRow[]
    return rows.map(row => this.rowToChannel(row))
  }

  /**
   * Close the database connection
   */
  close(): void {
    this.db.close()
  }

  private channelToRow(channel: Channel): ChannelRow {
    return {
      id: channel.id,
      pair_key: pairKey(channel.agentA, channel.agentB, channel.asset),
      agent_a: channel.agentA,
      agent_b: channel.agentB,
      asset: channel.asset,
      deposit_a: channel.depositA.toString(),
      deposit_b: channel.depositB.toString(),
      balance_a: channel.balanceA.toString(),
      balance_b: channel.balanceB.toString(),
      status: channel.status,
      challenge_period: channel.challengePeriod,
      nonce: channel.nonce.toString(),
      close_time: channel.closeTime ?? null,
      challenger: channel.challenger ?? null,
      created_at: channel.createdAt
    }
  }

  /**
   * Convert database row to Channel object
   */
  private rowToChannel(row: ChannelRow): Channel {
    return {
      id: row.id,
      agentA: row.agent_a,
      agentB: row.agent_b,
      asset: row.asset,
      depositA: BigInt(row.deposit_a),
      depositB: BigInt(row.deposit_b),
      balanceA: BigInt(row.balance_a),
      balanceB: BigInt(row.balance_b),
      status: parseStatus(row.status),
      challengePeriod: row.challenge_period,
      nonce: BigInt(row.nonce),
      closeTime: row.close_time ?? undefined,
      challenger: row.challenger ?? undefined,
      createdAt: row.created_at
    }
  }
}
