/**
 * Channel State Machine
 *
 * Every transition goes through authorize() before anything is mutated:
 * caller check first, then status check.
 */

import { ChannelError } from '../errors.js'
import type { Channel, ChannelStatus } from './types.js'

export type ChannelOperation =
  | 'join'
  | 'updateState'
  | 'startChallenge'
  | 'close'
  | 'cooperativeClose'

/**
 * Valid status transitions. Nothing ever moves backwards.
 */
const VALID_TRANSITIONS: Record<ChannelStatus, ChannelStatus[]> = {
  Open: ['Joined', 'Challenge'],
  Joined: ['Challenge', 'Closed'],
  Challenge: ['Closed'],
  Closed: []  // Terminal state
}

interface OperationRule {
  /** Statuses the channel must be in */
  from: ChannelStatus[]
  /** Who may call: both agents, or agentB only */
  callers: 'parties' | 'agentB'
}

const OPERATION_RULES: Record<ChannelOperation, OperationRule> = {
  join: { from: ['Open'], callers: 'agentB' },
  updateState: { from: ['Joined', 'Challenge'], callers: 'parties' },
  startChallenge: { from: ['Open', 'Joined'], callers: 'parties' },
  close: { from: ['Challenge'], callers: 'parties' },
  cooperativeClose: { from: ['Joined', 'Challenge'], callers: 'parties' }
}

export class ChannelStateMachine {
  /**
   * Check if a status transition is valid
   */
  canTransition(from: ChannelStatus, to: ChannelStatus): boolean {
    return VALID_TRANSITIONS[from].includes(to)
  }

  isParty(channel: Channel, caller: string): boolean {
    return caller === channel.agentA || caller === channel.agentB
  }

  /**
   * Throws Unauthorized or InvalidStatus unless the caller may run
   * the operation on the channel as it is now
   */
  authorize(channel: Channel, caller: string, operation: ChannelOperation): void {
    const rule = OPERATION_RULES[operation]

    const allowed = rule.callers === 'agentB'
      ? caller === channel.agentB
      : this.isParty(channel, caller)
    if (!allowed) {
      throw new ChannelError(
        'Unauthorized',
        `${caller.slice(0, 16)}... may not ${operation} channel ${channel.id.slice(0, 8)}...`,
        { channelId: channel.id }
      )
    }

    this.requireStatus(channel, operation)
  }

  requireStatus(channel: Channel, operation: ChannelOperation): void {
    if (!OPERATION_RULES[operation].from.includes(channel.status)) {
      throw new ChannelError(
        'InvalidStatus',
        `Cannot ${operation} channel in status ${channel.status}`,
        { channelId: channel.id }
      )
    }
  }

  /**
   * Return the next status, throwing if the edge is not in the table
   */
  transition(channel: Channel, to: ChannelStatus): ChannelStatus {
    if (!this.canTransition(channel.status, to)) {
      throw new ChannelError(
        'InvalidStatus',
        `Invalid transition: ${channel.status} -> ${to}`,
        { channelId: channel.id }
      )
    }
    return to
  }
}
