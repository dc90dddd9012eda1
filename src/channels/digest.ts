/**
 * Structured-data digests for channel states
 *
 * Both agents sign the digest, never the raw fields. The layout follows
 * typed-data hashing: a domain separator plus a struct hash, joined under
 * the 0x19 0x01 prefix, all on SHA-256.
 *
 *   domainSeparator = H(H(DOMAIN_TYPE) || H(name) || H(version) || H(ledger))
 *   structHash      = H(H(TYPE) || channelId || u256(nonce) || u256(balanceA) || u256(balanceB))
 *   digest          = H(0x19 || 0x01 || domainSeparator || structHash)
 *
 * Wallets producing signatures must build exactly these bytes.
 */

import { Hash, Utils } from '@bsv/sdk'
import type { UnsignedState } from './types.js'

const { sha256 } = Hash

export const DOMAIN_TYPE = 'EscrowChannelDomain(string name,string version,string ledger)'
export const STATE_TYPE = 'ChannelState(bytes32 channelId,uint256 nonce,uint256 balanceA,uint256 balanceB)'
export const CLOSE_TYPE = 'ChannelClose(bytes32 channelId,uint256 nonce,uint256 balanceA,uint256 balanceB)'

export const MAX_UINT256 = (1n << 256n) - 1n

export interface SigningDomain {
  name: string
  version: string
  /** Identifies the escrow ledger the channel settles on */
  ledger: string
}

export type DigestKind = 'state' | 'close'

/**
 * Builds the bytes a party signs for a channel state
 */
export interface StateDigester {
  digest(state: UnsignedState, kind?: DigestKind): number[]
}

/**
 * Encode a non-negative integer as 32 big-endian bytes
 */
export function encodeUint256(value: bigint): number[] {
  if (value < 0n || value > MAX_UINT256) {
    throw new RangeError(`Value out of uint256 range: ${value}`)
  }
  const out = new Array<number>(32).fill(0)
  let v = value
  for (let i = 31; i >= 0 && v > 0n; i--) {
    out[i] = Number(v & 0xffn)
    v >>= 8n
  }
  return out
}

export function encodeBytes32(hex: string): number[] {
  if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
    throw new RangeError(`Expected 32 bytes of hex, got "${hex}"`)
  }
  return Utils.toArray(hex, 'hex')
}

function hashString(value: string): number[] {
  return sha256(Utils.toArray(value, 'utf8'))
}

export function domainSeparator(domain: SigningDomain): number[] {
  return sha256([
    ...hashString(DOMAIN_TYPE),
    ...hashString(domain.name),
    ...hashString(domain.version),
    ...hashString(domain.ledger)
  ])
}

export function structHash(state: UnsignedState, kind: DigestKind = 'state'): number[] {
  return sha256([
    ...hashString(kind === 'close' ? CLOSE_TYPE : STATE_TYPE),
    ...encodeBytes32(state.channelId),
    ...encodeUint256(state.nonce),
    ...encodeUint256(state.balanceA),
    ...encodeUint256(state.balanceB)
  ])
}

/**
 * The raw fingerprint, before typed-data wrapping. Never signed directly.
 */
export function stateFingerprint(state: UnsignedState): number[] {
  return [
    ...encodeBytes32(state.channelId),
    ...encodeUint256(state.nonce),
    ...encodeUint256(state.balanceA),
    ...encodeUint256(state.balanceB)
  ]
}

export class TypedDataDigester implements StateDigester {
  private readonly separator: number[]

  constructor(domain: SigningDomain) {
    this.separator = domainSeparator(domain)
  }

  digest(state: UnsignedState, kind: DigestKind = 'state'): number[] {
    return sha256([0x19, 0x01, ...this.separator, ...structHash(state, kind)])
  }
}

export function digestHex(digest: number[]): string {
  return Utils.toHex(digest)
}
