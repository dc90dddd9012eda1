import { ChannelManager } from '../../../src/channels/manager.js'
import { MemoryEscrowLedger } from '../../../src/channels/ledger.js'
import { TypedDataDigester } from '../../../src/channels/digest.js'
import { StateSigner } from '../../../src/channels/signer.js'
import type { ChannelStore } from '../../../src/channels/store.js'
import type { ChannelLogger, Clock } from '../../../src/channels/types.js'
import { DEFAULT_CONFIG } from '../../../src/config/index.js'

// Test keys (well-known scalars 1, 2 and 3, never use for funds)
export const KEY_A = '0000000000000000000000000000000000000000000000000000000000000001'
export const KEY_B = '0000000000000000000000000000000000000000000000000000000000000002'
export const KEY_C = '0000000000000000000000000000000000000000000000000000000000000003'

export const PUBKEY_A = '0279be667ef9dcbbac55a06295ce870b07029bfcdb2dce28d959f2815b16f81798'
export const PUBKEY_B = '02c6047f9441ed7d6d3045406e95c07cd85c778e4b8cef3ca7abac09b95c709ee5'

export const ETHER = 10n ** 18n
export const ASSET = 'eth'
export const CHALLENGE_PERIOD = 6000

export const digester = new TypedDataDigester(DEFAULT_CONFIG.domain)
export const signerA = new StateSigner(KEY_A, digester)
export const signerB = new StateSigner(KEY_B, digester)
export const signerC = new StateSigner(KEY_C, digester)

export const silentLogger: ChannelLogger = {
  log: () => {},
  warn: () => {},
  error: () => {}
}

export class ManualClock implements Clock {
  constructor(public time: number = 1_700_000_000) {}

  now(): number {
    return this.time
  }

  advance(seconds: number): void {
    this.time += seconds
  }
}

export interface Harness {
  manager: ChannelManager
  ledger: MemoryEscrowLedger
  clock: ManualClock
  A: string
  B: string
  C: string
}

export function createHarness(options: { ledger?: MemoryEscrowLedger; store?: ChannelStore } = {}): Harness {
  const ledger = options.ledger ?? new MemoryEscrowLedger()
  const clock = new ManualClock()
  const A = signerA.identity
  const B = signerB.identity
  const C = signerC.identity
  for (const holder of [A, B, C]) {
    ledger.mint(holder, ASSET, 100n * ETHER)
  }
  const manager = new ChannelManager({
    ledger,
    clock,
    store: options.store,
    logger: silentLogger,
    domain: DEFAULT_CONFIG.domain
  })
  return { manager, ledger, clock, A, B, C }
}

/**
 * Ledger whose transfers can be made to fail per direction and party
 */
export class FlakyLedger extends MemoryEscrowLedger {
  failIn = new Set<string>()
  failOut = new Set<string>()
  throwOut = new Set<string>()

  async transferIn(payer: string, asset: string, amount: bigint): Promise<boolean> {
    if (this.failIn.has(payer)) return false
    return super.transferIn(payer, asset, amount)
  }

  async transferOut(payee: string, asset: string, amount: bigint): Promise<boolean> {
    if (this.throwOut.has(payee)) throw new Error('ledger unavailable')
    if (this.failOut.has(payee)) return false
    return super.transferOut(payee, asset, amount)
  }
}

/**
 * Open (10 ETH from A) and join (3 ETH from B)
 */
export async function openJoin(h: Harness, depositA = 10n * ETHER, depositB = 3n * ETHER): Promise<string> {
  const id = await h.manager.open(h.A, h.B, ASSET, depositA, CHALLENGE_PERIOD)
  await h.manager.join(h.B, id, ASSET, depositB)
  return id
}
