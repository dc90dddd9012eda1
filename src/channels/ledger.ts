/**
 * In-process escrow ledger.
 *
 * Tracks spendable funds per (holder, asset) and the amount held in escrow per
 * asset. transferIn moves funds from a holder into escrow; transferOut pays out
 * of escrow. Both are all-or-nothing.
 */

import type { EscrowLedger } from './types.js'

export class MemoryEscrowLedger implements EscrowLedger {
  private accounts: Map<string, bigint> = new Map()
  private escrow: Map<string, bigint> = new Map()

  private key(holder: string, asset: string): string {
    return `${holder}:${asset}`
  }

  /**
   * Credit a holder's spendable funds
   */
  mint(holder: string, asset: string, amount: bigint): void {
    const key = this.key(holder, asset)
    this.accounts.set(key, (this.accounts.get(key) ?? 0n) + amount)
  }

  balanceOf(holder: string, asset: string): bigint {
    return this.accounts.get(this.key(holder, asset)) ?? 0n
  }

  escrowed(asset: string): bigint {
    return this.escrow.get(asset) ?? 0n
  }

  async transferIn(payer: string, asset: string, amount: bigint): Promise<boolean> {
    const key = this.key(payer, asset)
    const available = this.accounts.get(key) ?? 0n
    if (amount < 0n || amount > available) return false

    this.accounts.set(key, available - amount)
    this.escrow.set(asset, this.escrowed(asset) + amount)
    return true
  }

  async transferOut(payee: string, asset: string, amount: bigint): Promise<boolean> {
    const held = this.escrowed(asset)
    if (amount < 0n || amount > held) return false

    this.escrow.set(asset, held - amount)
    this.mint(payee, asset, amount)
    return true
  }
}
