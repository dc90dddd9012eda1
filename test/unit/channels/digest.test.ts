import { describe, it, expect } from 'vitest'
import {
  TypedDataDigester,
  digestHex,
  domainSeparator,
  encodeBytes32,
  encodeUint256,
  stateFingerprint,
  structHash
} from '../../../src/channels/digest.js'
import type { UnsignedState } from '../../../src/channels/types.js'

const domain = { name: 'escrow-channel', version: '1', ledger: 'default' }

const update: UnsignedState = {
  channelId: 'ab'.repeat(32),
  nonce: 1n,
  balanceA: 9n * 10n ** 18n,
  balanceB: 4n * 10n ** 18n
}

describe('digest', () => {
  describe('encodeUint256', () => {
    it('should encode big-endian in 32 bytes', () => {
      const encoded = encodeUint256(0x0102n)
      expect(encoded).toHaveLength(32)
      expect(encoded.slice(0, 30).every(b => b === 0)).toBe(true)
      expect(encoded[30]).toBe(0x01)
      expect(encoded[31]).toBe(0x02)
    })

    it('should encode zero as all zero bytes', () => {
      expect(encodeUint256(0n)).toEqual(new Array<number>(32).fill(0))
    })

    it('should encode the maximum value', () => {
      expect(encodeUint256((1n << 256n) - 1n)).toEqual(new Array<number>(32).fill(0xff))
    })

    it('should reject values outside uint256', () => {
      expect(() => encodeUint256(-1n)).toThrow(RangeError)
      expect(() => encodeUint256(1n << 256n)).toThrow(RangeError)
    })
  })

  describe('encodeBytes32', () => {
    it('should decode 64 hex characters', () => {
      expect(encodeBytes32('ab'.repeat(32))).toEqual(new Array<number>(32).fill(0xab))
    })

    it('should reject anything else', () => {
      expect(() => encodeBytes32('abcd')).toThrow(RangeError)
      expect(() => encodeBytes32('zz'.repeat(32))).toThrow(RangeError)
    })
  })

  describe('typed-data layout', () => {
    it('should compute the domain separator', () => {
      expect(digestHex(domainSeparator(domain))).toBe(
        '2166f6f7f695c8c1fe9d26dae0e01faa962dfe1ca1e1bb560ac92280c83f541d'
      )
    })

    it('should compute the state struct hash', () => {
      expect(digestHex(structHash(update))).toBe(
        'b21459d83c94a2b09e4978b47842d94c24e09f95dbe6ad0531c9598e1b4738bc'
      )
    })

    it('should compute the state digest', () => {
      const digester = new TypedDataDigester(domain)
      expect(digestHex(digester.digest(update))).toBe(
        'd02a7fb185a781edb3cf32a10102eb9b93b001d8cc13037d04296ef12b8fd523'
      )
    })

    it('should compute a different digest for closing', () => {
      const digester = new TypedDataDigester(domain)
      expect(digestHex(digester.digest(update, 'close'))).toBe(
        '9e897ae8c959fcc0c8be13b4d82a0bd525efd08a3892bf2d1a12a8cb5e77679d'
      )
    })

    it('should bind the digest to the ledger', () => {
      const digester = new TypedDataDigester({ ...domain, ledger: 'other' })
      expect(digestHex(digester.digest(update))).toBe(
        '7427bdb21f7721072b3f5397f5469a19a6ef657a5fff385ade8390280cfddc67'
      )
    })

    it('should change with every field', () => {
      const digester = new TypedDataDigester(domain)
      const base = digestHex(digester.digest(update))

      expect(digestHex(digester.digest({ ...update, nonce: 2n }))).not.toBe(base)
      expect(digestHex(digester.digest({ ...update, balanceA: update.balanceB, balanceB: update.balanceA }))).not.toBe(base)
      expect(digestHex(digester.digest({ ...update, channelId: 'cd'.repeat(32) }))).not.toBe(base)
    })
  })

  describe('stateFingerprint', () => {
    it('should concatenate the encoded fields', () => {
      const fingerprint = stateFingerprint(update)
      expect(fingerprint).toHaveLength(128)
      expect(fingerprint.slice(0, 32)).toEqual(new Array<number>(32).fill(0xab))
      expect(fingerprint[63]).toBe(1)
    })
  })
})
