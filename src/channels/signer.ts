/**
 * Off-channel signing and on-channel verification of state digests.
 *
 * Uses @bsv/sdk secp256k1 keys. Identities are compressed public keys (hex),
 * signatures are DER (hex).
 */

import { PrivateKey, PublicKey, Signature, Utils } from '@bsv/sdk'
import type { DigestKind, StateDigester } from './digest.js'
import type { SignatureVerifier, SignedState, UnsignedState } from './types.js'

export function signatureToHex(signature: Signature): string {
  const der = signature.toDER('hex')
  return typeof der === 'string' ? der : Utils.toHex(der)
}

/**
 * Default verifier: ECDSA over the digest with the claimed signer's public key.
 * Malformed keys or signatures never verify.
 */
export const bsvSignatureVerifier: SignatureVerifier = {
  verify(digest: number[], signature: string, claimedSigner: string): boolean {
    try {
      const publicKey = PublicKey.fromString(claimedSigner)
      return publicKey.verify(digest, Signature.fromDER(signature, 'hex'))
    } catch {
      return false
    }
  }
}

/**
 * Holds one agent's key and signs channel states the way the
 * channel manager verifies them
 */
export class StateSigner {
  private privateKey: PrivateKey
  readonly identity: string

  constructor(privateKeyHex: string, private digester: StateDigester) {
    this.privateKey = PrivateKey.fromHex(privateKeyHex)
    this.identity = this.privateKey.toPublicKey().toString()
  }

  sign(state: UnsignedState, kind: DigestKind = 'state'): string {
    return signatureToHex(this.privateKey.sign(this.digester.digest(state, kind)))
  }
}

/**
 * Collect both agents' signatures on a state
 */
export function cosign(
  state: UnsignedState,
  signerA: StateSigner,
  signerB: StateSigner,
  kind: DigestKind = 'state'
): SignedState {
  return {
    ...state,
    sigA: signerA.sign(state, kind),
    sigB: signerB.sign(state, kind)
  }
}
