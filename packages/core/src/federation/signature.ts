/**
 * Federation Signatures
 * =====================
 *
 * Signed, verifiable federation messages. The default capability is
 * Ed25519 over SHA-256 of the canonical JSON; a node's id is its public
 * key in hex.
 */

import * as ed from '@noble/ed25519';
import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import { FederationMessage, NodeId } from '../types/index.js';
import { canonicalJson } from '../util/hash.js';

export interface SignatureCapability {
  readonly nodeId: NodeId;
  sign(bytes: Uint8Array): Promise<string>;
  verify(bytes: Uint8Array, signature: string, nodeId: NodeId): Promise<boolean>;
}

export type UnsignedMessage = Omit<FederationMessage, 'signature'>;

export function messageDigest(unsigned: UnsignedMessage): Uint8Array {
  return sha256(utf8ToBytes(canonicalJson(unsigned)));
}

export async function generateIdentity(): Promise<{
  publicKeyHex: string;
  privateKeyHex: string;
}> {
  const priv = ed.utils.randomPrivateKey();
  const pub = await ed.getPublicKey(priv);
  return {
    publicKeyHex: bytesToHex(pub),
    privateKeyHex: bytesToHex(priv),
  };
}

export class Ed25519Signer implements SignatureCapability {
  constructor(
    readonly nodeId: NodeId,
    private privateKeyHex: string
  ) {}

  /**
   * Fresh key pair; node id is the public key
   */
  static async generate(): Promise<Ed25519Signer> {
    const { publicKeyHex, privateKeyHex } = await generateIdentity();
    return new Ed25519Signer(publicKeyHex, privateKeyHex);
  }

  async sign(bytes: Uint8Array): Promise<string> {
    const sig = await ed.sign(bytes, hexToBytes(this.privateKeyHex));
    return bytesToHex(sig);
  }

  async verify(bytes: Uint8Array, signature: string, nodeId: NodeId): Promise<boolean> {
    try {
      return await ed.verify(hexToBytes(signature), bytes, hexToBytes(nodeId));
    } catch {
      // Malformed hex or key material
      return false;
    }
  }
}

export async function signMessage(
  unsigned: UnsignedMessage,
  signer: SignatureCapability
): Promise<FederationMessage> {
  const signature = await signer.sign(messageDigest(unsigned));
  return { ...unsigned, signature };
}

export async function verifyMessage(
  message: FederationMessage,
  verifier: SignatureCapability
): Promise<boolean> {
  const { signature, ...unsigned } = message;
  return verifier.verify(messageDigest(unsigned), signature, message.nodeId);
}
