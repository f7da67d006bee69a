import { concat, isAddressEqual, recoverMessageAddress, size, slice, type Address, type Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { domainDigest } from "./hashing";

/**
 * Opaque "this message was approved by the quorum" oracle. Each instance is bound to one
 * application domain so a signature for one purpose never verifies for another.
 */
export interface SignatureVerifier {
  readonly domain: string;
  verify(message: Hex, signature: Hex): Promise<boolean>;
}

const SIGNATURE_SIZE = 65;

/**
 * k-of-n committee of ECDSA keys. The aggregate signature is the concatenation of member
 * signatures over the domain digest; each member counts once.
 */
export class QuorumSignatureVerifier implements SignatureVerifier {
  readonly domain: string;
  readonly threshold: number;
  private readonly members: Address[];

  constructor(domain: string, members: Address[], threshold: number) {
    if (members.length === 0) throw new Error("Quorum requires at least one member");
    if (!Number.isInteger(threshold) || threshold < 1 || threshold > members.length) {
      throw new Error(`Invalid quorum threshold ${threshold} for ${members.length} members`);
    }
    this.domain = domain;
    this.members = [...members];
    this.threshold = threshold;
  }

  async verify(message: Hex, signature: Hex): Promise<boolean> {
    const total = size(signature);
    if (total === 0 || total % SIGNATURE_SIZE !== 0) return false;

    const digest = domainDigest(this.domain, message);
    const approved = new Set<Address>();
    for (let offset = 0; offset < total; offset += SIGNATURE_SIZE) {
      const part = slice(signature, offset, offset + SIGNATURE_SIZE);
      let signer: Address;
      try {
        signer = await recoverMessageAddress({ message: { raw: digest }, signature: part });
      } catch {
        return false;
      }
      const member = this.members.find((candidate) => isAddressEqual(candidate, signer));
      if (!member) return false;
      approved.add(member);
    }
    return approved.size >= this.threshold;
  }
}

/** Produces the aggregate signature a {@link QuorumSignatureVerifier} accepts. */
export async function signQuorumMessage(domain: string, message: Hex, privateKeys: readonly Hex[]): Promise<Hex> {
  const digest = domainDigest(domain, message);
  const parts = await Promise.all(
    privateKeys.map((key) => privateKeyToAccount(key).signMessage({ message: { raw: digest } }))
  );
  return concat(parts);
}
