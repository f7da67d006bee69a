import { getAddress, hashTypedData, isAddressEqual, recoverAddress, type Address, type Hex } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import type { Journaled, LedgerClock } from "./chain";
import { SettlementError } from "./errors";
import type { TokenLedger } from "./token-ledger";

export type SwapRequestWitness = {
  router: Address;
  tokenIn: Address;
  tokenOut: Address;
  amountIn: bigint;
  amountOut: bigint;
  solverFee: bigint;
  dstChainId: bigint;
  recipient: Address;
  additionalData: Hex;
};

export type RelayerWitness = {
  requestId: Hex;
  recipient: Address;
  additionalData: Hex;
};

export type PermitWitness =
  | { kind: "swap_request"; value: SwapRequestWitness }
  | { kind: "relayer"; value: RelayerWitness };

export type PermitWitnessTransfer = {
  owner: Address;
  token: Address;
  amount: bigint;
  spender: Address;
  nonce: bigint;
  deadline: bigint;
  witness: PermitWitness;
};

export type PermitDomain = {
  chainId: bigint;
  relay: Address;
};

const tokenPermissions = [
  { name: "token", type: "address" },
  { name: "amount", type: "uint256" }
] as const;

export const swapRequestWitnessTypes = {
  PermitWitnessTransferFrom: [
    { name: "permitted", type: "TokenPermissions" },
    { name: "spender", type: "address" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
    { name: "witness", type: "SwapRequestWitness" }
  ],
  TokenPermissions: tokenPermissions,
  SwapRequestWitness: [
    { name: "router", type: "address" },
    { name: "tokenIn", type: "address" },
    { name: "tokenOut", type: "address" },
    { name: "amountIn", type: "uint256" },
    { name: "amountOut", type: "uint256" },
    { name: "solverFee", type: "uint256" },
    { name: "dstChainId", type: "uint256" },
    { name: "recipient", type: "address" },
    { name: "additionalData", type: "bytes" }
  ]
} as const;

export const relayerWitnessTypes = {
  PermitWitnessTransferFrom: [
    { name: "permitted", type: "TokenPermissions" },
    { name: "spender", type: "address" },
    { name: "nonce", type: "uint256" },
    { name: "deadline", type: "uint256" },
    { name: "witness", type: "RelayerWitness" }
  ],
  TokenPermissions: tokenPermissions,
  RelayerWitness: [
    { name: "requestId", type: "bytes32" },
    { name: "recipient", type: "address" },
    { name: "additionalData", type: "bytes" }
  ]
} as const;

function typedDataDomain(domain: PermitDomain) {
  return { name: "Permit2", chainId: domain.chainId, verifyingContract: domain.relay } as const;
}

function permitMessage(transfer: PermitWitnessTransfer) {
  return {
    permitted: { token: transfer.token, amount: transfer.amount },
    spender: transfer.spender,
    nonce: transfer.nonce,
    deadline: transfer.deadline
  };
}

export function hashPermitWitnessTransfer(domain: PermitDomain, transfer: PermitWitnessTransfer): Hex {
  const witness = transfer.witness;
  if (witness.kind === "swap_request") {
    return hashTypedData({
      domain: typedDataDomain(domain),
      types: swapRequestWitnessTypes,
      primaryType: "PermitWitnessTransferFrom",
      message: { ...permitMessage(transfer), witness: witness.value }
    });
  }
  return hashTypedData({
    domain: typedDataDomain(domain),
    types: relayerWitnessTypes,
    primaryType: "PermitWitnessTransferFrom",
    message: { ...permitMessage(transfer), witness: witness.value }
  });
}

export async function signPermitWitnessTransfer(
  privateKey: Hex,
  domain: PermitDomain,
  transfer: PermitWitnessTransfer
): Promise<Hex> {
  const account = privateKeyToAccount(privateKey);
  const witness = transfer.witness;
  if (witness.kind === "swap_request") {
    return await account.signTypedData({
      domain: typedDataDomain(domain),
      types: swapRequestWitnessTypes,
      primaryType: "PermitWitnessTransferFrom",
      message: { ...permitMessage(transfer), witness: witness.value }
    });
  }
  return await account.signTypedData({
    domain: typedDataDomain(domain),
    types: relayerWitnessTypes,
    primaryType: "PermitWitnessTransferFrom",
    message: { ...permitMessage(transfer), witness: witness.value }
  });
}

/** Moves tokens on the strength of an owner's signed permit; each (owner, nonce) works once. */
export interface PermitTransferRelay {
  readonly address: Address;
  permitWitnessTransferFrom(caller: Address, transfer: PermitWitnessTransfer, to: Address, signature: Hex): Promise<void>;
}

export class PermitWitnessRelay implements PermitTransferRelay, Journaled {
  readonly address: Address;
  private readonly chainId: bigint;
  private readonly tokens: TokenLedger;
  private readonly clock: LedgerClock;
  private usedNonces = new Set<string>();

  constructor(options: { address: Address; chainId: bigint; tokens: TokenLedger; clock: LedgerClock }) {
    this.address = options.address;
    this.chainId = options.chainId;
    this.tokens = options.tokens;
    this.clock = options.clock;
  }

  checkpoint(): () => void {
    const saved = new Set(this.usedNonces);
    return () => {
      this.usedNonces = saved;
    };
  }

  isNonceUsed(owner: Address, nonce: bigint): boolean {
    return this.usedNonces.has(nonceKey(owner, nonce));
  }

  async permitWitnessTransferFrom(
    caller: Address,
    transfer: PermitWitnessTransfer,
    to: Address,
    signature: Hex
  ): Promise<void> {
    if (!isAddressEqual(caller, transfer.spender)) {
      throw new SettlementError("InvalidPermitSignature", { spender: transfer.spender, caller });
    }
    if (this.clock.now() > transfer.deadline) {
      throw new SettlementError("PermitExpired", { deadline: transfer.deadline });
    }
    const key = nonceKey(transfer.owner, transfer.nonce);
    if (this.usedNonces.has(key)) {
      throw new SettlementError("PermitNonceUsed", { owner: transfer.owner, nonce: transfer.nonce });
    }

    const digest = hashPermitWitnessTransfer({ chainId: this.chainId, relay: this.address }, transfer);
    let signer: Address;
    try {
      signer = await recoverAddress({ hash: digest, signature });
    } catch (error) {
      throw new SettlementError("InvalidPermitSignature", {
        owner: transfer.owner,
        reason: error instanceof Error ? error.message : String(error)
      });
    }
    if (!isAddressEqual(signer, transfer.owner)) {
      throw new SettlementError("InvalidPermitSignature", { owner: transfer.owner, signer });
    }

    this.usedNonces.add(key);
    // owners approve the relay once; authority for each transfer comes from the signature
    await this.tokens.transferFrom(transfer.token, this.address, transfer.owner, to, transfer.amount);
  }
}

function nonceKey(owner: Address, nonce: bigint): string {
  return `${getAddress(owner)}:${nonce.toString()}`;
}
