import { getAddress, keccak256, slice, stringToHex, type Address } from "viem";
import { ContractRegistry, LedgerChain, SystemClock, type LedgerClock } from "./chain";
import type { RouterEvent } from "./events";
import { CONTRACT_UPGRADE_DOMAIN, SWAP_REQUEST_DOMAIN } from "./hashing";
import { InProcessHookGateway, type HookGateway } from "./hooks";
import { PermitWitnessRelay, type PermitTransferRelay } from "./permit";
import { RouterProxy } from "./proxy";
import { SwapRouterLogic } from "./router";
import { InMemoryTokenLedger } from "./token-ledger";
import { QuorumSignatureVerifier, type SignatureVerifier } from "./verifier";

export type CommitteeConfig = {
  members: Address[];
  threshold: number;
};

export type LedgerDeploymentOptions = {
  chainId: bigint;
  owner: Address;
  verificationFeeBps: bigint;
  swapCommittee: CommitteeConfig;
  upgradeCommittee: CommitteeConfig;
  version?: string;
  clock?: LedgerClock;
};

export type LedgerDeployment = {
  chain: LedgerChain<RouterEvent>;
  tokens: InMemoryTokenLedger;
  router: RouterProxy;
  hookGateway: InProcessHookGateway;
  permitRelay: PermitWitnessRelay;
  swapVerifier: QuorumSignatureVerifier;
  upgradeVerifier: QuorumSignatureVerifier;
  verifiers: ContractRegistry<SignatureVerifier>;
  implementations: ContractRegistry<SwapRouterLogic>;
  addresses: {
    router: Address;
    implementation: Address;
    hookGateway: Address;
    permitRelay: Address;
    swapVerifier: Address;
    upgradeVerifier: Address;
  };
};

/** Deterministic per-ledger address for a named contract. */
export function contractAddress(label: string, chainId: bigint): Address {
  return getAddress(slice(keccak256(stringToHex(`${label}:${chainId.toString()}`)), 12));
}

/**
 * Stands up one ledger with a router, its collaborators and both committees. The hook
 * gateway and permit relay are deployed and wired; chains and token mappings are left to
 * the admin.
 */
export async function deployLedger(options: LedgerDeploymentOptions): Promise<LedgerDeployment> {
  const clock = options.clock ?? new SystemClock();
  const chain = new LedgerChain<RouterEvent>(options.chainId, clock);
  const tokens = new InMemoryTokenLedger();
  chain.register(tokens);

  const addresses = {
    router: contractAddress("router", options.chainId),
    implementation: contractAddress(`router-implementation:${options.version ?? "1.0.0"}`, options.chainId),
    hookGateway: contractAddress("hook-gateway", options.chainId),
    permitRelay: contractAddress("permit-relay", options.chainId),
    swapVerifier: contractAddress("swap-verifier", options.chainId),
    upgradeVerifier: contractAddress("upgrade-verifier", options.chainId)
  };

  const swapVerifier = new QuorumSignatureVerifier(
    SWAP_REQUEST_DOMAIN,
    options.swapCommittee.members,
    options.swapCommittee.threshold
  );
  const upgradeVerifier = new QuorumSignatureVerifier(
    CONTRACT_UPGRADE_DOMAIN,
    options.upgradeCommittee.members,
    options.upgradeCommittee.threshold
  );
  const verifiers = new ContractRegistry<SignatureVerifier>();
  verifiers.register(addresses.swapVerifier, swapVerifier);
  verifiers.register(addresses.upgradeVerifier, upgradeVerifier);

  const hookGateway = new InProcessHookGateway();
  const hookGateways = new ContractRegistry<HookGateway>();
  hookGateways.register(addresses.hookGateway, hookGateway);

  const permitRelay = new PermitWitnessRelay({ address: addresses.permitRelay, chainId: options.chainId, tokens, clock });
  chain.register(permitRelay);
  const permitRelays = new ContractRegistry<PermitTransferRelay>();
  permitRelays.register(addresses.permitRelay, permitRelay);

  const implementations = new ContractRegistry<SwapRouterLogic>();
  implementations.register(addresses.implementation, new SwapRouterLogic(options.version));

  const router = new RouterProxy({
    address: addresses.router,
    chain,
    tokens,
    registries: { verifiers, hookGateways, permitRelays, implementations },
    owner: options.owner,
    implementation: addresses.implementation,
    verificationFeeBps: options.verificationFeeBps,
    swapRequestValidator: addresses.swapVerifier,
    contractUpgradeValidator: addresses.upgradeVerifier
  });
  await router.setHookGateway(options.owner, addresses.hookGateway);
  await router.setPermitRelay(options.owner, addresses.permitRelay);

  return {
    chain,
    tokens,
    router,
    hookGateway,
    permitRelay,
    swapVerifier,
    upgradeVerifier,
    verifiers,
    implementations,
    addresses
  };
}
