import { deployLedger, type LedgerClock, type LedgerDeployment } from "@relayswap/settlement";
import type { LedgerServiceConfig } from "./config";

/** Deploys the ledger described by the config and applies its peer chains and token mappings as the owner. */
export async function bootstrapLedger(
  config: Pick<
    LedgerServiceConfig,
    "chainId" | "owner" | "verificationFeeBps" | "version" | "swapCommittee" | "upgradeCommittee" | "peerChainIds" | "tokenMappings"
  >,
  clock?: LedgerClock
): Promise<LedgerDeployment> {
  const deployment = await deployLedger({
    chainId: config.chainId,
    owner: config.owner,
    verificationFeeBps: config.verificationFeeBps,
    swapCommittee: config.swapCommittee,
    upgradeCommittee: config.upgradeCommittee,
    version: config.version,
    clock
  });

  for (const chainId of config.peerChainIds) {
    await deployment.router.permitDestinationChainId(config.owner, chainId);
  }
  for (const mapping of config.tokenMappings) {
    await deployment.router.setTokenMapping(config.owner, mapping.dstChainId, mapping.dstToken, mapping.srcToken);
  }
  return deployment;
}
