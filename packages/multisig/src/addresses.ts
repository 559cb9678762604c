/**
 * Seeds for the two record domains the engine derives addresses in.
 *
 * - wallet:   ["wallet"]                         (one wallet per engine id)
 * - proposal: ["proposal", wallet bytes, index]  (index as u64 LE)
 */

import type { Address } from "@cosign/types";
import { seedFromAddress, seedFromIndex } from "@cosign/record-store";
import type { Seed } from "@cosign/record-store";

export const WALLET_DOMAIN = "wallet";
export const PROPOSAL_DOMAIN = "proposal";

export function walletSeeds(): readonly Seed[] {
  return [WALLET_DOMAIN];
}

export function proposalSeeds(wallet: Address, index: number): readonly Seed[] {
  return [PROPOSAL_DOMAIN, seedFromAddress(wallet), seedFromIndex(index)];
}
