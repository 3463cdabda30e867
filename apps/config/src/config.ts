import { arbitrum, foundry } from "viem/chains";

import type { OracleChainConfig } from "./types.js";

export const chainConfigs: Record<number, OracleChainConfig> = {
  [arbitrum.id]: {
    chain: arbitrum,
    options: {
      description: "wToken / USD",
      defaultPriceCeiling: 2n * 10n ** 18n,
    },
  },
  // Local fork / anvil
  [foundry.id]: {
    chain: foundry,
    options: {
      description: "wToken / USD (local)",
      defaultPriceCeiling: 2n * 10n ** 18n,
    },
  },
};
