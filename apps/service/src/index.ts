import { serve } from "@hono/node-server";
import { oracleConfig } from "@wtoken-oracle/config";
import {
  CapGovernance,
  MemoryGovernanceStore,
  ViemObservationSource,
  ViemReserveValuationSource,
  ViemShareSource,
  ViemSupplySource,
  WTokenPriceOracle,
  assertBindings,
  oracleIdOf,
  type GovernanceStore,
} from "@wtoken-oracle/oracle";
import { createPublicClient, http } from "viem";
import { arbitrum } from "viem/chains";

import { SignatureGate } from "./auth.js";
import { openPgStore } from "./db.js";
import { buildApp } from "./service.js";

async function main() {
  const chainId = Number(process.env.CHAIN_ID ?? arbitrum.id);
  const config = oracleConfig(chainId);

  const client = createPublicClient({ chain: config.chain, transport: http(config.rpcUrl) });
  const bindings = assertBindings({
    reserveValuationSource: config.reserveValuationSource,
    referenceAssetSource: config.referenceAssetSource,
    shareSource: config.shareSource,
  });
  const oracleId = oracleIdOf(chainId, bindings);

  let store: GovernanceStore;
  if (config.databaseUrl) {
    store = await openPgStore(config.databaseUrl);
  } else {
    console.warn("⚠️  DATABASE_URL not set; governance state lives in memory only");
    store = new MemoryGovernanceStore();
  }
  const governance = await CapGovernance.open({
    store,
    oracleId,
    bindings,
    owner: config.owner,
    priceCeiling: config.priceCeiling,
    onListenerError: (e, event) => console.error(`❌ ${event.type} listener failed:`, e),
  });
  governance.onEvent((event) => {
    switch (event.type) {
      case "PriceCeilingUpdated":
        console.log(`🧢 price ceiling set to ${event.priceCeiling}`);
        break;
      case "OwnershipTransferStarted":
        console.log(`🔑 ownership transfer started: ${event.previousOwner} -> ${event.newOwner}`);
        break;
      case "OwnershipTransferred":
        console.log(`🔑 ownership transferred: ${event.previousOwner} -> ${event.newOwner}`);
        break;
    }
  });

  const oracle = new WTokenPriceOracle({
    reserveValuation: new ViemReserveValuationSource(client, bindings.reserveValuationSource),
    referenceAsset: new ViemSupplySource(client, bindings.referenceAssetSource),
    share: new ViemShareSource(client, bindings.shareSource),
    observer: new ViemObservationSource(client),
    ceiling: governance,
    description: config.description,
  });

  const app = buildApp({ oracle, governance, gate: new SignatureGate(oracleId) });
  serve({ fetch: app.fetch, port: config.port });
  console.log(`🛰 ${config.description} oracle ${oracleId} listening on :${config.port}`);
  console.log(`   owner ${governance.owner()}, ceiling ${governance.priceCeiling()}`);
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
