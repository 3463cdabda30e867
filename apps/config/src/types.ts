import type { Address, Chain } from "viem";

export interface OracleOptions {
  description: string;
  /** 18 decimals. Used until the deployment sets its own. */
  defaultPriceCeiling: bigint;
}

export interface OracleChainConfig {
  chain: Chain;
  options: OracleOptions;
}

export interface Deployment {
  rpcUrl: string;
  reserveValuationSource: Address;
  referenceAssetSource: Address;
  shareSource: Address;
  owner: Address;
  priceCeiling?: bigint;
  databaseUrl?: string;
  port: number;
}

export interface OracleConfig extends Omit<Deployment, "priceCeiling"> {
  chain: Chain;
  chainId: number;
  description: string;
  priceCeiling: bigint;
}
