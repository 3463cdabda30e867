import dotenv from "dotenv";
import { getAddress, isAddress, type Chain } from "viem";
import { z } from "zod";

import { chainConfigs } from "./config.js";
import type { Deployment, OracleConfig } from "./types.js";

dotenv.config();

type Env = Record<string, string | undefined>;

const address = z
  .string()
  .refine((v) => isAddress(v, { strict: false }), "not an address")
  .transform((v) => getAddress(v));

const uint = z
  .string()
  .regex(/^\d+$/, "expected an unsigned integer")
  .transform((v) => BigInt(v));

const deploymentSchema = z.object({
  rpcUrl: z.string().url(),
  reserveValuationSource: address,
  referenceAssetSource: address,
  shareSource: address,
  owner: address,
  priceCeiling: uint.optional(),
  databaseUrl: z.string().min(1).optional(),
  port: z.coerce.number().int().positive().default(48090),
});

function envNames(chainId: number): Record<keyof Deployment, string> {
  return {
    rpcUrl: `RPC_URL_${chainId}`,
    reserveValuationSource: `RESERVE_VALUATION_SOURCE_${chainId}`,
    referenceAssetSource: `REFERENCE_ASSET_SOURCE_${chainId}`,
    shareSource: `SHARE_SOURCE_${chainId}`,
    owner: `ORACLE_OWNER_${chainId}`,
    priceCeiling: `PRICE_CEILING_${chainId}`,
    databaseUrl: "DATABASE_URL",
    port: "PORT",
  };
}

export function oracleConfig(chainId: number, env: Env = process.env): OracleConfig {
  const config = chainConfigs[chainId];
  if (!config) {
    throw new Error(`No config found for chainId ${chainId}`);
  }

  const { priceCeiling, ...deployment } = getDeployment(chainId, config.chain, env);
  return {
    ...config.options,
    ...deployment,
    chain: config.chain,
    chainId,
    priceCeiling: priceCeiling ?? config.options.defaultPriceCeiling,
  };
}

export function getDeployment(chainId: number, chain?: Chain, env: Env = process.env): Deployment {
  const names = envNames(chainId);
  const byField: Record<string, string | undefined> = names;
  const defaultRpcUrl = chain?.rpcUrls.default.http[0];

  // Blank variables count as unset.
  const read = (name: string) => env[name]?.trim() || undefined;

  const parsed = deploymentSchema.safeParse({
    rpcUrl: read(names.rpcUrl) ?? defaultRpcUrl,
    reserveValuationSource: read(names.reserveValuationSource),
    referenceAssetSource: read(names.referenceAssetSource),
    shareSource: read(names.shareSource),
    owner: read(names.owner),
    priceCeiling: read(names.priceCeiling),
    databaseUrl: read(names.databaseUrl),
    port: read(names.port),
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => {
      const field = String(issue.path[0]);
      return `${byField[field] ?? field}: ${issue.message}`;
    });
    throw new Error(`Invalid deployment for chainId ${chainId}: ${problems.join("; ")}`);
  }
  return parsed.data;
}

export { chainConfigs };
export type { Deployment, OracleChainConfig, OracleConfig, OracleOptions } from "./types.js";
