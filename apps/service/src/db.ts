import { Pool } from "pg";
import { getAddress } from "viem";
import { z } from "zod";

import type { GovernanceRecord, GovernanceState, GovernanceStore, OwnershipState } from "@wtoken-oracle/oracle";

export type QueryFn = (text: string, values?: unknown[]) => Promise<{ rows: unknown[] }>;

const governanceRow = z.object({
  reserve_valuation_source: z.string(),
  reference_asset_source: z.string(),
  share_source: z.string(),
  owner: z.string(),
  pending_owner: z.string().nullable(),
  // NUMERIC comes back from pg as a string
  price_ceiling: z.string().regex(/^\d+$/),
});

function ownershipOf(owner: string, pendingOwner: string | null): OwnershipState {
  return pendingOwner === null
    ? { status: "owned", owner: getAddress(owner) }
    : { status: "pending", owner: getAddress(owner), pendingOwner: getAddress(pendingOwner) };
}

function pendingColumn(state: GovernanceState): string | null {
  return state.ownership.status === "pending" ? state.ownership.pendingOwner : null;
}

export class PgGovernanceStore implements GovernanceStore {
  private readonly query: QueryFn;

  constructor(query: QueryFn) {
    this.query = query;
  }

  async initSchema(): Promise<void> {
    await this.query(`
      CREATE TABLE IF NOT EXISTS wtoken_oracle_governance (
        oracle_id TEXT PRIMARY KEY,
        reserve_valuation_source TEXT NOT NULL,
        reference_asset_source TEXT NOT NULL,
        share_source TEXT NOT NULL,
        owner TEXT NOT NULL,
        pending_owner TEXT,
        price_ceiling NUMERIC(78,0) NOT NULL CHECK (price_ceiling > 0),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
      );
    `);
  }

  async load(oracleId: string): Promise<GovernanceRecord | undefined> {
    const { rows } = await this.query(
      `SELECT reserve_valuation_source, reference_asset_source, share_source, owner, pending_owner, price_ceiling::text AS price_ceiling
       FROM wtoken_oracle_governance WHERE oracle_id=$1`,
      [oracleId],
    );
    if (rows.length === 0) return undefined;
    const row = governanceRow.parse(rows[0]);
    return {
      bindings: {
        reserveValuationSource: getAddress(row.reserve_valuation_source),
        referenceAssetSource: getAddress(row.reference_asset_source),
        shareSource: getAddress(row.share_source),
      },
      state: {
        ownership: ownershipOf(row.owner, row.pending_owner),
        priceCeiling: BigInt(row.price_ceiling),
      },
    };
  }

  async init(oracleId: string, { bindings, state }: GovernanceRecord): Promise<void> {
    await this.query(
      `INSERT INTO wtoken_oracle_governance(oracle_id, reserve_valuation_source, reference_asset_source, share_source, owner, pending_owner, price_ceiling)
       VALUES($1,$2,$3,$4,$5,$6,$7)
       ON CONFLICT (oracle_id) DO NOTHING`,
      [
        oracleId,
        bindings.reserveValuationSource,
        bindings.referenceAssetSource,
        bindings.shareSource,
        state.ownership.owner,
        pendingColumn(state),
        state.priceCeiling.toString(),
      ],
    );
  }

  async save(oracleId: string, state: GovernanceState): Promise<void> {
    const { rows } = await this.query(
      `UPDATE wtoken_oracle_governance
       SET owner=$2, pending_owner=$3, price_ceiling=$4, updated_at=now()
       WHERE oracle_id=$1
       RETURNING oracle_id`,
      [oracleId, state.ownership.owner, pendingColumn(state), state.priceCeiling.toString()],
    );
    if (rows.length === 0) {
      throw new Error(`No governance record for ${oracleId}`);
    }
  }
}

export async function openPgStore(connectionString: string): Promise<PgGovernanceStore> {
  const pool = new Pool({ connectionString, max: 5 });
  const store = new PgGovernanceStore((text, values) => pool.query(text, values));
  await store.initSchema();
  return store;
}
