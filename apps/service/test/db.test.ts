import { describe, expect, it } from "vitest";

import { BindingMismatchError, CapGovernance, type GovernanceState } from "@wtoken-oracle/oracle";

import { PgGovernanceStore, type QueryFn } from "../src/db.js";

const ORACLE_ID = "42161:0x3333333333333333333333333333333333333333";
const RESERVE = "0x1111111111111111111111111111111111111111";
const SUPPLY = "0x2222222222222222222222222222222222222222";
const SHARE = "0x3333333333333333333333333333333333333333";
const OWNER = "0x4444444444444444444444444444444444444444";
const NOMINEE = "0x5555555555555555555555555555555555555555";

function fakeQuery(responses: unknown[][] = []) {
  const seen: { text: string; values?: unknown[] }[] = [];
  const query: QueryFn = async (text, values) => {
    seen.push({ text, values });
    return { rows: responses.shift() ?? [] };
  };
  return { seen, query };
}

const storedRow = {
  reserve_valuation_source: RESERVE,
  reference_asset_source: SUPPLY,
  share_source: SHARE,
  owner: OWNER,
  pending_owner: NOMINEE,
  price_ceiling: "1500000000000000000",
};

describe("PgGovernanceStore", () => {
  it("creates its table", async () => {
    const { seen, query } = fakeQuery();
    await new PgGovernanceStore(query).initSchema();
    expect(seen).toHaveLength(1);
    expect(seen[0]?.text).toContain("CREATE TABLE IF NOT EXISTS wtoken_oracle_governance");
  });

  it("loads a stored record", async () => {
    const { seen, query } = fakeQuery([[storedRow]]);
    const record = await new PgGovernanceStore(query).load(ORACLE_ID);
    expect(seen[0]?.values).toEqual([ORACLE_ID]);
    expect(record).toEqual({
      bindings: { reserveValuationSource: RESERVE, referenceAssetSource: SUPPLY, shareSource: SHARE },
      state: {
        ownership: { status: "pending", owner: OWNER, pendingOwner: NOMINEE },
        priceCeiling: 1_500_000_000_000_000_000n,
      },
    });
  });

  it("loads nothing for an unknown oracle", async () => {
    const { query } = fakeQuery([[]]);
    expect(await new PgGovernanceStore(query).load(ORACLE_ID)).toBeUndefined();
  });

  it("refuses a corrupt row", async () => {
    const { query } = fakeQuery([[{ ...storedRow, price_ceiling: "-1" }]]);
    await expect(new PgGovernanceStore(query).load(ORACLE_ID)).rejects.toThrow();
  });

  it("writes the ceiling as a decimal string", async () => {
    const { seen, query } = fakeQuery([[], [{ oracle_id: ORACLE_ID }]]);
    const store = new PgGovernanceStore(query);
    const state: GovernanceState = {
      ownership: { status: "owned", owner: OWNER },
      priceCeiling: 10n ** 40n,
    };
    await store.init(ORACLE_ID, {
      bindings: { reserveValuationSource: RESERVE, referenceAssetSource: SUPPLY, shareSource: SHARE },
      state,
    });
    await store.save(ORACLE_ID, {
      ownership: { status: "pending", owner: OWNER, pendingOwner: NOMINEE },
      priceCeiling: 10n ** 18n,
    });
    expect(seen[0]?.values).toEqual([
      ORACLE_ID,
      RESERVE,
      SUPPLY,
      SHARE,
      OWNER,
      null,
      "10000000000000000000000000000000000000000",
    ]);
    expect(seen[1]?.values).toEqual([ORACLE_ID, OWNER, NOMINEE, "1000000000000000000"]);
  });

  it("fails a save for a missing record", async () => {
    const { query } = fakeQuery([[]]);
    await expect(
      new PgGovernanceStore(query).save(ORACLE_ID, {
        ownership: { status: "owned", owner: OWNER },
        priceCeiling: 1n,
      }),
    ).rejects.toThrow(`No governance record for ${ORACLE_ID}`);
  });

  it("keeps bindings immutable across restarts", async () => {
    const { query } = fakeQuery([[storedRow]]);
    await expect(
      CapGovernance.open({
        store: new PgGovernanceStore(query),
        oracleId: ORACLE_ID,
        bindings: { reserveValuationSource: RESERVE, referenceAssetSource: SUPPLY, shareSource: NOMINEE },
        owner: OWNER,
      }),
    ).rejects.toBeInstanceOf(BindingMismatchError);
  });
});
