import { maxUint256, zeroAddress } from "viem";
import { beforeEach, describe, expect, it } from "vitest";

import {
  BindingMismatchError,
  CapGovernance,
  DEFAULT_PRICE_CEILING,
  InvalidOwnerError,
  InvalidPriceCeilingError,
  InvalidSourceError,
  MemoryGovernanceStore,
  RenounceDisabledError,
  UnauthorizedAccountError,
  type GovernanceEvent,
  type GovernanceState,
  type OracleBindings,
} from "../src/index.js";
import {
  NOMINEE,
  OWNER,
  RESERVE_SOURCE,
  SHARE_SOURCE,
  STRANGER,
  SUPPLY_SOURCE,
  WAD,
} from "./_utils/fakes.js";

const ORACLE_ID = `42161:${SHARE_SOURCE}`;

const bindings: OracleBindings = {
  reserveValuationSource: RESERVE_SOURCE,
  referenceAssetSource: SUPPLY_SOURCE,
  shareSource: SHARE_SOURCE,
};

class FlakyStore extends MemoryGovernanceStore {
  failNextSave?: Error;
  saves = 0;

  async save(oracleId: string, state: GovernanceState): Promise<void> {
    this.saves += 1;
    const failure = this.failNextSave;
    if (failure) {
      this.failNextSave = undefined;
      throw failure;
    }
    await super.save(oracleId, state);
  }
}

describe("CapGovernance", () => {
  let store: FlakyStore;
  let governance: CapGovernance;
  let events: GovernanceEvent[];

  beforeEach(async () => {
    store = new FlakyStore();
    governance = await CapGovernance.open({
      store,
      oracleId: ORACLE_ID,
      bindings,
      owner: OWNER,
      priceCeiling: 1_500_000_000_000_000_000n,
    });
    events = [];
    governance.onEvent((event) => events.push(event));
  });

  describe("open", () => {
    it("defaults the ceiling", async () => {
      const fresh = await CapGovernance.open({
        store: new MemoryGovernanceStore(),
        oracleId: ORACLE_ID,
        bindings,
        owner: OWNER,
      });
      expect(fresh.priceCeiling()).toBe(DEFAULT_PRICE_CEILING);
      expect(DEFAULT_PRICE_CEILING).toBe(2n * WAD);
      expect(fresh.owner()).toBe(OWNER);
      expect(fresh.pendingOwner()).toBeUndefined();
    });

    it("refuses a zero owner, a zero ceiling and a zero binding", async () => {
      const empty = new MemoryGovernanceStore();
      await expect(
        CapGovernance.open({ store: empty, oracleId: ORACLE_ID, bindings, owner: zeroAddress }),
      ).rejects.toBeInstanceOf(InvalidOwnerError);
      await expect(
        CapGovernance.open({ store: empty, oracleId: ORACLE_ID, bindings, owner: OWNER, priceCeiling: 0n }),
      ).rejects.toBeInstanceOf(InvalidPriceCeilingError);
      await expect(
        CapGovernance.open({
          store: empty,
          oracleId: ORACLE_ID,
          bindings: { ...bindings, referenceAssetSource: zeroAddress },
          owner: OWNER,
        }),
      ).rejects.toBeInstanceOf(InvalidSourceError);
      expect(await empty.load(ORACLE_ID)).toBeUndefined();
    });

    it("resumes persisted state instead of the configured defaults", async () => {
      await governance.setPriceCeiling(OWNER, 3n * WAD);
      await governance.transferOwnership(OWNER, NOMINEE);

      const reopened = await CapGovernance.open({
        store,
        oracleId: ORACLE_ID,
        bindings,
        owner: STRANGER,
        priceCeiling: WAD,
      });
      expect(reopened.priceCeiling()).toBe(3n * WAD);
      expect(reopened.owner()).toBe(OWNER);
      expect(reopened.pendingOwner()).toBe(NOMINEE);
    });

    it("refuses to rebind a persisted oracle", async () => {
      await expect(
        CapGovernance.open({
          store,
          oracleId: ORACLE_ID,
          bindings: { ...bindings, reserveValuationSource: STRANGER },
          owner: OWNER,
        }),
      ).rejects.toBeInstanceOf(BindingMismatchError);
    });
  });

  describe("setPriceCeiling", () => {
    it("lets the owner move the ceiling and announces it", async () => {
      await governance.setPriceCeiling(OWNER, WAD);
      expect(governance.priceCeiling()).toBe(WAD);
      expect(events).toEqual([{ type: "PriceCeilingUpdated", priceCeiling: WAD }]);
      expect((await store.load(ORACLE_ID))?.state.priceCeiling).toBe(WAD);
    });

    it("accepts any uint256", async () => {
      await governance.setPriceCeiling(OWNER, maxUint256);
      expect(governance.priceCeiling()).toBe(maxUint256);
    });

    it("rejects a ceiling wider than uint256 with no state change", async () => {
      await expect(governance.setPriceCeiling(OWNER, maxUint256 + 1n)).rejects.toBeInstanceOf(
        InvalidPriceCeilingError,
      );
      expect(governance.priceCeiling()).toBe(1_500_000_000_000_000_000n);
      expect(store.saves).toBe(0);
      await expect(
        CapGovernance.open({
          store: new MemoryGovernanceStore(),
          oracleId: ORACLE_ID,
          bindings,
          owner: OWNER,
          priceCeiling: maxUint256 + 1n,
        }),
      ).rejects.toBeInstanceOf(InvalidPriceCeilingError);
    });

    it("rejects zero with no state change", async () => {
      await expect(governance.setPriceCeiling(OWNER, 0n)).rejects.toBeInstanceOf(InvalidPriceCeilingError);
      expect(governance.priceCeiling()).toBe(1_500_000_000_000_000_000n);
      expect(store.saves).toBe(0);
      expect(events).toEqual([]);
    });

    it("rejects anyone but the owner with no state change", async () => {
      await expect(governance.setPriceCeiling(STRANGER, WAD)).rejects.toBeInstanceOf(UnauthorizedAccountError);
      await expect(governance.setPriceCeiling(NOMINEE, WAD)).rejects.toBeInstanceOf(UnauthorizedAccountError);
      expect(governance.priceCeiling()).toBe(1_500_000_000_000_000_000n);
      expect(store.saves).toBe(0);
    });

    it("keeps the old ceiling when the write fails", async () => {
      const failure = new Error("connection terminated");
      store.failNextSave = failure;

      await expect(governance.setPriceCeiling(OWNER, WAD)).rejects.toBe(failure);
      expect(governance.priceCeiling()).toBe(1_500_000_000_000_000_000n);
      expect(events).toEqual([]);

      await governance.setPriceCeiling(OWNER, WAD);
      expect(governance.priceCeiling()).toBe(WAD);
    });

    it("applies concurrent updates in call order", async () => {
      await Promise.all([
        governance.setPriceCeiling(OWNER, 3n * WAD),
        governance.setPriceCeiling(OWNER, 4n * WAD),
      ]);
      expect(governance.priceCeiling()).toBe(4n * WAD);
      expect(events).toEqual([
        { type: "PriceCeilingUpdated", priceCeiling: 3n * WAD },
        { type: "PriceCeilingUpdated", priceCeiling: 4n * WAD },
      ]);
    });
  });

  describe("ownership", () => {
    it("hands the ceiling over in two steps", async () => {
      await governance.transferOwnership(OWNER, NOMINEE);
      expect(governance.owner()).toBe(OWNER);
      expect(governance.pendingOwner()).toBe(NOMINEE);
      await expect(governance.setPriceCeiling(NOMINEE, WAD)).rejects.toBeInstanceOf(UnauthorizedAccountError);

      await governance.acceptOwnership(NOMINEE);
      expect(governance.owner()).toBe(NOMINEE);
      expect(governance.pendingOwner()).toBeUndefined();

      await expect(governance.setPriceCeiling(OWNER, WAD)).rejects.toBeInstanceOf(UnauthorizedAccountError);
      await governance.setPriceCeiling(NOMINEE, WAD);
      expect(governance.priceCeiling()).toBe(WAD);

      expect(events).toEqual([
        { type: "OwnershipTransferStarted", previousOwner: OWNER, newOwner: NOMINEE },
        { type: "OwnershipTransferred", previousOwner: OWNER, newOwner: NOMINEE },
        { type: "PriceCeilingUpdated", priceCeiling: WAD },
      ]);
    });

    it("never renounces, whoever asks", async () => {
      for (const caller of [OWNER, NOMINEE, STRANGER, zeroAddress]) {
        await expect(governance.renounceOwnership(caller)).rejects.toBeInstanceOf(RenounceDisabledError);
      }
      expect(governance.owner()).toBe(OWNER);
      expect(governance.pendingOwner()).toBeUndefined();
      expect(store.saves).toBe(0);
    });

    it("hands a throwing listener's error to the error hook", async () => {
      const failures: [unknown, GovernanceEvent][] = [];
      const failure = new Error("listener failed");
      const hooked = await CapGovernance.open({
        store: new MemoryGovernanceStore(),
        oracleId: ORACLE_ID,
        bindings,
        owner: OWNER,
        onListenerError: (error, event) => failures.push([error, event]),
      });
      const seen: GovernanceEvent[] = [];
      hooked.onEvent(() => {
        throw failure;
      });
      hooked.onEvent((event) => seen.push(event));

      await hooked.setPriceCeiling(OWNER, WAD);
      await new Promise((resolve) => setTimeout(resolve, 0));

      expect(hooked.priceCeiling()).toBe(WAD);
      expect(seen).toEqual([{ type: "PriceCeilingUpdated", priceCeiling: WAD }]);
      expect(failures).toEqual([[failure, { type: "PriceCeilingUpdated", priceCeiling: WAD }]]);
    });

    it("stops notifying after unsubscribe", async () => {
      const seen: GovernanceEvent[] = [];
      const off = governance.onEvent((event) => seen.push(event));
      off();
      await governance.setPriceCeiling(OWNER, WAD);
      expect(seen).toEqual([]);
      expect(events).toHaveLength(1);
    });
  });
});
