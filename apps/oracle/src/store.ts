import type { OracleBindings } from "./bindings.js";
import type { GovernanceState } from "./governance.js";

export interface GovernanceRecord {
  bindings: OracleBindings;
  state: GovernanceState;
}

export interface GovernanceStore {
  load(oracleId: string): Promise<GovernanceRecord | undefined>;
  init(oracleId: string, record: GovernanceRecord): Promise<void>;
  save(oracleId: string, state: GovernanceState): Promise<void>;
}

export class MemoryGovernanceStore implements GovernanceStore {
  private records = new Map<string, GovernanceRecord>();

  async load(oracleId: string): Promise<GovernanceRecord | undefined> {
    return this.records.get(oracleId);
  }

  async init(oracleId: string, record: GovernanceRecord): Promise<void> {
    if (!this.records.has(oracleId)) this.records.set(oracleId, record);
  }

  async save(oracleId: string, state: GovernanceState): Promise<void> {
    const record = this.records.get(oracleId);
    if (!record) throw new Error(`No governance record for ${oracleId}`);
    this.records.set(oracleId, { ...record, state });
  }
}
