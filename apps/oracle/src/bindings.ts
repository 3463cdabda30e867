import { isAddress, isAddressEqual, zeroAddress, type Address } from "viem";

import { BindingMismatchError, InvalidSourceError } from "./errors.js";

export interface OracleBindings {
  reserveValuationSource: Address;
  referenceAssetSource: Address;
  shareSource: Address;
}

const ROLES = ["reserveValuationSource", "referenceAssetSource", "shareSource"] as const;

export function isLiveAddress(value: string): value is Address {
  return isAddress(value, { strict: false }) && !isAddressEqual(value, zeroAddress);
}

export function assertBindings(bindings: OracleBindings): OracleBindings {
  for (const role of ROLES) {
    if (!isLiveAddress(bindings[role])) throw new InvalidSourceError(role, bindings[role]);
  }
  return bindings;
}

export function assertSameBindings(stored: OracleBindings, configured: OracleBindings): void {
  for (const role of ROLES) {
    if (!isAddressEqual(stored[role], configured[role])) {
      throw new BindingMismatchError(role, stored[role], configured[role]);
    }
  }
}

export function oracleIdOf(chainId: number, bindings: OracleBindings): string {
  return `${chainId}:${bindings.shareSource.toLowerCase()}`;
}
