import { maxInt256, maxUint256, maxUint80 } from "viem";

import { ArithmeticOverflowError } from "./errors.js";

export const WAD = 10n ** 18n;

export function toUint256(value: bigint, what: string): bigint {
  if (value < 0n || value > maxUint256) throw new ArithmeticOverflowError(what, 256);
  return value;
}

// Checked uint256 multiply, so a product that would revert on-chain fails here too.
export function mulUint256(a: bigint, b: bigint, what: string): bigint {
  return toUint256(toUint256(a, what) * toUint256(b, what), what);
}

export function toInt256(value: bigint, what: string): bigint {
  if (value > maxInt256 || value < -maxInt256 - 1n) throw new ArithmeticOverflowError(what, 256);
  return value;
}

export function toUint80(value: bigint, what: string): bigint {
  if (value < 0n || value > maxUint80) throw new ArithmeticOverflowError(what, 80);
  return value;
}
