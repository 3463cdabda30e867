export type OracleErrorCode =
  | "INVALID_SOURCE"
  | "INVALID_OWNER"
  | "UNAUTHORIZED_ACCOUNT"
  | "INVALID_PRICE_CEILING"
  | "RENOUNCE_DISABLED"
  | "ZERO_SUPPLY"
  | "ARITHMETIC_OVERFLOW"
  | "BINDING_MISMATCH";

export class OracleError extends Error {
  readonly code: OracleErrorCode;

  constructor(code: OracleErrorCode, message: string) {
    super(message);
    this.name = "OracleError";
    this.code = code;
  }
}

export class InvalidSourceError extends OracleError {
  readonly role: string;

  constructor(role: string, value: string) {
    super("INVALID_SOURCE", `Invalid ${role} address: ${value}`);
    this.name = "InvalidSourceError";
    this.role = role;
  }
}

export class InvalidOwnerError extends OracleError {
  constructor(value: string) {
    super("INVALID_OWNER", `Invalid owner: ${value}`);
    this.name = "InvalidOwnerError";
  }
}

export class UnauthorizedAccountError extends OracleError {
  readonly account: string;

  constructor(account: string) {
    super("UNAUTHORIZED_ACCOUNT", `Unauthorized account: ${account}`);
    this.name = "UnauthorizedAccountError";
    this.account = account;
  }
}

export class InvalidPriceCeilingError extends OracleError {
  constructor(value: bigint) {
    super("INVALID_PRICE_CEILING", `Price ceiling must be positive, got ${value}`);
    this.name = "InvalidPriceCeilingError";
  }
}

export class RenounceDisabledError extends OracleError {
  constructor() {
    super("RENOUNCE_DISABLED", "Ownership cannot be renounced");
    this.name = "RenounceDisabledError";
  }
}

export class ZeroSupplyError extends OracleError {
  constructor() {
    super("ZERO_SUPPLY", "Reference asset total supply is zero");
    this.name = "ZeroSupplyError";
  }
}

export class ArithmeticOverflowError extends OracleError {
  constructor(what: string, bits: number) {
    super("ARITHMETIC_OVERFLOW", `${what} does not fit in ${bits} bits`);
    this.name = "ArithmeticOverflowError";
  }
}

export class BindingMismatchError extends OracleError {
  constructor(role: string, stored: string, configured: string) {
    super(
      "BINDING_MISMATCH",
      `${role} is bound to ${stored} but configured as ${configured}`,
    );
    this.name = "BindingMismatchError";
  }
}
