import { recoverMessageAddress, type Address, type Hex } from "viem";

export type GovernanceAction =
  | "set-price-ceiling"
  | "transfer-ownership"
  | "accept-ownership"
  | "renounce-ownership";

/** Longest accepted distance between now and a signature's expiry, seconds. */
export const MAX_SIGNATURE_VALIDITY = 15 * 60;

export class SignatureError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SignatureError";
  }
}

export interface SignedRequest {
  action: GovernanceAction;
  argument: string;
  /** Unix seconds. */
  expiry: number;
  signature: Hex;
}

export function governanceMessage(oracleId: string, req: Omit<SignedRequest, "signature">): string {
  return `wtoken-oracle:${oracleId}:${req.action}:${req.argument}:${req.expiry}`;
}

/**
 * Resolves the caller of a governance request from an EIP-191 signature.
 * A message is accepted once; it is forgotten after it expires. A request
 * whose action then fails can hand its message back with `release`.
 */
export class SignatureGate {
  private readonly oracleId: string;
  private readonly now: () => number;
  private used = new Map<string, number>();

  constructor(oracleId: string, now: () => number = () => Math.floor(Date.now() / 1000)) {
    this.oracleId = oracleId;
    this.now = now;
  }

  async authorize(req: SignedRequest): Promise<Address> {
    const now = this.now();
    for (const [message, expiry] of this.used) {
      if (expiry <= now) this.used.delete(message);
    }
    if (req.expiry <= now) throw new SignatureError("Signature expired");
    if (req.expiry > now + MAX_SIGNATURE_VALIDITY) throw new SignatureError("Signature expiry too far ahead");

    const message = governanceMessage(this.oracleId, req);
    if (this.used.has(message)) throw new SignatureError("Signature already used");

    let signer: Address;
    try {
      signer = await recoverMessageAddress({ message, signature: req.signature });
    } catch (e) {
      throw new SignatureError("Invalid signature", { cause: e });
    }
    this.used.set(message, req.expiry);
    return signer;
  }

  release(req: Omit<SignedRequest, "signature">): void {
    this.used.delete(governanceMessage(this.oracleId, req));
  }
}
