import { Hono, type Context } from "hono";
import { BaseError, isAddress, isHex, type Address, type Hex } from "viem";
import { z } from "zod";

import {
  InvalidOwnerError,
  InvalidPriceCeilingError,
  OracleError,
  RenounceDisabledError,
  UnauthorizedAccountError,
  type CapGovernance,
  type RoundData,
  type WTokenPriceOracle,
} from "@wtoken-oracle/oracle";

import { SignatureError, type GovernanceAction, type SignatureGate } from "./auth.js";

export interface OracleServiceDeps {
  oracle: WTokenPriceOracle;
  governance: CapGovernance;
  gate: SignatureGate;
}

type ErrorStatus = 400 | 401 | 403 | 422 | 500 | 502;

const signed = {
  expiry: z.number().int().positive(),
  signature: z.string().refine((v): v is Hex => isHex(v), "not a hex signature"),
};

const priceCeilingBody = z.object({
  ...signed,
  priceCeiling: z
    .string()
    .regex(/^\d+$/, "expected an unsigned integer string")
    .transform((v) => BigInt(v)),
});

const transferOwnershipBody = z.object({
  ...signed,
  newOwner: z.string().refine((v): v is Address => isAddress(v, { strict: false }), "not an address"),
});

const signedBody = z.object(signed);

export function roundToJson(round: RoundData) {
  return {
    roundId: round.roundId.toString(),
    answer: round.answer.toString(),
    startedAt: round.startedAt.toString(),
    updatedAt: round.updatedAt.toString(),
    answeredInRound: round.answeredInRound.toString(),
  };
}

export function errorStatus(err: Error): ErrorStatus {
  if (err instanceof SignatureError) return 401;
  if (err instanceof UnauthorizedAccountError || err instanceof RenounceDisabledError) return 403;
  if (err instanceof InvalidPriceCeilingError || err instanceof InvalidOwnerError) return 400;
  if (err instanceof OracleError) return 422;
  // viem errors: the upstream read failed
  if (err instanceof BaseError) return 502;
  return 500;
}

async function readBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}

export function buildApp(deps: OracleServiceDeps) {
  const app = new Hono();
  const { oracle, governance, gate } = deps;

  function governanceJson() {
    return {
      owner: governance.owner(),
      pendingOwner: governance.pendingOwner() ?? null,
      priceCeiling: governance.priceCeiling().toString(),
    };
  }

  // A signature is spent only when the action it authorizes goes through.
  async function asCaller<T>(
    action: GovernanceAction,
    argument: string,
    body: { expiry: number; signature: Hex },
    run: (account: Address) => Promise<T>,
  ): Promise<T> {
    const req = { action, argument, expiry: body.expiry, signature: body.signature };
    const account = await gate.authorize(req);
    try {
      return await run(account);
    } catch (e) {
      gate.release(req);
      throw e;
    }
  }

  app.onError((err, c) => {
    const status = errorStatus(err);
    if (status >= 500) console.error(`❌ ${c.req.method} ${c.req.path} failed:`, err);
    const code = err instanceof OracleError ? err.code : null;
    return c.json({ error: err.name, code, message: err.message }, status);
  });

  app.get("/health", (c) => c.text("ok"));

  app.get("/feed", (c) =>
    c.json({
      description: oracle.description(),
      version: oracle.version().toString(),
      decimals: oracle.decimals(),
    }),
  );

  app.get("/decimals", (c) => c.json({ decimals: oracle.decimals() }));

  app.get("/latestRoundData", async (c) => c.json(roundToJson(await oracle.latestRoundData())));

  app.get("/livePrice", async (c) => c.json({ price: (await oracle.getLivePrice()).toString() }));

  app.get("/governance", (c) => c.json(governanceJson()));

  app.post("/governance/price-ceiling", async (c) => {
    const parsed = priceCeilingBody.safeParse(await readBody(c));
    if (!parsed.success) return c.json({ error: "BadRequest", issues: parsed.error.issues }, 400);
    const body = parsed.data;
    await asCaller("set-price-ceiling", body.priceCeiling.toString(), body, (account) =>
      governance.setPriceCeiling(account, body.priceCeiling),
    );
    return c.json(governanceJson());
  });

  app.post("/governance/transfer-ownership", async (c) => {
    const parsed = transferOwnershipBody.safeParse(await readBody(c));
    if (!parsed.success) return c.json({ error: "BadRequest", issues: parsed.error.issues }, 400);
    const body = parsed.data;
    await asCaller("transfer-ownership", body.newOwner.toLowerCase(), body, (account) =>
      governance.transferOwnership(account, body.newOwner),
    );
    return c.json(governanceJson());
  });

  app.post("/governance/accept-ownership", async (c) => {
    const parsed = signedBody.safeParse(await readBody(c));
    if (!parsed.success) return c.json({ error: "BadRequest", issues: parsed.error.issues }, 400);
    await asCaller("accept-ownership", "", parsed.data, (account) => governance.acceptOwnership(account));
    return c.json(governanceJson());
  });

  app.post("/governance/renounce-ownership", async (c) => {
    const parsed = signedBody.safeParse(await readBody(c));
    if (!parsed.success) return c.json({ error: "BadRequest", issues: parsed.error.issues }, 400);
    return asCaller("renounce-ownership", "", parsed.data, (account) =>
      governance.renounceOwnership(account),
    );
  });

  return app;
}
