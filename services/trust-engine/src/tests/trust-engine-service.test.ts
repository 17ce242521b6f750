import assert from "node:assert/strict";
import { rmSync } from "node:fs";
import test from "node:test";
import type {
  AuthorityResponse,
  DisputeResponse,
  ErrorResponse,
  EscrowResponse,
  GetListingAuditResponse,
  ListDisputesResponse,
  ListingByHashResponse,
  ListingResponse,
  ListingRiskResponse,
  PolicyResponse,
  ReputationResponse,
  RuleDisputeResponse,
} from "@p2p-trust/shared";
import { readConfig } from "../config.js";
import { buildServer } from "../server.js";
import {
  ARBITRATOR,
  AUTHORITY,
  BUYER,
  ITEM_HASH,
  SELLER,
  SUBMITTER,
  createTempDbPath,
  listingInput,
} from "./fixtures.js";

type TestServer = Awaited<ReturnType<typeof buildServer>>;

async function startServer(env: Record<string, string> = {}) {
  const temp = createTempDbPath();
  const config = readConfig({
    TRUST_ENGINE_DB_PATH: temp.dbPath,
    ARBITRATORS: ARBITRATOR,
    ...env,
  });
  const app = await buildServer({ config, logger: false });
  return {
    app,
    async cleanup() {
      await app.close();
      rmSync(temp.dir, { recursive: true, force: true });
    },
  };
}

function asPrincipal(principal: string): Record<string, string> {
  return { "x-principal": principal };
}

async function seedListing(app: TestServer): Promise<void> {
  const authority = await app.inject({
    method: "POST",
    url: "/authority",
    headers: asPrincipal(AUTHORITY),
    payload: { principal: AUTHORITY },
  });
  assert.equal(authority.statusCode, 201);

  const reputation = await app.inject({
    method: "POST",
    url: `/reputation/${SELLER}`,
    headers: asPrincipal(AUTHORITY),
    payload: { score: 150 },
  });
  assert.equal(reputation.statusCode, 200);

  const submit = await app.inject({
    method: "POST",
    url: "/listings/submit",
    headers: asPrincipal(SUBMITTER),
    payload: listingInput(),
  });
  assert.equal(submit.statusCode, 201);
}

async function openEscrow(app: TestServer, key: string, amount = 1000) {
  return app.inject({
    method: "POST",
    url: "/escrow/open",
    headers: { ...asPrincipal(BUYER), "idempotency-key": key },
    payload: { listingId: 1, buyerId: BUYER, amount, currency: "STX" },
  });
}

test("health endpoint is available", async () => {
  const { app, cleanup } = await startServer();
  try {
    const res = await app.inject({ method: "GET", url: "/health" });
    assert.equal(res.statusCode, 200);
    assert.deepEqual(res.json(), { ok: true, service: "trust-engine" });
  } finally {
    await cleanup();
  }
});

test("submits a listing and reads it back", async () => {
  const { app, cleanup } = await startServer();
  try {
    await seedListing(app);

    const listingRes = await app.inject({ method: "GET", url: "/listings/1" });
    assert.equal(listingRes.statusCode, 200);
    const { listing } = listingRes.json<ListingResponse>();
    assert.equal(listing.status, "ACTIVE");
    assert.equal(listing.sellerId, SELLER);

    const riskRes = await app.inject({ method: "GET", url: "/listings/1/risk" });
    assert.deepEqual(riskRes.json<ListingRiskResponse>(), { listingId: 1, riskScore: 10 });

    const hashRes = await app.inject({ method: "GET", url: `/listings/by-hash/${ITEM_HASH}` });
    assert.deepEqual(hashRes.json<ListingByHashResponse>(), { itemHash: ITEM_HASH, listingId: 1 });

    const auditRes = await app.inject({ method: "GET", url: "/listings/1/audit" });
    const audit = auditRes.json<GetListingAuditResponse>();
    assert.deepEqual(
      audit.events.map((event) => event.type),
      ["SUBMITTED"],
    );
    assert.equal(audit.events[0]?.actor, SUBMITTER);

    const missingRes = await app.inject({ method: "GET", url: "/listings/99" });
    assert.equal(missingRes.statusCode, 404);
    assert.equal(missingRes.json<ErrorResponse>().error, "ListingNotFound");

    const flagRes = await app.inject({ method: "GET", url: "/listings/1/flag" });
    assert.equal(flagRes.statusCode, 404);
    assert.deepEqual(flagRes.json(), { error: "flag_not_found" });
  } finally {
    await cleanup();
  }
});

test("maps engine rejections to status codes", async () => {
  const { app, cleanup } = await startServer();
  try {
    await seedListing(app);

    const priceRes = await app.inject({
      method: "POST",
      url: "/listings/submit",
      headers: asPrincipal(SUBMITTER),
      payload: listingInput({ id: 2, itemHash: "b".repeat(64), price: 0 }),
    });
    assert.equal(priceRes.statusCode, 400);
    assert.deepEqual(priceRes.json(), {
      error: "InvalidPrice",
      message: "Price must be a positive integer",
    });

    const duplicateRes = await app.inject({
      method: "POST",
      url: "/listings/submit",
      headers: asPrincipal(SUBMITTER),
      payload: listingInput({ id: 2 }),
    });
    assert.equal(duplicateRes.statusCode, 400);
    assert.equal(duplicateRes.json<ErrorResponse>().error, "DuplicateHash");

    const malformedRes = await app.inject({
      method: "POST",
      url: "/listings/submit",
      headers: asPrincipal(SUBMITTER),
      payload: { id: "one" },
    });
    assert.equal(malformedRes.statusCode, 400);
    assert.equal(malformedRes.json<ErrorResponse>().error, "invalid_request");

    const againRes = await app.inject({
      method: "POST",
      url: "/authority",
      headers: asPrincipal(SUBMITTER),
      payload: { principal: SUBMITTER },
    });
    assert.equal(againRes.statusCode, 409);
    assert.equal(againRes.json<ErrorResponse>().error, "AlreadySet");

    const policyRes = await app.inject({
      method: "POST",
      url: "/policy/max-risk-score",
      headers: asPrincipal(SELLER),
      payload: { value: 10 },
    });
    assert.equal(policyRes.statusCode, 403);
    assert.equal(policyRes.json<ErrorResponse>().error, "Unauthorized");

    const pauseRes = await app.inject({
      method: "POST",
      url: "/listings/1/pause",
      headers: asPrincipal(SELLER),
    });
    assert.equal(pauseRes.statusCode, 200);
    const pauseAgainRes = await app.inject({
      method: "POST",
      url: "/listings/1/pause",
      headers: asPrincipal(SELLER),
    });
    assert.equal(pauseAgainRes.statusCode, 409);
    assert.equal(pauseAgainRes.json<ErrorResponse>().error, "InvalidState");

    const queryRes = await app.inject({ method: "GET", url: "/listings?status=GONE" });
    assert.equal(queryRes.statusCode, 400);
    assert.equal(queryRes.json<ErrorResponse>().error, "invalid_query");
  } finally {
    await cleanup();
  }
});

test("lets the authority tune policy over http", async () => {
  const { app, cleanup } = await startServer({ POLICY_MAX_RISK_SCORE: "60" });
  try {
    const initialRes = await app.inject({ method: "GET", url: "/policy" });
    assert.equal(initialRes.json<PolicyResponse>().policy.maxRiskScore, 60);

    const noAuthorityRes = await app.inject({ method: "GET", url: "/authority" });
    assert.deepEqual(noAuthorityRes.json<AuthorityResponse>(), { authority: null });

    await app.inject({
      method: "POST",
      url: "/authority",
      headers: asPrincipal(AUTHORITY),
      payload: { principal: AUTHORITY },
    });

    const minRes = await app.inject({
      method: "POST",
      url: "/policy/min-reputation",
      headers: asPrincipal(AUTHORITY),
      payload: { value: 20 },
    });
    assert.deepEqual(minRes.json(), { value: 20 });

    const toggleRes = await app.inject({
      method: "POST",
      url: "/policy/anomaly-detection/toggle",
      headers: asPrincipal(AUTHORITY),
    });
    assert.deepEqual(toggleRes.json(), { anomalyDetectionEnabled: false });

    const blacklistRes = await app.inject({
      method: "POST",
      url: "/blacklist/STBAD",
      headers: asPrincipal(AUTHORITY),
    });
    assert.deepEqual(blacklistRes.json(), { sellerId: "STBAD", blacklisted: true });

    const lookupRes = await app.inject({ method: "GET", url: "/blacklist/STBAD" });
    assert.deepEqual(lookupRes.json(), { sellerId: "STBAD", blacklisted: true });

    const removeRes = await app.inject({
      method: "DELETE",
      url: "/blacklist/STBAD",
      headers: asPrincipal(AUTHORITY),
    });
    assert.deepEqual(removeRes.json(), { sellerId: "STBAD", blacklisted: false });

    const policyRes = await app.inject({ method: "GET", url: "/policy" });
    assert.deepEqual(policyRes.json<PolicyResponse>().policy, {
      fraudThreshold: 50,
      minReputation: 20,
      maxRiskScore: 60,
      anomalyDetectionEnabled: false,
    });
  } finally {
    await cleanup();
  }
});

test("opens and confirms escrow with idempotent replays", async () => {
  const { app, cleanup } = await startServer();
  try {
    await seedListing(app);

    const missingKeyRes = await app.inject({
      method: "POST",
      url: "/escrow/open",
      headers: asPrincipal(BUYER),
      payload: { listingId: 1, buyerId: BUYER, amount: 1000, currency: "STX" },
    });
    assert.equal(missingKeyRes.statusCode, 400);
    assert.equal(missingKeyRes.json<ErrorResponse>().error, "missing_idempotency_key");

    const openRes = await openEscrow(app, "open-1");
    assert.equal(openRes.statusCode, 201);
    const opened = openRes.json<EscrowResponse>();
    assert.equal(opened.escrow.state, "HELD");

    const replayRes = await openEscrow(app, "open-1");
    assert.equal(replayRes.statusCode, 201);
    assert.deepEqual(replayRes.json<EscrowResponse>(), opened);

    const conflictRes = await openEscrow(app, "open-1", 999);
    assert.equal(conflictRes.statusCode, 409);
    assert.equal(conflictRes.json<ErrorResponse>().error, "idempotency_key_reuse_conflict");

    const secondRes = await openEscrow(app, "open-2");
    assert.equal(secondRes.statusCode, 409);
    assert.equal(secondRes.json<ErrorResponse>().error, "InvalidState");

    const confirm = () =>
      app.inject({
        method: "POST",
        url: "/escrow/confirm",
        headers: { ...asPrincipal(BUYER), "idempotency-key": "confirm-1" },
        payload: { listingId: 1 },
      });
    const confirmRes = await confirm();
    assert.equal(confirmRes.statusCode, 200);
    const confirmed = confirmRes.json<EscrowResponse>();
    assert.equal(confirmed.escrow.state, "RELEASED");
    assert.equal(confirmed.escrow.payee, SELLER);

    const confirmReplayRes = await confirm();
    assert.equal(confirmReplayRes.statusCode, 200);
    assert.deepEqual(confirmReplayRes.json<EscrowResponse>(), confirmed);

    const escrowRes = await app.inject({ method: "GET", url: "/escrow/1" });
    assert.equal(escrowRes.json<EscrowResponse>().escrow.state, "RELEASED");

    const sellerRes = await app.inject({ method: "GET", url: `/reputation/${SELLER}` });
    assert.deepEqual(sellerRes.json<ReputationResponse>(), { principal: SELLER, score: 160 });
    const buyerRes = await app.inject({ method: "GET", url: `/reputation/${BUYER}` });
    assert.deepEqual(buyerRes.json<ReputationResponse>(), { principal: BUYER, score: 5 });

    const listingRes = await app.inject({ method: "GET", url: "/listings/1" });
    assert.equal(listingRes.json<ListingResponse>().listing.status, "CLOSED");

    const noEscrowRes = await app.inject({ method: "GET", url: "/escrow/2" });
    assert.equal(noEscrowRes.statusCode, 404);
    assert.deepEqual(noEscrowRes.json(), { error: "escrow_not_found" });
  } finally {
    await cleanup();
  }
});

test("runs a dispute to a refund ruling", async () => {
  const { app, cleanup } = await startServer();
  try {
    await seedListing(app);
    assert.equal((await openEscrow(app, "open-1")).statusCode, 201);

    const openRes = await app.inject({
      method: "POST",
      url: "/disputes/open",
      headers: asPrincipal(BUYER),
      payload: { listingId: 1, evidenceRefs: ["evidence-1"] },
    });
    assert.equal(openRes.statusCode, 201);
    const { dispute } = openRes.json<DisputeResponse>();
    assert.equal(dispute.state, "OPEN");

    const evidenceRes = await app.inject({
      method: "POST",
      url: `/disputes/${encodeURIComponent(dispute.disputeId)}/evidence`,
      headers: asPrincipal(SELLER),
      payload: { evidenceRef: "evidence-2" },
    });
    assert.equal(evidenceRes.statusCode, 200);
    assert.deepEqual(evidenceRes.json<DisputeResponse>().dispute.evidenceRefs, [
      "evidence-1",
      "evidence-2",
    ]);

    const listRes = await app.inject({ method: "GET", url: "/disputes?state=OPEN" });
    assert.deepEqual(
      listRes.json<ListDisputesResponse>().disputes.map((item) => item.disputeId),
      [dispute.disputeId],
    );

    const outsiderRes = await app.inject({
      method: "POST",
      url: `/disputes/${encodeURIComponent(dispute.disputeId)}/rule`,
      headers: asPrincipal(SELLER),
      payload: { ruling: "RELEASE" },
    });
    assert.equal(outsiderRes.statusCode, 403);

    const ruleRes = await app.inject({
      method: "POST",
      url: `/disputes/${encodeURIComponent(dispute.disputeId)}/rule`,
      headers: asPrincipal(ARBITRATOR),
      payload: { ruling: "REFUND" },
    });
    assert.equal(ruleRes.statusCode, 200);
    const ruled = ruleRes.json<RuleDisputeResponse>();
    assert.equal(ruled.dispute.ruling, "REFUND");
    assert.equal(ruled.escrow.state, "REFUNDED");
    assert.equal(ruled.escrow.payee, BUYER);

    const againRes = await app.inject({
      method: "POST",
      url: `/disputes/${encodeURIComponent(dispute.disputeId)}/rule`,
      headers: asPrincipal(ARBITRATOR),
      payload: { ruling: "RELEASE" },
    });
    assert.equal(againRes.statusCode, 409);
    assert.equal(againRes.json<ErrorResponse>().error, "AlreadyRuled");

    const getRes = await app.inject({
      method: "GET",
      url: `/disputes/${encodeURIComponent(dispute.disputeId)}`,
    });
    assert.equal(getRes.json<DisputeResponse>().dispute.state, "RULED");

    const missingRes = await app.inject({ method: "GET", url: "/disputes/DSP-missing" });
    assert.equal(missingRes.statusCode, 404);

    const sellerRes = await app.inject({ method: "GET", url: `/reputation/${SELLER}` });
    assert.equal(sellerRes.json<ReputationResponse>().score, 125);
  } finally {
    await cleanup();
  }
});

test("requires the service token on writes when configured", async () => {
  const { app, cleanup } = await startServer({ SERVICE_AUTH_TOKEN: "test-secret" });
  try {
    const deniedRes = await app.inject({
      method: "POST",
      url: "/authority",
      headers: asPrincipal(AUTHORITY),
      payload: { principal: AUTHORITY },
    });
    assert.equal(deniedRes.statusCode, 401);
    assert.equal(deniedRes.json<ErrorResponse>().error, "unauthorized_service");

    const wrongRes = await app.inject({
      method: "POST",
      url: "/authority",
      headers: { ...asPrincipal(AUTHORITY), "x-service-token": "wrong-secret" },
      payload: { principal: AUTHORITY },
    });
    assert.equal(wrongRes.statusCode, 401);

    const acceptedRes = await app.inject({
      method: "POST",
      url: "/authority",
      headers: { ...asPrincipal(AUTHORITY), "x-service-token": "test-secret" },
      payload: { principal: AUTHORITY },
    });
    assert.equal(acceptedRes.statusCode, 201);

    const readRes = await app.inject({ method: "GET", url: "/authority" });
    assert.deepEqual(readRes.json<AuthorityResponse>(), { authority: AUTHORITY });
  } finally {
    await cleanup();
  }
});

test("rejects missing and unregistered principals", async () => {
  const { app, cleanup } = await startServer({ REGISTERED_PRINCIPALS: AUTHORITY });
  try {
    const missingRes = await app.inject({
      method: "POST",
      url: "/authority",
      payload: { principal: AUTHORITY },
    });
    assert.equal(missingRes.statusCode, 401);
    assert.equal(missingRes.json<ErrorResponse>().error, "missing_principal");

    const unregisteredRes = await app.inject({
      method: "POST",
      url: "/listings/submit",
      headers: asPrincipal(SUBMITTER),
      payload: listingInput(),
    });
    assert.equal(unregisteredRes.statusCode, 403);
    assert.deepEqual(unregisteredRes.json(), { error: "unregistered_identity" });

    const registeredRes = await app.inject({
      method: "POST",
      url: "/authority",
      headers: asPrincipal(AUTHORITY),
      payload: { principal: AUTHORITY },
    });
    assert.equal(registeredRes.statusCode, 201);
  } finally {
    await cleanup();
  }
});

test("trims seller and buyer identifiers from request bodies", async () => {
  const { app, cleanup } = await startServer();
  try {
    const submitRes = await app.inject({
      method: "POST",
      url: "/listings/submit",
      headers: asPrincipal(SUBMITTER),
      payload: listingInput({ sellerId: ` ${SELLER} ` }),
    });
    assert.equal(submitRes.statusCode, 201);
    assert.equal(submitRes.json<ListingResponse>().listing.sellerId, SELLER);

    const pauseRes = await app.inject({
      method: "POST",
      url: "/listings/1/pause",
      headers: asPrincipal(SELLER),
    });
    assert.equal(pauseRes.statusCode, 200);
    const resumeRes = await app.inject({
      method: "POST",
      url: "/listings/1/resume",
      headers: asPrincipal(SELLER),
    });
    assert.equal(resumeRes.statusCode, 200);

    const openRes = await app.inject({
      method: "POST",
      url: "/escrow/open",
      headers: { ...asPrincipal(BUYER), "idempotency-key": "open-trimmed" },
      payload: { listingId: 1, buyerId: ` ${BUYER}`, amount: 1000, currency: "STX" },
    });
    assert.equal(openRes.statusCode, 201);
    assert.equal(openRes.json<EscrowResponse>().escrow.buyerId, BUYER);
  } finally {
    await cleanup();
  }
});
