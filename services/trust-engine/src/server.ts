import Fastify from "fastify";
import type { FastifyReply, FastifyRequest } from "fastify";
import {
  type AuthorityResponse,
  type BlacklistResponse,
  canonicalJson,
  type ConfirmReceiptRequest,
  type DisputeResponse,
  type DisputeRuling,
  type DisputeState,
  type EngineErrorKind,
  type EscrowResponse,
  type FlaggedListingResponse,
  type FlagListingRequest,
  type GetListingAuditResponse,
  isServiceTokenAccepted,
  type ListDisputesResponse,
  type ListingByHashResponse,
  type ListingResponse,
  type ListingRiskResponse,
  type ListingStatus,
  type ListListingsResponse,
  type OpenDisputeRequest,
  type OpenEscrowRequest,
  parsePrincipalHeader,
  parsePrincipalSet,
  type PolicyResponse,
  type PolicyValueResponse,
  PRINCIPAL_HEADER,
  type ReputationResponse,
  type RuleDisputeRequest,
  type RuleDisputeResponse,
  SERVICE_AUTH_HEADER,
  type SetAuthorityRequest,
  type SetPolicyValueRequest,
  type SetReputationRequest,
  sha256Hex,
  type SubmitEvidenceRequest,
  type SubmitListingRequest,
  type ToggleAnomalyDetectionResponse,
  type UpdateListingPriceRequest,
} from "@p2p-trust/shared";
import { type EngineConfig, readConfig } from "./config.js";
import {
  type ArbitratorEligibility,
  type IdentityProvider,
  principalSetArbitrators,
  principalSetIdentityProvider,
} from "./engine/collaborators.js";
import { TrustEngine } from "./engine/trust-engine.js";
import { errorMessage, httpStatusForError } from "./errors.js";
import { type EngineStore, SqliteEngineStore } from "./storage/engine-store.js";

const IDEMPOTENCY_HEADER = "idempotency-key";

type EscrowAction = "OPEN_ESCROW" | "CONFIRM_RECEIPT";

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isInteger(value: unknown): value is number {
  return typeof value === "number" && Number.isSafeInteger(value);
}

function isListingStatus(value: unknown): value is ListingStatus {
  return value === "ACTIVE" || value === "PAUSED" || value === "CLOSED";
}

function isDisputeState(value: unknown): value is DisputeState {
  return value === "OPEN" || value === "RULED";
}

function isDisputeRuling(value: unknown): value is DisputeRuling {
  return value === "RELEASE" || value === "REFUND";
}

function parseListingIdParam(value: unknown): number | null {
  if (typeof value !== "string" || !/^\d{1,15}$/.test(value)) return null;
  return Number(value);
}

function parseSetAuthorityRequest(body: unknown): SetAuthorityRequest | null {
  if (!isObject(body) || !isNonEmptyString(body.principal)) return null;
  return { principal: body.principal.trim() };
}

function parseSetPolicyValueRequest(body: unknown): SetPolicyValueRequest | null {
  if (!isObject(body) || !isInteger(body.value)) return null;
  return { value: body.value };
}

function parseSetReputationRequest(body: unknown): SetReputationRequest | null {
  if (!isObject(body) || !isInteger(body.score)) return null;
  return { score: body.score };
}

// Field contents are checked by the engine so rejections carry its error kinds.
function parseSubmitListingRequest(body: unknown): SubmitListingRequest | null {
  if (!isObject(body)) return null;
  if (!isInteger(body.id)) return null;
  if (typeof body.itemHash !== "string") return null;
  if (!isNonEmptyString(body.sellerId)) return null;
  if (!isInteger(body.sellerReputation)) return null;
  if (!isInteger(body.price)) return null;
  if (typeof body.category !== "string") return null;
  if (typeof body.location !== "string") return null;
  if (typeof body.currency !== "string") return null;
  return {
    id: body.id,
    itemHash: body.itemHash,
    sellerId: body.sellerId.trim(),
    sellerReputation: body.sellerReputation,
    price: body.price,
    category: body.category,
    location: body.location,
    currency: body.currency,
  };
}

function parseFlagListingRequest(body: unknown): FlagListingRequest | null {
  if (!isObject(body)) return null;
  if (!isNonEmptyString(body.reason)) return null;
  if (!isInteger(body.riskScore)) return null;
  return { reason: body.reason, riskScore: body.riskScore };
}

function parseUpdateListingPriceRequest(body: unknown): UpdateListingPriceRequest | null {
  if (!isObject(body) || !isInteger(body.price)) return null;
  return { price: body.price };
}

function parseOpenEscrowRequest(body: unknown): OpenEscrowRequest | null {
  if (!isObject(body)) return null;
  if (!isInteger(body.listingId)) return null;
  if (!isNonEmptyString(body.buyerId)) return null;
  if (!isInteger(body.amount)) return null;
  if (typeof body.currency !== "string") return null;
  return {
    listingId: body.listingId,
    buyerId: body.buyerId.trim(),
    amount: body.amount,
    currency: body.currency,
  };
}

function parseConfirmReceiptRequest(body: unknown): ConfirmReceiptRequest | null {
  if (!isObject(body) || !isInteger(body.listingId)) return null;
  return { listingId: body.listingId };
}

function parseOpenDisputeRequest(body: unknown): OpenDisputeRequest | null {
  if (!isObject(body)) return null;
  if (!isInteger(body.listingId)) return null;
  const evidenceRefs = body.evidenceRefs ?? [];
  if (!Array.isArray(evidenceRefs)) return null;
  const refs = evidenceRefs.filter((ref): ref is string => typeof ref === "string");
  if (refs.length !== evidenceRefs.length) return null;
  return { listingId: body.listingId, evidenceRefs: refs };
}

function parseSubmitEvidenceRequest(body: unknown): SubmitEvidenceRequest | null {
  if (!isObject(body) || typeof body.evidenceRef !== "string") return null;
  return { evidenceRef: body.evidenceRef };
}

function parseRuleDisputeRequest(body: unknown): RuleDisputeRequest | null {
  if (!isObject(body) || !isDisputeRuling(body.ruling)) return null;
  return { ruling: body.ruling };
}

function readIdempotencyKey(req: FastifyRequest): string | null {
  const raw = req.headers[IDEMPOTENCY_HEADER];
  const value = Array.isArray(raw) ? raw[0] : raw;
  return isNonEmptyString(value) ? value.trim() : null;
}

function sendEngineError(reply: FastifyReply, kind: EngineErrorKind): FastifyReply {
  return reply.code(httpStatusForError(kind)).send({ error: kind, message: errorMessage(kind) });
}

function sendInvalidRequest(reply: FastifyReply, message: string): FastifyReply {
  return reply.code(400).send({ error: "invalid_request", message });
}

export interface BuildServerOptions {
  config?: EngineConfig;
  store?: EngineStore;
  dbPath?: string;
  serviceAuthToken?: string;
  identityProvider?: IdentityProvider;
  arbitrators?: ArbitratorEligibility;
  logger?: boolean;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const config = options.config ?? readConfig();
  const app = Fastify({ logger: options.logger === false ? false : { level: config.logLevel } });
  const store =
    options.store || new SqliteEngineStore(options.dbPath || config.dbPath, config.initialPolicy);
  const ownStore = !options.store;
  const serviceAuthToken = options.serviceAuthToken ?? config.serviceAuthToken;
  const identityProvider =
    options.identityProvider ||
    principalSetIdentityProvider(parsePrincipalSet(config.registeredPrincipals, ["*"]));
  const arbitrators =
    options.arbitrators || principalSetArbitrators(parsePrincipalSet(config.arbitrators, []));
  const engine = new TrustEngine({ store, arbitrators });

  function requireServiceAuth(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isServiceTokenAccepted(req.headers[SERVICE_AUTH_HEADER], serviceAuthToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_service",
      message: `Missing or invalid '${SERVICE_AUTH_HEADER}' header`,
    });
    return false;
  }

  /** Resolves the calling principal for a write, or answers the request itself. */
  function requireCaller(req: FastifyRequest, reply: FastifyReply): string | null {
    if (!requireServiceAuth(req, reply)) return null;
    const caller = parsePrincipalHeader(req.headers[PRINCIPAL_HEADER]);
    if (!caller) {
      reply.code(401).send({
        error: "missing_principal",
        message: `Set '${PRINCIPAL_HEADER}' header`,
      });
      return null;
    }
    if (!identityProvider.isRegistered(caller)) {
      reply.code(403).send({ error: "unregistered_identity" });
      return null;
    }
    return caller;
  }

  function replayIdempotentIfExists(
    reply: FastifyReply,
    action: EscrowAction,
    idempotencyKey: string,
    requestHash: string,
  ): boolean {
    const existing = store.getIdempotencyRecord(action, idempotencyKey);
    if (!existing) return false;

    if (existing.requestHash !== requestHash) {
      reply.code(409).send({
        error: "idempotency_key_reuse_conflict",
        message: "Idempotency key already used with different payload",
      });
      return true;
    }

    reply.code(existing.responseStatus).send(existing.responseBody);
    return true;
  }

  function saveIdempotentResponse(
    action: EscrowAction,
    idempotencyKey: string,
    requestHash: string,
    responseStatus: number,
    responseBody: unknown,
  ): void {
    store.putIdempotencyRecord({
      action,
      idempotencyKey,
      requestHash,
      responseStatus,
      responseBody,
      createdAt: new Date().toISOString(),
    });
  }

  app.get("/health", async () => ({ ok: true, service: "trust-engine" }));

  app.get("/authority", async () => {
    const response: AuthorityResponse = { authority: engine.config.getAuthority() };
    return response;
  });

  app.post("/authority", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseSetAuthorityRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected principal");

    const result = engine.config.setAuthority(parsed.principal);
    if (!result.ok) return sendEngineError(reply, result.error);
    req.log.info({ authority: result.value, caller }, "authority set");
    const response: AuthorityResponse = { authority: result.value };
    return reply.code(201).send(response);
  });

  app.get("/policy", async () => {
    const response: PolicyResponse = { policy: engine.config.getPolicy() };
    return response;
  });

  const policySetters = {
    "fraud-threshold": (caller: string, value: number) =>
      engine.config.setFraudThreshold(caller, value),
    "min-reputation": (caller: string, value: number) =>
      engine.config.setMinReputation(caller, value),
    "max-risk-score": (caller: string, value: number) =>
      engine.config.setMaxRiskScore(caller, value),
  };

  for (const [path, setter] of Object.entries(policySetters)) {
    app.post(`/policy/${path}`, async (req, reply) => {
      const caller = requireCaller(req, reply);
      if (!caller) return;

      const parsed = parseSetPolicyValueRequest(req.body);
      if (!parsed) return sendInvalidRequest(reply, "Expected integer value");

      const result = setter(caller, parsed.value);
      if (!result.ok) return sendEngineError(reply, result.error);
      const response: PolicyValueResponse = { value: result.value };
      return response;
    });
  }

  app.post("/policy/anomaly-detection/toggle", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const result = engine.config.toggleAnomalyDetection(caller);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ToggleAnomalyDetectionResponse = { anomalyDetectionEnabled: result.value };
    return response;
  });

  app.get("/blacklist/:sellerId", async (req) => {
    const params = req.params as { sellerId: string };
    const response: BlacklistResponse = {
      sellerId: params.sellerId,
      blacklisted: engine.config.isBlacklisted(params.sellerId),
    };
    return response;
  });

  app.post("/blacklist/:sellerId", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const params = req.params as { sellerId: string };
    const result = engine.config.blacklistSeller(caller, params.sellerId);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: BlacklistResponse = { sellerId: params.sellerId, blacklisted: result.value };
    return response;
  });

  app.delete("/blacklist/:sellerId", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const params = req.params as { sellerId: string };
    const result = engine.config.unblacklistSeller(caller, params.sellerId);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: BlacklistResponse = { sellerId: params.sellerId, blacklisted: result.value };
    return response;
  });

  app.get("/reputation/:principal", async (req) => {
    const params = req.params as { principal: string };
    const response: ReputationResponse = {
      principal: params.principal,
      score: engine.reputation.getReputation(params.principal),
    };
    return response;
  });

  app.post("/reputation/:principal", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const params = req.params as { principal: string };
    const parsed = parseSetReputationRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected integer score");

    const result = engine.reputation.setReputation(caller, params.principal, parsed.score);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ReputationResponse = { principal: params.principal, score: result.value };
    return response;
  });

  app.post("/listings/submit", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseSubmitListingRequest(req.body);
    if (!parsed) {
      return sendInvalidRequest(
        reply,
        "Expected id, itemHash, sellerId, sellerReputation, price, category, location, currency",
      );
    }

    const result = engine.listings.submitListing(caller, parsed);
    if (!result.ok) {
      req.log.info({ listingId: parsed.id, error: result.error }, "listing rejected");
      return sendEngineError(reply, result.error);
    }
    const response: ListingResponse = { listing: result.value };
    return reply.code(201).send(response);
  });

  app.get("/listings", async (req, reply) => {
    const query = req.query as { status?: string };
    if (query.status !== undefined && !isListingStatus(query.status)) {
      return reply.code(400).send({
        error: "invalid_query",
        message: "status must be one of ACTIVE, PAUSED, CLOSED",
      });
    }
    const status = isListingStatus(query.status) ? query.status : undefined;
    const response: ListListingsResponse = { listings: engine.listings.listListings({ status }) };
    return response;
  });

  app.get("/listings/by-hash/:itemHash", async (req, reply) => {
    const params = req.params as { itemHash: string };
    const listingId = engine.listings.getListingIdByHash(params.itemHash);
    if (listingId === null) return sendEngineError(reply, "ListingNotFound");
    const response: ListingByHashResponse = { itemHash: params.itemHash, listingId };
    return response;
  });

  app.get("/listings/:listingId", async (req, reply) => {
    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return reply.code(400).send({ error: "invalid_listing_id" });

    const listing = engine.listings.getListing(listingId);
    if (!listing) return sendEngineError(reply, "ListingNotFound");
    const response: ListingResponse = { listing };
    return response;
  });

  app.get("/listings/:listingId/audit", async (req, reply) => {
    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return reply.code(400).send({ error: "invalid_listing_id" });
    if (!engine.listings.getListing(listingId)) return sendEngineError(reply, "ListingNotFound");

    const response: GetListingAuditResponse = {
      listingId,
      events: engine.listings.getAuditEvents(listingId),
    };
    return response;
  });

  app.get("/listings/:listingId/risk", async (req, reply) => {
    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return reply.code(400).send({ error: "invalid_listing_id" });
    if (!engine.listings.getListing(listingId)) return sendEngineError(reply, "ListingNotFound");

    const response: ListingRiskResponse = {
      listingId,
      riskScore: engine.listings.getRiskScore(listingId),
    };
    return response;
  });

  app.get("/listings/:listingId/flag", async (req, reply) => {
    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return reply.code(400).send({ error: "invalid_listing_id" });

    const flagged = engine.listings.getFlaggedListing(listingId);
    if (!flagged) return reply.code(404).send({ error: "flag_not_found" });
    const response: FlaggedListingResponse = { flagged };
    return response;
  });

  app.post("/listings/:listingId/flag", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    const parsed = parseFlagListingRequest(req.body);
    if (listingId === null || !parsed) {
      return sendInvalidRequest(reply, "Expected listingId param, reason and integer riskScore");
    }

    const result = engine.listings.flagListing(caller, listingId, parsed.reason, parsed.riskScore);
    if (!result.ok) return sendEngineError(reply, result.error);
    req.log.info({ listingId, riskScore: parsed.riskScore }, "listing flagged");
    const response: FlaggedListingResponse = { flagged: result.value };
    return response;
  });

  app.post("/listings/:listingId/unflag", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return sendInvalidRequest(reply, "Expected listingId param");

    const result = engine.listings.unflagListing(caller, listingId);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ListingResponse = { listing: result.value };
    return response;
  });

  app.post("/listings/:listingId/price", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    const parsed = parseUpdateListingPriceRequest(req.body);
    if (listingId === null || !parsed) {
      return sendInvalidRequest(reply, "Expected listingId param and integer price");
    }

    const result = engine.listings.updateListingPrice(caller, listingId, parsed.price);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ListingResponse = { listing: result.value };
    return response;
  });

  app.post("/listings/:listingId/pause", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return sendInvalidRequest(reply, "Expected listingId param");

    const result = engine.listings.pauseListing(caller, listingId);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ListingResponse = { listing: result.value };
    return response;
  });

  app.post("/listings/:listingId/resume", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return sendInvalidRequest(reply, "Expected listingId param");

    const result = engine.listings.resumeListing(caller, listingId);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: ListingResponse = { listing: result.value };
    return response;
  });

  app.post("/escrow/open", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseOpenEscrowRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected listingId, buyerId, amount, currency");

    const idempotencyKey = readIdempotencyKey(req);
    if (!idempotencyKey) {
      return reply.code(400).send({
        error: "missing_idempotency_key",
        message: `Set '${IDEMPOTENCY_HEADER}' header`,
      });
    }

    const requestHash = sha256Hex(canonicalJson({ caller, ...parsed }));
    if (replayIdempotentIfExists(reply, "OPEN_ESCROW", idempotencyKey, requestHash)) {
      return;
    }

    const result = engine.escrow.openEscrow(caller, parsed);
    if (!result.ok) return sendEngineError(reply, result.error);

    const response: EscrowResponse = { escrow: result.value };
    saveIdempotentResponse("OPEN_ESCROW", idempotencyKey, requestHash, 201, response);
    return reply.code(201).send(response);
  });

  app.post("/escrow/confirm", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseConfirmReceiptRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected listingId");

    const idempotencyKey = readIdempotencyKey(req);
    if (!idempotencyKey) {
      return reply.code(400).send({
        error: "missing_idempotency_key",
        message: `Set '${IDEMPOTENCY_HEADER}' header`,
      });
    }

    const requestHash = sha256Hex(canonicalJson({ caller, ...parsed }));
    if (replayIdempotentIfExists(reply, "CONFIRM_RECEIPT", idempotencyKey, requestHash)) {
      return;
    }

    const result = engine.escrow.confirmReceipt(caller, parsed.listingId);
    if (!result.ok) return sendEngineError(reply, result.error);
    req.log.info(
      { listingId: parsed.listingId, reputation: result.value.reputation },
      "escrow released",
    );

    const response: EscrowResponse = { escrow: result.value.escrow };
    saveIdempotentResponse("CONFIRM_RECEIPT", idempotencyKey, requestHash, 200, response);
    return response;
  });

  app.get("/escrow/:listingId", async (req, reply) => {
    const listingId = parseListingIdParam((req.params as { listingId?: string }).listingId);
    if (listingId === null) return reply.code(400).send({ error: "invalid_listing_id" });

    const escrow = engine.escrow.getEscrow(listingId);
    if (!escrow) return reply.code(404).send({ error: "escrow_not_found" });
    const response: EscrowResponse = { escrow };
    return response;
  });

  app.post("/disputes/open", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const parsed = parseOpenDisputeRequest(req.body);
    if (!parsed) return sendInvalidRequest(reply, "Expected listingId and evidenceRefs string array");

    const result = engine.disputes.openDispute(caller, parsed.listingId, parsed.evidenceRefs);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: DisputeResponse = { dispute: result.value };
    return reply.code(201).send(response);
  });

  app.post("/disputes/:disputeId/evidence", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const params = req.params as { disputeId?: string };
    const parsed = parseSubmitEvidenceRequest(req.body);
    if (!isNonEmptyString(params.disputeId) || !parsed) {
      return sendInvalidRequest(reply, "Expected disputeId param and evidenceRef");
    }

    const result = engine.disputes.submitEvidence(caller, params.disputeId, parsed.evidenceRef);
    if (!result.ok) return sendEngineError(reply, result.error);
    const response: DisputeResponse = { dispute: result.value };
    return response;
  });

  app.post("/disputes/:disputeId/rule", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) return;

    const params = req.params as { disputeId?: string };
    const parsed = parseRuleDisputeRequest(req.body);
    if (!isNonEmptyString(params.disputeId) || !parsed) {
      return sendInvalidRequest(reply, "Expected disputeId param and ruling RELEASE or REFUND");
    }

    const result = engine.disputes.ruleDispute(caller, params.disputeId, parsed.ruling);
    if (!result.ok) return sendEngineError(reply, result.error);
    req.log.info(
      { disputeId: params.disputeId, ruling: parsed.ruling, arbitrator: caller },
      "dispute ruled",
    );
    const response: RuleDisputeResponse = {
      dispute: result.value.dispute,
      escrow: result.value.escrow,
    };
    return response;
  });

  app.get("/disputes/:disputeId", async (req, reply) => {
    const params = req.params as { disputeId?: string };
    if (!isNonEmptyString(params.disputeId)) {
      return reply.code(400).send({ error: "invalid_dispute_id" });
    }
    const dispute = engine.disputes.getDispute(params.disputeId);
    if (!dispute) return sendEngineError(reply, "DisputeNotFound");
    const response: DisputeResponse = { dispute };
    return response;
  });

  app.get("/disputes", async (req, reply) => {
    const query = req.query as { state?: string };
    if (query.state !== undefined && !isDisputeState(query.state)) {
      return reply.code(400).send({ error: "invalid_state" });
    }
    const state = isDisputeState(query.state) ? query.state : undefined;
    const response: ListDisputesResponse = { disputes: engine.disputes.listDisputes(state) };
    return response;
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
