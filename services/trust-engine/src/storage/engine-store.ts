import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import {
  DEFAULT_POLICY,
  type Dispute,
  type DisputeState,
  type EngineErrorKind,
  type EngineResult,
  type EscrowRecord,
  type FlaggedListing,
  type Listing,
  type ListingAuditEvent,
  type ListingStatus,
  type PolicyConfig,
  fail,
} from "@p2p-trust/shared";

export interface ListListingsFilter {
  status?: ListingStatus;
}

export interface IdempotencyRecord {
  action: string;
  idempotencyKey: string;
  requestHash: string;
  responseStatus: number;
  responseBody: unknown;
  createdAt: string;
}

/**
 * Single authoritative state for the engine. Every engine operation runs
 * through `atomic`, so a failed result leaves no writes behind.
 */
export interface EngineStore {
  atomic<T>(operation: () => EngineResult<T>): EngineResult<T>;

  getAuthority(): string | null;
  setAuthority(principal: string): void;
  getPolicy(): PolicyConfig;
  putPolicy(policy: PolicyConfig): void;

  isBlacklisted(sellerId: string): boolean;
  addToBlacklist(sellerId: string): void;
  removeFromBlacklist(sellerId: string): void;

  getReputation(principal: string): number | null;
  putReputation(principal: string, score: number): void;

  getListingIdByHash(itemHash: string): number | null;
  appendHistory(itemHash: string, listingId: number): void;
  getListing(listingId: number): Listing | null;
  putListing(listing: Listing): void;
  listListings(filter?: ListListingsFilter): Listing[];

  getFlag(listingId: number): FlaggedListing | null;
  putFlag(flag: FlaggedListing): void;
  deleteFlag(listingId: number): void;

  getEscrow(listingId: number): EscrowRecord | null;
  putEscrow(escrow: EscrowRecord): void;

  getDispute(disputeId: string): Dispute | null;
  putDispute(dispute: Dispute): void;
  findOpenDispute(escrowListingId: number): Dispute | null;
  listDisputes(state?: DisputeState): Dispute[];

  appendAuditEvent(event: ListingAuditEvent): void;
  getAuditEvents(listingId: number): ListingAuditEvent[];

  getIdempotencyRecord(action: string, idempotencyKey: string): IdempotencyRecord | null;
  putIdempotencyRecord(record: IdempotencyRecord): void;

  close(): void;
}

class RollbackSignal extends Error {
  constructor(readonly kind: EngineErrorKind) {
    super(`rollback:${kind}`);
  }
}

interface ValueRow {
  value_json: string;
}

interface ListingRow {
  listing_json: string;
}

interface FlagRow {
  flag_json: string;
}

interface EscrowRow {
  escrow_json: string;
}

interface DisputeRow {
  dispute_json: string;
}

interface AuditRow {
  event_json: string;
}

interface HistoryRow {
  listing_id: number;
}

interface ScoreRow {
  score: number;
}

interface IdempotencyRow {
  action: string;
  idempotency_key: string;
  request_hash: string;
  response_status: number;
  response_json: string;
  created_at: string;
}

const AUTHORITY_KEY = "authority";
const POLICY_KEY = "policy";

export class SqliteEngineStore implements EngineStore {
  private readonly db: Database.Database;
  private readonly getConfigStmt: Database.Statement<[string], ValueRow>;
  private readonly putConfigStmt: Database.Statement<[string, string]>;
  private readonly seedConfigStmt: Database.Statement<[string, string]>;
  private readonly getBlacklistStmt: Database.Statement<[string], { seller_id: string }>;
  private readonly addBlacklistStmt: Database.Statement<[string, string]>;
  private readonly removeBlacklistStmt: Database.Statement<[string]>;
  private readonly getReputationStmt: Database.Statement<[string], ScoreRow>;
  private readonly putReputationStmt: Database.Statement<[string, number, string]>;
  private readonly getHistoryStmt: Database.Statement<[string], HistoryRow>;
  private readonly appendHistoryStmt: Database.Statement<[string, number, string]>;
  private readonly getListingStmt: Database.Statement<[number], ListingRow>;
  private readonly putListingStmt: Database.Statement<[number, string, string, string]>;
  private readonly listAllListingsStmt: Database.Statement<[], ListingRow>;
  private readonly listListingsByStatusStmt: Database.Statement<[string], ListingRow>;
  private readonly getFlagStmt: Database.Statement<[number], FlagRow>;
  private readonly putFlagStmt: Database.Statement<[number, string]>;
  private readonly deleteFlagStmt: Database.Statement<[number]>;
  private readonly getEscrowStmt: Database.Statement<[number], EscrowRow>;
  private readonly putEscrowStmt: Database.Statement<[number, string, string]>;
  private readonly getDisputeStmt: Database.Statement<[string], DisputeRow>;
  private readonly putDisputeStmt: Database.Statement<[string, number, string, string, string]>;
  private readonly findOpenDisputeStmt: Database.Statement<[number], DisputeRow>;
  private readonly listAllDisputesStmt: Database.Statement<[], DisputeRow>;
  private readonly listDisputesByStateStmt: Database.Statement<[string], DisputeRow>;
  private readonly putAuditStmt: Database.Statement<[string, number, string, string, string, string]>;
  private readonly getAuditStmt: Database.Statement<[number], AuditRow>;
  private readonly getIdempotencyStmt: Database.Statement<[string, string], IdempotencyRow>;
  private readonly putIdempotencyStmt: Database.Statement<
    [string, string, string, number, string, string]
  >;

  constructor(dbPath: string, initialPolicy: PolicyConfig = DEFAULT_POLICY) {
    if (dbPath !== ":memory:") {
      mkdirSync(dirname(dbPath), { recursive: true });
    }
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS engine_config (
        key TEXT PRIMARY KEY,
        value_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS seller_blacklist (
        seller_id TEXT PRIMARY KEY,
        added_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS reputation_scores (
        principal TEXT PRIMARY KEY,
        score INTEGER NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS listing_history (
        item_hash TEXT PRIMARY KEY,
        listing_id INTEGER NOT NULL,
        recorded_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS listings (
        listing_id INTEGER PRIMARY KEY,
        status TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        listing_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_listings_status
      ON listings(status, listing_id ASC);

      CREATE TABLE IF NOT EXISTS flagged_listings (
        listing_id INTEGER PRIMARY KEY,
        flag_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS escrow_records (
        listing_id INTEGER PRIMARY KEY,
        state TEXT NOT NULL,
        escrow_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS disputes (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        dispute_id TEXT NOT NULL UNIQUE,
        escrow_listing_id INTEGER NOT NULL,
        state TEXT NOT NULL,
        opened_at TEXT NOT NULL,
        dispute_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_disputes_escrow_state
      ON disputes(escrow_listing_id, state);

      CREATE TABLE IF NOT EXISTS listing_audit_events (
        seq INTEGER PRIMARY KEY AUTOINCREMENT,
        event_id TEXT NOT NULL UNIQUE,
        listing_id INTEGER NOT NULL,
        event_type TEXT NOT NULL,
        actor TEXT NOT NULL,
        occurred_at TEXT NOT NULL,
        event_json TEXT NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_listing_audit_listing
      ON listing_audit_events(listing_id, seq ASC);

      CREATE TABLE IF NOT EXISTS escrow_idempotency (
        action TEXT NOT NULL,
        idempotency_key TEXT NOT NULL,
        request_hash TEXT NOT NULL,
        response_status INTEGER NOT NULL,
        response_json TEXT NOT NULL,
        created_at TEXT NOT NULL,
        PRIMARY KEY(action, idempotency_key)
      );
    `);

    this.getConfigStmt = this.db.prepare(`
      SELECT value_json FROM engine_config WHERE key = ? LIMIT 1
    `) as Database.Statement<[string], ValueRow>;

    this.putConfigStmt = this.db.prepare(`
      INSERT INTO engine_config (key, value_json) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value_json = excluded.value_json
    `);

    this.seedConfigStmt = this.db.prepare(`
      INSERT INTO engine_config (key, value_json) VALUES (?, ?)
      ON CONFLICT(key) DO NOTHING
    `);

    this.getBlacklistStmt = this.db.prepare(`
      SELECT seller_id FROM seller_blacklist WHERE seller_id = ? LIMIT 1
    `) as Database.Statement<[string], { seller_id: string }>;

    this.addBlacklistStmt = this.db.prepare(`
      INSERT INTO seller_blacklist (seller_id, added_at) VALUES (?, ?)
      ON CONFLICT(seller_id) DO NOTHING
    `);

    this.removeBlacklistStmt = this.db.prepare(`
      DELETE FROM seller_blacklist WHERE seller_id = ?
    `);

    this.getReputationStmt = this.db.prepare(`
      SELECT score FROM reputation_scores WHERE principal = ? LIMIT 1
    `) as Database.Statement<[string], ScoreRow>;

    this.putReputationStmt = this.db.prepare(`
      INSERT INTO reputation_scores (principal, score, updated_at) VALUES (?, ?, ?)
      ON CONFLICT(principal) DO UPDATE SET
        score = excluded.score,
        updated_at = excluded.updated_at
    `);

    this.getHistoryStmt = this.db.prepare(`
      SELECT listing_id FROM listing_history WHERE item_hash = ? LIMIT 1
    `) as Database.Statement<[string], HistoryRow>;

    this.appendHistoryStmt = this.db.prepare(`
      INSERT INTO listing_history (item_hash, listing_id, recorded_at) VALUES (?, ?, ?)
    `);

    this.getListingStmt = this.db.prepare(`
      SELECT listing_json FROM listings WHERE listing_id = ? LIMIT 1
    `) as Database.Statement<[number], ListingRow>;

    this.putListingStmt = this.db.prepare(`
      INSERT INTO listings (listing_id, status, updated_at, listing_json)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(listing_id) DO UPDATE SET
        status = excluded.status,
        updated_at = excluded.updated_at,
        listing_json = excluded.listing_json
    `);

    this.listAllListingsStmt = this.db.prepare(`
      SELECT listing_json FROM listings ORDER BY listing_id ASC
    `) as Database.Statement<[], ListingRow>;

    this.listListingsByStatusStmt = this.db.prepare(`
      SELECT listing_json FROM listings WHERE status = ? ORDER BY listing_id ASC
    `) as Database.Statement<[string], ListingRow>;

    this.getFlagStmt = this.db.prepare(`
      SELECT flag_json FROM flagged_listings WHERE listing_id = ? LIMIT 1
    `) as Database.Statement<[number], FlagRow>;

    this.putFlagStmt = this.db.prepare(`
      INSERT INTO flagged_listings (listing_id, flag_json) VALUES (?, ?)
      ON CONFLICT(listing_id) DO UPDATE SET flag_json = excluded.flag_json
    `);

    this.deleteFlagStmt = this.db.prepare(`
      DELETE FROM flagged_listings WHERE listing_id = ?
    `);

    this.getEscrowStmt = this.db.prepare(`
      SELECT escrow_json FROM escrow_records WHERE listing_id = ? LIMIT 1
    `) as Database.Statement<[number], EscrowRow>;

    this.putEscrowStmt = this.db.prepare(`
      INSERT INTO escrow_records (listing_id, state, escrow_json) VALUES (?, ?, ?)
      ON CONFLICT(listing_id) DO UPDATE SET
        state = excluded.state,
        escrow_json = excluded.escrow_json
    `);

    this.getDisputeStmt = this.db.prepare(`
      SELECT dispute_json FROM disputes WHERE dispute_id = ? LIMIT 1
    `) as Database.Statement<[string], DisputeRow>;

    this.putDisputeStmt = this.db.prepare(`
      INSERT INTO disputes (dispute_id, escrow_listing_id, state, opened_at, dispute_json)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(dispute_id) DO UPDATE SET
        state = excluded.state,
        dispute_json = excluded.dispute_json
    `);

    this.findOpenDisputeStmt = this.db.prepare(`
      SELECT dispute_json FROM disputes
      WHERE escrow_listing_id = ? AND state = 'OPEN'
      ORDER BY seq ASC
      LIMIT 1
    `) as Database.Statement<[number], DisputeRow>;

    this.listAllDisputesStmt = this.db.prepare(`
      SELECT dispute_json FROM disputes ORDER BY seq ASC
    `) as Database.Statement<[], DisputeRow>;

    this.listDisputesByStateStmt = this.db.prepare(`
      SELECT dispute_json FROM disputes WHERE state = ? ORDER BY seq ASC
    `) as Database.Statement<[string], DisputeRow>;

    this.putAuditStmt = this.db.prepare(`
      INSERT INTO listing_audit_events (event_id, listing_id, event_type, actor, occurred_at, event_json)
      VALUES (?, ?, ?, ?, ?, ?)
    `);

    this.getAuditStmt = this.db.prepare(`
      SELECT event_json FROM listing_audit_events
      WHERE listing_id = ?
      ORDER BY seq ASC
    `) as Database.Statement<[number], AuditRow>;

    this.getIdempotencyStmt = this.db.prepare(`
      SELECT action, idempotency_key, request_hash, response_status, response_json, created_at
      FROM escrow_idempotency
      WHERE action = ? AND idempotency_key = ?
      LIMIT 1
    `) as Database.Statement<[string, string], IdempotencyRow>;

    this.putIdempotencyStmt = this.db.prepare(`
      INSERT INTO escrow_idempotency (action, idempotency_key, request_hash, response_status, response_json, created_at)
      VALUES (?, ?, ?, ?, ?, ?)
      ON CONFLICT(action, idempotency_key) DO NOTHING
    `);

    this.seedConfigStmt.run(POLICY_KEY, JSON.stringify(initialPolicy));
  }

  atomic<T>(operation: () => EngineResult<T>): EngineResult<T> {
    const run = this.db.transaction((): EngineResult<T> => {
      const result = operation();
      if (!result.ok) throw new RollbackSignal(result.error);
      return result;
    });
    try {
      return run();
    } catch (err) {
      if (err instanceof RollbackSignal) return fail(err.kind);
      throw err;
    }
  }

  getAuthority(): string | null {
    const row = this.getConfigStmt.get(AUTHORITY_KEY);
    if (!row) return null;
    return JSON.parse(row.value_json) as string;
  }

  setAuthority(principal: string): void {
    this.putConfigStmt.run(AUTHORITY_KEY, JSON.stringify(principal));
  }

  getPolicy(): PolicyConfig {
    const row = this.getConfigStmt.get(POLICY_KEY);
    if (!row) return { ...DEFAULT_POLICY };
    return JSON.parse(row.value_json) as PolicyConfig;
  }

  putPolicy(policy: PolicyConfig): void {
    this.putConfigStmt.run(POLICY_KEY, JSON.stringify(policy));
  }

  isBlacklisted(sellerId: string): boolean {
    return this.getBlacklistStmt.get(sellerId) !== undefined;
  }

  addToBlacklist(sellerId: string): void {
    this.addBlacklistStmt.run(sellerId, new Date().toISOString());
  }

  removeFromBlacklist(sellerId: string): void {
    this.removeBlacklistStmt.run(sellerId);
  }

  getReputation(principal: string): number | null {
    const row = this.getReputationStmt.get(principal);
    return row ? row.score : null;
  }

  putReputation(principal: string, score: number): void {
    this.putReputationStmt.run(principal, score, new Date().toISOString());
  }

  getListingIdByHash(itemHash: string): number | null {
    const row = this.getHistoryStmt.get(itemHash);
    return row ? row.listing_id : null;
  }

  appendHistory(itemHash: string, listingId: number): void {
    this.appendHistoryStmt.run(itemHash, listingId, new Date().toISOString());
  }

  getListing(listingId: number): Listing | null {
    const row = this.getListingStmt.get(listingId);
    if (!row) return null;
    return JSON.parse(row.listing_json) as Listing;
  }

  putListing(listing: Listing): void {
    this.putListingStmt.run(
      listing.id,
      listing.status,
      listing.updatedAt,
      JSON.stringify(listing),
    );
  }

  listListings(filter: ListListingsFilter = {}): Listing[] {
    const rows =
      filter.status !== undefined
        ? this.listListingsByStatusStmt.all(filter.status)
        : this.listAllListingsStmt.all();
    return rows.map((row) => JSON.parse(row.listing_json) as Listing);
  }

  getFlag(listingId: number): FlaggedListing | null {
    const row = this.getFlagStmt.get(listingId);
    if (!row) return null;
    return JSON.parse(row.flag_json) as FlaggedListing;
  }

  putFlag(flag: FlaggedListing): void {
    this.putFlagStmt.run(flag.listingId, JSON.stringify(flag));
  }

  deleteFlag(listingId: number): void {
    this.deleteFlagStmt.run(listingId);
  }

  getEscrow(listingId: number): EscrowRecord | null {
    const row = this.getEscrowStmt.get(listingId);
    if (!row) return null;
    return JSON.parse(row.escrow_json) as EscrowRecord;
  }

  putEscrow(escrow: EscrowRecord): void {
    this.putEscrowStmt.run(escrow.listingId, escrow.state, JSON.stringify(escrow));
  }

  getDispute(disputeId: string): Dispute | null {
    const row = this.getDisputeStmt.get(disputeId);
    if (!row) return null;
    return JSON.parse(row.dispute_json) as Dispute;
  }

  putDispute(dispute: Dispute): void {
    this.putDisputeStmt.run(
      dispute.disputeId,
      dispute.escrowListingId,
      dispute.state,
      dispute.openedAt,
      JSON.stringify(dispute),
    );
  }

  findOpenDispute(escrowListingId: number): Dispute | null {
    const row = this.findOpenDisputeStmt.get(escrowListingId);
    if (!row) return null;
    return JSON.parse(row.dispute_json) as Dispute;
  }

  listDisputes(state?: DisputeState): Dispute[] {
    const rows = state ? this.listDisputesByStateStmt.all(state) : this.listAllDisputesStmt.all();
    return rows.map((row) => JSON.parse(row.dispute_json) as Dispute);
  }

  appendAuditEvent(event: ListingAuditEvent): void {
    this.putAuditStmt.run(
      event.eventId,
      event.listingId,
      event.type,
      event.actor,
      event.occurredAt,
      JSON.stringify(event),
    );
  }

  getAuditEvents(listingId: number): ListingAuditEvent[] {
    const rows = this.getAuditStmt.all(listingId);
    return rows.map((row) => JSON.parse(row.event_json) as ListingAuditEvent);
  }

  getIdempotencyRecord(action: string, idempotencyKey: string): IdempotencyRecord | null {
    const row = this.getIdempotencyStmt.get(action, idempotencyKey);
    if (!row) return null;
    return {
      action: row.action,
      idempotencyKey: row.idempotency_key,
      requestHash: row.request_hash,
      responseStatus: row.response_status,
      responseBody: JSON.parse(row.response_json),
      createdAt: row.created_at,
    };
  }

  putIdempotencyRecord(record: IdempotencyRecord): void {
    this.putIdempotencyStmt.run(
      record.action,
      record.idempotencyKey,
      record.requestHash,
      record.responseStatus,
      JSON.stringify(record.responseBody),
      record.createdAt,
    );
  }

  close(): void {
    this.db.close();
  }
}
