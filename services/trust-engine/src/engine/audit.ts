import type { ListingAuditEvent, ListingAuditEventType } from "@p2p-trust/shared";
import type { EngineStore } from "../storage/engine-store.js";
import { nowIso, prefixedIdNow } from "./values.js";

export function writeAuditEvent(
  store: EngineStore,
  listingId: number,
  type: ListingAuditEventType,
  actor: string,
  details?: Record<string, unknown>,
): ListingAuditEvent {
  const event: ListingAuditEvent = {
    eventId: prefixedIdNow("AUD"),
    listingId,
    type,
    actor,
    occurredAt: nowIso(),
    details,
  };
  store.appendAuditEvent(event);
  return event;
}
