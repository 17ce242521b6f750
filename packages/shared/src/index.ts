export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./auth/service-auth.js";
export * from "./auth/principals.js";
export * from "./types/listing.js";
export * from "./types/escrow.js";
export * from "./types/dispute.js";
export * from "./types/policy.js";
export * from "./types/errors.js";
export * from "./types/api.js";
