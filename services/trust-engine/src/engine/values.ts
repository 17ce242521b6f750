import { randomUUID } from "node:crypto";
import { CURRENCIES, type Currency } from "@p2p-trust/shared";

export function isUint(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function isPositiveUint(value: number): boolean {
  return Number.isSafeInteger(value) && value > 0;
}

export function isCurrency(value: string): value is Currency {
  return CURRENCIES.some((currency) => currency === value);
}

export function nowIso(): string {
  return new Date().toISOString();
}

export function prefixedIdNow(prefix: string): string {
  return `${prefix}-${nowIso()}-${randomUUID().split("-")[0]}`;
}
