import { monotonicFactory } from "ulid";

// Crockford Base32: digits and upper-case letters without I, L, O, U.
const ULID_PATTERN = /^[0-9A-HJKMNP-TV-Z]{26}$/i;

const nextUlid = monotonicFactory();

export function newEventId(): string {
  return nextUlid();
}

export function isValidId(id: string): boolean {
  return ULID_PATTERN.test(id);
}
