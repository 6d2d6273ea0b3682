import { NOT_AVAILABLE } from "../types";

const THOUSANDS_SEPARATOR = /,/g;
const CANONICAL_PRICE = /^[0-9]+(\.[0-9]+)?$/;

const utf8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Normalize an accessible price label such as "Price: $1,249.50" to "1249.50".
 *
 * Preconditions on the decoded text:
 * - it contains a colon; the amount is whatever follows the last one
 * - the amount starts with exactly one currency character
 * - thousands are grouped with commas, decimals use a period
 *
 * Anything else (invalid UTF-8, no colon, empty amount, leftover
 * non-digits) yields NOT_AVAILABLE. Never throws.
 */
export function normalizePrice(raw: Uint8Array | string): string {
  let text: string;
  if (typeof raw === "string") {
    text = raw;
  } else {
    try {
      text = utf8.decode(raw);
    } catch {
      return NOT_AVAILABLE;
    }
  }

  const colon = text.lastIndexOf(":");
  if (colon === -1) return NOT_AVAILABLE;

  const amount = text.slice(colon + 1).trim();
  if (!amount) return NOT_AVAILABLE;

  // Drop the currency symbol by code point so "₹" or "€" count as one
  const digits = Array.from(amount).slice(1).join("").replace(THOUSANDS_SEPARATOR, "");

  return CANONICAL_PRICE.test(digits) ? digits : NOT_AVAILABLE;
}
