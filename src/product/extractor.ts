import * as cheerio from "cheerio";
import { NOT_AVAILABLE, type ProductRecord } from "../types";
import { normalizePrice } from "./price";
import { type UrlShape, defaultUrlShape } from "./url-shape";

/** Visually hidden label, e.g. "List Price: $1,249.50" */
const ORIGINAL_PRICE_SELECTOR = "span.a-size-small.aok-offscreen";
/** Visible whole-number part of the buying price */
const DISCOUNTED_PRICE_SELECTOR = "span.a-price-whole";
/** Star icon alt text, e.g. "4.3 out of 5 stars" */
const RATING_SELECTOR = "span.a-icon-alt";

const encoder = new TextEncoder();

/** Trimmed text of the first match, or null when absent or blank */
function firstText($: cheerio.CheerioAPI, selector: string): string | null {
  const el = $(selector).first();
  if (!el.length) return null;
  const text = el.text().trim();
  return text || null;
}

/**
 * Extract a product record from page HTML.
 * Name and catalog ID come from the URL; prices and rating from the markup.
 * Missing elements become NOT_AVAILABLE. A URL the shape cannot name
 * throws StructuralUrlError.
 */
export function extractProduct(
  markup: string,
  sourceUrl: string,
  shape: UrlShape = defaultUrlShape
): ProductRecord {
  const catalogId = shape.catalogId(sourceUrl);
  const productName = shape.productName(sourceUrl);

  const $ = cheerio.load(markup);

  const priceLabel = firstText($, ORIGINAL_PRICE_SELECTOR);
  const originalPrice =
    priceLabel !== null ? normalizePrice(encoder.encode(priceLabel)) : NOT_AVAILABLE;

  return {
    sourceUrl,
    productName,
    catalogId,
    originalPrice,
    // Kept as rendered; only the hidden label goes through normalizePrice
    discountedPrice: firstText($, DISCOUNTED_PRICE_SELECTOR) ?? NOT_AVAILABLE,
    rating: firstText($, RATING_SELECTOR) ?? NOT_AVAILABLE,
  };
}

/** Record emitted for a URL whose fetch or extraction failed */
export function unavailableRecord(sourceUrl: string): ProductRecord {
  return {
    sourceUrl,
    productName: NOT_AVAILABLE,
    catalogId: null,
    originalPrice: NOT_AVAILABLE,
    discountedPrice: NOT_AVAILABLE,
    rating: NOT_AVAILABLE,
  };
}
