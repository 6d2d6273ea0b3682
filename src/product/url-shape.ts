import { StructuralUrlError } from "../core/errors";

/**
 * How a site encodes product identity in its URLs.
 * Swap the implementation to support another layout without touching the extractor.
 */
export interface UrlShape {
  /** Human-readable product name; throws StructuralUrlError if the URL lacks it */
  productName(url: string): string;
  /** Catalog identifier, or null when the URL carries none */
  catalogId(url: string): string | null;
}

export interface PathSegmentShapeOptions {
  /** Index into `url.split("/")`; 3 is the first path segment of "https://host/…" */
  segmentIndex?: number;
  /** First capture group is the catalog identifier */
  catalogIdPattern?: RegExp;
}

const DEFAULT_CATALOG_ID_PATTERN = /\/dp\/([A-Z0-9]+)/;

/** Strip query string and fragment; they are not part of the path layout */
function stripQuery(url: string): string {
  return url.split(/[?#]/)[0];
}

/**
 * Slug-style product URLs: "https://host/<name-with-hyphens>/dp/<ID>".
 */
export function pathSegmentShape(options: PathSegmentShapeOptions = {}): UrlShape {
  const segmentIndex = options.segmentIndex ?? 3;
  const catalogIdPattern = options.catalogIdPattern ?? DEFAULT_CATALOG_ID_PATTERN;

  return {
    productName(url: string): string {
      const segments = stripQuery(url).split("/");
      const segment = segments[segmentIndex];
      if (segment === undefined || segment === "") {
        throw new StructuralUrlError(
          url,
          `URL has no path segment at position ${segmentIndex} to derive a product name from`
        );
      }
      return segment.replace(/-/g, " ");
    },

    catalogId(url: string): string | null {
      const match = catalogIdPattern.exec(url);
      return match?.[1] ?? null;
    },
  };
}

export const defaultUrlShape: UrlShape = pathSegmentShape();
