import {
  CENTS_PER_DOLLAR,
  ContentMetadata,
  ContentMode,
  ContentSummary,
  CourseRun,
  EDX_PRODUCT_SOURCE,
  Entitlement,
  ListedPrice,
  ProductSource,
} from './pricing.types';

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const stringOrNull = (value: unknown): string | null => (typeof value === 'string' ? value : null);

const listedPriceOrNull = (value: unknown): ListedPrice | null =>
  typeof value === 'string' || typeof value === 'number' ? value : null;

const parseProductSource = (value: unknown): ProductSource | null => {
  if (!isRecord(value) || typeof value.name !== 'string' || value.name === '') {
    return null;
  }
  return { name: value.name, slug: stringOrNull(value.slug) };
};

const parseEntitlement = (value: unknown): Entitlement | null => {
  if (!isRecord(value) || typeof value.mode !== 'string') return null;
  const price = listedPriceOrNull(value.price);
  if (price === null) return null;
  return { mode: value.mode, price, currency: stringOrNull(value.currency) };
};

const parseCourseRun = (value: unknown): CourseRun | null => {
  if (!isRecord(value) || typeof value.key !== 'string') return null;
  return {
    key: value.key,
    uuid: stringOrNull(value.uuid),
    firstEnrollablePaidSeatPrice: listedPriceOrNull(value.first_enrollable_paid_seat_price),
  };
};

const parseList = <T>(value: unknown, parse: (item: unknown) => T | null): T[] =>
  Array.isArray(value) ? value.map(parse).filter((item): item is T => item !== null) : [];

/**
 * Read the catalog's JSON payload; returns null when it is not an object
 */
export const parseContentMetadata = (payload: unknown): ContentMetadata | null => {
  if (!isRecord(payload)) return null;

  return {
    uuid: stringOrNull(payload.uuid),
    key: stringOrNull(payload.key),
    contentType: stringOrNull(payload.content_type),
    productSource: parseProductSource(payload.product_source),
    courseRuns: parseList(payload.course_runs, parseCourseRun),
    entitlements: parseList(payload.entitlements, parseEntitlement),
    firstEnrollablePaidSeatPrice: listedPriceOrNull(payload.first_enrollable_paid_seat_price),
  };
};

// ---------------------------------------------------------------------------
// Pricing
// ---------------------------------------------------------------------------

export const modeForContent = (metadata: ContentMetadata): ContentMode =>
  metadata.productSource ? ContentMode.EXECUTIVE_EDUCATION : ContentMode.VERIFIED;

export const productSourceFor = (metadata: ContentMetadata): string =>
  metadata.productSource ? metadata.productSource.name : EDX_PRODUCT_SOURCE;

export const courseRunFor = (metadata: ContentMetadata, contentIdentifier: string): CourseRun | null =>
  metadata.courseRuns.find((run) => run.key === contentIdentifier) ?? null;

/**
 * Listed price (decimal string or number) for the mode.
 *
 * Verified course runs carry `first_enrollable_paid_seat_price`; everything
 * else is priced by the entitlement whose mode matches.
 */
export const listedPriceFor = (
  metadata: ContentMetadata,
  mode: ContentMode,
  contentIdentifier: string
): ListedPrice | null => {
  if (mode === ContentMode.VERIFIED) {
    if (metadata.contentType === 'courserun' && metadata.firstEnrollablePaidSeatPrice !== null) {
      return metadata.firstEnrollablePaidSeatPrice;
    }
    const run = courseRunFor(metadata, contentIdentifier);
    if (run && run.firstEnrollablePaidSeatPrice !== null) {
      return run.firstEnrollablePaidSeatPrice;
    }
  }

  const entitlement = metadata.entitlements.find((candidate) => candidate.mode === mode);
  return entitlement ? entitlement.price : null;
};

/**
 * Convert a listed price to integer minor units: multiply, then round.
 *
 * Truncating instead would turn "599.49" into 59948 because
 * 599.49 * 100 === 59948.99999999999 in binary floating point.
 * Prices that are empty, non-numeric, zero or negative yield null.
 */
export const toMinorUnits = (listedPrice: ListedPrice): number | null => {
  if (typeof listedPrice === 'string' && listedPrice.trim() === '') return null;

  const amount = typeof listedPrice === 'number' ? listedPrice : Number(listedPrice.trim());
  if (!Number.isFinite(amount) || amount <= 0) return null;

  return Math.round(amount * CENTS_PER_DOLLAR);
};

/**
 * Price in minor units for the mode the metadata resolves to, or null when
 * the content is not priced for that mode
 */
export const priceForContent = (metadata: ContentMetadata, contentIdentifier: string): number | null => {
  const listed = listedPriceFor(metadata, modeForContent(metadata), contentIdentifier);
  return listed === null ? null : toMinorUnits(listed);
};

export const summaryDataForContent = (
  contentIdentifier: string,
  metadata: ContentMetadata
): ContentSummary | null => {
  const contentPrice = priceForContent(metadata, contentIdentifier);
  if (contentPrice === null) {
    return null;
  }

  return {
    contentUuid: metadata.uuid,
    contentKey: metadata.key,
    courseRunKey: courseRunFor(metadata, contentIdentifier)?.key ?? null,
    source: productSourceFor(metadata),
    mode: modeForContent(metadata),
    contentPrice,
  };
};
