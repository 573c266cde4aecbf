/**
 * Course modes a price can be listed under
 */
export enum ContentMode {
  VERIFIED = 'verified',
  EXECUTIVE_EDUCATION = 'paid-executive-education',
}

/**
 * Source reported for content with no external product source
 */
export const EDX_PRODUCT_SOURCE = 'edX';

export const CENTS_PER_DOLLAR = 100;

export type ListedPrice = string | number;

export interface ProductSource {
  name: string;
  slug: string | null;
}

export interface Entitlement {
  mode: string;
  price: ListedPrice;
  currency: string | null;
}

export interface CourseRun {
  key: string;
  uuid: string | null;
  firstEnrollablePaidSeatPrice: ListedPrice | null;
}

/**
 * The subset of catalog content metadata pricing depends on
 */
export interface ContentMetadata {
  uuid: string | null;
  key: string | null;
  contentType: string | null;
  productSource: ProductSource | null;
  courseRuns: CourseRun[];
  entitlements: Entitlement[];
  firstEnrollablePaidSeatPrice: ListedPrice | null;
}

/**
 * What the subsidy service exposes about a piece of content for a customer
 */
export interface ContentSummary {
  contentUuid: string | null;
  contentKey: string | null;
  courseRunKey: string | null;
  source: string;
  mode: ContentMode;
  contentPrice: number;
}

/**
 * NOT_FOUND covers both "not in the customer's catalog" and "no price for the
 * resolved mode"; callers see the same condition either way.
 */
export type PricingError =
  | { kind: 'NOT_FOUND'; reason: 'CONTENT_NOT_FOUND' | 'PRICE_NOT_FOUND' }
  | { kind: 'TRANSPORT'; status?: number; detail: string };

export type CatalogResult = { ok: true; metadata: ContentMetadata } | { ok: false; error: PricingError };

export type SummaryResult = { ok: true; summary: ContentSummary } | { ok: false; error: PricingError };

export type PriceResult = { ok: true; price: number } | { ok: false; error: PricingError };
