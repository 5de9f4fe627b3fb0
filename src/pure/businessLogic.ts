/**
 * PURE BUSINESS LOGIC
 *
 * Everything the storefront coordinators decide, minus the effects: paging,
 * input validation, ownership checks and the content of outgoing messages.
 * Pricing lives next door in pricing.ts.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {IsoDate, Page, ProductRequest, SellerAccessRequest, Store, User} from '../domain';
import {NotificationPayload} from '../types';
import {
  IntegrityAlert,
  ProductRequestInput,
  SellerProductChanges,
  SellerProductInput,
  StorefrontError,
  StorefrontErrorKind,
} from './types';

export const DEFAULT_DISCOUNTS_PAGE_SIZE = 2;

export const storefrontError = (kind: StorefrontErrorKind, message: string): StorefrontError => ({kind, message});

// ============================================================================
// Dates & Paging
// ============================================================================

const pad = (value: number): string => String(value).padStart(2, '0');

export function toIsoDate(date: Date): IsoDate {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

/**
 * Slice one page out of a materialized list. Pages are 1-based; anything that
 * is not a whole number falls back to the first page and a page past the end
 * falls back to the last one.
 */
export function paginate<T>(items: T[], requestedPage: number, pageSize: number): Page<T> {
  const size = Math.max(1, Math.floor(pageSize));
  const totalPages = Math.max(1, Math.ceil(items.length / size));
  const page = Number.isInteger(requestedPage) && requestedPage >= 1
    ? Math.min(requestedPage, totalPages)
    : 1;

  return {
    items: items.slice((page - 1) * size, page * size),
    page,
    pageSize: size,
    totalItems: items.length,
    totalPages,
    hasPrevious: page > 1,
    hasNext: page < totalPages,
  };
}

export function parsePageNumber(raw: string | undefined): number {
  return Maybe.fromNullable(raw)
    .map(value => Number(value))
    .filter(Number.isInteger)
    .orDefault(1);
}

// ============================================================================
// Validation
// ============================================================================

// Row ids are positive BIGINTs
const ENTITY_ID = /^[1-9][0-9]{0,17}$/;

export function isEntityId(value: string): boolean {
  return ENTITY_ID.test(value);
}

export function parseEntityId(raw: string | undefined, label: string): Either<StorefrontError, string> {
  return Maybe.fromNullable(raw)
    .filter(isEntityId)
    .toEither(storefrontError('Validation', `${label} must be a positive integer id`));
}

// Limits of the NUMERIC(10, 2) price and INTEGER quantity columns
export const MAX_PRICE_EXCLUSIVE = 100000000;
export const MAX_QUANTITY = 2147483647;

function validatePriceAndQuantity(price: number, quantity: number): string[] {
  const problems: string[] = [];
  if (!Number.isFinite(price) || price < 0) {
    problems.push('Price must be a non-negative amount');
  } else if (price >= MAX_PRICE_EXCLUSIVE) {
    problems.push(`Price must be less than ${MAX_PRICE_EXCLUSIVE}`);
  } else if (Math.abs(Math.round(price * 100) - price * 100) > 1e-6) {
    problems.push('Price must have at most two decimal places');
  }
  if (!Number.isInteger(quantity) || quantity < 0) {
    problems.push('Quantity must be a non-negative whole number');
  } else if (quantity > MAX_QUANTITY) {
    problems.push(`Quantity must be at most ${MAX_QUANTITY}`);
  }
  return problems;
}

export function validateSellerProductInput(
  input: SellerProductInput
): Either<StorefrontError, SellerProductInput> {
  const problems = validatePriceAndQuantity(input.price, input.quantity);
  return problems.length > 0
    ? Left(storefrontError('Validation', problems.join('; ')))
    : Right(input);
}

export function validateSellerProductChanges(
  changes: SellerProductChanges
): Either<StorefrontError, SellerProductChanges> {
  const problems = validatePriceAndQuantity(changes.price, changes.quantity);
  return problems.length > 0
    ? Left(storefrontError('Validation', problems.join('; ')))
    : Right(changes);
}

export function validateProductRequestInput(
  input: ProductRequestInput
): Either<StorefrontError, ProductRequestInput> {
  const name = input.name.trim();
  if (name.length === 0) {
    return Left(storefrontError('Validation', 'Product name is required'));
  }
  return Right({...input, name, description: input.description.trim()});
}

export function checkStoreOwnership(
  store: Store | null,
  storeId: string,
  userId: string
): Either<StorefrontError, Store> {
  if (!store) {
    return Left(storefrontError('NotFound', `Store ${storeId} not found`));
  }
  if (store.ownerId !== userId) {
    return Left(storefrontError('Forbidden', `Store ${storeId} does not belong to user ${userId}`));
  }
  return Right(store);
}

// ============================================================================
// Users
// ============================================================================

export function displayName(user: User): string {
  return user.username ? user.username : user.email;
}

// ============================================================================
// Notifications & External Data Preparation
// ============================================================================

export function buildProductRequestEmails(
  managers: User[],
  requester: User,
  store: Store,
  request: ProductRequest
): NotificationPayload[] {
  const body = `
${displayName(requester)} asked to add a new product to the catalog.

Store: ${store.title}
Product: ${request.name}
Category: ${request.categoryId}
Description: ${request.description || '-'}

Request id: ${request.id}
  `.trim();

  return managers.map(manager => ({
    to: manager.email,
    subject: `New product request: ${request.name}`,
    body,
  }));
}

export function buildSellerAccessEmails(
  managers: User[],
  requester: User,
  request: SellerAccessRequest
): NotificationPayload[] {
  return managers.map(manager => ({
    to: manager.email,
    subject: `Seller access request from ${displayName(requester)}`,
    body: `${displayName(requester)} <${requester.email}> asked to become a seller.\n\nRequest id: ${request.id}`,
  }));
}

export function describeIntegrityAlert(alert: IntegrityAlert): string {
  switch (alert.type) {
    case 'invalid_discount':
      return `Discount ${alert.discountId} skipped: ${alert.reason}`;
    case 'invalid_price':
      return `Seller product ${alert.sellerProductId} hidden: ${alert.reason}`;
  }
}

// Workflow ids double as de-duplication keys for repeated submissions
export function productRequestWorkflowId(userId: string, input: ProductRequestInput): string {
  const slug = input.name.trim().toLowerCase().replace(/[^\p{L}\p{N}]+/gu, '-').replace(/^-+|-+$/g, '');
  return `product-request-${userId}-${input.storeId}-${slug}`;
}

export function sellerAccessWorkflowId(userId: string): string {
  return `seller-request-${userId}`;
}

export function sellerPermissionDenied(userId: string): StorefrontError {
  return storefrontError('Forbidden', `User ${userId} is not allowed to manage stores`);
}
