/**
 * DISCOUNT PRICING RESOLVER
 *
 * Pure functions that turn seller listings plus a discount into display-ready
 * prices. Nothing here reads the clock or touches storage: "today" is always
 * passed in, and the same inputs always produce the same outputs.
 *
 * Money is rounded to the currency's minor unit (cents). Arithmetic runs on
 * integer minor units so that 19.99 * 85% lands on 16.99, not 16.989999.
 */

import {Either, Left, Right} from 'purify-ts';
import {IsoDate, PricedSellerProduct, ProductDiscount, SellerProduct} from '../domain';
import {DisplayPricing, IntegrityAlert, PricingError} from './types';

const MINOR_UNITS_PER_MAJOR = 100;

const toMinorUnits = (amount: number): number => Math.round(amount * MINOR_UNITS_PER_MAJOR);

const fromMinorUnits = (minorUnits: number): number => minorUnits / MINOR_UNITS_PER_MAJOR;

// ============================================================================
// Discount Rules
// ============================================================================

export function validateDiscount(discount: ProductDiscount): Either<PricingError, ProductDiscount> {
  if (!Number.isFinite(discount.value) || discount.value < 0) {
    return Left<PricingError>({
      kind: 'InvalidDiscount',
      discountId: discount.id,
      message: `Discount ${discount.id} has a negative magnitude (${discount.value})`,
    });
  }
  if (discount.kind === 'percentage' && discount.value > 100) {
    return Left<PricingError>({
      kind: 'InvalidDiscount',
      discountId: discount.id,
      message: `Discount ${discount.id} exceeds 100 percent (${discount.value})`,
    });
  }
  return Right(discount);
}

/**
 * A discount is current when it is active and today lies inside its validity
 * window, both bounds included. ISO dates compare correctly as strings.
 */
export function isDiscountCurrent(discount: ProductDiscount, today: IsoDate): boolean {
  return discount.isActive && discount.validFrom <= today && today <= discount.validTo;
}

export function discountAppliesTo(discount: ProductDiscount, product: SellerProduct): boolean {
  if (discount.storeWide) {
    return discount.storeId === null || discount.storeId === product.storeId;
  }
  return product.discountId === discount.id;
}

export function computeDiscountedPrice(basePrice: number, discount: ProductDiscount): number {
  const base = toMinorUnits(basePrice);
  const discounted = discount.kind === 'percentage'
    ? Math.round(base * (100 - discount.value) / 100)
    : base - toMinorUnits(discount.value);
  return fromMinorUnits(Math.max(0, discounted));
}

// ============================================================================
// Resolver
// ============================================================================

function priceProduct(
  product: SellerProduct,
  discount: ProductDiscount | null
): Either<PricingError, PricedSellerProduct> {
  if (!Number.isFinite(product.price) || product.price < 0) {
    return Left<PricingError>({
      kind: 'InvalidPrice',
      sellerProductId: product.id,
      message: `Seller product ${product.id} has a negative base price (${product.price})`,
    });
  }

  const applied = discount !== null && discountAppliesTo(discount, product) ? discount : null;
  return Right({
    product,
    originalPrice: product.price,
    effectivePrice: applied ? computeDiscountedPrice(product.price, applied) : product.price,
    discount: applied,
  });
}

/**
 * Price every product with the given discount, in input order.
 *
 * The caller is expected to have filtered the discount down to a current one;
 * validity is not checked again here.
 */
export function resolvePrices(
  products: SellerProduct[],
  discount: ProductDiscount | null
): Either<PricingError, PricedSellerProduct[]> {
  const validated: Either<PricingError, ProductDiscount | null> =
    discount === null ? Right<ProductDiscount | null, PricingError>(null) : validateDiscount(discount);

  return validated.chain(d => Either.sequence(products.map(product => priceProduct(product, d))));
}

// ============================================================================
// Display Policy
// ============================================================================

/**
 * Like resolvePrices, but never fails: an invalid discount is dropped (every
 * product shows its base price) and products with an invalid price are left
 * out. Each skipped piece of data is reported as an alert.
 */
export function priceForDisplay(
  products: SellerProduct[],
  discount: ProductDiscount | null
): DisplayPricing {
  const alerts: IntegrityAlert[] = [];

  const usable = discount === null ? null : validateDiscount(discount).caseOf<ProductDiscount | null>({
    Left: error => {
      alerts.push(toIntegrityAlert(error));
      return null;
    },
    Right: d => d,
  });

  const items = products.flatMap(product => priceProduct(product, usable).caseOf<PricedSellerProduct[]>({
    Left: error => {
      alerts.push(toIntegrityAlert(error));
      return [];
    },
    Right: priced => [priced],
  }));

  return {items, alerts};
}

/**
 * Price listings that each carry their own attached discount. A discount
 * only counts when it is current on the given day. Output keeps input order.
 */
export function priceListings(
  products: SellerProduct[],
  discountsById: Record<string, ProductDiscount>,
  today: IsoDate
): DisplayPricing {
  const groups = new Map<string | null, SellerProduct[]>();
  for (const product of products) {
    const group = groups.get(product.discountId) ?? [];
    groups.set(product.discountId, [...group, product]);
  }

  const priced = new Map<string, PricedSellerProduct>();
  const alerts: IntegrityAlert[] = [];

  for (const [discountId, group] of groups) {
    const discount = discountId !== null && Object.prototype.hasOwnProperty.call(discountsById, discountId)
      ? discountsById[discountId]
      : undefined;
    const current = discount !== undefined && isDiscountCurrent(discount, today) ? discount : null;
    const result = priceForDisplay(group, current);
    result.items.forEach(item => priced.set(item.product.id, item));
    alerts.push(...result.alerts);
  }

  return {
    items: products.flatMap(product => {
      const item = priced.get(product.id);
      return item ? [item] : [];
    }),
    alerts,
  };
}

export function toIntegrityAlert(error: PricingError): IntegrityAlert {
  switch (error.kind) {
    case 'InvalidDiscount':
      return {type: 'invalid_discount', discountId: error.discountId, reason: error.message};
    case 'InvalidPrice':
      return {type: 'invalid_price', sellerProductId: error.sellerProductId, reason: error.message};
  }
}
