/**
 * STOREFRONT COORDINATORS
 *
 * One function per use-case. Each is a thin effectful shell that:
 * 1. Calls effects to get data (inputs)
 * 2. Passes data to pure business logic functions
 * 3. Calls effects to persist results (outputs)
 *
 * Permission checks go through the injected AuthorizationService. Expected
 * failures come back as a Left; infrastructure errors thrown by effects are
 * left to propagate.
 */

import {Either, EitherAsync, Left, Right} from 'purify-ts';
import {IsoDate, Page, ProductDiscount, SellerProduct} from '../domain';
import {AppEffects} from './effects';
import {
  DiscountDetail,
  IntegrityAlert,
  ProductOption,
  SellerProductChanges,
  SellerProductForm,
  SellerProductInput,
  SellersRoom,
  StoreDetail,
  StorefrontError,
} from './types';
import {
  checkStoreOwnership,
  DEFAULT_DISCOUNTS_PAGE_SIZE,
  describeIntegrityAlert,
  paginate,
  sellerPermissionDenied,
  storefrontError,
  validateSellerProductChanges,
  validateSellerProductInput,
} from './businessLogic';
import {isDiscountCurrent, priceForDisplay, priceListings} from './pricing';

export type Coordinator<T> = (effects: AppEffects) => Promise<Either<StorefrontError, T>>;

// ============================================================================
// Shopper Pages
// ============================================================================

export function listCurrentDiscounts(
  requestedPage: number,
  today: IsoDate,
  pageSize: number = DEFAULT_DISCOUNTS_PAGE_SIZE
): Coordinator<Page<ProductDiscount>> {
  return async (effects: AppEffects) => {
    const discounts = await effects.discounts.getCurrent(today);
    const current = discounts.filter(discount => isDiscountCurrent(discount, today));
    return Right(paginate(current, requestedPage, pageSize));
  };
}

/**
 * A discount's page lists every listing it covers. The discount is only
 * applied to the prices while it is current; otherwise the base prices show.
 */
export function getDiscountDetail(slug: string, today: IsoDate): Coordinator<DiscountDetail> {
  return async (effects: AppEffects) => {
    const discount = await effects.discounts.getBySlug(slug);
    if (!discount) {
      return Left(storefrontError('NotFound', `Discount ${slug} not found`));
    }

    const listings = await effects.sellerProducts.getByDiscount(discount);
    const isCurrent = isDiscountCurrent(discount, today);
    const {items, alerts} = priceForDisplay(listings, isCurrent ? discount : null);

    await reportIntegrityAlerts(alerts)(effects);
    return Right({discount, isCurrent, products: items});
  };
}

export function getStoreDetail(slug: string, today: IsoDate): Coordinator<StoreDetail> {
  return async (effects: AppEffects) => {
    const store = await effects.stores.getBySlug(slug);
    if (!store) {
      return Left(storefrontError('NotFound', `Store ${slug} not found`));
    }

    const listings = await effects.sellerProducts.getByStores([store.id]);
    const discountsById = await effects.discounts.getByIds(attachedDiscountIds(listings));
    const {items, alerts} = priceListings(listings, discountsById, today);

    await reportIntegrityAlerts(alerts)(effects);
    return Right({store, products: items});
  };
}

export function filterProductsByCategory(categoryId: string | null): Coordinator<ProductOption[]> {
  return async (effects: AppEffects) => {
    const products = await effects.catalog.getProducts(categoryId);
    return Right(products.map(({id, name}) => ({id, name})));
  };
}

// ============================================================================
// Seller Room
// ============================================================================

export function getSellersRoom(userId: string): Coordinator<SellersRoom> {
  return async (effects: AppEffects) => {
    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const stores = await effects.stores.getByOwner(userId);
    const [categories, sellerProducts] = await Promise.all([
      effects.catalog.getCategories(),
      effects.sellerProducts.getByStores(stores.map(store => store.id)),
    ]);

    return Right({stores, categories, sellerProducts});
  };
}

export function getSellerProductForm(userId: string, today: IsoDate): Coordinator<SellerProductForm> {
  return async (effects: AppEffects) => {
    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const [categories, products, discounts, stores] = await Promise.all([
      effects.catalog.getCategories(),
      effects.catalog.getProducts(null),
      effects.discounts.getCurrent(today),
      effects.stores.getByOwner(userId),
    ]);

    return Right({
      categories,
      products,
      discounts: discounts.filter(discount => isDiscountCurrent(discount, today)),
      stores,
    });
  };
}

export function addSellerProduct(userId: string, input: SellerProductInput): Coordinator<SellerProduct> {
  return async (effects: AppEffects) => {
    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const validated = validateSellerProductInput(input);
    if (validated.isLeft()) {
      return Left(validated.extract());
    }

    const owned = checkStoreOwnership(await effects.stores.getById(input.storeId), input.storeId, userId);
    if (owned.isLeft()) {
      return Left(owned.extract());
    }

    const product = await effects.catalog.getProductById(input.productId);
    if (!product) {
      return Left(storefrontError('NotFound', `Product ${input.productId} not found`));
    }

    const discountProblem = await checkDiscountExists(input.discountId)(effects);
    if (discountProblem.isLeft()) {
      return Left(discountProblem.extract());
    }

    if (await effects.sellerProducts.existsInStore(input.storeId, input.productId)) {
      return Left(duplicateListing());
    }

    // A concurrent add can still win the race between the check and the insert
    const created = await effects.sellerProducts.create(validated.unsafeCoerce());
    return created ? Right(created) : Left(duplicateListing());
  };
}

export function editSellerProduct(
  userId: string,
  sellerProductId: string,
  changes: SellerProductChanges
): Coordinator<SellerProduct> {
  return async (effects: AppEffects) => {
    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const validated = validateSellerProductChanges(changes);
    if (validated.isLeft()) {
      return Left(validated.extract());
    }

    const existing = await findOwnedListing(userId, sellerProductId)(effects);
    if (existing.isLeft()) {
      return Left(existing.extract());
    }

    const discountProblem = await checkDiscountExists(changes.discountId)(effects);
    if (discountProblem.isLeft()) {
      return Left(discountProblem.extract());
    }

    return Right(await effects.sellerProducts.update(sellerProductId, validated.unsafeCoerce()));
  };
}

export function removeSellerProduct(userId: string, sellerProductId: string): Coordinator<SellerProduct> {
  return async (effects: AppEffects) => {
    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const existing = await findOwnedListing(userId, sellerProductId)(effects);
    if (existing.isLeft()) {
      return existing;
    }

    await effects.sellerProducts.remove(sellerProductId);
    return existing;
  };
}

// ============================================================================
// Helpers
// ============================================================================

function duplicateListing(): StorefrontError {
  return storefrontError('Conflict', 'This product already exists in this store!');
}

function attachedDiscountIds(listings: SellerProduct[]): string[] {
  const ids = listings.flatMap(listing => listing.discountId === null ? [] : [listing.discountId]);
  return [...new Set(ids)];
}

function findOwnedListing(userId: string, sellerProductId: string): Coordinator<SellerProduct> {
  return async (effects: AppEffects) => {
    const listing = await effects.sellerProducts.getById(sellerProductId);
    if (!listing) {
      return Left(storefrontError('NotFound', `Seller product ${sellerProductId} not found`));
    }
    const store = await effects.stores.getById(listing.storeId);
    return checkStoreOwnership(store, listing.storeId, userId).map(() => listing);
  };
}

function checkDiscountExists(discountId: string | null): Coordinator<string | null> {
  return async (effects: AppEffects) => {
    if (discountId === null) {
      return Right(null);
    }
    const found = await effects.discounts.getByIds([discountId]);
    return Object.prototype.hasOwnProperty.call(found, discountId)
      ? Right(discountId)
      : Left(storefrontError('Validation', `Discount ${discountId} not found`));
  };
}

/**
 * Log skipped pricing data and forward it to monitoring. A monitoring outage
 * is logged, never surfaced to the shopper.
 */
function reportIntegrityAlerts(alerts: IntegrityAlert[]): (effects: AppEffects) => Promise<void> {
  return async (effects: AppEffects) => {
    if (alerts.length === 0) {
      return;
    }

    alerts.forEach(alert => console.warn(describeIntegrityAlert(alert)));

    const sent = await EitherAsync(() => effects.monitoring.sendAlerts(alerts)).run();
    sent.ifLeft(error => console.error('Failed to report pricing integrity alerts:', error));
  };
}
