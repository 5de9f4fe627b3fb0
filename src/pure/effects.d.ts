/**
 * EFFECTS LAYER
 *
 * Everything the storefront needs from the outside world, expressed as small
 * repository and service interfaces. Queries return fully materialized
 * collections; nothing here is a lazy query object.
 */

import {
  Category,
  IsoDate,
  Permission,
  Product,
  ProductDiscount,
  ProductRequest,
  SellerAccessRequest,
  SellerProduct,
  Store,
  User,
} from '../domain';
import {NotificationPayload} from '../types';
import {IntegrityAlert, ProductRequestInput, SellerProductChanges, SellerProductInput} from './types';

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface DiscountRepository {
  // Active discounts whose validity window contains today, ordered by validTo then id
  getCurrent(today: IsoDate): Promise<ProductDiscount[]>;
  getBySlug(slug: string): Promise<ProductDiscount | null>;
  getByIds(ids: string[]): Promise<Record<string, ProductDiscount>>;
}

export interface SellerProductRepository {
  getById(id: string): Promise<SellerProduct | null>;
  getByStores(storeIds: string[]): Promise<SellerProduct[]>;
  getByDiscount(discount: ProductDiscount): Promise<SellerProduct[]>;
  existsInStore(storeId: string, productId: string): Promise<boolean>;
  // null when the store already lists the product
  create(input: SellerProductInput): Promise<SellerProduct | null>;
  update(id: string, changes: SellerProductChanges): Promise<SellerProduct>;
  remove(id: string): Promise<void>;
}

export interface StoreRepository {
  getById(id: string): Promise<Store | null>;
  getBySlug(slug: string): Promise<Store | null>;
  getByOwner(userId: string): Promise<Store[]>;
}

export interface CatalogRepository {
  getCategories(): Promise<Category[]>;
  getCategoryById(id: string): Promise<Category | null>;
  // All products when categoryId is null
  getProducts(categoryId: string | null): Promise<Product[]>;
  getProductById(id: string): Promise<Product | null>;
}

export interface UserRepository {
  getById(id: string): Promise<User | null>;
  getContentManagers(): Promise<User[]>;
}

export interface RequestRepository {
  createProductRequest(userId: string, input: ProductRequestInput): Promise<ProductRequest>;
  createSellerAccessRequest(userId: string): Promise<SellerAccessRequest>;
}

export interface AuthorizationService {
  hasPermission(userId: string, permission: Permission): Promise<boolean>;
}

export interface NotificationService {
  sendEmail(payload: NotificationPayload): Promise<void>;
}

export interface MonitoringService {
  sendAlerts(alerts: IntegrityAlert[]): Promise<void>;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly discounts: DiscountRepository;
  readonly sellerProducts: SellerProductRepository;
  readonly stores: StoreRepository;
  readonly catalog: CatalogRepository;
  readonly users: UserRepository;
  readonly requests: RequestRepository;
  readonly authorization: AuthorizationService;
  readonly notifications: NotificationService;
  readonly monitoring: MonitoringService;
}

// What the seller request coordinators touch; the Temporal workflow provides exactly this
export type SellerRequestEffects = {
  readonly stores: Pick<StoreRepository, 'getById'>;
  readonly catalog: Pick<CatalogRepository, 'getCategoryById'>;
  readonly users: UserRepository;
  readonly requests: RequestRepository;
  readonly authorization: AuthorizationService;
  readonly notifications: NotificationService;
}
