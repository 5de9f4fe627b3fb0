/**
 * TEMPORAL ACTIVITIES TYPE DEFINITIONS
 *
 * The flattened activity methods registered in worker.ts, typed for use with
 * proxyActivities in the seller request workflows. Names are unique across
 * repositories (getUserById, getStoreById, ...).
 */

import {Category, Permission, ProductRequest, SellerAccessRequest, Store, User} from '../domain';
import {NotificationPayload} from '../types';
import {ProductRequestInput} from '../pure/types';

export interface Activities {
  // AuthorizationService methods
  hasPermission(userId: string, permission: Permission): Promise<boolean>;

  // StoreRepository methods
  getStoreById(id: string): Promise<Store | null>;

  // CatalogRepository methods
  getCategoryById(id: string): Promise<Category | null>;

  // UserRepository methods
  getUserById(id: string): Promise<User | null>;
  getContentManagers(): Promise<User[]>;

  // RequestRepository methods
  createProductRequest(userId: string, input: ProductRequestInput): Promise<ProductRequest>;
  createSellerAccessRequest(userId: string): Promise<SellerAccessRequest>;

  // NotificationService methods
  sendEmail(payload: NotificationPayload): Promise<void>;
}
