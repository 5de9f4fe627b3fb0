/**
 * TEMPORAL WORKFLOWS - Seller Requests
 *
 * Flattened activities are adapted back into the SellerRequestEffects shape
 * the pure coordinators expect, so the coordinators stay unaware of Temporal.
 * Database and mail activities get separate retry policies.
 */
import {ProductRequest, SellerAccessRequest} from '../domain';
import {requestNewProduct, requestSellerAccess} from '../pure/sellerRequests';
import type {SellerRequestEffects} from '../pure/effects';
import type {ProductRequestInput, StorefrontError} from '../pure/types';
import {Activities} from './activities';
import {ActivityOptions, proxyActivities} from '@temporalio/workflow';
import {Either} from 'purify-ts';

const databaseActivityOptions: ActivityOptions = {
  startToCloseTimeout: '60s',
  retry: {
    initialInterval: 500,
    backoffCoefficient: 2,
    maximumAttempts: 9,
    maximumInterval: 1600,
  },
}

const mailActivityOptions: ActivityOptions = {
  startToCloseTimeout: '120s',
  retry: {
    initialInterval: 1000,
    backoffCoefficient: 2,
    maximumAttempts: 10,
    maximumInterval: 30000,
  },
}

// Database activities (authorization, stores, catalog, users, requests)
const {
  hasPermission,
  getStoreById,
  getCategoryById,
  getUserById,
  getContentManagers,
  createProductRequest,
  createSellerAccessRequest,
} = proxyActivities<Omit<Activities, 'sendEmail'>>(databaseActivityOptions);

// Mail activities
const {
  sendEmail,
} = proxyActivities<Pick<Activities, 'sendEmail'>>(mailActivityOptions);

// Plain data, so the outcome serializes cleanly into workflow history
export type SellerRequestOutcome<T> =
  | { readonly status: 'accepted'; readonly request: T }
  | { readonly status: 'rejected'; readonly error: StorefrontError };

const temporalEffects: SellerRequestEffects = {
  authorization: {hasPermission},
  stores: {getById: getStoreById},
  catalog: {getCategoryById},
  users: {getById: getUserById, getContentManagers},
  requests: {createProductRequest, createSellerAccessRequest},
  notifications: {sendEmail},
};

function toOutcome<T>(result: Either<StorefrontError, T>): SellerRequestOutcome<T> {
  return result.caseOf<SellerRequestOutcome<T>>({
    Left: error => ({status: 'rejected', error}),
    Right: request => ({status: 'accepted', request}),
  });
}

export async function requestNewProductWorkflow(
  userId: string,
  input: ProductRequestInput
): Promise<SellerRequestOutcome<ProductRequest>> {
  return toOutcome(await requestNewProduct(userId, input)(temporalEffects));
}

export async function requestSellerAccessWorkflow(
  userId: string
): Promise<SellerRequestOutcome<SellerAccessRequest>> {
  return toOutcome(await requestSellerAccess(userId)(temporalEffects));
}
