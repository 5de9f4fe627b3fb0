/**
 * SELLER REQUEST COORDINATORS
 *
 * Requests that end with content managers being emailed. These run inside a
 * Temporal workflow, so they only depend on SellerRequestEffects and every
 * effect they call is an activity with its own retry policy.
 */

import {Either, EitherAsync, Left, Right} from 'purify-ts';
import {ProductRequest, SellerAccessRequest} from '../domain';
import {NotificationPayload} from '../types';
import {SellerRequestEffects} from './effects';
import {ProductRequestInput, StorefrontError} from './types';
import {
  buildProductRequestEmails,
  buildSellerAccessEmails,
  checkStoreOwnership,
  sellerPermissionDenied,
  storefrontError,
  validateProductRequestInput,
} from './businessLogic';
import {EffectsError} from '../effects/EffectsError';

/**
 * Record a seller's request for a product that is not in the catalog yet and
 * notify the content managers.
 *
 * @throws EffectsError when any notification could not be sent
 */
export function requestNewProduct(
  userId: string,
  rawInput: ProductRequestInput
): (effects: SellerRequestEffects) => Promise<Either<StorefrontError, ProductRequest>> {
  return async (effects: SellerRequestEffects) => {
    // ========== GATHER INPUTS (Effects) ==========

    if (!await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(sellerPermissionDenied(userId));
    }

    const validated = validateProductRequestInput(rawInput);
    if (validated.isLeft()) {
      return Left(validated.extract());
    }
    const input = validated.unsafeCoerce();

    const owned = checkStoreOwnership(await effects.stores.getById(input.storeId), input.storeId, userId);
    if (owned.isLeft()) {
      return Left(owned.extract());
    }

    if (!await effects.catalog.getCategoryById(input.categoryId)) {
      return Left(storefrontError('Validation', `Category ${input.categoryId} not found`));
    }

    const requester = await effects.users.getById(userId);
    if (!requester) {
      return Left(storefrontError('NotFound', `User ${userId} not found`));
    }

    // ========== PERFORM OUTPUTS (Effects) ==========

    const request = await effects.requests.createProductRequest(userId, input);
    const managers = await effects.users.getContentManagers();
    const emails = buildProductRequestEmails(managers, requester, owned.unsafeCoerce(), request);
    if (emails.length === 0) {
      console.warn(`No content managers to notify about product request ${request.id}`);
    }

    await sendAll(emails)(effects);
    return Right(request);
  };
}

/**
 * Record a user's request to join the sellers and notify the content managers.
 *
 * @throws EffectsError when any notification could not be sent
 */
export function requestSellerAccess(
  userId: string
): (effects: SellerRequestEffects) => Promise<Either<StorefrontError, SellerAccessRequest>> {
  return async (effects: SellerRequestEffects) => {
    const requester = await effects.users.getById(userId);
    if (!requester) {
      return Left(storefrontError('NotFound', `User ${userId} not found`));
    }

    if (await effects.authorization.hasPermission(userId, 'sellers')) {
      return Left(storefrontError('Conflict', `User ${userId} is already a seller`));
    }

    const request = await effects.requests.createSellerAccessRequest(userId);
    const managers = await effects.users.getContentManagers();
    const emails = buildSellerAccessEmails(managers, requester, request);
    if (emails.length === 0) {
      console.warn(`No content managers to notify about seller request ${request.id}`);
    }

    await sendAll(emails)(effects);
    return Right(request);
  };
}

// Send every email and throw the failures together once all have settled
function sendAll(payloads: NotificationPayload[]): (effects: SellerRequestEffects) => Promise<void> {
  return async (effects: SellerRequestEffects) => {
    const results = await Promise.all(
      payloads.map(payload => EitherAsync(() => effects.notifications.sendEmail(payload)).run())
    );
    const errors = Either.lefts(results)
      .map(err => (err instanceof Error) ? err : new Error(String(err)));
    if (errors.length) throw new EffectsError(errors);
  };
}
