/**
 * Request body codecs. Shape checks and id format only; business rules
 * (price bounds, whole quantities, ownership) stay in the pure layer.
 */

import {Codec, Either, Left, nullable, number, optional, Right, string} from 'purify-ts';
import {ProductRequestInput, SellerProductChanges, SellerProductInput, StorefrontError} from '../pure/types';
import {isEntityId, storefrontError} from '../pure/businessLogic';

const entityId = Codec.custom<string>({
  decode: input => typeof input === 'string' && isEntityId(input)
    ? Right<string, string>(input)
    : Left<string, string>(`Expected a positive integer id, but received ${JSON.stringify(input)}`),
  encode: id => id,
});

const SellerProductBody = Codec.interface({
  storeId: entityId,
  productId: entityId,
  price: number,
  quantity: number,
  discountId: optional(nullable(entityId)),
});

const SellerProductChangesBody = Codec.interface({
  price: number,
  quantity: number,
  discountId: optional(nullable(entityId)),
});

const ProductRequestBody = Codec.interface({
  storeId: entityId,
  name: string,
  categoryId: entityId,
  description: optional(string),
});

const invalidBody = (message: string): StorefrontError => storefrontError('Validation', message);

export function decodeSellerProductInput(body: unknown): Either<StorefrontError, SellerProductInput> {
  return SellerProductBody.decode(body)
    .mapLeft(invalidBody)
    .map(decoded => ({
      storeId: decoded.storeId,
      productId: decoded.productId,
      price: decoded.price,
      quantity: decoded.quantity,
      discountId: decoded.discountId ?? null,
    }));
}

export function decodeSellerProductChanges(body: unknown): Either<StorefrontError, SellerProductChanges> {
  return SellerProductChangesBody.decode(body)
    .mapLeft(invalidBody)
    .map(decoded => ({
      price: decoded.price,
      quantity: decoded.quantity,
      discountId: decoded.discountId ?? null,
    }));
}

export function decodeProductRequestInput(body: unknown): Either<StorefrontError, ProductRequestInput> {
  return ProductRequestBody.decode(body)
    .mapLeft(invalidBody)
    .map(decoded => ({
      storeId: decoded.storeId,
      name: decoded.name,
      categoryId: decoded.categoryId,
      description: decoded.description ?? '',
    }));
}
