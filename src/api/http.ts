// Mapping from coordinator results to HTTP responses

import {Either, Maybe} from 'purify-ts';
import {StorefrontError, StorefrontErrorKind} from '../pure/types';
import {isEntityId} from '../pure/businessLogic';

export type HttpResponse = {
  readonly status: number;
  readonly body: unknown;
};

const STATUS_BY_KIND: Record<StorefrontErrorKind, number> = {
  Validation: 400,
  Forbidden: 403,
  NotFound: 404,
  Conflict: 409,
};

export const UNAUTHENTICATED: HttpResponse = {
  status: 401,
  body: {error: 'Unauthenticated', message: 'Missing or invalid x-user-id header'},
};

export const INTERNAL_ERROR: HttpResponse = {
  status: 500,
  body: {error: 'InternalError', message: 'Failed to handle request'},
};

export function statusFor(kind: StorefrontErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export function toHttpResponse<T>(result: Either<StorefrontError, T>, successStatus = 200): HttpResponse {
  return result.caseOf<HttpResponse>({
    Left: error => ({status: statusFor(error.kind), body: {error: error.kind, message: error.message}}),
    Right: value => ({status: successStatus, body: value}),
  });
}

export function userIdFrom(header: string | undefined): Maybe<string> {
  return Maybe.fromNullable(header)
    .map(value => value.trim())
    .filter(isEntityId);
}
