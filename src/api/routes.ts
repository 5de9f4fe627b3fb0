/**
 * HTTP ROUTES
 *
 * Each route turns a plain request (user id, params, query, body) into a
 * coordinator call and maps the Either it returns onto a status code. The
 * routes know nothing about express; app.ts adapts them.
 */

import {Either, Maybe} from 'purify-ts';
import {AppEffects} from '../pure/effects';
import {ProductRequestInput, StorefrontError} from '../pure/types';
import {parseEntityId, parsePageNumber, toIsoDate} from '../pure/businessLogic';
import {
  addSellerProduct,
  editSellerProduct,
  filterProductsByCategory,
  getDiscountDetail,
  getSellerProductForm,
  getSellersRoom,
  getStoreDetail,
  listCurrentDiscounts,
  removeSellerProduct,
} from '../pure/storefront';
import {decodeProductRequestInput, decodeSellerProductChanges, decodeSellerProductInput} from './codecs';
import {HttpResponse, toHttpResponse, UNAUTHENTICATED} from './http';

export type StartedRequest = {
  readonly workflowId: string;
  readonly runId: string;
};

// Seller requests run as background workflows; the API only starts them
export interface SellerRequestGateway {
  startProductRequest(userId: string, input: ProductRequestInput): Promise<Either<StorefrontError, StartedRequest>>;
  startSellerAccessRequest(userId: string): Promise<Either<StorefrontError, StartedRequest>>;
}

export type ApiRequest = {
  readonly userId: Maybe<string>;
  readonly params: Readonly<Record<string, string>>;
  readonly query: Readonly<Record<string, string | undefined>>;
  readonly body: unknown;
};

export type Route = (request: ApiRequest) => Promise<HttpResponse>;

export type StorefrontRoutes = {
  readonly health: Route;
  readonly listDiscounts: Route;
  readonly discountDetail: Route;
  readonly storeDetail: Route;
  readonly productsByCategory: Route;
  readonly sellersRoom: Route;
  readonly sellerProductForm: Route;
  readonly addSellerProduct: Route;
  readonly editSellerProduct: Route;
  readonly removeSellerProduct: Route;
  readonly requestProduct: Route;
  readonly requestSellerAccess: Route;
};

function authenticated(respond: (userId: string, request: ApiRequest) => Promise<HttpResponse>): Route {
  return request => request.userId.caseOf<Promise<HttpResponse>>({
    Just: userId => respond(userId, request),
    Nothing: () => Promise.resolve(UNAUTHENTICATED),
  });
}

function accepted(started: Either<StorefrontError, StartedRequest>, message: string): HttpResponse {
  return toHttpResponse(started.map(({workflowId, runId}) => ({message, workflowId, runId})), 202);
}

export function createRoutes(
  effects: AppEffects,
  sellerRequests: SellerRequestGateway,
  clock: () => Date = () => new Date()
): StorefrontRoutes {
  const today = () => toIsoDate(clock());

  return {
    health: () => Promise.resolve({status: 200, body: {status: 'healthy', service: 'storefront'}}),

    // ------------------------------------------------------------------------
    // Shopper pages
    // ------------------------------------------------------------------------

    listDiscounts: async request => {
      const page = parsePageNumber(request.query.page);
      return toHttpResponse(await listCurrentDiscounts(page, today())(effects));
    },

    discountDetail: async request =>
      toHttpResponse(await getDiscountDetail(request.params.slug, today())(effects)),

    storeDetail: async request =>
      toHttpResponse(await getStoreDetail(request.params.slug, today())(effects)),

    productsByCategory: async request => {
      const raw = request.query.category_id;
      if (!raw) {
        return toHttpResponse(await filterProductsByCategory(null)(effects));
      }
      const categoryId = parseEntityId(raw, 'Category id');
      if (categoryId.isLeft()) {
        return toHttpResponse(categoryId);
      }
      return toHttpResponse(await filterProductsByCategory(categoryId.unsafeCoerce())(effects));
    },

    // ------------------------------------------------------------------------
    // Seller room
    // ------------------------------------------------------------------------

    sellersRoom: authenticated(async userId =>
      toHttpResponse(await getSellersRoom(userId)(effects))),

    sellerProductForm: authenticated(async userId =>
      toHttpResponse(await getSellerProductForm(userId, today())(effects))),

    addSellerProduct: authenticated(async (userId, request) => {
      const input = decodeSellerProductInput(request.body);
      if (input.isLeft()) {
        return toHttpResponse(input);
      }
      return toHttpResponse(await addSellerProduct(userId, input.unsafeCoerce())(effects), 201);
    }),

    editSellerProduct: authenticated(async (userId, request) => {
      const sellerProductId = parseEntityId(request.params.id, 'Seller product id');
      if (sellerProductId.isLeft()) {
        return toHttpResponse(sellerProductId);
      }
      const changes = decodeSellerProductChanges(request.body);
      if (changes.isLeft()) {
        return toHttpResponse(changes);
      }
      return toHttpResponse(
        await editSellerProduct(userId, sellerProductId.unsafeCoerce(), changes.unsafeCoerce())(effects)
      );
    }),

    removeSellerProduct: authenticated(async (userId, request) => {
      const sellerProductId = parseEntityId(request.params.id, 'Seller product id');
      if (sellerProductId.isLeft()) {
        return toHttpResponse(sellerProductId);
      }
      return toHttpResponse(await removeSellerProduct(userId, sellerProductId.unsafeCoerce())(effects));
    }),

    // ------------------------------------------------------------------------
    // Requests to content managers
    // ------------------------------------------------------------------------

    requestProduct: authenticated(async (userId, request) => {
      const input = decodeProductRequestInput(request.body);
      if (input.isLeft()) {
        return toHttpResponse(input);
      }
      console.log(`📨 Product request from user ${userId} for store ${input.unsafeCoerce().storeId}`);
      const started = await sellerRequests.startProductRequest(userId, input.unsafeCoerce());
      return accepted(started, 'Product request submitted');
    }),

    requestSellerAccess: authenticated(async userId => {
      console.log(`📨 Seller access request from user ${userId}`);
      const started = await sellerRequests.startSellerAccessRequest(userId);
      return accepted(started, 'Seller access request submitted');
    }),
  };
}
