/**
 * Express adapter for the storefront routes
 */
import express, {Express, NextFunction, Request, RequestHandler, Response} from 'express';
import {userIdFrom, INTERNAL_ERROR} from './http';
import {ApiRequest, Route, StorefrontRoutes} from './routes';

function toApiRequest(req: Request): ApiRequest {
  const query: Record<string, string | undefined> = {};
  Object.entries(req.query).forEach(([key, value]) => {
    query[key] = typeof value === 'string' ? value : undefined;
  });

  return {
    userId: userIdFrom(req.header('x-user-id')),
    params: req.params,
    query,
    body: req.body,
  };
}

function serve(route: Route): RequestHandler {
  return async (req: Request, res: Response) => {
    try {
      const response = await route(toApiRequest(req));
      res.status(response.status).json(response.body);
    } catch (error) {
      console.error(`❌ ${req.method} ${req.path} failed:`, error);
      res.status(INTERNAL_ERROR.status).json(INTERNAL_ERROR.body);
    }
  };
}

export function createApp(routes: StorefrontRoutes): Express {
  const app = express();

  app.use(express.json());

  app.get('/health', serve(routes.health));

  app.get('/api/discounts', serve(routes.listDiscounts));
  app.get('/api/discounts/:slug', serve(routes.discountDetail));
  app.get('/api/stores/:slug', serve(routes.storeDetail));
  app.get('/api/categories/products', serve(routes.productsByCategory));

  app.get('/api/sellers-room', serve(routes.sellersRoom));
  app.get('/api/seller-products/form', serve(routes.sellerProductForm));
  app.post('/api/seller-products', serve(routes.addSellerProduct));
  app.put('/api/seller-products/:id', serve(routes.editSellerProduct));
  app.delete('/api/seller-products/:id', serve(routes.removeSellerProduct));

  app.post('/api/product-requests', serve(routes.requestProduct));
  app.post('/api/seller-requests', serve(routes.requestSellerAccess));

  // Malformed JSON bodies are rejected by express.json() before any route runs
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({error: 'Validation', message: 'Request body is not valid JSON'});
      return;
    }
    console.error(`❌ ${req.method} ${req.path} failed:`, error);
    res.status(INTERNAL_ERROR.status).json(INTERNAL_ERROR.body);
  });

  return app;
}
