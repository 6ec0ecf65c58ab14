// src/app.ts
import express from 'express';
import swaggerUi from 'swagger-ui-express';
import { createApiV1, type ApiDeps } from './api_v1.js';
import { openapi } from './openapi.js';

export function createApp(deps: ApiDeps): express.Express {
  const app = express();
  app.set('etag', false);
  app.use(express.json({ limit: deps.config.bodyLimit }));

  // ===== v1 REST =====
  app.use('/v1', createApiV1(deps));

  // ===== OpenAPI JSON (no-store, fresh copy per request) =====
  app.get('/openapi.json', (_req, res) => {
    res.set('Cache-Control', 'no-store');
    res.json(structuredClone(openapi));
  });

  const noStore = (_req: express.Request, res: express.Response, next: express.NextFunction) => {
    res.set('Cache-Control', 'no-store');
    next();
  };

  app.use(
    '/docs',
    noStore,
    swaggerUi.serve,
    swaggerUi.setup(undefined, {
      explorer: true,
      customSiteTitle: 'Cell test ingestion API',
      swaggerUrl: '/openapi.json',
    })
  );

  return app;
}
