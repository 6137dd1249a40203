import { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { buildSwaggerSpec } from '../swagger.js';

export const OPENAPI_JSON_PATH = '/docs/openapi.json';

export function createSwaggerRoutes() {
  const router = Router();
  const spec = buildSwaggerSpec();

  // Registered before the UI's static handler, which would otherwise claim /docs/*
  router.get(OPENAPI_JSON_PATH, (_req, res) => {
    res.json(spec);
  });

  router.use('/docs', swaggerUi.serve);
  router.get('/docs', swaggerUi.setup(spec, {
    customSiteTitle: 'BankStack API',
    customCss: '.swagger-ui .topbar { display: none }',
  }));

  return router;
}
