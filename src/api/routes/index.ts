import express, { Router } from 'express';
import swaggerUi from 'swagger-ui-express';
import { swaggerDocument } from '../swagger';
import { compressionMiddleware, rateLimiter, corsMiddleware, requireAdminKey } from '../middleware';
import { asyncHandler } from '../middleware/asyncHandler';
import { ValidatorController } from '../controllers/validator.controller';
import { SubnetController } from '../controllers/subnet.controller';
import { TrpcController } from '../controllers/trpc.controller';

export interface RouterDependencies {
  validatorController: ValidatorController;
  subnetController: SubnetController;
  trpcController: TrpcController;
  adminKey: string | undefined;
  docsBaseUrl: string;
}

export function createRouter(deps: RouterDependencies): Router {
  const router = express.Router();
  const { validatorController, subnetController, trpcController } = deps;

  // Apply global middlewares
  router.use(corsMiddleware);
  router.use(compressionMiddleware);
  router.use(rateLimiter);

  // Swagger documentation route
  router.use('/api-docs', swaggerUi.serve);
  router.get('/api-docs', swaggerUi.setup(swaggerDocument, {
    swaggerOptions: {
      url: `${deps.docsBaseUrl}/api/swagger.json`,
      displayRequestDuration: true,
      docExpansion: 'list',
      filter: true
    }
  }));

  // Add route to serve swagger.json
  router.get('/swagger.json', (req, res) => {
    res.json(swaggerDocument);
  });

  router.get('/health', (req, res) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  // Validator routes; the subnet listing must be registered before /:hotkey
  router.get('/validators', asyncHandler(validatorController.listValidators));
  router.get('/validators/subnet/:subnetId', asyncHandler(validatorController.listSubnetValidators));
  router.get('/validators/:hotkey/live', asyncHandler(validatorController.getLiveValidator));
  router.get('/validators/:hotkey', asyncHandler(validatorController.getValidator));

  // Subnet routes
  router.get('/subnets', asyncHandler(subnetController.listSubnets));
  router.post('/admin/subnets/:netuid', requireAdminKey(deps.adminKey), asyncHandler(subnetController.updateSubnet));

  // Batched procedure calls
  router.get('/trpc/:procedures', asyncHandler(trpcController.handleBatch));
  router.post('/trpc/:procedures', asyncHandler(trpcController.handleBatch));

  return router;
}
