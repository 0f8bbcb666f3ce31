import { Router } from 'express';
import { AppContext } from '@/config/dependencies';
import { createAccountsController } from '@/controllers/accounts.controller';
import { methodNotAllowed } from '@/middlewares/methodNotAllowed';
import { createAccountsRouter } from './accounts.routes';

/**
 * Service routes, mounted at the application root
 */
export function createRoutes(context: AppContext): Router {
  const router = Router();
  const { config, loggerFactory, accountService } = context;

  // Root endpoint
  router
    .route('/')
    .get((_req, res) => {
      res.status(200).json({
        name: config.service.name,
        version: config.service.version,
        paths: '/accounts',
      });
    })
    .all(methodNotAllowed(['GET', 'HEAD']));

  // Health check endpoint
  router
    .route('/health')
    .get((_req, res) => {
      res.status(200).json({ status: 'OK' });
    })
    .all(methodNotAllowed(['GET', 'HEAD']));

  const controllerLogger = loggerFactory.createLogger('AccountsController');
  router.use(
    '/accounts',
    createAccountsRouter(createAccountsController(accountService, controllerLogger), controllerLogger)
  );

  return router;
}
