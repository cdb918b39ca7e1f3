import express, { type NextFunction, type Request, type Response } from 'express';
import {
  createAuthenticator,
  createAuthMiddleware,
  createGoogleLoginHandler,
  createLoginHandler,
  type AuthConfig
} from './auth.js';
import { HttpError, MissingTokenError } from './httpError.js';
import type { Logger } from './logger.js';
import type { ChangeCoordinator } from './services/coordinator.js';
import {
  parseCreateComponentInput,
  parseCreateOperationInput,
  parseCreateTagInput,
  parseOperationFilter,
  parseOperationId,
  parseSubscriptionTarget,
  parseUpdateOperationInput
} from './services/inputs.js';

export const API_PREFIX = '/api/v1';

const getAuthenticatedUser = (req: Request) => {
  if (!req.user) {
    throw new MissingTokenError('Authentication required');
  }

  return req.user;
};

type AppOptions = {
  coordinator: ChangeCoordinator;
  auth: AuthConfig;
  logger: Logger;
};

const asyncHandler = (
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void> | void
) =>
  async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      next(error);
    }
  };

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError && 'type' in error && error.type === 'entity.parse.failed';

export const createApp = ({ coordinator, auth, logger }: AppOptions) => {
  const app = express();
  app.use(express.json());

  app.use((req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      logger.debug(
        { method: req.method, path: req.originalUrl, status: res.statusCode, durationMs: Date.now() - startedAt },
        'handled request'
      );
    });
    next();
  });

  // Health check endpoint (public)
  app.get(
    '/health',
    asyncHandler(async (_req, res) => {
      res.json({ status: 'ok' });
    })
  );

  const apiRouter = express.Router();

  // Credential issuance is public; everything registered after the middleware is not.
  if (auth.mode === 'token') {
    apiRouter.post('/auth', asyncHandler(createLoginHandler(auth, coordinator)));

    const { googleClientId } = auth;
    if (googleClientId) {
      apiRouter.post('/auth/google', createGoogleLoginHandler({ ...auth, googleClientId }, coordinator));
    }
  }

  apiRouter.use(createAuthMiddleware(createAuthenticator(auth, coordinator)));

  apiRouter.get(
    '/components',
    asyncHandler((_req, res) => {
      res.json({ components: coordinator.listComponents() });
    })
  );

  apiRouter.post(
    '/components',
    asyncHandler((req, res) => {
      const component = coordinator.createComponent(parseCreateComponentInput(req.body));
      res.status(201).json({ component });
    })
  );

  apiRouter.get(
    '/components/:name',
    asyncHandler((req, res) => {
      res.json({ component: coordinator.getComponent(req.params.name) });
    })
  );

  apiRouter.get(
    '/tags',
    asyncHandler((_req, res) => {
      res.json({ tags: coordinator.listTags() });
    })
  );

  apiRouter.post(
    '/tags',
    asyncHandler((req, res) => {
      const tag = coordinator.createTag(parseCreateTagInput(req.body));
      res.status(201).json({ tag });
    })
  );

  apiRouter.get(
    '/tags/:name',
    asyncHandler((req, res) => {
      res.json({ tag: coordinator.getTag(req.params.name) });
    })
  );

  apiRouter.get(
    '/operations',
    asyncHandler((req, res) => {
      const operations = coordinator.listOperations(parseOperationFilter(req.query));
      res.json({ operations });
    })
  );

  apiRouter.post(
    '/operations',
    asyncHandler((req, res) => {
      const user = getAuthenticatedUser(req);
      const operation = coordinator.createOperation(user.name, parseCreateOperationInput(req.body));
      res.status(201).json({ operation });
    })
  );

  apiRouter.get(
    '/operations/:id',
    asyncHandler((req, res) => {
      res.json({ operation: coordinator.getOperation(parseOperationId(req.params.id)) });
    })
  );

  apiRouter.patch(
    '/operations/:id',
    asyncHandler((req, res) => {
      const operation = coordinator.updateOperation(
        parseOperationId(req.params.id),
        parseUpdateOperationInput(req.body)
      );
      res.json({ operation });
    })
  );

  apiRouter.get(
    '/subscriptions',
    asyncHandler((req, res) => {
      const user = getAuthenticatedUser(req);
      res.json({ subscriptions: coordinator.listSubscriptions(user.name) });
    })
  );

  apiRouter.post(
    '/subscriptions',
    asyncHandler((req, res) => {
      const user = getAuthenticatedUser(req);
      const subscriptions = coordinator.subscribe(user.name, parseSubscriptionTarget(req.body));
      res.status(201).json({ subscriptions });
    })
  );

  apiRouter.get(
    '/locks',
    asyncHandler((_req, res) => {
      res.json({ locks: coordinator.listLocks() });
    })
  );

  // Error handler for API routes
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  const handleError = (error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof HttpError) {
      res.status(error.status).json({ message: error.message, code: error.code, details: error.details });
      return;
    }

    if (isBodyParseError(error)) {
      res.status(400).json({ message: 'Malformed JSON body', code: 'InvalidRequest', details: {} });
      return;
    }

    logger.error({ err: error }, 'unexpected error');
    res.status(500).json({ message: 'Internal Server Error', code: 'Internal', details: {} });
  };

  apiRouter.use(handleError);
  app.use(API_PREFIX, apiRouter);
  app.use(handleError);

  return app;
};
