import type { Express } from 'express';
import express from 'express';
import cors from 'cors';

import type { Logger } from '@usersvc/shared';

import { errorMiddleware, notFoundHandler, requestLogger } from './http';
import type { ApiObservability } from './observability';
import { createUsersRouter } from './users-router';
import type { UserService } from './users-service';
import type { Clock } from './users-store';
import { createUtilityRouter } from './utility-routes';

export type AppDeps = {
  serviceName: string;
  users: UserService;
  logger: Logger;
  observability: ApiObservability;
  clock?: Clock;
};

export function createApp(deps: AppDeps): Express {
  const app = express();
  app.disable('x-powered-by');
  app.set('json spaces', 2);
  app.set('case sensitive routing', true);

  app.use(requestLogger(deps.logger, deps.observability));
  // OPTIONS goes on to method negotiation like any other verb.
  app.use(cors({ preflightContinue: true }));

  app.use(createUtilityRouter({
    serviceName: deps.serviceName,
    users: deps.users,
    observability: deps.observability,
    clock: deps.clock ?? (() => new Date()),
  }));
  app.use(createUsersRouter(deps.users));

  app.use(notFoundHandler);
  app.use(errorMiddleware(deps.logger));

  return app;
}
