import type { Request } from 'express';
import { Router } from 'express';
import { z } from 'zod';

import type {
  ArithmeticResponse,
  EchoResponse,
  HealthResponse,
  ServiceBanner,
  TimeResponse,
} from '@usersvc/contracts';

import { ValidationError } from './errors';
import { jsonBody, methodNotAllowed, readJson } from './http';
import type { ApiObservability } from './observability';
import type { Clock } from './users-store';
import type { UserService } from './users-service';

export const ROUTE_HINTS = [
  'GET /health',
  'GET /time',
  'GET /echo?name=',
  'POST /sum',
  'POST /mul',
  'GET /metrics',
  'GET /users',
  'POST /users',
  'GET /users/{id}',
  'DELETE /users/{id}',
  'GET /users/{id}/profile',
  'GET /users/{id}/orders/{orderId}',
];

const arithmeticSchema = z.object({
  a: z.number().int().nullish(),
  b: z.number().int().nullish(),
}).strict();

export type UtilityRouterDeps = {
  serviceName: string;
  users: UserService;
  observability: ApiObservability;
  clock: Clock;
};

function readOperands(req: Request): { a: number; b: number } {
  const { a, b } = readJson(req, arithmeticSchema);
  const missing: string[] = [];
  if (a == null) missing.push('a is required');
  if (b == null) missing.push('b is required');
  if (a == null || b == null) {
    throw new ValidationError('missing required fields', missing);
  }
  return { a, b };
}

function firstQueryValue(value: unknown): string {
  const first: unknown = Array.isArray(value) ? value[0] : value;
  return typeof first === 'string' ? first : '';
}

export function createUtilityRouter(deps: UtilityRouterDeps): Router {
  const router = Router({ caseSensitive: true });

  router.route('/')
    .get((_req, res) => {
      const banner: ServiceBanner = { service: deps.serviceName, routes: ROUTE_HINTS };
      res.json(banner);
    })
    .all(methodNotAllowed(['GET']));

  router.route('/health')
    .get((_req, res) => {
      const health: HealthResponse = { status: 'ok' };
      res.json(health);
    })
    .all(methodNotAllowed(['GET']));

  router.route('/time')
    .get((_req, res) => {
      // second precision, e.g. 2024-05-01T12:00:00Z
      const time: TimeResponse = { time: deps.clock().toISOString().replace(/\.\d{3}Z$/, 'Z') };
      res.json(time);
    })
    .all(methodNotAllowed(['GET']));

  router.route('/echo')
    .get((req, res) => {
      const name = firstQueryValue(req.query.name).trim();
      if (name === '') {
        throw new ValidationError('missing required fields', ['name is required']);
      }
      const echo: EchoResponse = { name };
      res.json(echo);
    })
    .all(methodNotAllowed(['GET']));

  router.route('/sum')
    .post(jsonBody(), (req, res) => {
      const { a, b } = readOperands(req);
      const sum: ArithmeticResponse = { result: a + b };
      res.json(sum);
    })
    .all(methodNotAllowed(['POST']));

  router.route('/mul')
    .post(jsonBody(), (req, res) => {
      const { a, b } = readOperands(req);
      const product: ArithmeticResponse = { result: a * b };
      res.json(product);
    })
    .all(methodNotAllowed(['POST']));

  router.route('/metrics')
    .get((_req, res) => {
      res.type('text/plain');
      res.send(deps.observability.toPrometheus(deps.users.countUsers()));
    })
    .all(methodNotAllowed(['GET']));

  return router;
}
