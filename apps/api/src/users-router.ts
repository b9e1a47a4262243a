import { Router } from 'express';
import { z } from 'zod';

import type {
  UserDeleted,
  UserListing,
  UserOrderRef,
  UserProfileStub,
} from '@usersvc/contracts';

import { PathError } from './errors';
import { jsonBody, methodNotAllowed, notFoundHandler, readJson } from './http';
import type { UserService } from './users-service';

const createUserSchema = z.object({
  name: z.string().nullish(),
}).strict();

const SIGNED_DIGITS = /^[+-]?\d+$/;

// `/users/` and `/users//`: the id segment is present but empty.
const MISSING_ID_PATH = /^\/users\/+$/;

export function parseUserId(raw: string): number {
  const value = raw.trim();
  if (value === '') {
    throw new PathError('user id is required');
  }
  const id = SIGNED_DIGITS.test(value) ? Number(value) : Number.NaN;
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new PathError('user id must be a positive integer');
  }
  return id;
}

/**
 * Routes under `/users`. The `{id}` segment is validated for every nested
 * path before method negotiation or any service call.
 */
export function createUsersRouter(service: UserService): Router {
  const router = Router({ caseSensitive: true });

  router.use((req, _res, next) => {
    if (MISSING_ID_PATH.test(req.path)) {
      throw new PathError('user id is required');
    }
    next();
  });

  router.param('id', (_req, _res, next, value: string) => {
    parseUserId(value);
    next();
  });

  router.route('/users')
    .get((_req, res) => {
      const items = service.listUsers();
      const listing: UserListing = { items, count: items.length };
      res.status(200).json(listing);
    })
    .post(jsonBody(), (req, res) => {
      const body = readJson(req, createUserSchema);
      const user = service.createUser(body.name ?? '');
      res.status(201).json(user);
    })
    .all(methodNotAllowed(['GET', 'POST']));

  router.route('/users/:id')
    .get((req, res) => {
      const user = service.getUser(parseUserId(req.params.id));
      res.status(200).json(user);
    })
    .delete((req, res) => {
      const id = parseUserId(req.params.id);
      service.deleteUser(id);
      const deleted: UserDeleted = { deleted: true, id };
      res.status(200).json(deleted);
    })
    .all(methodNotAllowed(['GET', 'DELETE']));

  router.route('/users/:id/profile')
    .get((req, res) => {
      const { id } = service.getUser(parseUserId(req.params.id));
      const profile: UserProfileStub = { id, profile: true };
      res.status(200).json(profile);
    })
    .all(methodNotAllowed(['GET']));

  router.route('/users/:id/orders/:orderId')
    .get((req, res) => {
      const id = parseUserId(req.params.id);
      const orderId = req.params.orderId.trim();
      if (orderId === '') {
        throw new PathError('orderId is required');
      }
      service.getUser(id);
      const order: UserOrderRef = { id, orderId };
      res.status(200).json(order);
    })
    .all(methodNotAllowed(['GET']));

  router.all('/users/:id/*', notFoundHandler);

  return router;
}
