import type { IncomingMessage } from 'node:http';

import type { ErrorRequestHandler, Request, RequestHandler } from 'express';
import express from 'express';
import type { z } from 'zod';

import type { ErrorBody } from '@usersvc/contracts';
import type { Logger } from '@usersvc/shared';
import { serializeError } from '@usersvc/shared';

import { AppError, BodyError, InternalError, MethodError, NotFoundError, PathError } from './errors';
import type { ApiObservability } from './observability';

export const MAX_BODY_BYTES = 1 << 20;

type ParserError = Error & { type: string };

function isParserError(error: unknown): error is ParserError {
  return error instanceof Error && 'type' in error && typeof error.type === 'string';
}

function toBodyError(error: unknown): BodyError {
  if (isParserError(error)) {
    if (error.type === 'entity.too.large') return new BodyError('request body too large');
    if (error.type === 'entity.parse.failed') return new BodyError(error.message);
  }
  return new BodyError('invalid request body');
}

function describeIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return 'invalid request body';
  if (issue.code === 'unrecognized_keys') {
    return `unknown field "${issue.keys[0] ?? ''}"`;
  }
  const path = issue.path.join('.');
  return `${path || 'body'}: ${issue.message}`;
}

/**
 * Parses the request body as JSON whatever its content type, capped at
 * {@link MAX_BODY_BYTES}. Parser failures and empty bodies are forwarded as
 * {@link BodyError}.
 */
export function jsonBody(): RequestHandler {
  // The parser never calls verify for a request without a body.
  const bodyBytes = new WeakMap<IncomingMessage, number>();
  const parse = express.json({
    limit: MAX_BODY_BYTES,
    strict: true,
    type: () => true,
    verify: (req, _res, buf) => {
      bodyBytes.set(req, buf.length);
    },
  });
  return (req, res, next) => {
    parse(req, res, (error?: unknown) => {
      if (error) {
        next(toBodyError(error));
        return;
      }
      if (!bodyBytes.get(req)) {
        next(new BodyError('request body is empty'));
        return;
      }
      next();
    });
  };
}

/** Checks a parsed body against a strict schema; use after {@link jsonBody}. */
export function readJson<S extends z.ZodTypeAny>(req: Request, schema: S): z.infer<S> {
  const result = schema.safeParse(req.body);
  if (!result.success) {
    throw new BodyError(describeIssue(result.error));
  }
  return result.data;
}

export function methodNotAllowed(allow: string[]): RequestHandler {
  return (req) => {
    throw new MethodError(req.method, allow);
  };
}

export const notFoundHandler: RequestHandler = (req) => {
  throw new NotFoundError('resource not found', { path: req.path });
};

export function requestLogger(logger: Logger, observability: ApiObservability): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    res.on('finish', () => {
      const durationMs = Date.now() - startedAt;
      observability.observeRequest(res.statusCode, durationMs);
      logger.info('http request', {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs,
      });
    });
    next();
  };
}

function toAppError(error: unknown): AppError | undefined {
  if (error instanceof AppError) return error;
  // Express raises this when a route parameter has a malformed percent-encoding.
  if (error instanceof URIError) return new PathError('malformed path encoding');
  return undefined;
}

export function errorMiddleware(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req, res, next) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    let appError = toAppError(error);
    if (!appError) {
      logger.error('unhandled request error', {
        method: req.method,
        path: req.path,
        ...serializeError(error),
      });
      appError = new InternalError();
    }

    if (appError instanceof MethodError) {
      res.setHeader('Allow', appError.allow.join(', '));
    }

    const body: ErrorBody = {
      error: appError.code,
      message: appError.message,
    };
    if (appError.details !== undefined) {
      body.details = appError.details;
    }
    res.status(appError.statusCode).json(body);
  };
}
