import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import {
  generateId,
  ApplyError,
  CompileError,
  ConcurrencyConflictError,
  EntityNotFoundError,
  PreviewError,
  RollbackError,
  RuleStoreError,
  ValidationError,
} from '@dataherd/core';
import type { CleaningServices } from './services.js';
import { registerRuleRoutes } from './routes/rules.route.js';
import { registerBatchRoutes } from './routes/batches.route.js';
import { registerOperationRoutes } from './routes/operations.route.js';
import { registerHealthRoutes } from './routes/health.route.js';
import type { LogLevel } from './config.js';

export interface ServerDeps {
  services: CleaningServices;
  /** Resolves when the database answers; always healthy when omitted. */
  healthCheck?: () => Promise<unknown>;
  logLevel?: LogLevel;
}

interface ErrorReply {
  status: number;
  body: Record<string, unknown>;
}

const CORRELATION_HEADER = 'x-correlation-id';

function previewStatus(error: PreviewError): number {
  return error.code === 'batch_not_found' ? 404 : 422;
}

function applyStatus(error: ApplyError): number {
  switch (error.code) {
    case 'batch_not_found':
      return 404;
    case 'batch_mismatch':
      return 409;
    case 'preview_required':
      return 400;
    case 'invalid_change_set':
    case 'approval_required':
    case 'nothing_to_apply':
      return 422;
  }
}

function rollbackStatus(error: RollbackError): number {
  return error.code === 'operation_not_found' ? 404 : 409;
}

/** Map a domain error to an HTTP reply; null for anything unexpected. */
export function toErrorReply(error: Error): ErrorReply | null {
  if (error instanceof ValidationError) {
    return {
      status: 400,
      body: { error: 'Validation Error', message: error.message, field: error.field, details: error.details },
    };
  }

  if (error instanceof CompileError) {
    return {
      status: 422,
      body: { error: 'Compile Error', code: error.code, message: error.message, details: error.details },
    };
  }

  if (error instanceof PreviewError) {
    return {
      status: previewStatus(error),
      body: { error: 'Preview Error', code: error.code, message: error.message, lot_ids: error.lotIds },
    };
  }

  if (error instanceof ApplyError) {
    return { status: applyStatus(error), body: { error: 'Apply Error', code: error.code, message: error.message } };
  }

  if (error instanceof RollbackError) {
    return {
      status: rollbackStatus(error),
      body: {
        error: 'Rollback Error',
        code: error.code,
        message: error.message,
        operation_id: error.operationId,
        blocking_lot_ids: error.blockingLotIds,
      },
    };
  }

  if (error instanceof RuleStoreError) {
    return {
      status: error.code === 'rule_not_found' ? 404 : 422,
      body: { error: 'Rule Error', code: error.code, message: error.message, rule_id: error.ruleId },
    };
  }

  if (error instanceof ConcurrencyConflictError) {
    return {
      status: 409,
      body: {
        error: 'Concurrency Conflict',
        message: error.message,
        entity_id: error.entityId,
        expected_version: error.expectedVersion,
        actual_version: error.actualVersion,
      },
    };
  }

  if (error instanceof EntityNotFoundError) {
    return {
      status: 404,
      body: {
        error: 'Not Found',
        message: error.message,
        entity_type: error.entityType,
        entity_id: error.entityId,
      },
    };
  }

  return null;
}

export function createServer(deps: ServerDeps): FastifyInstance {
  const app = Fastify({
    logger: { level: deps.logLevel ?? 'info' },
    genReqId: () => generateId(),
  });

  // Add correlation ID to every request
  app.addHook('onRequest', async (request, reply) => {
    const header = request.headers[CORRELATION_HEADER];
    const correlationId = typeof header === 'string' && header.length > 0 ? header : generateId();
    request.headers[CORRELATION_HEADER] = correlationId;
    request.log = request.log.child({ correlation_id: correlationId });
    reply.header(CORRELATION_HEADER, correlationId);
  });

  registerRuleRoutes(app, deps.services);
  registerBatchRoutes(app, deps.services);
  registerOperationRoutes(app, deps.services);
  registerHealthRoutes(app, deps.healthCheck ?? (async () => undefined));

  // Global error handler
  app.setErrorHandler((error, request, reply) => {
    const mapped = toErrorReply(error);
    if (mapped) {
      request.log.info({ status: mapped.status, err_message: error.message }, 'Request rejected');
      return reply.status(mapped.status).send(mapped.body);
    }

    // Fastify's own client errors, e.g. malformed JSON or an oversized body.
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'Bad Request', message: error.message });
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return reply.status(500).send({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred',
      correlation_id: request.headers[CORRELATION_HEADER],
    });
  });

  return app;
}
