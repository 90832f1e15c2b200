import type { FastifyInstance } from 'fastify';
import { EntityNotFoundError } from '@dataherd/core';
import type { CleaningServices } from '../services.js';
import { idParamsSchema, operationsQuerySchema, parseInput, rollbackBodySchema } from '../schemas.js';

export function registerOperationRoutes(app: FastifyInstance, services: CleaningServices): void {
  const { ledger } = services;

  app.get('/operations', async (request) => {
    const query = parseInput(operationsQuerySchema, request.query);
    const operations = await ledger.listOperations(query);
    return { operations };
  });

  app.get('/operations/:id', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const operation = await ledger.getOperation(id);
    if (!operation) throw new EntityNotFoundError('operation', id);
    return { operation };
  });

  app.get('/operations/:id/changes', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const operation = await ledger.getOperation(id);
    if (!operation) throw new EntityNotFoundError('operation', id);
    const changes = await ledger.listChangeEntries({ operation_id: id });
    return { operation_id: id, changes };
  });

  app.post('/operations/:id/rollback', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const body = parseInput(rollbackBodySchema, request.body ?? {});
    const result = await ledger.rollback(id, { actor: body.actor });
    if (!result.ok) throw result.error;
    return result.value;
  });
}
