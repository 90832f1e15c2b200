import type { FastifyInstance } from 'fastify';
import { EntityNotFoundError } from '@dataherd/core';
import type { ApplyRequest } from '@dataherd/cleaning';
import type { CleaningServices } from '../services.js';
import {
  applyBodySchema,
  asOfDate,
  idParamsSchema,
  ingestBodySchema,
  parseInput,
  previewBodySchema,
} from '../schemas.js';

export function registerBatchRoutes(app: FastifyInstance, services: CleaningServices): void {
  const { processor, pipeline } = services;

  app.post('/batches', async (request, reply) => {
    const body = parseInput(ingestBodySchema, request.body);
    const batch = await processor.ingest(body.records, {
      batch_id: body.batch_id,
      client_context: body.client_context,
      source_name: body.source_name,
    });
    if (!batch.ok) throw batch.error;
    return reply.status(201).send({ batch: batch.value });
  });

  app.get('/batches/:id', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const batch = await processor.getBatch(id);
    if (!batch) throw new EntityNotFoundError('batch', id);
    return { batch };
  });

  // Instructions in `texts` are compiled as unsaved drafts for this preview only.
  app.post('/batches/:id/preview', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const body = parseInput(previewBodySchema, request.body ?? {});
    const as_of = asOfDate(body.as_of);

    if (body.texts.length > 0) {
      const preview = await pipeline.previewText(id, body.texts, {
        strategy: body.strategy,
        include_stored_rules: body.include_stored_rules,
        ordering: body.ordering,
        as_of,
      });
      if (!preview.ok) throw preview.error;
      return preview.value;
    }

    const preview = await processor.previewBatch(id, {
      include_stored_rules: body.include_stored_rules,
      ordering: body.ordering,
      as_of,
    });
    if (!preview.ok) throw preview.error;
    return { change_set: preview.value, drafts: [] };
  });

  app.post('/batches/:id/apply', async (request, reply) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const body = parseInput(applyBodySchema, request.body);
    const applyRequest: ApplyRequest =
      'change_set' in body
        ? { kind: 'change_set', change_set: body.change_set, approved_keys: body.approved_keys }
        : { kind: 'direct', bypass_preview: body.bypass_preview, entries: body.entries };

    // A client that disconnects mid-apply cancels the remaining records.
    const controller = new AbortController();
    reply.raw.once('close', () => {
      if (!reply.raw.writableFinished) controller.abort();
    });

    const result = await processor.apply(id, applyRequest, { actor: body.actor, signal: controller.signal });
    if (!result.ok) throw result.error;
    return result.value;
  });
}
