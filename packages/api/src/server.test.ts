import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { STARTER_SUGGESTIONS } from '@dataherd/core';
import { InMemoryCleaningStorage } from '@dataherd/core/testing';
import { createServer } from './server.js';
import { createServices } from './services.js';

const WEIGHT_TEXT = 'Flag lots where entry weight is below 500 pounds';

const STANDARDIZE_BREED = {
  rule_type: 'standardization',
  field: 'breed',
  condition: { operator: 'not_canonical' },
  action: { kind: 'standardize', format: 'proper_case' },
};

describe('API server', () => {
  let app: FastifyInstance;

  beforeEach(async () => {
    const services = createServices(new InMemoryCleaningStorage());
    app = createServer({ services, logLevel: 'silent' });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  async function ingest(records: Array<Record<string, unknown>>): Promise<void> {
    const response = await app.inject({ method: 'POST', url: '/batches', payload: { batch_id: 'b1', records } });
    expect(response.statusCode).toBe(201);
  }

  async function saveBreedRule(): Promise<string> {
    const response = await app.inject({ method: 'POST', url: '/rules', payload: { definition: STANDARDIZE_BREED } });
    expect(response.statusCode).toBe(201);
    return response.json().rule.id;
  }

  describe('rules', () => {
    it('should compile text without saving it', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/rules/compile',
        payload: { text: WEIGHT_TEXT, strategy: 'pattern' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.rule.name).toBe('flag_weight_lt');
      expect(body.rule.definition.condition).toEqual({ operator: 'lt', value: 500 });
      expect(body.rule.confidence).toBe(0.7);

      const listed = await app.inject({ method: 'GET', url: '/rules' });
      expect(listed.json().rules).toEqual([]);
    });

    it('should answer 422 for text it cannot compile', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/rules/compile',
        payload: { text: 'weight below 500', strategy: 'pattern' },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().code).toBe('ambiguous');
    });

    it('should save, update and deactivate a rule', async () => {
      const created = await app.inject({ method: 'POST', url: '/rules', payload: { text: WEIGHT_TEXT } });
      expect(created.statusCode).toBe(201);
      const id: string = created.json().rule.id;

      const fetched = await app.inject({ method: 'GET', url: `/rules/${id}` });
      expect(fetched.json().rule).toMatchObject({ id, name: 'flag_weight_lt', compiled_by: 'pattern', version: 1 });

      const patched = await app.inject({
        method: 'PATCH',
        url: `/rules/${id}`,
        payload: { expected_version: 1, priority: 5 },
      });
      expect(patched.statusCode).toBe(200);
      expect(patched.json().rule).toMatchObject({ priority: 5, version: 2 });

      const stale = await app.inject({
        method: 'PATCH',
        url: `/rules/${id}`,
        payload: { expected_version: 1, priority: 6 },
      });
      expect(stale.statusCode).toBe(409);

      const deleted = await app.inject({ method: 'DELETE', url: `/rules/${id}` });
      expect(deleted.json().rule.is_active).toBe(false);
      const listed = await app.inject({ method: 'GET', url: '/rules' });
      expect(listed.json().rules).toEqual([]);
    });

    it('should reject a definition whose action does not fit its rule type', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/rules',
        payload: { definition: { ...STANDARDIZE_BREED, rule_type: 'validation' } },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json().code).toBe('invalid_rule');
    });

    it('should reject a body with neither text nor definition', async () => {
      const response = await app.inject({ method: 'POST', url: '/rules', payload: {} });

      expect(response.statusCode).toBe(400);
      expect(response.json().message).toBe('(root): text or definition is required');
    });

    it('should answer 404 for an unknown rule', async () => {
      const response = await app.inject({ method: 'GET', url: '/rules/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toMatchObject({ entity_type: 'rule', entity_id: 'missing' });
    });

    it('should offer starter suggestions to a new client', async () => {
      const response = await app.inject({ method: 'GET', url: '/rules/suggestions?client=ranch-a' });

      expect(response.json().suggestions).toEqual(STARTER_SUGGESTIONS);
    });
  });

  describe('batches and operations', () => {
    it('should preview, apply and roll back a batch', async () => {
      await ingest([
        { lot_id: 'L1', breed: 'angus' },
        { lot_id: 'L2', breed: 'Hereford' },
        { lot_id: 'L3', breed: 'Angus' },
      ]);
      const ruleId = await saveBreedRule();

      const preview = await app.inject({ method: 'POST', url: '/batches/b1/preview', payload: { as_of: '2026-06-01' } });
      expect(preview.statusCode).toBe(200);
      const changeSet = preview.json().change_set;
      expect(changeSet.entries).toHaveLength(1);
      expect(changeSet.entries[0]).toMatchObject({
        change_key: `b1:L1:${ruleId}:breed`,
        original_value: 'angus',
        new_value: 'Angus',
        status: 'proposed',
      });

      const applied = await app.inject({ method: 'POST', url: '/batches/b1/apply', payload: { change_set: changeSet } });
      expect(applied.statusCode).toBe(200);
      const operationId: string = applied.json().operation_id;
      expect(applied.json().status).toBe('applied');

      const changes = await app.inject({ method: 'GET', url: `/operations/${operationId}/changes` });
      expect(changes.json().changes.map((entry: { status: string }) => entry.status)).toEqual(['applied']);

      const rolledBack = await app.inject({ method: 'POST', url: `/operations/${operationId}/rollback` });
      expect(rolledBack.statusCode).toBe(200);
      expect(rolledBack.json().restored_lot_ids).toEqual(['L1']);

      const again = await app.inject({ method: 'POST', url: `/operations/${operationId}/rollback` });
      expect(again.statusCode).toBe(409);
      expect(again.json().code).toBe('already_rolled_back');

      const operations = await app.inject({ method: 'GET', url: '/operations?batch_id=b1' });
      expect(operations.json().operations.map((op: { kind: string }) => op.kind)).toEqual(['rollback', 'apply']);
    });

    it('should answer 422 until a high-risk ChangeSet names its approved keys', async () => {
      await ingest([
        { lot_id: 'L1', breed: null },
        { lot_id: 'L2', breed: 'Angus' },
      ]);
      const saved = await app.inject({
        method: 'POST',
        url: '/rules',
        payload: {
          definition: {
            rule_type: 'validation',
            field: 'breed',
            condition: { operator: 'missing' },
            action: { kind: 'remove' },
          },
        },
      });
      expect(saved.statusCode).toBe(201);
      const preview = await app.inject({ method: 'POST', url: '/batches/b1/preview', payload: { as_of: '2026-06-01' } });
      const changeSet = preview.json().change_set;

      const refused = await app.inject({ method: 'POST', url: '/batches/b1/apply', payload: { change_set: changeSet } });
      const approved = await app.inject({
        method: 'POST',
        url: '/batches/b1/apply',
        payload: { change_set: changeSet, approved_keys: [changeSet.entries[0].change_key] },
      });

      expect(refused.statusCode).toBe(422);
      expect(refused.json().code).toBe('approval_required');
      expect(approved.statusCode).toBe(200);
      expect(approved.json().counts.removed).toBe(1);
    });

    it('should reject a ChangeSet carrying an unknown diagnostic code', async () => {
      await ingest([{ lot_id: 'L1', breed: 'angus' }]);
      await saveBreedRule();
      const preview = await app.inject({ method: 'POST', url: '/batches/b1/preview', payload: { as_of: '2026-06-01' } });
      const changeSet = {
        ...preview.json().change_set,
        diagnostics: [{ code: 'already_canonical', lot_id: 'L1', rule_id: 'r1', field: 'breed', message: 'ok' }],
      };

      const response = await app.inject({ method: 'POST', url: '/batches/b1/apply', payload: { change_set: changeSet } });

      expect(response.statusCode).toBe(400);
    });

    it('should preview instructions as drafts', async () => {
      await ingest([
        { lot_id: 'L1', weight: 420 },
        { lot_id: 'L2', weight: 600 },
      ]);

      const response = await app.inject({
        method: 'POST',
        url: '/batches/b1/preview',
        payload: { texts: [WEIGHT_TEXT], as_of: '2026-06-01' },
      });

      expect(response.statusCode).toBe(200);
      const body = response.json();
      expect(body.drafts).toHaveLength(1);
      expect(body.change_set.entries.map((entry: { lot_id: string }) => entry.lot_id)).toEqual(['L1']);
    });

    it('should refuse a batch with repeated lot ids', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/batches',
        payload: { records: [{ lot_id: 'L1' }, { lot_id: 'L1' }] },
      });

      expect(response.statusCode).toBe(422);
      expect(response.json()).toMatchObject({ code: 'duplicate_lot_id', lot_ids: ['L1'] });
    });

    it('should answer 404 when previewing an unknown batch', async () => {
      const response = await app.inject({ method: 'POST', url: '/batches/nope/preview', payload: {} });

      expect(response.statusCode).toBe(404);
      expect(response.json().code).toBe('batch_not_found');
    });

    it('should require a preview unless bypassed', async () => {
      await ingest([{ lot_id: 'L1', breed: 'angus' }]);

      const response = await app.inject({ method: 'POST', url: '/batches/b1/apply', payload: { entries: [] } });

      expect(response.statusCode).toBe(400);
      expect(response.json().code).toBe('preview_required');
    });

    it('should answer 404 when rolling back an unknown operation', async () => {
      const response = await app.inject({ method: 'POST', url: '/operations/nope/rollback' });

      expect(response.statusCode).toBe(404);
      expect(response.json().code).toBe('operation_not_found');
    });
  });

  describe('health', () => {
    it('should report ok and echo the correlation id', async () => {
      const response = await app.inject({
        method: 'GET',
        url: '/health',
        headers: { 'x-correlation-id': 'corr-1' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toMatchObject({ status: 'ok', checks: { database: 'ok' } });
      expect(response.headers['x-correlation-id']).toBe('corr-1');
    });

    it('should report degraded when the database check fails', async () => {
      const services = createServices(new InMemoryCleaningStorage());
      const degraded = createServer({
        services,
        logLevel: 'silent',
        healthCheck: async () => {
          throw new Error('connection refused');
        },
      });

      const response = await degraded.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(503);
      expect(response.json().status).toBe('degraded');
      await degraded.close();
    });
  });
});
