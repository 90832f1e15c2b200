import type { FastifyInstance } from 'fastify';
import {
  EntityNotFoundError,
  RuleStoreError,
  summarizeRule,
  validateRuleDefinition,
  type CompiledRule,
} from '@dataherd/core';
import type { CleaningServices } from '../services.js';
import {
  clientQuerySchema,
  compileBodySchema,
  idParamsSchema,
  parseInput,
  saveRuleBodySchema,
  updateRuleBodySchema,
} from '../schemas.js';

export function registerRuleRoutes(app: FastifyInstance, services: CleaningServices): void {
  const { compiler, ruleStore } = services;

  // Compile without saving, for review before a preview or save.
  app.post('/rules/compile', async (request, reply) => {
    const body = parseInput(compileBodySchema, request.body);
    const compiled = await compiler.compile(body.text, {
      client_context: body.client_context,
      strategy: body.strategy,
    });
    if (!compiled.ok) throw compiled.error;

    return reply.status(200).send({
      rule: compiled.value,
      explanation: compiler.explain(compiled.value),
    });
  });

  app.post('/rules', async (request, reply) => {
    const body = parseInput(saveRuleBodySchema, request.body);

    let compiled: CompiledRule;
    if (body.definition !== undefined) {
      const definition = validateRuleDefinition(body.definition);
      if (!definition.ok) throw new RuleStoreError('invalid_rule', null, definition.error.join('; '));
      const description = body.description ?? summarizeRule(definition.value);
      compiled = {
        name: body.name ?? `${definition.value.action.kind}_${definition.value.field}`,
        description,
        source_text: body.text ?? description,
        definition: definition.value,
        confidence: body.confidence,
        compiled_by: 'manual',
        client_context: body.client_context,
        priority: body.priority,
      };
    } else {
      const result = await compiler.compile(body.text ?? '', {
        client_context: body.client_context,
        strategy: body.strategy,
      });
      if (!result.ok) throw result.error;
      compiled = {
        ...result.value,
        name: body.name ?? result.value.name,
        description: body.description ?? result.value.description,
        priority: body.priority,
      };
    }

    const rule = await ruleStore.save(compiled, body.client_context, body.is_permanent);
    return reply.status(201).send({ rule });
  });

  app.get('/rules', async (request) => {
    const query = parseInput(clientQuerySchema, request.query);
    const rules = await ruleStore.getForClient(query.client ?? null);
    return { rules };
  });

  app.get('/rules/suggestions', async (request) => {
    const query = parseInput(clientQuerySchema, request.query);
    const suggestions = await ruleStore.suggestForClient(query.client ?? '');
    return { suggestions };
  });

  app.get('/rules/:id', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const rule = await ruleStore.getById(id);
    if (!rule) throw new EntityNotFoundError('rule', id);
    return { rule };
  });

  app.patch('/rules/:id', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const { expected_version, ...changes } = parseInput(updateRuleBodySchema, request.body);
    const updated = await ruleStore.update(id, changes, expected_version);
    if (!updated.ok) throw updated.error;
    return { rule: updated.value };
  });

  // Soft delete: deactivated rules stay queryable by id.
  app.delete('/rules/:id', async (request) => {
    const { id } = parseInput(idParamsSchema, request.params);
    const deactivated = await ruleStore.deactivate(id);
    if (!deactivated.ok) throw deactivated.error;
    return { rule: deactivated.value };
  });
}
