import type { Logger } from 'pino';
import { ConcurrencyConflictError, RuleStoreError } from '../shared/errors.js';
import { createLogger } from '../shared/logger.js';
import { err, generateId, ok, type Result } from '../shared/types.js';
import { validateRuleDefinition } from '../rules-engine/rule-validator.js';
import type { CompiledRule, Rule } from '../rules-engine/types.js';
import type { RuleRepository } from '../storage/types.js';

export interface RuleUpdate {
  name?: string;
  description?: string;
  /** Validated before it is stored. */
  definition?: unknown;
  priority?: number | null;
  is_active?: boolean;
  is_permanent?: boolean;
}

/** Starter phrasings offered to every client. */
export const STARTER_SUGGESTIONS = [
  'Flag lots where entry weight is below 500 pounds',
  'Remove lots with missing breed information',
  'Standardize breed names',
  'Flag birth dates that are invalid or more than 3 years old',
  'Remove duplicate records',
];

const MAX_SUGGESTIONS = 5;

/**
 * Running mean after one more outcome: old + (outcome - old) / new_count.
 */
export function nextSuccessRate(oldRate: number, oldCount: number, success: boolean): number {
  const outcome = success ? 1 : 0;
  return oldRate + (outcome - oldRate) / (oldCount + 1);
}

export class RuleStore {
  private readonly logger: Logger;

  constructor(
    private readonly repository: RuleRepository,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('rule-store');
  }

  async save(compiled: CompiledRule, clientContext: string | null, isPermanent: boolean): Promise<Rule> {
    const now = new Date();
    const rule: Rule = {
      ...compiled,
      id: generateId(),
      client_context: clientContext,
      is_permanent: isPermanent,
      is_active: true,
      usage_count: 0,
      success_rate: 0,
      last_used: null,
      created_at: now,
      updated_at: now,
      version: 1,
    };
    const saved = await this.repository.insert(rule);
    this.logger.info({ rule_id: saved.id, client: clientContext, permanent: isPermanent }, 'Rule saved');
    return saved;
  }

  async getById(id: string): Promise<Rule | null> {
    return this.repository.findById(id);
  }

  /** Active client rules and global rules, ordered by usage count descending. */
  async getForClient(client: string | null): Promise<Rule[]> {
    return this.repository.findForClient(client);
  }

  async listPermanent(): Promise<Rule[]> {
    return this.repository.listPermanent();
  }

  async recordUsage(id: string, success: boolean): Promise<Result<Rule, RuleStoreError>> {
    const updated = await this.repository.recordUsage(id, success, new Date());
    if (!updated) return err(new RuleStoreError('rule_not_found', id, `Rule not found: ${id}`));
    return ok(updated);
  }

  async update(
    id: string,
    changes: RuleUpdate,
    expectedVersion: number,
  ): Promise<Result<Rule, RuleStoreError | ConcurrencyConflictError>> {
    const current = await this.repository.findById(id);
    if (!current) return err(new RuleStoreError('rule_not_found', id, `Rule not found: ${id}`));
    if (current.version !== expectedVersion) {
      return err(new ConcurrencyConflictError(id, expectedVersion, current.version));
    }

    let definition = current.definition;
    if (changes.definition !== undefined) {
      const validated = validateRuleDefinition(changes.definition);
      if (!validated.ok) {
        return err(new RuleStoreError('invalid_rule', id, validated.error.join('; ')));
      }
      definition = validated.value;
    }

    const next: Rule = {
      ...current,
      name: changes.name ?? current.name,
      description: changes.description ?? current.description,
      definition,
      compiled_by: changes.definition !== undefined ? 'manual' : current.compiled_by,
      priority: changes.priority !== undefined ? changes.priority : current.priority,
      is_active: changes.is_active ?? current.is_active,
      is_permanent: changes.is_permanent ?? current.is_permanent,
      updated_at: new Date(),
      version: current.version + 1,
    };

    const saved = await this.repository.update(next, expectedVersion);
    if (!saved) {
      const latest = await this.repository.findById(id);
      return err(new ConcurrencyConflictError(id, expectedVersion, latest?.version ?? -1));
    }
    return ok(saved);
  }

  /** Soft delete: the rule stays for history but no longer applies. */
  async deactivate(id: string): Promise<Result<Rule, RuleStoreError | ConcurrencyConflictError>> {
    const current = await this.repository.findById(id);
    if (!current) return err(new RuleStoreError('rule_not_found', id, `Rule not found: ${id}`));
    if (!current.is_active) return ok(current);
    return this.update(id, { is_active: false }, current.version);
  }

  /**
   * Rule texts to offer a client: its most recent rules, then starter
   * phrasings it has not used yet.
   */
  async suggestForClient(client: string): Promise<string[]> {
    const rules = await this.repository.findForClient(client);
    const recent = rules
      .filter((rule) => rule.client_context === client)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime())
      .slice(0, 3)
      .map((rule) => rule.source_text);

    const seen = new Set(recent.map((text) => text.toLowerCase()));
    const starters = STARTER_SUGGESTIONS.filter((text) => !seen.has(text.toLowerCase()));
    return [...recent, ...starters].slice(0, MAX_SUGGESTIONS);
  }
}
