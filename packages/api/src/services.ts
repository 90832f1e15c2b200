import {
  ChangeLedger,
  RuleCompiler,
  RuleStore,
  createLogger,
  type CleaningStorage,
  type LlmClient,
  type Logger,
  type RuleOrdering,
  type SeedRule,
} from '@dataherd/core';
import { BatchProcessor, CleaningPipeline } from '@dataherd/cleaning';

export interface CleaningServices {
  storage: CleaningStorage;
  ruleStore: RuleStore;
  compiler: RuleCompiler;
  processor: BatchProcessor;
  pipeline: CleaningPipeline;
  ledger: ChangeLedger;
}

export interface ServiceOptions {
  llm?: LlmClient | null;
  ordering?: RuleOrdering;
  logger?: Logger;
}

export function createServices(storage: CleaningStorage, options: ServiceOptions = {}): CleaningServices {
  const ruleStore = new RuleStore(storage.rules, options.logger);
  const ledger = new ChangeLedger(storage, options.logger);
  const compiler = new RuleCompiler({ llm: options.llm ?? null, rules: ruleStore, logger: options.logger });
  const processor = new BatchProcessor({ storage, ruleStore, ledger, ordering: options.ordering, logger: options.logger });
  const pipeline = new CleaningPipeline({ compiler, processor, logger: options.logger });
  return { storage, ruleStore, compiler, processor, pipeline, ledger };
}

/**
 * Store seed rules whose name is not yet taken by a permanent rule of the
 * same client. Returns the number stored.
 */
export async function seedRules(ruleStore: RuleStore, seeds: SeedRule[], logger: Logger = createLogger('seed')): Promise<number> {
  const existing = await ruleStore.listPermanent();
  const taken = new Set(existing.map((rule) => `${rule.client_context ?? ''}\u0000${rule.name}`));

  let stored = 0;
  for (const seed of seeds) {
    const key = `${seed.client_context ?? ''}\u0000${seed.name}`;
    if (taken.has(key)) continue;
    const { is_permanent, ...compiled } = seed;
    await ruleStore.save(compiled, seed.client_context, is_permanent);
    taken.add(key);
    stored++;
  }
  logger.info({ seeds: seeds.length, stored }, 'Seed rules loaded');
  return stored;
}
