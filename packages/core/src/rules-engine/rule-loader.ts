import { readFileSync, readdirSync } from 'fs';
import { join, extname } from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ValidationError } from '../shared/errors.js';
import { validateRuleDefinition } from './rule-validator.js';
import type { CompiledRule } from './types.js';

export interface SeedRule extends CompiledRule {
  is_permanent: boolean;
}

const seedEntrySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(''),
  source_text: z.string().optional(),
  client_context: z.string().nullable().default(null),
  priority: z.number().int().nullable().default(null),
  confidence: z.number().min(0).max(1).default(1),
  is_permanent: z.boolean().default(true),
  definition: z.unknown(),
});

const ruleFileSchema = z.object({ rules: z.array(seedEntrySchema) });

/**
 * Load seed rules from a single YAML or JSON file.
 */
export function loadRulesFromFile(filePath: string): SeedRule[] {
  const content = readFileSync(filePath, 'utf-8');
  const ext = extname(filePath).toLowerCase();

  let raw: unknown;
  if (ext === '.yaml' || ext === '.yml') {
    raw = yaml.load(content);
  } else if (ext === '.json') {
    raw = JSON.parse(content);
  } else {
    throw new Error(`Unsupported rule file format: ${ext} (expected .yaml, .yml, or .json)`);
  }

  const parsed = ruleFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid rule file ${filePath}: expected { rules: [...] }`, undefined, {
      issues: parsed.error.issues.map((issue) => issue.message),
    });
  }

  return parsed.data.rules.map((entry, index) => {
    const definition = validateRuleDefinition(entry.definition);
    if (!definition.ok) {
      throw new ValidationError(`Invalid rule "${entry.name}" in ${filePath}`, `rules.${index}.definition`, {
        issues: definition.error,
      });
    }
    return {
      name: entry.name,
      description: entry.description,
      source_text: entry.source_text ?? entry.description,
      definition: definition.value,
      confidence: entry.confidence,
      compiled_by: 'manual',
      client_context: entry.client_context,
      priority: entry.priority,
      is_permanent: entry.is_permanent,
    };
  });
}

/**
 * Load and merge rules from all YAML/JSON files in a directory.
 */
export function loadRulesFromDirectory(dirPath: string): SeedRule[] {
  const files = readdirSync(dirPath).filter((f) => {
    const ext = extname(f).toLowerCase();
    return ext === '.yaml' || ext === '.yml' || ext === '.json';
  });

  const allRules: SeedRule[] = [];
  for (const file of files.sort()) {
    const rules = loadRulesFromFile(join(dirPath, file));
    allRules.push(...rules);
  }

  return allRules;
}
