// Shared
export { generateId, ok, err, SYSTEM_ACTOR } from './shared/types.js';
export type { Result, FieldValue, LotRecord, Actor } from './shared/types.js';
export {
  ValidationError,
  ConcurrencyConflictError,
  EntityNotFoundError,
  RecordConstraintError,
  CompileError,
  PreviewError,
  ApplyError,
  RollbackError,
  RuleStoreError,
} from './shared/errors.js';
export type {
  CompileErrorCode,
  PreviewErrorCode,
  ApplyErrorCode,
  RollbackErrorCode,
  RuleStoreErrorCode,
} from './shared/errors.js';
export { createPool, runMigrations, withTransaction } from './shared/database.js';
export type { DatabaseConfig } from './shared/database.js';
export { createLogger } from './shared/logger.js';
export type { Logger } from './shared/logger.js';

// Observability
export { getTracer, startSpan, endSpan, withSpan, SpanStatusCode } from './observability/index.js';

// Rules Engine
export * from './rules-engine/index.js';

// Rule Compiler
export * from './rule-compiler/index.js';

// Rule Store
export * from './rule-store/index.js';

// Change Ledger
export * from './change-ledger/index.js';

// Storage
export * from './storage/index.js';
