export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConcurrencyConflictError extends Error {
  constructor(
    public readonly entityId: string,
    public readonly expectedVersion: number,
    public readonly actualVersion: number,
  ) {
    super(
      `Concurrency conflict on entity ${entityId}: expected version ${expectedVersion}, actual ${actualVersion}`,
    );
    this.name = 'ConcurrencyConflictError';
  }
}

export class EntityNotFoundError extends Error {
  constructor(
    public readonly entityType: string,
    public readonly entityId: string,
  ) {
    super(`Entity not found: ${entityType}/${entityId}`);
    this.name = 'EntityNotFoundError';
  }
}

/**
 * Raised by storage when a record write violates a database constraint.
 */
export class RecordConstraintError extends Error {
  constructor(
    public readonly lotId: string,
    public readonly constraint: string,
    message: string,
  ) {
    super(message);
    this.name = 'RecordConstraintError';
  }
}

export type CompileErrorCode =
  | 'ambiguous'
  | 'unknown_field'
  | 'invalid_rule'
  | 'service_unavailable'
  | 'malformed_response';

export class CompileError extends Error {
  constructor(
    public readonly code: CompileErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
  ) {
    super(message);
    this.name = 'CompileError';
  }

  static ambiguous(text: string): CompileError {
    return new CompileError(
      'ambiguous',
      `Could not resolve a field, condition and action from: "${text.slice(0, 120)}"`,
      { text },
    );
  }

  static unknownField(field: string): CompileError {
    return new CompileError('unknown_field', `Unknown field: ${field}`, { field });
  }
}

export type PreviewErrorCode = 'duplicate_lot_id' | 'batch_not_found';

export class PreviewError extends Error {
  constructor(
    public readonly code: PreviewErrorCode,
    message: string,
    public readonly lotIds: string[] = [],
  ) {
    super(message);
    this.name = 'PreviewError';
  }
}

export type ApplyErrorCode =
  | 'batch_not_found'
  | 'batch_mismatch'
  | 'invalid_change_set'
  | 'preview_required'
  | 'approval_required'
  | 'nothing_to_apply';

export class ApplyError extends Error {
  constructor(
    public readonly code: ApplyErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'ApplyError';
  }
}

export type RollbackErrorCode =
  | 'operation_not_found'
  | 'not_rollbackable'
  | 'already_rolled_back'
  | 'restore_blocked';

export class RollbackError extends Error {
  constructor(
    public readonly code: RollbackErrorCode,
    public readonly operationId: string,
    message: string,
    public readonly blockingLotIds: string[] = [],
  ) {
    super(message);
    this.name = 'RollbackError';
  }
}

export type RuleStoreErrorCode = 'rule_not_found' | 'invalid_rule';

export class RuleStoreError extends Error {
  constructor(
    public readonly code: RuleStoreErrorCode,
    public readonly ruleId: string | null,
    message: string,
  ) {
    super(message);
    this.name = 'RuleStoreError';
  }
}
