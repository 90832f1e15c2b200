export const LEDGER_QUERIES = {
  INSERT_SNAPSHOT: `
    INSERT INTO batch_snapshots (snapshot_id, batch_id, operation_id, records, created_at)
    VALUES ($1, $2, $3, $4, $5)
  `,

  GET_SNAPSHOT: `
    SELECT * FROM batch_snapshots WHERE snapshot_id = $1
  `,

  INSERT_OPERATION: `
    INSERT INTO operation_logs (
      operation_id, batch_id, kind, status, rule_ids, counts,
      client_context, actor_type, actor_id, actor_name,
      snapshot_id, target_operation_id, rolled_back_by, created_at
    ) VALUES (
      $1, $2, $3, $4, $5, $6,
      $7, $8, $9, $10,
      $11, $12, $13, $14
    )
  `,

  GET_OPERATION: `
    SELECT * FROM operation_logs WHERE operation_id = $1
  `,

  LOCK_OPERATION: `
    SELECT * FROM operation_logs WHERE operation_id = $1 FOR UPDATE
  `,

  LIST_OPERATIONS: `
    SELECT * FROM operation_logs
    WHERE ($1::text IS NULL OR batch_id = $1)
      AND ($2::text IS NULL OR kind = $2)
    ORDER BY seq DESC
    LIMIT $3
  `,

  INSERT_CHANGE_ENTRIES: `
    INSERT INTO change_entries (
      change_key, operation_id, batch_id, lot_id, position, field, action,
      original_value, new_value, rule_id, confidence, reason,
      risk_level, status, failure_reason
    )
    SELECT
      e.change_key, e.operation_id, e.batch_id, e.lot_id, e.position, e.field, e.action,
      e.original_value, e.new_value, e.rule_id, e.confidence, e.reason,
      e.risk_level, e.status, e.failure_reason
    FROM jsonb_to_recordset($1::jsonb) AS e(
      change_key TEXT, operation_id TEXT, batch_id TEXT, lot_id TEXT, position INTEGER,
      field TEXT, action TEXT, original_value JSONB, new_value JSONB, rule_id TEXT,
      confidence DOUBLE PRECISION, reason TEXT, risk_level TEXT, status TEXT, failure_reason TEXT
    )
  `,

  LIST_CHANGE_ENTRIES: `
    SELECT * FROM change_entries
    WHERE ($1::text IS NULL OR batch_id = $1)
      AND ($2::text IS NULL OR operation_id = $2)
      AND ($3::text IS NULL OR status = $3)
    ORDER BY position, seq
  `,

  SET_CHANGE_STATUS: `
    UPDATE change_entries SET status = $3
    WHERE operation_id = $1 AND status = $2
  `,

  MARK_ROLLED_BACK: `
    UPDATE operation_logs SET status = 'rolled_back', rolled_back_by = $2
    WHERE operation_id = $1
  `,
} as const;
