export const RECORD_QUERIES = {
  INSERT_BATCH: `
    INSERT INTO batches (id, client_context, source_name, record_count, created_at)
    VALUES ($1, $2, $3, $4, $5)
  `,

  INSERT_RECORDS: `
    INSERT INTO lot_records (batch_id, lot_id, position, data)
    SELECT $1::text, r.lot_id, r.position, r.data
    FROM jsonb_to_recordset($2::jsonb) AS r(lot_id TEXT, position INTEGER, data JSONB)
  `,

  GET_BATCH: `
    SELECT * FROM batches WHERE id = $1
  `,

  LIST_RECORDS: `
    SELECT * FROM lot_records WHERE batch_id = $1 ORDER BY position
  `,

  LOCK_RECORDS: `
    SELECT * FROM lot_records
    WHERE batch_id = $1 AND lot_id = ANY($2)
    ORDER BY position
    FOR UPDATE
  `,

  GET_VERSION: `
    SELECT version FROM lot_records WHERE batch_id = $1 AND lot_id = $2
  `,

  WRITE_RECORD: `
    UPDATE lot_records SET
      data = $3, status = $4, issues = $5,
      version = version + 1, updated_at = NOW()
    WHERE batch_id = $1 AND lot_id = $2 AND version = $6
    RETURNING *
  `,
} as const;
