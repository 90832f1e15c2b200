export const RULE_QUERIES = {
  INSERT: `
    INSERT INTO rules (
      id, name, description, source_text, definition,
      confidence, compiled_by, client_context, priority,
      is_permanent, is_active, usage_count, success_rate, last_used,
      created_at, updated_at, version
    ) VALUES (
      $1, $2, $3, $4, $5,
      $6, $7, $8, $9,
      $10, $11, $12, $13, $14,
      $15, $16, $17
    )
    RETURNING *
  `,

  GET_BY_ID: `
    SELECT * FROM rules WHERE id = $1
  `,

  FIND_FOR_CLIENT: `
    SELECT * FROM rules
    WHERE is_active
      AND (client_context IS NULL OR client_context = $1)
    ORDER BY usage_count DESC, created_at, id
  `,

  LIST_PERMANENT: `
    SELECT * FROM rules
    WHERE is_active AND is_permanent
    ORDER BY created_at, id
  `,

  UPDATE: `
    UPDATE rules SET
      name = $2, description = $3, definition = $4,
      compiled_by = $5, priority = $6,
      is_permanent = $7, is_active = $8,
      updated_at = $9, version = $10
    WHERE id = $1 AND version = $11
    RETURNING *
  `,

  RECORD_USAGE: `
    UPDATE rules SET
      success_rate = success_rate + ($2::double precision - success_rate) / (usage_count + 1),
      usage_count = usage_count + 1,
      last_used = $3,
      updated_at = $3
    WHERE id = $1
    RETURNING *
  `,
} as const;
