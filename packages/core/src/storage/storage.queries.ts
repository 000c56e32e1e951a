export const QUERIES = {
  INSERT_ACCOUNT: `
    INSERT INTO accounts (name, created_at)
    VALUES ($1, $2)
    RETURNING *
  `,

  GET_ACCOUNT: `
    SELECT * FROM accounts WHERE id = $1
  `,

  LOCK_ACCOUNT: `
    SELECT id FROM accounts WHERE id = $1 FOR NO KEY UPDATE
  `,

  INSERT_REVISION: `
    INSERT INTO revisions (
      account_id, entity_type, entity_id, entity_version,
      author, action, changes, recorded_at
    ) VALUES (
      $1, $2, $3, $4,
      $5, $6, $7, $8
    )
    RETURNING *
  `,
} as const;
