/** Bumped whenever the stored analysis shape changes; older rows are dropped. */
export const SCHEMA_VERSION = '1';

export const SCHEMA_DDL = `
CREATE TABLE IF NOT EXISTS commit_analyses (
  commit_id TEXT PRIMARY KEY,
  analysis TEXT NOT NULL,
  created_at TEXT DEFAULT (datetime('now'))
);

CREATE TABLE IF NOT EXISTS metadata (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);
`;
