export const SCHEMA_VERSION = 2;

// Timestamps are ISO 8601 strings written by the application, so range
// queries compare them lexically.
export const CREATE_TABLES_SQL = `
  -- 1. run_log
  CREATE TABLE IF NOT EXISTS run_log (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_type TEXT NOT NULL,
    started_at TEXT NOT NULL,
    finished_at TEXT,
    status TEXT NOT NULL DEFAULT 'running',
    items_found INTEGER DEFAULT 0,
    items_new INTEGER DEFAULT 0,
    items_duplicate INTEGER DEFAULT 0,
    errors TEXT,
    dry_run INTEGER DEFAULT 0
  );

  -- 2. work_items
  CREATE TABLE IF NOT EXISTS work_items (
    id TEXT PRIMARY KEY,
    title TEXT NOT NULL,
    company TEXT NOT NULL,
    url TEXT NOT NULL,
    description TEXT NOT NULL DEFAULT '',
    priority_key TEXT NOT NULL,
    status TEXT NOT NULL CHECK (status IN (
      'QUEUED', 'IN_ARCHIVE', 'ACCEPTED', 'REJECTED', 'SKIPPED',
      'DELIVERED', 'USER_ACCEPTED', 'USER_REJECTED'
    )),
    created_at TEXT NOT NULL,
    last_transition_at TEXT NOT NULL,
    delivered_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_work_items_status_transition
    ON work_items(status, last_transition_at DESC);
  CREATE INDEX IF NOT EXISTS idx_work_items_priority ON work_items(priority_key);
  CREATE INDEX IF NOT EXISTS idx_work_items_created ON work_items(created_at DESC);

  -- 3. classification_results (one per item)
  CREATE TABLE IF NOT EXISTS classification_results (
    item_id TEXT PRIMARY KEY,
    accepted INTEGER NOT NULL,
    score REAL NOT NULL CHECK (score >= 0 AND score <= 1),
    rationale TEXT NOT NULL DEFAULT '',
    tags TEXT NOT NULL DEFAULT '[]',
    model_used TEXT NOT NULL DEFAULT '',
    classified_at TEXT NOT NULL,
    enrichment_status TEXT NOT NULL DEFAULT 'NOT_ATTEMPTED',
    enrichment_attempts INTEGER NOT NULL DEFAULT 0,
    enrichment_last_attempt_at TEXT,
    artifact TEXT,
    FOREIGN KEY (item_id) REFERENCES work_items(id) ON DELETE CASCADE
  );

  -- 4. notifications
  CREATE TABLE IF NOT EXISTS notifications (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    bot_type TEXT NOT NULL,
    message_type TEXT NOT NULL,
    item_id TEXT,
    message_text TEXT NOT NULL,
    telegram_message_id TEXT,
    sent_at TEXT NOT NULL,
    success INTEGER NOT NULL,
    error_message TEXT,
    FOREIGN KEY (item_id) REFERENCES work_items(id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_notifications_item ON notifications(item_id);
`;
