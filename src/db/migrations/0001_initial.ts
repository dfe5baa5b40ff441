import type { Migration } from "../../types/database";

export const migration: Migration = {
  version: 1,
  name: "initial",
  description: "Transactions, files, operations, validation results and backups",
  up: `
CREATE TABLE transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    transaction_id TEXT UNIQUE NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL,
    user_id TEXT NOT NULL,
    status TEXT NOT NULL,
    project_path TEXT NOT NULL,
    description TEXT,
    backup_id TEXT
);

CREATE INDEX idx_transactions_project ON transactions(project_path, id DESC);
CREATE INDEX idx_transactions_user ON transactions(user_id, id DESC);

CREATE TABLE files (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_id TEXT UNIQUE NOT NULL,
    transaction_id TEXT NOT NULL REFERENCES transactions(transaction_id),
    original_name TEXT NOT NULL,
    source_path TEXT NOT NULL,
    destination_path TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'PENDING',
    validation_status TEXT,
    checksum TEXT
);

CREATE INDEX idx_files_transaction ON files(transaction_id, id);

CREATE TABLE operations (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    operation_id TEXT UNIQUE NOT NULL,
    transaction_id TEXT NOT NULL REFERENCES transactions(transaction_id),
    file_id TEXT REFERENCES files(file_id),
    operation_type TEXT NOT NULL,
    source_path TEXT,
    destination_path TEXT,
    created_at TEXT NOT NULL,
    status TEXT NOT NULL,
    error_message TEXT
);

CREATE INDEX idx_operations_transaction ON operations(transaction_id, id);
CREATE INDEX idx_operations_file ON operations(file_id, operation_type, status);

CREATE TABLE validation_results (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_id TEXT NOT NULL REFERENCES files(file_id),
    severity TEXT NOT NULL,
    rule TEXT NOT NULL,
    line INTEGER NOT NULL DEFAULT 0,
    message TEXT NOT NULL,
    created_at TEXT NOT NULL
);

CREATE INDEX idx_validation_results_file ON validation_results(file_id);

CREATE TABLE backups (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    backup_id TEXT UNIQUE NOT NULL,
    created_at TEXT NOT NULL,
    project_path TEXT NOT NULL,
    storage_path TEXT NOT NULL,
    backup_type TEXT NOT NULL,
    size_bytes INTEGER NOT NULL,
    file_count INTEGER NOT NULL,
    user_id TEXT NOT NULL,
    verified INTEGER NOT NULL DEFAULT 0,
    checksum TEXT NOT NULL,
    compressed INTEGER NOT NULL DEFAULT 0,
    description TEXT
);

CREATE INDEX idx_backups_project ON backups(project_path, id DESC);

CREATE TABLE schema_version (
    version INTEGER PRIMARY KEY,
    applied_at TEXT DEFAULT (datetime('now'))
);
`,
};
