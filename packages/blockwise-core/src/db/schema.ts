// Append-only event ledger (source of truth)
export const EVENTS_SCHEMA = `
CREATE TABLE IF NOT EXISTS events (
    id               INTEGER PRIMARY KEY AUTOINCREMENT,
    event_id         TEXT NOT NULL UNIQUE,
    task_id          TEXT NOT NULL,
    type             TEXT NOT NULL,
    data             TEXT NOT NULL CHECK (json_valid(data)),
    author           TEXT,
    agent_id         TEXT,
    timestamp        TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
);

-- Append-only enforcement: prevent UPDATE on events
CREATE TRIGGER IF NOT EXISTS events_no_update
BEFORE UPDATE ON events
BEGIN
    SELECT RAISE(ABORT, 'Events table is append-only: cannot UPDATE');
END;

-- Append-only enforcement: prevent DELETE on events
CREATE TRIGGER IF NOT EXISTS events_no_delete
BEFORE DELETE ON events
BEGIN
    SELECT RAISE(ABORT, 'Events table is append-only: cannot DELETE');
END;

CREATE INDEX IF NOT EXISTS idx_events_task_id_id ON events(task_id, id);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(type);
`;

// Projections (rebuildable from events)
export const PROJECTIONS_SCHEMA = `
CREATE TABLE IF NOT EXISTS projection_state (
    name          TEXT PRIMARY KEY,
    last_event_id INTEGER NOT NULL DEFAULT 0,
    updated_at    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS tasks_current (
    task_id          TEXT PRIMARY KEY,
    title            TEXT NOT NULL,
    description      TEXT,
    project          TEXT,
    priority         TEXT NOT NULL DEFAULT 'normal' CHECK (priority IN ('critical','high','normal','low','background')),
    tags             TEXT NOT NULL DEFAULT '[]' CHECK (json_valid(tags)),
    status           TEXT NOT NULL CHECK (status IN ('active','paused','blocked','completed','cancelled')),
    terminal_at      TEXT,
    created_at       TEXT NOT NULL,
    updated_at       TEXT NOT NULL,
    created_event_id INTEGER NOT NULL,
    last_event_id    INTEGER NOT NULL
);

-- Blocker edges; position is the row id of the event that added the edge
CREATE TABLE IF NOT EXISTS task_blockers (
    task_id     TEXT NOT NULL,
    blocker_id  TEXT NOT NULL,
    position    INTEGER NOT NULL,
    PRIMARY KEY (task_id, blocker_id)
);

CREATE INDEX IF NOT EXISTS idx_tasks_current_status ON tasks_current(status, created_event_id);
CREATE INDEX IF NOT EXISTS idx_tasks_current_project ON tasks_current(project, status);
CREATE INDEX IF NOT EXISTS idx_task_blockers_task ON task_blockers(task_id, position);
CREATE INDEX IF NOT EXISTS idx_task_blockers_blocker ON task_blockers(blocker_id);
`;

export const PRAGMAS = `
PRAGMA journal_mode=WAL;
PRAGMA synchronous=NORMAL;
PRAGMA foreign_keys=ON;
PRAGMA busy_timeout=5000;
`;
