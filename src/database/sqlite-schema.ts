/**
 * SQLite schema for the items table
 *
 * Reservation columns are non-null exactly while state = 'RESERVED'; the CHECK
 * keeps a DONE row from carrying a stale token.
 */
export const SQLITE_SCHEMA = `
  CREATE TABLE IF NOT EXISTS items (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL UNIQUE,
    state TEXT NOT NULL DEFAULT 'PENDING' CHECK (state IN ('PENDING', 'RESERVED', 'DONE')),
    labels_json TEXT,
    skipped INTEGER NOT NULL DEFAULT 0,
    reservation_token TEXT,
    reservation_expires_at INTEGER,
    updated_at INTEGER NOT NULL,
    CHECK (
      (state = 'RESERVED') = (reservation_token IS NOT NULL AND reservation_expires_at IS NOT NULL)
    )
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_items_reservation_token
    ON items (reservation_token)
    WHERE reservation_token IS NOT NULL;

  CREATE INDEX IF NOT EXISTS idx_items_state_id ON items (state, id);
`;
