import { createRequire } from 'module';
import type { Database, SqlJsStatic, SqlValue } from 'sql.js';
import { create_profile } from './profile.js';
import { parse_profile, parse_questions, parse_state } from './session.js';
import type { ConversationMessage, ConversationSession } from './types.js';

// sql.js is a CommonJS module; use createRequire to import it in ESM
const _require = createRequire(import.meta.url);
const init_sql_js: () => Promise<SqlJsStatic> = _require('sql.js');

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS sessions (
  session_id      TEXT    PRIMARY KEY,
  state           TEXT    NOT NULL DEFAULT 'greeting',
  locale          TEXT    NOT NULL,
  profile         TEXT    NOT NULL,
  questions       TEXT    NOT NULL DEFAULT '[]',
  question_cursor INTEGER NOT NULL DEFAULT 0,
  created_at      INTEGER NOT NULL,
  updated_at      INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS messages (
  id         INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT    NOT NULL REFERENCES sessions(session_id),
  role       TEXT    NOT NULL,
  content    TEXT    NOT NULL,
  timestamp  INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sessions_updated ON sessions(updated_at);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id);
`;

type Row = Record<string, SqlValue>;

function text_column(row: Row, key: string): string {
  const value = row[key];
  if (typeof value !== 'string') throw new Error(`Column ${key} is not text`);
  return value;
}

function number_column(row: Row, key: string): number {
  const value = row[key];
  if (typeof value !== 'number') throw new Error(`Column ${key} is not a number`);
  return value;
}

/**
 * Process-lifetime session storage on an in-memory SQLite database.
 * Each session is one row in `sessions`; its history lives in `messages`
 * ordered by insertion id.
 */
export class SessionStore {
  private constructor(private readonly db: Database) {}

  static async open(): Promise<SessionStore> {
    const SQL = await init_sql_js();
    const db = new SQL.Database();
    db.run(SCHEMA_SQL);
    return new SessionStore(db);
  }

  private query_all(sql: string, params: SqlValue[] = []): Row[] {
    const stmt = this.db.prepare(sql);
    try {
      stmt.bind(params);
      const rows: Row[] = [];
      while (stmt.step()) rows.push(stmt.getAsObject());
      return rows;
    } finally {
      stmt.free();
    }
  }

  private query_one(sql: string, params: SqlValue[] = []): Row | null {
    return this.query_all(sql, params)[0] ?? null;
  }

  private transaction<T>(work: () => T): T {
    this.db.run('BEGIN');
    try {
      const result = work();
      this.db.run('COMMIT');
      return result;
    } catch (err) {
      this.db.run('ROLLBACK');
      throw err;
    }
  }

  private write_row(session: ConversationSession): void {
    this.db.run(
      `INSERT INTO sessions (session_id, state, locale, profile, questions, question_cursor, created_at, updated_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)
       ON CONFLICT(session_id) DO UPDATE SET
         state = excluded.state,
         locale = excluded.locale,
         profile = excluded.profile,
         questions = excluded.questions,
         question_cursor = excluded.question_cursor,
         updated_at = excluded.updated_at`,
      [
        session.session_id,
        session.state,
        session.locale,
        JSON.stringify(session.profile),
        JSON.stringify(session.questions),
        session.question_cursor,
        session.created_at,
        session.updated_at,
      ],
    );
  }

  private append_messages(session_id: string, messages: readonly ConversationMessage[]): void {
    for (const message of messages) {
      this.db.run(
        'INSERT INTO messages (session_id, role, content, timestamp) VALUES (?, ?, ?, ?)',
        [session_id, message.role, message.content, message.timestamp],
      );
    }
  }

  private remove(session_id: string): boolean {
    this.db.run('DELETE FROM messages WHERE session_id = ?', [session_id]);
    this.db.run('DELETE FROM sessions WHERE session_id = ?', [session_id]);
    return this.db.getRowsModified() > 0;
  }

  /** Fresh session in `greeting`, replacing any session stored under the same id. */
  create(session_id: string, locale: string, now: number): ConversationSession {
    const session: ConversationSession = {
      session_id,
      state: 'greeting',
      locale,
      profile: create_profile(),
      messages: [],
      questions: [],
      question_cursor: 0,
      created_at: now,
      updated_at: now,
    };
    this.replace(session);
    return session;
  }

  get(session_id: string): ConversationSession | null {
    const row = this.query_one('SELECT * FROM sessions WHERE session_id = ?', [session_id]);
    if (!row) return null;

    const messages = this.query_all(
      'SELECT role, content, timestamp FROM messages WHERE session_id = ? ORDER BY id',
      [session_id],
    ).map((m): ConversationMessage => ({
      role: text_column(m, 'role') === 'user' ? 'user' : 'assistant',
      content: text_column(m, 'content'),
      timestamp: number_column(m, 'timestamp'),
    }));

    return {
      session_id,
      state: parse_state(text_column(row, 'state')),
      locale: text_column(row, 'locale'),
      profile: parse_profile(JSON.parse(text_column(row, 'profile'))),
      messages,
      questions: parse_questions(JSON.parse(text_column(row, 'questions'))),
      question_cursor: number_column(row, 'question_cursor'),
      created_at: number_column(row, 'created_at'),
      updated_at: number_column(row, 'updated_at'),
    };
  }

  has(session_id: string): boolean {
    return this.query_one('SELECT 1 AS found FROM sessions WHERE session_id = ?', [session_id]) !== null;
  }

  /** Persist the outcome of one turn: the session row plus the messages it added. */
  commit(session: ConversationSession, new_messages: readonly ConversationMessage[]): void {
    this.transaction(() => {
      this.write_row(session);
      this.append_messages(session.session_id, new_messages);
    });
  }

  /** Overwrite a session and its whole history. */
  replace(session: ConversationSession): void {
    this.transaction(() => {
      this.remove(session.session_id);
      this.write_row(session);
      this.append_messages(session.session_id, session.messages);
    });
  }

  delete(session_id: string): boolean {
    return this.transaction(() => this.remove(session_id));
  }

  find_idle(before: number): string[] {
    return this.query_all('SELECT session_id FROM sessions WHERE updated_at < ? ORDER BY updated_at', [before])
      .map(row => text_column(row, 'session_id'));
  }

  count(): number {
    const row = this.query_one('SELECT COUNT(*) AS total FROM sessions');
    return row ? number_column(row, 'total') : 0;
  }

  close(): void {
    this.db.close();
  }
}
