/**
 * Session Store - durable sessions, users and ordered conversation turns
 *
 * Turn numbers are assigned inside an immediate transaction, and appends to
 * the same session are additionally chained in-process so that callers see
 * them complete in call order.
 */

import crypto from "node:crypto";

import { InvalidTransitionError, NotFoundError, ValidationError } from "../errors.js";
import type { Logger } from "../log.js";
import { ensureColumns, openDatabase, type SqliteDatabase } from "../storage/database.js";
import { decodeMetadata, encodeMetadata, type Metadata } from "../storage/payload.js";
import { DEFAULT_CONFLICT_RETRIES, withConflictRetry } from "../storage/retry.js";
import { systemClock, type Clock } from "../utils/clock.js";
import { canTransition, isSessionStatus } from "./state-machine.js";
import type {
  ConversationTurn,
  HistoryOptions,
  ListSessionsOptions,
  NewSessionInput,
  NewTurnInput,
  Session,
  SessionStatus,
  TurnRole,
  User,
} from "./types.js";

type SessionRow = {
  session_id: string;
  user_id: string | null;
  agent_name: string;
  created_at: number;
  updated_at: number;
  status: string;
  metadata: string | null;
};

type TurnRow = {
  session_id: string;
  turn_number: number;
  role: string;
  content: string;
  timestamp: number;
  metadata: string | null;
};

type UserRow = {
  user_id: string;
  created_at: number;
  metadata: string | null;
};

const SESSION_COLUMNS = "session_id, user_id, agent_name, created_at, updated_at, status, metadata";
const TURN_COLUMNS = "session_id, turn_number, role, content, timestamp, metadata";

export type SessionStoreParams = {
  dbPath: string;
  logger: Logger;
  clock?: Clock;
  busyTimeoutMs?: number;
  /** Retries of a lost turn-number race before it surfaces */
  conflictRetries?: number;
};

export class SessionStore {
  private readonly db: SqliteDatabase;
  private readonly logger: Logger;
  private readonly now: Clock;
  private readonly conflictRetries: number;
  private readonly appendQueue = new Map<string, Promise<ConversationTurn>>();

  constructor(params: SessionStoreParams) {
    this.logger = params.logger.child({ component: "session-store" });
    this.now = params.clock ?? systemClock;
    this.conflictRetries = params.conflictRetries ?? DEFAULT_CONFLICT_RETRIES;
    this.db = openDatabase({
      path: params.dbPath,
      busyTimeoutMs: params.busyTimeoutMs,
      logger: this.logger,
    });
    this.ensureSchema();
  }

  private ensureSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        user_id TEXT PRIMARY KEY,
        created_at INTEGER NOT NULL,
        metadata TEXT
      );

      CREATE TABLE IF NOT EXISTS sessions (
        session_id TEXT PRIMARY KEY,
        user_id TEXT,
        agent_name TEXT NOT NULL,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL,
        status TEXT NOT NULL DEFAULT 'active',
        metadata TEXT,
        FOREIGN KEY (user_id) REFERENCES users(user_id)
      );

      -- Append-only turn log, one contiguous sequence per session
      CREATE TABLE IF NOT EXISTS conversation_turns (
        session_id TEXT NOT NULL,
        turn_number INTEGER NOT NULL,
        role TEXT NOT NULL,
        content TEXT NOT NULL,
        timestamp INTEGER NOT NULL,
        metadata TEXT,
        PRIMARY KEY (session_id, turn_number),
        FOREIGN KEY (session_id) REFERENCES sessions(session_id)
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_user_id ON sessions(user_id);
      CREATE INDEX IF NOT EXISTS idx_sessions_status ON sessions(status);
      CREATE INDEX IF NOT EXISTS idx_turns_timestamp ON conversation_turns(timestamp);
    `);

    // Databases from before metadata bags existed
    ensureColumns(this.db, "users", { metadata: "TEXT" });
    ensureColumns(this.db, "sessions", { metadata: "TEXT" });
    ensureColumns(this.db, "conversation_turns", { metadata: "TEXT" });
  }

  async createSession(input: NewSessionInput): Promise<Session> {
    const agentName = typeof input.agentName === "string" ? input.agentName.trim() : "";
    if (!agentName) {
      throw new ValidationError("agentName is required");
    }
    const userId = input.userId?.trim() || null;

    const now = this.now();
    const session: Session = {
      sessionId: crypto.randomUUID(),
      userId,
      agentName,
      createdAt: now,
      updatedAt: now,
      status: "active",
      metadata: { ...(input.metadata ?? {}) },
    };

    const insert = this.db.transaction(() => {
      if (userId) {
        this.db
          .prepare("INSERT OR IGNORE INTO users (user_id, created_at, metadata) VALUES (?, ?, ?)")
          .run(userId, now, encodeMetadata(undefined));
      }
      this.db
        .prepare(
          `INSERT INTO sessions (${SESSION_COLUMNS})
           VALUES (?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          session.sessionId,
          session.userId,
          session.agentName,
          session.createdAt,
          session.updatedAt,
          session.status,
          encodeMetadata(session.metadata),
        );
    });
    insert.immediate();

    this.logger.info({ sessionId: session.sessionId, userId, agentName }, "Session created");
    return session;
  }

  async getSession(sessionId: string): Promise<Session> {
    return this.requireSession(sessionId);
  }

  async getUser(userId: string): Promise<User> {
    const row = this.db
      .prepare<[string], UserRow>("SELECT user_id, created_at, metadata FROM users WHERE user_id = ?")
      .get(userId);
    if (!row) throw new NotFoundError("user", userId);
    return {
      userId: row.user_id,
      createdAt: row.created_at,
      metadata: decodeMetadata(row.metadata),
    };
  }

  /**
   * Append a turn, assigning the next turn number for the session.
   */
  async appendTurn(sessionId: string, input: NewTurnInput): Promise<ConversationTurn> {
    if (input.role !== "user" && input.role !== "assistant") {
      throw new ValidationError(`Unknown turn role: ${String(input.role)}`);
    }
    if (typeof input.content !== "string") {
      throw new ValidationError("Turn content must be a string");
    }

    const previous: Promise<unknown> = this.appendQueue.get(sessionId) ?? Promise.resolve();
    const next = previous
      .catch(() => {
        // A failed append is reported to its own caller; it must not block the chain.
        return undefined;
      })
      .then(() =>
        withConflictRetry(() => this.insertTurn(sessionId, input), {
          retries: this.conflictRetries,
          label: "appendTurn",
          logger: this.logger,
        }),
      );
    this.appendQueue.set(sessionId, next);

    try {
      return await next;
    } finally {
      if (this.appendQueue.get(sessionId) === next) {
        this.appendQueue.delete(sessionId);
      }
    }
  }

  private insertTurn(sessionId: string, input: NewTurnInput): ConversationTurn {
    const append = this.db.transaction((): ConversationTurn => {
      const session = this.findSession(sessionId);
      if (!session) throw new NotFoundError("session", sessionId);

      const { next } = this.db
        .prepare<[string], { next: number }>(
          "SELECT COALESCE(MAX(turn_number), 0) + 1 AS next FROM conversation_turns WHERE session_id = ?",
        )
        .get(sessionId) ?? { next: 1 };

      const turn: ConversationTurn = {
        sessionId,
        turnNumber: next,
        role: input.role,
        content: input.content,
        timestamp: this.now(),
        metadata: { ...(input.metadata ?? {}) },
      };

      this.db
        .prepare(`INSERT INTO conversation_turns (${TURN_COLUMNS}) VALUES (?, ?, ?, ?, ?, ?)`)
        .run(
          turn.sessionId,
          turn.turnNumber,
          turn.role,
          turn.content,
          turn.timestamp,
          encodeMetadata(turn.metadata),
        );
      this.touch(sessionId, turn.timestamp);
      return turn;
    });

    const turn = append.immediate();
    this.logger.debug({ sessionId, turn: turn.turnNumber, role: turn.role }, "Turn appended");
    return turn;
  }

  /**
   * Most recent turns first, at most `limit` of them.
   */
  async getHistory(sessionId: string, options: HistoryOptions): Promise<ConversationTurn[]> {
    assertPositiveInt(options.limit, "limit");

    const rows =
      options.beforeTurn === undefined
        ? this.db
            .prepare<[string, number], TurnRow>(
              `SELECT ${TURN_COLUMNS} FROM conversation_turns
               WHERE session_id = ?
               ORDER BY turn_number DESC
               LIMIT ?`,
            )
            .all(sessionId, options.limit)
        : this.db
            .prepare<[string, number, number], TurnRow>(
              `SELECT ${TURN_COLUMNS} FROM conversation_turns
               WHERE session_id = ? AND turn_number < ?
               ORDER BY turn_number DESC
               LIMIT ?`,
            )
            .all(sessionId, options.beforeTurn, options.limit);

    return rows.map(toTurn);
  }

  async listSessionsForUser(userId: string, options: ListSessionsOptions = {}): Promise<Session[]> {
    if (options.limit !== undefined) assertPositiveInt(options.limit, "limit");

    const clauses = ["user_id = ?"];
    const params: Array<string | number> = [userId];
    if (options.status) {
      clauses.push("status = ?");
      params.push(options.status);
    }
    let sql = `SELECT ${SESSION_COLUMNS} FROM sessions WHERE ${clauses.join(" AND ")} ORDER BY created_at DESC, rowid DESC`;
    if (options.limit !== undefined) {
      sql += " LIMIT ?";
      params.push(options.limit);
    }

    return this.db
      .prepare<Array<string | number>, SessionRow>(sql)
      .all(...params)
      .map(toSession);
  }

  /**
   * Move a session forward in active -> completed -> archived.
   */
  async setStatus(sessionId: string, status: SessionStatus): Promise<Session> {
    if (!isSessionStatus(status)) {
      throw new ValidationError(`Unknown session status: ${String(status)}`);
    }

    const update = this.db.transaction((): Session => {
      const session = this.requireSession(sessionId);
      if (!canTransition(session.status, status)) {
        throw new InvalidTransitionError(session.status, status);
      }
      if (session.status === status) return session;

      const updatedAt = this.touch(sessionId, this.now());
      this.db.prepare("UPDATE sessions SET status = ? WHERE session_id = ?").run(status, sessionId);
      return { ...session, status, updatedAt };
    });

    const updated = update.immediate();
    this.logger.info({ sessionId, status: updated.status }, "Session status updated");
    return updated;
  }

  async closeSession(sessionId: string): Promise<Session> {
    return this.setStatus(sessionId, "completed");
  }

  /**
   * Replace the session's metadata bag.
   */
  async updateMetadata(sessionId: string, metadata: Metadata): Promise<Session> {
    const update = this.db.transaction((): Session => {
      const session = this.requireSession(sessionId);
      const updatedAt = this.touch(sessionId, this.now());
      this.db
        .prepare("UPDATE sessions SET metadata = ? WHERE session_id = ?")
        .run(encodeMetadata(metadata), sessionId);
      return { ...session, metadata: { ...metadata }, updatedAt };
    });
    return update.immediate();
  }

  close(): void {
    this.db.close();
  }

  private findSession(sessionId: string): Session | undefined {
    const row = this.db
      .prepare<[string], SessionRow>(`SELECT ${SESSION_COLUMNS} FROM sessions WHERE session_id = ?`)
      .get(sessionId);
    return row ? toSession(row) : undefined;
  }

  private requireSession(sessionId: string): Session {
    const session = this.findSession(sessionId);
    if (!session) throw new NotFoundError("session", sessionId);
    return session;
  }

  /** Bump updated_at without ever moving it backwards. */
  private touch(sessionId: string, at: number): number {
    this.db
      .prepare("UPDATE sessions SET updated_at = MAX(updated_at, ?) WHERE session_id = ?")
      .run(at, sessionId);
    const row = this.db
      .prepare<[string], { updated_at: number }>("SELECT updated_at FROM sessions WHERE session_id = ?")
      .get(sessionId);
    return row?.updated_at ?? at;
  }
}

function toSession(row: SessionRow): Session {
  if (!isSessionStatus(row.status)) {
    throw new Error(`Corrupt session row ${row.session_id}: unknown status ${row.status}`);
  }
  return {
    sessionId: row.session_id,
    userId: row.user_id,
    agentName: row.agent_name,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    status: row.status,
    metadata: decodeMetadata(row.metadata),
  };
}

function toTurn(row: TurnRow): ConversationTurn {
  return {
    sessionId: row.session_id,
    turnNumber: row.turn_number,
    role: toRole(row.role),
    content: row.content,
    timestamp: row.timestamp,
    metadata: decodeMetadata(row.metadata),
  };
}

function toRole(value: string): TurnRole {
  if (value === "user" || value === "assistant") return value;
  throw new Error(`Corrupt turn row: unknown role ${value}`);
}

function assertPositiveInt(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${name} must be a positive integer`, { [name]: value });
  }
}
