import type { Metadata } from "../storage/payload.js";

export type SessionStatus = "active" | "completed" | "archived";

export type TurnRole = "user" | "assistant";

export interface User {
  userId: string;
  createdAt: number;
  metadata: Metadata;
}

export interface Session {
  sessionId: string;
  /** Null for anonymous sessions */
  userId: string | null;
  agentName: string;
  createdAt: number;
  updatedAt: number;
  status: SessionStatus;
  metadata: Metadata;
}

/**
 * One message in a session. Immutable once written.
 */
export interface ConversationTurn {
  sessionId: string;
  /** 1-based, contiguous within the session */
  turnNumber: number;
  role: TurnRole;
  content: string;
  timestamp: number;
  metadata: Metadata;
}

export type NewSessionInput = {
  userId?: string | null;
  agentName: string;
  metadata?: Metadata;
};

export type NewTurnInput = {
  role: TurnRole;
  content: string;
  metadata?: Metadata;
};

export type HistoryOptions = {
  limit: number;
  /** Only turns with a smaller number */
  beforeTurn?: number;
};

export type ListSessionsOptions = {
  status?: SessionStatus;
  limit?: number;
};
