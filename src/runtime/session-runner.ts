/**
 * Session Runner - per-request context assembly around one model call
 *
 * Stages: resolve-session -> gather-context -> build-prompt -> invoke ->
 * persist -> done. A failure anywhere moves to "failed" and the original
 * error reaches the caller. Nothing is persisted unless the model answered.
 */

import { errorMessage, InvalidTransitionError, ValidationError } from "../errors.js";
import type { Logger } from "../log.js";
import type { MemoryStore } from "../memory/memory-store.js";
import type {
  LongTermMemory,
  LongTermMemoryType,
  ShortTermMemory,
  ShortTermMemoryType,
} from "../memory/types.js";
import type { SessionStore } from "../session/session-store.js";
import type { ConversationTurn, Session } from "../session/types.js";
import type { JsonValue, Metadata } from "../storage/payload.js";
import { closeSessionAndClearMemories } from "./close-session.js";
import { invokeModel, type ModelInvoker } from "./invoke.js";
import { buildPrompt, type AdditionalContext } from "./prompt-builder.js";

/**
 * How much context is injected per request. Fixed so the prompt size stays
 * predictable.
 */
export const CONTEXT_LIMITS = {
  historyTurns: 10,
  shortTermMemories: 3,
  longTermMemories: 5,
} as const;

export type RunStage =
  | "resolve-session"
  | "gather-context"
  | "build-prompt"
  | "invoke"
  | "persist"
  | "done"
  | "failed";

export interface RunRequest {
  prompt: string;
  sessionId?: string;
  userId?: string;
  additionalContext?: AdditionalContext;
  signal?: AbortSignal;
}

export interface SessionMetadata {
  sessionId: string;
  /** Number of the assistant turn that holds the response */
  turnNumber: number;
}

export interface RunResult {
  responseText: string;
  /** Absent for session-less calls */
  sessionMetadata?: SessionMetadata;
  memoriesUsed: {
    shortTerm: number;
    longTerm: number;
  };
}

export type StageListener = (stage: RunStage, info: { sessionId: string | null }) => void;

export type SessionRunnerParams = {
  sessions: SessionStore;
  memories: MemoryStore;
  invoker: ModelInvoker;
  logger: Logger;
  /** Agent name recorded on sessions this runner creates */
  agentName: string;
  invokeTimeoutMs: number;
  /** TTL of the per-turn interaction memory; store default when omitted */
  interactionTtlHours?: number;
  onStage?: StageListener;
};

type GatheredContext = {
  history: ConversationTurn[];
  shortTerm: ShortTermMemory[];
  longTerm: LongTermMemory[];
};

const EMPTY_CONTEXT: GatheredContext = { history: [], shortTerm: [], longTerm: [] };

export class SessionRunner {
  private readonly sessions: SessionStore;
  private readonly memories: MemoryStore;
  private readonly invoker: ModelInvoker;
  private readonly logger: Logger;
  private readonly agentName: string;
  private readonly invokeTimeoutMs: number;
  private readonly interactionTtlHours?: number;
  private readonly onStage?: StageListener;
  private readonly persistQueue = new Map<string, Promise<unknown>>();

  constructor(params: SessionRunnerParams) {
    this.sessions = params.sessions;
    this.memories = params.memories;
    this.invoker = params.invoker;
    this.logger = params.logger.child({ component: "session-runner" });
    this.agentName = params.agentName;
    this.invokeTimeoutMs = params.invokeTimeoutMs;
    this.interactionTtlHours = params.interactionTtlHours;
    this.onStage = params.onStage;
  }

  async run(request: RunRequest): Promise<RunResult> {
    if (typeof request.prompt !== "string" || !request.prompt.trim()) {
      throw new ValidationError("prompt is required");
    }

    const state: { stage: RunStage; sessionId: string | null } = {
      stage: "resolve-session",
      sessionId: request.sessionId ?? null,
    };
    const enter = (stage: RunStage) => {
      state.stage = stage;
      this.logger.debug({ stage, sessionId: state.sessionId }, "Run stage");
      this.onStage?.(stage, { sessionId: state.sessionId });
    };

    try {
      enter("resolve-session");
      const session = await this.resolveSession(request);
      state.sessionId = session?.sessionId ?? null;
      const userId = session ? (session.userId ?? request.userId ?? null) : null;

      enter("gather-context");
      const context = session ? await this.gatherContext(session.sessionId, userId) : EMPTY_CONTEXT;

      enter("build-prompt");
      const prompt = buildPrompt({
        history: [...context.history].reverse(),
        longTerm: context.longTerm,
        shortTerm: context.shortTerm,
        additionalContext: request.additionalContext,
        prompt: request.prompt,
      });

      enter("invoke");
      const responseText = await invokeModel(this.invoker, prompt, {
        timeoutMs: this.invokeTimeoutMs,
        signal: request.signal,
      });

      const memoriesUsed = { shortTerm: context.shortTerm.length, longTerm: context.longTerm.length };
      if (!session) {
        enter("done");
        return { responseText, memoriesUsed };
      }

      enter("persist");
      const turnNumber = await this.persist(session.sessionId, request, responseText);

      enter("done");
      this.logger.info({ sessionId: session.sessionId, turn: turnNumber }, "Run complete");
      return {
        responseText,
        sessionMetadata: { sessionId: session.sessionId, turnNumber },
        memoriesUsed,
      };
    } catch (err) {
      this.logger.warn(
        { stage: state.stage, sessionId: state.sessionId, error: errorMessage(err) },
        "Run failed",
      );
      state.stage = "failed";
      this.onStage?.("failed", { sessionId: state.sessionId });
      throw err;
    }
  }

  /**
   * Store a long-term memory for the session's user.
   */
  async rememberLongTerm(
    sessionId: string,
    input: {
      key: string;
      value: JsonValue;
      memoryType?: LongTermMemoryType;
      importance?: number;
      ttlMs?: number;
      metadata?: Metadata;
    },
  ): Promise<string> {
    const session = await this.sessions.getSession(sessionId);
    if (!session.userId) {
      throw new ValidationError("Long-term memories need a session with a user", { sessionId });
    }
    return this.memories.storeLongTermMemory({ ...input, userId: session.userId, sessionId });
  }

  /**
   * Store a short-term memory bound to the session.
   */
  async rememberShortTerm(
    sessionId: string,
    input: {
      key: string;
      value: JsonValue;
      memoryType?: ShortTermMemoryType;
      ttlHours?: number | null;
      metadata?: Metadata;
    },
  ): Promise<string> {
    await this.sessions.getSession(sessionId);
    return this.memories.storeShortTermMemory({ ...input, sessionId });
  }

  /**
   * Complete the session and drop its short-term memories.
   */
  async closeSession(sessionId: string): Promise<Session> {
    const { session } = await closeSessionAndClearMemories(
      { sessions: this.sessions, memories: this.memories, logger: this.logger },
      sessionId,
    );
    return session;
  }

  private async resolveSession(request: RunRequest): Promise<Session | null> {
    if (request.sessionId) {
      const session = await this.sessions.getSession(request.sessionId);
      if (session.status !== "active") {
        throw new InvalidTransitionError(
          session.status,
          "active",
          `Session ${session.sessionId} is ${session.status} and cannot take new turns`,
        );
      }
      if (request.userId && session.userId && request.userId !== session.userId) {
        throw new ValidationError("Session belongs to a different user", {
          sessionId: session.sessionId,
        });
      }
      return session;
    }

    if (request.userId) {
      return this.sessions.createSession({ userId: request.userId, agentName: this.agentName });
    }

    // Neither id given: stateless call.
    return null;
  }

  private async gatherContext(sessionId: string, userId: string | null): Promise<GatheredContext> {
    const [history, shortTerm, longTerm] = await Promise.all([
      this.sessions.getHistory(sessionId, { limit: CONTEXT_LIMITS.historyTurns }),
      this.memories.retrieveShortTermMemories(sessionId, { topN: CONTEXT_LIMITS.shortTermMemories }),
      userId
        ? this.memories.retrieveLongTermMemories(userId, { topK: CONTEXT_LIMITS.longTermMemories })
        : Promise.resolve([]),
    ]);
    return { history, shortTerm, longTerm };
  }

  /**
   * Append the user/assistant pair, then record the interaction. Pairs on the
   * same session are written one at a time so they stay adjacent.
   */
  private async persist(sessionId: string, request: RunRequest, responseText: string): Promise<number> {
    const previous: Promise<unknown> = this.persistQueue.get(sessionId) ?? Promise.resolve();
    const next = previous
      .catch(() => {
        // Surfaced to the run that owned it.
        return undefined;
      })
      .then(() => this.appendPair(sessionId, request, responseText));
    this.persistQueue.set(sessionId, next);

    const { userTurn, assistantTurn } = await next.finally(() => {
      if (this.persistQueue.get(sessionId) === next) {
        this.persistQueue.delete(sessionId);
      }
    });

    try {
      await this.memories.storeShortTermMemory({
        sessionId,
        key: `turn_${userTurn.turnNumber}`,
        value: {
          userPrompt: request.prompt,
          assistantResponse: responseText,
          turnNumber: userTurn.turnNumber,
        },
        memoryType: "event",
        ttlHours: this.interactionTtlHours,
      });
    } catch (err) {
      // Turn history is authoritative; the interaction memory is best-effort.
      this.logger.warn({ sessionId, error: errorMessage(err) }, "Failed to record interaction memory");
    }

    return assistantTurn.turnNumber;
  }

  private async appendPair(
    sessionId: string,
    request: RunRequest,
    responseText: string,
  ): Promise<{ userTurn: ConversationTurn; assistantTurn: ConversationTurn }> {
    const userTurn = await this.sessions.appendTurn(sessionId, {
      role: "user",
      content: request.prompt,
      metadata: request.additionalContext === undefined ? {} : { context: request.additionalContext },
    });
    // If this one fails the user turn stays behind unanswered; no compensating delete.
    const assistantTurn = await this.sessions.appendTurn(sessionId, {
      role: "assistant",
      content: responseText,
    });
    return { userTurn, assistantTurn };
  }
}
