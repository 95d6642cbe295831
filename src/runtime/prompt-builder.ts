/**
 * Prompt Builder - merges history and memories into the text sent to the model
 *
 * Section order is fixed: history (oldest first), long-term memories,
 * short-term memories, caller context, then the request itself. The same
 * state always produces the same prompt.
 */

import type { LongTermMemory, ShortTermMemory } from "../memory/types.js";
import type { ConversationTurn } from "../session/types.js";

export type AdditionalContext = string | Record<string, unknown>;

export interface PromptInput {
  /** Oldest first */
  history: ConversationTurn[];
  /** Importance descending */
  longTerm: LongTermMemory[];
  /** Most recent first */
  shortTerm: ShortTermMemory[];
  additionalContext?: AdditionalContext;
  prompt: string;
}

export const SECTION_TITLES = {
  history: "## Previous Conversation",
  longTerm: "## Relevant Context",
  shortTerm: "## Recent Session Context",
  additional: "## Additional Context",
  request: "## Current Request",
} as const;

export function buildPrompt(input: PromptInput): string {
  const sections: string[] = [];

  if (input.history.length > 0) {
    sections.push(buildHistorySection(input.history));
  }

  if (input.longTerm.length > 0) {
    sections.push(
      buildListSection(
        SECTION_TITLES.longTerm,
        input.longTerm.map((memory) => formatEntry(memory.key, memory.value)),
      ),
    );
  }

  if (input.shortTerm.length > 0) {
    sections.push(
      buildListSection(
        SECTION_TITLES.shortTerm,
        input.shortTerm.map((memory) => formatEntry(memory.key, memory.value)),
      ),
    );
  }

  const additional = buildAdditionalSection(input.additionalContext);
  if (additional) {
    sections.push(additional);
  }

  sections.push(`${SECTION_TITLES.request}\n${input.prompt}`);

  return sections.join("\n\n");
}

function buildHistorySection(history: ConversationTurn[]): string {
  const lines = history.map((turn) => `${capitalize(turn.role)}: ${turn.content}`);
  return [SECTION_TITLES.history, ...lines].join("\n");
}

function buildListSection(title: string, entries: string[]): string {
  return [title, ...entries].join("\n");
}

function buildAdditionalSection(context: AdditionalContext | undefined): string | null {
  if (context === undefined) return null;

  if (typeof context === "string") {
    const trimmed = context.trim();
    return trimmed ? `${SECTION_TITLES.additional}\n${trimmed}` : null;
  }

  const entries = Object.entries(context);
  if (entries.length === 0) return null;
  return buildListSection(
    SECTION_TITLES.additional,
    entries.map(([key, value]) => formatEntry(key, value)),
  );
}

function formatEntry(key: string, value: unknown): string {
  return `- ${key}: ${renderValue(value)}`;
}

/**
 * Strings go in verbatim, everything else as compact JSON.
 */
export function renderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === undefined) return "";
  return JSON.stringify(value) ?? String(value);
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}
