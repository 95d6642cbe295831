/**
 * CLI App - Commander.js setup for the maintenance commands
 */

import { Command } from "commander";

import { loadConfig } from "../config.js";
import { associate, links, type AssociateOptions, type LinksOptions } from "./commands/memory/associate.js";
import { purge, watch, type WatchOptions } from "./commands/memory/purge.js";
import { recall, type RecallOptions } from "./commands/memory/recall.js";
import { remember, type RememberOptions } from "./commands/memory/remember.js";
import { shortTerm, type ShortTermOptions } from "./commands/memory/short.js";
import { sessionsList, type SessionsListOptions } from "./commands/sessions/list.js";
import { sessionsArchive, sessionsClose } from "./commands/sessions/status.js";
import { sessionsView, type SessionsViewOptions } from "./commands/sessions/view.js";
import { formatError, withErrorHandling } from "./error-handler.js";

export type GlobalOptions = {
  config?: string;
  json?: boolean;
  quiet?: boolean;
};

function globals(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>();
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name("convo")
    .description("Inspect and maintain conversation sessions and memories")
    .version("0.1.0")
    .option("-c, --config <path>", "Path to convo.config.json")
    .option("--json", "Output in JSON format")
    .option("--quiet", "Suppress non-essential output");

  // ============================================================================
  // Session Commands
  // ============================================================================

  const sessions = program.command("sessions").description("Session management");

  sessions
    .command("list")
    .description("List a user's sessions, newest first")
    .requiredOption("-u, --user <id>", "User id")
    .option("-s, --status <status>", "Only sessions with this status")
    .option("-l, --limit <n>", "Maximum number of sessions")
    .action(
      withErrorHandling(async (options: SessionsListOptions & { user: string }, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await sessionsList(cfg, options.user, { ...options, ...opts });
      }),
    );

  sessions
    .command("view <sessionId>")
    .description("Show a session and its recent turns")
    .option("-l, --limit <n>", "Number of turns to show")
    .action(
      withErrorHandling(async (sessionId: string, options: SessionsViewOptions, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await sessionsView(cfg, sessionId, { ...options, ...opts });
      }),
    );

  sessions
    .command("close <sessionId>")
    .description("Mark a session completed and clear its short-term memories")
    .action(
      withErrorHandling(async (sessionId: string, _options: unknown, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await sessionsClose(cfg, sessionId, opts);
      }),
    );

  sessions
    .command("archive <sessionId>")
    .description("Archive a session")
    .action(
      withErrorHandling(async (sessionId: string, _options: unknown, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await sessionsArchive(cfg, sessionId, opts);
      }),
    );

  // ============================================================================
  // Memory Commands
  // ============================================================================

  const memory = program.command("memory").description("Memory management");

  memory
    .command("remember <userId> <key> <value>")
    .description("Store a long-term memory (value parsed as JSON when possible)")
    .option("-t, --type <type>", "fact, preference, skill or other")
    .option("-i, --importance <n>", "Importance within [0, 1]")
    .option("-s, --session <id>", "Session the memory came from")
    .option("--ttl-hours <n>", "Expire after this many hours")
    .action(
      withErrorHandling(
        async (userId: string, key: string, value: string, options: RememberOptions, cmd: Command) => {
          const opts = globals(cmd);
          const cfg = await loadConfig(opts.config);
          await remember(cfg, userId, key, value, { ...options, ...opts });
        },
      ),
    );

  memory
    .command("recall")
    .description("Show a user's most important long-term memories")
    .requiredOption("-u, --user <id>", "User id")
    .option("-n, --top <n>", "Number of memories")
    .option("-k, --key <key>", "Only this key")
    .option("-t, --type <type>", "Only this memory type")
    .option("--min-importance <n>", "Importance floor")
    .action(
      withErrorHandling(async (options: RecallOptions & { user: string }, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await recall(cfg, options.user, { ...options, ...opts });
      }),
    );

  memory
    .command("short <sessionId>")
    .description("Show live short-term memories of a session")
    .option("-n, --top <n>", "Number of memories")
    .option("-k, --key <key>", "Only this key")
    .option("-t, --type <type>", "Only this memory type")
    .action(
      withErrorHandling(async (sessionId: string, options: ShortTermOptions, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await shortTerm(cfg, sessionId, { ...options, ...opts });
      }),
    );

  memory
    .command("associate <memoryId1> <memoryId2>")
    .description("Link two memories")
    .option("-t, --type <type>", "Association type", "related")
    .option("-s, --strength <n>", "Strength within [0, 1]")
    .action(
      withErrorHandling(async (memoryId1: string, memoryId2: string, options: AssociateOptions, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await associate(cfg, memoryId1, memoryId2, { ...options, ...opts });
      }),
    );

  memory
    .command("links <memoryId>")
    .description("Show memories associated with a memory")
    .option("-t, --type <type>", "Only this association type")
    .option("--min-strength <n>", "Strength floor")
    .action(
      withErrorHandling(async (memoryId: string, options: LinksOptions, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await links(cfg, memoryId, { ...options, ...opts });
      }),
    );

  memory
    .command("purge")
    .description("Delete expired short-term memories now")
    .action(
      withErrorHandling(async (_options: unknown, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await purge(cfg, opts);
      }),
    );

  memory
    .command("watch")
    .description("Purge expired short-term memories on a cron schedule")
    .option("--schedule <cron>", "Override memory.purgeSchedule")
    .action(
      withErrorHandling(async (options: WatchOptions, cmd: Command) => {
        const opts = globals(cmd);
        const cfg = await loadConfig(opts.config);
        await watch(cfg, { ...options, quiet: opts.quiet });
      }),
    );

  return program;
}

/**
 * Run the CLI
 */
export async function runCli(args: string[] = process.argv): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(args);
  } catch (err) {
    console.error(formatError(err));
    process.exitCode = 1;
  }
}
