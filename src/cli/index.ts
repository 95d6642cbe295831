/**
 * CLI Module - Exports for the CLI layer
 */

export { createProgram, runCli, type GlobalOptions } from "./cli-app.js";
export { OutputFormatter, type OutputLevel, type TableColumn } from "./output-formatter.js";
export { formatError, parseNumberArg, withErrorHandling } from "./error-handler.js";
export { withRuntime } from "./open-runtime.js";

export { sessionsList } from "./commands/sessions/list.js";
export { sessionsView } from "./commands/sessions/view.js";
export { sessionsArchive, sessionsClose } from "./commands/sessions/status.js";

export { associate, links } from "./commands/memory/associate.js";
export { purge, resolveWatchScheduler, watch } from "./commands/memory/purge.js";
export { recall } from "./commands/memory/recall.js";
export { remember } from "./commands/memory/remember.js";
export { shortTerm } from "./commands/memory/short.js";
