export { runCli, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from './run.js';
export type { CliDeps } from './run.js';
export { parseArgs, USAGE } from './parse-args.js';
export type { CliCommand, ParseResult } from './parse-args.js';
