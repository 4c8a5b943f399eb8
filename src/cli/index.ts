/**
 * CLI module
 */

export { runCli } from "./run";
export { defaultIO, type IO } from "./io";
export { openSession, parseList, type CliDeps, type GlobalArgs, type Session } from "./session";
