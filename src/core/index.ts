/**
 * Core module
 *
 * Engine interfaces, their Node.js implementations, logging, privilege
 * handling and archive safety.
 */

export * from "./interfaces";
export * from "./errors";
export * from "./logger";
export * from "./privileges";
export * from "./commands";
export * from "./archive-utils";
export {
  createNodeContext,
  createNodeFileSystem,
  createNodeHttpClient,
  createNodeShellExecutor,
  createNodeSystemProbe,
  type NodeContextOptions,
} from "./node";
