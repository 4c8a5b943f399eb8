/**
 * dotstrap entry point
 */

import { fileURLToPath } from "url";
import { hideBin } from "yargs/helpers";
import { createNodeContext } from "#/core";
import { defaultIO } from "./io";
import { runCli } from "./run";

process.exitCode = await runCli({
  argv: hideBin(process.argv),
  io: defaultIO(),
  createContext: (logLevel) => createNodeContext({ logLevel }),
  nodeVersion: process.versions.node,
  selfPath: fileURLToPath(new URL("../../bin/dotstrap", import.meta.url)),
});
