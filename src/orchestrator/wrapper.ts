/**
 * `<prefix>/bin/dependencies`: a shell script that re-runs the dependency
 * step through dotstrap.
 */

import { join } from "path";
import { errorMessage } from "#/core";
import { BINARY_MODE } from "#/constants";
import type { InstallEnv } from "#/environment";
import { writeManagedFile } from "#/layout";

export const WRAPPER_NAME = "dependencies";

function shellQuote(value: string): string {
  return `'${value.replaceAll("'", `'\\''`)}'`;
}

export function wrapperScript(selfPath: string): string {
  return ["#!/bin/sh", "# Installed by dotstrap", `exec ${shellQuote(selfPath)} dependencies "$@"`, ""].join("\n");
}

/**
 * Write the wrapper into the prefix bin directory. Returns its path.
 */
export function installWrapper(env: InstallEnv, selfPath: string): string {
  const dest = join(env.layout.bin, WRAPPER_NAME);
  try {
    writeManagedFile(env.ctx, env.privileged, dest, wrapperScript(selfPath), {
      mode: BINARY_MODE,
      group: env.platform.adminGroup,
    });
  } catch (err) {
    throw new Error(`Cannot install the ${WRAPPER_NAME} wrapper: ${errorMessage(err)}`);
  }
  env.ctx.logger.info(`Installed ${dest}`);
  return dest;
}
