import { describe, test, expect } from "vitest";
import { rustToolchain } from "./rust";
import { createTestInstallEnv } from "#/test-utils/install-env";
import {
  binaryResponse,
  createMockFileSystem,
  createMockHttpClient,
  createMockShellExecutor,
  createTestContext,
} from "#/test-utils/mocks";

const RUST_DIR = "/opt/local/share/dev/toolchains/rust";
const CARGO_BIN = `${RUST_DIR}/cargo/bin`;

const RUST_ENV = {
  RUSTUP_HOME: `${RUST_DIR}/rustup`,
  CARGO_HOME: `${RUST_DIR}/cargo`,
  PATH: "/opt/local/bin:/usr/local/bin:/usr/bin:/bin",
};

describe("rust toolchain", () => {
  test("bootstraps rustup into the toolchain directory", async () => {
    const fs = createMockFileSystem();
    const shell = createMockShellExecutor({
      sh: () => {
        for (const name of ["cargo", "rustc", "rustup"]) {
          fs.writeFile(`${CARGO_BIN}/${name}`, "", 0o755);
        }
        return "";
      },
      [`${CARGO_BIN}/rustc --version`]: "rustc 1.77.0 (aedd173a2 2024-03-17)\n",
    });
    const http = createMockHttpClient(new Map([["https://sh.rustup.rs", binaryResponse(Buffer.from("#!/bin/sh"))]]));
    const env = createTestInstallEnv({ ctx: createTestContext({ fs, http, shell }) });

    const result = await rustToolchain.install(env, {});

    expect(result).toEqual({ name: "rust", state: "installed", version: "1.77.0" });
    const installer = shell.calls.find((call) => call.command === "sh");
    expect(installer?.args).toEqual(["/tmp/dotstrap-rustup-1/rustup-init.sh", "-y", "--no-modify-path"]);
    expect(installer?.options?.env).toEqual(RUST_ENV);
    expect(shell.commands).toContain(`ln -sf ${CARGO_BIN}/rustup /opt/local/bin/rustup`);
    expect(shell.commands).toContain(`chown -R root:staff ${RUST_DIR}`);
  });

  test("runs rustup update when already installed", async () => {
    let probes = 0;
    const fs = createMockFileSystem({}, { executables: [`${CARGO_BIN}/rustup`, `${CARGO_BIN}/rustc`] });
    const shell = createMockShellExecutor({
      [`${CARGO_BIN}/rustc --version`]: () => (++probes === 1 ? "rustc 1.77.0 (a 2024-03-17)" : "rustc 1.78.0 (b 2024-05-02)"),
    });
    const env = createTestInstallEnv({ ctx: createTestContext({ fs, shell }) });

    const result = await rustToolchain.install(env, {});

    expect(result).toEqual({ name: "rust", state: "updated", version: "1.78.0" });
    const update = shell.calls.find((call) => call.command === `${CARGO_BIN}/rustup`);
    expect(update?.args).toEqual(["update"]);
    expect(update?.options?.env).toEqual(RUST_ENV);
  });

  test("passes rustup's environment through sudo", async () => {
    const fs = createMockFileSystem({}, { executables: [`${CARGO_BIN}/rustup`, `${CARGO_BIN}/rustc`] });
    const env = createTestInstallEnv({ ctx: createTestContext({ fs }), mode: "sudo" });

    await rustToolchain.install(env, {});

    expect(env.ctx.shell.commands).toContain(
      `sudo -n env RUSTUP_HOME=${RUST_DIR}/rustup CARGO_HOME=${RUST_DIR}/cargo PATH=${RUST_ENV.PATH} ${CARGO_BIN}/rustup update`
    );
  });

  test("reports an update failure", async () => {
    const fs = createMockFileSystem({}, { executables: [`${CARGO_BIN}/rustup`] });
    const shell = createMockShellExecutor({ [`${CARGO_BIN}/rustup update`]: new Error("network unreachable") });
    const env = createTestInstallEnv({ ctx: createTestContext({ fs, shell }) });

    const result = await rustToolchain.install(env, {});

    expect(result).toEqual({ name: "rust", state: "failed", version: null, error: "network unreachable" });
    expect(env.ctx.logger.at("warn")).toEqual(["rustup update failed: network unreachable"]);
  });
});
