import { describe, test, expect } from "vitest";
import { runTools, selectTools } from "./tools";
import { parseToolsConf } from "#/tools-conf";
import { createTestInstallEnv } from "#/test-utils/install-env";

describe("tool runner", () => {
  describe("selectTools", () => {
    test("selects the whole catalogue by default", () => {
      const env = createTestInstallEnv();

      expect(selectTools(env)).toHaveLength(14);
    });

    test("uses settings.tools in catalogue order", () => {
      const env = createTestInstallEnv({ settings: { tools: ["tmux", "bat"] } });

      expect(selectTools(env)).toEqual(["bat", "tmux"]);
    });

    test("lets --only win over settings and reports unknown names", () => {
      const env = createTestInstallEnv({ settings: { tools: ["tmux"] } });

      expect(selectTools(env, ["zoxide", "emacs"])).toEqual(["zoxide"]);
      expect(env.ctx.logger.at("warn")).toEqual(["Unknown tool: emacs"]);
    });
  });

  test("continues after a failing tool", async () => {
    const env = createTestInstallEnv();
    const conf = parseToolsConf("bat-extras=stable\nfiglet=none\n");

    const results = await runTools(env, conf, { only: ["figlet", "bat-extras"] });

    expect(results).toEqual([
      { name: "bat-extras", status: "failed", error: "bat must be installed first" },
      { name: "figlet", status: "skipped" },
    ]);
  });
});
