import { describe, test, expect } from "vitest";
import {
  splitFields,
  parseToolsConf,
  getToolConfig,
  hasFlag,
  formatToolConfig,
  serializeToolsConf,
  defaultToolsConf,
  loadToolsConf,
} from "./tools-conf";
import { createMockFileSystem, createTestContext } from "#/test-utils/mocks";

const SAMPLE = [
  "# tools",
  "bat=stable",
  "neovim=head, config",
  'delta = Stable , post="git config --global core.pager \\"delta --dark\\""',
  "tmux=managed",
  "figlet=none",
  "broken line",
  "bad name=stable",
  "zoxide=nightly",
  "yazi=",
  "bat=head",
].join("\n");

describe("tools-conf", () => {
  describe("splitFields", () => {
    test("splits on commas and trims", () => {
      expect(splitFields("head, config ,x")).toEqual(["head", "config", "x"]);
    });

    test("keeps commas inside quotes", () => {
      expect(splitFields('stable, post="a, b"')).toEqual(["stable", 'post="a, b"']);
    });
  });

  describe("parseToolsConf", () => {
    const conf = parseToolsConf(SAMPLE);

    test("reads version types", () => {
      expect(getToolConfig(conf, "bat").versionType).toBe("stable");
      expect(getToolConfig(conf, "neovim").versionType).toBe("head");
      expect(getToolConfig(conf, "tmux").versionType).toBe("managed");
      expect(getToolConfig(conf, "figlet").versionType).toBe("none");
    });

    test("normalizes case and whitespace of the version type", () => {
      expect(getToolConfig(conf, "delta").versionType).toBe("stable");
    });

    test("collects flags", () => {
      const neovim = getToolConfig(conf, "neovim");

      expect(neovim.flags).toEqual(["config"]);
      expect(hasFlag(neovim, "config")).toBe(true);
      expect(hasFlag(getToolConfig(conf, "bat"), "config")).toBe(false);
    });

    test("unquotes post commands", () => {
      const delta = getToolConfig(conf, "delta");

      expect(delta.postCommand).toBe('git config --global core.pager "delta --dark"');
      expect(delta.flags).toEqual([]);
    });

    test("keeps the first of duplicate entries", () => {
      expect(conf.entries.get("bat")?.line).toBe(2);
    });

    test("falls back to stable for unknown or missing version types", () => {
      expect(getToolConfig(conf, "zoxide").versionType).toBe("stable");
      expect(getToolConfig(conf, "yazi").versionType).toBe("stable");
    });

    test("reports every problem with its line number", () => {
      expect(conf.warnings).toEqual([
        'Line 7: expected <tool>=<version type>, ignoring "broken line"',
        'Line 8: invalid tool name "bad name", ignoring',
        'Line 9: unknown version type "nightly" for zoxide, using stable',
        "Line 10: missing version type for yazi, using stable",
        "Line 11: duplicate entry for bat, keeping the first one",
      ]);
    });

    test("lists only valid entries", () => {
      expect([...conf.entries.keys()]).toEqual(["bat", "neovim", "delta", "tmux", "figlet", "zoxide", "yazi"]);
    });
  });

  describe("getToolConfig", () => {
    test("defaults unlisted tools to stable", () => {
      expect(getToolConfig(parseToolsConf(""), "fzf")).toEqual({ name: "fzf", versionType: "stable", flags: [] });
    });
  });

  describe("serialization", () => {
    test("formats flags and escapes post commands", () => {
      const text = formatToolConfig({
        name: "delta",
        versionType: "head",
        flags: ["config"],
        postCommand: 'echo "hi"',
      });

      expect(text).toBe('delta=head, config, post="echo \\"hi\\""');
    });

    test("writes what it reads", () => {
      const conf = parseToolsConf(SAMPLE);
      const reparsed = parseToolsConf(serializeToolsConf(conf.entries.values()));

      expect(reparsed.warnings).toEqual([]);
      expect(getToolConfig(reparsed, "delta").postCommand).toBe('git config --global core.pager "delta --dark"');
      expect(getToolConfig(reparsed, "neovim").flags).toEqual(["config"]);
    });

    test("default template lists every tool on stable", () => {
      const text = defaultToolsConf(["bat", "fzf"]);

      expect(text.startsWith("# dotstrap tools configuration\n")).toBe(true);
      expect(text.endsWith("\n\nbat=stable\nfzf=stable\n")).toBe(true);
      expect(parseToolsConf(text).warnings).toEqual([]);
    });
  });

  describe("loadToolsConf", () => {
    test("treats a missing file as empty", () => {
      const ctx = createTestContext();

      const conf = loadToolsConf(ctx, "/opt/local/etc/dev/tools.conf");

      expect(conf.entries.size).toBe(0);
      expect(ctx.logger.at("warn")).toEqual([]);
    });

    test("logs parse warnings with the file name", () => {
      const ctx = createTestContext({
        fs: createMockFileSystem({ "/opt/local/etc/dev/tools.conf": "bat=latest\n" }),
      });

      const conf = loadToolsConf(ctx, "/opt/local/etc/dev/tools.conf");

      expect(getToolConfig(conf, "bat").versionType).toBe("stable");
      expect(ctx.logger.at("warn")).toEqual([
        '/opt/local/etc/dev/tools.conf: Line 1: unknown version type "latest" for bat, using stable',
      ]);
    });
  });
});
