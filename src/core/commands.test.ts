import { describe, test, expect } from "vitest";
import { commandExists, which, whichAll } from "./commands";
import { createMockFileSystem, createMockSystem } from "#/test-utils/mocks";

describe("commands", () => {
  const system = createMockSystem();

  test("whichAll searches extra directories first and skips duplicates", () => {
    const fs = createMockFileSystem({}, { executables: ["/opt/local/bin/go", "/usr/bin/go"] });

    expect(whichAll(fs, system, "go", ["/opt/local/bin", "/usr/bin"])).toEqual(["/opt/local/bin/go", "/usr/bin/go"]);
  });

  test("which ignores files without an execute bit", () => {
    const fs = createMockFileSystem({ "/usr/bin/tar": "not executable" }, { executables: ["/bin/tar"] });

    expect(which(fs, system, "tar")).toBe("/bin/tar");
  });

  test("a name with a slash is checked as a path", () => {
    const fs = createMockFileSystem({}, { executables: ["/usr/bin/go"] });

    expect(which(fs, system, "/usr/bin/go")).toBe("/usr/bin/go");
    expect(which(fs, system, "./go")).toBeNull();
  });

  test("commandExists is false for an empty PATH", () => {
    const fs = createMockFileSystem({}, { executables: ["/usr/bin/git"] });

    expect(commandExists(fs, createMockSystem({ env: {} }), "git")).toBe(false);
    expect(commandExists(fs, system, "git")).toBe(true);
  });
});
