import { describe, test, expect } from "vitest";
import { SettingsSchema } from "#/schemas";
import { safeParseYaml, formatFriendlyError } from "./friendly-errors";

describe("friendly-errors", () => {
  describe("safeParseYaml", () => {
    test("returns parsed data for valid documents", () => {
      const result = safeParseYaml("prefix: /usr/local\njobs: 2\n", SettingsSchema, "settings.yaml");

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data.prefix).toBe("/usr/local");
        expect(result.data.jobs).toBe(2);
      }
    });

    test("accepts an empty document", () => {
      const result = safeParseYaml("", SettingsSchema);

      expect(result).toEqual({ success: true, data: { tools: [] } });
    });

    test("reports YAML syntax errors with file context", () => {
      const result = safeParseYaml("prefix: [unclosed\n", SettingsSchema, "settings.yaml");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.message).toBe("Invalid YAML syntax in settings.yaml");
        expect(result.error.details).toHaveLength(1);
      }
    });

    test("reports schema violations with their path", () => {
      const result = safeParseYaml("jobs: -1\n", SettingsSchema, "settings.yaml");

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("validation");
        expect(result.error.message).toBe("Invalid configuration in settings.yaml");
        expect(result.error.details?.[0]).toMatch(/^jobs: /);
      }
    });
  });

  describe("formatFriendlyError", () => {
    test("indents details under the message", () => {
      const text = formatFriendlyError({
        type: "validation",
        message: "Invalid configuration in settings.yaml",
        details: ["jobs: Number must be greater than 0"],
      });

      expect(text).toBe("Invalid configuration in settings.yaml\n  jobs: Number must be greater than 0");
    });

    test("prints the message alone without details", () => {
      expect(formatFriendlyError({ type: "io", message: "Cannot read settings.yaml" })).toBe(
        "Cannot read settings.yaml"
      );
    });
  });
});
