import { describe, expect, it } from "vitest";
import { parseCliArgs } from "../../config/cli-args";

describe("parseCliArgs", () => {
  it("defaults to no overrides", () => {
    expect(parseCliArgs([])._unsafeUnwrap()).toEqual({ overrides: {}, showVersion: false });
  });

  it("reads flags in both value forms", () => {
    expect(parseCliArgs(["--user", "--type", "timer", "--config=/tmp/s.yaml"])._unsafeUnwrap()).toEqual({
      overrides: { user: true, category: "timer" },
      configPath: "/tmp/s.yaml",
      showVersion: false,
    });
    expect(parseCliArgs(["--type=socket"])._unsafeUnwrap().overrides.category).toBe("socket");
  });

  it("recognises the version flag", () => {
    expect(parseCliArgs(["-v"])._unsafeUnwrap().showVersion).toBe(true);
  });

  it("rejects unknown categories and arguments", () => {
    expect(parseCliArgs(["--type", "device"])._unsafeUnwrapErr()).toBe("Invalid --type: device");
    expect(parseCliArgs(["--type"])._unsafeUnwrapErr()).toBe("Invalid --type: (missing)");
    expect(parseCliArgs(["--config"])._unsafeUnwrapErr()).toBe("--config needs a path");
    expect(parseCliArgs(["--verbose"])._unsafeUnwrapErr()).toBe("Unknown argument: --verbose");
  });
});
