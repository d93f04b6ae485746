import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { applyOverrides, DEFAULT_CONFIG, parseConfig, readConfig } from "../../config/app-config";
import { resolveConfigPath } from "../../config/paths";

describe("parseConfig", () => {
  it("fills defaults for an empty document", () => {
    expect(parseConfig("", "/tmp/c.yaml")._unsafeUnwrap()).toEqual(DEFAULT_CONFIG);
    expect(DEFAULT_CONFIG.logLimit).toBe(1000);
    expect(DEFAULT_CONFIG.tailIntervalMs).toBe(2000);
  });

  it("reads overrides", () => {
    const config = parseConfig("scope: user\ncategory: timer\nlogLimit: 200\n")._unsafeUnwrap();
    expect(config.scope).toBe("user");
    expect(config.category).toBe("timer");
    expect(config.logLimit).toBe(200);
    expect(config.systemctl).toBe("systemctl");
  });

  it("reports each invalid field by path", () => {
    const error = parseConfig("logLimit: -5", "/tmp/c.yaml")._unsafeUnwrapErr();
    expect(error).toEqual({ path: "/tmp/c.yaml", message: "logLimit: Number must be greater than 0" });
  });

  it("rejects a document that is not a mapping", () => {
    expect(parseConfig("- a", "/tmp/c.yaml")._unsafeUnwrapErr().message).toBe(
      "(root): Expected object, received array",
    );
  });

  it("rejects broken YAML", () => {
    expect(parseConfig("scope: [", "/tmp/c.yaml").isErr()).toBe(true);
  });
});

describe("readConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "sysdeck-config-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("uses defaults when the file is missing", async () => {
    const result = await readConfig(path.join(dir, "missing.yaml"));
    expect(result._unsafeUnwrap()).toEqual(DEFAULT_CONFIG);
  });

  it("parses an existing file", async () => {
    const file = path.join(dir, "config.yaml");
    await fs.writeFile(file, "journalctl: /usr/local/bin/journalctl\n");
    const result = await readConfig(file);
    expect(result._unsafeUnwrap().journalctl).toBe("/usr/local/bin/journalctl");
  });
});

describe("applyOverrides", () => {
  it("lets the command line win", () => {
    expect(applyOverrides(DEFAULT_CONFIG, { user: true, category: "socket" })).toMatchObject({
      scope: "user",
      category: "socket",
    });
  });

  it("keeps the file's scope when --user is absent", () => {
    const fromFile = { ...DEFAULT_CONFIG, scope: "user" as const };
    expect(applyOverrides(fromFile, {}).scope).toBe("user");
  });
});

describe("resolveConfigPath", () => {
  it("prefers the explicit variable", () => {
    expect(resolveConfigPath({ SYSDECK_CONFIG: "/etc/sysdeck.yaml", XDG_CONFIG_HOME: "/x" })).toBe(
      "/etc/sysdeck.yaml",
    );
  });

  it("uses the XDG config directory", () => {
    expect(resolveConfigPath({ XDG_CONFIG_HOME: "/home/test/.cfg" })).toBe("/home/test/.cfg/sysdeck/config.yaml");
  });
});
