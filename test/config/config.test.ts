import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { randomUUID } from "node:crypto";
import { loadConfig, resolveHomeDir, CONFIG_FILE, DEFAULT_CONFIG_YAML } from "../../src/config/index.js";

describe("resolveHomeDir", () => {
  it("defaults to .habits under the working directory", () => {
    expect(resolveHomeDir("/work", {})).toBe(join("/work", ".habits"));
  });

  it("honours HABITR_HOME relative to the working directory", () => {
    expect(resolveHomeDir("/work", { HABITR_HOME: "data" })).toBe(join("/work", "data"));
    expect(resolveHomeDir("/work", { HABITR_HOME: "/srv/habits" })).toBe("/srv/habits");
  });
});

describe("loadConfig", () => {
  let homeDir: string;

  beforeEach(async () => {
    homeDir = join(tmpdir(), `habitr-config-${randomUUID()}`);
    await mkdir(homeDir, { recursive: true });
  });

  afterEach(async () => {
    await rm(homeDir, { recursive: true, force: true });
  });

  it("uses defaults when config.yaml is missing", async () => {
    const { config, warnings } = await loadConfig(homeDir);

    expect(config.dataFile).toBe(join(homeDir, "habits.json"));
    expect(config.exportDir).toBe(join(homeDir, "exports"));
    expect(warnings).toEqual([]);
  });

  it("reads the default file written by init", async () => {
    await writeFile(join(homeDir, CONFIG_FILE), DEFAULT_CONFIG_YAML);
    const { config, warnings } = await loadConfig(homeDir);

    expect(config.dataFile).toBe(join(homeDir, "habits.json"));
    expect(warnings).toEqual([]);
  });

  it("resolves relative paths against the home directory", async () => {
    await writeFile(
      join(homeDir, CONFIG_FILE),
      "dataFile: db/store.json\nexport:\n  dir: /tmp/habit-exports\n"
    );
    const { config } = await loadConfig(homeDir);

    expect(config.dataFile).toBe(join(homeDir, "db/store.json"));
    expect(config.exportDir).toBe("/tmp/habit-exports");
  });

  it("treats an empty file as defaults", async () => {
    await writeFile(join(homeDir, CONFIG_FILE), "");
    const { config, warnings } = await loadConfig(homeDir);

    expect(config.dataFile).toBe(join(homeDir, "habits.json"));
    expect(warnings).toEqual([]);
  });

  it("falls back to defaults with a warning for invalid values", async () => {
    await writeFile(join(homeDir, CONFIG_FILE), "dataFile: 5\n");
    const { config, warnings } = await loadConfig(homeDir);

    expect(config.dataFile).toBe(join(homeDir, "habits.json"));
    expect(warnings).toHaveLength(1);
    expect(warnings[0]).toContain(": dataFile: ");
  });

  it("falls back to defaults with a warning for malformed YAML", async () => {
    await writeFile(join(homeDir, CONFIG_FILE), "dataFile: [unclosed\n");
    const { warnings } = await loadConfig(homeDir);

    expect(warnings).toHaveLength(1);
    expect(warnings[0].startsWith(join(homeDir, CONFIG_FILE))).toBe(true);
  });
});
