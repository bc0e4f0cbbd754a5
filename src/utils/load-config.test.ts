import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.split).toEqual({
      delimiter: "---",
      noPublishMarker: "<!-- no-pub -->",
    });
    expect(config.output).toEqual({ name: "page", directoryPrefix: "Pages_" });
    expect(config.code).toEqual({ imagePrefix: "codeimg_", imageDelay: 0 });
    expect(config.html.customCss).toBe("custom.css");
  });
});

describe("mergeConfig", () => {
  it("overrides single keys of a section", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, { split: { delimiter: "***" } });

    expect(merged.split).toEqual({
      delimiter: "***",
      noPublishMarker: "<!-- no-pub -->",
    });
    expect(merged.output).toEqual(base.output);
  });
});

describe("loadConfig", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "marksplit-config-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("applies a custom config file", async () => {
    const path = join(root, "custom.json");
    await writeFile(path, JSON.stringify({ output: { name: "slide" } }));

    const { config, errors } = await loadConfig(path);

    expect(config.output.name).toBe("slide");
    expect(errors.map((e) => e.path)).not.toContain(path);
  });

  it("reports an invalid custom config file and keeps going", async () => {
    const path = join(root, "broken.json");
    await writeFile(path, "{ not json");

    const { config, errors } = await loadConfig(path);

    expect(errors.map((e) => e.path)).toContain(path);
    expect(config.split.delimiter).toBeTypeOf("string");
  });

  it("reports a custom config that fails validation", async () => {
    const path = join(root, "invalid.json");
    await writeFile(path, JSON.stringify({ code: { imageDelay: -5 } }));

    const { errors } = await loadConfig(path);

    expect(errors.map((e) => e.path)).toContain(path);
  });
});
