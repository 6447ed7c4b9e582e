import { test, expect, describe, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { formatLogLine, log } from "../../src/logging";

describe("formatLogLine", () => {
  test("timestamp, upper-cased level and message", () => {
    expect(formatLogLine("warn", "slow tool")).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z \[WARN\] slow tool\n$/);
  });

  test("extra fields are appended as JSON", () => {
    expect(formatLogLine("info", "connected", { server: "academic" }).endsWith(' connected {"server":"academic"}\n')).toBe(
      true
    );
  });
});

describe("log", () => {
  const saved = { level: process.env.TOOLRAG_LOG_LEVEL, file: process.env.TOOLRAG_LOG_FILE };
  let dir: string | undefined;

  function restore(key: string, value: string | undefined): void {
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }

  afterEach(() => {
    restore("TOOLRAG_LOG_LEVEL", saved.level);
    restore("TOOLRAG_LOG_FILE", saved.file);
    if (dir) {
      rmSync(dir, { recursive: true, force: true });
      dir = undefined;
    }
  });

  test("writes lines at or above the configured level", async () => {
    dir = mkdtempSync(join(tmpdir(), "toolrag-log-"));
    const file = join(dir, "nested", "toolrag.log");
    process.env.TOOLRAG_LOG_LEVEL = "warn";
    process.env.TOOLRAG_LOG_FILE = file;

    log("info", "dropped");
    log("error", "kept");

    await vi.waitFor(() => {
      expect(existsSync(file) && readFileSync(file, "utf-8")).toMatch(/\[ERROR\] kept\n$/);
    });
    expect(readFileSync(file, "utf-8")).not.toContain("dropped");
  });

  test("silent writes nothing", async () => {
    dir = mkdtempSync(join(tmpdir(), "toolrag-log-"));
    const file = join(dir, "toolrag.log");
    process.env.TOOLRAG_LOG_LEVEL = "silent";
    process.env.TOOLRAG_LOG_FILE = file;

    log("error", "never");
    await new Promise(resolve => setTimeout(resolve, 20));

    expect(existsSync(file)).toBe(false);
  });
});
