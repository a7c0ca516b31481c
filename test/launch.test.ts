import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { assertCommandExists, assertPathsExist, resolveCommand } from "../src/launch.js";
import { ConnectionError } from "../src/errors.js";

describe("launch checks", () => {
  let dir: string;

  beforeAll(() => {
    dir = mkdtempSync(join(tmpdir(), "launch-test-"));
    writeFileSync(join(dir, "article-server"), "");
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("finds bare commands on PATH", () => {
    expect(resolveCommand("article-server", { pathEnv: dir })).toBe(join(dir, "article-server"));
    expect(resolveCommand("article-server", { pathEnv: "" })).toBeUndefined();
  });

  it("resolves relative paths against the working directory", () => {
    expect(resolveCommand("./article-server", { cwd: dir })).toBe(join(dir, "article-server"));
    expect(resolveCommand("./missing", { cwd: dir })).toBeUndefined();
  });

  it("does not accept directories as commands", () => {
    expect(resolveCommand(dir)).toBeUndefined();
  });

  it("throws ConnectionError for a missing command", () => {
    expect(() => assertCommandExists("/nonexistent/bin/server")).toThrow(ConnectionError);
    expect(() => assertCommandExists("/nonexistent/bin/server")).toThrow("Command not found: /nonexistent/bin/server");
  });

  it("throws ConnectionError for a missing required path", () => {
    expect(() => assertPathsExist("python", ["article-server"], dir)).not.toThrow();
    expect(() => assertPathsExist("python", ["server.py"], dir)).toThrow("Required path does not exist: server.py");
  });
});
