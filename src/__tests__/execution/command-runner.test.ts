import { mkdtempSync, readFileSync, rmSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  type CommandOptions,
  ShellCommandRunner,
} from "../../execution/command-runner";
import { Logger } from "../../utils/logger";

describe("ShellCommandRunner", () => {
  let tmpDir: string;
  let options: CommandOptions;
  const runner = new ShellCommandRunner();

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "makeshift-cmd-"));
    options = {
      cwd: tmpDir,
      env: { PATH: process.env.PATH ?? "/usr/bin:/bin" },
      shell: "/bin/sh",
    };
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("returns the exit status", async () => {
    expect(await runner.run("true", options)).toBe(0);
    expect(await runner.run("exit 3", options)).toBe(3);
  });

  it("runs in the given directory with the given environment", async () => {
    const status = await runner.run('printf "%s" "$GREETING" > out.txt', {
      ...options,
      env: { ...options.env, GREETING: "hello" },
    });

    expect(status).toBe(0);
    expect(readFileSync(join(tmpDir, "out.txt"), "utf-8")).toBe("hello");
  });

  it("does not leak the parent environment", async () => {
    vi.stubEnv("MAKESHIFT_PARENT_ONLY", "1");

    expect(await runner.run('test -z "$MAKESHIFT_PARENT_ONLY"', options)).toBe(0);
  });

  it("pipes output through a task logger", async () => {
    const output = new Logger({ prefix: true }).createTaskLogger("t");
    const logSpy = vi.spyOn(output, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    const errorSpy = vi.spyOn(output, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });

    await runner.run("echo one; echo two >&2", { ...options, output });

    expect(logSpy).toHaveBeenCalledWith("one\n");
    expect(errorSpy).toHaveBeenCalledWith("two\n");
  });

  it("writes a line split across chunks once", async () => {
    const output = new Logger({ prefix: true }).createTaskLogger("t");
    const logSpy = vi.spyOn(output, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });

    await runner.run("printf 'par'; sleep 0.1; printf 'tial\\n'", {
      ...options,
      output,
    });

    expect(logSpy.mock.calls).toEqual([["partial\n"]]);
  });

  it("flushes an unterminated last line on exit", async () => {
    const output = new Logger({ prefix: true }).createTaskLogger("t");
    const errorSpy = vi.spyOn(output, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });

    await runner.run("printf 'no newline' >&2", { ...options, output });

    expect(errorSpy.mock.calls).toEqual([["no newline"]]);
  });

  it("reports 128 plus the signal number when killed", async () => {
    expect(await runner.run("kill -TERM $$", options)).toBe(143);
  });

  it("reports 127 when the shell cannot be started", async () => {
    const status = await runner.run("true", {
      ...options,
      shell: join(tmpDir, "missing-shell"),
    });
    expect(status).toBe(127);
  });
});
