import { copyFileSync, mkdtempSync, rmSync } from "node:fs";
import os from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import {
  type MockInstance,
  afterEach,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";
import type {
  CommandOptions,
  CommandRunner,
} from "../../execution/command-runner";
import { Runner } from "../../execution/runner";

const FIXTURE = fileURLToPath(new URL("./fixtures/Makefile", import.meta.url));

class RecordingRunner implements CommandRunner {
  readonly commands: string[] = [];
  readonly options: CommandOptions[] = [];

  constructor(private readonly statuses: Record<string, number> = {}) {}

  async run(command: string, options: CommandOptions): Promise<number> {
    this.commands.push(command);
    this.options.push(options);
    return this.statuses[command] ?? 0;
  }
}

describe("Python project control file", () => {
  let tmpDir: string;
  let consoleLogSpy: MockInstance<typeof console.log>;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  const run = (args: string[], commandRunner: CommandRunner) =>
    new Runner().run(args, {
      commandRunner,
      cwd: tmpDir,
      environment: { HOME: "/home/tester" },
    });

  beforeEach(() => {
    tmpDir = mkdtempSync(join(os.tmpdir(), "makeshift-project-"));
    copyFileSync(FIXTURE, join(tmpDir, "Makefile"));
    consoleLogSpy = vi.spyOn(console, "log").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
    vi.spyOn(console, "warn").mockImplementation(() => {
      // Intentionally empty - suppressing console output in tests
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tmpDir, { force: true, recursive: true });
  });

  it("runs help as the default goal without echoing", async () => {
    const commandRunner = new RecordingRunner();

    expect(await run([], commandRunner)).toBe(0);
    expect(commandRunner.commands).toEqual([
      'echo "targets: clean setup test lint shell"',
      'echo "PY_VERSION defaults to 3"',
    ]);
    expect(consoleLogSpy).not.toHaveBeenCalledWith(
      'echo "PY_VERSION defaults to 3"'
    );
  });

  it("runs the test chain in prerequisite order", async () => {
    const commandRunner = new RecordingRunner();

    expect(await run(["test"], commandRunner)).toBe(0);
    expect(commandRunner.commands).toEqual([
      "rm -rf env build dist",
      'find . -name "*.pyc" | xargs -r rm',
      "virtualenv -p /usr/bin/python3 env",
      "env/bin/pip install wheel",
      "env/bin/pip install  -r requirements.txt",
      "env/bin/python setup.py develop",
      "env/bin/python -m pytest tests",
    ]);
  });

  it("switches install arguments with a command-line override", async () => {
    const commandRunner = new RecordingRunner();

    expect(await run(["USE_WHEELS=1", "setup"], commandRunner)).toBe(0);
    expect(commandRunner.commands[4]).toBe(
      "env/bin/pip install --no-index --find-links=/home/tester/wheels -r requirements.txt"
    );
    expect(commandRunner.options[0]?.env).toEqual({
      HOME: "/home/tester",
      SERVICE_URL: "http://127.0.0.1:8080/api/",
      USE_WHEELS: "1",
      VIRTUALENV_PATH: "env/bin/",
    });
  });

  it("fails before running anything when a prerequisite has no rule", async () => {
    const commandRunner = new RecordingRunner();

    expect(await run(["shell"], commandRunner)).toBe(2);
    expect(commandRunner.commands).toEqual([]);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining(
        "No rule to make target 'install', needed by 'shell'"
      )
    );
  });

  it("continues past an ignored lint failure", async () => {
    const commandRunner = new RecordingRunner({ "env/bin/flake8 src": 1 });

    expect(await run(["lint"], commandRunner)).toBe(0);
    expect(commandRunner.commands.slice(-2)).toEqual([
      "env/bin/flake8 src",
      "echo lint done",
    ]);
  });

  it("stops the chain at the first failure", async () => {
    const commandRunner = new RecordingRunner({ "env/bin/pip install wheel": 1 });

    expect(await run(["test"], commandRunner)).toBe(1);
    expect(commandRunner.commands).toEqual([
      "rm -rf env build dist",
      'find . -name "*.pyc" | xargs -r rm',
      "virtualenv -p /usr/bin/python3 env",
      "env/bin/pip install wheel",
    ]);
    expect(consoleErrorSpy).toHaveBeenCalledWith(
      expect.stringContaining("[Makefile:26: virtualenv] Error 1")
    );
  });

  it("keeps going with unrelated goals", async () => {
    const commandRunner = new RecordingRunner({ "env/bin/pip install wheel": 1 });

    expect(await run(["-k", "setup", "help"], commandRunner)).toBe(1);
    expect(commandRunner.commands.slice(-2)).toEqual([
      'echo "targets: clean setup test lint shell"',
      'echo "PY_VERSION defaults to 3"',
    ]);
    expect(commandRunner.commands).not.toContain(
      "env/bin/python setup.py develop"
    );
  });

  it("prints the whole chain in dry-run mode", async () => {
    const commandRunner = new RecordingRunner();

    expect(await run(["-n", "test"], commandRunner)).toBe(0);
    expect(commandRunner.commands).toEqual([]);
    expect(consoleLogSpy).toHaveBeenCalledWith("virtualenv -p /usr/bin/python3 env");
    expect(consoleLogSpy).toHaveBeenCalledWith("env/bin/python -m pytest tests");
  });
});
