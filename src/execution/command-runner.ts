import { constants } from "node:os";
import debug from "debug";
import { execa } from "execa";
import type { TaskLogger } from "../utils/logger";

const log = debug("makeshift:executor");

// Status reported when the shell itself could not be started
const SPAWN_FAILURE_STATUS = 127;
// Shells report death by signal N as 128 + N
const SIGNAL_STATUS_BASE = 128;
const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(constants.signals));

export type CommandOptions = {
  cwd: string;
  env: Record<string, string>;
  shell: string;
  /** Pipe output through a prefixed logger; inherit the terminal when absent. */
  output?: TaskLogger;
};

export interface CommandRunner {
  run(command: string, options: CommandOptions): Promise<number>;
}

/**
 * Holds back an unterminated last line until the rest of it arrives, so a
 * line split across chunks is written once.
 */
export class LineBuffer {
  private pending = "";

  constructor(private readonly write: (text: string) => void) {}

  push(chunk: string): void {
    const text = this.pending + chunk;
    const end = text.lastIndexOf("\n");
    if (end === -1) {
      this.pending = text;
      return;
    }
    this.pending = text.slice(end + 1);
    this.write(text.slice(0, end + 1));
  }

  flush(): void {
    if (this.pending) {
      this.write(this.pending);
      this.pending = "";
    }
  }
}

export class ShellCommandRunner implements CommandRunner {
  async run(command: string, options: CommandOptions): Promise<number> {
    const { cwd, env, shell, output } = options;
    log(`Spawning via ${shell}: ${command}`);

    const proc = execa(command, {
      cwd,
      env,
      extendEnv: false,
      reject: false,
      shell,
      stdio: output ? ["ignore", "pipe", "pipe"] : "inherit",
    });

    const buffers: LineBuffer[] = [];
    if (output) {
      const stdout = new LineBuffer((text) => output.log(text));
      const stderr = new LineBuffer((text) => output.error(text));
      buffers.push(stdout, stderr);
      proc.stdout?.on("data", (data: Buffer) => {
        stdout.push(data.toString());
      });
      proc.stderr?.on("data", (data: Buffer) => {
        stderr.push(data.toString());
      });
    }

    const result = await proc;
    for (const buffer of buffers) {
      buffer.flush();
    }

    if (result.signal) {
      log(`Terminated by ${result.signal}: ${command}`);
      return SIGNAL_STATUS_BASE + (SIGNAL_NUMBERS.get(result.signal) ?? 0);
    }
    if (result.failed && typeof result.exitCode !== "number") {
      log(`No exit status for: ${command}`);
      return SPAWN_FAILURE_STATUS;
    }
    log(`Exited with ${result.exitCode}`);
    return result.exitCode;
  }
}
