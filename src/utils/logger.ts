import ansis from "ansis";
import type { Config } from "../types";

const colors = [
  ansis.cyan,
  ansis.green,
  ansis.yellow,
  ansis.blue,
  ansis.magenta,
  ansis.red,
  ansis.gray,
  ansis.white,
] as const;

export type LoggerConfig = Pick<Config, "prefix" | "silent">;

export class Logger {
  private readonly colorMap = new Map<string, (typeof colors)[number]>();
  private colorIndex = 0;
  private maxPrefixLength = 0;
  private readonly config: LoggerConfig;

  constructor(config: LoggerConfig = {}) {
    this.config = {
      prefix: false,
      silent: false,
      ...config,
    };
  }

  get prefixed(): boolean {
    return this.config.prefix !== false && this.config.prefix !== undefined;
  }

  registerTask(taskName: string): void {
    if (!this.colorMap.has(taskName)) {
      const color = colors[this.colorIndex % colors.length];
      if (color) {
        this.colorMap.set(taskName, color);
      }
      this.colorIndex++;
      this.maxPrefixLength = Math.max(this.maxPrefixLength, taskName.length);
    }
  }

  /**
   * Subprocess output. Never silenced: `--silent` only hides echoes and
   * status messages.
   */
  log(taskName: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.log(this.formatLine(taskName, line));
    }
  }

  error(taskName: string, message: string): void {
    for (const line of message.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      console.error(this.formatLine(taskName, ansis.red(line)));
    }
  }

  /**
   * Echo a recipe line before it runs.
   */
  command(taskName: string, command: string): void {
    if (!this.prefixed) {
      console.log(command);
      return;
    }
    for (const line of command.split("\n")) {
      console.log(this.formatLine(taskName, ansis.dim(line)));
    }
  }

  info(message: string): void {
    if (this.config.silent) {
      return;
    }
    console.log(`${ansis.blue("ℹ")} ${message}`);
  }

  warn(message: string): void {
    console.warn(`${ansis.yellow("⚠")} ${message}`);
  }

  fail(message: string): void {
    console.error(`${ansis.red("✗")} ${ansis.red(message)}`);
  }

  private formatLine(taskName: string, line: string): string {
    if (!this.prefixed) {
      return line;
    }

    const color = this.colorMap.get(taskName) ?? ansis.white;

    if (typeof this.config.prefix === "string") {
      return `${color(this.config.prefix)} ${line}`;
    }
    const prefix = `[${taskName}]`;
    const paddedPrefix = prefix.padEnd(this.maxPrefixLength + 2); // +2 for brackets
    return `${color(paddedPrefix)} ${ansis.gray("|")} ${line}`;
  }

  /**
   * Create a child logger for a specific target
   */
  createTaskLogger(taskName: string): TaskLogger {
    this.registerTask(taskName);
    return new TaskLogger(this, taskName);
  }
}

export class TaskLogger {
  private readonly parent: Logger;
  private readonly taskName: string;

  constructor(parent: Logger, taskName: string) {
    this.parent = parent;
    this.taskName = taskName;
  }

  log(message: string): void {
    this.parent.log(this.taskName, message);
  }

  error(message: string): void {
    this.parent.error(this.taskName, message);
  }

  command(command: string): void {
    this.parent.command(this.taskName, command);
  }
}
