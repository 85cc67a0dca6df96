/**
 * Blocking invocation of an external tool with captured output.
 *
 * Each call is isolated: its own process, its own buffers, an explicit
 * timeout. Nothing is retried.
 */
import { spawnSync } from "node:child_process";
import { accessSync, constants } from "node:fs";
import path from "node:path";

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
  /** Set when the process was killed (timeout or external signal) */
  signal: NodeJS.Signals | null;
  timedOut: boolean;
}

export interface CommandOptions {
  timeoutMs: number;
  maxBuffer?: number;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): CommandResult;
  /** Resolve an executable on PATH, or null when it is not installed */
  which(command: string): string | null;
}

export class ProcessCommandRunner implements CommandRunner {
  run(command: string, args: readonly string[], options: CommandOptions): CommandResult {
    const result = spawnSync(command, args, {
      encoding: "utf8",
      timeout: options.timeoutMs,
      maxBuffer: options.maxBuffer,
      killSignal: "SIGKILL",
      windowsHide: true,
    });

    const errCode = result.error && "code" in result.error ? result.error.code : undefined;
    const timedOut = errCode === "ETIMEDOUT";
    if (result.error && !timedOut) throw result.error;

    return {
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? "",
      exitCode: result.status,
      signal: result.signal,
      timedOut,
    };
  }

  which(command: string): string | null {
    const dirs = (process.env.PATH || "").split(path.delimiter).filter(Boolean);
    const exts = process.platform === "win32" ? (process.env.PATHEXT || ".EXE").split(";") : [""];
    for (const dir of dirs) {
      for (const ext of exts) {
        const candidate = path.join(dir, command + ext);
        try {
          accessSync(candidate, constants.X_OK);
          return candidate;
        } catch {
          continue; // not in this directory
        }
      }
    }
    return null;
  }
}
