import { spawn } from "node:child_process";

export interface CommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode?: number | undefined;
  reason?: string;
}

interface RunCommandOptions {
  cwd?: string | undefined;
  timeoutMs?: number | undefined;
  maxBufferBytes?: number | undefined;
}

const DEFAULT_TIMEOUT_MS = 60 * 1000;
const DEFAULT_MAX_BUFFER_BYTES = 1024 * 1024;

function trimToTailWithinBytes(value: string, maxBytes: number): string {
  if (Buffer.byteLength(value, "utf8") <= maxBytes) return value;
  let low = 0;
  let high = value.length;
  while (low < high) {
    const mid = Math.floor((low + high) / 2);
    const sliced = value.slice(mid);
    if (Buffer.byteLength(sliced, "utf8") > maxBytes) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  return value.slice(low);
}

export function summarizeFailure(result: CommandResult): string {
  const reason = result.reason ?? "unknown error";
  const combined = `${result.stderr}\n${result.stdout}`.replace(/\s+/g, " ").trim();
  if (!combined) return reason;
  const snippet = combined.length > 200 ? `${combined.slice(0, 200)}...` : combined;
  return `${reason}: ${snippet}`;
}

/** Runs a short-lived command to completion and buffers the tail of its output. */
export function runCommand(command: string, args: string[], options: RunCommandOptions = {}): Promise<CommandResult> {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const maxBufferBytes = options.maxBufferBytes ?? DEFAULT_MAX_BUFFER_BYTES;

  return new Promise((resolveResult) => {
    let stdout = "";
    let stderr = "";
    let completed = false;
    let timedOut = false;
    let stdoutTruncated = false;
    let stderrTruncated = false;

    const resolveOnce = (result: CommandResult): void => {
      if (completed) return;
      completed = true;
      clearTimeout(timeoutHandle);
      resolveResult(result);
    };

    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["ignore", "pipe", "pipe"]
    });

    const appendChunk = (
      buffer: string,
      chunk: string
    ): {
      next: string;
      truncated: boolean;
    } => {
      const rawNext = buffer + chunk;
      return {
        next: trimToTailWithinBytes(rawNext, maxBufferBytes),
        truncated: Buffer.byteLength(rawNext, "utf8") > maxBufferBytes
      };
    };

    const withOutputTailNotice = (reason: string): string => {
      if (!stdoutTruncated && !stderrTruncated) return reason;
      return `${reason}; output truncated to last ${maxBufferBytes} bytes per stream`;
    };

    child.stdout?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => {
      const appended = appendChunk(stdout, chunk);
      stdout = appended.next;
      stdoutTruncated = stdoutTruncated || appended.truncated;
    });

    child.stderr?.setEncoding("utf8");
    child.stderr?.on("data", (chunk: string) => {
      const appended = appendChunk(stderr, chunk);
      stderr = appended.next;
      stderrTruncated = stderrTruncated || appended.truncated;
    });

    child.on("error", (error) => {
      resolveOnce({
        ok: false,
        stdout,
        stderr,
        reason: withOutputTailNotice(error.message)
      });
    });

    child.on("close", (code) => {
      if (timedOut) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          reason: withOutputTailNotice(`timeout after ${timeoutMs / 1000}s`)
        });
        return;
      }
      if (code !== 0) {
        resolveOnce({
          ok: false,
          stdout,
          stderr,
          ...(code !== null ? { exitCode: code } : {}),
          reason: withOutputTailNotice(`exit code ${code ?? "unknown"}`)
        });
        return;
      }
      resolveOnce({
        ok: true,
        stdout,
        stderr,
        exitCode: 0
      });
    });

    const timeoutHandle = setTimeout(() => {
      timedOut = true;
      child.kill("SIGKILL");
    }, timeoutMs);
  });
}
