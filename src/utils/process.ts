import { execFile } from "node:child_process";
import { promisify } from "node:util";

const execFileAsync = promisify(execFile);

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export async function runCommand(
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> }
): Promise<CommandResult> {
  try {
    const { stdout, stderr } = await execFileAsync(command, args, {
      cwd: options?.cwd,
      env: { ...process.env, ...options?.env },
      timeout: options?.timeoutMs,
      encoding: "utf8",
    });

    return { stdout, stderr, exitCode: 0 };
  } catch (err: unknown) {
    const detail = typeof err === "object" && err !== null ? err : {};
    const stdout = "stdout" in detail ? String(detail.stdout ?? "") : "";
    const stderr = "stderr" in detail ? String(detail.stderr ?? "") : err instanceof Error ? err.message : "";
    const exitCode = "code" in detail && typeof detail.code === "number" ? detail.code : 1;
    throw new Error(`Command failed (${command} ${args.join(" ")}): code=${exitCode}\nSTDERR: ${stderr}\nSTDOUT: ${stdout}`);
  }
}
