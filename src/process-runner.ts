import { spawn } from "child_process";
import { CONFIG } from "./config.js";
import { CommandError } from "./errors.js";
import type { CommandResult } from "./types.js";

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeout?: number;
}

export function runCommand(
  command: string,
  args: readonly string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    // Pas de shell : les arguments sont passés tels quels
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ?? process.env,
      timeout: options.timeout ?? CONFIG.commandTimeoutMs,
      windowsHide: true,
    });

    let stdout = "";
    let stderr = "";

    // Décodage en flux : un caractère UTF-8 peut être coupé entre deux chunks
    proc.stdout?.setEncoding("utf8");
    proc.stderr?.setEncoding("utf8");

    proc.stdout?.on("data", (data: string) => {
      stdout += data;
    });

    proc.stderr?.on("data", (data: string) => {
      stderr += data;
    });

    proc.on("error", (error) => {
      reject(error);
    });

    // code vaut null quand le processus est tué (timeout inclus)
    proc.on("close", (code, signal) => {
      resolve({ code: code ?? 1, signal, stdout, stderr });
    });
  });
}

export async function runOrThrow(
  command: string,
  args: readonly string[],
  options: RunOptions = {}
): Promise<CommandResult> {
  const result = await runCommand(command, args, options);
  if (result.code !== 0 || result.signal) {
    throw new CommandError(
      command,
      args,
      result.code,
      result.stderr || result.stdout,
      result.signal
    );
  }
  return result;
}
