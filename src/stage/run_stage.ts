import { spawn } from "node:child_process";
import type { Env } from "../config.js";

export type StageName = "extract" | "features" | "match" | "mapper" | "export";

export type StageInvocation = {
  stage: StageName;
  command: string;
  args: string[];
  quiet?: boolean;
};

export type StageResult = {
  stage: StageName;
  success: boolean;
  exitCode: number | null;
  error?: string;
};

export type StageRunner = {
  run(invocation: StageInvocation): Promise<StageResult>;
};

export type StageRunnerOptions = {
  env: Env;
  cwd?: string;
};

/**
 * Runs each stage as a child process and resolves once it exits.
 * Output is passed straight through to the terminal so the tools' own progress
 * stays visible; only the exit status decides success.
 */
export function createStageRunner(opts: StageRunnerOptions): StageRunner {
  return {
    run(invocation) {
      return new Promise<StageResult>(resolvePromise => {
        let settled = false;
        const settle = (result: Omit<StageResult, "stage">) => {
          if (settled) return;
          settled = true;
          resolvePromise({ stage: invocation.stage, ...result });
        };

        const proc = spawn(invocation.command, invocation.args, {
          env: opts.env,
          cwd: opts.cwd,
          stdio: invocation.quiet ? "ignore" : "inherit"
        });
        proc.on("error", err => {
          settle({ success: false, exitCode: null, error: `failed to launch ${invocation.command}: ${err.message}` });
        });
        proc.on("close", (code, signal) => {
          if (code === 0) settle({ success: true, exitCode: 0 });
          else if (code === null) settle({ success: false, exitCode: null, error: `terminated by ${signal ?? "signal"}` });
          else settle({ success: false, exitCode: code, error: `exited with code ${code}` });
        });
      });
    }
  };
}
