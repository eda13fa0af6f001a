/**
 * Post-success regression run
 */

import { spawn } from "child_process";
import { Logger } from "./logger";

/**
 * Run the regression command with inherited stdio and resolve with its exit
 * code. A command that cannot start, or dies from a signal, counts as 1.
 */
export function runRegressionTests(command: string[], cwd: string, logger?: Logger): Promise<number> {
  const [executable, ...args] = command;
  if (!executable) {
    return Promise.resolve(1);
  }

  logger?.info(`Running regression tests: ${command.join(" ")}`);
  return new Promise<number>((resolve) => {
    const child = spawn(executable, args, { cwd, stdio: "inherit", shell: process.platform === "win32" });
    child.on("error", (error) => {
      logger?.error(`Regression command failed to start: ${error.message}`);
      resolve(1);
    });
    child.on("close", (code) => {
      const exitCode = code ?? 1;
      logger?.info(`Regression tests exited with code ${exitCode}`);
      resolve(exitCode);
    });
  });
}
