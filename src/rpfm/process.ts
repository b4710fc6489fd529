import { spawn } from "child_process";
import { ExtractionError } from "../errors.js";
import { logger } from "../logger.js";

/** Runs a command to completion. Rejects unless it exits with code 0. */
export type ProcessRunner = (command: string, args: string[]) => Promise<void>;

const MAX_ERR_LEN = 1000;

/**
 * The child's output goes to the logger (stderr), never to our stdout, which
 * may be carrying the MCP stdio transport.
 */
export const runProcess: ProcessRunner = (command, args) => {
  logger.debug({ command, args }, "spawning");

  return new Promise<void>((resolve, reject) => {
    const child = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"], shell: false });
    let stderr = "";

    child.stdout.setEncoding("utf-8");
    child.stdout.on("data", (chunk: string) => {
      logger.info({ command }, chunk.trimEnd());
    });

    child.stderr.setEncoding("utf-8");
    child.stderr.on("data", (chunk: string) => {
      stderr = (stderr + chunk).slice(-MAX_ERR_LEN);
      logger.warn({ command }, chunk.trimEnd());
    });

    child.on("error", (err) => {
      reject(new ExtractionError(`Failed to start "${command}": ${err.message}`, null, { cause: err }));
    });

    child.on("close", (code, signal) => {
      if (code === 0) {
        resolve();
        return;
      }
      const reason = signal ? `was killed by ${signal}` : `exited with code ${code}`;
      const details = stderr.trim();
      reject(new ExtractionError(details ? `"${command}" ${reason}: ${details}` : `"${command}" ${reason}`, code));
    });
  });
};
