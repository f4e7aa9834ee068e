import { spawn, type SpawnOptions } from "child_process";
import { config } from "../config.js";
import { errorMessage } from "../errors.js";
import { createChildLogger } from "../logger.js";

const logger = createChildLogger("restart");

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => { pid?: number; unref(): void };

export interface RestartOptions {
  delayMs?: number;
  spawnProcess?: SpawnProcess;
  exit?: (code: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Re-execute this process from a clean state after a cooldown.
 *
 * The replacement runs the same Node binary, exec arguments (loaders such
 * as tsx included) and script arguments. It stays in this process group so
 * terminal signals still reach it; once unref'd it outlives this process,
 * which then exits and takes whatever the transport layer leaked with it.
 */
export async function restartProcess(reason: string, options: RestartOptions = {}): Promise<void> {
  const delayMs = options.delayMs ?? config.restartDelaySeconds * 1000;
  const spawnProcess = options.spawnProcess ?? spawn;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const sleep = options.sleep ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  logger.warn({ reason, delayMs }, "Restarting process");
  await sleep(delayMs);

  const args = [...process.execArgv, ...process.argv.slice(1)];

  try {
    const child = spawnProcess(process.execPath, args, {
      stdio: "inherit",
      env: process.env,
    });
    child.unref();
    logger.info({ pid: child.pid, args }, "Spawned replacement process");
    exit(0);
  } catch (error) {
    logger.fatal({ error: errorMessage(error) }, "Failed to spawn replacement process");
    exit(1);
  }
}
