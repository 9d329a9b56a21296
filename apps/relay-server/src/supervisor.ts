import { fork } from "node:child_process";
import type { EventEmitter } from "node:events";
import type { UnitName } from "./units.js";
import { createLogger } from "./log.js";

const log = createLogger("supervisor");

export interface UnitExit {
  name: UnitName;
  code: number | null;
  signal: NodeJS.Signals | null;
}

/** A running unit as seen by the supervisor */
export interface UnitHandle {
  readonly name: UnitName;
  /** Settles once, when the unit has exited */
  readonly exited: Promise<UnitExit>;
  /** Signal the unit; a no-op once it has exited */
  stop(signal: NodeJS.Signals): void;
}

export type UnitLauncher = (name: UnitName) => UnitHandle;

/** Run `name` in a child process executing `entry <name>` */
export function forkUnit(entry: string, name: UnitName): UnitHandle {
  const child = fork(entry, [name], { stdio: "inherit" });

  const exited = new Promise<UnitExit>((resolve) => {
    child.once("exit", (code, signal) => resolve({ name, code, signal }));
    child.once("error", (err) => {
      log.error(`Could not start ${name} unit: ${err.message}`);
      resolve({ name, code: null, signal: null });
    });
  });

  return {
    name,
    exited,
    stop(signal) {
      if (child.exitCode === null && child.signalCode === null) {
        child.kill(signal);
      }
    },
  };
}

function logExit(exit: UnitExit): void {
  if (exit.code === 0) {
    log.info(`${exit.name} unit exited`);
  } else if (exit.signal) {
    log.info(`${exit.name} unit stopped by ${exit.signal}`);
  } else {
    // Not restarted; the remaining units keep running
    log.error(`${exit.name} unit exited with code ${exit.code ?? "unknown"}`);
  }
}

/**
 * Start every unit and wait for all of them to exit. Units fail
 * independently. SIGINT and SIGTERM are forwarded while they run.
 */
export async function superviseUnits(
  names: readonly UnitName[],
  launch: UnitLauncher,
  signals: EventEmitter = process
): Promise<UnitExit[]> {
  const handles = names.map((name) => {
    const handle = launch(name);
    log.info(`Started ${name} unit`);
    return handle;
  });

  const forward = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, stopping units`);
    for (const handle of handles) handle.stop(signal);
  };
  signals.on("SIGINT", forward);
  signals.on("SIGTERM", forward);

  try {
    return await Promise.all(
      handles.map(async (handle) => {
        const exit = await handle.exited;
        logExit(exit);
        return exit;
      })
    );
  } finally {
    signals.off("SIGINT", forward);
    signals.off("SIGTERM", forward);
  }
}
