import { fileURLToPath } from "node:url";
import config from "./config.js";
import { configureLogging, createLogger, errorMessage } from "./log.js";
import { UNIT_NAMES, createUnit, isUnitName } from "./units.js";
import { forkUnit, superviseUnits } from "./supervisor.js";

configureLogging(config.logLevel);
const log = createLogger("main");

const entry = fileURLToPath(import.meta.url);

async function main() {
  const requested = process.argv[2];

  // Without an argument this process supervises; each unit runs in its own child
  if (requested === undefined) {
    await superviseUnits(UNIT_NAMES, (name) => forkUnit(entry, name));
    return;
  }

  if (!isUnitName(requested)) {
    throw new Error(`Unknown unit "${requested}", expected one of: ${UNIT_NAMES.join(", ")}`);
  }
  await createUnit(requested, config).run();
}

main().catch((err: unknown) => {
  log.error(`Fatal error: ${errorMessage(err)}`);
  process.exit(1);
});
