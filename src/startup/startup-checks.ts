import { config } from "../config/index.js";
import { getDefaultQaEngine } from "../modules/qa/default-engine.js";
import { logInfo } from "../observability/logger.js";

export interface StartupCheckOptions {
  enabled?: boolean;
  loadEngine?: () => Promise<unknown>;
}

/** Loads both reference files up front so a malformed file stops the boot. */
export async function runStartupChecks(options: StartupCheckOptions = {}): Promise<void> {
  if (!(options.enabled ?? config.RUN_STARTUP_CHECKS)) {
    return;
  }

  await (options.loadEngine ?? getDefaultQaEngine)();
  logInfo("startup.checks.passed", {}, {
    constitution_file: config.CONSTITUTION_FILE,
    reality_file: config.REALITY_FILE
  });
}
