#!/usr/bin/env node
import "dotenv/config";
import { createServer } from "./src";
import { createConfig } from "./src/utils/config";
import { createLogger } from "./src/utils/logger";

async function main(): Promise<number> {
  const config = createConfig();
  const logger = createLogger(config);
  const configLogger = logger.child({ component: "config" });
  for (const warning of config.warnings) {
    configLogger.warn(warning);
  }
  configLogger.debug("Configuration loaded", {
    environment: config.server.environment,
    logLevel: config.logging.level,
    disabledTools: config.tools.disabled,
  });

  logger.info("Starting MCP stdio server process");
  try {
    const report = await createServer({ config, logger }).run();
    if (report.state === "shutdown_fault") {
      logger.error("Server exited with error", report.error);
      return 1;
    }
    logger.info("Server exited successfully", { processed: report.processed });
    return 0;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exitCode = code;
    if (code !== 0) {
      // stdin may still hold the event loop open after an output failure;
      // the log file has been flushed by now
      process.exit();
    }
  })
  .catch((error: unknown) => {
    process.stderr.write(
      `Fatal error: ${error instanceof Error ? error.stack : String(error)}\n`
    );
    process.exitCode = 1;
  });
