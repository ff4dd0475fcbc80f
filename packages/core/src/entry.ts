#!/usr/bin/env node

import "dotenv/config";
import { Command } from "commander";
import { applyCliOverrides, type StartOptions } from "./cli/overrides.js";
import { applyEnvOverrides } from "./config/env.js";
import { DEFAULT_CONFIG_PATH, initializeConfig, loadConfigOrDefaults } from "./config/loader.js";
import { createGateway } from "./gateway/server.js";
import { createLogger, redactSensitive } from "./infra/logger.js";

const program = new Command();

program
  .name("ledger-rest")
  .description("REST gateway in front of a ledger validator")
  .version("0.1.0");

// --- ledger-rest init ---
program
  .command("init")
  .description("Write a config file holding every default setting")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .action((options: { config: string }) => {
    const log = createLogger("ledger-rest");
    try {
      initializeConfig(options.config);
      log.info(`Created ${options.config}`);
    } catch (err) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

// --- ledger-rest start ---
program
  .command("start", { isDefault: true })
  .description("Connect to the validator and serve the REST API")
  .option("-c, --config <path>", "Path to config file", DEFAULT_CONFIG_PATH)
  .option("-b, --bind <host:port>", "Address to serve on, e.g. 0.0.0.0:8008")
  .option("-C, --connect <url>", "Validator endpoint, e.g. ws://127.0.0.1:4004")
  .option("-t, --timeout <seconds>", "Seconds to wait for each validator reply")
  .action(async (options: StartOptions) => {
    let log = createLogger("ledger-rest");

    try {
      const config = applyCliOverrides(
        applyEnvOverrides(loadConfigOrDefaults(options.config)),
        options,
      );
      log = createLogger("ledger-rest", {
        level: config.logging.level,
        redact: config.logging.redactSecrets,
      });
      log.debug("Effective config:", redactSensitive(config));

      const gateway = createGateway({ config, logger: log });
      await gateway.listen();

      let stopping = false;
      const shutdown = (signal: string): void => {
        if (stopping) return;
        stopping = true;
        log.info(`Received ${signal}, shutting down...`);
        gateway.close().then(
          () => process.exit(0),
          (err: unknown) => {
            log.error("Failed to close cleanly:", err);
            process.exit(1);
          },
        );
      };

      process.on("SIGINT", shutdown);
      process.on("SIGTERM", shutdown);
    } catch (err) {
      log.error(`Failed to start: ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    }
  });

program.parse();
