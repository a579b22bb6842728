// Voice Command Relay - Entry point
// Loads .env, validates configuration, wires the relay and starts the server.

import "dotenv/config";
import { APP_NAME, APP_VERSION, createRelayApp } from "./index.js";
import { resolveConfig, validateConfig } from "./config.js";
import { toErrorMessage } from "./errors.js";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

async function main(): Promise<void> {
  const config = resolveConfig();

  const errors = validateConfig(config);
  if (errors.length > 0) {
    for (const error of errors) logFatal(error);
    process.exit(1);
  }

  logInit(`Loading triggers from ${config.triggerConfigPath}`);
  const app = await createRelayApp(config);

  const port = await app.server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${port}`);
  logInit(`Session ceiling ${config.maxSessionDurationMs}ms, language "${config.language}"`);

  if (config.autoStart) {
    logInit("Starting to listen...");
    await app.relay.start();
  }

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down`);
    app
      .shutdown()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${toErrorMessage(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  logInit("Ready for connections");
}

main().catch((err: unknown) => {
  logFatal(toErrorMessage(err));
  process.exit(1);
});
