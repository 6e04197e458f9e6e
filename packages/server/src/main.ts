import { readFile } from "node:fs/promises";
import { createLogger, loadDeploymentConfig } from "@tally/aggregator";
import { app } from "./app.js";
import { buildRole, startJobs } from "./deployment.js";

// Serves one aggregator role, configured by the JSON file at $TALLY_CONFIG.

async function main(): Promise<void> {
  const path = process.env.TALLY_CONFIG;
  if (!path) {
    throw new Error("TALLY_CONFIG must name a deployment config file");
  }

  const config = await loadDeploymentConfig(
    JSON.parse(await readFile(path, "utf8")),
  );
  const logger = createLogger("tally:http", config.logLevel);
  const role = buildRole(config);

  const server = app(role, logger).listen(config.port, () => {
    logger.info(`${config.role} listening on port ${config.port}`);
  });
  const stopJobs = startJobs(role, config.jobInterval, logger);

  process.once("SIGTERM", () => {
    logger.info("shutting down");
    stopJobs();
    server.close();
  });
}

main().catch((error: unknown) => {
  createLogger("tally:http").error("failed to start", error);
  process.exitCode = 1;
});
