import "dotenv/config";
import { loadConfig } from "./bootstrap/config";
import { getLogger } from "./bootstrap/logger";
import { loadTlsConfig } from "./bootstrap/tls";
import { createDbPool } from "./db";
import { HealthChecker } from "./health/checker";

function main() {
  const config = loadConfig();
  const logger = getLogger(config.logLevel, config.logPretty);

  const pool = config.dbUrl ? createDbPool(config.dbUrl, logger) : undefined;
  const checker = new HealthChecker(
    config.healthPort,
    pool,
    config,
    loadTlsConfig(config.storage.caCert),
    { logger, dbHealthQuery: config.dbHealthQuery }
  );

  logger.info(
    { storageUrl: checker.storageUrl, broker: checker.brokerAddress, database: Boolean(pool) },
    "starting healthcheck"
  );
  const srv = checker.run();

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutting down healthcheck");
    srv.close(() => {
      (pool ? pool.end() : Promise.resolve())
        .catch((err: unknown) => logger.error({ err }, "failed to close database pool"))
        .finally(() => process.exit(0));
    });
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);
}

try {
  main();
} catch (err) {
  getLogger("info", false).fatal({ err }, "healthcheck failed to start");
  process.exit(1);
}
