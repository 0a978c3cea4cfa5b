import { createLogger } from "./logger.js";
import { main } from "./main.js";

const logger = createLogger();

try {
  const app = await main(process.env, logger);

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.log.info({ signal }, "shutting down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.log.error({ err }, "error during shutdown");
          process.exit(1);
        },
      );
    });
  }
} catch (err) {
  // Still at the startup level: a config error is reported even under "silent"
  logger.fatal({ err }, "failed to start exporter");
  process.exit(1);
}
