import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";

const config = loadConfig();
const app = await buildApp({ config });

// Start
try {
  await app.listen({ port: config.port, host: config.host });
  app.log.info(
    `Metrics explorer API listening on ${config.host}:${config.port} (exporter: ${app.explorer.metricsUrl})`,
  );
} catch (err) {
  app.log.error(err);
  process.exit(1);
}
