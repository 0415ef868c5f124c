import "dotenv/config";
import { loadConfig } from "../core/config/index.js";
import { buildServer } from "./app.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const server = buildServer({ config });

  try {
    await server.listen({ port: config.port, host: config.host });
    server.log.info(`BW Assist API listening on http://${config.host}:${config.port}`);
    server.log.info("POST /test-cases, POST /analysis, GET /options, GET /health");
  } catch (err) {
    server.log.error(err);
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
