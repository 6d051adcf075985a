import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { getSearchCredentials } from "./env";
import { ConfigurationError } from "./errors";
import { createLogger } from "./logger";
import { createServer, SERVER_NAME, SERVER_VERSION } from "./server";

const log = createLogger("main");

function reportCredentials() {
  try {
    const { cx } = getSearchCredentials();
    log.info(`Using CSE ID: ${cx.slice(0, 5)}...`);
  } catch (err) {
    if (!(err instanceof ConfigurationError)) throw err;
    log.warn(`${err.message}; the search tool will fail until it is set`);
  }
}

async function main() {
  const server = createServer();
  const transport = new StdioServerTransport();

  const shutdown = (signal: string) => {
    log.info(`${signal} received, shutting down`);
    server
      .close()
      .then(() => process.exit(0))
      .catch((e) => {
        log.error("Error while closing:", e);
        process.exit(1);
      });
  };
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.connect(transport);
  log.info(`${SERVER_NAME} v${SERVER_VERSION} running on stdio`);
  reportCredentials();
}

main().catch((e) => {
  log.error("Fatal error:", e instanceof Error ? e.message : e);
  process.exit(1);
});
