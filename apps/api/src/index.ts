import dotenv from "dotenv";
import path from "path";
import { shutdownTracing, startTracing } from "./observability/tracing";

// Load .env for local dev; deployed environments inject variables directly
dotenv.config({ path: path.resolve(__dirname, "..", "..", "..", ".env") });

async function main() {
  startTracing();
  const { loadConfig } = await import("./config");
  const { buildApp } = await import("./app");
  const config = loadConfig();
  const app = await buildApp({ logger: true, config });
  const { port, host } = config.server;

  const SHUTDOWN_TIMEOUT_MS = Number(process.env.SHUTDOWN_TIMEOUT_MS) || 15_000;
  let isShuttingDown = false;

  const shutdown = async (signal: string) => {
    if (isShuttingDown) return;
    isShuttingDown = true;
    app.log.info(`Received ${signal}, shutting down gracefully (timeout ${SHUTDOWN_TIMEOUT_MS}ms)`);

    const forceExit = setTimeout(() => {
      app.log.error("Graceful shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);
    forceExit.unref();

    try {
      await app.close();
      await shutdownTracing();
      clearTimeout(forceExit);
      app.log.info("Graceful shutdown complete");
      process.exit(0);
    } catch (err) {
      clearTimeout(forceExit);
      app.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  try {
    await app.listen({ port, host });
    app.log.info(`API listening on ${host}:${port}`);
  } catch (err) {
    app.log.error({ err }, "API failed to listen");
    await shutdownTracing();
    process.exit(1);
  }
}

main().catch(async (err: unknown) => {
  // Configuration errors land here before the Fastify logger exists.
  const { errorMessage, logError } = await import("./logger");
  logError("API failed to start", { error: errorMessage(err) });
  await shutdownTracing();
  process.exit(1);
});
