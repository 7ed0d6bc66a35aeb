import dotenv from "dotenv";
import { buildServer } from "./api/server.js";
import { ConfigurationError } from "./core/errors.js";
import { createGatewayContext, type GatewayContext } from "./core/services/gateway-context.js";

dotenv.config({ path: [".env.local", ".env"] });

function start(): void {
  let context: GatewayContext;
  try {
    context = createGatewayContext();
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(`Configuration error: ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const { port, host } = context.settings;
  const app = buildServer(context);

  let isShuttingDown = false;

  async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
      return;
    }
    isShuttingDown = true;
    console.log(`\n${signal} received. Shutting down gracefully...`);
    try {
      await app.close();
      console.log("Server closed. Goodbye.");
    } catch (error) {
      console.error("Error during shutdown:", error);
      process.exitCode = 1;
    }
  }

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

  app
    .listen({ port, host })
    .then(() => {
      console.log(`DevUI gateway listening on http://${host}:${port}`);
    })
    .catch((error: unknown) => {
      console.error("Failed to start DevUI gateway:", error instanceof Error ? error.message : error);
      process.exitCode = 1;
      return app.close();
    })
    .catch((error: unknown) => {
      console.error("Error during shutdown:", error);
    });
}

start();
