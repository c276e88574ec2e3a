/* Layer 1: Backend Server Entry Point */
import { stopTracing } from "./config/otel"; // Bootstraps OpenTelemetry before loading instrumented modules
import Fastify from "fastify";
import cors from "@fastify/cors";
import { env } from "./config/env";
import { PROJECT_NAME } from "./config/constants";
import { chatRoutes, type ChatRouteOptions } from "./routes/chat";
import { healthRoutes, type HealthRouteOptions } from "./routes/health";
import { statsRoutes, type StatsRouteOptions } from "./routes/stats";

export type BuildOptions = ChatRouteOptions & HealthRouteOptions & StatsRouteOptions & { logger?: boolean };

export async function build(opts: BuildOptions = {}) {
  const app = Fastify({ logger: opts.logger ?? true });

  await app.register(cors, { origin: env.CORS_ORIGIN, credentials: true, exposedHeaders: ["x-request-id"] });

  // Telemetry handled by OpenTelemetry NodeSDK (HTTP/Fastify instrumentation)

  await healthRoutes(app, opts);
  await statsRoutes(app, opts);
  await chatRoutes(app, opts);

  return app;
}

async function start() {
  const app = await build();
  await app.listen({ port: env.PORT, host: "0.0.0.0" });
  app.log.info(`${PROJECT_NAME} listening on http://localhost:${env.PORT}`);

  const shutdown = () => {
    app
      .close()
      .then(stopTracing)
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        console.error(err);
        process.exit(1);
      });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

// Start server if run directly (not imported)
if (import.meta.url === `file://${process.argv[1]}`) {
  start().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
