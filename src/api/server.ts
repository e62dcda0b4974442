import { fastify } from "fastify";
import routes from "./routes.js";
import { loadConfig, type Config } from "../config.js";

export function buildApp(config: Config = loadConfig()) {
  const app = fastify({
    logger: {
      level: config.LOG_LEVEL,
    },
  });

  app.register(routes);

  return app;
}

export async function startServer(config: Config = loadConfig()) {
  const app = buildApp(config);

  try {
    await app.listen({ port: config.PORT, host: config.HOST });
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }

  return app;
}
