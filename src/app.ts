import fastify, { type FastifyError, type FastifyInstance } from "fastify";
import { ApiError, InternalError } from "./errors";
import { registerRoutes, type RouteDeps } from "./routes";

export interface AppOptions extends RouteDeps {
  logLevel?: string;
}

/**
 * Build the webhook server
 */
export async function buildApp(options: AppOptions): Promise<FastifyInstance> {
  const app = fastify({
    logger: { level: options.logLevel ?? process.env.LOG_LEVEL ?? "info" },
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    if (error instanceof ApiError) {
      return reply.status(error.statusCode).send(error.toJSON());
    }

    // Body parsing and other framework errors keep their status
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: { code: error.code, message: error.message },
      });
    }

    request.log.error({ err: error }, "Unhandled error");
    return reply.status(500).send(new InternalError().toJSON());
  });

  await registerRoutes(app, options);

  return app;
}
