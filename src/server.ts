import cors from "@fastify/cors";
import Fastify, { type FastifyInstance } from "fastify";
import { analyzeRoutes, type AnalyzeRouteDeps, type ErrorEnvelope } from "./routes/analyze";
import { healthRoutes } from "./routes/health";

export interface ServerOptions extends AnalyzeRouteDeps {
    logger?: boolean;
}

export async function buildServer(options: ServerOptions): Promise<FastifyInstance> {
    const fastify = Fastify({
        logger: options.logger ?? true,
    });

    await fastify.register(cors, {
        origin: true,
        credentials: true,
        methods: ["GET", "POST", "OPTIONS"],
        allowedHeaders: ["Content-Type", "Authorization"],
    });

    fastify.setErrorHandler(
        (error: Error & { statusCode?: number; code?: string }, _request, reply) => {
            const statusCode = error.statusCode ?? 500;
            const envelope: ErrorEnvelope = {
                ok: false,
                error: {
                    code: error.code ?? "INTERNAL_ERROR",
                    message: error.message,
                },
            };
            reply.code(statusCode).send(envelope);
        },
    );

    await fastify.register(healthRoutes);
    await fastify.register(analyzeRoutes(options));

    return fastify;
}
