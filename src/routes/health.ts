import type { FastifyInstance } from "fastify";

export async function healthRoutes(fastify: FastifyInstance): Promise<void> {
    fastify.get("/", async () => {
        return { message: "URL analyzer service is running" };
    });

    fastify.get("/health", async () => {
        return { status: "healthy" };
    });
}
