import { resolve } from "node:path";
import { randomUUID } from "node:crypto";
import Fastify, { FastifyServerOptions } from "fastify";
import FastifyFormBody from "@fastify/formbody";
import FastifyStatic from "@fastify/static";
import FastifyVite from "@fastify/vite";
import { serializerCompiler, validatorCompiler } from "fastify-zod-openapi";
import defaultConfig, { type Config } from "./config.js";
import errorHandlerPlugin from "./plugins/errorHandler.js";
import analyzeRoutes from "./routes/analyze.js";

export type BuildServerOptions = {
  config?: Config;
  logger?: FastifyServerOptions["logger"];
  // "dev" serves the client through Vite, "static" serves dist/ui, "none" skips it
  ui?: "dev" | "static" | "none";
};

export function joinUrl(...parts: string[]) {
  return `/${parts.join("/")}`.replace(/\/{2,}/g, "/").replace(/(.)\/$/, "$1");
}

export async function buildServer({
  config = defaultConfig,
  logger = { level: config.LOG_LEVEL },
  ui = "static",
}: BuildServerOptions = {}) {
  const server = Fastify({
    logger,
    genReqId: () => randomUUID().toString(),
    trustProxy: true,
  });

  server.setValidatorCompiler(validatorCompiler);
  server.setSerializerCompiler(serializerCompiler);
  await server.register(errorHandlerPlugin);
  await server.register(FastifyFormBody);

  if (ui === "dev") {
    await server.register(FastifyVite, {
      root: resolve(import.meta.dirname, "../"),
      dev: true,
      spa: true,
      prefix: config.BASE_URL,
      distDir: resolve(import.meta.dirname, "../dist/ui"),
    });
    server.get(config.BASE_URL, (_request, reply) => {
      return reply.html();
    });
    await server.vite.ready();
  } else if (ui === "static") {
    await server.register(FastifyStatic, {
      root: resolve(import.meta.dirname, "../dist/ui/"),
      prefix: joinUrl(config.BASE_URL, "/"),
    });
  }

  server.get(joinUrl(config.BASE_URL, "api/v1/pingz"), (_request, reply) => {
    return reply.send("OK");
  });

  const routeOptions = {
    defaultBucketCount: config.HISTOGRAM_BUCKETS,
    maxInputLength: config.MAX_INPUT_LENGTH,
  };
  await server.register(analyzeRoutes, {
    ...routeOptions,
    prefix: joinUrl(config.BASE_URL, "api/v1"),
  });
  // Form posts from the original page went straight to /analyze
  await server.register(analyzeRoutes, {
    ...routeOptions,
    prefix: joinUrl(config.BASE_URL),
  });

  if (joinUrl(config.BASE_URL) !== "/") {
    server.get("/", {}, async (_request, reply) => {
      return reply.redirect(joinUrl(config.BASE_URL));
    });
  }
  return server;
}
