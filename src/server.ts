import config from "./config.js";
import { buildServer } from "./app.js";

const server = await buildServer({
  config,
  ui: process.argv.includes("--dev") ? "dev" : "static",
});

process.on("uncaughtException", (err) => {
  server.log.fatal({ msg: "Uncaught exception", err });
  throw err;
});

process.on("unhandledRejection", (reason) => {
  const err = new Error(`Unhandled rejection. Reason: ${reason}`);
  server.log.error({ msg: "Unhandled rejection", err });
});

try {
  await server.listen({ host: config.HOST, port: config.PORT });
} catch (err) {
  server.log.error(err);
  process.exit(1);
}
