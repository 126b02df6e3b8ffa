import { config as loadDotenv } from "dotenv";
import { resolve } from "node:path";
import { buildApp } from "./app";

loadDotenv({ path: resolve(__dirname, "../../../.env") });

async function start() {
  const app = buildApp({ logger: { level: process.env.LOG_LEVEL ?? "info" } });

  const port = Number(process.env.PORT ?? 3001);
  const host = "0.0.0.0";

  await app.listen({ port, host });
}

start().catch((err) => {
  console.error(err);
  process.exit(1);
});
