import "dotenv/config";
import express from "express";
import { createServer } from "http";
import {
  createQueryService,
  createSeededRandom,
  loadArchiveFromFile,
  loadConfig,
  MalformedDocumentError
} from "../archive";
import { createArchiveRouter } from "./routes";

async function startServer() {
  const config = loadConfig();
  if (!config.dataFile) {
    throw new Error("WEATHER_DATA_FILE must be set");
  }

  const loaded = await loadArchiveFromFile(config.dataFile);
  if (!loaded.ok) {
    throw new MalformedDocumentError(`Failed to load ${config.dataFile}: ${loaded.error}`);
  }
  console.log(`[server] Loaded ${loaded.loaded} record(s) from ${config.dataFile}`);

  const service = createQueryService(loaded.archive, {
    random: config.sampleSeed === undefined ? undefined : createSeededRandom(config.sampleSeed)
  });

  const app = express();
  const server = createServer(app);

  app.use("/api", createArchiveRouter(service));

  app.use((_req, res) => {
    res.status(404).json({ error: "NOT_FOUND" });
  });

  server.listen(config.port, () => {
    console.log(`Server running on http://localhost:${config.port}/`);
  });
}

startServer().catch((error: unknown) => {
  console.error("[server] failed to start:", error);
  process.exitCode = 1;
});
