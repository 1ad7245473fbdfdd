import express from "express";
import { loadConfig } from "./config/env";
import { MODEL_TIERS } from "./config/models";
import { createLLMClient } from "./llm/client";
import { registerRoutes } from "./routes";
import { ScheduleOracle } from "./schedule/scheduleOracle";
import { MessageDeduplicator } from "./services/messageDeduplicator";
import { createStorage } from "./storage";
import { systemClock } from "./utils/civilTime";
import { logError } from "./utils/errorHandler";
import { logInfo, setLogLevel } from "./utils/logger";
import { createWahaGateway } from "./whatsapp/gatewayApi";
import { Whitelist } from "./whatsapp/whitelist";

function main(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  if (!config.groqApiKey) {
    console.warn("[Startup] GROQ_API_KEY not set; vision, text and context tiers will fail over");
  }
  if (!config.geminiApiKey) {
    console.warn("[Startup] GEMINI_API_KEY not set; fallback and matching tiers will fail");
  }

  const storage = createStorage(config.databaseUrl);
  const pipeline = {
    storage,
    oracle: ScheduleOracle.loadFromFile(config.schedulePath),
    llm: createLLMClient({
      groqApiKey: config.groqApiKey,
      geminiApiKey: config.geminiApiKey,
      timeoutMs: config.llmTimeoutMs,
    }),
    tiers: MODEL_TIERS,
    whitelist: new Whitelist(config.academicChannels),
    clock: systemClock,
  };

  const app = express();
  app.use(express.json({ limit: "25mb" }));

  const server = registerRoutes(app, {
    pipeline,
    gateway: createWahaGateway(config.waha),
    deduplicator: new MessageDeduplicator(storage),
  });

  server.listen(config.port, () => {
    logInfo(`[Startup] Listening on port ${config.port}`, { nodeEnv: config.nodeEnv, storage: config.databaseUrl ? "postgres" : "memory" });
  });
}

try {
  main();
} catch (err) {
  logError("Startup", err);
  process.exit(1);
}
