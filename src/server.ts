import { createApp } from "./app";
import { loadEnv } from "./config/env";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger, services } = createApp(env);

  app.listen(env.port, () => {
    logger.info("Server started", { port: env.port });
    logger.info("LLM model", {
      model: services.llmClient.getModelName(),
      configured: services.llmClient.isConfigured(),
    });
    if (!services.llmClient.isConfigured()) {
      logger.warn("GEMINI_API_KEY is not set, deterministic fallbacks will be used");
    }
    logger.info("Candidate store", {
      filePath: services.candidateStore.getFilePath(),
      saveCandidates: env.saveCandidates,
    });
  });
}

bootstrap().catch((error: unknown) => {
  process.stderr.write(`Failed to start server: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
});
