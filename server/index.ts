// Validate environment variables before anything else
import { validateEnv } from "./config/env";
const env = validateEnv();

import path from "path";
import { createServer } from "http";
import { createApp } from "./app";
import { createDefaultRegistry } from "./engines";
import { DocumentStore, ResultStore } from "./documents";
import { PreviewService } from "./preview";
import { FileBlobStorage } from "./storage";
import { logger } from "./logger";

async function main(): Promise<void> {
  const storage = new FileBlobStorage(path.resolve(env.DATA_DIR));
  const documents = new DocumentStore(storage);

  const { registry, rasterizer } = createDefaultRegistry({
    ocrDpi: env.OCR_DPI,
    tesseract: {
      lang: env.OCR_LANG,
      langPath: env.OCR_LANG_PATH,
      cachePath: env.OCR_CACHE_PATH,
    },
  });
  await registry.initialize();

  const app = createApp(env, {
    registry,
    documents,
    results: new ResultStore(storage),
    preview: new PreviewService({ documents, storage, rasterizer, dpi: env.PREVIEW_DPI }),
    dpi: env.PREVIEW_DPI,
    pipelineTimeoutMs: env.PIPELINE_TIMEOUT_MS,
    maxUploadMb: env.MAX_UPLOAD_MB,
  });

  const httpServer = createServer(app);
  httpServer.listen(env.PORT, () => {
    logger.info("Server started", {
      port: env.PORT,
      env: env.NODE_ENV,
      dataDir: env.DATA_DIR,
      pipelines: registry.describe(),
    });
  });
}

main().catch((error: unknown) => {
  logger.error("Server failed to start", {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
