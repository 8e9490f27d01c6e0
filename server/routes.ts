import type { Express, Request, Response, NextFunction } from "express";
import multer, { MulterError } from "multer";
import { extractRequestSchema, type ExtractRequest } from "@shared/schema";
import type { DocumentStore, ResultStore } from "./documents";
import type { PreviewService } from "./preview";
import { DocumentNotFoundError, PipelineRegistry, runExtraction } from "./extraction";
import { extractLimiter, readLimiter, uploadLimiter } from "./rate-limit";
import { createBodyValidator, validatePdfFile } from "./middleware/validation";
import { jsonError, jsonNotFound, jsonSuccess, sendError } from "./utils/response-helpers";
import { createLogger } from "./logger";

const log = createLogger("routes");

export interface RouteDependencies {
  registry: PipelineRegistry;
  documents: DocumentStore;
  results: ResultStore;
  preview: PreviewService;
  /** Preview resolution; every pipeline maps its boxes into it. */
  dpi: number;
  pipelineTimeoutMs: number;
  maxUploadMb: number;
}

function createUpload(maxUploadMb: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: maxUploadMb * 1024 * 1024,
      files: 1,
    },
  });
}

// Error handling middleware for multer
function multerErrorHandler(maxUploadMb: number) {
  return (err: Error, _req: Request, res: Response, next: NextFunction) => {
    if (err instanceof MulterError) {
      if (err.code === "LIMIT_FILE_SIZE") {
        return jsonError(res, `File is too large. Maximum size is ${maxUploadMb}MB.`);
      }
      return jsonError(res, err.message);
    }
    if (err) {
      return jsonError(res, err.message);
    }
    next();
  };
}

/**
 * Abort signal tied to the client connection: fires when the socket closes
 * before the response has been written.
 */
function connectionSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

export function registerRoutes(app: Express, deps: RouteDependencies): void {
  const upload = createUpload(deps.maxUploadMb);

  app.get("/api/v1/health", (_req: Request, res: Response) => {
    jsonSuccess(res, {
      status: "ok",
      uptimeSeconds: Math.round(process.uptime()),
      pipelines: deps.registry.describe(),
    });
  });

  app.get("/api/v1/pipelines", (_req: Request, res: Response) => {
    jsonSuccess(res, {
      supportedPipelines: deps.registry.supported(),
      pipelines: deps.registry.describe(),
    });
  });

  app.post(
    "/api/v1/upload",
    uploadLimiter,
    upload.single("file"),
    multerErrorHandler(deps.maxUploadMb),
    validatePdfFile,
    async (req: Request, res: Response) => {
      const file = req.file;
      if (!file) {
        return jsonError(res, "No file provided");
      }

      try {
        const saved = await deps.documents.saveUpload(file.buffer, file.originalname);
        jsonSuccess(res, saved);
      } catch (error) {
        sendError(res, error, "Upload");
      }
    }
  );

  app.post(
    "/api/v1/extract",
    extractLimiter,
    createBodyValidator(extractRequestSchema),
    async (req: Request, res: Response) => {
      const { filename, pipelines }: ExtractRequest = req.body;
      const signal = connectionSignal(res);

      try {
        const document = await deps.documents.load(filename);
        if (!document) {
          throw new DocumentNotFoundError(filename);
        }

        const response = await runExtraction(document, pipelines, {
          registry: deps.registry,
          dpi: deps.dpi,
          timeoutMs: deps.pipelineTimeoutMs,
          signal,
        });

        if (signal.aborted) {
          log.info("Client disconnected before extraction finished", { filename });
          return;
        }

        const resultId = await deps.results.save(response);
        jsonSuccess(res, resultId ? { ...response, resultId } : response);
      } catch (error) {
        sendError(res, error, "Extraction");
      }
    }
  );

  app.get("/api/v1/preview/:filename/:pageIndex", readLimiter, async (req: Request, res: Response) => {
    try {
      const png = await deps.preview.getOrCreate(req.params.filename, req.params.pageIndex);
      res.type("png").set("Cache-Control", "private, max-age=3600").send(png);
    } catch (error) {
      sendError(res, error, "Preview");
    }
  });

  app.get("/api/v1/file/:filename", readLimiter, async (req: Request, res: Response) => {
    try {
      const document = await deps.documents.load(req.params.filename);
      if (!document) {
        throw new DocumentNotFoundError(req.params.filename);
      }
      res.type("application/pdf").send(Buffer.from(document.data));
    } catch (error) {
      sendError(res, error, "Download");
    }
  });

  app.get("/api/v1/results/:resultId", readLimiter, async (req: Request, res: Response) => {
    try {
      const result = await deps.results.load(req.params.resultId);
      if (!result) {
        return jsonNotFound(res, "Result");
      }
      jsonSuccess(res, result);
    } catch (error) {
      sendError(res, error, "Result lookup");
    }
  });
}
