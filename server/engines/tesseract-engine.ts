import type { OcrEngine, OcrPageResult, OcrSession, RasterImage } from "../extraction/types";
import { loadTesseract, resolveLanguageData, type TesseractModule } from "./loaders";
import { flattenWords } from "./tesseract-words";
import { createLogger } from "../logger";

const log = createLogger("tesseract");

type Worker = Awaited<ReturnType<TesseractModule["createWorker"]>>;

export interface TesseractEngineOptions {
  lang: string;
  /** Directory holding `<lang>.traineddata.gz`; defaults to the installed language package. */
  langPath?: string;
  /** Where tesseract.js keeps its unpacked traineddata. */
  cachePath?: string;
}

class TesseractSession implements OcrSession {
  constructor(private readonly worker: Worker) {}

  async recognize(image: RasterImage): Promise<OcrPageResult> {
    const { data } = await this.worker.recognize(image.png, {}, { text: true, blocks: true });
    return {
      tokens: flattenWords(data.blocks),
      fullText: data.text ?? "",
    };
  }

  async close(): Promise<void> {
    await this.worker.terminate();
  }
}

export class TesseractEngine implements OcrEngine {
  readonly name = "tesseract.js";

  constructor(private readonly options: TesseractEngineOptions) {}

  private languageDir(): string {
    return this.options.langPath ?? resolveLanguageData(this.options.lang);
  }

  async ensureAvailable(): Promise<void> {
    await loadTesseract();
    this.languageDir();
  }

  async open(): Promise<OcrSession> {
    const { createWorker } = await loadTesseract();
    const { lang, cachePath } = this.options;
    const langPath = this.languageDir();

    const worker = await createWorker(lang, undefined, {
      langPath,
      ...(cachePath ? { cachePath } : {}),
    });
    log.debug("OCR worker started", { lang, langPath });

    return new TesseractSession(worker);
  }
}
