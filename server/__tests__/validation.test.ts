import { describe, it, expect } from "vitest";
import express from "express";
import multer from "multer";
import request from "supertest";
import { z } from "zod";
import { extractRequestSchema } from "@shared/schema";
import { createBodyValidator, formatZodError, hasPdfHeader, validatePdfFile } from "../middleware/validation";

function createTestApp() {
  const app = express();
  app.use(express.json());

  app.post("/extract", createBodyValidator(extractRequestSchema), (req, res) => {
    res.json({ success: true, body: req.body });
  });

  app.post("/upload", multer({ storage: multer.memoryStorage() }).single("file"), validatePdfFile, (_req, res) => {
    res.json({ success: true });
  });

  return app;
}

describe("Validation Middleware", () => {
  describe("createBodyValidator", () => {
    it("should apply schema defaults to the body", async () => {
      const response = await request(createTestApp()).post("/extract").send({ filename: "a.pdf" });

      expect(response.status).toBe(200);
      expect(response.body.body).toEqual({ filename: "a.pdf", pipelines: ["structural"] });
    });

    it("should reject an empty filename with the field named", async () => {
      const response = await request(createTestApp()).post("/extract").send({ filename: "" });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({ success: false, message: "filename: filename is required" });
    });

    it("should reject pipelines that are not strings", async () => {
      const response = await request(createTestApp()).post("/extract").send({ filename: "a.pdf", pipelines: [1] });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("pipelines.0: Expected string, received number");
    });
  });

  describe("validatePdfFile", () => {
    it("should accept a PDF with the right header", async () => {
      const response = await request(createTestApp())
        .post("/upload")
        .attach("file", Buffer.from("%PDF-1.4"), { filename: "A.PDF", contentType: "application/pdf" });

      expect(response.status).toBe(200);
    });

    it("should reject a file without an extension", async () => {
      const response = await request(createTestApp())
        .post("/upload")
        .attach("file", Buffer.from("%PDF-1.4"), { filename: "noext", contentType: "application/pdf" });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe("Only PDF uploads are accepted");
    });
  });

  describe("helpers", () => {
    it("should check the PDF magic bytes", () => {
      expect(hasPdfHeader(Buffer.from("%PDF-2.0"))).toBe(true);
      expect(hasPdfHeader(Buffer.from("%PD"))).toBe(false);
      expect(hasPdfHeader(Buffer.from("<html>"))).toBe(false);
    });

    it("should join zod issues into one message", () => {
      const result = z.object({ a: z.number(), b: z.string() }).safeParse({ a: "x", b: 1 });
      if (result.success) throw new Error("expected failure");

      expect(formatZodError(result.error)).toBe(
        "a: Expected number, received string; b: Expected string, received number"
      );
    });
  });
});
