import rateLimit from "express-rate-limit";

/**
 * Rate limiting for API endpoints, tiered by how much work a request costs.
 */

// Uploads - 30 requests per 15 minutes per IP
export const uploadLimiter = rateLimit({
  windowMs: 15 * 60 * 1000, // 15 minutes
  max: 30,
  message: {
    success: false,
    message: "Too many uploads. Please wait before trying again.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

// Extraction runs parsers and OCR over whole documents
// 20 requests per 15 minutes per IP
export const extractLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 20,
  message: {
    success: false,
    message: "Too many extraction requests. Please wait before trying again.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});

// Previews, file downloads, stored results - one request per page viewed
// 300 requests per 15 minutes per IP
export const readLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 300,
  message: {
    success: false,
    message: "Too many requests. Please try again later.",
  },
  standardHeaders: true,
  legacyHeaders: false,
});
