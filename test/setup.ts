import "@testing-library/jest-dom/vitest";
import { afterEach } from "vitest";

// Keep test output readable: only errors reach the console
process.env.LOG_LEVEL ??= "error";
process.env.NODE_ENV ??= "test";

if (typeof window !== "undefined") {
  const { cleanup } = await import("@testing-library/react");
  afterEach(() => cleanup());
}
