import { describe, it, expect, afterEach } from "vitest";
import { AffineMatrix, installCanvasGlobals } from "../engines/polyfills";

describe("AffineMatrix", () => {
  it("should compose transforms in pdfjs order", () => {
    const flipped = new AffineMatrix([1, 0, 0, -1, 0, 792]).multiply(new AffineMatrix([12, 0, 0, 12, 72, 700]));

    expect([flipped.a, flipped.b, flipped.c, flipped.d, flipped.e, flipped.f]).toEqual([12, 0, 0, -12, 72, 92]);
  });

  it("should invert to the identity", () => {
    const matrix = new AffineMatrix([2, 0, 0, 4, 10, 20]);
    const identity = matrix.multiply(matrix.inverse());

    expect(identity.isIdentity).toBe(true);
    expect(matrix.translate(1, 1).transformPoint({ x: 0, y: 0 })).toEqual({ x: 12, y: 24, z: 0, w: 1 });
  });
});

describe("installCanvasGlobals", () => {
  const installed: string[] = [];

  afterEach(() => {
    installed.splice(0).forEach((name) => Reflect.deleteProperty(globalThis, name));
  });

  it("should only define globals the runtime lacks", () => {
    class FakeMatrix {}
    class FakePath {}
    class FakeImageData {}
    const hadImageData = Reflect.has(globalThis, "ImageData");
    const canvas = { DOMMatrix: FakeMatrix, Path2D: FakePath, ImageData: FakeImageData };
    Reflect.set(globalThis, "Path2D", FakePath);
    installed.push("Path2D");

    const names = installCanvasGlobals(canvas);
    installed.push(...names);

    expect(names).not.toContain("Path2D");
    expect(names.includes("ImageData")).toBe(!hadImageData);
    expect(Reflect.get(globalThis, "Path2D")).toBe(FakePath);
  });
});
