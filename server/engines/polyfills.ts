/**
 * Browser globals pdfjs-dist expects in Node.js.
 *
 * Must run BEFORE pdfjs-dist is imported; loaders.ts takes care of that.
 */

/**
 * The constructors @napi-rs/canvas exports for the browser globals.
 */
export interface CanvasGlobals {
  DOMMatrix: unknown;
  Path2D: unknown;
  ImageData: unknown;
}

function define(name: string, value: unknown): boolean {
  if (Reflect.has(globalThis, name)) return false;
  Reflect.set(globalThis, name, value);
  return true;
}

/**
 * Install DOMMatrix, Path2D and ImageData from @napi-rs/canvas where the
 * runtime lacks them. Returns the names that were installed.
 */
export function installCanvasGlobals(canvas: CanvasGlobals): string[] {
  const candidates: Array<[string, unknown]> = [
    ["DOMMatrix", canvas.DOMMatrix],
    ["Path2D", canvas.Path2D],
    ["ImageData", canvas.ImageData],
  ];

  return candidates.filter(([name, value]) => define(name, value)).map(([name]) => name);
}

/**
 * 2D affine matrix, enough for pdfjs text extraction when no canvas
 * library is installed.
 */
export class AffineMatrix {
  a = 1;
  b = 0;
  c = 0;
  d = 1;
  e = 0;
  f = 0;
  readonly is2D = true;

  constructor(init?: number[]) {
    if (Array.isArray(init) && init.length === 6) {
      [this.a, this.b, this.c, this.d, this.e, this.f] = init;
    }
  }

  get isIdentity(): boolean {
    return this.a === 1 && this.b === 0 && this.c === 0 && this.d === 1 && this.e === 0 && this.f === 0;
  }

  multiply(other: AffineMatrix): AffineMatrix {
    return new AffineMatrix([
      this.a * other.a + this.c * other.b,
      this.b * other.a + this.d * other.b,
      this.a * other.c + this.c * other.d,
      this.b * other.c + this.d * other.d,
      this.a * other.e + this.c * other.f + this.e,
      this.b * other.e + this.d * other.f + this.f,
    ]);
  }

  translate(tx: number, ty: number): AffineMatrix {
    return this.multiply(new AffineMatrix([1, 0, 0, 1, tx, ty]));
  }

  scale(sx: number, sy = sx): AffineMatrix {
    return this.multiply(new AffineMatrix([sx, 0, 0, sy, 0, 0]));
  }

  inverse(): AffineMatrix {
    const det = this.a * this.d - this.b * this.c;
    if (det === 0) {
      return new AffineMatrix([NaN, NaN, NaN, NaN, NaN, NaN]);
    }
    return new AffineMatrix([
      this.d / det,
      -this.b / det,
      -this.c / det,
      this.a / det,
      (this.c * this.f - this.d * this.e) / det,
      (this.b * this.e - this.a * this.f) / det,
    ]);
  }

  transformPoint(point: { x: number; y: number }): { x: number; y: number; z: number; w: number } {
    return {
      x: this.a * point.x + this.c * point.y + this.e,
      y: this.b * point.x + this.d * point.y + this.f,
      z: 0,
      w: 1,
    };
  }
}

export function installMatrixFallback(): boolean {
  return define("DOMMatrix", AffineMatrix);
}
