import { describe, expect, it } from "vitest";
import sharp from "sharp";
import {
  computeHistogram,
  computeOtsuThreshold,
  toGrayRaw,
  transformImage,
} from "../../src/receipts/imageTransform";
import { PREPROCESS_MODES } from "../../src/receipts/preprocessModes";

const WIDTH = 16;
const HEIGHT = 8;

// Left half black, right half white.
async function splitImage(): Promise<Buffer> {
  const data = Buffer.alloc(WIDTH * HEIGHT * 3);
  for (let y = 0; y < HEIGHT; y++) {
    for (let x = 0; x < WIDTH; x++) {
      const v = x < WIDTH / 2 ? 0 : 255;
      data.fill(v, (y * WIDTH + x) * 3, (y * WIDTH + x) * 3 + 3);
    }
  }
  return sharp(data, { raw: { width: WIDTH, height: HEIGHT, channels: 3 } }).png().toBuffer();
}

async function decodeGray(png: Buffer) {
  return toGrayRaw(sharp(png));
}

describe("computeOtsuThreshold", () => {
  it("splits a two-level histogram at the lower level", () => {
    const histogram = new Array<number>(256).fill(0);
    histogram[10] = 50;
    histogram[200] = 50;
    expect(computeOtsuThreshold(histogram)).toBe(10);
  });

  it("defaults to mid-grey for an empty histogram", () => {
    expect(computeOtsuThreshold(new Array<number>(256).fill(0))).toBe(127);
  });
});

describe("computeHistogram", () => {
  it("counts pixel values", () => {
    const histogram = computeHistogram(Uint8Array.from([0, 0, 255]));
    expect(histogram).toHaveLength(256);
    expect(histogram[0]).toBe(2);
    expect(histogram[255]).toBe(1);
  });
});

describe("transformImage", () => {
  it.each(PREPROCESS_MODES)("emits a PNG of the same size for %s", async (mode) => {
    const out = await transformImage(await splitImage(), mode);
    const meta = await sharp(out).metadata();
    expect(meta.format).toBe("png");
    expect(meta.width).toBe(WIDTH);
    expect(meta.height).toBe(HEIGHT);
  });

  it("reduces colour input to one grey channel", async () => {
    const gray = await toGrayRaw(sharp(await splitImage()).grayscale());
    expect(gray.data).toHaveLength(WIDTH * HEIGHT);
  });

  it("binarizes with otsu", async () => {
    const { data, width } = await decodeGray(await transformImage(await splitImage(), "otsu"));
    expect([...data].every((v) => v === 0 || v === 255)).toBe(true);
    expect(data[0]).toBe(0);
    expect(data[width - 1]).toBe(255);
  });

  it("binarizes with the adaptive threshold", async () => {
    const { data } = await decodeGray(await transformImage(await splitImage(), "adaptive"));
    expect([...data].every((v) => v === 0 || v === 255)).toBe(true);
  });
});
