import sharp from "sharp";

import type { ImageFormat } from "../types";

export type Dimensions = { width: number; height: number; format: ImageFormat };

/** Image decode collaborator. Both calls reject on undecodable input. */
export interface ImageDecoder {
  /** Reads the header only; pixel data is not decoded. */
  decodeDimensionsOnly(data: Buffer): Promise<Dimensions>;
  /** Decodes every pixel to prove the file is structurally intact. */
  decodeFull(data: Buffer): Promise<void>;
}

function toFormat(format: string | undefined): ImageFormat {
  if (format === "jpeg" || format === "png") return format;
  return "";
}

export class SharpImageDecoder implements ImageDecoder {
  async decodeDimensionsOnly(data: Buffer): Promise<Dimensions> {
    const meta = await sharp(data, { limitInputPixels: false }).metadata();
    if (!meta.width || !meta.height) {
      throw new Error("image header has no dimensions");
    }
    return { width: meta.width, height: meta.height, format: toFormat(meta.format) };
  }

  async decodeFull(data: Buffer): Promise<void> {
    await sharp(data, { failOn: "error", limitInputPixels: false }).raw().toBuffer();
  }
}
