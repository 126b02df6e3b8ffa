import sharp from "sharp";

/** Re-encodes `image` as a PNG of exactly width × height, cropping to cover. */
export async function ensureSize(image: Buffer, width: number, height: number): Promise<Buffer> {
  return sharp(image).resize(width, height, { fit: "cover", position: "centre" }).png().toBuffer();
}
