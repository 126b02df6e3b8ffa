import sharp from "sharp";
import type { ComposeInput, CreativeCompositor } from "../providers/contracts";

const FOOTER_BAND_RATIO = 0.15;
const LOGO_WIDTH_RATIO = 0.12;
const MARGIN_RATIO = 0.03;

export function escapeXml(value: string) {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

export type FooterLayout = {
  bandTop: number;
  bandHeight: number;
  fontSize: number;
  baselines: number[];
};

export function footerLayout(width: number, height: number, lineCount: number): FooterLayout {
  const bandHeight = Math.max(Math.round(height * FOOTER_BAND_RATIO), 1);
  const bandTop = height - bandHeight;
  const slot = bandHeight / (lineCount + 1);
  const fontSize = Math.max(10, Math.min(Math.round(slot * 0.6), Math.round(width / 40)));
  const baselines = Array.from({ length: lineCount }, (_, index) => Math.round(bandTop + slot * (index + 1) + fontSize / 3));
  return { bandTop, bandHeight, fontSize, baselines };
}

export function footerSvg(width: number, height: number, lines: string[], accentColor?: string) {
  const layout = footerLayout(width, height, lines.length);
  const accent = accentColor
    ? `<rect x="0" y="${layout.bandTop}" width="${width}" height="4" fill="${escapeXml(accentColor)}"/>`
    : "";
  const text = lines
    .map(
      (line, index) =>
        `<text x="${Math.round(width / 2)}" y="${layout.baselines[index]}" font-family="Helvetica, Arial, sans-serif" font-size="${layout.fontSize}" fill="#FFFFFF" text-anchor="middle">${escapeXml(line)}</text>`
    )
    .join("");
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<rect x="0" y="${layout.bandTop}" width="${width}" height="${layout.bandHeight}" fill="#000000" fill-opacity="0.72"/>`,
    accent,
    text,
    "</svg>",
  ].join("");
}

/** Footer band with the legal lines plus the logo in the top-right corner. */
export class SharpCompositor implements CreativeCompositor {
  async compose(input: ComposeInput): Promise<Buffer> {
    const { width, height } = input;
    const logoSize = Math.max(Math.round(width * LOGO_WIDTH_RATIO), 1);
    const margin = Math.round(width * MARGIN_RATIO);

    const logo = await sharp(input.logo)
      .resize(logoSize, logoSize, { fit: "contain", background: { r: 0, g: 0, b: 0, alpha: 0 } })
      .png()
      .toBuffer();

    return sharp(input.design)
      .resize(width, height, { fit: "cover" })
      .composite([
        { input: Buffer.from(footerSvg(width, height, input.footerLines, input.accentColor)), top: 0, left: 0 },
        { input: logo, top: margin, left: Math.max(width - logoSize - margin, 0) },
      ])
      .png()
      .toBuffer();
  }
}
