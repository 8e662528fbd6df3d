import sharp from 'sharp';

const RIGHT_MARGIN = 30;
const BOTTOM_MARGIN = 80;
const STROKE_WIDTH = 8;

export interface SlotBadgeOptions {
  fontFamily: string;
  fontSize: number;
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/** Overlay with the slot number in the bottom-right corner, white on a black outline. */
export function buildSlotSvg(width: number, height: number, slot: string, options: SlotBadgeOptions): string {
  const x = width - RIGHT_MARGIN;
  const y = height - BOTTOM_MARGIN;
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}">`,
    `<text x="${x}" y="${y}" text-anchor="end" font-family="${escapeXml(options.fontFamily)}"`,
    ` font-size="${options.fontSize}" font-weight="bold" font-style="italic"`,
    ` fill="white" stroke="black" stroke-width="${STROKE_WIDTH}" paint-order="stroke">`,
    escapeXml(slot),
    '</text></svg>',
  ].join('');
}

export async function addSlotNumber(
  inputPath: string,
  slot: string,
  outputPath: string,
  options: SlotBadgeOptions,
): Promise<void> {
  const image = sharp(inputPath);
  const { width, height } = await image.metadata();
  if (!width || !height) {
    throw new Error(`Could not read image dimensions: ${inputPath}`);
  }
  const overlay = Buffer.from(buildSlotSvg(width, height, slot, options));
  await image.composite([{ input: overlay, top: 0, left: 0 }]).png().toFile(outputPath);
}
