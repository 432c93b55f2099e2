/**
 * Icon normalization.
 *
 * Converts raster images into the .ico container the packaging tool embeds.
 * The converted icon always lands at the same temp path; builds are
 * single-flight, so last write wins.
 */

import { readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { extname, join } from 'node:path';
import bmp from 'bmp-js';
import sharp from 'sharp';
import toIco from 'to-ico';
import { atomicWriteFile } from './fs.js';
import { DEFAULT_ICON_FILE_NAME } from './branding.js';

/**
 * Error thrown when an image cannot be decoded, encoded or written.
 */
export class ConversionError extends Error {
  constructor(
    message: string,
    public readonly sourcePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'ConversionError';
  }
}

export interface IconNormalizerOptions {
  /** Directory for the generated icon (defaults to os.tmpdir()) */
  tempDir?: string | null;
  /** Fixed file name of the generated icon */
  fileName?: string;
  /** Edge length in pixels */
  size?: number;
}

export type IconNormalizer = (imagePath: string) => Promise<string>;

const ICO_EXTENSION = '.ico';

export const CANONICAL_ICON_SIZE = 256;

export function isIcoPath(imagePath: string): boolean {
  return extname(imagePath).toLowerCase() === ICO_EXTENSION;
}

export interface RgbaImage {
  width: number;
  height: number;
  data: Buffer;
}

// "BM"
function isBmp(content: Buffer): boolean {
  return content.length > 2 && content[0] === 0x42 && content[1] === 0x4d;
}

/**
 * Decodes a Windows bitmap into RGBA pixels. Bitmaps without an alpha
 * channel come out opaque.
 */
export function decodeBmp(content: Buffer): RgbaImage {
  const image = bmp.decode(content);
  const data = Buffer.alloc(image.width * image.height * 4);
  for (let i = 0; i < data.length; i += 4) {
    data[i] = image.data[i + 3];
    data[i + 1] = image.data[i + 2];
    data[i + 2] = image.data[i + 1];
    data[i + 3] = image.is_with_alpha ? image.data[i] : 0xff;
  }
  return { width: image.width, height: image.height, data };
}

// sharp has no BMP decoder
async function openImage(imagePath: string): Promise<sharp.Sharp> {
  const content = await readFile(imagePath);
  if (isBmp(content)) {
    const { width, height, data } = decodeBmp(content);
    return sharp(data, { raw: { width, height, channels: 4 } });
  }
  return sharp(content);
}

/**
 * Returns the path where converted icons are written.
 */
export function iconOutputPath(options: IconNormalizerOptions = {}): string {
  return join(options.tempDir ?? tmpdir(), options.fileName ?? DEFAULT_ICON_FILE_NAME);
}

/**
 * Resolves an image into an .ico file usable by the packaging tool.
 *
 * .ico inputs are returned unchanged without touching the file system.
 *
 * @param imagePath - Source image (png, jpg, bmp, webp, gif, tiff or ico)
 * @returns Path of an .ico file
 * @throws {ConversionError} If decoding, encoding or writing fails
 */
export async function normalizeIcon(imagePath: string, options: IconNormalizerOptions = {}): Promise<string> {
  if (isIcoPath(imagePath)) {
    return imagePath;
  }

  const size = options.size ?? CANONICAL_ICON_SIZE;
  const outputPath = iconOutputPath(options);

  try {
    const image = await openImage(imagePath);
    const png = await image
      .resize(size, size, { fit: 'contain', background: { r: 0, g: 0, b: 0, alpha: 0 } })
      .png()
      .toBuffer();
    const ico = await toIco([png]);
    await atomicWriteFile(outputPath, ico);
  } catch (error) {
    throw new ConversionError(
      `Icon conversion failed for ${imagePath}: ${error instanceof Error ? error.message : String(error)}`,
      imagePath,
      error instanceof Error ? error : undefined
    );
  }

  return outputPath;
}

/**
 * Binds normalizeIcon to fixed options.
 */
export function createIconNormalizer(options: IconNormalizerOptions = {}): IconNormalizer {
  return (imagePath) => normalizeIcon(imagePath, options);
}
