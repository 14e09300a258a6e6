/**
 * Image processor
 *
 * Decoding, measuring and downscaling of image bytes, backed by sharp.
 */

import sharp from 'sharp';

export type ImageFormat = 'jpeg' | 'png' | 'gif' | 'webp';

export const SUPPORTED_FORMATS: readonly ImageFormat[] = ['jpeg', 'png', 'gif', 'webp'];

const MIME_BY_FORMAT: Record<ImageFormat, string> = {
  jpeg: 'image/jpeg',
  png: 'image/png',
  gif: 'image/gif',
  webp: 'image/webp'
};

export interface Size {
  width: number;
  height: number;
}

export function isSupportedFormat(format: string | undefined): format is ImageFormat {
  return SUPPORTED_FORMATS.some((supported) => supported === format);
}

export function mimeTypeForFormat(format: ImageFormat): string {
  return MIME_BY_FORMAT[format];
}

/**
 * Sharp reports SVG, TIFF, HEIF and friends as well; those come back as
 * `undefined` format together with their size.
 */
export interface ProbeResult extends Size {
  format: ImageFormat | undefined;
  rawFormat: string | undefined;
}

export class ImageProcessor {
  /**
   * Read format and pixel size. Rejects when the bytes cannot be decoded.
   */
  async probe(data: Buffer): Promise<ProbeResult> {
    const metadata = await sharp(data).metadata();
    const rawFormat = metadata.format;
    return {
      width: metadata.width ?? 0,
      height: metadata.height ?? 0,
      format: isSupportedFormat(rawFormat) ? rawFormat : undefined,
      rawFormat
    };
  }

  /**
   * Pixel size, or `undefined` when the bytes are empty or undecodable.
   */
  async tryGetSize(data: Buffer): Promise<Size | undefined> {
    if (data.length === 0) {
      return undefined;
    }
    try {
      const { width, height } = await this.probe(data);
      return { width, height };
    } catch (err) {
      console.warn(`Unable to read image size: ${err instanceof Error ? err.message : String(err)}`);
      return undefined;
    }
  }

  /**
   * Scale so the longest side is `targetSize`, never enlarging, and encode
   * in the source format (`jpeg` when it is not a supported one).
   */
  async resize(data: Buffer, targetSize: number, quality: number): Promise<Buffer> {
    const { format } = await this.probe(data);
    const output = format ?? 'jpeg';

    const pipeline = sharp(data).resize({
      width: targetSize,
      height: targetSize,
      fit: 'inside',
      withoutEnlargement: true
    });

    switch (output) {
      case 'jpeg':
        return pipeline.jpeg({ quality }).toBuffer();
      case 'webp':
        return pipeline.webp({ quality }).toBuffer();
      case 'png':
        return pipeline.png().toBuffer();
      case 'gif':
        return pipeline.gif().toBuffer();
    }
  }
}
