import sharp from 'sharp';
import { CHANNELS, RasterImage } from '../models/raster-image';

export interface ImageInfo {
  width: number;
  height: number;
  format?: string;
  hasAlpha: boolean;
}

export class ImageService {
  /**
   * Read dimensions and format without decoding pixels
   */
  async inspect(buffer: Buffer): Promise<ImageInfo> {
    const metadata = await sharp(buffer).metadata();
    return {
      width: metadata.width || 0,
      height: metadata.height || 0,
      format: metadata.format,
      hasAlpha: metadata.hasAlpha ?? false,
    };
  }

  /**
   * Decode any format sharp understands into an RGBA raster
   */
  async decode(buffer: Buffer): Promise<RasterImage> {
    const { data, info } = await sharp(buffer)
      .ensureAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    if (info.channels !== CHANNELS) {
      throw new Error(`Expected ${CHANNELS} channels after decoding, got ${info.channels}`);
    }

    // Copy so the raster owns its pixels
    return new RasterImage(info.width, info.height, new Uint8ClampedArray(data));
  }

  /**
   * Encode a raster as lossless PNG with alpha.
   * PNG has no 0xN form, so empty rasters become a single transparent pixel.
   */
  async encodePng(image: RasterImage): Promise<Buffer> {
    const source = image.isEmpty ? RasterImage.blank(1, 1) : image;
    return sharp(source.toBuffer(), {
      raw: {
        width: source.width,
        height: source.height,
        channels: CHANNELS,
      },
    })
      .png({
        compressionLevel: 9,  // Lossless either way; smallest output
        palette: false,
      })
      .toBuffer();
  }
}
