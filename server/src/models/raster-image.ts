import { Rect } from './slice.types';

export const CHANNELS = 4;

/**
 * Tightly packed RGBA8 pixel buffer.
 * Rasters with zero width or height are valid and carry no pixels; they keep
 * their nominal size so a 0xN slice still reports its height.
 */
export class RasterImage {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8ClampedArray;

  constructor(width: number, height: number, data?: Uint8ClampedArray) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width < 0 || height < 0) {
      throw new RangeError(`Invalid raster size ${width}x${height}`);
    }
    const expected = width * height * CHANNELS;
    if (data && data.length !== expected) {
      throw new RangeError(`Pixel buffer has ${data.length} bytes, expected ${expected}`);
    }
    this.width = width;
    this.height = height;
    // Zero-filled buffer is fully transparent
    this.data = data ?? new Uint8ClampedArray(expected);
  }

  /**
   * Fully transparent raster
   */
  static blank(width: number, height: number): RasterImage {
    return new RasterImage(width, height);
  }

  /**
   * Raster filled with a single RGBA colour
   */
  static filled(width: number, height: number, rgba: [number, number, number, number]): RasterImage {
    const image = new RasterImage(width, height);
    for (let i = 0; i < image.data.length; i += CHANNELS) {
      image.data[i] = rgba[0];
      image.data[i + 1] = rgba[1];
      image.data[i + 2] = rgba[2];
      image.data[i + 3] = rgba[3];
    }
    return image;
  }

  get isEmpty(): boolean {
    return this.width === 0 || this.height === 0;
  }

  /**
   * Copy a rectangle into a new raster. The result shares no memory with this one.
   */
  crop(rect: Rect): RasterImage {
    const { x, y, width, height } = rect;
    if (
      x < 0 || y < 0 || width < 0 || height < 0 ||
      x + width > this.width || y + height > this.height
    ) {
      throw new RangeError(
        `Region (${x}, ${y}, ${width}, ${height}) lies outside ${this.width}x${this.height} image`
      );
    }
    const out = new RasterImage(width, height);
    const rowBytes = width * CHANNELS;
    for (let row = 0; row < height; row++) {
      const start = ((y + row) * this.width + x) * CHANNELS;
      out.data.set(this.data.subarray(start, start + rowBytes), row * rowBytes);
    }
    return out;
  }

  /**
   * Copy every pixel of `source` onto this raster at (x, y), replacing what is there.
   * Mutates this raster; only used on canvases the caller just created.
   */
  blit(source: RasterImage, x: number, y: number): void {
    if (source.isEmpty) return;
    if (x < 0 || y < 0 || x + source.width > this.width || y + source.height > this.height) {
      throw new RangeError(
        `Cannot place ${source.width}x${source.height} image at (${x}, ${y}) on ${this.width}x${this.height} canvas`
      );
    }
    const rowBytes = source.width * CHANNELS;
    for (let row = 0; row < source.height; row++) {
      const from = row * rowBytes;
      const to = ((y + row) * this.width + x) * CHANNELS;
      this.data.set(source.data.subarray(from, from + rowBytes), to);
    }
  }

  /**
   * The pixel bytes as a Buffer view; no copy is made
   */
  toBuffer(): Buffer {
    return Buffer.from(this.data.buffer, this.data.byteOffset, this.data.byteLength);
  }

  /**
   * RGBA tuple at (x, y)
   */
  pixelAt(x: number, y: number): [number, number, number, number] {
    if (x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) outside ${this.width}x${this.height} image`);
    }
    const i = (y * this.width + x) * CHANNELS;
    return [this.data[i], this.data[i + 1], this.data[i + 2], this.data[i + 3]];
  }
}
