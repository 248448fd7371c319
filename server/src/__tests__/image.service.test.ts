import sharp from 'sharp';
import { RasterImage } from '../models/raster-image';
import { ImageService } from '../services/image.service';
import { coordinateImage, solidPng } from './helpers/raster.helper';

describe('ImageService', () => {
  let service: ImageService;

  beforeEach(() => {
    service = new ImageService();
  });

  describe('inspect', () => {
    it('should report size and format without decoding', async () => {
      const info = await service.inspect(await solidPng(100, 80));

      expect(info).toEqual({ width: 100, height: 80, format: 'png', hasAlpha: true });
    });
  });

  describe('decode', () => {
    it('should decode a PNG into RGBA pixels', async () => {
      const image = await service.decode(await solidPng(4, 3));

      expect([image.width, image.height]).toEqual([4, 3]);
      expect(image.data.length).toBe(4 * 3 * 4);
      expect(image.pixelAt(3, 2)).toEqual([255, 0, 0, 255]);
    });

    it('should add an opaque alpha channel to RGB images', async () => {
      const rgb = await sharp({
        create: {
          width: 2,
          height: 2,
          channels: 3,
          background: { r: 0, g: 128, b: 255 },
        },
      })
        .png()
        .toBuffer();

      const image = await service.decode(rgb);

      expect(image.pixelAt(1, 1)).toEqual([0, 128, 255, 255]);
    });

    it('should keep transparency from the source', async () => {
      const translucent = await sharp({
        create: {
          width: 3,
          height: 3,
          channels: 4,
          background: { r: 0, g: 0, b: 255, alpha: 0 },
        },
      })
        .png()
        .toBuffer();

      const image = await service.decode(translucent);

      expect(image.pixelAt(0, 0)[3]).toBe(0);
    });

    it('should reject bytes that are not an image', async () => {
      await expect(service.decode(Buffer.from('definitely not an image'))).rejects.toThrow();
    });
  });

  describe('encodePng', () => {
    it('should encode losslessly', async () => {
      const original = coordinateImage(6, 5);
      const decoded = await service.decode(await service.encodePng(original));

      expect([decoded.width, decoded.height]).toEqual([6, 5]);
      expect(decoded.toBuffer().equals(original.toBuffer())).toBe(true);
    });

    it('should encode an empty raster as one transparent pixel', async () => {
      const png = await service.encodePng(new RasterImage(0, 12));
      const { data, info } = await sharp(png).raw().toBuffer({ resolveWithObject: true });

      expect([info.width, info.height, info.channels]).toEqual([1, 1, 4]);
      expect([...data]).toEqual([0, 0, 0, 0]);
    });

    it('should give identical bytes for identical pixels', async () => {
      const first = await service.encodePng(coordinateImage(8, 8));
      const second = await service.encodePng(coordinateImage(8, 8));

      expect(first.equals(second)).toBe(true);
    });
  });
});
