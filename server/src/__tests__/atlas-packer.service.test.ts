import { InvalidPaddingError } from '../errors/slicing.errors';
import { RasterImage } from '../models/raster-image';
import { mapSlices, SliceName } from '../models/slice.types';
import { AtlasPacker, SliceSource } from '../services/atlas-packer.service';
import { SliceExtractor } from '../services/slice-extractor.service';
import { SliceGeometry } from '../services/slice-geometry.service';
import { coordinateImage } from './helpers/raster.helper';

describe('AtlasPacker', () => {
  let packer: AtlasPacker;
  let extractor: SliceExtractor;

  beforeEach(() => {
    packer = new AtlasPacker();
    extractor = new SliceExtractor();
  });

  describe('pack', () => {
    const red = RasterImage.filled(100, 80, [255, 0, 0, 255]);
    const geometry = SliceGeometry.create(100, 80, 10, 8, 12, 9);

    it('should add four gutters of padding on each axis', () => {
      const atlas = packer.pack(extractor.extractAll(red, geometry), 2);

      expect(atlas.width).toBe((10 + 78 + 12) + 4 * 2);
      expect(atlas.height).toBe((8 + 63 + 9) + 4 * 2);
      expect(atlas.image.width).toBe(108);
      expect(atlas.image.height).toBe(88);
      expect(atlas.columnWidths).toEqual([10, 78, 12]);
      expect(atlas.rowHeights).toEqual([8, 63, 9]);
    });

    it('should lay frames out like the source image', () => {
      const atlas = packer.pack(extractor.extractAll(red, geometry), 2);

      expect(atlas.frames['top-left']).toEqual({ x: 2, y: 2, width: 10, height: 8 });
      expect(atlas.frames['center']).toEqual({ x: 14, y: 12, width: 78, height: 63 });
      expect(atlas.frames['bottom-right']).toEqual({ x: 94, y: 77, width: 12, height: 9 });
    });

    it('should leave gutters fully transparent', () => {
      const atlas = packer.pack(extractor.extractAll(red, geometry), 2);

      expect(atlas.image.pixelAt(0, 0)).toEqual([0, 0, 0, 0]);
      expect(atlas.image.pixelAt(1, 1)).toEqual([0, 0, 0, 0]);
      expect(atlas.image.pixelAt(12, 2)).toEqual([0, 0, 0, 0]);
      expect(atlas.image.pixelAt(107, 87)).toEqual([0, 0, 0, 0]);
      expect(atlas.image.pixelAt(2, 2)).toEqual([255, 0, 0, 255]);
      expect(atlas.image.pixelAt(14, 12)).toEqual([255, 0, 0, 255]);
    });

    it('should reproduce the source image when padding is zero', () => {
      const source = coordinateImage(20, 16);
      const sliced = SliceGeometry.create(20, 16, 3, 4, 5, 6);
      const atlas = packer.pack(extractor.extractAll(source, sliced), 0);

      expect([atlas.width, atlas.height]).toEqual([20, 16]);
      expect(atlas.image.toBuffer().equals(source.toBuffer())).toBe(true);
    });

    it('should produce identical bytes for identical input', () => {
      const source = coordinateImage(20, 16);
      const sliced = SliceGeometry.create(20, 16, 3, 4, 5, 6);
      const first = packer.pack(extractor.extractAll(source, sliced), 3);
      const second = packer.pack(extractor.extractAll(source, sliced), 3);

      expect(first.image.toBuffer().equals(second.image.toBuffer())).toBe(true);
    });

    it('should reject negative padding before reading any slice', () => {
      const get = jest.fn((_name: SliceName) => RasterImage.blank(1, 1));
      const slices: SliceSource = { get };

      expect(() => packer.pack(slices, -1)).toThrow(InvalidPaddingError);
      expect(get).not.toHaveBeenCalled();
    });

    it('should reject fractional padding', () => {
      expect(() => packer.pack(extractor.extractAll(red, geometry), 1.5)).toThrow(InvalidPaddingError);
    });
  });

  describe('layout', () => {
    it('should size columns and rows by their largest member', () => {
      const sizes = mapSlices(name => ({
        'top-left': { width: 2, height: 3 },
        'top-center': { width: 4, height: 1 },
        'top-right': { width: 1, height: 1 },
        'mid-left': { width: 5, height: 2 },
        'center': { width: 1, height: 1 },
        'mid-right': { width: 1, height: 4 },
        'bottom-left': { width: 1, height: 1 },
        'bottom-center': { width: 1, height: 6 },
        'bottom-right': { width: 3, height: 1 },
      }[name]));

      const layout = packer.layout(sizes, 1);

      expect(layout.columnWidths).toEqual([5, 4, 3]);
      expect(layout.rowHeights).toEqual([3, 4, 6]);
      expect(layout.width).toBe(16);
      expect(layout.height).toBe(17);
      expect(layout.frames['center']).toEqual({ x: 7, y: 5, width: 1, height: 1 });
      expect(layout.frames['bottom-right']).toEqual({ x: 12, y: 10, width: 3, height: 1 });
    });
  });
});
