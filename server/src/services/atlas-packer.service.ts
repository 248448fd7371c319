import { InvalidPaddingError } from '../errors/slicing.errors';
import { RasterImage } from '../models/raster-image';
import { mapSlices, Rect, SLICE_NAMES, SliceName } from '../models/slice.types';

/**
 * Anything that hands out slice images by name (a SliceSet, a plain lookup)
 */
export interface SliceSource {
  get(name: SliceName): RasterImage;
}

export interface AtlasLayout {
  columnWidths: number[];
  rowHeights: number[];
  width: number;
  height: number;
  frames: Record<SliceName, Rect>;
}

export interface PackedAtlas extends AtlasLayout {
  image: RasterImage;
  padding: number;
}

const GRID = 3;

export class AtlasPacker {
  /**
   * Compute cell sizes and frame positions without touching pixels.
   * Columns take the widest slice in them and rows the tallest; `padding`
   * separates cells and frames the outer border, so each axis has four gutters.
   */
  layout(sizes: Record<SliceName, { width: number; height: number }>, padding: number): AtlasLayout {
    this.assertPadding(padding);

    const columnWidths = new Array<number>(GRID).fill(0);
    const rowHeights = new Array<number>(GRID).fill(0);

    SLICE_NAMES.forEach((name, index) => {
      const row = Math.floor(index / GRID);
      const col = index % GRID;
      columnWidths[col] = Math.max(columnWidths[col], sizes[name].width);
      rowHeights[row] = Math.max(rowHeights[row], sizes[name].height);
    });

    const columnOffsets = this.offsets(columnWidths, padding);
    const rowOffsets = this.offsets(rowHeights, padding);

    const frames = mapSlices((name, index) => ({
      x: columnOffsets[index % GRID],
      y: rowOffsets[Math.floor(index / GRID)],
      width: sizes[name].width,
      height: sizes[name].height,
    }));

    return {
      columnWidths,
      rowHeights,
      width: this.sum(columnWidths) + (GRID + 1) * padding,
      height: this.sum(rowHeights) + (GRID + 1) * padding,
      frames,
    };
  }

  /**
   * Pack all nine slices into one transparent canvas laid out like the source.
   * Same slices and padding always give byte-identical pixels.
   */
  pack(slices: SliceSource, padding: number): PackedAtlas {
    this.assertPadding(padding);

    const images = mapSlices(name => slices.get(name));

    const layout = this.layout(images, padding);
    const image = RasterImage.blank(layout.width, layout.height);
    for (const name of SLICE_NAMES) {
      const frame = layout.frames[name];
      image.blit(images[name], frame.x, frame.y);
    }

    return { ...layout, image, padding };
  }

  private assertPadding(padding: number): void {
    if (!Number.isInteger(padding) || padding < 0) {
      throw new InvalidPaddingError(padding);
    }
  }

  private offsets(sizes: number[], padding: number): number[] {
    const offsets: number[] = [];
    let cursor = padding;
    for (const size of sizes) {
      offsets.push(cursor);
      cursor += size + padding;
    }
    return offsets;
  }

  private sum(values: number[]): number {
    return values.reduce((total, value) => total + value, 0);
  }
}
