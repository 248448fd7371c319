import { RasterImage } from '../models/raster-image';
import {
  CORNER_NAMES,
  CornerName,
  Rect,
  SLICE_NAMES,
  SliceName,
  SliceRegion,
} from '../models/slice.types';
import { SliceGeometry } from './slice-geometry.service';

export type CornerImages = Record<CornerName, RasterImage>;

/**
 * Lazy name -> slice mapping over one source image.
 * A slice is copied out of the source the first time it is asked for,
 * so a live preview that only needs corners never touches the centre.
 */
export class SliceSet implements Iterable<[SliceName, RasterImage]> {
  private readonly cache = new Map<SliceName, RasterImage>();
  private readonly byName: Map<SliceName, SliceRegion>;

  constructor(
    private readonly source: RasterImage,
    regions: SliceRegion[],
    private readonly extractor: SliceExtractor
  ) {
    this.byName = new Map(regions.map(region => [region.name, region]));
  }

  region(name: SliceName): SliceRegion {
    const region = this.byName.get(name);
    if (!region) {
      throw new RangeError(`Unknown slice "${name}"`);
    }
    return region;
  }

  get(name: SliceName): RasterImage {
    let image = this.cache.get(name);
    if (!image) {
      image = this.extractor.extract(this.source, this.region(name));
      this.cache.set(name, image);
    }
    return image;
  }

  corners(): CornerImages {
    const [topLeft, topRight, bottomLeft, bottomRight] = CORNER_NAMES.map(name => this.get(name));
    return {
      'top-left': topLeft,
      'top-right': topRight,
      'bottom-left': bottomLeft,
      'bottom-right': bottomRight,
    };
  }

  /** Number of slices copied so far */
  get materialized(): number {
    return this.cache.size;
  }

  *entries(): IterableIterator<[SliceName, RasterImage]> {
    for (const name of SLICE_NAMES) {
      yield [name, this.get(name)];
    }
  }

  [Symbol.iterator](): IterableIterator<[SliceName, RasterImage]> {
    return this.entries();
  }
}

export class SliceExtractor {
  /**
   * Copy the pixels of `region` into a new image.
   * Zero-area regions give an empty image instead of failing.
   */
  extract(image: RasterImage, region: Rect): RasterImage {
    return image.crop(region);
  }

  /**
   * All nine slices of `image` under `geometry`, extracted on demand
   */
  extractAll(image: RasterImage, geometry: SliceGeometry): SliceSet {
    if (image.width !== geometry.width || image.height !== geometry.height) {
      throw new RangeError(
        `Image is ${image.width}x${image.height} but geometry expects ${geometry.width}x${geometry.height}`
      );
    }
    return new SliceSet(image, geometry.regions(), this);
  }
}
