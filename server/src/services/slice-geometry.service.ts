import { InvalidDimensionError } from '../errors/slicing.errors';
import {
  CoordinateDescription,
  MarginRatios,
  Margins,
  Side,
  SLICE_NAMES,
  SliceName,
  SliceRegion,
} from '../models/slice.types';

/** Fraction of each axis used for margins when an image is first loaded */
export const DEFAULT_MARGIN_FRACTION = 0.25;

const OPPOSITE: Record<Side, Side> = {
  left: 'right',
  right: 'left',
  top: 'bottom',
  bottom: 'top',
};

/**
 * Project a requested margin onto [0, axis - opposite].
 * Fractions are truncated the way pointer positions are; NaN counts as 0.
 */
export function clampMargin(value: number, axis: number, opposite: number): number {
  const requested = Number.isNaN(value) ? 0 : Math.trunc(value);
  return Math.max(0, Math.min(requested, axis - opposite));
}

/**
 * Round to the nearest integer, sending exact halves to the even neighbour
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const fraction = value - floor;
  if (fraction !== 0.5) return Math.round(value);
  return floor % 2 === 0 ? floor : floor + 1;
}

/**
 * Image size plus four margins. Owns the only invariants of the slicer:
 * margins are non-negative and never overlap on either axis.
 * Out-of-range updates are clamped, not rejected, so a drag stays smooth.
 */
export class SliceGeometry {
  private readonly current: Margins = { left: 0, top: 0, right: 0, bottom: 0 };

  private constructor(
    readonly width: number,
    readonly height: number
  ) {}

  static create(
    width: number,
    height: number,
    left: number,
    top: number,
    right: number,
    bottom: number
  ): SliceGeometry {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new InvalidDimensionError(width, height);
    }
    const geometry = new SliceGeometry(width, height);
    geometry.setMargins({ left, top, right, bottom });
    return geometry;
  }

  /**
   * Margins at a quarter of each axis, as a freshly loaded image gets them
   */
  static withDefaultMargins(width: number, height: number): SliceGeometry {
    const horizontal = roundHalfEven(width * DEFAULT_MARGIN_FRACTION);
    const vertical = roundHalfEven(height * DEFAULT_MARGIN_FRACTION);
    return SliceGeometry.create(width, height, horizontal, vertical, horizontal, vertical);
  }

  /**
   * Rebuild a geometry from an exported coordinate description
   */
  static fromDescription(description: CoordinateDescription): SliceGeometry {
    const { left, top, right, bottom } = description.margins;
    return SliceGeometry.create(
      description.image_width,
      description.image_height,
      left,
      top,
      right,
      bottom
    );
  }

  get margins(): Readonly<Margins> {
    return Object.freeze({ ...this.current });
  }

  private axisOf(side: Side): number {
    return side === 'left' || side === 'right' ? this.width : this.height;
  }

  /**
   * Clamp `value` against the opposite margin and apply it.
   * Returns the value actually stored.
   */
  setMargin(side: Side, value: number): number {
    const applied = clampMargin(value, this.axisOf(side), this.current[OPPOSITE[side]]);
    this.current[side] = applied;
    return applied;
  }

  /**
   * Apply several margins at once. When both sides of an axis are given,
   * right (or bottom) is first bounded by the axis, left (or top) is clamped
   * against it, then right (or bottom) against the new left (or top).
   */
  setMargins(margins: Partial<Margins>): Readonly<Margins> {
    const pairs: Array<[Side, Side]> = [['left', 'right'], ['top', 'bottom']];
    for (const [lead, trail] of pairs) {
      const leadValue = margins[lead];
      const trailValue = margins[trail];
      if (leadValue !== undefined && trailValue !== undefined) {
        const axis = this.axisOf(lead);
        this.current[lead] = clampMargin(leadValue, axis, clampMargin(trailValue, axis, 0));
        this.setMargin(trail, trailValue);
      } else if (leadValue !== undefined) {
        this.setMargin(lead, leadValue);
      } else if (trailValue !== undefined) {
        this.setMargin(trail, trailValue);
      }
    }
    return this.margins;
  }

  /**
   * The nine slice rectangles in canonical row-major order.
   * Together they tile the image with no gaps or overlaps.
   */
  regions(): SliceRegion[] {
    const { left, top, right, bottom } = this.current;
    const xs = [0, left, this.width - right, this.width];
    const ys = [0, top, this.height - bottom, this.height];

    return SLICE_NAMES.map((name, index) => {
      const row = Math.floor(index / 3);
      const col = index % 3;
      return {
        name,
        x: xs[col],
        y: ys[row],
        width: xs[col + 1] - xs[col],
        height: ys[row + 1] - ys[row],
      };
    });
  }

  region(name: SliceName): SliceRegion {
    const index = SLICE_NAMES.indexOf(name);
    return this.regions()[index];
  }

  isDegenerate(name: SliceName): boolean {
    const { width, height } = this.region(name);
    return width === 0 || height === 0;
  }

  /**
   * Each margin as a fraction of its axis
   */
  marginRatios(): MarginRatios {
    const { left, top, right, bottom } = this.current;
    return {
      left: left / this.width,
      top: top / this.height,
      right: right / this.width,
      bottom: bottom / this.height,
    };
  }

  clone(): SliceGeometry {
    const { left, top, right, bottom } = this.current;
    return SliceGeometry.create(this.width, this.height, left, top, right, bottom);
  }
}
