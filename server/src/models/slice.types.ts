/**
 * Shared nine-slice types
 */

export type Side = 'left' | 'top' | 'right' | 'bottom';

export const SIDES: readonly Side[] = ['left', 'top', 'right', 'bottom'];

/**
 * Canonical region names, row-major.
 * Order is stable: it drives slice file names and atlas layout.
 */
export const SLICE_NAMES = [
  'top-left', 'top-center', 'top-right',
  'mid-left', 'center', 'mid-right',
  'bottom-left', 'bottom-center', 'bottom-right',
] as const;

export type SliceName = typeof SLICE_NAMES[number];

export const CORNER_NAMES = ['top-left', 'top-right', 'bottom-left', 'bottom-right'] as const;

export type CornerName = typeof CORNER_NAMES[number];

export interface Margins {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface SliceRegion extends Rect {
  name: SliceName;
}

export interface MarginRatios {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

/**
 * Coordinate description consumed by downstream engine tooling.
 * Field names are a compatibility surface.
 */
export interface CoordinateDescription {
  image_width: number;
  image_height: number;
  margins: Margins;
  regions: Record<SliceName, Rect>;
}

export function isSliceName(value: string): value is SliceName {
  return (SLICE_NAMES as readonly string[]).includes(value);
}

export function isSide(value: unknown): value is Side {
  return typeof value === 'string' && (SIDES as readonly string[]).includes(value);
}

/**
 * Build a record over all nine names, calling `fn` in canonical order
 */
export function mapSlices<T>(fn: (name: SliceName, index: number) => T): Record<SliceName, T> {
  return {
    'top-left': fn('top-left', 0),
    'top-center': fn('top-center', 1),
    'top-right': fn('top-right', 2),
    'mid-left': fn('mid-left', 3),
    'center': fn('center', 4),
    'mid-right': fn('mid-right', 5),
    'bottom-left': fn('bottom-left', 6),
    'bottom-center': fn('bottom-center', 7),
    'bottom-right': fn('bottom-right', 8),
  };
}
