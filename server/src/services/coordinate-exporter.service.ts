import {
  CoordinateDescription,
  Margins,
  mapSlices,
  Rect,
  SliceRegion,
} from '../models/slice.types';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readInt(source: Record<string, unknown>, key: string, path: string): number {
  const value = source[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new TypeError(`${path}.${key} must be a non-negative integer`);
  }
  return value;
}

function readObject(source: Record<string, unknown>, key: string, path: string): Record<string, unknown> {
  const value = source[key];
  if (!isRecord(value)) {
    throw new TypeError(`${path}.${key} must be an object`);
  }
  return value;
}

export class CoordinateExporter {
  /**
   * Build the coordinate record for one image and its nine regions
   */
  describe(
    width: number,
    height: number,
    margins: Margins,
    regions: SliceRegion[]
  ): CoordinateDescription {
    const byName = new Map(regions.map(region => [region.name, region]));
    const rects = mapSlices((name): Rect => {
      const region = byName.get(name);
      if (!region) {
        throw new RangeError(`Missing region "${name}"`);
      }
      return { x: region.x, y: region.y, width: region.width, height: region.height };
    });

    return Object.freeze({
      image_width: width,
      image_height: height,
      margins: {
        left: margins.left,
        top: margins.top,
        right: margins.right,
        bottom: margins.bottom,
      },
      regions: rects,
    });
  }

  /**
   * JSON text, two-space indent, trailing newline
   */
  serialize(description: CoordinateDescription): string {
    return `${JSON.stringify(description, null, 2)}\n`;
  }

  parse(text: string): CoordinateDescription {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TypeError(`Coordinate description is not valid JSON: ${reason}`);
    }
    return this.validate(raw);
  }

  /**
   * Check an already-decoded value, e.g. a JSON request body
   */
  validate(raw: unknown): CoordinateDescription {
    if (!isRecord(raw)) {
      throw new TypeError('Coordinate description must be an object');
    }

    const margins = readObject(raw, 'margins', '$');
    const regions = readObject(raw, 'regions', '$');

    return {
      image_width: readInt(raw, 'image_width', '$'),
      image_height: readInt(raw, 'image_height', '$'),
      margins: {
        left: readInt(margins, 'left', '$.margins'),
        top: readInt(margins, 'top', '$.margins'),
        right: readInt(margins, 'right', '$.margins'),
        bottom: readInt(margins, 'bottom', '$.margins'),
      },
      regions: mapSlices(name => {
        const rect = readObject(regions, name, '$.regions');
        const path = `$.regions.${name}`;
        return {
          x: readInt(rect, 'x', path),
          y: readInt(rect, 'y', path),
          width: readInt(rect, 'width', path),
          height: readInt(rect, 'height', path),
        };
      }),
    };
  }
}
