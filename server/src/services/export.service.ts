import { mkdir, writeFile } from 'fs/promises';
import path from 'path';
import { ExportIOError, ExportKind } from '../errors/slicing.errors';
import { RasterImage } from '../models/raster-image';
import { AtlasPacker } from './atlas-packer.service';
import { CoordinateExporter } from './coordinate-exporter.service';
import { CornerStitcher } from './corner-stitcher.service';
import { ImageService } from './image.service';
import { SliceExtractor } from './slice-extractor.service';
import { SliceGeometry } from './slice-geometry.service';

/**
 * Where export bytes go. The orchestrator never touches the filesystem itself.
 */
export interface OutputWriter {
  ensureDir(directory: string): Promise<void>;
  write(destination: string, contents: Buffer | string): Promise<void>;
}

export class FileSystemWriter implements OutputWriter {
  async ensureDir(directory: string): Promise<void> {
    await mkdir(directory, { recursive: true });
  }

  async write(destination: string, contents: Buffer | string): Promise<void> {
    await writeFile(destination, contents);
  }
}

export interface ExportResult {
  kind: ExportKind;
  paths: string[];
  width?: number;
  height?: number;
}

export interface ExportServiceDeps {
  writer?: OutputWriter;
  imageService?: ImageService;
  extractor?: SliceExtractor;
  stitcher?: CornerStitcher;
  packer?: AtlasPacker;
  exporter?: CoordinateExporter;
}

/**
 * Export entry points for the editor front end.
 * Every call derives its own images, encodes everything, and only then
 * hands bytes to the writer; a writer failure surfaces as ExportIOError.
 */
export class ExportService {
  private readonly writer: OutputWriter;
  private readonly imageService: ImageService;
  private readonly extractor: SliceExtractor;
  private readonly stitcher: CornerStitcher;
  private readonly packer: AtlasPacker;
  private readonly exporter: CoordinateExporter;

  constructor(deps: ExportServiceDeps = {}) {
    this.writer = deps.writer ?? new FileSystemWriter();
    this.imageService = deps.imageService ?? new ImageService();
    this.extractor = deps.extractor ?? new SliceExtractor();
    this.stitcher = deps.stitcher ?? new CornerStitcher();
    this.packer = deps.packer ?? new AtlasPacker();
    this.exporter = deps.exporter ?? new CoordinateExporter();
  }

  async exportStitched(
    image: RasterImage,
    geometry: SliceGeometry,
    destination: string
  ): Promise<ExportResult> {
    const slices = this.extractor.extractAll(image, geometry);
    const preview = this.stitcher.stitch(slices.corners());
    const png = await this.imageService.encodePng(preview.image);

    await this.persist('stitched', destination, async () => {
      await this.writer.ensureDir(path.dirname(destination));
      await this.writer.write(destination, png);
    });

    return {
      kind: 'stitched',
      paths: [destination],
      width: preview.width,
      height: preview.height,
    };
  }

  /**
   * Write `<region-name>.png` for each slice, in canonical order
   */
  async exportSlices(
    image: RasterImage,
    geometry: SliceGeometry,
    destinationDir: string
  ): Promise<ExportResult> {
    const slices = this.extractor.extractAll(image, geometry);

    const files: Array<{ destination: string; png: Buffer }> = [];
    for (const [name, slice] of slices) {
      files.push({
        destination: path.join(destinationDir, `${name}.png`),
        png: await this.imageService.encodePng(slice),
      });
    }

    await this.persist('slices', destinationDir, async () => {
      await this.writer.ensureDir(destinationDir);
      for (const file of files) {
        await this.writer.write(file.destination, file.png);
      }
    });

    return {
      kind: 'slices',
      paths: files.map(file => file.destination),
    };
  }

  async exportAtlas(
    image: RasterImage,
    geometry: SliceGeometry,
    padding: number,
    destination: string
  ): Promise<ExportResult> {
    const slices = this.extractor.extractAll(image, geometry);
    const atlas = this.packer.pack(slices, padding);
    const png = await this.imageService.encodePng(atlas.image);

    await this.persist('atlas', destination, async () => {
      await this.writer.ensureDir(path.dirname(destination));
      await this.writer.write(destination, png);
    });

    return {
      kind: 'atlas',
      paths: [destination],
      width: atlas.width,
      height: atlas.height,
    };
  }

  async exportCoordinates(geometry: SliceGeometry, destination: string): Promise<ExportResult> {
    const description = this.exporter.describe(
      geometry.width,
      geometry.height,
      geometry.margins,
      geometry.regions()
    );
    const text = this.exporter.serialize(description);

    await this.persist('coordinates', destination, async () => {
      await this.writer.ensureDir(path.dirname(destination));
      await this.writer.write(destination, text);
    });

    return {
      kind: 'coordinates',
      paths: [destination],
    };
  }

  private async persist(kind: ExportKind, destination: string, write: () => Promise<void>): Promise<void> {
    try {
      await write();
    } catch (error) {
      throw new ExportIOError(kind, destination, error);
    }
  }
}
