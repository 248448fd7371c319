import { NextFunction, Request, Response, Router } from 'express';
import path from 'path';
import { upload } from '../config/multer';
import { ExportKind } from '../errors/slicing.errors';
import { BadRequestError } from '../middleware/error-handler';
import { CoordinateDescription, isSliceName, Margins, SIDES } from '../models/slice.types';
import { AtlasPacker } from '../services/atlas-packer.service';
import { CoordinateExporter } from '../services/coordinate-exporter.service';
import { CornerStitcher } from '../services/corner-stitcher.service';
import { ExportResult, ExportService } from '../services/export.service';
import { ImageService } from '../services/image.service';
import { SessionService, SlicingSession } from '../services/session.service';
import { SliceExtractor } from '../services/slice-extractor.service';
import { SliceGeometry } from '../services/slice-geometry.service';

const router = Router();
const imageService = new ImageService();
const extractor = new SliceExtractor();
const stitcher = new CornerStitcher();
const packer = new AtlasPacker();
const exporter = new CoordinateExporter();

const EXPORT_KINDS: readonly ExportKind[] = ['stitched', 'slices', 'atlas', 'coordinates'];

const DEFAULT_EXPORT_NAMES: Record<ExportKind, string> = {
  stitched: 'corners.png',
  slices: 'slices',
  atlas: 'atlas.png',
  coordinates: 'slices.json',
};

/**
 * Shared services live on app.locals so the socket channel sees the same sessions
 */
function sessionsOf(req: Request): SessionService {
  const sessions: unknown = req.app.locals.sessions;
  if (!(sessions instanceof SessionService)) {
    throw new Error('Session service is not configured');
  }
  return sessions;
}

function exportServiceOf(req: Request): ExportService {
  const service: unknown = req.app.locals.exportService;
  return service instanceof ExportService ? service : new ExportService({ imageService });
}

function exportDirOf(req: Request): string {
  const dir: unknown = req.app.locals.exportDir;
  if (typeof dir !== 'string' || dir.length === 0) {
    throw new Error('Export directory is not configured');
  }
  return dir;
}

function defaultPaddingOf(req: Request): number {
  const padding: unknown = req.app.locals.defaultAtlasPadding;
  return typeof padding === 'number' ? padding : 0;
}

/**
 * Numbers and integer strings pass through; anything else becomes NaN,
 * which the packer rejects
 */
function readPadding(raw: unknown, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  if (typeof raw === 'number') return raw;
  if (typeof raw === 'string' && /^-?\d+$/.test(raw)) return Number(raw);
  return NaN;
}

function field(body: unknown, key: string): unknown {
  return typeof body === 'object' && body !== null ? Reflect.get(body, key) : undefined;
}

function readMargins(body: unknown): Partial<Margins> {
  if (typeof body !== 'object' || body === null) {
    throw new BadRequestError('Expected a JSON object of margins');
  }
  const margins: Partial<Margins> = {};
  for (const side of SIDES) {
    const value = field(body, side);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new BadRequestError(`Margin "${side}" must be a number`);
    }
    margins[side] = value;
  }
  if (Object.keys(margins).length === 0) {
    throw new BadRequestError(`Provide at least one of ${SIDES.join(', ')}`);
  }
  return margins;
}

function readDescription(body: unknown): CoordinateDescription {
  try {
    return exporter.validate(body);
  } catch (error) {
    throw new BadRequestError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Keep export names inside the session's export directory
 */
function safeName(raw: unknown, fallback: string): string {
  if (raw === undefined) return fallback;
  if (typeof raw !== 'string' || !/^[\w.-]+$/.test(raw) || raw === '.' || raw === '..') {
    throw new BadRequestError('Export name may only contain letters, digits, ".", "_" and "-"');
  }
  return raw;
}

function sendPng(res: Response, png: Buffer, width: number, height: number): void {
  res.setHeader('Content-Type', 'image/png');
  res.setHeader('X-Result-Width', String(width));
  res.setHeader('X-Result-Height', String(height));
  res.send(png);
}

/**
 * Upload an image and open an editing session
 */
router.post('/sessions', upload.single('image'), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const file = req.file;
    if (!file) {
      res.status(400).json({ error: 'No image uploaded' });
      return;
    }

    const sessions = sessionsOf(req);
    const session = await sessions.open(file.buffer, file.originalname).catch((error: unknown) => {
      const reason = error instanceof Error ? error.message : String(error);
      throw new BadRequestError(`Could not decode image: ${reason}`);
    });

    res.status(201).json(sessions.snapshot(session.id));
  } catch (error) {
    next(error);
  }
});

router.get('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    res.json(sessionsOf(req).snapshot(req.params.id));
  } catch (error) {
    next(error);
  }
});

/**
 * Numeric margin entry. Out-of-range values are clamped, never rejected.
 */
router.put('/sessions/:id/margins', (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessions = sessionsOf(req);
    sessions.setMargins(req.params.id, readMargins(req.body));
    res.json(sessions.snapshot(req.params.id));
  } catch (error) {
    next(error);
  }
});

router.post('/sessions/:id/undo', (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessions = sessionsOf(req);
    sessions.undo(req.params.id);
    res.json(sessions.snapshot(req.params.id));
  } catch (error) {
    next(error);
  }
});

router.post('/sessions/:id/redo', (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessions = sessionsOf(req);
    sessions.redo(req.params.id);
    res.json(sessions.snapshot(req.params.id));
  } catch (error) {
    next(error);
  }
});

/**
 * Coordinate description of the current margins
 */
router.get('/sessions/:id/regions', (req: Request, res: Response, next: NextFunction) => {
  try {
    const { geometry } = sessionsOf(req).get(req.params.id);
    res.json(exporter.describe(geometry.width, geometry.height, geometry.margins, geometry.regions()));
  } catch (error) {
    next(error);
  }
});

/**
 * Restore margins from a previously exported coordinate description
 */
router.put('/sessions/:id/regions', (req: Request, res: Response, next: NextFunction) => {
  try {
    const description = readDescription(req.body);
    const sessions = sessionsOf(req);
    const { image } = sessions.get(req.params.id);
    if (description.image_width !== image.width || description.image_height !== image.height) {
      throw new BadRequestError(
        `Description is for a ${description.image_width}x${description.image_height} image, ` +
          `session image is ${image.width}x${image.height}`
      );
    }

    sessions.setMargins(req.params.id, SliceGeometry.fromDescription(description).margins);
    res.json(sessions.snapshot(req.params.id));
  } catch (error) {
    next(error);
  }
});

router.get('/sessions/:id/preview.png', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { image, geometry } = sessionsOf(req).get(req.params.id);
    const corners = extractor.extractAll(image, geometry).corners();
    const preview = stitcher.stitch(corners);
    sendPng(res, await imageService.encodePng(preview.image), preview.width, preview.height);
  } catch (error) {
    next(error);
  }
});

router.get('/sessions/:id/slices/:name.png', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { name } = req.params;
    if (!isSliceName(name)) {
      res.status(404).json({ error: 'Not Found', message: `Unknown slice "${name}"` });
      return;
    }
    const { image, geometry } = sessionsOf(req).get(req.params.id);
    const slice = extractor.extractAll(image, geometry).get(name);
    sendPng(res, await imageService.encodePng(slice), slice.width, slice.height);
  } catch (error) {
    next(error);
  }
});

router.get('/sessions/:id/atlas.png', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { image, geometry } = sessionsOf(req).get(req.params.id);
    const padding = readPadding(req.query.padding, defaultPaddingOf(req));
    const atlas = packer.pack(extractor.extractAll(image, geometry), padding);
    sendPng(res, await imageService.encodePng(atlas.image), atlas.width, atlas.height);
  } catch (error) {
    next(error);
  }
});

function runExport(
  exportService: ExportService,
  kind: ExportKind,
  session: SlicingSession,
  destination: string,
  padding: number
): Promise<ExportResult> {
  switch (kind) {
    case 'stitched':
      return exportService.exportStitched(session.image, session.geometry, destination);
    case 'slices':
      return exportService.exportSlices(session.image, session.geometry, destination);
    case 'atlas':
      return exportService.exportAtlas(session.image, session.geometry, padding, destination);
    case 'coordinates':
      return exportService.exportCoordinates(session.geometry, destination);
  }
}

/**
 * Run one export into the session's directory under the export root
 */
router.post('/sessions/:id/exports', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const requested = field(req.body, 'kind');
    const kind = EXPORT_KINDS.find(candidate => candidate === requested);
    if (!kind) {
      throw new BadRequestError(`"kind" must be one of ${EXPORT_KINDS.join(', ')}`);
    }
    const name = safeName(field(req.body, 'name'), DEFAULT_EXPORT_NAMES[kind]);
    const padding = readPadding(field(req.body, 'padding'), defaultPaddingOf(req));

    const session = sessionsOf(req).get(req.params.id);
    const destination = path.join(exportDirOf(req), session.id, name);
    const result = await runExport(exportServiceOf(req), kind, session, destination, padding);

    console.log(`[Slicing] Exported ${result.kind} for ${session.id} -> ${result.paths.length} file(s)`);
    res.json(result);
  } catch (error) {
    next(error);
  }
});

router.delete('/sessions/:id', (req: Request, res: Response, next: NextFunction) => {
  try {
    const sessions = sessionsOf(req);
    sessions.get(req.params.id);
    sessions.close(req.params.id);
    res.status(204).end();
  } catch (error) {
    next(error);
  }
});

export const slicingRouter = router;
