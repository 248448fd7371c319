import { v4 as uuidv4 } from 'uuid';
import { SessionNotFoundError } from '../errors/slicing.errors';
import { RasterImage } from '../models/raster-image';
import { MarginRatios, Margins, Side } from '../models/slice.types';
import { CornerStitcher } from './corner-stitcher.service';
import { ImageService } from './image.service';
import { MarginHistory } from './margin-history.service';
import { SliceExtractor } from './slice-extractor.service';
import { SliceGeometry } from './slice-geometry.service';

export interface SlicingSession {
  id: string;
  fileName: string;
  image: RasterImage;
  geometry: SliceGeometry;
  history: MarginHistory;
  createdAt: number;
  touchedAt: number;
}

export interface SessionSnapshot {
  id: string;
  fileName: string;
  width: number;
  height: number;
  margins: Margins;
  ratios: MarginRatios;
  preview: { width: number; height: number };
  canUndo: boolean;
  canRedo: boolean;
}

function sameMargins(a: Margins, b: Margins): boolean {
  return a.left === b.left && a.top === b.top && a.right === b.right && a.bottom === b.bottom;
}

/**
 * Editing sessions held in memory: one loaded image, its margins and
 * their undo history per session.
 */
export class SessionService {
  private sessions: Map<string, SlicingSession> = new Map();
  private readonly extractor = new SliceExtractor();
  private readonly stitcher = new CornerStitcher();

  constructor(
    private readonly imageService: ImageService = new ImageService(),
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Decode an upload and start a session with quarter-axis margins
   */
  async open(buffer: Buffer, fileName: string): Promise<SlicingSession> {
    const image = await this.imageService.decode(buffer);
    return this.openImage(image, fileName);
  }

  openImage(image: RasterImage, fileName: string): SlicingSession {
    const geometry = SliceGeometry.withDefaultMargins(image.width, image.height);
    const timestamp = this.now();
    const session: SlicingSession = {
      id: uuidv4(),
      fileName,
      image,
      geometry,
      history: new MarginHistory(),
      createdAt: timestamp,
      touchedAt: timestamp,
    };
    this.sessions.set(session.id, session);
    console.log(`[Session] Opened ${session.id} for ${fileName} (${image.width}x${image.height})`);
    return session;
  }

  get(id: string): SlicingSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new SessionNotFoundError(id);
    }
    session.touchedAt = this.now();
    return session;
  }

  /**
   * Start of a drag gesture: remember the margins it will replace
   */
  beginDrag(id: string): SlicingSession {
    const session = this.get(id);
    session.history.push(session.geometry.margins);
    return session;
  }

  /**
   * One drag motion step. No history entry; the gesture already has one.
   */
  dragMargin(id: string, side: Side, value: number): number {
    return this.get(id).geometry.setMargin(side, value);
  }

  /**
   * Numeric entry. Records history only when something actually changed.
   */
  setMargins(id: string, margins: Partial<Margins>): SlicingSession {
    const session = this.get(id);
    const before = session.geometry.margins;
    const after = session.geometry.clone().setMargins(margins);
    if (!sameMargins(before, after)) {
      session.history.push(before);
      session.geometry.setMargins(after);
    }
    return session;
  }

  undo(id: string): SlicingSession {
    const session = this.get(id);
    const previous = session.history.undo(session.geometry.margins);
    if (previous) {
      session.geometry.setMargins(previous);
    }
    return session;
  }

  redo(id: string): SlicingSession {
    const session = this.get(id);
    const next = session.history.redo(session.geometry.margins);
    if (next) {
      session.geometry.setMargins(next);
    }
    return session;
  }

  snapshot(id: string): SessionSnapshot {
    const session = this.get(id);
    const { geometry, history } = session;
    const corners = this.extractor.extractAll(session.image, geometry).corners();
    const preview = this.stitcher.stitch(corners);

    return {
      id: session.id,
      fileName: session.fileName,
      width: geometry.width,
      height: geometry.height,
      margins: { ...geometry.margins },
      ratios: geometry.marginRatios(),
      preview: { width: preview.width, height: preview.height },
      canUndo: history.canUndo,
      canRedo: history.canRedo,
    };
  }

  close(id: string): boolean {
    const removed = this.sessions.delete(id);
    if (removed) {
      console.log(`[Session] Closed ${id}`);
    }
    return removed;
  }

  /**
   * Drop sessions idle for longer than `ttlMs`. Returns how many were dropped.
   */
  sweep(ttlMs: number): number {
    const cutoff = this.now() - ttlMs;
    let dropped = 0;
    this.sessions.forEach((session, id) => {
      if (session.touchedAt < cutoff) {
        this.sessions.delete(id);
        dropped++;
      }
    });
    if (dropped > 0) {
      console.log(`[Session] Expired ${dropped} idle session(s)`);
    }
    return dropped;
  }

  get size(): number {
    return this.sessions.size;
  }
}
