import { SessionNotFoundError } from '../errors/slicing.errors';
import { RasterImage } from '../models/raster-image';
import { ImageService } from '../services/image.service';
import { SessionService } from '../services/session.service';
import { solidPng } from './helpers/raster.helper';

describe('SessionService', () => {
  let clock: number;
  let service: SessionService;
  let logSpy: jest.SpyInstance;

  beforeEach(() => {
    clock = 1_000;
    service = new SessionService(new ImageService(), () => clock);
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
  });

  const openRed = () => service.openImage(RasterImage.filled(100, 80, [255, 0, 0, 255]), 'panel.png');

  describe('open', () => {
    it('should decode the upload and start with quarter-axis margins', async () => {
      const session = await service.open(await solidPng(100, 80), 'panel.png');
      const snapshot = service.snapshot(session.id);

      expect(snapshot).toMatchObject({
        id: session.id,
        fileName: 'panel.png',
        width: 100,
        height: 80,
        margins: { left: 25, top: 20, right: 25, bottom: 20 },
        preview: { width: 50, height: 40 },
        canUndo: false,
        canRedo: false,
      });
      expect(snapshot.ratios.left).toBeCloseTo(0.25);
    });

    it('should give every session its own id', () => {
      expect(openRed().id).not.toBe(openRed().id);
      expect(service.size).toBe(2);
    });
  });

  describe('setMargins', () => {
    it('should record history only when margins change', () => {
      const { id } = openRed();

      service.setMargins(id, { left: 25 });
      expect(service.snapshot(id).canUndo).toBe(false);

      service.setMargins(id, { left: 10, top: 8, right: 12, bottom: 9 });
      expect(service.snapshot(id)).toMatchObject({
        margins: { left: 10, top: 8, right: 12, bottom: 9 },
        preview: { width: 22, height: 17 },
        canUndo: true,
      });
    });

    it('should clamp instead of rejecting', () => {
      const { id } = openRed();
      service.setMargins(id, { left: 500 });

      expect(service.snapshot(id).margins.left).toBe(75);
    });
  });

  describe('undo / redo', () => {
    it('should walk back and forth through margin changes', () => {
      const { id } = openRed();
      service.setMargins(id, { left: 10 });
      service.setMargins(id, { left: 30 });

      expect(service.undo(id).geometry.margins.left).toBe(10);
      expect(service.undo(id).geometry.margins.left).toBe(25);
      expect(service.undo(id).geometry.margins.left).toBe(25);
      expect(service.redo(id).geometry.margins.left).toBe(10);
      expect(service.redo(id).geometry.margins.left).toBe(30);
      expect(service.snapshot(id).canRedo).toBe(false);
    });
  });

  describe('dragging', () => {
    it('should record one history entry per gesture', () => {
      const { id } = openRed();

      service.beginDrag(id);
      expect(service.dragMargin(id, 'left', 30)).toBe(30);
      expect(service.dragMargin(id, 'left', 40)).toBe(40);
      expect(service.dragMargin(id, 'left', 90)).toBe(75);

      expect(service.undo(id).geometry.margins.left).toBe(25);
      expect(service.snapshot(id).canUndo).toBe(false);
    });
  });

  describe('get', () => {
    it('should throw for unknown sessions', () => {
      expect(() => service.get('missing')).toThrow(SessionNotFoundError);
    });
  });

  describe('close', () => {
    it('should forget the session', () => {
      const { id } = openRed();

      expect(service.close(id)).toBe(true);
      expect(service.close(id)).toBe(false);
      expect(() => service.get(id)).toThrow(SessionNotFoundError);
    });
  });

  describe('sweep', () => {
    it('should drop sessions idle longer than the ttl', () => {
      const stale = openRed();
      clock = 5_000;
      const fresh = openRed();
      clock = 10_000;

      expect(service.sweep(6_000)).toBe(1);
      expect(() => service.get(stale.id)).toThrow(SessionNotFoundError);
      expect(service.get(fresh.id).id).toBe(fresh.id);
    });

    it('should count reads as activity', () => {
      const session = openRed();
      clock = 8_000;
      service.get(session.id);
      clock = 10_000;

      expect(service.sweep(6_000)).toBe(0);
    });
  });
});
