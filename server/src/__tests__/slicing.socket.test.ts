import { RasterImage } from '../models/raster-image';
import { SessionService } from '../services/session.service';
import { DragPayload, DragSocket, registerSlicingSocket } from '../sockets/slicing.socket';

class FakeSocket implements DragSocket {
  id = 'socket-1';
  sent: Array<{ event: string; payload: unknown }> = [];
  private handlers = new Map<string, (payload?: DragPayload) => void>();

  on(event: string, listener: (payload?: DragPayload) => void): this {
    this.handlers.set(event, listener);
    return this;
  }

  emit(event: string, payload: unknown): boolean {
    this.sent.push({ event, payload });
    return true;
  }

  receive(event: string, payload?: DragPayload): void {
    const handler = this.handlers.get(event);
    if (!handler) throw new Error(`No handler for ${event}`);
    handler(payload);
  }

  last(): { event: string; payload: unknown } | undefined {
    return this.sent[this.sent.length - 1];
  }
}

describe('registerSlicingSocket', () => {
  let sessions: SessionService;
  let socket: FakeSocket;
  let sessionId: string;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    sessions = new SessionService();
    sessionId = sessions.openImage(RasterImage.filled(100, 80, [0, 0, 0, 255]), 'frame.png').id;
    socket = new FakeSocket();
    registerSlicingSocket(socket, sessions);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should answer each drag step with the clamped state', () => {
    socket.receive('margin:drag-start', { sessionId });
    socket.receive('margin:drag', { sessionId, side: 'left', value: 1000 });

    expect(socket.last()).toEqual({
      event: 'session:state',
      payload: expect.objectContaining({
        margins: { left: 75, top: 20, right: 25, bottom: 20 },
        preview: { width: 100, height: 40 },
        canUndo: true,
      }),
    });
  });

  it('should keep one undo step for the whole gesture', () => {
    socket.receive('margin:drag-start', { sessionId });
    socket.receive('margin:drag', { sessionId, side: 'top', value: 5 });
    socket.receive('margin:drag', { sessionId, side: 'top', value: 10 });
    socket.receive('margin:drag-end', { sessionId });

    sessions.undo(sessionId);
    expect(sessions.snapshot(sessionId).margins.top).toBe(20);
    expect(sessions.snapshot(sessionId).canUndo).toBe(false);
  });

  it('should report a missing session id', () => {
    socket.receive('margin:drag', { side: 'left', value: 3 });

    expect(socket.last()).toEqual({ event: 'session:error', payload: { message: 'sessionId is required' } });
  });

  it('should report an unknown side', () => {
    socket.receive('margin:drag', { sessionId, side: 'middle', value: 3 });

    expect(socket.last()).toEqual({
      event: 'session:error',
      payload: { message: 'side must be one of left, top, right, bottom' },
    });
  });

  it('should report unknown sessions', () => {
    socket.receive('margin:drag-start', { sessionId: 'gone' });

    expect(socket.last()).toEqual({ event: 'session:error', payload: { message: 'Session gone not found' } });
  });
});
