import { Server as SocketIOServer } from 'socket.io';
import { isSide } from '../models/slice.types';
import { SessionService } from '../services/session.service';

export interface DragPayload {
  sessionId?: unknown;
  side?: unknown;
  value?: unknown;
}

/**
 * The slice of a socket the drag channel talks to
 */
export interface DragSocket {
  id: string;
  on(event: string, listener: (payload?: DragPayload) => void): unknown;
  emit(event: string, payload: unknown): unknown;
}

function sessionIdOf(payload: DragPayload | undefined): string {
  const id = payload?.sessionId;
  if (typeof id !== 'string' || id.length === 0) {
    throw new Error('sessionId is required');
  }
  return id;
}

/**
 * Drag channel: the front end streams guide positions while the pointer
 * moves and gets the clamped state back after every step.
 *
 *   margin:drag-start { sessionId }              -> session:state
 *   margin:drag       { sessionId, side, value } -> session:state
 *   margin:drag-end   { sessionId }              -> session:state
 */
export function registerSlicingSocket(socket: DragSocket, sessions: SessionService): void {
  const reply = (action: () => string) => {
    try {
      const id = action();
      socket.emit('session:state', sessions.snapshot(id));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[Socket] ${socket.id}: ${message}`);
      socket.emit('session:error', { message });
    }
  };

  socket.on('margin:drag-start', (payload?: DragPayload) => {
    reply(() => {
      const id = sessionIdOf(payload);
      sessions.beginDrag(id);
      return id;
    });
  });

  socket.on('margin:drag', (payload?: DragPayload) => {
    reply(() => {
      const id = sessionIdOf(payload);
      const side = payload?.side;
      const value = payload?.value;
      if (!isSide(side)) {
        throw new Error('side must be one of left, top, right, bottom');
      }
      if (typeof value !== 'number') {
        throw new Error('value must be a number');
      }
      sessions.dragMargin(id, side, value);
      return id;
    });
  });

  socket.on('margin:drag-end', (payload?: DragPayload) => {
    reply(() => sessionIdOf(payload));
  });
}

export function attachSlicingSockets(io: SocketIOServer, sessions: SessionService): void {
  io.on('connection', (socket) => {
    console.log(`🔌 Client connected: ${socket.id}`);
    registerSlicingSocket(
      {
        id: socket.id,
        on: (event, listener) => socket.on(event, listener),
        emit: (event, payload) => socket.emit(event, payload),
      },
      sessions
    );

    socket.on('disconnect', (reason) => {
      console.log(`❌ Client disconnected: ${socket.id} (${reason})`);
    });

    socket.on('error', (error) => {
      console.error(`⚠️  Socket error for ${socket.id}:`, error);
    });
  });
}
