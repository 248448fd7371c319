import { createServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { createApp } from './app';
import { config } from './config';
import { ExportService } from './services/export.service';
import { ImageService } from './services/image.service';
import { SessionService } from './services/session.service';
import { attachSlicingSockets } from './sockets/slicing.socket';

const imageService = new ImageService();
const sessions = new SessionService(imageService);
const exportService = new ExportService({ imageService });

const app = createApp(config, { sessions, exportService });
const httpServer = createServer(app);

// Initialize Socket.IO
const io = new SocketIOServer(httpServer, {
  cors: {
    origin: config.nodeEnv === 'production'
      ? false // In production, use same origin
      : ['http://localhost:4200', 'http://localhost:5173'], // Allow dev servers
    methods: ['GET', 'POST']
  },
  pingTimeout: 60000, // 60 seconds
  pingInterval: 25000  // 25 seconds
});

attachSlicingSockets(io, sessions);

// Idle sessions hold decoded pixels; drop them
const sweeper = setInterval(() => sessions.sweep(config.sessionTtlMs), Math.min(config.sessionTtlMs, 60000));
sweeper.unref();

function shutdown(signal: string): void {
  console.log(`${signal} received, closing server...`);
  clearInterval(sweeper);
  // Closes the HTTP server as well
  io.close(() => process.exit(0));
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));

// Start server
httpServer.listen(config.port, () => {
  console.log(`⚡️ Server is running on port ${config.port}`);
  console.log(`🧩 Nine-slice API ready at http://localhost:${config.port}/api`);
  console.log(`📁 Exports written to ${config.exportDir}`);
  console.log(`🔌 Socket.IO ready for margin dragging`);
});

export default app;
