import http from 'node:http';
import { WebSocketServer } from 'ws';
import type { Engine } from '../engine/engine.js';
import { errorMessage } from '../errors.js';
import { createLogger } from '../log/logger.js';
import type { Protocol } from '../protocol/codec.js';
import { WsConnection } from './connection.js';
import { Session } from './session.js';

const log = createLogger('server');

export const WS_PATH = '/ws';
export const HEALTH_PATH = '/health';

export interface EngineServerOptions<S, C, E> {
  engine: Engine<S, C, E>;
  protocol: Protocol<S, C, E>;
  host: string;
  port: number;
  version: string;
}

export interface EngineServer {
  readonly server: http.Server;
  /** Actual bound port, useful when 0 was requested. */
  readonly port: number;
  readonly sessionCount: number;
  close(): Promise<void>;
}

function jsonResponse(res: http.ServerResponse, status: number, data: unknown): void {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(data));
}

export function startEngineServer<S, C, E>(options: EngineServerOptions<S, C, E>): Promise<EngineServer> {
  const { engine, protocol, host, port, version } = options;
  const sessions = new Set<Session<S, C, E>>();

  return new Promise((resolve, reject) => {
    const server = http.createServer((req, res) => {
      const url = new URL(req.url ?? '/', `http://${req.headers.host ?? 'localhost'}`);
      if (req.method === 'GET' && url.pathname === HEALTH_PATH) {
        jsonResponse(res, 200, { status: 'ok', engine: engine.name, version, observers: sessions.size });
        return;
      }
      jsonResponse(res, 404, { error: 'Not found' });
    });

    const wss = new WebSocketServer({ server, path: WS_PATH });

    wss.on('connection', (ws) => {
      const session = new Session(engine, protocol, new WsConnection(ws));
      sessions.add(session);
      session
        .run()
        .catch((err: unknown) => log.error(`Session ${session.id} failed: ${errorMessage(err)}`))
        .finally(() => sessions.delete(session));
    });

    wss.on('error', (err) => log.error(`WebSocket server error: ${err.message}`));

    const onStartupError = (err: Error): void => reject(err);
    server.once('error', onStartupError);

    server.listen(port, host, () => {
      server.off('error', onStartupError);
      server.on('error', (err) => log.error(`HTTP server error: ${err.message}`));

      const address = server.address();
      const boundPort = typeof address === 'object' && address !== null ? address.port : port;
      log.info(`Starting ${engine.name} engine server on ws://${host}:${boundPort}${WS_PATH}`);

      resolve({
        server,
        port: boundPort,
        get sessionCount() {
          return sessions.size;
        },
        close: () =>
          new Promise<void>((done, fail) => {
            for (const session of sessions) session.stop();
            for (const client of wss.clients) client.terminate();
            wss.close();
            server.close((err) => (err ? fail(err) : done()));
          }),
      });
    });
  });
}
