/**
 * HTTP listener for the game client's state pushes, plus local endpoints
 * for recognized utterances and raw voice audio.
 */

import express from 'express';
import type { Express, NextFunction, Request, Response } from 'express';
import type { Server } from 'node:http';
import { logger } from '../logger.js';
import { isRecord } from '../utils/guards.js';
import { snapshotToken } from './snapshot.js';

const SNAPSHOT_JSON_LIMIT = '2mb';
const VOICE_AUDIO_LIMIT = '10mb';

export interface IngestHandlers {
  /** One raw snapshot document; validation happens downstream. */
  snapshot(document: unknown, receivedAt: number): void;
  /** Recognized text; true when it carried the wake phrase. */
  utterance(text: string): boolean;
  /** Raw audio to transcribe and interpret; null when no transcriber is configured. */
  voice: ((audio: Buffer, filename: string) => Promise<string | null>) | null;
  health(): Record<string, unknown>;
}

export interface IngestServerOptions {
  /** Expected `auth.token`; empty disables the check. */
  authToken: string;
}

const AUDIO_EXTENSIONS: Record<string, string> = {
  'audio/wav': 'wav',
  'audio/x-wav': 'wav',
  'audio/webm': 'webm',
  'audio/ogg': 'ogg',
  'audio/mpeg': 'mp3',
  'audio/mp4': 'm4a',
};

export function createIngestApp(handlers: IngestHandlers, options: IngestServerOptions): Express {
  const app = express();

  app.post('/', express.json({ limit: SNAPSHOT_JSON_LIMIT }), (req: Request, res: Response) => {
    const document: unknown = req.body;
    if (options.authToken && snapshotToken(document) !== options.authToken) {
      logger.warn('Ingest: rejected snapshot with missing or wrong auth token');
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    try {
      handlers.snapshot(document, Date.now());
    } catch (err) {
      logger.error('Ingest: snapshot handler failed:', err);
    }
    res.json({ status: 'ok' });
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', ...handlers.health() });
  });

  app.post('/utterance', express.json(), (req: Request, res: Response) => {
    const body: unknown = req.body;
    const text = isRecord(body) && typeof body.text === 'string' ? body.text.trim() : '';
    if (!text) {
      res.status(400).json({ error: 'text is required' });
      return;
    }
    res.json({ status: 'ok', accepted: handlers.utterance(text) });
  });

  app.post(
    '/voice',
    express.raw({ type: () => true, limit: VOICE_AUDIO_LIMIT }),
    (req: Request, res: Response, next: NextFunction) => {
      const voice = handlers.voice;
      if (!voice) {
        res.status(503).json({ error: 'speech-to-text is not configured' });
        return;
      }
      const audio: unknown = req.body;
      if (!Buffer.isBuffer(audio) || audio.length === 0) {
        res.status(400).json({ error: 'audio body is required' });
        return;
      }
      const extension = AUDIO_EXTENSIONS[(req.headers['content-type'] ?? '').split(';')[0].trim()] ?? 'wav';
      voice(audio, `utterance.${extension}`)
        .then(text => {
          res.json({ status: 'ok', text });
        })
        .catch(next);
    },
  );

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    logger.warn('Ingest: request failed:', err);
    const status = isRecord(err) && typeof err.status === 'number' ? err.status : 500;
    res.status(status).json({ error: status === 500 ? 'internal error' : 'bad request' });
  });

  return app;
}

export class IngestServer {
  private server: Server | null = null;
  readonly app: Express;

  constructor(handlers: IngestHandlers, options: IngestServerOptions) {
    this.app = createIngestApp(handlers, options);
  }

  /** Listen; resolves with the bound port (useful with port 0). */
  start(port: number, host = '127.0.0.1'): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, host);
      server.once('listening', () => {
        const address = server.address();
        const bound = typeof address === 'object' && address !== null ? address.port : port;
        logger.info(`Ingest: listening on http://${host}:${bound}`);
        resolve(bound);
      });
      server.once('error', reject);
      this.server = server;
    });
  }

  /** Stop accepting requests and drop open connections. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;
    await new Promise<void>((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    logger.info('Ingest: stopped');
  }
}
