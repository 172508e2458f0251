// src/server/index.ts
// HTTP transport: messages and button presses in, replies out

import express from 'express';
import { createServer } from 'http';
import { z } from 'zod';
import { CommandRouter } from '../router/index.js';
import { ServiceContainer } from '../services/index.js';
import { Reply } from '../tools/index.js';
import { info, error, debug } from '../utils/logger.js';

const UserIdSchema = z.number().int();

const MessageBodySchema = z.object({
  userId: UserIdSchema,
  text: z.string(),
});

const CallbackBodySchema = z.object({
  userId: UserIdSchema,
  data: z.string().min(1),
});

export class BotServer {
  readonly app = express();
  private server = createServer(this.app);
  private router: CommandRouter;
  private apiToken: string;

  constructor(services: ServiceContainer, router: CommandRouter) {
    this.router = router;
    this.apiToken = services.config.bot.token?.trim() || '';
    this.setupRoutes();
  }

  private setupRoutes() {
    this.app.use(express.json({ limit: '64kb' }));

    this.app.get('/api/health', (_req, res) => {
      res.json({ status: 'ok' });
    });

    this.app.post('/api/message', async (req, res) => {
      if (!this.isAuthorized(req)) {
        res.status(401).json({ error: 'Unauthorized' });
        return;
      }

      const body = MessageBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'Expected { userId: integer, text: string }' });
        return;
      }

      await this.respond(res, () => this.router.handleMessage(body.data.userId, body.data.text));
    });

    this.app.post('/api/callback', async (req, res) => {
      if (!this.isAuthorized(req)) {
        res.status(401).json({ error: 'Unauthorized' });
        return;
      }

      const body = CallbackBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: 'Expected { userId: integer, data: string }' });
        return;
      }

      await this.respond(res, () => this.router.handleCallback(body.data.userId, body.data.data));
    });
  }

  private async respond(res: express.Response, handle: () => Promise<Reply[]>): Promise<void> {
    try {
      const replies = await handle();
      debug('Request handled', { replies: replies.length });
      res.json({ replies });
    } catch (err) {
      error('Request failed', { error: String(err) });
      res.status(500).json({ error: 'Failed to process request' });
    }
  }

  private isAuthorized(req: express.Request): boolean {
    if (!this.apiToken) return true;
    const authHeader = req.get('authorization') || '';
    const bearerMatch = authHeader.match(/^Bearer\s+(.+)$/i);
    const token = bearerMatch?.[1] || req.get('x-bot-token');
    return token === this.apiToken;
  }

  start(port: number = 3000, host: string = '0.0.0.0'): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(port, host, () => {
        info(`Bot server running at http://${host}:${port}`);
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.close((err) => (err ? reject(err) : resolve()));
    });
  }
}
