// src/router/index.ts
import { BotAction, Reply, ToolContext, executeAction } from '../tools/index.js';
import { ServiceContainer } from '../services/index.js';
import { parseCallback, parseMessage } from './parse.js';
import { debug, error, info } from '../utils/logger.js';

export class CommandRouter {
  private services: ServiceContainer;

  constructor(services: ServiceContainer) {
    this.services = services;
  }

  async initialize(): Promise<void> {
    info('CommandRouter initialized');
  }

  /** A typed message: a `/command` or a bare city name. Blank text gets no reply. */
  async handleMessage(userId: number, text: string): Promise<Reply[]> {
    const action = parseMessage(text);
    if (!action) return [];
    return this.dispatch(userId, action);
  }

  /**
   * A pressed button. The first reply replaces the message the button
   * belongs to.
   */
  async handleCallback(userId: number, data: string): Promise<Reply[]> {
    const replies = await this.dispatch(userId, parseCallback(data));
    return replies.map((reply, i) => (i === 0 ? { ...reply, edit: true } : reply));
  }

  private async dispatch(userId: number, action: BotAction): Promise<Reply[]> {
    const context: ToolContext = {
      userId,
      prefs: this.services.preferences.getOrCreate(userId),
      services: this.services,
    };

    debug('Dispatching action', { userId, action: action.type });

    try {
      return await executeAction(action, context);
    } catch (err) {
      error('Action failed', { userId, action: action.type, error: String(err) });
      return [{
        text: this.services.i18n.t(context.prefs.language, 'unexpected_error'),
        buttons: [],
        edit: false,
      }];
    }
  }
}

export { parseCallback, parseMessage, encodeCallback } from './parse.js';
