import { createServer, type Server } from 'node:http';
import { webhookCallback, type Bot } from 'grammy';

import { serializeError, type RuntimeLogger } from '../../utils/runtimeLogger.js';

/**
 * How long an update may run before Telegram gets its 200. LLM and image calls
 * outlast it; they keep running after the acknowledgement, and Telegram does
 * not redeliver an acknowledged update.
 */
export const WEBHOOK_ACK_TIMEOUT_MS = 9_000;

export type WebhookServerOptions = {
  bot: Bot;
  host: string;
  port: number;
  /** Public URL registered with Telegram; its path is the one served. */
  webhookUrl: string;
  logger: RuntimeLogger;
  ackTimeoutMs?: number;
};

export async function listenForWebhooks(options: WebhookServerOptions): Promise<Server> {
  const { bot, host, port, logger } = options;
  const handleUpdate = webhookCallback(bot, 'http', {
    onTimeout: 'return',
    timeoutMilliseconds: options.ackTimeoutMs ?? WEBHOOK_ACK_TIMEOUT_MS,
  });
  const webhookPath = new URL(options.webhookUrl).pathname || '/';

  const server = createServer((req, res) => {
    const requestPath = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (req.method !== 'POST' || requestPath !== webhookPath) {
      res.writeHead(404).end();
      return;
    }
    handleUpdate(req, res).catch((err: unknown) => {
      logger.error('webhook update failed', { error: serializeError(err) });
      if (!res.headersSent) {
        res.writeHead(500).end();
      }
    });
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      resolve();
    });
  });

  logger.info('webhook server listening', { host, port, path: webhookPath });
  return server;
}
