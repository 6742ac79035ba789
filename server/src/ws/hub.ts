import { WebSocketServer, WebSocket } from 'ws';
import type { Server as HttpServer } from 'http';
import type { Logger } from 'pino';
import { toDescriptionBody, toErrorBody } from '../serialize.js';
import type { VisionSystem } from '../vision/vision.system.js';
import type { DescribeSource, Description, RecordedError } from '../vision/vision.types.js';
import { ClientMessageSchema, type ServerMessage, type StatusMessage } from './schemas.js';

export type WsHub = {
  broadcast: (message: ServerMessage) => void;
  clientCount: () => number;
  close: () => Promise<void>;
};

export function createWsHub(params: {
  server: HttpServer;
  path: string;
  vision: VisionSystem;
  logger: Logger;
}): WsHub {
  const { vision } = params;
  const log = params.logger.child({ component: 'ws' });
  const wss = new WebSocketServer({ server: params.server, path: params.path });

  const send = (ws: WebSocket, message: ServerMessage) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  const broadcast = (message: ServerMessage) => {
    for (const client of wss.clients) {
      send(client, message);
    }
  };

  const statusMessage = (): StatusMessage => {
    const status = vision.getStatus();
    return {
      type: 'status',
      loop_state: status.loopState,
      interval: status.intervalSeconds,
      last_description: status.lastDescription?.text ?? null,
      last_error: toErrorBody(status.lastError),
      last_notification_error: toErrorBody(status.lastNotificationError),
      tick_count: status.tickCount
    };
  };

  const onDescription = (description: Description, source: DescribeSource) => {
    broadcast({ type: 'vision_update', source, ...toDescriptionBody(description) });
  };
  const onVisionError = (error: RecordedError, source: DescribeSource) => {
    broadcast({ type: 'vision_error', source, ...error });
  };
  const onNotificationError = (error: RecordedError) => {
    broadcast({ type: 'notification_error', ...error });
  };

  vision.on('description', onDescription);
  vision.on('vision_error', onVisionError);
  vision.on('notification_error', onNotificationError);

  wss.on('connection', (ws) => {
    send(ws, statusMessage());

    ws.on('message', async (data) => {
      let parsedMessage: unknown;
      try {
        parsedMessage = JSON.parse(data.toString());
      } catch {
        send(ws, { type: 'error', code: 'invalid_json', message: 'Invalid JSON.' });
        return;
      }

      const result = ClientMessageSchema.safeParse(parsedMessage);
      if (!result.success) {
        send(ws, { type: 'error', code: 'invalid_message', message: 'Message failed validation.' });
        return;
      }

      const message = result.data;
      switch (message.type) {
        case 'get_status': {
          send(ws, statusMessage());
          break;
        }
        case 'describe': {
          try {
            await vision.describeCurrentView({ speak: message.speak ?? false, source: 'on_demand' });
          } catch (error) {
            // already broadcast as vision_error
            log.debug({ err: error }, 'describe over websocket failed');
          }
          break;
        }
      }
    });

    ws.on('error', (error) => {
      log.warn({ err: error }, 'websocket client error');
    });
  });

  return {
    broadcast,
    clientCount: () => wss.clients.size,
    close: () =>
      new Promise<void>((resolve, reject) => {
        vision.off('description', onDescription);
        vision.off('vision_error', onVisionError);
        vision.off('notification_error', onNotificationError);
        for (const client of wss.clients) {
          client.terminate();
        }
        wss.close((error) => (error ? reject(error) : resolve()));
      })
  };
}
