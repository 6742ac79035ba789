import fs from 'fs/promises';
import path from 'path';
import type { Logger } from 'pino';
import { z } from 'zod';
import type { VisionSystem } from '../vision/vision.system.js';
import type { DescribeSource, Description, RecordedError } from '../vision/vision.types.js';

const RecordedErrorSchema = z.object({
  kind: z.string(),
  code: z.string(),
  message: z.string(),
  at: z.number()
});

export const VisionEventSchema = z.object({
  ts_iso: z.string(),
  kind: z.enum(['description', 'error', 'notification_error']),
  source: z.enum(['loop', 'on_demand']).optional(),
  description: z.string().optional(),
  provider: z.string().optional(),
  error: RecordedErrorSchema.optional()
});

export type VisionEvent = z.infer<typeof VisionEventSchema>;

/** Append-only JSONL history of what the camera saw and what went wrong. */
export class EventLog {
  readonly path: string;

  constructor(outputPath: string) {
    this.path = path.resolve(outputPath);
  }

  async append(event: VisionEvent) {
    await fs.mkdir(path.dirname(this.path), { recursive: true });
    await fs.appendFile(this.path, `${JSON.stringify(event)}\n`, 'utf8');
  }

  async recent(limit = 20): Promise<VisionEvent[]> {
    const events = await this.readAll();
    return limit > 0 && events.length > limit ? events.slice(-limit) : events;
  }

  /** Events whose timestamp falls within [from, to]; either bound may be left open. */
  async range(from?: Date, to?: Date): Promise<VisionEvent[]> {
    const start = from?.getTime() ?? Number.NEGATIVE_INFINITY;
    const end = to?.getTime() ?? Number.POSITIVE_INFINITY;
    const events = await this.readAll();
    return events.filter((event) => {
      const at = Date.parse(event.ts_iso);
      return !Number.isNaN(at) && at >= start && at <= end;
    });
  }

  private async readAll(): Promise<VisionEvent[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }
    const events: VisionEvent[] = [];
    for (const line of raw.split('\n')) {
      const trimmed = line.trim();
      if (!trimmed) continue;
      const parsed = VisionEventSchema.safeParse(parseLine(trimmed));
      if (parsed.success) {
        events.push(parsed.data);
      }
    }
    return events;
  }
}

/** Mirrors every description and failure the vision system reports into the log. */
export function attachEventLog(vision: VisionSystem, eventLog: EventLog, logger: Logger): () => void {
  const write = (event: VisionEvent) => {
    eventLog.append(event).catch((error: unknown) => {
      logger.warn({ err: error, path: eventLog.path }, 'Failed to append vision event');
    });
  };
  const onDescription = (description: Description, source: DescribeSource) => {
    write({
      ts_iso: new Date(description.describedAt).toISOString(),
      kind: 'description',
      source,
      description: description.text,
      provider: description.provider
    });
  };
  const onError = (error: RecordedError, source: DescribeSource) => {
    write({ ts_iso: new Date(error.at).toISOString(), kind: 'error', source, error });
  };
  const onNotificationError = (error: RecordedError) => {
    write({ ts_iso: new Date(error.at).toISOString(), kind: 'notification_error', error });
  };

  vision.on('description', onDescription);
  vision.on('vision_error', onError);
  vision.on('notification_error', onNotificationError);
  return () => {
    vision.off('description', onDescription);
    vision.off('vision_error', onError);
    vision.off('notification_error', onNotificationError);
  };
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return null;
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
