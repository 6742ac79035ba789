import { z } from 'zod';
import type { ErrorBody } from '../serialize.js';

export const GetStatusSchema = z.object({
  type: z.literal('get_status')
});

export const DescribeRequestSchema = z.object({
  type: z.literal('describe'),
  speak: z.boolean().optional()
});

export const ClientMessageSchema = z.discriminatedUnion('type', [GetStatusSchema, DescribeRequestSchema]);

export type ClientMessage = z.infer<typeof ClientMessageSchema>;

export type StatusMessage = {
  type: 'status';
  loop_state: 'stopped' | 'running';
  interval: number | null;
  last_description: string | null;
  last_error: ErrorBody | null;
  last_notification_error: ErrorBody | null;
  tick_count: number;
};

export type VisionUpdate = {
  type: 'vision_update';
  source: 'loop' | 'on_demand';
  description: string;
  provider: string | null;
  captured_at: number;
  described_at: number;
};

export type VisionErrorMessage = ErrorBody & {
  type: 'vision_error';
  source: 'loop' | 'on_demand';
};

export type NotificationErrorMessage = ErrorBody & {
  type: 'notification_error';
};

export type ErrorMessage = {
  type: 'error';
  code: string;
  message: string;
};

export type ServerMessage =
  | StatusMessage
  | VisionUpdate
  | VisionErrorMessage
  | NotificationErrorMessage
  | ErrorMessage;
