import type { NotificationChannel, NotificationResult, ZoneStatusSummary } from './types.js';

export interface ChannelClient {
  readonly channel: NotificationChannel;
  readonly enabled: boolean;
  /** Longest message the channel accepts in one send. */
  readonly maxLength: number;
  send(recipient: string, message: string): Promise<NotificationResult>;
  formatAlert(entityName: string, status: ZoneStatusSummary): string;
}
