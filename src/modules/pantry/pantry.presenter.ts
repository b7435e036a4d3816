import type { HistoryEvent } from '../../connections/db/models/history-event.model';
import { formatTimestamp } from '../../utils/timestamp';

export type HistoryEventView = Omit<HistoryEvent, 'timestamp'> & { timestamp: string };

// Timestamps leave the API in the store's naive format
export const presentEvent = (event: HistoryEvent): HistoryEventView => ({
  ...event,
  timestamp: formatTimestamp(event.timestamp),
});

export const connectionMeta = (connectionError: string | null): Record<string, unknown> | undefined =>
  connectionError ? { connection_error: connectionError } : undefined;
