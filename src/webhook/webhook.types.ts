export enum WebhookEventType {
  MATCH_FOUND = 'match.found',
  TEST = 'webhook.test',
}

export interface WebhookEvent {
  id: string;
  type: WebhookEventType;
  timestamp: string;
  data: Record<string, unknown>;
}

export interface WebhookEndpoint {
  id: string;
  url: string;
  secret?: string;
  events: WebhookEventType[] | '*';
  enabled: boolean;
  maxAttempts?: number;
  headers?: Record<string, string>;
}

export type NewWebhookEndpoint = Omit<WebhookEndpoint, 'id'>;

export interface WebhookDelivery {
  endpointId: string;
  success: boolean;
  attempts: number;
  statusCode?: number;
  error?: string;
  durationMs: number;
}

export interface WebhookHistoryEntry {
  event: WebhookEvent;
  deliveries: WebhookDelivery[];
}
