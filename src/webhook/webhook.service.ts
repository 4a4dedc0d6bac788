import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosInstance } from 'axios';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { MatchRecord, NotificationSink } from '../common/interfaces';
import { errorMessage } from '../common/errors';
import {
  NewWebhookEndpoint,
  WebhookDelivery,
  WebhookEndpoint,
  WebhookEvent,
  WebhookEventType,
  WebhookHistoryEntry,
} from './webhook.types';

const DEFAULT_MAX_ATTEMPTS = 3;
export const HISTORY_LIMIT = 500;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isEndpoint = (value: unknown): value is WebhookEndpoint =>
  isRecord(value) &&
  typeof value.id === 'string' &&
  typeof value.url === 'string' &&
  typeof value.enabled === 'boolean' &&
  (value.events === '*' || Array.isArray(value.events));

const parseJsonLine = (line: string): unknown => {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
};

const isHistoryEntry = (value: unknown): value is WebhookHistoryEntry =>
  isRecord(value) && isRecord(value.event) && Array.isArray(value.deliveries);

/**
 * Notification des nouvelles correspondances par webhook HTTP.
 * Les nouvelles tentatives se font ici: le moteur n'en refait jamais.
 */
@Injectable()
export class WebhookService implements NotificationSink {
  private readonly logger = new Logger(WebhookService.name);
  private readonly http: AxiosInstance;
  private readonly endpoints = new Map<string, WebhookEndpoint>();
  private history: WebhookHistoryEntry[] = [];
  private readonly endpointsFile: string;
  private readonly historyFile: string;
  private readonly retryDelayMs: number;

  constructor(private readonly configService: ConfigService) {
    this.http = axios.create({
      timeout: this.configService.get<number>('webhook.timeoutMs', 10000),
      headers: {
        'Content-Type': 'application/json',
        'User-Agent': 'AttachmentKeywordMonitor/1.0',
      },
    });
    this.retryDelayMs = this.configService.get<number>('webhook.retryDelayMs', 1000);

    const outputDir = this.configService.get<string>('app.outputDir', './output');
    this.endpointsFile = path.join(outputDir, 'webhook-endpoints.json');
    this.historyFile = path.join(outputDir, 'webhook-history.jsonl');

    this.restore();
  }

  // ============ ENDPOINTS ============

  listEndpoints(): WebhookEndpoint[] {
    return [...this.endpoints.values()];
  }

  addEndpoint(endpoint: NewWebhookEndpoint): string {
    const id = `wh_${crypto.randomUUID().slice(0, 8)}`;
    this.endpoints.set(id, { ...endpoint, id });
    this.persistEndpoints();
    this.logger.log(`Endpoint webhook ajouté: ${id} → ${endpoint.url}`);
    return id;
  }

  removeEndpoint(id: string): boolean {
    const removed = this.endpoints.delete(id);
    if (removed) {
      this.persistEndpoints();
      this.logger.log(`Endpoint webhook supprimé: ${id}`);
    }
    return removed;
  }

  // ============ ÉVÉNEMENTS ============

  async notify(record: MatchRecord): Promise<void> {
    await this.emit(WebhookEventType.MATCH_FOUND, {
      messageId: record.messageId,
      sender: record.sender,
      subject: record.subject,
      receivedAt: record.receivedAt.toISOString(),
      bodyPreview: record.bodyPreview,
      matchedFilenames: record.matchedFilenames,
    });
  }

  /**
   * Envoie un événement aux endpoints actifs abonnés, l'un après l'autre
   */
  async emit(type: WebhookEventType, data: Record<string, unknown>): Promise<WebhookDelivery[]> {
    const targets = this.listEndpoints().filter(
      (endpoint) => endpoint.enabled && (endpoint.events === '*' || endpoint.events.includes(type)),
    );
    if (targets.length === 0) {
      this.logger.debug(`Aucun endpoint abonné à ${type}`);
      return [];
    }

    const event: WebhookEvent = {
      id: `evt_${crypto.randomUUID()}`,
      type,
      timestamp: new Date().toISOString(),
      data,
    };
    const body = JSON.stringify(event);

    const deliveries: WebhookDelivery[] = [];
    for (const endpoint of targets) {
      deliveries.push(await this.deliver(endpoint, event, body));
    }

    this.record({ event, deliveries });
    return deliveries;
  }

  getEventHistory(limit = 100): WebhookHistoryEntry[] {
    return this.history.slice(-limit).reverse();
  }

  /**
   * HMAC-SHA256 hexadécimal du corps envoyé
   */
  sign(body: string, secret: string): string {
    return crypto.createHmac('sha256', secret).update(body).digest('hex');
  }

  private async deliver(endpoint: WebhookEndpoint, event: WebhookEvent, body: string): Promise<WebhookDelivery> {
    const startedAt = Date.now();
    const maxAttempts = Math.max(1, endpoint.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    const headers: Record<string, string> = {
      ...endpoint.headers,
      'X-Webhook-Event': event.type,
      'X-Webhook-ID': event.id,
      'X-Webhook-Timestamp': event.timestamp,
      ...(endpoint.secret ? { 'X-Webhook-Signature': this.sign(body, endpoint.secret) } : {}),
    };

    let statusCode: number | undefined;
    let lastError = '';

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const response = await this.http.post(endpoint.url, body, { headers });
        this.logger.log(`Webhook ${event.type} → ${endpoint.url} (${response.status})`);
        return {
          endpointId: endpoint.id,
          success: true,
          attempts: attempt,
          statusCode: response.status,
          durationMs: Date.now() - startedAt,
        };
      } catch (error) {
        statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
        lastError = errorMessage(error);

        if (attempt < maxAttempts) {
          this.logger.warn(`Webhook ${endpoint.url}: tentative ${attempt}/${maxAttempts} échouée (${lastError})`);
          await new Promise((resolve) => setTimeout(resolve, this.retryDelayMs * attempt));
        }
      }
    }

    this.logger.error(`Webhook ${endpoint.url} abandonné après ${maxAttempts} tentative(s): ${lastError}`);
    return {
      endpointId: endpoint.id,
      success: false,
      attempts: maxAttempts,
      statusCode,
      error: lastError,
      durationMs: Date.now() - startedAt,
    };
  }

  // ============ PERSISTANCE ============

  private restore() {
    for (const endpoint of this.readEndpointsFile()) {
      this.endpoints.set(endpoint.id, endpoint);
    }

    const defaultUrl = this.configService.get<string>('webhook.defaultUrl');
    if (defaultUrl && !this.listEndpoints().some((endpoint) => endpoint.url === defaultUrl)) {
      this.endpoints.set('default', {
        id: 'default',
        url: defaultUrl,
        secret: this.configService.get<string>('webhook.secret') || undefined,
        events: '*',
        enabled: true,
      });
    }

    this.history = this.readHistoryFile();
    this.logger.log(`${this.listEndpoints().filter((e) => e.enabled).length} endpoint(s) webhook actif(s)`);
  }

  private readEndpointsFile(): WebhookEndpoint[] {
    if (!fs.existsSync(this.endpointsFile)) return [];
    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.endpointsFile, 'utf-8'));
      return Array.isArray(parsed) ? parsed.filter(isEndpoint) : [];
    } catch (error) {
      this.logger.warn(`Fichier endpoints illisible ${this.endpointsFile}: ${errorMessage(error)}`);
      return [];
    }
  }

  private persistEndpoints() {
    try {
      fs.mkdirSync(path.dirname(this.endpointsFile), { recursive: true });
      fs.writeFileSync(this.endpointsFile, JSON.stringify(this.listEndpoints(), null, 2));
    } catch (error) {
      this.logger.error(`Sauvegarde des endpoints impossible: ${errorMessage(error)}`);
    }
  }

  // Une ligne JSON par événement; une ligne illisible est ignorée seule
  private readHistoryFile(): WebhookHistoryEntry[] {
    if (!fs.existsSync(this.historyFile)) return [];

    let content: string;
    try {
      content = fs.readFileSync(this.historyFile, 'utf-8');
    } catch (error) {
      this.logger.warn(`Historique webhook illisible: ${errorMessage(error)}`);
      return [];
    }

    const entries: WebhookHistoryEntry[] = [];
    let skipped = 0;
    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      const parsed = parseJsonLine(line);
      if (isHistoryEntry(parsed)) {
        entries.push(parsed);
      } else {
        skipped++;
      }
    }

    if (skipped > 0) {
      this.logger.warn(`${skipped} ligne(s) ignorée(s) dans ${this.historyFile}`);
    }
    return entries.slice(-HISTORY_LIMIT);
  }

  private record(entry: WebhookHistoryEntry) {
    this.history.push(entry);

    try {
      fs.mkdirSync(path.dirname(this.historyFile), { recursive: true });
      if (this.history.length > HISTORY_LIMIT) {
        // Fichier réécrit au plafond pour suivre la mémoire
        this.history = this.history.slice(-HISTORY_LIMIT);
        fs.writeFileSync(this.historyFile, this.history.map((item) => `${JSON.stringify(item)}\n`).join(''));
      } else {
        fs.appendFileSync(this.historyFile, `${JSON.stringify(entry)}\n`);
      }
    } catch (error) {
      this.logger.debug(`Écriture historique webhook impossible: ${errorMessage(error)}`);
    }
  }
}
