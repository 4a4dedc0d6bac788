import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as crypto from 'crypto';
import * as fs from 'fs';
import * as http from 'http';
import * as os from 'os';
import * as path from 'path';
import { HISTORY_LIMIT, WebhookService } from './webhook.service';
import { WebhookEventType } from './webhook.types';
import { MatchRecord } from '../common/interfaces';

interface ReceivedRequest {
  url: string;
  headers: http.IncomingHttpHeaders;
  body: string;
}

describe('WebhookService', () => {
  let server: http.Server;
  let baseUrl: string;
  let received: ReceivedRequest[];
  let statuses: number[];
  let outputDir: string;
  let service: WebhookService;

  const record: MatchRecord = {
    messageId: '<offer-1@example.com>',
    sender: 'Alice Martin',
    subject: 'Offre',
    receivedAt: new Date('2026-03-02T10:00:00Z'),
    bodyPreview: "Bonjour, voici l'offre",
    matchedFilenames: ['offer.txt'],
  };

  const createService = async (): Promise<WebhookService> => {
    const config: Record<string, unknown> = {
      'app.outputDir': outputDir,
      'webhook.defaultUrl': `${baseUrl}/hook`,
      'webhook.secret': 'test-secret',
      'webhook.timeoutMs': 2000,
      'webhook.retryDelayMs': 1,
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        WebhookService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string, fallback?: unknown) => config[key] ?? fallback) },
        },
      ],
    }).compile();

    return module.get<WebhookService>(WebhookService);
  };

  beforeEach(async () => {
    received = [];
    statuses = [];
    outputDir = fs.mkdtempSync(path.join(os.tmpdir(), 'webhook-'));

    server = http.createServer((req, res) => {
      const chunks: Buffer[] = [];
      req.on('data', (chunk: Buffer) => chunks.push(chunk));
      req.on('end', () => {
        received.push({ url: req.url ?? '', headers: req.headers, body: Buffer.concat(chunks).toString('utf-8') });
        res.statusCode = statuses.shift() ?? 200;
        res.end('ok');
      });
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));

    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('adresse du serveur de test inconnue');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;

    service = await createService();
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    fs.rmSync(outputDir, { recursive: true, force: true });
  });

  it('should post a signed match.found event for a new match', async () => {
    await service.notify(record);

    expect(received).toHaveLength(1);
    const [request] = received;
    expect(request.url).toBe('/hook');
    expect(request.headers['x-webhook-event']).toBe('match.found');
    expect(request.headers['x-webhook-signature']).toBe(
      crypto.createHmac('sha256', 'test-secret').update(request.body).digest('hex'),
    );

    const payload: unknown = JSON.parse(request.body);
    expect(payload).toMatchObject({
      type: 'match.found',
      data: {
        messageId: '<offer-1@example.com>',
        sender: 'Alice Martin',
        receivedAt: '2026-03-02T10:00:00.000Z',
        matchedFilenames: ['offer.txt'],
      },
    });
  });

  it('should retry a failed delivery', async () => {
    statuses = [500];

    const [result] = await service.emit(WebhookEventType.TEST, { isTest: true });

    expect(received).toHaveLength(2);
    expect(result).toMatchObject({ endpointId: 'default', success: true, attempts: 2, statusCode: 200 });
  });

  it('should give up after the last attempt and report the status', async () => {
    statuses = [503, 503, 503];

    const [result] = await service.emit(WebhookEventType.MATCH_FOUND, { messageId: 'x' });

    expect(received).toHaveLength(3);
    expect(result).toMatchObject({ endpointId: 'default', success: false, attempts: 3, statusCode: 503 });
  });

  it('should keep a history of sent events', async () => {
    await service.notify(record);

    const [entry] = service.getEventHistory(1);
    expect(entry.event.type).toBe('match.found');
    expect(entry.deliveries[0].success).toBe(true);
  });

  it('should only send to endpoints subscribed to the event', async () => {
    service.removeEndpoint('default');
    service.addEndpoint({ url: `${baseUrl}/tests-only`, events: [WebhookEventType.TEST], enabled: true, maxAttempts: 1 });

    expect(await service.emit(WebhookEventType.MATCH_FOUND, { messageId: 'x' })).toEqual([]);
    await service.emit(WebhookEventType.TEST, { isTest: true });

    expect(received.map((r) => r.url)).toEqual(['/tests-only']);
    expect(received[0].headers['x-webhook-signature']).toBeUndefined();
  });

  it('should persist added endpoints', async () => {
    const id = service.addEndpoint({ url: `${baseUrl}/other`, events: '*', enabled: true });

    const reloaded = await createService();

    expect(reloaded.listEndpoints().map((e) => e.id)).toEqual(['default', id]);
  });

  describe('history file', () => {
    const historyFile = () => path.join(outputDir, 'webhook-history.jsonl');

    const historyLine = (id: string) =>
      JSON.stringify({
        event: { id, type: 'webhook.test', timestamp: '2026-03-01T00:00:00.000Z', data: {} },
        deliveries: [],
      });

    it('should skip unreadable lines and keep the others', async () => {
      fs.writeFileSync(historyFile(), [historyLine('evt_a'), '{pas du json', '42', historyLine('evt_b'), ''].join('\n'));

      const reloaded = await createService();

      expect(reloaded.getEventHistory().map((entry) => entry.event.id)).toEqual(['evt_b', 'evt_a']);
    });

    it('should trim the file to the history limit', async () => {
      const lines = Array.from({ length: HISTORY_LIMIT }, (_, i) => `${historyLine(`evt_old_${i}`)}\n`);
      fs.writeFileSync(historyFile(), lines.join(''));
      const reloaded = await createService();

      await reloaded.notify(record);

      const stored = fs.readFileSync(historyFile(), 'utf-8').trim().split('\n');
      expect(stored).toHaveLength(HISTORY_LIMIT);
      expect(JSON.parse(stored[0]).event.id).toBe('evt_old_1');
      expect(JSON.parse(stored[HISTORY_LIMIT - 1]).event.type).toBe('match.found');
    });
  });
});
