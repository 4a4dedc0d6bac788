import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DedupStoreService } from './dedup-store.service';
import { MatchRecord } from '../common/interfaces';
import { ConsistencyError } from '../common/errors';

describe('DedupStoreService', () => {
  let tmpDir: string;
  let dbPath: string;
  let service: DedupStoreService;

  const createRecord = (overrides: Partial<MatchRecord> = {}): MatchRecord => ({
    messageId: 'msg-1',
    sender: 'Alice Martin',
    subject: 'Offre Varun',
    receivedAt: new Date('2026-03-01T09:00:00Z'),
    bodyPreview: 'Ci-joint',
    matchedFilenames: ['offer.txt'],
    ...overrides,
  });

  const createService = async (): Promise<DedupStoreService> => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        DedupStoreService,
        {
          provide: ConfigService,
          useValue: { get: jest.fn((key: string) => (key === 'app.dbPath' ? dbPath : undefined)) },
        },
      ],
    }).compile();

    const store = module.get<DedupStoreService>(DedupStoreService);
    await store.onModuleInit();
    return store;
  };

  beforeEach(async () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dedup-store-'));
    dbPath = path.join(tmpDir, 'store.db');
    service = await createService();
  });

  afterEach(() => {
    service.onModuleDestroy();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('recordEvaluated', () => {
    it('should record a match and make it visible to every lookup', async () => {
      const record = createRecord();

      expect(await service.recordEvaluated('msg-1', record)).toBe('recorded');

      expect(await service.hasEvaluated('msg-1')).toBe(true);
      expect(await service.contains('msg-1')).toBe(true);
      expect(await service.getMatch('msg-1')).toEqual(record);
    });

    it('should record a non-matching message as evaluated only', async () => {
      expect(await service.recordEvaluated('msg-2', null)).toBe('recorded');

      expect(await service.hasEvaluated('msg-2')).toBe(true);
      expect(await service.contains('msg-2')).toBe(false);
      expect(await service.getMatch('msg-2')).toBeNull();
    });

    it('should be a no-op when the same outcome is recorded twice', async () => {
      await service.recordEvaluated('msg-1', createRecord());

      expect(await service.recordEvaluated('msg-1', createRecord())).toBe('unchanged');
      expect(await service.recordEvaluated('msg-3', null)).toBe('recorded');
      expect(await service.recordEvaluated('msg-3', null)).toBe('unchanged');
      expect(await service.stats()).toEqual({ evaluated: 2, matched: 1 });
    });

    it('should reject a match for a message already recorded without one', async () => {
      await service.recordEvaluated('msg-1', null);
      await expect(service.recordEvaluated('msg-1', createRecord())).rejects.toThrow(ConsistencyError);
    });

    it('should reject a missing match for a message already recorded with one', async () => {
      await service.recordEvaluated('msg-1', createRecord());
      await expect(service.recordEvaluated('msg-1', null)).rejects.toThrow(ConsistencyError);
    });

    it('should reject a different list of matched filenames', async () => {
      await service.recordEvaluated('msg-1', createRecord());
      await expect(
        service.recordEvaluated('msg-1', createRecord({ matchedFilenames: ['offer.txt', 'other.pdf'] })),
      ).rejects.toThrow(ConsistencyError);
      expect((await service.getMatch('msg-1'))?.matchedFilenames).toEqual(['offer.txt']);
    });

    it('should reject a record stored under another id', async () => {
      await expect(service.recordEvaluated('msg-9', createRecord())).rejects.toThrow(ConsistencyError);
      expect(await service.hasEvaluated('msg-9')).toBe(false);
    });

    it('should serialise concurrent writes of the same id', async () => {
      const outcomes = await Promise.all([
        service.recordEvaluated('msg-1', createRecord()),
        service.recordEvaluated('msg-1', createRecord()),
      ]);

      expect(outcomes).toEqual(['recorded', 'unchanged']);
    });

    it('should not keep a write that could not reach the disk', async () => {
      fs.rmSync(tmpDir, { recursive: true, force: true });

      await expect(service.recordEvaluated('msg-1', createRecord())).rejects.toThrow();
      expect(await service.hasEvaluated('msg-1')).toBe(false);
      expect(await service.contains('msg-1')).toBe(false);
    });
  });

  describe('persistence', () => {
    it('should reload evaluated ids and matches after a restart', async () => {
      await service.recordEvaluated('msg-1', createRecord());
      await service.recordEvaluated('msg-2', null);
      service.onModuleDestroy();

      service = await createService();

      expect(await service.hasEvaluated('msg-1')).toBe(true);
      expect(await service.hasEvaluated('msg-2')).toBe(true);
      expect(await service.getMatch('msg-1')).toEqual(createRecord());
    });
  });

  describe('listMatches', () => {
    beforeEach(async () => {
      const t1 = new Date('2026-03-01T08:00:00Z');
      const t2 = new Date('2026-03-02T08:00:00Z');
      const t3 = new Date('2026-03-03T08:00:00Z');
      await service.recordEvaluated('m1', createRecord({ messageId: 'm1', receivedAt: t1, subject: 'Premier' }));
      await service.recordEvaluated('m3', createRecord({ messageId: 'm3', receivedAt: t3, subject: 'Troisième' }));
      await service.recordEvaluated('m2', createRecord({ messageId: 'm2', receivedAt: t2, sender: 'Bob Durand' }));
      await service.recordEvaluated('m0', null);
    });

    it('should list matches newest first', async () => {
      const matches = await service.listMatches();
      expect(matches.map((m) => m.messageId)).toEqual(['m3', 'm2', 'm1']);
    });

    it('should order identical dates by message id', async () => {
      const same = new Date('2026-03-03T08:00:00Z');
      await service.recordEvaluated('m4', createRecord({ messageId: 'm4', receivedAt: same }));
      await service.recordEvaluated('a5', createRecord({ messageId: 'a5', receivedAt: same }));

      const matches = await service.listMatches({ limit: 3 });
      expect(matches.map((m) => m.messageId)).toEqual(['a5', 'm3', 'm4']);
    });

    it('should filter on sender or subject without regard to case', async () => {
      expect((await service.listMatches({ search: 'bob' })).map((m) => m.messageId)).toEqual(['m2']);
      expect((await service.listMatches({ search: 'TROISIÈME' })).map((m) => m.messageId)).toEqual(['m3']);
    });
  });
});
