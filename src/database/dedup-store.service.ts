import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import initSqlJs, { Database, SqlValue } from 'sql.js';
import * as fs from 'fs';
import * as path from 'path';
import { MatchRecord } from '../common/interfaces';
import { ConsistencyError } from '../common/errors';
import { normalizeForMatch } from '../common/keyword';
import { DedupStats, MatchQuery, RecordOutcome } from './entities';

type Row = Record<string, SqlValue>;

const sameFilenames = (a: string[], b: string[]): boolean =>
  a.length === b.length && a.every((name, i) => name === b[i]);

/**
 * Mémoire durable des emails évalués et des correspondances.
 * evaluated_messages et match_records ne font que grandir.
 */
@Injectable()
export class DedupStoreService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(DedupStoreService.name);
  private db: Database | null = null;
  private readonly dbPath: string;
  private writeLock: Promise<unknown> = Promise.resolve();

  constructor(private configService: ConfigService) {
    this.dbPath = this.configService.get<string>('app.dbPath') || './data/attachment-monitor.db';
  }

  async onModuleInit() {
    await this.initDatabase();
  }

  onModuleDestroy() {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private async initDatabase() {
    const SQL = await initSqlJs();

    const dir = path.dirname(this.dbPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    if (fs.existsSync(this.dbPath)) {
      this.db = new SQL.Database(fs.readFileSync(this.dbPath));
      this.logger.log(`Dedup store chargé depuis ${this.dbPath}`);
    } else {
      this.db = new SQL.Database();
      this.logger.log('Nouveau dedup store créé');
    }
    this.createTables(this.db);
  }

  private createTables(db: Database) {
    db.run(`
      CREATE TABLE IF NOT EXISTS evaluated_messages (
        id TEXT PRIMARY KEY,
        matched INTEGER NOT NULL,
        evaluated_at TEXT NOT NULL
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS match_records (
        message_id TEXT PRIMARY KEY REFERENCES evaluated_messages(id),
        sender TEXT NOT NULL,
        subject TEXT NOT NULL,
        received_at TEXT NOT NULL,
        body_preview TEXT NOT NULL,
        matched_filenames TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);

    db.run(`CREATE INDEX IF NOT EXISTS idx_match_received ON match_records(received_at DESC, message_id)`);
  }

  private get database(): Database {
    if (!this.db) {
      throw new Error('Dedup store non initialisé');
    }
    return this.db;
  }

  private queryRows(sql: string, params: SqlValue[] = []): Row[] {
    const result = this.database.exec(sql, params);
    if (result.length === 0) return [];

    const { columns, values } = result[0];
    return values.map((row) => {
      const obj: Row = {};
      columns.forEach((col, i) => (obj[col] = row[i]));
      return obj;
    });
  }

  /**
   * Écriture atomique sur disque (fichier temporaire puis rename)
   */
  private saveToFile() {
    const tmpPath = `${this.dbPath}.tmp`;
    fs.writeFileSync(tmpPath, Buffer.from(this.database.export()));
    fs.renameSync(tmpPath, this.dbPath);
  }

  /**
   * Sérialise les écritures: une seule à la fois sur tout le store
   */
  private withWriteLock<T>(task: () => T): Promise<T> {
    const run = this.writeLock.then(task);
    this.writeLock = run.catch(() => undefined);
    return run;
  }

  async hasEvaluated(id: string): Promise<boolean> {
    return this.queryRows(`SELECT id FROM evaluated_messages WHERE id = ?`, [id]).length > 0;
  }

  async contains(id: string): Promise<boolean> {
    return this.queryRows(`SELECT message_id FROM match_records WHERE message_id = ?`, [id]).length > 0;
  }

  async getMatch(id: string): Promise<MatchRecord | null> {
    const [row] = this.queryRows(`SELECT * FROM match_records WHERE message_id = ?`, [id]);
    return row ? this.mapRowToMatch(row) : null;
  }

  /**
   * Enregistre le résultat d'évaluation d'un email.
   * Idempotent pour un résultat identique, ConsistencyError si le résultat diffère.
   * Retourne seulement une fois le fichier écrit.
   */
  recordEvaluated(id: string, record: MatchRecord | null): Promise<RecordOutcome> {
    return this.withWriteLock(() => {
      if (record && record.messageId !== id) {
        throw new ConsistencyError(id, `MatchRecord ${record.messageId} enregistré sous l'id ${id}`);
      }

      const [existing] = this.queryRows(`SELECT matched FROM evaluated_messages WHERE id = ?`, [id]);
      if (existing) {
        this.assertSameOutcome(id, existing.matched === 1, record);
        return 'unchanged';
      }

      const now = new Date().toISOString();
      this.database.run('BEGIN');
      try {
        this.database.run(
          `INSERT INTO evaluated_messages (id, matched, evaluated_at) VALUES (?, ?, ?)`,
          [id, record ? 1 : 0, now],
        );
        if (record) {
          this.database.run(
            `INSERT INTO match_records (message_id, sender, subject, received_at, body_preview, matched_filenames, created_at)
             VALUES (?, ?, ?, ?, ?, ?, ?)`,
            [
              id,
              record.sender,
              record.subject,
              record.receivedAt.toISOString(),
              record.bodyPreview,
              JSON.stringify(record.matchedFilenames),
              now,
            ],
          );
        }
        this.database.run('COMMIT');
      } catch (error) {
        this.database.run('ROLLBACK');
        throw error;
      }

      try {
        this.saveToFile();
      } catch (error) {
        // Pas durable = pas enregistré: le message sera réévalué au prochain cycle
        this.database.run(`DELETE FROM match_records WHERE message_id = ?`, [id]);
        this.database.run(`DELETE FROM evaluated_messages WHERE id = ?`, [id]);
        throw error;
      }

      return 'recorded';
    });
  }

  private assertSameOutcome(id: string, wasMatched: boolean, record: MatchRecord | null) {
    if (!record) {
      if (wasMatched) {
        throw new ConsistencyError(id, `Email ${id} déjà enregistré comme correspondance, nouveau résultat: aucune`);
      }
      return;
    }

    if (!wasMatched) {
      throw new ConsistencyError(id, `Email ${id} déjà enregistré sans correspondance, nouveau résultat: correspondance`);
    }

    const [row] = this.queryRows(`SELECT matched_filenames FROM match_records WHERE message_id = ?`, [id]);
    const stored = row ? this.parseFilenames(row.matched_filenames) : [];
    if (!sameFilenames(stored, record.matchedFilenames)) {
      throw new ConsistencyError(
        id,
        `Email ${id}: pièces jointes différentes (${stored.join(', ')} / ${record.matchedFilenames.join(', ')})`,
      );
    }
  }

  /**
   * Correspondances, plus récentes d'abord (égalité départagée par messageId)
   */
  async listMatches(query: MatchQuery = {}): Promise<MatchRecord[]> {
    let matches = this.queryRows(
      `SELECT * FROM match_records ORDER BY received_at DESC, message_id ASC`,
    ).map((row) => this.mapRowToMatch(row));

    if (query.search && query.search.trim() !== '') {
      const needle = normalizeForMatch(query.search.trim());
      matches = matches.filter((match) =>
        [match.sender, match.subject, match.bodyPreview, ...match.matchedFilenames]
          .some((field) => normalizeForMatch(field).includes(needle)),
      );
    }

    return query.limit ? matches.slice(0, query.limit) : matches;
  }

  async stats(): Promise<DedupStats> {
    const [row] = this.queryRows(`
      SELECT
        (SELECT COUNT(*) FROM evaluated_messages) AS evaluated,
        (SELECT COUNT(*) FROM match_records) AS matched
    `);
    return {
      evaluated: Number(row?.evaluated ?? 0),
      matched: Number(row?.matched ?? 0),
    };
  }

  private parseFilenames(value: SqlValue): string[] {
    const parsed: unknown = JSON.parse(String(value ?? '[]'));
    return Array.isArray(parsed) ? parsed.filter((name): name is string => typeof name === 'string') : [];
  }

  private mapRowToMatch(row: Row): MatchRecord {
    return {
      messageId: String(row.message_id),
      sender: String(row.sender),
      subject: String(row.subject),
      receivedAt: new Date(String(row.received_at)),
      bodyPreview: String(row.body_preview),
      matchedFilenames: this.parseFilenames(row.matched_filenames),
    };
  }
}
