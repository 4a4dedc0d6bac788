import { Inject, Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { SchedulerRegistry } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { DedupStoreService } from '../database/dedup-store.service';
import { MessageEvaluatorService } from '../detector/message-evaluator.service';
import {
  MAIL_SOURCE,
  MailSource,
  MatchRecord,
  NOTIFICATION_SINK,
  NotificationSink,
  ParsedEmail,
  PollConfig,
} from '../common/interfaces';
import { validatePollConfig } from '../common/dto';
import {
  ConfigError,
  ConsistencyError,
  FetchError,
  SchedulerStateError,
  errorMessage,
} from '../common/errors';
import { withTimeout } from '../common/with-timeout';

export type SchedulerState = 'idle' | 'running' | 'stopped';
export type CycleTrigger = 'timer' | 'manual';
export type CycleStatus = 'completed' | 'fetch_failed' | 'cancelled' | 'failed';

export interface CycleReport {
  trigger: CycleTrigger;
  status: CycleStatus;
  startedAt: Date;
  finishedAt: Date;
  windowStart: Date;
  fetched: number;
  alreadyEvaluated: number;
  evaluated: number;
  matched: number;
  failed: number;
  consistencyErrors: number;
  error?: string;
}

export type RunOnceResult =
  | { status: 'already_running' }
  | { status: 'executed'; report: CycleReport };

const INTERVAL_NAME = 'attachment-monitor';
const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_FETCH_TIMEOUT_MS = 60000;
const DEFAULT_CONCURRENCY = 4;

/**
 * Jeton d'annulation coopérative: observé entre deux emails, jamais pendant une extraction
 */
class CancellationToken {
  private cancelled = false;

  constructor(readonly trigger: CycleTrigger) {}

  cancel() {
    this.cancelled = true;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }
}

@Injectable()
export class SchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(SchedulerService.name);
  private state: SchedulerState = 'idle';
  private config: PollConfig | null = null;
  private inFlight: Promise<CycleReport> | null = null;
  private token: CancellationToken | null = null;
  private progress = { done: 0, total: 0 };
  private lastCycle: CycleReport | null = null;
  private nextExecution: Date | null = null;

  constructor(
    private readonly configService: ConfigService,
    private readonly dedupStore: DedupStoreService,
    private readonly evaluator: MessageEvaluatorService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(MAIL_SOURCE) private readonly mailSource: MailSource,
    @Inject(NOTIFICATION_SINK) private readonly sink: NotificationSink,
  ) {}

  onApplicationBootstrap() {
    if (!this.configService.get<boolean>('monitor.autoStart', false)) {
      this.logger.log('Surveillance non démarrée automatiquement');
      return;
    }

    try {
      this.start({
        keyword: this.configService.get<string>('monitor.keyword', ''),
        lookbackDays: this.configService.get<number>('monitor.lookbackDays', 1),
        intervalSeconds: this.configService.get<number>('monitor.intervalSeconds', 300),
        fetchTimeoutMs: this.configService.get<number>('monitor.fetchTimeoutMs', DEFAULT_FETCH_TIMEOUT_MS),
        concurrency: this.configService.get<number>('monitor.concurrency', DEFAULT_CONCURRENCY),
      });
    } catch (error) {
      this.logger.error(`Démarrage automatique impossible: ${errorMessage(error)}`);
    }
  }

  async onModuleDestroy() {
    // À l'arrêt de l'application, même un cycle manuel est interrompu
    this.token?.cancel();
    await this.stop();
    this.state = 'stopped';
  }

  /**
   * Idle → Running: valide la configuration, arme l'intervalle et lance un cycle immédiat
   * (après la fin d'un cycle encore en cours).
   */
  start(input: unknown): PollConfig {
    if (this.state === 'stopped') {
      throw new SchedulerStateError('Scheduler arrêté définitivement');
    }
    if (this.state === 'running') {
      throw new SchedulerStateError('Surveillance déjà active, arrêter avant de redémarrer');
    }

    // ConfigError ici: rien n'est appliqué
    const config = validatePollConfig(input);

    this.config = config;
    this.state = 'running';

    const intervalMs = config.intervalSeconds * 1000;
    this.schedulerRegistry.addInterval(INTERVAL_NAME, setInterval(() => this.onTick(), intervalMs));
    this.nextExecution = new Date(Date.now() + intervalMs);

    this.logger.log(
      `Surveillance démarrée: "${config.keyword}", ${config.lookbackDays} jour(s), toutes les ${config.intervalSeconds}s`,
    );

    if (this.inFlight) {
      this.logger.log('Cycle précédent pas encore terminé, le cycle de démarrage suivra');
      void this.launchWhenIdle(config);
    } else {
      void this.launch('timer', config);
    }

    return config;
  }

  /**
   * Running → Idle: supprime l'intervalle, demande l'arrêt du cycle lancé par le timer
   * et attend qu'il se termine. Un cycle manuel va jusqu'au bout.
   */
  async stop(): Promise<void> {
    if (this.schedulerRegistry.doesExist('interval', INTERVAL_NAME)) {
      this.schedulerRegistry.deleteInterval(INTERVAL_NAME);
    }

    if (this.state === 'running') {
      this.state = 'idle';
      this.nextExecution = null;
      this.logger.log('Surveillance arrêtée');

      if (this.token?.trigger === 'timer') {
        this.token.cancel();
      }
    }

    await this.whenIdle();
  }

  /**
   * Vérification manuelle, sans toucher à l'intervalle.
   * Un seul cycle à la fois: un appel concurrent répond already_running.
   */
  async runOnce(input?: unknown): Promise<RunOnceResult> {
    if (this.state === 'stopped') {
      throw new SchedulerStateError('Scheduler arrêté définitivement');
    }

    if (this.inFlight) {
      this.logger.warn('Traitement déjà en cours, vérification manuelle ignorée');
      return { status: 'already_running' };
    }

    const config = input !== undefined ? validatePollConfig(input) : this.config;
    if (!config) {
      throw new ConfigError('Aucune configuration de surveillance: démarrer ou fournir une configuration');
    }

    const report = await this.launch('manual', config);
    return { status: 'executed', report };
  }

  /**
   * Résout quand aucun cycle n'est en cours
   */
  async whenIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  async getStatus() {
    return {
      state: this.state,
      isProcessing: this.inFlight !== null,
      progress: { ...this.progress },
      config: this.config,
      nextExecution: this.nextExecution,
      lastCycle: this.lastCycle,
      store: await this.dedupStore.stats(),
    };
  }

  private onTick() {
    if (this.state !== 'running' || !this.config) return;

    this.nextExecution = new Date(Date.now() + this.config.intervalSeconds * 1000);

    if (this.inFlight) {
      this.logger.warn('Traitement déjà en cours, tick ignoré');
      return;
    }

    void this.launch('timer', this.config);
  }

  private async launchWhenIdle(config: PollConfig): Promise<void> {
    await this.whenIdle();

    // Un stop, un nouveau start ou un cycle manuel a pu passer entre-temps
    if (this.state === 'running' && this.config === config && !this.inFlight) {
      await this.launch('timer', config);
    }
  }

  private launch(trigger: CycleTrigger, config: PollConfig): Promise<CycleReport> {
    const token = new CancellationToken(trigger);
    this.token = token;

    const cycle = this.runCycle(trigger, config, token).finally(() => {
      this.inFlight = null;
      this.token = null;
    });
    this.inFlight = cycle;
    return cycle;
  }

  /**
   * Un cycle: fetch → évaluation → enregistrement → notification.
   * Ne rejette jamais: toute erreur finit dans le rapport.
   */
  private async runCycle(trigger: CycleTrigger, config: PollConfig, token: CancellationToken): Promise<CycleReport> {
    const startedAt = new Date();
    const report: CycleReport = {
      trigger,
      status: 'completed',
      startedAt,
      finishedAt: startedAt,
      windowStart: new Date(startedAt.getTime() - config.lookbackDays * DAY_MS),
      fetched: 0,
      alreadyEvaluated: 0,
      evaluated: 0,
      matched: 0,
      failed: 0,
      consistencyErrors: 0,
    };
    this.progress = { done: 0, total: 0 };

    try {
      const timeoutMs = config.fetchTimeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
      let messages: ParsedEmail[];

      try {
        messages = await withTimeout(
          this.mailSource.fetchMessages(report.windowStart, { timeoutMs }),
          timeoutMs,
          () => new FetchError('timeout', `Aucune réponse de la source de mails après ${timeoutMs} ms`),
        );
      } catch (error) {
        const fetchError = error instanceof FetchError ? error : new FetchError('network', errorMessage(error));
        report.status = 'fetch_failed';
        report.error = `${fetchError.kind}: ${fetchError.message}`;
        this.logger.warn(`Récupération des emails impossible (${report.error}), nouvel essai au prochain cycle`);
        return this.finish(report);
      }

      report.fetched = messages.length;
      const pending = await this.selectPending(messages, report);
      this.progress = { done: 0, total: pending.length };

      await this.runPool(pending, config.concurrency ?? DEFAULT_CONCURRENCY, token, (email) =>
        this.processEmail(email, config.keyword, report),
      );

      if (token.isCancelled && this.progress.done < pending.length) {
        report.status = 'cancelled';
        this.logger.log(`Cycle interrompu: ${this.progress.done}/${pending.length} emails traités`);
      }
    } catch (error) {
      report.status = 'failed';
      report.error = errorMessage(error);
      this.logger.error(`Erreur cycle de surveillance: ${report.error}`);
    }

    return this.finish(report);
  }

  /**
   * Retire les doublons du fetch et les emails déjà évalués
   */
  private async selectPending(messages: ParsedEmail[], report: CycleReport): Promise<ParsedEmail[]> {
    const unique = new Map<string, ParsedEmail>();
    for (const email of messages) {
      if (!unique.has(email.id)) unique.set(email.id, email);
    }

    const pending: ParsedEmail[] = [];
    for (const email of unique.values()) {
      if (await this.dedupStore.hasEvaluated(email.id)) {
        report.alreadyEvaluated++;
      } else {
        pending.push(email);
      }
    }
    return pending;
  }

  /**
   * Au plus `concurrency` emails en parallèle; le jeton est vérifié avant chaque email
   */
  private async runPool<T>(
    items: T[],
    concurrency: number,
    token: CancellationToken,
    worker: (item: T) => Promise<void>,
  ): Promise<void> {
    let next = 0;
    const lane = async () => {
      while (next < items.length && !token.isCancelled) {
        const item = items[next++];
        await worker(item);
      }
    };

    await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, lane));
  }

  private async processEmail(email: ParsedEmail, keyword: string, report: CycleReport): Promise<void> {
    let record: MatchRecord | null = null;

    try {
      record = await this.evaluator.evaluate(email, keyword);
    } catch (error) {
      // Échec local au message: compté comme "pas de correspondance"
      report.failed++;
      this.logger.error(`Erreur traitement email ${email.id}: ${errorMessage(error)}`);
    }

    try {
      const outcome = await this.dedupStore.recordEvaluated(email.id, record);
      report.evaluated++;

      // Notification uniquement après écriture durable
      if (record && outcome === 'recorded') {
        report.matched++;
        this.dispatch(record);
      }
    } catch (error) {
      if (error instanceof ConsistencyError) {
        report.consistencyErrors++;
        this.logger.error(`INCOHÉRENCE dedup store pour ${error.messageId}: ${error.message}`);
      } else {
        report.failed++;
        this.logger.error(`Erreur enregistrement email ${email.id}: ${errorMessage(error)}`);
      }
    } finally {
      this.progress.done++;
    }
  }

  private dispatch(record: MatchRecord) {
    this.sink.notify(record).catch((error) => {
      this.logger.warn(`Notification échouée pour ${record.messageId}: ${errorMessage(error)}`);
    });
  }

  private finish(report: CycleReport): CycleReport {
    report.finishedAt = new Date();
    this.lastCycle = report;

    if (report.status === 'completed' || report.status === 'cancelled') {
      this.logger.log(
        `Cycle ${report.trigger} terminé: ${report.fetched} récupérés, ${report.alreadyEvaluated} déjà évalués, ` +
          `${report.evaluated} évalués, ${report.matched} nouvelle(s) correspondance(s)`,
      );
    }
    return report;
  }
}
