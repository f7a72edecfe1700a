import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { DataSource } from 'typeorm';
import { Pool, PoolClient } from 'pg';
import { Observable, Subject } from 'rxjs';
import { filter } from 'rxjs/operators';
import { errorMessage } from '../common/errors';
import type { Env } from '../config/env.validation';
import type { LogLevel } from '../pipeline/pipeline.types';

const LOG_CHANNEL = 'step_logs';

export interface LogStreamEvent {
  step_id: string;
  log_line: string;
  log_level: LogLevel;
  timestamp: string;
  id?: string;
}

function isLogStreamEvent(value: unknown): value is LogStreamEvent {
  if (typeof value !== 'object' || value === null) return false;
  const event: Record<string, unknown> = { ...value };
  return typeof event.step_id === 'string' && typeof event.log_line === 'string';
}

/**
 * Real-time step logs: the database is the source of truth and the event emitter.
 * - A trigger on step_logs NOTIFYs on INSERT (see DatabaseSeedService); this service LISTENs and forwards.
 * - appendLog() only INSERTs. No app-side publishing.
 */
@Injectable()
export class LogStreamService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(LogStreamService.name);
  private pool: Pool | null = null;
  private listenClient: PoolClient | null = null;
  private restartTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;
  private readonly logSubject = new Subject<LogStreamEvent>();

  constructor(
    private readonly configService: ConfigService<Env, true>,
    private readonly dataSource: DataSource,
  ) {}

  private getPool(): Pool {
    if (!this.pool) {
      this.pool = new Pool({
        connectionString: this.configService.getOrThrow('DATABASE_URL', { infer: true }),
      });
    }
    return this.pool;
  }

  async onModuleInit(): Promise<void> {
    await this.startListening();
  }

  async onModuleDestroy(): Promise<void> {
    this.stopped = true;
    if (this.restartTimer) clearTimeout(this.restartTimer);
    if (this.listenClient) {
      this.listenClient.release();
      this.listenClient = null;
    }
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
    this.logSubject.complete();
  }

  /**
   * Dedicated connection that LISTENs to step_logs; reconnects a second after it drops.
   */
  private async startListening(): Promise<void> {
    const client = await this.getPool().connect();
    this.listenClient = client;

    client.on('notification', (msg) => {
      if (msg.channel !== LOG_CHANNEL || !msg.payload) return;
      let parsed: unknown;
      try {
        parsed = JSON.parse(msg.payload);
      } catch (err) {
        this.logger.warn(`Dropping malformed ${LOG_CHANNEL} payload: ${errorMessage(err)}`);
        return;
      }
      if (isLogStreamEvent(parsed)) this.logSubject.next(parsed);
    });

    const restart = (err?: Error) => {
      if (this.listenClient !== client) return;
      this.listenClient = null;
      client.release(err);
      if (this.stopped) return;
      this.logger.warn(`LISTEN connection lost${err ? `: ${err.message}` : ''}; reconnecting`);
      this.restartTimer = setTimeout(() => {
        this.startListening().catch((e: unknown) =>
          this.logger.error(`LISTEN reconnect failed: ${errorMessage(e)}`),
        );
      }, 1000);
    };

    client.on('error', restart);
    client.on('end', () => restart());

    await client.query(`LISTEN "${LOG_CHANNEL}"`);
  }

  getLogStream(): Observable<LogStreamEvent> {
    return this.logSubject.asObservable();
  }

  getLogStreamForStep(stepId: string): Observable<LogStreamEvent> {
    return this.logSubject.pipe(filter((ev) => ev.step_id === stepId));
  }

  /**
   * Persist a log line only. The trigger NOTIFYs; we do not publish from the app.
   */
  async appendLog(stepId: string, logLine: string, logLevel: LogLevel = 'info'): Promise<{ id: string }> {
    const result: Array<{ id: string | number }> = await this.dataSource.query(
      `INSERT INTO step_logs (step_id, log_line, log_level) VALUES ($1, $2, $3) RETURNING id`,
      [stepId, logLine, logLevel],
    );
    return { id: String(result[0]?.id ?? '') };
  }
}
