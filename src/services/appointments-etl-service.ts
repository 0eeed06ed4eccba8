/**
 * Appointments ETL service
 *
 * One run: extract the full source batch, ask for confirmation before the
 * destructive load, load it, and report what happened.
 *
 * "No data" has two causes: the source returned zero rows, or the read
 * failed. Both end the run as a successful no-op, but the report and the log
 * keep them apart through `noDataReason`. A source row missing a required
 * value fails the run without touching the destination.
 */

import { v4 as uuidv4 } from 'uuid';
import { EtlBaseError, Logger, describeError, getLogger } from '../lib/error-handler';
import { FlatAppointmentRecord } from '../models/appointment-record';
import { ExtractionResult } from './appointment-extractor';
import { LoadOptions, LoadSummary } from './load-orchestrator';

export interface AppointmentSource {
  extract(): Promise<ExtractionResult>;
}

export interface AppointmentLoader {
  run(batch: readonly FlatAppointmentRecord[], options?: LoadOptions): Promise<LoadSummary>;
}

export type EtlRunStatus = 'success' | 'failure';
export type EtlRunOutcome = 'loaded' | 'no_data' | 'cancelled' | 'failed';
export type NoDataReason = 'empty' | 'extraction_failed';

export interface EtlRunReport {
  runId: string;
  status: EtlRunStatus;
  outcome: EtlRunOutcome;
  noDataReason?: NoDataReason;
  recordsExtracted: number;
  summary?: LoadSummary;
  error?: {
    name: string;
    message: string;
    code?: string;
    cause?: { name: string; message: string };
  };
  durationMs: number;
}

export interface EtlRunOptions {
  /**
   * Asked before the destination is wiped. Resolving false cancels the run.
   * Without it the load goes ahead unasked.
   */
  confirm?: (recordCount: number) => Promise<boolean>;
  onProgress?: (processed: number, total: number) => void;
  runId?: string;
}

export class AppointmentsEtlService {
  constructor(
    private readonly source: AppointmentSource,
    private readonly loader: AppointmentLoader,
    private readonly logger: Logger = getLogger()
  ) {}

  async run(options: EtlRunOptions = {}): Promise<EtlRunReport> {
    const runId = options.runId ?? uuidv4();
    const startTime = Date.now();
    this.logger.setRunId(runId);

    try {
      this.logger.info('Extracting appointments from source');
      const extraction = await this.source.extract();

      if (extraction.status === 'invalid') {
        this.logger.error('Run failed, source data rejected before loading', extraction.error, {
          rows_read: extraction.rowsRead
        });
        return {
          runId,
          status: 'failure',
          outcome: 'failed',
          recordsExtracted: 0,
          error: this.describeFailure(extraction.error),
          durationMs: Date.now() - startTime
        };
      }

      if (extraction.status !== 'extracted') {
        return this.noData(runId, startTime, extraction);
      }

      const records = extraction.records;

      if (options.confirm && !(await options.confirm(records.length))) {
        this.logger.warn('Load cancelled before touching the destination', { records: records.length });
        return {
          runId,
          status: 'success',
          outcome: 'cancelled',
          recordsExtracted: records.length,
          durationMs: Date.now() - startTime
        };
      }

      try {
        const summary = await this.loader.run(records, {
          onProgress: options.onProgress,
          correlationId: runId
        });

        this.logger.info(`Run completed: ${summary.appointmentsLoaded} appointments loaded`, { ...summary });
        return {
          runId,
          status: 'success',
          outcome: 'loaded',
          recordsExtracted: records.length,
          summary,
          durationMs: Date.now() - startTime
        };
      } catch (error) {
        this.logger.error('Run failed, destination left unchanged', error);
        return {
          runId,
          status: 'failure',
          outcome: 'failed',
          recordsExtracted: records.length,
          error: this.describeFailure(error),
          durationMs: Date.now() - startTime
        };
      }
    } finally {
      this.logger.clearContext();
    }
  }

  private noData(
    runId: string,
    startTime: number,
    extraction: Extract<ExtractionResult, { status: 'empty' | 'failed' }>
  ): EtlRunReport {
    const noDataReason: NoDataReason = extraction.status === 'empty' ? 'empty' : 'extraction_failed';

    if (extraction.status === 'failed') {
      this.logger.warn('No data to process: extraction failed', {
        no_data_reason: noDataReason,
        error_message: extraction.error.message
      });
    } else {
      this.logger.warn('No data to process: source returned no rows', { no_data_reason: noDataReason });
    }

    return {
      runId,
      status: 'success',
      outcome: 'no_data',
      noDataReason,
      recordsExtracted: 0,
      error: extraction.status === 'failed' ? this.describeFailure(extraction.error) : undefined,
      durationMs: Date.now() - startTime
    };
  }

  private describeFailure(error: unknown): NonNullable<EtlRunReport['error']> {
    const base = describeError(error) ?? { name: 'Error', message: 'Unknown error' };
    if (error instanceof EtlBaseError) {
      return { ...base, code: error.errorCode, cause: describeError(error.cause) };
    }
    return base;
  }
}
