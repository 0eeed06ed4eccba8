/**
 * Load orchestrator
 *
 * Loads one extracted batch into the analytics schema inside a single
 * destination transaction: schema reset, patients, appointments, services and
 * the appointment_service junction. Either the whole batch commits or nothing
 * does, including the schema reset.
 */

import { SqlExecutor, TransactionalDatabase } from '../lib/database-connections';
import { LoadFailedError, Logger, MissingIdentifierError, getLogger } from '../lib/error-handler';
import { FlatAppointmentRecord, SERVICE_SLOT_COUNT } from '../models/appointment-record';
import { EntityResolver, extractId } from './entity-resolver';
import { SchemaBuilder } from './schema-builder';
import { SexInferrer } from './sex-inference';

export interface LoadSummary {
  appointmentsLoaded: number;
  patientsResolved: number;
  servicesResolved: number;
  appointmentServicesLinked: number;
  durationMs: number;
}

export interface LoadOptions {
  /** Called after each record has been fully written */
  onProgress?: (processed: number, total: number) => void;
  /** Tag attached to a LoadFailedError */
  correlationId?: string;
}

const INSERT_APPOINTMENT_SQL =
  'INSERT INTO appointment (patient_id, appointment_date, appointment_time, duration_minutes, overbooked, status, created_at, created_by) ' +
  'VALUES ($1, $2, $3, $4, $5, $6, $7, $8) RETURNING id';

const INSERT_APPOINTMENT_SERVICE_SQL =
  'INSERT INTO appointment_service (appointment_id, service_id) VALUES ($1, $2)';

/**
 * Slot value worth resolving, or null for an empty or whitespace-only slot
 */
export function serviceNameOf(slot: string | null | undefined): string | null {
  if (slot === null || slot === undefined) {
    return null;
  }
  const name = slot.trim();
  return name === '' ? null : name;
}

export class LoadOrchestrator {
  constructor(
    private readonly database: TransactionalDatabase,
    private readonly schemaBuilder: SchemaBuilder,
    private readonly sexInferrer: SexInferrer,
    private readonly logger: Logger = getLogger()
  ) {}

  async run(batch: readonly FlatAppointmentRecord[], options: LoadOptions = {}): Promise<LoadSummary> {
    const startTime = Date.now();

    if (batch.length === 0) {
      this.logger.info('Empty batch, nothing to load');
      return {
        appointmentsLoaded: 0,
        patientsResolved: 0,
        servicesResolved: 0,
        appointmentServicesLinked: 0,
        durationMs: 0
      };
    }

    const tx = await this.database.beginTransaction();
    this.logger.info('Destination transaction started', { records: batch.length });

    let recordIndex = -1;
    try {
      await this.schemaBuilder.recreate(tx.executor);

      // fresh resolver per run: cached ids are only valid for this schema
      const resolver = new EntityResolver(tx.executor, this.sexInferrer, this.logger);
      let linked = 0;

      for (recordIndex = 0; recordIndex < batch.length; recordIndex++) {
        linked += await this.loadRecord(tx.executor, resolver, batch[recordIndex]);
        options.onProgress?.(recordIndex + 1, batch.length);
      }

      await tx.commit();

      const cacheStats = resolver.getCacheStats();
      const summary: LoadSummary = {
        appointmentsLoaded: batch.length,
        patientsResolved: cacheStats.patients,
        servicesResolved: cacheStats.services,
        appointmentServicesLinked: linked,
        durationMs: Date.now() - startTime
      };

      this.logger.info('Destination transaction committed', { ...summary });
      return summary;
    } catch (error) {
      try {
        await tx.rollback();
        this.logger.warn('Destination transaction rolled back', { failed_record_index: recordIndex });
      } catch (rollbackError) {
        this.logger.error('Rollback of destination transaction failed', rollbackError);
      }

      const failing = recordIndex >= 0 && recordIndex < batch.length ? batch[recordIndex] : undefined;
      const message = error instanceof Error ? error.message : String(error);
      throw new LoadFailedError(
        `Load failed${failing ? ` at record ${recordIndex}` : ''}: ${message}`,
        {
          failed_record_index: failing ? recordIndex : null,
          source_appointment_id: failing?.sourceAppointmentId ?? null
        },
        error,
        options.correlationId
      );
    }
  }

  /**
   * Write one appointment and its service links. Returns the number of links.
   */
  private async loadRecord(db: SqlExecutor, resolver: EntityResolver, record: FlatAppointmentRecord): Promise<number> {
    const patientId = await resolver.resolvePatient(
      record.patientDocumentNumber,
      record.patientFirstName,
      record.patientLastName
    );

    const inserted = await db.query(INSERT_APPOINTMENT_SQL, [
      patientId,
      record.appointmentDate,
      record.appointmentTime,
      record.durationMinutes,
      record.overbooked,
      record.status,
      record.createdAt,
      record.createdBy
    ]);

    const appointmentId = extractId(inserted.rows);
    if (appointmentId === null) {
      throw new MissingIdentifierError('appointment', { source_appointment_id: record.sourceAppointmentId });
    }

    let linked = 0;
    for (let slot = 0; slot < SERVICE_SLOT_COUNT; slot++) {
      const serviceName = serviceNameOf(record.services[slot]);
      if (serviceName === null) {
        continue;
      }

      const serviceId = await resolver.resolveService(serviceName);
      await db.query(INSERT_APPOINTMENT_SERVICE_SQL, [appointmentId, serviceId]);
      linked++;
    }

    return linked;
  }
}
