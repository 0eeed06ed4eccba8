/**
 * Appointment extractor
 *
 * Reads every appointment from the scheduling system (SQL Server) in one
 * query, with patient, status, creating user and the eleven service columns
 * joined in. The result is fully buffered; there is no streaming.
 */

import * as sql from 'mssql';
import { connectSource } from '../lib/database-connections';
import { SourceDatabaseConfig } from '../lib/environment-config';
import { ExtractionError, InvalidSourceRowError, Logger, getLogger } from '../lib/error-handler';
import { FlatAppointmentRecord, SourceAppointmentRow, toFlatRecord } from '../models/appointment-record';

export type ExtractionResult =
  | { status: 'extracted'; records: FlatAppointmentRecord[] }
  | { status: 'empty' }
  | { status: 'failed'; error: ExtractionError }
  | { status: 'invalid'; error: InvalidSourceRowError; rowsRead: number };

export const EXTRACT_APPOINTMENTS_SQL = `
SELECT
    t.Id AS appointment_id,

    p.Nombres AS patient_first_name,
    p.Apellido AS patient_last_name,
    p.Documento_Numero AS patient_document_number,

    t.FechaTurno AS appointment_date,
    t.HoraTurno AS appointment_time,
    t.DuracionMinutos AS appointment_duration,
    t.EsSobreTurno AS overbooked,
    te.Nombre AS appointment_status,

    t.FechaAlta AS created_at,
    usu.NombreInicioSesion AS created_by_username,

    pres0.Nombre AS service_0,
    pres1.Nombre AS service_1,
    pres2.Nombre AS service_2,
    pres3.Nombre AS service_3,
    pres4.Nombre AS service_4,
    pres5.Nombre AS service_5,
    pres6.Nombre AS service_6,
    pres7.Nombre AS service_7,
    pres8.Nombre AS service_8,
    pres9.Nombre AS service_9,
    pres10.Nombre AS service_10

FROM Turnos t
    JOIN Personas p ON p.Id = t.IdPersona
    JOIN Turno_Estados te ON te.Id = t.IdTurno_Estado
    JOIN Usuarios usu ON usu.Id = t.IdUsuario_Otorgo
    LEFT JOIN Prestaciones pres0 ON pres0.Id = t.IdPrestacionAsignada
    LEFT JOIN Prestaciones pres1 ON pres1.Id = t.IdPrestacionRealizable01
    LEFT JOIN Prestaciones pres2 ON pres2.Id = t.IdPrestacionRealizable02
    LEFT JOIN Prestaciones pres3 ON pres3.Id = t.IdPrestacionRealizable03
    LEFT JOIN Prestaciones pres4 ON pres4.Id = t.IdPrestacionRealizable04
    LEFT JOIN Prestaciones pres5 ON pres5.Id = t.IdPrestacionRealizable05
    LEFT JOIN Prestaciones pres6 ON pres6.Id = t.IdPrestacionRealizable06
    LEFT JOIN Prestaciones pres7 ON pres7.Id = t.IdPrestacionRealizable07
    LEFT JOIN Prestaciones pres8 ON pres8.Id = t.IdPrestacionRealizable08
    LEFT JOIN Prestaciones pres9 ON pres9.Id = t.IdPrestacionRealizable09
    LEFT JOIN Prestaciones pres10 ON pres10.Id = t.IdPrestacionRealizable10

ORDER BY t.FechaAlta DESC
`;

export class AppointmentExtractor {
  constructor(
    private readonly config: SourceDatabaseConfig,
    private readonly logger: Logger = getLogger()
  ) {}

  /**
   * Never throws. Connection and query problems come back as 'failed'; a row
   * that cannot become a flat record comes back as 'invalid'.
   */
  async extract(): Promise<ExtractionResult> {
    const read = await this.readRows();
    if (read.status === 'failed') {
      return read;
    }

    const rows = read.rows;
    if (rows.length === 0) {
      this.logger.info('Source returned no appointments');
      return { status: 'empty' };
    }

    try {
      const records = rows.map(toFlatRecord);
      this.logger.info('Appointments extracted', { records: records.length });
      return { status: 'extracted', records };
    } catch (error) {
      const invalid = error instanceof InvalidSourceRowError
        ? error
        : new InvalidSourceRowError(`Source row conversion failed: ${error instanceof Error ? error.message : String(error)}`, {}, error);
      this.logger.logEtlError(invalid);
      return { status: 'invalid', error: invalid, rowsRead: rows.length };
    }
  }

  private async readRows(): Promise<{ status: 'read'; rows: SourceAppointmentRow[] } | { status: 'failed'; error: ExtractionError }> {
    let pool: sql.ConnectionPool | null = null;

    try {
      pool = await connectSource(this.config);
      const result = await pool.request().query<SourceAppointmentRow>(EXTRACT_APPOINTMENTS_SQL);
      return { status: 'read', rows: result.recordset ?? [] };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const extractionError = new ExtractionError(
        `Extraction from source failed: ${message}`,
        { host: this.config.host, database: this.config.database },
        error
      );
      this.logger.logEtlError(extractionError);
      return { status: 'failed', error: extractionError };
    } finally {
      if (pool) {
        await this.closeQuietly(pool);
      }
    }
  }

  private async closeQuietly(pool: sql.ConnectionPool): Promise<void> {
    try {
      await pool.close();
    } catch (error) {
      this.logger.warn('Failed to close source connection', {
        error_message: error instanceof Error ? error.message : String(error)
      });
    }
  }
}
