/**
 * Destination schema builder
 *
 * Drops the `public` schema of the analytics database and recreates the four
 * tables the load writes to. Everything previously stored there is lost.
 */

import { SqlExecutor } from '../lib/database-connections';
import { Logger, SchemaRecreateError, getLogger } from '../lib/error-handler';

export const SCHEMA_SAVEPOINT = 'schema_recreate';

export const SCHEMA_STATEMENTS: readonly string[] = [
  'DROP SCHEMA IF EXISTS public CASCADE',
  'CREATE SCHEMA public',
  'GRANT ALL ON SCHEMA public TO PUBLIC',

  `CREATE TABLE patient (
    id SERIAL PRIMARY KEY,
    first_name VARCHAR(255) NOT NULL,
    last_name VARCHAR(255) NOT NULL,
    document_number VARCHAR(255) NOT NULL,
    inferred_sex VARCHAR(255)
  )`,
  'CREATE INDEX idx_patient_document ON patient (document_number)',

  `CREATE TABLE appointment (
    id SERIAL PRIMARY KEY,
    patient_id INTEGER NOT NULL,
    appointment_date DATE NOT NULL,
    appointment_time TIME(0) WITHOUT TIME ZONE NOT NULL,
    duration_minutes INTEGER NOT NULL,
    overbooked BOOLEAN NOT NULL,
    status VARCHAR(255) NOT NULL,
    created_at TIMESTAMP(0) WITHOUT TIME ZONE NOT NULL,
    created_by VARCHAR(255) NOT NULL,
    CONSTRAINT fk_appointment_patient FOREIGN KEY (patient_id)
      REFERENCES patient (id) ON DELETE RESTRICT
  )`,
  'CREATE INDEX idx_appointment_patient ON appointment (patient_id)',
  'CREATE INDEX idx_appointment_date ON appointment (appointment_date)',
  'CREATE INDEX idx_appointment_status ON appointment (status)',

  `CREATE TABLE service (
    id SERIAL PRIMARY KEY,
    name VARCHAR(255) NOT NULL UNIQUE
  )`,

  // no uniqueness: a source row may list the same service in several slots
  `CREATE TABLE appointment_service (
    id SERIAL PRIMARY KEY,
    appointment_id INTEGER NOT NULL,
    service_id INTEGER NOT NULL,
    CONSTRAINT fk_appointment_service_appointment FOREIGN KEY (appointment_id)
      REFERENCES appointment (id) ON DELETE CASCADE,
    CONSTRAINT fk_appointment_service_service FOREIGN KEY (service_id)
      REFERENCES service (id) ON DELETE RESTRICT
  )`,
  'CREATE INDEX idx_appointment_service_appointment ON appointment_service (appointment_id)',
  'CREATE INDEX idx_appointment_service_service ON appointment_service (service_id)',
];

export class SchemaBuilder {
  constructor(private readonly logger: Logger = getLogger()) {}

  /**
   * Recreate the destination schema on the caller's transaction.
   *
   * The work runs under a savepoint: on failure the savepoint is rolled back
   * and a SchemaRecreateError is thrown, leaving the enclosing transaction
   * usable for the caller's own rollback.
   */
  async recreate(executor: SqlExecutor): Promise<void> {
    await executor.query(`SAVEPOINT ${SCHEMA_SAVEPOINT}`);

    let statementIndex = 0;
    try {
      for (; statementIndex < SCHEMA_STATEMENTS.length; statementIndex++) {
        await executor.query(SCHEMA_STATEMENTS[statementIndex]);
      }
      await executor.query(`RELEASE SAVEPOINT ${SCHEMA_SAVEPOINT}`);
    } catch (error) {
      try {
        await executor.query(`ROLLBACK TO SAVEPOINT ${SCHEMA_SAVEPOINT}`);
      } catch (rollbackError) {
        this.logger.error('Rollback to schema savepoint failed', rollbackError);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new SchemaRecreateError(
        `Destination schema recreation failed: ${message}`,
        { statement_index: statementIndex },
        error
      );
    }

    this.logger.info('Destination schema recreated', { statements: SCHEMA_STATEMENTS.length });
  }
}
