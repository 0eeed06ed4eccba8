/**
 * Entity resolver
 *
 * Deduplicates patients (by document number) and services (by name) while a
 * batch is loaded. Each key is looked up once: first in a run-scoped cache,
 * then in the destination, and inserted only when both miss.
 *
 * One instance per run. The caches are never evicted and must not outlive the
 * run, since the destination schema is rebuilt at the start of every run.
 */

import { SqlExecutor, SqlRow } from '../lib/database-connections';
import { Logger, MissingIdentifierError, getLogger } from '../lib/error-handler';
import { firstToken, normalizePersonName } from '../utils/name-normalization';
import { SexInferrer, safeInferSex } from './sex-inference';

export interface ResolverCacheStats {
  patients: number;
  services: number;
}

/**
 * Generated id of the first returned row. SERIAL ids arrive as numbers, BIGINT ones as strings.
 */
export function extractId(rows: readonly SqlRow[]): number | null {
  const id = rows[0]?.id;
  if (typeof id === 'number' && Number.isInteger(id)) {
    return id;
  }
  if (typeof id === 'string' && /^\d+$/.test(id)) {
    return parseInt(id, 10);
  }
  return null;
}

export class EntityResolver {
  private readonly patientCache = new Map<string, number>();
  private readonly serviceCache = new Map<string, number>();

  constructor(
    private readonly db: SqlExecutor,
    private readonly sexInferrer: SexInferrer,
    private readonly logger: Logger = getLogger()
  ) {}

  /**
   * Find or create the patient with this document number
   */
  async resolvePatient(documentNumber: string, rawFirstName: string | null, rawLastName: string | null): Promise<number> {
    const key = documentNumber.trim();

    const cached = this.patientCache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const existing = await this.db.query('SELECT id FROM patient WHERE document_number = $1', [key]);
    let patientId = extractId(existing.rows);

    if (patientId === null) {
      const firstName = normalizePersonName(rawFirstName);
      const lastName = normalizePersonName(rawLastName);
      const inferredSex = safeInferSex(this.sexInferrer, firstToken(firstName), this.logger);

      const inserted = await this.db.query(
        'INSERT INTO patient (first_name, last_name, document_number, inferred_sex) VALUES ($1, $2, $3, $4) RETURNING id',
        [firstName, lastName, key, inferredSex]
      );
      patientId = extractId(inserted.rows);

      if (patientId === null) {
        throw new MissingIdentifierError('patient', { document_number: key });
      }
      this.logger.debug('Patient created', { patient_id: patientId, inferred_sex: inferredSex });
    }

    this.patientCache.set(key, patientId);
    return patientId;
  }

  /**
   * Find or create the service with this name
   */
  async resolveService(rawServiceName: string): Promise<number> {
    const name = rawServiceName.trim();

    const cached = this.serviceCache.get(name);
    if (cached !== undefined) {
      return cached;
    }

    const existing = await this.db.query('SELECT id FROM service WHERE name = $1', [name]);
    let serviceId = extractId(existing.rows);

    if (serviceId === null) {
      const inserted = await this.db.query('INSERT INTO service (name) VALUES ($1) RETURNING id', [name]);
      serviceId = extractId(inserted.rows);

      if (serviceId === null) {
        throw new MissingIdentifierError('service', { name });
      }
    }

    this.serviceCache.set(name, serviceId);
    return serviceId;
  }

  getCacheStats(): ResolverCacheStats {
    return {
      patients: this.patientCache.size,
      services: this.serviceCache.size
    };
  }
}
