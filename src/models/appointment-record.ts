/**
 * Flat appointment record as read from the scheduling system, plus the
 * conversion from raw SQL Server rows.
 */

import { InvalidSourceRowError } from '../lib/error-handler';

/**
 * The source encodes appointment → service as fixed columns: the assigned
 * service followed by ten performable ones. Known limitation: a wider
 * relationship is truncated by the source itself.
 */
export const SERVICE_SLOT_COUNT = 11;

export type ServiceSlots = readonly (string | null)[];

export interface FlatAppointmentRecord {
  sourceAppointmentId: number | null;
  patientFirstName: string | null;
  patientLastName: string | null;
  patientDocumentNumber: string;
  /** YYYY-MM-DD */
  appointmentDate: string;
  /** HH:mm:ss */
  appointmentTime: string;
  durationMinutes: number;
  overbooked: boolean;
  status: string;
  /** YYYY-MM-DD HH:mm:ss */
  createdAt: string;
  createdBy: string;
  /** Always SERVICE_SLOT_COUNT entries, in source column order */
  services: ServiceSlots;
}

/**
 * Row shape returned by the extraction query (column aliases)
 */
export interface SourceAppointmentRow {
  appointment_id: number | null;
  patient_first_name: string | null;
  patient_last_name: string | null;
  patient_document_number: string | null;
  appointment_date: Date | string | null;
  appointment_time: Date | string | null;
  appointment_duration: number | null;
  overbooked: boolean | number | null;
  appointment_status: string | null;
  created_at: Date | string | null;
  created_by_username: string | null;
  service_0: string | null;
  service_1: string | null;
  service_2: string | null;
  service_3: string | null;
  service_4: string | null;
  service_5: string | null;
  service_6: string | null;
  service_7: string | null;
  service_8: string | null;
  service_9: string | null;
  service_10: string | null;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * mssql hands DATE/TIME/DATETIME columns over as UTC-based Date objects.
 * Strings pass through untouched.
 */
export function formatSqlDate(value: Date | string): string {
  if (typeof value === 'string') {
    return value;
  }
  return `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())}`;
}

export function formatSqlTime(value: Date | string): string {
  if (typeof value === 'string') {
    return value;
  }
  return `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`;
}

export function formatSqlTimestamp(value: Date | string): string {
  if (typeof value === 'string') {
    return value;
  }
  return `${formatSqlDate(value)} ${formatSqlTime(value)}`;
}

export function serviceSlotsOf(row: SourceAppointmentRow): ServiceSlots {
  return [
    row.service_0,
    row.service_1,
    row.service_2,
    row.service_3,
    row.service_4,
    row.service_5,
    row.service_6,
    row.service_7,
    row.service_8,
    row.service_9,
    row.service_10,
  ];
}

function required<T>(value: T | null | undefined, column: string, appointmentId: number | null): T {
  if (value === null || value === undefined) {
    throw new InvalidSourceRowError(`Source row ${appointmentId ?? '?'} has no value for ${column}`, {
      source_appointment_id: appointmentId,
      column
    });
  }
  return value;
}

/**
 * Convert one raw source row into a flat record. Throws InvalidSourceRowError
 * when a column the destination declares NOT NULL is missing.
 */
export function toFlatRecord(row: SourceAppointmentRow): FlatAppointmentRecord {
  const id = row.appointment_id;

  return {
    sourceAppointmentId: id,
    patientFirstName: row.patient_first_name,
    patientLastName: row.patient_last_name,
    patientDocumentNumber: required(row.patient_document_number, 'patient_document_number', id),
    appointmentDate: formatSqlDate(required(row.appointment_date, 'appointment_date', id)),
    appointmentTime: formatSqlTime(required(row.appointment_time, 'appointment_time', id)),
    durationMinutes: required(row.appointment_duration, 'appointment_duration', id),
    overbooked: Boolean(required(row.overbooked, 'overbooked', id)),
    status: required(row.appointment_status, 'appointment_status', id),
    createdAt: formatSqlTimestamp(required(row.created_at, 'created_at', id)),
    createdBy: required(row.created_by_username, 'created_by_username', id),
    services: serviceSlotsOf(row),
  };
}
