/**
 * OBVIOUSLY-FAKE TEST DATA
 *
 * Patient identifiers use a TEST- prefix so they can never be mistaken for
 * a real study code. Builders go through the smart constructors, so every
 * fixture carries the slot its timestamp implies.
 */

import type { EcgMeasurement, FileDescriptor, MeasurementTimestamp, PressureMeasurement } from "../schemas/measurement";
import { makeEcgMeasurement, makePressureMeasurement } from "./measurementExtractor.effect";

export const TEST_PATIENTS = {
  PRIMARY: "TEST-PATIENT-001",
  SECONDARY: "TEST-PATIENT-002",
  EMPTY: "TEST-PATIENT-003",
} as const;

export const at = (date: string, hour: number, minute = 0, second = 0): MeasurementTimestamp => ({
  date,
  hour,
  minute,
  second,
});

export const pressureAt = (
  timestamp: MeasurementTimestamp,
  patientId: string = TEST_PATIENTS.PRIMARY,
  systolic = 120,
  diastolic = 80
): PressureMeasurement =>
  makePressureMeasurement(patientId, "pressure_export.csv", timestamp, { systolic, diastolic, warnings: [] });

export const ecgAt = (timestamp: MeasurementTimestamp, patientId: string = TEST_PATIENTS.PRIMARY): EcgMeasurement =>
  makeEcgMeasurement(patientId, "ecg_report.txt", timestamp);

/**
 * Two pressure readings and two ECGs in each slot: a complete day under
 * the default 2/2 requirements.
 */
export const completeDay = (
  date: string,
  patientId: string = TEST_PATIENTS.PRIMARY
): Array<PressureMeasurement | EcgMeasurement> => [
  pressureAt(at(date, 8, 0), patientId),
  pressureAt(at(date, 8, 5), patientId),
  ecgAt(at(date, 8, 10), patientId),
  ecgAt(at(date, 8, 15), patientId),
  pressureAt(at(date, 20, 0), patientId),
  pressureAt(at(date, 20, 5), patientId),
  ecgAt(at(date, 20, 10), patientId),
  ecgAt(at(date, 20, 15), patientId),
];

export const fileDescriptor = (
  name: string,
  size: number,
  modifiedTime: number,
  sessionId?: string
): FileDescriptor => {
  const descriptor = { id: `mem://${name}`, name, size, modifiedTime };
  return sessionId === undefined ? descriptor : { ...descriptor, sessionId };
};
