import type { ZodIssue } from 'zod';

/** Base class for every error the chronicle raises on purpose. */
export class ChronicleError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class GateClosedError extends ChronicleError {
  constructor() {
    super('Chronicle gate has been shut down');
  }
}

export class EnvelopeValidationError extends ChronicleError {
  readonly issues: readonly ZodIssue[];

  constructor(message: string, issues: readonly ZodIssue[] = []) {
    super(message);
    this.issues = issues;
  }
}

export class PartitionCommitError extends ChronicleError {
  readonly partition: string;

  constructor(partition: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Commit to partition ${partition} failed: ${reason}`, { cause });
    this.partition = partition;
  }
}

export class SensorRegistrationError extends ChronicleError {}

export class SensorNotFoundError extends ChronicleError {
  readonly sensorId: string;

  constructor(sensorId: string) {
    super(`Sensor '${sensorId}' not found`);
    this.sensorId = sensorId;
  }
}

export class SensorConfigError extends ChronicleError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConfigurationError extends ChronicleError {}
