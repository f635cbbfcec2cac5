export class CalibrationStoreError extends Error {
  readonly code: string = 'CALIBRATION_STORE_ERROR';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CalibrationStoreError';
  }
}

export class RecordStoreError extends CalibrationStoreError {
  readonly code = 'RECORD_STORE_FAILURE';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecordStoreError';
  }
}

export class RecordValidationError extends CalibrationStoreError {
  readonly code = 'RECORD_VALIDATION_FAILED';
  readonly issues: unknown;

  constructor(message: string, issues: unknown) {
    super(message);
    this.name = 'RecordValidationError';
    this.issues = issues;
  }
}

export class CalibrationNotFoundError extends CalibrationStoreError {
  readonly code = 'CALIBRATION_NOT_FOUND';
  readonly identifier: string;

  constructor(identifier: string, message?: string) {
    super(message ?? `Calibration ${identifier} was not found`);
    this.name = 'CalibrationNotFoundError';
    this.identifier = identifier;
  }
}

export class CalibrationUnavailableError extends CalibrationStoreError {
  readonly code = 'CALIBRATION_UNAVAILABLE';
  readonly calibrationId: string;

  constructor(calibrationId: string, filename: string) {
    super(`Calibration ${calibrationId} has no cached file ${filename} and no remote archive is configured`);
    this.name = 'CalibrationUnavailableError';
    this.calibrationId = calibrationId;
  }
}

export class VersionOverflowError extends CalibrationStoreError {
  readonly code = 'VERSION_OVERFLOW';
  readonly attemptedVersion: number;

  constructor(attemptedVersion: number, maxVersion: number) {
    super(`Version ${attemptedVersion} exceeds the maximum calibration version ${maxVersion}`);
    this.name = 'VersionOverflowError';
    this.attemptedVersion = attemptedVersion;
  }
}

export class ConfigurationError extends CalibrationStoreError {
  readonly code = 'CONFIGURATION_ERROR';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}
