import type { ValidationErrorItem } from 'joi';

export class VariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VariantError';
  }
}

/**
 * A variant was assembled in a shape its kind does not allow: a test
 * variant without a tested variant, or a tested library whose output
 * artifact was not set before dependencies were resolved.
 */
export class StructuralInvariantViolationError extends VariantError {
  constructor(message: string) {
    super(message);
    this.name = 'StructuralInvariantViolationError';
  }
}

export class MissingManifestError extends VariantError {
  public readonly manifestPath: string;

  constructor(manifestPath: string) {
    super(`Main manifest missing from ${manifestPath}`);
    this.name = 'MissingManifestError';
    this.manifestPath = manifestPath;
  }
}

export class UnresolvedPackageNameError extends VariantError {
  public readonly manifestPath: string;

  constructor(manifestPath: string, reason?: string) {
    super(
      `Unable to resolve package name from ${manifestPath}` + (reason ? `: ${reason}` : '')
    );
    this.name = 'UnresolvedPackageNameError';
    this.manifestPath = manifestPath;
  }
}

export class ProjectConfigurationError extends VariantError {
  /** Joi failure details, when the project file did not match the schema. */
  public readonly details: ValidationErrorItem[];

  constructor(message: string, details: ValidationErrorItem[] = []) {
    super(message);
    this.name = 'ProjectConfigurationError';
    this.details = details;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
