/**
 * Storm Impact Error Types
 *
 * Custom error classes for configuration, geometry and data failures.
 *
 * Handling policy:
 * - ConfigurationError is fatal. It is never caught inside a region because
 *   continuing would silently corrupt admin aggregation.
 * - GeometryError is recovered by a repair attempt, then by falling back to
 *   the unrepaired geometry.
 * - MissingDataError is recovered locally by a placeholder (empty set or
 *   all-null column) and a warning.
 * - RegionProcessingError wraps any failure inside one region so the run
 *   summary can report it while the remaining regions continue.
 */

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * Structural precondition that must hold before a computation can run
 */
export interface ConfigurationErrorDetails {
  /** Component that detected the problem */
  readonly component: string;
  /** Region code, when the error is region-specific */
  readonly region?: string;
  /** Offending identifiers (zone ids, setting names) */
  readonly offending?: readonly string[];
}

/**
 * Error thrown when a required structural precondition is absent
 *
 * @example
 * ```typescript
 * if (zone.adminId === undefined) {
 *   throw new ConfigurationError('Zone has no admin assignment', {
 *     component: 'severity-index',
 *     offending: [zone.id],
 *   });
 * }
 * ```
 */
export class ConfigurationError extends Error {
  public readonly name = 'ConfigurationError' as const;

  constructor(
    message: string,
    public readonly details: ConfigurationErrorDetails
  ) {
    super(message);
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }

  /**
   * Create a formatted error message for logging
   */
  toLogString(): string {
    const parts = [
      `ConfigurationError: ${this.message}`,
      `  Component: ${this.details.component}`,
    ];
    if (this.details.region) {
      parts.push(`  Region: ${this.details.region}`);
    }
    if (this.details.offending && this.details.offending.length > 0) {
      const shown = this.details.offending.slice(0, 5).join(', ');
      const more = this.details.offending.length > 5 ? ` (+${this.details.offending.length - 5} more)` : '';
      parts.push(`  Offending: ${shown}${more}`);
    }
    return parts.join('\n');
  }
}

/**
 * Type guard to check if an error is a ConfigurationError
 */
export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}

// ============================================================================
// Geometry Errors
// ============================================================================

export type GeometryOperation = 'buffer' | 'repair' | 'overlay' | 'parse';

/**
 * Error raised when a geometry operation produces or receives invalid output
 */
export class GeometryError extends Error {
  public readonly name = 'GeometryError' as const;

  constructor(
    message: string,
    public readonly operation: GeometryOperation,
    public readonly subject?: string
  ) {
    super(message);
    Object.setPrototypeOf(this, GeometryError.prototype);
  }

  toLogString(): string {
    const subject = this.subject ? ` [${this.subject}]` : '';
    return `GeometryError (${this.operation})${subject}: ${this.message}`;
  }
}

export function isGeometryError(error: unknown): error is GeometryError {
  return error instanceof GeometryError;
}

// ============================================================================
// Missing Data
// ============================================================================

/**
 * External fetch returned nothing or malformed data
 *
 * Never fatal. Raised inside collaborators and converted into an
 * `unavailable` fetch outcome by the fallback helper.
 */
export class MissingDataError extends Error {
  public readonly name = 'MissingDataError' as const;

  constructor(
    message: string,
    public readonly source: string
  ) {
    super(message);
    Object.setPrototypeOf(this, MissingDataError.prototype);
  }

  toLogString(): string {
    return `MissingDataError (${this.source}): ${this.message}`;
  }
}

export function isMissingDataError(error: unknown): error is MissingDataError {
  return error instanceof MissingDataError;
}

// ============================================================================
// Region Isolation
// ============================================================================

/**
 * Failure of one region's pipeline, recorded in the run summary
 */
export class RegionProcessingError extends Error {
  public readonly name = 'RegionProcessingError' as const;

  constructor(
    public readonly region: string,
    public readonly stage: string,
    public readonly failure: unknown
  ) {
    super(`Region ${region} failed during ${stage}: ${describeError(failure)}`);
    Object.setPrototypeOf(this, RegionProcessingError.prototype);
  }

  toLogString(): string {
    const parts = [`RegionProcessingError: ${this.message}`];
    if (this.failure instanceof Error && this.failure.stack) {
      parts.push(this.failure.stack);
    }
    return parts.join('\n');
  }
}

export function isRegionProcessingError(error: unknown): error is RegionProcessingError {
  return error instanceof RegionProcessingError;
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
