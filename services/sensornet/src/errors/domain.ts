import type { MetadataLevel } from '../metadata/types';

export type FieldError = {
  field: string;
  message: string;
};

export class RequestValidationError extends Error {
  constructor(public readonly errors: FieldError[]) {
    super(errors.map((entry) => `${entry.field}: ${entry.message}`).join('; ') || 'Request validation failed');
    this.name = 'RequestValidationError';
  }
}

export type UpstreamSelection = {
  level: MetadataLevel;
  values: string[];
};

/**
 * Raised when valid filters cascade down to zero records at some metadata level.
 * `level` is the level that came up empty, `requested` the explicit filter values
 * given for it, and `upstream` the resolved selection it inherited from.
 */
export class EmptyResolutionError extends Error {
  constructor(
    public readonly level: MetadataLevel,
    public readonly target: MetadataLevel,
    public readonly requested: string[],
    public readonly upstream: UpstreamSelection | null
  ) {
    super(describeEmptyResolution(level, target, requested, upstream));
    this.name = 'EmptyResolutionError';
  }
}

function describeEmptyResolution(
  level: MetadataLevel,
  target: MetadataLevel,
  requested: string[],
  upstream: UpstreamSelection | null
): string {
  if (!upstream) {
    const selection = requested.length > 0 ? requested.join(', ') : 'any';
    return `Given your selection, no valid ${level} could be found for: ${selection}`;
  }
  const suffix = requested.length > 0 ? ` matching ${level}: ${requested.join(', ')}` : '';
  return (
    `Given your selection, ${upstream.level}: ${upstream.values.join(', ')} are available ` +
    `and from these no valid ${target} could be found${suffix}`
  );
}

export class UnprocessableQueryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnprocessableQueryError';
  }
}

export class FeatureTableMissingError extends Error {
  constructor(public readonly feature: string, cause?: unknown) {
    super(`Observation table for feature '${feature}' does not exist`, { cause });
    this.name = 'FeatureTableMissingError';
  }
}

export class FeatureSchemaChangedError extends Error {
  constructor(public readonly feature: string, cause?: unknown) {
    super(`Columns of the observation table for feature '${feature}' changed while it was queried`, { cause });
    this.name = 'FeatureSchemaChangedError';
  }
}

/**
 * An error that already knows its response: status, machine readable code
 * and optional details for the body.
 */
export class ApiError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}
