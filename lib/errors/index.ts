/**
 * Raised when the deployment configuration is structurally invalid
 * (missing field, unsupported value, out-of-range number).
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when an identifier or database name breaks its naming pattern.
 */
export class NamingConventionError extends Error {
  constructor(
    message: string,
    public readonly value: string,
  ) {
    super(message);
    this.name = 'NamingConventionError';
  }
}

/**
 * Raised when an external collaborator (EC2, KMS, ...) fails or returns
 * something the deployment cannot be built from. Not retried.
 */
export class ExternalDependencyError extends Error {
  constructor(
    message: string,
    public readonly originalError?: Error,
  ) {
    super(message);
    this.name = 'ExternalDependencyError';
  }
}

export class NoEligibleSubnetsError extends ExternalDependencyError {
  constructor(
    public readonly threshold: number,
    public readonly candidateCount: number,
  ) {
    super(
      `No subnet has more than ${threshold} available IP addresses ` +
      `(${candidateCount} candidate subnet(s) checked). Cannot build the DB subnet group.`,
    );
    this.name = 'NoEligibleSubnetsError';
  }
}
