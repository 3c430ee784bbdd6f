/**
 * Error kinds raised across the on-air pipeline.
 *
 * Only structural problems are errors. Stale messages are a discard
 * outcome of the listener, not an exception.
 */

export class OnAirError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A state message or payload that does not match the wire schema */
export class InvalidPayloadError extends OnAirError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid payload: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/** The configured light could not be opened; callers fall back to no device */
export class IndicatorUnavailableError extends OnAirError {
  constructor(indicator: string, reason: string) {
    super(`Indicator "${indicator}" unavailable: ${reason}`);
  }
}

/** Unexpected output from the hardware probe */
export class ProbeError extends OnAirError {}

export class ConfigError extends OnAirError {}
