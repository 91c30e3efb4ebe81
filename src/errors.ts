/**
 * Error types raised by the churn engine and its entry points.
 */

/**
 * A raw date parameter could not be parsed. Always raised at parse time.
 */
export class InvalidDateFormatError extends Error {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid date format: ${JSON.stringify(value)}`);
    this.name = 'InvalidDateFormatError';
    this.value = value;
  }
}

/**
 * The end date precedes the start date.
 */
export class InvalidDateRangeError extends Error {
  readonly startDate: string;
  readonly endDate: string;

  constructor(startDate: string, endDate: string) {
    super(`End date ${endDate} must be on or after start date ${startDate}`);
    this.name = 'InvalidDateRangeError';
    this.startDate = startDate;
    this.endDate = endDate;
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration:\n${issues.map((issue) => `  - ${issue}`).join('\n')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}
