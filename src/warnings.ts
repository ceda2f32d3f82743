// Warning sink: where remarks, unsupported constructs and unresolved types end up

import { Logger, logger as defaultLogger } from './logger';

export type Severity = 1 | 2 | 3 | 4;

export interface Warning {
  message: string;
  severity: Severity;
}

export interface WarningSink {
  warn(message: string, severity: Severity): void;
}

/**
 * Keeps every warning and forwards those at or above `threshold` to the
 * logger: 1 as info, 2 as a warning, 3 and 4 as errors.
 */
export class CollectingWarningSink implements WarningSink {
  readonly warnings: Warning[] = [];

  constructor(private readonly threshold: number = 2, private readonly log: Logger = defaultLogger) {}

  warn(message: string, severity: Severity): void {
    this.warnings.push({ message, severity });
    if (severity < this.threshold) {
      return;
    }
    if (severity === 1) {
      this.log.info(message);
    } else if (severity === 2) {
      this.log.warn(message);
    } else {
      this.log.error(message);
    }
  }

  messages(minimum: number = 1): string[] {
    return this.warnings.filter(warning => warning.severity >= minimum).map(warning => warning.message);
  }
}

export function toSeverity(value: number): Severity {
  if (value <= 1) return 1;
  if (value >= 4) return 4;
  return value === 2 ? 2 : 3;
}
