// src/core/errors.ts

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}

export class TelemetryStateError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'TelemetryStateError'
  }
}
