/**
 * Fatal setup errors. Raised while building the pipeline, never per block.
 */
export class ConfigurationError extends Error {
  /** Setting that failed validation, e.g. "sampleRate" */
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}
