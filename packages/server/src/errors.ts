/**
 * Error taxonomy for the spectrum engine.
 *
 * Every raised condition is fatal to the operation that raised it. Routes map
 * `status` onto the HTTP response; anything else is treated as a bad request.
 */
export class SpectrumError extends Error {
  readonly status: number = 500;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input file, band document or rtl_power binary missing. */
export class NotFoundError extends SpectrumError {
  override readonly status = 404;
}

/** Band allocation document does not have the expected structure. */
export class BandSchemaError extends SpectrumError {
  override readonly status = 422;
}

/** Peak-hold, envelope or waterfall called with zero sweeps. */
export class EmptyInputError extends SpectrumError {
  override readonly status = 400;
}

export class ScanError extends SpectrumError {
  override readonly status = 500;
}

/** A scan was requested while another one is still running. */
export class ScanBusyError extends SpectrumError {
  override readonly status = 409;
}

export function errorStatus(err: unknown): number {
  return err instanceof SpectrumError ? err.status : 400;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
