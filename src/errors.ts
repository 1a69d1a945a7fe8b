/**
 * Error taxonomy shared by the address utility, repositories and services.
 * Range failures (prefix lengths, lossiness, enum codes) use the built-in
 * RangeError.
 */

export abstract class RegistryError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Address text is not a dotted-quad IPv4 literal. */
export class FormatError extends RegistryError {
  readonly code = "FORMAT";
}

export class UniquenessViolation extends RegistryError {
  readonly code = "UNIQUENESS";

  constructor(
    readonly entity: string,
    readonly fields: string[],
    detail?: string
  ) {
    super(detail ?? `${entity} with the same ${fields.join(", ")} already exists`);
  }
}

export class NotFoundError extends RegistryError {
  readonly code = "NOT_FOUND";

  constructor(
    readonly entity: string,
    readonly id: number | string
  ) {
    super(`${entity} ${id} not found`);
  }
}

/** Relational invariant broken: cycles, dangling references, bad link endpoints. */
export class IntegrityError extends RegistryError {
  readonly code = "INTEGRITY";
}

export class ValidationError extends RegistryError {
  readonly code = "VALIDATION";

  constructor(
    readonly field: string,
    message: string
  ) {
    super(field ? `${field}: ${message}` : message);
  }
}
