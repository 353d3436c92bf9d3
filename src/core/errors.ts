// src/core/errors.ts

/** A filter, or the engine configuration, cannot be built as given. */
export class FilterConfigurationError extends Error {
  override readonly name = "FilterConfigurationError";

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnknownDescriptorError extends Error {
  override readonly name = "UnknownDescriptorError";

  constructor(readonly shortName: string) {
    super(`Unknown filter descriptor '${shortName}'`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class FilterSpecSyntaxError extends Error {
  override readonly name = "FilterSpecSyntaxError";

  constructor(readonly input: string, message: string) {
    super(`${message}: "${input}"`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
