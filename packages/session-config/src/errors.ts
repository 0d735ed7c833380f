export class ConfigRelaxationRejected extends Error {
  public readonly code = "CONFIG_RELAXATION_REJECTED";
  public readonly violations: ReadonlyArray<string>;

  constructor(violations: ReadonlyArray<string>) {
    super(`CONFIG_RELAXATION_REJECTED: ${violations.join("; ")}`);
    this.name = "ConfigRelaxationRejected";
    this.violations = Object.freeze([...violations]);
  }
}
