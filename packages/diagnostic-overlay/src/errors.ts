export class DiagnosticComputationError extends Error {
  public readonly code = "DIAGNOSTIC_COMPUTATION_ERROR";
  public readonly epochIndex: number;
  public readonly proposalId: string;

  constructor(epochIndex: number, proposalId: string, cause: unknown) {
    super(
      `DIAGNOSTIC_COMPUTATION_ERROR: ${cause instanceof Error ? cause.message : String(cause)} @ epoch:${epochIndex}`,
      { cause }
    );
    this.name = "DiagnosticComputationError";
    this.epochIndex = epochIndex;
    this.proposalId = proposalId;
  }
}
