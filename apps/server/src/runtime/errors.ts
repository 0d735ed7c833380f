// Session runtime errors. Each carries the HTTP status the routes answer with.

export class EpochOrderViolation extends Error {
  public readonly code = "EPOCH_ORDER_VIOLATION";
  public readonly status = 409;
  public readonly lastEpochIndex: number;
  public readonly epochIndex: number;

  constructor(lastEpochIndex: number, epochIndex: number) {
    super(`EPOCH_ORDER_VIOLATION: epoch ${epochIndex} after ${lastEpochIndex}`);
    this.name = "EpochOrderViolation";
    this.lastEpochIndex = lastEpochIndex;
    this.epochIndex = epochIndex;
  }
}

export class SessionHalted extends Error {
  public readonly code = "SESSION_HALTED";
  public readonly status = 409;

  constructor(subjectId: string, cause: Error) {
    super(`SESSION_HALTED: ${subjectId} (${cause.message})`, { cause });
    this.name = "SessionHalted";
  }
}

export class SubjectMismatch extends Error {
  public readonly code = "SUBJECT_MISMATCH";
  public readonly status = 400;

  constructor(expected: string, actual: string) {
    super(`SUBJECT_MISMATCH: snapshot for ${actual} sent to session ${expected}`);
    this.name = "SubjectMismatch";
  }
}

export class SessionNotFound extends Error {
  public readonly code = "SESSION_NOT_FOUND";
  public readonly status = 404;

  constructor(subjectId: string) {
    super(`SESSION_NOT_FOUND: ${subjectId}`);
    this.name = "SessionNotFound";
  }
}

export class SessionAlreadyExists extends Error {
  public readonly code = "SESSION_EXISTS";
  public readonly status = 409;

  constructor(subjectId: string) {
    super(`SESSION_EXISTS: ${subjectId}`);
    this.name = "SessionAlreadyExists";
  }
}

export class ProposalIdDuplicate extends Error {
  public readonly code = "PROPOSAL_ID_DUPLICATE";
  public readonly status = 409;

  constructor(proposalId: string) {
    super(`PROPOSAL_ID_DUPLICATE: ${proposalId} is already on the chain`);
    this.name = "ProposalIdDuplicate";
  }
}

export class SessionResumeRefused extends Error {
  public readonly code = "SESSION_RESUME_REFUSED";
  public readonly status = 409;

  constructor(subjectId: string, detail: string) {
    super(`SESSION_RESUME_REFUSED: ${subjectId} (${detail})`);
    this.name = "SessionResumeRefused";
  }
}
