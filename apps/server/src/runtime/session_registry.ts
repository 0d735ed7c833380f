import type { CapabilityTierV1 } from "@vitalgate/contracts";
import {
  computeUnfairDrainV1,
  UNFAIR_DRAIN_DEFAULTS_V1,
  type UnfairDrainConfigV1,
  type UnfairDrainFlagV1
} from "@vitalgate/diagnostic-overlay";
import type { HashLinkedLedgerV1 } from "@vitalgate/ledger";
import { SessionConfigHolder } from "@vitalgate/session-config";

import { SessionAlreadyExists, SessionNotFound } from "./errors";
import type { ProposalLogV1 } from "./proposal_log";
import { resumePointV1 } from "./resume";
import { SessionRuntime, type RuntimeLogger } from "./session_runtime";

export interface RegistryLogger extends RuntimeLogger {
  child(bindings: Record<string, unknown>): RuntimeLogger;
}

export interface SessionRegistryDepsV1 {
  logger: RegistryLogger;
  ledgerFor(subjectId: string): HashLinkedLedgerV1;
  proposalLogFor(subjectId: string): ProposalLogV1;
  clock?: () => number;
}

export interface CreateSessionArgsV1 {
  subjectId: string;
  /** Admitted through SessionConfigHolder; admission errors propagate. */
  config: unknown;
  /** Ignored when the subject already has a chain to resume. */
  initialTier?: CapabilityTierV1;
}

/**
 * One independent runtime per subject. Runtimes share nothing but the
 * factories they were built from.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, SessionRuntime>();

  constructor(private readonly deps: SessionRegistryDepsV1) {}

  /**
   * Starts a session, resuming the subject's chain when one exists.
   *
   * @throws SessionAlreadyExists when the subject already has a runtime here.
   * @throws SessionResumeRefused when an existing chain cannot be resumed.
   */
  create(args: CreateSessionArgsV1): SessionRuntime {
    if (this.sessions.has(args.subjectId)) throw new SessionAlreadyExists(args.subjectId);

    const config = new SessionConfigHolder(args.config);
    const ledger = this.deps.ledgerFor(args.subjectId);
    const proposalLog = this.deps.proposalLogFor(args.subjectId);
    const resumed = resumePointV1(args.subjectId, ledger, proposalLog.records());

    const runtime = new SessionRuntime({
      subjectId: args.subjectId,
      config,
      ledger,
      proposalLog,
      logger: this.deps.logger.child({ subjectId: args.subjectId }),
      clock: this.deps.clock,
      initialState:
        resumed?.state ?? (args.initialTier === undefined ? undefined : { tier: args.initialTier, risk: 0 }),
      lastEpochIndex: resumed?.lastEpochIndex
    });
    this.sessions.set(args.subjectId, runtime);
    if (resumed === null) {
      this.deps.logger.info({ subjectId: args.subjectId, tier: runtime.state().tier }, "session created");
    } else {
      this.deps.logger.info(
        { subjectId: args.subjectId, tier: runtime.state().tier, lastEpochIndex: resumed.lastEpochIndex },
        "session resumed from ledger"
      );
    }
    return runtime;
  }

  get(subjectId: string): SessionRuntime | null {
    return this.sessions.get(subjectId) ?? null;
  }

  /** @throws SessionNotFound */
  require(subjectId: string): SessionRuntime {
    const runtime = this.sessions.get(subjectId);
    if (runtime === undefined) throw new SessionNotFound(subjectId);
    return runtime;
  }

  subjectIds(): string[] {
    return [...this.sessions.keys()].sort();
  }

  /** UNFAIR_DRAIN over every live session's recent samples. */
  unfairDrainReport(config: UnfairDrainConfigV1 = UNFAIR_DRAIN_DEFAULTS_V1): UnfairDrainFlagV1[] {
    return computeUnfairDrainV1(
      config,
      [...this.sessions.values()].flatMap((r) => [...r.drainSamples()])
    );
  }
}
