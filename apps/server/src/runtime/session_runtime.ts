// Session runtime (one per subject)
//
// Kernel path, synchronous and strictly in epoch order:
//   envelope -> risk -> proposal -> kernel decision -> ledger append (CAS, retried)
//   -> state commit -> proposal log
// Diagnostic path, after the kernel path has returned its result:
//   assets -> drain sample, overlay frame -> publish (never awaited here)
//
// The overlay receives the ledger's read view and annotation sink only. Nothing
// computed on the diagnostic path flows back into a proposal.

import type {
  AssetVectorV1,
  DecisionV1,
  KernelStateViewV1,
  LedgerEntryV1,
  ProposalLogRecordV1,
  SessionConfigV1,
  SignalSnapshotV1,
  TransitionProposalV1,
  TransitionRequestV1
} from "@vitalgate/contracts";
import { deriveAssetsV1, deriveBandLoadsV1, type AxisSeverityV1 } from "@vitalgate/asset-engine";
import {
  KernelStateCell,
  RoHMonotonicityViolation,
  computeRiskV1,
  evaluateEnvelopeV1,
  evaluateTransitionV1,
  type AxisStateV1,
  type KernelStateInitV1
} from "@vitalgate/control-kernel";
import { DiagnosticOverlay, isOverloadedV1, type DrainSampleV1 } from "@vitalgate/diagnostic-overlay";
import {
  ChainCorruption,
  appendWithRetryV1,
  type ChainCorruptionKind,
  type HashLinkedLedgerV1,
  type LedgerReadViewV1
} from "@vitalgate/ledger";
import type { SessionConfigHolder } from "@vitalgate/session-config";
import type { BaseLogger } from "pino";

import { EpochOrderViolation, ProposalIdDuplicate, SessionHalted, SubjectMismatch } from "./errors";
import type { ProposalLogV1 } from "./proposal_log";

export type RuntimeLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export interface SessionRuntimeDepsV1 {
  subjectId: string;
  config: SessionConfigHolder;
  ledger: HashLinkedLedgerV1;
  proposalLog: ProposalLogV1;
  logger: RuntimeLogger;
  /** Evaluation time source; wall clock by default. */
  clock?: () => number;
  initialState?: KernelStateInitV1;
  /** Last epoch already on the chain, when resuming one. */
  lastEpochIndex?: number;
  /** Attempts for a ledger append that loses the tip race. */
  maxAppendAttempts?: number;
}

export interface EpochInputV1 {
  snapshot: SignalSnapshotV1;
  request: TransitionRequestV1;
}

export interface EpochOutcomeV1 {
  proposal: TransitionProposalV1;
  decision: DecisionV1;
  entry: LedgerEntryV1;
  state: KernelStateViewV1;
}

// Recent drain samples kept per session for the cross-session report.
const DRAIN_SAMPLE_CAP = 256;

export type VerifyResultV1 = { ok: true; entries: number } | { ok: false; index: number; kind: ChainCorruptionKind };

export class SessionRuntime {
  readonly subjectId: string;

  private readonly config: SessionConfigHolder;
  private readonly ledger: HashLinkedLedgerV1;
  private readonly proposalLog: ProposalLogV1;
  private readonly logger: RuntimeLogger;
  private readonly clock: () => number;
  private readonly maxAppendAttempts: number;
  private readonly cell: KernelStateCell;
  private readonly overlay: DiagnosticOverlay;

  private axisStates: ReadonlyArray<AxisStateV1> = [];
  private lastEpochIndex: number | null;
  private halted: ChainCorruption | null = null;
  private drain: DrainSampleV1[] = [];

  constructor(deps: SessionRuntimeDepsV1) {
    this.subjectId = deps.subjectId;
    this.config = deps.config;
    this.ledger = deps.ledger;
    this.proposalLog = deps.proposalLog;
    this.logger = deps.logger;
    this.clock = deps.clock ?? Date.now;
    this.maxAppendAttempts = deps.maxAppendAttempts ?? 3;
    this.lastEpochIndex = deps.lastEpochIndex ?? null;

    const active = deps.config.current();
    this.cell = new KernelStateCell(active.risk, deps.initialState);
    this.overlay = new DiagnosticOverlay({
      ledger: deps.ledger.readView(),
      sink: deps.ledger.annotationSink(),
      config: active.overlay,
      logger: deps.logger
    });
  }

  /**
   * Runs one epoch through the kernel path and hands its frame to the overlay.
   *
   * @throws SessionHalted after a failed chain verification.
   * @throws EpochOrderViolation when the epoch does not follow the last one.
   * @throws ProposalIdDuplicate when the request reuses a committed proposal id.
   */
  ingest(input: EpochInputV1): EpochOutcomeV1 {
    const { snapshot, request } = input;
    if (this.halted !== null) throw new SessionHalted(this.subjectId, this.halted);
    if (snapshot.subjectId !== this.subjectId) throw new SubjectMismatch(this.subjectId, snapshot.subjectId);
    if (this.lastEpochIndex !== null && snapshot.epochIndex <= this.lastEpochIndex) {
      throw new EpochOrderViolation(this.lastEpochIndex, snapshot.epochIndex);
    }
    if (this.ledger.readView().entryFor(request.proposalId) !== null) {
      throw new ProposalIdDuplicate(request.proposalId);
    }

    const config = this.config.current();
    const axisStates = evaluateEnvelopeV1(snapshot, this.axisStates, config.axes, config.hysteresis);

    const before = this.cell.view();
    const riskAfter = this.riskFor(axisStates, config, before.risk, snapshot.epochIndex);

    const proposal: TransitionProposalV1 = {
      ...request,
      fromState: before.tier,
      riskBefore: before.risk,
      riskAfter,
      epochIndex: snapshot.epochIndex,
      evaluatedAtMs: this.clock()
    };
    const decision = evaluateTransitionV1(proposal, { risk: config.risk, policy: config.policy });

    const entry = appendWithRetryV1(
      this.ledger,
      { decision, proposal, timestamp: proposal.evaluatedAtMs },
      {
        maxAttempts: this.maxAppendAttempts,
        onRetry: (err, attempt) =>
          this.logger.warn({ err, attempt, proposalId: proposal.proposalId }, "ledger tip moved; retrying append")
      }
    );
    const state = this.cell.commit(decision, proposal);

    this.axisStates = axisStates;
    this.lastEpochIndex = snapshot.epochIndex;
    this.proposalLog.append(logRecordV1(proposal, decision, entry));
    this.logger.info(
      { epochIndex: snapshot.epochIndex, proposalId: proposal.proposalId, decision: entry.decision },
      "epoch committed"
    );

    this.publishFrame(snapshot, axisStates, config, state, proposal, entry);
    return { proposal, decision, entry, state };
  }

  /**
   * Re-verifies the whole chain. A corrupted chain halts ingestion; a later
   * clean verification lifts the halt.
   */
  verify(): VerifyResultV1 {
    try {
      const entries = this.ledger.verifyChain();
      if (this.halted !== null) this.logger.info({ entries }, "ledger chain verified; session resumed");
      this.halted = null;
      return { ok: true, entries };
    } catch (err: unknown) {
      if (!(err instanceof ChainCorruption)) throw err;
      this.halted = err;
      this.logger.error({ err, index: err.index, kind: err.kind }, "ledger chain corrupted; session halted");
      return { ok: false, index: err.index, kind: err.kind };
    }
  }

  /**
   * @throws ConfigRelaxationRejected when the reload loosens anything the kernel
   *   path reads; the active config stays in force.
   */
  reloadConfig(next: unknown): Readonly<SessionConfigV1> {
    const active = this.config.reload(next);
    this.cell.reconfigure(active.risk);
    this.overlay.reconfigure(active.overlay);
    this.logger.info({ axes: active.axes.map((a) => a.axis) }, "session config reloaded");
    return active;
  }

  state(): KernelStateViewV1 {
    return this.cell.view();
  }

  isHalted(): boolean {
    return this.halted !== null;
  }

  ledgerView(): LedgerReadViewV1 {
    return this.ledger.readView();
  }

  proposalRecords(): ProposalLogRecordV1[] {
    return this.proposalLog.records();
  }

  overlayIdle(): Promise<void> {
    return this.overlay.idle();
  }

  /** Oldest first. Advisory; never read by the kernel path. */
  drainSamples(): ReadonlyArray<DrainSampleV1> {
    return this.drain;
  }

  overlayStatus(): { pending: number; failures: number } {
    return { pending: this.overlay.pending(), failures: this.overlay.failureCount() };
  }

  // A raw score below the committed one is logged and proposed as-is so the
  // kernel denies it and the ledger records the denial.
  private riskFor(
    axisStates: ReadonlyArray<AxisStateV1>,
    config: Readonly<SessionConfigV1>,
    before: number,
    epochIndex: number
  ): number {
    try {
      return computeRiskV1(axisStates, config.risk, before);
    } catch (err: unknown) {
      if (!(err instanceof RoHMonotonicityViolation)) throw err;
      this.logger.warn({ err, epochIndex }, "risk monotonicity violation");
      return err.rawAfter;
    }
  }

  private publishFrame(
    snapshot: SignalSnapshotV1,
    axisStates: ReadonlyArray<AxisStateV1>,
    config: Readonly<SessionConfigV1>,
    state: KernelStateViewV1,
    proposal: TransitionProposalV1,
    entry: LedgerEntryV1
  ): void {
    const severityByAxis = new Map(axisStates.map((s) => [s.axis, s.severity]));
    const envelope: AxisSeverityV1[] = config.axes.map((a) => ({
      axis: a.axis,
      channel: a.channel,
      severity: severityByAxis.get(a.axis) ?? "INFO"
    }));

    const assets: AssetVectorV1 = deriveAssetsV1(
      snapshot,
      {
        risk: state.risk,
        riskCeiling: state.riskCeiling,
        tier: state.tier,
        envelope,
        acceptedTransitionCount: state.acceptedTransitionCount
      },
      config.assets
    );

    this.drain = [
      ...this.drain.slice(Math.max(0, this.drain.length - DRAIN_SAMPLE_CAP + 1)),
      Object.freeze({
        subjectId: this.subjectId,
        tMs: proposal.evaluatedAtMs,
        tier: state.tier,
        jurisdiction: proposal.jurisdiction,
        lifeforce: assets.LIFEFORCE,
        oxygen: assets.OXYGEN,
        overloaded: isOverloadedV1(assets, config.overlay.overloaded)
      })
    ];

    this.overlay.publish(Object.freeze({
      proposalId: proposal.proposalId,
      entryHash: entry.entryHash,
      epochIndex: snapshot.epochIndex,
      epochDurationSeconds: snapshot.epochDurationSeconds,
      assets,
      gammaLoad: deriveBandLoadsV1(snapshot, config.assets).gamma,
      envelope: Object.freeze(envelope.map(({ axis, severity }) => Object.freeze({ axis, severity }))),
      kernel: state
    }));
  }
}

function logRecordV1(proposal: TransitionProposalV1, decision: DecisionV1, entry: LedgerEntryV1): ProposalLogRecordV1 {
  return {
    epochIndex: proposal.epochIndex,
    proposalId: proposal.proposalId,
    fromState: proposal.fromState,
    toState: proposal.toState,
    riskBefore: proposal.riskBefore,
    riskAfter: proposal.riskAfter,
    decision: entry.decision,
    reason: decision.verdict === "DENY" ? decision.reason : null,
    timestamp: entry.timestamp,
    policyRefs: [...proposal.policyRefs]
  };
}
