// Diagnostic Overlay (v1)
//
// Non-blocking consumer of committed epochs. publish() only enqueues; frames are
// processed one per event-loop turn, in publish order. Each processed epoch
// yields at most one DiagnosticAnnotationV1, written through the annotation sink.
//
// Capabilities held: a read-only ledger view and an attach-only sink. The
// overlay cannot append to the ledger, and nothing it produces is an input the
// kernel accepts.
//
// Failure policy: an error while processing epoch t is logged as a
// DiagnosticComputationError and t gets no annotation. Processing continues
// with t+1; the failed epoch does not enter the history.

import {
  decodeDecisionV1,
  TAG_VOCABULARY_VERSION_V1,
  type DiagnosticAnnotationV1,
  type OverlayConfigV1
} from "@vitalgate/contracts";
import type { AnnotationSinkV1, LedgerReadViewV1 } from "@vitalgate/ledger";
import type { BaseLogger } from "pino";

import { DiagnosticComputationError } from "./errors";
import type { OverlayFrameV1 } from "./frame";
import { computeRowV1, type RowPointV1 } from "./rules/row";
import { deriveTagsV1, gammaWaveStateV1, type TagInputFrameV1 } from "./rules/tag_rules";

export type OverlayLogger = Pick<BaseLogger, "debug" | "warn">;

export interface DiagnosticOverlayDepsV1 {
  ledger: LedgerReadViewV1;
  sink: AnnotationSinkV1;
  config: OverlayConfigV1;
  logger: OverlayLogger;
}

interface HistoryItemV1 extends TagInputFrameV1 {
  readonly point: RowPointV1;
}

export class DiagnosticOverlay {
  private readonly ledger: LedgerReadViewV1;
  private readonly sink: AnnotationSinkV1;
  private readonly logger: OverlayLogger;
  private config: OverlayConfigV1;

  private readonly queue: OverlayFrameV1[] = [];
  private history: HistoryItemV1[] = [];
  private scheduled = false;
  private waiters: Array<() => void> = [];
  private failures = 0;

  constructor(deps: DiagnosticOverlayDepsV1) {
    this.ledger = deps.ledger;
    this.sink = deps.sink;
    this.config = deps.config;
    this.logger = deps.logger;
  }

  /**
   * Enqueues a frame and returns immediately.
   */
  publish(frame: OverlayFrameV1): void {
    this.queue.push(frame);
    this.schedule();
  }

  /**
   * Resolves once every frame published so far has been processed.
   */
  idle(): Promise<void> {
    if (this.queue.length === 0 && !this.scheduled) return Promise.resolve();
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  pending(): number {
    return this.queue.length;
  }

  /** Epochs whose annotation was dropped because processing failed. */
  failureCount(): number {
    return this.failures;
  }

  reconfigure(config: OverlayConfigV1): void {
    this.config = config;
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    setImmediate(() => this.step());
  }

  private step(): void {
    const frame = this.queue.shift();
    if (frame !== undefined) {
      try {
        this.process(frame);
      } catch (err: unknown) {
        this.failures += 1;
        const wrapped = new DiagnosticComputationError(frame.epochIndex, frame.proposalId, err);
        this.logger.warn(
          { err: wrapped, epochIndex: frame.epochIndex, proposalId: frame.proposalId },
          "diagnostic annotation dropped"
        );
      }
    }

    if (this.queue.length > 0) {
      setImmediate(() => this.step());
      return;
    }

    this.scheduled = false;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve();
  }

  private process(frame: OverlayFrameV1): void {
    const config = this.config;
    const point: RowPointV1 = {
      epochIndex: frame.epochIndex,
      epochDurationSeconds: frame.epochDurationSeconds,
      decay: frame.assets.DECAY,
      wave: frame.assets.WAVE
    };

    const prev = this.history[this.history.length - 1];
    const { row, rowState } = computeRowV1(prev?.point ?? null, point, this.guardHolds(frame), config);

    const item: HistoryItemV1 = {
      epochIndex: frame.epochIndex,
      assets: frame.assets,
      gammaWaveState: gammaWaveStateV1(frame.gammaLoad, config.gamma),
      severities: frame.envelope.map((a) => a.severity),
      row,
      point
    };
    const history = [...this.history, item];

    const annotation: DiagnosticAnnotationV1 = {
      proposalId: frame.proposalId,
      epochIndex: frame.epochIndex,
      tagVocabularyVersion: TAG_VOCABULARY_VERSION_V1,
      treeOfLifeView: { ...frame.assets },
      envelopeStates: Object.fromEntries(frame.envelope.map((a) => [a.axis, a.severity])),
      diagnostics: {
        row,
        rowState,
        gammaWaveState: item.gammaWaveState,
        natureTags: deriveTagsV1(history, config)
      }
    };

    this.sink.attach(annotation);

    const keep = Math.max(
      config.windowEpochs,
      config.recovery.pastEpochs + config.recovery.gapEpochs + config.recovery.recentEpochs
    );
    this.history = history.slice(Math.max(0, history.length - keep));
    this.logger.debug({ epochIndex: frame.epochIndex, rowState }, "diagnostic annotation attached");
  }

  // ROW is only defined for an epoch whose committed entry kept the risk
  // invariant: monotone, under the current ceiling, and not itself a risk deny.
  private guardHolds(frame: OverlayFrameV1): boolean {
    const entry = this.ledger.entryByHash(frame.entryHash);
    if (entry === null || entry.proposalId !== frame.proposalId) return false;
    const decision = decodeDecisionV1(entry.decision);
    if (decision.verdict === "DENY" && decision.reason === "RISK_INVARIANT") return false;
    return entry.riskAfter >= entry.riskBefore && entry.riskAfter <= frame.kernel.riskCeiling;
  }
}
