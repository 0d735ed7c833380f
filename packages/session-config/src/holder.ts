import type { SessionConfigV1 } from "@vitalgate/contracts";

import { assertNonRelaxingReloadV1 } from "./reload";
import { validateSessionConfigV1 } from "./validator";

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null) {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

/**
 * Holds the active config of one session. The held value is deeply frozen and
 * only replaced by an admitted, non-relaxing reload.
 */
export class SessionConfigHolder {
  private active: Readonly<SessionConfigV1>;

  constructor(initial: unknown) {
    this.active = deepFreeze(validateSessionConfigV1(initial));
  }

  current(): Readonly<SessionConfigV1> {
    return this.active;
  }

  /**
   * @throws ConfigRelaxationRejected when `next` loosens the active envelope;
   *   the active config is kept.
   */
  reload(next: unknown): Readonly<SessionConfigV1> {
    const admitted = validateSessionConfigV1(next);
    assertNonRelaxingReloadV1(this.active, admitted);
    this.active = deepFreeze(admitted);
    return this.active;
  }
}
