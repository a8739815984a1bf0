/**
 * @petledger/ledger — Logical clock.
 *
 * Activities are stamped with a height, never with wall time.
 */

import type { Height } from "@petledger/types";
import { LedgerError } from "./types.js";

export interface Clock {
  /** Current height. Never decreases between calls. */
  now(): Height;
}

/**
 * A clock advanced explicitly by its owner.
 * Used by tests and by hosts that drive heights themselves.
 */
export class ManualClock implements Clock {
  private _height: Height;

  constructor(start: Height = 0) {
    assertHeight(start);
    this._height = start;
  }

  now(): Height {
    return this._height;
  }

  /**
   * Move to `height`. Staying at the same height is allowed.
   */
  advanceTo(height: Height): void {
    assertHeight(height);
    if (height < this._height) {
      throw new LedgerError(
        "CLOCK_REGRESSION",
        `Clock cannot move backwards: at ${this._height}, asked for ${height}`,
      );
    }
    this._height = height;
  }

  tick(steps = 1): Height {
    this.advanceTo(this._height + steps);
    return this._height;
  }
}

export function assertHeight(height: Height): void {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw new LedgerError(
      "INVALID_HEIGHT",
      `Height must be a non-negative integer, got ${height}`,
    );
  }
}
