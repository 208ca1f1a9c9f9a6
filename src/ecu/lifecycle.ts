import { EventEmitter } from 'node:events';
import { consoleSink, type LogSink } from '../util/log.js';

export enum EcuState {
  Boot = 'BOOT',
  Application = 'APPLICATION',
  UpdatePending = 'UPDATE_PENDING',
  Bricked = 'BRICKED',
}

/**
 * Process-wide operational state of the ECU.
 *
 * The main loop and every session read and write the state through this
 * object only. JavaScript runs each accessor to completion on the event
 * loop, so a read or transition is never interleaved with another.
 *
 * Emits `stateChange` with `(to, from)` on every effective transition.
 */
export class EcuLifecycle extends EventEmitter {
  private current: EcuState;

  constructor(
    initial: EcuState = EcuState.Boot,
    private sink: LogSink = consoleSink,
  ) {
    super();
    this.current = initial;
  }

  get state(): EcuState {
    return this.current;
  }

  is(state: EcuState): boolean {
    return this.current === state;
  }

  get bricked(): boolean {
    return this.current === EcuState.Bricked;
  }

  /**
   * Move to `to`. Returns false when refused: BRICKED is terminal.
   * Transitioning to the current state is accepted and changes nothing.
   */
  transition(to: EcuState): boolean {
    const from = this.current;
    if (from === EcuState.Bricked) {
      if (to !== EcuState.Bricked) this.log(`refusing ${from} -> ${to}`);
      return to === EcuState.Bricked;
    }
    if (from === to) return true;

    this.current = to;
    this.log(`${from} -> ${to}`);
    this.emit('stateChange', to, from);
    return true;
  }

  /** Move to `to` only while still in `from`. */
  transitionFrom(from: EcuState, to: EcuState): boolean {
    if (this.current !== from) {
      this.log(`not moving to ${to}: expected ${from}, in ${this.current}`);
      return false;
    }
    return this.transition(to);
  }

  private log(msg: string): void {
    this.sink(`[STATE] ${msg}`);
  }
}
