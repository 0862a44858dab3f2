import type { OrderSide } from '../types';

/** bybit and binanceusdm cap client order ids at 36 characters. */
export const MAX_LINK_ID_LENGTH = 36;

/**
 * Client order ids of the form `{side}_{session}_{build}_{index}`. The session
 * is the engine's start second and the build stamp is the ladder's build
 * millisecond, so ids stay unique across restarts and across rebuilds.
 */
export class LinkIdPolicy {
  readonly sessionId: number;
  private buildStamp: number;
  private counterSequence = 0;

  constructor(startedAtMs: number) {
    this.sessionId = Math.floor(startedAtMs / 1000);
    this.buildStamp = startedAtMs;
  }

  /** Stamps a new build; stamps never repeat within a session. */
  nextBuild(nowMs: number) {
    this.buildStamp = Math.max(nowMs, this.buildStamp + 1);
    return this.buildStamp;
  }

  get currentBuild() {
    return this.buildStamp;
  }

  ladderLinkId(side: OrderSide, index: number) {
    return this.checked(`${side}_${this.sessionId}_${this.buildStamp}_${index}`);
  }

  counterLinkId(side: OrderSide) {
    this.counterSequence += 1;
    return this.checked(`${side}_${this.sessionId}_${this.buildStamp}_c${this.counterSequence}`);
  }

  private checked(linkId: string) {
    if (linkId.length > MAX_LINK_ID_LENGTH) {
      throw new Error(`link_id_too_long:${linkId}`);
    }
    return linkId;
  }
}
