/**
 * Broadcaster lifecycle transitions
 */

import { InvalidStateError } from '@tankview/shared';
import { BROADCASTER_STATES, type BroadcasterState } from './types.js';

// stopped is terminal
const VALID_TRANSITIONS: Record<BroadcasterState, readonly BroadcasterState[]> = {
  [BROADCASTER_STATES.IDLE]: [BROADCASTER_STATES.STARTING, BROADCASTER_STATES.STOPPING],
  [BROADCASTER_STATES.STARTING]: [
    BROADCASTER_STATES.RUNNING,
    BROADCASTER_STATES.FAILED,
    BROADCASTER_STATES.STOPPING,
  ],
  [BROADCASTER_STATES.RUNNING]: [BROADCASTER_STATES.STOPPING, BROADCASTER_STATES.FAILED],
  [BROADCASTER_STATES.FAILED]: [BROADCASTER_STATES.STOPPING],
  [BROADCASTER_STATES.STOPPING]: [BROADCASTER_STATES.STOPPED],
  [BROADCASTER_STATES.STOPPED]: [],
};

export function isValidTransition(from: BroadcasterState, to: BroadcasterState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Returns `to`, or throws InvalidStateError naming both states
 */
export function assertTransition(camera: number, from: BroadcasterState, to: BroadcasterState): BroadcasterState {
  if (!isValidTransition(from, to)) {
    throw new InvalidStateError(`Camera ${camera} broadcaster cannot go from ${from} to ${to}`, {
      camera,
      from,
      to,
    });
  }
  return to;
}
