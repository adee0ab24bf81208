import type { CallEvent, CallState, EndReason, TransitionEffect, TransitionResult } from './types';
import type { CallHistoryStatus } from '../history/types';

const END_EFFECTS: TransitionEffect[] = ['stamp_ended', 'stop_recording', 'release_slot'];

type TransitionTable = Record<CallState, Partial<Record<CallEvent['type'], { to: CallState; effects: TransitionEffect[] }>>>;

const TABLE: TransitionTable = {
  initiated: {
    ringing: { to: 'ringing', effects: [] },
    ended: { to: 'ended', effects: END_EFFECTS },
  },
  ringing: {
    connected: { to: 'connected', effects: ['stamp_connected', 'start_recording'] },
    ended: { to: 'ended', effects: END_EFFECTS },
  },
  connected: {
    held: { to: 'held', effects: ['set_hold'] },
    ended: { to: 'ended', effects: END_EFFECTS },
  },
  held: {
    connected: { to: 'connected', effects: ['clear_hold'] },
    ended: { to: 'ended', effects: END_EFFECTS },
  },
  ended: {},
};

/**
 * Pure transition decision. Re-delivery of the event that produced the
 * current state is a no-op so duplicated engine notifications are harmless.
 */
export function transition(state: CallState, event: CallEvent): TransitionResult {
  if (eventTargetState(event) === state) {
    return { kind: 'noop', state };
  }

  const entry = TABLE[state][event.type];
  if (!entry) {
    return { kind: 'rejected', state, event: event.type };
  }

  return { kind: 'applied', from: state, to: entry.to, effects: [...entry.effects] };
}

function eventTargetState(event: CallEvent): CallState {
  switch (event.type) {
    case 'ringing':
      return 'ringing';
    case 'connected':
      return 'connected';
    case 'held':
      return 'held';
    case 'ended':
      return 'ended';
  }
}

export function isActiveState(state: CallState): boolean {
  return state === 'ringing' || state === 'connected' || state === 'held';
}

export function historyStatusFor(
  state: CallState,
  wasConnected: boolean,
  endReason?: EndReason,
): CallHistoryStatus {
  switch (state) {
    case 'initiated':
      return 'calling';
    case 'ringing':
      return 'ringing';
    case 'connected':
    case 'held':
      return 'answered';
    case 'ended':
      if (endReason === 'failure' && !wasConnected) {
        return 'failed';
      }
      return 'ended';
  }
}

export function computeDurationSeconds(connectedAt: Date | undefined, endedAt: Date): number {
  if (!connectedAt) {
    return 0;
  }
  const elapsedMs = endedAt.getTime() - connectedAt.getTime();
  return elapsedMs > 0 ? Math.round(elapsedMs) / 1000 : 0;
}
