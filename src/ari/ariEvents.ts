import type { EngineEvent } from '../engine/types';
import type { AriChannel, AriEvent } from './types';

// Q.850 causes that mean the far end simply hung up, was busy or did not answer
const NORMAL_CLEARING_CAUSES = new Set([0, 16, 17, 18, 19, 21, 31]);

export function remoteUriForChannel(channel: AriChannel, sipDomain: string): string {
  const number = channel.caller?.number?.trim();
  if (number) {
    return number.startsWith('sip:') ? number : `sip:${number}@${sipDomain}`;
  }
  return channel.name ?? channel.id;
}

export function mapChannelState(stateText: string): 'ringing' | 'connected' | null {
  switch (stateText) {
    case 'Ring':
    case 'Ringing':
      return 'ringing';
    case 'Up':
      return 'connected';
    default:
      return null;
  }
}

/**
 * Translates one ARI event into the engine contract. Channels we originated
 * never surface as incoming calls.
 */
export function mapAriEvent(
  event: AriEvent,
  ownChannels: ReadonlySet<string>,
  sipDomain: string,
): EngineEvent | null {
  const channel = event.channel;
  if (!channel) {
    return null;
  }

  switch (event.type) {
    case 'StasisStart':
      if (ownChannels.has(channel.id)) {
        return null;
      }
      return { type: 'incoming', handle: channel.id, remoteUri: remoteUriForChannel(channel, sipDomain) };
    case 'ChannelStateChange': {
      const stateText = channel.state ?? 'Unknown';
      const state = mapChannelState(stateText);
      if (!state) {
        return null;
      }
      return { type: 'state', handle: channel.id, state, stateText, remoteUri: remoteUriForChannel(channel, sipDomain) };
    }
    case 'ChannelDestroyed':
      return {
        type: 'state',
        handle: channel.id,
        state: 'disconnected',
        stateText: event.cause_txt ?? 'Destroyed',
        remoteUri: remoteUriForChannel(channel, sipDomain),
        failed: event.cause !== undefined && !NORMAL_CLEARING_CAUSES.has(event.cause),
      };
    case 'StasisEnd':
      return {
        type: 'state',
        handle: channel.id,
        state: 'disconnected',
        stateText: 'StasisEnd',
        remoteUri: remoteUriForChannel(channel, sipDomain),
      };
    default:
      return null;
  }
}
