import { CallControlError } from '../errors';

const SIP_URI_REGEX = /^sips?:[^@\s:;]+@[^\s@;]+$/i;
const BARE_DESTINATION_REGEX = /^[A-Za-z0-9+*#._-]+$/;
const DTMF_REGEX = /^[0-9A-D*#]+$/;

/**
 * Expands a dialable destination into a SIP URI. Bare extensions and numbers
 * are qualified with the configured SIP domain.
 */
export function normalizeDestination(destination: string, sipDomain: string): string {
  const trimmed = destination.trim();
  if (trimmed === '') {
    throw new CallControlError('InvalidDestination', 'destination is required');
  }

  if (/^sips?:/i.test(trimmed)) {
    if (!SIP_URI_REGEX.test(trimmed)) {
      throw new CallControlError('InvalidDestination', `malformed sip uri: ${trimmed}`);
    }
    return trimmed;
  }

  if (!BARE_DESTINATION_REGEX.test(trimmed)) {
    throw new CallControlError('InvalidDestination', `malformed destination: ${trimmed}`);
  }

  return `sip:${trimmed}@${sipDomain}`;
}

export function assertDtmfDigits(digits: string): string {
  if (!DTMF_REGEX.test(digits)) {
    throw new CallControlError('InvalidDigits', 'digits must match [0-9A-D*#]+', { digits });
  }
  return digits;
}

/** User part of a SIP URI, or the whole value when it is not one. */
export function remoteUserPart(remoteUri: string): string {
  const withoutDisplay = remoteUri.replace(/^.*</, '').replace(/>.*$/, '');
  const withoutScheme = withoutDisplay.replace(/^sips?:/i, '');
  const atIndex = withoutScheme.indexOf('@');
  const user = atIndex >= 0 ? withoutScheme.slice(0, atIndex) : withoutScheme;
  return user.split(';')[0];
}
