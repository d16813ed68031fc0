import { ValidationError } from './errors.js';

export type PushFields = Readonly<Record<string, string>>;

/**
 * Map a decoded push document to its normalized type tag.
 *
 * A subscribe event that carries a scene `Ticket` came from scanning a QR code
 * and is reported as `scan_subscribe`; the periodic `LOCATION` event becomes
 * `user_location` so it cannot be confused with a `location` message.
 */
export function classifyPush(fields: PushFields): string {
  const msgType = fields.MsgType;
  if (!msgType) {
    throw new ValidationError('MsgType', 'Push payload has no MsgType.');
  }

  if (msgType !== 'event') {
    return msgType;
  }

  const event = fields.Event;
  if (!event) {
    throw new ValidationError('Event', 'Event push payload has no Event.');
  }

  if (event === 'subscribe' && fields.Ticket) {
    return 'scan_subscribe';
  }

  if (event === 'LOCATION') {
    return 'user_location';
  }

  return event.toLowerCase();
}
