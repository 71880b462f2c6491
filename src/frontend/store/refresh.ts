import type { AttachmentChangedEvent, UpdateBroker, UpdateSource } from '../realtime/update-broker.js';

/**
 * Whether a widget showing `caseId` should re-fetch for `event`.
 * Events for other cases and the widget's own publications are ignored.
 */
export function shouldRefresh(event: AttachmentChangedEvent, caseId: string, self: UpdateSource): boolean {
  return event.case_id === caseId && event.source !== self;
}

/**
 * Publishes a change that has already been saved. A failing subscriber
 * is returned rather than thrown so callers do not report the save
 * itself as failed.
 */
export function publishChange(broker: UpdateBroker, event: AttachmentChangedEvent): unknown {
  try {
    broker.publish(event);
    return null;
  } catch (err: unknown) {
    return err;
  }
}
