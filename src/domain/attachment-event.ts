/** Which widget (or remote session) caused an attachment change. */
export type UpdateSource = 'catalog-browser' | 'attachment-list' | 'remote';

/**
 * "Attachments changed for case X."
 *
 * Never persisted; lives only for the duration of delivery.
 */
export interface AttachmentChangedEvent {
  readonly case_id: string;
  readonly source: UpdateSource;
}
