/* ------------------------------------------------------------------ */
/*  UpdateBroker: in-page pub/sub for attachment changes               */
/*                                                                     */
/*  One broker per page, created by UpdateBrokerProvider and closed    */
/*  when the page unmounts. Delivery is synchronous and in             */
/*  subscription order; nothing is buffered for late subscribers.      */
/*  Subscribers filter by case_id themselves.                          */
/* ------------------------------------------------------------------ */

export type UpdateSource = 'catalog-browser' | 'attachment-list' | 'remote';

export interface AttachmentChangedEvent {
  readonly case_id: string;
  readonly source: UpdateSource;
}

export type UpdateHandler = (event: AttachmentChangedEvent) => void;

export interface Subscription {
  /** Stops delivery to this handler. Safe to call more than once. */
  release(): void;
}

interface Entry {
  handler: UpdateHandler;
  active: boolean;
}

export class UpdateBroker {
  private entries: Entry[] = [];

  get subscriberCount(): number {
    return this.entries.length;
  }

  subscribe(handler: UpdateHandler): Subscription {
    const entry: Entry = { handler, active: true };
    this.entries.push(entry);
    return {
      release: () => {
        if (!entry.active) return;
        entry.active = false;
        this.entries = this.entries.filter((e) => e !== entry);
      },
    };
  }

  /**
   * Delivers `event` to every handler subscribed when the call starts.
   *
   * A handler released mid-delivery is skipped. A throwing handler does
   * not stop the others; its error is rethrown once all have run.
   */
  publish(event: AttachmentChangedEvent): void {
    const snapshot = [...this.entries];
    const errors: unknown[] = [];

    for (const entry of snapshot) {
      if (!entry.active) continue;
      try {
        entry.handler(event);
      } catch (err: unknown) {
        errors.push(err);
      }
    }

    if (errors.length === 1) throw errors[0];
    if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} update handlers failed`);
    }
  }

  /** Releases every subscription. The broker can be subscribed to again. */
  close(): void {
    for (const entry of this.entries) entry.active = false;
    this.entries = [];
  }
}
