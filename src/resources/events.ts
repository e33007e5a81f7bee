import {
  Attribute,
  BooleanAttribute,
  EnumerativeAttribute,
  NonFilterableAttribute,
} from '../query/attribute.js';
import { BulkAction, type BulkActionContext } from '../query/bulk.js';
import { Query } from '../query/query.js';
import type { FetchOptions, QueryContainer, QueryOptions } from '../types.js';
import { ImportanceLevel } from './messages.js';

export const Sensitivity = {
  Normal: 'normal',
  Personal: 'personal',
  Private: 'private',
  Confidential: 'confidential',
} as const;

export const FreeBusyStatus = {
  Free: 'free',
  Tentative: 'tentative',
  Busy: 'busy',
  Oof: 'oof',
  WorkingElsewhere: 'workingElsewhere',
  Unknown: 'unknown',
} as const;

export const EventAttributes = {
  Subject: new Attribute('subject'),
  Created: new Attribute<Date>('created_date_time'),
  LastModified: new Attribute<Date>('last_modified_date_time'),
  IsAllDay: new BooleanAttribute('is_all_day'),
  IsCancelled: new BooleanAttribute('is_cancelled'),
  IsOnlineMeeting: new BooleanAttribute('is_online_meeting'),
  Importance: new EnumerativeAttribute('importance', ImportanceLevel),
  Sensitivity: new EnumerativeAttribute('sensitivity', Sensitivity),
  ShowAs: new EnumerativeAttribute('show_as', FreeBusyStatus),
  Body: new NonFilterableAttribute('body'),
  Attendees: new NonFilterableAttribute('attendees'),
  Location: new NonFilterableAttribute('location'),
} as const;

export interface EventItem {
  readonly id: string;
  delete(): Promise<unknown>;
}

export interface EventContainer<E extends EventItem = EventItem> extends QueryContainer {
  getEvents(options: FetchOptions): Promise<readonly E[]>;
}

export class BulkEventAction<E extends EventItem = EventItem> extends BulkAction<E> {
  delete(): BulkActionContext<E, []> {
    return this.context<[]>('delete', (event) => event.delete());
  }
}

/** Query over the events of one calendar. */
export class EventQuery<E extends EventItem = EventItem> extends Query<E> {
  protected override readonly kind = 'events';

  constructor(
    protected override readonly container: EventContainer<E>,
    options: QueryOptions = {},
  ) {
    super(container, options);
  }

  override get bulk(): BulkEventAction<E> {
    return new BulkEventAction(this, this.options);
  }

  override async execute(): Promise<E[]> {
    return [...(await this.container.getEvents(this.fetchOptions()))];
  }
}
