import {
  Attribute,
  BooleanAttribute,
  EnumerativeAttribute,
  NonFilterableAttribute,
} from '../query/attribute.js';
import { BulkAction, type BulkActionContext } from '../query/bulk.js';
import { Query } from '../query/query.js';
import type { FetchOptions, FolderRef, QueryContainer, QueryOptions } from '../types.js';

export const ImportanceLevel = {
  Normal: 'normal',
  Low: 'low',
  High: 'high',
} as const;

export const MessageAttributes = {
  From: new Attribute('from'),
  Sender: new Attribute('sender'),
  Subject: new Attribute('subject'),
  ReceivedOn: new Attribute<Date>('received_date_time'),
  LastModified: new Attribute<Date>('last_modified_date_time'),
  Categories: new Attribute('categories'),
  IsRead: new BooleanAttribute('is_read'),
  HasAttachments: new BooleanAttribute('has_attachments'),
  IsDraft: new BooleanAttribute('is_draft'),
  HasDeliveryReceipt: new BooleanAttribute('is_delivery_receipt_requested'),
  HasReadReceipt: new BooleanAttribute('is_read_receipt_requested'),
  Importance: new EnumerativeAttribute('importance', ImportanceLevel),
  Body: new NonFilterableAttribute('body'),
  Cc: new NonFilterableAttribute('cc_recipients'),
  Bcc: new NonFilterableAttribute('bcc_recipients'),
  To: new NonFilterableAttribute('to_recipients'),
} as const;

export interface MessageItem {
  readonly id: string;
  copy(folder: FolderRef): Promise<unknown>;
  move(folder: FolderRef): Promise<unknown>;
  delete(): Promise<unknown>;
  markAsRead(): Promise<unknown>;
  saveDraft(): Promise<unknown>;
}

export interface MessageContainer<M extends MessageItem = MessageItem> extends QueryContainer {
  getMessages(options: FetchOptions): Promise<readonly M[]>;
}

export class BulkMessageAction<M extends MessageItem = MessageItem> extends BulkAction<M> {
  copy(folder: FolderRef): BulkActionContext<M, [FolderRef]> {
    return this.context<[FolderRef]>('copy', (message, target) => message.copy(target), folder);
  }

  move(folder: FolderRef): BulkActionContext<M, [FolderRef]> {
    return this.context<[FolderRef]>('move', (message, target) => message.move(target), folder);
  }

  delete(): BulkActionContext<M, []> {
    return this.context<[]>('delete', (message) => message.delete());
  }

  markAsRead(): BulkActionContext<M, []> {
    return this.context<[]>('markAsRead', (message) => message.markAsRead());
  }

  saveDraft(): BulkActionContext<M, []> {
    return this.context<[]>('saveDraft', (message) => message.saveDraft());
  }
}

/** Query over the messages of one folder. */
export class MessageQuery<M extends MessageItem = MessageItem> extends Query<M> {
  protected override readonly kind = 'messages';

  constructor(
    protected override readonly container: MessageContainer<M>,
    options: QueryOptions = {},
  ) {
    super(container, options);
  }

  override get bulk(): BulkMessageAction<M> {
    return new BulkMessageAction(this, this.options);
  }

  override async execute(): Promise<M[]> {
    return [...(await this.container.getMessages(this.fetchOptions()))];
  }
}
