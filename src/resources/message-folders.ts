import { Attribute, NonFilterableAttribute } from '../query/attribute.js';
import { BulkAction, type BulkActionContext } from '../query/bulk.js';
import type { FolderRef } from '../types.js';
import { FolderQuery, type FolderItem } from './folders.js';

export const MessageFolderAttributes = {
  ChildFolderCount: new Attribute<number>('child_folder_count'),
  TotalItemCount: new Attribute<number>('total_item_count'),
  UnreadItemCount: new Attribute<number>('unread_item_count'),
  Name: new Attribute('display_name'),
  ChildFolders: new NonFilterableAttribute('child_folders'),
  Messages: new NonFilterableAttribute('messages'),
} as const;

export interface MessageFolderItem extends FolderItem {
  moveFolder(target: FolderRef): Promise<unknown>;
  copyFolder(target: FolderRef): Promise<unknown>;
  delete(): Promise<unknown>;
}

export class BulkMessageFolderAction<F extends MessageFolderItem = MessageFolderItem> extends BulkAction<F> {
  move(folder: FolderRef): BulkActionContext<F, [FolderRef]> {
    return this.context<[FolderRef]>('move', (item, target) => item.moveFolder(target), folder);
  }

  delete(): BulkActionContext<F, []> {
    return this.context<[]>('delete', (item) => item.delete());
  }

  copy(folder: FolderRef): BulkActionContext<F, [FolderRef]> {
    return this.context<[FolderRef]>('copy', (item, target) => item.copyFolder(target), folder);
  }
}

export class MessageFolderQuery<F extends MessageFolderItem = MessageFolderItem> extends FolderQuery<F> {
  protected override readonly kind = 'messageFolders';

  override get bulk(): BulkMessageFolderAction<F> {
    return new BulkMessageFolderAction(this, this.options);
  }
}
