import { Attribute, NonFilterableAttribute } from '../query/attribute.js';
import { BulkAction, type BulkActionContext } from '../query/bulk.js';
import type { FolderRef } from '../types.js';
import { FolderQuery, type FolderItem } from './folders.js';

export const ContactFolderAttributes = {
  Name: new Attribute('display_name'),
  Contacts: new NonFilterableAttribute('contacts'),
  ChildFolders: new NonFilterableAttribute('child_folders'),
} as const;

export interface ContactFolderItem extends FolderItem {
  moveFolder(target: FolderRef): Promise<unknown>;
  delete(): Promise<unknown>;
}

export class BulkContactFolderAction<F extends ContactFolderItem = ContactFolderItem> extends BulkAction<F> {
  move(folder: FolderRef): BulkActionContext<F, [FolderRef]> {
    return this.context<[FolderRef]>('move', (item, target) => item.moveFolder(target), folder);
  }

  delete(): BulkActionContext<F, []> {
    return this.context<[]>('delete', (item) => item.delete());
  }
}

export class ContactFolderQuery<F extends ContactFolderItem = ContactFolderItem> extends FolderQuery<F> {
  protected override readonly kind = 'contactFolders';

  override get bulk(): BulkContactFolderAction<F> {
    return new BulkContactFolderAction(this, this.options);
  }
}
