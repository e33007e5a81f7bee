import { Query } from '../query/query.js';
import type { FetchOptions, FolderRef, OfficeHandle, QueryContainer, QueryOptions } from '../types.js';

/** A folder result; carries a back-reference to the account once fetched. */
export interface FolderItem extends FolderRef {
  office: OfficeHandle | null;
}

export interface FolderContainer<F extends FolderItem> extends QueryContainer {
  readonly office: OfficeHandle;
  getFolders(options: FetchOptions): Promise<readonly F[]>;
  getFolder(name: string): Promise<F | null>;
}

/** Query over the child folders of a container. Every returned folder is tagged with the container's office. */
export abstract class FolderQuery<F extends FolderItem> extends Query<F> {
  constructor(
    protected override readonly container: FolderContainer<F>,
    options: QueryOptions = {},
  ) {
    super(container, options);
  }

  /** One child folder by display name, or null. */
  async get(name: string): Promise<F | null> {
    const folder = await this.container.getFolder(name);
    if (folder !== null) {
      folder.office = this.container.office;
    }
    return folder;
  }

  override async execute(): Promise<F[]> {
    const folders = [...(await this.container.getFolders(this.fetchOptions()))];
    for (const folder of folders) {
      folder.office = this.container.office;
    }
    return folders;
  }
}
