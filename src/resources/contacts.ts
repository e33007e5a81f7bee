import { Attribute, NonFilterableAttribute } from '../query/attribute.js';
import { BulkAction, type BulkActionContext } from '../query/bulk.js';
import { Query } from '../query/query.js';
import type { FetchOptions, QueryContainer, QueryOptions } from '../types.js';

export const ContactAttributes = {
  Name: new Attribute('given_name'),
  Surname: new Attribute('surname'),
  DisplayName: new Attribute('display_name'),
  Company: new Attribute('company_name'),
  Department: new Attribute('department'),
  Created: new Attribute<Date>('created_date_time'),
  LastModified: new Attribute<Date>('last_modified_date_time'),
  HomeAddress: new Attribute('home_address'),
  JobTitle: new Attribute('job_title'),
  Manager: new Attribute('manager'),
  MiddleName: new Attribute('middle_name'),
  Mobile: new Attribute('mobile_phone1'),
  OfficeLocation: new Attribute('office_location'),
  Profession: new Attribute('profession'),
  EmailAddresses: new NonFilterableAttribute('email_addresses'),
} as const;

export interface ContactItem {
  readonly id: string;
  delete(): Promise<unknown>;
}

export interface ContactContainer<C extends ContactItem = ContactItem> extends QueryContainer {
  getContacts(options: FetchOptions): Promise<readonly C[]>;
}

export class BulkContactAction<C extends ContactItem = ContactItem> extends BulkAction<C> {
  delete(): BulkActionContext<C, []> {
    return this.context<[]>('delete', (contact) => contact.delete());
  }
}

export class ContactQuery<C extends ContactItem = ContactItem> extends Query<C> {
  protected override readonly kind = 'contacts';

  constructor(
    protected override readonly container: ContactContainer<C>,
    options: QueryOptions = {},
  ) {
    super(container, options);
  }

  override get bulk(): BulkContactAction<C> {
    return new BulkContactAction(this, this.options);
  }

  override async execute(): Promise<C[]> {
    return [...(await this.container.getContacts(this.fetchOptions()))];
  }
}
