// Public API barrel for the mailbox-query/resources subpath.

export { MessageAttributes, ImportanceLevel, MessageQuery, BulkMessageAction } from './messages.js';
export type { MessageItem, MessageContainer } from './messages.js';
export { MessageFolderAttributes, MessageFolderQuery, BulkMessageFolderAction } from './message-folders.js';
export type { MessageFolderItem } from './message-folders.js';
export { ContactAttributes, ContactQuery, BulkContactAction } from './contacts.js';
export type { ContactItem, ContactContainer } from './contacts.js';
export { ContactFolderAttributes, ContactFolderQuery, BulkContactFolderAction } from './contact-folders.js';
export type { ContactFolderItem } from './contact-folders.js';
export { EventAttributes, Sensitivity, FreeBusyStatus, EventQuery, BulkEventAction } from './events.js';
export type { EventItem, EventContainer } from './events.js';
export { FolderQuery } from './folders.js';
export type { FolderItem, FolderContainer } from './folders.js';
