/**
 * Graph resource factories
 *
 * Each factory returns a plausible resource; pass overrides for the fields a test cares about.
 */

import type {
  GraphAttachment,
  GraphEvent,
  GraphMailFolder,
  GraphMessage,
  GraphUser,
} from '@outlook-connector/integrations';

let sequence = 0;

function nextId(prefix: string): string {
  sequence += 1;
  return `${prefix}-${sequence}`;
}

export function createGraphMessage(overrides: Partial<GraphMessage> = {}): GraphMessage {
  return {
    id: nextId('msg'),
    subject: 'Project sync notes',
    from: { emailAddress: { name: 'Dana Reyes', address: 'dana@example.com' } },
    receivedDateTime: '2025-08-14T08:30:00Z',
    isRead: false,
    bodyPreview: 'Notes from the weekly sync are attached.',
    ...overrides,
  };
}

export function createGraphEvent(overrides: Partial<GraphEvent> = {}): GraphEvent {
  return {
    id: nextId('evt'),
    subject: 'Design review',
    start: { dateTime: '2025-08-14T09:00:00.0000000', timeZone: 'UTC' },
    end: { dateTime: '2025-08-14T10:30:00.0000000', timeZone: 'UTC' },
    location: { displayName: 'Room 4B' },
    attendees: [],
    ...overrides,
  };
}

export function createGraphUser(overrides: Partial<GraphUser> = {}): GraphUser {
  return {
    id: nextId('user'),
    displayName: 'Sam Example',
    mail: 'sam@example.com',
    userPrincipalName: 'sam@example.onmicrosoft.com',
    jobTitle: 'Engineer',
    officeLocation: 'Building 2',
    businessPhones: ['+1 555 0100'],
    ...overrides,
  };
}

export function createGraphMailFolder(overrides: Partial<GraphMailFolder> = {}): GraphMailFolder {
  return {
    id: nextId('folder'),
    displayName: 'Inbox',
    childFolderCount: 0,
    unreadItemCount: 3,
    totalItemCount: 42,
    ...overrides,
  };
}

export function createFileAttachment(
  content: string,
  overrides: Partial<GraphAttachment> = {}
): GraphAttachment {
  return {
    '@odata.type': '#microsoft.graph.fileAttachment',
    id: nextId('att'),
    name: 'notes.txt',
    contentType: 'text/plain',
    size: Buffer.byteLength(content),
    isInline: false,
    contentBytes: Buffer.from(content).toString('base64'),
    ...overrides,
  };
}
