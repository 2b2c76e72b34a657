/**
 * Microsoft Graph resource views
 *
 * Graph omits or nulls fields freely, so every field is optional and unknown fields pass
 * through untouched. Consumers substitute their own placeholders for missing values.
 */

import { z } from 'zod';

export const EmailAddressSchema = z
  .object({
    name: z.string().nullish(),
    address: z.string().nullish(),
  })
  .passthrough();

export const RecipientSchema = z
  .object({
    emailAddress: EmailAddressSchema.nullish(),
  })
  .passthrough();

export const DateTimeTimeZoneSchema = z
  .object({
    dateTime: z.string().nullish(),
    timeZone: z.string().nullish(),
  })
  .passthrough();

export const GraphMessageSchema = z
  .object({
    id: z.string().nullish(),
    subject: z.string().nullish(),
    from: RecipientSchema.nullish(),
    toRecipients: z.array(RecipientSchema).nullish(),
    receivedDateTime: z.string().nullish(),
    isRead: z.boolean().nullish(),
    bodyPreview: z.string().nullish(),
    hasAttachments: z.boolean().nullish(),
    importance: z.string().nullish(),
    flag: z.object({ flagStatus: z.string().nullish() }).passthrough().nullish(),
    body: z
      .object({ contentType: z.string().nullish(), content: z.string().nullish() })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export type GraphMessage = z.infer<typeof GraphMessageSchema>;

export const AttendeeSchema = z
  .object({
    emailAddress: EmailAddressSchema.nullish(),
    type: z.string().nullish(),
  })
  .passthrough();

export const GraphEventSchema = z
  .object({
    id: z.string().nullish(),
    subject: z.string().nullish(),
    start: DateTimeTimeZoneSchema.nullish(),
    end: DateTimeTimeZoneSchema.nullish(),
    location: z.object({ displayName: z.string().nullish() }).passthrough().nullish(),
    attendees: z.array(AttendeeSchema).nullish(),
    bodyPreview: z.string().nullish(),
    isAllDay: z.boolean().nullish(),
    webLink: z.string().nullish(),
  })
  .passthrough();

export type GraphEvent = z.infer<typeof GraphEventSchema>;

export const GraphUserSchema = z
  .object({
    id: z.string().nullish(),
    displayName: z.string().nullish(),
    mail: z.string().nullish(),
    userPrincipalName: z.string().nullish(),
    jobTitle: z.string().nullish(),
    officeLocation: z.string().nullish(),
    businessPhones: z.array(z.string()).nullish(),
  })
  .passthrough();

export type GraphUser = z.infer<typeof GraphUserSchema>;

export const GraphMailFolderSchema = z
  .object({
    id: z.string().nullish(),
    displayName: z.string().nullish(),
    parentFolderId: z.string().nullish(),
    childFolderCount: z.number().nullish(),
    unreadItemCount: z.number().nullish(),
    totalItemCount: z.number().nullish(),
  })
  .passthrough();

export type GraphMailFolder = z.infer<typeof GraphMailFolderSchema>;

export const FILE_ATTACHMENT_TYPE = '#microsoft.graph.fileAttachment';

export const GraphAttachmentSchema = z
  .object({
    '@odata.type': z.string().nullish(),
    id: z.string().nullish(),
    name: z.string().nullish(),
    contentType: z.string().nullish(),
    size: z.number().nullish(),
    isInline: z.boolean().nullish(),
    contentBytes: z.string().nullish(),
  })
  .passthrough();

export type GraphAttachment = z.infer<typeof GraphAttachmentSchema>;

export const GraphMessageRuleSchema = z
  .object({
    id: z.string().nullish(),
    displayName: z.string().nullish(),
    sequence: z.number().nullish(),
    isEnabled: z.boolean().nullish(),
    conditions: z.record(z.unknown()).nullish(),
    actions: z.record(z.unknown()).nullish(),
  })
  .passthrough();

export type GraphMessageRule = z.infer<typeof GraphMessageRuleSchema>;

/**
 * Graph wraps every list response in `{ value: [...] }`
 */
export const GraphCollectionSchema = z
  .object({ value: z.array(z.unknown()).default([]) })
  .passthrough();

/**
 * Persisted bearer credential
 */
export interface Credential {
  accessToken: string;
  /** Informational only; never compared against the clock */
  expiry?: Date;
}

export type CredentialLoadResult =
  | { found: true; credential: Credential }
  | { found: false; reason: string };

export type HttpMethod = 'GET' | 'POST' | 'PATCH' | 'PUT' | 'DELETE';

export type QueryParams = Record<string, string | number | undefined>;

export interface CallOptions {
  params?: QueryParams;
  body?: unknown;
  headers?: Record<string, string>;
}

export interface ListMessagesOptions {
  folderId?: string;
  top?: number;
  skip?: number;
  search?: string;
  filter?: string;
  select?: string[];
  orderBy?: string;
}

export interface ListEventsOptions {
  /** Lower bound on `start/dateTime`, ISO-8601 */
  start?: string;
  /** Upper bound on `end/dateTime`, ISO-8601 */
  end?: string;
  top?: number;
}

export interface CreateEventInput {
  subject: string;
  /** Wall-clock time in `timeZone`, `YYYY-MM-DDTHH:mm:ss` */
  start: string;
  end: string;
  timeZone?: string;
  body?: string;
  location?: string;
  attendees?: string[];
}

export type FlagStatus = 'notFlagged' | 'flagged' | 'complete';

export interface DownloadedAttachment {
  name: string;
  contentType: string;
  size: number;
  content: Buffer;
}

/**
 * Result of one item in a sequential bulk operation
 */
export type BulkOutcome<T> =
  | { id: string; success: true; result: T }
  | { id: string; success: false; error: string };
