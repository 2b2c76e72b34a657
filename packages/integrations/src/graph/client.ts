/**
 * Microsoft Graph Client
 *
 * Authenticated REST access to the signed-in user's mailbox, calendar and profile.
 * A client is bound to one credential for its whole life; there are no retries.
 */

import { z } from 'zod';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc.js';
import {
  AuthExpiredError,
  RemoteCallFailedError,
  RemoteTimeoutError,
  UnsupportedResourceError,
  createServiceLogger,
  DEFAULT_GRAPH_BASE_URL,
} from '@outlook-connector/core';
import {
  FILE_ATTACHMENT_TYPE,
  GraphAttachmentSchema,
  GraphEventSchema,
  GraphMailFolderSchema,
  GraphMessageRuleSchema,
  GraphMessageSchema,
  GraphUserSchema,
  GraphCollectionSchema,
  type BulkOutcome,
  type CallOptions,
  type CreateEventInput,
  type Credential,
  type DownloadedAttachment,
  type FlagStatus,
  type GraphAttachment,
  type GraphEvent,
  type GraphMailFolder,
  type GraphMessage,
  type GraphMessageRule,
  type GraphUser,
  type HttpMethod,
  type ListEventsOptions,
  type ListMessagesOptions,
  type QueryParams,
} from './types.js';

dayjs.extend(utc);

const logger = createServiceLogger('graph-client');

const SUCCESS_STATUSES = new Set([200, 201, 202, 204]);

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface GraphClientOptions {
  credential: Credential;
  baseUrl?: string;
  timeoutMs?: number;
  /** IANA zone for calendar reads and for created events */
  timezone?: string;
}

// =============================================================================
// Query construction
// =============================================================================

function sortedParams(params: QueryParams): Record<string, string> {
  const result: Record<string, string> = {};
  for (const key of Object.keys(params).sort()) {
    const value = params[key];
    if (value !== undefined) {
      result[key] = String(value);
    }
  }
  return result;
}

/**
 * OData query for a message listing. Keys come back sorted.
 */
export function buildMessageQuery(options: ListMessagesOptions = {}): Record<string, string> {
  const { top = 50, skip, search, filter, select, orderBy } = options;
  return sortedParams({
    $top: top,
    $orderby: orderBy || 'receivedDateTime desc',
    $skip: skip && skip > 0 ? skip : undefined,
    $search: search ? `"${search}"` : undefined,
    $filter: filter || undefined,
    $select: select && select.length > 0 ? select.join(',') : undefined,
  });
}

/**
 * OData query for an event listing bounded by start and/or end. Keys come back sorted.
 */
export function buildEventQuery(options: ListEventsOptions = {}): Record<string, string> {
  const { start, end, top = 50 } = options;
  const bounds: string[] = [];
  if (start) bounds.push(`start/dateTime ge '${start}'`);
  if (end) bounds.push(`end/dateTime le '${end}'`);

  return sortedParams({
    $top: top,
    $orderby: 'start/dateTime',
    $filter: bounds.length > 0 ? bounds.join(' and ') : undefined,
  });
}

/**
 * Serialize query params with keys in sorted order
 */
export function serializeQuery(params: QueryParams): string {
  return new URLSearchParams(sortedParams(params)).toString();
}

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

// =============================================================================
// Client
// =============================================================================

export class GraphClient {
  private readonly credential: Credential;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly timezone?: string;

  constructor(options: GraphClientOptions) {
    this.credential = options.credential;
    this.baseUrl = (options.baseUrl || DEFAULT_GRAPH_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.timezone = options.timezone;
  }

  /**
   * Make an authenticated request. Resolves to the parsed JSON body, or null for an
   * empty body.
   */
  async call(method: HttpMethod, endpoint: string, options: CallOptions = {}): Promise<unknown> {
    const query = options.params ? serializeQuery(options.params) : '';
    const url = `${this.baseUrl}${endpoint}${query ? `?${query}` : ''}`;

    logger.debug('Graph request', { method, endpoint, params: options.params });

    // The timeout covers reading the body as well as receiving the headers
    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          ...options.headers,
          Authorization: `Bearer ${this.credential.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      text = await response.text();
    } catch (error) {
      if (isTimeoutError(error)) {
        logger.warn('Graph request timed out', { method, endpoint, timeoutMs: this.timeoutMs });
        throw new RemoteTimeoutError(method, endpoint, this.timeoutMs);
      }
      throw error;
    }

    if (!SUCCESS_STATUSES.has(response.status)) {
      logger.error('Graph API error', { status: response.status, method, endpoint });
      if (response.status === 401) {
        throw new AuthExpiredError(text);
      }
      throw new RemoteCallFailedError(response.status, text);
    }

    if (response.status === 204 || !text) {
      return null;
    }

    return JSON.parse(text);
  }

  /**
   * Request and validate the response against a resource schema
   */
  private async callAs<S extends z.ZodTypeAny>(
    schema: S,
    method: HttpMethod,
    endpoint: string,
    options: CallOptions = {}
  ): Promise<z.output<S>> {
    const json = await this.call(method, endpoint, options);
    return this.validate(schema, json ?? {}, method, endpoint);
  }

  private async list<S extends z.ZodTypeAny>(
    item: S,
    endpoint: string,
    options: CallOptions = {}
  ): Promise<z.output<S>[]> {
    const page = await this.callAs(GraphCollectionSchema, 'GET', endpoint, options);
    return page.value.map((entry) => this.validate(item, entry, 'GET', endpoint));
  }

  private validate<S extends z.ZodTypeAny>(
    schema: S,
    json: unknown,
    method: HttpMethod,
    endpoint: string
  ): z.output<S> {
    const parsed = schema.safeParse(json);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new RemoteCallFailedError(
        200,
        JSON.stringify(json),
        'REMOTE_CALL_FAILED',
        `Unexpected response from ${method} ${endpoint}: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid shape'}`
      );
    }
    return parsed.data;
  }

  // ---------------------------------------------------------------------------
  // Messages
  // ---------------------------------------------------------------------------

  async listMessages(options: ListMessagesOptions = {}): Promise<GraphMessage[]> {
    const folderId = options.folderId || 'inbox';
    return this.list(GraphMessageSchema, `/me/mailFolders/${encodeURIComponent(folderId)}/messages`, {
      params: buildMessageQuery(options),
    });
  }

  /**
   * Full-text search over the inbox
   */
  async searchMessages(query: string, top = 25): Promise<GraphMessage[]> {
    return this.listMessages({ folderId: 'inbox', search: query, top });
  }

  async getMessage(messageId: string, select?: string[]): Promise<GraphMessage> {
    return this.callAs(GraphMessageSchema, 'GET', `/me/messages/${encodeURIComponent(messageId)}`, {
      params: select && select.length > 0 ? { $select: select.join(',') } : undefined,
    });
  }

  async getRecentMessages(hours = 24, folderId = 'inbox'): Promise<GraphMessage[]> {
    const cutoff = dayjs.utc().subtract(hours, 'hour').format('YYYY-MM-DDTHH:mm:ss[Z]');
    return this.listMessages({ folderId, filter: `receivedDateTime ge ${cutoff}` });
  }

  async markAsRead(messageId: string): Promise<GraphMessage> {
    return this.patchMessage(messageId, { isRead: true });
  }

  async markAsUnread(messageId: string): Promise<GraphMessage> {
    return this.patchMessage(messageId, { isRead: false });
  }

  async flagMessage(messageId: string, flagStatus: FlagStatus = 'flagged'): Promise<GraphMessage> {
    return this.patchMessage(messageId, { flag: { flagStatus } });
  }

  private async patchMessage(messageId: string, body: Record<string, unknown>): Promise<GraphMessage> {
    return this.callAs(GraphMessageSchema, 'PATCH', `/me/messages/${encodeURIComponent(messageId)}`, {
      body,
    });
  }

  async moveMessage(messageId: string, destinationId: string): Promise<GraphMessage> {
    return this.callAs(
      GraphMessageSchema,
      'POST',
      `/me/messages/${encodeURIComponent(messageId)}/move`,
      { body: { destinationId } }
    );
  }

  async copyMessage(messageId: string, destinationId: string): Promise<GraphMessage> {
    return this.callAs(
      GraphMessageSchema,
      'POST',
      `/me/messages/${encodeURIComponent(messageId)}/copy`,
      { body: { destinationId } }
    );
  }

  async deleteMessage(messageId: string): Promise<void> {
    await this.call('DELETE', `/me/messages/${encodeURIComponent(messageId)}`);
  }

  /**
   * Mark each message read in turn. A failed item is recorded and the fold continues.
   */
  async bulkMarkRead(messageIds: string[]): Promise<BulkOutcome<GraphMessage>[]> {
    const op = logger.startOperation('bulkMarkRead', { count: messageIds.length });
    const outcomes: BulkOutcome<GraphMessage>[] = [];

    for (const id of messageIds) {
      try {
        const result = await this.markAsRead(id);
        outcomes.push({ id, success: true, result });
      } catch (error) {
        outcomes.push({
          id,
          success: false,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const failed = outcomes.filter((outcome) => !outcome.success).length;
    op.success('Bulk mark-read finished', { succeeded: outcomes.length - failed, failed });
    return outcomes;
  }

  // ---------------------------------------------------------------------------
  // Attachments
  // ---------------------------------------------------------------------------

  async listAttachments(messageId: string): Promise<GraphAttachment[]> {
    return this.list(
      GraphAttachmentSchema,
      `/me/messages/${encodeURIComponent(messageId)}/attachments`
    );
  }

  /**
   * Fetch and decode a file attachment. Item and reference attachments carry no bytes.
   */
  async downloadAttachment(messageId: string, attachmentId: string): Promise<DownloadedAttachment> {
    const attachment = await this.callAs(
      GraphAttachmentSchema,
      'GET',
      `/me/messages/${encodeURIComponent(messageId)}/attachments/${encodeURIComponent(attachmentId)}`
    );

    const kind = attachment['@odata.type'] ?? undefined;
    if (kind !== FILE_ATTACHMENT_TYPE || typeof attachment.contentBytes !== 'string') {
      throw new UnsupportedResourceError('attachment', kind);
    }

    const content = Buffer.from(attachment.contentBytes, 'base64');
    return {
      name: attachment.name || attachmentId,
      contentType: attachment.contentType || 'application/octet-stream',
      size: content.length,
      content,
    };
  }

  // ---------------------------------------------------------------------------
  // Folders and rules
  // ---------------------------------------------------------------------------

  async listMailFolders(): Promise<GraphMailFolder[]> {
    return this.list(GraphMailFolderSchema, '/me/mailFolders');
  }

  async createMailFolder(displayName: string, parentFolderId?: string): Promise<GraphMailFolder> {
    const endpoint = parentFolderId
      ? `/me/mailFolders/${encodeURIComponent(parentFolderId)}/childFolders`
      : '/me/mailFolders';
    return this.callAs(GraphMailFolderSchema, 'POST', endpoint, { body: { displayName } });
  }

  async getUnreadCount(folderId = 'inbox'): Promise<number> {
    const folder = await this.callAs(
      GraphMailFolderSchema,
      'GET',
      `/me/mailFolders/${encodeURIComponent(folderId)}`
    );
    return folder.unreadItemCount ?? 0;
  }

  async listMessageRules(): Promise<GraphMessageRule[]> {
    return this.list(GraphMessageRuleSchema, '/me/mailFolders/inbox/messageRules');
  }

  async createMessageRule(
    displayName: string,
    conditions: Record<string, unknown>,
    actions: Record<string, unknown>,
    enabled = true
  ): Promise<GraphMessageRule> {
    return this.callAs(GraphMessageRuleSchema, 'POST', '/me/mailFolders/inbox/messageRules', {
      body: { displayName, sequence: 1, isEnabled: enabled, conditions, actions },
    });
  }

  // ---------------------------------------------------------------------------
  // Calendar
  // ---------------------------------------------------------------------------

  async listEvents(options: ListEventsOptions = {}): Promise<GraphEvent[]> {
    return this.list(GraphEventSchema, '/me/events', {
      params: buildEventQuery(options),
      headers: this.timezone ? { Prefer: `outlook.timezone="${this.timezone}"` } : undefined,
    });
  }

  async createEvent(input: CreateEventInput): Promise<GraphEvent> {
    const timeZone = input.timeZone || this.timezone || 'UTC';
    const event: Record<string, unknown> = {
      subject: input.subject,
      start: { dateTime: input.start, timeZone },
      end: { dateTime: input.end, timeZone },
    };

    if (input.body) {
      event.body = { contentType: 'text', content: input.body };
    }
    if (input.location) {
      event.location = { displayName: input.location };
    }
    if (input.attendees && input.attendees.length > 0) {
      event.attendees = input.attendees.map((address) => ({
        emailAddress: { address, name: address.split('@')[0] },
        type: 'required',
      }));
    }

    return this.callAs(GraphEventSchema, 'POST', '/me/events', { body: event });
  }

  // ---------------------------------------------------------------------------
  // Profile
  // ---------------------------------------------------------------------------

  async getCurrentUser(): Promise<GraphUser> {
    return this.callAs(GraphUserSchema, 'GET', '/me');
  }
}
