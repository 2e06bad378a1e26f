import { simpleParser, AddressObject, ParsedMail } from 'mailparser';
import type Mail from 'nodemailer/lib/mailer';
import type { OutboundHandle, SessionHandle } from './account-session';
import { abortReason } from './backoff';
import { GatewayError, configurationError } from './gateway-errors';
import type { FetchedMessage, MailboxFolder, SearchCriterion } from './transports';
import type {
  AttachmentSummary,
  ComposedMessage,
  MailboxCursor,
  MessageBody,
  MessageQuery,
  MessageSummary,
  RawMessage,
  SendResult
} from '../types/gateway';

export interface MessageQueryInput {
  folder?: string;
  unseenOnly?: boolean;
  from?: string;
  since?: Date;
  before?: Date;
  subject?: string;
  maxResults?: number;
}

export interface QueryLimits {
  defaultMaxResults: number;
  maxResultsLimit: number;
}

export const DEFAULT_QUERY_LIMITS: QueryLimits = {
  defaultMaxResults: 50,
  maxResultsLimit: 500
};

export interface FetchBodyOptions {
  includeAttachmentContent?: boolean;
}

export interface NewMessages {
  cursor: MailboxCursor;
  messages: MessageSummary[];
}

const SYNTHETIC_ID = /^uid:(\d+):(\d+)$/;

function isValidDate(value: Date | undefined): boolean {
  return value === undefined || !Number.isNaN(value.getTime());
}

/**
 * Normalises and freezes a query. Rejects values no search could honour.
 */
export function createMessageQuery(input: MessageQueryInput, limits: QueryLimits = DEFAULT_QUERY_LIMITS): MessageQuery {
  const folder = (input.folder ?? 'INBOX').trim();
  if (folder.length === 0) {
    throw configurationError('Folder name must not be empty');
  }

  const maxResults = input.maxResults ?? limits.defaultMaxResults;
  if (!Number.isInteger(maxResults) || maxResults < 1 || maxResults > limits.maxResultsLimit) {
    throw configurationError(`maxResults must be an integer between 1 and ${limits.maxResultsLimit}`);
  }

  if (!isValidDate(input.since) || !isValidDate(input.before)) {
    throw configurationError('since and before must be valid dates');
  }

  if (input.since && input.before && input.since.getTime() > input.before.getTime()) {
    throw configurationError('since must not be later than before');
  }

  const from = input.from?.trim();
  const subject = input.subject?.trim();

  return Object.freeze({
    folder,
    unseenOnly: input.unseenOnly ?? false,
    ...(from ? { from } : {}),
    ...(input.since ? { since: new Date(input.since.getTime()) } : {}),
    ...(input.before ? { before: new Date(input.before.getTime()) } : {}),
    ...(subject ? { subject } : {}),
    maxResults
  });
}

/**
 * Every filter is ANDed; a query without filters matches the whole folder.
 */
export function buildSearchCriteria(query: MessageQuery): SearchCriterion[] {
  const criteria: SearchCriterion[] = [];

  if (query.unseenOnly) {
    criteria.push('UNSEEN');
  }
  if (query.from) {
    criteria.push(['FROM', query.from]);
  }
  if (query.since) {
    criteria.push(['SINCE', query.since]);
  }
  if (query.before) {
    criteria.push(['BEFORE', query.before]);
  }
  if (query.subject) {
    criteria.push(['SUBJECT', query.subject]);
  }

  return criteria.length > 0 ? criteria : ['ALL'];
}

export function syntheticMessageId(uidValidity: number, uid: number): string {
  return `uid:${uidValidity}:${uid}`;
}

function checkpoint(handle: SessionHandle): void {
  if (handle.signal?.aborted) {
    throw abortReason(handle.signal);
  }
}

function firstHeader(values?: string[]): string | null {
  return values && values.length > 0 ? values[0] : null;
}

function parseHeaderDate(value: string | null): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function toSummary(message: FetchedMessage, folder: string, uidValidity: number): MessageSummary {
  const { headers } = message;
  return {
    messageId: firstHeader(headers.messageId)?.trim() || syntheticMessageId(uidValidity, message.uid),
    uid: message.uid,
    folder,
    from: firstHeader(headers.from),
    to: headers.to ? [...headers.to] : [],
    cc: headers.cc ? [...headers.cc] : [],
    subject: firstHeader(headers.subject),
    date: parseHeaderDate(firstHeader(headers.date)) ?? message.date,
    flags: [...message.flags],
    seen: message.flags.includes('\\Seen'),
    size: message.size
  };
}

/**
 * Orders fetch results by the identifiers they were requested with,
 * dropping any the server no longer returned.
 */
function inRequestOrder(uids: number[], fetched: FetchedMessage[]): FetchedMessage[] {
  const byUid = new Map(fetched.map(message => [message.uid, message]));
  const ordered: FetchedMessage[] = [];
  for (const uid of uids) {
    const message = byUid.get(uid);
    if (message) {
      ordered.push(message);
    }
  }
  return ordered;
}

export async function listFolders(handle: SessionHandle): Promise<MailboxFolder[]> {
  checkpoint(handle);
  return handle.connection.listFolders();
}

/**
 * Summaries of the newest `maxResults` matches, in the order the server
 * reported them.
 */
export async function listMessages(handle: SessionHandle, query: MessageQuery): Promise<MessageSummary[]> {
  const { connection } = handle;

  checkpoint(handle);
  const status = await connection.selectFolder(query.folder);

  checkpoint(handle);
  const uids = await connection.search(buildSearchCriteria(query));
  if (uids.length === 0) {
    return [];
  }

  const selected = uids.length > query.maxResults ? uids.slice(-query.maxResults) : uids;

  checkpoint(handle);
  const fetched = await connection.fetch(selected, 'headers');

  return inRequestOrder(selected, fetched).map(message => toSummary(message, query.folder, status.uidValidity));
}

function addressTexts(value: AddressObject | AddressObject[] | undefined): string[] {
  if (!value) {
    return [];
  }
  return (Array.isArray(value) ? value : [value]).map(address => address.text);
}

function referenceList(value: string | string[] | undefined): string[] {
  if (!value) {
    return [];
  }
  return Array.isArray(value) ? value : value.split(/\s+/).filter(Boolean);
}

function toAttachments(parsed: ParsedMail, includeContent: boolean): AttachmentSummary[] {
  return parsed.attachments.map(attachment => ({
    filename: attachment.filename ?? null,
    contentType: attachment.contentType,
    size: attachment.size,
    contentId: attachment.contentId ?? null,
    ...(includeContent ? { content: attachment.content.toString('base64') } : {})
  }));
}

function messageNotFound(messageId: string, folder: string): GatewayError {
  return new GatewayError('not_found', `Message ${messageId} not found in ${folder}`, {
    code: 'MESSAGE_NOT_FOUND'
  });
}

/**
 * Full content of one message, located by Message-ID or by the synthetic
 * `uid:<uidvalidity>:<uid>` form handed out for messages without one.
 */
export async function fetchBody(
  handle: SessionHandle,
  folder: string,
  messageId: string,
  options: FetchBodyOptions = {}
): Promise<MessageBody> {
  const { connection } = handle;

  checkpoint(handle);
  const status = await connection.selectFolder(folder);

  let uid: number;
  const synthetic = SYNTHETIC_ID.exec(messageId);
  if (synthetic) {
    // UIDs from an earlier UIDVALIDITY epoch may now name other messages
    if (Number(synthetic[1]) !== status.uidValidity) {
      throw messageNotFound(messageId, folder);
    }
    uid = Number(synthetic[2]);
  } else {
    checkpoint(handle);
    const uids = await connection.search([['HEADER', 'MESSAGE-ID', messageId]]);
    if (uids.length === 0) {
      throw messageNotFound(messageId, folder);
    }
    uid = uids[uids.length - 1];
  }

  checkpoint(handle);
  const [message] = await connection.fetch([uid], 'full');
  if (!message || message.uid !== uid || message.body === undefined) {
    throw messageNotFound(messageId, folder);
  }

  const parsed = await simpleParser(message.body);
  const summary = toSummary(message, folder, status.uidValidity);

  return {
    ...summary,
    messageId: parsed.messageId?.trim() || summary.messageId,
    from: parsed.from?.text ?? summary.from,
    to: parsed.to ? addressTexts(parsed.to) : summary.to,
    cc: parsed.cc ? addressTexts(parsed.cc) : summary.cc,
    subject: parsed.subject ?? summary.subject,
    date: parsed.date ?? summary.date,
    text: parsed.text ?? null,
    html: parsed.html === false ? null : parsed.html,
    inReplyTo: parsed.inReplyTo ?? null,
    references: referenceList(parsed.references),
    attachments: toAttachments(parsed, options.includeAttachmentContent ?? false)
  };
}

/**
 * Messages that arrived after the cursor. Without a cursor, or after a
 * UIDVALIDITY change, the cursor restarts at the current end of the folder
 * and nothing is reported.
 */
export async function listSince(
  handle: SessionHandle,
  folder: string,
  cursor: MailboxCursor | null
): Promise<NewMessages> {
  const { connection } = handle;

  checkpoint(handle);
  const status = await connection.selectFolder(folder);

  if (!cursor || cursor.folder !== folder || cursor.uidValidity !== status.uidValidity) {
    return {
      cursor: { folder, uidValidity: status.uidValidity, lastUid: Math.max(0, status.uidNext - 1) },
      messages: []
    };
  }

  checkpoint(handle);
  // `n:*` always matches the highest UID, even when it is below n
  const uids = (await connection.search([['UID', `${cursor.lastUid + 1}:*`]]))
    .filter(uid => uid > cursor.lastUid);

  if (uids.length === 0) {
    return { cursor, messages: [] };
  }

  checkpoint(handle);
  const fetched = await connection.fetch(uids, 'headers');
  const messages = inRequestOrder(uids, fetched).map(message => toSummary(message, folder, status.uidValidity));

  return {
    cursor: { ...cursor, lastUid: Math.max(cursor.lastUid, ...uids) },
    messages
  };
}

export function buildMailOptions(from: string, message: ComposedMessage): Mail.Options {
  if (message.to.length === 0) {
    throw configurationError('At least one recipient is required');
  }
  if (!message.text && !message.html) {
    throw configurationError('Message needs a text or html body');
  }

  const options: Mail.Options = {
    from,
    to: message.to.join(', '),
    subject: message.subject
  };

  if (message.cc && message.cc.length > 0) {
    options.cc = message.cc.join(', ');
  }
  if (message.bcc && message.bcc.length > 0) {
    options.bcc = message.bcc.join(', ');
  }
  if (message.text) {
    options.text = message.text;
  }
  if (message.html) {
    options.html = message.html;
  }
  if (message.replyTo) {
    options.replyTo = message.replyTo;
  }
  if (message.inReplyTo) {
    options.inReplyTo = message.inReplyTo;
  }
  if (message.references && message.references.length > 0) {
    options.references = message.references;
  }
  if (message.attachments && message.attachments.length > 0) {
    options.attachments = message.attachments.map(attachment => ({
      filename: attachment.filename,
      content: attachment.content,
      encoding: 'base64',
      contentType: attachment.contentType
    }));
  }

  return options;
}

export function buildRawMailOptions(from: string, message: RawMessage): Mail.Options {
  if (message.to.length === 0) {
    throw configurationError('At least one recipient is required');
  }
  if (message.raw.trim().length === 0) {
    throw configurationError('Raw message is empty');
  }

  return {
    envelope: { from: message.from || from, to: message.to },
    raw: message.raw
  };
}

// Message-ID from the header block of a raw message, folded or not
export function rawMessageId(raw: string): string | undefined {
  const end = raw.search(/\r?\n\r?\n/);
  const head = end === -1 ? raw : raw.slice(0, end);
  return /^message-id:\s*(<[^>\r\n]+>)/im.exec(head)?.[1];
}

/**
 * Submits one message. Accepted for at least one recipient counts as sent;
 * final delivery is the server's business.
 */
export async function sendMessage(outbound: OutboundHandle, message: ComposedMessage): Promise<SendResult> {
  return submit(outbound, buildMailOptions(outbound.from, message));
}

/**
 * Submits a pre-built message to the given envelope. The message's own
 * Message-ID, when it has one, is reported back.
 */
export async function sendRawMessage(outbound: OutboundHandle, message: RawMessage): Promise<SendResult> {
  return submit(outbound, buildRawMailOptions(outbound.from, message), rawMessageId(message.raw));
}

async function submit(outbound: OutboundHandle, options: Mail.Options, knownMessageId?: string): Promise<SendResult> {
  if (outbound.signal?.aborted) {
    throw abortReason(outbound.signal);
  }

  const delivery = await outbound.transport.sendMail(options);

  if (delivery.accepted.length === 0) {
    throw new GatewayError('protocol', 'Mail server rejected every recipient', {
      email: outbound.email,
      code: 'RECIPIENTS_REJECTED',
      causeDescription: delivery.response
    });
  }

  const messageId = knownMessageId || delivery.messageId;
  if (!messageId) {
    throw new GatewayError('protocol', 'Mail server accepted the message without a message id', {
      email: outbound.email
    });
  }

  return {
    messageId,
    accepted: delivery.accepted,
    rejected: delivery.rejected,
    response: delivery.response
  };
}
