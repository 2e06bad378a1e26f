import type Mail from 'nodemailer/lib/mailer';
import type { ResolvedAccount } from '../types/gateway';

/**
 * One search key in `imap` notation: a bare keyword ('UNSEEN') or a keyword
 * with its arguments (['FROM', 'a@b.c'], ['HEADER', 'MESSAGE-ID', '<id>']).
 */
export type SearchCriterion = string | Array<string | number | Date>;

export interface MailboxStatus {
  name: string;
  uidValidity: number;
  uidNext: number;
  total: number;
}

export interface FetchedHeaders {
  from?: string[];
  to?: string[];
  cc?: string[];
  subject?: string[];
  date?: string[];
  messageId?: string[];
}

export interface FetchedMessage {
  uid: number;
  flags: string[];
  date: Date | null;
  size: number | null;
  headers: FetchedHeaders;
  body?: Buffer; // full RFC 5322 source when fetched with 'full'
}

export type FetchPart = 'headers' | 'full';

export interface MailboxFolder {
  name: string;
  delimiter: string;
  flags: string[];
  children?: MailboxFolder[];
}

/**
 * The stateful IMAP connection owned by one account session.
 */
export interface ImapTransport {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  isConnected(): boolean;
  listFolders(): Promise<MailboxFolder[]>;
  selectFolder(folder: string): Promise<MailboxStatus>;
  search(criteria: SearchCriterion[]): Promise<number[]>;
  fetch(uids: number[], part: FetchPart): Promise<FetchedMessage[]>;
  on(event: 'close', listener: (hadError: boolean) => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
  removeAllListeners(event?: string | symbol): this;
}

export interface OutboundDelivery {
  messageId: string;
  accepted: string[];
  rejected: string[];
  response: string;
}

/**
 * A short-lived SMTP connection: opened for one send, closed on release.
 */
export interface OutboundTransport {
  sendMail(options: Mail.Options): Promise<OutboundDelivery>;
  close(): void;
}

export type ImapTransportFactory = (account: ResolvedAccount) => ImapTransport;

export type OutboundTransportFactory = (account: ResolvedAccount) => OutboundTransport;
