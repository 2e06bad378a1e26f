export type TlsMode = 'tls' | 'starttls' | 'none';

export type AuthMethod = 'password' | 'oauth2';

export interface EndpointSettings {
  host: string;
  port: number;
  tls: TlsMode;
}

export interface ProviderProfile {
  provider: string;
  imap: EndpointSettings;
  smtp: EndpointSettings;
}

export interface AccountCredentials {
  email: string;
  secret: string;
  authMethod?: AuthMethod;
  username?: string; // defaults to the email address
  settings?: {
    imap?: EndpointSettings;
    smtp?: EndpointSettings;
  };
}

/**
 * Credentials joined with the connection parameters in force.
 * Lives inside the session pool only.
 */
export interface ResolvedAccount {
  email: string;
  username: string;
  secret: string;
  authMethod: AuthMethod;
  profile: ProviderProfile;
}

export type SessionState = 'disconnected' | 'connecting' | 'ready' | 'busy' | 'closed';

export interface MessageQuery {
  readonly folder: string;
  readonly unseenOnly: boolean;
  readonly from?: string;
  readonly since?: Date;
  readonly before?: Date;
  readonly subject?: string;
  readonly maxResults: number;
}

export interface MessageSummary {
  messageId: string;
  uid: number; // valid for the current session only
  folder: string;
  from: string | null;
  to: string[];
  cc: string[];
  subject: string | null;
  date: Date | null;
  flags: string[];
  seen: boolean;
  size: number | null;
}

export interface AttachmentSummary {
  filename: string | null;
  contentType: string;
  size: number;
  contentId: string | null;
  content?: string; // base64, only when requested
}

export interface MessageBody extends MessageSummary {
  text: string | null;
  html: string | null;
  inReplyTo: string | null;
  references: string[];
  attachments: AttachmentSummary[];
}

export interface AttachmentInput {
  filename: string;
  content: string; // base64
  contentType?: string;
}

export interface ComposedMessage {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  text?: string;
  html?: string;
  replyTo?: string;
  inReplyTo?: string;
  references?: string[];
  attachments?: AttachmentInput[];
}

/**
 * A message already in RFC 5322 form. It is submitted unchanged to the
 * envelope recipients, which need not match its headers.
 */
export interface RawMessage {
  from?: string; // envelope sender, defaults to the account address
  to: string[];
  raw: string;
}

export interface SendResult {
  messageId: string;
  accepted: string[];
  rejected: string[];
  response: string;
}

/**
 * Position of the mailbox monitor inside one folder. Only meaningful while
 * uidValidity is unchanged.
 */
export interface MailboxCursor {
  folder: string;
  uidValidity: number;
  lastUid: number;
}

export interface AccountInfo {
  email: string;
  username: string;
  authMethod: AuthMethod;
  provider: string;
  imap: EndpointSettings;
  smtp: EndpointSettings;
  state: SessionState;
}
