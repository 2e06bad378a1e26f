import type { AuthMethod, EndpointSettings, SessionState } from './gateway';

export interface CreateAccountRequest {
  email_address: string;
  secret: string;
  auth_method?: AuthMethod;
  username?: string;
  imap?: EndpointSettings;
  smtp?: EndpointSettings;
}

export interface RotateSecretRequest {
  secret: string;
}

export interface AttachmentRequest {
  filename: string;
  content: string; // base64
  content_type?: string;
}

export interface SendMessageRequest {
  to: string[];
  cc?: string[];
  bcc?: string[];
  subject: string;
  text?: string;
  html?: string;
  reply_to?: string;
  in_reply_to?: string;
  references?: string[];
  attachments?: AttachmentRequest[];
}

// A pre-built RFC 5322 message; `from` is the envelope sender
export interface SendRawMessageRequest {
  to: string[];
  from?: string;
  raw: string;
}

export interface AccountResponse {
  email_address: string;
  username: string;
  auth_method: AuthMethod;
  provider: string;
  imap: EndpointSettings;
  smtp: EndpointSettings;
  state: SessionState;
}

export class RequestValidationError extends Error {
  constructor(public field: string, message: string) {
    super(message);
    this.name = 'RequestValidationError';
  }
}
