import express, { Router } from 'express';
import { withGatewayJson } from '../lib/http/gateway-http';
import type { MailGateway } from '../lib/mail-gateway';
import {
  parseMessageQuery,
  validateMessageQuery,
  validateSendMessage,
  validateSendRawMessage
} from '../middleware/validation';
import type { SendMessageRequest, SendRawMessageRequest } from '../types/api';
import type { ComposedMessage } from '../types/gateway';

export interface MessageRouteDeps {
  gateway: MailGateway;
}

function toComposedMessage(body: SendMessageRequest): ComposedMessage {
  return {
    to: body.to,
    subject: body.subject,
    ...(body.cc ? { cc: body.cc } : {}),
    ...(body.bcc ? { bcc: body.bcc } : {}),
    ...(body.text ? { text: body.text } : {}),
    ...(body.html ? { html: body.html } : {}),
    ...(body.reply_to ? { replyTo: body.reply_to } : {}),
    ...(body.in_reply_to ? { inReplyTo: body.in_reply_to } : {}),
    ...(body.references ? { references: body.references } : {}),
    ...(body.attachments
      ? {
          attachments: body.attachments.map(attachment => ({
            filename: attachment.filename,
            content: attachment.content,
            ...(attachment.content_type ? { contentType: attachment.content_type } : {})
          }))
        }
      : {})
  };
}

export function createMessagesRouter({ gateway }: MessageRouteDeps): Router {
  const router = express.Router();

  // List messages: ?folder=&unseen_only=&from=&since=&before=&subject=&max_results=
  router.get('/:email/messages', validateMessageQuery, async (req, res) => {
    await withGatewayJson(res, async () => {
      const messages = await gateway.listMessages(req.params.email, parseMessageQuery(req.query));
      return { messages, count: messages.length };
    });
  });

  router.get('/:email/messages/:messageId', async (req, res) => {
    const folder = typeof req.query.folder === 'string' && req.query.folder ? req.query.folder : 'INBOX';
    const includeAttachmentContent = req.query.include_attachments === 'true';

    await withGatewayJson(res, () =>
      gateway.fetchMessage(req.params.email, req.params.messageId, { folder, includeAttachmentContent })
    );
  });

  router.post('/:email/messages', validateSendMessage, async (req, res) => {
    const body: SendMessageRequest = req.body;
    await withGatewayJson(res, () => gateway.sendMessage(req.params.email, toComposedMessage(body)), 202);
  });

  // Submit a pre-built message as-is to the given envelope
  router.post('/:email/messages/raw', validateSendRawMessage, async (req, res) => {
    const body: SendRawMessageRequest = req.body;
    await withGatewayJson(res, () => gateway.sendRawMessage(req.params.email, {
      to: body.to,
      raw: body.raw,
      ...(body.from ? { from: body.from } : {})
    }), 202);
  });

  return router;
}
