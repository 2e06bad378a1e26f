import express, { RequestHandler } from 'express';
import request from 'supertest';
import {
  parseMessageQuery,
  validateCreateAccount,
  validateSecretRotation,
  validateSendMessage,
  validateSendRawMessage
} from '../validation';
import { RequestValidationError } from '../../types/api';

// Echoes the normalised body so tests can see what the route would receive
function echoApp(validator: RequestHandler): express.Express {
  const app = express();
  app.use(express.json());
  app.post('/', validator, (req, res) => {
    res.json(req.body);
  });
  return app;
}

describe('Validation Middleware', () => {
  describe('validateCreateAccount', () => {
    const app = echoApp(validateCreateAccount);

    it('should normalise the address and keep the secret as given', async () => {
      const response = await request(app)
        .post('/')
        .send({ email_address: ' User@Example.COM ', secret: ' test-secret ' })
        .expect(200);

      expect(response.body).toEqual({ email_address: 'user@example.com', secret: ' test-secret ' });
    });

    it('should accept explicit endpoints', async () => {
      const response = await request(app)
        .post('/')
        .send({
          email_address: 'me@corp.example',
          secret: 'test-secret',
          auth_method: 'password',
          username: ' me ',
          imap: { host: 'imap.corp.example', port: '993', tls: 'tls' },
          smtp: { host: 'smtp.corp.example', port: 587, tls: 'starttls' }
        })
        .expect(200);

      expect(response.body).toEqual({
        email_address: 'me@corp.example',
        secret: 'test-secret',
        auth_method: 'password',
        username: 'me',
        imap: { host: 'imap.corp.example', port: 993, tls: 'tls' },
        smtp: { host: 'smtp.corp.example', port: 587, tls: 'starttls' }
      });
    });

    it('should reject invalid email format', async () => {
      const response = await request(app)
        .post('/')
        .send({ email_address: 'not-an-email', secret: 'test-secret' })
        .expect(400);

      expect(response.body).toEqual({
        error: 'Validation error',
        field: 'email_address',
        message: 'Invalid email address format'
      });
    });

    it('should require the address and the secret', async () => {
      const missingEmail = await request(app).post('/').send({ secret: 'test-secret' }).expect(400);
      expect(missingEmail.body.message).toBe('Email address is required');

      const missingSecret = await request(app).post('/').send({ email_address: 'a@example.org' }).expect(400);
      expect(missingSecret.body).toEqual({ error: 'Validation error', field: 'secret', message: 'Secret is required' });
    });

    it('should reject unknown auth methods and bad endpoints', async () => {
      const authMethod = await request(app)
        .post('/')
        .send({ email_address: 'a@example.org', secret: 'test-secret', auth_method: 'kerberos' })
        .expect(400);
      expect(authMethod.body.message).toBe('auth_method must be one of password, oauth2');

      const port = await request(app)
        .post('/')
        .send({ email_address: 'a@example.org', secret: 'test-secret', imap: { host: 'imap.example.org', port: 0, tls: 'tls' } })
        .expect(400);
      expect(port.body).toEqual({
        error: 'Validation error',
        field: 'imap.port',
        message: 'IMAP port must be between 1 and 65535'
      });

      const tls = await request(app)
        .post('/')
        .send({ email_address: 'a@example.org', secret: 'test-secret', smtp: { host: 'smtp.example.org', port: 25, tls: 'ssl' } })
        .expect(400);
      expect(tls.body.message).toBe('SMTP tls must be one of tls, starttls, none');
    });

    it('should reject a body that is not an object', async () => {
      const response = await request(app)
        .post('/')
        .set('Content-Type', 'application/json')
        .send('["a@example.org"]')
        .expect(400);

      expect(response.body.field).toBe('body');
    });
  });

  describe('validateSecretRotation', () => {
    const app = echoApp(validateSecretRotation);

    it('should pass a secret through', async () => {
      const response = await request(app).post('/').send({ secret: 'rotated-secret', extra: true }).expect(200);
      expect(response.body).toEqual({ secret: 'rotated-secret' });
    });

    it('should reject a blank secret', async () => {
      const response = await request(app).post('/').send({ secret: '   ' }).expect(400);
      expect(response.body.message).toBe('Secret is required');
    });
  });

  describe('validateSendMessage', () => {
    const app = echoApp(validateSendMessage);

    it('should normalise recipients and references', async () => {
      const response = await request(app)
        .post('/')
        .send({
          to: 'Bob@Example.org, carol@example.org',
          cc: ['dave@example.org'],
          subject: 'Status',
          text: 'All good',
          reply_to: 'Team@Example.org',
          in_reply_to: '<earlier@test.local>',
          references: '<first@test.local> <earlier@test.local>',
          attachments: [{ filename: 'a.txt', content: 'aGVsbG8=', content_type: 'text/plain' }]
        })
        .expect(200);

      expect(response.body).toEqual({
        to: ['bob@example.org', 'carol@example.org'],
        cc: ['dave@example.org'],
        subject: 'Status',
        text: 'All good',
        reply_to: 'team@example.org',
        in_reply_to: '<earlier@test.local>',
        references: ['<first@test.local>', '<earlier@test.local>'],
        attachments: [{ filename: 'a.txt', content: 'aGVsbG8=', content_type: 'text/plain' }]
      });
    });

    it('should default the subject to empty', async () => {
      const response = await request(app).post('/').send({ to: ['bob@example.org'], html: '<p>Hi</p>' }).expect(200);
      expect(response.body).toEqual({ to: ['bob@example.org'], subject: '', html: '<p>Hi</p>' });
    });

    it('should require recipients and a body', async () => {
      const noRecipients = await request(app).post('/').send({ subject: 'x', text: 'y' }).expect(400);
      expect(noRecipients.body).toEqual({ error: 'Validation error', field: 'to', message: 'to is required' });

      const emptyList = await request(app).post('/').send({ to: [], text: 'y' }).expect(400);
      expect(emptyList.body.message).toBe('to must contain at least one address');

      const noBody = await request(app).post('/').send({ to: ['bob@example.org'] }).expect(400);
      expect(noBody.body.message).toBe('Either text or html is required');
    });

    it('should reject malformed recipients and attachments', async () => {
      const recipient = await request(app).post('/').send({ to: ['bob'], text: 'y' }).expect(400);
      expect(recipient.body).toEqual({ error: 'Validation error', field: 'to', message: 'Invalid email address format' });

      const attachment = await request(app)
        .post('/')
        .send({ to: ['bob@example.org'], text: 'y', attachments: [{ filename: 'a.bin', content: 'not base64!' }] })
        .expect(400);
      expect(attachment.body).toEqual({
        error: 'Validation error',
        field: 'attachments[0].content',
        message: 'Attachment content must be base64'
      });
    });
  });

  describe('validateSendRawMessage', () => {
    const app = echoApp(validateSendRawMessage);

    it('should keep the message as given and normalise the envelope', async () => {
      const response = await request(app)
        .post('/')
        .send({ to: 'Bob@Example.org', from: 'Bounces@Example.org', raw: 'Subject: x\r\n\r\nbody\r\n' })
        .expect(200);

      expect(response.body).toEqual({
        to: ['bob@example.org'],
        from: 'bounces@example.org',
        raw: 'Subject: x\r\n\r\nbody\r\n'
      });
    });

    it('should require recipients and the message', async () => {
      const noRecipients = await request(app).post('/').send({ raw: 'Subject: x\r\n\r\ny' }).expect(400);
      expect(noRecipients.body).toEqual({ error: 'Validation error', field: 'to', message: 'to is required' });

      const noMessage = await request(app).post('/').send({ to: ['bob@example.org'], raw: '' }).expect(400);
      expect(noMessage.body).toEqual({ error: 'Validation error', field: 'raw', message: 'raw is required' });
    });
  });

  describe('parseMessageQuery', () => {
    it('should map query parameters onto a message query', () => {
      expect(parseMessageQuery({
        folder: 'Sent',
        unseen_only: 'true',
        from: 'bob@example.org',
        since: '2024-03-01',
        subject: 'report',
        max_results: '20'
      })).toEqual({
        folder: 'Sent',
        unseenOnly: true,
        from: 'bob@example.org',
        since: new Date('2024-03-01'),
        subject: 'report',
        maxResults: 20
      });
    });

    it('should default to all messages', () => {
      expect(parseMessageQuery({})).toEqual({ unseenOnly: false });
    });

    it('should take the last value of a repeated parameter', () => {
      expect(parseMessageQuery({ folder: ['INBOX', 'Sent'] })).toEqual({ folder: 'Sent', unseenOnly: false });
    });

    it('should reject malformed values', () => {
      expect(() => parseMessageQuery({ unseen_only: 'yes' })).toThrow(RequestValidationError);
      expect(() => parseMessageQuery({ max_results: '-3' })).toThrow('max_results must be a positive integer');
      expect(() => parseMessageQuery({ before: 'yesterday' })).toThrow('before must be an ISO 8601 date');
    });
  });
});
