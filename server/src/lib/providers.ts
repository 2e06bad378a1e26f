import fs from 'fs';
import builtinProviders from '../config/providers.json';
import { configurationError } from './gateway-errors';
import {
  AccountCredentials,
  EndpointSettings,
  ProviderProfile,
  ResolvedAccount,
  TlsMode
} from '../types/gateway';

export interface ProviderEntry extends ProviderProfile {
  domains: string[];
}

const TLS_MODES: readonly TlsMode[] = ['tls', 'starttls', 'none'];

// Ports whose protocol starts with a TLS handshake
const IMPLICIT_TLS_PORTS = new Set([993, 465, 995]);
// Ports whose protocol starts in plaintext (STARTTLS may upgrade later)
const PLAINTEXT_PORTS = new Set([143, 25, 587, 110]);

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Returned for domains missing from the table. Compared by identity.
 */
export const UNRESOLVED_PROFILE: ProviderProfile = Object.freeze({
  provider: 'unresolved',
  imap: Object.freeze({ host: '', port: 0, tls: 'none' as const }),
  smtp: Object.freeze({ host: '', port: 0, tls: 'none' as const })
});

export function isResolved(profile: ProviderProfile): boolean {
  return profile !== UNRESOLVED_PROFILE;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function extractDomain(email: string): string {
  const at = email.lastIndexOf('@');
  return at === -1 ? '' : normalizeEmail(email.slice(at + 1));
}

/**
 * Rejects settings that contradict themselves, such as TLS on a port that
 * only speaks plaintext.
 */
export function validateEndpoint(label: string, endpoint: EndpointSettings, email?: string): EndpointSettings {
  const host = typeof endpoint.host === 'string' ? endpoint.host.trim() : '';
  if (host.length === 0 || /\s/.test(host)) {
    throw configurationError(`${label} host is missing or invalid`, email);
  }

  if (!Number.isInteger(endpoint.port) || endpoint.port < 1 || endpoint.port > 65535) {
    throw configurationError(`${label} port must be between 1 and 65535`, email);
  }

  if (!TLS_MODES.includes(endpoint.tls)) {
    throw configurationError(`${label} TLS mode must be one of ${TLS_MODES.join(', ')}`, email);
  }

  if (endpoint.tls === 'tls' && PLAINTEXT_PORTS.has(endpoint.port)) {
    throw configurationError(
      `${label} requires TLS but port ${endpoint.port} is a plaintext port`,
      email
    );
  }

  if (endpoint.tls !== 'tls' && IMPLICIT_TLS_PORTS.has(endpoint.port)) {
    throw configurationError(
      `${label} port ${endpoint.port} expects implicit TLS but TLS mode is ${endpoint.tls}`,
      email
    );
  }

  return { host, port: endpoint.port, tls: endpoint.tls };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseEndpoint(value: unknown, label: string): EndpointSettings {
  if (!isRecord(value)) {
    throw configurationError(`${label} must be an object`);
  }
  const { host, port, tls } = value;
  if (typeof host !== 'string' || typeof port !== 'number' || typeof tls !== 'string') {
    throw configurationError(`${label} needs host, port and tls`);
  }
  const mode = TLS_MODES.find(m => m === tls);
  if (!mode) {
    throw configurationError(`${label} TLS mode must be one of ${TLS_MODES.join(', ')}`);
  }
  return validateEndpoint(label, { host, port, tls: mode });
}

/**
 * Validates a provider table read from JSON.
 */
export function parseProviderTable(data: unknown, source: string): ProviderEntry[] {
  if (!Array.isArray(data)) {
    throw configurationError(`Provider table ${source} must be an array`);
  }

  return data.map((item: unknown, index) => {
    const label = `${source}[${index}]`;
    if (!isRecord(item)) {
      throw configurationError(`${label} must be an object`);
    }
    const { provider, domains, imap, smtp } = item;
    if (typeof provider !== 'string' || provider.length === 0) {
      throw configurationError(`${label}.provider is required`);
    }
    if (!Array.isArray(domains) || domains.length === 0 || !domains.every(d => typeof d === 'string')) {
      throw configurationError(`${label}.domains must be a non-empty list of strings`);
    }
    return {
      provider,
      domains: domains.map((d: string) => d.toLowerCase()),
      imap: parseEndpoint(imap, `${label}.imap`),
      smtp: parseEndpoint(smtp, `${label}.smtp`)
    };
  });
}

export function loadProviderFile(filePath: string): ProviderEntry[] {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw configurationError(`Cannot read provider table ${filePath}: ${reason}`);
  }
  return parseProviderTable(data, filePath);
}

/**
 * Immutable domain → profile table. Later entries win over earlier ones for
 * the same domain.
 */
export class ProviderDirectory {
  private readonly byDomain: ReadonlyMap<string, ProviderProfile>;

  constructor(entries: ProviderEntry[]) {
    const byDomain = new Map<string, ProviderProfile>();
    for (const entry of entries) {
      const profile: ProviderProfile = Object.freeze({
        provider: entry.provider,
        imap: Object.freeze({ ...entry.imap }),
        smtp: Object.freeze({ ...entry.smtp })
      });
      for (const domain of entry.domains) {
        byDomain.set(domain, profile);
      }
    }
    this.byDomain = byDomain;
  }

  withEntries(entries: ProviderEntry[]): ProviderDirectory {
    const existing: ProviderEntry[] = Array.from(this.byDomain.entries()).map(([domain, profile]) => ({
      ...profile,
      domains: [domain]
    }));
    return new ProviderDirectory([...existing, ...entries]);
  }

  domains(): string[] {
    return Array.from(this.byDomain.keys());
  }

  resolve(email: string): ProviderProfile {
    return this.byDomain.get(extractDomain(email)) ?? UNRESOLVED_PROFILE;
  }

  /**
   * Joins credentials with the profile in force. Explicit settings override
   * the table per protocol.
   */
  resolveAccount(credentials: AccountCredentials): ResolvedAccount {
    const email = normalizeEmail(credentials.email);
    if (!EMAIL_PATTERN.test(email)) {
      throw configurationError('Invalid email address format');
    }
    if (!credentials.secret) {
      throw configurationError('Account secret is required', email);
    }

    const profile = this.resolve(email);
    const known = isResolved(profile);
    const imap = credentials.settings?.imap ?? (known ? profile.imap : undefined);
    const smtp = credentials.settings?.smtp ?? (known ? profile.smtp : undefined);

    if (!imap || !smtp) {
      throw configurationError(
        `No provider profile known for ${extractDomain(email)}; explicit IMAP and SMTP settings are required`,
        email
      );
    }

    const explicit = credentials.settings?.imap !== undefined && credentials.settings?.smtp !== undefined;

    return {
      email,
      username: credentials.username?.trim() || email,
      secret: credentials.secret,
      authMethod: credentials.authMethod ?? 'password',
      profile: {
        provider: explicit || !known ? 'custom' : profile.provider,
        imap: validateEndpoint('IMAP', imap, email),
        smtp: validateEndpoint('SMTP', smtp, email)
      }
    };
  }
}

export const defaultProviderDirectory = new ProviderDirectory(
  parseProviderTable(builtinProviders, 'providers.json')
);

export function resolveProvider(email: string): ProviderProfile {
  return defaultProviderDirectory.resolve(email);
}

export function resolveAccountProfile(credentials: AccountCredentials): ResolvedAccount {
  return defaultProviderDirectory.resolveAccount(credentials);
}
