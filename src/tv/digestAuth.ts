/**
 * HTTP Digest authentication for the JointSpace v6 API.
 *
 * The TV answers the first request with a 401 challenge. The challenge is kept and
 * reused with an increasing nonce count, so steady-state polling costs one request per frame.
 */

import { AxiosError, type AxiosInstance, type InternalAxiosRequestConfig } from 'axios';
import crypto from 'crypto';

export interface DigestChallenge {
  realm: string;
  nonce: string;
  qop?: string;
  opaque?: string;
  algorithm?: string;
}

export function parseDigestChallenge(header: string): DigestChallenge | null {
  if (!/^Digest\s/i.test(header)) {
    return null;
  }

  const fields = new Map<string, string>();
  const pattern = /(\w+)=(?:"([^"]*)"|([^,\s]*))/g;
  for (const match of header.slice('Digest'.length).matchAll(pattern)) {
    fields.set(match[1].toLowerCase(), match[2] ?? match[3] ?? '');
  }

  const realm = fields.get('realm');
  const nonce = fields.get('nonce');
  if (realm === undefined || nonce === undefined) {
    return null;
  }

  return {
    realm,
    nonce,
    qop: fields.get('qop'),
    opaque: fields.get('opaque'),
    algorithm: fields.get('algorithm'),
  };
}

const RETRY_MARKER = 'x-digest-retry';

function md5(value: string): string {
  return crypto.createHash('md5').update(value).digest('hex');
}

export class DigestAuth {
  private challenge: DigestChallenge | null = null;
  private nonceCount = 0;
  private readonly retried = new WeakSet<object>();
  private readonly startedAt = new WeakMap<object, number>();

  constructor(
    private readonly username: string,
    private readonly password: string,
    private readonly createCnonce: () => string = () => crypto.randomBytes(8).toString('hex')
  ) {}

  setChallenge(challenge: DigestChallenge): void {
    this.challenge = challenge;
    this.nonceCount = 0;
  }

  /**
   * Build the Authorization header for a request, or null before the first challenge
   */
  authorization(method: string, uri: string): string | null {
    const challenge = this.challenge;
    if (!challenge) {
      return null;
    }

    const ha1 = md5(`${this.username}:${challenge.realm}:${this.password}`);
    const ha2 = md5(`${method.toUpperCase()}:${uri}`);
    const parts = [
      `username="${this.username}"`,
      `realm="${challenge.realm}"`,
      `nonce="${challenge.nonce}"`,
      `uri="${uri}"`,
      'algorithm=MD5',
    ];

    const qopAuth = challenge.qop?.split(',').some((qop) => qop.trim() === 'auth') ?? false;
    if (qopAuth) {
      this.nonceCount++;
      const nc = this.nonceCount.toString(16).padStart(8, '0');
      const cnonce = this.createCnonce();
      const response = md5(`${ha1}:${challenge.nonce}:${nc}:${cnonce}:auth:${ha2}`);
      parts.push(`response="${response}"`, 'qop=auth', `nc=${nc}`, `cnonce="${cnonce}"`);
    } else {
      parts.push(`response="${md5(`${ha1}:${challenge.nonce}:${ha2}`)}"`);
    }

    if (challenge.opaque !== undefined) {
      parts.push(`opaque="${challenge.opaque}"`);
    }

    return `Digest ${parts.join(', ')}`;
  }

  /**
   * Install request/response interceptors on an axios instance.
   *
   * A 401 challenge is answered with at most one retry, inside what is left of the
   * original request's timeout. The retry keeps the original abort signal.
   */
  attach(client: AxiosInstance, now: () => number = Date.now): void {
    client.interceptors.request.use((config: InternalAxiosRequestConfig) => {
      // axios merges the retry into a fresh config object, so the retry is marked by header
      if (config.headers.has(RETRY_MARKER)) {
        config.headers.delete(RETRY_MARKER);
        this.retried.add(config);
      } else {
        this.startedAt.set(config, now());
      }

      const header = this.authorization(config.method ?? 'get', requestUri(client, config));
      if (header) {
        config.headers.set('Authorization', header);
      }
      return config;
    });

    client.interceptors.response.use(undefined, (error: unknown) => {
      if (!(error instanceof AxiosError)) {
        return Promise.reject(error);
      }

      const { config, response } = error;
      if (!config || !response || response.status !== 401 || this.retried.has(config)) {
        return Promise.reject(error);
      }

      const header = response.headers['www-authenticate'];
      const challenge = typeof header === 'string' ? parseDigestChallenge(header) : null;
      if (!challenge) {
        return Promise.reject(error);
      }

      let timeout = config.timeout ?? 0;
      if (timeout > 0) {
        timeout -= now() - (this.startedAt.get(config) ?? now());
        if (timeout <= 0) {
          return Promise.reject(error);
        }
      }

      this.setChallenge(challenge);
      config.headers.set(RETRY_MARKER, '1');
      return client.request({ ...config, timeout });
    });
  }
}

function requestUri(client: AxiosInstance, config: InternalAxiosRequestConfig): string {
  const url = new URL(client.getUri(config));
  return `${url.pathname}${url.search}`;
}
