/**
 * JDownloader Client
 * 
 * Talks to a JDownloader instance through the MyJDownloader relay.
 * API Docs: https://my.jdownloader.org/developers/
 * 
 * Features:
 * - Session handshake with signed, AES-encrypted requests
 * - Device discovery by name
 * - Add links to the link grabber with autostart
 * - Package queries on the download list and the link grabber
 * - Package removal
 * - Transparent session regain on TOKEN_INVALID
 */

import { createCipheriv, createDecipheriv, createHash, createHmac } from 'node:crypto';
import { z } from 'zod';
import { AuthenticationError } from '@relayarr/core';
import { createLogger, errorMessage } from '@relayarr/utils';

const logger = createLogger({ component: 'jdownloader' });

export interface JDownloaderConfig {
  apiUrl: string;
  email: string;
  password: string;
  /** device name; the first device is used when no name matches */
  deviceName: string;
  appKey: string;
  timeoutMs: number;
}

export type PackageList = 'downloads' | 'linkgrabber';

export interface AddLinksOptions {
  links: readonly string[];
  packageName: string;
  destinationFolder: string;
  autostart?: boolean;
}

const packageSchema = z.object({
  uuid: z.union([z.number(), z.string()]).transform(String),
  name: z.string().default(''),
  status: z.string().optional(),
  finished: z.boolean().optional(),
  running: z.boolean().optional(),
  bytesLoaded: z.number().optional(),
  bytesTotal: z.number().optional(),
  speed: z.number().optional(),
  eta: z.number().optional(),
  saveTo: z.string().optional(),
});

export type JdPackage = z.infer<typeof packageSchema>;

/**
 * What the bridge needs from the engine
 */
export interface JdEngineClient {
  connect(): Promise<void>;
  reconnect(): Promise<void>;
  addLinks(options: AddLinksOptions): Promise<string>;
  queryPackages(list: PackageList): Promise<JdPackage[]>;
  removePackages(list: PackageList, packageIds: readonly string[]): Promise<void>;
}

/**
 * Error reported by the relay or the device (`type` is the relay's code)
 */
export class JdApiError extends Error {
  constructor(
    public readonly type: string,
    public readonly status: number
  ) {
    super(`MyJDownloader error ${type} (HTTP ${status})`);
    this.name = 'JdApiError';
  }
}

const AUTH_ERROR_TYPES = new Set([
  'AUTH_FAILED',
  'EMAIL_INVALID',
  'EMAIL_FORBIDDEN',
  'CHALLENGE_FAILED',
]);

const connectSchema = z.object({
  sessiontoken: z.string(),
  regaintoken: z.string(),
});

const devicesSchema = z.object({
  list: z.array(z.object({ id: z.string(), name: z.string(), type: z.string().optional() })),
});

const envelopeSchema = z.object({ data: z.unknown() });

const errorSchema = z.object({ type: z.string() });

const addLinksSchema = z.object({
  id: z.union([z.number(), z.string()]).transform(String),
});

// ============================================
// Crypto helpers
// ============================================

export function sha256(...parts: Array<string | Buffer>): Buffer {
  const hash = createHash('sha256');
  for (const part of parts) hash.update(part);
  return hash.digest();
}

export function secretFor(email: string, password: string, domain: 'server' | 'device'): Buffer {
  return sha256(email.toLowerCase() + password + domain);
}

/** AES-128-CBC; the first half of the token is the IV, the second the key */
export function encrypt(token: Buffer, plain: string): string {
  const cipher = createCipheriv('aes-128-cbc', token.subarray(16, 32), token.subarray(0, 16));
  return Buffer.concat([cipher.update(plain, 'utf8'), cipher.final()]).toString('base64');
}

export function decrypt(token: Buffer, payload: string): string {
  const decipher = createDecipheriv('aes-128-cbc', token.subarray(16, 32), token.subarray(0, 16));
  return Buffer.concat([decipher.update(payload, 'base64'), decipher.final()]).toString('utf8');
}

export function sign(key: Buffer, data: string): string {
  return createHmac('sha256', key).update(data).digest('hex');
}

function parseJson(text: string): unknown {
  return JSON.parse(text);
}

interface Session {
  sessionToken: string;
  regainToken: string;
  serverToken: Buffer;
  deviceToken: Buffer;
  deviceId: string;
}

export class JDownloaderClient implements JdEngineClient {
  private readonly config: JDownloaderConfig;
  private readonly loginSecret: Buffer;
  private readonly deviceSecret: Buffer;
  private session: Session | null = null;
  private lastRid = 0;

  constructor(config: JDownloaderConfig) {
    this.config = { ...config, apiUrl: config.apiUrl.replace(/\/+$/, '') };
    this.loginSecret = secretFor(config.email, config.password, 'server');
    this.deviceSecret = secretFor(config.email, config.password, 'device');
  }

  get connected(): boolean {
    return this.session !== null;
  }

  /**
   * Open a relay session and bind it to the configured device
   */
  async connect(): Promise<void> {
    const response = connectSchema.parse(
      await this.serverCall('/my/connect', [
        ['email', this.config.email.toLowerCase()],
        ['appkey', this.config.appKey],
      ], this.loginSecret)
    );

    await this.bindSession(response.sessiontoken, response.regaintoken);
    logger.info({ device: this.config.deviceName }, 'Connected to JDownloader');
  }

  /**
   * Regain the session with the regain token, or start over without one
   */
  async reconnect(): Promise<void> {
    const current = this.session;
    if (!current) {
      await this.connect();
      return;
    }

    try {
      const response = connectSchema.parse(
        await this.serverCall('/my/reconnect', [
          ['sessiontoken', current.sessionToken],
          ['regaintoken', current.regainToken],
        ], current.serverToken)
      );
      await this.bindSession(response.sessiontoken, response.regaintoken);
    } catch (error) {
      if (error instanceof AuthenticationError) {
        throw error;
      }
      logger.debug({ error: errorMessage(error) }, 'Session regain failed, reconnecting');
      this.session = null;
      await this.connect();
    }
  }

  async addLinks(options: AddLinksOptions): Promise<string> {
    const result = await this.action('/linkgrabberv2/addLinks', [{
      autostart: options.autostart ?? true,
      links: options.links.join('\n'),
      packageName: options.packageName,
      destinationFolder: options.destinationFolder,
      overwritePackagizerRules: true,
    }]);

    const { id } = addLinksSchema.parse(result);
    logger.info({ id, packageName: options.packageName, links: options.links.length }, 'Links added');
    return id;
  }

  async queryPackages(list: PackageList): Promise<JdPackage[]> {
    const query = list === 'downloads'
      ? {
          bytesLoaded: true,
          bytesTotal: true,
          eta: true,
          finished: true,
          name: true,
          running: true,
          saveTo: true,
          speed: true,
          status: true,
          maxResults: -1,
          startAt: 0,
        }
      : {
          bytesTotal: true,
          name: true,
          saveTo: true,
          status: true,
          maxResults: -1,
          startAt: 0,
        };

    const path = list === 'downloads' ? '/downloadsV2/queryPackages' : '/linkgrabberv2/queryPackages';
    const result = await this.action(path, [query]);
    return z.array(packageSchema).parse(result ?? []);
  }

  async removePackages(list: PackageList, packageIds: readonly string[]): Promise<void> {
    if (packageIds.length === 0) {
      return;
    }
    const path = list === 'downloads' ? '/downloadsV2/removeLinks' : '/linkgrabberv2/removeLinks';
    await this.action(path, [[], packageIds.map(Number)]);
    logger.info({ list, packageIds }, 'Packages removed');
  }

  // ============================================
  // Transport
  // ============================================

  /** request ids must grow strictly */
  private nextRid(): number {
    this.lastRid = Math.max(this.lastRid + 1, Date.now());
    return this.lastRid;
  }

  private async ensureSession(): Promise<Session> {
    if (!this.session) {
      await this.connect();
    }
    if (!this.session) {
      throw new JdApiError('NO_SESSION', 0);
    }
    return this.session;
  }

  private async bindSession(sessionToken: string, regainToken: string): Promise<void> {
    const tokenBytes = Buffer.from(sessionToken, 'hex');
    const serverToken = sha256(this.loginSecret, tokenBytes);
    const deviceToken = sha256(this.deviceSecret, tokenBytes);

    const devices = devicesSchema.parse(
      await this.serverCall('/my/listdevices', [['sessiontoken', sessionToken]], serverToken)
    );

    const device = devices.list.find(d => d.name === this.config.deviceName) ?? devices.list[0];
    if (!device) {
      throw new JdApiError('NO_DEVICE', 404);
    }
    if (device.name !== this.config.deviceName) {
      logger.warn({ wanted: this.config.deviceName, using: device.name }, 'Device not found, using first device');
    }

    this.session = { sessionToken, regainToken, serverToken, deviceToken, deviceId: device.id };
  }

  /**
   * Signed GET against the relay itself
   */
  private async serverCall(
    path: string,
    params: Array<[string, string]>,
    key: Buffer
  ): Promise<unknown> {
    const entries: Array<[string, string]> = [...params, ['rid', String(this.nextRid())]];
    const query = entries
      .map(([name, value]) => `${name}=${encodeURIComponent(value)}`)
      .join('&');
    const signed = `${path}?${query}`;

    const response = await fetch(`${this.config.apiUrl}${signed}&signature=${sign(key, signed)}`, {
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    const text = await response.text();

    if (!response.ok) {
      throw this.errorFrom(response.status, text, key);
    }
    return parseJson(decrypt(key, text));
  }

  /**
   * Encrypted device call, regaining the session once on TOKEN_INVALID
   */
  private async action(path: string, params: unknown[]): Promise<unknown> {
    try {
      return await this.deviceCall(path, params);
    } catch (error) {
      if (error instanceof JdApiError && error.type === 'TOKEN_INVALID') {
        logger.debug({ path }, 'Session token expired, regaining');
        await this.reconnect();
        return this.deviceCall(path, params);
      }
      throw error;
    }
  }

  private async deviceCall(path: string, params: unknown[]): Promise<unknown> {
    const session = await this.ensureSession();

    // objects travel as JSON strings, lists as they are
    const body = JSON.stringify({
      apiVer: 1,
      url: path,
      params: params.map(param => (Array.isArray(param) ? param : JSON.stringify(param))),
      rid: this.nextRid(),
    });

    const url = `${this.config.apiUrl}/t_${encodeURIComponent(session.sessionToken)}_${encodeURIComponent(session.deviceId)}${path}`;
    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/aesjson-jd; charset=utf-8' },
      body: encrypt(session.deviceToken, body),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    });
    const text = await response.text();

    if (!response.ok) {
      throw this.errorFrom(response.status, text, session.deviceToken);
    }

    return envelopeSchema.parse(parseJson(decrypt(session.deviceToken, text))).data;
  }

  /**
   * Error bodies come back either as plain JSON or encrypted
   */
  private errorFrom(status: number, text: string, key: Buffer): Error {
    let type = 'UNKNOWN';

    for (const read of [() => text, () => decrypt(key, text)]) {
      try {
        const parsed = errorSchema.safeParse(parseJson(read()));
        if (parsed.success) {
          type = parsed.data.type;
          break;
        }
      } catch (error) {
        logger.trace({ status, error: errorMessage(error) }, 'Unreadable error body');
      }
    }

    if (AUTH_ERROR_TYPES.has(type)) {
      this.session = null;
      return new AuthenticationError('engine', type);
    }
    return new JdApiError(type, status);
  }
}
