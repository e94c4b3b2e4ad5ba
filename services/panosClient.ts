import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { setTimeout as delay } from 'node:timers/promises';
import type {
  CommitOptions,
  CommitResult,
  ConnectOptions,
  FirewallCredentials,
  FirewallSession,
  SshService,
} from '../types.js';
import {
  AuthenticationError,
  CommitError,
  CommitTimeoutError,
  ConnectionError,
  DeviceApiError,
  InvalidCipherSuiteError,
  RequestTimeoutError,
  RestartError,
} from './errors.js';

export type FetchLike = (
  url: string,
  init: { method: string; headers: Record<string, string>; body: string; signal: AbortSignal }
) => Promise<Response>;

type XmlNode = { [tag: string]: XmlNode | string };

interface PanosResponseBody {
  '@_status'?: string;
  '@_code'?: number | string;
  msg?: unknown;
  result?: unknown;
}

interface PanosResponse {
  response?: PanosResponseBody;
}

interface ApiResult {
  messages: string[];
  result: Record<string, unknown>;
}

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '_text';

// text stays text: API keys and versions such as 11.0 must not become numbers
const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  parseAttributeValue: true,
  parseTagValue: false,
});

const builder = new XMLBuilder({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  format: false,
});

const isElementName = (key: string): boolean => !key.startsWith(ATTRIBUTE_PREFIX) && key !== TEXT_NODE;

const DEVICE_XPATH = "/config/devices/entry[@name='localhost.localdomain']";

export const cipherXpath = (service: SshService): string =>
  `${DEVICE_XPATH}/deviceconfig/system/ssh/ciphers/${service}`;

export function toXml(node: XmlNode): string {
  return builder.build(node);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Flattens `<msg>`, `<line>` and `<member>` trees into their text lines. */
export function collectText(node: unknown): string[] {
  if (node === undefined || node === null || node === '') return [];
  if (typeof node === 'string' || typeof node === 'number' || typeof node === 'boolean') {
    return [String(node)];
  }
  if (Array.isArray(node)) return node.flatMap(collectText);
  if (isRecord(node)) {
    return Object.entries(node)
      .filter(([key]) => !key.startsWith(ATTRIBUTE_PREFIX))
      .flatMap(([, value]) => collectText(value));
  }
  return [];
}

function parseResponse(xmlText: string): PanosResponseBody | undefined {
  try {
    const data: PanosResponse = parser.parse(xmlText);
    return isRecord(data.response) ? data.response : undefined;
  } catch {
    return undefined;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

async function rejectingAs<T>(
  action: () => Promise<T>,
  wrap: (error: DeviceApiError) => Error
): Promise<T> {
  try {
    return await action();
  } catch (error) {
    if (error instanceof DeviceApiError) throw wrap(error);
    throw error;
  }
}

/**
 * Session against the PAN-OS XML API of a single firewall. Each call is one
 * POST to `/api/` carrying its own timeout.
 */
export class PanosClient implements FirewallSession {
  private apiKey?: string;
  private closed = false;
  private readonly apiUrl: string;

  constructor(
    private readonly address: string,
    private readonly options: ConnectOptions,
    private readonly fetchImpl: FetchLike = fetch
  ) {
    this.apiUrl = `${options.protocol}://${address}/api/`;
  }

  async authenticate(credentials: FirewallCredentials): Promise<void> {
    if ('apiKey' in credentials) {
      this.apiKey = credentials.apiKey;
      const info = await this.op({ show: { system: { info: '' } } }, 'API key verification');
      const system: Record<string, unknown> = isRecord(info.result.system) ? info.result.system : {};
      if (system.hostname !== undefined) {
        console.log(`Connected to ${String(system.hostname)} (PAN-OS ${String(system['sw-version'])})`);
      }
      return;
    }

    const { result } = await this.request(
      { type: 'keygen', user: credentials.username, password: credentials.password },
      'API key generation'
    );
    if (result.key === undefined || result.key === '') {
      throw new AuthenticationError(`Firewall ${this.address} did not return an API key`);
    }
    this.apiKey = String(result.key);
  }

  async getCiphers(service: SshService): Promise<string[]> {
    const { result } = await this.request(
      { type: 'config', action: 'get', xpath: cipherXpath(service) },
      `Reading ${service} ciphers`
    );
    const node = result[service];
    if (!isRecord(node)) return [];
    // leaves may carry change-tracking attributes (admin, dirtyId, time)
    return Object.keys(node).filter(isElementName);
  }

  async setCipher(service: SshService, suite: string[]): Promise<void> {
    const element = toXml({ [service]: Object.fromEntries(suite.map((cipher) => [cipher, ''])) });
    await rejectingAs(
      () => this.request(
        { type: 'config', action: 'edit', xpath: cipherXpath(service), element },
        `Setting ${service} ciphers`
      ),
      (error) => new InvalidCipherSuiteError(service, suite, error.message, error.code)
    );
  }

  async commit(options: CommitOptions): Promise<CommitResult> {
    const cmd = toXml({ commit: { description: options.description } });
    const response = await rejectingAs(
      () => this.request({ type: 'commit', cmd }, 'Commit'),
      (error) => new CommitError(`Commit rejected: ${error.message}`, error.code)
    );

    const job = response.result.job;
    if (job === undefined || job === '') {
      return { messages: response.messages };
    }

    const jobId = Number(job);
    const details = await this.waitForJob(jobId, options);
    return { jobId, messages: [...response.messages, ...details] };
  }

  async restartService(service: SshService): Promise<void> {
    const { result } = await rejectingAs(
      () => this.op(
        { set: { ssh: { 'service-restart': { [service]: '' } } } },
        `Restarting ${service} SSH service`
      ),
      (error) => new RestartError(`Restart of ${service} SSH service rejected: ${error.message}`, error.code)
    );
    for (const message of collectText(result.member)) {
      console.log(`${message}...  success`);
    }
  }

  async reboot(): Promise<void> {
    try {
      await rejectingAs(
        () => this.op({ request: { restart: { system: '' } } }, 'System restart'),
        (error) => new RestartError(`System restart rejected: ${error.message}`, error.code)
      );
    } catch (error) {
      // the device may go down before it answers; only transport failures carry a cause
      if (error instanceof ConnectionError && !(error instanceof RequestTimeoutError) && error.cause !== undefined) {
        console.log('Connection closed while the firewall restarts');
        return;
      }
      throw error;
    }
  }

  close(): void {
    this.closed = true;
    this.apiKey = undefined;
  }

  private async waitForJob(jobId: number, options: CommitOptions): Promise<string[]> {
    const deadline = Date.now() + options.timeoutMs;

    for (;;) {
      const { result } = await this.op(
        { show: { jobs: { id: String(jobId) } } },
        `Commit job ${jobId} status`
      );
      const job: Record<string, unknown> = isRecord(result.job) ? result.job : {};

      if (job.status === 'FIN') {
        const details = collectText(job.details);
        if (job.result !== 'OK') {
          const suffix = details.length > 0 ? `: ${details.join('; ')}` : '';
          throw new CommitError(`Commit job ${jobId} finished with result ${String(job.result)}${suffix}`);
        }
        return details;
      }

      if (Date.now() >= deadline) {
        throw new CommitTimeoutError(jobId, options.timeoutMs);
      }
      await delay(options.pollIntervalMs);
    }
  }

  private op(command: XmlNode, what: string): Promise<ApiResult> {
    return this.request({ type: 'op', cmd: toXml(command) }, what);
  }

  private async request(params: Record<string, string>, what: string): Promise<ApiResult> {
    if (this.closed) {
      throw new ConnectionError(`Session to ${this.address} is closed`);
    }

    const headers: Record<string, string> = {
      Accept: 'application/xml',
      'Content-Type': 'application/x-www-form-urlencoded',
    };
    if (this.apiKey) headers['X-PAN-KEY'] = this.apiKey;

    const signal = AbortSignal.timeout(this.options.requestTimeoutMs);
    let response: Response;
    let xmlText: string;
    try {
      response = await this.fetchImpl(this.apiUrl, {
        method: 'POST',
        headers,
        body: new URLSearchParams(params).toString(),
        signal,
      });
      xmlText = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw new RequestTimeoutError(this.options.requestTimeoutMs, what);
      }
      throw new ConnectionError(`${what}: cannot reach ${this.address}: ${errorMessage(error)}`, { cause: error });
    }

    const body = parseResponse(xmlText);
    const rawCode = body?.['@_code'];
    const code = rawCode === undefined ? undefined : Number(rawCode);
    const messages = body
      ? collectText(body.msg ?? (isRecord(body.result) ? body.result.msg : undefined))
      : [];

    if (response.status === 403 || code === 403) {
      throw new AuthenticationError(
        messages.length > 0 ? messages.join('; ') : `${response.status} ${response.statusText}`
      );
    }
    if (!body) {
      throw new ConnectionError(`Firewall API error: ${response.status} ${response.statusText}`);
    }
    if (body['@_status'] !== 'success') {
      throw new DeviceApiError(messages.length > 0 ? messages.join('; ') : `${what} failed`, code);
    }

    return { messages, result: isRecord(body.result) ? body.result : {} };
  }
}

export async function connectToFirewall(
  address: string,
  credentials: FirewallCredentials,
  options: ConnectOptions,
  fetchImpl: FetchLike = fetch
): Promise<PanosClient> {
  const client = new PanosClient(address, options, fetchImpl);
  await client.authenticate(credentials);
  return client;
}
