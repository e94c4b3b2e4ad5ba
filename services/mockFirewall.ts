import { XMLParser } from 'fast-xml-parser';
import { SSH_SERVICES } from '../types.js';
import type { SshService } from '../types.js';
import type { FetchLike } from './panosClient.js';
import { cipherXpath, isRecord } from './panosClient.js';

// Ciphers accepted by the simulated firmware
const SUPPORTED_CIPHERS = [
  'aes128-cbc', 'aes192-cbc', 'aes256-cbc',
  'aes128-ctr', 'aes192-ctr', 'aes256-ctr',
  'aes128-gcm', 'aes256-gcm',
];

export interface MockFirewallOptions {
  apiKey?: string;
  username?: string;
  password?: string;
  hostname?: string;
  swVersion?: string;
  ciphers?: Partial<Record<SshService, string[]>>;
  /** Ciphers whose leaves carry change-tracking attributes in config reads. */
  annotated?: string[];
  /** Job polls answered with status ACT before the commit job reports FIN. */
  commitPolls?: number;
  commitResult?: 'OK' | 'FAIL';
  rejectCommit?: boolean;
  rejectRestart?: SshService | 'system';
  unreachable?: boolean;
  stall?: boolean;
}

interface CommitJob {
  id: number;
  pollsLeft: number;
}

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  textNodeName: '_text',
  parseAttributeValue: true,
});

const xml = (status: number, body: string): Response =>
  new Response(body, { status, headers: { 'Content-Type': 'application/xml' } });

const success = (inner: string, code?: number): Response =>
  xml(200, `<response status="success"${code === undefined ? '' : ` code="${code}"`}>${inner}</response>`);

const failure = (code: number, message: string): Response =>
  xml(200, `<response status="error" code="${code}"><msg><line>${message}</line></msg></response>`);

const forbidden = (): Response =>
  xml(403, '<response status="error" code="403"><result><msg>Invalid Credential</msg></result></response>');

function child(node: unknown, ...path: string[]): unknown {
  let current = node;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function serviceOf(node: unknown): SshService | undefined {
  return SSH_SERVICES.find((service) => isRecord(node) && service in node);
}

/**
 * In-process stand-in for the PAN-OS XML API of one firewall. `fetch` is
 * handed to the client in place of the global one; every request it answers
 * is appended to `operations`.
 */
export class MockFirewall {
  readonly operations: string[] = [];
  readonly running: Record<SshService, string[]>;
  readonly candidate: Record<SshService, string[]>;
  readonly restarted: SshService[] = [];
  rebooted = false;

  private readonly apiKey: string;
  private nextJobId = 1;
  private pendingChanges = false;
  private readonly jobs = new Map<number, CommitJob>();

  constructor(private readonly options: MockFirewallOptions = {}) {
    this.apiKey = options.apiKey ?? 'test-key';
    this.running = {
      mgmt: [...(options.ciphers?.mgmt ?? [])],
      ha: [...(options.ciphers?.ha ?? [])],
    };
    this.candidate = { mgmt: [...this.running.mgmt], ha: [...this.running.ha] };
  }

  readonly fetch: FetchLike = async (_url, init) => {
    if (this.options.unreachable) {
      throw new TypeError('fetch failed');
    }
    if (this.options.stall) {
      const { signal } = init;
      return new Promise<Response>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(signal.reason), { once: true });
      });
    }

    const params = new URLSearchParams(init.body);
    const type = params.get('type');

    if (type === 'keygen') {
      this.operations.push('keygen');
      const valid = params.get('user') === (this.options.username ?? 'admin')
        && params.get('password') === (this.options.password ?? 'test-password');
      return valid ? success(`<result><key>${this.apiKey}</key></result>`) : forbidden();
    }

    if (init.headers['X-PAN-KEY'] !== this.apiKey) {
      this.operations.push(`unauthorized:${type ?? ''}`);
      return forbidden();
    }

    switch (type) {
      case 'config':
        return this.config(params);
      case 'commit':
        return this.commit();
      case 'op':
        return this.op(parser.parse(params.get('cmd') ?? ''));
      default:
        return failure(1, `Unknown request type ${type ?? ''}`);
    }
  };

  private config(params: URLSearchParams): Response {
    const action = params.get('action');
    const service = SSH_SERVICES.find((svc) => cipherXpath(svc) === params.get('xpath'));
    if (!service) {
      return failure(7, 'Object doesn\'t exist');
    }
    this.operations.push(`${action ?? ''}:${service}`);

    if (action === 'get') {
      const ciphers = this.candidate[service];
      if (ciphers.length === 0) {
        return success('<result total-count="0" count="0"/>', 19);
      }
      const annotated = this.options.annotated ?? [];
      const entries = ciphers
        .map((cipher) => annotated.includes(cipher)
          ? `<${cipher} admin="admin" dirtyId="2" time="2026/10/19 10:00:00"/>`
          : `<${cipher}/>`)
        .join('');
      return success(
        `<result total-count="1" count="1"><${service} admin="admin" dirtyId="1">${entries}</${service}></result>`,
        19
      );
    }

    if (action === 'edit') {
      const element: unknown = parser.parse(params.get('element') ?? '');
      const node = child(element, service);
      const ciphers = isRecord(node) ? Object.keys(node) : [];
      const unsupported = ciphers.find((cipher) => !SUPPORTED_CIPHERS.includes(cipher));
      if (unsupported !== undefined) {
        return failure(12, `${unsupported} is not a valid cipher for ${service}`);
      }
      this.candidate[service] = ciphers;
      this.pendingChanges = true;
      return success('<msg>command succeeded</msg>', 20);
    }

    return failure(12, `Unsupported action ${action ?? ''}`);
  }

  private commit(): Response {
    this.operations.push('commit');
    if (this.options.rejectCommit) {
      return failure(13, 'Another commit is in progress');
    }
    if (!this.pendingChanges) {
      return success('<msg>There are no changes to commit.</msg>', 19);
    }

    const id = this.nextJobId++;
    this.jobs.set(id, { id, pollsLeft: this.options.commitPolls ?? 0 });
    this.pendingChanges = false;
    return success(
      `<result><msg><line>Commit job enqueued with jobid ${id}</line></msg><job>${id}</job></result>`,
      19
    );
  }

  private op(command: unknown): Response {
    if (child(command, 'show', 'system', 'info') !== undefined) {
      this.operations.push('system-info');
      return success(
        `<result><system><hostname>${this.options.hostname ?? 'fw-test'}</hostname><sw-version>${this.options.swVersion ?? '10.2.4'}</sw-version></system></result>`
      );
    }

    const jobId = child(command, 'show', 'jobs', 'id');
    if (jobId !== undefined) {
      this.operations.push(`job:${String(jobId)}`);
      return this.jobStatus(Number(jobId));
    }

    const restartService = serviceOf(child(command, 'set', 'ssh', 'service-restart'));
    if (restartService) {
      this.operations.push(`service-restart:${restartService}`);
      if (this.options.rejectRestart === restartService) {
        return failure(17, `Unable to restart ${restartService} SSH service`);
      }
      this.restarted.push(restartService);
      return success('<result><member>SSH restarted</member></result>');
    }

    if (child(command, 'request', 'restart', 'system') !== undefined) {
      this.operations.push('restart-system');
      if (this.options.rejectRestart === 'system') {
        return failure(17, 'Another restart is already in progress');
      }
      this.rebooted = true;
      return success('<result>Command succeeded with no output</result>');
    }

    this.operations.push('unknown-op');
    return failure(17, 'Unknown command');
  }

  private jobStatus(id: number): Response {
    const job = this.jobs.get(id);
    if (!job) {
      return failure(17, `job ${id} not found`);
    }
    if (job.pollsLeft > 0) {
      job.pollsLeft--;
      return success(`<result><job><id>${id}</id><type>Commit</type><status>ACT</status><progress>50</progress></job></result>`);
    }

    const result = this.options.commitResult ?? 'OK';
    if (result === 'OK') {
      this.running.mgmt = [...this.candidate.mgmt];
      this.running.ha = [...this.candidate.ha];
    }
    const detail = result === 'OK' ? 'Configuration committed successfully' : 'Validation error in ssh ciphers';
    return success(
      `<result><job><id>${id}</id><type>Commit</type><status>FIN</status><result>${result}</result><details><line>${detail}</line></details></job></result>`
    );
  }
}
