
export const SSH_SERVICES = ['mgmt', 'ha'] as const;

export type SshService = typeof SSH_SERVICES[number];

export type FirewallProtocol = 'https' | 'http';

export type FirewallCredentials =
  | { apiKey: string }
  | { username: string; password: string };

export interface CommitOptions {
  description: string;
  pollIntervalMs: number;
  timeoutMs: number;
}

export interface CipherConfiguration {
  address: string;
  protocol: FirewallProtocol;
  credentials: FirewallCredentials;
  ciphers: Record<SshService, string[]>;
  requestTimeoutMs: number;
  commit: CommitOptions;
  skipIfApplied: boolean;
}

export interface ConnectOptions {
  protocol: FirewallProtocol;
  requestTimeoutMs: number;
}

export interface CommitResult {
  jobId?: number;
  messages: string[];
}

export interface FirewallSession {
  getCiphers(service: SshService): Promise<string[]>;
  setCipher(service: SshService, suite: string[]): Promise<void>;
  commit(options: CommitOptions): Promise<CommitResult>;
  restartService(service: SshService): Promise<void>;
  reboot(): Promise<void>;
  close(): void;
}

export type FirewallConnector = (
  address: string,
  credentials: FirewallCredentials,
  options: ConnectOptions
) => Promise<FirewallSession>;

export type ConfiguratorStep =
  | 'connect'
  | `check-ciphers:${SshService}`
  | `set-cipher:${SshService}`
  | 'commit'
  | `restart-service:${SshService}`
  | 'reboot';

export interface ApplyResult {
  applied: boolean;
  commit?: CommitResult;
}
