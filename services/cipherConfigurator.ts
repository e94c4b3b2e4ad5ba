import { SSH_SERVICES } from '../types.js';
import type {
  ApplyResult,
  CipherConfiguration,
  ConfiguratorStep,
  FirewallConnector,
} from '../types.js';
import { CipherConfiguratorError } from './errors.js';
import { connectToFirewall } from './panosClient.js';

function withStep(error: unknown, step: ConfiguratorStep): CipherConfiguratorError {
  if (error instanceof CipherConfiguratorError) {
    error.step ??= step;
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CipherConfiguratorError(message, { cause: error, step });
}

async function runStep<T>(step: ConfiguratorStep, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (error) {
    throw withStep(error, step);
  }
}

function sameCiphers(current: string[], wanted: string[]): boolean {
  const set = new Set(current);
  return set.size === new Set(wanted).size && wanted.every((cipher) => set.has(cipher));
}

/**
 * Sets the SSH cipher lists of the management and HA services, commits,
 * restarts both SSH services and reboots the firewall.
 *
 * The steps run strictly one after another and the first failure aborts the
 * rest. Nothing is rolled back: a cipher list already set stays in the
 * candidate (or running) configuration. Running this again while the device is
 * still restarting may be rejected or queued by the device, or fail to
 * connect at all.
 */
export async function applyCipherConfiguration(
  config: CipherConfiguration,
  connect: FirewallConnector = connectToFirewall
): Promise<ApplyResult> {
  console.log(`Connecting to firewall ${config.address}...`);
  const session = await runStep('connect', () =>
    connect(config.address, config.credentials, {
      protocol: config.protocol,
      requestTimeoutMs: config.requestTimeoutMs,
    })
  );

  try {
    if (config.skipIfApplied) {
      let applied = true;
      for (const service of SSH_SERVICES) {
        console.log(`Checking ${service} ciphers...`);
        const current = await runStep(`check-ciphers:${service}`, () => session.getCiphers(service));
        applied &&= sameCiphers(current, config.ciphers[service]);
      }
      if (applied) {
        console.log('Ciphers match, nothing to do.');
        return { applied: false };
      }
      console.log('Ciphers need to be set...');
    }

    for (const service of SSH_SERVICES) {
      console.log(`Setting ${service} ciphers: ${config.ciphers[service].join(', ')}`);
      await runStep(`set-cipher:${service}`, () => session.setCipher(service, config.ciphers[service]));
    }

    console.log('Committing config...');
    const commit = await runStep('commit', () => session.commit(config.commit));
    console.log('Commit Status:');
    commit.messages.forEach((message) => console.log(message));

    for (const service of SSH_SERVICES) {
      console.log(`Restarting ${service} service...`);
      await runStep(`restart-service:${service}`, () => session.restartService(service));
    }

    console.log('Restarting system...');
    await runStep('reboot', () => session.reboot());

    return { applied: true, commit };
  } finally {
    session.close();
  }
}
