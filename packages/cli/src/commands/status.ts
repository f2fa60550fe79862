import { defineCommand } from 'citty';
import { consola } from 'consola';
import { PeerClient } from '@convoy/transport';
import { formatRelayAddress, parseRelayAddress, toError, type RelayAddress } from '@convoy/types';
import { ConfigError, configPathFor, loadConfig } from '../config.js';
import { createCliLogger } from '../logger.js';

const PROBE_TIMEOUT_MS = 2000;

export const statusCommand = defineCommand({
  meta: {
    name: 'status',
    description: 'Validate the config and check that the relay is reachable',
  },
  args: {
    dir: {
      type: 'positional',
      description: 'Project directory',
      default: '.',
    },
    relay: {
      type: 'string',
      description: 'Relay address (host:port), overrides the config',
    },
  },
  async run({ args }) {
    consola.info('Convoy Status');
    consola.info('='.repeat(40));

    const configPath = configPathFor(args.dir);
    let relay: RelayAddress;
    try {
      const { config, found } = await loadConfig(configPath);
      if (found) {
        consola.success(`Config: ${configPath}`);
      } else {
        consola.warn(`No ${configPath} found. Run \`convoy init\` first. Using defaults.`);
      }
      consola.info(`Tick: ${config.tickMs}ms, peer-loss window: ${config.peerLossTimeoutMs}ms`);
      relay = args.relay ? parseRelayAddress(args.relay) : config.relay;
    } catch (error) {
      consola.error(error instanceof ConfigError ? error.message : toError(error).message);
      process.exitCode = 1;
      return;
    }

    const target = formatRelayAddress(relay);
    const probe = new PeerClient({ connectTimeoutMs: PROBE_TIMEOUT_MS }, createCliLogger('probe'));
    try {
      await probe.connect(relay);
      consola.success(`Relay reachable at ${target}`);
      await probe.disconnect();
    } catch (error) {
      consola.warn(`Relay not reachable at ${target}: ${toError(error).message}`);
      consola.info('Start one with: convoy relay');
      process.exitCode = 1;
    }
  },
});
