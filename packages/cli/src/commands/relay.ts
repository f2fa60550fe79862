import { defineCommand } from 'citty';
import { consola } from 'consola';
import { z } from 'zod';
import { MessageRelay } from '@convoy/relay';
import { formatRelayAddress } from '@convoy/types';
import { ConfigError, configPathFor, loadConfig } from '../config.js';
import { createCliLogger, enableVerbose } from '../logger.js';

const PortSchema = z.coerce.number().int().min(0).max(65535);

export const relayCommand = defineCommand({
  meta: {
    name: 'relay',
    description: 'Run the message relay every vehicle connects to',
  },
  args: {
    host: {
      type: 'string',
      description: 'Interface to listen on (default from config, else 127.0.0.1)',
    },
    port: {
      type: 'string',
      description: 'Port to listen on (default from config, else 52384)',
    },
    config: {
      type: 'string',
      description: 'Path to convoy.config.json',
    },
    verbose: {
      type: 'boolean',
      description: 'Log every forwarded frame',
      default: false,
    },
  },
  async run({ args }) {
    enableVerbose(args.verbose);

    let host: string;
    let port: number;
    try {
      const { config } = await loadConfig(args.config ?? configPathFor('.'), { required: args.config !== undefined });
      host = args.host ?? config.relay.host;
      port = args.port === undefined ? config.relay.port : PortSchema.parse(args.port);
    } catch (error) {
      consola.error(error instanceof ConfigError ? error.message : `Invalid --port: ${args.port}`);
      process.exit(1);
    }

    const relay = new MessageRelay({ host, port }, createCliLogger('relay'));

    relay.on('peerConnected', (peer) => {
      consola.success(`Peer connected: ${peer.id} (${peer.remoteAddr})`);
    });
    relay.on('peerDisconnected', (peerId, reason) => {
      consola.warn(`Peer disconnected: ${peerId} (${reason})`);
    });
    relay.on('forwarded', (fromPeerId, recipients, bytes) => {
      consola.debug(`${fromPeerId} -> ${recipients} peers (${bytes} bytes)`);
    });
    relay.on('error', ({ peerId, error }) => {
      consola.error(`Relay error${peerId ? ` on ${peerId}` : ''}:`, error);
    });

    const shutdown = async () => {
      consola.info('Shutting down...');
      await relay.stop();
      consola.success('Stopped');
      process.exit(0);
    };

    process.on('SIGINT', () => void shutdown());
    process.on('SIGTERM', () => void shutdown());

    try {
      const address = await relay.start();
      consola.start(`Relay listening on ${formatRelayAddress(address)}`);
    } catch (error) {
      consola.error('Failed to start:', error);
      process.exit(1);
    }
  },
});
