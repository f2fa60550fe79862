import { defineCommand } from 'citty';
import { consola } from 'consola';
import { createInterface } from 'node:readline';
import { z } from 'zod';
import { SimWorld, isBlueprintName, BLUEPRINT_NAMES, type SimVehicle } from '@convoy/sim';
import { PeerClient } from '@convoy/transport';
import { OPERATOR_USAGE, VehicleSession, parseOperatorCommand, type OperatorCommand } from '@convoy/platoon';
import { describeRole, formatRelayAddress, parseRelayAddress, toError, type RelayAddress } from '@convoy/types';
import { ConfigError, configPathFor, loadConfig, type LoadedConfig } from '../config.js';
import { createCliLogger, enableVerbose } from '../logger.js';

const NumericArgsSchema = z.object({
  slot: z.coerce.number().int().nonnegative().optional(),
  gap: z.coerce.number().positive().optional(),
  speed: z.coerce.number().nonnegative().optional(),
  tick: z.coerce.number().int().positive().optional(),
});

export const vehicleCommand = defineCommand({
  meta: {
    name: 'vehicle',
    description: 'Spawn a simulated vehicle and drive it as a platoon member',
  },
  args: {
    relay: {
      type: 'string',
      description: 'Relay address (host:port), overrides the config',
    },
    blueprint: {
      type: 'string',
      description: `Vehicle blueprint (${BLUEPRINT_NAMES.join(', ')})`,
    },
    slot: {
      type: 'string',
      description: 'Formation slot to spawn in (default: first free slot)',
    },
    gap: {
      type: 'string',
      description: 'Target gap to the predecessor, metres',
    },
    speed: {
      type: 'string',
      description: 'Cruise speed while leading, m/s',
    },
    tick: {
      type: 'string',
      description: 'Control loop period, ms',
    },
    config: {
      type: 'string',
      description: 'Path to convoy.config.json',
    },
    'auto-join': {
      type: 'boolean',
      description: 'Join the platoon right after connecting',
      default: false,
    },
    'peer-id': {
      type: 'string',
      description: 'Platoon peer id (default: random)',
    },
    verbose: {
      type: 'boolean',
      description: 'Debug logging',
      default: false,
    },
  },
  async run({ args }) {
    enableVerbose(args.verbose);

    // ─── Settings ────────────────────────────────────────────────────────

    let relayAddress: RelayAddress;
    let numeric: z.infer<typeof NumericArgsSchema>;
    let loaded: LoadedConfig;
    try {
      loaded = await loadConfig(args.config ?? configPathFor('.'), { required: args.config !== undefined });
      relayAddress = args.relay ? parseRelayAddress(args.relay) : loaded.config.relay;
      numeric = NumericArgsSchema.parse({ slot: args.slot, gap: args.gap, speed: args.speed, tick: args.tick });
    } catch (error) {
      consola.error(error instanceof ConfigError ? error.message : `Invalid arguments: ${toError(error).message}`);
      process.exit(1);
    }

    const { config } = loaded;
    const blueprint = args.blueprint ?? config.blueprint;
    if (!isBlueprintName(blueprint)) {
      consola.error(`Unknown blueprint "${blueprint}". Choose one of: ${BLUEPRINT_NAMES.join(', ')}`);
      process.exit(1);
    }
    const tickMs = numeric.tick ?? config.tickMs;

    // ─── Vehicle ─────────────────────────────────────────────────────────

    const world = new SimWorld({ logger: createCliLogger('sim') });
    let vehicle: SimVehicle;
    try {
      vehicle =
        numeric.slot === undefined
          ? world.spawnInFormation(blueprint).vehicle
          : world.spawn(blueprint, world.slotLocation(numeric.slot));
    } catch (error) {
      consola.error('Failed to spawn vehicle:', toError(error).message);
      process.exit(1);
    }
    world.start(tickMs);

    // ─── Session ─────────────────────────────────────────────────────────

    const client = new PeerClient(
      { reconnect: config.reconnect, retryInitialConnect: true },
      createCliLogger('client')
    );
    const session = new VehicleSession({
      vehicle,
      client,
      relay: relayAddress,
      peerId: args['peer-id'],
      tickMs,
      stalenessTimeoutMs: config.stalenessTimeoutMs,
      peerLossTimeoutMs: config.peerLossTimeoutMs,
      controller: {
        ...config.controller,
        ...(numeric.gap === undefined ? {} : { targetGap: numeric.gap }),
        ...(numeric.speed === undefined ? {} : { targetSpeed: numeric.speed }),
      },
      logger: createCliLogger('session'),
    });

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    rl.setPrompt('convoy> ');

    let exiting = false;
    const shutdown = async (code: number) => {
      if (exiting) return;
      exiting = true;
      try {
        await session.stop();
      } catch (error) {
        consola.error('Shutdown failed:', toError(error).message);
        code = 1;
      }
      world.stop();
      rl.close();
      process.exit(code);
    };

    session.on('roleChanged', (role) => {
      consola.info(`Role: ${describeRole(role)}`);
      rl.prompt(true);
    });
    session.on('membershipChanged', (members) => {
      consola.info(`Platoon: [${members.join(', ')}]`);
      rl.prompt(true);
    });
    session.on('predecessorStale', (error) => consola.warn(error.message));
    session.on('linkDown', (reason) => consola.warn(`Relay link down (${reason}), braking until it returns`));
    session.on('linkUp', () => consola.success('Relay link restored'));
    session.on('disconnected', (error) => {
      consola.error(error.message);
      void shutdown(1);
    });
    session.on('terminated', (error) => {
      consola.error(`Vehicle lost: ${error.message}`);
      void shutdown(1);
    });
    session.on('left', () => consola.success('Left the platoon'));
    session.on('error', (error) => consola.error(error.message));

    consola.start(`Connecting ${vehicle.id} (${blueprint}) to ${formatRelayAddress(relayAddress)}`);
    try {
      await session.start();
    } catch (error) {
      consola.error(toError(error).message);
      world.stop();
      rl.close();
      process.exit(1);
    }
    consola.success('Connected. Type "help" for commands.');

    if (args['auto-join']) {
      session.join();
    }

    // ─── Console ─────────────────────────────────────────────────────────

    const handle = (command: OperatorCommand) => {
      switch (command.kind) {
        case 'help':
          consola.log(OPERATOR_USAGE);
          return;
        case 'status': {
          const status = session.getStatus();
          consola.box(
            [
              `Peer:     ${status.peerId ?? '(not joined)'}`,
              `Role:     ${describeRole(status.role)}`,
              `Platoon:  [${status.members.join(', ')}]`,
              `Mode:     ${status.mode}${status.muted ? ' (muted)' : ''}`,
              `Link:     ${status.linkUp ? 'up' : 'down'}`,
              `Gap:      ${status.targetGap} m`,
              `Speed:    ${status.targetSpeed} m/s${status.profile ? ` (profile ${status.profile})` : ''}`,
            ].join('\n')
          );
          return;
        }
        case 'leave':
          void shutdown(0);
          return;
        default:
          session.submit(command).catch((error) => consola.error(toError(error).message));
      }
    };

    rl.on('line', (line) => {
      const parsed = parseOperatorCommand(line);
      if (parsed.ok) {
        handle(parsed.command);
      } else {
        consola.warn(parsed.error);
      }
      if (!exiting) rl.prompt();
    });
    rl.on('close', () => void shutdown(0));
    rl.on('SIGINT', () => void shutdown(0));
    process.on('SIGTERM', () => void shutdown(0));

    rl.prompt();
  },
});
