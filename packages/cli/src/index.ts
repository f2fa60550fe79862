#!/usr/bin/env -S npx tsx
import { defineCommand, runMain } from 'citty';
import { initCommand } from './commands/init.js';
import { relayCommand } from './commands/relay.js';
import { statusCommand } from './commands/status.js';
import { vehicleCommand } from './commands/vehicle.js';

const main = defineCommand({
  meta: {
    name: 'convoy',
    version: '0.1.0',
    description: 'Run a platoon relay and drive simulated platoon vehicles',
  },
  subCommands: {
    relay: relayCommand,
    vehicle: vehicleCommand,
    init: initCommand,
    status: statusCommand,
  },
});

void runMain(main);
