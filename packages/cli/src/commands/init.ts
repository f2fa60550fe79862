import { defineCommand } from 'citty';
import { consola } from 'consola';
import { writeFile, mkdir } from 'node:fs/promises';
import { configPathFor, defaultConfig, fileExists } from '../config.js';

export const initCommand = defineCommand({
  meta: {
    name: 'init',
    description: 'Write a convoy.config.json with the default settings',
  },
  args: {
    dir: {
      type: 'positional',
      description: 'Project directory',
      default: '.',
    },
  },
  async run({ args }) {
    const configPath = configPathFor(args.dir);

    if (await fileExists(configPath)) {
      consola.warn(`Config file already exists: ${configPath}`);
      return;
    }

    await mkdir(args.dir, { recursive: true });
    await writeFile(configPath, `${JSON.stringify(defaultConfig(), null, 2)}\n`, 'utf-8');
    consola.success(`Created ${configPath}`);

    consola.info('');
    consola.info('Next steps:');
    consola.info('  1. Start the relay: convoy relay');
    consola.info('  2. In one terminal per vehicle: convoy vehicle --slot <n> --auto-join');
  },
});
