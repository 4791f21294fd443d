import { Command } from 'commander';
import yaml from 'js-yaml';
import { ConfigLoader } from '@drivesort/core';
import type { GlobalOptions } from '../options';

export function registerConfigCommand(program: Command) {
  program
    .command('config')
    .description('Print the effective configuration after all files and defaults are merged')
    .action(() => {
      const globalOpts = program.opts<GlobalOptions>();
      const config = ConfigLoader.load({ configPath: globalOpts.config });

      if (globalOpts.json) {
        console.log(JSON.stringify(config, null, 2));
      } else {
        console.log(`# user config: ${ConfigLoader.userConfigPath()}`);
        console.log(yaml.dump(config).trimEnd());
      }
    });
}
