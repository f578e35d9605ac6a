import { Command } from 'commander';
import chalk from 'chalk';
import { getConfigSources, getGlobalConfigPath, getProjectConfigPath, loadConfig } from '../../config/loader.js';
import { resolveLockSettings } from '../../config/resolver.js';
import type { RwlockBridgeConfig } from '../../config/types.js';
import { print } from '../../utils/logger.js';

function displayConfig(config: RwlockBridgeConfig | null, title: string): void {
  if (!config || Object.keys(config).length === 0) {
    print(chalk.gray(`  ${title}: (empty)`));
    return;
  }

  print(chalk.bold(`  ${title}:`));
  print(`  ${JSON.stringify(config, null, 2).split('\n').join('\n  ')}`);
}

export function registerConfigCommand(program: Command): void {
  program
    .command('config')
    .description('Show the resolved configuration')
    .option('--sources', 'show each configuration source separately')
    .option('--project <path>', 'project directory', '.')
    .option('--json', 'print JSON only')
    .action((options: { sources?: boolean; project: string; json?: boolean }) => {
      const basePath = options.project;
      const resolved = { ...loadConfig(basePath), lock: resolveLockSettings(basePath) };

      if (options.json) {
        print(JSON.stringify(resolved, null, 2));
        return;
      }

      if (options.sources) {
        const sources = getConfigSources(basePath);
        print(chalk.cyan.bold('\nConfiguration sources\n'));
        print(chalk.gray(`  global:  ${getGlobalConfigPath()}`));
        print(chalk.gray(`  project: ${getProjectConfigPath(basePath)}\n`));
        displayConfig(sources.global, 'Global');
        displayConfig(sources.project, 'Project');
        displayConfig(sources.env, 'Environment');
        print('');
      }

      print(chalk.cyan.bold('Resolved configuration'));
      print(JSON.stringify(resolved, null, 2));
    });
}
