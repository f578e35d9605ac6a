import 'dotenv/config';
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { Command } from 'commander';
import { registerConfigCommand } from './commands/config-cmd.js';
import { registerStressCommand } from './commands/stress-cmd.js';
import { resolveLogLevel } from '../config/resolver.js';
import { log } from '../utils/logger.js';

function readPackageVersion(): string {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = path.dirname(__filename);
  const packageJsonPath = path.join(__dirname, '..', '..', 'package.json');
  const packageJson: unknown = JSON.parse(fs.readFileSync(packageJsonPath, 'utf8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return '0.0.0';
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();

  program
    .name('rwlock-bridge')
    .description('Async reader/writer locks over synchronous primitives, with a cross-thread stress harness')
    .version(readPackageVersion())
    .option('-q, --quiet', 'only log warnings and errors');

  const level = resolveLogLevel();
  if (level !== undefined) {
    log.setLevel(level);
  }

  program.hook('preAction', () => {
    if (program.opts<{ quiet?: boolean }>().quiet) {
      log.setQuiet(true);
    }
  });

  registerStressCommand(program);
  registerConfigCommand(program);

  if (!argv || argv.length <= 2) {
    program.help();
    return;
  }

  await program.parseAsync(argv);
}
