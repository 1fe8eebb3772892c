#!/usr/bin/env node
import { Command } from 'commander';
import { doctorCommand } from './commands/doctor.js';
import { readPackageVersion } from './commands/version.js';

interface CliOptions {
  interface?: string;
  lookupInterface: boolean;
  settings?: string;
  nonInteractive: boolean;
  verbose: boolean;
}

const program = new Command();

program
  .name('tunnel-doctor')
  .description('Diagnose a WireGuard-style tunnel that is not passing traffic')
  .version(readPackageVersion(), '-V, --version')
  .argument('<config>', 'Path to the tunnel .conf file')
  .option('--interface <name>', 'Interface to inspect (default: config file name without extension)')
  .option('--lookup-interface', 'Find the interface from live state by the peer public key', false)
  .option('--settings <path>', 'Path to tunnel-doctor.config.json')
  .option('--non-interactive', 'Answer every question with its default', false)
  .option('--verbose', 'Print external commands as they run', false)
  .action(async (configPath: string, options: CliOptions) => {
    await doctorCommand({
      configPath,
      interfaceName: options.interface,
      lookupInterface: options.lookupInterface,
      settings: options.settings,
      nonInteractive: options.nonInteractive,
      verbose: options.verbose
    });
  });

await program.parseAsync();
