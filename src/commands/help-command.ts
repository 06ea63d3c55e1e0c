/**
 * Help Command Handler
 */

import { box, color, dim, sectionHeader, subheader } from '../utils/ui';
import { getVersion } from '../utils/version';
import { HomeContext } from '../core/home-context';

/**
 * Print a major section with === borders
 */
function printMajorSection(title: string, subtitles: string[], items: [string, string][]): void {
  console.log(sectionHeader(title));
  for (const subtitle of subtitles) {
    console.log(`  ${dim(subtitle)}`);
  }
  console.log('');

  const maxCmdLen = Math.max(...items.map(([cmd]) => cmd.length));
  for (const [cmd, desc] of items) {
    console.log(`  ${color(cmd.padEnd(maxCmdLen + 2), 'command')} ${desc}`);
  }
  console.log('');
}

function printConfigSection(title: string, items: [string, string][]): void {
  console.log(subheader(`${title}:`));
  const maxLabelLen = Math.max(...items.map(([label]) => label.length));
  for (const [label, value] of items) {
    console.log(`  ${label.padEnd(maxLabelLen)} ${color(value, 'path')}`);
  }
  console.log('');
}

export function handleHelpCommand(home: HomeContext): void {
  console.log(box(`mihomo-manager v${getVersion()}\n\nInstall, run and observe mihomo`, { padding: 0 }));
  console.log('');

  console.log(subheader('Usage:'));
  console.log(`  ${color('mihomo-manager', 'command')} <command> [subcommand] [options]`);
  console.log('');

  printMajorSection(
    'Versions',
    ['Channels: stable, beta, nightly'],
    [
      ['install [version|channel]', 'Install (default: stable); first install becomes default'],
      ['version list', 'Installed versions'],
      ['version list-remote [--limit N]', 'Published releases'],
      ['version install <version> [--default]', 'Install a version or channel'],
      ['version uninstall <version>', 'Remove an installed version'],
      ['version default [version]', 'Show or set the default version'],
    ]
  );

  printMajorSection(
    'Profiles',
    ['YAML configs under configs/; one is current'],
    [
      ['profile list', 'Stored profiles'],
      ['profile use <name>', 'Make a profile current'],
      ['profile show [name]', 'Print a profile (default: current)'],
      ['profile import <name> <file> [--force]', 'Validate and store a file'],
      ['profile delete <name>', 'Remove a profile'],
      ['profile validate [name|file]', 'Check a profile (default: current)'],
      ['profile backup [name] [-m TEXT]', 'Save a timestamped copy (default: current)'],
      ['profile backups [name]', 'Backups, newest first'],
      ['profile restore <id> [--into name] [--no-backup]', 'Write a backup back into a profile'],
      ['profile delete-backup <id>', 'Remove a backup'],
    ]
  );

  printMajorSection(
    'Service',
    ['start, stop, restart and status also work without "service"'],
    [
      ['service start', 'Run the default version with the current profile'],
      ['service stop', 'Stop the running instance'],
      ['service restart', 'Stop, then start with the current selections'],
      ['service status', 'State, version, profile and controller'],
      ['monitor [--policy P]', 'Watch and restart on crash until Ctrl-C'],
    ]
  );

  printMajorSection(
    'Control plane',
    ['Talks to the running instance'],
    [
      ['proxy list', 'Proxies with their last delay'],
      ['proxy groups', 'Groups and their selection'],
      ['proxy switch <group> <proxy>', 'Select a group member'],
      ['proxy test <proxy> [--url U] [--timeout MS]', 'Measure delay'],
      ['proxy batch-test [--group G] [--concurrency N]', 'Measure many delays, fastest first'],
      ['proxy auto-select <group> [--max-delay MS]', 'Select the fastest member (default: 1000 ms)'],
      ['proxy current [group]', 'Current selection'],
      ['connections list', 'Active connections'],
      ['connections close <id>', 'Close one connection'],
      ['connections close-all', 'Close every connection'],
      ['logs [--level L] [--filter S]', 'Stream logs (debug, info, warning, error)'],
      ['traffic', 'Stream throughput'],
      ['memory [--watch]', 'Memory usage, once or streamed'],
    ]
  );

  printMajorSection(
    'Flags',
    [],
    [
      ['--home <dir>', 'Manager home (default: MIHOMO_HOME or platform config dir)'],
      ['--verbose', 'Diagnostic output on stderr (also MIHOMO_VERBOSE=1)'],
      ['--version, -v', 'Show version'],
      ['--help, -h', 'Show this help'],
    ]
  );

  printConfigSection('Paths', [
    ['Home:', home.root],
    ['Settings:', home.settingsFile],
    ['Service log:', home.serviceLogFile],
  ]);
}
