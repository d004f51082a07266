/**
 * Command handlers behind the dupewarden executable
 *
 * Usage:
 *   dupewarden scan <dir>            - Fingerprint files under <dir>
 *   dupewarden plan <dir>            - Show keepers without moving anything
 *   dupewarden resolve <dir>         - Classify, pick keepers, quarantine the rest
 *   dupewarden run <dir>             - scan, then resolve
 *   dupewarden moves                 - List open relocations
 *   dupewarden restore <id>          - Move one quarantined file back
 *   dupewarden restore-all           - Move every quarantined file back
 *   dupewarden stats <dir>           - File and duplicate totals for <dir>
 *   dupewarden config list|get|set   - Persisted scan settings
 */

import { ConfigManager, DEFAULT_CONFIG_PATH, applyEnvironment, createExampleConfig, isDirectoryMode } from './config.js';
import { AppError, configureLogging, errorMessage, handleError } from './logger.js';
import { openWarden } from './pipeline.js';
import { ProgressTracker } from './progress.js';
import { SETTING_KEYS } from './settings.js';
import { IGNORE_CATEGORIES } from './ignore-rules.js';
import { DirectoryMode, ScanSettings } from './types.js';

// ============================================================================
// CLI Argument Parsing
// ============================================================================

export type CliCommand =
  | 'scan'
  | 'plan'
  | 'resolve'
  | 'run'
  | 'moves'
  | 'restore'
  | 'restore-all'
  | 'stats'
  | 'config'
  | 'init-config'
  | 'help';

export interface CliArgs {
  command: CliCommand;
  target?: string;
  moveId?: number;
  configAction?: 'list' | 'get' | 'set';
  configKey?: string;
  configValue?: string;
  configPath: string;
  dbPath?: string;
  quarantineDir?: string;
  mode?: DirectoryMode;
  json: boolean;
  reregister: boolean;
  errors: string[];
}

const COMMANDS: CliCommand[] = [
  'scan', 'plan', 'resolve', 'run', 'moves', 'restore', 'restore-all', 'stats', 'config', 'init-config', 'help'
];

function isCommand(value: string): value is CliCommand {
  return COMMANDS.some(command => command === value);
}

export const PERSISTED_SETTING_KEYS: string[] = [
  SETTING_KEYS.directoryMode,
  SETTING_KEYS.subdirectoryMinFiles,
  SETTING_KEYS.rootMinFiles,
  ...IGNORE_CATEGORIES.map(category => SETTING_KEYS.ignorePrefix + category)
];

/**
 * Reason a value cannot be stored under a persisted setting key, or null
 */
export function validateSettingValue(key: string, value: string): string | null {
  if (key === SETTING_KEYS.directoryMode) {
    return isDirectoryMode(value) ? null : `${key} must be flat or hierarchical`;
  }
  if (key.startsWith(SETTING_KEYS.ignorePrefix)) {
    return value === 'true' || value === 'false' ? null : `${key} must be true or false`;
  }
  return /^\d+$/.test(value) ? null : `${key} must be a non-negative integer`;
}

export function parseArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): CliArgs {
  const result: CliArgs = {
    command: 'help',
    configPath: env.DUPEWARDEN_CONFIG || DEFAULT_CONFIG_PATH,
    json: false,
    reregister: false,
    errors: []
  };

  const positional: string[] = [];
  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--config' || arg === '-c') {
      result.configPath = argv[++i] ?? result.configPath;
    } else if (arg === '--db') {
      result.dbPath = argv[++i];
    } else if (arg === '--quarantine' || arg === '-q') {
      result.quarantineDir = argv[++i];
    } else if (arg === '--mode' || arg === '-m') {
      const mode = argv[++i];
      if (isDirectoryMode(mode)) {
        result.mode = mode;
      } else {
        result.errors.push(`Invalid --mode: ${mode ?? '(missing)'} (expected flat or hierarchical)`);
      }
    } else if (arg === '--json') {
      result.json = true;
    } else if (arg === '--reregister') {
      result.reregister = true;
    } else if (arg === '--help' || arg === '-h') {
      result.command = 'help';
      return result;
    } else if (arg.startsWith('-')) {
      result.errors.push(`Unknown option: ${arg}`);
    } else {
      positional.push(arg);
    }

    i++;
  }

  const [command, ...rest] = positional;
  if (command === undefined) return result;

  if (!isCommand(command)) {
    result.errors.push(`Unknown command: ${command}`);
    return result;
  }
  result.command = command;

  switch (command) {
    case 'scan':
    case 'plan':
    case 'resolve':
    case 'run':
    case 'stats':
      result.target = rest[0];
      if (!result.target) result.errors.push(`${command} needs a directory`);
      break;
    case 'restore': {
      const id = Number(rest[0]);
      if (Number.isInteger(id) && id > 0) {
        result.moveId = id;
      } else {
        result.errors.push(`restore needs a move id, got: ${rest[0] ?? '(missing)'}`);
      }
      break;
    }
    case 'config': {
      const action = rest[0] ?? 'list';
      if (action === 'list' || action === 'get' || action === 'set') {
        result.configAction = action;
      } else {
        result.errors.push(`Unknown config action: ${action}`);
        break;
      }
      result.configKey = rest[1];
      result.configValue = rest[2];
      if (action !== 'list' && !result.configKey) {
        result.errors.push(`config ${action} needs a key`);
      } else if (result.configKey && !PERSISTED_SETTING_KEYS.includes(result.configKey)) {
        result.errors.push(`Unknown setting: ${result.configKey}`);
      }
      if (action === 'set') {
        if (result.configValue === undefined) {
          result.errors.push('config set needs a value');
        } else if (result.configKey && PERSISTED_SETTING_KEYS.includes(result.configKey)) {
          const problem = validateSettingValue(result.configKey, result.configValue);
          if (problem) result.errors.push(problem);
        }
      }
      break;
    }
    case 'init-config':
      result.target = rest[0];
      break;
    default:
      break;
  }

  return result;
}

// ============================================================================
// Formatting
// ============================================================================

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB', 'TB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(2)} ${units[unit]}`;
}

function showHelp(): void {
  console.log(`
dupewarden - find duplicate files, keep one, quarantine the rest

Usage:
  dupewarden <command> [options]

Commands:
  scan <dir>                 Fingerprint files under <dir>
  plan <dir>                 Flag duplicates and show keepers, move nothing
  resolve <dir>              Flag duplicates, keep one per group, quarantine the rest
  run <dir>                  scan followed by resolve
  moves                      List quarantined files
  restore <id>               Move one quarantined file back
  restore-all                Move every quarantined file back
  stats <dir>                File and duplicate totals
  config list|get|set        Persisted scan settings
  init-config [path]         Write an example config file

Options:
  -c, --config <path>        Config file (default ${DEFAULT_CONFIG_PATH})
  --db <path>                Database file
  -q, --quarantine <dir>     Quarantine directory
  -m, --mode <mode>          flat or hierarchical
  --reregister               Record restored files in the store again
  --json                     Machine-readable output
  -h, --help                 Show this help
`);
}

// ============================================================================
// Command Handlers
// ============================================================================

function print(args: CliArgs, value: unknown, text: () => void): void {
  if (args.json) {
    console.log(JSON.stringify(value, null, 2));
  } else {
    text();
  }
}

export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const args = parseArgs(argv, env);

  if (args.errors.length > 0) {
    args.errors.forEach(message => console.error(`Error: ${message}`));
    return 2;
  }

  if (args.command === 'help') {
    showHelp();
    return 0;
  }

  // stdout carries only command output under --json
  const previousLogging = configureLogging({ stderr: args.json });
  try {
    return await execute(args, env);
  } finally {
    configureLogging(previousLogging);
  }
}

async function execute(args: CliArgs, env: NodeJS.ProcessEnv): Promise<number> {
  if (args.command === 'init-config') {
    try {
      createExampleConfig(args.target);
    } catch (error) {
      console.error(`Error: ${errorMessage(handleError(error, 'cli'))}`);
      return 1;
    }
    return 0;
  }

  const manager = new ConfigManager(args.configPath);
  const { errors } = manager.validate();
  if (errors.length > 0) {
    errors.forEach(message => console.error(`Error: ${args.configPath}: ${message}`));
    return 2;
  }

  const config = applyEnvironment(manager.getAll(), env);
  if (args.dbPath) config.paths.databasePath = args.dbPath;
  if (args.quarantineDir) config.paths.quarantineDir = args.quarantineDir;
  configureLogging({ level: config.logLevel });

  const overrides: Partial<ScanSettings> = args.mode ? { directoryMode: args.mode } : {};

  let opened: ReturnType<typeof openWarden>;
  try {
    opened = openWarden(config, overrides);
  } catch (error) {
    const appError = handleError(error, 'cli');
    console.error(`Error: ${appError.message}`);
    return 1;
  }

  const { db, warden } = opened;
  try {
    switch (args.command) {
      case 'scan':
      case 'run': {
        const target = args.target ?? '.';
        const progress: { tracker?: ProgressTracker } = {};
        const scanOptions = args.json
          ? {}
          : {
              onProgress: (processed: number, total: number) => {
                progress.tracker ??= new ProgressTracker({ total, label: 'Scanning' });
                progress.tracker.set(processed);
              }
            };

        if (args.command === 'scan') {
          const scan = await warden.runScan(target, scanOptions);
          progress.tracker?.complete();
          print(args, scan, () => {
            console.log(`${scan.kind === 'full' ? 'Full scan' : 'Incremental scan'} of ${target}`);
            console.log(`  Files recorded: ${scan.processed}`);
            console.log(`  Records removed: ${scan.removed}`);
            console.log(`  Errors: ${scan.errors}`);
            console.log(`  Duration: ${scan.durationSeconds}s`);
            if (scan.errorLog) console.log(`\n${scan.errorLog}`);
          });
          return 0;
        }

        const { scan, resolution } = await warden.run(target, scanOptions);
        progress.tracker?.complete();
        print(args, { scan, resolution }, () => {
          console.log(`Scanned ${scan.processed} files (${scan.errors} errors)`);
          console.log(`Potential duplicates: ${resolution.duplicateCount} of ${resolution.totalFiles}`);
          console.log(`Quarantined: ${resolution.movedCount} (${resolution.moveErrors} errors)`);
          if (resolution.errorLog) console.log(`\n${resolution.errorLog}`);
        });
        return resolution.moveErrors > 0 ? 1 : 0;
      }

      case 'plan': {
        const plan = warden.planResolution(args.target ?? '.');
        print(args, plan.map(group => ({
          contentHash: group.contentHash,
          keeper: group.keeper.path,
          relocate: group.relocate.map(r => r.path)
        })), () => {
          if (plan.length === 0) {
            console.log('No content duplicates found');
          }
          for (const group of plan) {
            console.log(`${group.contentHash}`);
            for (const member of group.scores) {
              const marker = member.record.path === group.keeper.path ? 'keep' : 'move';
              console.log(`  [${marker}] (${member.score}) ${member.record.path}`);
            }
          }
        });
        return 0;
      }

      case 'resolve': {
        const result = await warden.classifyAndResolve(args.target ?? '.');
        print(args, result, () => {
          console.log(`Potential duplicates: ${result.duplicateCount} of ${result.totalFiles}`);
          console.log(`Quarantined: ${result.movedCount} (${result.moveErrors} errors)`);
          if (result.errorLog) console.log(`\n${result.errorLog}`);
        });
        return result.moveErrors > 0 ? 1 : 0;
      }

      case 'moves': {
        const moves = warden.listMoves();
        print(args, moves, () => {
          if (moves.length === 0) console.log('No quarantined files');
          for (const move of moves) {
            console.log(`${String(move.id).padStart(5)}  ${move.originalPath} -> ${move.destinationPath}`);
          }
        });
        return 0;
      }

      case 'restore': {
        const moveId = args.moveId;
        if (moveId === undefined) throw new AppError('restore needs a move id', 'MOVE_NOT_FOUND');
        const result = await warden.restoreOne(moveId, { reregister: args.reregister });
        print(args, result, () => {
          console.log(result.ok
            ? `Restored ${result.move.originalPath}`
            : `Could not restore move ${result.moveId}: ${result.error}`);
        });
        return result.ok ? 0 : 1;
      }

      case 'restore-all': {
        const result = await warden.restoreAll({ reregister: args.reregister });
        print(args, result, () => {
          console.log(`Restored ${result.restoredCount} files (${result.errors} errors)`);
          if (result.errorLog) console.log(`\n${result.errorLog}`);
        });
        return result.errors > 0 ? 1 : 0;
      }

      case 'stats': {
        const totals = warden.getRootTotals(args.target ?? '.');
        print(args, totals, () => {
          console.log(`Files: ${totals.totalFiles} (${formatBytes(totals.totalBytes)})`);
          console.log(`Potential duplicates: ${totals.duplicateFiles} (${formatBytes(totals.duplicateBytes)})`);
          console.log(`Quarantined: ${warden.listMoves().length}`);
        });
        return 0;
      }

      case 'config': {
        if (args.configAction === 'set' && args.configKey && args.configValue !== undefined) {
          db.setSetting(args.configKey, args.configValue);
          console.log(`${args.configKey} = ${args.configValue}`);
        } else if (args.configAction === 'get' && args.configKey) {
          console.log(db.getSetting(args.configKey) ?? '(not set)');
        } else {
          print(args, warden.settings, () => {
            const stored = db.getAllSettings();
            for (const key of PERSISTED_SETTING_KEYS) {
              console.log(`${key} = ${stored[key] ?? '(default)'}`);
            }
          });
        }
        return 0;
      }

      default:
        showHelp();
        return 0;
    }
  } catch (error) {
    console.error(`Error: ${errorMessage(handleError(error, 'cli'))}`);
    return 1;
  } finally {
    db.close();
  }
}
