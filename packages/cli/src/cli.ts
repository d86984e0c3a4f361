// ============================================================================
// bluefind — CLI Surface
// A fresh context is built for every invocation; nothing is shared between runs
// ============================================================================
import { Command, CommanderError } from 'commander';
import type { CommandEvent, DeviceAction } from '@bluefind/shared';
import { ActionDispatcher } from './actions/dispatcher.js';
import { SpawnRunner, type CommandRunner } from './bluetooth/runner.js';
import { BluetoothService } from './bluetooth/service.js';
import { runAction, runList, runStatus, type CommandContext, type ListOptions } from './commands.js';
import { parseThreshold, resolveConfig, type GlobalOptions } from './config.js';
import { BluefindError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { createPalette } from './presentation/palette.js';
import { ReadlinePrompter, type Prompter } from './prompt/prompter.js';

export const VERSION = '0.1.0';

export interface CliDependencies {
  runner?: CommandRunner;
  createPrompter?: () => Prompter;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
}

function buildContext(opts: GlobalOptions, deps: CliDependencies): CommandContext {
  const config = resolveConfig(opts);
  const palette = createPalette(config.color);
  const logger = createLogger({ verbose: config.verbose, palette, write: deps.stderr ?? console.error });
  const service = new BluetoothService({
    runner: deps.runner ?? new SpawnRunner(),
    blueutilPath: config.blueutilPath,
    audioToolPath: config.audioToolPath,
  });

  if (config.verbose) {
    service.on('command', (e: CommandEvent) => {
      logger.debug(`${e.command} ${e.args.join(' ')} → exit ${e.status ?? 'none'}`);
    });
  }

  return {
    config,
    service,
    dispatcher: new ActionDispatcher(service),
    palette,
    logger,
    createPrompter: deps.createPrompter ?? (() => new ReadlinePrompter()),
    print: deps.stdout ?? console.log,
  };
}

export function createProgram(deps: CliDependencies, onContext: (ctx: CommandContext) => void, setExitCode: (code: number) => void): Command {
  const program = new Command();
  const contextFor = (cmd: Command) => {
    const ctx = buildContext(cmd.optsWithGlobals<GlobalOptions>(), deps);
    onContext(ctx);
    return ctx;
  };

  program
    .name('bluefind')
    .description('List, inspect and connect paired Bluetooth devices by (partial) name')
    .version(VERSION)
    .option('--blueutil <path>', 'blueutil executable to invoke')
    .option('--audio-tool <path>', 'SwitchAudioSource executable used for the audio output')
    .option('--threshold <score>', 'minimum fuzzy score (0-1] for a name to match', parseThreshold)
    .option('--no-color', 'disable colored output')
    .option('-v, --verbose', 'log every blueutil call to stderr')
    .exitOverride()
    .configureOutput({
      writeOut: (str) => (deps.stdout ?? console.log)(str.trimEnd()),
      writeErr: (str) => (deps.stderr ?? console.error)(str.trimEnd()),
    });

  program
    .command('list')
    .description('List paired devices and their connection state')
    .option('--json', 'print devices as JSON')
    .option('--connected', 'only show connected devices')
    .action((opts: ListOptions, cmd: Command) => {
      setExitCode(runList(contextFor(cmd), opts));
    });

  program
    .command('status')
    .description('Show power, discoverability, audio output and paired devices')
    .option('--json', 'print status as JSON')
    .action((opts: { json?: boolean }, cmd: Command) => {
      setExitCode(runStatus(contextFor(cmd), opts));
    });

  const actions: Array<[DeviceAction, string]> = [
    ['connect', 'Connect to the paired device best matching <name>'],
    ['disconnect', 'Disconnect the paired device best matching <name>'],
  ];
  for (const [action, description] of actions) {
    program
      .command(`${action} <name...>`)
      .description(description)
      .action(async (words: string[], _opts: unknown, cmd: Command) => {
        setExitCode(await runAction(contextFor(cmd), action, words.join(' ')));
      });
  }

  return program;
}

/** Runs one invocation and resolves to its exit code. `argv` excludes the node and script paths. */
export async function run(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const state: { exitCode: number; logger?: Logger } = { exitCode: 0 };
  const program = createProgram(deps, (ctx) => { state.logger = ctx.logger; }, (code) => { state.exitCode = code; });

  try {
    await program.parseAsync(argv, { from: 'user' });
    return state.exitCode;
  } catch (err) {
    if (err instanceof CommanderError) return err.exitCode;

    const log = state.logger ?? createLogger({ verbose: false, palette: createPalette(false), write: deps.stderr ?? console.error });
    if (err instanceof BluefindError) {
      log.error(err.message);
      return err.exitCode;
    }
    log.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
