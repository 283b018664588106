import { Command, CommanderError } from "commander";
import { CLI_NAME, DEFAULT_PLATFORM_CONFIG_PATH } from "../config/constants.js";
import { loadEnv, type EnvConfig } from "../config/env.js";
import { errorMessage } from "../errors/updaterErrors.js";
import { FilePlatformConfigStore } from "../platformConfig/platformConfigStore.js";
import { buildConfigCommand, PlatformConfigCommands, type Print } from "./configCommands.js";

export interface ProgramIo {
  print: Print;
  env: NodeJS.ProcessEnv;
  /** Starts the engine; the process entry point passes `runUpdater`. */
  run: (env: EnvConfig) => Promise<void>;
}

export function createProgram(io: ProgramIo): Command {
  const program = new Command()
    .name(CLI_NAME)
    .description("VM auto-updater and configuration manager")
    .version("0.1.0");

  program
    .command("run")
    .description("Start the auto-updater service")
    .action(() => io.run(loadEnv(io.env)));

  const settingsPath = () => (io.env.PLATFORM_CONFIG_PATH ?? "").trim() || DEFAULT_PLATFORM_CONFIG_PATH;
  program.addCommand(
    buildConfigCommand(() => new PlatformConfigCommands(new FilePlatformConfigStore(settingsPath()), io.print))
  );

  return program;
}

export interface CliIo extends ProgramIo {
  printError: Print;
  exit: (code: number) => void;
}

/**
 * Process entry: parses `argv` (node, script, ...args) and maps every failure to
 * a message on stderr and exit status 1. Commander's own usage errors keep the
 * exit code commander chose (0 for --help and --version).
 */
export async function runCli(argv: string[], io: CliIo): Promise<void> {
  const program = createProgram(io)
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.print(text.trimEnd()),
      writeErr: (text) => io.printError(text.trimEnd())
    });

  try {
    await program.parseAsync(argv);
  } catch (err) {
    if (err instanceof CommanderError) {
      io.exit(err.exitCode);
      return;
    }
    io.printError(`Error: ${errorMessage(err)}`);
    io.exit(1);
  }
}
