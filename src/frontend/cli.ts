import { Command, CommanderError, OutputConfiguration } from "commander";
import { printMainHelp } from "../utils/help";
import { getAppVersion } from "../utils/versionString";
import { convertCommand } from "./convert";
import { CommandLineOptions, parseDirection } from "./parseOptions";

// Commander throws instead of exiting; runCli turns that into an exit code.
export function buildProgram(output: OutputConfiguration = {}): Command {
  const program: Command = new Command();

  // Disable default help
  program.helpOption(false);
  program.exitOverride();
  program.configureOutput(output);

  program
    .name("cprbin")
    .description("Convert cartridge images between CPR and raw BIN")
    .version(getAppVersion(), "-v, --version", "Output version information")
    .option("--to-bin", "Unpack a CPR container into a flat binary dump")
    .option("--to-cpr", "Pack a flat binary dump into a CPR container")
    .argument("<input>", "Input file")
    .argument("<output>", "Output file")
    .allowExcessArguments(false)
    .action(async (input: string, outputPath: string) => {
      const direction = parseDirection(program.opts<CommandLineOptions>());
      if (!direction.ok) {
        return program.error(`error: ${direction.error}`);
      }
      await convertCommand(direction.value, input, outputPath);
    });

  return program;
}

// returns the process exit code.
export async function runCli(args: string[], output: OutputConfiguration = {}): Promise<number> {
  // no arguments at all is a usage error; asking for help is not.
  if (args.length === 0) {
    printMainHelp();
    return 1;
  }
  if (args.includes("-h") || args.includes("--help")) {
    printMainHelp();
    return 0;
  }

  const program = buildProgram(output);
  try {
    await program.parseAsync(args, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) {
      return e.exitCode;
    }
    throw e;
  }
  return 0;
}
