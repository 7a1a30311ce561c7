import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { runCommand } from "./commands/run.js";
import { debugFromEnv } from "./log.js";

const program = new Command();
const cwd = process.cwd();

interface InitOptions {
  force: boolean;
}

interface RunOptions {
  keepOutputs: boolean;
  debug: boolean;
  reportDir: string;
  mediainfo: string;
}

program
  .name("transcode-bench")
  .description(
    "Time an external transcoder over a set of clips at several levels of parallelism",
  )
  .version("0.1.0");

program
  .command("init")
  .description("Scaffold a transcode-tests.yaml file")
  .option("--force", "Overwrite existing tests file", false)
  .action((options: InitOptions) => {
    initCommand(cwd, options.force);
  });

program
  .command("run")
  .description("Run every test and write the results as CSV")
  .argument("<assets>", "Directory searched recursively for .mov clips")
  .argument("<output>", "Directory for copies, transcodes and scratch files")
  .argument("<tests>", "YAML file of test definitions")
  .option("--keep-outputs", "Keep run logs and the output directory contents", false)
  .option("--debug", "Print every command and file operation", false)
  .option("--report-dir <dir>", "Directory for the CSV report", ".")
  .option("--mediainfo <path>", "mediainfo executable to use", "mediainfo")
  .action(async (assets: string, output: string, tests: string, options: RunOptions) => {
    await runCommand(
      cwd,
      { assets, output, tests },
      {
        keepOutputs: options.keepOutputs,
        debug: options.debug || debugFromEnv(),
        reportDir: options.reportDir,
        mediainfo: options.mediainfo,
      },
    );
  });

await program.parseAsync();
