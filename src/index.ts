import { resolve } from "path";
import chalk from "chalk";
import { Command, InvalidArgumentError } from "commander";
import { FatalStartupError, describeError } from "./types/errors";
import { CONFIG_FILE, DEBUG } from "./constants";
import { Logger } from "./services/logger";
import { ConfigStore } from "./services/config";
import { LogWriter } from "./services/logWriter";
import { ProbeExecutor } from "./services/probe";
import { promptDuration } from "./ui/prompt";
import { createPinger } from "./utils/ping";
import { formatMinutes, parseDuration } from "./utils/duration";
import { isValidTarget } from "./utils/target";
import { UptimeMonitor } from "./app";

type CliOptions = {
  config: string;
  duration?: number | null;
  debug?: boolean;
  ui?: boolean;
};

function parseDurationOption(value: string): number | null {
  try {
    return parseDuration(value);
  } catch (error) {
    throw new InvalidArgumentError(describeError(error));
  }
}

// Initialise program
export const program = new Command()
  .name("uptime-probe")
  .description("Network uptime monitor: repeated ping windows logged with latency, jitter and packet loss")
  .argument("[target]", "hostname or IP to ping (overrides the config file for this run)")
  .helpOption("-h, --help", "display help for command")
  .option("-c, --config <path>", "configuration file", CONFIG_FILE)
  .option("-t, --duration <duration>", "test duration in minutes, or like 90s / 2h; 0 for unlimited", parseDurationOption)
  .option("-d, --debug", "enable debug logging")
  .option("-u, --ui", "show the full-screen dashboard instead of status lines");

function printHelpAndExit(extraMsg?: string): never {
  program.addHelpText(
    "after",
    `
Examples:
  $ uptime-probe                      # prompt for a duration, settings from ${CONFIG_FILE}
  $ uptime-probe -t 30 1.1.1.1        # 30 minute run against 1.1.1.1
  $ uptime-probe -t 0 --ui            # run until stopped, with the dashboard
  $ uptime-probe -c ./conf/office.ini -t 2h

${extraMsg ? `\nError: ${extraMsg}` : ""}`
  );

  program.outputHelp();
  process.exit(extraMsg ? 1 : 0);
}

// Application entry point
async function main() {
  program.parse();
  const options = program.opts<CliOptions>();
  const target = program.args[0];
  const debug = options.debug ?? DEBUG;

  const startupLogger = new Logger({ debug });
  let config = new ConfigStore(startupLogger).load(resolve(options.config));

  if (target !== undefined) {
    if (!isValidTarget(target)) {
      printHelpAndExit(`Invalid target "${target}"`);
    }
    config = { ...config, targetHost: target };
  }

  const logger = new Logger({ filePath: resolve(config.errorLogPath), debug });
  const writer = new LogWriter(
    {
      allLogPath: resolve(config.allLogPath),
      failureLogPath: resolve(config.failureLogPath),
      maxLogBytes: config.maxLogBytes,
      maxLogAgeMillis: config.maxLogAgeMillis,
    },
    logger
  );
  await writer.open();

  const executor = new ProbeExecutor(createPinger());
  logger.log(`Using ${executor.pingerName} ping, ${config.probeCount} probes per window, ${config.timeoutMillis}ms timeout`, "DEBUG");

  // Handlers go in before the prompt so Ctrl-C there exits cleanly
  const app = new UptimeMonitor(config, logger, writer, executor, options.ui ?? false);

  let durationMinutes: number | null;
  if (options.duration !== undefined) {
    durationMinutes = options.duration;
  } else {
    try {
      durationMinutes = await promptDuration();
    } catch (error) {
      console.log(describeError(error));
      await writer.close();
      process.exit(0);
    }
  }

  console.log(chalk.bold(`Commence test: ${config.targetHost} for ${formatMinutes(durationMinutes)}`));
  const summary = await app.start(durationMinutes);
  app.finish(summary);
  await logger.flush();
  process.exit(0);
}

try {
  await main();
} catch (error) {
  const fatal = error instanceof FatalStartupError ? error.message : `Failed to start: ${describeError(error)}`;
  console.error(chalk.red(fatal));
  process.exit(1);
}
