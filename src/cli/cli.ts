import {parseArgs} from 'util';

import type {Config, SetupOptions, SyslogWriter} from '../library/index.js';
import {
  INVALID_ARGUMENT,
  MISSING_CONFIGURATION_ARGUMENT,
  Reporter,
  UNEXPECTED_ERROR,
  UpdateDNSError,
  loadConfig,
  setup,
} from '../library/index.js';
import {getErrorMessage} from '../library/@utils/index.js';

import {SCRIPT_NAME, SCRIPT_VERSION, USAGE} from './@constants.js';

export type CLIOptions = Omit<SetupOptions, 'reporter'> & {
  syslogWriter?: SyslogWriter;
};

type Flags = {
  nocolor: boolean;
  syslog: boolean;
  verbose: boolean;
};

type CommandLine = {
  values: {[TName in keyof Flags | 'help' | 'version']?: boolean};
  positionals: string[];
};

/**
 * Runs one update cycle for the command line arguments and resolves the exit
 * code.
 */
export async function cli(
  args: string[],
  {syslogWriter, ...setupOptions}: CLIOptions = {},
): Promise<number> {
  let parsed: CommandLine;

  try {
    parsed = parseCommandLine(args);
  } catch (error) {
    return usageError(getErrorMessage(error));
  }

  const {values, positionals} = parsed;

  if (values.help) {
    // eslint-disable-next-line no-console
    console.info(USAGE);
    return 0;
  }

  if (values.version) {
    // eslint-disable-next-line no-console
    console.info(SCRIPT_VERSION);
    return 0;
  }

  const [configPath, ...extraArguments] = positionals;

  if (configPath === undefined) {
    return usageError(MISSING_CONFIGURATION_ARGUMENT);
  }

  if (extraArguments.length > 0) {
    return usageError(INVALID_ARGUMENT(extraArguments[0]));
  }

  const flags: Flags = {
    nocolor: values.nocolor ?? false,
    syslog: values.syslog ?? false,
    verbose: values.verbose ?? false,
  };

  let reporter = createReporter(flags, undefined, syslogWriter);

  try {
    const config = await loadConfig(configPath);

    reporter = createReporter(flags, config, syslogWriter);

    const updater = await setup(config, {...setupOptions, reporter});

    await updater.run();

    return 0;
  } catch (error) {
    if (error instanceof UpdateDNSError) {
      reporter.error(error.message);
    } else {
      reporter.error(UNEXPECTED_ERROR(error));
    }

    reporter.debug('cli', error);

    return 1;
  } finally {
    await reporter.flush();
  }
}

function parseCommandLine(args: string[]): CommandLine {
  return parseArgs({
    args,
    options: {
      help: {type: 'boolean', short: 'h'},
      nocolor: {type: 'boolean'},
      syslog: {type: 'boolean'},
      verbose: {type: 'boolean', short: 'v'},
      version: {type: 'boolean'},
    },
    allowPositionals: true,
  });
}

function createReporter(
  {nocolor, syslog, verbose}: Flags,
  {messages = {}}: Partial<Config> = {},
  syslogWriter: SyslogWriter | undefined,
): Reporter {
  return new Reporter({
    name: SCRIPT_NAME,
    color: !nocolor && (messages.send_in_color ?? true),
    syslog: syslog || (messages.send_to_syslog ?? false),
    verbose: verbose || (messages.verbose ?? false),
    syslogWriter,
  });
}

function usageError(message: string): number {
  // eslint-disable-next-line no-console
  console.error(message);
  // eslint-disable-next-line no-console
  console.info(USAGE);
  return 1;
}
