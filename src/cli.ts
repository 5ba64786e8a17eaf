import { parseArgs } from 'node:util';
import { loadConfig, type Config, type ConfigOverrides } from './config/index.js';
import type { GeocoderPort } from './ports/GeocoderPort.js';
import type { ForecastPort } from './ports/ForecastPort.js';
import type { WeatherStorePort } from './ports/WeatherStorePort.js';
import { NominatimAdapter } from './adapters/geocoding/NominatimAdapter.js';
import { OpenMeteoAdapter } from './adapters/weather/OpenMeteoAdapter.js';
import { openDatabase } from './persistence/database.js';
import { WeatherDailyRepository } from './persistence/repositories/WeatherDailyRepository.js';
import { MysqlWeatherStore, createMysqlExecutor, type SqlExecutor } from './persistence/mysql/MysqlWeatherStore.js';
import { ForecastService } from './core/forecast/ForecastService.js';
import { IngestService } from './core/ingest/IngestService.js';
import { ExportService } from './core/export/ExportService.js';
import { formatReport } from './core/report/ReportFormatter.js';
import { ConfigError, errorMessage } from './utils/errors.js';
import { isIsoDate, localDateString } from './utils/dates.js';
import { createLogger } from './utils/logger.js';

export const USAGE = `Usage: weather-pipeline <command> [options]

Commands:
  forecast   Geocode the ZIP code and print today's forecast
  ingest     Fetch today's forecast and upsert it into weather_daily
  export     Print the stored record for a ZIP code and date as JSON

Options:
  --zip <code>         5-digit ZIP code (default: $ZIP or 64093)
  --date <YYYY-MM-DD>  export only; default: today in $TIMEZONE
  --db-driver <name>   sqlite or mysql (default: mysql when a mysql option
                       below is given, otherwise sqlite)
  --db-path <file>     sqlite database file
  --db-host <host>     mysql host
  --db-user <user>     mysql user
  --db-pass <pass>     mysql password
  --db-name <name>     mysql database
  -h, --help           Show this help`;

type Command = 'forecast' | 'ingest' | 'export';

const COMMANDS: readonly Command[] = ['forecast', 'ingest', 'export'];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((command) => command === value);
}

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

export interface CliDependencies {
  createGeocoder(config: Config): GeocoderPort;
  createForecastPort(config: Config): ForecastPort;
  openStore(config: Config): Promise<WeatherStorePort>;
  now(): Date;
}

export const defaultIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export async function openStore(
  config: Config,
  createExecutor: (config: Config) => SqlExecutor = createMysqlExecutor
): Promise<WeatherStorePort> {
  if (config.dbDriver === 'mysql') {
    const store = new MysqlWeatherStore(createExecutor(config));
    try {
      await store.ensureSchema();
    } catch (error) {
      await store.close();
      throw error;
    }
    return store;
  }
  return new WeatherDailyRepository(openDatabase(config.databasePath));
}

export const defaultDependencies: CliDependencies = {
  createGeocoder: (config) => new NominatimAdapter(config),
  createForecastPort: (config) => new OpenMeteoAdapter(config),
  openStore: (config) => openStore(config),
  now: () => new Date(),
};

const MYSQL_ONLY_OPTIONS = ['db-host', 'db-user', 'db-pass', 'db-name'] as const;

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      zip: { type: 'string' },
      date: { type: 'string' },
      'db-driver': { type: 'string' },
      'db-path': { type: 'string' },
      'db-host': { type: 'string' },
      'db-user': { type: 'string' },
      'db-pass': { type: 'string' },
      'db-name': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

/** Parse argv, run one phase, and return the process exit code. */
export async function runCli(
  argv: string[],
  io: CliIo = defaultIo,
  deps: CliDependencies = defaultDependencies
): Promise<number> {
  const logger = createLogger({ component: 'cli' });

  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    io.err(`Error: ${errorMessage(error)}`);
    io.err(USAGE);
    return 1;
  }

  const { values, positionals } = parsed;
  if (values.help) {
    io.out(USAGE);
    return 0;
  }

  const [command, ...extra] = positionals;
  if (!isCommand(command) || extra.length > 0) {
    io.err(command ? `Error: unknown command: ${[command, ...extra].join(' ')}` : 'Error: missing command');
    io.err(USAGE);
    return 1;
  }

  let store: WeatherStorePort | undefined;
  try {
    const overrides: ConfigOverrides = {
      zip: values.zip,
      dbDriver: values['db-driver'],
      databasePath: values['db-path'],
      dbHost: values['db-host'],
      dbUser: values['db-user'],
      dbPassword: values['db-pass'],
      dbName: values['db-name'],
    };
    const config = loadConfig(process.env, overrides);

    if (config.dbDriver === 'sqlite') {
      const given = MYSQL_ONLY_OPTIONS.filter((name) => values[name] !== undefined);
      if (given.length > 0) {
        throw new ConfigError(`--${given.join(', --')} cannot be used with --db-driver sqlite`);
      }
    }
    if (values.date !== undefined && command !== 'export') {
      throw new ConfigError('--date only applies to export');
    }

    const zip = config.zip;
    logger.info({ command, zip }, 'Running command');

    if (command === 'export') {
      const date = values.date ?? localDateString(config.timezone, deps.now());
      if (!isIsoDate(date)) {
        throw new ConfigError(`Invalid --date: ${date} (expected YYYY-MM-DD)`);
      }
      store = await deps.openStore(config);
      const exported = await new ExportService(store).run(zip, date);
      io.out(exported ? JSON.stringify(exported, null, 2) : `No data for ${date}.`);
      return 0;
    }

    const forecastService = new ForecastService(
      deps.createGeocoder(config),
      deps.createForecastPort(config),
      { timezone: config.timezone, now: deps.now }
    );

    if (command === 'forecast') {
      const result = await forecastService.run(zip);
      for (const notice of result.notices) io.err(notice.message);
      io.out(
        formatReport(zip, result.location.lat, result.location.lon, result.forecast, result.location.displayName)
      );
      return 0;
    }

    store = await deps.openStore(config);
    const { record, notices } = await new IngestService(forecastService, store).run(zip);
    for (const notice of notices) io.err(notice.message);
    io.out(`Stored forecast for ${record.date} (ZIP ${record.zip}).`);
    return 0;
  } catch (error) {
    logger.error({ err: error, command }, 'Command failed');
    io.err(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    if (store) {
      try {
        await store.close();
      } catch (error) {
        logger.warn({ err: error }, 'Failed to close store');
      }
    }
  }
}
