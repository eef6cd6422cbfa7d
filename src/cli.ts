import { Command, Option } from 'commander';
import { fileURLToPath } from 'node:url';
import { loadTopologyFile } from './graph/index.js';
import { Simulation } from './core/simulation.js';
import { isRelayError } from './core/errors.js';
import { logger, makeLogger, type LogTarget } from './utils/logger.js';
import { collectLinkPairs, parseCount, parseDecimal, parseInteger } from './utils/cli-args.js';

const DEFAULTS = {
  topology: fileURLToPath(new URL('../data/topologies/mars-earth.json', import.meta.url)),
  source: 'mars_rover_1',
  destination: 'earth_station_1',
  message: 'Hello from Mars!',
  errorRate: 0.1,
  disruptionRate: 0.2,
  maxRetries: 3,
  maxPaths: 3,
  bufferCapacity: 10,
  maxDepth: 10,
  runs: 1,
  logLevel: 'info',
  logTarget: 'pino-pretty',
};

interface CliOptions {
  topology: string;
  source: string;
  destination: string;
  message: string;
  errorRate: number;
  disruptionRate: number;
  maxRetries: number;
  maxPaths: number;
  bufferCapacity: number;
  maxDepth: number;
  maxDelay?: number;
  seed?: number;
  runs: number;
  forceDisrupt: Array<[string, string]>;
  logLevel: string;
  logTarget: LogTarget;
  logFile?: string;
}

const program = new Command();

program
  .name('dtn-relay')
  .description('Delay-tolerant network bundle relay simulator')
  .version('1.0.0')
  .option('-t, --topology <file>', 'Topology JSON file', DEFAULTS.topology)
  .option('-s, --source <node>', 'Source node', DEFAULTS.source)
  .option('-d, --destination <node>', 'Destination node', DEFAULTS.destination)
  .option('-m, --message <text>', 'Bundle payload', DEFAULTS.message)
  .option('-e, --error-rate <rate>', 'Per-hop error probability', parseDecimal, DEFAULTS.errorRate)
  .option('-r, --disruption-rate <rate>', 'Per-hop disruption probability', parseDecimal, DEFAULTS.disruptionRate)
  .option('--max-retries <number>', 'Recovery attempts per link', parseInteger, DEFAULTS.maxRetries)
  .option('--max-paths <number>', 'Alternate paths kept per selection', parseInteger, DEFAULTS.maxPaths)
  .option('--buffer-capacity <number>', 'Bundles stored per node', parseInteger, DEFAULTS.bufferCapacity)
  .option('--max-depth <number>', 'Maximum hops per enumerated path', parseInteger, DEFAULTS.maxDepth)
  .option('--max-delay <seconds>', 'Logical delay budget', parseDecimal)
  .option('--seed <number>', 'Random seed', parseInteger)
  .option('-n, --runs <number>', 'Independent runs on the same topology', parseCount, DEFAULTS.runs)
  .option('--force-disrupt <a:b>', 'Link that is always disrupted (repeatable)', collectLinkPairs, [])
  .addOption(
    new Option('--log-level <level>', 'Log level')
      .choices(['fatal', 'error', 'warn', 'info', 'debug', 'trace'])
      .default(DEFAULTS.logLevel)
  )
  .addOption(
    new Option('--log-target <target>', 'Log target')
      .choices(['pino-pretty', 'pino/file'])
      .default(DEFAULTS.logTarget)
  )
  .option('--log-file <path>', 'Log file for the pino/file target (default: logs/dtn-relay-<time>.log)')
  .parse(process.argv);

const opts = program.opts<CliOptions>();

const config = {
  topology: opts.topology,
  source: opts.source,
  destination: opts.destination,
  message: opts.message,
  errorRate: opts.errorRate,
  disruptionRate: opts.disruptionRate,
  maxRetriesPerLink: opts.maxRetries,
  maxAlternatePaths: opts.maxPaths,
  bufferCapacityPerNode: opts.bufferCapacity,
  maxPathDepth: opts.maxDepth,
  maxTotalDelay: opts.maxDelay,
  seed: opts.seed,
  runs: opts.runs,
  forcedDisruptions: opts.forceDisrupt,
  logLevel: opts.logLevel,
  logTarget: opts.logTarget,
  logFile: opts.logFile,
};

async function main(): Promise<void> {
  const log = makeLogger(config.logLevel, config.logTarget, config.logFile);
  log.info({ ...config, forcedDisruptions: config.forcedDisruptions.map((p) => p.join(':')) }, 'configuration');

  const topology = await loadTopologyFile(config.topology);
  log.debug({ nodeCount: topology.getNodeCount(), linkCount: topology.getLinkCount() }, 'topology loaded');

  const simulation = new Simulation(
    topology,
    {
      errorRate: config.errorRate,
      disruptionRate: config.disruptionRate,
      maxRetriesPerLink: config.maxRetriesPerLink,
      maxAlternatePaths: config.maxAlternatePaths,
      bufferCapacityPerNode: config.bufferCapacityPerNode,
      maxPathDepth: config.maxPathDepth,
      forcedDisruptions: config.forcedDisruptions,
      ...(config.maxTotalDelay !== undefined ? { maxTotalDelay: config.maxTotalDelay } : {}),
      ...(config.seed !== undefined ? { seed: config.seed } : {}),
    },
    { logger: log }
  );

  let delivered = 0;
  for (let i = 0; i < config.runs; i++) {
    const stats = simulation.run(config.source, config.destination, config.message);
    if (stats.status === 'Delivered') delivered++;

    log.info({
      run: i + 1,
      status: stats.status,
      reason: stats.reason,
      total_delay_s: stats.totalDelay,
      hops: stats.hopCount,
      retransmissions: stats.totalRetransmissions,
      disruptions: stats.disruptionCount,
      storage_events: stats.storageEvents,
      max_stored_bundles: stats.maxStoredBundles,
      paths_attempted: stats.pathsAttempted,
      paths_available: stats.pathsAvailable,
      final_path: stats.finalPath.join(' -> '),
      path_history: stats.pathHistory.map((a) => `${a.attemptIndex}:${a.status}:${a.path.join('>')}`),
    }, 'run statistics');
  }

  log.info({
    runs: config.runs,
    delivered,
    delivery_rate: config.runs > 0 ? delivered / config.runs : 0,
  }, 'simulation complete');
}

main().catch((error: unknown) => {
  if (isRelayError(error)) {
    logger.error({ code: error.code, message: error.message }, 'simulation rejected');
  } else {
    logger.fatal({ error }, 'simulation failed');
  }
  process.exitCode = 1;
});
