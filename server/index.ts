import { createServer } from 'node:http';
import { pathToFileURL } from 'node:url';
import { Engine } from '../src/engine.ts';
import { Grid } from '../src/grid.ts';
import { PATTERN_NAMES, getPattern } from '../src/patterns.ts';
import { createRng } from '../src/rng.ts';
import { formatRule, resolveRule } from '../src/rules.ts';
import { USAGE, parseConfig, wantsHelp, type ServerConfig } from './config.ts';
import { readGridFile } from './gridFile.ts';
import { createHttpHandler } from './httpApi.ts';
import { createLogger, describeError, type Logger } from './logger.ts';
import { createPersistence, initDb } from './persistence.ts';
import { SimServer, describeFileError } from './simServer.ts';
import { WsHub } from './wsHub.ts';

export interface RunningServer {
  port: number;
  wsUrl: string;
  httpUrl: string;
  sim: SimServer;
  close: () => Promise<void>;
}

/**
 * Build the engine described by the configuration.
 * @param config - Normalized configuration.
 * @param seed - Seed for a random initial fill.
 * @returns Engine in its configured initial state.
 * @throws RuleParseError for an invalid rule; Error for an unknown pattern or
 *   one larger than a clamped grid.
 */
export function buildEngine(config: ServerConfig, seed: number): Engine {
  const rules = resolveRule(config.rule);
  const grid = new Grid(config.width, config.height, { edge: config.edge });
  const engine = new Engine({ rules, grid, running: !config.startPaused });
  if (config.pattern === 'empty') return engine;
  if (config.pattern === 'random') {
    engine.randomize(createRng(seed), config.density);
    return engine;
  }
  const pattern = getPattern(config.pattern);
  if (!pattern) {
    throw new Error(
      `unknown pattern "${config.pattern}" (expected random, empty or one of ${PATTERN_NAMES.join(', ')})`
    );
  }
  if (grid.edge === 'clamp' && (pattern.width > grid.width || pattern.height > grid.height)) {
    throw new Error(
      `pattern "${config.pattern}" is ${pattern.width}x${pattern.height} and does not fit the ${grid.width}x${grid.height} grid`
    );
  }
  engine.stamp(pattern);
  return engine;
}

export async function startServer(
  config: ServerConfig,
  logger: Logger = createLogger(config.logLevel)
): Promise<RunningServer> {
  const seed = Number.isFinite(config.seed)
    ? (config.seed ?? 0)
    : Math.floor(Math.random() * 1e9);
  const engine = buildEngine(config, seed);
  if (config.loadFile) {
    try {
      engine.replaceGrid(readGridFile(config.loadFile));
      logger.info('server', `loaded ${config.loadFile}`);
    } catch (err) {
      logger.warn('server', `${describeFileError('load', err)}; starting from ${config.pattern}`);
    }
  }

  const db = initDb(config.dbPath);
  const persistence = createPersistence(db);

  let sim: SimServer | null = null;
  const httpServer = createServer();

  const hub = new WsHub(httpServer, () => {
    if (!sim) throw new Error('simulation not ready');
    return sim.buildWelcome();
  }, { logger });
  const simServer = new SimServer(
    engine,
    hub,
    {
      tickRateHz: config.tickRateHz,
      frameRateHz: config.frameRateHz,
      saveFile: config.saveFile,
      density: config.density,
      seed
    },
    logger,
    persistence
  );
  sim = simServer;
  hub.setHandlers({
    onHello: (connId) => simServer.handleHello(connId),
    onCommand: (connId, msg) => simServer.handleCommand(connId, msg)
  });

  httpServer.on('request', createHttpHandler({
    getStatus: () => ({ tick: simServer.getTickId(), clients: hub.getClientCount() }),
    sim: simServer,
    logger
  }));

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      httpServer.off('error', onError);
      reject(err);
    };
    httpServer.once('error', onError);
    httpServer.listen({ port: config.port, host: config.host }, () => {
      httpServer.off('error', onError);
      resolve();
    });
  }).catch((err: unknown) => {
    hub.closeAll();
    db.close();
    throw err;
  });

  const address = httpServer.address();
  const port = typeof address === 'object' && address ? address.port : config.port;

  simServer.start();
  logger.info(
    'server',
    `${formatRule(engine.rules)} on ${engine.grid.width}x${engine.grid.height} (${engine.grid.edge}), ${engine.state}`
  );

  const close = async () => {
    simServer.stop();
    hub.closeAll();
    db.close();
    await new Promise<void>((resolve) => httpServer.close(() => resolve()));
  };

  const host =
    config.host === '0.0.0.0' || config.host === '::' ? 'localhost' : config.host;
  return {
    port,
    wsUrl: `ws://${host}:${port}`,
    httpUrl: `http://${host}:${port}`,
    sim: simServer,
    close
  };
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  if (wantsHelp(argv)) {
    process.stdout.write(USAGE);
    return;
  }
  const config = parseConfig(argv, process.env);
  const logger = createLogger(config.logLevel);
  let server: RunningServer;
  try {
    server = await startServer(config, logger);
  } catch (err) {
    logger.error('server', describeError(err));
    process.exitCode = 1;
    return;
  }
  logger.info('server', `listening on ${server.httpUrl}`);

  let closing = false;
  const shutdown = () => {
    if (closing) return;
    closing = true;
    logger.info('server', 'shutting down');
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error('server', `shutdown failed: ${describeError(err)}`);
        process.exit(1);
      }
    );
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

if (import.meta.url === pathToFileURL(process.argv[1] ?? '').href) {
  main().catch((err) => {
    console.error(err);
    process.exit(1);
  });
}
