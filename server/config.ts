import fs from 'node:fs';
import { parse as parseToml } from 'smol-toml';
import { isEdgePolicy, type EdgePolicy } from '../src/grid.ts';
import { DEFAULT_RULE } from '../src/rules.ts';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ServerConfig {
  host: string;
  port: number;
  tickRateHz: number;
  frameRateHz: number;
  /** Rule string or preset name; validated when the engine is built. */
  rule: string;
  width: number;
  height: number;
  edge: EdgePolicy;
  /** Built-in pattern name, "random" or "empty". */
  pattern: string;
  density: number;
  startPaused: boolean;
  saveFile: string;
  loadFile?: string;
  dbPath: string;
  logLevel: LogLevel;
  seed?: number;
}

export const DEFAULT_CONFIG: ServerConfig = {
  host: '127.0.0.1',
  port: 5180,
  tickRateHz: 20,
  frameRateHz: 20,
  rule: DEFAULT_RULE,
  width: 120,
  height: 80,
  edge: 'clamp',
  pattern: 'glider',
  density: 0.3,
  startPaused: false,
  saveFile: './lifegrid_save.lgrd',
  dbPath: './data/lifegrid.db',
  logLevel: 'info'
};

export const USAGE = `lifegrid - a 2D cellular automaton server

Usage: lifegrid [RULE] [options]

RULE is B<digits>/S<digits> (digits 0-8) or a preset name such as
life, highlife, seeds, daynight or maze. Default: ${DEFAULT_RULE}.

Options:
  --rule <rule>         Same as the positional RULE
  --width <n>           Grid width in cells (default ${DEFAULT_CONFIG.width})
  --height <n>          Grid height in cells (default ${DEFAULT_CONFIG.height})
  --edge <clamp|wrap>   Edge policy (default ${DEFAULT_CONFIG.edge})
  --pattern <name>      Initial pattern, "random" or "empty" (default ${DEFAULT_CONFIG.pattern})
  --density <0..1>      Live fraction for random fills (default ${DEFAULT_CONFIG.density})
  --seed <n>            Seed for random fills
  --paused              Start paused
  --save-file <path>    Save file used by save/load (default ${DEFAULT_CONFIG.saveFile})
  --load-file <path>    Load this save file at startup
  --db-path <path>      Snapshot database (default ${DEFAULT_CONFIG.dbPath})
  --host <host>         Bind host (default ${DEFAULT_CONFIG.host})
  --port <n>            Bind port (default ${DEFAULT_CONFIG.port})
  --tick <hz>           Generations per second while running (default ${DEFAULT_CONFIG.tickRateHz})
  --frame-rate <hz>     Frame broadcasts per second (default ${DEFAULT_CONFIG.frameRateHz})
  --log <level>         debug, info, warn or error (default ${DEFAULT_CONFIG.logLevel})
  --config <file>       TOML file with any of the settings above
  -h, --help            Show this help

Controls (WebSocket messages): toggle, pause, resume, step, clear,
randomize, save, load.
`;

type Env = Record<string, string | undefined>;

/** Unvalidated settings from a file, the environment or argv. */
export type ConfigInput = { [K in keyof ServerConfig]?: unknown };

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Flags that take a value; used to tell the positional rule apart from flag values. */
const VALUE_FLAGS = new Set([
  '--rule',
  '--width',
  '--height',
  '--edge',
  '--pattern',
  '--density',
  '--seed',
  '--save-file',
  '--load-file',
  '--db-path',
  '--host',
  '--port',
  '--tick',
  '--frame-rate',
  '--log',
  '--config'
]);

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

function parseIntValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function parseFloatValue(raw: string | undefined): number | undefined {
  if (raw == null) return undefined;
  const parsed = Number.parseFloat(raw);
  if (!Number.isFinite(parsed)) return undefined;
  return parsed;
}

function parseBoolValue(raw: string | undefined): boolean | undefined {
  if (raw == null) return undefined;
  const value = raw.trim().toLowerCase();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return undefined;
}

function getArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg === flag) {
      return argv[i + 1];
    }
    if (arg.startsWith(prefix)) {
      return arg.slice(prefix.length);
    }
  }
  return undefined;
}

function hasFlag(argv: string[], flag: string): boolean {
  return argv.includes(flag);
}

/**
 * Find the first argument that is neither a flag nor a flag's value.
 * @param argv - Raw arguments.
 * @returns Positional argument or undefined.
 */
function getPositional(argv: string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (!arg) continue;
    if (arg.startsWith('-')) {
      if (VALUE_FLAGS.has(arg)) i++;
      continue;
    }
    return arg;
  }
  return undefined;
}

export function wantsHelp(argv: string[]): boolean {
  return hasFlag(argv, '--help') || hasFlag(argv, '-h');
}

function coerceInt(
  name: string,
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  warn?: (msg: string) => void
): number {
  if (value === undefined || value === null) {
    return fallback;
  }
  let parsed: number;
  if (typeof value === 'number') {
    parsed = value;
  } else if (typeof value === 'string') {
    parsed = Number.parseInt(value, 10);
  } else {
    parsed = Number.NaN;
  }
  if (!Number.isFinite(parsed)) {
    warn?.(`${name} is invalid; using ${fallback}.`);
    return fallback;
  }
  const clamped = clampInt(Math.floor(parsed), min, max);
  if (clamped !== parsed) {
    warn?.(`${name} was clamped to ${clamped}.`);
  }
  return clamped;
}

function coerceString(
  name: string,
  value: unknown,
  fallback: string,
  warn?: (msg: string) => void
): string {
  if (value === undefined) return fallback;
  if (typeof value === 'string' && value.trim()) return value.trim();
  warn?.(`${name} is invalid; using ${fallback}.`);
  return fallback;
}

export function normalizeConfig(
  input: ConfigInput,
  warn?: (msg: string) => void
): ServerConfig {
  const host = coerceString('host', input.host, DEFAULT_CONFIG.host, warn);
  const port = coerceInt('port', input.port, DEFAULT_CONFIG.port, 0, 65535, warn);
  const tickRateHz = coerceInt(
    'tickRateHz',
    input.tickRateHz,
    DEFAULT_CONFIG.tickRateHz,
    1,
    240,
    warn
  );
  let frameRateHz = coerceInt(
    'frameRateHz',
    input.frameRateHz,
    DEFAULT_CONFIG.frameRateHz,
    1,
    120,
    warn
  );
  if (frameRateHz > tickRateHz) {
    warn?.('frameRateHz exceeded tickRateHz; clamping to tickRateHz.');
    frameRateHz = tickRateHz;
  }
  const width = coerceInt('width', input.width, DEFAULT_CONFIG.width, 1, 4096, warn);
  const height = coerceInt('height', input.height, DEFAULT_CONFIG.height, 1, 4096, warn);

  let edge = DEFAULT_CONFIG.edge;
  if (isEdgePolicy(input.edge)) {
    edge = input.edge;
  } else if (input.edge !== undefined) {
    warn?.(`edge "${String(input.edge)}" is invalid; using ${edge}.`);
  }

  const rule = coerceString('rule', input.rule, DEFAULT_CONFIG.rule, warn);
  const pattern = coerceString('pattern', input.pattern, DEFAULT_CONFIG.pattern, warn).toLowerCase();

  let density = DEFAULT_CONFIG.density;
  if (typeof input.density === 'number' && Number.isFinite(input.density)) {
    density = Math.min(1, Math.max(0, input.density));
    if (density !== input.density) warn?.(`density was clamped to ${density}.`);
  } else if (input.density !== undefined) {
    warn?.(`density is invalid; using ${density}.`);
  }

  const startPaused = typeof input.startPaused === 'boolean'
    ? input.startPaused
    : DEFAULT_CONFIG.startPaused;
  const saveFile = coerceString('saveFile', input.saveFile, DEFAULT_CONFIG.saveFile, warn);
  const dbPath = coerceString('dbPath', input.dbPath, DEFAULT_CONFIG.dbPath, warn);

  let logLevel = DEFAULT_CONFIG.logLevel;
  if (isLogLevel(input.logLevel)) {
    logLevel = input.logLevel;
  } else if (input.logLevel !== undefined) {
    warn?.(`logLevel "${String(input.logLevel)}" is invalid; using ${logLevel}.`);
  }

  let seed: number | undefined;
  if (input.seed !== undefined) {
    const parsedSeed =
      typeof input.seed === 'number'
        ? input.seed
        : Number.parseInt(String(input.seed), 10);
    if (Number.isFinite(parsedSeed)) {
      seed = Math.floor(parsedSeed);
    } else {
      warn?.('seed is invalid; ignoring.');
    }
  }

  const output: ServerConfig = {
    host,
    port,
    tickRateHz,
    frameRateHz,
    rule,
    width,
    height,
    edge,
    pattern,
    density,
    startPaused,
    saveFile,
    dbPath,
    logLevel
  };
  if (typeof input.loadFile === 'string' && input.loadFile.trim()) {
    output.loadFile = input.loadFile.trim();
  }
  if (seed !== undefined) output.seed = seed;
  return output;
}

/** Keys accepted in a TOML config file. */
const TOML_KEYS: ReadonlyArray<keyof ServerConfig> = [
  'host',
  'port',
  'tickRateHz',
  'frameRateHz',
  'rule',
  'width',
  'height',
  'edge',
  'pattern',
  'density',
  'startPaused',
  'saveFile',
  'loadFile',
  'dbPath',
  'logLevel',
  'seed'
];

function isConfigKey(key: string): key is keyof ServerConfig {
  return TOML_KEYS.some((known) => known === key);
}

/**
 * Read settings from a TOML file. Unknown keys are reported and skipped;
 * value validation happens in normalizeConfig.
 * @param filePath - TOML path.
 * @param warn - Warning sink.
 * @returns Partial config.
 * @throws Error when the file cannot be read or parsed.
 */
export function loadTomlConfig(
  filePath: string,
  warn?: (msg: string) => void
): ConfigInput {
  const raw = fs.readFileSync(filePath, 'utf8');
  let parsed: Record<string, unknown>;
  try {
    parsed = parseToml(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse ${filePath}: ${message}`);
  }
  const input: ConfigInput = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (!isConfigKey(key)) {
      warn?.(`unknown key "${key}" in ${filePath}; ignoring.`);
      continue;
    }
    input[key] = value;
  }
  return input;
}

/**
 * Build the server configuration. Later sources win:
 * defaults, TOML file, environment, command line.
 * @param argv - Arguments after the script name.
 * @param env - Process environment.
 * @param warn - Warning sink for invalid values.
 * @returns Normalized configuration.
 */
export function parseConfig(
  argv: string[],
  env: Env,
  warn: (msg: string) => void = (msg) => console.warn(`[config] ${msg}`)
): ServerConfig {
  const configPath = getArgValue(argv, '--config') ?? env['LIFEGRID_CONFIG'];
  const input: ConfigInput = configPath ? loadTomlConfig(configPath, warn) : {};

  const host = getArgValue(argv, '--host') ?? env['HOST'];
  if (host) input.host = host;
  const port = parseIntValue(getArgValue(argv, '--port')) ?? parseIntValue(env['PORT']);
  if (port !== undefined) input.port = port;
  const tickRate =
    parseIntValue(getArgValue(argv, '--tick')) ?? parseIntValue(env['TICK_RATE']);
  if (tickRate !== undefined) input.tickRateHz = tickRate;
  const frameRate =
    parseIntValue(getArgValue(argv, '--frame-rate')) ?? parseIntValue(env['FRAME_RATE']);
  if (frameRate !== undefined) input.frameRateHz = frameRate;
  const rule = getArgValue(argv, '--rule') ?? getPositional(argv) ?? env['RULE'];
  if (rule) input.rule = rule;
  const width = parseIntValue(getArgValue(argv, '--width')) ?? parseIntValue(env['GRID_WIDTH']);
  if (width !== undefined) input.width = width;
  const height =
    parseIntValue(getArgValue(argv, '--height')) ?? parseIntValue(env['GRID_HEIGHT']);
  if (height !== undefined) input.height = height;
  const edge = getArgValue(argv, '--edge') ?? env['EDGE'];
  if (edge) input.edge = edge;
  const pattern = getArgValue(argv, '--pattern') ?? env['PATTERN'];
  if (pattern) input.pattern = pattern;
  const density =
    parseFloatValue(getArgValue(argv, '--density')) ?? parseFloatValue(env['DENSITY']);
  if (density !== undefined) input.density = density;
  const paused = hasFlag(argv, '--paused') ? true : parseBoolValue(env['START_PAUSED']);
  if (paused !== undefined) input.startPaused = paused;
  const saveFile = getArgValue(argv, '--save-file') ?? env['SAVE_FILE'];
  if (saveFile) input.saveFile = saveFile;
  const loadFile = getArgValue(argv, '--load-file') ?? env['LOAD_FILE'];
  if (loadFile) input.loadFile = loadFile;
  const dbPath = getArgValue(argv, '--db-path') ?? env['DB_PATH'];
  if (dbPath) input.dbPath = dbPath;
  const logLevel = getArgValue(argv, '--log') ?? env['LOG_LEVEL'];
  if (logLevel) input.logLevel = logLevel;
  const seed =
    parseIntValue(getArgValue(argv, '--seed')) ?? parseIntValue(env['GRID_SEED']);
  if (seed !== undefined) input.seed = seed;
  return normalizeConfig(input, warn);
}
