import { performance } from 'node:perf_hooks';
import { CODEC_VERSION, encodeGrid } from '../src/codec.ts';
import type { Engine } from '../src/engine.ts';
import { CodecError, OutOfBoundsError } from '../src/errors.ts';
import type { Grid, GridShape } from '../src/grid.ts';
import { createRng, hashSeed } from '../src/rng.ts';
import { formatRule } from '../src/rules.ts';
import { readGridFile, writeGridFile } from './gridFile.ts';
import { describeError, silentLogger, type Logger } from './logger.ts';
import type { Persistence, Snapshot, SnapshotMeta } from './persistence.ts';
import { PROTOCOL_VERSION, type CommandMsg, type StatsMsg, type WelcomeMsg } from './protocol.ts';
import type { FrameHub } from './wsHub.ts';

/** SQLite error code indicating the database or disk is full. */
const SQLITE_FULL_CODE = 'SQLITE_FULL';
const STATS_INTERVAL_MS = 1000;

/**
 * Determine whether an error is a SQLite "full" error.
 * @param err - Error thrown by persistence.
 * @returns True when the error matches SQLITE_FULL.
 */
function isSqliteFullError(err: unknown): boolean {
  if (!err || typeof err !== 'object' || !('code' in err)) return false;
  return err.code === SQLITE_FULL_CODE;
}

/**
 * User-facing message for a failed save or load.
 * @param action - "save" or "load".
 * @param err - Error thrown by gridFile.
 * @returns Message distinguishing missing/unreadable files from corrupt ones.
 */
export function describeFileError(action: 'save' | 'load', err: unknown): string {
  if (err instanceof CodecError) {
    if (err.kind === 'io' && err.code === 'ENOENT' && action === 'load') {
      return 'nothing to load: save file does not exist';
    }
    if (err.kind === 'io') return `${action} failed: ${err.message}`;
    return `save file is corrupt: ${err.message}`;
  }
  return `${action} failed: ${describeError(err)}`;
}

export interface SimServerOptions {
  tickRateHz: number;
  frameRateHz: number;
  saveFile: string;
  /** Default live fraction for randomize commands. */
  density: number;
  /** Base seed for randomize commands. */
  seed: number;
  sessionId?: string;
}

/** Drives the engine from a timer and fans state out to connected clients. */
export class SimServer {
  /** Engine that owns rules, grid and run state. */
  private engine: Engine;
  /** Outbound message hub. */
  private hub: FrameHub;
  private logger: Logger;
  /** Snapshot storage; null when absent or disabled. */
  private persistence: Persistence | null;
  /** Reason persistence was disabled, if any. */
  private persistenceDisabledReason: string | null = null;
  private options: SimServerOptions;
  private sessionId: string;
  /** Loop tick counter, advanced whether or not the engine is running. */
  private tickId = 0;
  /** Whether the timer loop is active. */
  private looping = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextTickAt = 0;
  private lastTickAt = 0;
  private lastFps = 0;
  private lastFrameSentAt = Number.NEGATIVE_INFINITY;
  private lastStatsSentAt = Number.NEGATIVE_INFINITY;
  /** Grid changed since the last broadcast frame. */
  private dirty = true;
  /** Counter mixed into the randomize seed so each fill differs. */
  private randomizeCount = 0;

  /**
   * @param engine - Engine to drive.
   * @param hub - Outbound hub.
   * @param options - Loop rates, save file and randomize defaults.
   * @param logger - Logger for lifecycle and failures.
   * @param persistence - Optional snapshot storage.
   */
  constructor(
    engine: Engine,
    hub: FrameHub,
    options: SimServerOptions,
    logger: Logger = silentLogger,
    persistence: Persistence | null = null
  ) {
    this.engine = engine;
    this.hub = hub;
    this.options = options;
    this.logger = logger;
    this.persistence = persistence;
    this.sessionId = options.sessionId ?? Math.random().toString(36).slice(2, 10);
  }

  /** Start the timer loop. */
  start(): void {
    if (this.looping) return;
    this.looping = true;
    this.nextTickAt = performance.now();
    this.loop();
  }

  /** Stop the timer loop. */
  stop(): void {
    this.looping = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
  }

  getTickId(): number {
    return this.tickId;
  }

  getEngine(): Engine {
    return this.engine;
  }

  buildWelcome(): WelcomeMsg {
    const grid = this.engine.grid;
    return {
      type: 'welcome',
      sessionId: this.sessionId,
      protocolVersion: PROTOCOL_VERSION,
      codecVersion: CODEC_VERSION,
      tickRate: this.options.tickRateHz,
      rule: formatRule(this.engine.rules),
      width: grid.width,
      height: grid.height,
      edge: grid.edge,
      state: this.engine.state
    };
  }

  buildStats(): StatsMsg {
    return {
      type: 'stats',
      tick: this.tickId,
      generation: this.engine.generation,
      population: this.engine.population(),
      state: this.engine.state,
      fps: Math.round(this.lastFps || this.options.tickRateHz)
    };
  }

  /**
   * Send the current frame and stats to a client that just said hello.
   * @param connId - Connection id.
   */
  handleHello(connId: number): void {
    this.hub.sendFrameTo(connId, encodeGrid(this.engine.grid));
    this.hub.sendJsonTo(connId, this.buildStats());
  }

  /**
   * Apply one client command between ticks.
   * @param connId - Connection id, for error replies.
   * @param msg - Validated command.
   */
  handleCommand(connId: number, msg: CommandMsg): void {
    try {
      this.applyCommand(connId, msg);
    } catch (err) {
      if (err instanceof OutOfBoundsError || err instanceof CodecError) {
        this.hub.sendJsonTo(connId, { type: 'error', message: err.message });
        return;
      }
      throw err;
    }
  }

  private applyCommand(connId: number, msg: CommandMsg): void {
    switch (msg.type) {
      case 'toggle':
        this.engine.toggleCell(msg.x, msg.y);
        this.dirty = true;
        return;
      case 'pause':
        this.engine.pause();
        this.logger.info('sim', 'paused');
        this.hub.broadcastJson(this.buildStats());
        return;
      case 'resume':
        this.engine.resume();
        this.logger.info('sim', 'resumed');
        this.hub.broadcastJson(this.buildStats());
        return;
      case 'step':
        this.engine.step();
        this.dirty = true;
        return;
      case 'clear':
        this.engine.clear();
        this.dirty = true;
        return;
      case 'randomize':
        this.randomize(msg.density ?? this.options.density);
        return;
      case 'save':
        try {
          const bytes = this.saveToFile();
          this.hub.sendJsonTo(connId, { type: 'saved', bytes });
        } catch (err) {
          this.hub.sendJsonTo(connId, { type: 'error', message: describeFileError('save', err) });
        }
        return;
      case 'load':
        try {
          this.loadFromFile();
        } catch (err) {
          this.hub.sendJsonTo(connId, { type: 'error', message: describeFileError('load', err) });
        }
        return;
    }
  }

  /**
   * Refill the grid from the seeded generator.
   * @param density - Live fraction in [0, 1].
   * @returns Live cell count.
   */
  randomize(density: number): number {
    this.randomizeCount += 1;
    const rng = createRng(hashSeed(this.options.seed, this.randomizeCount));
    const live = this.engine.randomize(rng, density);
    this.dirty = true;
    return live;
  }

  /**
   * Write the current grid to the configured save file.
   * @returns Bytes written.
   * @throws CodecError with kind `io` on write failure.
   */
  saveToFile(): number {
    const bytes = writeGridFile(this.options.saveFile, this.engine.grid);
    this.logger.info('sim', `saved ${bytes} bytes to ${this.options.saveFile}`);
    return bytes;
  }

  /**
   * Replace the grid with the configured save file's contents.
   * The engine is untouched when reading or decoding fails.
   * @returns Shape of the loaded grid.
   */
  loadFromFile(): GridShape {
    let grid: Grid;
    try {
      grid = readGridFile(this.options.saveFile);
    } catch (err) {
      this.logger.warn('sim', describeFileError('load', err));
      throw err;
    }
    this.installGrid(grid);
    this.logger.info('sim', `loaded ${grid.width}x${grid.height} grid from ${this.options.saveFile}`);
    return grid.shape();
  }

  /**
   * Replace the engine's grid and tell every client about the new shape.
   * @param grid - Grid to install.
   */
  installGrid(grid: Grid): void {
    this.engine.replaceGrid(grid);
    this.dirty = true;
    this.hub.broadcastJson({ type: 'loaded', ...grid.shape() });
  }

  /**
   * Store the current grid as a named snapshot.
   * @param name - Snapshot label.
   * @returns Snapshot id.
   */
  saveSnapshot(name: string): number {
    const persistence = this.requirePersistence();
    try {
      const id = persistence.saveSnapshot({
        name,
        rule: formatRule(this.engine.rules),
        generation: this.engine.generation,
        grid: this.engine.grid
      });
      this.logger.info('persistence', `saved snapshot ${id} "${name.trim()}"`);
      return id;
    } catch (err) {
      if (isSqliteFullError(err)) {
        this.disablePersistence('sqlite full during snapshot save', err);
      }
      throw err;
    }
  }

  listSnapshots(limit: number): SnapshotMeta[] {
    return this.requirePersistence().listSnapshots(limit);
  }

  /**
   * Install a stored snapshot's grid. The rule set stays as configured.
   * @param id - Snapshot id.
   * @returns The snapshot, or null when the id is unknown.
   */
  loadSnapshot(id: number): Snapshot | null {
    const snapshot = this.requirePersistence().loadSnapshot(id);
    if (!snapshot) return null;
    const rule = formatRule(this.engine.rules);
    if (snapshot.rule !== rule) {
      this.logger.warn(
        'persistence',
        `snapshot ${id} was recorded under ${snapshot.rule}; continuing with ${rule}`
      );
    }
    this.installGrid(snapshot.grid);
    return snapshot;
  }

  hasPersistence(): boolean {
    return this.persistence !== null;
  }

  private requirePersistence(): Persistence {
    if (!this.persistence) {
      throw new Error(this.persistenceDisabledReason
        ? `snapshots disabled (${this.persistenceDisabledReason})`
        : 'snapshots are not configured');
    }
    return this.persistence;
  }

  /**
   * Disable persistence after a non-recoverable storage failure.
   * @param reason - Human-readable reason for disabling.
   * @param err - Original error for logging.
   */
  private disablePersistence(reason: string, err: unknown): void {
    if (this.persistenceDisabledReason) return;
    this.persistenceDisabledReason = reason;
    this.persistence = null;
    this.logger.warn('persistence', `disabled (${reason}): ${describeError(err)}`);
  }

  /** Main timer loop for scheduling ticks. */
  private loop(): void {
    if (!this.looping) return;
    const now = performance.now();
    if (now >= this.nextTickAt) {
      this.tick(now);
      this.nextTickAt += 1000 / this.options.tickRateHz;
      // Skip missed ticks after a stall instead of bursting to catch up.
      if (this.nextTickAt < now) this.nextTickAt = now;
    }
    const delay = Math.max(0, this.nextTickAt - now);
    this.timer = setTimeout(() => this.loop(), delay);
  }

  /**
   * Run one loop iteration: advance the engine when running and broadcast as needed.
   * @param now - Current timestamp in ms.
   */
  tick(now: number): void {
    this.tickId += 1;
    if (this.lastTickAt > 0) {
      const dt = (now - this.lastTickAt) / 1000;
      if (dt > 0) this.lastFps = 1 / dt;
    }
    this.lastTickAt = now;

    if (this.engine.tick()) this.dirty = true;

    const frameDue = now - this.lastFrameSentAt >= 1000 / this.options.frameRateHz;
    if (this.dirty && frameDue && this.hub.hasFrameRecipients()) {
      this.hub.broadcastFrame(encodeGrid(this.engine.grid));
      this.lastFrameSentAt = now;
      this.dirty = false;
    }
    if (now - this.lastStatsSentAt >= STATS_INTERVAL_MS) {
      this.hub.broadcastJson(this.buildStats());
      this.lastStatsSentAt = now;
    }
  }
}
