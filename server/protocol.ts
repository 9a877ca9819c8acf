import type { EdgePolicy } from '../src/grid.ts';
import type { EngineState } from '../src/engine.ts';

export const PROTOCOL_VERSION = 1;

export type ClientType = 'ui' | 'script';

export interface HelloMsg {
  type: 'hello';
  clientType: ClientType;
  version: number;
}

export interface PingMsg {
  type: 'ping';
  t?: number;
}

export interface ToggleMsg {
  type: 'toggle';
  x: number;
  y: number;
}

export interface PauseMsg {
  type: 'pause';
}

export interface ResumeMsg {
  type: 'resume';
}

export interface StepMsg {
  type: 'step';
}

export interface ClearMsg {
  type: 'clear';
}

export interface RandomizeMsg {
  type: 'randomize';
  density?: number;
}

export interface SaveMsg {
  type: 'save';
}

export interface LoadMsg {
  type: 'load';
}

/** Messages that operate on the engine once the client has said hello. */
export type CommandMsg =
  | ToggleMsg
  | PauseMsg
  | ResumeMsg
  | StepMsg
  | ClearMsg
  | RandomizeMsg
  | SaveMsg
  | LoadMsg;

export type ClientMessage = HelloMsg | PingMsg | CommandMsg;

export interface WelcomeMsg {
  type: 'welcome';
  sessionId: string;
  protocolVersion: number;
  codecVersion: number;
  tickRate: number;
  rule: string;
  width: number;
  height: number;
  edge: EdgePolicy;
  state: EngineState;
}

export interface StatsMsg {
  type: 'stats';
  tick: number;
  generation: number;
  population: number;
  state: EngineState;
  fps: number;
}

export interface SavedMsg {
  type: 'saved';
  bytes: number;
}

export interface LoadedMsg {
  type: 'loaded';
  width: number;
  height: number;
  edge: EdgePolicy;
}

export interface ErrorMsg {
  type: 'error';
  message: string;
}

export type ServerMessage = WelcomeMsg | StatsMsg | SavedMsg | LoadedMsg | ErrorMsg;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function isCellIndex(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0;
}

export function isHello(msg: unknown): msg is HelloMsg {
  if (!isRecord(msg)) return false;
  return (
    msg['type'] === 'hello' &&
    msg['version'] === PROTOCOL_VERSION &&
    (msg['clientType'] === 'ui' || msg['clientType'] === 'script')
  );
}

export function isPing(msg: unknown): msg is PingMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'ping') return false;
  if ('t' in msg && !isFiniteNumber(msg['t'])) return false;
  return true;
}

export function isToggle(msg: unknown): msg is ToggleMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'toggle') return false;
  return isCellIndex(msg['x']) && isCellIndex(msg['y']);
}

export function isRandomize(msg: unknown): msg is RandomizeMsg {
  if (!isRecord(msg)) return false;
  if (msg['type'] !== 'randomize') return false;
  if ('density' in msg) {
    const density = msg['density'];
    if (!isFiniteNumber(density) || density < 0 || density > 1) return false;
  }
  return true;
}

const BARE_COMMANDS = ['pause', 'resume', 'step', 'clear', 'save', 'load'] as const;
type BareCommand = (typeof BARE_COMMANDS)[number];

function isBareCommand(type: string): type is BareCommand {
  return BARE_COMMANDS.some((command) => command === type);
}

export function parseClientMessage(raw: unknown): ClientMessage | null {
  if (!isRecord(raw)) return null;
  const type = raw['type'];
  if (typeof type !== 'string') return null;
  switch (type) {
    case 'hello':
      return isHello(raw) ? raw : null;
    case 'ping':
      return isPing(raw) ? raw : null;
    case 'toggle':
      return isToggle(raw) ? raw : null;
    case 'randomize':
      return isRandomize(raw) ? raw : null;
    default:
      return isBareCommand(type) ? { type } : null;
  }
}
