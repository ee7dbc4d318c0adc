/**
 * Shared helpers for tests: unwrapping results, temporary directories,
 * small catalogs and sample events
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { Result } from "./result.js";
import type { EventKindDefinition } from "../catalog/types.js";
import type {
  Beat,
  CdjStatus,
  MixerStatus,
  TrackPositionUpdate,
} from "../runtime/events.js";

const describeError = (value: unknown): string =>
  value instanceof Error ? value.message : JSON.stringify(value, null, 2);

export const expectOk = <T, E>(result: Result<T, E>): T => {
  if (!result.ok) {
    throw new Error(`Expected success, got: ${describeError(result.error)}`);
  }
  return result.value;
};

export const expectError = <T, E>(result: Result<T, E>): E => {
  if (result.ok) {
    throw new Error("Expected failure, got success");
  }
  return result.error;
};

export type TempDir = {
  readonly dir: string;
  readonly write: (name: string, content: string) => string;
  readonly cleanup: () => void;
};

export const createTempDir = (): TempDir => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "trigger-expr-test-"));
  return {
    dir,
    write: (name, content) => {
      const filePath = path.join(dir, name);
      fs.mkdirSync(path.dirname(filePath), { recursive: true });
      fs.writeFileSync(filePath, content);
      return filePath;
    },
    cleanup: () => fs.rmSync(dir, { recursive: true, force: true }),
  };
};

/**
 * Two kinds: `Base` binds `x`, `Child` inherits it and adds `y`,
 * which needs `x` bound first
 */
export const BASE_AND_CHILD: readonly EventKindDefinition[] = [
  {
    kind: "Base",
    inherits: [],
    bindings: [{ name: "x", generator: "1 + 1", doc: "Two." }],
  },
  {
    kind: "Child",
    inherits: ["Base"],
    bindings: [
      { name: "y", generator: "x * 10", doc: "Ten times x.", requires: "x" },
    ],
  },
];

const deviceFields = {
  deviceNumber: 2,
  deviceName: "CDJ-3000",
  address: "192.168.1.12",
  timestamp: 1000,
  pitch: 1048576,
  bpm: 12800,
  effectiveTempo: 128,
  beatWithinBar: 1,
  isBeatWithinBarMeaningful: true,
  isTempoMaster: false,
};

export const sampleBeat = (overrides: Partial<Beat> = {}): Beat => ({
  ...deviceFields,
  ...overrides,
  type: "beat",
});

export const sampleMixerStatus = (
  overrides: Partial<MixerStatus> = {}
): MixerStatus => ({
  ...deviceFields,
  deviceNumber: 33,
  deviceName: "DJM-900NXS2",
  ...overrides,
  type: "mixer-status",
});

export const sampleCdjStatus = (
  overrides: Partial<CdjStatus> = {}
): CdjStatus => ({
  ...deviceFields,
  beatNumber: 5,
  cueCountdown: 511,
  isAtEnd: false,
  isBusy: true,
  isCued: false,
  isLooping: false,
  isOnAir: true,
  isPaused: false,
  isPlaying: true,
  isSynced: false,
  rekordboxId: 42,
  trackNumber: 3,
  trackSourcePlayer: 2,
  trackSourceSlot: "usb-slot",
  trackType: "rekordbox",
  ...overrides,
  type: "cdj-status",
});

export const samplePosition = (
  overrides: Partial<TrackPositionUpdate> = {}
): TrackPositionUpdate => ({
  timestamp: 1000,
  milliseconds: 3000,
  beatNumber: 7,
  definitive: true,
  playing: true,
  pitch: 1048576,
  reverse: false,
  ...overrides,
});
