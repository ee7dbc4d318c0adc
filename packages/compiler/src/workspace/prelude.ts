/**
 * Helper functions installed in the shared workspace for generators and
 * user snippets
 */

import {
  type BeatGrid,
  type CdjStatus,
  type CueEntry,
  type CueList,
  type DeviceUpdate,
  type ExpressionEvent,
  type TrackMetadata,
  isBeatWithPosition,
} from "../runtime/events.js";
import type { DeviceServices } from "./services.js";

/** Raw pitch value of normal playback speed */
export const NORMAL_PITCH = 1048576;

/** Cue countdown value reported when no cue is within 64 bars */
export const NO_CUE_COUNTDOWN = 511;

export const pitchToMultiplier = (pitch: number): number =>
  pitch / NORMAL_PITCH;

export const pitchToPercentage = (pitch: number): number =>
  (pitch - NORMAL_PITCH) / (NORMAL_PITCH / 100);

/**
 * Cue countdown the way a player displays it: bars and beats to the
 * next cue, "--.-" when there is none
 */
export const formatCueCountdown = (countdown: number): string => {
  if (countdown === NO_CUE_COUNTDOWN) {
    return "--.-";
  }
  if (countdown === 0) {
    return "00.0";
  }
  if (Number.isInteger(countdown) && countdown >= 1 && countdown <= 256) {
    const bars = Math.floor((countdown - 1) / 4);
    const beats = ((countdown - 1) % 4) + 1;
    return `${String(bars).padStart(2, "0")}.${beats}`;
  }
  return "??.?";
};

export const extractDeviceUpdate = (event: ExpressionEvent): DeviceUpdate =>
  isBeatWithPosition(event) ? event[0] : event;

export const extractDeviceNumber = (event: ExpressionEvent): number =>
  extractDeviceUpdate(event).deviceNumber;

/**
 * Bar holding a beat, counting from 1 at the first downbeat
 */
export const barNumberOf = (
  grid: BeatGrid,
  beat: number
): number | undefined => {
  const beatWithinBar = grid.beatWithinBar[beat - 1];
  if (beatWithinBar === undefined) {
    return undefined;
  }
  return Math.floor((beat - beatWithinBar) / 4) + 1;
};

/**
 * First cue at or after a position, so a player sitting on a cue sees it
 * as both next and previous
 */
export const findEntryAfter = (
  cueList: CueList,
  milliseconds: number
): CueEntry | undefined =>
  cueList.entries.find((entry) => entry.cueTime >= milliseconds);

export const findEntryBefore = (
  cueList: CueList,
  milliseconds: number
): CueEntry | undefined =>
  [...cueList.entries].reverse().find((entry) => entry.cueTime <= milliseconds);

export type Prelude = {
  readonly extractDeviceUpdate: (event: ExpressionEvent) => DeviceUpdate;
  readonly extractDeviceNumber: (event: ExpressionEvent) => number;
  readonly playbackTime: (update: DeviceUpdate) => number | undefined;
  readonly currentBeat: (event: ExpressionEvent) => number | undefined;
  readonly currentBar: (event: ExpressionEvent) => number | undefined;
  readonly barNumberFor: (
    update: DeviceUpdate,
    beat: number
  ) => number | undefined;
  readonly metadataFor: (update: DeviceUpdate) => TrackMetadata | undefined;
  readonly latestStatusFor: (update: DeviceUpdate) => CdjStatus | undefined;
  readonly findNextCue: (event: ExpressionEvent) => CueEntry | undefined;
  readonly findPreviousCue: (event: ExpressionEvent) => CueEntry | undefined;
  readonly pitchToMultiplier: (pitch: number) => number;
  readonly pitchToPercentage: (pitch: number) => number;
  readonly formatCueCountdown: (countdown: number) => string;
};

/**
 * Build the helpers over whichever services are current when called
 */
export const createPrelude = (services: () => DeviceServices): Prelude => {
  const playbackTime = (update: DeviceUpdate): number | undefined => {
    const time = services().playbackTimeFor(update);
    return time === undefined || time < 0 ? undefined : time;
  };

  const currentBeat = (event: ExpressionEvent): number | undefined =>
    isBeatWithPosition(event)
      ? event[1].beatNumber
      : services().positionFor(event)?.beatNumber;

  const barNumberFor = (
    update: DeviceUpdate,
    beat: number
  ): number | undefined => {
    const grid = services().beatGridFor(update);
    return grid ? barNumberOf(grid, beat) : undefined;
  };

  const currentBar = (event: ExpressionEvent): number | undefined => {
    const beat = currentBeat(event);
    return beat === undefined
      ? undefined
      : barNumberFor(extractDeviceUpdate(event), beat);
  };

  const metadataFor = (update: DeviceUpdate): TrackMetadata | undefined =>
    services().metadataFor(update);

  const cueNear = (
    event: ExpressionEvent,
    find: (cueList: CueList, milliseconds: number) => CueEntry | undefined
  ): CueEntry | undefined => {
    const update = extractDeviceUpdate(event);
    const reached = playbackTime(update);
    const cueList = metadataFor(update)?.cueList;
    return reached === undefined || cueList === undefined
      ? undefined
      : find(cueList, reached);
  };

  return {
    extractDeviceUpdate,
    extractDeviceNumber,
    playbackTime,
    currentBeat,
    currentBar,
    barNumberFor,
    metadataFor,
    latestStatusFor: (update) => services().latestStatusFor(update),
    findNextCue: (event) => cueNear(event, findEntryAfter),
    findPreviousCue: (event) => cueNear(event, findEntryBefore),
    pitchToMultiplier,
    pitchToPercentage,
    formatCueCountdown,
  };
};
