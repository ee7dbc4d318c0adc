/**
 * Device services - the network layer's lookups that workspace helpers
 * read through. Replaceable so the workspace runs without a network.
 */

import type {
  BeatGrid,
  CdjStatus,
  DeviceUpdate,
  TrackMetadata,
  TrackPositionUpdate,
} from "../runtime/events.js";

export type DeviceServices = {
  /** Milliseconds into the track, negative or undefined when unknown */
  readonly playbackTimeFor: (update: DeviceUpdate) => number | undefined;
  readonly positionFor: (
    update: DeviceUpdate
  ) => TrackPositionUpdate | undefined;
  readonly beatGridFor: (update: DeviceUpdate) => BeatGrid | undefined;
  readonly metadataFor: (update: DeviceUpdate) => TrackMetadata | undefined;
  readonly latestStatusFor: (update: DeviceUpdate) => CdjStatus | undefined;
};

/**
 * Services of a network layer that is not running: nothing is known
 */
export const offlineServices: DeviceServices = {
  playbackTimeFor: () => undefined,
  positionFor: () => undefined,
  beatGridFor: () => undefined,
  metadataFor: () => undefined,
  latestStatusFor: () => undefined,
};

export type DeviceState = {
  readonly playbackTime?: number;
  readonly position?: TrackPositionUpdate;
  readonly beatGrid?: BeatGrid;
  readonly metadata?: TrackMetadata;
  readonly status?: CdjStatus;
};

/**
 * Services answering from fixed per-device state, keyed by device number
 */
export const createStaticServices = (
  devices: ReadonlyMap<number, DeviceState>
): DeviceServices => ({
  playbackTimeFor: (update) => devices.get(update.deviceNumber)?.playbackTime,
  positionFor: (update) => devices.get(update.deviceNumber)?.position,
  beatGridFor: (update) => devices.get(update.deviceNumber)?.beatGrid,
  metadataFor: (update) => devices.get(update.deviceNumber)?.metadata,
  latestStatusFor: (update) => devices.get(update.deviceNumber)?.status,
});
