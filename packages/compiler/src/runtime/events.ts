/**
 * Event shapes handed over by the network layer. Expressions receive
 * these as `event`; catalog generators read them.
 */

type DeviceUpdateFields = {
  readonly deviceNumber: number;
  readonly deviceName: string;
  readonly address: string;
  /** Nanosecond the packet was received */
  readonly timestamp: number;
  /** Raw pitch, 0 to 2,097,152 with 1,048,576 as normal speed */
  readonly pitch: number;
  /** Track BPM times 100 */
  readonly bpm: number;
  readonly effectiveTempo: number;
  readonly beatWithinBar: number;
  readonly isBeatWithinBarMeaningful: boolean;
  readonly isTempoMaster: boolean;
};

export type Beat = DeviceUpdateFields & {
  readonly type: "beat";
};

export type MixerStatus = DeviceUpdateFields & {
  readonly type: "mixer-status";
};

export type TrackSourceSlot =
  | "no-track"
  | "cd-slot"
  | "sd-slot"
  | "usb-slot"
  | "collection"
  | "unknown";

export type TrackType =
  | "no-track"
  | "cd-digital-audio"
  | "rekordbox"
  | "unanalyzed"
  | "unknown";

export type CdjStatus = DeviceUpdateFields & {
  readonly type: "cdj-status";
  readonly beatNumber: number;
  readonly cueCountdown: number;
  readonly isAtEnd: boolean;
  readonly isBusy: boolean;
  readonly isCued: boolean;
  readonly isLooping: boolean;
  readonly isOnAir: boolean;
  readonly isPaused: boolean;
  readonly isPlaying: boolean;
  readonly isSynced: boolean;
  readonly rekordboxId: number;
  readonly trackNumber: number;
  readonly trackSourcePlayer: number;
  readonly trackSourceSlot: TrackSourceSlot;
  readonly trackType: TrackType;
};

export type DeviceUpdate = Beat | MixerStatus | CdjStatus;

/**
 * Where a player is within its track, as inferred from beats and status
 */
export type TrackPositionUpdate = {
  readonly timestamp: number;
  readonly milliseconds: number;
  readonly beatNumber: number;
  readonly definitive: boolean;
  readonly playing: boolean;
  readonly pitch: number;
  readonly reverse: boolean;
};

export type BeatWithPosition = readonly [Beat, TrackPositionUpdate];

/**
 * Anything an expression may be handed as its event
 */
export type ExpressionEvent = DeviceUpdate | BeatWithPosition;

export type CueEntry = {
  /** Position of the cue in milliseconds */
  readonly cueTime: number;
  readonly hotCueNumber: number;
  readonly isLoop: boolean;
  readonly comment?: string;
};

/**
 * Cue entries ordered by `cueTime`
 */
export type CueList = {
  readonly entries: readonly CueEntry[];
};

/**
 * Beat-within-bar value of every beat of a track, first beat first
 */
export type BeatGrid = {
  readonly beatWithinBar: readonly number[];
};

export type TrackMetadata = {
  readonly title: string;
  readonly artist?: string;
  readonly album?: string;
  readonly comment?: string;
  readonly genre?: string;
  readonly key?: string;
  readonly label?: string;
  /** Length in seconds */
  readonly duration: number;
  readonly cueList?: CueList;
};

export const isBeatWithPosition = (
  event: ExpressionEvent
): event is BeatWithPosition => Array.isArray(event);
