/**
 * Tests for the workspace helper functions
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  barNumberOf,
  createPrelude,
  extractDeviceNumber,
  extractDeviceUpdate,
  findEntryAfter,
  findEntryBefore,
  formatCueCountdown,
  pitchToMultiplier,
  pitchToPercentage,
} from "./prelude.js";
import { createStaticServices, offlineServices } from "./services.js";
import type { CueList } from "../runtime/events.js";
import {
  sampleBeat,
  sampleCdjStatus,
  samplePosition,
} from "../types/test-harness.js";

const cueList: CueList = {
  entries: [
    { cueTime: 1000, hotCueNumber: 0, isLoop: false },
    { cueTime: 5000, hotCueNumber: 1, isLoop: false, comment: "Drop" },
  ],
};

describe("Workspace prelude", () => {
  describe("pitch conversion", () => {
    it("should treat 1048576 as normal speed", () => {
      expect(pitchToMultiplier(1048576)).to.equal(1);
      expect(pitchToMultiplier(2097152)).to.equal(2);
      expect(pitchToPercentage(1048576)).to.equal(0);
    });

    it("should span -100% to +100%", () => {
      expect(pitchToPercentage(0)).to.be.closeTo(-100, 1e-9);
      expect(pitchToPercentage(2097152)).to.be.closeTo(100, 1e-9);
    });
  });

  describe("formatCueCountdown", () => {
    it("should show dashes when no cue is near", () => {
      expect(formatCueCountdown(511)).to.equal("--.-");
    });

    it("should show bars and beats to the cue", () => {
      expect(formatCueCountdown(256)).to.equal("63.4");
      expect(formatCueCountdown(5)).to.equal("01.1");
      expect(formatCueCountdown(1)).to.equal("00.1");
      expect(formatCueCountdown(0)).to.equal("00.0");
    });

    it("should flag values a player never sends", () => {
      expect(formatCueCountdown(300)).to.equal("??.?");
      expect(formatCueCountdown(-1)).to.equal("??.?");
    });
  });

  it("should find the update inside a beat with position", () => {
    const beat = sampleBeat({ deviceNumber: 3 });
    expect(extractDeviceUpdate([beat, samplePosition()])).to.equal(beat);
    expect(extractDeviceUpdate(beat)).to.equal(beat);
    expect(extractDeviceNumber([beat, samplePosition()])).to.equal(3);
  });

  it("should number bars from the first downbeat", () => {
    const grid = { beatWithinBar: [1, 2, 3, 4, 1, 2, 3, 4] };
    expect(barNumberOf(grid, 4)).to.equal(1);
    expect(barNumberOf(grid, 5)).to.equal(2);
    expect(barNumberOf(grid, 8)).to.equal(2);
    expect(barNumberOf(grid, 9)).to.equal(undefined);
  });

  it("should treat a cue at the position as both next and previous", () => {
    expect(findEntryAfter(cueList, 1000)?.cueTime).to.equal(1000);
    expect(findEntryBefore(cueList, 1000)?.cueTime).to.equal(1000);
    expect(findEntryAfter(cueList, 1001)?.cueTime).to.equal(5000);
    expect(findEntryBefore(cueList, 4999)?.cueTime).to.equal(1000);
    expect(findEntryBefore(cueList, 999)).to.equal(undefined);
    expect(findEntryAfter(cueList, 5001)).to.equal(undefined);
  });

  describe("service-backed helpers", () => {
    const services = createStaticServices(
      new Map([
        [
          2,
          {
            playbackTime: 3000,
            position: samplePosition({ beatNumber: 5 }),
            beatGrid: { beatWithinBar: [1, 2, 3, 4, 1, 2, 3, 4] },
            metadata: { title: "Test Track", duration: 240, cueList },
          },
        ],
        [3, { playbackTime: -1 }],
      ])
    );
    const prelude = createPrelude(() => services);

    it("should find cues around the playback position", () => {
      const status = sampleCdjStatus();
      expect(prelude.findNextCue(status)?.cueTime).to.equal(5000);
      expect(prelude.findPreviousCue(status)?.cueTime).to.equal(1000);
    });

    it("should work out the current beat and bar", () => {
      expect(prelude.currentBeat(sampleBeat())).to.equal(5);
      expect(prelude.currentBar(sampleBeat())).to.equal(2);
    });

    it("should take the beat of a beat with position from the position", () => {
      const event = [sampleBeat(), samplePosition({ beatNumber: 1 })] as const;
      expect(prelude.currentBeat(event)).to.equal(1);
      expect(prelude.currentBar(event)).to.equal(1);
    });

    it("should hide negative playback times", () => {
      expect(prelude.playbackTime(sampleBeat({ deviceNumber: 3 }))).to.equal(
        undefined
      );
    });

    it("should know nothing while the network is offline", () => {
      const offline = createPrelude(() => offlineServices);
      expect(offline.currentBeat(sampleBeat())).to.equal(undefined);
      expect(offline.currentBar(sampleBeat())).to.equal(undefined);
      expect(offline.findNextCue(sampleCdjStatus())).to.equal(undefined);
      expect(offline.metadataFor(sampleBeat())).to.equal(undefined);
    });
  });
});
