import { beforeEach, describe, expect, it } from "vitest";
import {
  createParserState,
  decodeByte,
  getActiveChannel,
  initParserState,
  type MidiChannel,
  type MidiParserState,
  setActiveChannel,
  UNDEFINED_STATUS_BYTES,
} from "../midi";
import { decodeEach, stateSnapshot } from "./test-utils";

describe("Error Handling and Edge Cases", () => {
  let state: MidiParserState;

  beforeEach(() => {
    state = createParserState();
  });

  describe("Invalid Arguments", () => {
    // Callers outside the type system may pass anything
    const missingState = undefined as unknown as MidiParserState;

    it("should report no message for a missing state", () => {
      expect(decodeByte(missingState, 0x90)).toBeNull();
      expect(decodeByte(missingState, 0xf8)).toBeNull();
    });

    it("should not throw when initializing a missing state", () => {
      expect(() => initParserState(missingState)).not.toThrow();
      expect(() => setActiveChannel(missingState, 3)).not.toThrow();
      expect(getActiveChannel(missingState)).toBeNull();
    });

    it("should ignore values outside a byte without touching state", () => {
      decodeEach(state, [0x91, 0x30]);
      const before = stateSnapshot(state);

      for (const value of [-1, 256, 0x190, 1.5, Number.NaN, Infinity]) {
        expect(decodeByte(state, value)).toBeNull();
        expect(stateSnapshot(state)).toEqual(before);
      }

      // The pending Note On still completes
      expect(decodeByte(state, 0x50)).toEqual({
        type: "noteOn",
        channel: 1,
        note: 0x30,
        velocity: 0x50,
      });
    });

    it("should ignore an out-of-range active channel", () => {
      setActiveChannel(state, 9);
      for (const value of [16, -1, 2.5]) {
        setActiveChannel(state, value as MidiChannel);
      }
      expect(getActiveChannel(state)).toBe(9);
    });
  });

  describe("Undefined Status Bytes", () => {
    it("should list the four undefined system status bytes", () => {
      expect(UNDEFINED_STATUS_BYTES).toEqual([0xf4, 0xf5, 0xf9, 0xfd]);
    });

    for (const undefinedByte of UNDEFINED_STATUS_BYTES) {
      const hex = `0x${undefinedByte.toString(16)}`;

      it(`should ignore ${hex} on a fresh parser`, () => {
        expect(decodeByte(state, undefinedByte)).toBeNull();
        expect(stateSnapshot(state)).toEqual(stateSnapshot(createParserState()));
      });

      it(`should ignore ${hex} in the middle of a Note On`, () => {
        expect(decodeEach(state, [0x90, 60, undefinedByte])).toEqual([
          null,
          null,
          null,
        ]);
        expect(state.status).toBe("noteOn");
        expect(state.channel).toBe(0);
        expect(state.byteCount).toBe(1);

        expect(decodeByte(state, 100)).toEqual({
          type: "noteOn",
          channel: 0,
          note: 60,
          velocity: 100,
        });
      });

      it(`should ignore ${hex} inside SysEx`, () => {
        expect(decodeEach(state, [0xf0, 0x0a, undefinedByte, 0x05])).toEqual([
          { type: "systemExclusive", channel: null },
          null,
          null,
          null,
        ]);
        expect(state.status).toBe("systemExclusive");

        expect(decodeByte(state, 0xf7)).toEqual({
          type: "endOfExclusive",
          channel: null,
        });
        expect(state.status).toBeNull();
      });
    }
  });

  describe("Stray Data Bytes", () => {
    it("should ignore data bytes before any status byte", () => {
      for (let data = 0; data < 128; data++) {
        expect(decodeByte(state, data)).toBeNull();
      }
      expect(stateSnapshot(state)).toEqual(stateSnapshot(createParserState()));
    });

    it("should ignore data bytes after End of Exclusive", () => {
      expect(decodeEach(state, [0xf0, 0x01, 0xf7, 0x40, 0x41])).toEqual([
        { type: "systemExclusive", channel: null },
        null,
        { type: "endOfExclusive", channel: null },
        null,
        null,
      ]);
    });

    it("should ignore data bytes after an MTC Quarter Frame completes", () => {
      expect(decodeEach(state, [0xf1, 0x23, 0x45])).toEqual([
        null,
        { type: "mtcQuarterFrame", channel: null, mtcType: 2, mtcValue: 3 },
        null,
      ]);
    });

    it("should ignore data bytes after a Song Position Pointer completes", () => {
      expect(decodeEach(state, [0xf2, 0x10, 0x02, 0x10, 0x02])).toEqual([
        null,
        null,
        { type: "songPositionPointer", channel: null, position: 0x110 },
        null,
        null,
      ]);
    });
  });

  describe("Accumulation Overflow Guard", () => {
    it("should reset a corrupted count and drop the byte", () => {
      decodeByte(state, 0x90);
      state.byteCount = 2;

      expect(decodeByte(state, 0x40)).toBeNull();
      expect(state.byteCount).toBe(0);
      expect(state.status).toBe("noteOn");

      // Decoding resumes cleanly afterwards
      expect(decodeEach(state, [0x40, 0x41])).toEqual([
        null,
        { type: "noteOn", channel: 0, note: 0x40, velocity: 0x41 },
      ]);
    });

    it("should treat a count at a one-byte message's length as overflow", () => {
      decodeByte(state, 0xc2);
      state.byteCount = 1;

      expect(decodeByte(state, 0x10)).toBeNull();
      expect(state.byteCount).toBe(0);
      expect(decodeByte(state, 0x11)).toEqual({
        type: "programChange",
        channel: 2,
        program: 0x11,
      });
    });

    it("should reset a negative count", () => {
      decodeByte(state, 0xe0);
      state.byteCount = -3;

      expect(decodeByte(state, 0x00)).toBeNull();
      expect(state.byteCount).toBe(0);
    });
  });
});
